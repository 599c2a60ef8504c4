/**
 * Run one analysis outside the MCP server and print the result.
 *
 *   npm run analyze -- "Total sales by region" --dataset=sales --location=data/sales.parquet
 *   npm run analyze -- "Top customers" --engine=postgres --no-fallback --max-corrections=1
 */

import { createAnalysisAgent, type AnalysisRequest } from "../src/analysis_agent.js"
import { isEngineId, type DatasetRef, type ExecutorConfig } from "../src/config.js"
import { loadConfig } from "../src/config/loadConfig.js"
import { closeEngines } from "../src/engine_registry.js"
import { AnalysisError, errorMessage } from "../src/errors.js"
import { createLogger } from "../src/logger.js"

function parseArgs(args: string[]): AnalysisRequest {
	const words: string[] = []
	const overrides: Partial<ExecutorConfig> = {}
	let dataset: DatasetRef | undefined
	let location: string | undefined
	let visualize: boolean | undefined

	for (const arg of args) {
		if (arg.startsWith("--dataset=")) {
			dataset = { name: arg.split("=")[1] }
		} else if (arg.startsWith("--location=")) {
			location = arg.slice("--location=".length)
		} else if (arg.startsWith("--engine=")) {
			const engine = arg.split("=")[1]
			if (!isEngineId(engine)) throw new Error(`Unknown engine: ${engine}`)
			overrides.primary_engine = engine
		} else if (arg === "--no-fallback") {
			overrides.enable_fallback = false
		} else if (arg.startsWith("--max-corrections=")) {
			overrides.max_corrections_per_engine = parseInt(arg.split("=")[1], 10)
		} else if (arg === "--no-plot") {
			visualize = false
		} else {
			words.push(arg)
		}
	}

	if (words.length === 0) {
		throw new Error('Usage: analyze_once "<question>" [--dataset=name --location=path] [--engine=duckdb|spark|postgres]')
	}
	if (location) {
		if (!dataset) throw new Error("--location needs --dataset")
		dataset.location = location
		dataset.format = location.endsWith(".csv") ? "csv" : "parquet"
	}

	return { question: words.join(" "), dataset, config: overrides, visualize }
}

async function main() {
	const request = parseArgs(process.argv.slice(2))
	const config = loadConfig()
	const logger = createLogger(config.logging.level)
	const { agent, engines } = createAnalysisAgent(config, logger)

	try {
		const result = await agent.analyze(request)

		console.log("\n=== RESULT ===")
		console.log("Status:", result.status)
		console.log("Engine:", result.engine ?? "-")
		console.log("SQL:", result.final_sql?.substring(0, 300) ?? "-")
		console.log("Rows:", result.row_count ?? 0, result.truncated ? "(truncated)" : "")
		for (const attempt of result.attempts) {
			const outcome = attempt.outcome.status === "success"
				? `ok, ${attempt.outcome.row_count} rows`
				: `${attempt.outcome.kind}: ${attempt.outcome.message.substring(0, 120)}`
			console.log(`  #${attempt.sequence} ${attempt.engine} (${attempt.origin}) ${outcome}`)
		}
		if (result.error) console.log("Error:", `${result.error.kind}: ${result.error.message.substring(0, 200)}`)
		if (result.plot) console.log("Chart:", result.plot.path)
		if (result.plot_error) console.log("Chart error:", result.plot_error)
		console.log("Latency:", `${result.latency_ms}ms`)
	} catch (error) {
		const type = error instanceof AnalysisError ? error.type : "unknown"
		console.error(`Analysis failed (${type}): ${errorMessage(error)}`)
		process.exitCode = 1
	} finally {
		await closeEngines(engines, logger)
	}
}

main().catch((error) => {
	console.error(errorMessage(error))
	process.exitCode = 1
})
