/**
 * MCP server exposing the analysis pipeline as a single tool
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import { ENGINE_IDS, type EngineId } from "./config.js"
import type { AppConfig } from "./config/loadConfig.js"
import { createAnalysisAgent, type AnalysisAgent, type AnalysisRequest } from "./analysis_agent.js"
import type { EngineAdapter } from "./engine_adapter.js"
import type { EngineMap } from "./engine_registry.js"
import { AnalysisError, errorMessage } from "./errors.js"
import type { OllamaClient } from "./llm_client.js"
import type { Logger } from "./logger.js"

export const analyzeDataShape = {
	question: z.string().min(1).describe("Question about the data, in natural language"),
	dataset: z
		.object({
			name: z.string().min(1).describe("Table or view name the SQL should use"),
			location: z.string().optional().describe("File or directory exposed under that name"),
			format: z.enum(["parquet", "csv", "table"]).optional(),
		})
		.optional(),
	primary_engine: z.enum(ENGINE_IDS).optional(),
	enable_fallback: z.boolean().optional(),
	max_corrections_per_engine: z.number().int().min(0).optional(),
	per_attempt_timeout_ms: z.number().int().positive().optional(),
	visualize: z.boolean().optional().describe("Write a Vega-Lite chart of the result"),
}

const analyzeDataInput = z.object(analyzeDataShape)
export type AnalyzeDataInput = z.infer<typeof analyzeDataInput>

export function toAnalysisRequest(input: AnalyzeDataInput): AnalysisRequest {
	return {
		question: input.question,
		dataset: input.dataset,
		visualize: input.visualize,
		config: {
			primary_engine: input.primary_engine,
			enable_fallback: input.enable_fallback,
			max_corrections_per_engine: input.max_corrections_per_engine,
			per_attempt_timeout_ms: input.per_attempt_timeout_ms,
		},
	}
}

/**
 * JSON text for tool results; engine drivers may hand back bigint and Date values
 */
export function toJson(value: unknown): string {
	return JSON.stringify(
		value,
		(_key, v: unknown) => (typeof v === "bigint" ? (Number.isSafeInteger(Number(v)) ? Number(v) : v.toString()) : v),
		2,
	)
}

export interface ServerContext {
	config: AppConfig
	logger: Logger
	/** Prebuilt agent; built from config when omitted */
	agent?: AnalysisAgent
}

export interface AnalysisServer {
	server: McpServer
	engines: EngineMap
	/** Set when the agent was built from config */
	llm?: OllamaClient
}

export default function createServer({ config, logger, agent }: ServerContext): AnalysisServer {
	const wired = agent
		? { agent, engines: new Map<EngineId, EngineAdapter>(), llm: undefined }
		: createAnalysisAgent(config, logger)

	const server = new McpServer({
		name: "data-analysis-agent",
		version: "0.1.0",
	})

	server.tool(
		"analyze_data",
		"Answer a question about a dataset: plan, generate SQL, run it on DuckDB, Spark or Postgres with automatic correction and engine fallback, and optionally chart the result.",
		analyzeDataShape,
		async (input, extra) => {
			try {
				const result = await wired.agent.analyze(toAnalysisRequest(input), { signal: extra.signal })
				return { content: [{ type: "text" as const, text: toJson(result) }] }
			} catch (error) {
				const body = error instanceof AnalysisError
					? { error_type: error.type, message: error.message, recoverable: error.recoverable, attempts: error.attempts }
					: { error_type: "unknown", message: errorMessage(error), recoverable: false, attempts: [] }
				logger.error("analyze_data failed", { error_type: body.error_type, message: body.message })
				return { content: [{ type: "text" as const, text: toJson(body) }], isError: true }
			}
		},
	)

	return { server, engines: wired.engines, llm: wired.llm }
}
