#!/usr/bin/env node
/**
 * Stdio entry point for the data-analysis MCP server
 *
 * Config priority: ENV > config/config.local.yaml > config/config.yaml
 *
 * Usage:
 *   node dist/src/stdio.js
 *   PRIMARY_ENGINE=spark LIVY_URL=http://livy:8998 SPARK_ENABLED=true node dist/src/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import createServer from "./index.js"
import { loadConfig } from "./config/loadConfig.js"
import { closeEngines } from "./engine_registry.js"
import { errorMessage } from "./errors.js"
import { createLogger } from "./logger.js"

// stderr only: stdout is reserved for the MCP protocol
let logger = createLogger("INFO")

async function main() {
	const config = loadConfig()
	logger = createLogger(config.logging.level)

	const { executor, engines: engineConfig } = config
	logger.info("Starting data-analysis MCP server with stdio transport")
	logger.info("Executor", {
		primary_engine: executor.primary_engine,
		enable_fallback: executor.enable_fallback,
		fallback_order: executor.fallback_order,
		max_corrections_per_engine: executor.max_corrections_per_engine,
		correction_budget_scope: executor.correction_budget_scope,
	})
	if (engineConfig.postgres.enabled && engineConfig.postgres.connection_string) {
		logger.info(`Postgres: ${engineConfig.postgres.connection_string.replace(/:[^:@]+@/, ":***@")}`)
	}

	const { server, engines, llm } = createServer({ config, logger })
	llm?.startHealthChecks(config.model.health_check_interval_ms)

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Data-analysis MCP server running via stdio")

	const shutdown = async () => {
		logger.info("Shutting down...")
		llm?.stopHealthChecks()
		await server.close()
		await closeEngines(engines, logger)
		process.exit(0)
	}

	process.on("SIGINT", () => {
		shutdown().catch((error) => {
			logger.error("Shutdown failed", { error: errorMessage(error) })
			process.exit(1)
		})
	})

	process.on("SIGTERM", () => {
		shutdown().catch((error) => {
			logger.error("Shutdown failed", { error: errorMessage(error) })
			process.exit(1)
		})
	})
}

main().catch((error) => {
	logger.error("Fatal error", { error: errorMessage(error) })
	process.exit(1)
})
