/**
 * Engine construction and priority resolution
 */

import type { EngineId } from "./config.js"
import type { AppConfig } from "./config/loadConfig.js"
import { ConfigError, errorMessage } from "./errors.js"
import type { EngineAdapter, EngineHandle } from "./engine_adapter.js"
import type { Logger } from "./logger.js"
import { DuckDbEngine } from "./duckdb_engine.js"
import { SparkEngine } from "./spark_engine.js"
import { PostgresEngine, createPostgresPool } from "./postgres_engine.js"

export type EngineMap = ReadonlyMap<EngineId, EngineAdapter>

/**
 * Build adapters for every enabled engine. Nothing connects until first use.
 */
export function createEngines(config: AppConfig, logger: Logger): Map<EngineId, EngineAdapter> {
	const engines = new Map<EngineId, EngineAdapter>()
	const { duckdb, spark, postgres } = config.engines

	if (duckdb.enabled) {
		engines.set("duckdb", new DuckDbEngine({ path: duckdb.path, logger }))
	}

	if (spark.enabled) {
		engines.set("spark", new SparkEngine({
			livyUrl: spark.livy_url,
			pollIntervalMs: spark.poll_interval_ms,
			sessionStartTimeoutMs: spark.session_start_timeout_ms,
			requestTimeoutMs: spark.request_timeout_ms,
			requireBoundedScan: spark.require_bounded_scan,
			logger,
		}))
	}

	if (postgres.enabled) {
		engines.set("postgres", new PostgresEngine({ pool: createPostgresPool(postgres), logger }))
	}

	logger.info("Engines configured", { engines: [...engines.keys()] })
	return engines
}

/**
 * Order the available engines for one session: primary first, then the
 * fallback order, skipping duplicates and engines that are not available.
 * With fallback disabled only the primary is returned.
 */
export function resolveEnginePriority(
	primary: EngineId,
	fallbackOrder: readonly EngineId[],
	available: EngineMap,
	enableFallback: boolean,
): EngineHandle[] {
	const primaryAdapter = available.get(primary)
	if (!primaryAdapter) {
		throw new ConfigError(`Primary engine "${primary}" is not enabled`, {
			primary,
			available: [...available.keys()],
		})
	}

	const handles: EngineHandle[] = [{ id: primary, priority: 0, adapter: primaryAdapter }]
	if (!enableFallback) return handles

	for (const id of fallbackOrder) {
		if (handles.some(h => h.id === id)) continue
		const adapter = available.get(id)
		if (!adapter) continue
		handles.push({ id, priority: handles.length, adapter })
	}
	return handles
}

export async function closeEngines(engines: EngineMap, logger: Logger): Promise<void> {
	for (const [id, adapter] of engines) {
		try {
			await adapter.close()
		} catch (error) {
			logger.warn("Engine close failed", { engine: id, error: errorMessage(error) })
		}
	}
}
