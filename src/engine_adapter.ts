/**
 * Engine Adapter capability
 *
 * Every backing engine (embedded DuckDB, distributed Spark, Postgres) implements
 * the same contract and rejects only with EngineError of the four ErrorKinds,
 * so the executor can fall back from one engine to another without knowing
 * which one it is talking to.
 */

import type { DatasetRef, DatasetSchema, EngineId, ErrorKind, RowSet } from "./config.js"
import { DEFAULTS } from "./config.js"
import { EngineError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"

export interface ExecuteOptions {
	maxRows: number
	/** Deadline the caller enforces; server-side engines may also apply it natively */
	timeoutMs: number
}

export interface EngineAdapter {
	readonly id: EngineId
	execute(sql: string, dataset: DatasetRef | undefined, options: ExecuteOptions): Promise<RowSet>
	describeSchema(dataset?: DatasetRef): Promise<DatasetSchema>
	/** Interrupt the statement in flight, where the backend allows it */
	cancel(): Promise<void>
	close(): Promise<void>
}

/**
 * A usable engine with its place in the session's priority order (0 = primary)
 */
export interface EngineHandle {
	id: EngineId
	priority: number
	adapter: EngineAdapter
}

/**
 * Build a RowSet, capping rows at maxRows
 */
export function toRowSet(columns: string[], rows: Record<string, unknown>[], maxRows: number): RowSet {
	const truncated = rows.length > maxRows
	const kept = truncated ? rows.slice(0, maxRows) : rows
	return {
		columns,
		rows: kept,
		row_count: kept.length,
		truncated,
	}
}

export function truncateMessage(message: string): string {
	return message.length > DEFAULTS.errorMessageMaxLength
		? message.slice(0, DEFAULTS.errorMessageMaxLength) + "…"
		: message
}

/**
 * Normalize anything an adapter threw into an EngineError.
 * Adapters classify their own backend errors; whatever slips through is
 * treated as the engine being unusable.
 */
export function toEngineError(engine: EngineId, error: unknown, fallbackKind: ErrorKind = "EngineUnavailable"): EngineError {
	if (error instanceof EngineError) return error
	return new EngineError(fallbackKind, engine, truncateMessage(errorMessage(error)))
}

export interface RunOptions extends ExecuteOptions {
	logger: Logger
}

/**
 * Run one execute call under a scoped timeout.
 *
 * On expiry the adapter is asked to cancel and the call rejects with a
 * TimeoutError. The abandoned promise is still observed so a late failure is
 * logged instead of becoming an unhandled rejection.
 */
export async function runWithTimeout(
	adapter: EngineAdapter,
	sql: string,
	dataset: DatasetRef | undefined,
	options: RunOptions,
): Promise<RowSet> {
	const { logger, timeoutMs, maxRows } = options
	let timer: NodeJS.Timeout | undefined
	let timedOut = false

	const execution = adapter.execute(sql, dataset, { maxRows, timeoutMs })
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			timedOut = true
			reject(new EngineError("TimeoutError", adapter.id, `Query exceeded ${timeoutMs}ms on ${adapter.id}`))
		}, timeoutMs)
	})

	try {
		return await Promise.race([execution, deadline])
	} catch (error) {
		if (timedOut) {
			execution.then(
				() => logger.debug("Abandoned attempt finished after timeout", { engine: adapter.id }),
				(late) => logger.debug("Abandoned attempt failed after timeout", { engine: adapter.id, error: errorMessage(late) }),
			)
			try {
				await adapter.cancel()
			} catch (cancelError) {
				logger.warn("Engine cancel failed", { engine: adapter.id, error: errorMessage(cancelError) })
			}
		}
		throw toEngineError(adapter.id, error)
	} finally {
		clearTimeout(timer)
	}
}
