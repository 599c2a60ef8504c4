/**
 * Query Executor
 *
 * Drives one session's attempt loop:
 *
 *   Pending → Executing → Succeeded
 *                       ↘ Failed → Correcting  → Executing (same engine, corrected SQL)
 *                                → FallingBack → Executing (next engine, original SQL)
 *                                → Exhausted
 *
 * Every execution appends exactly one Attempt before the decision is made.
 * Correction counters are explicit (per engine, or shared with
 * correction_budget_scope "global"), so the loop is bounded by
 * max_corrections × engines + engines attempts whatever the error sequence.
 */

import {
	DEFAULTS,
	type Attempt,
	type AttemptOrigin,
	type DatasetRef,
	type DatasetSchema,
	type EngineId,
	type ErrorKind,
	type ExecutorConfig,
	type RowSet,
	type SessionStatus,
} from "./config.js"
import type { Corrector } from "./corrector.js"
import { runWithTimeout, toEngineError, type EngineHandle } from "./engine_adapter.js"
import { AnalysisError, ConfigError, EngineError, GenerationError, errorMessage } from "./errors.js"
import type { ExecutionMemory } from "./execution_memory.js"
import type { Logger } from "./logger.js"
import type { Plan } from "./planner.js"

export type ExecutorState =
	| "Pending"
	| "Executing"
	| "Succeeded"
	| "Failed"
	| "Correcting"
	| "FallingBack"
	| "Exhausted"
	| "Cancelled"

export type FailureDecision = "Correcting" | "FallingBack" | "Exhausted"

export interface DecisionInput {
	kind: ErrorKind
	/** Corrections already spent against the budget that applies to this engine */
	correctionsUsed: number
	maxCorrections: number
	enableFallback: boolean
	hasUntriedEngine: boolean
}

/**
 * The failure decision policy, in tie-break order:
 * 1. SyntaxError with budget left → Correcting
 * 2. fallback enabled and an untried engine remains → FallingBack
 * 3. Exhausted
 */
export function decideNextStep(input: DecisionInput): FailureDecision {
	if (input.kind === "SyntaxError" && input.correctionsUsed < input.maxCorrections) {
		return "Correcting"
	}
	if (input.enableFallback && input.hasUntriedEngine) {
		return "FallingBack"
	}
	return "Exhausted"
}

/**
 * Upper bound on attempts for one session
 */
export function maxAttempts(config: Pick<ExecutorConfig, "max_corrections_per_engine" | "correction_budget_scope">, engineCount: number): number {
	return config.correction_budget_scope === "global"
		? config.max_corrections_per_engine + engineCount
		: config.max_corrections_per_engine * engineCount + engineCount
}

export interface ExecutionInput {
	/** Original generator output; every fallback engine starts from it */
	sql: string
	plan: Plan
	schema: DatasetSchema
	dataset?: DatasetRef
	maxRows?: number
	signal?: AbortSignal
}

export interface ExecutionOutcome {
	status: SessionStatus
	rows?: RowSet
	engine?: EngineId
	sql?: string
	attempts: Attempt[]
	/** Last failure, set when Exhausted */
	error?: { kind: ErrorKind; message: string }
}

export interface QueryExecutorDeps {
	/** Usable engines in priority order, primary first */
	engines: EngineHandle[]
	corrector: Corrector
	memory: ExecutionMemory
	logger: Logger
}

export type QueryExecutorConfig = Pick<
	ExecutorConfig,
	"enable_fallback" | "max_corrections_per_engine" | "per_attempt_timeout_ms" | "correction_budget_scope"
>

export class QueryExecutor {
	private readonly engines: EngineHandle[]
	private readonly corrector: Corrector
	private readonly memory: ExecutionMemory
	private readonly logger: Logger

	constructor(
		private readonly config: QueryExecutorConfig,
		deps: QueryExecutorDeps,
	) {
		if (deps.engines.length === 0) {
			throw new ConfigError("Query executor needs at least one engine")
		}
		this.engines = [...deps.engines].sort((a, b) => a.priority - b.priority)
		this.corrector = deps.corrector
		this.memory = deps.memory
		this.logger = deps.logger
	}

	async run(input: ExecutionInput): Promise<ExecutionOutcome> {
		const queryId = this.memory.sessionId
		const maxRows = input.maxRows ?? DEFAULTS.maxRows
		const correctionsByEngine = new Map<EngineId, number>()
		let globalCorrections = 0

		let engineIndex = 0
		let sql = input.sql
		let origin: AttemptOrigin = "initial"

		this.transition(queryId, "Pending", { engines: this.engines.map(e => e.id) })

		for (;;) {
			if (input.signal?.aborted) {
				return this.cancelled(queryId)
			}

			const handle = this.engines[engineIndex]
			this.transition(queryId, "Executing", { attempt: this.memory.nextSequence, engine: handle.id, origin })

			const startedAt = new Date()
			const result = await this.execute(handle, sql, input.dataset, maxRows)

			const attempt: Attempt = {
				session_id: queryId,
				sequence: this.memory.nextSequence,
				engine: handle.id,
				sql,
				origin,
				outcome: result.ok
					? { status: "success", row_count: result.rows.row_count, columns: result.rows.columns }
					: { status: "failure", kind: result.error.kind, message: result.error.message },
				started_at: startedAt.toISOString(),
				duration_ms: Date.now() - startedAt.getTime(),
			}
			await this.record(attempt)

			if (result.ok) {
				this.transition(queryId, "Succeeded", { attempt: attempt.sequence, engine: handle.id, rows: result.rows.row_count })
				return { status: "Succeeded", rows: result.rows, engine: handle.id, sql, attempts: this.attempts() }
			}

			const { kind, message } = result.error
			this.transition(queryId, "Failed", { attempt: attempt.sequence, engine: handle.id, kind, message: message.substring(0, 200) })

			const correctionsUsed = this.config.correction_budget_scope === "global"
				? globalCorrections
				: correctionsByEngine.get(handle.id) ?? 0

			const decision = decideNextStep({
				kind,
				correctionsUsed,
				maxCorrections: this.config.max_corrections_per_engine,
				enableFallback: this.config.enable_fallback,
				hasUntriedEngine: engineIndex + 1 < this.engines.length,
			})

			switch (decision) {
				case "Correcting": {
					if (input.signal?.aborted) {
						return this.cancelled(queryId)
					}
					correctionsByEngine.set(handle.id, (correctionsByEngine.get(handle.id) ?? 0) + 1)
					globalCorrections++
					this.transition(queryId, "Correcting", { attempt: attempt.sequence, engine: handle.id, correction: correctionsUsed + 1 })
					sql = await this.correct({
						failedSql: sql,
						errorKind: kind,
						errorMessage: message,
						plan: input.plan,
						schema: input.schema,
						engine: handle.id,
						previousFailures: this.memory.failureContext(),
						attempt: globalCorrections,
					})
					origin = "correction"
					break
				}
				case "FallingBack": {
					engineIndex++
					sql = input.sql
					origin = "fallback"
					this.transition(queryId, "FallingBack", { attempt: attempt.sequence, from: handle.id, to: this.engines[engineIndex].id })
					break
				}
				case "Exhausted": {
					this.transition(queryId, "Exhausted", { attempts: attempt.sequence, kind })
					return { status: "Exhausted", attempts: this.attempts(), error: { kind, message } }
				}
			}
		}
	}

	private async execute(
		handle: EngineHandle,
		sql: string,
		dataset: DatasetRef | undefined,
		maxRows: number,
	): Promise<{ ok: true; rows: RowSet } | { ok: false; error: EngineError }> {
		try {
			const rows = await runWithTimeout(handle.adapter, sql, dataset, {
				maxRows,
				timeoutMs: this.config.per_attempt_timeout_ms,
				logger: this.logger,
			})
			return { ok: true, rows }
		} catch (error) {
			return { ok: false, error: toEngineError(handle.id, error) }
		}
	}

	private attempts(): Attempt[] {
		return [...this.memory.snapshot()]
	}

	private async record(attempt: Attempt): Promise<void> {
		try {
			await this.memory.append(attempt)
		} catch (error) {
			throw this.withAttempts(error)
		}
	}

	private async correct(request: Parameters<Corrector["correct"]>[0]): Promise<string> {
		try {
			return await this.corrector.correct(request)
		} catch (error) {
			throw this.withAttempts(error)
		}
	}

	/**
	 * Fatal errors leave the loop carrying the attempts recorded so far
	 */
	private withAttempts(error: unknown): AnalysisError {
		const fatal = error instanceof AnalysisError
			? error
			: new GenerationError(`Correction failed: ${errorMessage(error)}`)
		fatal.attempts = this.attempts()
		return fatal
	}

	private cancelled(queryId: string): ExecutionOutcome {
		this.transition(queryId, "Cancelled", { attempts: this.memory.snapshot().length })
		return { status: "Cancelled", attempts: this.attempts() }
	}

	private transition(queryId: string, state: ExecutorState, meta: Record<string, unknown>): void {
		const level = state === "Failed" || state === "Exhausted" ? "warn" : state === "Pending" || state === "Executing" ? "debug" : "info"
		this.logger[level](`Query ${state}`, { query_id: queryId, state, ...meta })
	}
}
