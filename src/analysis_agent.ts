/**
 * Analysis Agent
 *
 * One session per request:
 *
 *   schema (primary engine) → knowledge-base hints → plan → generate SQL
 *     → QueryExecutor.run (correction / fallback) → chart on success
 *
 * Planning and generation failures are fatal to the session and propagate
 * as PlanningError / GenerationError carrying the attempts recorded so far.
 * Engines are shared between sessions; memories are not.
 */

import { v4 as uuidv4 } from "uuid"
import * as path from "path"
import {
	type Attempt,
	type DatasetRef,
	type DatasetSchema,
	type EngineId,
	type ErrorKind,
	type ExecutorConfig,
	type RowSet,
	type SessionStatus,
} from "./config.js"
import type { AppConfig } from "./config/loadConfig.js"
import { SqlCorrector, type Corrector } from "./corrector.js"
import { toEngineError, type EngineHandle } from "./engine_adapter.js"
import { createEngines, resolveEnginePriority, type EngineMap } from "./engine_registry.js"
import { AnalysisError, ConfigError, errorMessage } from "./errors.js"
import {
	ExecutionMemory,
	InMemoryAttemptStore,
	JsonlAttemptStore,
	type AttemptStore,
} from "./execution_memory.js"
import { KnowledgeBase } from "./knowledge_base.js"
import { OllamaClient } from "./llm_client.js"
import type { Logger } from "./logger.js"
import { LlmPlanner, type Plan, type Planner } from "./planner.js"
import { VegaLitePlotter, type PlotArtifact, type Plotter } from "./plotter.js"
import { QueryExecutor } from "./query_executor.js"
import { LlmSqlGenerator, type SqlGenerator } from "./sql_generator.js"

export interface AnalysisRequest {
	readonly question: string
	readonly dataset?: Readonly<DatasetRef>
	/** Per-request overrides of the executor configuration */
	readonly config?: Readonly<Partial<ExecutorConfig>>
	/** Render a chart on success; defaults to plotter.enabled */
	readonly visualize?: boolean
}

export interface AnalysisResult {
	session_id: string
	status: SessionStatus
	question: string
	plan?: Plan
	final_sql?: string
	engine?: EngineId
	final_rows?: Record<string, unknown>[]
	columns?: string[]
	row_count?: number
	truncated?: boolean
	attempts: Attempt[]
	error?: { kind: ErrorKind; message: string }
	plot?: { path: string; mark: string }
	plot_error?: string
	latency_ms: number
}

export interface AnalyzeOptions {
	signal?: AbortSignal
}

export type AnalysisSettings = Pick<AppConfig, "executor" | "execution" | "plotter" | "knowledge_base">

export interface AnalysisAgentDeps {
	engines: EngineMap
	planner: Planner
	generator: SqlGenerator
	corrector: Corrector
	plotter?: Plotter
	knowledgeBase?: KnowledgeBase
	attemptStore?: AttemptStore
	logger: Logger
}

/**
 * Audit entry written once per session
 */
interface AuditLogEntry {
	session_id: string
	question: string
	status: SessionStatus | "Failed"
	engine?: EngineId
	sql?: string
	attempt_count: number
	corrections: number
	fallbacks: number
	row_count?: number
	error_type?: string
	error?: string
	latency_ms: number
}

/**
 * Merge request overrides over the configured executor settings
 */
export function resolveExecutorConfig(base: ExecutorConfig, overrides: Partial<ExecutorConfig> = {}): ExecutorConfig {
	const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined))
	const merged: ExecutorConfig = { ...base, ...defined }

	if (!Number.isInteger(merged.max_corrections_per_engine) || merged.max_corrections_per_engine < 0) {
		throw new ConfigError(`max_corrections_per_engine must be a non-negative integer, got ${merged.max_corrections_per_engine}`)
	}
	if (!(merged.per_attempt_timeout_ms > 0)) {
		throw new ConfigError(`per_attempt_timeout_ms must be positive, got ${merged.per_attempt_timeout_ms}`)
	}
	return merged
}

export class AnalysisAgent {
	/** Shared across sessions when given; otherwise each session keeps its own */
	private readonly store?: AttemptStore
	private readonly logger: Logger

	constructor(
		private readonly settings: AnalysisSettings,
		private readonly deps: AnalysisAgentDeps,
	) {
		this.store = deps.attemptStore
		this.logger = deps.logger
	}

	async analyze(input: AnalysisRequest, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
		const request = freezeRequest(input)
		const sessionId = uuidv4()
		const startTime = Date.now()
		const memory = new ExecutionMemory(sessionId, this.store)

		this.logger.info("Analysis started", {
			session_id: sessionId,
			question: request.question.substring(0, 100),
			dataset: request.dataset?.name,
		})

		try {
			const executorConfig = resolveExecutorConfig(this.settings.executor, request.config)
			const engines = resolveEnginePriority(
				executorConfig.primary_engine,
				executorConfig.fallback_order,
				this.deps.engines,
				executorConfig.enable_fallback,
			)

			const schema = await this.describeSchema(sessionId, engines, request.dataset)
			const hints = await this.hints(request.question, schema)
			const plan = await this.deps.planner.plan(request.question, schema, hints)
			this.logger.info("Plan ready", { session_id: sessionId, goal: plan.goal, steps: plan.steps.length })

			const sql = await this.deps.generator.generate(plan, schema, engines[0].id)
			this.logger.info("SQL generated", { session_id: sessionId, engine: engines[0].id, sql: sql.substring(0, 200) })

			const executor = new QueryExecutor(executorConfig, {
				engines,
				corrector: this.deps.corrector,
				memory,
				logger: this.logger,
			})
			const outcome = await executor.run({
				sql,
				plan,
				schema,
				dataset: request.dataset,
				maxRows: this.settings.execution.max_rows,
				signal: options.signal,
			})

			const result: AnalysisResult = {
				session_id: sessionId,
				status: outcome.status,
				question: request.question,
				plan,
				attempts: outcome.attempts,
				latency_ms: 0,
			}

			if (outcome.status === "Succeeded" && outcome.rows && outcome.engine && outcome.sql !== undefined) {
				result.final_sql = outcome.sql
				result.engine = outcome.engine
				result.final_rows = outcome.rows.rows
				result.columns = outcome.rows.columns
				result.row_count = outcome.rows.row_count
				result.truncated = outcome.rows.truncated

				if (request.visualize ?? this.settings.plotter.enabled) {
					await this.plot(result, outcome.rows, plan)
				}
				await this.recordSolution(outcome.attempts, outcome.sql, outcome.engine)
			} else if (outcome.error) {
				result.error = outcome.error
			}

			result.latency_ms = Date.now() - startTime
			this.audit(result)
			return result
		} catch (error) {
			const latency = Date.now() - startTime
			const attempts = error instanceof AnalysisError && error.attempts.length > 0
				? error.attempts
				: memory.snapshot()

			this.logger.error("Analysis failed", {
				session_id: sessionId,
				error_type: error instanceof AnalysisError ? error.type : "unknown",
				error_message: errorMessage(error),
			})
			this.logAudit({
				session_id: sessionId,
				question: request.question,
				status: "Failed",
				attempt_count: attempts.length,
				corrections: countOrigin(attempts, "correction"),
				fallbacks: countOrigin(attempts, "fallback"),
				error_type: error instanceof AnalysisError ? error.type : "unknown",
				error: errorMessage(error),
				latency_ms: latency,
			})

			if (error instanceof AnalysisError) {
				if (error.attempts.length === 0) error.attempts = [...attempts]
				throw error
			}
			const unexpected = new AnalysisError("execution", `Unexpected error: ${errorMessage(error)}`, false, { session_id: sessionId })
			unexpected.attempts = [...attempts]
			throw unexpected
		}
	}

	/**
	 * Schema from the primary engine; an engine that cannot describe it hands
	 * over to the next one. With none left the session continues without a schema.
	 */
	private async describeSchema(
		sessionId: string,
		engines: EngineHandle[],
		dataset: DatasetRef | undefined,
	): Promise<DatasetSchema> {
		for (const handle of engines) {
			try {
				const schema = await handle.adapter.describeSchema(dataset)
				this.logger.debug("Schema described", { session_id: sessionId, engine: handle.id, tables: Object.keys(schema).length })
				return schema
			} catch (error) {
				const engineError = toEngineError(handle.id, error)
				this.logger.warn("Schema unavailable", {
					session_id: sessionId,
					engine: handle.id,
					kind: engineError.kind,
					error: engineError.message.substring(0, 200),
				})
			}
		}
		return {}
	}

	private async hints(question: string, schema: DatasetSchema): Promise<string[]> {
		const kb = this.deps.knowledgeBase
		if (!kb || !this.settings.knowledge_base.enabled) return []
		return kb.hintsFor(question, schema, this.settings.knowledge_base.top_k)
	}

	private async plot(result: AnalysisResult, rows: RowSet, plan: Plan): Promise<void> {
		if (!this.deps.plotter) return
		try {
			const artifact: PlotArtifact | null = await this.deps.plotter.render(
				rows,
				{ title: plan.goal, ...plan.chart },
				result.session_id,
			)
			if (artifact) result.plot = { path: artifact.path, mark: artifact.mark }
		} catch (error) {
			result.plot_error = errorMessage(error)
			this.logger.warn("Chart rendering failed", { session_id: result.session_id, error: result.plot_error })
		}
	}

	/**
	 * A session that needed a correction to succeed teaches the knowledge base
	 * the error it got past
	 */
	private async recordSolution(attempts: Attempt[], finalSql: string, engine: EngineId): Promise<void> {
		const kb = this.deps.knowledgeBase
		const last = attempts[attempts.length - 1]
		if (!kb || !this.settings.knowledge_base.enabled || last?.origin !== "correction") return

		const failed = attempts
			.slice(0, -1)
			.reverse()
			.find(a => a.engine === engine && a.outcome.status === "failure")
		if (!failed || failed.outcome.status !== "failure") return

		try {
			await kb.recordSolution({
				error: failed.outcome.message,
				solution: `Corrected ${failed.outcome.kind} on ${engine}`,
				sqlExample: finalSql,
				engine,
			})
		} catch (error) {
			this.logger.warn("Knowledge base not updated", { error: errorMessage(error) })
		}
	}

	private audit(result: AnalysisResult): void {
		this.logger.info("Analysis finished", {
			session_id: result.session_id,
			status: result.status,
			engine: result.engine,
			attempts: result.attempts.length,
			latency_ms: result.latency_ms,
		})
		this.logAudit({
			session_id: result.session_id,
			question: result.question,
			status: result.status,
			engine: result.engine,
			sql: result.final_sql,
			attempt_count: result.attempts.length,
			corrections: countOrigin(result.attempts, "correction"),
			fallbacks: countOrigin(result.attempts, "fallback"),
			row_count: result.row_count,
			error_type: result.error?.kind,
			error: result.error?.message,
			latency_ms: result.latency_ms,
		})
	}

	private logAudit(entry: AuditLogEntry): void {
		this.logger.info("AUDIT_LOG", { ...entry })
	}
}

function countOrigin(attempts: readonly Attempt[], origin: Attempt["origin"]): number {
	return attempts.filter(a => a.origin === origin).length
}

function freezeRequest(request: AnalysisRequest): AnalysisRequest {
	return Object.freeze({
		...request,
		...(request.dataset ? { dataset: Object.freeze({ ...request.dataset }) } : {}),
		...(request.config ? { config: Object.freeze({ ...request.config }) } : {}),
	})
}

/**
 * Wire the agent from configuration: Ollama-backed planner, generator and
 * corrector, every enabled engine, the knowledge base and the attempt store
 */
export function createAnalysisAgent(
	config: AppConfig,
	logger: Logger,
): { agent: AnalysisAgent; engines: EngineMap; llm: OllamaClient } {
	const llm = new OllamaClient({
		baseUrl: config.model.ollama_url,
		model: config.model.llm,
		timeoutMs: config.model.timeout_ms,
		numCtx: config.model.num_ctx,
		temperature: config.model.temperature,
		retryAfterMs: config.model.retry_after_ms,
	})
	const generator = new LlmSqlGenerator(llm, logger, { temperature: config.model.temperature })
	const engines = createEngines(config, logger)

	const agent = new AnalysisAgent(config, {
		engines,
		planner: new LlmPlanner(llm, logger, { temperature: config.model.temperature }),
		generator,
		corrector: new SqlCorrector(generator, { timeoutMs: config.model.timeout_ms }),
		plotter: config.plotter.enabled ? new VegaLitePlotter(path.resolve(config.plotter.output_dir), logger) : undefined,
		knowledgeBase: config.knowledge_base.enabled
			? new KnowledgeBase(path.resolve(config.knowledge_base.path), logger)
			: undefined,
		attemptStore: config.memory.store === "jsonl"
			? new JsonlAttemptStore(path.resolve(config.memory.log_dir))
			: new InMemoryAttemptStore(config.memory.max_sessions),
		logger,
	})

	return { agent, engines, llm }
}
