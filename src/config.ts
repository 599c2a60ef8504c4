/**
 * Shared types and constants for the data-analysis server
 *
 * Includes:
 * - Engine identifiers and the normalized error taxonomy
 * - Executor configuration surface
 * - Attempt / row set / session result shapes
 */

/**
 * Engines the executor can dispatch to.
 *
 * - duckdb: embedded analytical engine (in-process)
 * - spark: distributed engine, reached through Apache Livy
 * - postgres: server database via node-postgres
 */
export const ENGINE_IDS = ["duckdb", "spark", "postgres"] as const
export type EngineId = (typeof ENGINE_IDS)[number]

export function isEngineId(value: string): value is EngineId {
	return (ENGINE_IDS as readonly string[]).includes(value)
}

/**
 * Normalized failure classes every engine adapter must map its backend errors into.
 *
 * - SyntaxError: malformed or unsupported SQL (correctable)
 * - ResourceError: missing table/column, permission, exhausted resources (prefer fallback)
 * - TimeoutError: attempt exceeded its deadline (prefer fallback)
 * - EngineUnavailable: engine cannot be reached (fallback, no correction budget spent)
 */
export const ERROR_KINDS = ["SyntaxError", "ResourceError", "TimeoutError", "EngineUnavailable"] as const
export type ErrorKind = (typeof ERROR_KINDS)[number]

/**
 * Whether the correction budget is tracked per engine or shared by all engines of a session
 */
export type CorrectionBudgetScope = "per_engine" | "global"

/**
 * Executor configuration surface
 */
export interface ExecutorConfig {
	primary_engine: EngineId
	enable_fallback: boolean
	/** Engine priority after the primary; the primary is skipped if listed */
	fallback_order: EngineId[]
	max_corrections_per_engine: number
	per_attempt_timeout_ms: number
	correction_budget_scope: CorrectionBudgetScope
}

/**
 * Reference to the data a question is asked about.
 *
 * `name` is the table/view name SQL refers to. When `location` is set the
 * engine exposes that file (or directory) under `name` for the session.
 * For Postgres, `name` selects the schema placed first on the search_path.
 */
export interface DatasetRef {
	name: string
	location?: string
	format?: "parquet" | "csv" | "table"
}

/**
 * table -> column -> type
 */
export type DatasetSchema = Record<string, Record<string, string>>

export interface RowSet {
	columns: string[]
	rows: Record<string, unknown>[]
	row_count: number
	/** True when the engine returned more rows than max_rows */
	truncated: boolean
}

export type AttemptOrigin = "initial" | "correction" | "fallback"

export type AttemptOutcome =
	| { status: "success"; row_count: number; columns: string[] }
	| { status: "failure"; kind: ErrorKind; message: string }

/**
 * One execution try of one SQL string against one engine
 */
export interface Attempt {
	session_id: string
	/** 1-based, contiguous within a session */
	sequence: number
	engine: EngineId
	sql: string
	origin: AttemptOrigin
	outcome: AttemptOutcome
	started_at: string
	duration_ms: number
}

export type SessionStatus = "Succeeded" | "Exhausted" | "Cancelled"

/**
 * Default configuration values
 */
export const DEFAULTS = {
	maxRows: 1000,
	perAttemptTimeoutMs: 30_000,
	maxCorrectionsPerEngine: 2,
	collaboratorTimeoutMs: 60_000,
	failureContextLimit: 3,
	errorMessageMaxLength: 2000,
	memoryMaxSessions: 100,
}
