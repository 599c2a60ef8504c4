/**
 * Postgres adapter (node-postgres pool)
 *
 * Each attempt runs on its own pooled client with statement_timeout set to the
 * attempt deadline, so the server stops work even when the caller gives up.
 * A dataset ref selects the schema placed first on the search_path. Both are
 * session settings, so every client is RESET before it goes back to the pool.
 */

import pg from "pg"
import type { DatasetRef, DatasetSchema, ErrorKind, RowSet } from "./config.js"
import { EngineError, errorMessage } from "./errors.js"
import { toRowSet, truncateMessage, type EngineAdapter, type ExecuteOptions } from "./engine_adapter.js"
import type { Logger } from "./logger.js"
import { checkReadOnlySQL } from "./sql_guard.js"

/**
 * The slice of pg.Pool / pg.PoolClient this adapter needs
 */
export interface PgClientLike {
	query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[]; fields: Array<{ name: string }> }>
	release(err?: Error | boolean): void
}

export interface PgPoolLike {
	connect(): Promise<PgClientLike>
	end(): Promise<void>
}

/**
 * SQLSTATE classification
 *
 * Exact codes are checked before two-character class prefixes.
 */
export const SQLSTATE_CLASSIFICATION: Record<ErrorKind, string[]> = {
	// Schema or permission problems: rewriting on the same engine will not help
	ResourceError: [
		"42P01", // Undefined table
		"42703", // Undefined column
		"42501", // Insufficient privilege
		"3D000", // Invalid catalog name
		"3F000", // Invalid schema name
		"53", // Insufficient resources
		"54", // Program limit exceeded
	],

	TimeoutError: [
		"57014", // Query canceled (statement_timeout)
	],

	EngineUnavailable: [
		"53300", // Too many connections
		"57P01", // Admin shutdown
		"57P02", // Crash shutdown
		"57P03", // Cannot connect now
		"08", // Connection exception
		"58", // System error
		"F0", // Config file error
		"XX", // Internal error
	],

	// Correctable with model feedback
	SyntaxError: [
		"42", // Syntax error or access rule violation (42601, 42883, 42803, ...)
		"22", // Data exception (division by zero, invalid cast, ...)
		"0A", // Feature not supported
	],
}

const CLASSIFICATION_ORDER: ErrorKind[] = ["TimeoutError", "EngineUnavailable", "ResourceError", "SyntaxError"]

const NETWORK_ERROR_CODES = ["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "ETIMEDOUT", "EHOSTUNREACH", "EPIPE"]

export function classifySQLSTATE(sqlstate: string): ErrorKind | null {
	for (const kind of CLASSIFICATION_ORDER) {
		if (SQLSTATE_CLASSIFICATION[kind].some(code => code.length === 5 && code === sqlstate)) return kind
	}
	for (const kind of CLASSIFICATION_ORDER) {
		if (SQLSTATE_CLASSIFICATION[kind].some(code => code.length === 2 && sqlstate.startsWith(code))) return kind
	}
	return null
}

/**
 * Get hint for SQLSTATE error, passed along to the corrector with the message
 */
export function getSQLSTATEHint(sqlstate: string): string {
	const hints: Record<string, string> = {
		"42601": "Fix SQL syntax based on the error position",
		"42P01": "Use a table name from the schema",
		"42703": "Use a column name from the schema",
		"42P09": "Qualify ambiguous column with table alias",
		"42804": "Fix datatype mismatch in comparison",
		"42883": "Use correct function name or check argument types",
		"42803": "Add missing column to GROUP BY or use aggregate",
		"22012": "Avoid division by zero - add NULLIF or CASE",
		"57014": "Query timed out - simplify query or add filters",
	}
	return hints[sqlstate] || "Review the error message and fix the SQL"
}

function readString(error: unknown, key: string): string | undefined {
	if (error && typeof error === "object" && key in error) {
		const value: unknown = Reflect.get(error, key)
		return typeof value === "string" ? value : undefined
	}
	return undefined
}

/**
 * Parse a node-postgres error into an EngineError
 */
export function toPostgresEngineError(error: unknown): EngineError {
	const code = readString(error, "code")
	const message = truncateMessage(errorMessage(error))

	if (code && NETWORK_ERROR_CODES.includes(code)) {
		return new EngineError("EngineUnavailable", "postgres", message, code)
	}

	if (code && /^[0-9A-Z]{5}$/.test(code)) {
		const kind = classifySQLSTATE(code) ?? "ResourceError"
		const hint = kind === "SyntaxError" || kind === "ResourceError" ? ` (hint: ${getSQLSTATEHint(code)})` : ""
		return new EngineError(kind, "postgres", `${message}${hint}`, code)
	}

	// No SQLSTATE: the failure happened outside a statement (socket closed, pool error)
	return new EngineError("EngineUnavailable", "postgres", message, code)
}

function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, '""')}"`
}

export interface PostgresEngineOptions {
	pool: PgPoolLike
	logger: Logger
}

export interface PostgresConnectionOptions {
	connection_string?: string
	host: string
	port: number
	name: string
	user: string
	password: string
	pool_max: number
}

export function createPostgresPool(options: PostgresConnectionOptions): pg.Pool {
	return options.connection_string
		? new pg.Pool({ connectionString: options.connection_string, max: options.pool_max })
		: new pg.Pool({
			host: options.host,
			port: options.port,
			database: options.name,
			user: options.user,
			password: options.password,
			max: options.pool_max,
		})
}

export class PostgresEngine implements EngineAdapter {
	readonly id = "postgres" as const
	private readonly pool: PgPoolLike
	private readonly logger: Logger

	constructor(options: PostgresEngineOptions) {
		this.pool = options.pool
		this.logger = options.logger
	}

	async execute(sql: string, dataset: DatasetRef | undefined, options: ExecuteOptions): Promise<RowSet> {
		const violation = checkReadOnlySQL(sql)
		if (violation) {
			throw new EngineError(violation.kind, this.id, violation.message, violation.code)
		}

		const client = await this.acquire()
		try {
			await client.query(`SET statement_timeout = ${Math.max(1, Math.floor(options.timeoutMs))}`)
			await this.applySearchPath(client, dataset)

			const result = await client.query(sql)
			return toRowSet(result.fields.map(f => f.name), result.rows, options.maxRows)
		} catch (error) {
			throw toPostgresEngineError(error)
		} finally {
			await this.release(client)
		}
	}

	async describeSchema(dataset?: DatasetRef): Promise<DatasetSchema> {
		const client = await this.acquire()
		try {
			await this.applySearchPath(client, dataset)
			const result = await client.query(
				`SELECT table_name, column_name, data_type
				FROM information_schema.columns
				WHERE table_schema = current_schema()
				ORDER BY table_name, ordinal_position`,
			)
			const schema: DatasetSchema = {}
			for (const row of result.rows) {
				const table = String(row.table_name)
				const columns = schema[table] ?? (schema[table] = {})
				columns[String(row.column_name)] = String(row.data_type)
			}
			return schema
		} catch (error) {
			throw toPostgresEngineError(error)
		} finally {
			await this.release(client)
		}
	}

	/**
	 * statement_timeout bounds server-side work; nothing to interrupt from here.
	 */
	async cancel(): Promise<void> {
		this.logger.debug("Postgres cancel relies on statement_timeout")
	}

	async close(): Promise<void> {
		await this.pool.end()
		this.logger.info("Postgres pool closed")
	}

	private async acquire(): Promise<PgClientLike> {
		try {
			return await this.pool.connect()
		} catch (error) {
			const wrapped = toPostgresEngineError(error)
			throw new EngineError("EngineUnavailable", this.id, `Cannot connect to Postgres: ${wrapped.message}`, wrapped.code)
		}
	}

	/**
	 * Clear session settings; a client that cannot be reset is destroyed instead of pooled
	 */
	private async release(client: PgClientLike): Promise<void> {
		try {
			await client.query("RESET ALL")
			client.release()
		} catch (error) {
			this.logger.warn("Postgres session reset failed, discarding client", { error: errorMessage(error) })
			client.release(error instanceof Error ? error : true)
		}
	}

	private async applySearchPath(client: PgClientLike, dataset: DatasetRef | undefined): Promise<void> {
		if (!dataset) return
		await client.query(`SET search_path TO ${quoteIdent(dataset.name)}, public`)
	}
}
