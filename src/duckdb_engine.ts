/**
 * DuckDB adapter (embedded analytical engine)
 *
 * Opens the database lazily on first use. A dataset with a `location` is
 * exposed as a TEMP VIEW over read_parquet / read_csv_auto for the length of
 * one call, so the files themselves are never modified.
 *
 * Rows come back as native JS values: BIGINT and HUGEINT as bigint, DATE and
 * TIMESTAMP as Date.
 */

import { DuckDBInstance } from "@duckdb/node-api"
import type { DatasetRef, DatasetSchema, ErrorKind, RowSet } from "./config.js"
import { EngineError, errorMessage } from "./errors.js"
import { toRowSet, truncateMessage, type EngineAdapter, type ExecuteOptions } from "./engine_adapter.js"
import type { Logger } from "./logger.js"
import { checkReadOnlySQL } from "./sql_guard.js"

/**
 * The slice of a DuckDB connection this adapter needs
 */
export interface DuckDbConnection {
	run(sql: string): Promise<{ columns: string[]; rows: Record<string, unknown>[] }>
	interrupt(): void
	close(): void
}

export type DuckDbConnector = (path: string) => Promise<DuckDbConnection>

export const connectDuckDb: DuckDbConnector = async (path) => {
	const instance = await DuckDBInstance.create(path)
	const connection = await instance.connect()
	return {
		async run(sql) {
			const reader = await connection.runAndReadAll(sql)
			return { columns: reader.columnNames(), rows: reader.getRowObjectsJS() }
		},
		interrupt: () => connection.interrupt(),
		close: () => connection.closeSync(),
	}
}

/**
 * Map a DuckDB error message onto the normalized taxonomy.
 *
 * DuckDB prefixes messages with the error type, e.g.
 * "Parser Error: syntax error at or near ..." or
 * "Catalog Error: Table with name x does not exist!"
 */
export function classifyDuckDbError(message: string): ErrorKind {
	const text = message.trim()

	if (/^(INTERRUPT|Interrupt(ed)?)\b/i.test(text) || /\binterrupted\b/i.test(text)) return "TimeoutError"

	if (/^(Connection|Fatal|Internal) Error/i.test(text) || /database has been (invalidated|closed)/i.test(text)) {
		return "EngineUnavailable"
	}

	if (/^(Catalog|Permission|IO|Out of Memory|Constraint|Dependency) Error/i.test(text)) return "ResourceError"

	if (/^Binder Error/i.test(text)) {
		// missing columns are schema problems; other binder errors are query shape problems
		return /Referenced column .* not found|column .* does not exist|Table .* does not have a column/i.test(text)
			? "ResourceError"
			: "SyntaxError"
	}

	if (/^(Parser|Syntax|Conversion|Invalid Input|Not implemented|Out of Range|Mismatch Type|Type mismatch|Decimal) Error/i.test(text)) {
		return "SyntaxError"
	}

	return "ResourceError"
}

function errorCode(message: string): string | undefined {
	const match = /^([A-Za-z ]+ Error):/.exec(message.trim())
	return match?.[1]
}

function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, '""')}"`
}

function quoteLiteral(value: string): string {
	return `'${value.replace(/'/g, "''")}'`
}

export interface DuckDbEngineOptions {
	path: string
	logger: Logger
	connector?: DuckDbConnector
}

export class DuckDbEngine implements EngineAdapter {
	readonly id = "duckdb" as const
	private connection: Promise<DuckDbConnection> | null = null
	private readonly path: string
	private readonly logger: Logger
	private readonly connector: DuckDbConnector

	constructor(options: DuckDbEngineOptions) {
		this.path = options.path
		this.logger = options.logger
		this.connector = options.connector ?? connectDuckDb
	}

	async execute(sql: string, dataset: DatasetRef | undefined, options: ExecuteOptions): Promise<RowSet> {
		const violation = checkReadOnlySQL(sql)
		if (violation) {
			throw new EngineError(violation.kind, this.id, violation.message, violation.code)
		}

		const connection = await this.connect()
		const view = await this.registerDataset(connection, dataset)
		try {
			this.logger.debug("DuckDB executing", { sql: sql.substring(0, 200) })
			const result = await this.run(connection, sql)
			return toRowSet(result.columns, result.rows, options.maxRows)
		} finally {
			await this.dropDataset(connection, view)
		}
	}

	async describeSchema(dataset?: DatasetRef): Promise<DatasetSchema> {
		const connection = await this.connect()
		const view = await this.registerDataset(connection, dataset)
		try {
			const result = await this.run(
				connection,
				`SELECT table_name, column_name, data_type
				FROM information_schema.columns
				WHERE table_schema NOT IN ('information_schema', 'pg_catalog')
				ORDER BY table_name, ordinal_position`,
			)

			const schema: DatasetSchema = {}
			for (const row of result.rows) {
				const table = String(row.table_name)
				const columns = schema[table] ?? (schema[table] = {})
				columns[String(row.column_name)] = String(row.data_type)
			}
			return schema
		} finally {
			await this.dropDataset(connection, view)
		}
	}

	async cancel(): Promise<void> {
		if (!this.connection) return
		const connection = await this.connection
		connection.interrupt()
		this.logger.info("DuckDB statement interrupted")
	}

	async close(): Promise<void> {
		if (!this.connection) return
		const pending = this.connection
		this.connection = null
		try {
			const connection = await pending
			connection.close()
			this.logger.info("DuckDB connection closed", { path: this.path })
		} catch (error) {
			this.logger.warn("DuckDB close failed", { error: errorMessage(error) })
		}
	}

	private connect(): Promise<DuckDbConnection> {
		if (!this.connection) {
			this.connection = this.open()
		}
		return this.connection
	}

	private async open(): Promise<DuckDbConnection> {
		try {
			const connection = await this.connector(this.path)
			this.logger.info("Connected to DuckDB", { path: this.path })
			return connection
		} catch (error) {
			this.connection = null
			throw new EngineError("EngineUnavailable", this.id, `Cannot open DuckDB at ${this.path}: ${errorMessage(error)}`)
		}
	}

	/**
	 * Returns the quoted view name, or undefined when there is nothing to register
	 */
	private async registerDataset(connection: DuckDbConnection, dataset: DatasetRef | undefined): Promise<string | undefined> {
		if (!dataset?.location) return undefined
		const view = quoteIdent(dataset.name)
		const reader = dataset.format === "csv" ? "read_csv_auto" : "read_parquet"
		await this.run(
			connection,
			`CREATE OR REPLACE TEMP VIEW ${view} AS SELECT * FROM ${reader}(${quoteLiteral(dataset.location)})`,
		)
		return view
	}

	private async dropDataset(connection: DuckDbConnection, view: string | undefined): Promise<void> {
		if (!view) return
		try {
			await connection.run(`DROP VIEW IF EXISTS ${view}`)
		} catch (error) {
			this.logger.warn("DuckDB temp view cleanup failed", { view, error: errorMessage(error) })
		}
	}

	private async run(connection: DuckDbConnection, sql: string): Promise<{ columns: string[]; rows: Record<string, unknown>[] }> {
		try {
			return await connection.run(sql)
		} catch (error) {
			const message = errorMessage(error)
			throw new EngineError(classifyDuckDbError(message), this.id, truncateMessage(message), errorCode(message))
		}
	}
}
