/**
 * Spark adapter (distributed engine) over the Apache Livy REST API
 *
 * Responsibilities:
 * - Lazily start one interactive SQL session and wait until it is idle
 * - Submit statements and poll until they are available
 * - Cancel the running statement when the attempt deadline passes
 * - Map Livy / Spark failures onto the normalized error taxonomy
 */

import { z } from "zod"
import type { DatasetRef, DatasetSchema, ErrorKind, RowSet } from "./config.js"
import { EngineError, errorMessage } from "./errors.js"
import { toRowSet, truncateMessage, type EngineAdapter, type ExecuteOptions } from "./engine_adapter.js"
import type { Logger } from "./logger.js"
import { checkReadOnlySQL } from "./sql_guard.js"

const sessionSchema = z.object({
	id: z.number(),
	state: z.string(),
})

const statementSchema = z.object({
	id: z.number(),
	state: z.string(),
	output: z
		.object({
			status: z.string(),
			ename: z.string().optional(),
			evalue: z.string().optional(),
			data: z.record(z.unknown()).optional(),
		})
		.nullable()
		.optional(),
})

const sqlPayloadSchema = z.object({
	schema: z.object({
		fields: z.array(z.object({ name: z.string() })),
	}),
	data: z.array(z.array(z.unknown())),
})

type LivyStatement = z.infer<typeof statementSchema>

const DEAD_SESSION_STATES = ["dead", "error", "killed", "shutting_down", "success"]

/**
 * Map a Spark exception (Livy `ename` + `evalue`) onto the normalized taxonomy
 */
export function classifySparkError(ename: string, evalue: string): ErrorKind {
	const text = `${ename}: ${evalue}`

	if (/ParseException|PARSE_SYNTAX_ERROR/.test(text)) return "SyntaxError"

	if (
		/TABLE_OR_VIEW_NOT_FOUND|Table or view not found|UNRESOLVED_COLUMN|cannot resolve|PATH_NOT_FOUND|Path does not exist|INSUFFICIENT_PERMISSIONS|AccessControlException|Permission denied/i.test(
			text,
		)
	) {
		return "ResourceError"
	}

	if (/SparkContext (was|has been) shut down|Cannot call methods on a stopped SparkContext/i.test(text)) {
		return "EngineUnavailable"
	}

	if (/cancelled|InterruptedException/i.test(text)) return "TimeoutError"

	if (/AnalysisException/.test(text)) return "SyntaxError"

	return "ResourceError"
}

function quoteIdent(name: string): string {
	return "`" + name.replace(/`/g, "``") + "`"
}

function quoteLiteral(value: string): string {
	return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

export interface SparkEngineOptions {
	livyUrl: string
	pollIntervalMs: number
	sessionStartTimeoutMs: number
	requestTimeoutMs: number
	/** Reject queries that neither aggregate nor LIMIT */
	requireBoundedScan: boolean
	logger: Logger
}

export class SparkEngine implements EngineAdapter {
	readonly id = "spark" as const
	private sessionId: number | null = null
	private sessionStarting: Promise<number> | null = null
	private activeStatement: number | null = null
	private readonly baseUrl: string
	private readonly options: SparkEngineOptions

	constructor(options: SparkEngineOptions) {
		this.options = options
		this.baseUrl = options.livyUrl.replace(/\/+$/, "")
	}

	async execute(sql: string, dataset: DatasetRef | undefined, options: ExecuteOptions): Promise<RowSet> {
		const violation = checkReadOnlySQL(sql, { requireBoundedScan: this.options.requireBoundedScan })
		if (violation) {
			throw new EngineError(violation.kind, this.id, violation.message, violation.code)
		}

		const sessionId = await this.ensureSession()
		await this.registerDataset(sessionId, dataset)

		this.options.logger.debug("Spark executing", { session_id: sessionId, sql: sql.substring(0, 200) })
		const result = await this.runStatement(sessionId, sql)
		return toRowSet(result.columns, result.rows, options.maxRows)
	}

	async describeSchema(dataset?: DatasetRef): Promise<DatasetSchema> {
		const sessionId = await this.ensureSession()
		await this.registerDataset(sessionId, dataset)

		const tables = await this.runStatement(sessionId, "SHOW TABLES")
		const schema: DatasetSchema = {}
		for (const row of tables.rows) {
			const table = String(row.tableName ?? row.table_name ?? "")
			if (!table) continue
			const described = await this.runStatement(sessionId, `DESCRIBE TABLE ${quoteIdent(table)}`)
			const columns: Record<string, string> = {}
			for (const col of described.rows) {
				const name = String(col.col_name ?? "")
				// DESCRIBE appends partition info after a "# ..." marker row
				if (!name || name.startsWith("#")) break
				columns[name] = String(col.data_type ?? "")
			}
			schema[table] = columns
		}
		return schema
	}

	async cancel(): Promise<void> {
		if (this.sessionId === null || this.activeStatement === null) return
		const statementId = this.activeStatement
		await this.request("POST", `/sessions/${this.sessionId}/statements/${statementId}/cancel`)
		this.options.logger.info("Spark statement cancelled", { session_id: this.sessionId, statement_id: statementId })
	}

	async close(): Promise<void> {
		if (this.sessionId === null) return
		const sessionId = this.sessionId
		this.sessionId = null
		try {
			await this.request("DELETE", `/sessions/${sessionId}`)
			this.options.logger.info("Livy session closed", { session_id: sessionId })
		} catch (error) {
			this.options.logger.warn("Livy session close failed", { session_id: sessionId, error: errorMessage(error) })
		}
	}

	private ensureSession(): Promise<number> {
		if (this.sessionId !== null) return Promise.resolve(this.sessionId)
		if (!this.sessionStarting) {
			this.sessionStarting = this.startSession().finally(() => {
				this.sessionStarting = null
			})
		}
		return this.sessionStarting
	}

	private async startSession(): Promise<number> {
		const created = sessionSchema.parse(await this.request("POST", "/sessions", { kind: "sql" }))
		this.options.logger.info("Livy session created", { session_id: created.id, state: created.state })

		const deadline = Date.now() + this.options.sessionStartTimeoutMs
		let state = created.state
		while (state !== "idle") {
			if (DEAD_SESSION_STATES.includes(state)) {
				throw new EngineError("EngineUnavailable", this.id, `Livy session ${created.id} is ${state}`)
			}
			if (Date.now() > deadline) {
				throw new EngineError("EngineUnavailable", this.id, `Livy session ${created.id} did not start within ${this.options.sessionStartTimeoutMs}ms`)
			}
			await sleep(this.options.pollIntervalMs)
			state = sessionSchema.parse(await this.request("GET", `/sessions/${created.id}`)).state
		}

		this.sessionId = created.id
		return created.id
	}

	private async registerDataset(sessionId: number, dataset: DatasetRef | undefined): Promise<void> {
		if (!dataset?.location) return
		const source = dataset.format === "csv" ? "csv OPTIONS (header 'true', inferSchema 'true', path " : "parquet OPTIONS (path "
		await this.runStatement(
			sessionId,
			`CREATE OR REPLACE TEMPORARY VIEW ${quoteIdent(dataset.name)} USING ${source}${quoteLiteral(dataset.location)})`,
		)
	}

	private async runStatement(sessionId: number, code: string): Promise<{ columns: string[]; rows: Record<string, unknown>[] }> {
		let statement = statementSchema.parse(
			await this.request("POST", `/sessions/${sessionId}/statements`, { code, kind: "sql" }),
		)
		this.activeStatement = statement.id
		try {
			while (statement.state === "waiting" || statement.state === "running" || statement.state === "cancelling") {
				await sleep(this.options.pollIntervalMs)
				statement = statementSchema.parse(
					await this.request("GET", `/sessions/${sessionId}/statements/${statement.id}`),
				)
			}
		} finally {
			this.activeStatement = null
		}
		return this.readOutput(sessionId, statement)
	}

	private readOutput(sessionId: number, statement: LivyStatement): { columns: string[]; rows: Record<string, unknown>[] } {
		if (statement.state === "cancelled") {
			throw new EngineError("TimeoutError", this.id, `Statement ${statement.id} was cancelled`)
		}

		const output = statement.output
		if (!output) {
			throw new EngineError("EngineUnavailable", this.id, `Statement ${statement.id} ended in state ${statement.state} without output`)
		}

		if (output.status !== "ok") {
			const ename = output.ename ?? "Error"
			const evalue = output.evalue ?? ""
			if (/session.*(dead|not found)/i.test(evalue)) {
				this.sessionId = null
				throw new EngineError("EngineUnavailable", this.id, truncateMessage(`${ename}: ${evalue}`), ename)
			}
			throw new EngineError(classifySparkError(ename, evalue), this.id, truncateMessage(`${ename}: ${evalue}`), ename)
		}

		const payload = sqlPayloadSchema.safeParse(output.data?.["application/json"])
		if (!payload.success) {
			const content = Object.keys(output.data ?? {}).join(", ") || "none"
			this.options.logger.warn("Unexpected Livy SQL payload", { session_id: sessionId, statement_id: statement.id, content })
			throw new EngineError(
				"ResourceError",
				this.id,
				`Livy statement ${statement.id} returned an unexpected payload (content: ${content})`,
				"UNEXPECTED_PAYLOAD",
			)
		}

		const columns = payload.data.schema.fields.map(f => f.name)
		const rows = payload.data.data.map(values => {
			const row: Record<string, unknown> = {}
			columns.forEach((name, i) => {
				row[name] = values[i]
			})
			return row
		})
		return { columns, rows }
	}

	/**
	 * One HTTP call to Livy with its own timeout. Transport failures and 5xx
	 * responses mean the engine is unavailable.
	 */
	private async request(method: "GET" | "POST" | "DELETE", route: string, body?: unknown): Promise<unknown> {
		const url = `${this.baseUrl}${route}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.options.requestTimeoutMs)

		let response: Response
		try {
			response = await fetch(url, {
				method,
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
					"X-Requested-By": "mcp-server-data-analyst",
				},
				body: body === undefined ? undefined : JSON.stringify(body),
				signal: controller.signal,
			})
		} catch (error) {
			if (error instanceof Error && error.name === "AbortError") {
				throw new EngineError("EngineUnavailable", this.id, `Livy request timed out after ${this.options.requestTimeoutMs}ms: ${method} ${route}`)
			}
			throw new EngineError("EngineUnavailable", this.id, `Cannot reach Livy at ${this.baseUrl}: ${errorMessage(error)}`)
		} finally {
			clearTimeout(timeoutId)
		}

		if (!response.ok) {
			const errorText = await response.text()
			if (response.status === 404 && route.startsWith("/sessions/")) {
				this.sessionId = null
			}
			throw new EngineError("EngineUnavailable", this.id, truncateMessage(`Livy returned ${response.status}: ${errorText}`), String(response.status))
		}

		if (method === "DELETE") return null
		return response.json()
	}
}
