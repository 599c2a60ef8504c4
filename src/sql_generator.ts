/**
 * SQL Generator
 *
 * LLM-backed: one prompt for the initial query, one for repairing a query that
 * failed on an engine. Both return a single cleaned statement.
 */

import type { DatasetSchema, EngineId, ErrorKind } from "./config.js"
import { AnalysisError, GenerationError, errorMessage } from "./errors.js"
import type { LlmClient } from "./llm_client.js"
import type { Logger } from "./logger.js"
import type { Plan } from "./planner.js"

export interface RepairRequest {
	failedSql: string
	errorKind: ErrorKind
	errorMessage: string
	plan: Plan
	schema: DatasetSchema
	engine: EngineId
	/** Formatted earlier failures of the session, may be empty */
	previousFailures: string
	/** 1-based correction number within the session */
	attempt: number
}

export interface SqlGenerator {
	generate(plan: Plan, schema: DatasetSchema, engine: EngineId): Promise<string>
	repair(request: RepairRequest): Promise<string>
}

const DIALECTS: Record<EngineId, string> = {
	duckdb: "DuckDB SQL (PostgreSQL-like; read_parquet/read_csv_auto are available)",
	spark: "Spark SQL (backtick-quoted identifiers; every query must aggregate or end with LIMIT)",
	postgres: "PostgreSQL",
}

/**
 * Remove markdown fences and comments, collapse whitespace, drop a trailing semicolon
 */
export function cleanSQL(raw: string): string {
	let sql = raw.replace(/```(?:sql)?\s*/gi, "").replace(/```/g, "")
	sql = sql.replace(/--.*$/gm, "")
	sql = sql.replace(/\/\*[\s\S]*?\*\//g, "")
	sql = sql.split(/\s+/).filter(Boolean).join(" ")
	return sql.replace(/;\s*$/, "").trim()
}

function describePlan(plan: Plan): string {
	const steps = plan.steps
		.filter(s => s.tool_needed === "SQL_Executor")
		.map(s => `${s.step_id}. ${s.step_name}: ${s.description}`)
	return [`Goal: ${plan.goal}`, ...(steps.length > 0 ? ["Steps:", ...steps] : [])].join("\n")
}

export function buildGeneratePrompt(schema: DatasetSchema, engine: EngineId): string {
	return [
		"You are an expert SQL writer. Write one query that answers the analysis goal.",
		"",
		`Dialect: ${DIALECTS[engine]}`,
		"",
		"Schema (table -> column -> type):",
		JSON.stringify(schema, null, 2),
		"",
		"Rules:",
		"1. Use only tables and columns that exist in the schema",
		"2. Read-only: a single SELECT (or WITH ... SELECT) statement",
		"3. For large tables aggregate or add a LIMIT",
		"4. Return only the SQL, no explanation",
	].join("\n")
}

export function buildRepairPrompt(request: RepairRequest): string {
	const sections = [
		"You fix SQL queries that failed to execute.",
		"",
		`Dialect: ${DIALECTS[request.engine]}`,
		"",
		"Failed query:",
		request.failedSql,
		"",
		`Error (${request.errorKind}):`,
		request.errorMessage,
	]
	if (request.previousFailures) {
		sections.push("", request.previousFailures)
	}
	sections.push(
		"",
		"Schema (table -> column -> type):",
		JSON.stringify(request.schema, null, 2),
		"",
		"Return only the corrected SQL, no explanation.",
	)
	return sections.join("\n")
}

export interface LlmSqlGeneratorOptions {
	temperature?: number
	repairTemperature?: number
}

export class LlmSqlGenerator implements SqlGenerator {
	private readonly temperature: number
	private readonly repairTemperature: number

	constructor(
		private readonly llm: LlmClient,
		private readonly logger: Logger,
		options: LlmSqlGeneratorOptions = {},
	) {
		this.temperature = options.temperature ?? 0.2
		this.repairTemperature = options.repairTemperature ?? 0.3
	}

	async generate(plan: Plan, schema: DatasetSchema, engine: EngineId): Promise<string> {
		const sql = await this.ask(
			{ system: buildGeneratePrompt(schema, engine), user: describePlan(plan), temperature: this.temperature },
			"generate",
		)
		this.logger.info("SQL generated", { engine, sql: sql.substring(0, 200) })
		return sql
	}

	async repair(request: RepairRequest): Promise<string> {
		const sql = await this.ask(
			{
				system: buildRepairPrompt(request),
				user: `Correction attempt ${request.attempt}. Goal: ${request.plan.goal}`,
				temperature: this.repairTemperature,
			},
			"repair",
		)
		this.logger.info("SQL repaired", { engine: request.engine, attempt: request.attempt, sql: sql.substring(0, 200) })
		return sql
	}

	private async ask(request: { system: string; user: string; temperature: number }, operation: string): Promise<string> {
		let reply: string
		try {
			reply = await this.llm.chat(request)
		} catch (error) {
			const recoverable = error instanceof AnalysisError && error.recoverable
			throw new GenerationError(`SQL ${operation} failed: ${errorMessage(error)}`, recoverable, { operation })
		}

		const sql = cleanSQL(reply)
		if (!sql) {
			throw new GenerationError(`SQL ${operation} returned no SQL`, true, { operation })
		}
		return sql
	}
}
