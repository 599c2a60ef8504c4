/**
 * Knowledge Base
 *
 * JSON file of solved errors, SQL patterns and table documentation.
 * Searched before planning (hints for the planner) and appended to whenever
 * a session succeeds after a correction.
 *
 * Ranking is Okapi BM25 over the error text, solution and SQL of each entry.
 */

import * as fs from "fs"
import * as path from "path"
import { z } from "zod"
import { ENGINE_IDS, type DatasetSchema, type EngineId } from "./config.js"
import { StorageError, errorMessage } from "./errors.js"
import type { Logger } from "./logger.js"

const solvedErrorSchema = z.object({
	error: z.string(),
	solution: z.string(),
	sql_example: z.string().default(""),
	engine: z.enum(ENGINE_IDS).optional(),
	recorded_at: z.string().optional(),
})

const knowledgeBaseSchema = z.object({
	common_errors: z.array(solvedErrorSchema).default([]),
	sql_patterns: z.array(z.object({ type: z.string(), template: z.string() })).default([]),
	schema_documentation: z
		.record(z.object({
			description: z.string().optional(),
			columns: z.record(z.string()).optional(),
		}))
		.default({}),
})

export type SolvedError = z.infer<typeof solvedErrorSchema>
export type KnowledgeBaseData = z.infer<typeof knowledgeBaseSchema>
export type TableDocumentation = KnowledgeBaseData["schema_documentation"][string]

export interface ScoredEntry {
	entry: SolvedError
	score: number
}

// ── BM25 ─────────────────────────────────────────────────────────────

const BM25_K1 = 1.2
const BM25_B = 0.75

export function tokenize(text: string): string[] {
	return text
		.toLowerCase()
		.split(/[^a-z0-9_]+/)
		.filter(t => t.length > 1)
}

/**
 * Rank documents against a query; documents with no matching term are dropped
 */
export function bm25Rank(query: string, documents: string[]): Array<{ index: number; score: number }> {
	const queryTerms = [...new Set(tokenize(query))]
	if (queryTerms.length === 0 || documents.length === 0) return []

	const docs = documents.map(tokenize)
	const avgLength = docs.reduce((sum, d) => sum + d.length, 0) / docs.length || 1

	const documentFrequency = new Map<string, number>()
	for (const doc of docs) {
		for (const term of new Set(doc)) {
			documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1)
		}
	}

	const results: Array<{ index: number; score: number }> = []
	docs.forEach((doc, index) => {
		const termCounts = new Map<string, number>()
		for (const term of doc) termCounts.set(term, (termCounts.get(term) ?? 0) + 1)

		let score = 0
		for (const term of queryTerms) {
			const tf = termCounts.get(term)
			if (!tf) continue
			const df = documentFrequency.get(term) ?? 0
			const idf = Math.log(1 + (docs.length - df + 0.5) / (df + 0.5))
			score += idf * (tf * (BM25_K1 + 1)) / (tf + BM25_K1 * (1 - BM25_B + BM25_B * doc.length / avgLength))
		}
		if (score > 0) results.push({ index, score })
	})

	return results.sort((a, b) => b.score - a.score || a.index - b.index)
}

// ── Store ────────────────────────────────────────────────────────────

export interface RecordSolutionInput {
	error: string
	solution: string
	sqlExample?: string
	engine?: EngineId
}

export class KnowledgeBase {
	private data: KnowledgeBaseData | null = null

	constructor(
		private readonly filePath: string,
		private readonly logger: Logger,
	) {}

	async load(): Promise<KnowledgeBaseData> {
		if (this.data) return this.data

		let raw: string
		try {
			raw = await fs.promises.readFile(this.filePath, "utf-8")
		} catch (error) {
			if (error instanceof Error && "code" in error && error.code === "ENOENT") {
				this.logger.debug("Knowledge base not found, starting empty", { path: this.filePath })
			} else {
				this.logger.warn("Knowledge base unreadable, starting empty", { path: this.filePath, error: errorMessage(error) })
			}
			this.data = knowledgeBaseSchema.parse({})
			return this.data
		}

		try {
			this.data = knowledgeBaseSchema.parse(JSON.parse(raw))
		} catch (error) {
			this.logger.warn("Knowledge base invalid, starting empty", { path: this.filePath, error: errorMessage(error) })
			this.data = knowledgeBaseSchema.parse({})
		}
		return this.data
	}

	async search(query: string, topK: number): Promise<ScoredEntry[]> {
		const { common_errors } = await this.load()
		const ranked = bm25Rank(
			query,
			common_errors.map(e => `${e.error} ${e.solution} ${e.sql_example}`),
		)
		const results = ranked.slice(0, topK).map(r => ({ entry: common_errors[r.index], score: r.score }))
		this.logger.debug("Knowledge base search", { query: query.substring(0, 80), hits: results.length })
		return results
	}

	async searchDocumentation(table: string): Promise<TableDocumentation | undefined> {
		const { schema_documentation } = await this.load()
		return schema_documentation[table]
	}

	async searchSqlPatterns(type: string): Promise<string[]> {
		const { sql_patterns } = await this.load()
		return sql_patterns.filter(p => p.type === type).map(p => p.template)
	}

	/**
	 * Planner hints: documentation of the tables in scope, then solved errors
	 * similar to the question
	 */
	async hintsFor(question: string, schema: DatasetSchema, topK: number): Promise<string[]> {
		const hints: string[] = []
		for (const table of Object.keys(schema)) {
			const doc = await this.searchDocumentation(table)
			if (!doc) continue
			if (doc.description) hints.push(`${table}: ${doc.description}`)
			for (const [column, description] of Object.entries(doc.columns ?? {})) {
				hints.push(`${table}.${column}: ${description}`)
			}
		}
		for (const { entry } of await this.search(question, topK)) {
			hints.push(`${entry.error} → ${entry.solution}`)
		}
		return hints
	}

	/**
	 * Append a solved error and rewrite the file atomically (temp file + rename)
	 */
	async recordSolution(input: RecordSolutionInput): Promise<SolvedError> {
		const data = await this.load()
		const entry: SolvedError = {
			error: input.error,
			solution: input.solution,
			sql_example: input.sqlExample ?? "",
			...(input.engine ? { engine: input.engine } : {}),
			recorded_at: new Date().toISOString(),
		}
		const next: KnowledgeBaseData = { ...data, common_errors: [...data.common_errors, entry] }

		const tmp = `${this.filePath}.${process.pid}.tmp`
		try {
			await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true })
			await fs.promises.writeFile(tmp, JSON.stringify(next, null, 2) + "\n", "utf-8")
			await fs.promises.rename(tmp, this.filePath)
		} catch (error) {
			await fs.promises.rm(tmp, { force: true })
			throw new StorageError(`Failed to write knowledge base: ${errorMessage(error)}`, { path: this.filePath })
		}

		this.data = next
		this.logger.info("Solution recorded", { error: entry.error.substring(0, 80) })
		return entry
	}
}
