/**
 * Planner
 *
 * Turns a question into a structured analysis plan with the LLM. The reply is
 * cleaned (markdown fences, chatter around the JSON), parsed, and validated;
 * a bad reply is retried with exponential back-off before giving up.
 */

import { z } from "zod"
import type { DatasetSchema } from "./config.js"
import { PlanningError, errorMessage } from "./errors.js"
import type { LlmClient } from "./llm_client.js"
import type { Logger } from "./logger.js"

export const PLAN_TOOLS = ["SQL_Executor", "Plotter", "RAG_Search"] as const

export const CHART_TYPES = ["line", "bar", "point", "rect"] as const
export type ChartType = (typeof CHART_TYPES)[number]

const stepSchema = z.object({
	step_id: z.number().int().positive(),
	step_name: z.string().min(1),
	description: z.string(),
	tool_needed: z.enum(PLAN_TOOLS),
	reasoning: z.string(),
})

const chartIntentSchema = z.object({
	type: z.enum(CHART_TYPES).optional(),
	x: z.string().optional(),
	y: z.string().optional(),
	color: z.string().optional(),
	title: z.string().optional(),
})

export const planSchema = z.object({
	goal: z.string().min(1),
	steps: z.array(stepSchema).min(1, "Plan must contain at least one step"),
	risk_assessment: z.string(),
	chart: chartIntentSchema.optional(),
})

export type Plan = z.infer<typeof planSchema>
export type PlanStep = z.infer<typeof stepSchema>
export type ChartIntent = z.infer<typeof chartIntentSchema>

export interface Planner {
	plan(question: string, schema: DatasetSchema, hints?: string[]): Promise<Plan>
}

/**
 * Strip markdown fences and keep the outermost {...}
 */
export function extractJson(text: string): string {
	const cleaned = text.replace(/```json\s*/gi, "").replace(/```/g, "")
	const start = cleaned.indexOf("{")
	const end = cleaned.lastIndexOf("}")
	if (start !== -1 && end > start) return cleaned.slice(start, end + 1).trim()
	return cleaned.trim()
}

export function parsePlan(text: string): Plan {
	let raw: unknown
	try {
		raw = JSON.parse(extractJson(text))
	} catch (error) {
		throw new PlanningError(`Plan is not valid JSON: ${errorMessage(error)}`, true)
	}
	const result = planSchema.safeParse(raw)
	if (!result.success) {
		const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`)
		throw new PlanningError(`Plan failed validation: ${issues.join("; ")}`, true, { issues })
	}
	return result.data
}

export function buildPlannerPrompt(schema: DatasetSchema, hints: string[] = []): string {
	const sections = [
		"You are a data architect planning analyses over very large datasets.",
		"Turn the user's question into a short sequence of executable steps.",
		"",
		"Principles:",
		"1. Every query costs real compute. Prefer aggregates, approximate functions and LIMIT over full scans.",
		"2. Split complex work into steps (extract subset, aggregate, analyze further).",
		"3. If a field the user mentions is missing from the schema, say so in reasoning and use the closest column.",
		"",
		"Available tools:",
		"- SQL_Executor: run a read-only SQL query",
		"- Plotter: chart the query result",
		"- RAG_Search: look up business definitions",
		"",
		"Schema (table -> column -> type):",
		JSON.stringify(schema, null, 2),
	]

	if (hints.length > 0) {
		sections.push("", "Known pitfalls from earlier sessions:", ...hints.map(h => `- ${h}`))
	}

	sections.push(
		"",
		"Respond with a single JSON object and nothing else:",
		'{"goal": string, "steps": [{"step_id": 1, "step_name": string, "description": string, "tool_needed": "SQL_Executor" | "Plotter" | "RAG_Search", "reasoning": string}], "risk_assessment": string, "chart"?: {"type"?: "line" | "bar" | "point" | "rect", "x"?: string, "y"?: string, "color"?: string, "title"?: string}}',
	)
	return sections.join("\n")
}

export interface LlmPlannerOptions {
	maxAttempts?: number
	/** Delay before the second attempt; doubles each time */
	backoffMs?: number
	temperature?: number
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

export class LlmPlanner implements Planner {
	private readonly maxAttempts: number
	private readonly backoffMs: number
	private readonly temperature: number

	constructor(
		private readonly llm: LlmClient,
		private readonly logger: Logger,
		options: LlmPlannerOptions = {},
	) {
		this.maxAttempts = options.maxAttempts ?? 3
		this.backoffMs = options.backoffMs ?? 1000
		this.temperature = options.temperature ?? 0.2
	}

	async plan(question: string, schema: DatasetSchema, hints: string[] = []): Promise<Plan> {
		const system = buildPlannerPrompt(schema, hints)
		let lastError: unknown

		for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
			try {
				const reply = await this.llm.chat({ system, user: question, temperature: this.temperature })
				const plan = parsePlan(reply)
				this.logger.info("Plan generated", { steps: plan.steps.length, attempt })
				return plan
			} catch (error) {
				lastError = error
				this.logger.warn("Planning attempt failed", { attempt, error: errorMessage(error) })
				if (attempt < this.maxAttempts) {
					await sleep(this.backoffMs * 2 ** (attempt - 1))
				}
			}
		}

		throw new PlanningError(
			`Planning failed after ${this.maxAttempts} attempts: ${errorMessage(lastError)}`,
			false,
			{ attempts: this.maxAttempts },
		)
	}
}
