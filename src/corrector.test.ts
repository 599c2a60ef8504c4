import { describe, it, expect, vi } from "vitest"
import { SqlCorrector, type CorrectionRequest } from "./corrector.js"
import { GenerationError } from "./errors.js"
import type { SqlGenerator } from "./sql_generator.js"

const REQUEST: CorrectionRequest = {
	failedSql: "SELECT regon FROM sales",
	errorKind: "SyntaxError",
	errorMessage: 'Binder Error: column "regon" not found',
	plan: { goal: "regions", steps: [{ step_id: 1, step_name: "q", description: "d", tool_needed: "SQL_Executor", reasoning: "r" }], risk_assessment: "low" },
	schema: { sales: { region: "VARCHAR" } },
	engine: "duckdb",
	previousFailures: "",
	attempt: 1,
}

function generatorWith(repair: SqlGenerator["repair"]): SqlGenerator {
	return { generate: async () => "SELECT 1", repair }
}

describe("SqlCorrector", () => {
	it("passes the failure context to the generator and returns its SQL", async () => {
		const repair = vi.fn(async () => "  SELECT region FROM sales  ")
		const corrector = new SqlCorrector(generatorWith(repair))

		expect(await corrector.correct(REQUEST)).toBe("SELECT region FROM sales")
		expect(repair).toHaveBeenCalledWith(REQUEST)
	})

	it("rejects an empty candidate", async () => {
		const corrector = new SqlCorrector(generatorWith(async () => "   "))
		await expect(corrector.correct(REQUEST)).rejects.toThrow("Correction produced empty SQL")
	})

	it("passes GenerationError through", async () => {
		const original = new GenerationError("SQL repair failed: model offline", true)
		const corrector = new SqlCorrector(generatorWith(async () => {
			throw original
		}))

		await expect(corrector.correct(REQUEST)).rejects.toBe(original)
	})

	it("wraps other failures in GenerationError", async () => {
		const corrector = new SqlCorrector(generatorWith(async () => {
			throw new Error("boom")
		}))

		const error = await corrector.correct(REQUEST).catch((e: unknown) => e)
		expect(error).toBeInstanceOf(GenerationError)
		expect(error).toMatchObject({ message: "Correction failed: boom", recoverable: false })
	})

	it("times out a slow generator", async () => {
		vi.useFakeTimers()
		try {
			const corrector = new SqlCorrector(generatorWith(() => new Promise<string>(() => {})), { timeoutMs: 50 })
			const pending = corrector.correct(REQUEST).catch((e: unknown) => e)

			await vi.advanceTimersByTimeAsync(50)

			expect(await pending).toMatchObject({ type: "generation", message: "Correction timed out after 50ms" })
		} finally {
			vi.useRealTimers()
		}
	})
})
