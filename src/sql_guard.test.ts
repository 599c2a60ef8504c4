import { describe, it, expect } from "vitest"
import { checkReadOnlySQL, maskLiteralsAndComments } from "./sql_guard.js"

describe("maskLiteralsAndComments", () => {
	it("blanks strings, identifiers and comments but keeps offsets", () => {
		const sql = `SELECT 'DROP' AS x, "delete" -- update\nFROM t /* insert */`
		const masked = maskLiteralsAndComments(sql)
		expect(masked.length).toBe(sql.length)
		expect(masked).not.toMatch(/DROP|delete|update|insert/i)
		expect(masked.startsWith("SELECT ")).toBe(true)
		expect(masked).toContain("\nFROM t ")
	})

	it("handles doubled quote escapes", () => {
		const masked = maskLiteralsAndComments("SELECT 'it''s; DROP' FROM t")
		expect(masked).toBe("SELECT " + " ".repeat(13) + " FROM t")
	})
})

describe("checkReadOnlySQL", () => {
	it("accepts a plain SELECT", () => {
		expect(checkReadOnlySQL("SELECT region, SUM(amount) FROM sales GROUP BY region;")).toBeNull()
	})

	it("rejects write statements as a ResourceError", () => {
		const violation = checkReadOnlySQL("DELETE FROM sales WHERE id = 1")
		expect(violation).toEqual({
			kind: "ResourceError",
			code: "WRITE_OPERATION",
			message: "Permission denied: DELETE statements are not allowed, only read-only queries",
		})
	})

	it("ignores write keywords inside strings and comments", () => {
		expect(checkReadOnlySQL("SELECT 'drop table' AS note FROM t -- delete me")).toBeNull()
	})

	it("does not confuse column names containing keywords", () => {
		expect(checkReadOnlySQL("SELECT updated_at, created_by FROM events")).toBeNull()
	})

	it("rejects stacked statements as a SyntaxError", () => {
		const violation = checkReadOnlySQL("SELECT 1; SELECT 2")
		expect(violation?.kind).toBe("SyntaxError")
		expect(violation?.code).toBe("MULTIPLE_STATEMENTS")
	})

	it("allows a semicolon inside a string", () => {
		expect(checkReadOnlySQL("SELECT ';' AS sep FROM t")).toBeNull()
	})

	it("rejects empty statements", () => {
		expect(checkReadOnlySQL("  ; -- nothing")?.code).toBe("EMPTY_STATEMENT")
	})

	describe("bounded scans", () => {
		it("requires an aggregate or LIMIT when asked", () => {
			const violation = checkReadOnlySQL("SELECT * FROM events", { requireBoundedScan: true })
			expect(violation?.kind).toBe("SyntaxError")
			expect(violation?.code).toBe("UNBOUNDED_SCAN")
		})

		it("accepts a LIMIT", () => {
			expect(checkReadOnlySQL("SELECT * FROM events LIMIT 100", { requireBoundedScan: true })).toBeNull()
		})

		it("accepts an aggregate", () => {
			expect(checkReadOnlySQL("SELECT count(*) FROM events", { requireBoundedScan: true })).toBeNull()
		})

		it("does not count a LIMIT inside a string", () => {
			const violation = checkReadOnlySQL("SELECT * FROM events WHERE note = 'LIMIT 5'", { requireBoundedScan: true })
			expect(violation?.code).toBe("UNBOUNDED_SCAN")
		})
	})
})
