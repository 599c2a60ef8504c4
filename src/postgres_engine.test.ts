import { describe, it, expect, vi } from "vitest"
import {
	classifySQLSTATE,
	PostgresEngine,
	toPostgresEngineError,
	type PgClientLike,
	type PgPoolLike,
} from "./postgres_engine.js"
import { silentLogger } from "./logger.js"

type QueryResult = Awaited<ReturnType<PgClientLike["query"]>>

function pgError(code: string, message: string): Error {
	return Object.assign(new Error(message), { code })
}

function fakePool(handler: (text: string) => Promise<QueryResult>) {
	const client = {
		query: vi.fn(handler),
		release: vi.fn(),
	} satisfies PgClientLike
	const pool = {
		connect: vi.fn(async () => client),
		end: vi.fn(async () => {}),
	} satisfies PgPoolLike
	return { pool, client }
}

const EMPTY: QueryResult = { rows: [], fields: [] }

describe("classifySQLSTATE", () => {
	it.each([
		["42601", "SyntaxError"],
		["42883", "SyntaxError"],
		["22012", "SyntaxError"],
		["0A000", "SyntaxError"],
		["42P01", "ResourceError"],
		["42703", "ResourceError"],
		["42501", "ResourceError"],
		["53200", "ResourceError"],
		["53300", "EngineUnavailable"],
		["08006", "EngineUnavailable"],
		["57P01", "EngineUnavailable"],
		["57014", "TimeoutError"],
	])("%s → %s", (sqlstate, kind) => {
		expect(classifySQLSTATE(sqlstate)).toBe(kind)
	})

	it("returns null for codes it does not know", () => {
		expect(classifySQLSTATE("P0001")).toBeNull()
	})
})

describe("toPostgresEngineError", () => {
	it("appends the SQLSTATE hint to correctable errors", () => {
		const error = toPostgresEngineError(pgError("42803", 'column "region" must appear in the GROUP BY clause'))
		expect(error.kind).toBe("SyntaxError")
		expect(error.code).toBe("42803")
		expect(error.message).toBe(
			'column "region" must appear in the GROUP BY clause (hint: Add missing column to GROUP BY or use aggregate)',
		)
	})

	it("maps socket errors to EngineUnavailable", () => {
		const error = toPostgresEngineError(pgError("ECONNREFUSED", "connect ECONNREFUSED 127.0.0.1:5432"))
		expect(error.kind).toBe("EngineUnavailable")
	})

	it("maps errors without a code to EngineUnavailable", () => {
		expect(toPostgresEngineError(new Error("Connection terminated unexpectedly")).kind).toBe("EngineUnavailable")
	})

	it("treats unknown SQLSTATEs as ResourceError", () => {
		expect(toPostgresEngineError(pgError("P0001", "raise exception")).kind).toBe("ResourceError")
	})
})

describe("PostgresEngine", () => {
	it("sets the statement timeout and search path before running the query", async () => {
		const { pool, client } = fakePool(async (text) =>
			text.startsWith("SELECT region")
				? { rows: [{ region: "north" }], fields: [{ name: "region" }] }
				: EMPTY,
		)
		const engine = new PostgresEngine({ pool, logger: silentLogger })

		const rows = await engine.execute("SELECT region FROM sales", { name: "div_06" }, { maxRows: 10, timeoutMs: 2500 })

		expect(client.query.mock.calls.map(c => c[0])).toEqual([
			"SET statement_timeout = 2500",
			'SET search_path TO "div_06", public',
			"SELECT region FROM sales",
			"RESET ALL",
		])
		expect(rows).toEqual({ columns: ["region"], rows: [{ region: "north" }], row_count: 1, truncated: false })
		expect(client.release).toHaveBeenCalledTimes(1)
	})

	it("releases the client and classifies the error when the query fails", async () => {
		const { pool, client } = fakePool(async (text) => {
			if (text.startsWith("SET") || text === "RESET ALL") return EMPTY
			throw pgError("42P01", 'relation "orders" does not exist')
		})
		const engine = new PostgresEngine({ pool, logger: silentLogger })

		await expect(
			engine.execute("SELECT * FROM orders", undefined, { maxRows: 10, timeoutMs: 1000 }),
		).rejects.toMatchObject({ kind: "ResourceError", engine: "postgres", code: "42P01" })
		expect(client.query).toHaveBeenLastCalledWith("RESET ALL")
		expect(client.release).toHaveBeenCalledWith()
	})

	it("reports statement_timeout cancellation as TimeoutError", async () => {
		const { pool } = fakePool(async (text) => {
			if (text.startsWith("SET") || text === "RESET ALL") return EMPTY
			throw pgError("57014", "canceling statement due to statement timeout")
		})
		const engine = new PostgresEngine({ pool, logger: silentLogger })

		await expect(
			engine.execute("SELECT pg_sleep_for('1 minute')", undefined, { maxRows: 10, timeoutMs: 1000 }),
		).rejects.toMatchObject({ kind: "TimeoutError" })
	})

	it("reports a pool that cannot connect as EngineUnavailable", async () => {
		const pool: PgPoolLike = {
			connect: async () => {
				throw pgError("ECONNREFUSED", "connect ECONNREFUSED 127.0.0.1:5432")
			},
			end: async () => {},
		}
		const engine = new PostgresEngine({ pool, logger: silentLogger })

		await expect(
			engine.execute("SELECT 1", undefined, { maxRows: 10, timeoutMs: 1000 }),
		).rejects.toMatchObject({
			kind: "EngineUnavailable",
			message: "Cannot connect to Postgres: connect ECONNREFUSED 127.0.0.1:5432",
		})
	})

	it("blocks write statements without acquiring a client", async () => {
		const { pool } = fakePool(async () => EMPTY)
		const engine = new PostgresEngine({ pool, logger: silentLogger })

		await expect(
			engine.execute("UPDATE sales SET amount = 0", undefined, { maxRows: 10, timeoutMs: 1000 }),
		).rejects.toMatchObject({ kind: "ResourceError" })
		expect(pool.connect).not.toHaveBeenCalled()
	})

	it("describes the current schema", async () => {
		const { pool } = fakePool(async (text) =>
			text.includes("information_schema")
				? {
					rows: [
						{ table_name: "sales", column_name: "region", data_type: "text" },
						{ table_name: "sales", column_name: "amount", data_type: "numeric" },
					],
					fields: [{ name: "table_name" }, { name: "column_name" }, { name: "data_type" }],
				}
				: EMPTY,
		)
		const engine = new PostgresEngine({ pool, logger: silentLogger })

		expect(await engine.describeSchema()).toEqual({ sales: { region: "text", amount: "numeric" } })
	})

	it("hands pooled clients back without the previous attempt's session settings", async () => {
		const settings = new Map<string, string>()
		const seen: Array<Record<string, string>> = []
		const { pool } = fakePool(async (text) => {
			const set = /^SET (\w+)(?: TO| =) (.+)$/.exec(text)
			if (set) settings.set(set[1], set[2])
			else if (text === "RESET ALL") settings.clear()
			else seen.push(Object.fromEntries(settings))
			return EMPTY
		})
		const engine = new PostgresEngine({ pool, logger: silentLogger })

		await engine.execute("SELECT 1", { name: "div_06" }, { maxRows: 10, timeoutMs: 60000 })
		await engine.execute("SELECT 2", undefined, { maxRows: 10, timeoutMs: 500 })
		await engine.describeSchema()

		expect(seen).toEqual([
			{ statement_timeout: "60000", search_path: '"div_06", public' },
			{ statement_timeout: "500" },
			{},
		])
		expect(settings.size).toBe(0)
	})

	it("destroys a client whose session cannot be reset", async () => {
		const resetFailure = pgError("08006", "connection lost")
		const { pool, client } = fakePool(async (text) => {
			if (text === "RESET ALL") throw resetFailure
			return EMPTY
		})
		const engine = new PostgresEngine({ pool, logger: silentLogger })

		await engine.execute("SELECT 1", { name: "div_06" }, { maxRows: 10, timeoutMs: 1000 })

		expect(client.release).toHaveBeenCalledWith(resetFailure)
	})

	it("ends the pool on close", async () => {
		const { pool } = fakePool(async () => EMPTY)
		await new PostgresEngine({ pool, logger: silentLogger }).close()
		expect(pool.end).toHaveBeenCalledTimes(1)
	})
})
