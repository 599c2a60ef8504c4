import { describe, it, expect, vi } from "vitest"
import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { classifyDuckDbError, DuckDbEngine, type DuckDbConnection } from "./duckdb_engine.js"
import { EngineError } from "./errors.js"
import { silentLogger } from "./logger.js"
import { suggestPlotType } from "./plotter.js"

type RunResult = { columns: string[]; rows: Record<string, unknown>[] }

function fakeConnection(run: (sql: string) => Promise<RunResult>) {
	const connection = {
		run: vi.fn(run),
		interrupt: vi.fn(),
		close: vi.fn(),
	} satisfies DuckDbConnection
	return connection
}

function engineWith(connection: DuckDbConnection) {
	const connector = vi.fn(async () => connection)
	const engine = new DuckDbEngine({ path: ":memory:", logger: silentLogger, connector })
	return { engine, connector }
}

describe("classifyDuckDbError", () => {
	const cases: Array<[string, string]> = [
		['Parser Error: syntax error at or near "SELEC"', "SyntaxError"],
		["Catalog Error: Table with name orders does not exist!", "ResourceError"],
		['Binder Error: Referenced column "revenue" not found in FROM clause!', "ResourceError"],
		['Binder Error: column "region" must appear in the GROUP BY clause', "SyntaxError"],
		["Conversion Error: Could not convert string 'x' to INT32", "SyntaxError"],
		["IO Error: No files found that match the pattern \"/data/missing.parquet\"", "ResourceError"],
		["Out of Memory Error: failed to allocate data of size 4.0 GiB", "ResourceError"],
		["INTERRUPT Error: Interrupted!", "TimeoutError"],
		["Connection Error: Connection was never established or has been closed already", "EngineUnavailable"],
		["Something nobody has seen before", "ResourceError"],
	]

	for (const [message, kind] of cases) {
		it(`${message.substring(0, 40)} → ${kind}`, () => {
			expect(classifyDuckDbError(message)).toBe(kind)
		})
	}
})

describe("DuckDbEngine", () => {
	it("runs the query and caps the rows", async () => {
		const connection = fakeConnection(async () => ({
			columns: ["region", "total"],
			rows: [{ region: "north", total: 10 }, { region: "south", total: 7 }, { region: "east", total: 3 }],
		}))
		const { engine, connector } = engineWith(connection)

		const rows = await engine.execute("SELECT region, total FROM sales", undefined, { maxRows: 2, timeoutMs: 1000 })

		expect(connector).toHaveBeenCalledWith(":memory:")
		expect(rows.columns).toEqual(["region", "total"])
		expect(rows.row_count).toBe(2)
		expect(rows.truncated).toBe(true)
	})

	it("opens the database once across calls", async () => {
		const connection = fakeConnection(async () => ({ columns: ["n"], rows: [{ n: 1 }] }))
		const { engine, connector } = engineWith(connection)

		await engine.execute("SELECT 1 AS n", undefined, { maxRows: 10, timeoutMs: 1000 })
		await engine.execute("SELECT 1 AS n", undefined, { maxRows: 10, timeoutMs: 1000 })

		expect(connector).toHaveBeenCalledTimes(1)
	})

	it("exposes a dataset location as a temp view for the length of the query", async () => {
		const connection = fakeConnection(async () => ({ columns: [], rows: [] }))
		const { engine } = engineWith(connection)

		await engine.execute(
			"SELECT count(*) FROM trips",
			{ name: "trips", location: "/data/o'hare.parquet" },
			{ maxRows: 10, timeoutMs: 1000 },
		)

		expect(connection.run.mock.calls[0][0]).toBe(
			`CREATE OR REPLACE TEMP VIEW "trips" AS SELECT * FROM read_parquet('/data/o''hare.parquet')`,
		)
		expect(connection.run.mock.calls[1][0]).toBe("SELECT count(*) FROM trips")
		expect(connection.run.mock.calls[2][0]).toBe('DROP VIEW IF EXISTS "trips"')
	})

	it("drops the temp view when the query fails", async () => {
		const connection = fakeConnection(async (sql) => {
			if (sql.startsWith("SELECT")) throw new Error('Binder Error: Referenced column "fare" not found in FROM clause!')
			return { columns: [], rows: [] }
		})
		const { engine } = engineWith(connection)

		await expect(
			engine.execute("SELECT fare FROM trips", { name: "trips", location: "/data/trips.parquet" }, { maxRows: 10, timeoutMs: 1000 }),
		).rejects.toMatchObject({ kind: "ResourceError" })
		expect(connection.run).toHaveBeenLastCalledWith('DROP VIEW IF EXISTS "trips"')
	})

	it("uses read_csv_auto for csv datasets", async () => {
		const connection = fakeConnection(async () => ({ columns: [], rows: [] }))
		const { engine } = engineWith(connection)

		await engine.execute("SELECT 1", { name: "t", location: "/data/t.csv", format: "csv" }, { maxRows: 10, timeoutMs: 1000 })

		expect(connection.run.mock.calls[0][0]).toContain("read_csv_auto('/data/t.csv')")
	})

	it("normalizes backend errors into EngineError", async () => {
		const connection = fakeConnection(async () => {
			throw new Error("Catalog Error: Table with name orders does not exist!")
		})
		const { engine } = engineWith(connection)

		const error = await engine.execute("SELECT * FROM orders", undefined, { maxRows: 10, timeoutMs: 1000 }).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(EngineError)
		expect(error).toMatchObject({ kind: "ResourceError", engine: "duckdb", code: "Catalog Error" })
	})

	it("blocks write statements before touching the database", async () => {
		const connection = fakeConnection(async () => ({ columns: [], rows: [] }))
		const { engine, connector } = engineWith(connection)

		await expect(
			engine.execute("DROP TABLE sales", undefined, { maxRows: 10, timeoutMs: 1000 }),
		).rejects.toMatchObject({ kind: "ResourceError", code: "WRITE_OPERATION" })
		expect(connector).not.toHaveBeenCalled()
	})

	it("reports an unopenable database as EngineUnavailable", async () => {
		const engine = new DuckDbEngine({
			path: "/nope/db.duckdb",
			logger: silentLogger,
			connector: async () => {
				throw new Error("IO Error: Cannot open file")
			},
		})

		await expect(
			engine.execute("SELECT 1", undefined, { maxRows: 10, timeoutMs: 1000 }),
		).rejects.toMatchObject({ kind: "EngineUnavailable" })
	})

	it("builds the schema from information_schema rows", async () => {
		const connection = fakeConnection(async () => ({
			columns: ["table_name", "column_name", "data_type"],
			rows: [
				{ table_name: "sales", column_name: "region", data_type: "VARCHAR" },
				{ table_name: "sales", column_name: "amount", data_type: "DOUBLE" },
				{ table_name: "stores", column_name: "id", data_type: "INTEGER" },
			],
		}))
		const { engine } = engineWith(connection)

		expect(await engine.describeSchema()).toEqual({
			sales: { region: "VARCHAR", amount: "DOUBLE" },
			stores: { id: "INTEGER" },
		})
	})

	it("interrupts the open connection on cancel and closes it once", async () => {
		const connection = fakeConnection(async () => ({ columns: [], rows: [] }))
		const { engine } = engineWith(connection)
		await engine.execute("SELECT 1", undefined, { maxRows: 10, timeoutMs: 1000 })

		await engine.cancel()
		await engine.close()
		await engine.close()

		expect(connection.interrupt).toHaveBeenCalledTimes(1)
		expect(connection.close).toHaveBeenCalledTimes(1)
	})
})

describe("DuckDbEngine on an in-memory database", () => {
	it("returns BIGINT counts as bigint so they chart as numbers", async () => {
		const engine = new DuckDbEngine({ path: ":memory:", logger: silentLogger })
		try {
			const rows = await engine.execute(
				"SELECT 'north' AS region, count(*) AS n FROM range(3)",
				undefined,
				{ maxRows: 10, timeoutMs: 1000 },
			)

			expect(rows.rows).toEqual([{ region: "north", n: BigInt(3) }])
			expect(suggestPlotType(rows)).toBe("bar")
		} finally {
			await engine.close()
		}
	})

	it("leaves no dataset view behind after a query", async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "duckdb-"))
		const file = path.join(dir, "sales.csv")
		fs.writeFileSync(file, "region,amount\nnorth,10\nsouth,7\n")
		const engine = new DuckDbEngine({ path: ":memory:", logger: silentLogger })
		try {
			const rows = await engine.execute(
				"SELECT count(*) AS n FROM sales",
				{ name: "sales", location: file, format: "csv" },
				{ maxRows: 10, timeoutMs: 1000 },
			)

			expect(rows.rows).toEqual([{ n: BigInt(2) }])
			expect(Object.keys(await engine.describeSchema())).not.toContain("sales")
		} finally {
			await engine.close()
			fs.rmSync(dir, { recursive: true, force: true })
		}
	})
})
