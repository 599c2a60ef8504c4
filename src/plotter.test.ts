import { describe, it, expect, afterEach } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { buildVegaLiteSpec, inferFieldType, suggestPlotType, VegaLitePlotter } from "./plotter.js"
import { AnalysisError } from "./errors.js"
import { silentLogger } from "./logger.js"
import type { RowSet } from "./config.js"

function rowSet(columns: string[], rows: Record<string, unknown>[]): RowSet {
	return { columns, rows, row_count: rows.length, truncated: false }
}

const BY_REGION = rowSet(["region", "total"], [
	{ region: "north", total: 10 },
	{ region: "south", total: 7 },
])

const tempDirs: string[] = []

afterEach(() => {
	for (const dir of tempDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true })
})

describe("inferFieldType", () => {
	it("skips nulls and reads the first value", () => {
		expect(inferFieldType([{ a: null }, { a: 3 }], "a")).toBe("quantitative")
		expect(inferFieldType([{ a: "2026-03-01" }], "a")).toBe("temporal")
		expect(inferFieldType([{ a: "2026-03-01T10:15:00Z" }], "a")).toBe("temporal")
		expect(inferFieldType([{ a: "north" }], "a")).toBe("nominal")
		expect(inferFieldType([], "a")).toBe("nominal")
	})
})

describe("suggestPlotType", () => {
	it("uses a line for dates", () => {
		expect(suggestPlotType(rowSet(["day", "n"], [{ day: "2026-01-01", n: 3 }]))).toBe("line")
	})

	it("uses bars for category and number", () => {
		expect(suggestPlotType(BY_REGION)).toBe("bar")
	})

	it("uses points for two numbers", () => {
		expect(suggestPlotType(rowSet(["price", "qty"], [{ price: 2.5, qty: 4 }]))).toBe("point")
	})

	it("uses rect for two categories", () => {
		expect(suggestPlotType(rowSet(["region", "channel"], [{ region: "north", channel: "web" }]))).toBe("rect")
	})

	it("defaults to a line for empty results", () => {
		expect(suggestPlotType(rowSet(["a"], []))).toBe("line")
	})
})

describe("buildVegaLiteSpec", () => {
	it("encodes the suggested mark with typed fields", () => {
		const spec = buildVegaLiteSpec(BY_REGION, { title: "Sales by region" })

		expect(spec.$schema).toBe("https://vega.github.io/schema/vega-lite/v5.json")
		expect(spec.title).toBe("Sales by region")
		expect(spec.mark).toEqual({ type: "bar", tooltip: true })
		expect(spec.encoding).toEqual({
			x: { field: "region", type: "nominal", title: "region" },
			y: { field: "total", type: "quantitative", title: "total" },
		})
		expect(spec.data.values).toEqual(BY_REGION.rows)
	})

	it("honours the chart intent", () => {
		const rows = rowSet(["region", "channel", "total"], [{ region: "north", channel: "web", total: 4 }])
		const spec = buildVegaLiteSpec(rows, { type: "bar", x: "channel", y: "total", color: "region" })

		expect(spec.mark.type).toBe("bar")
		expect(spec.encoding).toEqual({
			x: { field: "channel", type: "nominal", title: "channel" },
			y: { field: "total", type: "quantitative", title: "total" },
			color: { field: "region", type: "nominal", title: "region" },
		})
	})

	it("colours a heatmap by the remaining numeric column", () => {
		const rows = rowSet(["region", "channel", "total"], [{ region: "north", channel: "web", total: 4 }])
		const spec = buildVegaLiteSpec(rows)

		expect(spec.mark.type).toBe("rect")
		expect(spec.encoding.color).toEqual({ field: "total", type: "quantitative", aggregate: "sum", title: "total" })
	})

	it("rejects fields that are not result columns", () => {
		expect(() => buildVegaLiteSpec(BY_REGION, { x: "revenue" })).toThrow(AnalysisError)
	})

	it("converts bigint values", () => {
		const spec = buildVegaLiteSpec(rowSet(["region", "n"], [{ region: "north", n: BigInt(12) }]))
		expect(spec.data.values).toEqual([{ region: "north", n: 12 }])
	})
})

describe("VegaLitePlotter", () => {
	it("writes the spec to the output directory", async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "plots-"))
		tempDirs.push(dir)
		const plotter = new VegaLitePlotter(path.join(dir, "out"), silentLogger)

		const artifact = await plotter.render(BY_REGION, undefined, "session/1")

		expect(artifact?.path).toBe(path.join(dir, "out", "session_1.vl.json"))
		expect(artifact?.mark).toBe("bar")
		const written: unknown = JSON.parse(fs.readFileSync(path.join(dir, "out", "session_1.vl.json"), "utf-8"))
		expect(written).toEqual(JSON.parse(JSON.stringify(artifact?.spec)))
	})

	it("renders nothing for an empty result", async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "plots-"))
		tempDirs.push(dir)

		expect(await new VegaLitePlotter(dir, silentLogger).render(rowSet(["a"], []), undefined, "empty")).toBeNull()
		expect(fs.readdirSync(dir)).toEqual([])
	})
})
