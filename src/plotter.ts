/**
 * Plotter
 *
 * Renders a successful row set as a Vega-Lite spec (JSON) on disk. The mark is
 * taken from the plan's chart intent, or suggested from the column types.
 */

import * as fs from "fs"
import * as path from "path"
import type { RowSet } from "./config.js"
import { AnalysisError } from "./errors.js"
import type { Logger } from "./logger.js"
import type { ChartIntent, ChartType } from "./planner.js"

const VEGA_LITE_SCHEMA = "https://vega.github.io/schema/vega-lite/v5.json"

const FONT = "system-ui, -apple-system, sans-serif"

/**
 * Shared theming for every chart
 */
export const VEGA_BASE_CONFIG = {
	axis: {
		labelFontSize: 11,
		titleFontSize: 13,
		labelFont: FONT,
		titleFont: FONT,
		gridOpacity: 0.5,
		domainWidth: 1,
	},
	legend: {
		labelFontSize: 11,
		titleFontSize: 12,
		labelFont: FONT,
		titleFont: FONT,
	},
	title: {
		fontSize: 16,
		font: FONT,
		anchor: "start",
		fontWeight: 600,
	},
	view: {
		strokeWidth: 0,
		continuousWidth: 550,
		continuousHeight: 350,
	},
	bar: {
		discreteBandSize: 40,
		cornerRadiusEnd: 4,
	},
	line: {
		strokeWidth: 2,
		point: true,
	},
	point: {
		size: 80,
		opacity: 0.7,
	},
} as const

export const CHART_CONSTRAINTS = {
	MAX_DATA_POINTS: 10000,
}

export type FieldType = "quantitative" | "temporal" | "nominal"

const ISO_DATE = /^\d{4}-\d{2}(-\d{2})?([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/

export function inferFieldType(rows: Record<string, unknown>[], column: string): FieldType {
	for (const row of rows) {
		const value = row[column]
		if (value === null || value === undefined) continue
		if (typeof value === "number" || typeof value === "bigint") return "quantitative"
		if (value instanceof Date) return "temporal"
		if (typeof value === "string" && ISO_DATE.test(value)) return "temporal"
		return "nominal"
	}
	return "nominal"
}

/**
 * Pick a mark from the shape of the data:
 * temporal first column → line, category + number → bar,
 * two numbers → point, anything else → rect (heatmap of counts)
 */
export function suggestPlotType(rows: RowSet): ChartType {
	const [first, second] = rows.columns
	if (!first || rows.rows.length === 0) return "line"

	const firstType = inferFieldType(rows.rows, first)
	if (firstType === "temporal") return "line"
	if (!second) return "bar"

	const secondType = inferFieldType(rows.rows, second)
	if (firstType === "nominal" && secondType === "quantitative") return "bar"
	if (firstType === "quantitative" && secondType === "quantitative") return "point"
	return "rect"
}

export interface VegaLiteSpec {
	$schema: string
	title?: string
	data: { values: Record<string, unknown>[] }
	mark: { type: ChartType; tooltip: boolean }
	encoding: Record<string, unknown>
	config: typeof VEGA_BASE_CONFIG
}

function jsonSafe(rows: Record<string, unknown>[]): Record<string, unknown>[] {
	return rows.map(row => {
		const out: Record<string, unknown> = {}
		for (const [key, value] of Object.entries(row)) {
			if (key === "__proto__" || key === "constructor" || key === "prototype") continue
			out[key] = typeof value === "bigint" ? Number(value) : value instanceof Date ? value.toISOString() : value
		}
		return out
	})
}

export function buildVegaLiteSpec(rows: RowSet, intent: ChartIntent = {}): VegaLiteSpec {
	const mark = intent.type ?? suggestPlotType(rows)
	const x = intent.x ?? rows.columns[0]
	const y = intent.y ?? rows.columns[1]

	for (const field of [x, y, intent.color]) {
		if (field !== undefined && !rows.columns.includes(field)) {
			throw new AnalysisError("plot", `Chart field "${field}" is not a result column`, false, { columns: rows.columns })
		}
	}
	if (x === undefined) {
		throw new AnalysisError("plot", "Result has no columns to chart")
	}

	const values = jsonSafe(rows.rows.slice(0, CHART_CONSTRAINTS.MAX_DATA_POINTS))
	const encoding: Record<string, unknown> = {
		x: { field: x, type: mark === "rect" ? "nominal" : inferFieldType(rows.rows, x), title: x },
	}

	if (mark === "rect") {
		if (y !== undefined) encoding.y = { field: y, type: "nominal", title: y }
		const third = rows.columns.find(c => c !== x && c !== y && inferFieldType(rows.rows, c) === "quantitative")
		encoding.color = third
			? { field: third, type: "quantitative", aggregate: "sum", title: third }
			: { aggregate: "count", type: "quantitative", title: "count" }
	} else if (y !== undefined) {
		encoding.y = { field: y, type: inferFieldType(rows.rows, y), title: y }
	}

	if (intent.color && mark !== "rect") {
		encoding.color = { field: intent.color, type: inferFieldType(rows.rows, intent.color), title: intent.color }
	}

	return {
		$schema: VEGA_LITE_SCHEMA,
		...(intent.title ? { title: intent.title } : {}),
		data: { values },
		mark: { type: mark, tooltip: true },
		encoding,
		config: VEGA_BASE_CONFIG,
	}
}

export interface PlotArtifact {
	path: string
	mark: ChartType
	spec: VegaLiteSpec
}

export interface Plotter {
	render(rows: RowSet, intent: ChartIntent | undefined, name: string): Promise<PlotArtifact | null>
}

export class VegaLitePlotter implements Plotter {
	constructor(
		private readonly outputDir: string,
		private readonly logger: Logger,
	) {}

	/**
	 * Write `<outputDir>/<name>.vl.json`; an empty row set produces no artifact
	 */
	async render(rows: RowSet, intent: ChartIntent | undefined, name: string): Promise<PlotArtifact | null> {
		if (rows.rows.length === 0) {
			this.logger.warn("Empty result, no chart rendered", { name })
			return null
		}

		const spec = buildVegaLiteSpec(rows, intent)
		const file = path.join(this.outputDir, `${name.replace(/[^A-Za-z0-9_-]/g, "_")}.vl.json`)
		await fs.promises.mkdir(this.outputDir, { recursive: true })
		await fs.promises.writeFile(file, JSON.stringify(spec, null, 2) + "\n", "utf-8")

		this.logger.info("Chart rendered", { path: file, mark: spec.mark.type, points: spec.data.values.length })
		return { path: file, mark: spec.mark.type, spec }
	}
}
