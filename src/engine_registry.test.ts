import { describe, it, expect, vi } from "vitest"
import { closeEngines, createEngines, resolveEnginePriority } from "./engine_registry.js"
import { parseConfig } from "./config/loadConfig.js"
import { ConfigError } from "./errors.js"
import { silentLogger } from "./logger.js"
import type { EngineId } from "./config.js"
import type { EngineAdapter } from "./engine_adapter.js"

function fakeAdapter(id: EngineId, close: EngineAdapter["close"] = vi.fn(async () => {})): EngineAdapter {
	return {
		id,
		execute: async () => ({ columns: [], rows: [], row_count: 0, truncated: false }),
		describeSchema: async () => ({}),
		cancel: async () => {},
		close,
	}
}

function available(...ids: EngineId[]): Map<EngineId, EngineAdapter> {
	return new Map(ids.map((id): [EngineId, EngineAdapter] => [id, fakeAdapter(id)]))
}

describe("createEngines", () => {
	it("builds only the enabled engines", () => {
		const config = parseConfig({
			engines: { duckdb: { enabled: true }, spark: { enabled: true }, postgres: { enabled: false } },
		})

		const engines = createEngines(config, silentLogger)

		expect([...engines.keys()]).toEqual(["duckdb", "spark"])
		expect(engines.get("spark")?.id).toBe("spark")
	})

	it("returns an empty map when everything is disabled", () => {
		const config = parseConfig({ engines: { duckdb: { enabled: false } } })
		expect(createEngines(config, silentLogger).size).toBe(0)
	})
})

describe("resolveEnginePriority", () => {
	it("puts the primary first and follows the fallback order", () => {
		const handles = resolveEnginePriority("spark", ["duckdb", "postgres"], available("duckdb", "spark", "postgres"), true)
		expect(handles.map(h => [h.id, h.priority])).toEqual([["spark", 0], ["duckdb", 1], ["postgres", 2]])
	})

	it("skips duplicates and engines that are not available", () => {
		const handles = resolveEnginePriority("duckdb", ["duckdb", "spark", "postgres", "spark"], available("duckdb", "postgres"), true)
		expect(handles.map(h => h.id)).toEqual(["duckdb", "postgres"])
	})

	it("returns only the primary when fallback is disabled", () => {
		const handles = resolveEnginePriority("duckdb", ["spark"], available("duckdb", "spark"), false)
		expect(handles.map(h => h.id)).toEqual(["duckdb"])
	})

	it("rejects a primary that is not enabled", () => {
		expect(() => resolveEnginePriority("postgres", [], available("duckdb"), true)).toThrow(ConfigError)
	})
})

describe("closeEngines", () => {
	it("closes every engine and keeps going when one fails", async () => {
		const failing = vi.fn(async () => {
			throw new Error("already closed")
		})
		const ok = vi.fn(async () => {})
		const engines = new Map<EngineId, EngineAdapter>([
			["duckdb", fakeAdapter("duckdb", failing)],
			["spark", fakeAdapter("spark", ok)],
		])

		await closeEngines(engines, silentLogger)

		expect(failing).toHaveBeenCalledTimes(1)
		expect(ok).toHaveBeenCalledTimes(1)
	})
})
