/**
 * Unified config loader.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged document is validated with zod; every field has a default so an
 * empty (or missing) config directory still yields a usable config.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { DEFAULTS, ENGINE_IDS } from "../config.js"
import { ConfigError } from "../errors.js"

// ── Schema ───────────────────────────────────────────────────────────

const engineId = z.enum(ENGINE_IDS)

const executorSchema = z.object({
	primary_engine: engineId.default("duckdb"),
	enable_fallback: z.boolean().default(true),
	fallback_order: z.array(engineId).default(["spark", "postgres"]),
	max_corrections_per_engine: z.number().int().min(0).default(DEFAULTS.maxCorrectionsPerEngine),
	per_attempt_timeout_ms: z.number().int().positive().default(DEFAULTS.perAttemptTimeoutMs),
	correction_budget_scope: z.enum(["per_engine", "global"]).default("per_engine"),
})

const enginesSchema = z.object({
	duckdb: z.object({
		enabled: z.boolean().default(true),
		path: z.string().default(":memory:"),
	}).default({}),
	spark: z.object({
		enabled: z.boolean().default(false),
		livy_url: z.string().default("http://localhost:8998"),
		poll_interval_ms: z.number().int().min(0).default(500),
		session_start_timeout_ms: z.number().int().positive().default(120_000),
		request_timeout_ms: z.number().int().positive().default(15_000),
		require_bounded_scan: z.boolean().default(true),
	}).default({}),
	postgres: z.object({
		enabled: z.boolean().default(false),
		connection_string: z.string().optional(),
		host: z.string().default("localhost"),
		port: z.number().int().positive().default(5432),
		name: z.string().default("analytics"),
		user: z.string().default("postgres"),
		password: z.string().default(""),
		pool_max: z.number().int().positive().default(5),
	}).default({}),
})

export const configSchema = z.object({
	executor: executorSchema.default({}),
	engines: enginesSchema.default({}),
	model: z.object({
		provider: z.literal("ollama").default("ollama"),
		ollama_url: z.string().default("http://localhost:11434"),
		llm: z.string().default("qwen2.5-coder:7b"),
		timeout_ms: z.number().int().positive().default(DEFAULTS.collaboratorTimeoutMs),
		num_ctx: z.number().int().positive().default(8192),
		temperature: z.number().min(0).max(2).default(0.2),
		retry_after_ms: z.number().int().min(0).default(5000),
		health_check_interval_ms: z.number().int().positive().default(30_000),
	}).default({}),
	execution: z.object({
		max_rows: z.number().int().positive().default(DEFAULTS.maxRows),
	}).default({}),
	plotter: z.object({
		enabled: z.boolean().default(true),
		output_dir: z.string().default("outputs/plots"),
	}).default({}),
	knowledge_base: z.object({
		enabled: z.boolean().default(true),
		path: z.string().default("data/knowledge_base.json"),
		top_k: z.number().int().positive().default(2),
	}).default({}),
	memory: z.object({
		store: z.enum(["memory", "jsonl"]).default("memory"),
		log_dir: z.string().default("logs/attempts"),
		max_sessions: z.number().int().positive().default(DEFAULTS.memoryMaxSessions),
	}).default({}),
	logging: z.object({
		level: z.enum(["DEBUG", "INFO", "WARN", "ERROR"]).default("INFO"),
	}).default({}),
})

export type AppConfig = z.infer<typeof configSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

type YamlDoc = Record<string, unknown>

function isRecord(value: unknown): value is YamlDoc {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): YamlDoc {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	let parsed: unknown
	try {
		parsed = yaml.load(raw)
	} catch (err) {
		throw new ConfigError(`Invalid YAML in ${filePath}: ${String(err)}`, { file: filePath })
	}
	if (parsed === undefined || parsed === null) return {}
	if (!isRecord(parsed)) {
		throw new ConfigError(`Expected a mapping at the top of ${filePath}`, { file: filePath })
	}
	return parsed
}

/** Deep merge b into a (b wins on conflicts). */
export function deepMerge(a: YamlDoc, b: YamlDoc): YamlDoc {
	const result: YamlDoc = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(left) && isRecord(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function env(name: string): string | undefined {
	const v = process.env[name]
	return v === "" ? undefined : v
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}
function envList(name: string): string[] | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v.split(",").map(s => s.trim()).filter(s => s.length > 0)
}

/** Get (or create) a nested mapping. */
function section(doc: YamlDoc, key: string): YamlDoc {
	const existing = doc[key]
	if (isRecord(existing)) return existing
	const created: YamlDoc = {}
	doc[key] = created
	return created
}

/** Only overwrite when the env var is actually set. */
function set(target: YamlDoc, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

function applyEnvOverrides(cfg: YamlDoc): void {
	// executor
	const x = section(cfg, "executor")
	set(x, "primary_engine", env("PRIMARY_ENGINE"))
	set(x, "enable_fallback", envBool("ENABLE_FALLBACK"))
	set(x, "fallback_order", envList("FALLBACK_ORDER"))
	set(x, "max_corrections_per_engine", envInt("MAX_CORRECTIONS_PER_ENGINE"))
	set(x, "per_attempt_timeout_ms", envInt("PER_ATTEMPT_TIMEOUT_MS"))
	set(x, "correction_budget_scope", env("CORRECTION_BUDGET_SCOPE"))

	// engines
	const engines = section(cfg, "engines")
	const duck = section(engines, "duckdb")
	set(duck, "enabled", envBool("DUCKDB_ENABLED"))
	set(duck, "path", env("DUCKDB_PATH"))

	const spark = section(engines, "spark")
	set(spark, "enabled", envBool("SPARK_ENABLED"))
	set(spark, "livy_url", env("LIVY_URL"))

	const pg = section(engines, "postgres")
	set(pg, "enabled", envBool("POSTGRES_ENABLED"))
	set(pg, "connection_string", env("DATABASE_URL"))
	set(pg, "host", env("DB_HOST"))
	set(pg, "port", envInt("DB_PORT"))
	set(pg, "name", env("DB_NAME"))
	set(pg, "user", env("DB_USER"))
	set(pg, "password", env("DB_PASSWORD"))

	// model
	const m = section(cfg, "model")
	set(m, "ollama_url", env("OLLAMA_BASE_URL"))
	set(m, "llm", env("OLLAMA_MODEL"))
	set(m, "timeout_ms", envInt("LLM_TIMEOUT_MS"))
	set(m, "temperature", envFloat("TEMPERATURE"))

	set(section(cfg, "execution"), "max_rows", envInt("MAX_ROWS"))
	set(section(cfg, "plotter"), "output_dir", env("PLOT_OUTPUT_DIR"))
	set(section(cfg, "knowledge_base"), "path", env("KNOWLEDGE_BASE_PATH"))

	const mem = section(cfg, "memory")
	set(mem, "store", env("MEMORY_STORE"))
	set(mem, "log_dir", env("MEMORY_LOG_DIR"))

	const level = env("LOG_LEVEL")
	set(section(cfg, "logging"), "level", level?.toUpperCase())
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: AppConfig | null = null

export function parseConfig(doc: unknown): AppConfig {
	const result = configSchema.safeParse(doc)
	if (!result.success) {
		const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`)
		throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues })
	}
	return result.data
}

export function loadConfig(): AppConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: YamlDoc = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = parseConfig(merged)
	return _config
}

export function getConfig(): AppConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
