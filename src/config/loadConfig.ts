/**
 * Unified config loader for the query router.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * No module-level cache: the entry point loads once and passes the value down.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { ChatRouterError } from "../errors.js"

// ── Schema ───────────────────────────────────────────────────────────

const configSchema = z.object({
	database: z
		.object({
			host: z.string().default("localhost"),
			port: z.number().int().positive().default(5432),
			name: z.string().default("chitalishte"),
			user: z.string().default("postgres"),
			password: z.string().default(""),
			statement_timeout_ms: z.number().int().positive().default(10000),
			max_rows: z.number().int().positive().default(1000),
		})
		.default({}),
	llm: z
		.object({
			enabled: z.boolean().default(true),
			base_url: z.string().url().default("https://api.openai.com/v1"),
			model: z.string().min(1).default("gpt-4o-mini"),
			api_key: z.string().default(""),
			timeout_ms: z.number().int().positive().default(15000),
			temperature: z.number().min(0).max(2).default(0),
		})
		.default({}),
	router: z
		.object({
			llm_fallback_to_keywords: z.boolean().default(true),
		})
		.default({}),
	catalog: z
		.object({
			schema_file: z.string().min(1).default("schema_catalog.yaml"),
			keywords_file: z.string().min(1).default("intent_keywords.json"),
		})
		.default({}),
	logging: z
		.object({
			level: z.enum(["debug", "info", "warn", "error"]).default("info"),
		})
		.default({}),
})

export type ChatRouterConfig = z.infer<typeof configSchema>

export interface LoadConfigOptions {
	/** Directory holding config.yaml; found by walking up from cwd when omitted */
	configDir?: string
	/** Defaults to process.env */
	env?: NodeJS.ProcessEnv
}

// ── YAML Loading ─────────────────────────────────────────────────────

type ConfigRecord = Record<string, unknown>

function isRecord(value: unknown): value is ConfigRecord {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

export function findConfigDir(start: string = process.cwd()): string | null {
	// Walk up looking for config/config.yaml
	let dir = start
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): ConfigRecord {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	let parsed: unknown
	try {
		parsed = yaml.load(raw)
	} catch (err) {
		throw new ChatRouterError("configuration", `Cannot parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
	}
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts, undefined in b is skipped). */
function deepMerge(a: ConfigRecord, b: ConfigRecord): ConfigRecord {
	const result: ConfigRecord = { ...a }
	for (const [key, value] of Object.entries(b)) {
		if (value === undefined) continue
		const current = result[key]
		result[key] = isRecord(value) && isRecord(current) ? deepMerge(current, value) : value
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function envInt(value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	const n = parseInt(value, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	const n = parseFloat(value)
	return isNaN(n) ? undefined : n
}
function envBool(value: string | undefined): boolean | undefined {
	if (value === "true" || value === "1") return true
	if (value === "false" || value === "0") return false
	return undefined
}

/** Env-var overrides, shaped like the YAML file. Unset vars stay undefined. */
function envOverlay(env: NodeJS.ProcessEnv): ConfigRecord {
	return {
		database: {
			host: env.DB_HOST,
			port: envInt(env.DB_PORT),
			name: env.DB_NAME,
			user: env.DB_USER,
			password: env.DB_PASSWORD,
			statement_timeout_ms: envInt(env.DB_STATEMENT_TIMEOUT_MS),
			max_rows: envInt(env.DB_MAX_ROWS),
		},
		llm: {
			enabled: envBool(env.LLM_ENABLED),
			base_url: env.LLM_BASE_URL,
			model: env.LLM_MODEL,
			api_key: env.LLM_API_KEY ?? env.OPENAI_API_KEY,
			timeout_ms: envInt(env.LLM_TIMEOUT_MS),
			temperature: envFloat(env.LLM_TEMPERATURE),
		},
		router: {
			llm_fallback_to_keywords: envBool(env.LLM_FALLBACK_TO_KEYWORDS),
		},
		logging: {
			level: env.LOG_LEVEL,
		},
	}
}

// ── Loading ──────────────────────────────────────────────────────────

export function loadConfig(options: LoadConfigOptions = {}): ChatRouterConfig {
	const configDir = options.configDir ?? findConfigDir()
	let merged: ConfigRecord = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	merged = deepMerge(merged, envOverlay(options.env ?? process.env))

	const parsed = configSchema.safeParse(merged)
	if (!parsed.success) {
		throw new ChatRouterError(
			"configuration",
			`Invalid configuration: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
			false,
			{ configDir },
		)
	}

	// Catalog files are relative to the config directory
	const baseDir = configDir ?? process.cwd()
	const config = parsed.data
	config.catalog.schema_file = path.resolve(baseDir, config.catalog.schema_file)
	config.catalog.keywords_file = path.resolve(baseDir, config.catalog.keywords_file)
	return config
}
