/**
 * Unified config loader for the query migrator.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * Missing keys fall back to the schema defaults, so a checkout without a
 * config directory still gets a complete config.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Types ────────────────────────────────────────────────────────────

const configSchema = z.object({
	parser: z
		.object({
			dialect: z.string().min(1).default("mysql"),
		})
		.default({}),
	rewrite: z
		.object({
			default_id_column: z.string().min(1).default("Id"),
		})
		.default({}),
	reports: z
		.object({
			dir: z.string().min(1).default("reports"),
			file_name: z.string().min(1).default("impacted_queries.json"),
		})
		.default({}),
	logging: z
		.object({
			level: z.enum(["debug", "info", "warn", "error"]).default("info"),
		})
		.default({}),
	server: z
		.object({
			name: z.string().min(1).default("query-migrator"),
			version: z.string().min(1).default("0.1.0"),
		})
		.default({}),
})

export type QueryMigratorConfig = z.infer<typeof configSchema>

type YamlObject = Record<string, unknown>

function isObject(value: unknown): value is YamlObject {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

// ── YAML Loading ─────────────────────────────────────────────────────

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

function loadYaml(filePath: string): YamlObject {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed = yaml.load(raw)
	return isObject(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: YamlObject, b: YamlObject): YamlObject {
	const result: YamlObject = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isObject(right) && isObject(left)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}

function section(cfg: YamlObject, key: string): YamlObject {
	const existing = cfg[key]
	if (isObject(existing)) return existing
	const created: YamlObject = {}
	cfg[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: YamlObject): void {
	const p = section(cfg, "parser")
	p.dialect = env("SQL_DIALECT") ?? p.dialect

	const rw = section(cfg, "rewrite")
	rw.default_id_column = env("DEFAULT_ID_COLUMN") ?? rw.default_id_column

	const r = section(cfg, "reports")
	r.dir = env("REPORTS_DIR") ?? r.dir
	r.file_name = env("REPORT_FILE_NAME") ?? r.file_name

	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL")?.toLowerCase() ?? l.level

	const s = section(cfg, "server")
	s.name = env("MCP_SERVER_NAME") ?? s.name
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: QueryMigratorConfig | null = null

export function loadConfig(): QueryMigratorConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: YamlObject = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = configSchema.parse(merged)
	return _config
}

export function getConfig(): QueryMigratorConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
