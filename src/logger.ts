/**
 * Stderr logger
 *
 * stdout is reserved for the MCP protocol, so every level writes to stderr.
 */

import type { LogLevel, MigrationLogger } from "./migration_types.js"

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

function write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
	const prefix = `[${level.toUpperCase()}]`
	if (data && Object.keys(data).length > 0) {
		console.error(prefix, message, JSON.stringify(data))
	} else {
		console.error(prefix, message)
	}
}

export function createLogger(level: LogLevel = "info"): MigrationLogger {
	const threshold = LEVEL_ORDER[level]
	const at = (l: LogLevel) => (message: string, data?: Record<string, unknown>) => {
		if (LEVEL_ORDER[l] >= threshold) write(l, message, data)
	}
	return {
		debug: at("debug"),
		info: at("info"),
		warn: at("warn"),
		error: at("error"),
	}
}

/**
 * Child logger that stamps the same fields on every line (e.g. batch_id).
 */
export function withFields(logger: MigrationLogger, fields: Record<string, unknown>): MigrationLogger {
	return {
		debug: (m, d) => logger.debug(m, { ...fields, ...d }),
		info: (m, d) => logger.info(m, { ...fields, ...d }),
		warn: (m, d) => logger.warn(m, { ...fields, ...d }),
		error: (m, d) => logger.error(m, { ...fields, ...d }),
	}
}

export const silentLogger: MigrationLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
