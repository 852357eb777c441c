/**
 * Fallback Direct Rewriter
 *
 * Used when the structural parse fails. Builds a replacement log straight from
 * the mapping rows and hands it to the formatting-preserving rewriter. Aliases
 * are recovered from the text by the rewriter itself, and every source table
 * keeps a single target, so no joins are synthesized here.
 */

import { isFieldLevel } from "./mapping_index.js"
import type { MappingEntry, MigrationLogger, ReplacementLog } from "./migration_types.js"
import { escapeRegex, rewriteWithFormatting, type RewriteOptions } from "./format_rewriter.js"
import { silentLogger } from "./logger.js"

export interface DirectRewriteResult {
	sql: string
	replacements: ReplacementLog
}

function mentionsTable(sql: string, table: string): boolean {
	// "dbo.Amendment" counts as a mention
	return new RegExp(`(?<!\\w)${escapeRegex(table)}\\b`, "i").test(sql)
}

/**
 * Replacement log for the tables the query actually mentions. The first row
 * naming a table decides its target; field rows pointing elsewhere are
 * routed to that target.
 */
export function buildDirectReplacements(
	sql: string,
	mappings: readonly MappingEntry[],
	logger: MigrationLogger = silentLogger,
): ReplacementLog {
	const targets = new Map<string, string>()
	for (const entry of mappings) {
		const key = entry.deprecatedTable.toLowerCase()
		if (!entry.deprecatedTable || !entry.newTable || targets.has(key)) continue
		if (!mentionsTable(sql, entry.deprecatedTable)) continue
		targets.set(key, entry.newTable)
	}

	const replacements: ReplacementLog = new Map()
	for (const entry of mappings) {
		const target = targets.get(entry.deprecatedTable.toLowerCase())
		if (target === undefined) continue

		if (!replacements.has(entry.deprecatedTable)) {
			replacements.set(entry.deprecatedTable, target)
		}
		if (!isFieldLevel(entry) || !entry.deprecatedField || !entry.newField) continue

		if (entry.newTable && entry.newTable.toLowerCase() !== target.toLowerCase()) {
			logger.debug("Direct rewrite keeps a single target per table", {
				table: entry.deprecatedTable,
				target,
				ignored_target: entry.newTable,
			})
		}
		replacements.set(`${entry.deprecatedTable}.${entry.deprecatedField}`, `${target}.${entry.newField}`)
	}

	return replacements
}

export function rewriteDirectly(
	sql: string,
	mappings: readonly MappingEntry[],
	options: RewriteOptions = {},
	logger: MigrationLogger = silentLogger,
): DirectRewriteResult {
	const replacements = buildDirectReplacements(sql, mappings, logger)
	if (replacements.size === 0) return { sql, replacements }
	return { sql: rewriteWithFormatting(sql, replacements, options), replacements }
}
