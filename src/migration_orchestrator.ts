/**
 * Migration Orchestrator
 *
 * Per query: sanitize -> structural migration -> formatting-preserving rewrite,
 * or, when the sanitized text does not parse as a single SELECT or the
 * structural path throws, the direct rewriter. Every input record yields
 * exactly one output record; failures are contained to the query that caused
 * them.
 */

import { v4 as uuidv4 } from "uuid"
import { buildMappingIndex, type MappingIndex } from "./mapping_index.js"
import { rewriteWithFormatting } from "./format_rewriter.js"
import { rewriteDirectly } from "./direct_rewriter.js"
import { sanitizeSql } from "./sql_sanitize.js"
import { migrateStructurally } from "./structural_migrator.js"
import { silentLogger, withFields } from "./logger.js"
import {
	errorMessage,
	type MappingEntry,
	type MigrationBatchResult,
	type MigrationLogger,
	type QueryOutcome,
	type QueryRecord,
	type ReplacementLog,
} from "./migration_types.js"

// ============================================================================
// Types
// ============================================================================

export interface MigrationOptions {
	/** node-sql-parser database option */
	dialect?: string
	defaultIdColumn?: string
	logger?: MigrationLogger
	batchId?: string
}

export interface SingleQueryResult {
	sql: string
	changed: boolean
	strategy: "structural" | "direct"
	replacements: ReplacementLog
	/** Why the structural path was not taken */
	reason?: string
}

interface BatchContext {
	index: MappingIndex
	mappings: readonly MappingEntry[]
	dialect?: string
	defaultIdColumn?: string
	logger: MigrationLogger
}

// ============================================================================
// Single Query
// ============================================================================

function migrateText(sql: string, ctx: BatchContext): SingleQueryResult {
	const rewriteOptions = { defaultIdColumn: ctx.defaultIdColumn }
	let reason: string
	try {
		const structural = migrateStructurally(sanitizeSql(sql), ctx.index, ctx.dialect)
		if (structural.kind === "migrated") {
			if (!structural.hasChanges) {
				return { sql, changed: false, strategy: "structural", replacements: structural.replacements }
			}
			return {
				sql: rewriteWithFormatting(sql, structural.replacements, rewriteOptions),
				changed: true,
				strategy: "structural",
				replacements: structural.replacements,
			}
		}
		reason = structural.reason
	} catch (err) {
		// a parsed tree the migrator cannot handle still gets the direct rewrite
		reason = errorMessage(err)
	}

	const direct = rewriteDirectly(sql, ctx.mappings, rewriteOptions, ctx.logger)
	return {
		sql: direct.sql,
		changed: direct.sql !== sql,
		strategy: "direct",
		replacements: direct.replacements,
		reason,
	}
}

/**
 * Migrate one query text without a batch around it.
 */
export function migrateSingleQuery(
	sql: string,
	mappings: readonly MappingEntry[],
	options: MigrationOptions = {},
): SingleQueryResult {
	return migrateText(sql, {
		index: buildMappingIndex(mappings),
		mappings,
		dialect: options.dialect,
		defaultIdColumn: options.defaultIdColumn,
		logger: options.logger ?? silentLogger,
	})
}

function migrateRecord(record: QueryRecord, ctx: BatchContext): QueryOutcome {
	const { logger } = ctx
	let result: SingleQueryResult
	try {
		result = migrateText(record.originalQuery, ctx)
	} catch (err) {
		record.impacted = false
		record.status = `FAILED: ${errorMessage(err)}`
		logger.error("Query migration failed", { query: record.name, error: errorMessage(err) })
		return { name: record.name, strategy: "failed", impacted: false, replacements: 0, reason: errorMessage(err) }
	}

	if (result.strategy === "direct") {
		logger.warn("Parse failed, using direct replacement", { query: record.name, reason: result.reason })
	}

	if (result.changed) {
		record.updatedQuery = result.sql
		record.impacted = true
		logger.debug("Query impacted and updated", {
			query: record.name,
			strategy: result.strategy,
			replacements: result.replacements.size,
		})
	} else {
		record.impacted = false
		logger.debug("Query unchanged", { query: record.name, strategy: result.strategy })
	}

	return {
		name: record.name,
		strategy: result.strategy,
		impacted: record.impacted,
		replacements: result.replacements.size,
		reason: result.reason,
	}
}

// ============================================================================
// Batch
// ============================================================================

/**
 * Migrate every record in place and return them in input order with the
 * impacted subset, per-query outcomes and a summary.
 */
export function migrateQueries(
	queries: QueryRecord[],
	mappings: readonly MappingEntry[],
	options: MigrationOptions = {},
): MigrationBatchResult {
	const batchId = options.batchId ?? uuidv4()
	const logger = withFields(options.logger ?? silentLogger, { batch_id: batchId })
	const ctx: BatchContext = {
		index: buildMappingIndex(mappings),
		mappings,
		dialect: options.dialect,
		defaultIdColumn: options.defaultIdColumn,
		logger,
	}

	logger.info("Migration started", { queries: queries.length, mappings: mappings.length })

	const outcomes = queries.map((record) => migrateRecord(record, ctx))
	const impacted = queries.filter((record) => record.impacted)

	logger.info("Migration complete", {
		impacted: impacted.length,
		total: queries.length,
		direct: outcomes.filter((o) => o.strategy === "direct").length,
		failed: outcomes.filter((o) => o.strategy === "failed").length,
	})

	return {
		records: queries,
		impacted,
		outcomes,
		summary: {
			success: true,
			message:
				impacted.length === 0
					? "Migration completed successfully. No queries were impacted."
					: "Migration completed successfully.",
			totalQueries: queries.length,
			impactedQueries: impacted.length,
			batchId,
		},
	}
}
