/**
 * Query Migrator MCP Server
 *
 * Exposes the migration engine as MCP tools:
 * - migrate_queries: migrate a batch and optionally write the impacted report
 * - preview_migration: show the strategy, replacement log and rewritten SQL for one query
 * - sanitize_sql: the normalization applied before the structural parse
 * - health: liveness check
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import { mappingRowSchema, queryInputSchema, toQueryRecords } from "./batch_schema.js"
import type { QueryMigratorConfig } from "./config/loadConfig.js"
import { parseMappingRows } from "./mapping_index.js"
import { migrateQueries, migrateSingleQuery } from "./migration_orchestrator.js"
import { errorMessage, type MigrationLogger } from "./migration_types.js"
import { writeImpactedReport } from "./report_writer.js"
import { sanitizeWithTrace } from "./sql_sanitize.js"

export { migrateQueries, migrateSingleQuery } from "./migration_orchestrator.js"
export { buildMappingIndex, parseMappingEntry, parseMappingRows } from "./mapping_index.js"
export { rewriteWithFormatting } from "./format_rewriter.js"
export { sanitizeSql } from "./sql_sanitize.js"
export * from "./migration_types.js"

export interface CreateServerOptions {
	config: QueryMigratorConfig
	logger: MigrationLogger
}

function textResult(value: unknown) {
	return {
		content: [{ type: "text" as const, text: typeof value === "string" ? value : JSON.stringify(value, null, 2) }],
	}
}

function errorResult(message: string) {
	return { ...textResult(message), isError: true }
}

export default function createServer({ config, logger }: CreateServerOptions): McpServer {
	const server = new McpServer({ name: config.server.name, version: config.server.version })
	const migrationOptions = {
		dialect: config.parser.dialect,
		defaultIdColumn: config.rewrite.default_id_column,
		logger,
	}

	server.tool(
		"migrate_queries",
		"Migrate SQL SELECT queries from deprecated tables/columns to their replacements. " +
			"Mappings use 'Table' or 'Table.Column' on both sides.",
		{
			mappings: z.array(mappingRowSchema).describe("Deprecated object -> new object rows"),
			queries: z.array(queryInputSchema).describe("Queries to migrate"),
			write_report: z.boolean().optional().describe("Write the impacted-queries report file"),
		},
		async ({ mappings, queries, write_report }) => {
			try {
				const records = toQueryRecords(queries)
				const result = migrateQueries(records, parseMappingRows(mappings), migrationOptions)

				if (write_report && result.impacted.length > 0) {
					result.summary.reportFilePath = writeImpactedReport(
						result.impacted,
						{ dir: config.reports.dir, fileName: config.reports.file_name },
						logger,
					)
				}

				return textResult({
					summary: result.summary,
					outcomes: result.outcomes,
					impacted: result.impacted,
				})
			} catch (err) {
				logger.error("migrate_queries failed", { error: errorMessage(err) })
				return errorResult(`Migration failed due to an internal error: ${errorMessage(err)}`)
			}
		},
	)

	server.tool(
		"preview_migration",
		"Show how a single SQL query would be migrated without writing anything.",
		{
			mappings: z.array(mappingRowSchema),
			sql: z.string().min(1),
		},
		async ({ mappings, sql }) => {
			try {
				const result = migrateSingleQuery(sql, parseMappingRows(mappings), migrationOptions)
				return textResult({
					strategy: result.strategy,
					changed: result.changed,
					reason: result.reason,
					replacements: [...result.replacements.entries()].map(([from, to]) => ({ from, to })),
					sql: result.sql,
				})
			} catch (err) {
				logger.error("preview_migration failed", { error: errorMessage(err) })
				return errorResult(errorMessage(err))
			}
		},
	)

	server.tool(
		"sanitize_sql",
		"Normalize SQL text the way it is cleaned before structural parsing.",
		{ sql: z.string() },
		async ({ sql }) => {
			const result = sanitizeWithTrace(sql)
			return textResult({ sql: result.sql, applied: result.applied })
		},
	)

	server.tool("health", "Check that the migrator is running.", {}, async () =>
		textResult("SQL Query Migrator Service is running"),
	)

	return server
}
