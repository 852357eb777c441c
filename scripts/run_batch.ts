/**
 * Batch Runner
 *
 * Migrates every query in a JSON batch file and writes the impacted-queries report.
 *
 * Batch file shape:
 *   { "mappings": [{ "deprecatedObject": "Amendment", "newObject": "Orders" }],
 *     "queries":  [{ "name": "q1", "description": "...", "originalQuery": "SELECT ..." }] }
 *
 * Usage:
 *   npx tsx scripts/run_batch.ts path/to/batch.json [--no-report]
 */

import fs from "fs"
import path from "path"
import { loadBatch } from "../src/batch_schema.js"
import { loadConfig } from "../src/config/loadConfig.js"
import { createLogger } from "../src/logger.js"
import { migrateQueries } from "../src/migration_orchestrator.js"
import { errorMessage } from "../src/migration_types.js"
import { writeImpactedReport } from "../src/report_writer.js"

function runBatch(): number {
	const args = process.argv.slice(2)
	const batchPath = args.find((a) => !a.startsWith("--"))
	const writeReport = !args.includes("--no-report")

	if (!batchPath) {
		console.error("Usage: npx tsx scripts/run_batch.ts <batch.json> [--no-report]")
		return 1
	}

	const config = loadConfig()
	const logger = createLogger(config.logging.level)

	const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(batchPath), "utf-8"))
	const { queries, mappings } = loadBatch(raw)

	const result = migrateQueries(queries, mappings, {
		dialect: config.parser.dialect,
		defaultIdColumn: config.rewrite.default_id_column,
		logger,
	})

	for (const outcome of result.outcomes) {
		if (!outcome.impacted) continue
		console.log(`✓ ${outcome.name} (${outcome.strategy}, ${outcome.replacements} replacements)`)
	}

	if (writeReport && result.impacted.length > 0) {
		result.summary.reportFilePath = writeImpactedReport(
			result.impacted,
			{ dir: config.reports.dir, fileName: config.reports.file_name },
			logger,
		)
	}

	console.log("")
	console.log(result.summary.message)
	console.log(`Impacted: ${result.summary.impactedQueries}/${result.summary.totalQueries}`)
	if (result.summary.reportFilePath) {
		console.log(`Report:   ${result.summary.reportFilePath}`)
	}
	return 0
}

try {
	process.exitCode = runBatch()
} catch (err) {
	console.error(`[ERROR] ${errorMessage(err)}`)
	process.exitCode = 1
}
