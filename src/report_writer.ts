/**
 * Impacted-query report
 *
 * The report directory is created when the first report is written, not when
 * the service starts.
 */

import fs from "fs"
import path from "path"
import { errorMessage, MigrationError, type MigrationLogger, type QueryRecord } from "./migration_types.js"
import { silentLogger } from "./logger.js"

export interface ReportOptions {
	dir: string
	fileName: string
}

export interface ImpactedReportRow {
	queryName: string
	description: string
	originalQuery: string
	updatedQuery: string
}

export function toReportRows(records: readonly QueryRecord[]): ImpactedReportRow[] {
	return records
		.filter((r) => r.impacted)
		.map((r) => ({
			queryName: r.name,
			description: r.description,
			originalQuery: r.originalQuery,
			updatedQuery: r.updatedQuery ?? r.originalQuery,
		}))
}

/**
 * Write impacted records as a JSON array. Returns the report path.
 */
export function writeImpactedReport(
	records: readonly QueryRecord[],
	options: ReportOptions,
	logger: MigrationLogger = silentLogger,
): string {
	const filePath = path.join(options.dir, options.fileName)
	const rows = toReportRows(records)

	try {
		fs.mkdirSync(options.dir, { recursive: true })
		fs.writeFileSync(filePath, JSON.stringify(rows, null, 2) + "\n", "utf-8")
	} catch (err) {
		throw new MigrationError("REPORT_WRITE_FAILED", `Failed to write report ${filePath}: ${errorMessage(err)}`, {
			cause: err,
		})
	}

	logger.info("Saved impacted queries report", { path: path.resolve(filePath), rows: rows.length })
	return filePath
}
