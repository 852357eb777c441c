/**
 * Migration Types
 *
 * Defines types for:
 * - Mapping rows (deprecated object -> new object)
 * - Query records flowing through a batch
 * - Replacement log produced per query
 * - Per-query outcomes and batch summary
 * - Logger contract shared by every component
 */

// ============================================================================
// Mapping Types
// ============================================================================

/**
 * Raw mapping row as supplied by the caller (spreadsheet row, JSON body, ...)
 */
export interface RawMappingRow {
	deprecatedObject: string
	newObject: string
}

/**
 * Mapping row split into its table/field parts.
 *
 * A non-empty `deprecatedField` makes the entry a field-level mapping,
 * otherwise it renames the whole table.
 */
export interface MappingEntry {
	deprecatedObject: string
	newObject: string
	deprecatedTable: string
	deprecatedField: string | null
	newTable: string
	newField: string | null
}

// ============================================================================
// Query Types
// ============================================================================

export interface QueryRecord {
	name: string
	description: string
	originalQuery: string
	updatedQuery?: string
	impacted: boolean
	/** Populated by the console automation collaborator only */
	oldUrl?: string
	newUrl?: string
	status?: string
}

/**
 * Insertion-ordered old reference -> new reference.
 *
 * Keys are either a bare table name or a `table.column` pair.
 */
export type ReplacementLog = Map<string, string>

// ============================================================================
// Batch Result Types
// ============================================================================

export type MigrationStrategy = "structural" | "direct" | "failed"

export interface QueryOutcome {
	name: string
	strategy: MigrationStrategy
	impacted: boolean
	/** Number of replacement log entries applied */
	replacements: number
	/** Parse failure or error message, when a strategy was skipped */
	reason?: string
}

export interface MigrationSummary {
	success: boolean
	message: string
	totalQueries: number
	impactedQueries: number
	batchId: string
	reportFilePath?: string
	error?: string
}

export interface MigrationBatchResult {
	/** Every input record, mutated in place, input order */
	records: QueryRecord[]
	/** Impacted subset, input order */
	impacted: QueryRecord[]
	outcomes: QueryOutcome[]
	summary: MigrationSummary
}

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogFn = (message: string, data?: Record<string, unknown>) => void

export interface MigrationLogger {
	debug: LogFn
	info: LogFn
	warn: LogFn
	error: LogFn
}

// ============================================================================
// Errors
// ============================================================================

export type MigrationErrorCode = "REPORT_WRITE_FAILED" | "INVALID_BATCH"

export class MigrationError extends Error {
	readonly code: MigrationErrorCode

	constructor(code: MigrationErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = "MigrationError"
		this.code = code
	}
}

/** Message of anything thrown, for logs and status fields. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
