/**
 * Mapping Index
 *
 * Lookup structures built once per batch from the mapping rows:
 * - fieldMappings: "table.column" (lower-cased) -> entry, last row wins
 * - tableMappings: table (lower-cased) -> table-level entries in row order
 *
 * Read-only after construction and shared by every query in the batch.
 */

import type { MappingEntry, RawMappingRow } from "./migration_types.js"

export interface MappingIndex {
	readonly fieldMappings: ReadonlyMap<string, MappingEntry>
	readonly tableMappings: ReadonlyMap<string, readonly MappingEntry[]>
}

// ============================================================================
// Row Parsing
// ============================================================================

function splitObject(value: string): { table: string; field: string | null } {
	const dot = value.indexOf(".")
	if (dot < 0) return { table: value, field: null }
	const field = value.substring(dot + 1).trim()
	return { table: value.substring(0, dot).trim(), field: field.length > 0 ? field : null }
}

/**
 * Split a raw row into table/field parts. Returns null for an empty deprecated object.
 */
export function parseMappingEntry(row: RawMappingRow): MappingEntry | null {
	const deprecatedObject = (row.deprecatedObject ?? "").trim()
	const newObject = (row.newObject ?? "").trim()
	if (!deprecatedObject) return null

	const deprecated = splitObject(deprecatedObject)
	const replacement = splitObject(newObject)

	return {
		deprecatedObject,
		newObject,
		deprecatedTable: deprecated.table,
		deprecatedField: deprecated.field,
		newTable: replacement.table,
		newField: replacement.field,
	}
}

export function parseMappingRows(rows: readonly RawMappingRow[]): MappingEntry[] {
	const entries: MappingEntry[] = []
	for (const row of rows) {
		const entry = parseMappingEntry(row)
		if (entry) entries.push(entry)
	}
	return entries
}

export function isFieldLevel(entry: MappingEntry): boolean {
	return entry.deprecatedField !== null && entry.deprecatedField.length > 0
}

// ============================================================================
// Index Construction
// ============================================================================

export function buildMappingIndex(entries: readonly MappingEntry[]): MappingIndex {
	const fieldMappings = new Map<string, MappingEntry>()
	const tableMappings = new Map<string, MappingEntry[]>()

	for (const entry of entries) {
		if (!entry.deprecatedTable) continue
		const table = entry.deprecatedTable.toLowerCase()

		if (isFieldLevel(entry)) {
			if (!entry.newTable || !entry.newField) continue
			// Later rows overwrite earlier ones on the same key
			fieldMappings.set(`${table}.${(entry.deprecatedField ?? "").toLowerCase()}`, entry)
			continue
		}

		if (!entry.newTable) continue
		const list = tableMappings.get(table)
		if (list) {
			list.push(entry)
		} else {
			tableMappings.set(table, [entry])
		}
	}

	return { fieldMappings, tableMappings }
}
