/**
 * Naming conventions used when generating aliases, AS identifiers and
 * foreign-key column names for migrated queries.
 */

/** First letter upper-cased, remainder lower-cased ("orderNumber" -> "Ordernumber"). */
export function capitalize(value: string): string {
	if (!value) return value
	return value.charAt(0).toUpperCase() + value.substring(1).toLowerCase()
}

/**
 * English singular form of a table name. Only the plural endings that show up
 * in table names are handled; anything else is returned unchanged.
 */
export function singularize(value: string): string {
	const lower = value.toLowerCase()
	if (lower.length > 3 && lower.endsWith("ies")) {
		return value.substring(0, value.length - 3) + (isUpper(value.charAt(value.length - 3)) ? "Y" : "y")
	}
	if (/(ss|x|ch|sh)es$/.test(lower)) return value.substring(0, value.length - 2)
	if (lower.endsWith("ss") || lower.endsWith("us") || lower.endsWith("is")) return value
	if (lower.length > 1 && lower.endsWith("s")) return value.substring(0, value.length - 1)
	return value
}

function isUpper(ch: string): boolean {
	return ch !== ch.toLowerCase()
}

/** Lower-cased first three characters of a table name. */
export function generateAlias(tableName: string): string {
	const cleaned = tableName.trim()
	return cleaned.substring(0, Math.min(3, cleaned.length)).toLowerCase()
}

/**
 * Alias per target table for one source table.
 *
 * Targets are sorted by name length (shorter first, stable) and each gets its
 * 3-letter prefix; a prefix already taken earlier in the list gets a, b, c, ...
 * appended. Returns the sorted targets with their aliases.
 */
export function assignAliases(targets: readonly string[]): Array<{ table: string; alias: string }> {
	const sorted = [...targets].sort((a, b) => a.length - b.length)
	const taken = new Set<string>()
	const assigned: Array<{ table: string; alias: string }> = []

	for (const table of sorted) {
		const base = generateAlias(table)
		let alias = base
		let suffix = 0
		while (taken.has(alias)) {
			alias = base + suffixLetters(suffix)
			suffix++
		}
		taken.add(alias)
		assigned.push({ table, alias })
	}

	return assigned
}

/** 0 -> "a", 25 -> "z", 26 -> "aa", ... */
function suffixLetters(n: number): string {
	let out = ""
	let i = n
	do {
		out = String.fromCharCode(97 + (i % 26)) + out
		i = Math.floor(i / 26) - 1
	} while (i >= 0)
	return out
}

/** Generated identifier for `<alias>.<column> AS ...` on a migrated table. */
export function generatedColumnAlias(table: string, column: string): string {
	return capitalize(singularize(table)) + capitalize(column)
}

/** Foreign-key column on a secondary table pointing back at the primary one. */
export function foreignKeyColumn(primaryTable: string, idColumn: string): string {
	return singularize(primaryTable) + capitalize(idColumn)
}
