/**
 * SQL Sanitizer
 *
 * Deterministic cleanup applied before the structural parse only. The original
 * text is kept separately for the formatting-preserving rewrite.
 */

interface Transform {
	name: string
	pattern: RegExp
	replace: string
}

// Order matters: trailing-comma removal relies on line endings already being \n
const TRANSFORMS: Transform[] = [
	{
		name: "STRIP_CONTROL_CHARS",
		pattern: /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g,
		replace: "",
	},
	{
		name: "NORMALIZE_CRLF",
		pattern: /\r\n?/g,
		replace: "\n",
	},
	{
		// "a, b,\nFROM t" is a common spreadsheet copy-paste artifact
		name: "TRAILING_COMMA_BEFORE_CLAUSE",
		pattern: /,\s*\b(FROM|WHERE|GROUP\s+BY|ORDER\s+BY|LIMIT|HAVING|UNION)\b/gi,
		replace: "\n$1",
	},
	{
		name: "TRAILING_COMMA_BEFORE_PAREN",
		pattern: /,\s*\)/g,
		replace: ")",
	},
	{
		name: "LEADING_INDENT",
		pattern: /^[ \t]+/gm,
		replace: "    ",
	},
	{
		name: "INTERIOR_SPACES",
		pattern: /(\S)[ \t]{2,}/g,
		replace: "$1 ",
	},
	{
		name: "TRAILING_WHITESPACE",
		pattern: /[ \t]+$/gm,
		replace: "",
	},
]

export interface SanitizeResult {
	sql: string
	applied: string[]
}

/**
 * Run every transform and report which ones changed the text.
 */
export function sanitizeWithTrace(sql: string | null | undefined): SanitizeResult {
	let result = sql ?? ""
	const applied: string[] = []

	for (const t of TRANSFORMS) {
		const next = result.replace(t.pattern, t.replace)
		if (next !== result) applied.push(t.name)
		result = next
	}

	return { sql: result.trim(), applied }
}

export function sanitizeSql(sql: string | null | undefined): string {
	return sanitizeWithTrace(sql).sql
}
