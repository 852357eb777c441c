/**
 * Formatting-Preserving Rewriter
 *
 * Applies a replacement log to the ORIGINAL query text with ordered regex
 * passes, so developer formatting, comments and untouched tokens survive:
 *
 *   A. classify log entries (tables, qualified columns, generated AS names)
 *   B. assign one alias per target table
 *   C. rewrite FROM/JOIN/comma-listed tables (schema prefix and quoting kept),
 *      synthesize joins for split tables
 *   D. move old alias prefixes to the new alias (single-target batches only)
 *   E. route each qualified column to its target alias, longest key first
 *   F. regenerate or drop `<alias>.<column> AS <name>` identifiers
 *
 * All matching is case-insensitive and tolerates whitespace (including
 * newlines) between a qualifier and its column.
 */

import type { ReplacementLog } from "./migration_types.js"
import { assignAliases, capitalize, foreignKeyColumn, generatedColumnAlias } from "./naming.js"

// ============================================================================
// Types
// ============================================================================

export interface RewriteOptions {
	/** Id column for synthetic joins when no `<source>.id` mapping exists */
	defaultIdColumn?: string
}

interface QualifiedReplacement {
	key: string
	oldTable: string
	oldColumn: string
	newTable: string
	newColumn: string
}

interface TargetAlias {
	table: string
	alias: string
}

interface SourcePlan {
	/** Source table as it appears in the log */
	source: string
	/** Distinct targets in log order */
	targets: string[]
	/** Sorted targets with aliases; index 0 is the primary target */
	aliases: TargetAlias[]
	/** Aliases the original text uses for this table */
	actualAliases: string[]
}

const IDENT = "[A-Za-z_][A-Za-z0-9_]*"

// Words that can follow a table name without being its alias
const CLAUSE_KEYWORDS = new Set([
	"where", "join", "inner", "left", "right", "full", "outer", "cross", "natural",
	"straight_join", "on", "using", "group", "order", "having", "limit", "offset",
	"union", "intersect", "except", "window", "qualify", "fetch", "for", "lateral",
])

export function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

function sameName(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase()
}

function splitQualified(value: string): [string, string] | null {
	const dot = value.indexOf(".")
	if (dot < 0) return null
	return [value.substring(0, dot), value.substring(dot + 1)]
}

// ============================================================================
// Step A: classify
// ============================================================================

interface Classified {
	sources: Map<string, SourcePlan>
	qualified: QualifiedReplacement[]
	/** Generated identifiers such as AmendmentId -> OrdersId */
	aliasStyle: Map<string, string>
}

function addTarget(sources: Map<string, SourcePlan>, source: string, target: string): void {
	const key = source.toLowerCase()
	let plan = sources.get(key)
	if (!plan) {
		plan = { source, targets: [], aliases: [], actualAliases: [] }
		sources.set(key, plan)
	}
	if (!plan.targets.some((t) => sameName(t, target))) plan.targets.push(target)
}

function classify(log: ReplacementLog): Classified {
	const sources = new Map<string, SourcePlan>()
	const qualified: QualifiedReplacement[] = []
	const aliasStyle = new Map<string, string>()

	for (const [oldValue, newValue] of log) {
		const oldParts = splitQualified(oldValue)
		if (!oldParts) {
			addTarget(sources, oldValue, newValue)
			continue
		}
		const newParts = splitQualified(newValue)
		if (!newParts) continue

		const [oldTable, oldColumn] = oldParts
		const [newTable, newColumn] = newParts
		qualified.push({ key: oldValue, oldTable, oldColumn, newTable, newColumn })
		addTarget(sources, oldTable, newTable)

		const oldAlias = capitalize(oldTable) + capitalize(oldColumn)
		const newAlias = capitalize(newTable) + capitalize(newColumn)
		if (!sameName(oldAlias, newAlias)) aliasStyle.set(oldAlias, newAlias)
	}

	return { sources, qualified, aliasStyle }
}

// ============================================================================
// Step C: FROM/JOIN and synthetic joins
// ============================================================================

// Plain, backtick, double-quoted or bracketed identifier
const ANY_IDENT = `(?:${IDENT}|\`[^\`]+\`|"[^"]+"|\\[[^\\]]+\\])`

const CLAUSE_START = /\b(SELECT|FROM|JOIN|ON|WHERE|GROUP|ORDER|HAVING|LIMIT|UNION)\b/gi

interface TableReference {
	start: number
	end: number
	/** FROM / JOIN keyword or list comma, with the whitespace after it */
	lead: string
	/** "schema." prefix as written, or "" */
	schema: string
	open: string
	close: string
	/** Text after the table name that the pattern consumed: " a", " AS a", " WHERE" */
	aliasClause: string
	ident: string | null
}

function tableReferencePattern(table: string): RegExp {
	return new RegExp(
		`(\\bFROM\\s+|\\bJOIN\\s+|,\\s*)((?:${ANY_IDENT}\\s*\\.\\s*)?)([\`"[]?)${escapeRegex(table)}([\`"\\]]?)` +
			`(?!\\w)(?!\\s*\\.)((\\s+)(?:AS\\s+)?(${IDENT})\\b)?`,
		"gi",
	)
}

function quotesPair(open: string, close: string): boolean {
	if (open === "[") return close === "]"
	return open === close
}

/** A comma only starts a table reference inside a FROM list. */
function inFromList(sql: string, index: number): boolean {
	let last: string | null = null
	for (const match of sql.substring(0, index).matchAll(CLAUSE_START)) {
		last = match[1].toUpperCase()
	}
	return last === "FROM" || last === "JOIN"
}

function findTableReferences(sql: string, table: string): TableReference[] {
	const found: TableReference[] = []
	for (const match of sql.matchAll(tableReferencePattern(table))) {
		const start = match.index ?? 0
		const lead = match[1] ?? ""
		const open = match[3] ?? ""
		const close = match[4] ?? ""
		if (!quotesPair(open, close)) continue
		if (lead.startsWith(",") && !inFromList(sql, start)) continue
		found.push({
			start,
			end: start + match[0].length,
			lead,
			schema: match[2] ?? "",
			open,
			close,
			aliasClause: match[5] ?? "",
			ident: match[7] ?? null,
		})
	}
	return found
}

function isClauseKeyword(ident: string | null): boolean {
	return ident !== null && CLAUSE_KEYWORDS.has(ident.toLowerCase())
}

function findActualAliases(sql: string, table: string): string[] {
	const aliases: string[] = []
	for (const ref of findTableReferences(sql, table)) {
		const alias = ref.ident !== null && !isClauseKeyword(ref.ident) ? ref.ident : table
		if (!aliases.some((a) => sameName(a, alias))) aliases.push(alias)
	}
	return aliases
}

function rewriteFromJoin(sql: string, plan: SourcePlan): string {
	const primary = plan.aliases[0]
	let result = ""
	let cursor = 0
	for (const ref of findTableReferences(sql, plan.source)) {
		result += sql.substring(cursor, ref.start)
		result += `${ref.lead}${ref.schema}${ref.open}${primary.table}${ref.close} ${primary.alias}`
		if (isClauseKeyword(ref.ident)) result += ref.aliasClause
		cursor = ref.end
	}
	return result + sql.substring(cursor)
}

function idColumnFor(plan: SourcePlan, qualified: QualifiedReplacement[], fallback: string): string {
	const primary = plan.aliases[0]
	const idMapping = qualified.find(
		(q) => sameName(q.oldTable, plan.source) && sameName(q.oldColumn, "id") && sameName(q.newTable, primary.table),
	)
	return idMapping ? idMapping.newColumn : fallback
}

function syntheticJoins(plan: SourcePlan, qualified: QualifiedReplacement[], defaultIdColumn: string): string[] {
	if (plan.aliases.length < 2) return []
	const primary = plan.aliases[0]
	const idColumn = idColumnFor(plan, qualified, defaultIdColumn)
	const fk = foreignKeyColumn(primary.table, idColumn)
	return plan.aliases
		.slice(1)
		.map((secondary) => `JOIN ${secondary.table} ${secondary.alias} ON ${primary.alias}.${idColumn} = ${secondary.alias}.${fk}`)
}

/**
 * Insert joins before the first WHERE, reusing the whitespace that precedes it,
 * or append them at the end of the statement.
 */
function insertJoins(sql: string, joins: string[]): string {
	if (joins.length === 0) return sql

	const where = /\bWHERE\b/i.exec(sql)
	if (where) {
		const before = sql.substring(0, where.index)
		const head = before.replace(/\s+$/, "")
		const sep = before.substring(head.length) || " "
		return head + sep + joins.join(sep) + sep + sql.substring(where.index)
	}

	const tail = /\s*;?\s*$/.exec(sql)
	const cut = tail ? tail.index : sql.length
	const sep = sql.includes("\n") ? "\n" : " "
	return sql.substring(0, cut) + sep + joins.join(sep) + sql.substring(cut)
}

// ============================================================================
// Step D / E: qualified references
// ============================================================================

function qualifiedPattern(qualifier: string, column: string): RegExp {
	return new RegExp(`(?<![\\w.])${escapeRegex(qualifier)}\\s*\\.\\s*(${escapeRegex(column)})\\b`, "gi")
}

function targetAliasFor(plan: SourcePlan, table: string): string {
	const hit = plan.aliases.find((a) => sameName(a.table, table))
	return (hit ?? plan.aliases[0]).alias
}

function replaceAliasPrefixes(sql: string, plan: SourcePlan): string {
	const newAlias = plan.aliases[0].alias
	let result = sql
	for (const oldAlias of plan.actualAliases) {
		if (sameName(oldAlias, newAlias)) continue
		const pattern = new RegExp(`(?<![\\w.])${escapeRegex(oldAlias)}(\\s*)\\.`, "gi")
		result = result.replace(pattern, (_m: string, ws: string) => `${newAlias}${ws}.`)
	}
	return result
}

function routeColumn(sql: string, q: QualifiedReplacement, plan: SourcePlan): string {
	const alias = targetAliasFor(plan, q.newTable)
	const keepCase = sameName(q.oldColumn, q.newColumn)
	const replacer = (_m: string, columnText: string) =>
		`${alias}.${keepCase || sameName(columnText, q.newColumn) ? columnText : q.newColumn}`

	let result = sql
	for (const oldAlias of plan.actualAliases) {
		result = result.replace(qualifiedPattern(oldAlias, q.oldColumn), replacer)
	}
	result = result.replace(qualifiedPattern(q.oldTable, q.oldColumn), replacer)
	result = result.replace(qualifiedPattern(q.newTable, q.newColumn), replacer)
	return result
}

/**
 * One pass per alias so a renamed column is never renamed a second time
 * when another entry's old name equals its new name.
 */
function correctLeftoverColumns(sql: string, qualified: QualifiedReplacement[], sources: Map<string, SourcePlan>): string {
	const byAlias = new Map<string, Map<string, string>>()
	for (const q of qualified) {
		if (sameName(q.oldColumn, q.newColumn)) continue
		const plan = sources.get(q.oldTable.toLowerCase())
		if (!plan) continue
		const alias = targetAliasFor(plan, q.newTable)
		let columns = byAlias.get(alias)
		if (!columns) {
			columns = new Map()
			byAlias.set(alias, columns)
		}
		columns.set(q.oldColumn.toLowerCase(), q.newColumn)
	}

	let result = sql
	for (const [alias, columns] of byAlias) {
		const names = [...columns.keys()].sort((a, b) => b.length - a.length).map(escapeRegex)
		const pattern = new RegExp(`(?<![\\w.])${escapeRegex(alias)}\\s*\\.\\s*(${names.join("|")})\\b`, "gi")
		result = result.replace(pattern, (match: string, column: string) => {
			const renamed = columns.get(column.toLowerCase())
			return renamed === undefined ? match : `${alias}.${renamed}`
		})
	}
	return result
}

function replaceAliasStyle(sql: string, aliasStyle: Map<string, string>): string {
	let result = sql
	const ordered = [...aliasStyle.entries()].sort((a, b) => b[0].length - a[0].length)
	for (const [oldName, newName] of ordered) {
		result = result.replace(new RegExp(`(?<![\\w.])${escapeRegex(oldName)}(?![\\w.])`, "gi"), newName)
	}
	return result
}

// ============================================================================
// Step F: AS identifiers
// ============================================================================

function rewriteAsAliases(sql: string, sources: Map<string, SourcePlan>, qualified: QualifiedReplacement[]): string {
	const aliasToTable = new Map<string, string>()
	for (const plan of sources.values()) {
		for (const a of plan.aliases) aliasToTable.set(a.alias.toLowerCase(), a.table)
	}

	const renamedColumns = new Map<string, Set<string>>()
	for (const q of qualified) {
		if (sameName(q.oldColumn, q.newColumn)) continue
		const plan = sources.get(q.oldTable.toLowerCase())
		if (!plan) continue
		const alias = targetAliasFor(plan, q.newTable).toLowerCase()
		const set = renamedColumns.get(alias) ?? new Set<string>()
		set.add(q.newColumn.toLowerCase())
		renamedColumns.set(alias, set)
	}

	const pattern = new RegExp(`(?<![\\w.])(${IDENT})(\\s*\\.\\s*)(${IDENT})(\\s+AS\\s+)(${IDENT})\\b`, "gi")
	return sql.replace(pattern, (match: string, alias: string, dot: string, column: string, asClause: string) => {
		const table = aliasToTable.get(alias.toLowerCase())
		if (table === undefined) return match
		if (renamedColumns.get(alias.toLowerCase())?.has(column.toLowerCase())) {
			return `${alias}${dot}${column}`
		}
		return `${alias}${dot}${column}${asClause}${generatedColumnAlias(table, column)}`
	})
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Apply a replacement log to the original query text.
 */
export function rewriteWithFormatting(originalQuery: string, replacements: ReplacementLog, options: RewriteOptions = {}): string {
	const defaultIdColumn = options.defaultIdColumn ?? "Id"

	// Step A
	const { sources, qualified, aliasStyle } = classify(replacements)
	if (sources.size === 0) return originalQuery

	// Step B
	for (const plan of sources.values()) {
		plan.aliases = assignAliases(plan.targets)
	}
	const multiTarget = [...sources.values()].some((plan) => plan.targets.length > 1)

	// Step C
	let result = originalQuery
	const joins: string[] = []
	for (const plan of sources.values()) {
		plan.actualAliases = findActualAliases(result, plan.source)
		result = rewriteFromJoin(result, plan)
		joins.push(...syntheticJoins(plan, qualified, defaultIdColumn))
	}
	result = insertJoins(result, joins)

	// Step D: a global prefix swap would send every column of a split table to its primary alias
	if (!multiTarget) {
		for (const plan of sources.values()) {
			result = replaceAliasPrefixes(result, plan)
		}
	}

	// Step E
	const ordered = [...qualified].sort((a, b) => b.key.length - a.key.length)
	for (const q of ordered) {
		const plan = sources.get(q.oldTable.toLowerCase())
		if (plan) result = routeColumn(result, q, plan)
	}
	result = replaceAliasStyle(result, aliasStyle)
	if (!multiTarget) {
		result = correctLeftoverColumns(result, qualified, sources)
	}

	// Step F
	return rewriteAsAliases(result, sources, qualified)
}
