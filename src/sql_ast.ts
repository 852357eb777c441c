/**
 * Statement Tree
 *
 * Closed, mutable tree for the parts of a SELECT that migration touches, built
 * from node-sql-parser output. Anything the migrator never walks (literals,
 * subqueries, CASE, window specs) collapses into an `opaque` node.
 *
 * parseSelect() never throws: a syntax error, several statements, or a
 * non-SELECT statement come back as an `unparsable` outcome.
 */

import sqlParser from "node-sql-parser"
import { errorMessage } from "./migration_types.js"

const { Parser } = sqlParser

// ============================================================================
// Tree Types
// ============================================================================

export interface ColumnNode {
	kind: "column"
	/** Qualifier as written (alias or table name), null when unqualified */
	table: string | null
	column: string
}

export type ExpressionNode =
	| ColumnNode
	| { kind: "binary"; operator: string; left: ExpressionNode; right: ExpressionNode }
	| { kind: "list"; items: ExpressionNode[] }
	| { kind: "call"; name: string; args: ExpressionNode[] }
	| { kind: "between"; subject: ExpressionNode; low: ExpressionNode; high: ExpressionNode; negated: boolean }
	| { kind: "in"; subject: ExpressionNode; values: ExpressionNode; negated: boolean }
	| { kind: "opaque"; type: string }

export interface TableNode {
	kind: "table"
	name: string
	alias: string | null
}

export type FromItemNode = TableNode | { kind: "derived"; alias: string | null }

export interface JoinNode {
	/** e.g. "INNER JOIN", or "," for a comma join */
	type: string
	item: FromItemNode
	on: ExpressionNode | null
}

export interface SelectNode {
	kind: "select"
	columns: ExpressionNode[]
	from: FromItemNode | null
	joins: JoinNode[]
	where: ExpressionNode | null
	groupBy: ExpressionNode[]
	orderBy: ExpressionNode[]
}

export interface SetOperationNode {
	kind: "set_operation"
	operators: string[]
	branches: SelectNode[]
}

export type StatementNode = SelectNode | SetOperationNode

export type ParseOutcome =
	| { kind: "parsed"; statement: StatementNode }
	| { kind: "unparsable"; reason: string }

// ============================================================================
// Raw AST Narrowing
// ============================================================================

type RawNode = Record<string, unknown>

function isRecord(value: unknown): value is RawNode {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

function asString(value: unknown): string | null {
	return typeof value === "string" ? value : null
}

function asArray(value: unknown): unknown[] {
	return Array.isArray(value) ? value : []
}

/**
 * Identifier text from either a plain string or the `{expr: {value}}` shape
 * newer parser releases use for columns and aliases.
 */
function identText(value: unknown): string | null {
	const s = asString(value)
	if (s !== null) return s
	if (!isRecord(value)) return null
	if (isRecord(value.expr)) return asString(value.expr.value)
	return asString(value.value)
}

function functionName(node: RawNode): string {
	const direct = asString(node.name)
	if (direct !== null) return direct
	if (isRecord(node.name)) {
		const parts = asArray(node.name.name).map(identText).filter((p): p is string => p !== null)
		if (parts.length > 0) return parts.join(".")
	}
	return "unknown"
}

// ============================================================================
// Conversion
// ============================================================================

function convertArgs(args: unknown): ExpressionNode[] {
	if (Array.isArray(args)) return args.map(convertExpression)
	if (!isRecord(args)) return []
	if (args.type === "expr_list") return asArray(args.value).map(convertExpression)
	// Aggregates wrap their single argument in { expr }
	if (args.expr !== undefined) return [convertExpression(args.expr)]
	return []
}

function convertExpression(raw: unknown): ExpressionNode {
	if (!isRecord(raw)) return { kind: "opaque", type: typeof raw }
	const type = asString(raw.type) ?? "unknown"

	switch (type) {
		case "column_ref": {
			const column = identText(raw.column)
			if (column === null) return { kind: "opaque", type }
			return { kind: "column", table: asString(raw.table), column }
		}
		case "binary_expr": {
			const operator = (asString(raw.operator) ?? "").toUpperCase()
			const right = raw.right
			if ((operator === "BETWEEN" || operator === "NOT BETWEEN") && isRecord(right)) {
				const bounds = asArray(right.value)
				return {
					kind: "between",
					subject: convertExpression(raw.left),
					low: convertExpression(bounds[0]),
					high: convertExpression(bounds[1]),
					negated: operator.startsWith("NOT"),
				}
			}
			if (operator === "IN" || operator === "NOT IN") {
				return {
					kind: "in",
					subject: convertExpression(raw.left),
					values: convertExpression(right),
					negated: operator.startsWith("NOT"),
				}
			}
			return {
				kind: "binary",
				operator,
				left: convertExpression(raw.left),
				right: convertExpression(right),
			}
		}
		case "expr_list":
			return { kind: "list", items: asArray(raw.value).map(convertExpression) }
		case "function":
		case "aggr_func":
			return { kind: "call", name: functionName(raw), args: convertArgs(raw.args) }
		default:
			return { kind: "opaque", type }
	}
}

function convertFromItem(raw: RawNode): FromItemNode {
	const alias = identText(raw.as)
	const table = asString(raw.table)
	if (table !== null) return { kind: "table", name: table, alias }
	return { kind: "derived", alias }
}

function convertGroupBy(raw: unknown): ExpressionNode[] {
	// Older releases emit an array, newer ones { columns, modifiers }
	if (Array.isArray(raw)) return raw.map(convertExpression)
	if (isRecord(raw)) return asArray(raw.columns).map(convertExpression)
	return []
}

function convertSelect(raw: RawNode): SelectNode {
	const columns: ExpressionNode[] = []
	for (const item of asArray(raw.columns)) {
		// "SELECT *" may arrive as the bare string "*"
		if (isRecord(item)) columns.push(convertExpression(item.expr))
	}

	let from: FromItemNode | null = null
	const joins: JoinNode[] = []
	const fromEntries = asArray(raw.from)
	for (let i = 0; i < fromEntries.length; i++) {
		const entry = fromEntries[i]
		if (!isRecord(entry)) continue
		const item = convertFromItem(entry)
		const joinType = asString(entry.join)
		if (i === 0 && joinType === null) {
			from = item
			continue
		}
		joins.push({
			type: joinType ?? ",",
			item,
			on: entry.on === undefined || entry.on === null ? null : convertExpression(entry.on),
		})
	}

	const orderBy: ExpressionNode[] = []
	for (const item of asArray(raw.orderby)) {
		if (isRecord(item)) orderBy.push(convertExpression(item.expr))
	}

	return {
		kind: "select",
		columns,
		from,
		joins,
		where: raw.where === undefined || raw.where === null ? null : convertExpression(raw.where),
		groupBy: convertGroupBy(raw.groupby),
		orderBy,
	}
}

function convertStatement(raw: RawNode): StatementNode {
	const branches: SelectNode[] = [convertSelect(raw)]
	const operators: string[] = []
	let current: RawNode = raw
	for (;;) {
		const next = current._next
		if (!isRecord(next)) break
		operators.push((asString(current.set_op) ?? "union").toUpperCase())
		current = next
		branches.push(convertSelect(current))
	}
	if (branches.length === 1) return branches[0]
	return { kind: "set_operation", operators, branches }
}

// ============================================================================
// Parsing
// ============================================================================

const parser = new Parser()

export function parseSelect(sql: string, dialect = "mysql"): ParseOutcome {
	let raw: unknown
	try {
		raw = parser.astify(sql, { database: dialect })
	} catch (err) {
		return { kind: "unparsable", reason: errorMessage(err) }
	}

	const statements = Array.isArray(raw) ? raw : [raw]
	if (statements.length !== 1) {
		return { kind: "unparsable", reason: `expected a single statement, found ${statements.length}` }
	}
	const statement: unknown = statements[0]
	if (!isRecord(statement) || statement.type !== "select") {
		const type = isRecord(statement) ? asString(statement.type) : null
		return { kind: "unparsable", reason: `not a SELECT statement (${type ?? "unknown"})` }
	}

	return { kind: "parsed", statement: convertStatement(statement) }
}

/** Select branches of a statement in source order. */
export function selectBranches(statement: StatementNode): SelectNode[] {
	return statement.kind === "select" ? [statement] : statement.branches
}
