/**
 * Structural Migrator
 *
 * Tree-based migration of a parsed SELECT. For every select branch:
 * 1. collect table aliases from FROM/JOIN
 * 2. analyze qualified column usage to pick each deprecated table's new table
 * 3. rename FROM/JOIN tables, then rewrite JOIN ... ON columns
 * 4. rewrite qualified columns in SELECT, WHERE, GROUP BY and ORDER BY
 *
 * The tree is mutated in place; every rename is also recorded in an ordered
 * replacement log consumed by the formatting-preserving rewriter.
 */

import type { MappingIndex } from "./mapping_index.js"
import type { ReplacementLog } from "./migration_types.js"
import {
	parseSelect,
	selectBranches,
	type ColumnNode,
	type ExpressionNode,
	type FromItemNode,
	type SelectNode,
	type StatementNode,
	type TableNode,
} from "./sql_ast.js"

// ============================================================================
// Types
// ============================================================================

export interface StructuralResult {
	hasChanges: boolean
	replacements: ReplacementLog
}

export type StructuralOutcome =
	| ({ kind: "migrated"; statement: StatementNode } & StructuralResult)
	| { kind: "unparsable"; reason: string }

// ============================================================================
// Traversal
// ============================================================================

/**
 * Visit every column reference reachable from an expression.
 *
 * IN only contributes its left operand; the value list is not walked.
 */
export function forEachColumn(expr: ExpressionNode | null, visit: (column: ColumnNode) => void): void {
	if (!expr) return
	switch (expr.kind) {
		case "column":
			visit(expr)
			return
		case "binary":
			forEachColumn(expr.left, visit)
			forEachColumn(expr.right, visit)
			return
		case "list":
			for (const item of expr.items) forEachColumn(item, visit)
			return
		case "call":
			for (const arg of expr.args) forEachColumn(arg, visit)
			return
		case "between":
			forEachColumn(expr.subject, visit)
			forEachColumn(expr.low, visit)
			forEachColumn(expr.high, visit)
			return
		case "in":
			forEachColumn(expr.subject, visit)
			return
		case "opaque":
			return
		default: {
			const unreachable: never = expr
			return unreachable
		}
	}
}

/** SELECT list, WHERE, GROUP BY and ORDER BY expressions (JOIN ON excluded). */
function clauseExpressions(select: SelectNode): ExpressionNode[] {
	const exprs: ExpressionNode[] = [...select.columns]
	if (select.where) exprs.push(select.where)
	exprs.push(...select.groupBy, ...select.orderBy)
	return exprs
}

function fromItems(select: SelectNode): FromItemNode[] {
	const items: FromItemNode[] = []
	if (select.from) items.push(select.from)
	for (const join of select.joins) items.push(join.item)
	return items
}

// ============================================================================
// Processor
// ============================================================================

class SelectMigration {
	private readonly aliasTables = new Map<string, string>()
	private readonly targets = new Map<string, string>()
	changed = false

	constructor(
		private readonly index: MappingIndex,
		private readonly replacements: ReplacementLog,
	) {}

	run(select: SelectNode): void {
		this.recordAliases(select)
		this.pickTargets(select)
		this.pickDefaultTargets(select)
		this.renameTables(select)
		for (const expr of clauseExpressions(select)) {
			forEachColumn(expr, (column) => this.renameColumn(column))
		}
	}

	private recordAliases(select: SelectNode): void {
		for (const item of fromItems(select)) {
			if (item.kind !== "table") continue
			const table = item.name.toLowerCase()
			const key = item.alias ? item.alias.toLowerCase() : table
			this.aliasTables.set(key, table)
		}
	}

	private pickTargets(select: SelectNode): void {
		for (const expr of clauseExpressions(select)) {
			forEachColumn(expr, (column) => this.pickTarget(column))
		}
	}

	private pickTarget(column: ColumnNode): void {
		if (column.table === null) return
		const tableOrAlias = column.table.toLowerCase()
		const actualTable = this.aliasTables.get(tableOrAlias) ?? tableOrAlias

		const fieldMapping = this.index.fieldMappings.get(`${actualTable}.${column.column.toLowerCase()}`)
		if (fieldMapping) {
			this.targets.set(actualTable, fieldMapping.newTable)
			return
		}

		// First table-level row is the default target; never overrides a field-level pick
		const tableMappings = this.index.tableMappings.get(actualTable)
		if (tableMappings && tableMappings.length > 0 && !this.targets.has(actualTable)) {
			this.targets.set(actualTable, tableMappings[0].newTable)
		}
	}

	/** Tables referenced only through unqualified columns or "*" */
	private pickDefaultTargets(select: SelectNode): void {
		for (const item of fromItems(select)) {
			if (item.kind !== "table") continue
			const table = item.name.toLowerCase()
			if (this.targets.has(table)) continue
			const tableMappings = this.index.tableMappings.get(table)
			if (tableMappings && tableMappings.length > 0) {
				this.targets.set(table, tableMappings[0].newTable)
			}
		}
	}

	private renameTables(select: SelectNode): void {
		if (select.from?.kind === "table") this.renameTable(select.from)

		for (const join of select.joins) {
			if (join.item.kind === "table") this.renameTable(join.item)
			forEachColumn(join.on, (column) => this.renameColumn(column))
		}
	}

	private renameTable(table: TableNode): void {
		const tableName = table.name.toLowerCase()
		const newTableName = this.targets.get(tableName)
		if (newTableName === undefined) return

		this.replacements.set(tableName, newTableName)
		table.name = newTableName
		this.changed = true

		// Unaliased columns may already carry the new name; resolve them to the original
		if (!table.alias) {
			this.aliasTables.set(newTableName.toLowerCase(), tableName)
		}
	}

	private renameColumn(column: ColumnNode): void {
		if (column.table === null) return
		const tableOrAlias = column.table.toLowerCase()
		const originalTable = this.aliasTables.get(tableOrAlias) ?? tableOrAlias
		const columnName = column.column

		const newTableName = this.targets.get(originalTable)
		if (newTableName !== undefined) {
			this.replacements.set(`${originalTable}.${columnName}`, `${newTableName}.${columnName}`)
			column.table = newTableName
			this.changed = true
		}

		// Field-level rename runs second so its log entry wins on the same key
		const mapping = this.index.fieldMappings.get(`${originalTable}.${columnName.toLowerCase()}`)
		if (mapping && mapping.newField) {
			const targetTable = mapping.newTable || newTableName || column.table
			this.replacements.set(`${originalTable}.${columnName}`, `${targetTable}.${mapping.newField}`)
			column.column = mapping.newField
			if (mapping.newTable && mapping.newTable.toLowerCase() !== column.table.toLowerCase()) {
				column.table = mapping.newTable
			}
			this.changed = true
		}
	}
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Migrate an already parsed statement in place.
 */
export function migrateStatement(statement: StatementNode, index: MappingIndex): StructuralResult {
	const replacements: ReplacementLog = new Map()
	let hasChanges = false

	// Each branch of a set operation resolves its own aliases
	for (const select of selectBranches(statement)) {
		const migration = new SelectMigration(index, replacements)
		migration.run(select)
		hasChanges = hasChanges || migration.changed
	}

	return { hasChanges, replacements }
}

/**
 * Parse the (sanitized) SQL and migrate it. Parse failures are returned, not thrown.
 */
export function migrateStructurally(sql: string, index: MappingIndex, dialect?: string): StructuralOutcome {
	const parsed = parseSelect(sql, dialect)
	if (parsed.kind === "unparsable") return parsed
	const result = migrateStatement(parsed.statement, index)
	return { kind: "migrated", statement: parsed.statement, ...result }
}
