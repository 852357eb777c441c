import { describe, it, expect } from "vitest"
import { buildMappingIndex, parseMappingRows } from "./mapping_index.js"
import { forEachColumn, migrateStructurally, type StructuralOutcome } from "./structural_migrator.js"
import { parseSelect, selectBranches, type SelectNode } from "./sql_ast.js"
import type { RawMappingRow } from "./migration_types.js"

function migrate(sql: string, rows: RawMappingRow[]) {
	const outcome: StructuralOutcome = migrateStructurally(sql, buildMappingIndex(parseMappingRows(rows)))
	if (outcome.kind !== "migrated") throw new Error(`expected ${sql} to parse: ${outcome.reason}`)
	return outcome
}

function firstBranch(outcome: ReturnType<typeof migrate>): SelectNode {
	return selectBranches(outcome.statement)[0]
}

const TABLE_RENAME: RawMappingRow[] = [{ deprecatedObject: "Amendment", newObject: "Orders" }]

describe("migrateStructurally", () => {
	it("records the table first, then each qualified column in walk order", () => {
		const result = migrate("SELECT a.Name FROM Amendment a WHERE a.Status = 'X'", TABLE_RENAME)

		expect(result.hasChanges).toBe(true)
		expect([...result.replacements]).toEqual([
			["amendment", "Orders"],
			["amendment.Name", "Orders.Name"],
			["amendment.Status", "Orders.Status"],
		])
	})

	it("renames the tree in place and keeps the alias", () => {
		const select = firstBranch(migrate("SELECT a.Name FROM Amendment a", TABLE_RENAME))
		expect(select.from).toEqual({ kind: "table", name: "Orders", alias: "a" })
		expect(select.columns).toEqual([{ kind: "column", table: "Orders", column: "Name" }])
	})

	it("lets a field mapping overwrite the column entry", () => {
		const result = migrate("SELECT a.Name FROM Amendment a WHERE a.Status = 'X'", [
			{ deprecatedObject: "Amendment.Name", newObject: "Orders.OrderNumber" },
		])

		expect([...result.replacements]).toEqual([
			["amendment", "Orders"],
			["amendment.Name", "Orders.OrderNumber"],
			["amendment.Status", "Orders.Status"],
		])
	})

	it("prefers a field mapping's table over the table-level default", () => {
		const result = migrate("SELECT a.Status, a.Name FROM Amendment a", [
			{ deprecatedObject: "Amendment", newObject: "Archive" },
			{ deprecatedObject: "Amendment.Name", newObject: "Orders.OrderNumber" },
		])

		expect([...result.replacements]).toEqual([
			["amendment", "Orders"],
			["amendment.Status", "Orders.Status"],
			["amendment.Name", "Orders.OrderNumber"],
		])
	})

	it("uses the first table-level row but the last field-level row", () => {
		const tables = migrate("SELECT a.Name FROM Amendment a", [
			{ deprecatedObject: "Amendment", newObject: "Orders" },
			{ deprecatedObject: "Amendment", newObject: "Archive" },
		])
		expect(tables.replacements.get("amendment")).toBe("Orders")

		const fields = migrate("SELECT a.Name FROM Amendment a", [
			{ deprecatedObject: "Amendment.Name", newObject: "Orders.Title" },
			{ deprecatedObject: "Amendment.Name", newObject: "Orders.Label" },
		])
		expect(fields.replacements.get("amendment.Name")).toBe("Orders.Label")
	})

	it("rewrites JOIN ... ON columns before the SELECT list", () => {
		const result = migrate("SELECT a.Name FROM Amendment a JOIN Items i ON a.Id = i.AmendmentId", TABLE_RENAME)

		expect([...result.replacements]).toEqual([
			["amendment", "Orders"],
			["amendment.Id", "Orders.Id"],
			["amendment.Name", "Orders.Name"],
		])
	})

	it("renames tables referenced only through unqualified columns", () => {
		const result = migrate("SELECT Name FROM Amendment", TABLE_RENAME)

		expect(result.hasChanges).toBe(true)
		expect([...result.replacements]).toEqual([["amendment", "Orders"]])
		expect(firstBranch(result).columns).toEqual([{ kind: "column", table: null, column: "Name" }])
	})

	it("migrates every branch of a UNION with its own aliases", () => {
		const result = migrate("SELECT a.Name FROM Amendment a UNION SELECT b.Name FROM Amendment b", TABLE_RENAME)
		const branches = selectBranches(result.statement)

		expect(branches.map((b) => b.from)).toEqual([
			{ kind: "table", name: "Orders", alias: "a" },
			{ kind: "table", name: "Orders", alias: "b" },
		])
		expect([...result.replacements]).toEqual([
			["amendment", "Orders"],
			["amendment.Name", "Orders.Name"],
		])
	})

	it("reports no changes when nothing is mapped", () => {
		const result = migrate("SELECT c.Id FROM Customers c", TABLE_RENAME)
		expect(result.hasChanges).toBe(false)
		expect(result.replacements.size).toBe(0)
	})

	it("is idempotent on its own output", () => {
		const result = migrate("SELECT ord.Name FROM Orders ord WHERE ord.Status = 'X'", TABLE_RENAME)
		expect(result.hasChanges).toBe(false)
	})

	it("returns unparsable input instead of throwing", () => {
		const outcome = migrateStructurally("SELECT x.y FROM x WHERE x.y = = 1", buildMappingIndex([]))
		expect(outcome.kind).toBe("unparsable")
	})
})

describe("forEachColumn", () => {
	it("does not walk IN value lists", () => {
		const outcome = parseSelect("SELECT t.a FROM t WHERE t.b IN (t.c, 1)")
		if (outcome.kind !== "parsed") throw new Error(outcome.reason)
		const [select] = selectBranches(outcome.statement)

		const seen: string[] = []
		forEachColumn(select.where, (column) => seen.push(column.column))
		expect(seen).toEqual(["b"])
	})
})
