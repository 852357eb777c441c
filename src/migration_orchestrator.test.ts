import { describe, it, expect, vi } from "vitest"
import { parseMappingRows } from "./mapping_index.js"
import { migrateQueries, migrateSingleQuery } from "./migration_orchestrator.js"
import type { MigrationLogger, QueryRecord, RawMappingRow } from "./migration_types.js"
import { parseSelect, selectBranches } from "./sql_ast.js"

vi.mock("./structural_migrator.js", async (importOriginal) => {
	const actual = await importOriginal<typeof import("./structural_migrator.js")>()
	return {
		...actual,
		migrateStructurally: (...args: Parameters<typeof actual.migrateStructurally>) => {
			if (args[0].includes("/* tree-fault */")) throw new Error("tree conversion failed")
			return actual.migrateStructurally(...args)
		},
	}
})

function record(name: string, originalQuery: string): QueryRecord {
	return { name, description: `${name} description`, originalQuery, impacted: false }
}

function fromTables(sql: string): string[] {
	const parsed = parseSelect(sql)
	if (parsed.kind !== "parsed") throw new Error(`expected a SELECT: ${parsed.reason}`)
	const tables: string[] = []
	for (const select of selectBranches(parsed.statement)) {
		const items = [select.from, ...select.joins.map((j) => j.item)]
		for (const item of items) {
			if (item?.kind === "table") tables.push(item.name.toLowerCase())
		}
	}
	return tables
}

function fakeLogger(): MigrationLogger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

const TABLE_RENAME = parseMappingRows([{ deprecatedObject: "Amendment", newObject: "Orders" }])

const SPLIT_ROWS: RawMappingRow[] = [
	{ deprecatedObject: "Amendment.Name", newObject: "Orders.OrderNumber" },
	{ deprecatedObject: "Amendment.Amount", newObject: "OrderLines.Amount" },
]

describe("migrateQueries", () => {
	it("returns every record in input order with the impacted subset", () => {
		const logger = fakeLogger()
		const queries = [
			record("q1", "SELECT a.Name FROM Amendment a WHERE a.Status = 'X'"),
			record("q2", "SELECT c.Id FROM Customers c"),
			record("q3", "SELECT a.Name FROM Amendment a WHERE a.Name = = 1"),
		]

		const result = migrateQueries(queries, TABLE_RENAME, { logger, batchId: "batch-1" })

		expect(result.records.map((r) => r.name)).toEqual(["q1", "q2", "q3"])
		expect(result.impacted.map((r) => r.name)).toEqual(["q1", "q3"])
		expect(queries[0].updatedQuery).toBe("SELECT ord.Name FROM Orders ord WHERE ord.Status = 'X'")
		expect(queries[1].impacted).toBe(false)
		expect(queries[1].updatedQuery).toBeUndefined()
		expect(queries[2].updatedQuery).toBe("SELECT ord.Name FROM Orders ord WHERE ord.Name = = 1")

		expect(result.outcomes.map((o) => [o.name, o.strategy, o.impacted, o.replacements])).toEqual([
			["q1", "structural", true, 3],
			["q2", "structural", false, 0],
			["q3", "direct", true, 1],
		])
		expect(result.summary).toEqual({
			success: true,
			message: "Migration completed successfully.",
			totalQueries: 3,
			impactedQueries: 2,
			batchId: "batch-1",
		})
	})

	it("warns with the batch id when falling back to direct replacement", () => {
		const logger = fakeLogger()
		migrateQueries([record("broken", "SELECT a.Name FROM Amendment a WHERE = =")], TABLE_RENAME, {
			logger,
			batchId: "batch-2",
		})

		expect(logger.warn).toHaveBeenCalledWith(
			"Parse failed, using direct replacement",
			expect.objectContaining({ batch_id: "batch-2", query: "broken" }),
		)
		expect(logger.info).toHaveBeenCalledWith("Migration started", { batch_id: "batch-2", queries: 1, mappings: 1 })
	})

	it("reports when nothing was impacted", () => {
		const result = migrateQueries([record("q1", "SELECT c.Id FROM Customers c")], TABLE_RENAME)

		expect(result.impacted).toEqual([])
		expect(result.summary.message).toBe("Migration completed successfully. No queries were impacted.")
		expect(result.summary.batchId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/)
	})

	it("leaves no renamed table in FROM or JOIN", () => {
		const queries = [
			record("plain", "SELECT a.Name FROM Amendment a WHERE a.Status = 'X'"),
			record("comma", "SELECT o.Id, a.Name FROM Other o, Amendment a"),
			record("schema", "SELECT a.Name FROM dbo.Amendment a"),
			record("quoted", "SELECT a.Name FROM `Amendment` a"),
			record("star", "SELECT * FROM Amendment"),
			record("joined", "SELECT i.Id FROM Items i JOIN Amendment a ON a.Id = i.AmendmentId"),
		]

		const result = migrateQueries(queries, TABLE_RENAME)

		expect(result.impacted).toHaveLength(queries.length)
		for (const q of queries) {
			const tables = fromTables(q.updatedQuery ?? "")
			expect(tables).toContain("orders")
			expect(tables).not.toContain("amendment")
		}
	})

	it("falls back to direct replacement when the structural path throws", () => {
		const logger = fakeLogger()
		const queries = [record("fault", "SELECT a.Name /* tree-fault */ FROM Amendment a")]

		const result = migrateQueries(queries, TABLE_RENAME, { logger, batchId: "batch-3" })

		expect(queries[0].updatedQuery).toBe("SELECT ord.Name /* tree-fault */ FROM Orders ord")
		expect(result.outcomes).toEqual([
			{ name: "fault", strategy: "direct", impacted: true, replacements: 1, reason: "tree conversion failed" },
		])
		expect(logger.error).not.toHaveBeenCalled()
	})

	it("contains a failure to the query that caused it", () => {
		const logger = fakeLogger()
		logger.debug = vi.fn((message: string) => {
			if (message.startsWith("Direct rewrite")) throw new Error("sink closed")
		})
		const mappings = parseMappingRows([
			{ deprecatedObject: "Amendment", newObject: "Orders" },
			{ deprecatedObject: "Amendment.Name", newObject: "Archive.Title" },
		])
		const queries = [
			record("fails", "SELECT a.Name FROM Amendment a WHERE = ="),
			record("ok", "SELECT a.Name FROM Amendment a"),
		]

		const result = migrateQueries(queries, mappings, { logger })

		expect(queries[0].impacted).toBe(false)
		expect(queries[0].status).toBe("FAILED: sink closed")
		expect(result.outcomes[0]).toEqual({
			name: "fails",
			strategy: "failed",
			impacted: false,
			replacements: 0,
			reason: "sink closed",
		})
		expect(queries[1].updatedQuery).toBe("SELECT arc.Title FROM Archive arc")
		expect(result.impacted.map((r) => r.name)).toEqual(["ok"])
		expect(logger.error).toHaveBeenCalledWith(
			"Query migration failed",
			expect.objectContaining({ query: "fails", error: "sink closed" }),
		)
	})
})

describe("migrateSingleQuery", () => {
	const splitQuery = "SELECT a.Name, a.Amount\nFROM Amendment a\nWHERE a.Name = 'X'"
	const expected =
		"SELECT ord.OrderNumber, orda.Amount\n" +
		"FROM Orders ord\n" +
		"JOIN OrderLines orda ON ord.Id = orda.OrderId\n" +
		"WHERE ord.OrderNumber = 'X'"

	it("splits one table across two targets end to end", () => {
		const result = migrateSingleQuery(splitQuery, parseMappingRows(SPLIT_ROWS))

		expect(result.strategy).toBe("structural")
		expect(result.changed).toBe(true)
		expect(result.sql).toBe(expected)
		expect([...result.replacements]).toEqual([
			["amendment", "Orders"],
			["amendment.Name", "Orders.OrderNumber"],
			["amendment.Amount", "OrderLines.Amount"],
		])
	})

	it("leaves already migrated SQL unchanged", () => {
		const result = migrateSingleQuery(expected, parseMappingRows(SPLIT_ROWS))
		expect(result.changed).toBe(false)
		expect(result.sql).toBe(expected)
	})

	it("ignores a field row with an empty replacement", () => {
		const sql = "SELECT a.Name FROM Amendment a WHERE a.Status = 'X'"
		const result = migrateSingleQuery(sql, parseMappingRows([{ deprecatedObject: "Amendment.Name", newObject: "" }]))
		expect(result).toMatchObject({ sql, changed: false, strategy: "structural" })
		expect(result.replacements.size).toBe(0)
	})

	it.each([
		["SELECT o.Id, a.Name FROM Other o, Amendment a", "SELECT o.Id, ord.Name FROM Other o, Orders ord"],
		["SELECT a.Name FROM dbo.Amendment a", "SELECT ord.Name FROM dbo.Orders ord"],
		["SELECT a.Name FROM `Amendment` a", "SELECT ord.Name FROM `Orders` ord"],
	])("rewrites the table in %s", (sql, expectedSql) => {
		const result = migrateSingleQuery(sql, TABLE_RENAME)
		expect(result.strategy).toBe("structural")
		expect(result.sql).toBe(expectedSql)
	})

	it("rewrites from the original text, not the sanitized one", () => {
		const result = migrateSingleQuery("SELECT  a.Name,\r\n  a.Status FROM Amendment a", TABLE_RENAME)
		expect(result.sql).toBe("SELECT  ord.Name,\r\n  ord.Status FROM Orders ord")
	})
})
