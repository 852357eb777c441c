import { describe, it, expect } from "vitest"
import { loadBatch } from "./batch_schema.js"
import { MigrationError } from "./migration_types.js"

describe("loadBatch", () => {
	it("turns a batch file into records and mapping entries", () => {
		const batch = loadBatch({
			mappings: [{ deprecatedObject: "Amendment.Name", newObject: "Orders.OrderNumber" }, { deprecatedObject: "" }],
			queries: [{ name: "q1", originalQuery: "SELECT 1" }],
		})

		expect(batch.queries).toEqual([{ name: "q1", description: "", originalQuery: "SELECT 1", impacted: false }])
		expect(batch.mappings).toHaveLength(1)
		expect(batch.mappings[0].newField).toBe("OrderNumber")
	})

	it("names the offending path", () => {
		expect(() => loadBatch({ mappings: [], queries: [{ name: "", originalQuery: "SELECT 1" }] })).toThrow(
			/^Invalid batch file at queries\.0\.name: /,
		)
	})

	it("throws an INVALID_BATCH error for a non-object", () => {
		let caught: unknown
		try {
			loadBatch("nope")
		} catch (err) {
			caught = err
		}
		expect(caught).toBeInstanceOf(MigrationError)
		if (caught instanceof MigrationError) {
			expect(caught.code).toBe("INVALID_BATCH")
			expect(caught.message).toMatch(/^Invalid batch file at \(root\): /)
		}
	})
})
