/**
 * Input schemas shared by the MCP tools and the batch script.
 */

import { z } from "zod"
import { parseMappingRows } from "./mapping_index.js"
import { MigrationError, type MappingEntry, type QueryRecord } from "./migration_types.js"

export const mappingRowSchema = z.object({
	deprecatedObject: z.string(),
	newObject: z.string().default(""),
})

export const queryInputSchema = z.object({
	name: z.string().min(1),
	description: z.string().default(""),
	originalQuery: z.string(),
})

export const batchFileSchema = z.object({
	mappings: z.array(mappingRowSchema),
	queries: z.array(queryInputSchema),
})

export type QueryInput = z.infer<typeof queryInputSchema>
export type BatchFile = z.infer<typeof batchFileSchema>

export function toQueryRecords(inputs: readonly QueryInput[]): QueryRecord[] {
	return inputs.map((q) => ({
		name: q.name,
		description: q.description,
		originalQuery: q.originalQuery,
		impacted: false,
	}))
}

/**
 * Validate a parsed batch file and turn it into migration inputs.
 */
export function loadBatch(raw: unknown): { queries: QueryRecord[]; mappings: MappingEntry[] } {
	const parsed = batchFileSchema.safeParse(raw)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		const where = issue ? issue.path.join(".") : "(root)"
		throw new MigrationError("INVALID_BATCH", `Invalid batch file at ${where || "(root)"}: ${issue?.message ?? "unknown"}`)
	}
	return {
		queries: toQueryRecords(parsed.data.queries),
		mappings: parseMappingRows(parsed.data.mappings),
	}
}
