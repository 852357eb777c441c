#!/usr/bin/env node
/**
 * Stdio entry point for the Query Migrator MCP Server
 *
 * Config comes from config/config.yaml (+ config.local.yaml) and env vars,
 * see src/config/loadConfig.ts.
 *
 * Usage:
 *   node dist/src/stdio.js
 *   LOG_LEVEL=debug SQL_DIALECT=postgresql node dist/src/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import createServer from "./index.js"
import { loadConfig } from "./config/loadConfig.js"
import { createLogger } from "./logger.js"
import { errorMessage } from "./migration_types.js"

async function main() {
	const config = loadConfig()
	// stdout is reserved for the MCP protocol; the logger writes to stderr
	const logger = createLogger(config.logging.level)

	logger.info("Starting Query Migrator MCP Server with stdio transport")
	logger.info("Parser dialect", { dialect: config.parser.dialect })
	logger.info("Reports directory", { dir: config.reports.dir })

	const server = createServer({ config, logger })

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Query Migrator MCP Server running via stdio")

	const shutdown = () => {
		logger.info("Shutting down...")
		server
			.close()
			.then(() => process.exit(0))
			.catch((err: unknown) => {
				logger.error("Shutdown failed", { error: errorMessage(err) })
				process.exit(1)
			})
	}

	process.on("SIGINT", shutdown)
	process.on("SIGTERM", shutdown)
}

main().catch((error: unknown) => {
	console.error("[ERROR] Fatal error:", error)
	process.exit(1)
})
