#!/usr/bin/env node
/**
 * Stdio entry point for the chitalishte query router MCP server.
 *
 * Config comes from config/config.yaml, config/config.local.yaml and env vars
 * (see src/config/loadConfig.ts). Logs go to stderr; stdout carries the MCP
 * protocol.
 *
 * Usage:
 *   node dist/src/stdio.js
 *   DB_HOST=db LLM_API_KEY=... node dist/src/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import pg from "pg"
import { loadConfig } from "./config/loadConfig.js"
import { HybridRouter } from "./hybrid_router.js"
import { KeywordIntentClassifier, loadIntentKeywords } from "./keyword_classifier.js"
import { createLlmIntentClassifier, resolveExternalClassifier } from "./llm_intent_classifier.js"
import { createStderrLogger } from "./logger.js"
import { loadSchemaCatalog } from "./schema_catalog.js"
import { createServer } from "./server.js"
import { SQLAuditLogger } from "./sql_guard.js"
import { PgSqlExecutor } from "./sql_executor.js"

async function main() {
	const config = loadConfig()
	const logger = createStderrLogger(config.logging.level)

	const catalog = loadSchemaCatalog(config.catalog.schema_file)
	const ruleClassifier = new KeywordIntentClassifier(loadIntentKeywords(config.catalog.keywords_file))
	const externalClassifier = resolveExternalClassifier(createLlmIntentClassifier(config.llm, logger), {
		fallbackToKeywords: config.router.llm_fallback_to_keywords,
		ruleClassifier,
		logger,
	})
	const router = new HybridRouter({ ruleClassifier, externalClassifier, logger })

	const { database } = config
	const pool = new pg.Pool({
		host: database.host,
		port: database.port,
		database: database.name,
		user: database.user,
		password: database.password,
	})
	// Idle clients can fail when the server restarts; pg emits those on the pool
	pool.on("error", (error) => {
		logger.error("Idle Postgres client error", { message: error.message })
	})
	const executor = new PgSqlExecutor(pool, {
		statementTimeoutMs: database.statement_timeout_ms,
		maxRows: database.max_rows,
		logger,
	})

	logger.info("Starting query router MCP server with stdio transport")
	logger.info("Database", { host: database.host, port: database.port, name: database.name })
	logger.info("LLM", { enabled: config.llm.enabled, base_url: config.llm.base_url, model: config.llm.model })

	const server = createServer({
		router,
		catalog,
		executor,
		audit: new SQLAuditLogger(logger),
		logger,
	})

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Query router MCP server running via stdio")

	const shutdown = async (signal: string) => {
		logger.info("Shutting down...", { signal })
		await server.close()
		await executor.close()
		process.exit(0)
	}

	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.on(signal, () => {
			shutdown(signal).catch((error: unknown) => {
				logger.error("Shutdown failed", { error: error instanceof Error ? error.message : String(error) })
				process.exit(1)
			})
		})
	}
}

main().catch((error: unknown) => {
	console.error("[ERROR] Fatal error:", error instanceof Error ? error.message : error)
	process.exit(1)
})
