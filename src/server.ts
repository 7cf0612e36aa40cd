/**
 * MCP server for the chitalishte query router.
 *
 * Tools:
 *   route_query - decide between SQL, RAG and hybrid answering for a question
 *   prepare_sql - validate and rewrite generated SQL without running it
 *   execute_sql - prepare, then run read-only against Postgres
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js"
import { z } from "zod"
import { ChatRouterError } from "./errors.js"
import { guardSQL, routeQuery, runSQL, type QueryToolContext } from "./query_tool.js"

export const SERVER_NAME = "chitalishte-query-router"
export const SERVER_VERSION = "0.1.0"

function jsonResult(value: unknown): CallToolResult {
	return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] }
}

function errorResult(error: ChatRouterError): CallToolResult {
	return {
		isError: true,
		content: [
			{
				type: "text",
				text: JSON.stringify({ error: error.message, type: error.type, recoverable: error.recoverable }, null, 2),
			},
		],
	}
}

/** Known failures become tool errors; anything else reaches the SDK as is. */
async function handled(run: () => Promise<unknown>, context: QueryToolContext, tool: string): Promise<CallToolResult> {
	try {
		return jsonResult(await run())
	} catch (error) {
		if (error instanceof ChatRouterError) {
			context.logger.warn("Tool failed", { tool, type: error.type, message: error.message })
			return errorResult(error)
		}
		throw error
	}
}

export function createServer(context: QueryToolContext): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	server.tool(
		"route_query",
		"Classify a Bulgarian question about chitalishta as sql (statistics), rag (descriptive text) or hybrid.",
		{
			question: z.string().min(1).describe("The user's question"),
		},
		async ({ question }) => handled(() => routeQuery({ question }, context), context, "route_query"),
	)

	server.tool(
		"prepare_sql",
		"Validate generated SQL and apply the safety and correction rewrites. Nothing is executed.",
		{
			sql: z.string().describe("SQL generated for the question"),
		},
		async ({ sql }) => handled(async () => guardSQL({ sql }, context), context, "prepare_sql"),
	)

	server.tool(
		"execute_sql",
		"Validate, rewrite and run generated SQL in a read-only transaction. Returns at most the configured number of rows.",
		{
			sql: z.string().describe("SQL generated for the question"),
			question: z.string().optional().describe("Original question, recorded in the audit log"),
		},
		async ({ sql, question }) => handled(() => runSQL({ sql, question }, context), context, "execute_sql"),
	)

	return server
}
