/**
 * Query Tools
 *
 * Orchestration behind the MCP tools:
 *   route_query → hybrid routing decision for a user question
 *   prepare_sql → validation + rewrite, nothing executed
 *   execute_sql → prepare, run read-only on Postgres, audit
 *
 * Every function takes its collaborators through an explicit context so the
 * server, scripts and tests can wire their own.
 */

import { v4 as uuidv4 } from "uuid"
import { ChatRouterError } from "./errors.js"
import type { RoutingDecision } from "./intent_types.js"
import type { Logger } from "./logger.js"
import type { SchemaCatalog } from "./schema_catalog.js"
import { SQLAuditLogger, prepareSQL } from "./sql_guard.js"
import type { SqlExecutor } from "./sql_executor.js"
import type { InvalidColumn, SQLErrorCategory } from "./sql_validator.js"
import type { RewritePassName } from "./sql_rewriter.js"

export interface QueryRouter {
	route(query: string): Promise<RoutingDecision>
}

export interface QueryToolContext {
	router: QueryRouter
	catalog: SchemaCatalog
	executor: SqlExecutor
	audit: SQLAuditLogger
	logger: Logger
	/** Defaults to uuid v4 */
	newRequestId?: () => string
}

// ============================================================================
// route_query
// ============================================================================

export interface RouteQueryOutput {
	intent: RoutingDecision["intent"]
	confidence: number
	matched_signals: string[]
	explanation: string
}

export async function routeQuery(input: { question: string }, context: QueryToolContext): Promise<RouteQueryOutput> {
	const decision = await context.router.route(input.question)
	return {
		intent: decision.intent,
		confidence: decision.confidence,
		matched_signals: [...decision.matchedSignals],
		explanation: decision.explanation,
	}
}

// ============================================================================
// prepare_sql
// ============================================================================

export interface GuardSQLOutput {
	ok: boolean
	sql: string
	error_category: SQLErrorCategory
	message: string
	corrected_columns: InvalidColumn[]
	applied_passes: RewritePassName[]
}

export function guardSQL(input: { sql: string }, context: Pick<QueryToolContext, "catalog" | "logger">): GuardSQLOutput {
	const prepared = prepareSQL(input.sql, context.catalog, context.logger)
	if (!prepared.ok) {
		return {
			ok: false,
			sql: prepared.sql,
			error_category: prepared.validation.errorCategory,
			message: prepared.validation.message,
			corrected_columns: [],
			applied_passes: [],
		}
	}
	return {
		ok: true,
		sql: prepared.sql,
		error_category: "NONE",
		message: "",
		corrected_columns: [...prepared.correctedColumns],
		applied_passes: [...prepared.rewrite.appliedPasses],
	}
}

// ============================================================================
// execute_sql
// ============================================================================

export type RunSQLOutput =
	| {
			request_id: string
			executed: true
			sql: string
			applied_passes: RewritePassName[]
			columns: string[]
			rows: Record<string, unknown>[]
			row_count: number
			truncated: boolean
			execution_time_ms: number
	  }
	| {
			request_id: string
			executed: false
			sql: string
			error_type: "validation" | "execution" | "timeout"
			error_category?: SQLErrorCategory
			message: string
			recoverable: boolean
	  }

export async function runSQL(
	input: { sql: string; question?: string },
	context: QueryToolContext,
): Promise<RunSQLOutput> {
	const requestId = context.newRequestId ? context.newRequestId() : uuidv4()
	const { logger, audit } = context

	const prepared = prepareSQL(input.sql, context.catalog, logger)
	if (!prepared.ok) {
		audit.record({
			requestId,
			question: input.question,
			sql: input.sql,
			success: false,
			error: prepared.validation.message,
		})
		return {
			request_id: requestId,
			executed: false,
			sql: input.sql,
			error_type: "validation",
			error_category: prepared.validation.errorCategory,
			message: prepared.validation.message,
			recoverable: false,
		}
	}

	try {
		const result = await context.executor.execute(prepared.sql)
		audit.record({
			requestId,
			question: input.question,
			sql: prepared.sql,
			success: true,
			rowCount: result.rowCount,
		})
		return {
			request_id: requestId,
			executed: true,
			sql: prepared.sql,
			applied_passes: [...prepared.rewrite.appliedPasses],
			columns: result.columns,
			rows: result.rows,
			row_count: result.rowCount,
			truncated: result.truncated,
			execution_time_ms: result.executionTimeMs,
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error)
		audit.record({ requestId, question: input.question, sql: prepared.sql, success: false, error: message })

		if (error instanceof ChatRouterError && (error.type === "execution" || error.type === "timeout")) {
			return {
				request_id: requestId,
				executed: false,
				sql: prepared.sql,
				error_type: error.type,
				message,
				recoverable: error.recoverable,
			}
		}
		throw error
	}
}
