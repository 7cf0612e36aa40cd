/**
 * SQL Guard
 *
 * Runs generated SQL through the validator and the rewriter in the order the
 * executor relies on:
 *   1. validate the text as written
 *   2. stop on any rejection other than INVALID_COLUMN (those are correctable)
 *   3. rewrite (the correction pass fixes the known wrong names)
 *   4. validate the rewritten text; only that text is ever executed
 *
 * Also home to the audit record written for every execution attempt.
 */

import { assertString } from "./errors.js"
import type { Logger } from "./logger.js"
import type { SchemaCatalog } from "./schema_catalog.js"
import { rewriteSQL, type RewriteResult } from "./sql_rewriter.js"
import { validateSQL, type InvalidColumn, type SQLValidationResult } from "./sql_validator.js"

// ============================================================================
// Prepare
// ============================================================================

export type PreparedSQL =
	| {
			ok: true
			/** Rewritten, validated SQL */
			sql: string
			validation: SQLValidationResult
			rewrite: RewriteResult
			/** Wrong names found in the input and fixed by the rewrite */
			correctedColumns: readonly InvalidColumn[]
	  }
	| {
			ok: false
			/** The input, untouched */
			sql: string
			validation: SQLValidationResult
			rewrite: null
	  }

export function prepareSQL(sql: string, catalog: SchemaCatalog, logger?: Logger): PreparedSQL {
	assertString(sql, "sql")

	const initial = validateSQL(sql, catalog)
	if (!initial.isValid && initial.errorCategory !== "INVALID_COLUMN") {
		logger?.info("SQL rejected", { category: initial.errorCategory, message: initial.message })
		return { ok: false, sql, validation: initial, rewrite: null }
	}

	const rewrite = rewriteSQL(sql, catalog, logger)
	const validation = validateSQL(rewrite.sql, catalog)
	if (!validation.isValid) {
		logger?.info("Rewritten SQL rejected", { category: validation.errorCategory, message: validation.message })
		return { ok: false, sql, validation, rewrite: null }
	}

	if (initial.invalidColumns.length > 0) {
		logger?.debug("Column names corrected", {
			corrections: initial.invalidColumns.map((c) => `${c.name} → ${c.correction}`),
		})
	}

	return {
		ok: true,
		sql: rewrite.sql,
		validation,
		rewrite,
		correctedColumns: initial.invalidColumns,
	}
}

// ============================================================================
// Audit
// ============================================================================

export interface SQLAuditEntry {
	requestId: string
	question?: string
	sql: string
	success: boolean
	rowCount?: number
	error?: string
}

export class SQLAuditLogger {
	constructor(
		private readonly logger: Logger,
		private readonly now: () => Date = () => new Date(),
	) {}

	record(entry: SQLAuditEntry): void {
		const data: Record<string, unknown> = {
			type: "sql_query",
			request_id: entry.requestId,
			timestamp: this.now().toISOString(),
			question: entry.question,
			sql: entry.sql,
			success: entry.success,
		}
		if (entry.rowCount !== undefined) data.row_count = entry.rowCount
		if (entry.error !== undefined) data.error = entry.error

		this.logger.info("SQL_QUERY_AUDIT", data)
	}
}
