/**
 * SQL Validator
 *
 * Safety gate for generated SQL before it is rewritten or executed. Checks run
 * in a fixed order and the first failure wins:
 *
 *   1. empty input
 *   2. dangerous keyword anywhere in the text (whole word)
 *   3. statement must start with SELECT or WITH
 *   4. more than one ";"
 *   5. too many comment markers
 *   6. known hallucinated column names (outside literals)
 *
 * Pure. Never executes the SQL.
 */

import { assertString } from "./errors.js"
import type { SchemaCatalog } from "./schema_catalog.js"
import { escapeRegExp, maskSQL } from "./sql_tokens.js"

// ============================================================================
// Types
// ============================================================================

export const SQL_ERROR_CATEGORIES = [
	"NONE",
	"EMPTY_QUERY",
	"DANGEROUS_KEYWORD",
	"DISALLOWED_START",
	"INJECTION_SEMICOLONS",
	"INJECTION_COMMENTS",
	"INVALID_COLUMN",
] as const

export type SQLErrorCategory = (typeof SQL_ERROR_CATEGORIES)[number]

export interface InvalidColumn {
	name: string
	correction: string
}

export interface SQLValidationResult {
	isValid: boolean
	errorCategory: SQLErrorCategory
	/** Empty when valid */
	message: string
	/** Set only for INVALID_COLUMN */
	invalidColumns: readonly InvalidColumn[]
}

// ============================================================================
// Rules
// ============================================================================

export const DANGEROUS_KEYWORDS = [
	"DELETE",
	"DROP",
	"TRUNCATE",
	"ALTER",
	"CREATE",
	"INSERT",
	"UPDATE",
	"GRANT",
	"REVOKE",
	"EXEC",
	"EXECUTE",
] as const

const MAX_LINE_COMMENTS = 2
const MAX_BLOCK_COMMENTS = 1

function countOccurrences(text: string, needle: string): number {
	let count = 0
	let at = text.indexOf(needle)
	while (at !== -1) {
		count++
		at = text.indexOf(needle, at + needle.length)
	}
	return count
}

function rejected(errorCategory: SQLErrorCategory, message: string, invalidColumns: InvalidColumn[] = []): SQLValidationResult {
	const result: SQLValidationResult = {
		isValid: false,
		errorCategory,
		message,
		invalidColumns: Object.freeze(invalidColumns),
	}
	return Object.freeze(result)
}

const VALID: SQLValidationResult = {
	isValid: true,
	errorCategory: "NONE",
	message: "",
	invalidColumns: [],
}
Object.freeze(VALID)

/**
 * Find known wrong column names used as identifiers. String literals, quoted
 * identifiers and comments are masked first, so a value such as
 * 'population' does not count.
 */
function findInvalidColumns(sql: string, catalog: SchemaCatalog): InvalidColumn[] {
	const code = maskSQL(sql)
	const found: InvalidColumn[] = []
	for (const [wrong, correction] of catalog.columnCorrections()) {
		const pattern = new RegExp(`(?<![\\w$])${escapeRegExp(wrong)}(?![\\w$])`, "i")
		if (pattern.test(code)) {
			found.push({ name: wrong, correction })
		}
	}
	return found
}

// ============================================================================
// Main Function
// ============================================================================

export function validateSQL(sql: string, catalog: SchemaCatalog): SQLValidationResult {
	assertString(sql, "sql")

	const trimmed = sql.trim()
	if (!trimmed) {
		return rejected("EMPTY_QUERY", "Empty SQL query")
	}

	const upper = trimmed.toUpperCase()

	for (const keyword of DANGEROUS_KEYWORDS) {
		if (new RegExp(`\\b${keyword}\\b`).test(upper)) {
			return rejected(
				"DANGEROUS_KEYWORD",
				`Dangerous SQL keyword detected: ${keyword}. Only SELECT queries are allowed.`,
			)
		}
	}

	if (!/^(SELECT|WITH)\b/.test(upper)) {
		return rejected(
			"DISALLOWED_START",
			"Query must start with SELECT or WITH (for CTEs). Only read operations are allowed.",
		)
	}

	if (countOccurrences(sql, ";") > 1) {
		return rejected("INJECTION_SEMICOLONS", "Multiple semicolons detected. Possible SQL injection attempt.")
	}

	if (countOccurrences(sql, "--") > MAX_LINE_COMMENTS || countOccurrences(sql, "/*") > MAX_BLOCK_COMMENTS) {
		return rejected("INJECTION_COMMENTS", "Excessive comments detected. Possible SQL injection attempt.")
	}

	const invalidColumns = findInvalidColumns(sql, catalog)
	if (invalidColumns.length > 0) {
		const list = invalidColumns.map((c) => `${c.name} → ${c.correction}`).join(", ")
		return rejected("INVALID_COLUMN", `Unknown column name(s): ${list}`, invalidColumns)
	}

	return VALID
}
