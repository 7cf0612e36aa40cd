/**
 * SQL Rewriter
 *
 * Deterministic repair of generated SQL that already passed validation.
 * Seven passes run in a fixed order; each is idempotent and is recorded only
 * when it changed the text:
 *
 *   SANITIZE               drop comments, collapse whitespace, strip trailing ";"
 *   COLUMN_NAME_CORRECTION known wrong column names → catalog names
 *   CASE_INSENSITIVE_TEXT  text_col = 'v' → LOWER(text_col) = LOWER('v')
 *   COMPOSITE_PATTERN      town = 'X' → town ILIKE '%X%'
 *   NEGATION_REPAIR        col ILIKE 'x' = false → col NOT ILIKE 'x'
 *   NULL_FILTER            nullable ORDER BY columns get IS NOT NULL
 *   FANOUT_DEDUP           one parent row per group when ordering by a child column
 *
 * Passes work on text, with clause positions and matches taken from the
 * literal-masked copy (sql_tokens.ts). A pass that cannot place its edit
 * leaves the SQL as it was.
 */

import { assertString } from "./errors.js"
import { silentLogger, type Logger } from "./logger.js"
import type { SchemaCatalog } from "./schema_catalog.js"
import {
	TokenType,
	escapeRegExp,
	findTopLevelKeyword,
	maskSQL,
	parseFromClause,
	replaceOutsideLiterals,
	splitTopLevel,
	tokenizeSQL,
	topLevelKeywords,
	type FromClause,
	type TableReference,
} from "./sql_tokens.js"

// ============================================================================
// Types
// ============================================================================

export const REWRITE_PASSES = [
	"SANITIZE",
	"COLUMN_NAME_CORRECTION",
	"CASE_INSENSITIVE_TEXT",
	"COMPOSITE_PATTERN",
	"NEGATION_REPAIR",
	"NULL_FILTER",
	"FANOUT_DEDUP",
] as const

export type RewritePassName = (typeof REWRITE_PASSES)[number]

export interface RewriteResult {
	/** Rewritten SQL */
	sql: string
	/** Passes that changed the text, in order */
	appliedPasses: readonly RewritePassName[]
}

type RewritePass = (sql: string, catalog: SchemaCatalog) => string

// ============================================================================
// Shared patterns
// ============================================================================

const QUALIFIER = "(?:[A-Za-z_][\\w$]*\\.)?"
const QUOTED_VALUE = `('[^']*'|"[^"]*")`
const SET_OPERATIONS = ["UNION", "INTERSECT", "EXCEPT"]
const AFTER_WHERE = ["GROUP\\s+BY", "HAVING", "WINDOW", "ORDER\\s+BY"]
const AGGREGATE_CALL = /\b(?:COUNT|SUM|AVG|MIN|MAX|ARRAY_AGG|STRING_AGG|BOOL_AND|BOOL_OR)\s*\(/i

/** Unqualified name that is neither a qualifier nor a function call */
const BARE_IDENTIFIER = /(?<![\w$.])[A-Za-z_][\w$]*(?![\w$]|\s*[.(])/g

/** [qualifier.]column [ASC|DESC] [NULLS FIRST|LAST] */
const ORDER_ITEM = /^((?:([A-Za-z_][\w$]*)\.)?([A-Za-z_][\w$]*))(?:\s+(?:ASC|DESC))?(?:\s+NULLS\s+(?:FIRST|LAST))?$/i

/** [qualifier.]column [[AS] alias] */
const SELECT_ITEM = /^((?:([A-Za-z_][\w$]*)\.)?([A-Za-z_][\w$]*))(?:\s+(?:AS\s+)?([A-Za-z_][\w$]*|"[^"]*"))?$/i

/** Re-quote a captured literal as a single-quoted SQL string */
function toSingleQuoted(value: string): string {
	if (value.startsWith("'")) return value
	const inner = value.slice(1, -1).replace(/""/g, '"').replace(/'/g, "''")
	return `'${inner}'`
}

function unquote(value: string): string {
	return toSingleQuoted(value).slice(1, -1)
}

function sameName(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase()
}

// ============================================================================
// Pass 1: SANITIZE
// ============================================================================

/**
 * Comments are removed rather than kept: once newlines collapse, a line
 * comment would swallow the rest of the statement.
 */
export function sanitizeSQL(sql: string): string {
	let out = ""
	let code = ""
	const flushCode = (): void => {
		out += code.replace(/\s+/g, " ")
		code = ""
	}

	for (const token of tokenizeSQL(sql)) {
		if (token.type === TokenType.NORMAL) {
			code += token.value
		} else if (token.type === TokenType.LINE_COMMENT || token.type === TokenType.BLOCK_COMMENT) {
			code += " "
		} else {
			flushCode()
			out += token.value
		}
	}
	flushCode()

	out = out.trim()
	while (maskSQL(out).endsWith(";")) {
		out = out.slice(0, -1).trimEnd()
	}
	return out
}

// ============================================================================
// Pass 2: COLUMN_NAME_CORRECTION
// ============================================================================

export function correctColumnNames(sql: string, catalog: SchemaCatalog): string {
	let out = sql
	for (const [wrong, right] of catalog.columnCorrections()) {
		out = replaceOutsideLiterals(out, new RegExp(`(?<![\\w$])${escapeRegExp(wrong)}(?![\\w$])`, "i"), () => right)
	}
	return out
}

// ============================================================================
// Pass 3: CASE_INSENSITIVE_TEXT
// ============================================================================

/**
 * Composite columns are left to COMPOSITE_PATTERN, which turns their
 * equality into a substring match.
 */
export function lowerTextComparisons(sql: string, catalog: SchemaCatalog): string {
	let out = sql
	for (const column of catalog.textColumns()) {
		if (catalog.isCompositeTextColumn(column)) continue
		const pattern = new RegExp(
			`(?<!LOWER\\(\\s*)(?<![\\w$.])(${QUALIFIER})(${escapeRegExp(column)})\\s*=\\s*${QUOTED_VALUE}`,
			"i",
		)
		out = replaceOutsideLiterals(
			out,
			pattern,
			([, qualifier, name, value]) => `LOWER(${qualifier}${name}) = LOWER(${toSingleQuoted(value)})`,
		)
	}
	return out
}

// ============================================================================
// Pass 4: COMPOSITE_PATTERN
// ============================================================================

function substringMatch(whole: string, qualifier: string, name: string, value: string): string {
	const inner = unquote(value)
	if (!inner.trim()) return whole
	const pattern = inner.includes("%") ? inner : `%${inner}%`
	return `${qualifier}${name} ILIKE '${pattern}'`
}

export function widenCompositeMatches(sql: string, catalog: SchemaCatalog): string {
	let out = sql
	for (const column of catalog.compositeTextColumns()) {
		const col = escapeRegExp(column)

		// LOWER(town) = LOWER('x') and LOWER(town) = 'x'
		out = replaceOutsideLiterals(
			out,
			new RegExp(
				`(?<![\\w$.])LOWER\\(\\s*(${QUALIFIER})(${col})\\s*\\)\\s*=\\s*(?:LOWER\\(\\s*${QUOTED_VALUE}\\s*\\)|${QUOTED_VALUE})`,
				"i",
			),
			([whole, qualifier, name, lowered, plain]) => substringMatch(whole, qualifier, name, lowered || plain),
		)

		// town = 'x'
		out = replaceOutsideLiterals(
			out,
			new RegExp(`(?<!LOWER\\(\\s*)(?<![\\w$.])(${QUALIFIER})(${col})\\s*=\\s*${QUOTED_VALUE}`, "i"),
			([whole, qualifier, name, value]) => substringMatch(whole, qualifier, name, value),
		)

		// town LIKE 'x' without wildcards
		out = replaceOutsideLiterals(
			out,
			new RegExp(`(?<![\\w$.])(${QUALIFIER})(${col})\\s+((?:NOT\\s+)?I?LIKE)\\s+('[^']*')`, "i"),
			([whole, qualifier, name, operator, value]) => {
				const inner = value.slice(1, -1)
				if (inner.includes("%") || !inner.trim()) return whole
				return `${qualifier}${name} ${operator} '%${inner}%'`
			},
		)
	}
	return out
}

// ============================================================================
// Pass 5: NEGATION_REPAIR
// ============================================================================

const LIKE_OPERAND = "(?!NOT\\b)((?:[A-Za-z_][\\w$]*\\.)?[A-Za-z_][\\w$]*)"

function repairedLike(operand: string, operator: string, value: string, flag: string): string {
	const op = operator.toUpperCase()
	return sameName(flag, "false") ? `${operand} NOT ${op} ${value}` : `${operand} ${op} ${value}`
}

export function repairNegatedLike(sql: string): string {
	// (col ILIKE 'x') = false
	let out = replaceOutsideLiterals(
		sql,
		new RegExp(`\\(\\s*${LIKE_OPERAND}\\s+(I?LIKE)\\s+('[^']*')\\s*\\)\\s*=\\s*(FALSE|TRUE)(?![\\w$])`, "i"),
		([, operand, operator, value, flag]) => repairedLike(operand, operator, value, flag),
	)
	// col ILIKE 'x' = false
	out = replaceOutsideLiterals(
		out,
		new RegExp(`(?<![\\w$.])${LIKE_OPERAND}\\s+(I?LIKE)\\s+('[^']*')\\s*=\\s*(FALSE|TRUE)(?![\\w$])`, "i"),
		([, operand, operator, value, flag]) => repairedLike(operand, operator, value, flag),
	)
	return out
}

// ============================================================================
// ORDER BY helpers
// ============================================================================

interface OrderByClause {
	/** Offset of the ORDER keyword */
	start: number
	items: Array<{ text: string; start: number; end: number }>
}

function parseOrderBy(sql: string, masked: string): OrderByClause | undefined {
	const orderBy = findTopLevelKeyword(masked, ["ORDER\\s+BY"])
	if (!orderBy) return undefined
	const next = findTopLevelKeyword(masked, ["LIMIT", "OFFSET", "FETCH"], orderBy.end)
	const end = next ? next.index : sql.length
	return {
		start: orderBy.index,
		items: splitTopLevel(sql, masked, orderBy.end, end),
	}
}

function resolveTable(
	qualifier: string | undefined,
	column: string,
	from: FromClause,
	catalog: SchemaCatalog,
): string | undefined {
	const table = qualifier
		? from.tables.find((t) => sameName(t.alias, qualifier))?.table
		: uniqueOwner(column, from, catalog)
	return table && catalog.isKnownTable(table) ? table : undefined
}

function uniqueOwner(column: string, from: FromClause, catalog: SchemaCatalog): string | undefined {
	const owners = from.tables.filter((t) => catalog.isKnownColumn(t.table, column))
	return owners.length === 1 ? owners[0].table : undefined
}

// ============================================================================
// Pass 6: NULL_FILTER
// ============================================================================

/** An existing `[qualifier.]column IS NOT NULL` on the same table */
function hasNotNullPredicate(
	masked: string,
	table: string,
	column: string,
	from: FromClause,
	catalog: SchemaCatalog,
): boolean {
	const pattern = new RegExp(
		`(?<![\\w$.])(?:([A-Za-z_][\\w$]*)\\.)?${escapeRegExp(column)}\\s+IS\\s+NOT\\s+NULL(?![\\w$])`,
		"gi",
	)
	for (const match of masked.matchAll(pattern)) {
		const filtered = resolveTable(match[1], column, from, catalog)
		if (filtered && sameName(filtered, table)) return true
	}
	return false
}

export function injectNullFilters(sql: string, catalog: SchemaCatalog): string {
	const masked = maskSQL(sql)
	if (topLevelKeywords(masked, SET_OPERATIONS).length > 0) return sql

	const from = parseFromClause(masked)
	const order = parseOrderBy(sql, masked)
	if (!from || !order || order.start < from.end) return sql

	const predicates: string[] = []
	for (const item of order.items) {
		const match = ORDER_ITEM.exec(item.text)
		if (!match) continue
		const [, reference, qualifier, column] = match
		const table = resolveTable(qualifier, column, from, catalog)
		if (!table || !catalog.isNullable(table, column)) continue
		if (hasNotNullPredicate(masked, table, column, from, catalog)) continue
		const predicate = `${reference} IS NOT NULL`
		if (!predicates.includes(predicate)) predicates.push(predicate)
	}
	if (predicates.length === 0) return sql

	const filter = predicates.join(" AND ")
	const where = findTopLevelKeyword(masked, ["WHERE"], from.start)

	if (where && where.index < order.start) {
		const next = findTopLevelKeyword(masked, AFTER_WHERE, where.end)
		const end = next ? next.index : order.start
		const condition = sql.substring(where.end, end).trim()
		const hasOr = topLevelKeywords(masked.substring(where.end, end), ["OR"]).length > 0
		const guarded = hasOr ? `(${condition})` : condition
		return `${sql.substring(0, where.index)}WHERE ${guarded} AND ${filter} ${sql.substring(end)}`
	}

	// No WHERE: the clause after FROM is GROUP BY, HAVING, WINDOW or ORDER BY
	return `${sql.substring(0, from.end).trimEnd()} WHERE ${filter} ${sql.substring(from.end)}`
}

// ============================================================================
// Pass 7: FANOUT_DEDUP
// ============================================================================

interface ParentChild {
	parent: TableReference
	child: TableReference
	parentKey: string
}

function parentChild(a: TableReference, b: TableReference, catalog: SchemaCatalog): ParentChild | undefined {
	for (const [parent, child] of [
		[a, b],
		[b, a],
	]) {
		const relation = catalog.relationForChild(child.table)
		if (relation && sameName(relation.parent, parent.table)) {
			return { parent, child, parentKey: relation.parentKey }
		}
	}
	return undefined
}

interface Edit {
	start: number
	end: number
	text: string
}

function applyEdits(sql: string, edits: Edit[]): string {
	let out = sql
	for (const edit of [...edits].sort((x, y) => y.start - x.start)) {
		out = out.substring(0, edit.start) + edit.text + out.substring(edit.end)
	}
	return out
}

/**
 * Ordering by a column of a one-to-many child table repeats the parent row
 * once per child row. Collapse to one row per parent with MAX(child column).
 *
 * Only the plain shape is handled: one JOIN between a catalog parent and
 * child, no GROUP BY or HAVING, no subquery, no set operation, no aggregate
 * or expression in ORDER BY, no DISTINCT or * in the select list, and no
 * other child column selected. Anything else is returned unchanged.
 */
export function dedupeFanOut(sql: string, catalog: SchemaCatalog): string {
	const masked = maskSQL(sql)
	const lead = masked.length - masked.trimStart().length
	const select = /^SELECT\s+/i.exec(masked.substring(lead))
	if (!select) return sql
	const listStart = lead + select[0].length
	if (/^DISTINCT\b/i.test(masked.substring(listStart))) return sql
	if (/\(\s*SELECT\b/i.test(masked)) return sql
	if (topLevelKeywords(masked, [...SET_OPERATIONS, "GROUP\\s+BY", "HAVING"]).length > 0) return sql

	const from = parseFromClause(masked)
	const order = parseOrderBy(sql, masked)
	if (!from || !order || from.joinCount !== 1 || from.hasCommaJoin || from.tables.length !== 2) return sql

	const pair = parentChild(from.tables[0], from.tables[1], catalog)
	if (!pair) return sql
	const { parent, child } = pair

	const isChildColumn = (qualifier: string | undefined, column: string): boolean =>
		qualifier
			? sameName(qualifier, child.alias)
			: catalog.isKnownColumn(child.table, column) && !catalog.isKnownColumn(parent.table, column)

	const edits: Edit[] = []
	const ordered: string[] = []

	for (const item of order.items) {
		if (item.text.includes("(")) return sql
		const match = ORDER_ITEM.exec(item.text)
		if (!match) return sql
		const [, reference, qualifier, column] = match
		if (!isChildColumn(qualifier, column)) continue
		ordered.push(column.toLowerCase())
		edits.push({
			start: item.start,
			end: item.start + reference.length,
			text: `MAX(${reference})`,
		})
	}
	if (ordered.length === 0) return sql

	const childPrefix = new RegExp(`(?<![\\w$.])${escapeRegExp(child.alias)}\\.`, "i")
	for (const item of splitTopLevel(sql, masked, listStart, from.start)) {
		const code = masked.substring(item.start, item.end)
		if (code === "*" || code.endsWith(".*") || AGGREGATE_CALL.test(code)) return sql

		const match = SELECT_ITEM.exec(item.text)
		if (match) {
			const [, reference, qualifier, column, alias] = match
			if (isChildColumn(qualifier, column)) {
				if (!ordered.includes(column.toLowerCase())) return sql
				edits.push({ start: item.start, end: item.end, text: `MAX(${reference}) AS ${alias ?? column}` })
			}
			continue
		}
		if (childPrefix.test(code)) return sql
		for (const [identifier] of code.matchAll(BARE_IDENTIFIER)) {
			if (isChildColumn(undefined, identifier)) return sql
		}
	}

	edits.push({ start: order.start, end: order.start, text: `GROUP BY ${parent.alias}.${pair.parentKey} ` })
	return applyEdits(sql, edits)
}

// ============================================================================
// Main Function
// ============================================================================

const PASSES: ReadonlyArray<{ name: RewritePassName; apply: RewritePass }> = [
	{ name: "SANITIZE", apply: sanitizeSQL },
	{ name: "COLUMN_NAME_CORRECTION", apply: correctColumnNames },
	{ name: "CASE_INSENSITIVE_TEXT", apply: lowerTextComparisons },
	{ name: "COMPOSITE_PATTERN", apply: widenCompositeMatches },
	{ name: "NEGATION_REPAIR", apply: repairNegatedLike },
	{ name: "NULL_FILTER", apply: injectNullFilters },
	{ name: "FANOUT_DEDUP", apply: dedupeFanOut },
]

/**
 * Apply every rewrite pass to SQL that already passed validation.
 *
 * rewriteSQL(rewriteSQL(s).sql) yields the same SQL as rewriteSQL(s).
 * A pass that throws is logged and skipped; the others still run.
 */
export function rewriteSQL(sql: string, catalog: SchemaCatalog, logger: Logger = silentLogger): RewriteResult {
	assertString(sql, "sql")
	if (!sql.trim()) {
		return { sql, appliedPasses: [] }
	}

	const applied: RewritePassName[] = []
	let current = sql

	for (const pass of PASSES) {
		let next: string
		try {
			next = pass.apply(current, catalog)
		} catch (error) {
			logger.warn("Rewrite pass skipped", {
				pass: pass.name,
				error: error instanceof Error ? error.message : String(error),
			})
			continue
		}
		if (next !== current) {
			applied.push(pass.name)
			current = next
		}
	}

	if (applied.length > 0) {
		logger.debug("SQL rewritten", { passes: applied, sql: current })
	}

	return { sql: current, appliedPasses: applied }
}
