/**
 * SQL Token Helpers
 *
 * Splits SQL into code, string literals, quoted identifiers and comments with a
 * small state machine, then builds a "masked" copy of the text: the same length
 * as the original, with literal interiors replaced by "_" and comments by
 * spaces. Regexes and clause lookups run on the masked copy and their offsets
 * are applied to the original, so a keyword or column name inside a string
 * value is never mistaken for SQL.
 *
 * Not a parser. Clause positions are found by keyword at parenthesis depth 0.
 */

// ============================================================================
// Tokenizer
// ============================================================================

export enum TokenType {
	NORMAL = "NORMAL",
	SINGLE_QUOTE = "SINGLE_QUOTE",
	DOUBLE_QUOTE = "DOUBLE_QUOTE",
	DOLLAR_QUOTE = "DOLLAR_QUOTE",
	LINE_COMMENT = "LINE_COMMENT",
	BLOCK_COMMENT = "BLOCK_COMMENT",
}

export interface Token {
	type: TokenType
	value: string
	start: number
	end: number
}

const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/

/** Scan a quoted run with doubled-quote escaping; returns the end offset */
function scanQuoted(sql: string, start: number, quote: string): number {
	let i = start + 1
	while (i < sql.length) {
		if (sql[i] === quote) {
			if (sql[i + 1] === quote) {
				i += 2
				continue
			}
			return i + 1
		}
		i++
	}
	return i
}

/**
 * Tokenize SQL with handling of strings, quoted identifiers, dollar quoting
 * and comments. Unterminated literals and comments run to the end of input.
 */
export function tokenizeSQL(sql: string): Token[] {
	const tokens: Token[] = []
	const len = sql.length
	let i = 0
	let normalStart = 0

	const flushNormal = (end: number): void => {
		if (end > normalStart) {
			tokens.push({ type: TokenType.NORMAL, value: sql.substring(normalStart, end), start: normalStart, end })
		}
	}
	const push = (type: TokenType, start: number, end: number): void => {
		flushNormal(start)
		tokens.push({ type, value: sql.substring(start, end), start, end })
		normalStart = end
		i = end
	}

	while (i < len) {
		const char = sql[i]
		const next = sql[i + 1]

		// Line comment: -- ... (newline stays in the following code token)
		if (char === "-" && next === "-") {
			const newline = sql.indexOf("\n", i)
			push(TokenType.LINE_COMMENT, i, newline === -1 ? len : newline)
			continue
		}

		// Block comment: /* ... */
		if (char === "/" && next === "*") {
			const close = sql.indexOf("*/", i + 2)
			push(TokenType.BLOCK_COMMENT, i, close === -1 ? len : close + 2)
			continue
		}

		if (char === "'") {
			push(TokenType.SINGLE_QUOTE, i, scanQuoted(sql, i, "'"))
			continue
		}

		if (char === '"') {
			push(TokenType.DOUBLE_QUOTE, i, scanQuoted(sql, i, '"'))
			continue
		}

		// Dollar-quoted string: $tag$...$tag$ or $$...$$ ($1 parameters are code)
		if (char === "$") {
			const tag = DOLLAR_TAG.exec(sql.substring(i))
			if (tag) {
				const close = sql.indexOf(tag[0], i + tag[0].length)
				push(TokenType.DOLLAR_QUOTE, i, close === -1 ? len : close + tag[0].length)
				continue
			}
		}

		i++
	}

	flushNormal(len)
	return tokens
}

// ============================================================================
// Masking
// ============================================================================

function isLiteral(type: TokenType): boolean {
	return type === TokenType.SINGLE_QUOTE || type === TokenType.DOUBLE_QUOTE || type === TokenType.DOLLAR_QUOTE
}

function isComment(type: TokenType): boolean {
	return type === TokenType.LINE_COMMENT || type === TokenType.BLOCK_COMMENT
}

/**
 * Same-length copy of `sql` where literal interiors become "_" (delimiters
 * kept) and comments become spaces.
 */
export function maskSQL(sql: string): string {
	let masked = ""
	for (const token of tokenizeSQL(sql)) {
		if (isComment(token.type)) {
			masked += " ".repeat(token.value.length)
		} else if (isLiteral(token.type)) {
			masked += maskLiteral(token)
		} else {
			masked += token.value
		}
	}
	return masked
}

function maskLiteral(token: Token): string {
	const value = token.value
	if (token.type === TokenType.DOLLAR_QUOTE) {
		const tag = DOLLAR_TAG.exec(value)
		const delimiter = tag ? tag[0].length : 1
		const closed = value.length >= delimiter * 2 && value.endsWith(tag ? tag[0] : "$")
		const tail = closed ? delimiter : 0
		return value.substring(0, delimiter) + "_".repeat(value.length - delimiter - tail) + value.substring(value.length - tail)
	}
	const quote = value[0]
	const closed = value.length >= 2 && value.endsWith(quote)
	const tail = closed ? 1 : 0
	return quote + "_".repeat(value.length - 1 - tail) + (closed ? quote : "")
}

/**
 * Replace every match of `pattern` found in the masked text. The replacer
 * receives the ORIGINAL text of the whole match and of each capture group
 * (undefined groups become ""), so literal values survive intact.
 */
export function replaceOutsideLiterals(
	sql: string,
	pattern: RegExp,
	replace: (groups: string[]) => string,
): string {
	const masked = maskSQL(sql)
	const flags = new Set(pattern.flags)
	flags.add("g")
	flags.add("d")
	const regex = new RegExp(pattern.source, [...flags].join(""))

	let result = ""
	let cursor = 0
	let match: RegExpExecArray | null
	while ((match = regex.exec(masked)) !== null) {
		if (match[0].length === 0) {
			regex.lastIndex++
			continue
		}
		const indices = match.indices
		if (!indices) break
		const groups = indices.map((range) => (range ? sql.substring(range[0], range[1]) : ""))
		result += sql.substring(cursor, match.index) + replace(groups)
		cursor = match.index + match[0].length
	}
	return result + sql.substring(cursor)
}

// ============================================================================
// Clause lookup
// ============================================================================

export interface KeywordHit {
	/** Offset of the keyword */
	index: number
	/** Offset just past the keyword */
	end: number
	/** Uppercased keyword with whitespace collapsed, e.g. "ORDER BY" */
	keyword: string
}

/** Parenthesis depth before each offset of the masked text */
function depths(masked: string): number[] {
	const out: number[] = new Array<number>(masked.length + 1)
	let depth = 0
	for (let i = 0; i < masked.length; i++) {
		out[i] = depth
		if (masked[i] === "(") depth++
		else if (masked[i] === ")") depth = Math.max(0, depth - 1)
	}
	out[masked.length] = depth
	return out
}

/**
 * Keywords found at parenthesis depth 0 of the masked text, in order.
 * `keywords` are regex sources such as "ORDER\\s+BY".
 */
export function topLevelKeywords(masked: string, keywords: readonly string[], from = 0): KeywordHit[] {
	const depth = depths(masked)
	const regex = new RegExp(`(?<![\\w$.])(?:${keywords.join("|")})(?![\\w$])`, "gi")
	regex.lastIndex = from
	const hits: KeywordHit[] = []
	let match: RegExpExecArray | null
	while ((match = regex.exec(masked)) !== null) {
		if (depth[match.index] === 0) {
			hits.push({
				index: match.index,
				end: match.index + match[0].length,
				keyword: match[0].toUpperCase().replace(/\s+/g, " "),
			})
		}
	}
	return hits
}

export function findTopLevelKeyword(masked: string, keywords: readonly string[], from = 0): KeywordHit | undefined {
	return topLevelKeywords(masked, keywords, from)[0]
}

/**
 * Split [start, end) of `sql` on commas at depth 0, relative to the segment.
 * Returns trimmed pieces with their offsets in the original text.
 */
export function splitTopLevel(
	sql: string,
	masked: string,
	start: number,
	end: number,
): Array<{ text: string; start: number; end: number }> {
	const pieces: Array<{ text: string; start: number; end: number }> = []
	let depth = 0
	let pieceStart = start
	const pushPiece = (pieceEnd: number): void => {
		const raw = sql.substring(pieceStart, pieceEnd)
		const lead = raw.length - raw.trimStart().length
		const text = raw.trim()
		pieces.push({ text, start: pieceStart + lead, end: pieceStart + lead + text.length })
	}
	for (let i = start; i < end; i++) {
		const char = masked[i]
		if (char === "(") depth++
		else if (char === ")") depth = Math.max(0, depth - 1)
		else if (char === "," && depth === 0) {
			pushPiece(i)
			pieceStart = i + 1
		}
	}
	pushPiece(end)
	return pieces
}

// ============================================================================
// FROM clause
// ============================================================================

export interface TableReference {
	table: string
	/** Alias, or the table name when none was given */
	alias: string
}

const CLAUSE_END = [
	"WHERE",
	"GROUP\\s+BY",
	"HAVING",
	"WINDOW",
	"ORDER\\s+BY",
	"LIMIT",
	"OFFSET",
	"FETCH",
	"UNION",
	"INTERSECT",
	"EXCEPT",
]

const NOT_AN_ALIAS = new Set([
	"JOIN",
	"INNER",
	"LEFT",
	"RIGHT",
	"FULL",
	"CROSS",
	"OUTER",
	"NATURAL",
	"LATERAL",
	"ON",
	"USING",
	"WHERE",
	"GROUP",
	"HAVING",
	"WINDOW",
	"ORDER",
	"LIMIT",
	"OFFSET",
	"FETCH",
	"UNION",
	"INTERSECT",
	"EXCEPT",
])

export interface FromClause {
	/** Offset of the FROM keyword */
	start: number
	/** Offset of the clause that follows, or the text length */
	end: number
	tables: TableReference[]
	joinCount: number
	/** Comma-separated table list (implicit join) */
	hasCommaJoin: boolean
}

/**
 * Locate the top-level FROM clause and the plain tables it names. Subqueries
 * in FROM contribute no table reference.
 */
export function parseFromClause(masked: string): FromClause | undefined {
	const from = findTopLevelKeyword(masked, ["FROM"])
	if (!from) return undefined
	const next = findTopLevelKeyword(masked, CLAUSE_END, from.end)
	const end = next ? next.index : masked.length
	const clause = masked.substring(from.index, end)

	const hasCommaJoin = splitTopLevel(clause, clause, 0, clause.length).length > 1
	const tables: TableReference[] = []
	const ref = new RegExp(
		`(?:^FROM|\\bJOIN${hasCommaJoin ? "|," : ""})\\s+([A-Za-z_][\\w$]*)(?:\\s+(?:AS\\s+)?([A-Za-z_][\\w$]*))?`,
		"gi",
	)
	let match: RegExpExecArray | null
	while ((match = ref.exec(clause)) !== null) {
		const table = match[1]
		const alias = match[2]
		const usableAlias = alias !== undefined && !NOT_AN_ALIAS.has(alias.toUpperCase())
		tables.push({ table, alias: usableAlias ? alias : table })
		if (!usableAlias && alias !== undefined) {
			// the keyword after the table may start the next reference
			ref.lastIndex = match.index + match[0].length - alias.length
		}
	}

	return {
		start: from.index,
		end,
		tables,
		joinCount: topLevelKeywords(clause, ["JOIN"]).length,
		hasCommaJoin,
	}
}

export function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}
