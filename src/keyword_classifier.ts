/**
 * Keyword Intent Classifier
 *
 * Deterministic routing signal for Bulgarian questions about chitalishta.
 * Counts SQL-style keywords (counting, aggregation, ranking, lists) and
 * RAG-style keywords (question words, descriptive requests), then picks an
 * intent from the two family scores.
 *
 * Confidence never exceeds 0.95 so the LLM classifier can still win a
 * disagreement in the hybrid router.
 */

import * as fs from "fs"
import { z } from "zod"
import { assertString, ChatRouterError } from "./errors.js"
import { freezeResult, formatPercent, type ClassificationResult, type IntentClassifier } from "./intent_types.js"

// ============================================================================
// Keyword lists
// ============================================================================

export interface IntentKeywords {
	sql: readonly string[]
	rag: readonly string[]
	/** Connectives ("и", "също", "освен това") that signal a combined question */
	hybrid: readonly string[]
}

const keywordsFileSchema = z.object({
	sql: z.array(z.string().min(1)).min(1),
	rag: z.array(z.string().min(1)).min(1),
	hybrid: z.array(z.string().min(1)),
})

export function parseIntentKeywords(raw: unknown): IntentKeywords {
	const parsed = keywordsFileSchema.safeParse(raw)
	if (!parsed.success) {
		throw new ChatRouterError(
			"configuration",
			`Invalid intent keyword lists: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
		)
	}
	return parsed.data
}

export function loadIntentKeywords(filePath: string): IntentKeywords {
	if (!fs.existsSync(filePath)) {
		throw new ChatRouterError("configuration", `Intent keyword file not found: ${filePath}`, false, { filePath })
	}
	const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"))
	return parseIntentKeywords(raw)
}

// ============================================================================
// Scoring
// ============================================================================

export const MAX_KEYWORD_CONFIDENCE = 0.95
export const NO_MATCH_CONFIDENCE = 0.3
const HYBRID_CONNECTIVE_CAP = 0.9
const CLOSE_SCORE_DELTA = 0.2

/**
 * Length factor: short questions with matches are more telling than long
 * ones, where a keyword may appear by chance.
 */
export function lengthFactor(wordCount: number): number {
	if (wordCount <= 3) return 1.0
	if (wordCount <= 6) return 0.9
	if (wordCount <= 10) return 0.8
	return 0.7
}

export function familyScore(matchedCount: number, wordCount: number): number {
	if (matchedCount === 0) return 0
	const matchScore = Math.min(1.0, matchedCount / 3.0)
	return matchScore * lengthFactor(wordCount)
}

function normalizeKeywords(keywords: readonly string[]): string[] {
	const seen = new Set<string>()
	for (const kw of keywords) {
		const lower = kw.toLowerCase().trim()
		if (lower) seen.add(lower)
	}
	return [...seen]
}

/** Unique keywords that occur as substrings, in list order */
function matchSubstrings(query: string, keywords: readonly string[]): string[] {
	return keywords.filter((kw) => query.includes(kw))
}

// ============================================================================
// Classifier
// ============================================================================

export class KeywordIntentClassifier implements IntentClassifier {
	private readonly sqlKeywords: string[]
	private readonly ragKeywords: string[]
	private readonly hybridKeywords: string[]

	constructor(keywords: IntentKeywords) {
		this.sqlKeywords = normalizeKeywords(keywords.sql)
		this.ragKeywords = normalizeKeywords(keywords.rag)
		this.hybridKeywords = normalizeKeywords(keywords.hybrid)
	}

	classify(query: string): ClassificationResult {
		assertString(query, "query")
		const normalized = query.toLowerCase().trim()

		if (!normalized) {
			return freezeResult({
				intent: "rag",
				confidence: 0.0,
				matchedSignals: [],
				explanation: "Празна заявка - използва се RAG по подразбиране",
			})
		}

		const wordCount = normalized.split(/\s+/).length
		const sqlMatches = matchSubstrings(normalized, this.sqlKeywords)
		const ragMatches = matchSubstrings(normalized, this.ragKeywords)
		const connectives = matchSubstrings(normalized, this.hybridKeywords)

		const sqlScore = familyScore(sqlMatches.length, wordCount)
		const ragScore = familyScore(ragMatches.length, wordCount)

		const sqlSignals = sqlMatches.map((kw) => `SQL: ${kw}`)
		const ragSignals = ragMatches.map((kw) => `RAG: ${kw}`)

		let result: ClassificationResult

		if (connectives.length > 0 && sqlMatches.length > 0 && ragMatches.length > 0) {
			result = {
				intent: "hybrid",
				confidence: Math.min(HYBRID_CONNECTIVE_CAP, (sqlScore + ragScore) / 2),
				matchedSignals: [...sqlSignals, ...ragSignals, ...connectives.map((kw) => `HYBRID: ${kw}`)],
				explanation:
					`Открити са индикатори за хибридна заявка: ` +
					`${sqlMatches.length} SQL ключови думи и ${ragMatches.length} RAG ключови думи`,
			}
		} else if (sqlMatches.length > 0 && ragMatches.length === 0) {
			result = {
				intent: "sql",
				confidence: sqlScore,
				matchedSignals: sqlSignals,
				explanation: `Открити са само SQL ключови думи: ${sqlMatches.length} (увереност: ${formatPercent(sqlScore)})`,
			}
		} else if (ragMatches.length > 0 && sqlMatches.length === 0) {
			result = {
				intent: "rag",
				confidence: ragScore,
				matchedSignals: ragSignals,
				explanation: `Открити са само RAG ключови думи: ${ragMatches.length} (увереност: ${formatPercent(ragScore)})`,
			}
		} else if (sqlMatches.length > 0 && ragMatches.length > 0) {
			const signals = [...sqlSignals, ...ragSignals]
			if (Math.abs(sqlScore - ragScore) < CLOSE_SCORE_DELTA) {
				result = {
					intent: "hybrid",
					confidence: (sqlScore + ragScore) / 2,
					matchedSignals: signals,
					explanation:
						`Открити са и SQL (${sqlMatches.length}) и RAG (${ragMatches.length}) ` +
						`ключови думи с близки резултати - използва се хибриден режим`,
				}
			} else if (sqlScore > ragScore) {
				result = {
					intent: "sql",
					confidence: sqlScore,
					matchedSignals: signals,
					explanation: `Открити са и SQL и RAG ключови думи, но SQL има по-висок резултат (${formatPercent(sqlScore)})`,
				}
			} else {
				result = {
					intent: "rag",
					confidence: ragScore,
					matchedSignals: signals,
					explanation: `Открити са и SQL и RAG ключови думи, но RAG има по-висок резултат (${formatPercent(ragScore)})`,
				}
			}
		} else {
			result = {
				intent: "rag",
				confidence: NO_MATCH_CONFIDENCE,
				matchedSignals: [],
				explanation: "Не са открити специфични ключови думи - използва се RAG по подразбиране с ниска увереност",
			}
		}

		return freezeResult({
			...result,
			confidence: Math.min(result.confidence, MAX_KEYWORD_CONFIDENCE),
		})
	}
}
