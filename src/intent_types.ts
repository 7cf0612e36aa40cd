/**
 * Shared intent contract.
 *
 * Both classifiers and the router produce the same value shape, so downstream
 * code sees one contract whether or not fusion happened.
 */

export const QUERY_INTENTS = ["sql", "rag", "hybrid"] as const

export type QueryIntent = (typeof QUERY_INTENTS)[number]

export interface ClassificationResult {
	readonly intent: QueryIntent
	/** 0.0 - 1.0 */
	readonly confidence: number
	/** Evidence in discovery order */
	readonly matchedSignals: readonly string[]
	/** Human-readable, Bulgarian */
	readonly explanation: string
}

export type RoutingDecision = ClassificationResult

export interface IntentClassifier {
	classify(query: string): ClassificationResult | Promise<ClassificationResult>
}

export function isQueryIntent(value: string): value is QueryIntent {
	return QUERY_INTENTS.some((intent) => intent === value)
}

export function clampConfidence(value: number): number {
	if (Number.isNaN(value)) return 0
	return Math.max(0, Math.min(1, value))
}

/** 0.8123 → "81.23%" */
export function formatPercent(value: number): string {
	return `${(value * 100).toFixed(2)}%`
}

export function freezeResult(result: ClassificationResult): ClassificationResult {
	return Object.freeze({
		...result,
		matchedSignals: Object.freeze([...result.matchedSignals]),
	})
}
