/**
 * Hybrid Intent Router
 *
 * Runs the keyword classifier and the external (LLM) classifier on the same
 * question and fuses their outputs into one routing decision.
 *
 * Fusion rules, first match wins:
 *   1. agreement            → shared intent, 0.4 * rule + 0.6 * llm (cap 0.95)
 *   2. one side says hybrid → hybrid, weighted toward the hybrid side (cap 0.9)
 *   3. high/low split       → trust the side above 0.8 when the other is below 0.5
 *   4. both moderate        → hybrid, average (cap 0.75)
 *   5. otherwise            → more confident side wins, disagreement penalty (cap 0.85)
 */

import { assertString } from "./errors.js"
import {
	freezeResult,
	formatPercent,
	type ClassificationResult,
	type IntentClassifier,
	type RoutingDecision,
} from "./intent_types.js"
import type { Logger } from "./logger.js"

export type RouteBranch = "agreement" | "hybrid_signal" | "high_low_split" | "moderate_disagreement" | "weighted_pick"

const HIGH_CONFIDENCE = 0.8
const LOW_CONFIDENCE = 0.5
const MODERATE_CONFIDENCE = 0.7

const BRANCH_LABELS: Record<RouteBranch, string> = {
	agreement: "Съгласие",
	hybrid_signal: "Хибриден сигнал",
	high_low_split: "Висока срещу ниска увереност",
	moderate_disagreement: "Умерено несъгласие",
	weighted_pick: "Претеглен избор",
}

interface Fusion {
	branch: RouteBranch
	decision: RoutingDecision
}

function inputs(rule: ClassificationResult, llm: ClassificationResult): string {
	return (
		`Класификатор с ключови думи: '${rule.intent}' (${formatPercent(rule.confidence)}), ` +
		`LLM: '${llm.intent}' (${formatPercent(llm.confidence)}).`
	)
}

function decide(
	branch: RouteBranch,
	rule: ClassificationResult,
	llm: ClassificationResult,
	intent: RoutingDecision["intent"],
	confidence: number,
	reason: string,
): Fusion {
	return {
		branch,
		decision: freezeResult({
			intent,
			confidence,
			matchedSignals: rule.matchedSignals,
			explanation: `${BRANCH_LABELS[branch]}: ${reason} ${inputs(rule, llm)} Финална увереност: ${formatPercent(confidence)}.`,
		}),
	}
}

/**
 * Fuse two classification results. Pure: the same pair always yields the same
 * decision.
 */
export function fuseWithBranch(rule: ClassificationResult, llm: ClassificationResult): Fusion {
	const ruleConf = rule.confidence
	const llmConf = llm.confidence

	// 1. Agreement
	if (rule.intent === llm.intent) {
		return decide(
			"agreement",
			rule,
			llm,
			rule.intent,
			Math.min(0.95, ruleConf * 0.4 + llmConf * 0.6),
			`двата класификатора са съгласни за '${rule.intent}'.`,
		)
	}

	// 2. Either side says hybrid. Both saying hybrid is an agreement and
	// never reaches this point.
	if (rule.intent === "hybrid" || llm.intent === "hybrid") {
		const ruleSaidHybrid = rule.intent === "hybrid"
		const confidence = ruleSaidHybrid ? ruleConf * 0.6 + llmConf * 0.4 : ruleConf * 0.4 + llmConf * 0.6
		return decide(
			"hybrid_signal",
			rule,
			llm,
			"hybrid",
			Math.min(0.9, confidence),
			ruleSaidHybrid
				? "класификаторът с ключови думи идентифицира хибридна заявка - използва се хибриден режим."
				: "LLM класификаторът идентифицира хибридна заявка - използва се хибриден режим.",
		)
	}

	// 3. One side is confident, the other is not
	if (ruleConf > HIGH_CONFIDENCE && llmConf < LOW_CONFIDENCE) {
		return decide(
			"high_low_split",
			rule,
			llm,
			rule.intent,
			ruleConf * 0.9,
			"използва се решението на класификатора с ключови думи.",
		)
	}
	if (llmConf > HIGH_CONFIDENCE && ruleConf < LOW_CONFIDENCE) {
		return decide("high_low_split", rule, llm, llm.intent, llmConf * 0.9, "използва се решението на LLM класификатора.")
	}

	// 4. Neither side is sure
	if (ruleConf < MODERATE_CONFIDENCE && llmConf < MODERATE_CONFIDENCE) {
		return decide(
			"moderate_disagreement",
			rule,
			llm,
			"hybrid",
			Math.min(0.75, (ruleConf + llmConf) / 2),
			"двата класификатора имат умерена увереност и не са съгласни - използва се хибриден режим.",
		)
	}

	// 5. Weighted pick; ties go to the LLM
	const ruleWins = ruleConf > llmConf
	const [winner, loser] = ruleWins ? [ruleConf, llmConf] : [llmConf, ruleConf]
	const confidence = Math.min(0.85, (winner * 0.7 + loser * 0.3) * 0.85)
	return decide(
		"weighted_pick",
		rule,
		llm,
		ruleWins ? rule.intent : llm.intent,
		confidence,
		ruleWins
			? `използва се '${rule.intent}' от класификатора с ключови думи поради по-висока увереност.`
			: `използва се '${llm.intent}' от LLM класификатора поради по-висока увереност.`,
	)
}

export function fuseClassifications(rule: ClassificationResult, llm: ClassificationResult): RoutingDecision {
	return fuseWithBranch(rule, llm).decision
}

export interface HybridRouterDeps {
	ruleClassifier: IntentClassifier
	externalClassifier: IntentClassifier
	logger?: Logger
}

export class HybridRouter {
	private readonly ruleClassifier: IntentClassifier
	private readonly externalClassifier: IntentClassifier
	private readonly logger?: Logger

	constructor(deps: HybridRouterDeps) {
		this.ruleClassifier = deps.ruleClassifier
		this.externalClassifier = deps.externalClassifier
		this.logger = deps.logger
	}

	/**
	 * Route a question. A rejection from either classifier propagates to the
	 * caller; the router never substitutes a default intent.
	 */
	async route(query: string): Promise<RoutingDecision> {
		assertString(query, "query")

		const [rule, llm] = await Promise.all([
			this.ruleClassifier.classify(query),
			this.externalClassifier.classify(query),
		])

		const { branch, decision } = fuseWithBranch(rule, llm)

		this.logger?.debug("Routing decision", {
			branch,
			rule_intent: rule.intent,
			rule_confidence: rule.confidence,
			llm_intent: llm.intent,
			llm_confidence: llm.confidence,
			intent: decision.intent,
			confidence: decision.confidence,
		})

		return decision
	}
}
