/**
 * Print keyword-classifier and hybrid-router decisions for sample questions.
 *
 * Usage:
 *   npm run build
 *   node dist/scripts/verify_router.js         # keyword fallback as the second opinion
 *   node dist/scripts/verify_router.js --llm   # use the configured LLM endpoint
 */

import { loadConfig } from "../src/config/loadConfig.js"
import { HybridRouter } from "../src/hybrid_router.js"
import { formatPercent, type QueryIntent } from "../src/intent_types.js"
import { KeywordIntentClassifier, loadIntentKeywords } from "../src/keyword_classifier.js"
import {
	KeywordFallbackClassifier,
	createLlmIntentClassifier,
	resolveExternalClassifier,
} from "../src/llm_intent_classifier.js"
import { createStderrLogger } from "../src/logger.js"

const SAMPLES: Array<[string, QueryIntent]> = [
	["Колко читалища има в Пловдив?", "sql"],
	["Какво е читалище и какво представлява?", "rag"],
	["Колко читалища има и разкажи за тях?", "hybrid"],
	["Статистика за читалищата по региони", "sql"],
	["Разкажи ми за историята на читалищата", "rag"],
	["Какво е средното число на членовете?", "sql"],
	["Опиши как работи читалището", "rag"],
	["Колко читалища има в София и какви са техните характеристики?", "hybrid"],
]

async function main() {
	const useLlm = process.argv.includes("--llm")
	const config = loadConfig()
	const logger = createStderrLogger(config.logging.level)

	const ruleClassifier = new KeywordIntentClassifier(loadIntentKeywords(config.catalog.keywords_file))
	const externalClassifier = useLlm
		? resolveExternalClassifier(createLlmIntentClassifier(config.llm, logger), {
				fallbackToKeywords: false,
				ruleClassifier,
				logger,
			})
		: new KeywordFallbackClassifier(ruleClassifier)
	const router = new HybridRouter({ ruleClassifier, externalClassifier, logger })

	console.log("=".repeat(70))
	console.log(`  Hybrid router check (${useLlm ? `LLM: ${config.llm.model}` : "keyword fallback"})`)
	console.log("=".repeat(70))

	let matches = 0
	for (const [question, expected] of SAMPLES) {
		const rule = ruleClassifier.classify(question)
		const decision = await router.route(question)
		if (decision.intent === expected) matches++

		console.log(`\n${decision.intent === expected ? "✓" : "✗"} "${question}"`)
		console.log(`   Keywords: ${rule.intent} (${formatPercent(rule.confidence)}) ${rule.matchedSignals.slice(0, 3).join(", ")}`)
		console.log(`   Routed:   ${decision.intent} (${formatPercent(decision.confidence)}), expected ${expected}`)
		console.log(`   ${decision.explanation}`)
	}

	console.log(`\n${matches}/${SAMPLES.length} routed as expected`)
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
