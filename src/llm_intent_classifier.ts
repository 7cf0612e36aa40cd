/**
 * LLM Intent Classifier
 *
 * Second opinion for the hybrid router. Asks an OpenAI-compatible chat
 * endpoint to label a question as sql, rag or hybrid and normalizes whatever
 * comes back into a ClassificationResult.
 *
 * Construction never throws: createLlmIntentClassifier returns a result
 * object, and resolveExternalClassifier decides at the call site whether the
 * keyword classifier stands in when the LLM is unavailable.
 */

import { z } from "zod"
import type { ChatRouterConfig } from "./config/loadConfig.js"
import { ChatRouterError, assertString } from "./errors.js"
import {
	clampConfidence,
	freezeResult,
	isQueryIntent,
	type ClassificationResult,
	type IntentClassifier,
	type QueryIntent,
} from "./intent_types.js"
import { silentLogger, type Logger } from "./logger.js"

// ============================================================================
// Chat model contract
// ============================================================================

export interface ChatMessage {
	role: "system" | "user" | "assistant"
	content: string
}

export interface ChatModel {
	/** Returns the assistant's text reply */
	complete(messages: readonly ChatMessage[]): Promise<string>
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export interface OpenAIChatClientOptions {
	baseUrl: string
	model: string
	apiKey?: string
	timeoutMs: number
	temperature: number
	fetch?: FetchLike
}

const chatCompletionSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({ content: z.string().nullable() }),
			}),
		)
		.min(1),
})

/**
 * Minimal client for POST {baseUrl}/chat/completions. Works against OpenAI
 * and self-hosted OpenAI-compatible servers.
 */
export class OpenAIChatClient implements ChatModel {
	private readonly url: string
	private readonly fetchImpl: FetchLike

	constructor(private readonly options: OpenAIChatClientOptions) {
		this.url = `${options.baseUrl.replace(/\/+$/, "")}/chat/completions`
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
	}

	async complete(messages: readonly ChatMessage[]): Promise<string> {
		const { model, apiKey, timeoutMs, temperature } = this.options
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

		try {
			const headers: Record<string, string> = {
				"Content-Type": "application/json",
				"Accept": "application/json",
			}
			if (apiKey) headers.Authorization = `Bearer ${apiKey}`

			const response = await this.fetchImpl(this.url, {
				method: "POST",
				headers,
				body: JSON.stringify({
					model,
					temperature,
					messages,
					response_format: { type: "json_object" },
				}),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new ChatRouterError(
					"classification",
					`LLM endpoint returned error: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, url: this.url },
				)
			}

			const body: unknown = await response.json()
			const parsed = chatCompletionSchema.safeParse(body)
			if (!parsed.success) {
				throw new ChatRouterError("classification", "LLM endpoint returned an unexpected response shape", false, {
					url: this.url,
				})
			}
			return parsed.data.choices[0].message.content ?? ""
		} catch (error) {
			if (error instanceof ChatRouterError) {
				throw error
			}

			if (error instanceof Error && error.name === "AbortError") {
				throw new ChatRouterError("timeout", `LLM request timed out after ${timeoutMs}ms`, true, {
					timeout: timeoutMs,
					url: this.url,
				})
			}

			// fetch reports connection failures as TypeError
			if (error instanceof TypeError) {
				throw new ChatRouterError("classification", `Cannot connect to LLM endpoint at ${this.url}`, true, {
					originalError: error.message,
				})
			}

			throw new ChatRouterError("classification", `Unexpected error calling LLM endpoint: ${String(error)}`, false, {
				originalError: String(error),
			})
		} finally {
			clearTimeout(timeoutId)
		}
	}
}

// ============================================================================
// Prompt and reply parsing
// ============================================================================

const SYSTEM_PROMPT = [
	"Ти си класификатор на потребителски заявки за система за данни за читалища.",
	"Класифицирай всяка заявка в една от следните категории:",
	"1) 'sql' – когато потребителят иска числа, статистики, агрегати, брой, средно, максимум,",
	'   минимум, проценти, разпределения, таблици, списъци, "топ" класации и др.',
	"2) 'rag' – когато потребителят иска описателна текстова информация, обяснения,",
	'   история, контекст, "какво е", "как се", "защо", "разкажи" и др.',
	"3) 'hybrid' – когато заявката ясно комбинира и двете: иска и числа/статистика,",
	'   и описателен текст (напр. "Колко читалища има и разкажи за тях").',
	"",
	"Винаги връщай валиден JSON обект със следната структура:",
	"{",
	'  "intent": "sql" | "rag" | "hybrid",',
	'  "confidence": число между 0.0 и 1.0,',
	'  "reason": "кратко обяснение на български (1–2 изречения)"',
	"}",
	"",
	"Правила за confidence:",
	"  * 0.8–1.0, ако си силно уверен",
	"  * 0.5–0.8, ако си умерено уверен",
	"  * под 0.5, ако заявката е неясна или гранична",
	"",
	"Бъди стриктен и не измисляй други стойности за intent.",
].join("\n")

export function buildIntentMessages(query: string): ChatMessage[] {
	return [
		{ role: "system", content: SYSTEM_PROMPT },
		{ role: "user", content: `Класифицирай следната заявка и върни само валиден JSON:\n\nЗаявка: "${query}"\n` },
	]
}

export interface IntentReply {
	intent: QueryIntent
	confidence: number
	reason: string
}

const DEFAULT_CONFIDENCE = 0.5

const intentReplySchema = z.object({
	intent: z.string().default("rag"),
	confidence: z.coerce.number().default(DEFAULT_CONFIDENCE),
	reason: z.string().trim().min(1).catch("Няма обяснение предоставено."),
})

function toIntent(value: string): QueryIntent {
	const lowered = value.trim().toLowerCase()
	return isQueryIntent(lowered) ? lowered : "rag"
}

function extractJsonCandidate(text: string): string {
	const withIntent = /\{[^{}]*"intent"[^{}]*\}/s.exec(text)
	if (withIntent) return withIntent[0]
	const anyObject = /\{.*\}/s.exec(text)
	return anyObject ? anyObject[0] : text
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text)
	} catch {
		return undefined
	}
}

/** Field-by-field extraction for replies that are not valid JSON */
function scrapeFields(text: string): IntentReply {
	const intent = /"intent"\s*:\s*"([^"]+)"/.exec(text)
	const confidence = /"confidence"\s*:\s*([0-9.]+)/.exec(text)
	const reason = /"reason"\s*:\s*"([^"]+)"/.exec(text)
	const value = confidence ? Number(confidence[1]) : DEFAULT_CONFIDENCE

	return {
		intent: toIntent(intent ? intent[1] : "rag"),
		confidence: clampConfidence(Number.isNaN(value) ? DEFAULT_CONFIDENCE : value),
		reason: reason ? reason[1] : "Неуспешно парсиране на отговора.",
	}
}

/**
 * Normalize a model reply. Unknown intents become rag, confidence is clamped
 * to [0, 1] and defaults to 0.5.
 */
export function parseIntentReply(text: string): IntentReply {
	const parsed = intentReplySchema.safeParse(parseJson(extractJsonCandidate(text)))
	if (!parsed.success) {
		return scrapeFields(text)
	}
	return {
		intent: toIntent(parsed.data.intent),
		confidence: clampConfidence(parsed.data.confidence),
		reason: parsed.data.reason,
	}
}

// ============================================================================
// Classifier
// ============================================================================

export class LlmIntentClassifier implements IntentClassifier {
	constructor(
		private readonly model: ChatModel,
		private readonly logger: Logger = silentLogger,
	) {}

	/** Rejects when the chat model fails; there is no silent default here. */
	async classify(query: string): Promise<ClassificationResult> {
		assertString(query, "query")

		if (!query.trim()) {
			return freezeResult({
				intent: "rag",
				confidence: 0,
				matchedSignals: [],
				explanation: "Празна заявка - използва се RAG по подразбиране (LLM класификатор).",
			})
		}

		const reply = await this.model.complete(buildIntentMessages(query))
		const { intent, confidence, reason } = parseIntentReply(reply)

		this.logger.debug("LLM intent classification", { intent, confidence })

		return freezeResult({ intent, confidence, matchedSignals: [], explanation: reason })
	}
}

export type LlmClassifierResult = { ok: true; classifier: LlmIntentClassifier } | { ok: false; reason: string }

function needsApiKey(baseUrl: string): boolean {
	try {
		return new URL(baseUrl).hostname === "api.openai.com"
	} catch {
		return true
	}
}

/**
 * Build the LLM classifier from config. Self-hosted endpoints need no key;
 * the hosted OpenAI API does.
 */
export function createLlmIntentClassifier(
	config: ChatRouterConfig["llm"],
	logger: Logger = silentLogger,
	fetchImpl?: FetchLike,
): LlmClassifierResult {
	if (!config.enabled) {
		return { ok: false, reason: "LLM classification is disabled" }
	}
	if (!config.api_key && needsApiKey(config.base_url)) {
		return { ok: false, reason: `An API key (LLM_API_KEY or OPENAI_API_KEY) is required for ${config.base_url}` }
	}

	const client = new OpenAIChatClient({
		baseUrl: config.base_url,
		model: config.model,
		apiKey: config.api_key || undefined,
		timeoutMs: config.timeout_ms,
		temperature: config.temperature,
		fetch: fetchImpl,
	})
	return { ok: true, classifier: new LlmIntentClassifier(client, logger) }
}

// ============================================================================
// Fallback wiring
// ============================================================================

const FALLBACK_NOTE = "(Използван е класификатор с ключови думи поради недостъпност на LLM)"

/** Keyword classifier standing in for the LLM; says so in the explanation */
export class KeywordFallbackClassifier implements IntentClassifier {
	constructor(private readonly ruleClassifier: IntentClassifier) {}

	async classify(query: string): Promise<ClassificationResult> {
		const result = await this.ruleClassifier.classify(query)
		return freezeResult({ ...result, explanation: `${result.explanation} ${FALLBACK_NOTE}` })
	}
}

export interface ResolveExternalOptions {
	fallbackToKeywords: boolean
	ruleClassifier: IntentClassifier
	logger?: Logger
}

export function resolveExternalClassifier(created: LlmClassifierResult, options: ResolveExternalOptions): IntentClassifier {
	if (created.ok) {
		return created.classifier
	}
	if (options.fallbackToKeywords) {
		options.logger?.warn("LLM classifier unavailable, falling back to keyword classifier", {
			reason: created.reason,
		})
		return new KeywordFallbackClassifier(options.ruleClassifier)
	}
	throw new ChatRouterError("configuration", `LLM classifier unavailable: ${created.reason}`)
}
