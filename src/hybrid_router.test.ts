import { describe, it, expect, vi } from "vitest"
import { HybridRouter, fuseClassifications, fuseWithBranch } from "./hybrid_router.js"
import type { ClassificationResult, IntentClassifier, QueryIntent } from "./intent_types.js"
import { ChatRouterError } from "./errors.js"

function result(intent: QueryIntent, confidence: number, matchedSignals: string[] = []): ClassificationResult {
	return { intent, confidence, matchedSignals, explanation: "test" }
}

function fixed(r: ClassificationResult): IntentClassifier {
	return { classify: () => r }
}

describe("fuseClassifications", () => {
	describe("agreement", () => {
		it("should weight the LLM at 0.6", () => {
			const fused = fuseClassifications(result("rag", 0.8), result("rag", 0.6))
			expect(fused.intent).toBe("rag")
			expect(fused.confidence).toBeCloseTo(0.68)
		})

		it("should cap at 0.95", () => {
			const fused = fuseClassifications(result("sql", 1.0), result("sql", 1.0))
			expect(fused.confidence).toBe(0.95)
		})

		it("should treat two hybrid votes as agreement", () => {
			const { branch, decision } = fuseWithBranch(result("hybrid", 0.5), result("hybrid", 0.7))
			expect(branch).toBe("agreement")
			expect(decision.confidence).toBeCloseTo(0.62)
		})
	})

	describe("hybrid signal", () => {
		it("should favor the rule classifier when it said hybrid", () => {
			const { branch, decision } = fuseWithBranch(result("hybrid", 0.5), result("sql", 0.9))
			expect(branch).toBe("hybrid_signal")
			expect(decision.intent).toBe("hybrid")
			expect(decision.confidence).toBeCloseTo(0.66)
		})

		it("should favor the LLM when it said hybrid", () => {
			const fused = fuseClassifications(result("sql", 0.7), result("hybrid", 0.9))
			expect(fused.intent).toBe("hybrid")
			expect(fused.confidence).toBeCloseTo(0.82)
		})

		it("should cap at 0.9", () => {
			const fused = fuseClassifications(result("rag", 0.95), result("hybrid", 1.0))
			expect(fused.confidence).toBe(0.9)
		})
	})

	describe("high/low split", () => {
		it("should trust a confident rule classifier over an unsure LLM", () => {
			const { branch, decision } = fuseWithBranch(result("sql", 0.9), result("rag", 0.3))
			expect(branch).toBe("high_low_split")
			expect(decision.intent).toBe("sql")
			expect(decision.confidence).toBeCloseTo(0.81)
		})

		it("should trust a confident LLM over an unsure rule classifier", () => {
			const fused = fuseClassifications(result("sql", 0.4), result("rag", 0.85))
			expect(fused.intent).toBe("rag")
			expect(fused.confidence).toBeCloseTo(0.765)
		})
	})

	describe("moderate disagreement", () => {
		it("should fall back to hybrid with the average", () => {
			const { branch, decision } = fuseWithBranch(result("sql", 0.6), result("rag", 0.5))
			expect(branch).toBe("moderate_disagreement")
			expect(decision.intent).toBe("hybrid")
			expect(decision.confidence).toBeCloseTo(0.55)
		})
	})

	describe("weighted pick", () => {
		it("should pick the rule intent when it is more confident", () => {
			const { branch, decision } = fuseWithBranch(result("sql", 0.9), result("rag", 0.6))
			expect(branch).toBe("weighted_pick")
			expect(decision.intent).toBe("sql")
			expect(decision.confidence).toBeCloseTo(0.6885)
		})

		it("should pick the LLM intent when it is more confident", () => {
			const fused = fuseClassifications(result("sql", 0.75), result("rag", 0.8))
			expect(fused.intent).toBe("rag")
			expect(fused.confidence).toBeCloseTo(0.66725)
		})

		it("should give ties to the LLM", () => {
			const fused = fuseClassifications(result("sql", 0.75), result("rag", 0.75))
			expect(fused.intent).toBe("rag")
			expect(fused.confidence).toBeCloseTo(0.6375)
		})
	})

	describe("explanation", () => {
		it("should name the branch and both input confidences", () => {
			const fused = fuseClassifications(result("sql", 0.9), result("rag", 0.3))
			expect(fused.explanation).toBe(
				"Висока срещу ниска увереност: използва се решението на класификатора с ключови думи. " +
					"Класификатор с ключови думи: 'sql' (90.00%), LLM: 'rag' (30.00%). " +
					"Финална увереност: 81.00%.",
			)
		})

		it("should carry the rule classifier's signals", () => {
			const fused = fuseClassifications(result("sql", 0.6, ["SQL: колко"]), result("sql", 0.9))
			expect(fused.matchedSignals).toEqual(["SQL: колко"])
		})
	})
})

describe("HybridRouter", () => {
	it("should call both classifiers with the query and fuse the results", async () => {
		const rule = { classify: vi.fn(() => result("sql", 0.9)) }
		const llm = { classify: vi.fn(async () => result("rag", 0.3)) }
		const router = new HybridRouter({ ruleClassifier: rule, externalClassifier: llm })

		const decision = await router.route("Колко читалища има?")

		expect(rule.classify).toHaveBeenCalledWith("Колко читалища има?")
		expect(llm.classify).toHaveBeenCalledWith("Колко читалища има?")
		expect(decision.intent).toBe("sql")
		expect(decision.confidence).toBeCloseTo(0.81)
	})

	it("should not cache decisions between calls", async () => {
		const llm = {
			classify: vi
				.fn((_query: string): ClassificationResult => result("rag", 0.8))
				.mockReturnValueOnce(result("rag", 0.8))
				.mockReturnValueOnce(result("sql", 0.8)),
		}
		const router = new HybridRouter({ ruleClassifier: fixed(result("rag", 0.8)), externalClassifier: llm })

		const first = await router.route("въпрос")
		const second = await router.route("въпрос")

		expect(first.intent).toBe("rag")
		// tie between two 0.8 votes goes to the LLM
		expect(second.intent).toBe("sql")
	})

	it("should propagate a failing external classifier", async () => {
		const router = new HybridRouter({
			ruleClassifier: fixed(result("sql", 0.9)),
			externalClassifier: {
				classify: async () => {
					throw new ChatRouterError("classification", "LLM unavailable", true)
				},
			},
		})

		await expect(router.route("Колко?")).rejects.toThrow("LLM unavailable")
	})

	it("should log the branch that fired", async () => {
		const debug = vi.fn()
		const router = new HybridRouter({
			ruleClassifier: fixed(result("rag", 0.8)),
			externalClassifier: fixed(result("rag", 0.6)),
			logger: { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() },
		})

		await router.route("Какво е читалище?")

		expect(debug).toHaveBeenCalledWith("Routing decision", expect.objectContaining({ branch: "agreement", intent: "rag" }))
	})
})
