import { describe, it, expect } from "vitest"
import { createStderrLogger, formatLogLine, isLogLevel } from "./logger.js"

describe("formatLogLine", () => {
	it("should append data as JSON", () => {
		expect(formatLogLine("warn", "Rewrite pass skipped", { pass: "SANITIZE" })).toBe(
			'[WARN] Rewrite pass skipped {"pass":"SANITIZE"}',
		)
	})

	it("should omit empty data", () => {
		expect(formatLogLine("info", "Starting", {})).toBe("[INFO] Starting")
	})
})

describe("createStderrLogger", () => {
	it("should drop messages below the configured level", () => {
		const lines: string[] = []
		const logger = createStderrLogger("warn", (line) => lines.push(line))

		logger.debug("hidden")
		logger.info("hidden")
		logger.warn("shown")
		logger.error("shown too", { code: 1 })

		expect(lines).toEqual(["[WARN] shown", '[ERROR] shown too {"code":1}'])
	})
})

describe("isLogLevel", () => {
	it("should accept only the four levels", () => {
		expect(isLogLevel("debug")).toBe(true)
		expect(isLogLevel("verbose")).toBe(false)
		expect(isLogLevel("toString")).toBe(false)
	})
})
