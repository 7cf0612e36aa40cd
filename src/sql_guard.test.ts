import { describe, it, expect, vi } from "vitest"
import { fileURLToPath } from "url"
import { SQLAuditLogger, prepareSQL } from "./sql_guard.js"
import { loadSchemaCatalog } from "./schema_catalog.js"
import type { Logger } from "./logger.js"

const catalog = loadSchemaCatalog(fileURLToPath(new URL("../config/schema_catalog.yaml", import.meta.url)))

function recordingLogger() {
	const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger
	return logger
}

describe("prepareSQL", () => {
	it("should return the rewritten SQL for a safe query", () => {
		const prepared = prepareSQL("SELECT * FROM chitalishte WHERE region = 'Враца'", catalog)
		expect(prepared.ok).toBe(true)
		if (!prepared.ok) return
		expect(prepared.sql).toBe("SELECT * FROM chitalishte WHERE LOWER(region) = LOWER('Враца')")
		expect(prepared.validation.isValid).toBe(true)
		expect(prepared.rewrite.appliedPasses).toEqual(["CASE_INSENSITIVE_TEXT"])
		expect(prepared.correctedColumns).toEqual([])
	})

	it("should strip a single trailing semicolon", () => {
		const prepared = prepareSQL("SELECT name FROM chitalishte;", catalog)
		expect(prepared.ok).toBe(true)
		expect(prepared.sql).toBe("SELECT name FROM chitalishte")
	})

	it("should correct known wrong column names and revalidate", () => {
		const logger = recordingLogger()
		const prepared = prepareSQL(
			"SELECT c.name, ic.employee_count FROM chitalishte c JOIN information_card ic ON ic.chitalishte_id = c.id WHERE ic.year = 2023",
			catalog,
			logger,
		)
		expect(prepared.ok).toBe(true)
		if (!prepared.ok) return
		expect(prepared.sql).toBe(
			"SELECT c.name, ic.employees_count FROM chitalishte c JOIN information_card ic ON ic.chitalishte_id = c.id WHERE ic.year = 2023",
		)
		expect(prepared.correctedColumns).toEqual([{ name: "employee_count", correction: "employees_count" }])
		expect(prepared.rewrite.appliedPasses).toEqual(["COLUMN_NAME_CORRECTION"])
		expect(logger.debug).toHaveBeenCalledWith("Column names corrected", {
			corrections: ["employee_count → employees_count"],
		})
	})

	it("should reject unsafe SQL without rewriting it", () => {
		const logger = recordingLogger()
		const sql = "DELETE FROM chitalishte WHERE region = 'Враца'"
		const prepared = prepareSQL(sql, catalog, logger)
		expect(prepared).toEqual({
			ok: false,
			sql,
			validation: {
				isValid: false,
				errorCategory: "DANGEROUS_KEYWORD",
				message: "Dangerous SQL keyword detected: DELETE. Only SELECT queries are allowed.",
				invalidColumns: [],
			},
			rewrite: null,
		})
		expect(logger.info).toHaveBeenCalledWith("SQL rejected", {
			category: "DANGEROUS_KEYWORD",
			message: "Dangerous SQL keyword detected: DELETE. Only SELECT queries are allowed.",
		})
	})

	it("should reject stacked statements even when a column is also wrong", () => {
		const prepared = prepareSQL("SELECT employee_count FROM information_card; SELECT 1;", catalog)
		expect(prepared.ok).toBe(false)
		expect(prepared.validation.errorCategory).toBe("INJECTION_SEMICOLONS")
	})

	it("should reject an empty query", () => {
		const prepared = prepareSQL("   ", catalog)
		expect(prepared.ok).toBe(false)
		expect(prepared.validation.errorCategory).toBe("EMPTY_QUERY")
	})
})

describe("SQLAuditLogger", () => {
	const now = () => new Date("2026-03-01T10:00:00.000Z")

	it("should write one SQL_QUERY_AUDIT record for a success", () => {
		const logger = recordingLogger()
		new SQLAuditLogger(logger, now).record({
			requestId: "req-1",
			question: "Колко читалища има?",
			sql: "SELECT COUNT(*) FROM chitalishte",
			success: true,
			rowCount: 1,
		})
		expect(logger.info).toHaveBeenCalledTimes(1)
		expect(logger.info).toHaveBeenCalledWith("SQL_QUERY_AUDIT", {
			type: "sql_query",
			request_id: "req-1",
			timestamp: "2026-03-01T10:00:00.000Z",
			question: "Колко читалища има?",
			sql: "SELECT COUNT(*) FROM chitalishte",
			success: true,
			row_count: 1,
		})
	})

	it("should include the error for a failure", () => {
		const logger = recordingLogger()
		new SQLAuditLogger(logger, now).record({
			requestId: "req-2",
			sql: "DROP TABLE chitalishte",
			success: false,
			error: "Dangerous SQL keyword detected: DROP. Only SELECT queries are allowed.",
		})
		expect(logger.info).toHaveBeenCalledWith("SQL_QUERY_AUDIT", {
			type: "sql_query",
			request_id: "req-2",
			timestamp: "2026-03-01T10:00:00.000Z",
			question: undefined,
			sql: "DROP TABLE chitalishte",
			success: false,
			error: "Dangerous SQL keyword detected: DROP. Only SELECT queries are allowed.",
		})
	})
})
