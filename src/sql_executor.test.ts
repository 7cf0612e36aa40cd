import { describe, it, expect, vi } from "vitest"
import { PgSqlExecutor, type ConnectionPool, type QueryClient } from "./sql_executor.js"
import { ChatRouterError } from "./errors.js"

/**
 * In-process stand-in for a pg pool. Records every statement and answers the
 * user query with the configured rows or error.
 */
function fakePool(options: { rows?: Record<string, unknown>[]; fail?: unknown; rollbackFails?: boolean } = {}) {
	const statements: string[] = []
	const release = vi.fn()
	const client: QueryClient = {
		async query(text: string) {
			statements.push(text)
			if (text === "ROLLBACK" && options.rollbackFails) throw new Error("connection lost")
			if (text === "BEGIN READ ONLY" || text === "ROLLBACK" || text.startsWith("SET LOCAL")) {
				return { rows: [] }
			}
			if (options.fail !== undefined) throw options.fail
			const rows = options.rows ?? []
			return { rows, fields: Object.keys(rows[0] ?? {}).map((name) => ({ name })) }
		},
		release,
	}
	const pool: ConnectionPool = {
		connect: vi.fn(async () => client),
		end: vi.fn(async () => {}),
	}
	return { pool, statements, release }
}

function pgError(message: string, code: string): Error {
	return Object.assign(new Error(message), { code })
}

describe("PgSqlExecutor", () => {
	it("should run the query in a read-only transaction and roll back", async () => {
		const { pool, statements, release } = fakePool({ rows: [{ region: "Враца", count: 12 }] })
		const executor = new PgSqlExecutor(pool, { statementTimeoutMs: 5000, maxRows: 100 })

		const result = await executor.execute("SELECT region, COUNT(*) AS count FROM chitalishte GROUP BY region")

		expect(statements).toEqual([
			"BEGIN READ ONLY",
			"SET LOCAL statement_timeout = 5000",
			"SELECT region, COUNT(*) AS count FROM chitalishte GROUP BY region",
			"ROLLBACK",
		])
		expect(release).toHaveBeenCalledWith(undefined)
		expect(result.columns).toEqual(["region", "count"])
		expect(result.rows).toEqual([{ region: "Враца", count: 12 }])
		expect(result.rowCount).toBe(1)
		expect(result.truncated).toBe(false)
	})

	it("should truncate to maxRows", async () => {
		const rows = [{ id: 1 }, { id: 2 }, { id: 3 }]
		const { pool } = fakePool({ rows })
		const result = await new PgSqlExecutor(pool, { statementTimeoutMs: 1000, maxRows: 2 }).execute("SELECT id FROM chitalishte")
		expect(result.rows).toEqual([{ id: 1 }, { id: 2 }])
		expect(result.rowCount).toBe(2)
		expect(result.truncated).toBe(true)
	})

	it("should map a canceled statement to a timeout error", async () => {
		const { pool, statements, release } = fakePool({ fail: pgError("canceling statement due to statement timeout", "57014") })
		const error = await new PgSqlExecutor(pool, { statementTimeoutMs: 250, maxRows: 10 })
			.execute("SELECT pg_sleep(10)")
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(ChatRouterError)
		expect(error).toMatchObject({ type: "timeout", recoverable: true, message: "Query timed out after 250ms" })
		expect(statements[statements.length - 1]).toBe("ROLLBACK")
		expect(release).toHaveBeenCalledTimes(1)
	})

	it("should wrap other database errors", async () => {
		const { pool } = fakePool({ fail: pgError('column "foo" does not exist', "42703") })
		const error = await new PgSqlExecutor(pool, { statementTimeoutMs: 250, maxRows: 10 })
			.execute("SELECT foo FROM chitalishte")
			.catch((e: unknown) => e)

		expect(error).toMatchObject({
			type: "execution",
			recoverable: false,
			message: 'Query execution failed: column "foo" does not exist',
			context: { sqlstate: "42703" },
		})
	})

	it("should report connection failures as recoverable", async () => {
		const pool: ConnectionPool = {
			connect: async () => {
				throw pgError("connect ECONNREFUSED 127.0.0.1:5432", "ECONNREFUSED")
			},
			end: async () => {},
		}
		const error = await new PgSqlExecutor(pool, { statementTimeoutMs: 250, maxRows: 10 })
			.execute("SELECT 1")
			.catch((e: unknown) => e)
		expect(error).toMatchObject({ type: "execution", recoverable: true })
	})

	it("should discard the client when the rollback fails", async () => {
		const { pool, release } = fakePool({ rows: [{ id: 1 }], rollbackFails: true })
		const warn = vi.fn()
		const executor = new PgSqlExecutor(pool, {
			statementTimeoutMs: 1000,
			maxRows: 10,
			logger: { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() },
		})

		const result = await executor.execute("SELECT id FROM chitalishte")

		expect(result.rowCount).toBe(1)
		expect(warn).toHaveBeenCalledWith("Rollback failed", { error: "connection lost" })
		expect(release).toHaveBeenCalledWith(expect.objectContaining({ message: "connection lost" }))
	})

	it("should end the pool on close", async () => {
		const { pool } = fakePool()
		await new PgSqlExecutor(pool, { statementTimeoutMs: 1000, maxRows: 10 }).close()
		expect(pool.end).toHaveBeenCalledTimes(1)
	})
})
