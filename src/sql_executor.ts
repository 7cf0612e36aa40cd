/**
 * SQL Executor
 *
 * Runs guarded SQL on Postgres. Every statement executes inside a read-only
 * transaction with a local statement timeout and is always rolled back, so
 * the database sees no writes even if a rewrite slips something past the
 * validator.
 */

import { ChatRouterError } from "./errors.js"
import { silentLogger, type Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

export interface QueryRows {
	columns: string[]
	rows: Record<string, unknown>[]
	/** Rows returned to the caller (after truncation) */
	rowCount: number
	truncated: boolean
	executionTimeMs: number
}

export interface SqlExecutor {
	execute(sql: string): Promise<QueryRows>
	close(): Promise<void>
}

/** The slice of pg's PoolClient the executor needs */
export interface QueryClient {
	query(text: string): Promise<{ rows: Record<string, unknown>[]; fields?: Array<{ name: string }> }>
	release(err?: Error | boolean): void
}

/** The slice of pg's Pool the executor needs */
export interface ConnectionPool {
	connect(): Promise<QueryClient>
	end(): Promise<void>
}

export interface PgSqlExecutorOptions {
	statementTimeoutMs: number
	maxRows: number
	logger?: Logger
}

// ============================================================================
// Error mapping
// ============================================================================

interface PostgresErrorContext {
	sqlstate: string
	message: string
}

function parsePostgresError(error: unknown): PostgresErrorContext {
	if (error instanceof Error) {
		const code = "code" in error && typeof error.code === "string" ? error.code : "UNKNOWN"
		return { sqlstate: code, message: error.message }
	}
	return { sqlstate: "UNKNOWN", message: String(error) }
}

const QUERY_CANCELED = "57014"

function toExecutionError(error: unknown, timeoutMs: number): ChatRouterError {
	if (error instanceof ChatRouterError) return error

	const { sqlstate, message } = parsePostgresError(error)
	if (sqlstate === QUERY_CANCELED) {
		return new ChatRouterError("timeout", `Query timed out after ${timeoutMs}ms`, true, { sqlstate })
	}
	// Class 08: connection exception
	const recoverable = sqlstate.startsWith("08") || sqlstate === "ECONNREFUSED"
	return new ChatRouterError("execution", `Query execution failed: ${message}`, recoverable, { sqlstate })
}

// ============================================================================
// Executor
// ============================================================================

export class PgSqlExecutor implements SqlExecutor {
	private readonly logger: Logger

	constructor(
		private readonly pool: ConnectionPool,
		private readonly options: PgSqlExecutorOptions,
	) {
		this.logger = options.logger ?? silentLogger
	}

	async execute(sql: string): Promise<QueryRows> {
		const { statementTimeoutMs, maxRows } = this.options
		const start = Date.now()

		let client: QueryClient
		try {
			client = await this.pool.connect()
		} catch (error) {
			throw toExecutionError(error, statementTimeoutMs)
		}

		let releaseError: Error | undefined
		try {
			await client.query("BEGIN READ ONLY")
			await client.query(`SET LOCAL statement_timeout = ${statementTimeoutMs}`)
			const result = await client.query(sql)

			const truncated = result.rows.length > maxRows
			const rows = truncated ? result.rows.slice(0, maxRows) : result.rows
			const columns = result.fields ? result.fields.map((f) => f.name) : Object.keys(rows[0] ?? {})
			const executionTimeMs = Date.now() - start

			this.logger.info("Query executed", { rows_returned: rows.length, truncated, execution_time_ms: executionTimeMs })

			return { columns, rows, rowCount: rows.length, truncated, executionTimeMs }
		} catch (error) {
			const wrapped = toExecutionError(error, statementTimeoutMs)
			this.logger.error("Query execution failed", { sqlstate: wrapped.context?.sqlstate, message: wrapped.message })
			throw wrapped
		} finally {
			try {
				await client.query("ROLLBACK")
			} catch (rollbackError) {
				// The connection is unusable; have the pool discard it
				releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError))
				this.logger.warn("Rollback failed", { error: releaseError.message })
			}
			client.release(releaseError)
		}
	}

	async close(): Promise<void> {
		await this.pool.end()
	}
}
