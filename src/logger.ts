/**
 * Minimal structured logger.
 *
 * Writes to stderr: stdout is reserved for the MCP stdio protocol.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export interface Logger {
	debug(message: string, data?: Record<string, unknown>): void
	info(message: string, data?: Record<string, unknown>): void
	warn(message: string, data?: Record<string, unknown>): void
	error(message: string, data?: Record<string, unknown>): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value)
}

export function formatLogLine(level: LogLevel, message: string, data?: Record<string, unknown>): string {
	const prefix = `[${level.toUpperCase()}]`
	if (!data || Object.keys(data).length === 0) {
		return `${prefix} ${message}`
	}
	return `${prefix} ${message} ${JSON.stringify(data)}`
}

export function createStderrLogger(
	level: LogLevel = "info",
	write: (line: string) => void = (line) => console.error(line),
): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (lvl: LogLevel) => (message: string, data?: Record<string, unknown>) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		write(formatLogLine(lvl, message, data))
	}

	return {
		debug: emit("debug"),
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
	}
}

export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
