/**
 * Error type shared by the router, the SQL guard and their collaborators.
 *
 * Classification and rewriting never raise for data reasons; validation reports
 * a closed category instead. What remains is programmer error (wrong-typed
 * arguments) and collaborator failure (LLM endpoint, database).
 */

export type ChatRouterErrorType =
	| "input"
	| "classification"
	| "configuration"
	| "validation"
	| "execution"
	| "timeout"

export class ChatRouterError extends Error {
	constructor(
		public type: ChatRouterErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "ChatRouterError"
	}
}

/**
 * Guard for the public entry points. Callers that bypass the type system
 * (JSON tool input, scripts) get an immediate, typed failure.
 */
export function assertString(value: unknown, argument: string): asserts value is string {
	if (typeof value !== "string") {
		throw new ChatRouterError(
			"input",
			`Expected "${argument}" to be a string, got ${value === null ? "null" : typeof value}`,
			false,
			{ argument },
		)
	}
}
