/**
 * Lexer Errors
 *
 * Compile errors are raised while a lexer is built, so no instance exists.
 * Run errors abort a single `tokenise` call and leave the lexer usable.
 * Registry errors reject a lexer at registration.
 */

export type LexerCompileErrorCode =
	| 'invalid-config'
	| 'missing-root'
	| 'invalid-pattern'
	| 'group-count'
	| 'unknown-state'
	| 'invalid-mutator'

export type LexerRunErrorCode =
	| 'unknown-state'
	| 'stack-underflow'
	| 'invalid-mutator'
	| 'delegation'
	| 'callback'

export type LexerRegistryErrorCode = 'name-taken' | 'invalid-glob'

export type LexerErrorCode = LexerCompileErrorCode | LexerRunErrorCode | LexerRegistryErrorCode

export type LexerErrorDetails = {
	/** Lexer name from its config */
	lexer?: string
	/** State the failing rule or transition belongs to */
	state?: string
	pattern?: string
	/** Scan offset at the time of a run error */
	offset?: number
	cause?: unknown
}

export abstract class LexerError extends Error {
	abstract readonly code: LexerErrorCode
	readonly lexer: string | undefined
	readonly state: string | undefined
	readonly pattern: string | undefined
	readonly offset: number | undefined

	constructor(message: string, details: LexerErrorDetails = {}) {
		super(message, { cause: details.cause })
		this.lexer = details.lexer
		this.state = details.state
		this.pattern = details.pattern
		this.offset = details.offset
	}
}

export class LexerCompileError extends LexerError {
	constructor(
		readonly code: LexerCompileErrorCode,
		message: string,
		details?: LexerErrorDetails
	) {
		super(message, details)
		this.name = 'LexerCompileError'
	}
}

export class LexerRunError extends LexerError {
	constructor(
		readonly code: LexerRunErrorCode,
		message: string,
		details?: LexerErrorDetails
	) {
		super(message, details)
		this.name = 'LexerRunError'
	}
}

/**
 * Raised by LexerRegistry when a lexer cannot be added
 */
export class LexerRegistryError extends LexerError {
	constructor(
		readonly code: LexerRegistryErrorCode,
		message: string,
		details?: LexerErrorDetails
	) {
		super(message, details)
		this.name = 'LexerRegistryError'
	}
}

export const isLexerError = (error: unknown): error is LexerError =>
	error instanceof LexerError
