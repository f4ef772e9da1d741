/**
 * Lexer Types
 */

import type { LexerState } from './state'
import type { TokenType } from './tokenTypes'

/**
 * Lexer token output
 */
export type Token = {
	type: TokenType
	value: string
}

export type TokenSink = (token: Token) => void

export type TokenizeOptions = {
	/** State to start in, `root` when omitted */
	state?: string
}

/**
 * Anything that can turn text into tokens
 */
export interface Lexer {
	readonly config: LexerConfig
	tokenise(text: string, out: TokenSink, options?: TokenizeOptions): void
	/**
	 * Confidence in [0, 1] that `text` is in this lexer's language.
	 * Lexers without it take no part in selection.
	 */
	analyseText?: (text: string) => number
}

export type Analyser = (text: string) => number

/**
 * Per-lexer settings as supplied by a grammar author
 */
export type LexerConfigInput = {
	name: string
	aliases?: readonly string[]
	/** File name globs */
	filenames?: readonly string[]
	/** Secondary file name globs, consulted after every lexer's primary globs */
	aliasFilenames?: readonly string[]
	mimeTypes?: readonly string[]
	caseInsensitive?: boolean
	/** `.` matches newlines */
	dotAll?: boolean
	/** `^` and `$` match only at the start and end of the text */
	notMultiline?: boolean
}

export type LexerConfig = Readonly<Required<LexerConfigInput>>

/**
 * Emitter callback: receives the match groups (group 0 is the whole match)
 */
export type EmitterFn = (
	groups: readonly string[],
	lexer: Lexer,
	out: TokenSink,
	state: LexerState
) => void

export type MutatorFn = (state: LexerState) => void

export type Action =
	| { kind: 'token'; type: TokenType }
	| { kind: 'byGroups'; actions: readonly Action[] }
	| { kind: 'using'; lexer: Lexer; state: string | undefined }
	| { kind: 'usingSelf'; state: string }
	| { kind: 'emit'; emit: EmitterFn }

export type Mutator =
	| { kind: 'push'; states: readonly string[] }
	| { kind: 'pop'; depth: number }
	| { kind: 'replace'; state: string }
	| { kind: 'set'; states: readonly string[] }
	| { kind: 'combined'; mutators: readonly Mutator[] }
	| { kind: 'mutate'; mutate: MutatorFn }

export type Rule = {
	pattern: string
	action?: Action
	mutator?: Mutator
}

/**
 * State machine transition map: state name → ordered rules
 */
export type Rules = Readonly<Record<string, readonly Rule[]>>

export type TokenizeResult =
	| { succeeded: true; tokens: Token[] }
	| { succeeded: false; tokens: Token[]; error: Error }
