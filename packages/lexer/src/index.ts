/**
 * @pushlex/lexer
 *
 * Rule-driven regex lexer: named states of pattern/action rules driven by a
 * state stack, with delegation to other lexers.
 */

// Main class export
export { RegexLexer, type CompiledRule, type CompiledRules } from './lexer'

// Rule building blocks
export { byGroups, emitter, token, using, usingSelf } from './actions'
export { combined, mutator, pop, push, setStack, switchTo } from './mutators'
export { compilePattern, words, type CompiledPattern, type WordsOptions } from './pattern'

// Running
export { formatToken, tokenize, tryTokenize } from './tokenize'
export { LexerState, type RunCursor } from './state'

// Selection
export { pickLexer } from './pick'
export { LexerRegistry } from './registry'

export { TokenType, isTokenType, tokenCategory } from './tokenTypes'
export { lexerConfigSchema, resolveConfig } from './config'
export {
	LexerCompileError,
	LexerError,
	LexerRegistryError,
	LexerRunError,
	isLexerError,
	type LexerCompileErrorCode,
	type LexerErrorCode,
	type LexerErrorDetails,
	type LexerRegistryErrorCode,
	type LexerRunErrorCode,
} from './errors'

// Type exports
export type {
	Action,
	Analyser,
	EmitterFn,
	Lexer,
	LexerConfig,
	LexerConfigInput,
	Mutator,
	MutatorFn,
	Rule,
	Rules,
	Token,
	TokenizeOptions,
	TokenizeResult,
	TokenSink,
} from './types'
