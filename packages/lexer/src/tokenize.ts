import type { Lexer, Token, TokenizeOptions, TokenizeResult } from './types'

/**
 * Tokenise text, collecting the tokens into an array
 */
export const tokenize = (
	lexer: Lexer,
	text: string,
	options?: TokenizeOptions
): Token[] => {
	const tokens: Token[] = []
	lexer.tokenise(text, token => tokens.push(token), options)
	return tokens
}

/**
 * Like `tokenize`, but a run error is returned alongside the tokens emitted
 * before it instead of being thrown
 */
export const tryTokenize = (
	lexer: Lexer,
	text: string,
	options?: TokenizeOptions
): TokenizeResult => {
	const tokens: Token[] = []
	try {
		lexer.tokenise(text, token => tokens.push(token), options)
	} catch (error) {
		if (error instanceof Error) return { succeeded: false, tokens, error }
		throw error
	}
	return { succeeded: true, tokens }
}

export const formatToken = (token: Token): string =>
	`Token{${token.type}, ${JSON.stringify(token.value)}}`
