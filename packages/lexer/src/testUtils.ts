import type { Token } from './types'
import type { TokenType } from './tokenTypes'

/**
 * Error thrown by `fn`; fails when nothing is thrown
 */
export const thrownBy = (fn: () => unknown): unknown => {
	try {
		fn()
	} catch (error) {
		return error
	}
	throw new Error('Expected the call to throw')
}

export const tok = (type: TokenType, value: string): Token => ({ type, value })
