/**
 * Lexer Utility Functions
 */

import { MAX_SCORE, MIN_SCORE, REGEX_META } from './consts'

/**
 * The single code point starting at `offset` (two UTF-16 units for astral characters)
 */
export const codePointAt = (text: string, offset: number): string => {
	const codePoint = text.codePointAt(offset)
	if (codePoint === undefined) return ''
	return String.fromCodePoint(codePoint)
}

/**
 * Escape regex metacharacters so `value` matches itself
 */
export const escapeRegExp = (value: string): string =>
	value.replace(REGEX_META, '\\$&')

/**
 * Clamp a confidence score into [0, 1]; NaN stays NaN so it never wins a comparison
 */
export const clampScore = (score: number): number =>
	Math.min(MAX_SCORE, Math.max(MIN_SCORE, score))
