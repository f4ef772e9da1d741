/**
 * Lexer Constants
 */

export const ROOT_STATE = 'root'

export const MIN_SCORE = 0
export const MAX_SCORE = 1

// Best-so-far seed for selection; below any clamped score
export const NO_SCORE = -1

// Characters that must be escaped to match literally in a pattern
export const REGEX_META = /[\\^$*+?.()|[\]{}]/g
