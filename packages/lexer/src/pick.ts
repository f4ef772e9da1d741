import { loggers } from '@pushlex/logger'
import { NO_SCORE } from './consts'
import type { Lexer } from './types'
import { clampScore } from './utils'

const log = loggers.lexer.withTag('pick')

/**
 * Pick the lexer most confident about `text`.
 *
 * Lexers without `analyseText` are ignored. On a tie the earliest lexer
 * wins. Returns undefined when no lexer could be scored.
 */
export const pickLexer = (
	lexers: Iterable<Lexer>,
	text: string
): Lexer | undefined => {
	let picked: Lexer | undefined
	let highest = NO_SCORE

	for (const lexer of lexers) {
		if (!lexer.analyseText) continue
		const score = clampScore(lexer.analyseText(text))
		if (score > highest) {
			highest = score
			picked = lexer
		}
	}

	if (picked) log.debug(`picked "${picked.config.name}" with score ${highest}`)
	return picked
}
