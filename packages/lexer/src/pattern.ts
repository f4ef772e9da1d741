/**
 * Pattern Compiler
 *
 * Rule patterns are compiled once into sticky regexes, so a match can only
 * begin at the offset it is attempted at.
 */

import { LexerCompileError } from './errors'
import type { LexerConfig } from './types'
import { escapeRegExp } from './utils'

export type CompiledPattern = {
	readonly source: string
	readonly flags: string
	/** Number of capturing groups in the pattern */
	readonly groupCount: number
	/**
	 * Groups of a match starting exactly at `offset`, or undefined.
	 * Groups that did not take part in the match are ''.
	 */
	matchAt(text: string, offset: number): string[] | undefined
}

type PatternFlags = Pick<LexerConfig, 'caseInsensitive' | 'dotAll' | 'notMultiline'>

export const patternFlags = (config: PatternFlags): string => {
	let flags = ''
	if (!config.notMultiline) flags += 'm'
	if (config.caseInsensitive) flags += 'i'
	if (config.dotAll) flags += 's'
	return flags
}

const countGroups = (source: string, flags: string): number => {
	// An empty alternative always matches, exposing every group slot
	const probe = new RegExp(`${source}|`, flags).exec('')
	return probe ? probe.length - 1 : 0
}

export const compilePattern = (
	pattern: string,
	config: PatternFlags & { name?: string },
	state: string
): CompiledPattern => {
	const source = `(?:${pattern})`
	const flags = patternFlags(config)

	let regex: RegExp
	try {
		regex = new RegExp(source, `${flags}y`)
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new LexerCompileError(
			'invalid-pattern',
			`Invalid pattern ${JSON.stringify(pattern)} in state "${state}": ${reason}`,
			{ lexer: config.name, state, pattern, cause: error }
		)
	}

	const groupCount = countGroups(source, flags)

	return {
		source,
		flags: regex.flags,
		groupCount,
		matchAt(text, offset) {
			// shared by nested runs: lastIndex is reset before every exec
			regex.lastIndex = offset
			const match = regex.exec(text)
			if (!match) return undefined
			return Array.from(match, group => group ?? '')
		},
	}
}

export type WordsOptions = {
	prefix?: string
	suffix?: string
}

/**
 * Pattern matching any of the given literal words
 */
export const words = (
	list: readonly string[],
	{ prefix = '\\b', suffix = '\\b' }: WordsOptions = {}
): string => `${prefix}(?:${list.map(escapeRegExp).join('|')})${suffix}`
