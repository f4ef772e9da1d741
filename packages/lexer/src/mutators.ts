/**
 * State Mutators
 */

import { LexerCompileError, LexerRunError, isLexerError } from './errors'
import type { LexerState } from './state'
import type { Mutator, MutatorFn } from './types'

/**
 * Push states in order; with none, re-push the active state
 */
export const push = (...states: string[]): Mutator => ({ kind: 'push', states })

export const pop = (depth = 1): Mutator => ({ kind: 'pop', depth })

/** Replace the active state */
export const switchTo = (state: string): Mutator => ({ kind: 'replace', state })

/** Replace the whole stack */
export const setStack = (...states: string[]): Mutator => ({ kind: 'set', states })

export const combined = (...mutators: Mutator[]): Mutator => ({
	kind: 'combined',
	mutators,
})

export const mutator = (mutate: MutatorFn): Mutator => ({ kind: 'mutate', mutate })

type MutatorCheck = {
	lexer: string
	state: string
	pattern: string
	hasState: (state: string) => boolean
}

const namedTargets = (mutation: Mutator): readonly string[] => {
	switch (mutation.kind) {
		case 'push':
		case 'set':
			return mutation.states
		case 'replace':
			return [mutation.state]
		case 'combined':
			return mutation.mutators.flatMap(namedTargets)
		case 'pop':
		case 'mutate':
			return []
	}
}

const invalidPops = (mutation: Mutator): number[] => {
	switch (mutation.kind) {
		case 'pop':
			return Number.isInteger(mutation.depth) && mutation.depth >= 1
				? []
				: [mutation.depth]
		case 'combined':
			return mutation.mutators.flatMap(invalidPops)
		default:
			return []
	}
}

export const validateMutator = (mutation: Mutator, check: MutatorCheck): void => {
	const { lexer, state, pattern } = check
	for (const target of namedTargets(mutation)) {
		if (!check.hasState(target)) {
			throw new LexerCompileError(
				'unknown-state',
				`Rule ${JSON.stringify(pattern)} in state "${state}" transitions to unknown state "${target}"`,
				{ lexer, state, pattern }
			)
		}
	}
	const [badDepth] = invalidPops(mutation)
	if (badDepth !== undefined) {
		throw new LexerCompileError(
			'invalid-mutator',
			`Rule ${JSON.stringify(pattern)} in state "${state}" pops ${badDepth} state(s); depth must be a positive integer`,
			{ lexer, state, pattern }
		)
	}
}

export const applyMutator = (mutation: Mutator, state: LexerState): void => {
	switch (mutation.kind) {
		case 'push': {
			const active = state.current
			if (mutation.states.length > 0) state.push(...mutation.states)
			else if (active !== undefined) state.push(active)
			return
		}
		case 'pop':
			state.pop(mutation.depth)
			return
		case 'replace':
			state.replaceTop(mutation.state)
			return
		case 'set':
			state.setStack(mutation.states)
			return
		case 'combined':
			for (const inner of mutation.mutators) applyMutator(inner, state)
			return
		case 'mutate': {
			try {
				mutation.mutate(state)
			} catch (error) {
				if (isLexerError(error)) throw error
				throw new LexerRunError(
					'callback',
					`Mutator in state "${state.current}" failed: ${error instanceof Error ? error.message : String(error)}`,
					{ lexer: state.lexerName, state: state.current, offset: state.pos, cause: error }
				)
			}
			return
		}
	}
}
