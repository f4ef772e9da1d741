/**
 * Action Model
 *
 * Built-in emitters plus a callback escape hatch. Actions run after the
 * rule's mutator, with the run state that mutator just changed.
 */

import { ROOT_STATE } from './consts'
import { LexerCompileError, LexerRunError, isLexerError } from './errors'
import type { LexerState } from './state'
import type { TokenType } from './tokenTypes'
import type { Action, EmitterFn, Lexer, TokenSink } from './types'

export const token = (type: TokenType): Action => ({ kind: 'token', type })

/**
 * Apply one action per capture group: action i handles group i + 1
 */
export const byGroups = (...actions: Action[]): Action => ({
	kind: 'byGroups',
	actions,
})

/**
 * Tokenise the whole match with another lexer
 */
export const using = (lexer: Lexer, state?: string): Action => ({
	kind: 'using',
	lexer,
	state,
})

/**
 * Tokenise the whole match with the owning lexer, starting from `state`
 */
export const usingSelf = (state: string): Action => ({ kind: 'usingSelf', state })

export const emitter = (emit: EmitterFn): Action => ({ kind: 'emit', emit })

type ActionCheck = {
	lexer: string
	state: string
	pattern: string
	groupCount: number
	hasState: (state: string) => boolean
}

/**
 * Construction-time contract checks for an action attached to a rule
 */
export const validateAction = (action: Action, check: ActionCheck): void => {
	const { lexer, state, pattern } = check
	switch (action.kind) {
		case 'byGroups': {
			if (action.actions.length !== check.groupCount) {
				throw new LexerCompileError(
					'group-count',
					`byGroups in state "${state}" has ${action.actions.length} action(s) for ${check.groupCount} capture group(s) in ${JSON.stringify(pattern)}`,
					{ lexer, state, pattern }
				)
			}
			// each sub-action sees a single group, which has no captures of its own
			for (const sub of action.actions) {
				validateAction(sub, { ...check, groupCount: 0 })
			}
			return
		}
		case 'usingSelf': {
			if (!check.hasState(action.state)) {
				throw new LexerCompileError(
					'unknown-state',
					`usingSelf in state "${state}" targets unknown state "${action.state}"`,
					{ lexer, state, pattern }
				)
			}
			return
		}
		case 'token':
		case 'using':
		case 'emit':
			return
	}
}

const delegate = (
	target: Lexer,
	targetState: string,
	text: string,
	out: TokenSink,
	state: LexerState
): void => {
	try {
		target.tokenise(text, out, { state: targetState })
	} catch (error) {
		throw new LexerRunError(
			'delegation',
			`Delegated tokenisation with "${target.config.name}" from state "${targetState}" failed: ${error instanceof Error ? error.message : String(error)}`,
			{ lexer: target.config.name, state: state.current, offset: state.pos, cause: error }
		)
	}
}

export const runAction = (
	action: Action,
	groups: readonly string[],
	lexer: Lexer,
	out: TokenSink,
	state: LexerState
): void => {
	const [whole = ''] = groups
	switch (action.kind) {
		case 'token': {
			if (whole) out({ type: action.type, value: whole })
			return
		}
		case 'byGroups': {
			action.actions.forEach((sub, index) => {
				runAction(sub, [groups[index + 1] ?? ''], lexer, out, state)
			})
			return
		}
		case 'using': {
			delegate(action.lexer, action.state ?? ROOT_STATE, whole, out, state)
			return
		}
		case 'usingSelf': {
			delegate(lexer, action.state, whole, out, state)
			return
		}
		case 'emit': {
			try {
				action.emit(groups, lexer, out, state)
			} catch (error) {
				if (isLexerError(error)) throw error
				throw new LexerRunError(
					'callback',
					`Emitter in state "${state.current}" failed: ${error instanceof Error ? error.message : String(error)}`,
					{ lexer: lexer.config.name, state: state.current, offset: state.pos, cause: error }
				)
			}
			return
		}
	}
}
