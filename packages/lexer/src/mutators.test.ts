import { describe, expect, test } from 'vitest'
import { emitter, token } from './actions'
import { LexerCompileError, LexerRunError } from './errors'
import {
	applyMutator,
	combined,
	mutator,
	pop,
	push,
	setStack,
	switchTo,
	validateMutator,
} from './mutators'
import { RegexLexer } from './lexer'
import { LexerState, type RunCursor } from './state'
import { thrownBy } from './testUtils'
import { tokenize } from './tokenize'
import { TokenType } from './tokenTypes'

const known = new Set(['root', 'a', 'b'])
const newState = (cursor?: RunCursor) =>
	new LexerState('text', 'root', 'Test', state => known.has(state), cursor)
const check = { lexer: 'Test', state: 'root', pattern: 'x', hasState: (s: string) => known.has(s) }

describe('LexerState', () => {
	test('starts with the given state alone on the stack', () => {
		const state = newState()
		expect(state.states).toEqual(['root'])
		expect(state.depth).toBe(1)
		expect(state.current).toBe('root')
		expect(state.pos).toBe(0)
	})

	test('hands out stack snapshots', () => {
		const state = newState()
		const before = state.states
		state.push('a')
		expect(before).toEqual(['root'])
		expect(state.states).toEqual(['root', 'a'])
	})

	test('refuses to pop more than the stack holds', () => {
		const state = newState({ pos: 3, rule: 0, groups: ['te'] })
		const error = thrownBy(() => state.pop(2))
		expect(error).toBeInstanceOf(LexerRunError)
		expect(error).toMatchObject({ code: 'stack-underflow', offset: 3, lexer: 'Test' })
		expect(state.states).toEqual(['root'])
	})

	test('refuses pop depths that are not positive integers', () => {
		for (const depth of [0, -1, 0.5, Number.NaN]) {
			const state = newState()
			const error = thrownBy(() => state.pop(depth))
			expect(error).toBeInstanceOf(LexerRunError)
			expect(error).toMatchObject({
				code: 'invalid-mutator',
				message: `Cannot pop ${depth} state(s); depth must be a positive integer`,
			})
			expect(state.states).toEqual(['root'])
		}
	})

	test('reads position and match from the cursor', () => {
		const cursor: RunCursor = { pos: 0, rule: -1, groups: [] }
		const state = newState(cursor)
		cursor.pos = 2
		cursor.rule = 1
		cursor.groups = ['te']
		expect(state.pos).toBe(2)
		expect(state.rule).toBe(1)
		expect(state.groups).toEqual(['te'])
	})

	test('cannot replace the top of an empty stack', () => {
		const state = newState()
		state.pop()
		expect(state.current).toBeUndefined()
		expect(thrownBy(() => state.replaceTop('a'))).toMatchObject({
			code: 'stack-underflow',
			message: 'Cannot replace the top of an empty stack with "a"',
		})
	})

	test('refuses unknown states without changing the stack', () => {
		const state = newState()
		expect(thrownBy(() => state.push('a', 'zzz'))).toMatchObject({
			code: 'unknown-state',
			state: 'zzz',
		})
		expect(state.states).toEqual(['root'])
	})
})

describe('applyMutator', () => {
	test('pushes states in order', () => {
		const state = newState()
		applyMutator(push('a', 'b'), state)
		expect(state.states).toEqual(['root', 'a', 'b'])
	})

	test('re-pushes the active state when given none', () => {
		const state = newState()
		applyMutator(push('a'), state)
		applyMutator(push(), state)
		expect(state.states).toEqual(['root', 'a', 'a'])
	})

	test('pops several states at once', () => {
		const state = newState()
		applyMutator(setStack('root', 'a', 'b'), state)
		applyMutator(pop(2), state)
		expect(state.states).toEqual(['root'])
	})

	test('replaces the top entry', () => {
		const state = newState()
		applyMutator(push('a'), state)
		applyMutator(switchTo('b'), state)
		expect(state.states).toEqual(['root', 'b'])
	})

	test('applies combined mutators in order', () => {
		const state = newState()
		applyMutator(combined(pop(), push('a', 'b'), switchTo('root')), state)
		expect(state.states).toEqual(['a', 'root'])
	})

	test('runs custom mutators against the live state', () => {
		const state = newState()
		applyMutator(
			mutator(s => {
				if (s.current === 'root') s.push('b')
			}),
			state
		)
		expect(state.current).toBe('b')
	})

	test('wraps plain errors from custom mutators', () => {
		const error = thrownBy(() =>
			applyMutator(
				mutator(() => {
					throw new TypeError('bad')
				}),
				newState()
			)
		)
		expect(error).toBeInstanceOf(LexerRunError)
		expect(error).toMatchObject({
			code: 'callback',
			message: 'Mutator in state "root" failed: bad',
		})
	})
})

describe('custom mutators in a run', () => {
	test('fail the run on a negative pop instead of ending it', () => {
		const lexer = RegexLexer.create(
			{ name: 'Negative' },
			{ root: [{ pattern: 'a', action: token(TokenType.Text), mutator: mutator(s => s.pop(-1)) }] }
		)
		const error = thrownBy(() => tokenize(lexer, 'aaaa'))
		expect(error).toBeInstanceOf(LexerRunError)
		expect(error).toMatchObject({ code: 'invalid-mutator', lexer: 'Negative', offset: 1 })
	})

	test('cannot move the scan position or replace the match', () => {
		let rewinds = 0
		const seen: string[] = []
		const lexer = RegexLexer.create(
			{ name: 'Rewind' },
			{
				root: [
					{
						pattern: '[a-z]',
						action: emitter(groups => {
							seen.push(groups[0])
						}),
						mutator: mutator(s => {
							rewinds += 1
							Reflect.set(s, 'pos', 0)
							Reflect.set(s, 'groups', ['zz'])
							Reflect.set(s.groups, 0, 'zz')
						}),
					},
				],
			}
		)
		tokenize(lexer, 'ab')
		expect(rewinds).toBe(2)
		expect(seen).toEqual(['a', 'b'])
	})
})

describe('validateMutator', () => {
	test('accepts known targets', () => {
		expect(() => validateMutator(combined(push('a'), switchTo('b'), pop()), check)).not.toThrow()
	})

	test('finds unknown targets inside combined mutators', () => {
		const error = thrownBy(() => validateMutator(combined(pop(), setStack('root', 'c')), check))
		expect(error).toBeInstanceOf(LexerCompileError)
		expect(error).toMatchObject({
			code: 'unknown-state',
			message: 'Rule "x" in state "root" transitions to unknown state "c"',
		})
	})

	test('requires a positive integer pop depth', () => {
		expect(thrownBy(() => validateMutator(combined(pop(1.5)), check))).toMatchObject({
			code: 'invalid-mutator',
			message:
				'Rule "x" in state "root" pops 1.5 state(s); depth must be a positive integer',
		})
	})
})
