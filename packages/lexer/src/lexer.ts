/**
 * Regex Lexer
 *
 * Compiles a state → rules map once and runs the state-stack matching loop
 * over it. The compiled tables are never mutated after construction; every
 * `tokenise` call works on its own LexerState.
 */

import { loggers } from '@pushlex/logger'
import { runAction, validateAction } from './actions'
import { resolveConfig } from './config'
import { ROOT_STATE } from './consts'
import { LexerCompileError, LexerRunError } from './errors'
import { applyMutator, validateMutator } from './mutators'
import { compilePattern, type CompiledPattern } from './pattern'
import { LexerState, type RunCursor } from './state'
import { TokenType } from './tokenTypes'
import type {
	Analyser,
	Lexer,
	LexerConfig,
	LexerConfigInput,
	Rule,
	Rules,
	TokenSink,
	TokenizeOptions,
} from './types'
import { codePointAt } from './utils'

const log = loggers.lexer

/**
 * A Rule with its pre-compiled pattern
 */
export type CompiledRule = Rule & {
	readonly compiled: CompiledPattern
}

export type CompiledRules = ReadonlyMap<string, readonly CompiledRule[]>

type RuleMatch = {
	index: number
	rule: CompiledRule
	text: string
	groups: string[]
}

/**
 * First rule matching a non-empty span at `offset`. Empty matches are
 * skipped so every loop iteration consumes input.
 */
const matchRules = (
	rules: readonly CompiledRule[],
	text: string,
	offset: number
): RuleMatch | undefined => {
	for (let index = 0; index < rules.length; index++) {
		const rule = rules[index]
		const groups = rule.compiled.matchAt(text, offset)
		const matched = groups?.[0]
		if (groups && matched) return { index, rule, text: matched, groups }
	}
	return undefined
}

const compileRules = (config: LexerConfig, rules: Rules): CompiledRules => {
	if (!Object.hasOwn(rules, ROOT_STATE)) {
		throw new LexerCompileError(
			'missing-root',
			`Lexer "${config.name}" has no "${ROOT_STATE}" state`,
			{ lexer: config.name }
		)
	}

	const hasState = (state: string) => Object.hasOwn(rules, state)
	const compiled = new Map<string, readonly CompiledRule[]>()

	for (const [state, stateRules] of Object.entries(rules)) {
		const compiledState = stateRules.map((rule): CompiledRule => {
			const pattern = compilePattern(rule.pattern, config, state)
			const check = {
				lexer: config.name,
				state,
				pattern: rule.pattern,
				hasState,
			}
			if (rule.action) {
				validateAction(rule.action, { ...check, groupCount: pattern.groupCount })
			}
			if (rule.mutator) validateMutator(rule.mutator, check)
			return Object.freeze({ ...rule, compiled: pattern })
		})
		compiled.set(state, Object.freeze(compiledState))
	}

	return compiled
}

export class RegexLexer implements Lexer {
	readonly config: LexerConfig
	analyseText?: (text: string) => number

	private readonly rules: CompiledRules

	constructor(config: LexerConfigInput, rules: Rules) {
		this.config = resolveConfig(config)
		this.rules = compileRules(this.config, rules)

		let ruleCount = 0
		for (const stateRules of this.rules.values()) ruleCount += stateRules.length
		log.debug(
			`compiled "${this.config.name}": ${ruleCount} rule(s) in ${this.rules.size} state(s)`
		)
	}

	/**
	 * Build a lexer, throwing LexerCompileError on an invalid config or rule
	 */
	static create(config: LexerConfigInput, rules: Rules): RegexLexer {
		return new RegexLexer(config, rules)
	}

	/**
	 * Attach the content analyser used by lexer selection
	 */
	setAnalyser(analyser: Analyser): this {
		this.analyseText = analyser
		return this
	}

	hasState(state: string): boolean {
		return this.rules.has(state)
	}

	get states(): string[] {
		return [...this.rules.keys()]
	}

	tokenise(text: string, out: TokenSink, options: TokenizeOptions = {}): void {
		const start = options.state ?? ROOT_STATE
		if (!this.rules.has(start)) {
			throw new LexerRunError(
				'unknown-state',
				`Lexer "${this.config.name}" has no "${start}" state to start in`,
				{ lexer: this.config.name, state: start, offset: 0 }
			)
		}

		const cursor: RunCursor = { pos: 0, rule: -1, groups: [] }
		const state = new LexerState(
			text,
			start,
			this.config.name,
			name => this.rules.has(name),
			cursor
		)

		while (cursor.pos < text.length) {
			const active = state.current
			if (active === undefined) break

			const match = matchRules(this.rules.get(active) ?? [], text, cursor.pos)
			if (!match) {
				const unit = codePointAt(text, cursor.pos)
				out({ type: TokenType.Error, value: unit })
				cursor.pos += unit.length
				continue
			}

			const groups = Object.freeze(match.groups)
			cursor.rule = match.index
			cursor.groups = groups
			cursor.pos += match.text.length

			if (match.rule.mutator) applyMutator(match.rule.mutator, state)
			if (match.rule.action) runAction(match.rule.action, groups, this, out, state)
		}
	}
}
