import { LexerRunError } from './errors'

/**
 * Scan position and last match of a run. Only the matching loop writes it.
 */
export type RunCursor = {
	pos: number
	rule: number
	groups: readonly string[]
}

/**
 * Mutable state of a single `tokenise` call.
 *
 * Mutators and custom emitters receive this object by reference, so a
 * transition applied by a rule is visible to that rule's own action. They
 * may change the stack but not the scan position or the match.
 */
export class LexerState {
	private readonly stack: string[]

	constructor(
		readonly text: string,
		start: string,
		readonly lexerName: string,
		private readonly hasState: (state: string) => boolean,
		private readonly cursor: RunCursor = { pos: 0, rule: -1, groups: [] }
	) {
		this.stack = [start]
	}

	/** Scan offset into `text` */
	get pos(): number {
		return this.cursor.pos
	}

	/** Index of the last matched rule within its state */
	get rule(): number {
		return this.cursor.rule
	}

	/** Groups of the last match; group 0 is the whole match */
	get groups(): readonly string[] {
		return this.cursor.groups
	}

	get depth(): number {
		return this.stack.length
	}

	/** Active state, or undefined once the stack is empty */
	get current(): string | undefined {
		return this.stack[this.stack.length - 1]
	}

	/** Snapshot of the stack, bottom first */
	get states(): readonly string[] {
		return [...this.stack]
	}

	push(...states: string[]): void {
		for (const state of states) this.assertKnown(state)
		this.stack.push(...states)
	}

	pop(depth = 1): void {
		if (!Number.isInteger(depth) || depth < 1) {
			throw new LexerRunError(
				'invalid-mutator',
				`Cannot pop ${depth} state(s); depth must be a positive integer`,
				this.details()
			)
		}
		if (depth > this.stack.length) {
			throw new LexerRunError(
				'stack-underflow',
				`Cannot pop ${depth} state(s) from a stack of ${this.stack.length}`,
				this.details()
			)
		}
		this.stack.length -= depth
	}

	replaceTop(state: string): void {
		this.assertKnown(state)
		if (this.stack.length === 0) {
			throw new LexerRunError(
				'stack-underflow',
				`Cannot replace the top of an empty stack with "${state}"`,
				this.details()
			)
		}
		this.stack[this.stack.length - 1] = state
	}

	setStack(states: readonly string[]): void {
		for (const state of states) this.assertKnown(state)
		this.stack.splice(0, this.stack.length, ...states)
	}

	private assertKnown(state: string): void {
		if (this.hasState(state)) return
		throw new LexerRunError('unknown-state', `Unknown state "${state}"`, {
			...this.details(),
			state,
		})
	}

	private details() {
		return { lexer: this.lexerName, state: this.current, offset: this.pos }
	}
}
