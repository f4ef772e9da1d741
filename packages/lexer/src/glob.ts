import { escapeRegExp } from './utils'

/**
 * Compile a file name glob: `*` matches any run of characters, `?` one
 * character, `[...]` one character of a class (`a-z` ranges, `!` or `^`
 * negates), everything else itself. A `[` without a closing `]` is literal.
 * Throws a SyntaxError for a class with a reversed range such as `[z-a]`.
 */
export function globToRegExp(pattern: string): RegExp {
	const chars = Array.from(pattern)
	let regex = ''
	for (let i = 0; i < chars.length; i += 1) {
		const char = chars[i] ?? ''

		if (char === '*') {
			regex += '.*'
			continue
		}

		if (char === '?') {
			regex += '.'
			continue
		}

		if (char === '[') {
			const end = classEnd(chars, i)
			if (end !== -1) {
				regex += charClass(chars.slice(i + 1, end))
				i = end
				continue
			}
		}

		regex += escapeRegExp(char)
	}

	return new RegExp(`^${regex}$`)
}

const isNegation = (char: string | undefined) => char === '!' || char === '^'

/**
 * Index of the `]` closing the class opened at `open`, or -1. A `]` right
 * after the opening (or its negation) belongs to the class.
 */
const classEnd = (chars: readonly string[], open: number): number => {
	let i = open + 1
	if (isNegation(chars[i])) i += 1
	if (chars[i] === ']') i += 1
	return chars.indexOf(']', i)
}

const charClass = (body: readonly string[]): string => {
	const negate = isNegation(body[0])
	const members = (negate ? body.slice(1) : body)
		.map(char => (char === '\\' || char === ']' || char === '[' || char === '^' ? `\\${char}` : char))
		.join('')
	return `[${negate ? '^' : ''}${members}]`
}
