/**
 * Lexer Registry
 *
 * Looks lexers up by the identity metadata in their configs. Matching never
 * depends on it; only callers choosing a lexer do.
 */

import { loggers } from '@pushlex/logger'
import { LexerRegistryError } from './errors'
import { baseName, globToRegExp } from './glob'
import { pickLexer } from './pick'
import type { Lexer } from './types'

const log = loggers.lexer.withTag('registry')

type GlobEntry = {
	lexer: Lexer
	glob: RegExp
}

const compileGlob = (lexer: string, glob: string): RegExp => {
	try {
		return globToRegExp(glob)
	} catch (error) {
		throw new LexerRegistryError(
			'invalid-glob',
			`Invalid file name glob ${JSON.stringify(glob)} for "${lexer}": ${error instanceof Error ? error.message : String(error)}`,
			{ lexer, pattern: glob, cause: error }
		)
	}
}

export class LexerRegistry {
	private readonly lexers: Lexer[] = []
	private readonly byName = new Map<string, Lexer>()
	private readonly primaryGlobs: GlobEntry[] = []
	private readonly secondaryGlobs: GlobEntry[] = []

	constructor(lexers: Iterable<Lexer> = []) {
		for (const lexer of lexers) this.register(lexer)
	}

	/**
	 * Add a lexer under its name and aliases (case-insensitive). Nothing is
	 * registered when a key is taken or a glob does not compile.
	 */
	register(lexer: Lexer): this {
		const { name, aliases, filenames, aliasFilenames } = lexer.config
		const keys = [name, ...aliases].map(key => key.toLowerCase())

		for (const key of keys) {
			const existing = this.byName.get(key)
			if (existing) {
				throw new LexerRegistryError(
					'name-taken',
					`Cannot register "${name}": "${key}" is already taken by "${existing.config.name}"`,
					{ lexer: name }
				)
			}
		}

		const primary = filenames.map(glob => ({ lexer, glob: compileGlob(name, glob) }))
		const secondary = aliasFilenames.map(glob => ({
			lexer,
			glob: compileGlob(name, glob),
		}))

		for (const key of keys) this.byName.set(key, lexer)
		this.lexers.push(lexer)
		this.primaryGlobs.push(...primary)
		this.secondaryGlobs.push(...secondary)

		log.debug(`registered "${name}"`)
		return this
	}

	get(nameOrAlias: string): Lexer | undefined {
		return this.byName.get(nameOrAlias.toLowerCase())
	}

	all(): readonly Lexer[] {
		return [...this.lexers]
	}

	/**
	 * Lexer for a file path: primary globs of every lexer first, then secondary ones
	 */
	match(filename: string): Lexer | undefined {
		const name = baseName(filename)
		const primary = this.primaryGlobs.find(entry => entry.glob.test(name))
		if (primary) return primary.lexer
		return this.secondaryGlobs.find(entry => entry.glob.test(name))?.lexer
	}

	matchMimeType(mimeType: string): Lexer | undefined {
		const wanted = mimeType.trim().toLowerCase()
		return this.lexers.find(lexer =>
			lexer.config.mimeTypes.some(mime => mime.toLowerCase() === wanted)
		)
	}

	/**
	 * Pick a lexer by content among every registered lexer
	 */
	analyse(text: string): Lexer | undefined {
		return pickLexer(this.lexers, text)
	}
}
