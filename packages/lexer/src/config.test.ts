import { describe, expect, test } from 'vitest'
import { resolveConfig } from './config'
import { LexerCompileError } from './errors'
import { thrownBy } from './testUtils'

describe('resolveConfig', () => {
	test('fills in defaults and freezes the result', () => {
		const config = resolveConfig({ name: 'Test' })
		expect(config).toEqual({
			name: 'Test',
			aliases: [],
			filenames: [],
			aliasFilenames: [],
			mimeTypes: [],
			caseInsensitive: false,
			dotAll: false,
			notMultiline: false,
		})
		expect(Object.isFrozen(config)).toBe(true)
	})

	test('trims identity fields', () => {
		const config = resolveConfig({ name: ' Go ', aliases: [' golang'] })
		expect(config.name).toBe('Go')
		expect(config.aliases).toEqual(['golang'])
	})

	test('rejects an empty name', () => {
		const error = thrownBy(() => resolveConfig({ name: '' }))
		expect(error).toBeInstanceOf(LexerCompileError)
		expect(error).toMatchObject({ code: 'invalid-config' })
		expect(error instanceof Error && error.message).toMatch(/^Invalid lexer config:\n/)
	})

	test('rejects blank globs', () => {
		expect(thrownBy(() => resolveConfig({ name: 'X', filenames: ['*.x', ' '] }))).toMatchObject({
			code: 'invalid-config',
		})
	})
})
