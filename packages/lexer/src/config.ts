import { z } from 'zod'
import { LexerCompileError } from './errors'
import type { LexerConfig, LexerConfigInput } from './types'

const nonEmptyStrings = z.array(z.string().trim().min(1)).readonly().default([])

export const lexerConfigSchema = z.object({
	name: z.string().trim().min(1),
	aliases: nonEmptyStrings,
	filenames: nonEmptyStrings,
	aliasFilenames: nonEmptyStrings,
	mimeTypes: nonEmptyStrings,
	caseInsensitive: z.boolean().default(false),
	dotAll: z.boolean().default(false),
	notMultiline: z.boolean().default(false),
})

/**
 * Validate and freeze a lexer config, filling in defaults
 */
export const resolveConfig = (input: LexerConfigInput): LexerConfig => {
	const result = lexerConfigSchema.safeParse(input)
	if (!result.success) {
		throw new LexerCompileError(
			'invalid-config',
			`Invalid lexer config:\n${z.prettifyError(result.error)}`,
			{ cause: result.error }
		)
	}
	return Object.freeze(result.data)
}
