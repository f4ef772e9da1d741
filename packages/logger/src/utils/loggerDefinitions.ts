import type { LoggerScope } from './tags'

type LoggerDefinition = {
	scopes: readonly LoggerScope[]
	enabled: boolean
}

const LOGGER_DEFINITIONS = {
	app: {
		scopes: [],
		enabled: true,
	},
	lexer: {
		scopes: ['lexer'],
		enabled: true,
	},
} as const satisfies Record<string, LoggerDefinition>

type LoggerName = keyof typeof LOGGER_DEFINITIONS

const definitionEntries: [LoggerName, LoggerDefinition][] = [
	['app', LOGGER_DEFINITIONS.app],
	['lexer', LOGGER_DEFINITIONS.lexer],
]

export { LOGGER_DEFINITIONS, definitionEntries }
export type { LoggerDefinition, LoggerName }
