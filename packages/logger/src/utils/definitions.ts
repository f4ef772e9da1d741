import {
	LOGGER_DEFINITIONS,
	definitionEntries,
	type LoggerDefinition,
	type LoggerName,
} from './loggerDefinitions'
import { buildTag } from './tags'

const defaultLoggerVisibility = new Map<string, boolean>()

for (const [name, definition] of definitionEntries) {
	const tag = buildTag(definition.scopes)
	if (defaultLoggerVisibility.has(tag)) {
		throw new Error(
			`Logger "${name}" reuses the tag "${tag}". Each definition needs its own scopes.`
		)
	}
	defaultLoggerVisibility.set(tag, definition.enabled)
}

export { LOGGER_DEFINITIONS, definitionEntries, defaultLoggerVisibility }
export type { LoggerDefinition, LoggerName }
