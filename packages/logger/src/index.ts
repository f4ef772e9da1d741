export { createLogger, loggers, getLogger, logger } from './utils/loggers'
export type { Logger, LoggerKey, LoggerMap } from './utils/loggers'

export {
	configureLoggers,
	getRegisteredLoggers,
	isLoggerEnabled,
	setLoggerEnabled,
} from './utils/toggles'
export type { LoggerRegistryEntry } from './utils/toggles'

export { buildTag } from './utils/tags'
export type { LoggerScope } from './utils/tags'

export { defaultLogLevel, loggerEnv, parseLoggerEnv } from './env'
export type { LoggerEnv } from './env'
