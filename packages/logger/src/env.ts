import { z } from 'zod'

type EnvRecord = Record<string, string | undefined>

const getProcessEnv = (): EnvRecord => {
	if (typeof process === 'undefined') return {}
	return process.env ?? {}
}

const parseLevel = (value: unknown): number | undefined => {
	if (typeof value === 'number') return value
	if (typeof value === 'string' && value.trim().length > 0) {
		const parsed = Number.parseInt(value, 10)
		return Number.isNaN(parsed) ? undefined : parsed
	}
	return undefined
}

const envSchema = z.object({
	LOGGER_LEVEL: z
		.preprocess(parseLevel, z.number().int().min(0).max(5))
		.optional(),
	NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
})

export type LoggerEnv = {
	nodeEnv: 'development' | 'production' | 'test'
	isDev: boolean
	loggerLevel: number | undefined
}

export const parseLoggerEnv = (env: EnvRecord): LoggerEnv => {
	const result = envSchema.safeParse(env)
	if (!result.success) {
		throw new Error(z.prettifyError(result.error))
	}

	const nodeEnv = result.data.NODE_ENV ?? 'development'
	return {
		nodeEnv,
		isDev: nodeEnv === 'development',
		loggerLevel: result.data.LOGGER_LEVEL,
	}
}

export const loggerEnv = parseLoggerEnv(getProcessEnv())

/**
 * consola level used when LOGGER_LEVEL is unset: debug while developing, info otherwise
 */
export const defaultLogLevel = (env: LoggerEnv): number =>
	env.loggerLevel ?? (env.isDev ? 4 : 3)
