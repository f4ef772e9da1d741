import { createConsola, type ConsolaInstance } from 'consola'
import { defaultLogLevel, loggerEnv } from '../env'

const consola = createConsola({
	fancy: true,
	level: defaultLogLevel(loggerEnv),
})

export { consola }
export type { ConsolaInstance }
