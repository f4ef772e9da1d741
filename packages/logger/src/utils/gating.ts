import type { ConsolaInstance } from './consola'
import { isLoggerEnabled } from './toggles'

type LoggerFactory = (tag: string) => ConsolaInstance

const GATED_METHODS = new Set([
	'trace',
	'debug',
	'info',
	'log',
	'success',
	'warn',
	'error',
	'fatal',
	'ready',
	'start',
	'box',
])

/**
 * Wraps a tagged consola instance so its log methods respect the toggle
 * registry, and so `withTag` yields another gated logger.
 */
const createGatedLogger = (
	instance: ConsolaInstance,
	tag: string,
	createOrGetLogger: LoggerFactory
): ConsolaInstance =>
	new Proxy(instance, {
		get(target, prop, receiver) {
			if (prop === 'withTag') {
				return (childTag: string) => {
					const normalizedChild = childTag.trim()
					if (!normalizedChild) {
						throw new Error('logger.withTag requires a non-empty tag.')
					}
					return createOrGetLogger(`${tag}:${normalizedChild}`)
				}
			}

			const value: unknown = Reflect.get(target, prop, receiver)
			if (typeof value !== 'function') return value

			if (typeof prop === 'string' && GATED_METHODS.has(prop)) {
				return (...args: unknown[]) => {
					if (!isLoggerEnabled(tag)) return undefined
					return value.apply(target, args)
				}
			}

			return value.bind(target)
		},
	})

export { createGatedLogger }
