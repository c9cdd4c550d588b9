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
 * registry, and `withTag` produces registered child loggers.
 */
const createGatedLogger = (
	instance: ConsolaInstance,
	tag: string,
	createOrGetLogger: LoggerFactory
): ConsolaInstance => {
	return new Proxy(instance, {
		get(target, prop, receiver) {
			if (prop === 'withTag') {
				return (childTag: unknown) => {
					if (typeof childTag !== 'string') {
						throw new Error(
							`logger.withTag expects a string, received "${typeof childTag}".`
						)
					}
					const normalizedChild = childTag.trim()
					if (!normalizedChild) {
						throw new Error('logger.withTag requires a non-empty tag.')
					}
					return createOrGetLogger(`${tag}:${normalizedChild}`)
				}
			}

			const value: unknown = Reflect.get(target, prop, receiver)
			if (
				typeof prop === 'string' &&
				typeof value === 'function' &&
				GATED_METHODS.has(prop)
			) {
				return (...args: unknown[]) => {
					if (!isLoggerEnabled(tag)) {
						return receiver
					}
					return value.apply(target, args)
				}
			}

			return typeof value === 'function' ? value.bind(target) : value
		},
	})
}

export { createGatedLogger }
