import { consola, type ConsolaInstance } from './consola'
import { LOGGER_DEFINITIONS, type LoggerName } from './definitions'
import { createGatedLogger } from './gating'
import { buildTag, type LoggerScope } from './tags'
import { ensureLoggerToggleState } from './toggles'

const instances = new Map<string, ConsolaInstance>()

const getLoggerInstance = (tag: string): ConsolaInstance => {
	ensureLoggerToggleState(tag)

	const existing = instances.get(tag)
	if (existing) return existing

	const raw = consola.withTag(tag)
	const gated = createGatedLogger(raw, tag, getLoggerInstance)
	instances.set(tag, gated)
	return gated
}

const createLogger = (...scopes: LoggerScope[]): ConsolaInstance =>
	getLoggerInstance(buildTag(scopes))

type Logger = ConsolaInstance

const loggers: Readonly<Record<LoggerName, Logger>> = Object.freeze({
	app: createLogger(...LOGGER_DEFINITIONS.app.scopes),
	lexer: createLogger(...LOGGER_DEFINITIONS.lexer.scopes),
})

export { createLogger, loggers }
export type { Logger }
