export { loggers, createLogger } from './utils/loggers'
export type { Logger } from './utils/loggers'

export {
	configureLoggers,
	getRegisteredLoggers,
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
} from './utils/toggles'
export type { LoggerRegistryEntry } from './utils/toggles'

export { buildTag } from './utils/tags'
export type { LoggerScope } from './utils/tags'

export { parseLoggerEnv } from './env'
export type { LoggerEnv } from './env'
