import { defaultLoggerVisibility } from './definitions'

type LoggerToggleState = {
	enabled: boolean
}

const loggerToggleStates = new Map<string, LoggerToggleState>()

const seedDefaultLoggerStates = () => {
	loggerToggleStates.clear()
	for (const [tag, enabled] of defaultLoggerVisibility.entries()) {
		loggerToggleStates.set(tag, { enabled })
	}
}

seedDefaultLoggerStates()

const normalizeTag = (tag: string): string => {
	const normalized = tag.trim()
	if (!normalized) {
		throw new Error('Logger tag cannot be empty.')
	}
	return normalized
}

/**
 * Child tags (`lexer:patterns`) follow the closest registered ancestor,
 * so only root scopes need a definition.
 */
const getDefaultEnabledForTag = (tag: string): boolean => {
	const explicitDefault = defaultLoggerVisibility.get(tag)
	if (typeof explicitDefault === 'boolean') return explicitDefault

	const segments = tag.split(':')
	while (segments.length > 1) {
		segments.pop()
		const parentState = loggerToggleStates.get(segments.join(':'))
		if (parentState) return parentState.enabled
	}

	throw new Error(
		`Unknown logger tag "${tag}". Add it to LOGGER_DEFINITIONS in packages/logger/src/utils/loggerDefinitions.ts.`
	)
}

const ensureLoggerToggleState = (tag: string): LoggerToggleState => {
	const normalized = normalizeTag(tag)

	const existing = loggerToggleStates.get(normalized)
	if (existing) return existing

	const state: LoggerToggleState = {
		enabled: getDefaultEnabledForTag(normalized),
	}
	loggerToggleStates.set(normalized, state)
	return state
}

const isLoggerEnabled = (tag: string): boolean =>
	ensureLoggerToggleState(tag).enabled

type LoggerRegistryEntry = {
	tag: string
	enabled: boolean
}

const getRegisteredLoggers = (): LoggerRegistryEntry[] => {
	return Array.from(loggerToggleStates.entries())
		.map(([tag, state]) => ({
			tag,
			enabled: state.enabled,
		}))
		.sort((a, b) => a.tag.localeCompare(b.tag))
}

const setLoggerEnabled = (
	tag: string,
	enabled: boolean,
	options?: { includeChildren?: boolean }
): void => {
	const state = ensureLoggerToggleState(tag)
	state.enabled = enabled

	if (!options?.includeChildren) return

	const prefix = `${normalizeTag(tag)}:`
	for (const [registeredTag, registeredState] of loggerToggleStates.entries()) {
		if (registeredTag.startsWith(prefix)) {
			registeredState.enabled = enabled
		}
	}
}

const configureLoggers = (config: Record<string, boolean>): void => {
	for (const [tag, enabled] of Object.entries(config)) {
		setLoggerEnabled(tag, enabled)
	}
}

const resetLoggerToggles = (): void => {
	seedDefaultLoggerStates()
}

export {
	configureLoggers,
	ensureLoggerToggleState,
	getRegisteredLoggers,
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
}
export type { LoggerRegistryEntry }
