import {
	LOGGER_DEFINITIONS,
	definitionEntries,
	type LoggerDefinition,
	type LoggerName,
} from './loggerDefinitions'
import { buildTag } from './tags'

const defaultLoggerVisibility = new Map<string, boolean>()

for (const [, definition] of definitionEntries) {
	const tag = buildTag(definition.scopes)
	if (defaultLoggerVisibility.has(tag)) {
		throw new Error(
			`Logger scope "${tag}" is defined twice in LOGGER_DEFINITIONS.`
		)
	}
	defaultLoggerVisibility.set(tag, definition.enabled ?? true)
}

export { LOGGER_DEFINITIONS, definitionEntries, defaultLoggerVisibility }
export type { LoggerDefinition, LoggerName }
