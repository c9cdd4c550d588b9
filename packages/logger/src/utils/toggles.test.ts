import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger } from './loggers'
import { buildTag } from './tags'
import {
	configureLoggers,
	getRegisteredLoggers,
	isLoggerEnabled,
	resetLoggerToggles,
	setLoggerEnabled,
} from './toggles'
import { consola } from './consola'

describe('logger toggles', () => {
	afterEach(() => {
		resetLoggerToggles()
		vi.restoreAllMocks()
	})

	it('seeds every defined scope as enabled', () => {
		expect(getRegisteredLoggers()).toEqual([
			{ tag: 'app', enabled: true },
			{ tag: 'lexer', enabled: true },
		])
	})

	it('lets child tags inherit the parent state', () => {
		setLoggerEnabled('lexer', false)
		expect(isLoggerEnabled('lexer:patterns')).toBe(false)
		expect(isLoggerEnabled('app')).toBe(true)
	})

	it('disables registered children when asked to', () => {
		isLoggerEnabled('lexer:tables')
		setLoggerEnabled('lexer', false, { includeChildren: true })

		expect(getRegisteredLoggers()).toContainEqual({
			tag: 'lexer:tables',
			enabled: false,
		})
	})

	it('applies a toggle map', () => {
		configureLoggers({ app: false })
		expect(isLoggerEnabled('app')).toBe(false)
	})

	it('rejects unknown root tags', () => {
		expect(() => isLoggerEnabled('renderer')).toThrow(
			'Unknown logger tag "renderer"'
		)
	})

	it('rejects empty tags', () => {
		expect(() => isLoggerEnabled('   ')).toThrow('Logger tag cannot be empty.')
	})
})

describe('gated loggers', () => {
	afterEach(() => {
		resetLoggerToggles()
		vi.restoreAllMocks()
	})

	it('returns the same instance for the same tag', () => {
		const log = createLogger('lexer')
		expect(log.withTag('regions')).toBe(createLogger('lexer', 'regions'))
	})

	it('skips the underlying call while the tag is disabled', () => {
		const raw = consola.withTag('lexer:tables')
		const spy = vi.spyOn(raw, 'warn')
		vi.spyOn(consola, 'withTag').mockReturnValue(raw)

		const log = createLogger('lexer', 'tables')
		setLoggerEnabled('lexer:tables', false)
		log.warn('hidden')

		expect(spy).not.toHaveBeenCalled()
	})

	it('refuses an empty child tag', () => {
		expect(() => createLogger('lexer').withTag(' ')).toThrow(
			'logger.withTag requires a non-empty tag.'
		)
	})
})

describe('buildTag', () => {
	it('joins trimmed scopes', () => {
		expect(buildTag(['lexer', ' patterns '])).toBe('lexer:patterns')
	})

	it('falls back to the app scope', () => {
		expect(buildTag([])).toBe('app')
		expect(buildTag(['', '  '])).toBe('app')
	})
})
