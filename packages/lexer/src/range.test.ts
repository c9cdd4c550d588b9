import { describe, test, expect } from 'vitest'
import { Lexer } from './lexer'
import { widenRange } from './range'

describe('widenRange', () => {
	test('grows an edit to whole lines', () => {
		expect(widenRange('for x\nmax y\nz', 8, 9)).toEqual({ from: 6, to: 11 })
	})

	test('starts at a known region opening before the line', () => {
		const text = "''a\nb''\nc"
		const { regions } = Lexer.create().classify(text)

		expect(widenRange(text, 4, 4, regions)).toEqual({ from: 0, to: 7 })
	})

	test('normalizes reversed and out-of-range bounds', () => {
		expect(widenRange('ab\ncd', 10, -3)).toEqual({ from: 0, to: 5 })
	})

	test('widened ranges classify like the whole text', () => {
		const lexer = Lexer.create()
		const text = "for ''x\ny'' max\nwhile"
		const full = lexer.classify(text)
		const range = widenRange(text, 9, 9, full.regions)
		const partial = lexer.classify(text, range)

		expect(partial.spans).toEqual(
			full.spans.filter(
				span => span.start >= range.from && span.end <= range.to
			)
		)
	})
})
