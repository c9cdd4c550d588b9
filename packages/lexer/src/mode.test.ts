import { describe, test, expect } from 'vitest'
import { ORSON_DIALECT } from './dialect'
import { ORSON_MODE, createMode, findEnclosingBlock } from './mode'

describe('ORSON_MODE', () => {
	test('describes the Orson surface', () => {
		expect(ORSON_MODE.name).toBe('orson')
		expect(ORSON_MODE.dialect).toBe(ORSON_DIALECT)
		expect(ORSON_MODE.commentTrigger).toBe('!')
		expect(ORSON_MODE.stringDelimiter).toBe("''")
		expect(ORSON_MODE.extensions).toEqual(['.os', '.op'])
		expect(ORSON_MODE.blocks.pairs).toEqual({ '(': ')', '[': ']', '{': '}' })
	})
})

describe('findEnclosingBlock', () => {
	const text = '(for x (max))'

	test('finds the innermost block', () => {
		expect(findEnclosingBlock(text, 8)).toEqual({ open: 7, close: 11 })
	})

	test('finds the outer block', () => {
		expect(findEnclosingBlock(text, 5)).toEqual({ open: 0, close: 12 })
	})

	test('ignores brackets inside strings and comments', () => {
		expect(findEnclosingBlock("(a ''(''\n! )\n)", 2)).toEqual({
			open: 0,
			close: 13,
		})
	})

	test('returns null outside any block', () => {
		expect(findEnclosingBlock('max', 1)).toBeNull()
		expect(findEnclosingBlock('(a) b', 4)).toBeNull()
	})

	test('returns null for an unclosed block', () => {
		expect(findEnclosingBlock('(max', 2)).toBeNull()
	})

	test('returns null for mismatched brackets', () => {
		expect(findEnclosingBlock('(x]', 3)).toBeNull()
	})

	test('uses the pairs of a custom mode', () => {
		const mode = createMode('angles', ORSON_DIALECT, {
			pairs: { '<': '>' },
		})

		expect(findEnclosingBlock('<a (b) c>', 4, mode)).toEqual({
			open: 0,
			close: 8,
		})
	})
})
