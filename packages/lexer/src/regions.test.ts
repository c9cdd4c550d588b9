import { describe, test, expect } from 'vitest'
import { fenceMarks, regionAt, scanRegions } from './regions'
import type { RegionMarker } from './types'

const scan = (text: string) => scanRegions(text, 0, text.length)

describe('scanRegions', () => {
	describe('strings', () => {
		test('finds a closed string', () => {
			expect(scan("''abc''")).toEqual([
				{ kind: 'string', open: 0, close: 7, terminated: true },
			])
		})

		test('finds an empty string', () => {
			expect(scan("''''")).toEqual([
				{ kind: 'string', open: 0, close: 4, terminated: true },
			])
		})

		test('runs an unterminated string to end of input', () => {
			expect(scan("''abc")).toEqual([
				{ kind: 'string', open: 0, close: 5, terminated: false },
			])
		})

		test('spans line breaks', () => {
			expect(scan("''a\nb''")).toEqual([
				{ kind: 'string', open: 0, close: 7, terminated: true },
			])
		})

		test('treats the comment trigger as content', () => {
			expect(scan("''!''")).toEqual([
				{ kind: 'string', open: 0, close: 5, terminated: true },
			])
		})

		test('mis-tokenizes a lone quote inside a literal', () => {
			// the opening at 0 is abandoned; the real closing delimiter opens instead
			expect(scan("''it's''")).toEqual([
				{ kind: 'string', open: 6, close: 8, terminated: false },
			])
		})
	})

	describe('comments', () => {
		test('stops before the line terminator', () => {
			expect(scan('! comment text\ncode')).toEqual([
				{ kind: 'comment', open: 0, close: 14, terminated: true },
			])
		})

		test('stops before a CRLF terminator', () => {
			expect(scan('! c\r\nfor')).toEqual([
				{ kind: 'comment', open: 0, close: 3, terminated: true },
			])
		})

		test('runs to end of input without a terminator', () => {
			expect(scan('x ! tail')).toEqual([
				{ kind: 'comment', open: 2, close: 8, terminated: false },
			])
		})

		test('treats string delimiters as content', () => {
			expect(scan("! a ''b\n''c''")).toEqual([
				{ kind: 'comment', open: 0, close: 7, terminated: true },
				{ kind: 'string', open: 8, close: 13, terminated: true },
			])
		})
	})

	describe('ranges', () => {
		const text = "''a'' ''b''"

		test('reports regions opening in range even when they run past it', () => {
			expect(scanRegions(text, 5, 7)).toEqual([
				{ kind: 'string', open: 6, close: 11, terminated: true },
			])
		})

		test('stops at the end of the range', () => {
			expect(scanRegions(text, 0, 3)).toEqual([
				{ kind: 'string', open: 0, close: 5, terminated: true },
			])
		})

		test('an empty range has no regions', () => {
			expect(scanRegions('! x', 2, 2)).toEqual([])
		})
	})

	test('follows custom rules', () => {
		const rules = { commentTrigger: '#', stringDelimiter: '"' }
		expect(scanRegions('"a" # c', 0, 7, rules)).toEqual([
			{ kind: 'string', open: 0, close: 3, terminated: true },
			{ kind: 'comment', open: 4, close: 7, terminated: false },
		])
	})
})

describe('fenceMarks', () => {
	const closed: RegionMarker = {
		kind: 'string',
		open: 0,
		close: 7,
		terminated: true,
	}

	test('marks both fences of a closed string', () => {
		expect(fenceMarks([closed])).toEqual([
			{ offset: 0, fence: 'open' },
			{ offset: 6, fence: 'close' },
		])
	})

	test('marks only the opening of an unterminated string', () => {
		expect(fenceMarks([{ ...closed, terminated: false }])).toEqual([
			{ offset: 0, fence: 'open' },
		])
	})

	test('ignores comments', () => {
		expect(fenceMarks([{ ...closed, kind: 'comment' }])).toEqual([])
	})

	test('filters by range', () => {
		expect(fenceMarks([closed], 1, 10)).toEqual([{ offset: 6, fence: 'close' }])
	})
})

describe('regionAt', () => {
	test('finds the region containing an offset', () => {
		const regions = scan("x ''y'' ! z")

		expect(regionAt(regions, 4)?.kind).toBe('string')
		expect(regionAt(regions, 9)?.kind).toBe('comment')
		expect(regionAt(regions, 7)).toBeUndefined()
	})
})
