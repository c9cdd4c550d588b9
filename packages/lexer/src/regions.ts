/**
 * Region Scan
 *
 * Finds string and comment regions, which a longest-match alternation cannot
 * express. Strings open and close on the same delimiter and their content is
 * opaque; comments run from the trigger to the end of the line.
 */

import { loggers } from '@orson/logger'
import { ORSON_REGION_RULES } from './consts'
import type { FenceMark, RegionMarker, RegionRules } from './types'
import { lineEndOf } from './utils'

const log = loggers.lexer.withTag('regions')

type StringScan =
	| { kind: 'closed'; close: number }
	| { kind: 'open' }
	| { kind: 'none' }

/**
 * Read string content after an opening delimiter at `open`.
 *
 * Content may not contain the delimiter's first character, so a lone quote
 * inside a literal means there is no string at `open`.
 * TODO: decide whether embedded lone quotes are valid Orson before lifting this.
 */
const scanString = (
	text: string,
	open: number,
	delimiter: string
): StringScan => {
	const quote = delimiter[0]
	const len = text.length
	let j = open + delimiter.length

	while (j < len && text[j] !== quote) j++

	if (j >= len) return { kind: 'open' }
	if (text.startsWith(delimiter, j)) {
		return { kind: 'closed', close: j + delimiter.length }
	}
	return { kind: 'none' }
}

/**
 * Scan forward from `start` and report every region that opens before `end`.
 *
 * A region may run past `end`; callers that edit inside a region must start
 * the scan at or before its opening (see `widenRange`).
 */
export const scanRegions = (
	text: string,
	start: number,
	end: number,
	rules: RegionRules = ORSON_REGION_RULES
): RegionMarker[] => {
	const regions: RegionMarker[] = []
	const { stringDelimiter, commentTrigger } = rules
	const len = text.length
	const stop = Math.min(end, len)
	let i = Math.max(0, start)

	while (i < stop) {
		if (stringDelimiter.length > 0 && text.startsWith(stringDelimiter, i)) {
			const scan = scanString(text, i, stringDelimiter)

			if (scan.kind === 'closed') {
				regions.push({
					kind: 'string',
					open: i,
					close: scan.close,
					terminated: true,
				})
				i = scan.close
				continue
			}

			if (scan.kind === 'open') {
				log.debug(`Unterminated string at offset ${i}`)
				regions.push({ kind: 'string', open: i, close: len, terminated: false })
				break
			}
		}

		if (text[i] === commentTrigger) {
			const close = lineEndOf(text, i)
			regions.push({
				kind: 'comment',
				open: i,
				close,
				terminated: close < len,
			})
			i = close
			continue
		}

		i++
	}

	return regions
}

/**
 * One-character fences of string regions: the first character of the opening
 * delimiter and the last character of the closing one
 */
export const fenceMarks = (
	regions: readonly RegionMarker[],
	from = 0,
	to = Number.POSITIVE_INFINITY
): FenceMark[] => {
	const fences: FenceMark[] = []
	const inRange = (offset: number) => offset >= from && offset < to

	for (const region of regions) {
		if (region.kind !== 'string') continue
		if (inRange(region.open)) {
			fences.push({ offset: region.open, fence: 'open' })
		}
		if (region.terminated && inRange(region.close - 1)) {
			fences.push({ offset: region.close - 1, fence: 'close' })
		}
	}

	return fences
}

/**
 * Region containing `offset`, if any
 */
export const regionAt = (
	regions: readonly RegionMarker[],
	offset: number
): RegionMarker | undefined =>
	regions.find(region => offset >= region.open && offset < region.close)
