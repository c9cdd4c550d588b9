import { regionAt } from './regions'
import type { RegionMarker, TextRange } from './types'
import { clampRange, lineEndOf, lineStartOf } from './utils'

/**
 * Grow an edited range to one that is safe to reclassify: whole lines, and
 * starting no later than the opening of a previously known region that
 * contains `from`.
 *
 * `regions` should come from the last classification of the same buffer;
 * offsets are only trusted before the edit.
 */
export const widenRange = (
	text: string,
	from: number,
	to: number,
	regions: readonly RegionMarker[] = []
): TextRange => {
	const clamped = clampRange(text.length, from, to)
	const lo = Math.min(clamped.from, clamped.to)
	const hi = Math.max(clamped.from, clamped.to)

	let start = lineStartOf(text, lo)
	const enclosing = regionAt(regions, lo)
	if (enclosing && enclosing.open < start) {
		start = lineStartOf(text, enclosing.open)
	}

	return { from: start, to: lineEndOf(text, hi) }
}
