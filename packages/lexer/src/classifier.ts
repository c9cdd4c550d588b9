/**
 * Primary Classifier
 *
 * One scan per lexeme table, in class order, all written into a single
 * composite map. Tables applied later take over overlapped characters.
 */

import { CompositeMap } from './composite'
import { scanPattern, type CompiledPattern } from './pattern'

/**
 * Run each pattern over `[from, to)` in the given order
 */
export const classifyPrimary = (
	text: string,
	from: number,
	to: number,
	patterns: readonly CompiledPattern[],
	map: CompositeMap = new CompositeMap(from, to)
): CompositeMap => {
	for (const pattern of patterns) {
		for (const match of scanPattern(text, pattern, from, to)) {
			map.write(match.start, match.end, pattern.lexemeClass)
		}
	}
	return map
}
