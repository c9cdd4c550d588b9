/**
 * Mode Descriptor
 *
 * The declarative bundle an editor shell reads to activate the engine on a
 * buffer: which dialect, how comments and strings look, and which bracket
 * pairs delimit blocks for "jump to enclosing block" commands.
 */

import { BRACKET_PAIRS, ORSON_FILE_EXTENSIONS } from './consts'
import { ORSON_DIALECT } from './dialect'
import { scanRegions } from './regions'
import type { Dialect } from './types'

export type ModeDescriptor = {
	readonly name: string
	readonly extensions: readonly string[]
	readonly dialect: Dialect
	readonly commentTrigger: string
	readonly stringDelimiter: string
	readonly blocks: {
		/** Opening bracket → closing bracket */
		readonly pairs: Readonly<Record<string, string>>
	}
}

export type BlockRange = {
	open: number
	close: number
}

export const createMode = (
	name: string,
	dialect: Dialect,
	options: {
		extensions?: readonly string[]
		pairs?: Readonly<Record<string, string>>
	} = {}
): ModeDescriptor =>
	Object.freeze({
		name,
		extensions: Object.freeze([...(options.extensions ?? [])]),
		dialect,
		commentTrigger: dialect.regionRules.commentTrigger,
		stringDelimiter: dialect.regionRules.stringDelimiter,
		blocks: Object.freeze({
			pairs: Object.freeze({ ...(options.pairs ?? BRACKET_PAIRS) }),
		}),
	})

export const ORSON_MODE: ModeDescriptor = createMode('orson', ORSON_DIALECT, {
	extensions: ORSON_FILE_EXTENSIONS,
})

/**
 * Brackets inside strings and comments don't count
 */
const opaqueMask = (text: string, mode: ModeDescriptor): Uint8Array => {
	const mask = new Uint8Array(text.length)
	const rules = {
		commentTrigger: mode.commentTrigger,
		stringDelimiter: mode.stringDelimiter,
	}
	for (const region of scanRegions(text, 0, text.length, rules)) {
		mask.fill(1, region.open, region.close)
	}
	return mask
}

/**
 * Innermost block around the caret at `offset` (between `offset - 1` and
 * `offset`). Returns null when no balanced pair surrounds it.
 */
export const findEnclosingBlock = (
	text: string,
	offset: number,
	mode: ModeDescriptor = ORSON_MODE
): BlockRange | null => {
	const openers = new Map(Object.entries(mode.blocks.pairs))
	const closers = new Map<string, string>()
	for (const [openChar, closeChar] of openers) {
		closers.set(closeChar, openChar)
	}

	const mask = opaqueMask(text, mode)
	const start = Math.min(Math.max(0, offset), text.length)

	// backwards to the nearest unmatched opener
	const pending: string[] = []
	let open = -1
	for (let i = start - 1; i >= 0; i--) {
		if (mask[i]) continue
		const c = text[i] ?? ''
		if (closers.has(c)) {
			pending.push(c)
		} else if (openers.has(c)) {
			const expected = pending.pop()
			if (expected === undefined) {
				open = i
				break
			}
			if (closers.get(expected) !== c) return null
		}
	}
	if (open === -1) return null

	// forwards from the opener to its partner
	const stack: string[] = []
	for (let i = open; i < text.length; i++) {
		if (mask[i]) continue
		const c = text[i] ?? ''
		const closeChar = openers.get(c)
		if (closeChar !== undefined) {
			stack.push(closeChar)
		} else if (closers.has(c)) {
			if (stack.pop() !== c) return null
			if (stack.length === 0) return { open, close: i }
		}
	}

	return null
}
