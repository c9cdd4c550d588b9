/**
 * Pattern Compiler
 *
 * Turns a lexeme table into a single longest-first alternation whose
 * alternatives refuse to match inside a longer word, or where the text
 * continues into a longer lexeme of the same table.
 */

import { WORD_CHAR_CLASS } from './consts'
import type { LexemeClass, LexemeTable } from './types'
import { escapeRegExp, isWordChar } from './utils'

export type CompiledPattern = {
	readonly lexemeClass: LexemeClass
	readonly regex: RegExp
	/** False when the table had nothing to match */
	readonly matchable: boolean
}

export type PatternMatch = {
	start: number
	end: number
	text: string
}

// matches nothing, at any position
const NEVER_MATCH_SOURCE = '(?!)'

type Containment = {
	/** Characters of the longer lexeme before this one */
	prefix: string
	/** Characters of the longer lexeme after this one */
	suffix: string
}

// Every place `lexeme` occurs inside a longer lexeme of the same table
const containmentsOf = (
	lexeme: string,
	lexemes: readonly string[]
): Containment[] => {
	const found: Containment[] = []
	for (const longer of lexemes) {
		if (longer.length <= lexeme.length) continue
		let at = longer.indexOf(lexeme)
		while (at !== -1) {
			found.push({
				prefix: longer.slice(0, at),
				suffix: longer.slice(at + lexeme.length),
			})
			at = longer.indexOf(lexeme, at + 1)
		}
	}
	return found
}

// the word guard already covers a join between two word characters
const joinsWords = (left: string, right: string): boolean =>
	isWordChar(left) && isWordChar(right)

const compileAlternative = (
	lexeme: string,
	lexemes: readonly string[]
): string => {
	const first = lexeme[0] ?? ''
	const last = lexeme[lexeme.length - 1] ?? ''
	const body = escapeRegExp(lexeme)

	const tails = new Set<string>()
	const covers = new Set<string>()
	for (const { prefix, suffix } of containmentsOf(lexeme, lexemes)) {
		if (prefix.length === 0) {
			if (!joinsWords(last, suffix[0] ?? '')) tails.add(escapeRegExp(suffix))
		} else if (!joinsWords(prefix[prefix.length - 1] ?? '', first)) {
			covers.add(`(?<=${escapeRegExp(prefix)})${body}${escapeRegExp(suffix)}`)
		}
	}

	return (
		(isWordChar(first) ? `(?<![${WORD_CHAR_CLASS}])` : '') +
		(covers.size > 0 ? `(?!${[...covers].join('|')})` : '') +
		body +
		(tails.size > 0 ? `(?!${[...tails].join('|')})` : '') +
		(isWordChar(last) ? `(?![${WORD_CHAR_CLASS}])` : '')
	)
}

/**
 * Compile a table into one matcher. Never throws: an empty table gives a
 * pattern that matches nothing.
 */
export const compilePattern = (table: LexemeTable): CompiledPattern => {
	const lexemes = table.lexemes.filter(lexeme => lexeme.length > 0)
	if (lexemes.length === 0) {
		return {
			lexemeClass: table.lexemeClass,
			regex: new RegExp(NEVER_MATCH_SOURCE, 'g'),
			matchable: false,
		}
	}

	// Table order is already longest first; sort again for hand-built tables.
	const ordered = [...lexemes].sort((a, b) => b.length - a.length)
	const source = ordered
		.map(lexeme => compileAlternative(lexeme, lexemes))
		.join('|')

	return {
		lexemeClass: table.lexemeClass,
		regex: new RegExp(source, 'g'),
		matchable: true,
	}
}

/**
 * Non-overlapping matches that lie entirely inside `[from, to)`, left to right.
 * Boundary guards still look at characters outside the range.
 */
export function* scanPattern(
	text: string,
	pattern: CompiledPattern,
	from: number,
	to: number
): Generator<PatternMatch> {
	if (!pattern.matchable || from >= to) return

	// private copy: compiled patterns are shared and `lastIndex` is state
	const regex = new RegExp(pattern.regex.source, pattern.regex.flags)
	regex.lastIndex = from

	let match: RegExpExecArray | null
	while ((match = regex.exec(text)) !== null) {
		const start = match.index
		const end = start + match[0].length
		if (end > to) return
		if (end === start) {
			regex.lastIndex = start + 1
			continue
		}
		yield { start, end, text: match[0] }
	}
}
