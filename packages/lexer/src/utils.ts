/**
 * Lexer Utility Functions
 */

import { WORD_CHAR } from './consts'

export const isWordChar = (c: string): boolean => WORD_CHAR.test(c)

/**
 * Escape a literal for use inside a regular expression
 */
export const escapeRegExp = (s: string): string =>
	s.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')

/**
 * Clamp a requested range to the text; `from > to` afterwards means empty
 */
export const clampRange = (
	length: number,
	from: number,
	to: number
): { from: number; to: number } => ({
	from: Math.min(Math.max(0, from), length),
	to: Math.min(Math.max(0, to), length),
})

/**
 * Offset of the first character of the line containing `offset`
 */
export const lineStartOf = (text: string, offset: number): number => {
	if (offset <= 0) return 0
	return text.lastIndexOf('\n', offset - 1) + 1
}

/**
 * Offset of the line terminator (`\n` or `\r\n`) ending the line containing
 * `offset`, or the text length for the last line
 */
export const lineEndOf = (text: string, offset: number): number => {
	const newline = text.indexOf('\n', offset)
	if (newline === -1) return text.length
	return newline > offset && text[newline - 1] === '\r' ? newline - 1 : newline
}
