/**
 * Lexer Types
 */

/**
 * Classes a lexeme table can assign, listed in application order:
 * a later class overwrites an earlier one on the characters both matched.
 */
export const LEXEME_CLASSES = [
	'plainName',
	'operator',
	'clauseKeyword',
	'quotedName',
	'simpleType',
	'jokerType',
] as const

export type LexemeClass = (typeof LEXEME_CLASSES)[number]

/**
 * Every class a span can carry. Region classes come from the region scan
 * and always win over lexeme classes.
 */
export type TokenClass = LexemeClass | 'string' | 'comment'

/**
 * Immutable, deduplicated set of lexemes, longest first
 */
export type LexemeTable = {
	readonly lexemeClass: LexemeClass
	readonly lexemes: readonly string[]
}

export type LexemeTables = Readonly<Record<LexemeClass, LexemeTable>>

/**
 * Classified half-open range `[start, end)`
 */
export type TokenSpan = {
	start: number
	end: number
	tokenClass: TokenClass
}

export type RegionKind = 'string' | 'comment'

/**
 * Delimited string or comment region.
 *
 * For strings, `close` is just past the closing delimiter; for comments it is
 * the offset of the line terminator. Unterminated regions close at end of input.
 */
export type RegionMarker = {
	kind: RegionKind
	open: number
	close: number
	terminated: boolean
}

export type FenceMark = {
	offset: number
	fence: 'open' | 'close'
}

export type RegionRules = {
	/** Single character that starts a line comment */
	commentTrigger: string
	/** Sequence that both opens and closes a string */
	stringDelimiter: string
}

export type TextRange = {
	from: number
	to: number
}

/**
 * Result of classifying a range
 */
export type ClassificationResult = {
	from: number
	to: number
	spans: TokenSpan[]
	regions: RegionMarker[]
	fences: FenceMark[]
}

/**
 * Lexeme tables plus region rules: everything needed to retarget the engine
 */
export type Dialect = {
	readonly name: string
	readonly tables: LexemeTables
	readonly regionRules: Readonly<RegionRules>
	/** Theme scope per class, used when building render segments */
	readonly scopes: Readonly<Record<TokenClass, string>>
}
