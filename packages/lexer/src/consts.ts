/**
 * Lexer Constants
 */

import type { RegionRules, TokenClass } from './types'

// Bracket pair mappings
export const BRACKET_PAIRS: Record<string, string> = {
	'(': ')',
	'[': ']',
	'{': '}',
}

export const WORD_CHAR = /[a-zA-Z0-9_]/
export const WORD_CHAR_CLASS = 'a-zA-Z0-9_'

export const ORSON_REGION_RULES: RegionRules = {
	commentTrigger: '!',
	stringDelimiter: "''",
}

// Theme scopes per class
export const DEFAULT_SCOPES: Record<TokenClass, string> = {
	operator: 'operator',
	clauseKeyword: 'keyword.control',
	quotedName: 'function.builtin',
	plainName: 'constant.builtin',
	simpleType: 'type.builtin',
	jokerType: 'type',
	string: 'string',
	comment: 'comment',
}

export const ORSON_FILE_EXTENSIONS = ['.os', '.op'] as const
