/**
 * Lexeme Tables
 *
 * Orson's builtin tables live in `data/orson-lexemes.json` and are validated
 * and frozen once, on first import.
 */

import { z } from 'zod'
import { loggers } from '@orson/logger'
import orsonLexemes from './data/orson-lexemes.json'
import {
	LEXEME_CLASSES,
	type LexemeClass,
	type LexemeTable,
	type LexemeTables,
} from './types'

const log = loggers.lexer.withTag('tables')

/**
 * JSON/config key for each class
 */
export const TABLE_KEYS = {
	operator: 'operators',
	clauseKeyword: 'clauseKeywords',
	quotedName: 'quotedNames',
	plainName: 'plainNames',
	simpleType: 'simpleTypes',
	jokerType: 'jokerTypes',
} as const satisfies Record<LexemeClass, string>

export type TableKey = (typeof TABLE_KEYS)[LexemeClass]

const lexemeListSchema = z.array(z.string())

export const lexemeTablesSchema = z.object({
	operators: lexemeListSchema,
	clauseKeywords: lexemeListSchema,
	quotedNames: lexemeListSchema,
	plainNames: lexemeListSchema,
	simpleTypes: lexemeListSchema,
	jokerTypes: lexemeListSchema,
})

export type LexemeTablesSource = z.infer<typeof lexemeTablesSchema>

const byLengthThenText = (a: string, b: string): number =>
	b.length - a.length || (a < b ? -1 : a > b ? 1 : 0)

/**
 * Build a table: drops empty entries and duplicates, longest lexeme first
 */
export const createLexemeTable = (
	lexemeClass: LexemeClass,
	lexemes: Iterable<string>
): LexemeTable => {
	const unique = new Set<string>()
	const duplicates: string[] = []

	for (const lexeme of lexemes) {
		if (lexeme.length === 0) continue
		if (unique.has(lexeme)) {
			duplicates.push(lexeme)
			continue
		}
		unique.add(lexeme)
	}

	if (duplicates.length > 0) {
		log.warn(`Dropped duplicate ${lexemeClass} lexemes:`, duplicates)
	}

	return Object.freeze({
		lexemeClass,
		lexemes: Object.freeze([...unique].sort(byLengthThenText)),
	})
}

export const createLexemeTables = (
	source: LexemeTablesSource
): LexemeTables => {
	const build = (lexemeClass: LexemeClass) =>
		createLexemeTable(lexemeClass, source[TABLE_KEYS[lexemeClass]])

	const tables: LexemeTables = Object.freeze({
		plainName: build('plainName'),
		operator: build('operator'),
		clauseKeyword: build('clauseKeyword'),
		quotedName: build('quotedName'),
		simpleType: build('simpleType'),
		jokerType: build('jokerType'),
	})

	reportOverlaps(tables)
	return tables
}

/**
 * Lexemes that appear in more than one table, with the classes claiming them
 */
export const findOverlaps = (
	tables: LexemeTables
): Map<string, LexemeClass[]> => {
	const owners = new Map<string, LexemeClass[]>()
	for (const lexemeClass of LEXEME_CLASSES) {
		for (const lexeme of tables[lexemeClass].lexemes) {
			const claimed = owners.get(lexeme)
			if (claimed) claimed.push(lexemeClass)
			else owners.set(lexeme, [lexemeClass])
		}
	}

	for (const [lexeme, claimed] of owners) {
		if (claimed.length < 2) owners.delete(lexeme)
	}
	return owners
}

const reportOverlaps = (tables: LexemeTables): void => {
	const overlaps = findOverlaps(tables)
	if (overlaps.size === 0) return
	// later classes win on shared lexemes
	log.warn(
		'Lexemes shared between tables:',
		Object.fromEntries(overlaps.entries())
	)
}

export const ORSON_TABLES: LexemeTables = createLexemeTables(
	lexemeTablesSchema.parse(orsonLexemes)
)
