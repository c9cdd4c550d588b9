/**
 * Dialects
 *
 * A dialect is the whole configuration surface of the engine: six lexeme
 * tables, the comment trigger and the string delimiter.
 */

import { z } from 'zod'
import { DEFAULT_SCOPES, ORSON_REGION_RULES } from './consts'
import {
	createLexemeTables,
	lexemeTablesSchema,
	ORSON_TABLES,
	TABLE_KEYS,
	type LexemeTablesSource,
} from './tables'
import { LEXEME_CLASSES, type Dialect, type TokenClass } from './types'

const scopesSchema = z
	.object({
		operator: z.string(),
		clauseKeyword: z.string(),
		quotedName: z.string(),
		plainName: z.string(),
		simpleType: z.string(),
		jokerType: z.string(),
		string: z.string(),
		comment: z.string(),
	} satisfies Record<TokenClass, z.ZodString>)
	.partial()

export const dialectConfigSchema = lexemeTablesSchema.partial().extend({
	name: z.string().min(1).optional(),
	commentTrigger: z
		.string()
		.length(1, 'commentTrigger must be a single character')
		.optional(),
	stringDelimiter: z
		.string()
		.min(1, 'stringDelimiter cannot be empty')
		.optional(),
	scopes: scopesSchema.optional(),
})

export type DialectConfig = z.input<typeof dialectConfigSchema>

const orsonTableSource = (): LexemeTablesSource => ({
	operators: [...ORSON_TABLES.operator.lexemes],
	clauseKeywords: [...ORSON_TABLES.clauseKeyword.lexemes],
	quotedNames: [...ORSON_TABLES.quotedName.lexemes],
	plainNames: [...ORSON_TABLES.plainName.lexemes],
	simpleTypes: [...ORSON_TABLES.simpleType.lexemes],
	jokerTypes: [...ORSON_TABLES.jokerType.lexemes],
})

export const ORSON_DIALECT: Dialect = Object.freeze({
	name: 'orson',
	tables: ORSON_TABLES,
	regionRules: Object.freeze({ ...ORSON_REGION_RULES }),
	scopes: Object.freeze({ ...DEFAULT_SCOPES }),
})

/**
 * Build a dialect from a partial config; anything omitted comes from Orson.
 * Throws on an invalid config.
 */
export const createDialect = (config: DialectConfig = {}): Dialect => {
	const result = dialectConfigSchema.safeParse(config)
	if (!result.success) {
		throw new Error(z.prettifyError(result.error))
	}

	const parsed = result.data
	const defaults = orsonTableSource()
	const source: LexemeTablesSource = { ...defaults }
	for (const lexemeClass of LEXEME_CLASSES) {
		const key = TABLE_KEYS[lexemeClass]
		source[key] = parsed[key] ?? defaults[key]
	}

	return Object.freeze({
		name: parsed.name ?? 'custom',
		tables: createLexemeTables(source),
		regionRules: Object.freeze({
			commentTrigger: parsed.commentTrigger ?? ORSON_REGION_RULES.commentTrigger,
			stringDelimiter:
				parsed.stringDelimiter ?? ORSON_REGION_RULES.stringDelimiter,
		}),
		scopes: Object.freeze({ ...DEFAULT_SCOPES, ...parsed.scopes }),
	})
}
