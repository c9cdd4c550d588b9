/**
 * @orson/lexer
 *
 * Token classification engine for Orson source text.
 */

// Main class export
export { Lexer, type LineHighlightSegment } from './lexer'

// Type exports
export {
	LEXEME_CLASSES,
	type LexemeClass,
	type TokenClass,
	type LexemeTable,
	type LexemeTables,
	type TokenSpan,
	type RegionKind,
	type RegionMarker,
	type FenceMark,
	type RegionRules,
	type TextRange,
	type ClassificationResult,
	type Dialect,
} from './types'

// Tables and dialects
export {
	ORSON_TABLES,
	createLexemeTable,
	createLexemeTables,
	findOverlaps,
} from './tables'
export {
	ORSON_DIALECT,
	createDialect,
	dialectConfigSchema,
	type DialectConfig,
} from './dialect'

// Mode descriptor and editor helpers
export {
	ORSON_MODE,
	createMode,
	findEnclosingBlock,
	type ModeDescriptor,
	type BlockRange,
} from './mode'
export { widenRange } from './range'

// Phase exports (for advanced use)
export {
	compilePattern,
	scanPattern,
	type CompiledPattern,
	type PatternMatch,
} from './pattern'
export { classifyPrimary } from './classifier'
export { CompositeMap } from './composite'
export { scanRegions, fenceMarks, regionAt } from './regions'
