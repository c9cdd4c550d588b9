/**
 * Unified Lexer Class
 *
 * Compiles a dialect once and classifies text ranges in two phases: lexeme
 * tables first, then the region scan, whose strings and comments override
 * whatever the tables matched.
 */

import { loggers } from '@orson/logger'
import { classifyPrimary } from './classifier'
import { CompositeMap } from './composite'
import { ORSON_DIALECT } from './dialect'
import { compilePattern, type CompiledPattern } from './pattern'
import { fenceMarks, scanRegions } from './regions'
import {
	LEXEME_CLASSES,
	type ClassificationResult,
	type Dialect,
	type RegionMarker,
	type TextRange,
	type TokenClass,
	type TokenSpan,
} from './types'
import { clampRange } from './utils'

const log = loggers.lexer.withTag('patterns')

/**
 * Line highlight segment for rendering
 */
export type LineHighlightSegment = {
	start: number
	end: number
	className: string
	scope: string
}

const emptyResult = (from: number, to: number): ClassificationResult => ({
	from,
	to,
	spans: [],
	regions: [],
	fences: [],
})

/**
 * Classification engine for one dialect. Instances hold only frozen tables
 * and compiled patterns, so one lexer can serve any number of buffers.
 */
export class Lexer {
	readonly dialect: Dialect
	private readonly patterns: readonly CompiledPattern[]

	private constructor(dialect: Dialect) {
		this.dialect = dialect

		this.patterns = Object.freeze(
			LEXEME_CLASSES.map(lexemeClass =>
				compilePattern(dialect.tables[lexemeClass])
			)
		)

		log.debug(
			`Compiled ${dialect.name} patterns:`,
			Object.fromEntries(
				this.patterns.map(pattern => [
					pattern.lexemeClass,
					pattern.matchable ? pattern.regex.source.length : 0,
				])
			)
		)
	}

	/**
	 * Create a lexer for a dialect (Orson when omitted)
	 */
	static create(dialect: Dialect = ORSON_DIALECT): Lexer {
		return new Lexer(dialect)
	}

	/**
	 * Classify `[range.from, range.to)` of `text` (the whole text by default).
	 * Never throws; out-of-range bounds are clamped.
	 */
	classify(text: string, range?: Partial<TextRange>): ClassificationResult {
		const { from, to } = clampRange(
			text.length,
			range?.from ?? 0,
			range?.to ?? text.length
		)
		if (from >= to) return emptyResult(from, Math.max(from, to))

		const map = classifyPrimary(
			text,
			from,
			to,
			this.patterns,
			new CompositeMap(from, to)
		)

		const regions = scanRegions(text, from, to, this.dialect.regionRules)
		for (const region of regions) {
			map.write(region.open, region.close, region.kind)
		}

		return {
			from,
			to,
			spans: map.toSpans(),
			regions,
			fences: fenceMarks(regions, from, to),
		}
	}

	/**
	 * Region scan only, for callers that track strings and comments
	 * separately from the rest of the highlighting
	 */
	scanRegions(text: string, start = 0, end = text.length): RegionMarker[] {
		return scanRegions(text, start, end, this.dialect.regionRules)
	}

	/**
	 * Theme scope for a class in this lexer's dialect
	 */
	scopeOf(tokenClass: TokenClass): string {
		return this.dialect.scopes[tokenClass]
	}

	/**
	 * Convert spans to LineHighlightSegment format
	 */
	tokensToSegments(
		spans: readonly TokenSpan[],
		getClass: (scope: string) => string | undefined
	): LineHighlightSegment[] {
		const segments: LineHighlightSegment[] = []
		for (const span of spans) {
			const scope = this.scopeOf(span.tokenClass)
			const className = getClass(scope)
			if (className) {
				segments.push({
					start: span.start,
					end: span.end,
					className,
					scope,
				})
			}
		}
		return segments
	}
}
