import type { TokenClass, TokenSpan } from './types'

const UNOWNED = -1

/**
 * Per-offset owner array over `[from, to)`.
 *
 * Every write records a span and claims its characters; a later write takes
 * over whatever it overlaps. Reading back yields maximal runs of one owner,
 * so a partly overwritten span survives as fragments.
 */
export class CompositeMap {
	readonly from: number
	readonly to: number
	private readonly owners: Int32Array
	private readonly classes: TokenClass[] = []

	constructor(from: number, to: number) {
		this.from = from
		this.to = Math.max(from, to)
		this.owners = new Int32Array(this.to - this.from).fill(UNOWNED)
	}

	/**
	 * Claim `[start, end)` for `tokenClass`, clipped to the map's range
	 */
	write(start: number, end: number, tokenClass: TokenClass): void {
		const lo = Math.max(start, this.from)
		const hi = Math.min(end, this.to)
		if (lo >= hi) return

		const owner = this.classes.length
		this.classes.push(tokenClass)
		this.owners.fill(owner, lo - this.from, hi - this.from)
	}

	classAt(offset: number): TokenClass | undefined {
		if (offset < this.from || offset >= this.to) return undefined
		const owner = this.owners[offset - this.from] ?? UNOWNED
		return owner === UNOWNED ? undefined : this.classes[owner]
	}

	toSpans(): TokenSpan[] {
		const spans: TokenSpan[] = []
		const len = this.owners.length
		let i = 0

		while (i < len) {
			const owner = this.owners[i] ?? UNOWNED
			if (owner === UNOWNED) {
				i++
				continue
			}

			const start = i
			while (i < len && this.owners[i] === owner) i++

			const tokenClass = this.classes[owner]
			if (tokenClass) {
				spans.push({
					start: this.from + start,
					end: this.from + i,
					tokenClass,
				})
			}
		}

		return spans
	}
}
