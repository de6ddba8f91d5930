/**
 * Case-insensitive model name → id tables.
 *
 * Keys are kept as spelled in the definition files and ordered with
 * compareIgnoreCase; lookups binary-search with the same comparator, so no
 * normalized copy of either key is ever built.
 */

function foldAscii(code: number): number {
	return code >= 65 && code <= 90 ? code + 32 : code
}

/**
 * Three-way ASCII case-insensitive comparison.
 */
export function compareIgnoreCase(a: string, b: string): number {
	const length = Math.min(a.length, b.length)
	for (let i = 0; i < length; i++) {
		const diff = foldAscii(a.charCodeAt(i)) - foldAscii(b.charCodeAt(i))
		if (diff !== 0) return diff
	}
	return a.length - b.length
}

interface ModelEntry {
	readonly name: string
	id: number
}

/**
 * Ordered map from model name (case-insensitive) to a 32-bit id.
 */
export class ModelTable {
	private readonly entries: ModelEntry[] = []

	constructor(models?: Iterable<readonly [string, number]>) {
		if (models) {
			for (const [name, id] of models) this.set(name, id)
		}
	}

	/** Index of the first entry not less than name. */
	private lowerBound(name: string): number {
		let lo = 0
		let hi = this.entries.length
		while (lo < hi) {
			const mid = (lo + hi) >> 1
			const entry = this.entries[mid]
			if (entry !== undefined && compareIgnoreCase(entry.name, name) < 0) lo = mid + 1
			else hi = mid
		}
		return lo
	}

	private find(name: string): ModelEntry | undefined {
		const entry = this.entries[this.lowerBound(name)]
		return entry !== undefined && compareIgnoreCase(entry.name, name) === 0 ? entry : undefined
	}

	/**
	 * Insert or replace a model. Ids are stored as unsigned 32-bit integers.
	 */
	set(name: string, id: number): void {
		const index = this.lowerBound(name)
		const entry = this.entries[index]
		if (entry !== undefined && compareIgnoreCase(entry.name, name) === 0) {
			entry.id = id >>> 0
			return
		}
		this.entries.splice(index, 0, { id: id >>> 0, name })
	}

	get(name: string): number | undefined {
		return this.find(name)?.id
	}

	has(name: string): boolean {
		return this.find(name) !== undefined
	}

	get size(): number {
		return this.entries.length
	}

	/** Entries in case-insensitive name order. */
	*[Symbol.iterator](): Generator<[string, number]> {
		for (const entry of this.entries) yield [entry.name, entry.id]
	}
}
