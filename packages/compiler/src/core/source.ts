/**
 * Source text, token spans and the registry that owns token streams.
 *
 * Syntax nodes refer to their token stream through a StreamHandle, a
 * non-owning reference that stops resolving once the stream is released.
 */

/**
 * A named source text with line lookup.
 * Lines and columns are 1-based; 0 means unknown.
 */
export class TextStream {
	readonly text: string
	readonly streamName: string
	/** Offset of the first character of each line */
	private readonly lineStarts: number[]

	constructor(text: string, streamName: string) {
		this.text = text
		this.streamName = streamName
		this.lineStarts = [0]
		for (let i = 0; i < text.length; i++) {
			if (text.charCodeAt(i) === 10) this.lineStarts.push(i + 1)
		}
	}

	lineCount(): number {
		return this.lineStarts.length
	}

	/** Offset of the first character of a line. */
	lineStartOffset(lineno: number): number {
		const start = this.lineStarts[lineno - 1]
		if (start === undefined) {
			throw new Error(`Invalid line number: ${lineno}`)
		}
		return start
	}

	/** Text of a line without its terminator. */
	getLine(lineno: number): string {
		const start = this.lineStartOffset(lineno)
		const next = this.lineStarts[lineno]
		let end = next === undefined ? this.text.length : next - 1
		if (end > start && this.text.charCodeAt(end - 1) === 13) end--
		return this.text.slice(start, end)
	}

	/** Map a character offset to its 1-based [line, column]. */
	lineColFromOffset(offset: number): [number, number] {
		if (offset < 0 || offset > this.text.length) {
			throw new Error(`Invalid offset: ${offset}`)
		}
		let lo = 0
		let hi = this.lineStarts.length - 1
		while (lo < hi) {
			const mid = (lo + hi + 1) >> 1
			const start = this.lineStarts[mid] ?? 0
			if (start <= offset) lo = mid
			else hi = mid - 1
		}
		const lineStart = this.lineStarts[lo] ?? 0
		return [lo + 1, offset - lineStart + 1]
	}
}

/**
 * Half-open character span [begin, end) within a stream.
 */
export interface TokenSpan {
	readonly begin: number
	readonly end: number
}

/**
 * A token span bound to its stream. begin === end means no position.
 */
export interface TokenInfo extends TokenSpan {
	readonly stream: TextStream
}

/**
 * Token spans produced by the scanner for one translation unit.
 */
export class TokenStream {
	readonly text: TextStream
	private readonly spans: TokenSpan[] = []

	constructor(text: TextStream) {
		this.text = text
	}

	add(span: TokenSpan): number {
		this.spans.push(span)
		return this.spans.length - 1
	}

	get(index: number): TokenSpan {
		const span = this.spans[index]
		if (span === undefined) {
			throw new Error(`Invalid token index: ${index}`)
		}
		return span
	}

	count(): number {
		return this.spans.length
	}

	/** Source text covered by a span. */
	textOf(span: TokenSpan): string {
		return this.text.text.slice(span.begin, span.end)
	}
}

/**
 * Branded type for registered stream IDs.
 */
export type StreamId = number & { readonly __brand: 'StreamId' }

export function streamId(n: number): StreamId {
	return n as StreamId
}

/**
 * Non-owning reference to a registered token stream.
 * deref() returns undefined once the stream has been released.
 */
export class StreamHandle {
	readonly id: StreamId
	private readonly registry: TokenStreamRegistry

	constructor(registry: TokenStreamRegistry, id: StreamId) {
		this.registry = registry
		this.id = id
	}

	deref(): TokenStream | undefined {
		return this.registry.get(this.id)
	}
}

/**
 * Owns the token streams of a run. Jobs release their streams when they
 * complete or abort; handles held by syntax nodes then expire.
 */
export class TokenStreamRegistry {
	private readonly streams: (TokenStream | undefined)[] = []

	register(stream: TokenStream): StreamHandle {
		const id = streamId(this.streams.length)
		this.streams.push(stream)
		return new StreamHandle(this, id)
	}

	get(id: StreamId): TokenStream | undefined {
		return this.streams[id]
	}

	release(id: StreamId): void {
		if (id < 0 || id >= this.streams.length) {
			throw new Error(`Invalid StreamId: ${id}`)
		}
		this.streams[id] = undefined
	}

	/** Number of streams still alive. */
	liveCount(): number {
		return this.streams.filter((s) => s !== undefined).length
	}
}

/**
 * A whole translation unit, identified by its path.
 */
export interface TranslationUnit {
	readonly path: string
}

/** Display name of a unit, always with forward slashes. */
export function unitDisplayName(unit: TranslationUnit): string {
	return unit.path.replace(/\\/g, '/')
}
