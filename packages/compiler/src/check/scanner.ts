/**
 * Line scanner producing the statement trees the checker walks.
 *
 * One statement per line: a command word followed by its arguments.
 * - `//` starts a comment
 * - a double-quoted string is a single argument
 * - a line holding only `name:` is a label
 */

import type { ArgKind } from '../commands/commands.ts'
import { Lang } from '../core/options.ts'
import {
	type StreamHandle,
	TextStream,
	type TokenSpan,
	TokenStream,
	type TokenStreamRegistry,
	type TranslationUnit,
	unitDisplayName,
} from '../core/source.ts'
import { SyntaxKind, SyntaxTree } from '../core/syntax.ts'

export interface ScanResult {
	readonly stream: TokenStream
	readonly handle: StreamHandle
	/** Statement and label nodes in source order */
	readonly statements: SyntaxTree[]
}

function isSpace(code: number): boolean {
	return code === 32 || code === 9 || code === 13
}

/** Token spans of one line. */
function scanLine(text: string, start: number, end: number): TokenSpan[] {
	const spans: TokenSpan[] = []
	let i = start
	while (i < end) {
		const code = text.charCodeAt(i)
		if (isSpace(code)) {
			i++
			continue
		}
		if (code === 47 && text.charCodeAt(i + 1) === 47) break

		const begin = i
		if (code === 34) {
			i++
			while (i < end && text.charCodeAt(i) !== 34) i++
			if (i < end) i++
		} else {
			while (i < end && !isSpace(text.charCodeAt(i))) i++
		}
		spans.push({ begin, end: i })
	}
	return spans
}

/**
 * Scan a translation unit and register its token stream.
 * The caller releases the stream through the registry when the job ends.
 */
export function scanUnit(
	registry: TokenStreamRegistry,
	unit: TranslationUnit,
	source: string
): ScanResult {
	const text = new TextStream(source, unitDisplayName(unit))
	const stream = new TokenStream(text)
	const handle = registry.register(stream)
	const statements: SyntaxTree[] = []

	for (let line = 1; line <= text.lineCount(); line++) {
		const start = text.lineStartOffset(line)
		const end = start + text.getLine(line).length
		const spans = scanLine(source, start, end)
		const [first, ...rest] = spans
		if (first === undefined) continue
		for (const span of spans) stream.add(span)

		if (rest.length === 0 && source.charCodeAt(first.end - 1) === 58) {
			statements.push(new SyntaxTree(SyntaxKind.Label, handle, first))
			continue
		}

		const statement = new SyntaxTree(SyntaxKind.Statement, handle)
		statement.addChild(new SyntaxTree(SyntaxKind.Command, handle, first))
		for (const span of rest) {
			statement.addChild(new SyntaxTree(SyntaxKind.Argument, handle, span))
		}
		statements.push(statement)
	}

	return { handle, statements, stream }
}

/**
 * Lexical kind of an argument. IR2 marks numbers with an `i` or `f` suffix.
 */
export function classifyArg(word: string, lang: Lang): ArgKind {
	if (word.startsWith('"')) return 'string'
	if (lang === Lang.IR2) {
		if (/^-?\d+i$/.test(word)) return 'int'
		if (/^-?(\d+(\.\d*)?|\.\d+)f$/.test(word)) return 'float'
		return 'identifier'
	}
	if (/^-?\d+$/.test(word)) return 'int'
	if (/^-?(\d+\.\d*|\.\d+)f?$/.test(word)) return 'float'
	return 'identifier'
}
