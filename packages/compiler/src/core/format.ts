/**
 * Diagnostic rendering.
 *
 * Output format (consumed by editors and test harnesses, keep exact):
 * ```
 * main.sc:4:7: error: command 'FOO' undefined or unsupported
 *  FOO 1 2
 *       ^
 * ```
 * - `gta3sc:` replaces the file name when none is known
 * - the line and column parts are dropped when unknown (0)
 * - the source excerpt needs a known line inside a live stream; the caret
 *   also needs a known column
 */

import { type DiagnosticArgs, interpolateMessage, SCINT001 } from '@gta3sc/diagnostics'
import { type SourceContext, nocontext } from './context.ts'
import { type TextStream, type TokenInfo, unitDisplayName } from './source.ts'
import type { SyntaxNode } from './syntax.ts'

export const PROGRAM_TAG = 'gta3sc'

export const INTERNAL_ERROR_TYPE = 'internal_error'

/**
 * A context reduced to file, line and column.
 */
export interface SourceLocation {
	readonly name: string | undefined
	readonly line: number
	readonly column: number
	readonly stream: TextStream | undefined
}

const UNKNOWN_LOCATION: SourceLocation = {
	column: 0,
	line: 0,
	name: undefined,
	stream: undefined,
}

function locateToken(token: TokenInfo): SourceLocation {
	if (token.begin === token.end) {
		return { ...UNKNOWN_LOCATION, name: token.stream.streamName }
	}
	const [line, column] = token.stream.lineColFromOffset(token.begin)
	return { column, line, name: token.stream.streamName, stream: token.stream }
}

/**
 * The node itself if it carries text, else its first child that does.
 */
function textNode(node: SyntaxNode): SyntaxNode | undefined {
	if (node.hasText()) return node
	return node.children.find((child) => child.hasText())
}

function locateNode(node: SyntaxNode): SourceLocation | undefined {
	const target = textNode(node)
	if (!target) return undefined
	const stream = target.tokenStream()
	if (!stream) return undefined
	const { begin, end } = target.getToken()
	return locateToken({ begin, end, stream: stream.text })
}

/**
 * Resolve a context to a location. Undefined means a node context could not
 * be traced back to a live token stream.
 */
export function resolveContext(context: SourceContext): SourceLocation | undefined {
	switch (context.kind) {
		case 'none':
			return UNKNOWN_LOCATION
		case 'position':
			return {
				column: context.column,
				line: context.line,
				name: context.name,
				stream: context.stream,
			}
		case 'unit':
			return { ...UNKNOWN_LOCATION, name: unitDisplayName(context.unit) }
		case 'token':
			return locateToken(context.token)
		case 'node':
			return locateNode(context.node)
	}
}

/**
 * Render an already resolved diagnostic.
 */
export function renderDiagnostic(
	type: string | undefined,
	location: SourceLocation,
	text: string
): string {
	const { name, line, column, stream } = location
	let message = name !== undefined ? `${name}:` : `${PROGRAM_TAG}:`

	if (line) {
		message += `${line}:`
		if (column) message += `${column}:`
	}

	message += ' '

	if (type !== undefined) message += `${type}: `

	message += text

	if (stream && line && line <= stream.lineCount()) {
		message += `\n ${stream.getLine(line)}`
		if (column) message += `\n ${'^'.padStart(column)}`
	}

	return message
}

/**
 * Format a diagnostic message for the given context.
 * An unresolvable node context yields an internal error with no context.
 */
export function formatError(
	type: string | undefined,
	context: SourceContext,
	message: string,
	args?: DiagnosticArgs
): string {
	const location = resolveContext(context)
	if (!location) {
		return formatError(INTERNAL_ERROR_TYPE, nocontext, SCINT001.message)
	}
	return renderDiagnostic(type, location, interpolateMessage(message, args))
}
