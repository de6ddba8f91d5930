/**
 * Where in the source a diagnostic applies.
 *
 * Contexts are borrowed for the duration of a single diagnostic call;
 * the engine never keeps one.
 */

import type { TextStream, TokenInfo, TranslationUnit } from './source.ts'
import type { SyntaxNode } from './syntax.ts'

export interface NoContext {
	readonly kind: 'none'
}

export interface PositionContext {
	readonly kind: 'position'
	readonly stream: TextStream | undefined
	readonly name: string | undefined
	/** 1-based, 0 = unknown */
	readonly line: number
	/** 1-based, 0 = unknown */
	readonly column: number
}

export interface UnitContext {
	readonly kind: 'unit'
	readonly unit: TranslationUnit
}

export interface TokenContext {
	readonly kind: 'token'
	readonly token: TokenInfo
}

export interface NodeContext {
	readonly kind: 'node'
	readonly node: SyntaxNode
}

export type SourceContext = NoContext | PositionContext | UnitContext | TokenContext | NodeContext

export const nocontext: NoContext = { kind: 'none' }

export function atPosition(
	name: string | undefined,
	line: number,
	column: number,
	stream?: TextStream
): PositionContext {
	return { column, kind: 'position', line, name, stream }
}

export function atUnit(unit: TranslationUnit): UnitContext {
	return { kind: 'unit', unit }
}

export function atToken(stream: TextStream, begin: number, end: number): TokenContext {
	return { kind: 'token', token: { begin, end, stream } }
}

export function atNode(node: SyntaxNode): NodeContext {
	return { kind: 'node', node }
}
