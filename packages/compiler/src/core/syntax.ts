import type { StreamHandle, TokenSpan, TokenStream } from './source.ts'

/** Syntax node kinds produced by the line scanner. */
export const SyntaxKind = {
	Argument: 2,
	Command: 1,
	Label: 3,
	Statement: 0,
} as const

export type SyntaxKind = (typeof SyntaxKind)[keyof typeof SyntaxKind]

/**
 * What the diagnostic engine needs from a parsed node.
 */
export interface SyntaxNode {
	readonly children: readonly SyntaxNode[]
	hasText(): boolean
	/** Only meaningful when hasText() is true. */
	getToken(): TokenSpan
	/** Originating stream, or undefined once it has been released. */
	tokenStream(): TokenStream | undefined
}

/**
 * A syntax tree node. Leaf-ish nodes carry a token; grouping nodes
 * (statements) carry none and only own children.
 */
export class SyntaxTree implements SyntaxNode {
	readonly kind: SyntaxKind
	readonly children: SyntaxTree[] = []
	private readonly token: TokenSpan | undefined
	private readonly stream: StreamHandle

	constructor(kind: SyntaxKind, stream: StreamHandle, token?: TokenSpan) {
		this.kind = kind
		this.stream = stream
		this.token = token
	}

	addChild(child: SyntaxTree): SyntaxTree {
		this.children.push(child)
		return child
	}

	child(index: number): SyntaxTree {
		const node = this.children[index]
		if (node === undefined) {
			throw new Error(`Invalid child index: ${index}`)
		}
		return node
	}

	hasText(): boolean {
		return this.token !== undefined
	}

	getToken(): TokenSpan {
		if (this.token === undefined) {
			throw new Error('getToken called on a node without text')
		}
		return this.token
	}

	/** Source text of the node's token. */
	text(): string {
		const stream = this.tokenStream()
		if (!stream || !this.token) return ''
		return stream.textOf(this.token)
	}

	tokenStream(): TokenStream | undefined {
		return this.stream.deref()
	}
}
