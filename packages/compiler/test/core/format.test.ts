import assert from 'node:assert'
import { describe, it } from 'node:test'
import { atNode, atPosition, atToken, atUnit, nocontext } from '../../src/core/context.ts'
import { formatError, resolveContext } from '../../src/core/format.ts'
import { TextStream, TokenStream, TokenStreamRegistry } from '../../src/core/source.ts'
import { SyntaxKind, SyntaxTree } from '../../src/core/syntax.ts'

const INTERNAL_ERROR = 'gta3sc: internal_error: context->token_stream() == nullptr during format_error'

describe('core/format', () => {
	const text = new TextStream('WAIT 0\nFOO 1 2\n', 'main.sc')

	describe('prefix', () => {
		it('should use the program tag without a context', () => {
			assert.strictEqual(formatError('error', nocontext, 'boom'), 'gta3sc: error: boom')
		})

		it('should omit the type when none is given', () => {
			assert.strictEqual(formatError(undefined, nocontext, 'boom'), 'gta3sc: boom')
		})

		it('should interpolate arguments', () => {
			assert.strictEqual(
				formatError('error', nocontext, "command '{name}' undefined", { name: 'FOO' }),
				"gta3sc: error: command 'FOO' undefined"
			)
		})

		it('should show the file and line when the column is unknown', () => {
			assert.strictEqual(
				formatError('error', atPosition('main.sc', 4, 0), 'x'),
				'main.sc:4: error: x'
			)
		})

		it('should show file, line and column', () => {
			assert.strictEqual(
				formatError('warning', atPosition('main.sc', 4, 9), 'x'),
				'main.sc:4:9: warning: x'
			)
		})

		it('should use the program tag when only the line is known', () => {
			assert.strictEqual(formatError('error', atPosition(undefined, 3, 2), 'x'), 'gta3sc:3:2: error: x')
		})

		it('should drop a column without a line', () => {
			assert.strictEqual(formatError('error', atPosition('main.sc', 0, 7), 'x'), 'main.sc: error: x')
		})
	})

	describe('source excerpt', () => {
		it('should add the source line and a caret under the column', () => {
			assert.strictEqual(
				formatError('warning', atPosition('main.sc', 2, 5, text), 'x'),
				'main.sc:2:5: warning: x\n FOO 1 2\n     ^'
			)
		})

		it('should put the caret first for column 1', () => {
			const lines = formatError('error', atPosition('main.sc', 2, 1, text), 'x').split('\n')
			assert.strictEqual(lines[2], ' ^')
		})

		it('should add the source line but no caret when the column is unknown', () => {
			assert.strictEqual(
				formatError('note', atPosition('main.sc', 2, 0, text), 'x'),
				'main.sc:2: note: x\n FOO 1 2'
			)
		})

		it('should leave out the excerpt for a line past the end of the stream', () => {
			assert.strictEqual(
				formatError('error', atPosition('main.sc', 5, 2, text), 'x'),
				'main.sc:5:2: error: x'
			)
		})
	})

	describe('unit context', () => {
		it('should name the file only', () => {
			assert.strictEqual(
				formatError('fatal error', atUnit({ path: 'scripts\\main.sc' }), 'x'),
				'scripts/main.sc: fatal error: x'
			)
		})
	})

	describe('token context', () => {
		it('should locate the token start', () => {
			assert.strictEqual(
				formatError('error', atToken(text, 7, 10), 'x'),
				'main.sc:2:1: error: x\n FOO 1 2\n ^'
			)
		})

		it('should treat an empty span as positionless', () => {
			assert.strictEqual(formatError('error', atToken(text, 7, 7), 'x'), 'main.sc: error: x')
		})
	})

	describe('node context', () => {
		function setup(): { registry: TokenStreamRegistry; stream: TokenStream } {
			const registry = new TokenStreamRegistry()
			return { registry, stream: new TokenStream(text) }
		}

		it('should use the node token', () => {
			const { registry, stream } = setup()
			const handle = registry.register(stream)
			const node = new SyntaxTree(SyntaxKind.Argument, handle, { begin: 11, end: 12 })
			assert.strictEqual(
				formatError('error', atNode(node), 'x'),
				'main.sc:2:5: error: x\n FOO 1 2\n     ^'
			)
		})

		it('should fall back to the first child with text', () => {
			const { registry, stream } = setup()
			const handle = registry.register(stream)
			const statement = new SyntaxTree(SyntaxKind.Statement, handle)
			statement.addChild(new SyntaxTree(SyntaxKind.Statement, handle))
			statement.addChild(new SyntaxTree(SyntaxKind.Command, handle, { begin: 7, end: 10 }))
			statement.addChild(new SyntaxTree(SyntaxKind.Argument, handle, { begin: 11, end: 12 }))
			assert.strictEqual(
				formatError('error', atNode(statement), 'x'),
				'main.sc:2:1: error: x\n FOO 1 2\n ^'
			)
		})

		it('should report an internal error when no node has text', () => {
			const { registry, stream } = setup()
			const handle = registry.register(stream)
			const statement = new SyntaxTree(SyntaxKind.Statement, handle)
			statement.addChild(new SyntaxTree(SyntaxKind.Statement, handle))
			assert.strictEqual(formatError('error', atNode(statement), 'x'), INTERNAL_ERROR)
		})

		it('should report an internal error once the stream is released', () => {
			const { registry, stream } = setup()
			const handle = registry.register(stream)
			const node = new SyntaxTree(SyntaxKind.Command, handle, { begin: 7, end: 10 })
			registry.release(handle.id)
			assert.strictEqual(formatError('error', atNode(node), 'x'), INTERNAL_ERROR)
		})
	})

	describe('resolveContext', () => {
		it('should resolve a token to its stream position', () => {
			const location = resolveContext(atToken(text, 9, 10))
			assert.strictEqual(location?.name, 'main.sc')
			assert.strictEqual(location?.line, 2)
			assert.strictEqual(location?.column, 3)
			assert.strictEqual(location?.stream, text)
		})

		it('should resolve no context to an unknown location', () => {
			assert.deepStrictEqual(resolveContext(nocontext), {
				column: 0,
				line: 0,
				name: undefined,
				stream: undefined,
			})
		})
	})
})
