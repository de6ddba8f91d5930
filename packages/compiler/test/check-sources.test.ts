import assert from 'node:assert'
import { describe, it } from 'node:test'
import { checkSources } from '../src/index.ts'
import { createTestProgram } from './helpers.ts'

describe('checkSources', () => {
	it('should check every unit and report aborted ones', async () => {
		const { program, sink } = createTestProgram()
		const outcomes = await checkSources(program, [
			{ path: 'a.sc', source: 'WAIT 0\n' },
			{ path: 'b.sc', source: 'SET_AREA_VISIBLE 1\nWAIT 0\n' },
			{ path: 'c\\d.sc', source: 'REQUEST_MODEL banshee\n' },
		])

		assert.deepStrictEqual(
			outcomes.map((o) => [o.unit.path, o.status, o.value]),
			[
				['a.sc', 'completed', { statements: 1 }],
				['b.sc', 'aborted', undefined],
				['c\\d.sc', 'completed', { statements: 1 }],
			]
		)
		assert.strictEqual(program.hasError(), true)
		assert.strictEqual(program.fatalCount, 1)
		assert.strictEqual(program.errorCount, 1)
		assert.strictEqual(sink.blocks.length, 3)
		assert.ok(sink.blocks.includes('c/d.sc: note: model names are read from the IDE files listed in the default and level DAT files'))
	})

	it('should succeed when every unit is clean', async () => {
		const { program, sink } = createTestProgram()
		const outcomes = await checkSources(program, [{ path: 'a.sc', source: 'WAIT 0\nwait 1\n' }])
		assert.strictEqual(outcomes[0]?.status, 'completed')
		assert.strictEqual(program.hasError(), false)
		assert.deepStrictEqual(sink.blocks, [])
	})
})
