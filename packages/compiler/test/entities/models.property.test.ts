import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { compareIgnoreCase, ModelTable } from '../../src/entities/models.ts'

const modelNameArb = fc.stringMatching(/^[A-Za-z0-9_]{1,16}$/)

describe('entities/models properties', () => {
	it('any spelling of a registered name is found', () => {
		fc.assert(
			fc.property(fc.array(modelNameArb, { maxLength: 30 }), modelNameArb, (others, name) => {
				const table = new ModelTable(others.map((n, i) => [n, i]))
				table.set(name, 99)
				return (
					table.get(name.toUpperCase()) === 99 &&
					table.get(name.toLowerCase()) === 99 &&
					table.has(name)
				)
			}),
			{ numRuns: 300 }
		)
	})

	it('iteration is sorted and free of case-insensitive duplicates', () => {
		fc.assert(
			fc.property(fc.array(modelNameArb, { maxLength: 40 }), (names) => {
				const table = new ModelTable(names.map((n, i) => [n, i]))
				const keys = [...table].map(([name]) => name)
				for (let i = 1; i < keys.length; i++) {
					const prev = keys[i - 1]
					const next = keys[i]
					assert.ok(prev !== undefined && next !== undefined)
					assert.ok(compareIgnoreCase(prev, next) < 0)
				}
				const distinct = new Set(names.map((n) => n.toLowerCase()))
				assert.strictEqual(table.size, distinct.size)
			}),
			{ numRuns: 300 }
		)
	})
})
