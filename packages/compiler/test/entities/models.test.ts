import assert from 'node:assert'
import { describe, it } from 'node:test'
import { compareIgnoreCase, ModelTable } from '../../src/entities/models.ts'

describe('entities/models', () => {
	describe('compareIgnoreCase', () => {
		it('should ignore ASCII case', () => {
			assert.strictEqual(compareIgnoreCase('Ped1', 'PED1'), 0)
			assert.strictEqual(compareIgnoreCase('landstal', 'LANDSTAL'), 0)
		})

		it('should order by folded characters, then length', () => {
			assert.ok(compareIgnoreCase('abc', 'ABD') < 0)
			assert.ok(compareIgnoreCase('B', 'a') > 0)
			assert.ok(compareIgnoreCase('a', 'ab') < 0)
		})
	})

	describe('ModelTable', () => {
		it('should look up names case-insensitively', () => {
			const table = new ModelTable([['Ped1', 7]])
			assert.strictEqual(table.get('PED1'), 7)
			assert.strictEqual(table.get('ped1'), 7)
			assert.strictEqual(table.has('ped2'), false)
			assert.strictEqual(table.get('ped2'), undefined)
		})

		it('should replace the id of an existing name and keep its spelling', () => {
			const table = new ModelTable()
			table.set('Cop', 1)
			table.set('COP', 2)
			assert.strictEqual(table.size, 1)
			assert.deepStrictEqual([...table], [['Cop', 2]])
		})

		it('should iterate in case-insensitive order', () => {
			const table = new ModelTable([
				['zebra', 3],
				['Apple', 1],
				['mango', 2],
			])
			assert.deepStrictEqual(
				[...table].map(([name]) => name),
				['Apple', 'mango', 'zebra']
			)
		})

		it('should store ids as unsigned 32-bit integers', () => {
			const table = new ModelTable()
			table.set('neg', -1)
			assert.strictEqual(table.get('neg'), 4294967295)
		})
	})
})
