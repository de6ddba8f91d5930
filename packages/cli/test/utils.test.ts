import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ConfigError, Lang } from '@gta3sc/compiler'
import {
	formatInvalidConfigError,
	formatInvalidDefineError,
	formatInvalidLangError,
	formatLoadError,
	formatReadError,
	formatSummary,
	getErrorMessage,
	isNodeError,
	parseDefine,
	parseLang,
	summarize,
} from '../src/utils.ts'

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		const error = Object.assign(new Error('test'), { code: 'ENOENT' })
		assert.strictEqual(isNodeError(error), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		const error = Object.assign(new Error('no such file'), { code: 'ENOENT' })
		assert.strictEqual(
			formatReadError('/path/to/main.sc', error),
			'[SCCLI001] file not found: /path/to/main.sc'
		)
	})

	it('should format other errors with the reason', () => {
		const error = Object.assign(new Error('permission denied'), { code: 'EACCES' })
		assert.strictEqual(
			formatReadError('/path/to/main.sc', error),
			'[SCCLI002] cannot read file: permission denied'
		)
	})
})

describe('flag errors', () => {
	it('should format an unknown config', () => {
		assert.strictEqual(formatInvalidConfigError('gta4'), '[SCCLI003] unknown config "gta4"')
	})

	it('should format an unknown language', () => {
		assert.strictEqual(formatInvalidLangError('scm'), '[SCCLI004] unknown language "scm"')
	})

	it('should format an invalid define', () => {
		assert.strictEqual(formatInvalidDefineError('=1'), '[SCCLI007] invalid define "=1"')
	})
})

describe('formatLoadError', () => {
	it('should report ConfigError as a definition error', () => {
		const error = new ConfigError('bad id', 'data/commands.json')
		assert.strictEqual(
			formatLoadError(error),
			'[SCCLI005] cannot load definitions: data/commands.json: bad id'
		)
	})

	it('should wrap other errors as compilation failures', () => {
		assert.strictEqual(
			formatLoadError(new Error('boom')),
			'[SCCLI006] compilation failed: boom'
		)
	})
})

describe('parseLang', () => {
	it('should accept both languages case-insensitively', () => {
		assert.strictEqual(parseLang('gta3script'), Lang.GTA3Script)
		assert.strictEqual(parseLang('IR2'), Lang.IR2)
	})

	it('should reject anything else', () => {
		assert.strictEqual(parseLang('scm'), undefined)
		assert.strictEqual(parseLang(''), undefined)
	})
})

describe('parseDefine', () => {
	it('should default the value to 1', () => {
		assert.deepStrictEqual(parseDefine('DEBUG'), { name: 'DEBUG', value: '1' })
	})

	it('should split NAME=VALUE', () => {
		assert.deepStrictEqual(parseDefine('LEVEL=3'), { name: 'LEVEL', value: '3' })
	})

	it('should keep an empty value', () => {
		assert.deepStrictEqual(parseDefine('EMPTY='), { name: 'EMPTY', value: '' })
	})

	it('should reject names that are not identifiers', () => {
		assert.strictEqual(parseDefine('=1'), undefined)
		assert.strictEqual(parseDefine('1ABC'), undefined)
		assert.strictEqual(parseDefine(''), undefined)
	})
})

describe('formatSummary', () => {
	const unit = { path: 'main.sc', source: '' }

	it('should pluralize counts', () => {
		const summary = summarize([{ status: 'completed', unit }], 1, 2)
		assert.strictEqual(formatSummary(summary), '1 file checked, 1 error, 2 warnings')
	})

	it('should mention aborted units', () => {
		const summary = summarize(
			[
				{ status: 'aborted', unit },
				{ status: 'completed', unit },
			],
			1,
			0
		)
		assert.strictEqual(formatSummary(summary), '2 files checked, 1 error, 0 warnings, 1 aborted')
	})
})
