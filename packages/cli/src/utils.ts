import type { JobOutcome, SourceUnit } from '@gta3sc/compiler'
import { ConfigError, Lang } from '@gta3sc/compiler'
import {
	interpolateMessage,
	SCCLI001,
	SCCLI002,
	SCCLI003,
	SCCLI004,
	SCCLI005,
	SCCLI006,
	SCCLI007,
} from '@gta3sc/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(SCCLI001.message, { path: filePath })
		return `[${SCCLI001.code}] ${message}`
	}
	const message = interpolateMessage(SCCLI002.message, { reason: getErrorMessage(error) })
	return `[${SCCLI002.code}] ${message}`
}

export function formatInvalidConfigError(config: string): string {
	const message = interpolateMessage(SCCLI003.message, { config })
	return `[${SCCLI003.code}] ${message}`
}

export function formatInvalidLangError(lang: string): string {
	const message = interpolateMessage(SCCLI004.message, { lang })
	return `[${SCCLI004.code}] ${message}`
}

export function formatInvalidDefineError(define: string): string {
	const message = interpolateMessage(SCCLI007.message, { define })
	return `[${SCCLI007.code}] ${message}`
}

export function formatLoadError(error: unknown): string {
	if (error instanceof ConfigError) {
		const message = interpolateMessage(SCCLI005.message, { reason: error.message })
		return `[${SCCLI005.code}] ${message}`
	}
	const message = interpolateMessage(SCCLI006.message, { reason: getErrorMessage(error) })
	return `[${SCCLI006.code}] ${message}`
}

export function parseLang(value: string): Lang | undefined {
	switch (value.toLowerCase()) {
		case 'gta3script':
			return Lang.GTA3Script
		case 'ir2':
			return Lang.IR2
		default:
			return undefined
	}
}

export interface Define {
	readonly name: string
	readonly value: string
}

/**
 * Parse a `-D NAME` or `-D NAME=VALUE` flag. NAME defaults to the value '1'.
 */
export function parseDefine(raw: string): Define | undefined {
	const match = /^([A-Za-z_][A-Za-z0-9_]*)(?:=(.*))?$/.exec(raw)
	if (!match?.[1]) return undefined
	return { name: match[1], value: match[2] ?? '1' }
}

export interface CheckSummary {
	readonly files: number
	readonly aborted: number
	readonly errors: number
	readonly warnings: number
}

export function summarize(
	outcomes: readonly JobOutcome<SourceUnit, unknown>[],
	errors: number,
	warnings: number
): CheckSummary {
	return {
		aborted: outcomes.filter((o) => o.status === 'aborted').length,
		errors,
		files: outcomes.length,
		warnings,
	}
}

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? '' : 's'}`
}

export function formatSummary(summary: CheckSummary): string {
	const parts = [
		`${plural(summary.files, 'file')} checked`,
		plural(summary.errors, 'error'),
		plural(summary.warnings, 'warning'),
	]
	if (summary.aborted > 0) parts.push(`${summary.aborted} aborted`)
	return parts.join(', ')
}
