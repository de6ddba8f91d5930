/**
 * CLI diagnostic definitions.
 *
 * Error code format: SCCLI<NUMBER>
 * - SCCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (SCCLI001-099)
// =============================================================================

export const SCCLI001: DiagnosticDef = {
	code: 'SCCLI001',
	description: "gta3sc couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const SCCLI002: DiagnosticDef = {
	code: 'SCCLI002',
	description: "The file exists but gta3sc can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const SCCLI003: DiagnosticDef = {
	code: 'SCCLI003',
	description: "gta3sc doesn't know this target configuration.",
	message: 'unknown config "{config}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--config gta3`, `--config gtavc`, `--config gtasa` or `--config none`.',
}

export const SCCLI004: DiagnosticDef = {
	code: 'SCCLI004',
	description: "gta3sc doesn't know this source language.",
	message: 'unknown language "{lang}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--lang gta3script` or `--lang ir2`.',
}

export const SCCLI005: DiagnosticDef = {
	code: 'SCCLI005',
	description: 'A definition file (commands, dat or ide) could not be loaded.',
	message: 'cannot load definitions: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the file named in the message for syntax errors.',
}

export const SCCLI006: DiagnosticDef = {
	code: 'SCCLI006',
	description: 'Something unexpected went wrong during compilation.',
	message: 'compilation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

export const SCCLI007: DiagnosticDef = {
	code: 'SCCLI007',
	description: 'A `-D` flag must name a symbol, optionally followed by `=value`.',
	message: 'invalid define "{define}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write defines as `-D NAME` or `-D NAME=VALUE`.',
}
