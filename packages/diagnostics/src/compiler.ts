/**
 * Compiler diagnostic definitions.
 *
 * Error code format: SC<AREA><NUMBER>
 * - SCCMD: Command resolution errors (001-049), warnings (050-099)
 * - SCENT: Entity errors (001-049), notes (050-099)
 * - SCINT: Internal errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// COMMAND ERRORS (SCCMD001-049)
// =============================================================================

export const SCCMD001: DiagnosticDef = {
	code: 'SCCMD001',
	description:
		'This command is not in the command definitions, or the selected target game does not implement it.',
	message: "command '{name}' undefined or unsupported",
	severity: DiagnosticSeverity.Fatal,
	suggestion: 'Check the spelling, or pick a `--config` whose game provides this command.',
}

export const SCCMD002: DiagnosticDef = {
	code: 'SCCMD002',
	description: 'None of the overloads of this command accept the given arguments.',
	message: "alternator '{name}' undefined or unsupported",
	severity: DiagnosticSeverity.Fatal,
	suggestion: 'Check the number and kind of the arguments.',
}

// =============================================================================
// COMMAND WARNINGS (SCCMD050-099)
// =============================================================================

export const SCCMD050: DiagnosticDef = {
	code: 'SCCMD050',
	description: 'Command names are case-insensitive, but are conventionally written in upper case.',
	message: "command '{name}' should be written as '{expected}'",
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// ENTITY ERRORS (SCENT001-049)
// =============================================================================

export const SCENT001: DiagnosticDef = {
	code: 'SCENT001',
	description: 'A model argument names something that no loaded IDE file declares.',
	message: "unknown model '{name}'",
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// ENTITY NOTES (SCENT050-099)
// =============================================================================

export const SCENT050: DiagnosticDef = {
	code: 'SCENT050',
	description: 'Explains where model names come from.',
	message: 'model names are read from the IDE files listed in the default and level DAT files',
	severity: DiagnosticSeverity.Note,
}

// =============================================================================
// INTERNAL ERRORS (SCINT001-099)
// =============================================================================

export const SCINT001: DiagnosticDef = {
	code: 'SCINT001',
	description: 'A syntax node could not be traced back to its token stream. This is a compiler bug.',
	message: 'context->token_stream() == nullptr during format_error',
	severity: DiagnosticSeverity.Error,
}
