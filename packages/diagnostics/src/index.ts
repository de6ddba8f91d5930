/**
 * @gta3sc/diagnostics
 *
 * Shared diagnostic types and definitions for gta3sc packages.
 */

export {
	SCCLI001,
	SCCLI002,
	SCCLI003,
	SCCLI004,
	SCCLI005,
	SCCLI006,
	SCCLI007,
} from './cli.ts'
export {
	SCCMD001,
	SCCMD002,
	SCCMD050,
	SCENT001,
	SCENT050,
	SCINT001,
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export type { DiagnosticArgs, DiagnosticDef } from './types.ts'
export { DiagnosticSeverity } from './types.ts'
