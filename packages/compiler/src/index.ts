/**
 * gta3sc Compiler Public API
 *
 * Semantic core between parsing and code generation:
 * - Dialect configuration shared read-only by all jobs (Options)
 * - Diagnostic engine with source contexts and atomic counters (ProgramContext)
 * - Command & alternator catalog gated by the target dialect (Commands)
 * - Case-insensitive model tables loaded from dat/ide files (ModelTable)
 * - Job driver unwinding one unit on a fatal error (runJobs)
 */

import { type CheckResult, checkUnit } from './check/checker.ts'
import type { ProgramContext } from './core/program.ts'
import { TokenStreamRegistry, type TranslationUnit } from './core/source.ts'
import { type JobOutcome, runJobs } from './jobs/driver.ts'

export { type CheckResult, checkUnit, classifyArg, type ScanResult, scanUnit } from './check/index.ts'
export {
	type Alternator,
	type ArgKind,
	acceptsArg,
	type Command,
	type CommandDef,
	Commands,
	DEFAULT_COMMANDS_PATH,
	findAlternator,
	loadCommands,
	type ParamType,
	parseCommandDefs,
} from './commands/index.ts'
export * from './core/index.ts'
export {
	collectModels,
	compareIgnoreCase,
	type IdeRecord,
	type IdeSection,
	loadDat,
	loadIde,
	ModelTable,
	parseDatIdePaths,
	parseIde,
} from './entities/index.ts'
export { type Job, type JobOutcome, type JobStatus, runJob, runJobs } from './jobs/index.ts'

/**
 * A translation unit together with its source text.
 */
export interface SourceUnit extends TranslationUnit {
	readonly source: string
}

/**
 * Check every unit concurrently against one program context.
 *
 * A unit ending in a fatal error is reported as 'aborted' and does not stop
 * the others. Whether the run failed is program.hasError().
 */
export function checkSources(
	program: ProgramContext,
	units: readonly SourceUnit[]
): Promise<JobOutcome<SourceUnit, CheckResult>[]> {
	const registry = new TokenStreamRegistry()
	return runJobs(units, (unit) => checkUnit(program, registry, unit, unit.source))
}
