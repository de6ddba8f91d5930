/**
 * Per-run program context: the shared read-only configuration plus the
 * diagnostic engine used by every translation-unit job.
 */

import {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	SCCMD001,
	SCCMD002,
} from '@gta3sc/diagnostics'
import type { Alternator, Command, Commands } from '../commands/commands.ts'
import { ModelTable } from '../entities/models.ts'
import type { SourceContext } from './context.ts'
import { DiagnosticCounters } from './counters.ts'
import { HaltJobError } from './errors.ts'
import { formatError } from './format.ts'
import type { Options, ReadonlyOptions } from './options.ts'

/**
 * Destination of rendered diagnostics. Each call receives one complete
 * block (possibly multi-line, without the trailing newline).
 */
export interface DiagnosticSink {
	write(block: string): void
}

export const stderrSink: DiagnosticSink = {
	write(block: string): void {
		process.stderr.write(`${block}\n`)
	},
}

export class ProgramContext {
	/** Compiler options / flags. */
	readonly opt: ReadonlyOptions
	/** Built-in commands for the active dialect. */
	readonly commands: Commands

	private readonly counters: DiagnosticCounters
	private readonly sink: DiagnosticSink

	private defaultModels: ModelTable = new ModelTable()
	private levelModels: ModelTable = new ModelTable()

	/**
	 * Publishes opt: it is sealed here and no longer accepts changes.
	 */
	constructor(
		opt: Options,
		commands: Commands,
		sink: DiagnosticSink = stderrSink,
		counters: DiagnosticCounters = new DiagnosticCounters()
	) {
		this.opt = opt.seal()
		this.commands = commands
		this.sink = sink
		this.counters = counters
	}

	// ===========================================================================
	// ENTITIES
	// ===========================================================================

	/**
	 * Replace both model tables.
	 * Not safe while jobs are running; call before the first job starts.
	 */
	setupModels(defaultModels: ModelTable, levelModels: ModelTable): void {
		this.defaultModels = defaultModels
		this.levelModels = levelModels
	}

	isModelFromIde(name: string): boolean {
		return this.defaultModels.has(name) || this.levelModels.has(name)
	}

	// ===========================================================================
	// DIAGNOSTICS
	// ===========================================================================

	hasError(): boolean {
		return this.counters.errors > 0 || this.counters.fatals > 0
	}

	get errorCount(): number {
		return this.counters.errors
	}

	get warningCount(): number {
		return this.counters.warnings
	}

	get fatalCount(): number {
		return this.counters.fatals
	}

	error(context: SourceContext, message: string, args?: DiagnosticArgs): void {
		this.counters.addErrors()
		this.puts(formatError('error', context, message, args))
	}

	note(context: SourceContext, message: string, args?: DiagnosticArgs): void {
		this.puts(formatError('note', context, message, args))
	}

	warning(context: SourceContext, message: string, args?: DiagnosticArgs): void {
		this.counters.addWarnings()
		this.puts(formatError('warning', context, message, args))
	}

	/**
	 * Report and abort the current translation unit.
	 * @throws {HaltJobError} always
	 */
	fatalError(context: SourceContext, message: string, args?: DiagnosticArgs): never {
		this.counters.addFatal()
		this.puts(formatError('fatal error', context, message, args))
		throw new HaltJobError()
	}

	/**
	 * Report a catalog diagnostic with the entry point matching its severity.
	 */
	report(context: SourceContext, def: DiagnosticDef, args?: DiagnosticArgs): void {
		switch (def.severity) {
			case DiagnosticSeverity.Error:
				return this.error(context, def.message, args)
			case DiagnosticSeverity.Warning:
				return this.warning(context, def.message, args)
			case DiagnosticSeverity.Note:
				return this.note(context, def.message, args)
			case DiagnosticSeverity.Fatal:
				return this.fatalError(context, def.message, args)
		}
	}

	/** Count errors found by a collaborator that reported them itself. n may be 0. */
	registerErrors(n: number): void {
		this.counters.addErrors(n)
	}

	// ===========================================================================
	// COMMAND GUARDS
	// ===========================================================================

	/**
	 * The single place where an operation missing from the target dialect
	 * becomes a user error. A returned command is valid for the dialect.
	 */
	supportedOrFatal(context: SourceContext, command: Command | undefined, name: string): Command {
		if (command === undefined || !command.supported) {
			return this.fatalError(context, SCCMD001.message, { name })
		}
		return command
	}

	supportedOrFatalAlternator(
		context: SourceContext,
		alternator: Alternator | undefined,
		name: string
	): Alternator {
		if (alternator === undefined) {
			return this.fatalError(context, SCCMD002.message, { name })
		}
		return alternator
	}

	private puts(block: string): void {
		this.sink.write(block)
	}
}
