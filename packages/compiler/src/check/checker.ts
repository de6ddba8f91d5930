/**
 * Check phase for one translation unit.
 *
 * Performs, per statement:
 * - Command resolution (fatal when the dialect lacks the command)
 * - Alternator selection by argument shape (fatal when none fits)
 * - Model argument validation against the IDE tables
 */

import { SCCMD050, SCENT001, SCENT050 } from '@gta3sc/diagnostics'
import { findAlternator } from '../commands/commands.ts'
import { atNode, atUnit } from '../core/context.ts'
import type { ProgramContext } from '../core/program.ts'
import type { TokenStreamRegistry, TranslationUnit } from '../core/source.ts'
import { SyntaxKind, type SyntaxTree } from '../core/syntax.ts'
import { classifyArg, scanUnit } from './scanner.ts'

export interface CheckResult {
	/** Statements checked, labels excluded */
	readonly statements: number
}

function checkModelArgs(
	program: ProgramContext,
	unit: TranslationUnit,
	params: readonly string[],
	args: readonly SyntaxTree[]
): void {
	params.forEach((param, i) => {
		const arg = args[i]
		if (param !== 'model' || arg === undefined) return
		const name = arg.text()
		if (classifyArg(name, program.opt.lang) !== 'identifier') return
		if (!program.isModelFromIde(name)) {
			program.report(atNode(arg), SCENT001, { name })
			program.report(atUnit(unit), SCENT050)
		}
	})
}

function checkStatement(program: ProgramContext, unit: TranslationUnit, statement: SyntaxTree): void {
	const commandNode = statement.child(0)
	const name = commandNode.text()

	if (program.opt.pedantic && name !== name.toUpperCase()) {
		program.report(atNode(commandNode), SCCMD050, { expected: name.toUpperCase(), name })
	}

	const command = program.supportedOrFatal(atNode(commandNode), program.commands.lookup(name), name)

	const args = statement.children.slice(1)
	const kinds = args.map((arg) => classifyArg(arg.text(), program.opt.lang))
	const alternator = program.supportedOrFatalAlternator(
		atNode(statement),
		findAlternator(command, kinds),
		command.name
	)

	checkModelArgs(program, unit, alternator.params, args)
}

/**
 * Check a translation unit. A fatal diagnostic unwinds out of this function
 * with HaltJobError; the unit's token stream is released either way.
 */
export function checkUnit(
	program: ProgramContext,
	registry: TokenStreamRegistry,
	unit: TranslationUnit,
	source: string
): CheckResult {
	const { handle, statements } = scanUnit(registry, unit, source)
	try {
		let checked = 0
		for (const statement of statements) {
			if (statement.kind === SyntaxKind.Label) continue
			checkStatement(program, unit, statement)
			checked++
		}
		return { statements: checked }
	} finally {
		registry.release(handle.id)
	}
}
