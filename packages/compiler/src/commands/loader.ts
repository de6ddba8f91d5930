import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { ConfigError } from '../core/errors.ts'
import type { ReadonlyOptions } from '../core/options.ts'
import { type CommandDef, Commands } from './commands.ts'
import { CommandFileSchema } from './schema.ts'

/** Definitions shipped with the compiler. */
export const DEFAULT_COMMANDS_PATH = fileURLToPath(new URL('../../data/commands.json', import.meta.url))

/** `commands[3].alternators[0].params` */
function formatPath(path: readonly PropertyKey[]): string {
	return path.reduce<string>((out, key) => {
		if (typeof key === 'number') return `${out}[${key}]`
		return out.length > 0 ? `${out}.${String(key)}` : String(key)
	}, '')
}

/**
 * Validate the parsed contents of a command definition file.
 * @throws {ConfigError} listing every schema violation
 */
export function parseCommandDefs(data: unknown): CommandDef[] {
	const parsed = CommandFileSchema.safeParse(data)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) =>
			issue.path.length > 0 ? `${formatPath(issue.path)}: ${issue.message}` : issue.message
		)
		throw new ConfigError(issues.join('; '))
	}
	return parsed.data.commands
}

/**
 * Load the command catalog for the given options.
 * @throws {ConfigError} on unreadable or malformed input
 */
export async function loadCommands(path: string, opt: ReadonlyOptions): Promise<Commands> {
	let source: string
	try {
		source = await readFile(path, 'utf-8')
	} catch (error: unknown) {
		throw new ConfigError(error instanceof Error ? error.message : String(error), path)
	}

	let data: unknown
	try {
		data = JSON.parse(source)
	} catch (error: unknown) {
		throw new ConfigError(error instanceof Error ? error.message : String(error), path)
	}

	try {
		return Commands.fromDefinitions(parseCommandDefs(data), opt)
	} catch (error: unknown) {
		if (error instanceof ConfigError) throw new ConfigError(error.message, path)
		throw error
	}
}
