/**
 * Built-in command catalog.
 *
 * Each command carries the overloads ("alternators") it can be called with
 * and whether the active dialect implements it.
 */

import { ConfigError } from '../core/errors.ts'
import { dialectKey, type ReadonlyOptions } from '../core/options.ts'
import type { CommandDef, ParamType } from './schema.ts'

export type { CommandDef, ParamType } from './schema.ts'

/** Lexical kind of a call-site argument. */
export type ArgKind = 'int' | 'float' | 'string' | 'identifier'

export interface Alternator {
	readonly params: readonly ParamType[]
	/** Accepts any number of extra arguments after params. */
	readonly variadic: boolean
}

export interface Command {
	readonly name: string
	readonly id: number
	readonly supported: boolean
	readonly alternators: readonly Alternator[]
}

const ACCEPTS: Record<ParamType, readonly ArgKind[]> = {
	any: ['int', 'float', 'string', 'identifier'],
	float: ['float', 'identifier'],
	int: ['int', 'identifier'],
	label: ['identifier'],
	model: ['int', 'identifier'],
	string: ['string'],
	text_label: ['identifier', 'string'],
	var: ['identifier'],
}

export function acceptsArg(param: ParamType, kind: ArgKind): boolean {
	return ACCEPTS[param].includes(kind)
}

function arityMatches(alternator: Alternator, count: number): boolean {
	return alternator.variadic
		? count >= alternator.params.length
		: count === alternator.params.length
}

/**
 * Pick the overload for a call site: first by arity, then by argument kind.
 */
export function findAlternator(command: Command, args: readonly ArgKind[]): Alternator | undefined {
	return command.alternators.find(
		(alt) =>
			arityMatches(alt, args.length) &&
			alt.params.every((param, i) => {
				const kind = args[i]
				return kind !== undefined && acceptsArg(param, kind)
			})
	)
}

function isSupported(def: CommandDef, opt: ReadonlyOptions): boolean {
	const dialect = dialectKey(opt.header)
	const inDialect = dialect === undefined ? def.games.length > 0 : def.games.includes(dialect)
	return inDialect && (!def.cleo || opt.cleo !== undefined)
}

/**
 * The command table of a run. Read-only once built.
 */
export class Commands {
	private readonly byName: Map<string, Command> = new Map()

	/**
	 * @throws {ConfigError} when two definitions share a name, ignoring case
	 */
	static fromDefinitions(defs: Iterable<CommandDef>, opt: ReadonlyOptions): Commands {
		const commands = new Commands()
		for (const def of defs) {
			const key = def.name.toUpperCase()
			if (commands.byName.has(key)) {
				throw new ConfigError(`duplicate command "${def.name}"`)
			}
			commands.byName.set(key, {
				alternators: def.alternators.map((alt) => ({
					params: [...alt.params],
					variadic: alt.variadic ?? false,
				})),
				id: def.id,
				name: def.name,
				supported: isSupported(def, opt),
			})
		}
		return commands
	}

	/** Command names are case-insensitive in both source languages. */
	lookup(name: string): Command | undefined {
		return this.byName.get(name.toUpperCase())
	}

	get size(): number {
		return this.byName.size
	}

	*[Symbol.iterator](): Generator<Command> {
		yield* this.byName.values()
	}
}
