import {
	type CommandDef,
	Commands,
	createOptions,
	type DiagnosticSink,
	type Options,
	ProgramContext,
} from '../src/index.ts'

const ALL_GAMES = ['gta3', 'gtavc', 'gtasa'] as const

export const TEST_COMMANDS: CommandDef[] = [
	{ alternators: [{ params: ['int'] }], games: ALL_GAMES, id: 1, name: 'WAIT' },
	{
		alternators: [{ params: ['var', 'int'] }, { params: ['var', 'float'] }, { params: ['var', 'string'] }],
		games: ALL_GAMES,
		id: 4,
		name: 'SET',
	},
	{ alternators: [{ params: ['label'], variadic: true }], games: ALL_GAMES, id: 79, name: 'START_NEW_SCRIPT' },
	{
		alternators: [{ params: ['model', 'float', 'float', 'float', 'var'] }],
		games: ALL_GAMES,
		id: 165,
		name: 'CREATE_CAR',
	},
	{ alternators: [{ params: ['model'] }], games: ALL_GAMES, id: 583, name: 'REQUEST_MODEL' },
	{ alternators: [{ params: ['text_label', 'int', 'int'] }], games: ALL_GAMES, id: 188, name: 'PRINT_NOW' },
	{ alternators: [{ params: ['int'] }], games: ['gtavc', 'gtasa'], id: 1211, name: 'SET_AREA_VISIBLE' },
	{ alternators: [{ params: ['label', 'var'] }], cleo: true, games: ALL_GAMES, id: 2758, name: 'GET_LABEL_POINTER' },
]

/**
 * Sink that keeps every emitted block.
 */
export class CollectingSink implements DiagnosticSink {
	readonly blocks: string[] = []

	write(block: string): void {
		this.blocks.push(block)
	}
}

export function createTestProgram(options: Options = createOptions('gta3')): {
	program: ProgramContext
	sink: CollectingSink
} {
	const sink = new CollectingSink()
	const commands = Commands.fromDefinitions(TEST_COMMANDS, options)
	return { program: new ProgramContext(options, commands, sink), sink }
}
