export {
	type Alternator,
	type ArgKind,
	acceptsArg,
	type Command,
	type CommandDef,
	Commands,
	findAlternator,
	type ParamType,
} from './commands.ts'
export { DEFAULT_COMMANDS_PATH, loadCommands, parseCommandDefs } from './loader.ts'
