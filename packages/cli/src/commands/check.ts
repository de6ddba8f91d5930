import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	type Commands,
	checkSources,
	createOptions,
	DEFAULT_COMMANDS_PATH,
	isConfigName,
	loadCommands,
	loadDat,
	ModelTable,
	type Options,
	ProgramContext,
	type SourceUnit,
} from '@gta3sc/compiler'
import {
	formatInvalidConfigError,
	formatInvalidDefineError,
	formatInvalidLangError,
	formatLoadError,
	formatReadError,
	formatSummary,
	parseDefine,
	parseLang,
	summarize,
} from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Check script files against the commands and models of a target game'

	@args.spread({ description: 'Script files to check' })
	declare files: string[]

	@flags.string({
		alias: 'c',
		default: 'gtasa',
		description: 'Target game: gta3, gtavc, gtasa or none (syntax only)',
	})
	declare config: string

	@flags.string({ default: 'gta3script', description: 'Source language: gta3script or ir2' })
	declare lang: string

	@flags.array({ alias: 'D', description: 'Define a preprocessor symbol (NAME or NAME=VALUE)' })
	declare define?: string[]

	@flags.boolean({ description: 'Warn about non-conventional spellings' })
	declare pedantic: boolean

	@flags.number({ description: 'Enable CLEO commands for the given CLEO version' })
	declare cleo?: number

	@flags.string({ description: 'Command definitions JSON file' })
	declare commands?: string

	@flags.string({ description: 'DAT file listing the default IDE files' })
	declare defaultDat?: string

	@flags.string({ description: 'DAT file listing the level IDE files' })
	declare levelDat?: string

	private fail(message: string): void {
		this.logger.error(message)
		this.exitCode = 1
	}

	private buildOptions(): Options | null {
		if (!isConfigName(this.config)) {
			this.fail(formatInvalidConfigError(this.config))
			return null
		}
		const lang = parseLang(this.lang)
		if (lang === undefined) {
			this.fail(formatInvalidLangError(this.lang))
			return null
		}

		const options = createOptions(this.config, {
			cleo: this.cleo,
			lang,
			outputCleo: this.cleo !== undefined,
			pedantic: this.pedantic,
		})

		for (const raw of this.define ?? []) {
			const define = parseDefine(raw)
			if (!define) {
				this.fail(formatInvalidDefineError(raw))
				return null
			}
			options.define(define.name, define.value)
		}
		return options
	}

	private async loadDefinitions(
		options: Options
	): Promise<{ commands: Commands; defaultModels: ModelTable; levelModels: ModelTable } | null> {
		try {
			const commands = await loadCommands(this.commands ?? DEFAULT_COMMANDS_PATH, options)
			const defaultModels = this.defaultDat
				? await loadDat(this.defaultDat, true)
				: new ModelTable()
			const levelModels = this.levelDat ? await loadDat(this.levelDat, false) : new ModelTable()
			return { commands, defaultModels, levelModels }
		} catch (error: unknown) {
			this.fail(formatLoadError(error))
			return null
		}
	}

	private async readUnits(program: ProgramContext): Promise<SourceUnit[]> {
		const units: SourceUnit[] = []
		for (const path of this.files) {
			try {
				units.push({ path, source: await readFile(path, 'utf-8') })
			} catch (error: unknown) {
				this.logger.error(formatReadError(path, error))
				program.registerErrors(1)
			}
		}
		return units
	}

	override async run(): Promise<void> {
		const options = this.buildOptions()
		if (options === null) return

		const definitions = await this.loadDefinitions(options)
		if (definitions === null) return

		const program = new ProgramContext(options, definitions.commands)
		program.setupModels(definitions.defaultModels, definitions.levelModels)

		const units = await this.readUnits(program)
		const outcomes = await checkSources(program, units)

		const summary = formatSummary(
			summarize(outcomes, program.errorCount + program.fatalCount, program.warningCount)
		)
		if (program.hasError()) {
			this.fail(summary)
		} else {
			this.logger.success(summary)
		}
	}
}
