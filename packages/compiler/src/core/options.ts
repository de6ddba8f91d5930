/**
 * Dialect configuration: target capabilities and compiler switches.
 *
 * Built once per run (see presets.ts) and handed to ProgramContext, which
 * exposes it to every job through the ReadonlyOptions view.
 */

/** Source syntax accepted by the front end. */
export const Lang = {
	GTA3Script: 1,
	IR2: 0,
} as const

export type Lang = (typeof Lang)[keyof typeof Lang]

/** Target VM generation. None is only valid in syntax-only mode. */
export const HeaderVersion = {
	GTA3: 1,
	GTASA: 3,
	GTAVC: 2,
	None: 0,
} as const

export type HeaderVersion = (typeof HeaderVersion)[keyof typeof HeaderVersion]

/**
 * Any header enumeration with one member per game generation.
 * CompiledScmHeaderVersion and DecompiledScmHeaderVersion both fit.
 */
export interface HeaderVersionTable<T> {
	readonly Liberty: T
	readonly Miami: T
	readonly SanAndreas: T
}

export interface OptionFlags {
	headerless: boolean
	pedantic: boolean
	guesser: boolean
	useHalfFloat: boolean
	hasTextLabelPrefix: boolean
	skipSingleIfs: boolean
	optimizeZeroFloats: boolean
	entityTracking: boolean
	scriptNameCheck: boolean
	fswitch: boolean
	allowBreakContinue: boolean
	scopeThenLabel: boolean
	farrays: boolean
	streamedScripts: boolean
	textLabelVars: boolean
	useLocalOffsets: boolean
	skipCutscene: boolean
	fsyntaxOnly: boolean
	emitIr2: boolean
	linearSweep: boolean
	relaxNot: boolean
	outputCleo: boolean
}

/** Absent limits mean unbounded, which is not the same as 0. */
export interface OptionLimits {
	cleo: number | undefined
	timerIndex: number
	localVarLimit: number
	missionVarBegin: number
	missionVarLimit: number | undefined
	switchCaseLimit: number | undefined
	arrayElemLimit: number | undefined
}

export interface OptionsInit extends Partial<OptionFlags>, Partial<OptionLimits> {
	lang?: Lang
	header?: HeaderVersion
	defines?: Iterable<readonly [string, string]>
}

/**
 * Read-only view shared by concurrently running jobs.
 */
export type ReadonlyOptions = Readonly<OptionFlags> &
	Readonly<OptionLimits> & {
		readonly lang: Lang
		readonly header: HeaderVersion
		isDefined(symbol: string): boolean
		getDefine(symbol: string): string | undefined
		getHeader<T>(table: HeaderVersionTable<T>): T
	}

const DEFAULT_FLAGS: OptionFlags = {
	allowBreakContinue: false,
	emitIr2: false,
	entityTracking: true,
	farrays: false,
	fswitch: false,
	fsyntaxOnly: false,
	guesser: false,
	hasTextLabelPrefix: false,
	headerless: false,
	linearSweep: false,
	optimizeZeroFloats: false,
	outputCleo: false,
	pedantic: false,
	relaxNot: false,
	scopeThenLabel: false,
	scriptNameCheck: true,
	skipCutscene: false,
	skipSingleIfs: false,
	streamedScripts: false,
	textLabelVars: false,
	useHalfFloat: false,
	useLocalOffsets: false,
}

export class Options implements ReadonlyOptions {
	lang: Lang = Lang.GTA3Script
	header: HeaderVersion = HeaderVersion.None

	headerless = DEFAULT_FLAGS.headerless
	pedantic = DEFAULT_FLAGS.pedantic
	guesser = DEFAULT_FLAGS.guesser
	useHalfFloat = DEFAULT_FLAGS.useHalfFloat
	hasTextLabelPrefix = DEFAULT_FLAGS.hasTextLabelPrefix
	skipSingleIfs = DEFAULT_FLAGS.skipSingleIfs
	optimizeZeroFloats = DEFAULT_FLAGS.optimizeZeroFloats
	entityTracking = DEFAULT_FLAGS.entityTracking
	scriptNameCheck = DEFAULT_FLAGS.scriptNameCheck
	fswitch = DEFAULT_FLAGS.fswitch
	allowBreakContinue = DEFAULT_FLAGS.allowBreakContinue
	scopeThenLabel = DEFAULT_FLAGS.scopeThenLabel
	farrays = DEFAULT_FLAGS.farrays
	streamedScripts = DEFAULT_FLAGS.streamedScripts
	textLabelVars = DEFAULT_FLAGS.textLabelVars
	useLocalOffsets = DEFAULT_FLAGS.useLocalOffsets
	skipCutscene = DEFAULT_FLAGS.skipCutscene
	fsyntaxOnly = DEFAULT_FLAGS.fsyntaxOnly
	emitIr2 = DEFAULT_FLAGS.emitIr2
	linearSweep = DEFAULT_FLAGS.linearSweep
	relaxNot = DEFAULT_FLAGS.relaxNot
	outputCleo = DEFAULT_FLAGS.outputCleo

	cleo: number | undefined = undefined
	timerIndex = 0
	localVarLimit = 0
	missionVarBegin = 0
	missionVarLimit: number | undefined = undefined
	switchCaseLimit: number | undefined = undefined
	arrayElemLimit: number | undefined = undefined

	private readonly defines: Map<string, string> = new Map()
	private sealed = false

	constructor(init: OptionsInit = {}) {
		this.configure(init)
	}

	/**
	 * Apply settings on top of the current ones. Entries whose value is
	 * undefined are skipped and keep the current setting.
	 */
	configure(init: OptionsInit): this {
		this.assertWritable()
		const { defines, ...fields } = init
		for (const [key, value] of Object.entries(fields)) {
			if (value !== undefined) Object.assign(this, { [key]: value })
		}
		if (defines) {
			for (const [symbol, value] of defines) this.define(symbol, value)
		}
		return this
	}

	/** Define a preprocessor symbol, replacing any previous value. */
	define(symbol: string, value = '1'): void {
		this.assertWritable()
		this.defines.set(symbol, value)
	}

	undefine(symbol: string): void {
		this.assertWritable()
		this.defines.delete(symbol)
	}

	/**
	 * Publish the options: later configure, define or undefine calls throw.
	 * Sealing twice is allowed.
	 */
	seal(): ReadonlyOptions {
		this.sealed = true
		Object.freeze(this)
		return this
	}

	get isSealed(): boolean {
		return this.sealed
	}

	private assertWritable(): void {
		if (this.sealed) {
			throw new Error('Options are read-only once published to a ProgramContext')
		}
	}

	isDefined(symbol: string): boolean {
		return this.defines.has(symbol)
	}

	getDefine(symbol: string): string | undefined {
		return this.defines.get(symbol)
	}

	/**
	 * Convert the target dialect into a concrete header enumeration.
	 * Callers must check for syntax-only mode first; None is a programming error.
	 */
	getHeader<T>(table: HeaderVersionTable<T>): T {
		switch (this.header) {
			case HeaderVersion.GTA3:
				return table.Liberty
			case HeaderVersion.GTAVC:
				return table.Miami
			case HeaderVersion.GTASA:
				return table.SanAndreas
			case HeaderVersion.None:
				throw new Error('getHeader called without a target dialect (HeaderVersion.None)')
		}
	}
}

export type DialectKey = 'gta3' | 'gtavc' | 'gtasa'

/** Key used by command definitions to list the dialects implementing them. */
export function dialectKey(header: HeaderVersion): DialectKey | undefined {
	switch (header) {
		case HeaderVersion.GTA3:
			return 'gta3'
		case HeaderVersion.GTAVC:
			return 'gtavc'
		case HeaderVersion.GTASA:
			return 'gtasa'
		case HeaderVersion.None:
			return undefined
	}
}
