import { HeaderVersion, Options, type OptionsInit } from './options.ts'

export type ConfigName = 'gta3' | 'gtavc' | 'gtasa' | 'none'

const PRESETS: Record<ConfigName, OptionsInit> = {
	gta3: {
		header: HeaderVersion.GTA3,
		localVarLimit: 16,
		missionVarBegin: 0,
		skipSingleIfs: false,
		timerIndex: 16,
		useHalfFloat: true,
	},
	gtasa: {
		allowBreakContinue: true,
		arrayElemLimit: 1024,
		farrays: true,
		fswitch: true,
		hasTextLabelPrefix: true,
		header: HeaderVersion.GTASA,
		localVarLimit: 32,
		missionVarBegin: 34,
		missionVarLimit: 1024,
		streamedScripts: true,
		switchCaseLimit: 75,
		textLabelVars: true,
		timerIndex: 32,
		useLocalOffsets: true,
	},
	gtavc: {
		header: HeaderVersion.GTAVC,
		localVarLimit: 16,
		missionVarBegin: 0,
		skipCutscene: true,
		timerIndex: 16,
	},
	none: {
		fsyntaxOnly: true,
		header: HeaderVersion.None,
	},
}

export function isConfigName(value: string): value is ConfigName {
	return Object.hasOwn(PRESETS, value)
}

/**
 * Build the options for a target game, with explicit settings applied on top.
 * An override left undefined keeps the preset value.
 */
export function createOptions(config: ConfigName, overrides: OptionsInit = {}): Options {
	return new Options(PRESETS[config]).configure(overrides)
}
