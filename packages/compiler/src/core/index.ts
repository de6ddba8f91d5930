/**
 * Core of the gta3sc compiler: dialect configuration, source contexts and
 * the diagnostic engine shared by every translation-unit job.
 */

export {
	atNode,
	atPosition,
	atToken,
	atUnit,
	type NoContext,
	type NodeContext,
	nocontext,
	type PositionContext,
	type SourceContext,
	type TokenContext,
	type UnitContext,
} from './context.ts'
export { DiagnosticCounters } from './counters.ts'
export { ConfigError, HaltJobError } from './errors.ts'
export {
	formatError,
	INTERNAL_ERROR_TYPE,
	PROGRAM_TAG,
	renderDiagnostic,
	resolveContext,
	type SourceLocation,
} from './format.ts'
export { CompiledScmHeaderVersion, DecompiledScmHeaderVersion } from './header.ts'
export {
	type DialectKey,
	dialectKey,
	HeaderVersion,
	type HeaderVersionTable,
	Lang,
	type OptionFlags,
	type OptionLimits,
	Options,
	type OptionsInit,
	type ReadonlyOptions,
} from './options.ts'
export { type ConfigName, createOptions, isConfigName } from './presets.ts'
export { type DiagnosticSink, ProgramContext, stderrSink } from './program.ts'
export {
	StreamHandle,
	type StreamId,
	streamId,
	TextStream,
	type TokenInfo,
	type TokenSpan,
	TokenStream,
	TokenStreamRegistry,
	type TranslationUnit,
	unitDisplayName,
} from './source.ts'
export { SyntaxKind, type SyntaxNode, SyntaxTree } from './syntax.ts'
