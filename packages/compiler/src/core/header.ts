/**
 * Header enumerations of the output stages.
 * Options.getHeader() maps the target dialect onto either of them.
 */

export const CompiledScmHeaderVersion = {
	Liberty: 0,
	Miami: 1,
	SanAndreas: 2,
} as const

export type CompiledScmHeaderVersion =
	(typeof CompiledScmHeaderVersion)[keyof typeof CompiledScmHeaderVersion]

export const DecompiledScmHeaderVersion = {
	Liberty: 'liberty',
	Miami: 'miami',
	SanAndreas: 'san-andreas',
} as const

export type DecompiledScmHeaderVersion =
	(typeof DecompiledScmHeaderVersion)[keyof typeof DecompiledScmHeaderVersion]
