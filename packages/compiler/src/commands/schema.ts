/**
 * Shape of the command definition file.
 *
 * ```json
 * { "commands": [{ "name": "WAIT", "id": 1, "games": ["gta3"], "alternators": [{ "params": ["int"] }] }] }
 * ```
 */

import { z } from 'zod'

export const ParamTypeSchema = z.enum(['int', 'float', 'any', 'label', 'text_label', 'model', 'var', 'string'], {
	error: 'unknown parameter type',
})

export const DialectKeySchema = z.enum(['gta3', 'gtavc', 'gtasa'], {
	error: 'games must list gta3, gtavc or gtasa',
})

export const AlternatorDefSchema = z.object({
	params: z.array(ParamTypeSchema).readonly(),
	variadic: z.boolean().optional(),
})

const ID_RANGE = 'id must be an integer in 0..0xFFFF'

export const CommandDefSchema = z.object({
	alternators: z
		.array(AlternatorDefSchema)
		.min(1, { error: 'at least one alternator is required' })
		.readonly(),
	/** Lives in the CLEO opcode space; needs Options.cleo. */
	cleo: z.boolean().optional(),
	games: z.array(DialectKeySchema).readonly(),
	id: z
		.number({ error: ID_RANGE })
		.int({ error: ID_RANGE })
		.min(0, { error: ID_RANGE })
		.max(0xffff, { error: ID_RANGE }),
	name: z.string().min(1, { error: 'a command needs a name' }),
})

export const CommandFileSchema = z.object(
	{ commands: z.array(CommandDefSchema) },
	{ error: 'expected an object with a "commands" array' }
)

export type ParamType = z.infer<typeof ParamTypeSchema>

/**
 * A command as written in the definition file.
 */
export type CommandDef = z.infer<typeof CommandDefSchema>
