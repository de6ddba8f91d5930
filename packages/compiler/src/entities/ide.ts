/**
 * Item definition (.ide) file reader.
 *
 * An IDE file is a list of sections, each opened by its name on a line of
 * its own and closed by `end`:
 * ```
 * # comment
 * peds
 * 1, cop, cop, COP, ...
 * end
 * ```
 * Records are comma-separated; the first two fields are the model id and
 * the model name. Only model sections feed the model tables.
 */

import { readFile } from 'node:fs/promises'
import type { Node } from 'ohm-js'
import * as ohm from 'ohm-js'
import { ConfigError } from '../core/errors.ts'
import type { ModelTable } from './models.ts'

export interface IdeRecord {
	readonly line: number
	readonly fields: string[]
}

export interface IdeSection {
	readonly name: string
	readonly records: IdeRecord[]
}

const grammarSource = String.raw`
Ide {
  file = (blank | section)* lastLine

  section = header body footer
  header = hspace* sectionName trailer
  body = (blank | record)*
  footer = hspace* endKeyword trailerOrEnd

  record = hspace* ~endKeyword field ("," field)* trailer
  field = hspace* value
  value = (~("," | "#" | nl) any)*

  blank = hspace* comment? nl
  trailer = hspace* comment? nl
  trailerOrEnd = hspace* comment? (nl | end)
  lastLine = hspace* comment?

  endKeyword = caseInsensitive<"end"> ~identChar
  sectionName = identChar+
  identChar = alnum | "_"

  comment = "#" (~nl any)*
  nl = "\r\n" | "\n"
  hspace = " " | "\t"
}
`

export const IdeGrammar = ohm.grammar(grammarSource)

function lineOf(node: Node): number {
	const { sourceString, startIdx } = node.source
	return (sourceString.substring(0, startIdx).match(/\n/g) ?? []).length + 1
}

const semantics = IdeGrammar.createSemantics()

semantics.addOperation<IdeSection[]>('sections', {
	blank(_space: Node, _comment: Node, _nl: Node): IdeSection[] {
		return []
	},
	file(items: Node, _lastLine: Node): IdeSection[] {
		return items.children.flatMap((item: Node): IdeSection[] => item['sections']())
	},
	section(header: Node, body: Node, _footer: Node): IdeSection[] {
		return [{ name: header['headerName'](), records: body['records']() }]
	},
})

semantics.addOperation<IdeRecord[]>('records', {
	blank(_space: Node, _comment: Node, _nl: Node): IdeRecord[] {
		return []
	},
	body(items: Node): IdeRecord[] {
		return items.children.flatMap((item: Node): IdeRecord[] => item['records']())
	},
	record(_space: Node, first: Node, _commas: Node, rest: Node, _trailer: Node): IdeRecord[] {
		const fields: string[] = [first['fieldValue'](), ...rest.children.map((f: Node): string => f['fieldValue']())]
		return [{ fields, line: lineOf(this) }]
	},
})

semantics.addOperation<string>('headerName', {
	header(_space: Node, name: Node, _trailer: Node): string {
		return name.sourceString.toLowerCase()
	},
})

semantics.addOperation<string>('fieldValue', {
	field(_space: Node, value: Node): string {
		return value.sourceString.trim()
	},
})

/**
 * Parse IDE text into its sections.
 * @throws {ConfigError} if the text is not a well-formed IDE file
 */
export function parseIde(text: string, path?: string): IdeSection[] {
	const match = IdeGrammar.match(text)
	if (match.failed()) {
		throw new ConfigError(match.shortMessage ?? 'malformed IDE file', path)
	}
	return semantics(match)['sections']()
}

/** Sections whose records name models. */
const MODEL_SECTIONS = ['objs', 'tobj', 'anim', 'peds', 'cars', 'hier', 'weap']

/** The default IDE only contributes the globally shared model sections. */
const DEFAULT_SECTIONS = ['peds', 'cars', 'hier', 'weap']

/**
 * Add the models of parsed IDE sections to a table.
 * @throws {ConfigError} on records without a valid id and name
 */
export function collectModels(
	sections: readonly IdeSection[],
	isDefaultIde: boolean,
	output: ModelTable,
	path?: string
): void {
	const wanted = isDefaultIde ? DEFAULT_SECTIONS : MODEL_SECTIONS
	for (const section of sections) {
		if (!wanted.includes(section.name)) continue
		for (const record of section.records) {
			const [idField, name] = record.fields
			if (idField === undefined || name === undefined || name.length === 0) {
				throw new ConfigError(`line ${record.line}: expected "id, model" in ${section.name}`, path)
			}
			if (!/^-?\d+$/.test(idField)) {
				throw new ConfigError(`line ${record.line}: invalid model id "${idField}"`, path)
			}
			output.set(name, Number(idField))
		}
	}
}

/**
 * Load the models of an IDE file into output.
 * Not thread-safe; finish loading before jobs start.
 * @throws {ConfigError} on unreadable or malformed input
 */
export async function loadIde(path: string, isDefaultIde: boolean, output: ModelTable): Promise<void> {
	let text: string
	try {
		text = await readFile(path, 'utf-8')
	} catch (error: unknown) {
		throw new ConfigError(error instanceof Error ? error.message : String(error), path)
	}
	collectModels(parseIde(text, path), isDefaultIde, output, path)
}
