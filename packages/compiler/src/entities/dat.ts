import { readFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import type { Node } from 'ohm-js'
import * as ohm from 'ohm-js'
import { ConfigError } from '../core/errors.ts'
import { loadIde } from './ide.ts'
import { ModelTable } from './models.ts'

const grammarSource = String.raw`
Dat {
  file = (line nl)* line

  line = ideLine | otherLine
  ideLine = hspace* caseInsensitive<"IDE"> hspace+ path
  otherLine = (~eol any)*
  path = (~eol any)+

  eol = nl | end
  nl = "\r\n" | "\n"
  hspace = " " | "\t"
}
`

export const DatGrammar = ohm.grammar(grammarSource)

const semantics = DatGrammar.createSemantics()

semantics.addOperation<string[]>('idePaths', {
	file(lines: Node, _nls: Node, last: Node): string[] {
		return [...lines.children.flatMap((line: Node): string[] => line['idePaths']()), ...last['idePaths']()]
	},
	ideLine(_space: Node, _keyword: Node, _gap: Node, path: Node): string[] {
		return [path.sourceString.trim().replace(/\\/g, '/')]
	},
	line(inner: Node): string[] {
		return inner['idePaths']()
	},
	otherLine(_chars: Node): string[] {
		return []
	},
})

/**
 * IDE paths listed in a .dat file, in order.
 * Lines look like `IDE DATA\MAPS\GENERIC.IDE`; other directives and `#`
 * comments are ignored.
 */
export function parseDatIdePaths(text: string, path?: string): string[] {
	const match = DatGrammar.match(text)
	if (match.failed()) {
		throw new ConfigError(match.shortMessage ?? 'malformed DAT file', path)
	}
	return semantics(match)['idePaths']()
}

/**
 * Load every IDE file a .dat file lists into a new table. Paths in the dat
 * are relative to the game root, the parent of the dat file's directory.
 * Not thread-safe; finish loading before jobs start.
 * @throws {ConfigError} on unreadable or malformed input
 */
export async function loadDat(path: string, isDefaultDat: boolean): Promise<ModelTable> {
	let text: string
	try {
		text = await readFile(path, 'utf-8')
	} catch (error: unknown) {
		throw new ConfigError(error instanceof Error ? error.message : String(error), path)
	}

	const gameRoot = dirname(dirname(path))
	const output = new ModelTable()
	for (const idePath of parseDatIdePaths(text, path)) {
		await loadIde(join(gameRoot, idePath), isDefaultDat, output)
	}
	return output
}
