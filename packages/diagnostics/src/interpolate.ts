import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fill the `{key}` placeholders of a catalog message. A placeholder with no
 * argument of its own name stays as written.
 */
export function interpolateMessage(message: string, args: DiagnosticArgs = {}): string {
	return message.replace(PLACEHOLDER, (placeholder: string, key: string) =>
		Object.hasOwn(args, key) ? String(args[key]) : placeholder
	)
}
