/**
 * Thrown by fatalError to unwind the current translation-unit job.
 * Only the job driver may catch it.
 */
export class HaltJobError extends Error {
	constructor() {
		super('translation unit halted by a fatal error')
		this.name = 'HaltJobError'
	}
}

/**
 * Malformed definition input (command definitions, dat or ide files).
 * Raised before any job starts.
 */
export class ConfigError extends Error {
	readonly path: string | undefined

	constructor(message: string, path?: string) {
		super(path !== undefined ? `${path}: ${message}` : message)
		this.name = 'ConfigError'
		this.path = path
	}
}
