/**
 * Error, warning and fatal counters shared by every job of a run.
 *
 * Backed by a SharedArrayBuffer and updated with Atomics, so the same buffer
 * can also be handed to worker threads.
 */

const ERROR = 0
const WARNING = 1
const FATAL = 2

export class DiagnosticCounters {
	readonly buffer: SharedArrayBuffer
	private readonly cells: Uint32Array

	constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(3 * Uint32Array.BYTES_PER_ELEMENT)) {
		this.buffer = buffer
		this.cells = new Uint32Array(buffer, 0, 3)
	}

	addErrors(n = 1): void {
		Atomics.add(this.cells, ERROR, n)
	}

	addWarnings(n = 1): void {
		Atomics.add(this.cells, WARNING, n)
	}

	addFatal(): void {
		Atomics.add(this.cells, FATAL, 1)
	}

	get errors(): number {
		return Atomics.load(this.cells, ERROR)
	}

	get warnings(): number {
		return Atomics.load(this.cells, WARNING)
	}

	get fatals(): number {
		return Atomics.load(this.cells, FATAL)
	}
}
