/**
 * Translation-unit job driver.
 *
 * The only place a HaltJobError is caught: a fatal error aborts its own unit
 * and the remaining units keep going.
 */

import { HaltJobError } from '../core/errors.ts'
import type { TranslationUnit } from '../core/source.ts'

export type JobStatus = 'completed' | 'aborted'

export interface JobOutcome<U extends TranslationUnit, T> {
	readonly unit: U
	readonly status: JobStatus
	/** Result of a completed job */
	readonly value?: T
}

export type Job<U extends TranslationUnit, T> = (unit: U) => T | Promise<T>

/**
 * Run one job, converting a fatal abort into an 'aborted' outcome.
 * Any other error is a defect and propagates.
 */
export async function runJob<U extends TranslationUnit, T>(
	unit: U,
	job: Job<U, T>
): Promise<JobOutcome<U, T>> {
	try {
		const value = await job(unit)
		return { status: 'completed', unit, value }
	} catch (error: unknown) {
		if (error instanceof HaltJobError) {
			return { status: 'aborted', unit }
		}
		throw error
	}
}

/**
 * Run every unit concurrently. Outcomes are in input order.
 */
export function runJobs<U extends TranslationUnit, T>(
	units: readonly U[],
	job: Job<U, T>
): Promise<JobOutcome<U, T>[]> {
	return Promise.all(units.map((unit) => runJob(unit, job)))
}
