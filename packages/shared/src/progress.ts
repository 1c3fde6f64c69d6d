/**
 * Progress helpers for long-running operations.
 *
 * Provides a standard payload for reporting progress from the revert pipeline. Callers pass an
 * `onProgress` callback; the default writes each message to the console.
 *
 * @module
 */

/**
 * Progress payload containing a message and timestamp. `step` and `steps` are set for work that
 * reports a position within a known number of stages.
 */
export type Progress = {
	msg: string
	timestamp: number
	step?: number
	steps?: number
}

/** Callback receiving progress updates. */
export type OnProgress = (progress: Progress) => void

/**
 * Create a Progress payload with current timestamp.
 * @param msg - The progress message.
 */
export function progress(msg: string): Progress {
	return {
		msg,
		timestamp: Date.now(),
	}
}

/**
 * Create a Progress payload for a numbered step, prefixing the message with `[step/steps]`.
 */
export function stepProgress(step: number, steps: number, msg: string) {
	return {
		...progress(`[${step}/${steps}] ${msg}`),
		step,
		steps,
	}
}

/**
 * Log a progress message to the console.
 */
export function logProgress(progress: Progress) {
	console.log(progress.msg)
}

/** Discard progress updates. */
export function ignoreProgress(_progress: Progress) {}
