/**
 * Retry with capped exponential backoff.
 *
 * @module
 */

import { isRetryableError } from "./errors"

export interface RetryOptions {
	/** Attempts after the first one. */
	retries: number
	/** Delay before the first retry, doubled on every further attempt. */
	retryDelayMs: number
	/** Upper bound of a single delay. */
	maxRetryDelayMs: number
	/** Decide whether an error is transient. Defaults to `isRetryableError`. */
	shouldRetry?: (error: unknown) => boolean
	/** Called before waiting for the next attempt. */
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
	retries: 3,
	retryDelayMs: 1_000,
	maxRetryDelayMs: 10_000,
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Delay before retry number `attempt` (1-based).
 */
export function backoffDelay(
	attempt: number,
	{ retryDelayMs, maxRetryDelayMs }: RetryOptions,
) {
	return Math.min(retryDelayMs * 2 ** (attempt - 1), maxRetryDelayMs)
}

/**
 * Run `fn` until it resolves, retrying transient failures. The last error is rethrown once
 * retries are exhausted; non-transient errors are rethrown immediately.
 */
export async function withRetry<T>(
	fn: (attempt: number) => Promise<T>,
	options: Partial<RetryOptions> = {},
): Promise<T> {
	const opts = { ...DEFAULT_RETRY_OPTIONS, ...options }
	const shouldRetry = opts.shouldRetry ?? isRetryableError

	for (let attempt = 0; ; attempt++) {
		try {
			return await fn(attempt)
		} catch (error) {
			if (attempt >= opts.retries || !shouldRetry(error)) throw error
			const delay = backoffDelay(attempt + 1, opts)
			opts.onRetry?.(error, attempt + 1, delay)
			await sleep(delay)
		}
	}
}
