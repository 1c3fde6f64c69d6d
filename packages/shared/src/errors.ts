/**
 * Error taxonomy for the revert pipeline.
 *
 * Every fatal failure is a `RevertError` subclass carrying a machine-readable `code`, optional
 * structured `details` and the original `cause`. Non-fatal per-element problems are not errors;
 * they are reported as `AmbiguousInversionWarning` values by `@osm-undo/change`.
 *
 * @module
 */

export const ERROR_CODES = {
	INPUT_VALIDATION: "INPUT_VALIDATION",
	POLICY: "POLICY",
	UPSTREAM_FETCH: "UPSTREAM_FETCH",
	DATA_CONSISTENCY: "DATA_CONSISTENCY",
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export type ErrorDetails = Record<string, string | number | boolean | undefined>

/**
 * Base error of the revert pipeline.
 */
export class RevertError extends Error {
	readonly code: ErrorCode
	readonly details?: ErrorDetails

	constructor(
		code: ErrorCode,
		message: string,
		details?: ErrorDetails,
		options?: { cause?: unknown },
	) {
		super(message, options)
		this.name = new.target.name
		this.code = code
		this.details = details
		Object.setPrototypeOf(this, new.target.prototype)
	}
}

/**
 * Malformed caller input: changeset id, element filter token, query filter, discussion text.
 * Raised before any network call.
 */
export class InputValidationError extends RevertError {
	constructor(message: string, details?: ErrorDetails) {
		super(ERROR_CODES.INPUT_VALIDATION, message, details)
	}
}

/**
 * Revert-size or account-based limits exceeded, or the target is protected. Never retried.
 */
export class PolicyError extends RevertError {
	constructor(message: string, details?: ErrorDetails) {
		super(ERROR_CODES.POLICY, message, details)
	}
}

/**
 * A network or service failure while talking to the map-data or history service.
 * `retryable` marks transient failures (timeouts, 429 and 5xx responses, connection errors).
 */
export class UpstreamFetchError extends RevertError {
	readonly status?: number
	readonly retryable: boolean

	constructor(
		message: string,
		{
			status,
			retryable,
			url,
			cause,
		}: { status?: number; retryable: boolean; url?: string; cause?: unknown },
	) {
		super(ERROR_CODES.UPSTREAM_FETCH, message, { status, url }, { cause })
		this.status = status
		this.retryable = retryable
	}
}

/**
 * The computed history does not agree with what the service declared, e.g. a diff larger than
 * the changeset it came from.
 */
export class DataConsistencyError extends RevertError {
	constructor(message: string, details?: ErrorDetails) {
		super(ERROR_CODES.DATA_CONSISTENCY, message, details)
	}
}

/** Check if an error is a transient upstream failure worth retrying. */
export function isRetryableError(error: unknown) {
	return error instanceof UpstreamFetchError && error.retryable
}
