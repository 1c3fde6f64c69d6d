/**
 * Fetch helpers shared by the service clients.
 *
 * Every request carries a timeout. Network failures and unsuccessful responses become
 * `UpstreamFetchError`s, marked retryable for timeouts, connection errors, 429 and 5xx responses.
 *
 * @module
 */

import { UpstreamFetchError } from "@osm-undo/shared/errors"
import type { z } from "zod"

export type FetchFunction = (
	input: string,
	init?: RequestInit,
) => Promise<Response>

export interface HttpOptions {
	fetch: FetchFunction
	/** Abort requests running longer than this. */
	timeoutMs: number
	userAgent: string
	/** Value of the `Authorization` header, e.g. `Bearer <token>`. */
	authorization?: string
}

/** Uses the global `fetch` at call time so it can be replaced in tests. */
export const globalFetch: FetchFunction = (input, init) => fetch(input, init)

export function isRetryableStatus(status: number) {
	return status === 429 || status >= 500
}

function errorMessage(error: unknown) {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Send a request and return the successful response.
 * @throws UpstreamFetchError when the request fails or the response status is not 2xx.
 */
export async function request(
	url: string,
	init: RequestInit,
	options: HttpOptions,
): Promise<Response> {
	const method = init.method ?? "GET"
	const headers = new Headers(init.headers)
	headers.set("User-Agent", options.userAgent)
	if (options.authorization) headers.set("Authorization", options.authorization)

	let response: Response
	try {
		response = await options.fetch(url, {
			...init,
			method,
			headers,
			signal: AbortSignal.timeout(options.timeoutMs),
		})
	} catch (error) {
		throw new UpstreamFetchError(
			`${method} ${url} failed: ${errorMessage(error)}`,
			{ retryable: true, url, cause: error },
		)
	}

	if (!response.ok) {
		const body = await response.text()
		throw new UpstreamFetchError(
			`${method} ${url} responded ${response.status}${body ? `: ${body.slice(0, 200)}` : ""}`,
			{
				status: response.status,
				retryable: isRetryableStatus(response.status),
				url,
			},
		)
	}
	return response
}

/**
 * Request a text body.
 */
export async function requestText(
	url: string,
	init: RequestInit,
	options: HttpOptions,
) {
	const response = await request(url, init, options)
	return response.text()
}

/**
 * Request a JSON body and validate it.
 * @throws UpstreamFetchError when the body is not JSON or does not match the schema.
 */
export async function requestJson<T>(
	url: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	init: RequestInit,
	options: HttpOptions,
): Promise<T> {
	const text = await requestText(url, init, options)
	let json: unknown
	try {
		json = JSON.parse(text)
	} catch (error) {
		throw new UpstreamFetchError(`${url} did not return JSON`, {
			retryable: false,
			url,
			cause: error,
		})
	}

	const result = schema.safeParse(json)
	if (!result.success) {
		throw new UpstreamFetchError(
			`Unexpected response from ${url}: ${result.error.message}`,
			{ retryable: false, url, cause: result.error },
		)
	}
	return result.data
}
