import { describe, expect, it, vi } from "vitest"
import { InputValidationError, UpstreamFetchError } from "../src/errors"
import { mapWithConcurrency } from "../src/pool"
import { backoffDelay, DEFAULT_RETRY_OPTIONS, withRetry } from "../src/retry"

const transient = () =>
	new UpstreamFetchError("Service unavailable", {
		status: 503,
		retryable: true,
	})

describe("withRetry", () => {
	it("caps the exponential backoff", () => {
		expect(backoffDelay(1, DEFAULT_RETRY_OPTIONS)).toBe(1_000)
		expect(backoffDelay(3, DEFAULT_RETRY_OPTIONS)).toBe(4_000)
		expect(backoffDelay(5, DEFAULT_RETRY_OPTIONS)).toBe(10_000)
	})

	it("retries transient failures until success", async () => {
		const onRetry = vi.fn()
		const fn = vi
			.fn<(attempt: number) => Promise<string>>()
			.mockRejectedValueOnce(transient())
			.mockRejectedValueOnce(transient())
			.mockResolvedValue("ok")

		const result = await withRetry(fn, {
			retries: 3,
			retryDelayMs: 1,
			onRetry,
		})
		expect(result).toBe("ok")
		expect(fn).toHaveBeenCalledTimes(3)
		expect(onRetry).toHaveBeenCalledTimes(2)
		expect(onRetry.mock.calls[1]?.[1]).toBe(2)
	})

	it("gives up after the configured retries", async () => {
		const fn = vi
			.fn<(attempt: number) => Promise<string>>()
			.mockRejectedValue(transient())
		await expect(withRetry(fn, { retries: 2, retryDelayMs: 1 })).rejects.toThrow(
			"Service unavailable",
		)
		expect(fn).toHaveBeenCalledTimes(3)
	})

	it("does not retry permanent failures", async () => {
		const fn = vi
			.fn<(attempt: number) => Promise<string>>()
			.mockRejectedValue(new InputValidationError("bad input"))
		await expect(
			withRetry(fn, { retries: 5, retryDelayMs: 1 }),
		).rejects.toBeInstanceOf(InputValidationError)
		expect(fn).toHaveBeenCalledTimes(1)
	})
})

describe("mapWithConcurrency", () => {
	it("keeps input order and bounds in-flight calls", async () => {
		let inFlight = 0
		let maxInFlight = 0
		const results = await mapWithConcurrency(
			[30, 10, 20, 5],
			2,
			async (delay, index) => {
				inFlight++
				maxInFlight = Math.max(maxInFlight, inFlight)
				await new Promise((resolve) => setTimeout(resolve, delay))
				inFlight--
				return index * 10
			},
		)
		expect(results).toEqual([0, 10, 20, 30])
		expect(maxInFlight).toBe(2)
	})

	it("stops taking items after a failure", async () => {
		const started: number[] = []
		await expect(
			mapWithConcurrency([1, 2, 3, 4], 1, async (item) => {
				started.push(item)
				if (item === 2) throw Error("boom")
				return item
			}),
		).rejects.toThrow("boom")
		expect(started).toEqual([1, 2])
	})
})
