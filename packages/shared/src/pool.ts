/**
 * Bounded parallel execution.
 *
 * @module
 */

/**
 * Map `items` through `fn` with at most `concurrency` calls in flight. Results keep the input
 * order. The first failure rejects the whole run and no further items are started.
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	concurrency: number,
	fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	if (concurrency < 1) throw Error("Concurrency must be at least 1")

	const results = new Array<R>(items.length)
	// Workers share one iterator so every item is taken exactly once
	const queue = items.entries()
	let failed = false

	async function worker() {
		for (const [index, item] of queue) {
			if (failed) return
			try {
				results[index] = await fn(item, index)
			} catch (error) {
				failed = true
				throw error
			}
		}
	}

	const workerCount = Math.min(concurrency, items.length)
	await Promise.all(Array.from({ length: workerCount }, () => worker()))
	return results
}
