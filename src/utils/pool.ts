/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order whatever order the calls finish in.
 * Once `signal` aborts no further item is started and the promise
 * rejects with the signal's reason.
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	concurrency: number,
	worker: (item: T, index: number) => Promise<R>,
	signal?: AbortSignal,
): Promise<R[]> {
	const results = new Array<R>(items.length);
	let next = 0;

	const lanes = Math.min(Math.max(1, Math.floor(concurrency)), items.length);
	const runners = Array.from({ length: lanes }, async () => {
		while (next < items.length) {
			signal?.throwIfAborted();
			const index = next++;
			results[index] = await worker(items[index], index);
		}
	});

	await Promise.all(runners);
	signal?.throwIfAborted();
	return results;
}
