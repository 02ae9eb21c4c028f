/**
 * Map `items` through `fn` with at most `limit` calls in flight.
 * Results keep the order of `items`. A rejection from `fn` rejects the whole map.
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	limit: number,
	fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	const results = new Array<R>(items.length);
	// Workers share one iterator, so each entry is taken exactly once.
	const queue = items.entries();

	const worker = async (): Promise<void> => {
		for (const [index, item] of queue) {
			results[index] = await fn(item, index);
		}
	};

	const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
	await Promise.all(workers);
	return results;
}
