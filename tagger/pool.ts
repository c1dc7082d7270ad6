/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Items are
 * taken in order; once `shouldStart` returns false the rest are not started
 * and are returned instead.
 */
export async function runPool<T>(
	items: readonly T[],
	concurrency: number,
	worker: (item: T) => Promise<void>,
	shouldStart: () => boolean = () => true,
): Promise<T[]> {
	const queue = [...items];
	const notStarted: T[] = [];
	const lanes = Math.max(1, Math.min(Math.floor(concurrency), queue.length));

	async function lane() {
		while (queue.length > 0) {
			const [item] = queue.splice(0, 1);
			if (item === undefined) continue;
			if (!shouldStart()) {
				notStarted.push(item);
				continue;
			}
			await worker(item);
		}
	}

	await Promise.all(Array.from({ length: lanes }, () => lane()));
	return notStarted;
}
