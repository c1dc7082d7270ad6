import type { Batch } from "./types";

/** Splits paths into consecutive batches of `size`; the last may be short. */
export function buildBatches(paths: ImageList, size: number): Batch[] {
	const step = Math.max(1, Math.floor(size));
	const batches: Batch[] = [];
	for (let start = 0; start < paths.length; start += step) {
		const id = batches.length;
		batches.push({
			id,
			tasks: paths.slice(start, start + step).map((path) => ({ path, batchId: id })),
		});
	}
	return batches;
}
