import { describe, expect, it } from "vitest";
import { buildBatches } from "./batches";

const paths = (n: number) => Array.from({ length: n }, (_, i) => `/img/${i}.jpg`);

describe("buildBatches", () => {
	it.each([
		[10, 1, 10],
		[10, 3, 4],
		[10, 10, 1],
		[10, 20, 1],
		[21, 20, 2],
		[1, 5, 1],
	])("splits %i images with size %i into %i batches", (n, size, expected) => {
		const input = paths(n);
		const batches = buildBatches(input, size);
		expect(batches).toHaveLength(expected);
		const flattened = batches.flatMap((b) => b.tasks.map((t) => t.path));
		expect(flattened).toEqual(input);
	});

	it("tags every task with its batch id", () => {
		const batches = buildBatches(paths(5), 2);
		expect(batches.map((b) => b.id)).toEqual([0, 1, 2]);
		expect(batches[2]?.tasks).toEqual([{ path: "/img/4.jpg", batchId: 2 }]);
		for (const batch of batches) {
			for (const task of batch.tasks) expect(task.batchId).toBe(batch.id);
		}
	});

	it("returns no batches for no images", () => {
		expect(buildBatches([], 4)).toEqual([]);
	});
});
