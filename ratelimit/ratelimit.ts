export type RateLimiterOptions = {
	/** Calls allowed per window, default 50 */
	capacity?: number;
	/** Window length in ms, default 60s */
	windowMs?: number;
	now?: () => number;
};

export const DEFAULT_CAPACITY = 50;
export const DEFAULT_WINDOW_MS = 60_000;

/**
 * Sliding window over the issue times of the last `capacity` API calls,
 * shared by every worker of a run. A batched call counts once.
 */
export class RateLimiter {
	readonly capacity: number;
	readonly windowMs: number;
	private readonly now: () => number;
	private readonly issued: number[] = [];

	constructor(opts: RateLimiterOptions = {}) {
		this.capacity = opts.capacity ?? DEFAULT_CAPACITY;
		this.windowMs = opts.windowMs ?? DEFAULT_WINDOW_MS;
		this.now = opts.now ?? Date.now;
	}

	get size(): number {
		return this.issued.length;
	}

	/** How long the next call has to wait, 0 when it may go now. */
	delay(): number {
		if (this.issued.length < this.capacity) return 0;
		const oldest = this.issued[0] ?? 0;
		const age = this.now() - oldest;
		return age < this.windowMs ? this.windowMs - age : 0;
	}

	/** Records a call issued now. */
	record(): void {
		this.issued.push(this.now());
		while (this.issued.length > this.capacity) this.issued.shift();
	}

	/** Forgets every recorded call, used after the API reports a rate limit. */
	reset(): void {
		this.issued.length = 0;
	}
}
