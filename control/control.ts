/**
 * Cooperative pause/resume/stop signals for one run. Workers poll these at
 * their decision points; nothing here interrupts an in-flight call.
 */
export class RunControl {
	private isPaused = false;
	private isStopped = false;
	private waiters: Array<() => void> = [];
	private readonly abort = new AbortController();

	get paused(): boolean {
		return this.isPaused;
	}

	get stopped(): boolean {
		return this.isStopped;
	}

	pause(): void {
		if (this.isStopped) return;
		this.isPaused = true;
	}

	resume(): void {
		this.isPaused = false;
		this.release();
	}

	stop(): void {
		if (this.isStopped) return;
		this.isStopped = true;
		this.isPaused = false;
		this.abort.abort();
		this.release();
	}

	/** Resolves immediately unless paused; then on resume() or stop(). */
	waitIfPaused(): Promise<void> {
		if (!this.isPaused || this.isStopped) return Promise.resolve();
		return new Promise((resolve) => {
			this.waiters.push(resolve);
		});
	}

	/** Sleeps for `ms`, waking early on stop. Resolves false when cut short. */
	sleep(ms: number): Promise<boolean> {
		if (this.isStopped) return Promise.resolve(false);
		return new Promise((resolve) => {
			const onAbort = () => {
				clearTimeout(timer);
				resolve(false);
			};
			const timer = setTimeout(() => {
				this.abort.signal.removeEventListener("abort", onAbort);
				resolve(true);
			}, ms);
			this.abort.signal.addEventListener("abort", onAbort, { once: true });
		});
	}

	private release() {
		const waiters = this.waiters;
		this.waiters = [];
		for (const wake of waiters) wake();
	}
}
