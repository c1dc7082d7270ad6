import { afterEach, describe, expect, it, vi } from "vitest";
import { RunControl } from "./control";

afterEach(() => {
	vi.useRealTimers();
});

describe("RunControl", () => {
	it("does not block when running", async () => {
		const control = new RunControl();
		await expect(control.waitIfPaused()).resolves.toBeUndefined();
	});

	it("blocks paused waiters until resume", async () => {
		const control = new RunControl();
		control.pause();
		let released = false;
		const waiting = control.waitIfPaused().then(() => {
			released = true;
		});
		await Promise.resolve();
		expect(released).toBe(false);
		control.resume();
		await waiting;
		expect(released).toBe(true);
		expect(control.paused).toBe(false);
	});

	it("releases paused waiters on stop", async () => {
		const control = new RunControl();
		control.pause();
		const waiting = control.waitIfPaused();
		control.stop();
		await expect(waiting).resolves.toBeUndefined();
		expect(control.stopped).toBe(true);
		expect(control.paused).toBe(false);
	});

	it("ignores pause after stop", () => {
		const control = new RunControl();
		control.stop();
		control.pause();
		expect(control.paused).toBe(false);
	});

	it("sleeps for the full duration", async () => {
		vi.useFakeTimers();
		const control = new RunControl();
		const sleeping = control.sleep(60_000);
		await vi.advanceTimersByTimeAsync(59_999);
		let done = false;
		void sleeping.then(() => {
			done = true;
		});
		await Promise.resolve();
		expect(done).toBe(false);
		await vi.advanceTimersByTimeAsync(1);
		await expect(sleeping).resolves.toBe(true);
	});

	it("wakes a sleeper early on stop", async () => {
		vi.useFakeTimers();
		const control = new RunControl();
		const sleeping = control.sleep(60_000);
		control.stop();
		await expect(sleeping).resolves.toBe(false);
		expect(vi.getTimerCount()).toBe(0);
	});

	it("does not sleep once stopped", async () => {
		const control = new RunControl();
		control.stop();
		await expect(control.sleep(10_000)).resolves.toBe(false);
	});
});
