import path from "node:path";
import { buildInstruction, TOKENS_PER_IMAGE } from "../client/prompt";
import type { VisionClient } from "../client/types";
import { type TaggerConfig, type TaggerConfigInput, resolveConfig } from "../config";
import { RunControl } from "../control/control";
import { errorMessage, isRateLimitError, TaggerError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { hasTaggingMetadata } from "../metadata/read";
import {
	detectContainer,
	type ImageContainer,
	type MetadataWriter,
	UNSUPPORTED_FORMAT,
	writeMetadata,
} from "../metadata/metadata";
import { readReply } from "../parse/parse";
import { RateLimiter, type RateLimiterOptions } from "../ratelimit/ratelimit";
import { encodeThumbnail } from "../thumbnail/thumbnail";
import { buildBatches } from "./batches";
import { runPool } from "./pool";
import type {
	Batch,
	ImageTask,
	RunState,
	RunSummary,
	TaggerCallbacks,
	TaggerState,
	TaggingResult,
} from "./types";

export const CANCELLED_REASON = "Processing cancelled";

export type TaggerDeps = {
	client: VisionClient;
	logger?: Logger;
	/** Defaults to encodeThumbnail */
	encode?: (imagePath: ImagePath) => Promise<string | null>;
	/** Defaults to writeMetadata */
	write?: MetadataWriter;
	/** Defaults to detectContainer; images we can't write are never sent */
	detect?: (imagePath: ImagePath) => Promise<ImageContainer | null>;
	/** Defaults to hasTaggingMetadata; only used with skipTagged */
	isTagged?: (imagePath: ImagePath) => Promise<boolean>;
	/** Window settings for the per-run limiter */
	rateLimit?: Omit<RateLimiterOptions, "now">;
	progressIntervalMs?: number;
	now?: () => number;
};

type CallOutcome =
	| { kind: "reply"; text: string }
	| { kind: "failed"; reason: string }
	| { kind: "cancelled" };

type Run = {
	config: TaggerConfig;
	control: RunControl;
	limiter: RateLimiter;
	startedAt: number;
};

function emptyRunState(total = 0): RunState {
	return {
		isProcessing: false,
		isPaused: false,
		total,
		processed: 0,
		ok: 0,
		errors: 0,
		unprocessed: 0,
		skipped: 0,
	};
}

/**
 * Tags images in batches on a bounded worker pool, sharing one rate limiter
 * across workers, with cooperative pause/resume/stop.
 *
 * Every dispatched image gets exactly one result. Batches that have not
 * started when stop() is observed are dropped and listed in the summary.
 */
export class BatchTagger {
	private state: TaggerState = "idle";
	private runState: RunState = emptyRunState();
	private run: Run | null = null;
	private readonly logger: Logger;
	private readonly encode: (imagePath: ImagePath) => Promise<string | null>;
	private readonly write: MetadataWriter;
	private readonly isTagged: (imagePath: ImagePath) => Promise<boolean>;
	private readonly detect: (imagePath: ImagePath) => Promise<ImageContainer | null>;
	private readonly now: () => number;

	constructor(
		private readonly deps: TaggerDeps,
		private readonly callbacks: TaggerCallbacks = {},
	) {
		this.logger = deps.logger ?? silentLogger;
		this.encode =
			deps.encode ?? ((p) => encodeThumbnail(p, { logger: this.logger }));
		this.write =
			deps.write ?? ((p, m, o) => writeMetadata(p, m, o, this.logger));
		this.isTagged = deps.isTagged ?? hasTaggingMetadata;
		this.detect = deps.detect ?? detectContainer;
		this.now = deps.now ?? Date.now;
	}

	get status(): TaggerState {
		return this.state;
	}

	get stats(): Readonly<RunState> {
		return { ...this.runState };
	}

	async start(paths: ImageList, input: TaggerConfigInput): Promise<RunSummary> {
		if (this.run) {
			throw new TaggerError("A run is already in progress");
		}
		if (paths.length === 0) {
			throw new TaggerError("No images to process");
		}
		const { config, warnings } = resolveConfig(input);
		for (const warning of warnings) this.logger.warn(warning);

		const run: Run = {
			config,
			control: new RunControl(),
			limiter: new RateLimiter({ ...this.deps.rateLimit, now: this.now }),
			startedAt: this.now(),
		};
		this.run = run;
		this.runState = { ...emptyRunState(paths.length), isProcessing: true };
		this.setState("running");

		const batches = buildBatches(paths, config.batchSize);
		this.logger.info(
			`Tagging ${paths.length} image(s) in ${batches.length} batch(es) with ${config.model}, ${config.maxWorkers} worker(s)`,
		);

		const ticker = this.startTicker(run);
		let dropped: Batch[] = [];
		try {
			dropped = await runPool(
				batches,
				config.maxWorkers,
				(batch) => this.processBatch(batch, run),
				() => !run.control.stopped,
			);
		} finally {
			clearInterval(ticker);
		}

		const droppedPaths = dropped.flatMap((b) => b.tasks.map((t) => t.path));
		if (droppedPaths.length > 0) {
			this.logger.warn(`${droppedPaths.length} image(s) were never started and got no result`);
		}

		const cancelled = run.control.stopped;
		this.runState = { ...this.runState, isProcessing: false, isPaused: false };
		const summary: RunSummary = {
			...this.runState,
			elapsedMs: this.now() - run.startedAt,
			cancelled,
			dropped: droppedPaths,
		};
		this.run = null;

		if (!cancelled) this.setState("completed");
		this.callbacks.onProgress?.(summary.processed, summary.elapsedMs);
		this.callbacks.onComplete?.(summary);
		this.logger.info(cancelled ? "Processing stopped." : "Processing complete.");
		this.setState("idle");
		return summary;
	}

	pause(): void {
		if (this.state !== "running" || !this.run) return;
		this.run.control.pause();
		this.runState.isPaused = true;
		this.logger.info("Processing paused.");
		this.setState("paused");
	}

	resume(): void {
		if (this.state !== "paused" || !this.run) return;
		this.run.control.resume();
		this.runState.isPaused = false;
		this.logger.info("Processing resumed.");
		this.setState("running");
	}

	stop(): void {
		if ((this.state !== "running" && this.state !== "paused") || !this.run) return;
		this.run.control.stop();
		this.runState.isPaused = false;
		this.logger.info("Stopping: waiting for in-flight batches to finish.");
		this.setState("stopping");
	}

	private setState(next: TaggerState) {
		if (this.state === next) return;
		this.state = next;
		this.callbacks.onStateChange?.(next);
	}

	private startTicker(run: Run): NodeJS.Timeout {
		const timer = setInterval(() => {
			this.callbacks.onProgress?.(this.runState.processed, this.now() - run.startedAt);
		}, this.deps.progressIntervalMs ?? 1000);
		timer.unref();
		return timer;
	}

	private report(task: ImageTask, result: TaggingResult) {
		const s = this.runState;
		s.processed++;
		switch (result.status) {
			case "success":
				s.ok++;
				break;
			case "error":
				s.errors++;
				break;
			case "unprocessed":
				s.unprocessed++;
				break;
			case "skipped":
				s.skipped++;
				break;
		}
		this.callbacks.onResult?.(task.path, result);
	}

	private async processBatch(batch: Batch, run: Run): Promise<void> {
		// keyed by task: the same path may appear more than once
		const reported = new Set<ImageTask>();
		const report = (task: ImageTask, result: TaggingResult) => {
			if (reported.has(task)) return;
			reported.add(task);
			this.report(task, result);
		};
		const fail = (tasks: readonly ImageTask[], reason: string) => {
			for (const task of tasks) report(task, { status: "error", reason });
		};

		try {
			await this.tagBatch(batch, run, report, fail);
		} catch (e) {
			this.logger.error(`Batch ${batch.id} failed`, e);
			fail(batch.tasks, errorMessage(e));
		}
	}

	private async tagBatch(
		batch: Batch,
		run: Run,
		report: (task: ImageTask, result: TaggingResult) => void,
		fail: (tasks: readonly ImageTask[], reason: string) => void,
	): Promise<void> {
		const { control, config } = run;
		if (control.stopped) return fail(batch.tasks, CANCELLED_REASON);
		await control.waitIfPaused();
		if (control.stopped) return fail(batch.tasks, CANCELLED_REASON);

		const writable: ImageTask[] = [];
		for (const task of batch.tasks) {
			try {
				if (await this.detect(task.path)) writable.push(task);
				else report(task, { status: "error", reason: UNSUPPORTED_FORMAT });
			} catch (e) {
				report(task, { status: "error", reason: errorMessage(e) });
			}
		}
		let pending: readonly ImageTask[] = writable;

		if (config.skipTagged) {
			const untagged: ImageTask[] = [];
			for (const task of pending) {
				if (await this.isTagged(task.path).catch(() => false)) {
					report(task, { status: "skipped", reason: "Already tagged" });
				} else {
					untagged.push(task);
				}
			}
			pending = untagged;
		}

		const tasks: ImageTask[] = [];
		const images: string[] = [];
		for (const task of pending) {
			const data = await this.encode(task.path);
			if (data === null) {
				report(task, { status: "error", reason: "Could not read image" });
				continue;
			}
			tasks.push(task);
			images.push(data);
		}
		if (tasks.length === 0) return;

		const outcome = await this.callWithRateLimit(images, run);
		if (outcome.kind === "cancelled") return fail(tasks, CANCELLED_REASON);
		if (outcome.kind === "failed") {
			const names = tasks.map((t) => path.basename(t.path)).join(", ");
			this.logger.error(`Error processing ${names}: ${outcome.reason}`);
			return fail(tasks, outcome.reason);
		}

		const entries = readReply(outcome.text, tasks.length);
		for (const [i, task] of tasks.entries()) {
			if (control.stopped) {
				report(task, { status: "error", reason: CANCELLED_REASON });
				continue;
			}
			const entry = entries[i];
			if (!entry) {
				report(task, { status: "unprocessed", reason: "No usable title and tags in reply" });
				continue;
			}
			const written = await this.write(
				task.path,
				{ title: entry.title, keywords: entry.tags, authors: config.authors },
				{ clearExisting: config.clearExisting, outputDir: config.outputDir },
			);
			report(
				task,
				written.written
					? {
							status: "success",
							title: entry.title,
							tags: entry.tags,
							authors: config.authors,
							path: written.path,
						}
					: { status: "error", reason: `Metadata write failed: ${written.reason}` },
			);
		}
	}

	/**
	 * Issues the call once the limiter allows it. Rate-limit errors wait a full
	 * window, reset the limiter and retry the same batch until stopped.
	 */
	private async callWithRateLimit(images: string[], run: Run): Promise<CallOutcome> {
		const { control, limiter, config } = run;
		const instruction = buildInstruction(images.length, config.tagCount);

		while (true) {
			if (control.stopped) return { kind: "cancelled" };
			await control.waitIfPaused();
			if (control.stopped) return { kind: "cancelled" };

			const wait = limiter.delay();
			if (wait > 0) {
				this.logger.info(`Approaching rate limit, waiting for ${(wait / 1000).toFixed(2)} seconds...`);
				await control.sleep(wait);
				continue;
			}

			try {
				const text = await this.deps.client.describe({
					model: config.model,
					images,
					instruction,
					maxTokens: TOKENS_PER_IMAGE * images.length,
				});
				limiter.record();
				return { kind: "reply", text };
			} catch (e) {
				if (!isRateLimitError(e)) {
					return { kind: "failed", reason: errorMessage(e) };
				}
				this.logger.warn(
					`Rate limit hit, waiting for ${(limiter.windowMs / 1000).toFixed(0)} seconds...`,
				);
				await control.sleep(limiter.windowMs);
				limiter.reset();
			}
		}
	}
}
