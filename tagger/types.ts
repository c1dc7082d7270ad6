export type ImageTask = Readonly<{
	path: ImagePath;
	batchId: number;
}>;

export type Batch = Readonly<{
	id: number;
	tasks: readonly ImageTask[];
}>;

export type TaggingResult =
	| {
			status: "success";
			title: string;
			tags: string[];
			authors: string;
			/** File the metadata went into (a copy when an output folder is set) */
			path: ImagePath;
	  }
	| { status: "error"; reason: string }
	| { status: "unprocessed"; reason: string }
	| { status: "skipped"; reason: string };

export type TaggerState = "idle" | "running" | "paused" | "stopping" | "completed";

export type RunState = {
	isProcessing: boolean;
	isPaused: boolean;
	total: number;
	processed: number;
	ok: number;
	errors: number;
	unprocessed: number;
	skipped: number;
};

export type RunSummary = Readonly<
	RunState & {
		elapsedMs: number;
		cancelled: boolean;
		/** Images in batches that never started because the run was stopped */
		dropped: readonly ImagePath[];
	}
>;

export interface TaggerCallbacks {
	/** Fires once per image that was dispatched */
	onResult?: (path: ImagePath, result: TaggingResult) => void;
	/** Periodic tick while running */
	onProgress?: (processed: number, elapsedMs: number) => void;
	/** Fires exactly once per run */
	onComplete?: (summary: RunSummary) => void;
	onStateChange?: (state: TaggerState) => void;
}
