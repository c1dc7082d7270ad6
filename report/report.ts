import chalk from "chalk";
import path from "node:path";
import bar, { type ProgressBar } from "../bar";
import type { Logger } from "../logger";
import type { TaggerCallbacks } from "../tagger/types";
import { estimateRemainingMs, formatDuration } from "../utils";

export type ConsoleReporter = {
	callbacks: TaggerCallbacks;
};

/**
 * Drives a terminal progress bar from tagger callbacks and logs one line per
 * image to the run log.
 */
export function createConsoleReporter(total: number, logger: Logger): ConsoleReporter {
	let progress: ProgressBar | null = null;
	const ensureBar = () => {
		progress ??= bar.start(0, total, { task: "Tagging", detail: "Estimated time left: --:--:--" });
		return progress;
	};

	return {
		callbacks: {
			onStateChange(state) {
				if (state === "running") ensureBar().label({ task: "Tagging" });
				if (state === "paused") ensureBar().label({ task: "Paused (p to resume)" });
				if (state === "stopping") ensureBar().label({ task: "Stopping" });
			},
			onResult(imagePath, result) {
				const name = path.basename(imagePath);
				switch (result.status) {
					case "success":
						logger.info(`Processed ${name}: ${result.title}`);
						break;
					case "skipped":
						logger.info(`Skipped ${name}: ${result.reason}`);
						break;
					case "unprocessed":
						logger.warn(`Unprocessed ${name}: ${result.reason}`);
						break;
					case "error":
						logger.error(`Failed to process ${name}: ${result.reason}`);
						break;
				}
				ensureBar().increment(1);
			},
			onProgress(processed, elapsedMs) {
				const left = estimateRemainingMs(elapsedMs, processed, total);
				ensureBar().update(processed, {
					detail: `Estimated time left: ${left === null ? "--:--:--" : formatDuration(left)}`,
				});
			},
			onComplete(summary) {
				ensureBar().complete({ task: summary.cancelled ? "Stopped" : "Done" });
				const verb = summary.cancelled ? "Task stopped" : "Task completed";
				console.log(
					chalk.green.bold(`✅ ${verb}! Total time: ${formatDuration(summary.elapsedMs)}`),
				);
				console.log(
					`${chalk.green(`${summary.ok} tagged`)}, ${chalk.red(`${summary.errors} failed`)}, ` +
						`${chalk.yellow(`${summary.unprocessed} unprocessed`)}, ${chalk.dim(`${summary.skipped} skipped`)}`,
				);
				if (summary.dropped.length > 0) {
					logger.warn(
						`${summary.dropped.length} image(s) were not started before the stop: ${summary.dropped
							.map((p) => path.basename(p))
							.join(", ")}`,
					);
				}
			},
		},
	};
}
