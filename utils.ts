import fg from "fast-glob";
import path from "node:path";

/** Formats whose metadata we can write */
export const DEFAULT_EXTS: ImageExtension[] = ["png", "jpg", "jpeg"];

function buildGlobPattern(exts: string[]): string {
	return exts.length === 1 ? `*.${exts[0]}` : `*.{${exts.join(",")}}`;
}

/** Lists images directly inside `cwd` (non-recursive), sorted by name. */
export async function getFilesInFolder(
	cwd: string,
	exts: string[],
): Promise<ImageList> {
	const pattern = buildGlobPattern(exts);
	const filesRel = await fg([pattern], {
		cwd: cwd,
		onlyFiles: true,
		unique: true,
		dot: false,
		caseSensitiveMatch: false,
	});
	return filesRel.sort().map((f) => path.join(cwd, f));
}

export function sleep(ms: number): Promise<void> {
	return new Promise((res) => setTimeout(res, ms));
}

/** HH:MM:SS, hours not capped at 24 */
export function formatDuration(ms: number): string {
	const total = Math.max(0, Math.floor(ms / 1000));
	const hours = Math.floor(total / 3600);
	const minutes = Math.floor((total % 3600) / 60);
	const seconds = total % 60;
	return [hours, minutes, seconds]
		.map((n) => String(n).padStart(2, "0"))
		.join(":");
}

/** Linear extrapolation from the average time per processed image. */
export function estimateRemainingMs(
	elapsedMs: number,
	processed: number,
	total: number,
): number | null {
	if (processed <= 0) return null;
	const estimatedTotal = (elapsedMs / processed) * total;
	return Math.max(0, estimatedTotal - elapsedMs);
}
