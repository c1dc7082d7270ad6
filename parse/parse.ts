import { z } from "zod";

const FENCE = /^\s*```[\w-]*[^\S\n]*\n?([\s\S]*?)\n?\s*```\s*$/;
const OPEN_FENCE = /^\s*```[\w-]*[^\S\n]*\n?/;
const BRACKETED = /[{[][\s\S]*[}\]]/;
const TRAILING_COMMA = /,\s*([}\]])/g;

function stripCodeFence(content: string): string {
	const fenced = FENCE.exec(content);
	if (fenced) return fenced[1] ?? "";
	// truncated replies can lose the closing fence
	return content.replace(OPEN_FENCE, "");
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
	try {
		const value: unknown = JSON.parse(text);
		return { ok: true, value };
	} catch {
		return { ok: false };
	}
}

/**
 * Recovers JSON from a model reply. Handles code fences, prose around the
 * payload, trailing commas and replies cut off after a complete value.
 * Returns null when nothing parses.
 */
export function parseJsonContent(content: string): unknown {
	const text = stripCodeFence(content).trim();
	if (!text) return null;

	const direct = tryParse(text);
	if (direct.ok) return direct.value;

	const match = BRACKETED.exec(text);
	if (!match) return null;

	const candidate = match[0];
	for (let end = candidate.length; end > 0; end--) {
		const attempt = tryParse(
			candidate.slice(0, end).replace(TRAILING_COMMA, "$1"),
		);
		if (attempt.ok) return attempt.value;
	}
	return null;
}

const tagList = z
	.union([
		z.array(z.string()),
		z.string().transform((s) => s.split(",")),
	])
	.transform((tags) => tags.map((t) => t.trim()).filter(Boolean));

export const ReplyEntrySchema = z.object({
	title: z.string().transform((s) => s.trim()),
	tags: tagList,
});

export type ReplyEntry = z.infer<typeof ReplyEntrySchema>;

/**
 * Maps a reply onto `count` images, in order. A single object covers the
 * first image only; missing or malformed entries come back as null.
 */
export function readReply(
	content: string | null | undefined,
	count: number,
): (ReplyEntry | null)[] {
	const entries = new Array<ReplyEntry | null>(count).fill(null);
	if (!content?.trim()) return entries;

	const parsed = parseJsonContent(content);
	if (parsed === null) return entries;

	const list: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
	for (let i = 0; i < count && i < list.length; i++) {
		const entry = ReplyEntrySchema.safeParse(list[i]);
		if (entry.success) entries[i] = entry.data;
	}
	return entries;
}
