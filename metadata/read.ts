import exifr from "exifr";
import fs from "node:fs/promises";
import { isPng, readPngText } from "./png";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

function present(value: unknown): boolean {
	if (Array.isArray(value)) return value.length > 0;
	if (typeof value === "string") return value.trim().length > 0;
	return value !== undefined && value !== null;
}

/**
 * True when the image already carries both a title and keywords, in any of
 * the containers we write.
 */
export async function hasTaggingMetadata(filePath: ImagePath): Promise<boolean> {
	const buffer = await fs.readFile(filePath);
	if (isPng(buffer)) {
		const text = readPngText(buffer);
		return present(text.get("Title")) && present(text.get("Keywords"));
	}

	const tags: unknown = await exifr.parse(buffer, {
		tiff: true,
		exif: false,
		gps: false,
		iptc: true,
		xmp: true,
	});
	if (!isRecord(tags)) return false;
	const title = [tags.XPTitle, tags.ObjectName, tags.ImageDescription].some(present);
	const keywords = [tags.XPKeywords, tags.Keywords, tags.subject].some(present);
	return title && keywords;
}
