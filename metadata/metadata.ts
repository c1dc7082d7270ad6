import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, MetadataError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { writeExif } from "./exif";
import { writeIptc } from "./iptc";
import {
	isExifSegment,
	isJpeg,
	isPhotoshopSegment,
	isXmpSegment,
	joinJpeg,
	splitJpeg,
} from "./jpeg";
import { isPng, writePngText } from "./png";

export const UNSUPPORTED_FORMAT =
	"Unsupported format: only PNG and JPEG metadata can be written";

export type ImageContainer = "png" | "jpeg";

export type ImageMetadata = {
	title: string;
	keywords: readonly string[];
	authors: string;
};

export type WriteOptions = {
	/** Drop existing EXIF/IPTC/XMP/text metadata before writing */
	clearExisting?: boolean;
	/** Write into a copy inside this folder instead of the original */
	outputDir?: string;
};

export type WriteOutcome =
	| { written: true; path: ImagePath }
	| { written: false; path: ImagePath; reason: string };

export type MetadataWriter = (
	filePath: ImagePath,
	metadata: ImageMetadata,
	options?: WriteOptions,
) => Promise<WriteOutcome>;

function stripJpegMetadata(jpeg: Buffer): Buffer {
	const parts = splitJpeg(jpeg);
	parts.segments = parts.segments.filter(
		(s) => !isExifSegment(s) && !isXmpSegment(s) && !isPhotoshopSegment(s),
	);
	return joinJpeg(parts);
}

/** Returns the image bytes with title/keywords/authors embedded. */
export function embedMetadata(
	buffer: Buffer,
	metadata: ImageMetadata,
	clearExisting = false,
): Buffer {
	if (isPng(buffer)) {
		return writePngText(buffer, metadata, clearExisting);
	}
	if (isJpeg(buffer)) {
		const base = clearExisting ? stripJpegMetadata(buffer) : buffer;
		const withExif = writeExif(base, metadata);
		return writeIptc(withExif, {
			objectName: metadata.title,
			keywords: metadata.keywords,
			writer: metadata.authors,
		});
	}
	throw new MetadataError(UNSUPPORTED_FORMAT);
}

/** Sniffs the file signature; null for containers we can't write. */
export async function detectContainer(filePath: ImagePath): Promise<ImageContainer | null> {
	const file = await fs.open(filePath, "r");
	try {
		const head = Buffer.alloc(8);
		const { bytesRead } = await file.read(head, 0, head.length, 0);
		const bytes = head.subarray(0, bytesRead);
		if (isPng(bytes)) return "png";
		if (isJpeg(bytes)) return "jpeg";
		return null;
	} finally {
		await file.close();
	}
}

async function copyToOutput(filePath: ImagePath, outputDir: string): Promise<ImagePath> {
	await fs.mkdir(outputDir, { recursive: true });
	const target = path.join(outputDir, path.basename(filePath));
	if (path.resolve(target) !== path.resolve(filePath)) {
		await fs.copyFile(filePath, target);
	}
	return target;
}

/**
 * Embeds the metadata into the file on disk (or a copy in outputDir).
 * Errors are logged and reported as `written: false` with the original path.
 */
export async function writeMetadata(
	filePath: ImagePath,
	metadata: ImageMetadata,
	options: WriteOptions = {},
	logger: Logger = silentLogger,
): Promise<WriteOutcome> {
	try {
		const target = options.outputDir
			? await copyToOutput(filePath, options.outputDir)
			: filePath;
		const buffer = await fs.readFile(target);
		const updated = embedMetadata(buffer, metadata, options.clearExisting);
		await fs.writeFile(target, updated);
		logger.info(`Metadata added to ${target}`);
		return { written: true, path: target };
	} catch (e) {
		const reason = errorMessage(e);
		logger.error(`Error attaching metadata to ${filePath}: ${reason}`);
		return { written: false, path: filePath, reason };
	}
}
