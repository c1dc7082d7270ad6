import sharp from "sharp";
import { type Logger, silentLogger } from "../logger";

export type ThumbnailOptions = {
	/** Longest side allowed, default 800 */
	maxSize?: number;
	/** JPEG quality, default 85 */
	quality?: number;
	logger?: Logger;
};

const DEFAULTS = {
	maxSize: 800,
	quality: 85,
};

/**
 * Encodes a preview of the image for the vision model: fits inside
 * maxSize x maxSize, applies EXIF orientation, flattens transparency onto
 * white and returns base64 JPEG. Returns null if the file can't be decoded.
 */
export async function encodeThumbnail(
	imagePath: ImagePath,
	opts: ThumbnailOptions = {},
): Promise<string | null> {
	const maxSize = opts.maxSize ?? DEFAULTS.maxSize;
	const quality = opts.quality ?? DEFAULTS.quality;
	const logger = opts.logger ?? silentLogger;

	try {
		const buffer = await sharp(imagePath)
			.rotate() // auto-orient
			.resize({
				width: maxSize,
				height: maxSize,
				fit: "inside",
				withoutEnlargement: true,
			})
			.flatten({ background: "#ffffff" })
			.jpeg({ quality })
			.toBuffer();
		return buffer.toString("base64");
	} catch (e) {
		logger.error(`Could not create thumbnail for ${imagePath}`, e);
		return null;
	}
}
