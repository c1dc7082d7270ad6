import piexif from "piexifjs";

// IFD0
export const IMAGE_DESCRIPTION = 270;
export const XP_TITLE = 0x9c9b;
export const XP_AUTHOR = 0x9c9d;
export const XP_KEYWORDS = 0x9c9e;
// Exif IFD
export const USER_COMMENT = 0x9286;

const ASCII_CODE = "ASCII\0\0\0";

export type ExifFields = {
	title: string;
	keywords: readonly string[];
	authors: string;
};

/** Windows XP* tags are UTF-16LE byte arrays */
export function utf16Bytes(value: string): number[] {
	return Array.from(Buffer.from(value, "utf16le"));
}

/** piexifjs works on binary strings, one char per byte */
function utf8Binary(value: string): string {
	return Buffer.from(value, "utf8").toString("binary");
}

/** JSON with every non-ASCII character escaped, so it fits an ASCII comment */
export function asciiJson(value: unknown): string {
	return JSON.stringify(value).replace(
		/[\u007f-\uffff]/g,
		(c) => `\\u${c.charCodeAt(0).toString(16).padStart(4, "0")}`,
	);
}

export function userCommentDocument(fields: ExifFields): string {
	return asciiJson({
		title: fields.title,
		keywords: fields.keywords,
		authors: fields.authors,
	});
}

/** Writes the tagging fields into the JPEG's EXIF block, keeping other tags. */
export function writeExif(jpeg: Buffer, fields: ExifFields): Buffer {
	const binary = jpeg.toString("binary");
	const exif = piexif.load(binary);

	const zeroth = {
		...exif["0th"],
		[XP_TITLE]: utf16Bytes(fields.title),
		[IMAGE_DESCRIPTION]: utf8Binary(fields.title),
		[XP_KEYWORDS]: utf16Bytes(fields.keywords.join(", ")),
		...(fields.authors ? { [XP_AUTHOR]: utf16Bytes(fields.authors) } : {}),
	};

	const exifIfd = {
		...exif.Exif,
		[USER_COMMENT]: ASCII_CODE + userCommentDocument(fields),
	};

	const bytes = piexif.dump({ ...exif, "0th": zeroth, Exif: exifIfd });
	return Buffer.from(piexif.insert(bytes, binary), "binary");
}
