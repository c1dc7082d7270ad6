import encode from "png-chunks-encode";
import extract from "png-chunks-extract";
import { buildXmpPacket } from "./xmp";

export type PngChunk = {
	name: string;
	data: Uint8Array;
};

export type PngTextFields = {
	title: string;
	keywords: readonly string[];
	authors: string;
};

const SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const TEXT_CHUNKS = new Set(["tEXt", "zTXt", "iTXt"]);
const XMP_KEYWORD = "XML:com.adobe.xmp";
const OWN_KEYWORDS = new Set(["Title", "Author", "Keywords", "Description", XMP_KEYWORD]);

export function isPng(buffer: Uint8Array): boolean {
	return SIGNATURE.every((b, i) => buffer[i] === b);
}

function keywordOf(chunk: PngChunk): string {
	const end = chunk.data.indexOf(0);
	return Buffer.from(chunk.data.subarray(0, end === -1 ? chunk.data.length : end)).toString("latin1");
}

function isLatin1(value: string): boolean {
	return /^[\u0000-\u00ff]*$/.test(value);
}

/** Uncompressed international text chunk, no language tag */
function itxtChunk(keyword: string, value: string): PngChunk {
	return {
		name: "iTXt",
		data: Buffer.concat([
			Buffer.from(keyword, "latin1"),
			Buffer.from([0, 0, 0, 0, 0]),
			Buffer.from(value, "utf8"),
		]),
	};
}

/** tEXt when the value is Latin-1, iTXt otherwise */
export function textChunk(keyword: string, value: string): PngChunk {
	if (!isLatin1(value)) return itxtChunk(keyword, value);
	return {
		name: "tEXt",
		data: Buffer.concat([
			Buffer.from(keyword, "latin1"),
			Buffer.from([0]),
			Buffer.from(value, "latin1"),
		]),
	};
}

/** Keyword -> text for tEXt and uncompressed iTXt chunks */
export function readPngText(buffer: Uint8Array): Map<string, string> {
	const text = new Map<string, string>();
	for (const chunk of extract(buffer)) {
		const keyword = keywordOf(chunk);
		const data = Buffer.from(chunk.data);
		if (chunk.name === "tEXt") {
			text.set(keyword, data.subarray(keyword.length + 1).toString("latin1"));
		} else if (chunk.name === "iTXt" && data[keyword.length + 1] === 0) {
			// skip compression flag/method, then language and translated keyword
			let pos = keyword.length + 3;
			for (let i = 0; i < 2; i++) {
				const end = data.indexOf(0, pos);
				pos = end === -1 ? data.length : end + 1;
			}
			text.set(keyword, data.subarray(pos).toString("utf8"));
		}
	}
	return text;
}

/**
 * Adds Title/Author/Keywords/Description text chunks and an XMP packet,
 * replacing earlier copies. With clearExisting every text, XMP and eXIf
 * chunk is dropped first.
 */
export function writePngText(
	buffer: Uint8Array,
	fields: PngTextFields,
	clearExisting = false,
): Buffer {
	const chunks = extract(buffer).filter((chunk) => {
		if (clearExisting && (TEXT_CHUNKS.has(chunk.name) || chunk.name === "eXIf")) {
			return false;
		}
		return !(TEXT_CHUNKS.has(chunk.name) && OWN_KEYWORDS.has(keywordOf(chunk)));
	});

	const added: PngChunk[] = [
		textChunk("Title", fields.title),
		textChunk("Author", fields.authors),
		textChunk("Keywords", fields.keywords.join(", ")),
		textChunk("Description", fields.title),
		itxtChunk(XMP_KEYWORD, buildXmpPacket(fields)),
	];

	const idat = chunks.findIndex((c) => c.name === "IDAT");
	chunks.splice(idat === -1 ? chunks.length - 1 : idat, 0, ...added);
	return Buffer.from(encode(chunks));
}
