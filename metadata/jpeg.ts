import { MetadataError } from "../errors";

export const APP0 = 0xe0;
export const APP1 = 0xe1;
export const APP13 = 0xed;
const SOS = 0xda;

const EXIF_ID = Buffer.from("Exif\0\0", "latin1");
const XMP_ID = Buffer.from("http://ns.adobe.com/xap/1.0/\0", "latin1");
const PHOTOSHOP_ID = Buffer.from("Photoshop 3.0\0", "latin1");

/** One marker segment before the scan data, marker and length included. */
export type JpegSegment = {
	marker: number;
	bytes: Buffer;
};

export type JpegParts = {
	segments: JpegSegment[];
	/** Start-of-scan onwards, kept verbatim */
	scan: Buffer;
};

export function isJpeg(buffer: Uint8Array): boolean {
	return buffer.length > 3 && buffer[0] === 0xff && buffer[1] === 0xd8;
}

function standalone(marker: number): boolean {
	return marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7);
}

export function splitJpeg(buffer: Buffer): JpegParts {
	if (!isJpeg(buffer)) throw new MetadataError("Not a JPEG file");
	const segments: JpegSegment[] = [];
	let pos = 2;
	while (pos < buffer.length) {
		if (buffer[pos] !== 0xff) {
			throw new MetadataError(`Corrupt JPEG: expected marker at offset ${pos}`);
		}
		const marker = buffer[pos + 1] ?? 0;
		if (marker === 0xff) {
			pos += 1; // fill byte
			continue;
		}
		if (marker === SOS) {
			return { segments, scan: buffer.subarray(pos) };
		}
		if (standalone(marker)) {
			segments.push({ marker, bytes: buffer.subarray(pos, pos + 2) });
			pos += 2;
			continue;
		}
		if (pos + 4 > buffer.length) break;
		const length = buffer.readUInt16BE(pos + 2);
		segments.push({ marker, bytes: buffer.subarray(pos, pos + 2 + length) });
		pos += 2 + length;
	}
	throw new MetadataError("Corrupt JPEG: no image data found");
}

export function joinJpeg(parts: JpegParts): Buffer {
	return Buffer.concat([
		Buffer.from([0xff, 0xd8]),
		...parts.segments.map((s) => s.bytes),
		parts.scan,
	]);
}

/** Payload after the marker and two length bytes */
export function payloadOf(segment: JpegSegment): Buffer {
	return segment.bytes.subarray(4);
}

export function makeSegment(marker: number, payload: Buffer): JpegSegment {
	if (payload.length + 2 > 0xffff) {
		throw new MetadataError("Metadata block too large for a JPEG segment");
	}
	const head = Buffer.alloc(4);
	head[0] = 0xff;
	head[1] = marker;
	head.writeUInt16BE(payload.length + 2, 2);
	return { marker, bytes: Buffer.concat([head, payload]) };
}

function startsWith(segment: JpegSegment, id: Buffer): boolean {
	const payload = payloadOf(segment);
	return payload.length >= id.length && payload.subarray(0, id.length).equals(id);
}

export const isExifSegment = (s: JpegSegment) =>
	s.marker === APP1 && startsWith(s, EXIF_ID);
export const isXmpSegment = (s: JpegSegment) =>
	s.marker === APP1 && startsWith(s, XMP_ID);
export const isPhotoshopSegment = (s: JpegSegment) =>
	s.marker === APP13 && startsWith(s, PHOTOSHOP_ID);

export { PHOTOSHOP_ID };
