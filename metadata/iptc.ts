import {
	APP0,
	APP1,
	APP13,
	isPhotoshopSegment,
	joinJpeg,
	makeSegment,
	payloadOf,
	PHOTOSHOP_ID,
	splitJpeg,
} from "./jpeg";

// Photoshop image resource ids
const IPTC_RESOURCE = 0x0404;
const IPTC_DIGEST = 0x0425;
const RESOURCE_SIGNATURE = Buffer.from("8BIM", "latin1");

// IIM datasets
const UTF8_MARKER = Buffer.from([0x1b, 0x25, 0x47]); // ESC % G
const MAX_DATASET_BYTES = 0x7fff;

export type IptcFields = {
	objectName: string;
	keywords: readonly string[];
	writer: string;
};

export type IptcDataset = {
	record: number;
	dataset: number;
	value: Buffer;
};

type ImageResource = {
	id: number;
	name: Buffer;
	data: Buffer;
};

function dataset(record: number, id: number, value: Buffer): Buffer {
	const body = value.subarray(0, MAX_DATASET_BYTES);
	const head = Buffer.from([0x1c, record, id, 0, 0]);
	head.writeUInt16BE(body.length, 3);
	return Buffer.concat([head, body]);
}

/** IIM bytes for the caption fields, always UTF-8 tagged. */
export function encodeIptc(fields: IptcFields): Buffer {
	const parts = [
		dataset(1, 90, UTF8_MARKER),
		dataset(2, 0, Buffer.from([0x00, 0x04])),
		dataset(2, 5, Buffer.from(fields.objectName, "utf8")),
		...fields.keywords.map((k) => dataset(2, 25, Buffer.from(k, "utf8"))),
	];
	if (fields.writer) parts.push(dataset(2, 122, Buffer.from(fields.writer, "utf8")));
	return Buffer.concat(parts);
}

export function decodeIptc(data: Buffer): IptcDataset[] {
	const out: IptcDataset[] = [];
	let pos = 0;
	while (pos + 5 <= data.length && data[pos] === 0x1c) {
		const record = data[pos + 1] ?? 0;
		const id = data[pos + 2] ?? 0;
		const length = data.readUInt16BE(pos + 3);
		if (length & 0x8000) break; // extended datasets are not produced by us
		out.push({ record, dataset: id, value: data.subarray(pos + 5, pos + 5 + length) });
		pos += 5 + length;
	}
	return out;
}

function parseResources(block: Buffer): ImageResource[] {
	const resources: ImageResource[] = [];
	let pos = 0;
	while (pos + 12 <= block.length) {
		if (!block.subarray(pos, pos + 4).equals(RESOURCE_SIGNATURE)) break;
		const id = block.readUInt16BE(pos + 4);
		const nameLength = block[pos + 6] ?? 0;
		const nameField = (nameLength + 2) & ~1; // length byte + name, padded even
		const name = block.subarray(pos + 6, pos + 6 + nameField);
		const sizeAt = pos + 6 + nameField;
		if (sizeAt + 4 > block.length) break;
		const size = block.readUInt32BE(sizeAt);
		const data = block.subarray(sizeAt + 4, sizeAt + 4 + size);
		resources.push({ id, name, data });
		pos = sizeAt + 4 + size + (size % 2);
	}
	return resources;
}

function encodeResource(resource: ImageResource): Buffer {
	const size = Buffer.alloc(4);
	size.writeUInt32BE(resource.data.length);
	const head = Buffer.alloc(6);
	RESOURCE_SIGNATURE.copy(head);
	head.writeUInt16BE(resource.id, 4);
	const pad = resource.data.length % 2 ? Buffer.from([0]) : Buffer.alloc(0);
	return Buffer.concat([head, resource.name, size, resource.data, pad]);
}

/** Reads the IIM datasets of a JPEG's Photoshop block, empty when absent. */
export function readIptc(jpeg: Buffer): IptcDataset[] {
	const segment = splitJpeg(jpeg).segments.find(isPhotoshopSegment);
	if (!segment) return [];
	const resources = parseResources(payloadOf(segment).subarray(PHOTOSHOP_ID.length));
	const iptc = resources.find((r) => r.id === IPTC_RESOURCE);
	return iptc ? decodeIptc(iptc.data) : [];
}

/**
 * Replaces the IPTC resource of the JPEG's Photoshop block (creating the
 * block after the leading APP0/APP1 segments when missing). Other
 * resources are kept; the IPTC digest is dropped since it no longer matches.
 */
export function writeIptc(jpeg: Buffer, fields: IptcFields): Buffer {
	const parts = splitJpeg(jpeg);
	const index = parts.segments.findIndex(isPhotoshopSegment);
	const existing = parts.segments[index];
	const kept = existing
		? parseResources(payloadOf(existing).subarray(PHOTOSHOP_ID.length)).filter(
				(r) => r.id !== IPTC_RESOURCE && r.id !== IPTC_DIGEST,
			)
		: [];
	const resources: ImageResource[] = [
		...kept,
		{ id: IPTC_RESOURCE, name: Buffer.from([0, 0]), data: encodeIptc(fields) },
	];
	const segment = makeSegment(
		APP13,
		Buffer.concat([PHOTOSHOP_ID, ...resources.map(encodeResource)]),
	);

	if (existing) {
		parts.segments[index] = segment;
	} else {
		let at = 0;
		while (
			at < parts.segments.length &&
			(parts.segments[at]?.marker === APP0 || parts.segments[at]?.marker === APP1)
		) {
			at++;
		}
		parts.segments.splice(at, 0, segment);
	}
	return joinJpeg(parts);
}
