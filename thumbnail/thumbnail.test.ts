import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { encodeThumbnail } from "./thumbnail";

let dir: string;

beforeAll(async () => {
	dir = await fs.mkdtemp(path.join(os.tmpdir(), "tagger-thumb-"));
});

afterAll(async () => {
	await fs.rm(dir, { recursive: true, force: true });
});

async function decode(base64: string | null) {
	expect(base64).not.toBeNull();
	return Buffer.from(base64 ?? "", "base64");
}

describe("encodeThumbnail", () => {
	it("fits large images into 800px and flattens transparency onto white", async () => {
		const file = path.join(dir, "wide.png");
		await sharp({
			create: { width: 1600, height: 800, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } },
		})
			.png()
			.toFile(file);

		const jpeg = await decode(await encodeThumbnail(file));
		const meta = await sharp(jpeg).metadata();
		expect(meta.format).toBe("jpeg");
		expect(meta.width).toBe(800);
		expect(meta.height).toBe(400);
		expect(meta.channels).toBe(3);

		const { data } = await sharp(jpeg).raw().toBuffer({ resolveWithObject: true });
		expect(data[0]).toBeGreaterThan(250);
		expect(data[1]).toBeGreaterThan(250);
		expect(data[2]).toBeGreaterThan(250);
	});

	it("does not enlarge small images", async () => {
		const file = path.join(dir, "small.jpg");
		await sharp({
			create: { width: 120, height: 90, channels: 3, background: { r: 10, g: 120, b: 200 } },
		})
			.jpeg()
			.toFile(file);

		const jpeg = await decode(await encodeThumbnail(file));
		const meta = await sharp(jpeg).metadata();
		expect(meta.width).toBe(120);
		expect(meta.height).toBe(90);
	});

	it("honors a custom size", async () => {
		const file = path.join(dir, "tall.png");
		await sharp({
			create: { width: 300, height: 600, channels: 3, background: { r: 0, g: 0, b: 0 } },
		})
			.png()
			.toFile(file);

		const jpeg = await decode(await encodeThumbnail(file, { maxSize: 200 }));
		const meta = await sharp(jpeg).metadata();
		expect(meta.width).toBe(100);
		expect(meta.height).toBe(200);
	});

	it("returns null and logs for unreadable files", async () => {
		const file = path.join(dir, "broken.jpg");
		await fs.writeFile(file, "not an image");
		const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

		await expect(encodeThumbnail(file, { logger })).resolves.toBeNull();
		expect(logger.error).toHaveBeenCalledTimes(1);
		expect(logger.error.mock.calls[0]?.[0]).toBe(`Could not create thumbnail for ${file}`);
	});

	it("returns null for missing files", async () => {
		await expect(encodeThumbnail(path.join(dir, "nope.png"))).resolves.toBeNull();
	});
});
