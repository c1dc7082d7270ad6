import { describe, expect, it } from "vitest";
import { parseJsonContent, readReply } from "./parse";

describe("parseJsonContent", () => {
	it("parses valid JSON", () => {
		const content = '{"title": "img", "tags": ["a", "b"]}';
		expect(parseJsonContent(content)).toEqual({ title: "img", tags: ["a", "b"] });
	});

	it("parses JSON inside a code fence", () => {
		const content = '```json\n{"title": "img", "tags": ["a"]}\n```';
		expect(parseJsonContent(content)).toEqual({ title: "img", tags: ["a"] });
	});

	it("parses a fence without a language tag", () => {
		expect(parseJsonContent('```\n[1, 2]\n```')).toEqual([1, 2]);
	});

	it("drops a trailing comma before a closing bracket", () => {
		const content = '{"title": "img", "tags": ["a", "b", ]}';
		expect(parseJsonContent(content)).toEqual({ title: "img", tags: ["a", "b"] });
	});

	it("drops a compact trailing comma", () => {
		expect(parseJsonContent('{"title":"img","tags":["a","b",]}')).toEqual({
			title: "img",
			tags: ["a", "b"],
		});
	});

	it("returns null for a structural break", () => {
		const content = '{"title": "img", "tags": ["a", "b"}';
		expect(parseJsonContent(content)).toBeNull();
	});

	it("extracts the payload from surrounding prose", () => {
		const content = 'Sure! Here you go: {"title": "cat", "tags": ["pet"]} Hope it helps.';
		expect(parseJsonContent(content)).toEqual({ title: "cat", tags: ["pet"] });
	});

	it("recovers an array when the reply was cut off after it", () => {
		const content = '[{"title": "a", "tags": ["x"]}, {"title": "b", "tags": ["y"]}]\n\nNote: the second ima';
		expect(parseJsonContent(content)).toEqual([
			{ title: "a", tags: ["x"] },
			{ title: "b", tags: ["y"] },
		]);
	});

	it("strips an unterminated opening fence", () => {
		expect(parseJsonContent('```json\n{"title": "t", "tags": []}')).toEqual({
			title: "t",
			tags: [],
		});
	});

	it("returns null for text without brackets", () => {
		expect(parseJsonContent("I can't help with that.")).toBeNull();
	});

	it("returns null for empty text", () => {
		expect(parseJsonContent("   ")).toBeNull();
	});
});

describe("readReply", () => {
	it("maps a single object onto a one-image batch", () => {
		expect(readReply('{"title": " Sunset ", "tags": ["sky", " sea ", ""]}', 1)).toEqual([
			{ title: "Sunset", tags: ["sky", "sea"] },
		]);
	});

	it("maps array entries in order", () => {
		const reply = '[{"title": "a", "tags": ["1"]}, {"title": "b", "tags": ["2"]}]';
		expect(readReply(reply, 2)).toEqual([
			{ title: "a", tags: ["1"] },
			{ title: "b", tags: ["2"] },
		]);
	});

	it("fills a short array with nulls", () => {
		const reply = '[{"title": "a", "tags": ["1"]}]';
		expect(readReply(reply, 3)).toEqual([{ title: "a", tags: ["1"] }, null, null]);
	});

	it("uses a single object for the first image of a larger batch only", () => {
		expect(readReply('{"title": "a", "tags": []}', 2)).toEqual([{ title: "a", tags: [] }, null]);
	});

	it("accepts comma-separated tags", () => {
		expect(readReply('{"title": "a", "tags": "red, green,blue"}', 1)).toEqual([
			{ title: "a", tags: ["red", "green", "blue"] },
		]);
	});

	it("rejects entries missing required keys", () => {
		const reply = '[{"title": "a"}, {"tags": ["x"]}, {"title": "c", "tags": ["z"]}]';
		expect(readReply(reply, 3)).toEqual([null, null, { title: "c", tags: ["z"] }]);
	});

	it("returns nulls for empty or unparseable replies", () => {
		expect(readReply("", 2)).toEqual([null, null]);
		expect(readReply(undefined, 1)).toEqual([null]);
		expect(readReply("no json here", 1)).toEqual([null]);
	});

	it("ignores extra entries", () => {
		const reply = '[{"title": "a", "tags": []}, {"title": "b", "tags": []}]';
		expect(readReply(reply, 1)).toEqual([{ title: "a", tags: [] }]);
	});
});
