import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => {
	const generate = vi.fn<(request: unknown) => Promise<{ response: string }>>();
	const generateContent = vi.fn<(request: unknown) => Promise<{ text?: string }>>();
	const ollamaOptions: unknown[] = [];
	const geminiOptions: unknown[] = [];

	class Ollama {
		generate = generate;
		constructor(options: unknown) {
			ollamaOptions.push(options);
		}
	}

	class GoogleGenAI {
		models = { generateContent };
		constructor(options: unknown) {
			geminiOptions.push(options);
		}
	}

	return { generate, generateContent, ollamaOptions, geminiOptions, Ollama, GoogleGenAI };
});

vi.mock("ollama", () => ({ Ollama: mocks.Ollama }));
vi.mock("@google/genai", () => ({ GoogleGenAI: mocks.GoogleGenAI }));

import { CredentialsError, RateLimitError } from "../errors";
import { GeminiVisionClient } from "./gemini";
import { createVisionClient, requiresCredential } from "./index";
import { OllamaVisionClient } from "./ollama";

const REQUEST = {
	model: "test-model",
	images: ["aaa", "bbb"],
	instruction: "tag these",
	maxTokens: 2000,
};

let dir: string;

beforeAll(async () => {
	dir = await fs.mkdtemp(path.join(os.tmpdir(), "tagger-client-"));
});

afterAll(async () => {
	await fs.rm(dir, { recursive: true, force: true });
});

beforeEach(() => {
	mocks.generate.mockReset();
	mocks.generateContent.mockReset();
	mocks.ollamaOptions.length = 0;
	mocks.geminiOptions.length = 0;
});

describe("OllamaVisionClient", () => {
	it("sends the images with a JSON format request", async () => {
		mocks.generate.mockResolvedValue({ response: '  {"title":"x"}\n' });
		const client = new OllamaVisionClient();

		await expect(client.describe(REQUEST)).resolves.toBe('{"title":"x"}');
		expect(mocks.generate).toHaveBeenCalledWith({
			model: "test-model",
			stream: false,
			system: "tag these",
			prompt: "Describe these 2 images.",
			images: ["aaa", "bbb"],
			format: "json",
			keep_alive: "5m",
			options: { temperature: 0, num_predict: 2000 },
		});
		expect(mocks.ollamaOptions).toEqual([
			{ host: "http://127.0.0.1:11434", headers: undefined },
		]);
	});

	it("sends a bearer token when given a key", () => {
		new OllamaVisionClient({ host: "https://ollama.example.com", apiKey: "test-secret" });
		expect(mocks.ollamaOptions).toEqual([
			{
				host: "https://ollama.example.com",
				headers: { Authorization: "Bearer test-secret" },
			},
		]);
	});

	it("turns 429 responses into RateLimitError", async () => {
		mocks.generate.mockRejectedValue(
			Object.assign(new Error("too many requests"), { status_code: 429 }),
		);
		await expect(new OllamaVisionClient().describe(REQUEST)).rejects.toBeInstanceOf(
			RateLimitError,
		);
	});

	it("passes other errors through", async () => {
		mocks.generate.mockRejectedValue(new Error("model 'test-model' not found"));
		await expect(new OllamaVisionClient().describe(REQUEST)).rejects.toThrow(
			"model 'test-model' not found",
		);
	});
});

describe("GeminiVisionClient", () => {
	it("sends inline JPEG parts and the instruction as system text", async () => {
		mocks.generateContent.mockResolvedValue({ text: '{"title":"y"}' });
		const client = new GeminiVisionClient("test-secret");

		await expect(client.describe({ ...REQUEST, images: ["aaa"] })).resolves.toBe(
			'{"title":"y"}',
		);
		expect(mocks.geminiOptions).toEqual([{ apiKey: "test-secret" }]);
		expect(mocks.generateContent).toHaveBeenCalledWith({
			model: "test-model",
			contents: {
				parts: [
					{ inlineData: { mimeType: "image/jpeg", data: "aaa" } },
					{ text: "Describe this image." },
				],
			},
			config: {
				systemInstruction: "tag these",
				temperature: 0,
				maxOutputTokens: 2000,
				responseMimeType: "application/json",
			},
		});
	});

	it("returns an empty string when the reply has no text", async () => {
		mocks.generateContent.mockResolvedValue({});
		await expect(new GeminiVisionClient("test-secret").describe(REQUEST)).resolves.toBe("");
	});

	it("turns quota errors into RateLimitError", async () => {
		mocks.generateContent.mockRejectedValue(
			new Error('{"error":{"code":429,"status":"RESOURCE_EXHAUSTED"}}'),
		);
		await expect(new GeminiVisionClient("test-secret").describe(REQUEST)).rejects.toThrow(
			RateLimitError,
		);
	});
});

describe("requiresCredential", () => {
	it("lets a local Ollama run without a key", () => {
		expect(requiresCredential("ollama")).toBe(false);
		expect(requiresCredential("ollama", "http://localhost:11434")).toBe(false);
		expect(requiresCredential("ollama", "http://[::1]:11434")).toBe(false);
	});

	it("needs a key for remote hosts and hosted APIs", () => {
		expect(requiresCredential("ollama", "https://ollama.example.com")).toBe(true);
		expect(requiresCredential("ollama", "not a url")).toBe(true);
		expect(requiresCredential("gemini")).toBe(true);
	});
});

describe("createVisionClient", () => {
	it("builds a local Ollama client without reading a key", async () => {
		const client = await createVisionClient({
			provider: "ollama",
			keyFile: path.join(dir, "absent.txt"),
		});
		expect(client.name).toBe("ollama");
	});

	it("refuses to start Gemini without a key file", async () => {
		await expect(
			createVisionClient({ provider: "gemini", keyFile: path.join(dir, "absent.txt") }),
		).rejects.toBeInstanceOf(CredentialsError);
	});

	it("passes the key file contents to Gemini", async () => {
		const keyFile = path.join(dir, "key.txt");
		await fs.writeFile(keyFile, "test-secret\n");

		const client = await createVisionClient({ provider: "gemini", keyFile });
		expect(client.name).toBe("gemini");
		expect(mocks.geminiOptions).toEqual([{ apiKey: "test-secret" }]);
	});
});
