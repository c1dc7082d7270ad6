import { loadApiKey } from "../credentials";
import { DEFAULT_GEMINI_MODEL, GeminiVisionClient } from "./gemini";
import { DEFAULT_OLLAMA_HOST, DEFAULT_OLLAMA_MODEL, OllamaVisionClient } from "./ollama";
import type { VisionClient } from "./types";

export type { VisionClient, VisionRequest } from "./types";
export { buildInstruction, DEFAULT_TAG_COUNT, TOKENS_PER_IMAGE } from "./prompt";

export const PROVIDERS: readonly ProviderName[] = ["ollama", "gemini"];
export const DEFAULT_PROVIDER: ProviderName = "ollama";

export const DEFAULT_MODELS: Record<ProviderName, string> = {
	ollama: DEFAULT_OLLAMA_MODEL,
	gemini: DEFAULT_GEMINI_MODEL,
};

type ClientOptions = {
	provider: ProviderName;
	/** Ollama endpoint */
	host?: string;
	keyFile: string;
};

const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1", "::1", "[::1]"]);

/** A local Ollama server is the only backend that runs without a key. */
export function requiresCredential(provider: ProviderName, host?: string): boolean {
	if (provider !== "ollama") return true;
	try {
		return !LOOPBACK_HOSTS.has(new URL(host ?? DEFAULT_OLLAMA_HOST).hostname);
	} catch {
		return true;
	}
}

/**
 * Builds the process-wide client once at startup. Throws CredentialsError
 * when the backend needs a key and the key file is missing.
 */
export async function createVisionClient(opts: ClientOptions): Promise<VisionClient> {
	const needsKey = requiresCredential(opts.provider, opts.host);
	const apiKey = needsKey ? await loadApiKey(opts.keyFile) : undefined;

	switch (opts.provider) {
		case "gemini":
			return new GeminiVisionClient(apiKey ?? "");
		case "ollama":
			return new OllamaVisionClient({ host: opts.host, apiKey });
	}
}
