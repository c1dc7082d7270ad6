import { Ollama } from "ollama";
import { errorMessage, isRateLimitError, RateLimitError } from "../errors";
import type { VisionClient, VisionRequest } from "./types";

export const DEFAULT_OLLAMA_HOST = "http://127.0.0.1:11434";
export const DEFAULT_OLLAMA_MODEL = "llava:7b";

type OllamaClientOptions = {
	host?: string;
	/** Bearer token for hosted endpoints */
	apiKey?: string;
};

export class OllamaVisionClient implements VisionClient {
	readonly name = "ollama" as const;
	private readonly ollama: Ollama;

	constructor(opts: OllamaClientOptions = {}) {
		this.ollama = new Ollama({
			host: opts.host ?? DEFAULT_OLLAMA_HOST,
			headers: opts.apiKey
				? { Authorization: `Bearer ${opts.apiKey}` }
				: undefined,
		});
	}

	async describe(request: VisionRequest): Promise<string> {
		try {
			const res = await this.ollama.generate({
				model: request.model,
				stream: false,
				system: request.instruction,
				prompt:
					request.images.length > 1
						? `Describe these ${request.images.length} images.`
						: "Describe this image.",
				images: request.images,
				format: "json",
				keep_alive: "5m",
				options: {
					temperature: 0,
					num_predict: request.maxTokens,
				},
			});
			return res.response?.trim() ?? "";
		} catch (e) {
			if (isRateLimitError(e)) {
				throw new RateLimitError(`Ollama rate limit: ${errorMessage(e)}`);
			}
			throw e;
		}
	}
}
