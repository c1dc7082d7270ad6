import { GoogleGenAI } from "@google/genai";
import { errorMessage, isRateLimitError, RateLimitError } from "../errors";
import type { VisionClient, VisionRequest } from "./types";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

export class GeminiVisionClient implements VisionClient {
	readonly name = "gemini" as const;
	private readonly ai: GoogleGenAI;

	constructor(apiKey: string) {
		this.ai = new GoogleGenAI({ apiKey });
	}

	async describe(request: VisionRequest): Promise<string> {
		try {
			const response = await this.ai.models.generateContent({
				model: request.model,
				contents: {
					parts: [
						...request.images.map((data) => ({
							inlineData: { mimeType: "image/jpeg", data },
						})),
						{
							text:
								request.images.length > 1
									? `Describe these ${request.images.length} images.`
									: "Describe this image.",
						},
					],
				},
				config: {
					systemInstruction: request.instruction,
					temperature: 0,
					maxOutputTokens: request.maxTokens,
					responseMimeType: "application/json",
				},
			});
			return response.text?.trim() ?? "";
		} catch (error) {
			if (isRateLimitError(error)) {
				throw new RateLimitError(
					`API rate limit exceeded: ${errorMessage(error)}`,
				);
			}
			throw error;
		}
	}
}
