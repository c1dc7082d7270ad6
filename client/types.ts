export type VisionRequest = {
	model: string;
	/** Base64 JPEG payloads, one per image, in batch order */
	images: string[];
	instruction: string;
	maxTokens: number;
};

/**
 * A vision-capable model endpoint. Implementations throw RateLimitError
 * when the service asks callers to back off.
 */
export interface VisionClient {
	readonly name: ProviderName;
	describe(request: VisionRequest): Promise<string>;
}
