import { z } from "zod";
import { DEFAULT_TAG_COUNT } from "./client/prompt";
import { ConfigError } from "./errors";

export const MIN_BATCH_SIZE = 1;
export const MAX_BATCH_SIZE = 20;

export const TaggerConfigSchema = z.object({
	/** Model id passed to the vision backend */
	model: z.string().trim().min(1, "model is required"),
	maxWorkers: z.number().int().positive(),
	batchSize: z.number().int().min(MIN_BATCH_SIZE).max(MAX_BATCH_SIZE).default(1),
	/** Written as author/creator/writer; may be empty */
	authors: z.string().default(""),
	tagCount: z.number().int().positive().default(DEFAULT_TAG_COUNT),
	clearExisting: z.boolean().default(false),
	outputDir: z.string().min(1).optional(),
	skipTagged: z.boolean().default(false),
});

export type TaggerConfigInput = z.input<typeof TaggerConfigSchema>;
export type TaggerConfig = Readonly<z.output<typeof TaggerConfigSchema>>;

export type ResolvedConfig = {
	config: TaggerConfig;
	warnings: string[];
};

/** Clamps into [1, 20]; anything that isn't a finite number becomes 1. */
export function clampBatchSize(value: number): { value: number; warning?: string } {
	if (!Number.isFinite(value)) {
		return {
			value: MIN_BATCH_SIZE,
			warning: `Batch size must be a number between ${MIN_BATCH_SIZE} and ${MAX_BATCH_SIZE}; using ${MIN_BATCH_SIZE}.`,
		};
	}
	const clamped = Math.min(MAX_BATCH_SIZE, Math.max(MIN_BATCH_SIZE, Math.trunc(value)));
	if (clamped === value) return { value };
	return {
		value: clamped,
		warning: `Batch size ${value} is outside ${MIN_BATCH_SIZE}-${MAX_BATCH_SIZE}; using ${clamped}.`,
	};
}

/**
 * Validates a run configuration. Batch size problems are clamped and
 * reported as warnings; anything else throws ConfigError.
 */
export function resolveConfig(input: TaggerConfigInput): ResolvedConfig {
	const warnings: string[] = [];
	let batchSize = input.batchSize;
	if (batchSize !== undefined) {
		const clamped = clampBatchSize(batchSize);
		batchSize = clamped.value;
		if (clamped.warning) warnings.push(clamped.warning);
	}

	const parsed = TaggerConfigSchema.safeParse({ ...input, batchSize });
	if (!parsed.success) {
		const detail = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid configuration: ${detail}`);
	}
	return { config: Object.freeze(parsed.data), warnings };
}
