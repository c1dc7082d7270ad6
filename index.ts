#!/usr/bin/env -S npx tsx
import fs from "node:fs/promises";
import path from "node:path";
import { hideBin } from "yargs/helpers";
import yargs from "yargs/yargs";
import {
	createVisionClient,
	DEFAULT_MODELS,
	DEFAULT_PROVIDER,
	DEFAULT_TAG_COUNT,
	PROVIDERS,
} from "./client";
import { DEFAULT_KEY_FILE } from "./credentials";
import { bindKeyControls } from "./control/keys";
import { createLogger } from "./logger";
import { createConsoleReporter } from "./report/report";
import { BatchTagger } from "./tagger/tagger";
import { DEFAULT_EXTS, getFilesInFolder } from "./utils";

async function main() {
	const argv = await yargs(hideBin(process.argv))
		.option("path", {
			type: "string",
			demandOption: "Please select a folder first (--path)",
			describe: "Folder containing the images to tag",
		})
		.option("provider", {
			choices: PROVIDERS,
			default: DEFAULT_PROVIDER,
			describe: "Vision model backend",
		})
		.option("model", {
			type: "string",
			describe: "Model id (defaults per provider: llava:7b, gemini-2.5-flash)",
		})
		.option("host", {
			type: "string",
			describe: "Ollama endpoint, e.g. http://127.0.0.1:11434",
		})
		.option("key-file", {
			type: "string",
			default: DEFAULT_KEY_FILE,
			describe: "File holding the API key (required unless Ollama runs locally)",
		})
		.option("workers", {
			type: "number",
			default: 10,
			describe: "How many batches to tag in parallel",
		})
		.option("batch-size", {
			type: "number",
			default: 1,
			describe: "Images per request (1-20)",
		})
		.option("authors", {
			type: "string",
			default: "",
			describe: "Author/creator written into every image",
		})
		.option("tags", {
			type: "number",
			default: DEFAULT_TAG_COUNT,
			describe: "Number of tags to ask for",
		})
		.option("clear", {
			type: "boolean",
			default: false,
			describe: "Remove existing metadata before writing",
		})
		.option("out", {
			type: "string",
			describe: "Write tagged copies into this folder instead of editing in place",
		})
		.option("skip-tagged", {
			type: "boolean",
			default: false,
			describe: "Skip images that already have a title and keywords",
		})
		.option("ext", {
			type: "string",
			default: DEFAULT_EXTS.join(","),
			describe: "Comma-separated extensions to include (lowercase)",
		})
		.option("log-file", {
			type: "string",
			default: "image-tagger.log",
			describe: "Append-only log of every message",
		})
		.strict()
		.help()
		.parseAsync();

	const logger = createLogger({
		file: path.resolve(argv["log-file"]),
		console: true,
		quiet: true,
	});

	// Refuse to start without credentials
	const client = await createVisionClient({
		provider: argv.provider,
		host: argv.host,
		keyFile: path.resolve(argv["key-file"]),
	});

	const folder = path.resolve(argv.path);
	const stat = await fs.stat(folder).catch(() => null);
	if (!stat?.isDirectory()) {
		logger.error(`Folder not found: ${folder}`);
		process.exitCode = 1;
		return;
	}

	const exts = argv.ext
		.split(",")
		.map((s) => s.trim().toLowerCase())
		.filter(Boolean);
	const files = await getFilesInFolder(folder, exts);
	if (files.length === 0) {
		logger.warn(`No images found in ${folder}`);
		return;
	}

	const reporter = createConsoleReporter(files.length, logger);
	const tagger = new BatchTagger({ client, logger }, reporter.callbacks);
	const unbind = bindKeyControls(tagger);
	try {
		const summary = await tagger.start(files, {
			model: argv.model ?? DEFAULT_MODELS[argv.provider],
			maxWorkers: argv.workers,
			batchSize: argv["batch-size"],
			authors: argv.authors,
			tagCount: argv.tags,
			clearExisting: argv.clear,
			outputDir: argv.out ? path.resolve(argv.out) : undefined,
			skipTagged: argv["skip-tagged"],
		});
		if (summary.errors > 0) process.exitCode = 1;
	} finally {
		unbind();
	}
}

await main().catch((err) => {
	console.error(err instanceof Error ? err.message : String(err));
	process.exitCode = 1;
});
