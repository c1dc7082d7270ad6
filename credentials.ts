import fs from "node:fs/promises";
import { CredentialsError } from "./errors";

export const DEFAULT_KEY_FILE = "api_key.txt";

/** Reads an API key from a file. Missing or empty files are fatal. */
export async function loadApiKey(file = DEFAULT_KEY_FILE): Promise<string> {
	let raw: string;
	try {
		raw = await fs.readFile(file, "utf8");
	} catch (e) {
		const code =
			typeof e === "object" && e !== null && "code" in e ? e.code : undefined;
		throw new CredentialsError(
			code === "ENOENT"
				? `API key file not found: ${file}`
				: `Error reading API key from ${file}: ${e instanceof Error ? e.message : String(e)}`,
		);
	}
	const key = raw.trim();
	if (!key) {
		throw new CredentialsError(`API key file is empty: ${file}`);
	}
	return key;
}
