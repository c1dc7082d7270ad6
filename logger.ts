import chalk from "chalk";
import fs from "node:fs";
import path from "node:path";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface Logger {
	info(message: string): void;
	warn(message: string): void;
	error(message: string, error?: unknown): void;
}

type LoggerOptions = {
	/** Append-only log file; every message lands here with a timestamp */
	file?: string;
	/** Echo to the terminal (info is skipped when quiet) */
	console?: boolean;
	quiet?: boolean;
	now?: () => Date;
};

export function formatLogLine(level: LogLevel, message: string, at: Date): string {
	return `${at.toISOString()} [${level}] ${message}\n`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const now = options.now ?? (() => new Date());
	if (options.file) {
		fs.mkdirSync(path.dirname(options.file), { recursive: true });
	}

	function write(level: LogLevel, message: string) {
		if (options.file) {
			fs.appendFileSync(options.file, formatLogLine(level, message, now()));
		}
		if (!options.console) return;
		switch (level) {
			case "INFO":
				if (!options.quiet) console.log(chalk.dim(message));
				break;
			case "WARN":
				console.warn(chalk.yellow(`⚠️ ${message}`));
				break;
			case "ERROR":
				console.error(chalk.red(`❌ ${message}`));
				break;
		}
	}

	return {
		info: (message) => write("INFO", message),
		warn: (message) => write("WARN", message),
		error: (message, error) =>
			write(
				"ERROR",
				error === undefined
					? message
					: `${message}: ${error instanceof Error ? error.message : String(error)}`,
			),
	};
}

/** Logger that drops everything; handy as a default for library callers. */
export const silentLogger: Logger = {
	info: () => {},
	warn: () => {},
	error: () => {},
};
