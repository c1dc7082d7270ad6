import readline from "node:readline";

export interface Controllable {
	readonly status: string;
	pause(): void;
	resume(): void;
	stop(): void;
}

/** The parts of a TTY stream we touch; process.stdin in practice */
export type KeyInput = NodeJS.ReadableStream & {
	isTTY?: boolean;
	setRawMode?: (mode: boolean) => unknown;
};

/**
 * Terminal controls for a run: `p` toggles pause, `s` or Ctrl-C stops.
 * Returns a function that restores the terminal.
 */
export function bindKeyControls(target: Controllable, input: KeyInput = process.stdin): () => void {
	const onSignal = () => target.stop();
	process.on("SIGINT", onSignal);

	if (!input.isTTY || !input.setRawMode) {
		return () => {
			process.off("SIGINT", onSignal);
		};
	}

	readline.emitKeypressEvents(input);
	const setRawMode = input.setRawMode.bind(input);
	setRawMode(true);
	input.resume();

	const onKey = (_str: string | undefined, key: readline.Key | undefined) => {
		if (!key) return;
		if (key.ctrl && key.name === "c") return target.stop();
		if (key.name === "s") return target.stop();
		if (key.name === "p") {
			if (target.status === "paused") target.resume();
			else target.pause();
		}
	};
	input.on("keypress", onKey);

	return () => {
		input.off("keypress", onKey);
		setRawMode(false);
		input.pause();
		process.off("SIGINT", onSignal);
	};
}
