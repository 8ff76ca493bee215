import type { Terminal } from "../../src/terminal.js";

export interface CapturedTerminal {
	terminal: Terminal;
	out: string[];
	err: string[];
	prompts: string[];
}

/** Records output; prompts are answered from `answers` in order, then "" */
export function captureTerminal(answers: string[] = []): CapturedTerminal {
	const out: string[] = [];
	const err: string[] = [];
	const prompts: string[] = [];
	const pending = [...answers];

	return {
		out,
		err,
		prompts,
		terminal: {
			print: (text) => {
				out.push(text);
			},
			warn: (text) => {
				err.push(text);
			},
			prompt: async (question) => {
				prompts.push(question);
				return pending.shift() ?? "";
			},
		},
	};
}
