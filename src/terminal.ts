/**
 * Console I/O used by the commands. Results go to stdout, warnings and
 * diagnostics to stderr.
 */

import { once } from "node:events";
import { createInterface } from "node:readline/promises";

export interface Terminal {
	print(text: string): void;
	warn(text: string): void;
	/**
	 * Ask a question on the terminal; resolves with the raw answer.
	 * Rejects when the input ends before a line is read.
	 */
	prompt(question: string): Promise<string>;
}

export const NO_ANSWER_MESSAGE = "No answer: stdin closed. Use --non-interactive or --authorization-code.";

export function createTerminal(
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout,
): Terminal {
	return {
		print: (text) => console.log(text),
		warn: (text) => console.error(text),
		prompt: async (question) => {
			const rl = createInterface({ input, output });
			let closed = false;
			rl.once("close", () => {
				closed = true;
			});
			const ended = once(rl, "close").then(() => undefined);
			const asked = rl.question(question).catch((err: unknown) => {
				// Some Node releases reject the pending question on close
				if (closed) return undefined;
				throw err;
			});
			try {
				const answer = await Promise.race([asked, ended]);
				if (answer === undefined) {
					throw new Error(NO_ANSWER_MESSAGE);
				}
				return answer;
			} finally {
				rl.close();
			}
		},
	};
}
