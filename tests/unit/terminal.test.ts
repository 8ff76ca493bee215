import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { NO_ANSWER_MESSAGE, createTerminal } from "../../src/terminal.js";

describe("createTerminal().prompt", () => {
	it("resolves with the line typed on the input", async () => {
		const input = new PassThrough();
		const output = new PassThrough();
		const terminal = createTerminal(input, output);

		const answer = terminal.prompt("Code: ");
		input.write("answer\n");

		await expect(answer).resolves.toBe("answer");
	});

	it("rejects when the input ends before an answer arrives", async () => {
		const input = new PassThrough();
		input.end();
		const terminal = createTerminal(input, new PassThrough());

		await expect(terminal.prompt("Code: ")).rejects.toThrow(NO_ANSWER_MESSAGE);
	});
});
