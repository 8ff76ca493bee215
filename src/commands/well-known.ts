import type { Terminal } from "../terminal.js";
import { type GlobalOptions, createClient, discoveryUrlFor, printResponse } from "./shared.js";

export async function handleWellKnown(opts: GlobalOptions, terminal: Terminal): Promise<void> {
	const response = await createClient(opts).get(discoveryUrlFor(opts));
	printResponse(terminal, response);
	terminal.print(
		"\nThese metadata values can be plugged into Postman or other tooling to " +
			"compare the CLI results with external validators.",
	);
}
