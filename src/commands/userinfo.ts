import { fetchUserinfo } from "../entra.js";
import type { Terminal } from "../terminal.js";
import { type GlobalOptions, createClient, printResponse, requireOption } from "./shared.js";

export interface UserinfoOptions extends GlobalOptions {
	accessToken?: string | undefined;
}

export async function handleUserinfo(opts: UserinfoOptions, terminal: Terminal): Promise<void> {
	const accessToken = requireOption(opts.accessToken, "--access-token");
	const response = await fetchUserinfo(createClient(opts), opts.userinfoEndpoint, accessToken);
	printResponse(terminal, response);
	terminal.print(
		"\nTo refresh tokens without another browser login, keep the refresh_token " +
			"from the token response and run `token --grant-type refresh_token`.",
	);
}
