/**
 * `authorize`: print the authorization URL for step 1 of the flow and the
 * PKCE verifier the later `token` call must send.
 */

import { buildAuthorizationUrl } from "../authorize.js";
import { codeChallenge, generateCodeVerifier, isValidCodeVerifier } from "../pkce.js";
import type { Terminal } from "../terminal.js";
import { type GlobalOptions, endpointsFor, requireOption } from "./shared.js";

export interface AuthorizeOptions extends GlobalOptions {
	clientId?: string | undefined;
	redirectUri?: string | undefined;
	responseMode: string;
	responseType: string;
	state: string;
	codeVerifier?: string | undefined;
	disablePkce?: boolean | undefined;
}

export function handleAuthorize(opts: AuthorizeOptions, terminal: Terminal): void {
	const clientId = requireOption(opts.clientId, "--client-id", "client_id");
	const redirectUri = requireOption(opts.redirectUri, "--redirect-uri", "redirect_uri");

	terminal.print(
		"Step 1 (Authorization Request). " +
			"Send the user to the following URL and complete the login to capture the code.",
	);

	let verifier: string | undefined;
	if (opts.disablePkce) {
		terminal.print(
			"\nPKCE is disabled for this request. Only do this if you are certain the " +
				"Entra app registration does not enforce PKCE.",
		);
	} else {
		verifier = opts.codeVerifier ?? generateCodeVerifier();
		if (!isValidCodeVerifier(verifier)) {
			terminal.warn(
				"Warning: the supplied code verifier is not 43-128 characters of [A-Za-z0-9-._~]; " +
					"Entra is likely to reject it.",
			);
		}
	}

	const challenge = verifier ? codeChallenge(verifier) : undefined;
	const url = buildAuthorizationUrl({
		authorizeEndpoint: endpointsFor(opts).authorize,
		clientId,
		redirectUri,
		scope: opts.scope,
		responseMode: opts.responseMode,
		responseType: opts.responseType,
		state: opts.state,
		codeChallenge: challenge,
	});

	terminal.print(
		"\nPaste this authorization URL into a browser and complete the login " +
			"flow to obtain a code. Once redirected back, copy the `code` parameter.",
	);
	terminal.print(url);

	if (verifier) {
		terminal.print(
			"\nPKCE code verifier (required for the token request):\n" +
				`${verifier}\n` +
				"Run the token command with `--code-verifier` set to this value.",
		);
	}
	terminal.print("\nNext: run the `token` subcommand with the copied code and redirect URI.");
}
