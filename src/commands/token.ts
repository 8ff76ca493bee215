/**
 * `token`: one request to the token endpoint for any of the supported
 * grants.
 */

import { HttpError } from "../client.js";
import { resolvePublicClient } from "../config.js";
import { type GrantType, type TokenGrant, buildTokenForm, isSpaRedemptionError } from "../entra.js";
import { SPA_HINT } from "../reporter.js";
import type { Terminal } from "../terminal.js";
import {
	type GlobalOptions,
	UsageError,
	createClient,
	endpointsFor,
	printResponse,
	requireOption,
} from "./shared.js";

export interface TokenOptions extends GlobalOptions {
	clientId?: string | undefined;
	clientSecret?: string | undefined;
	grantType: GrantType;
	code?: string | undefined;
	refreshToken?: string | undefined;
	redirectUri?: string | undefined;
	codeVerifier?: string | undefined;
	publicClient?: boolean | undefined;
}

export async function handleToken(opts: TokenOptions, terminal: Terminal): Promise<void> {
	const clientId = requireOption(opts.clientId, "--client-id", "client_id");
	const publicClient = resolvePublicClient(opts.publicClient, opts.clientSecret);
	const grant = grantFromOptions(opts);

	if (grant.type === "client_credentials") {
		if (publicClient) {
			throw new UsageError(
				"Client credentials flow is not available for public clients. Remove --public-client.",
			);
		}
		if (!opts.scope) {
			throw new UsageError("--scope is required for the client_credentials grant");
		}
	}
	if ((grant.type === "client_credentials" || !publicClient) && !opts.clientSecret) {
		throw new UsageError(
			"--client-secret is required unless you set --public-client for the authorization_code/refresh_token grants.",
		);
	}

	const form = buildTokenForm(
		grant,
		{ clientId, clientSecret: opts.clientSecret, publicClient },
		opts.scope,
	);

	try {
		const response = await createClient(opts).postForm(endpointsFor(opts).token, form);
		printResponse(terminal, response);
	} catch (err) {
		if (err instanceof HttpError && isSpaRedemptionError(err.text)) {
			terminal.warn(SPA_HINT);
		}
		throw err;
	}

	if (grant.type === "authorization_code") {
		terminal.print(
			"\nNext: call the `userinfo` subcommand with the access token that was just returned.",
		);
	}
}

function grantFromOptions(opts: TokenOptions): TokenGrant {
	switch (opts.grantType) {
		case "authorization_code":
			return {
				type: "authorization_code",
				code: requireOption(opts.code, "--code", undefined, "for the authorization_code grant"),
				redirectUri: requireOption(
					opts.redirectUri,
					"--redirect-uri",
					undefined,
					"for the authorization_code grant",
				),
				codeVerifier: opts.codeVerifier,
			};
		case "refresh_token":
			return {
				type: "refresh_token",
				refreshToken: requireOption(
					opts.refreshToken,
					"--refresh-token",
					undefined,
					"for the refresh_token grant",
				),
			};
		case "client_credentials":
			return { type: "client_credentials" };
	}
}
