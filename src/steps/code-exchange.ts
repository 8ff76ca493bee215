/**
 * Step 5: Authorization code exchange
 *
 * Redeems the captured code at the token endpoint. With PKCE enabled the
 * verifier must come from the same run (or --code-verifier); public
 * clients never send the client secret.
 */

import { buildTokenForm, requestToken, summarizeTokenSet } from "../entra.js";
import { fail, pass, skip } from "./helpers.js";
import type { ReportStep } from "./types.js";

export const codeExchange: ReportStep = {
	id: "token",
	name: () => "Exchange authorization code for tokens",

	async run(ctx) {
		const { settings, session } = ctx;
		const code = session.authorizationCode;
		if (!code) {
			return skip("No authorization code captured; token exchange skipped.");
		}
		if (settings.usePkce && !session.codeVerifier) {
			return fail(
				"PKCE code verifier missing. Capture the code and verifier in the same run or provide --code-verifier.",
			);
		}

		const form = buildTokenForm(
			{
				type: "authorization_code",
				code,
				redirectUri: settings.redirectUri ?? "",
				codeVerifier: session.codeVerifier,
			},
			{
				clientId: settings.clientId ?? "",
				clientSecret: settings.clientSecret,
				publicClient: settings.publicClient,
			},
			settings.scope,
		);
		const clientType = settings.publicClient ? "public" : "confidential";
		ctx.log(`Redeeming authorization code (${clientType} client)`);
		const { tokens } = await requestToken(ctx.client, ctx.endpoints.token, form);
		session.authTokens = tokens;

		return pass(...summarizeTokenSet(tokens));
	},
};
