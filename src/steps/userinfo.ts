/**
 * Step 7: Userinfo endpoint call
 *
 * Calls the userinfo endpoint with the access token from the code exchange
 * (or --access-token) and lists the standard identity claims.
 */

import { json } from "../client.js";
import { fetchUserinfo, summarizeClaims } from "../entra.js";
import { pass, skip } from "./helpers.js";
import type { ReportStep } from "./types.js";

export const userinfo: ReportStep = {
	id: "userinfo",
	name: () => "Userinfo endpoint call",

	async run(ctx) {
		const accessToken = ctx.settings.accessToken || ctx.session.authTokens?.access_token;
		if (!accessToken) {
			return skip("No access token available for userinfo call.");
		}

		const response = await fetchUserinfo(ctx.client, ctx.settings.userinfoEndpoint, accessToken);
		return pass(summarizeClaims(json(response)));
	},
};
