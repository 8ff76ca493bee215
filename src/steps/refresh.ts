/**
 * Step 6: Refresh token exchange
 */

import { buildTokenForm, requestToken } from "../entra.js";
import { pass, skip } from "./helpers.js";
import type { ReportStep } from "./types.js";

export const refresh: ReportStep = {
	id: "refresh",
	name: () => "Refresh token exchange",

	async run(ctx) {
		const { settings, session } = ctx;
		const refreshToken = settings.refreshToken || session.authTokens?.refresh_token;
		if (!refreshToken) {
			return skip("No refresh token available. Ensure offline_access scope is granted.");
		}

		const form = buildTokenForm(
			{ type: "refresh_token", refreshToken },
			{
				clientId: settings.clientId ?? "",
				clientSecret: settings.clientSecret,
				publicClient: settings.publicClient,
			},
			settings.scope,
		);
		const { tokens } = await requestToken(ctx.client, ctx.endpoints.token, form);
		session.refreshTokens = tokens;

		const expiresIn = tokens.expires_in ?? "unknown";
		return pass(
			`Refresh token exchanged successfully (new access token expires in ${expiresIn}s).`,
		);
	},
};
