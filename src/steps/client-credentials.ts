/**
 * Step 3: Client credentials grant
 *
 * App-only token for confidential clients. Public clients cannot hold a
 * secret, so the step is skipped for them, as it is when no
 * --client-credentials-scope was given.
 */

import { buildTokenForm, requestToken } from "../entra.js";
import { pass, skip } from "./helpers.js";
import type { ReportStep } from "./types.js";

export const clientCredentials: ReportStep = {
	id: "client-credentials",
	name: () => "Client credentials grant",

	async run(ctx) {
		const { settings } = ctx;
		if (settings.publicClient) {
			return skip("Client credentials grant skipped because this app is registered as a public client.");
		}
		const scope = settings.clientCredentialsScope;
		if (!scope) {
			return skip(
				"No client-credentials scope supplied. Provide `--client-credentials-scope` to exercise this step.",
			);
		}

		const form = buildTokenForm(
			{ type: "client_credentials" },
			{
				clientId: settings.clientId ?? "",
				clientSecret: settings.clientSecret,
				publicClient: false,
			},
			scope,
		);
		ctx.log(`Requesting app-only token for scope "${scope}"`);
		const { tokens } = await requestToken(ctx.client, ctx.endpoints.token, form);
		ctx.session.clientCredentials = tokens;

		return pass(
			`Issued client_credentials access token (length ${tokens.access_token?.length ?? 0} chars, ` +
				`expires in ${tokens.expires_in ?? "unknown"}s).`,
		);
	},
};
