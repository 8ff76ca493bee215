/**
 * Step 1: Configuration check
 *
 * Confirms the values every later step depends on were loaded. The client
 * secret is only required for confidential clients.
 */

import { fail, pass } from "./helpers.js";
import type { ReportStep } from "./types.js";

export const configCheck: ReportStep = {
	id: "config",
	name: (settings) => `Load configuration from ${settings.envFile}`,

	async run({ settings }) {
		const required: Array<[string, boolean]> = [
			["client_id", Boolean(settings.clientId)],
			["redirect_uri", Boolean(settings.redirectUri)],
		];
		if (!settings.publicClient) {
			required.push(["client_secret", Boolean(settings.clientSecret)]);
		}

		const missing = required.filter(([, present]) => !present).map(([label]) => label);
		if (missing.length > 0) {
			return fail(`Missing required values in ${settings.envFile}: ${missing.join(", ")}.`);
		}

		let secretDetail: string;
		if (settings.publicClient && settings.clientSecret) {
			secretDetail = "Client secret: loaded (not sent for public-client flow)";
		} else if (settings.publicClient) {
			secretDetail = "Client secret: not required for public-client flow";
		} else {
			secretDetail = "Client secret: loaded";
		}

		return pass(
			`Client ID: loaded (${settings.clientId?.length ?? 0} chars)`,
			`Redirect URI: ${settings.redirectUri ?? ""}`,
			secretDetail,
		);
	},
};
