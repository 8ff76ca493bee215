/**
 * Step 2: OIDC discovery
 *
 * Fetches the tenant's openid-configuration document, either from the
 * configured discovery URL or the one derived from the tenant id.
 */

import { fetchDiscovery } from "../entra.js";
import { pass } from "./helpers.js";
import type { ReportStep } from "./types.js";

export const discovery: ReportStep = {
	id: "discovery",
	name: () => "Fetch OIDC discovery metadata",

	async run(ctx) {
		const url = ctx.settings.discoveryUrl ?? ctx.endpoints.discovery;
		ctx.log(`Discovery URL: ${url}`);
		const { document } = await fetchDiscovery(ctx.client, url);
		return pass(
			`Issuer: ${document.issuer ?? "<unknown>"}`,
			`Token endpoint: ${document.token_endpoint ?? "<unknown>"}`,
		);
	},
};
