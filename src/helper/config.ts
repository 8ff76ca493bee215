/**
 * Configuration record served to the browser helper page at GET /config.
 */

import type { EntraEndpoints } from "../config.js";

export interface HelperConfig {
	client_id: string;
	client_secret?: string;
	redirect_uri: string;
	tenant_id: string;
	scope: string;
	discovery_url: string;
	state: string;
	public_client: boolean;
	authorization_endpoint: string;
	token_endpoint: string;
	userinfo_endpoint: string;
}

export interface HelperSettings {
	clientId: string;
	clientSecret?: string | undefined;
	redirectUri: string;
	tenantId: string;
	scope: string;
	discoveryUrl?: string | undefined;
	state: string;
	publicClient: boolean;
	endpoints: EntraEndpoints;
	userinfoEndpoint: string;
}

/** The secret is only handed to the page for confidential clients */
export function buildHelperConfig(settings: HelperSettings): HelperConfig {
	const config: HelperConfig = {
		client_id: settings.clientId,
		redirect_uri: settings.redirectUri,
		tenant_id: settings.tenantId,
		scope: settings.scope,
		discovery_url: settings.discoveryUrl ?? settings.endpoints.discovery,
		state: settings.state,
		public_client: settings.publicClient,
		authorization_endpoint: settings.endpoints.authorize,
		token_endpoint: settings.endpoints.token,
		userinfo_endpoint: settings.userinfoEndpoint,
	};
	if (!settings.publicClient && settings.clientSecret) {
		config.client_secret = settings.clientSecret;
	}
	return config;
}
