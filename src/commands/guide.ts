/**
 * `guide`: the recommended command sequence plus a snapshot of what the
 * config file supplied. Secrets are reported by presence only.
 */

import { DEFAULT_SCOPE, type EnvDefaults } from "../config.js";
import type { Terminal } from "../terminal.js";

export function renderGuide(envFile: string, defaults: EnvDefaults): string {
	const present = (value: string | undefined) => (value ? "yes" : "no");

	return [
		"Microsoft Entra OIDC validation walkthrough",
		"===========================================",
		"",
		"Recommended sequence:",
		"  1. Authorization Request:",
		`     entra-oidc-check authorize --env-file ${envFile}`,
		"",
		"  2. Token Exchange (authorization_code grant):",
		'     entra-oidc-check token --code <value> --redirect-uri "<redirect>" --code-verifier <verifier>',
		"",
		"  3. User Info lookup:",
		"     entra-oidc-check userinfo --access-token <token>",
		"",
		"  4. Metadata inspection:",
		"     entra-oidc-check well-known",
		"",
		"  Or run everything at once:",
		"     entra-oidc-check report",
		"",
		`Configuration snapshot (${envFile}):`,
		`  • Client ID present: ${present(defaults.clientId)}`,
		`  • Client secret present: ${present(defaults.clientSecret)}`,
		`  • Redirect URI present: ${present(defaults.redirectUri)}`,
		`  • Discovery URL present: ${present(defaults.discoveryUrl)}`,
		`  • Tenant ID default: ${defaults.tenantId}`,
		`  • Scope default: ${DEFAULT_SCOPE}`,
		"",
		"Any value can be overridden on the command line to test another tenant",
		"or app registration without editing the config file.",
	].join("\n");
}

export function handleGuide(envFile: string, defaults: EnvDefaults, terminal: Terminal): void {
	terminal.print(renderGuide(envFile, defaults));
}
