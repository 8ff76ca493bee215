/**
 * Shared helpers for report steps.
 */

import type { ReportSession, ReportSettings, StepVerdict } from "./types.js";

export function pass(...lines: string[]): StepVerdict {
	return { status: "PASS", detail: lines.join("\n") };
}

export function skip(reason: string): StepVerdict {
	return { status: "SKIP", detail: reason };
}

export function fail(reason: string): StepVerdict {
	return { status: "FAIL", detail: reason };
}

/**
 * Secret values known at this point of the run, keyed by a display name.
 */
export function knownSecrets(
	settings: ReportSettings,
	session: ReportSession,
): Record<string, string> {
	const secrets: Record<string, string> = {};
	const add = (name: string, value: string | undefined) => {
		if (value) secrets[name] = value;
	};

	add("client_secret", settings.clientSecret);
	add("code_verifier", session.codeVerifier ?? settings.codeVerifier);
	add("authorization_code", session.authorizationCode);
	add("refresh_token", settings.refreshToken);
	add("access_token", settings.accessToken);
	add("client_credentials_token", session.clientCredentials?.access_token);
	add("auth_access_token", session.authTokens?.access_token);
	add("auth_refresh_token", session.authTokens?.refresh_token);
	add("auth_id_token", session.authTokens?.id_token);
	add("refreshed_access_token", session.refreshTokens?.access_token);
	add("refreshed_refresh_token", session.refreshTokens?.refresh_token);
	return secrets;
}

/**
 * Redact known secret values from a log message.
 * Replaces any occurrence of a known value with [REDACTED:<name>].
 */
export function redactSecrets(msg: string, secrets: Record<string, string>): string {
	let result = msg;
	for (const [name, value] of Object.entries(secrets)) {
		if (value.length >= 8) {
			result = result.replaceAll(value, `[REDACTED:${name}]`);
		}
	}
	return result;
}
