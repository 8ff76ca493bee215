/**
 * Authorization request construction and authorization code capture.
 */

import { DEFAULT_STATE } from "./config.js";

export interface AuthorizationUrlParams {
	authorizeEndpoint: string;
	clientId: string;
	redirectUri: string;
	scope: string;
	responseMode: string;
	responseType: string;
	/** Defaults to the literal "none"; supply a real value for CSRF protection */
	state?: string | undefined;
	codeChallenge?: string | undefined;
	codeChallengeMethod?: string | undefined;
}

/**
 * Percent-encode a parameter map in insertion order, dropping undefined
 * values. Spaces become %20 rather than "+".
 */
export function encodeQuery(params: Record<string, string | undefined>): string {
	const pairs: string[] = [];
	for (const [key, value] of Object.entries(params)) {
		if (value === undefined) continue;
		pairs.push(`${encodeURIComponent(key)}=${encodeURIComponent(value)}`);
	}
	return pairs.join("&");
}

export function buildAuthorizationUrl(params: AuthorizationUrlParams): string {
	const query: Record<string, string | undefined> = {
		client_id: params.clientId,
		redirect_uri: params.redirectUri,
		response_mode: params.responseMode,
		response_type: params.responseType,
		scope: params.scope,
		state: params.state || DEFAULT_STATE,
	};
	if (params.codeChallenge) {
		query.code_challenge = params.codeChallenge;
		query.code_challenge_method = params.codeChallengeMethod ?? "S256";
	}
	return `${params.authorizeEndpoint}?${encodeQuery(query)}`;
}

/**
 * Pull the authorization code out of whatever the user pasted: the full
 * redirect URL (query or fragment response mode) or the bare code.
 */
export function extractCode(value: string): string {
	const trimmed = value.trim();
	if (!trimmed) {
		throw new CodeExtractionError("Authorization code not provided.");
	}

	const params = redirectParams(trimmed);
	if (!params) {
		return trimmed;
	}

	const code = params.get("code");
	if (code) {
		return code;
	}

	const error = params.get("error");
	if (error) {
		const description = params.get("error_description") ?? "no description";
		throw new CodeExtractionError(
			`Redirect URL carries an error instead of a code: ${error} (${description})`,
		);
	}

	throw new CodeExtractionError(
		"Redirect URL does not contain a `code` parameter. Paste the full redirect URL or just the code.",
	);
}

/** Query parameters merged with fragment parameters; undefined for a bare code. */
function redirectParams(value: string): URLSearchParams | undefined {
	const queryStart = value.indexOf("?");
	const hashStart = value.indexOf("#");
	if (queryStart === -1 && hashStart === -1) {
		return undefined;
	}

	const queryEnd = hashStart > queryStart ? hashStart : undefined;
	const fragmentEnd = queryStart > hashStart ? queryStart : undefined;
	const query = queryStart === -1 ? "" : value.slice(queryStart + 1, queryEnd);
	const fragment = hashStart === -1 ? "" : value.slice(hashStart + 1, fragmentEnd);

	const params = new URLSearchParams(query);
	for (const [key, val] of new URLSearchParams(fragment)) {
		if (!params.has(key)) {
			params.append(key, val);
		}
	}
	return params;
}

export class CodeExtractionError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "CodeExtractionError";
	}
}
