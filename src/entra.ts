/**
 * Entra protocol calls shared by the CLI commands and the report steps:
 * discovery, token grants and userinfo, plus response summaries.
 */

import { decodeJwt } from "jose";
import { type EntraClient, type HttpResponse, json } from "./client.js";

/** Entra refuses to redeem a SPA registration's code outside a cross-origin browser request */
export const SPA_REDEMPTION_ERROR = "AADSTS9002327";

export const USERINFO_CLAIMS = ["sub", "email", "name", "preferred_username"] as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ClientIdentity {
	clientId: string;
	clientSecret?: string | undefined;
	/** Public clients never send client_secret */
	publicClient: boolean;
}

export type TokenGrant =
	| {
			type: "authorization_code";
			code: string;
			redirectUri: string;
			codeVerifier?: string | undefined;
		}
	| { type: "refresh_token"; refreshToken: string }
	| { type: "client_credentials" };

export type GrantType = TokenGrant["type"];

export const GRANT_TYPES: readonly GrantType[] = [
	"authorization_code",
	"refresh_token",
	"client_credentials",
];

export interface TokenSet {
	access_token?: string;
	refresh_token?: string;
	id_token?: string;
	token_type?: string;
	scope?: string;
	expires_in?: number | string;
}

export interface DiscoveryDocument {
	issuer?: string;
	authorization_endpoint?: string;
	token_endpoint?: string;
	userinfo_endpoint?: string;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export function buildTokenForm(
	grant: TokenGrant,
	client: ClientIdentity,
	scope?: string,
): Record<string, string | undefined> {
	const form: Record<string, string | undefined> = {
		client_id: client.clientId,
		grant_type: grant.type,
	};

	switch (grant.type) {
		case "authorization_code":
			form.code = grant.code;
			form.redirect_uri = grant.redirectUri;
			break;
		case "refresh_token":
			form.refresh_token = grant.refreshToken;
			break;
		case "client_credentials":
			break;
	}

	if (scope) {
		form.scope = scope;
	}
	if (grant.type === "authorization_code" && grant.codeVerifier) {
		form.code_verifier = grant.codeVerifier;
	}
	if (!client.publicClient && client.clientSecret) {
		form.client_secret = client.clientSecret;
	}
	return form;
}

export async function requestToken(
	client: EntraClient,
	tokenEndpoint: string,
	form: Record<string, string | undefined>,
): Promise<{ response: HttpResponse; tokens: TokenSet }> {
	const response = await client.postForm(tokenEndpoint, form);
	return { response, tokens: parseTokenSet(json(response)) };
}

export async function fetchDiscovery(
	client: EntraClient,
	url: string,
): Promise<{ response: HttpResponse; document: DiscoveryDocument }> {
	const response = await client.get(url);
	return { response, document: parseDiscovery(json(response)) };
}

export async function fetchUserinfo(
	client: EntraClient,
	userinfoEndpoint: string,
	accessToken: string,
): Promise<HttpResponse> {
	return client.get(userinfoEndpoint, { Authorization: `Bearer ${accessToken}` });
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const TOKEN_STRING_FIELDS = [
	"access_token",
	"refresh_token",
	"id_token",
	"token_type",
	"scope",
] as const;

export function parseTokenSet(body: Record<string, unknown>): TokenSet {
	const tokens: TokenSet = {};
	for (const key of TOKEN_STRING_FIELDS) {
		const value = body[key];
		if (typeof value === "string") {
			tokens[key] = value;
		}
	}
	const expires = body.expires_in;
	if (typeof expires === "number" || typeof expires === "string") {
		tokens.expires_in = expires;
	}
	return tokens;
}

const DISCOVERY_KEYS = [
	"issuer",
	"authorization_endpoint",
	"token_endpoint",
	"userinfo_endpoint",
] as const;

function parseDiscovery(body: Record<string, unknown>): DiscoveryDocument {
	const document: DiscoveryDocument = {};
	for (const key of DISCOVERY_KEYS) {
		const value = body[key];
		if (typeof value === "string") {
			document[key] = value;
		}
	}
	return document;
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

export function summarizeTokenSet(tokens: TokenSet): string[] {
	const lines = [
		`Received access token (length ${tokens.access_token?.length ?? 0} chars).`,
		`Expires in: ${tokens.expires_in ?? "unknown"} seconds.`,
		`Refresh token issued: ${tokens.refresh_token ? "yes" : "no"}.`,
	];
	if (tokens.id_token) {
		lines.push(describeIdToken(tokens.id_token));
	}
	return lines;
}

/** Claims are decoded for display only; signatures are not verified */
export function describeIdToken(idToken: string): string {
	try {
		const claims = decodeJwt(idToken);
		const audience = Array.isArray(claims.aud) ? claims.aud.join(" ") : (claims.aud ?? "<none>");
		const user = stringClaim(claims.preferred_username) ?? stringClaim(claims.name) ?? "<unknown>";
		return `ID token: issuer ${claims.iss ?? "<none>"}, audience ${audience}, user ${user}.`;
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		return `ID token: issued but could not be decoded (${message}).`;
	}
}

export function summarizeClaims(claims: Record<string, unknown>): string {
	const lines: string[] = [];
	for (const key of USERINFO_CLAIMS) {
		const value = claims[key];
		if (value !== undefined && value !== null) {
			lines.push(`${key}: ${String(value)}`);
		}
	}
	return lines.length > 0 ? lines.join("\n") : "No standard claims returned.";
}

export function isSpaRedemptionError(text: string): boolean {
	return text.includes(SPA_REDEMPTION_ERROR);
}

function stringClaim(value: unknown): string | undefined {
	return typeof value === "string" && value.length > 0 ? value : undefined;
}
