/**
 * PKCE (RFC 7636) verifier and S256 challenge.
 */

import { createHash, randomBytes } from "node:crypto";

const MIN_VERIFIER_LENGTH = 43;
const MAX_VERIFIER_LENGTH = 128;
const VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;

export interface PkcePair {
	codeVerifier: string;
	codeChallenge: string;
	codeChallengeMethod: "S256";
}

/**
 * Random verifier from secure bytes. 48 bytes base64url-encode to 64 chars;
 * smaller byte counts are padded up to the RFC minimum.
 */
export function generateCodeVerifier(byteLength = 48): string {
	let verifier = randomBytes(byteLength).toString("base64url");
	if (verifier.length < MIN_VERIFIER_LENGTH) {
		verifier += "A".repeat(MIN_VERIFIER_LENGTH - verifier.length);
	}
	return verifier.slice(0, MAX_VERIFIER_LENGTH);
}

export function codeChallenge(verifier: string): string {
	return createHash("sha256").update(verifier, "ascii").digest("base64url");
}

export function generatePkcePair(): PkcePair {
	const codeVerifier = generateCodeVerifier();
	return {
		codeVerifier,
		codeChallenge: codeChallenge(codeVerifier),
		codeChallengeMethod: "S256",
	};
}

/** Whether a user-supplied verifier has the shape RFC 7636 Section 4.1 requires. */
export function isValidCodeVerifier(value: string): boolean {
	return VERIFIER_PATTERN.test(value);
}
