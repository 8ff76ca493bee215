import { describe, expect, it } from "vitest";
import {
	codeChallenge,
	generateCodeVerifier,
	generatePkcePair,
	isValidCodeVerifier,
} from "../../src/pkce.js";

describe("generateCodeVerifier", () => {
	it("produces 64 URL-safe characters by default", () => {
		const verifier = generateCodeVerifier();
		expect(verifier).toHaveLength(64);
		expect(isValidCodeVerifier(verifier)).toBe(true);
	});

	it("pads short verifiers up to 43 characters", () => {
		const verifier = generateCodeVerifier(8);
		expect(verifier).toHaveLength(43);
		expect(verifier.endsWith("A")).toBe(true);
	});

	it("caps verifiers at 128 characters", () => {
		expect(generateCodeVerifier(200)).toHaveLength(128);
	});

	it("differs between calls", () => {
		expect(generateCodeVerifier()).not.toBe(generateCodeVerifier());
	});
});

describe("codeChallenge", () => {
	it("is the unpadded base64url SHA-256 of the verifier", () => {
		expect(codeChallenge("test")).toBe("n4bQgYhMfWWaL-qgxVrQFaO_TxsrC4Is0V1sFbDwCgg");
		expect(codeChallenge("a".repeat(43))).toBe("ZtNPunH49FD35FWYhT5Tv8I7vRKQJ8uxMaL0_9eHjNA");
	});
});

describe("generatePkcePair", () => {
	it("pairs a verifier with its S256 challenge", () => {
		const pair = generatePkcePair();
		expect(pair.codeChallengeMethod).toBe("S256");
		expect(pair.codeChallenge).toBe(codeChallenge(pair.codeVerifier));
	});
});

describe("isValidCodeVerifier", () => {
	it("enforces the RFC 7636 length and alphabet", () => {
		expect(isValidCodeVerifier("a".repeat(43))).toBe(true);
		expect(isValidCodeVerifier("a".repeat(42))).toBe(false);
		expect(isValidCodeVerifier("a".repeat(129))).toBe(false);
		expect(isValidCodeVerifier(`${"a".repeat(42)}+`)).toBe(false);
		expect(isValidCodeVerifier(`${"a".repeat(40)}-._~`)).toBe(true);
	});
});
