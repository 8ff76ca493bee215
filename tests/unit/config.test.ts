import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeAll, describe, expect, it } from "vitest";
import {
	ConfigError,
	DEFAULT_TENANT_ID,
	determineEnvFile,
	entraEndpoints,
	loadEnvDefaults,
	resolvePublicClient,
	tenantFromDiscoveryUrl,
} from "../../src/config.js";

describe("loadEnvDefaults", () => {
	let tmpDir: string;

	beforeAll(() => {
		tmpDir = mkdtempSync(join(tmpdir(), "entra-oidc-check-test-"));
	});

	afterEach(() => {
		delete process.env.TEST_ENTRA_SECRET;
	});

	function writeFile(name: string, content: string): string {
		const path = join(tmpDir, name);
		writeFileSync(path, content);
		return path;
	}

	it("falls back to the default tenant when the file is missing", () => {
		const defaults = loadEnvDefaults(join(tmpDir, "does-not-exist.env"));
		expect(defaults).toEqual({ tenantId: DEFAULT_TENANT_ID });
	});

	it("reads dotenv files with quotes and comments", () => {
		const path = writeFile(
			"app.env",
			[
				"# Entra app registration",
				'client_id="client-123"',
				"client_secret='test-secret'",
				"redirect_uri=http://localhost:5000/callback",
				"tenant_id=test-tenant",
				"unrelated=ignored",
			].join("\n"),
		);

		expect(loadEnvDefaults(path)).toEqual({
			clientId: "client-123",
			clientSecret: "test-secret",
			redirectUri: "http://localhost:5000/callback",
			tenantId: "test-tenant",
		});
	});

	it("treats empty values as absent", () => {
		const path = writeFile("empty.env", "client_id=client-123\nclient_secret=\n");
		const defaults = loadEnvDefaults(path);
		expect(defaults.clientSecret).toBeUndefined();
		expect(defaults.clientId).toBe("client-123");
	});

	it("derives the tenant from the discovery URL", () => {
		const path = writeFile(
			"discovery.env",
			"discovery_url=https://login.microsoftonline.com/custom-tenant/v2.0/.well-known/openid-configuration\n",
		);
		const defaults = loadEnvDefaults(path);
		expect(defaults.tenantId).toBe("custom-tenant");
		expect(defaults.discoveryUrl).toBe(
			"https://login.microsoftonline.com/custom-tenant/v2.0/.well-known/openid-configuration",
		);
	});

	it("prefers tenant_id over the discovery URL", () => {
		const path = writeFile(
			"both.env",
			"tenant_id=explicit-tenant\n" +
				"discovery_url=https://login.microsoftonline.com/other/v2.0/.well-known/openid-configuration\n",
		);
		expect(loadEnvDefaults(path).tenantId).toBe("explicit-tenant");
	});

	it("reads TOML files with env var interpolation", () => {
		process.env.TEST_ENTRA_SECRET = "test-secret";
		const path = writeFile(
			"app.toml",
			[
				'client_id = "client-123"',
				'client_secret = "${TEST_ENTRA_SECRET}"',
				'redirect_uri = "http://localhost:5000/callback"',
			].join("\n"),
		);

		expect(loadEnvDefaults(path)).toEqual({
			clientId: "client-123",
			clientSecret: "test-secret",
			redirectUri: "http://localhost:5000/callback",
			tenantId: DEFAULT_TENANT_ID,
		});
	});

	it("throws ConfigError for an unset interpolated variable", () => {
		const path = writeFile("missing-var.toml", 'client_secret = "${TEST_ENTRA_SECRET}"\n');
		expect(() => loadEnvDefaults(path)).toThrow(ConfigError);
		expect(() => loadEnvDefaults(path)).toThrow(
			'Config error: Environment variable "TEST_ENTRA_SECRET" is not set (referenced as ${TEST_ENTRA_SECRET})',
		);
	});

	it("throws ConfigError for non-string TOML values", () => {
		const path = writeFile("typed.toml", "tenant_id = 42\n");
		expect(() => loadEnvDefaults(path)).toThrow(`Config error: tenant_id in ${path} must be a string`);
	});

	it("throws ConfigError for invalid TOML", () => {
		const path = writeFile("broken.toml", "client_id = \n");
		expect(() => loadEnvDefaults(path)).toThrow(ConfigError);
	});
});

describe("tenantFromDiscoveryUrl", () => {
	it("returns the first path segment", () => {
		const url =
			"https://login.microsoftonline.com/custom-tenant/v2.0/.well-known/openid-configuration";
		expect(tenantFromDiscoveryUrl(url)).toBe("custom-tenant");
	});

	it("returns undefined for missing or unparsable URLs", () => {
		expect(tenantFromDiscoveryUrl(undefined)).toBeUndefined();
		expect(tenantFromDiscoveryUrl("not a url")).toBeUndefined();
		expect(tenantFromDiscoveryUrl("https://login.microsoftonline.com/")).toBeUndefined();
	});
});

describe("determineEnvFile", () => {
	it("defaults to .env", () => {
		expect(determineEnvFile(["report"])).toBe(".env");
	});

	it("accepts every spelling of the option", () => {
		expect(determineEnvFile(["--env-file", "a.env"])).toBe("a.env");
		expect(determineEnvFile(["-e", "b.env"])).toBe("b.env");
		expect(determineEnvFile(["--env-file=c.env"])).toBe("c.env");
		expect(determineEnvFile(["-e=d.toml"])).toBe("d.toml");
	});

	it("lets the last occurrence win", () => {
		const argv = ["-e", "first.env", "report", "--env-file=second.env"];
		expect(determineEnvFile(argv)).toBe("second.env");
	});

	it("ignores a trailing flag without a value", () => {
		expect(determineEnvFile(["report", "--env-file"])).toBe(".env");
	});
});

describe("resolvePublicClient", () => {
	it("is public exactly when no secret is configured", () => {
		expect(resolvePublicClient(undefined, undefined)).toBe(true);
		expect(resolvePublicClient(undefined, "test-secret")).toBe(false);
	});

	it("lets an explicit flag win", () => {
		expect(resolvePublicClient(true, "test-secret")).toBe(true);
		expect(resolvePublicClient(false, undefined)).toBe(false);
	});
});

describe("entraEndpoints", () => {
	it("builds the v2.0 endpoints for a tenant", () => {
		expect(entraEndpoints("test-tenant")).toEqual({
			authorize: "https://login.microsoftonline.com/test-tenant/oauth2/v2.0/authorize",
			token: "https://login.microsoftonline.com/test-tenant/oauth2/v2.0/token",
			discovery: "https://login.microsoftonline.com/test-tenant/v2.0/.well-known/openid-configuration",
		});
	});

	it("accepts another authority with a trailing slash", () => {
		expect(entraEndpoints("gov-tenant", "https://login.microsoftonline.us/").token).toBe(
			"https://login.microsoftonline.us/gov-tenant/oauth2/v2.0/token",
		);
	});
});
