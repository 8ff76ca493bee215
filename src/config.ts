/**
 * Configuration loader for entra-oidc-check.
 *
 * Reads the app registration's client settings from a local file:
 *   - dotenv files (`key=value` lines), the default `.env`
 *   - TOML files (`*.toml`), top-level keys, with ${ENV_VAR} interpolation
 *
 * Values found here only seed CLI option defaults; flags always win.
 */

import { existsSync, readFileSync } from "node:fs";
import { extname } from "node:path";
import { parse as parseDotenv } from "dotenv";
import { parse as parseToml } from "smol-toml";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_TENANT_ID = "14b77578-9773-42d5-8507-251ca2dc2b06";
export const DEFAULT_SCOPE = "email openid profile offline_access";
export const DEFAULT_ENV_FILE = ".env";
export const DEFAULT_AUTHORITY = "https://login.microsoftonline.com";
export const DEFAULT_USERINFO_ENDPOINT = "https://graph.microsoft.com/oidc/userinfo";
export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_STATE = "none";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EnvDefaults {
	clientId?: string;
	clientSecret?: string;
	redirectUri?: string;
	discoveryUrl?: string;
	/** Always resolved: file value, then discovery URL, then DEFAULT_TENANT_ID */
	tenantId: string;
}

export interface EntraEndpoints {
	authorize: string;
	token: string;
	discovery: string;
}

const ENV_KEYS = [
	"client_id",
	"client_secret",
	"redirect_uri",
	"discovery_url",
	"tenant_id",
] as const;

type EnvKey = (typeof ENV_KEYS)[number];

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export function loadEnvDefaults(path: string): EnvDefaults {
	if (!existsSync(path)) {
		return { tenantId: DEFAULT_TENANT_ID };
	}

	const values = extname(path).toLowerCase() === ".toml" ? readToml(path) : readDotenv(path);

	const defaults: EnvDefaults = { tenantId: DEFAULT_TENANT_ID };
	if (values.client_id) defaults.clientId = values.client_id;
	if (values.client_secret) defaults.clientSecret = values.client_secret;
	if (values.redirect_uri) defaults.redirectUri = values.redirect_uri;
	if (values.discovery_url) defaults.discoveryUrl = values.discovery_url;

	const tenant = values.tenant_id || tenantFromDiscoveryUrl(values.discovery_url);
	if (tenant) {
		defaults.tenantId = tenant;
	}
	return defaults;
}

function readDotenv(path: string): Partial<Record<EnvKey, string>> {
	const parsed = parseDotenv(readFileSync(path, "utf-8"));
	const values: Partial<Record<EnvKey, string>> = {};
	for (const key of ENV_KEYS) {
		const value = parsed[key];
		if (value !== undefined) {
			values[key] = value.trim();
		}
	}
	return values;
}

function readToml(path: string): Partial<Record<EnvKey, string>> {
	const raw = interpolateEnvVars(readFileSync(path, "utf-8"));
	let parsed: Record<string, unknown>;
	try {
		parsed = parseToml(raw);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new ConfigError(`Invalid TOML in ${path}: ${message}`);
	}

	const values: Partial<Record<EnvKey, string>> = {};
	for (const key of ENV_KEYS) {
		const value = parsed[key];
		if (value === undefined) continue;
		if (typeof value !== "string") {
			throw new ConfigError(`${key} in ${path} must be a string`);
		}
		values[key] = value.trim();
	}
	return values;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Tenant segment of an Entra discovery URL, e.g.
 * https://login.microsoftonline.com/<tenant>/v2.0/.well-known/openid-configuration
 */
export function tenantFromDiscoveryUrl(url: string | undefined): string | undefined {
	if (!url) return undefined;
	let pathname: string;
	try {
		pathname = new URL(url).pathname;
	} catch {
		return undefined;
	}
	const parts = pathname.split("/").filter((part) => part.length > 0);
	return parts[0];
}

/**
 * Find the config file named on the command line before the parser runs,
 * so its values can become option defaults.
 */
export function determineEnvFile(argv: readonly string[]): string {
	let envFile = DEFAULT_ENV_FILE;
	argv.forEach((arg, idx) => {
		if (arg === "--env-file" || arg === "-e") {
			const next = argv[idx + 1];
			if (next !== undefined) {
				envFile = next;
			}
		} else if (arg.startsWith("--env-file=") || arg.startsWith("-e=")) {
			envFile = arg.slice(arg.indexOf("=") + 1);
		}
	});
	return envFile;
}

/** An explicit --[no-]public-client wins; otherwise public means "no secret". */
export function resolvePublicClient(
	flag: boolean | undefined,
	clientSecret: string | undefined,
): boolean {
	if (flag === undefined) {
		return !clientSecret;
	}
	return flag;
}

export function entraEndpoints(
	tenantId: string,
	authority: string = DEFAULT_AUTHORITY,
): EntraEndpoints {
	const base = `${authority.replace(/\/+$/, "")}/${tenantId}`;
	return {
		authorize: `${base}/oauth2/v2.0/authorize`,
		token: `${base}/oauth2/v2.0/token`,
		discovery: `${base}/v2.0/.well-known/openid-configuration`,
	};
}

// ---------------------------------------------------------------------------
// Env var interpolation
// ---------------------------------------------------------------------------

/**
 * Replace ${ENV_VAR} patterns with environment variable values.
 * Throws ConfigError if a referenced variable is not set.
 */
function interpolateEnvVars(content: string): string {
	return content.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
		const value = process.env[name];
		if (value === undefined) {
			throw new ConfigError(
				`Environment variable "${name}" is not set (referenced as \${${name}})`,
			);
		}
		return value;
	});
}

// ---------------------------------------------------------------------------
// Error class
// ---------------------------------------------------------------------------

export class ConfigError extends Error {
	constructor(message: string) {
		super(`Config error: ${message}`);
		this.name = "ConfigError";
	}
}
