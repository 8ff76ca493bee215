/**
 * Command-line program definition. The config file is read before the
 * parser runs so its values become option defaults; flags always win.
 */

import { Command, InvalidArgumentError } from "commander";
import { type AuthorizeOptions, handleAuthorize } from "./commands/authorize.js";
import {
	type BrowserHelperOptions,
	DEFAULT_HELPER_HOST,
	DEFAULT_HELPER_PORT,
	handleBrowserHelper,
} from "./commands/browser-helper.js";
import { handleGuide } from "./commands/guide.js";
import {
	ReportFailedError,
	type ReportOptions,
	handleReport,
	listSteps,
	reportSettings,
} from "./commands/report.js";
import type { GlobalOptions } from "./commands/shared.js";
import { type TokenOptions, handleToken } from "./commands/token.js";
import { type UserinfoOptions, handleUserinfo } from "./commands/userinfo.js";
import { handleWellKnown } from "./commands/well-known.js";
import {
	DEFAULT_AUTHORITY,
	DEFAULT_SCOPE,
	DEFAULT_STATE,
	DEFAULT_TIMEOUT_SECONDS,
	DEFAULT_USERINFO_ENDPOINT,
	type EnvDefaults,
} from "./config.js";
import { GRANT_TYPES, type GrantType } from "./entra.js";
import type { BrowserChoice } from "./helper/browser.js";
import type { Terminal } from "./terminal.js";

export const VERSION = "0.1.0";

export interface ProgramContext {
	envFile: string;
	defaults: EnvDefaults;
	terminal: Terminal;
	openBrowser: (url: string, browser: BrowserChoice) => Promise<void>;
	/** Resolves when the browser helper should shut down */
	untilInterrupted: () => Promise<void>;
}

export function createProgram(ctx: ProgramContext): Command {
	const { defaults, terminal } = ctx;
	const program = new Command();

	// Errors surface as CommanderError; the caller picks the exit code
	program.exitOverride();

	program
		.name("entra-oidc-check")
		.description(
			"Walk through the Microsoft Entra OIDC authorization code flow (with PKCE) step by step",
		)
		.version(VERSION)
		.option(
			"-e, --env-file <path>",
			"Config file with client_id, client_secret, redirect_uri, ...",
			ctx.envFile,
		)
		.option("--tenant-id <id>", "Directory (tenant) ID", defaults.tenantId)
		.option("--scope <scope>", "Space-separated scopes", DEFAULT_SCOPE)
		.option(
			"--discovery-url <url>",
			"Override the OIDC discovery document URL",
			defaults.discoveryUrl,
		)
		.option("--authority <url>", "Login authority (sovereign clouds)", DEFAULT_AUTHORITY)
		.option("--userinfo-endpoint <url>", "Userinfo endpoint", DEFAULT_USERINFO_ENDPOINT)
		.option(
			"--timeout <seconds>",
			"HTTP timeout in seconds",
			parsePositiveInt,
			DEFAULT_TIMEOUT_SECONDS,
		);

	program
		.command("authorize")
		.description("Print the authorization URL and the PKCE verifier to use with `token`")
		.option("--client-id <id>", "Application (client) ID", defaults.clientId)
		.option("--redirect-uri <uri>", "Redirect URI registered for the app", defaults.redirectUri)
		.option("--response-mode <mode>", "response_mode parameter", "query")
		.option("--response-type <type>", "response_type parameter", "code")
		.option("--state <state>", "state parameter", DEFAULT_STATE)
		.option("--code-verifier <verifier>", "Use this PKCE verifier instead of a generated one")
		.option("--disable-pkce", "Send no code_challenge")
		.action((_opts: unknown, cmd: Command) => {
			handleAuthorize(cmd.optsWithGlobals<AuthorizeOptions>(), terminal);
		});

	program
		.command("token")
		.description("Call the token endpoint")
		.option("--client-id <id>", "Application (client) ID", defaults.clientId)
		.option(
			"--client-secret <secret>",
			"Client secret (confidential clients)",
			defaults.clientSecret,
		)
		.option(
			"--grant-type <type>",
			`One of: ${GRANT_TYPES.join(", ")}`,
			parseGrantType,
			"authorization_code",
		)
		.option("--code <code>", "Authorization code")
		.option("--refresh-token <token>", "Refresh token")
		.option(
			"--redirect-uri <uri>",
			"Redirect URI used for the authorization request",
			defaults.redirectUri,
		)
		.option("--code-verifier <verifier>", "PKCE verifier printed by `authorize`")
		.option("--public-client", "Treat the app as a public client (never send the secret)")
		.option("--no-public-client", "Treat the app as a confidential client")
		.action(async (_opts: unknown, cmd: Command) => {
			await handleToken(cmd.optsWithGlobals<TokenOptions>(), terminal);
		});

	program
		.command("userinfo")
		.description("Call the userinfo endpoint with an access token")
		.requiredOption("--access-token <token>", "Access token from the token response")
		.action(async (_opts: unknown, cmd: Command) => {
			await handleUserinfo(cmd.optsWithGlobals<UserinfoOptions>(), terminal);
		});

	program
		.command("well-known")
		.description("Fetch the OIDC discovery document")
		.action(async (_opts: unknown, cmd: Command) => {
			await handleWellKnown(cmd.optsWithGlobals<GlobalOptions>(), terminal);
		});

	program
		.command("guide")
		.description("Print the walkthrough and what the config file supplies")
		.action((_opts: unknown, cmd: Command) => {
			handleGuide(cmd.optsWithGlobals<GlobalOptions>().envFile, defaults, terminal);
		});

	program
		.command("report")
		.description("Run every step of the flow and print a PASS/SKIP/FAIL report")
		.option("--client-id <id>", "Application (client) ID", defaults.clientId)
		.option(
			"--client-secret <secret>",
			"Client secret (confidential clients)",
			defaults.clientSecret,
		)
		.option("--redirect-uri <uri>", "Redirect URI registered for the app", defaults.redirectUri)
		.option("--response-mode <mode>", "response_mode parameter", "query")
		.option("--response-type <type>", "response_type parameter", "code")
		.option("--state <state>", "state parameter", DEFAULT_STATE)
		.option("--authorization-code <value>", "Authorization code or the full redirect URL")
		.option("--code-verifier <verifier>", "PKCE verifier used when the code was obtained")
		.option("--refresh-token <token>", "Refresh token to exchange")
		.option("--access-token <token>", "Access token for the userinfo call")
		.option(
			"--client-credentials-scope <scope>",
			"Scope for the client credentials step, e.g. <app-id-uri>/.default",
		)
		.option("--disable-pkce", "Send no code_challenge / code_verifier")
		.option("--public-client", "Treat the app as a public client (never send the secret)")
		.option("--no-public-client", "Treat the app as a confidential client")
		.option("--non-interactive", "Never prompt; skip steps that need input")
		.option("--open-browser", "Open the authorization URL in the default browser")
		.option("-f, --format <format>", "Output format: table, json, markdown", "table")
		.option("-s, --step <id...>", "Run specific step(s) by ID")
		.option("-v, --verbose", "Include per-step request logs (secrets redacted)", false)
		.option("--list", "List available steps and exit")
		.action(async (_opts: unknown, cmd: Command) => {
			const opts = cmd.optsWithGlobals<ReportOptions>();
			if (opts.list) {
				listSteps(reportSettings(opts), terminal);
				return;
			}
			const run = await handleReport(opts, {
				terminal,
				openUrl: (url) => ctx.openBrowser(url, "default"),
			});
			if (run.summary.failed > 0) {
				throw new ReportFailedError(run.summary.failed);
			}
		});

	program
		.command("browser-helper")
		.description("Serve a page that runs the flow in the browser (SPA app registrations)")
		.option("--client-id <id>", "Application (client) ID", defaults.clientId)
		.option(
			"--client-secret <secret>",
			"Client secret (confidential clients)",
			defaults.clientSecret,
		)
		.option("--redirect-uri <uri>", "Redirect URI registered for the app", defaults.redirectUri)
		.option("--state <state>", "state parameter", DEFAULT_STATE)
		.option("--host <host>", "Interface to listen on", DEFAULT_HELPER_HOST)
		.option("--port <port>", "Port to listen on", parsePort, DEFAULT_HELPER_PORT)
		.option("--open-browser", "Open the helper page once the server is up")
		.option("--browser <name>", "Browser to open: default, firefox, chromium", "default")
		.option("--public-client", "Treat the app as a public client (never send the secret)")
		.option("--no-public-client", "Treat the app as a confidential client")
		.action(async (_opts: unknown, cmd: Command) => {
			const server = await handleBrowserHelper(cmd.optsWithGlobals<BrowserHelperOptions>(), {
				terminal,
				openBrowser: ctx.openBrowser,
			});
			await ctx.untilInterrupted();
			terminal.print("\nStopping browser helper...");
			await server.close();
		});

	return program;
}

// ---------------------------------------------------------------------------
// Argument parsers
// ---------------------------------------------------------------------------

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Expected a positive integer.");
	}
	return parsed;
}

function parsePort(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
		throw new InvalidArgumentError("Expected a port between 0 and 65535.");
	}
	return parsed;
}

function parseGrantType(value: string): GrantType {
	const grant = GRANT_TYPES.find((type) => type === value);
	if (!grant) {
		throw new InvalidArgumentError(`Expected one of: ${GRANT_TYPES.join(", ")}.`);
	}
	return grant;
}
