/**
 * `browser-helper`: serve the helper page so SPA registrations can redeem
 * their authorization code from a real browser origin.
 */

import { resolvePublicClient } from "../config.js";
import { createHelperApp } from "../helper/app.js";
import { BROWSER_CHOICES, type BrowserChoice, isBrowserChoice } from "../helper/browser.js";
import { buildHelperConfig } from "../helper/config.js";
import { type HelperServer, startHelperServer } from "../helper/server.js";
import type { Terminal } from "../terminal.js";
import { type GlobalOptions, UsageError, endpointsFor, requireOption } from "./shared.js";

export const DEFAULT_HELPER_HOST = "127.0.0.1";
export const DEFAULT_HELPER_PORT = 8765;

export interface BrowserHelperOptions extends GlobalOptions {
	clientId?: string | undefined;
	clientSecret?: string | undefined;
	redirectUri?: string | undefined;
	state: string;
	host: string;
	port: number;
	openBrowser?: boolean | undefined;
	browser: string;
	publicClient?: boolean | undefined;
}

export interface BrowserHelperDeps {
	terminal: Terminal;
	openBrowser: (url: string, browser: BrowserChoice) => Promise<void>;
}

export async function handleBrowserHelper(
	opts: BrowserHelperOptions,
	deps: BrowserHelperDeps,
): Promise<HelperServer> {
	const clientId = requireOption(opts.clientId, "--client-id", "client_id");
	const redirectUri = requireOption(opts.redirectUri, "--redirect-uri", "redirect_uri");
	if (!isBrowserChoice(opts.browser)) {
		throw new UsageError(
			`Unknown browser "${opts.browser}". Expected one of: ${BROWSER_CHOICES.join(", ")}`,
		);
	}
	const browser = opts.browser;

	const config = buildHelperConfig({
		clientId,
		clientSecret: opts.clientSecret,
		redirectUri,
		tenantId: opts.tenantId,
		scope: opts.scope,
		discoveryUrl: opts.discoveryUrl,
		state: opts.state,
		publicClient: resolvePublicClient(opts.publicClient, opts.clientSecret),
		endpoints: endpointsFor(opts),
		userinfoEndpoint: opts.userinfoEndpoint,
	});

	const server = await startHelperServer(
		createHelperApp(config),
		{ host: opts.host, port: opts.port },
	);
	const { terminal } = deps;
	terminal.print(`Browser helper running at ${server.url}`);
	terminal.print("Register this origin as a SPA redirect URI in the Entra app registration.");
	terminal.print("Press Ctrl+C to stop.");

	if (opts.openBrowser) {
		deps.openBrowser(server.url, browser).catch((err) => {
			const message = err instanceof Error ? err.message : String(err);
			terminal.warn(`Warning: failed to open ${browser} browser: ${message}`);
		});
	}
	return server;
}
