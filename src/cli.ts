#!/usr/bin/env node

/**
 * entra-oidc-check CLI — step-by-step checks of a Microsoft Entra app
 * registration's OIDC authorization code flow.
 *
 * Usage:
 *   entra-oidc-check guide
 *   entra-oidc-check authorize --env-file .env
 *   entra-oidc-check token --code <code> --code-verifier <verifier>
 *   entra-oidc-check report --format markdown
 *   entra-oidc-check browser-helper --open-browser
 */

import { CommanderError } from "commander";
import { UsageError } from "./commands/shared.js";
import { ConfigError, determineEnvFile, loadEnvDefaults } from "./config.js";
import { openInBrowser } from "./helper/browser.js";
import { createProgram } from "./program.js";
import { createTerminal } from "./terminal.js";

async function main(): Promise<void> {
	const envFile = determineEnvFile(process.argv.slice(2));
	const program = createProgram({
		envFile,
		defaults: loadEnvDefaults(envFile),
		terminal: createTerminal(),
		openBrowser: openInBrowser,
		untilInterrupted,
	});
	await program.parseAsync(process.argv);
}

function untilInterrupted(): Promise<void> {
	return new Promise((resolve) => {
		process.once("SIGINT", () => resolve());
		process.once("SIGTERM", () => resolve());
	});
}

/** 2 for bad input or configuration, 1 for everything that failed at run time */
function exitCodeFor(err: unknown): number {
	if (err instanceof CommanderError) {
		return err.exitCode === 0 ? 0 : 2;
	}
	if (err instanceof UsageError || err instanceof ConfigError) {
		return 2;
	}
	return 1;
}

main().catch((err: unknown) => {
	const code = exitCodeFor(err);
	// commander has already printed its own message
	if (!(err instanceof CommanderError)) {
		console.error(err instanceof Error ? err.message : String(err));
	}
	process.exit(code);
});
