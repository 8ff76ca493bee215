/**
 * Step 4: Authorization code capture
 *
 * The code either comes from --authorization-code (a bare code or the full
 * redirect URL) or from an interactive login: the step prints the
 * authorization URL, optionally opens it, and reads the redirect URL back
 * from the terminal.
 */

import { buildAuthorizationUrl, extractCode } from "../authorize.js";
import { codeChallenge, generateCodeVerifier } from "../pkce.js";
import { fail, pass, skip } from "./helpers.js";
import type { ReportStep, StepContext } from "./types.js";

const NOT_PROVIDED =
	"Authorization code not provided. Re-run with --authorization-code or allow interactive prompts.";

export const authorizationCode: ReportStep = {
	id: "authorization",
	name: () => "Authorization code capture",

	async run(ctx) {
		const { settings, session } = ctx;

		if (settings.authorizationCode !== undefined) {
			if (settings.usePkce && !session.codeVerifier) {
				return fail(
					"PKCE is required for this flow. " +
						"Supply --code-verifier with the value used when obtaining the code.",
				);
			}
			const supplied = settings.authorizationCode.trim();
			if (!supplied) {
				return skip(NOT_PROVIDED);
			}
			session.authorizationCode = extractCode(supplied);
			return pass("Authorization code supplied via CLI options.");
		}

		if (!settings.interactive) {
			return skip(
				"Authorization code not provided and prompts are disabled (--non-interactive).",
			);
		}

		const url = prepareAuthorizationUrl(ctx);
		await announce(ctx, url);

		const answer = (await ctx.terminal.prompt(
			"Paste the redirect URL or authorization code (leave blank to skip): ",
		)).trim();
		if (!answer) {
			return skip(NOT_PROVIDED);
		}

		session.authorizationCode = extractCode(answer);
		return pass("Authorization code captured via interactive login.");
	},
};

function prepareAuthorizationUrl(ctx: StepContext): string {
	const { settings, session } = ctx;
	if (settings.usePkce && !session.codeVerifier) {
		session.codeVerifier = generateCodeVerifier();
		ctx.log("Generated a new PKCE code verifier for this session");
	}
	const challenge =
		settings.usePkce && session.codeVerifier ? codeChallenge(session.codeVerifier) : undefined;

	const url = buildAuthorizationUrl({
		authorizeEndpoint: ctx.endpoints.authorize,
		clientId: settings.clientId ?? "",
		redirectUri: settings.redirectUri ?? "",
		scope: settings.scope,
		responseMode: settings.responseMode,
		responseType: settings.responseType,
		state: settings.state,
		codeChallenge: challenge,
		codeChallengeMethod: challenge ? "S256" : undefined,
	});
	session.authorizationUrl = url;
	return url;
}

async function announce(ctx: StepContext, url: string): Promise<void> {
	const { terminal, session } = ctx;
	terminal.print("Open the authorization URL below in a browser.");
	terminal.print("Complete the login and paste the resulting redirect URL or code.");

	if (ctx.settings.openBrowser) {
		try {
			await ctx.openUrl(url);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			terminal.warn(`Warning: failed to open a browser: ${message}`);
		}
	}

	if (session.codeVerifier) {
		terminal.print(
			"\nPKCE code verifier for this session " +
				"(you only need this if you re-run with --authorization-code):\n" +
				`${session.codeVerifier}\n`,
		);
	}
	terminal.print(`\nAuthorization URL:\n${url}\n`);
}
