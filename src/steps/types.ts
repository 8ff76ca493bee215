/**
 * Core type definitions for report steps.
 *
 * Each step runs once, in a fixed order, and returns a tagged verdict:
 *   PASS → the step completed; detail describes what came back
 *   SKIP → a precondition was not met (missing input or earlier output)
 *   FAIL → the step ran and something went wrong
 *
 * A step may also throw; the runner records that as FAIL.
 */

import type { EntraClient } from "../client.js";
import type { EntraEndpoints } from "../config.js";
import type { TokenSet } from "../entra.js";
import type { Terminal } from "../terminal.js";

// ---------------------------------------------------------------------------
// Step interface
// ---------------------------------------------------------------------------

export interface ReportStep {
	/** Unique identifier, e.g. "token" */
	id: string;
	/** Human-readable name shown in the report */
	name(settings: ReportSettings): string;
	run(ctx: StepContext): Promise<StepVerdict>;
}

export type StepStatus = "PASS" | "SKIP" | "FAIL";

export type StepVerdict =
	| { status: "PASS"; detail: string }
	| { status: "SKIP"; detail: string }
	| { status: "FAIL"; detail: string };

// ---------------------------------------------------------------------------
// Context passed to each step
// ---------------------------------------------------------------------------

export interface StepContext {
	settings: ReportSettings;
	endpoints: EntraEndpoints;
	client: EntraClient;
	session: ReportSession;
	terminal: Terminal;
	/** Best-effort browser launch; rejections are reported as warnings */
	openUrl: (url: string) => Promise<void>;
	log: (msg: string) => void;
}

/** Resolved options for one report run. Read-only once the run starts. */
export interface ReportSettings {
	envFile: string;
	clientId?: string | undefined;
	clientSecret?: string | undefined;
	redirectUri?: string | undefined;
	tenantId: string;
	scope: string;
	discoveryUrl?: string | undefined;
	userinfoEndpoint: string;
	responseMode: string;
	responseType: string;
	state: string;
	authorizationCode?: string | undefined;
	codeVerifier?: string | undefined;
	refreshToken?: string | undefined;
	accessToken?: string | undefined;
	clientCredentialsScope?: string | undefined;
	usePkce: boolean;
	publicClient: boolean;
	interactive: boolean;
	openBrowser: boolean;
}

/**
 * Values produced by earlier steps for later ones. Lives for a single
 * run and is discarded on exit.
 */
export interface ReportSession {
	codeVerifier?: string;
	authorizationUrl?: string;
	authorizationCode?: string;
	clientCredentials?: TokenSet;
	authTokens?: TokenSet;
	refreshTokens?: TokenSet;
}
