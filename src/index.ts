/**
 * entra-oidc-check - Microsoft Entra OIDC flow checks
 *
 * Library entry point for programmatic usage in test suites.
 */

export {
	ConfigError,
	DEFAULT_AUTHORITY,
	DEFAULT_SCOPE,
	DEFAULT_TENANT_ID,
	DEFAULT_USERINFO_ENDPOINT,
	determineEnvFile,
	entraEndpoints,
	loadEnvDefaults,
	resolvePublicClient,
	tenantFromDiscoveryUrl,
} from "./config.js";
export type { EntraEndpoints, EnvDefaults } from "./config.js";

export {
	codeChallenge,
	generateCodeVerifier,
	generatePkcePair,
	isValidCodeVerifier,
} from "./pkce.js";
export type { PkcePair } from "./pkce.js";

export { CodeExtractionError, buildAuthorizationUrl, extractCode } from "./authorize.js";
export type { AuthorizationUrlParams } from "./authorize.js";

export { EntraClient, HttpError } from "./client.js";
export type { EntraClientOptions, HttpResponse } from "./client.js";

export {
	SPA_REDEMPTION_ERROR,
	buildTokenForm,
	fetchDiscovery,
	fetchUserinfo,
	requestToken,
	summarizeTokenSet,
} from "./entra.js";
export type {
	ClientIdentity,
	DiscoveryDocument,
	GrantType,
	TokenGrant,
	TokenSet,
} from "./entra.js";

export { runSteps } from "./runner.js";
export type { RunResult, RunSummary, RunnerOptions, StepResult } from "./runner.js";
export { allSteps, getStepById, getStepIds } from "./steps/index.js";
export type {
	ReportSession,
	ReportSettings,
	ReportStep,
	StepContext,
	StepVerdict,
} from "./steps/index.js";
export { formatResults, spaRedemptionHint } from "./reporter.js";
export type { ReportFormat } from "./reporter.js";

export { createHelperApp } from "./helper/app.js";
export { buildHelperConfig } from "./helper/config.js";
export type { HelperConfig } from "./helper/config.js";
export { startHelperServer } from "./helper/server.js";
export type { HelperServer } from "./helper/server.js";

export { createProgram } from "./program.js";
export type { ProgramContext } from "./program.js";
export { UsageError } from "./commands/shared.js";
