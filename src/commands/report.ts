/**
 * `report`: run every step of the flow and print one report.
 */

import { resolvePublicClient } from "../config.js";
import { type RunResult, runSteps } from "../runner.js";
import {
	type ReportFormat,
	formatResults,
	isReportFormat,
	REPORT_FORMATS,
	spaRedemptionHint,
} from "../reporter.js";
import { allSteps, getStepIds } from "../steps/index.js";
import type { ReportSession, ReportSettings } from "../steps/types.js";
import type { Terminal } from "../terminal.js";
import { type GlobalOptions, UsageError, createClient, endpointsFor } from "./shared.js";

export interface ReportOptions extends GlobalOptions {
	clientId?: string | undefined;
	clientSecret?: string | undefined;
	redirectUri?: string | undefined;
	responseMode: string;
	responseType: string;
	state: string;
	authorizationCode?: string | undefined;
	codeVerifier?: string | undefined;
	refreshToken?: string | undefined;
	accessToken?: string | undefined;
	clientCredentialsScope?: string | undefined;
	disablePkce?: boolean | undefined;
	publicClient?: boolean | undefined;
	nonInteractive?: boolean | undefined;
	openBrowser?: boolean | undefined;
	format: string;
	step?: string[] | undefined;
	verbose?: boolean | undefined;
	list?: boolean | undefined;
}

export interface ReportDeps {
	terminal: Terminal;
	openUrl: (url: string) => Promise<void>;
}

export function reportSettings(opts: ReportOptions): ReportSettings {
	return {
		envFile: opts.envFile,
		clientId: opts.clientId,
		clientSecret: opts.clientSecret,
		redirectUri: opts.redirectUri,
		tenantId: opts.tenantId,
		scope: opts.scope,
		discoveryUrl: opts.discoveryUrl,
		userinfoEndpoint: opts.userinfoEndpoint,
		responseMode: opts.responseMode,
		responseType: opts.responseType,
		state: opts.state,
		authorizationCode: opts.authorizationCode,
		codeVerifier: opts.codeVerifier,
		refreshToken: opts.refreshToken,
		accessToken: opts.accessToken,
		clientCredentialsScope: opts.clientCredentialsScope,
		usePkce: !opts.disablePkce,
		publicClient: resolvePublicClient(opts.publicClient, opts.clientSecret),
		interactive: !opts.nonInteractive,
		openBrowser: opts.openBrowser ?? false,
	};
}

export async function handleReport(opts: ReportOptions, deps: ReportDeps): Promise<RunResult> {
	const format = parseFormat(opts.format);
	const stepFilter = parseStepFilter(opts.step);
	const settings = reportSettings(opts);

	const session: ReportSession = {};
	if (settings.codeVerifier) {
		session.codeVerifier = settings.codeVerifier;
	}

	const { terminal } = deps;
	const run = await runSteps(
		allSteps,
		{
			settings,
			endpoints: endpointsFor(opts),
			client: createClient(opts),
			session,
			terminal,
			openUrl: deps.openUrl,
		},
		{
			...(stepFilter ? { stepFilter } : {}),
			verbose: opts.verbose ?? false,
			onStepStart: (step, name) => {
				if (opts.verbose) terminal.warn(`Running ${step.id}: ${name}`);
			},
			onStepComplete: (result) => {
				if (format === "table") {
					terminal.warn(`  ${result.verdict.status.padEnd(4)} ${result.name}`);
				}
			},
		},
	);

	terminal.print(formatResults(run, format));

	const hint = spaRedemptionHint(run);
	if (hint) {
		terminal.warn(hint);
	}
	return run;
}

function parseFormat(value: string): ReportFormat {
	if (!isReportFormat(value)) {
		throw new UsageError(
			`Unknown format "${value}". Expected one of: ${REPORT_FORMATS.join(", ")}`,
		);
	}
	return value;
}

function parseStepFilter(ids: string[] | undefined): string[] | undefined {
	if (!ids || ids.length === 0) return undefined;
	const known = getStepIds();
	const unknown = ids.filter((id) => !known.includes(id));
	if (unknown.length > 0) {
		throw new UsageError(
			`Unknown step(s): ${unknown.join(", ")}. Available: ${known.join(", ")}`,
		);
	}
	return ids;
}

export class ReportFailedError extends Error {
	constructor(failed: number) {
		super(`${failed} step(s) failed. See the report above for details.`);
		this.name = "ReportFailedError";
	}
}

export function listSteps(settings: ReportSettings, terminal: Terminal): void {
	terminal.print("\nAvailable steps:\n");
	for (const step of allSteps) {
		terminal.print(`  ${step.id.padEnd(20)} ${step.name(settings)}`);
	}
	terminal.print("");
}
