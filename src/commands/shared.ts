/**
 * Pieces shared by every subcommand: global options, client construction,
 * response printing and the usage error type.
 */

import { EntraClient, type HttpResponse } from "../client.js";
import { type EntraEndpoints, entraEndpoints } from "../config.js";
import type { Terminal } from "../terminal.js";

/** Options declared on the root program; every subcommand sees them */
export interface GlobalOptions {
	envFile: string;
	tenantId: string;
	scope: string;
	discoveryUrl?: string | undefined;
	authority: string;
	userinfoEndpoint: string;
	/** Seconds */
	timeout: number;
}

export function createClient(opts: GlobalOptions): EntraClient {
	return new EntraClient({ timeoutMs: opts.timeout * 1000 });
}

export function endpointsFor(opts: GlobalOptions): EntraEndpoints {
	return entraEndpoints(opts.tenantId, opts.authority);
}

export function discoveryUrlFor(opts: GlobalOptions): string {
	return opts.discoveryUrl ?? endpointsFor(opts).discovery;
}

/** JSON bodies are pretty-printed with sorted keys; anything else verbatim */
export function printResponse(terminal: Terminal, response: HttpResponse): void {
	if (response.contentType.includes("application/json")) {
		terminal.print(JSON.stringify(sortKeys(response.body), null, 2));
	} else {
		terminal.print(response.text);
	}
}

export function requireOption(
	value: string | undefined,
	flag: string,
	envKey?: string,
	context?: string,
): string {
	if (!value) {
		const where = context ? ` ${context}` : "";
		const hint = envKey ? ` (or set ${envKey} in the env file)` : "";
		throw new UsageError(`${flag} is required${where}${hint}`);
	}
	return value;
}

function sortKeys(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(sortKeys);
	}
	if (value !== null && typeof value === "object") {
		const sorted: Record<string, unknown> = {};
		const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
		for (const [key, inner] of entries) {
			sorted[key] = sortKeys(inner);
		}
		return sorted;
	}
	return value;
}

/** Missing or contradictory command-line input */
export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}
