/**
 * HTTP client for the Entra endpoints.
 *
 * Every call is a single attempt bounded by the configured timeout:
 *   - GET with optional headers (discovery, userinfo)
 *   - form-encoded POST (token endpoint)
 *
 * Non-2xx responses raise HttpError carrying the response body, so the
 * vendor's AADSTS error text reaches the report.
 */

import { encodeQuery } from "./authorize.js";

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export interface EntraClientOptions {
	/** Per-request timeout in milliseconds */
	timeoutMs: number;
	/** Receives one line per request/response */
	log?: (msg: string) => void;
}

export interface HttpResponse {
	/** HTTP status code */
	status: number;
	/** Content-Type header ("" when absent) */
	contentType: string;
	/** Raw response text */
	text: string;
	/** Parsed JSON when the content type says so, otherwise the raw text */
	body: unknown;
	/** Response headers (lower-cased keys) */
	headers: Record<string, string>;
	/** Round-trip time in milliseconds */
	durationMs: number;
}

export class EntraClient {
	private readonly timeoutMs: number;
	private readonly log: (msg: string) => void;

	constructor(options: EntraClientOptions) {
		this.timeoutMs = options.timeoutMs;
		this.log = options.log ?? (() => {});
	}

	/** Same client, logging to a different sink */
	withLog(log: (msg: string) => void): EntraClient {
		return new EntraClient({ timeoutMs: this.timeoutMs, log });
	}

	async get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
		return this.send(url, {
			method: "GET",
			headers: { Accept: "application/json", ...headers },
		});
	}

	async postForm(url: string, data: Record<string, string | undefined>): Promise<HttpResponse> {
		return this.send(url, {
			method: "POST",
			headers: {
				"Content-Type": "application/x-www-form-urlencoded",
				Accept: "application/json",
			},
			body: encodeQuery(data),
		});
	}

	// -----------------------------------------------------------------------
	// Internal helpers
	// -----------------------------------------------------------------------

	private async send(url: string, init: RequestInit): Promise<HttpResponse> {
		const method = init.method ?? "GET";
		this.log(`${method} ${url}`);

		const start = performance.now();
		let response: Response;
		try {
			response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
		} catch (err) {
			if (isTimeout(err)) {
				throw new Error(`Request to ${url} timed out after ${this.timeoutMs}ms`);
			}
			const message = err instanceof Error ? describeFetchFailure(err) : String(err);
			throw new Error(`Request to ${url} failed: ${message}`);
		}
		const text = await response.text();
		const durationMs = Math.round(performance.now() - start);
		this.log(`HTTP ${response.status} from ${url} (${durationMs}ms)`);

		if (!response.ok) {
			throw new HttpError(response.status, url, text);
		}

		const headers: Record<string, string> = {};
		response.headers.forEach((value, key) => {
			headers[key] = value;
		});

		const contentType = response.headers.get("content-type") ?? "";
		let body: unknown = text;
		if (contentType.includes("application/json")) {
			try {
				body = JSON.parse(text);
			} catch {
				throw new Error(`Malformed JSON in response from ${url}: ${truncate(text)}`);
			}
		}

		return { status: response.status, contentType, text, body, headers, durationMs };
	}
}

// ---------------------------------------------------------------------------
// Body helpers
// ---------------------------------------------------------------------------

/**
 * JSON object body of a response. A text body is parsed as a fallback for
 * servers that mislabel their content type.
 */
export function json(response: HttpResponse): Record<string, unknown> {
	let body = response.body;
	if (typeof body === "string") {
		try {
			body = JSON.parse(body);
		} catch {
			throw new Error(`Expected a JSON response but got: ${truncate(response.text)}`);
		}
	}
	if (!isRecord(body)) {
		throw new Error(`Expected a JSON object but got: ${truncate(response.text)}`);
	}
	return body;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isTimeout(err: unknown): boolean {
	return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

/** undici wraps the socket error in `cause`; surface it */
function describeFetchFailure(err: Error): string {
	const cause: unknown = err.cause;
	if (cause instanceof Error && cause.message) {
		return `${err.message} (${cause.message})`;
	}
	return err.message;
}

function truncate(text: string, max = 200): string {
	return text.length > max ? `${text.slice(0, max)}…` : text;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class HttpError extends Error {
	public readonly status: number;
	public readonly url: string;
	public readonly text: string;

	constructor(status: number, url: string, text: string) {
		super(`HTTP ${status} error while calling ${url}: ${text}`);
		this.name = "HttpError";
		this.status = status;
		this.url = url;
		this.text = text;
	}
}
