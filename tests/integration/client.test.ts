import { type Server, createServer } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { EntraClient, HttpError, json } from "../../src/client.js";

// ---------------------------------------------------------------------------
// Mock server
// ---------------------------------------------------------------------------

let server: Server;
let baseUrl: string;
const received: Array<{ method: string; body: string; contentType: string | undefined }> = [];

beforeAll(async () => {
	server = createServer((req, res) => {
		const chunks: Buffer[] = [];
		req.on("data", (chunk: Buffer) => chunks.push(chunk));
		req.on("end", () => {
			received.push({
				method: req.method ?? "",
				body: Buffer.concat(chunks).toString(),
				contentType: req.headers["content-type"],
			});
			switch (req.url) {
				case "/json":
					res.writeHead(200, { "Content-Type": "application/json" });
					res.end('{"ok":true}');
					break;
				case "/text":
					res.writeHead(200, { "Content-Type": "text/plain" });
					res.end("plain text");
					break;
				case "/mislabelled":
					res.writeHead(200, { "Content-Type": "text/plain" });
					res.end('{"ok":"yes"}');
					break;
				case "/broken":
					res.writeHead(200, { "Content-Type": "application/json" });
					res.end("{not json");
					break;
				case "/slow":
					setTimeout(() => {
						res.writeHead(200);
						res.end();
					}, 500);
					break;
				default:
					res.writeHead(400, { "Content-Type": "application/json" });
					res.end('{"error":"invalid_grant"}');
			}
		});
	});
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
	const address = server.address();
	const port = address !== null && typeof address === "object" ? address.port : 0;
	baseUrl = `http://127.0.0.1:${port}`;
});

afterAll(async () => {
	server.closeAllConnections();
	await new Promise<void>((resolve) => server.close(() => resolve()));
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("EntraClient", () => {
	const client = new EntraClient({ timeoutMs: 2000 });

	it("parses JSON responses", async () => {
		const response = await client.get(`${baseUrl}/json`);
		expect(response.status).toBe(200);
		expect(response.body).toEqual({ ok: true });
		expect(json(response)).toEqual({ ok: true });
	});

	it("keeps other bodies as text", async () => {
		const response = await client.get(`${baseUrl}/text`);
		expect(response.body).toBe("plain text");
		expect(() => json(response)).toThrow("Expected a JSON response but got: plain text");
	});

	it("falls back to parsing mislabelled JSON", async () => {
		const response = await client.get(`${baseUrl}/mislabelled`);
		expect(json(response)).toEqual({ ok: "yes" });
	});

	it("posts form-encoded bodies", async () => {
		await client.postForm(`${baseUrl}/json`, {
			grant_type: "refresh_token",
			scope: "openid profile",
			skipped: undefined,
		});
		const last = received[received.length - 1];
		expect(last).toEqual({
			method: "POST",
			body: "grant_type=refresh_token&scope=openid%20profile",
			contentType: "application/x-www-form-urlencoded",
		});
	});

	it("raises HttpError with the body for non-2xx responses", async () => {
		const error = await client.get(`${baseUrl}/rejected`).catch((err: unknown) => err);
		expect(error).toBeInstanceOf(HttpError);
		if (error instanceof HttpError) {
			expect(error.status).toBe(400);
			expect(error.text).toBe('{"error":"invalid_grant"}');
			expect(error.message).toBe(
				`HTTP 400 error while calling ${baseUrl}/rejected: {"error":"invalid_grant"}`,
			);
		}
	});

	it("reports malformed JSON", async () => {
		await expect(client.get(`${baseUrl}/broken`)).rejects.toThrow(
			`Malformed JSON in response from ${baseUrl}/broken: {not json`,
		);
	});

	it("times out slow requests", async () => {
		const impatient = new EntraClient({ timeoutMs: 50 });
		await expect(impatient.get(`${baseUrl}/slow`)).rejects.toThrow(
			`Request to ${baseUrl}/slow timed out after 50ms`,
		);
	});

	it("logs each request and response", async () => {
		const lines: string[] = [];
		await client.withLog((msg) => lines.push(msg)).get(`${baseUrl}/json`);
		expect(lines[0]).toBe(`GET ${baseUrl}/json`);
		expect(lines[1]).toMatch(new RegExp(`^HTTP 200 from ${baseUrl}/json \\(\\d+ms\\)$`));
	});
});
