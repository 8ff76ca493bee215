/**
 * node:http server that hands every request to the helper's Hono app.
 */

import {
	type IncomingHttpHeaders,
	type IncomingMessage,
	type ServerResponse,
	createServer,
} from "node:http";
import type { AddressInfo } from "node:net";
import type { Hono } from "hono";

export interface HelperServerOptions {
	host: string;
	/** 0 picks a free port */
	port: number;
}

export interface HelperServer {
	/** Base URL, e.g. http://127.0.0.1:8765/ */
	url: string;
	close(): Promise<void>;
}

export async function startHelperServer(
	app: Hono,
	options: HelperServerOptions,
): Promise<HelperServer> {
	const server = createServer((req: IncomingMessage, res: ServerResponse) => {
		forward(app, req, res).catch((err) => {
			res.writeHead(500, { "Content-Type": "application/json" });
			res.end(JSON.stringify({ error: "Internal server error", message: String(err) }));
		});
	});

	await new Promise<void>((resolve, reject) => {
		server.once("error", reject);
		server.listen(options.port, options.host, () => {
			server.off("error", reject);
			resolve();
		});
	});

	const address = server.address();
	const port = isAddressInfo(address) ? address.port : options.port;

	return {
		url: `http://${options.host}:${port}/`,
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.close((err) => {
					if (err) reject(err);
					else resolve();
				});
			}),
	};
}

async function forward(app: Hono, req: IncomingMessage, res: ServerResponse): Promise<void> {
	const method = req.method ?? "GET";
	const webRequest = new Request(`http://localhost${req.url ?? "/"}`, {
		method,
		headers: toHeaders(req.headers),
	});

	const webResponse = await app.fetch(webRequest);

	res.writeHead(webResponse.status, Object.fromEntries(webResponse.headers.entries()));
	res.end(await webResponse.text());
}

function toHeaders(incoming: IncomingHttpHeaders): Headers {
	const headers = new Headers();
	for (const [name, value] of Object.entries(incoming)) {
		if (value === undefined) continue;
		headers.set(name, Array.isArray(value) ? value.join(", ") : value);
	}
	return headers;
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
	return address !== null && typeof address === "object";
}
