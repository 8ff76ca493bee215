/**
 * Browser helper routes using Hono
 *
 * - GET /        the helper page
 * - GET /config  the configuration record as JSON
 */

import { readFileSync } from "node:fs";
import { Hono } from "hono";
import type { HelperConfig } from "./config.js";

const PAGE_URL = new URL("../../public/browser-helper.html", import.meta.url);

export function readHelperPage(): string {
	return readFileSync(PAGE_URL, "utf-8");
}

export function createHelperApp(config: HelperConfig, page: string = readHelperPage()): Hono {
	const app = new Hono();

	app.get("/", (c) => {
		c.header("Cache-Control", "no-store");
		return c.html(page);
	});

	app.get("/config", (c) => {
		c.header("Cache-Control", "no-store");
		return c.json(config);
	});

	return app;
}
