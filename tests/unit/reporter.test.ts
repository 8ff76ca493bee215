import { describe, expect, it } from "vitest";
import { SPA_HINT, formatResults, isReportFormat, spaRedemptionHint } from "../../src/reporter.js";
import type { RunResult } from "../../src/runner.js";

function makeRun(): RunResult {
	return {
		results: [
			{
				id: "config",
				name: "Load configuration from .env",
				verdict: {
					status: "PASS",
					detail: "Client ID: loaded (10 chars)\nRedirect URI: http://localhost/cb",
				},
				durationMs: 1,
				logs: [],
			},
			{
				id: "client-credentials",
				name: "Client credentials grant",
				verdict: { status: "SKIP", detail: "No client-credentials scope supplied." },
				durationMs: 0,
				logs: [],
			},
			{
				id: "token",
				name: "Exchange authorization code for tokens",
				verdict: { status: "FAIL", detail: "HTTP 400 error | AADSTS9002327" },
				durationMs: 12,
				logs: ["POST http://127.0.0.1/token"],
			},
		],
		summary: { total: 3, passed: 1, failed: 1, skipped: 1, durationMs: 15 },
	};
}

describe("formatResults", () => {
	it("renders the terminal table", () => {
		expect(formatResults(makeRun(), "table").split("\n")).toEqual([
			"",
			"Microsoft Entra validation report",
			"=================================",
			"[PASS] Load configuration from .env",
			"    Client ID: loaded (10 chars)",
			"    Redirect URI: http://localhost/cb",
			"",
			"[SKIP] Client credentials grant",
			"    No client-credentials scope supplied.",
			"",
			"[FAIL] Exchange authorization code for tokens",
			"    HTTP 400 error | AADSTS9002327",
			"    log:",
			"      POST http://127.0.0.1/token",
			"",
			"1 passed, 1 FAILED, 1 skipped (3 total, 15ms)",
			"",
		]);
	});

	it("renders JSON with statuses and the summary", () => {
		const parsed: unknown = JSON.parse(formatResults(makeRun(), "json"));
		expect(parsed).toEqual({
			results: [
				{
					id: "config",
					name: "Load configuration from .env",
					status: "PASS",
					detail: "Client ID: loaded (10 chars)\nRedirect URI: http://localhost/cb",
					durationMs: 1,
				},
				{
					id: "client-credentials",
					name: "Client credentials grant",
					status: "SKIP",
					detail: "No client-credentials scope supplied.",
					durationMs: 0,
				},
				{
					id: "token",
					name: "Exchange authorization code for tokens",
					status: "FAIL",
					detail: "HTTP 400 error | AADSTS9002327",
					durationMs: 12,
					logs: ["POST http://127.0.0.1/token"],
				},
			],
			summary: { total: 3, passed: 1, failed: 1, skipped: 1, durationMs: 15 },
		});
	});

	it("renders markdown with escaped cells and a failures section", () => {
		const lines = formatResults(makeRun(), "markdown").split("\n");
		expect(lines[0]).toBe("# Microsoft Entra Validation Report");
		expect(lines).toContain(
			"| + PASS | Load configuration from .env | Client ID: loaded (10 chars)<br>Redirect URI: http://localhost/cb |",
		);
		expect(lines).toContain("| ! FAIL | Exchange authorization code for tokens | HTTP 400 error \\| AADSTS9002327 |");
		expect(lines).toContain("### Exchange authorization code for tokens (`token`)");
	});
});

describe("spaRedemptionHint", () => {
	it("returns the hint when a failure carries AADSTS9002327", () => {
		expect(spaRedemptionHint(makeRun())).toBe(SPA_HINT);
	});

	it("returns undefined otherwise", () => {
		const run = makeRun();
		run.results = run.results.filter((r) => r.verdict.status !== "FAIL");
		expect(spaRedemptionHint(run)).toBeUndefined();
	});
});

describe("isReportFormat", () => {
	it("accepts only known formats", () => {
		expect(isReportFormat("markdown")).toBe(true);
		expect(isReportFormat("xml")).toBe(false);
	});
});
