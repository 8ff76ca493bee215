/**
 * Output formatters for report results.
 *
 * Supports: table (terminal), JSON (CI), markdown (reports).
 */

import { isSpaRedemptionError } from "./entra.js";
import type { RunResult, StepResult } from "./runner.js";

export type ReportFormat = "table" | "json" | "markdown";

export const REPORT_FORMATS: readonly ReportFormat[] = ["table", "json", "markdown"];

export const SPA_HINT =
	"Hint: Microsoft Entra treated this app as a SPA. Use the `browser-helper` " +
	"subcommand to redeem the authorization code directly in the browser.";

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function formatResults(run: RunResult, format: ReportFormat): string {
	switch (format) {
		case "table":
			return formatTable(run);
		case "json":
			return formatJson(run);
		case "markdown":
			return formatMarkdown(run);
	}
}

/** The SPA redemption hint, when a failed step hit AADSTS9002327 */
export function spaRedemptionHint(run: RunResult): string | undefined {
	const spaFailure = run.results.some(
		(r) => r.verdict.status === "FAIL" && isSpaRedemptionError(r.verdict.detail),
	);
	return spaFailure ? SPA_HINT : undefined;
}

export function isReportFormat(value: string): value is ReportFormat {
	return REPORT_FORMATS.some((format) => format === value);
}

// ---------------------------------------------------------------------------
// Table format (terminal)
// ---------------------------------------------------------------------------

function formatTable(run: RunResult): string {
	const lines: string[] = [];

	lines.push("");
	lines.push("Microsoft Entra validation report");
	lines.push("=================================");

	for (const r of run.results) {
		lines.push(`[${r.verdict.status}] ${r.name}`);
		lines.push(indent(r.verdict.detail, "    "));
		if (r.logs.length > 0) {
			lines.push("    log:");
			lines.push(indent(r.logs.join("\n"), "      "));
		}
		lines.push("");
	}

	lines.push(summaryLine(run));
	lines.push("");

	return lines.join("\n");
}

// ---------------------------------------------------------------------------
// JSON format (CI)
// ---------------------------------------------------------------------------

function formatJson(run: RunResult): string {
	return JSON.stringify(
		{
			results: run.results.map((r) => ({
				id: r.id,
				name: r.name,
				status: r.verdict.status,
				detail: r.verdict.detail,
				durationMs: r.durationMs,
				logs: r.logs.length > 0 ? r.logs : undefined,
			})),
			summary: run.summary,
		},
		null,
		2,
	);
}

// ---------------------------------------------------------------------------
// Markdown format (reports)
// ---------------------------------------------------------------------------

function formatMarkdown(run: RunResult): string {
	const lines: string[] = [];

	lines.push("# Microsoft Entra Validation Report");
	lines.push("");
	lines.push(
		`**Total:** ${run.summary.total} steps | ` +
			`**Passed:** ${run.summary.passed} | ` +
			`**Failed:** ${run.summary.failed} | ` +
			`**Skipped:** ${run.summary.skipped} | ` +
			`**Duration:** ${run.summary.durationMs}ms`,
	);
	lines.push("");
	lines.push("| Status | Step | Detail |");
	lines.push("|--------|------|--------|");

	for (const r of run.results) {
		const detail = tableCell(r.verdict.detail);
		lines.push(`| ${statusIcon(r)} ${r.verdict.status} | ${r.name} | ${detail} |`);
	}

	const failures = run.results.filter((r) => r.verdict.status === "FAIL");
	if (failures.length > 0) {
		lines.push("");
		lines.push("## Failures");
		for (const r of failures) {
			lines.push("");
			lines.push(`### ${r.name} (\`${r.id}\`)`);
			lines.push("");
			lines.push("```");
			lines.push(r.verdict.detail);
			lines.push("```");
		}
	}

	lines.push("");
	return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function statusIcon(r: StepResult): string {
	switch (r.verdict.status) {
		case "PASS":
			return "+";
		case "FAIL":
			return "!";
		case "SKIP":
			return "-";
	}
}

function tableCell(text: string): string {
	return text.replace(/\|/g, "\\|").replace(/\n/g, "<br>");
}

function indent(text: string, prefix: string): string {
	return text
		.split("\n")
		.map((line) => (line.length > 0 ? `${prefix}${line}` : line))
		.join("\n");
}

function summaryLine(run: RunResult): string {
	const { passed, failed, skipped, total, durationMs } = run.summary;
	const parts: string[] = [];

	if (passed > 0) parts.push(`${passed} passed`);
	if (failed > 0) parts.push(`${failed} FAILED`);
	if (skipped > 0) parts.push(`${skipped} skipped`);

	return `${parts.join(", ")} (${total} total, ${durationMs}ms)`;
}
