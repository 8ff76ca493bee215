/**
 * Step runner: executes report steps sequentially and records one tagged
 * result per step. A failing step never stops the run.
 */

import { knownSecrets, redactSecrets } from "./steps/helpers.js";
import type { ReportStep, StepContext, StepStatus, StepVerdict } from "./steps/types.js";

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface StepResult {
	id: string;
	name: string;
	verdict: StepVerdict;
	durationMs: number;
	logs: string[];
}

export interface RunResult {
	results: StepResult[];
	summary: RunSummary;
}

export interface RunSummary {
	total: number;
	passed: number;
	failed: number;
	skipped: number;
	durationMs: number;
}

// ---------------------------------------------------------------------------
// Runner options
// ---------------------------------------------------------------------------

export interface RunnerOptions {
	/** Only run these step IDs (in registry order) */
	stepFilter?: string[];
	/** Collect per-step log lines, with secrets redacted */
	verbose?: boolean;
	/** Callbacks for live progress updates */
	onStepStart?: (step: ReportStep, name: string) => void;
	onStepComplete?: (result: StepResult) => void;
}

export type RunContext = Omit<StepContext, "log">;

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export async function runSteps(
	steps: ReportStep[],
	ctx: RunContext,
	options: RunnerOptions = {},
): Promise<RunResult> {
	const { stepFilter } = options;
	const filtered = stepFilter ? steps.filter((s) => stepFilter.includes(s.id)) : steps;

	const results: StepResult[] = [];
	const runStart = performance.now();

	for (const step of filtered) {
		const name = step.name(ctx.settings);
		options.onStepStart?.(step, name);

		const result = await runSingleStep(step, name, ctx, options.verbose ?? false);
		results.push(result);

		options.onStepComplete?.(result);
	}

	return {
		results,
		summary: summarize(results, elapsed(runStart)),
	};
}

// ---------------------------------------------------------------------------
// Single step execution
// ---------------------------------------------------------------------------

async function runSingleStep(
	step: ReportStep,
	name: string,
	ctx: RunContext,
	verbose: boolean,
): Promise<StepResult> {
	const logs: string[] = [];
	const log = (msg: string) => {
		if (verbose) {
			logs.push(redactSecrets(msg, knownSecrets(ctx.settings, ctx.session)));
		}
	};

	const stepStart = performance.now();
	let verdict: StepVerdict;
	try {
		verdict = await step.run({ ...ctx, client: ctx.client.withLog(log), log });
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		verdict = { status: "FAIL", detail: message };
	}
	log(`[${step.id}] ${verdict.status}`);

	return {
		id: step.id,
		name,
		verdict,
		durationMs: elapsed(stepStart),
		logs,
	};
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function elapsed(start: number): number {
	return Math.round(performance.now() - start);
}

function summarize(results: StepResult[], durationMs: number): RunSummary {
	const count = (status: StepStatus) => results.filter((r) => r.verdict.status === status).length;
	return {
		total: results.length,
		passed: count("PASS"),
		failed: count("FAIL"),
		skipped: count("SKIP"),
		durationMs,
	};
}
