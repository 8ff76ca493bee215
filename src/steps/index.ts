/**
 * Step registry — exports all report steps in execution order.
 *
 * Each step may depend on values recorded by the ones before it:
 *   authorization → code exchange → refresh / userinfo
 */

import { authorizationCode } from "./authorization-code.js";
import { clientCredentials } from "./client-credentials.js";
import { codeExchange } from "./code-exchange.js";
import { configCheck } from "./config-check.js";
import { discovery } from "./discovery.js";
import { refresh } from "./refresh.js";
import type { ReportStep } from "./types.js";
import { userinfo } from "./userinfo.js";

export const allSteps: ReportStep[] = [
	configCheck,
	discovery,
	clientCredentials,
	authorizationCode,
	codeExchange,
	refresh,
	userinfo,
];

export function getStepById(id: string): ReportStep | undefined {
	return allSteps.find((s) => s.id === id);
}

export function getStepIds(): string[] {
	return allSteps.map((s) => s.id);
}

export type {
	ReportStep,
	ReportSession,
	ReportSettings,
	StepContext,
	StepStatus,
	StepVerdict,
} from "./types.js";
export { fail, pass, skip, redactSecrets } from "./helpers.js";
