/**
 * Step outputs — exposes a decision to later workflow steps via `GITHUB_OUTPUT`.
 */

import { appendFile } from "node:fs/promises";
import type { PublishDecision } from "../schemas/decision.js";

export interface StepOutputs {
  mode: PublishDecision["mode"];
  deploy: "true" | "false";
  /** Empty for build-only decisions. */
  "pages-branch": string;
}

export function formatStepOutputs(decision: PublishDecision): StepOutputs {
  if (decision.mode === "build-and-deploy") {
    return { mode: decision.mode, deploy: "true", "pages-branch": decision.deployTargetBranch };
  }
  return { mode: decision.mode, deploy: "false", "pages-branch": "" };
}

/** Render outputs as `key=value` lines, one per output, newline-terminated. */
export function serializeStepOutputs(outputs: StepOutputs): string {
  return Object.entries(outputs)
    .map(([key, value]) => `${key}=${value}\n`)
    .join("");
}

/** Append a decision's outputs to the file GitHub Actions collects them from. */
export async function writeStepOutputs(outputPath: string, decision: PublishDecision): Promise<StepOutputs> {
  const outputs = formatStepOutputs(decision);
  await appendFile(outputPath, serializeStepOutputs(outputs), "utf-8");
  return outputs;
}
