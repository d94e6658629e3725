/**
 * Gate commands — evaluate an event, print the builder environment.
 */

import type { Command } from "commander";
import { loadCommandContext, reportCommandError } from "../context.js";
import { resolveEventInput, withEventFlags, type EventFlags } from "../event-input.js";
import { PublishGate } from "../../service/publish-gate.js";
import { writeStepOutputs } from "../../github/outputs.js";
import { formatBuilderEnv } from "../../builder/invocation.js";
import type { PublishDecision } from "../../schemas/decision.js";

interface EvaluateOptions extends EventFlags {
  json: boolean;
  githubOutput: boolean;
}

export function describeDecision(decision: PublishDecision): string {
  return decision.mode === "build-and-deploy"
    ? `build-and-deploy → ${decision.deployTargetBranch}`
    : "build-only";
}

/**
 * Register `evaluate` and `builder-env`.
 */
export function registerEvaluateCommands(program: Command): void {
  withEventFlags(
    program
      .command("evaluate")
      .description("Decide between build-only and build-and-deploy for one event"),
  )
    .option("--json", "Print the decision as JSON", false)
    .option("--github-output", "Append step outputs to $GITHUB_OUTPUT", false)
    .action(async (opts: EvaluateOptions) => {
      try {
        const { loaded, logger } = await loadCommandContext(program);
        const event = await resolveEventInput(opts);
        const gate = new PublishGate(loaded.config, { logger: logger ?? undefined });
        const { decision } = await gate.decide(event, "cli:evaluate");

        if (opts.githubOutput) {
          const outputPath = process.env["GITHUB_OUTPUT"];
          if (!outputPath) {
            throw new Error("--github-output requires GITHUB_OUTPUT to be set");
          }
          await writeStepOutputs(outputPath, decision);
        }

        console.log(opts.json ? JSON.stringify(decision) : describeDecision(decision));
      } catch (err) {
        reportCommandError(err);
      }
    });

  withEventFlags(
    program
      .command("builder-env")
      .description("Print the site builder environment for one event as KEY=value lines"),
  )
    .action(async (opts: EventFlags) => {
      try {
        const { loaded, logger } = await loadCommandContext(program);
        const event = await resolveEventInput(opts);
        const gate = new PublishGate(loaded.config, { logger: logger ?? undefined });
        const { invocation } = await gate.decide(event, "cli:builder-env");
        console.log(formatBuilderEnv(invocation.env));
      } catch (err) {
        reportCommandError(err);
      }
    });
}
