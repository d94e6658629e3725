/**
 * Publish decision schema — the gate's single output per event.
 */

import { z } from "zod";

/**
 * Publish mode.
 *
 * - `build-only`: render the site to prove it still builds, publish nothing
 * - `build-and-deploy`: render the site and push the output to the pages branch
 */
export const PublishMode = z.enum(["build-only", "build-and-deploy"]);
export type PublishMode = z.infer<typeof PublishMode>;

export const BuildOnlyDecision = z.object({
  mode: z.literal("build-only"),
});
export type BuildOnlyDecision = z.infer<typeof BuildOnlyDecision>;

export const BuildAndDeployDecision = z.object({
  mode: z.literal("build-and-deploy"),
  /** Branch that receives the generated output. */
  deployTargetBranch: z.string().min(1),
});
export type BuildAndDeployDecision = z.infer<typeof BuildAndDeployDecision>;

/** Publish decision — exactly one mode, deploy target only when deploying. */
export const PublishDecision = z.discriminatedUnion("mode", [
  BuildOnlyDecision,
  BuildAndDeployDecision,
]);
export type PublishDecision = z.infer<typeof PublishDecision>;
