/**
 * Builder invocation — the environment handed to the external site-building
 * action for a decision.
 *
 * The access token is not part of it; the host injects `GITHUB_TOKEN` itself.
 */

import type { PublishDecision } from "../schemas/decision.js";
import type { BuilderSettings } from "../schemas/config.js";

export type BuilderEnv =
  | { BUILD_DIR: string; BUILD_ONLY: "true" }
  | { BUILD_DIR: string; PAGES_BRANCH: string };

export interface BuilderInvocation {
  /** Action reference to run, e.g. `shalzz/zola-deploy-action@v0.16.1`. */
  uses: string;
  env: BuilderEnv;
}

export function toBuilderEnv(decision: PublishDecision, buildDir: string): BuilderEnv {
  switch (decision.mode) {
    case "build-only":
      return { BUILD_DIR: buildDir, BUILD_ONLY: "true" };
    case "build-and-deploy":
      return { BUILD_DIR: buildDir, PAGES_BRANCH: decision.deployTargetBranch };
  }
}

export function toBuilderInvocation(decision: PublishDecision, settings: BuilderSettings): BuilderInvocation {
  return {
    uses: settings.action,
    env: toBuilderEnv(decision, settings.buildDir),
  };
}

/** Render a builder environment as `KEY=value` lines. */
export function formatBuilderEnv(env: BuilderEnv): string {
  return Object.entries(env)
    .map(([key, value]) => `${key}=${value}`)
    .join("\n");
}
