/**
 * Publish config linter — policy checks beyond the Zod schema.
 *
 * - Publishing branch and pages branch must differ (a deploy would retrigger itself)
 * - Builder and checkout actions should be pinned to a ref
 * - Build directory should stay inside the repository
 */

import type { PublishConfig } from "../schemas/config.js";

export interface LintIssue {
  severity: "error" | "warning";
  rule: string;
  message: string;
  path?: string;
}

export function lintPublishConfig(config: PublishConfig): LintIssue[] {
  const issues: LintIssue[] = [];

  if (config.publishBranch === config.pagesBranch) {
    issues.push({
      severity: "error",
      rule: "distinct-branches",
      message: `publishBranch and pagesBranch are both '${config.publishBranch}'; deploying would push onto the branch being published`,
      path: "pagesBranch",
    });
  }

  for (const key of ["action", "checkout"] as const) {
    const ref = config.builder[key];
    if (!ref.includes("@")) {
      issues.push({
        severity: "warning",
        rule: "pinned-action",
        message: `builder.${key} '${ref}' is not pinned to a ref (expected '<owner>/<repo>@<ref>')`,
        path: `builder.${key}`,
      });
    }
  }

  const buildDir = config.builder.buildDir;
  if (buildDir.startsWith("/") || buildDir.split("/").includes("..")) {
    issues.push({
      severity: "warning",
      rule: "build-dir-in-repo",
      message: `builder.buildDir '${buildDir}' points outside the repository checkout`,
      path: "builder.buildDir",
    });
  }

  return issues;
}
