/**
 * Workflow renderer — emits the GitHub Actions workflow that runs the site
 * builder in the mode the publish gate would choose.
 *
 * The host evaluates the gate itself through job-level `if:` conditions:
 * `build` runs for every ref except the publishing branch, and
 * `build_and_deploy` runs only for it. Pull request runs carry a merge ref,
 * so they always land in `build`.
 */

import { stringify as stringifyYaml } from "yaml";
import writeFileAtomic from "write-file-atomic";
import type { PublishConfig } from "../schemas/config.js";
import { toBuilderEnv } from "../builder/invocation.js";
import type { BuilderEnv } from "../builder/invocation.js";

const TOKEN_EXPRESSION = "${{ secrets.GITHUB_TOKEN }}";

export interface WorkflowStep {
  name: string;
  uses: string;
  env?: Record<string, string>;
}

export interface WorkflowJob {
  "runs-on": string;
  if: string;
  steps: WorkflowStep[];
}

export interface WorkflowDocument {
  on: {
    push: { branches: string[] };
    pull_request: null;
  };
  jobs: {
    build: WorkflowJob;
    build_and_deploy: WorkflowJob;
  };
}

function builderStep(name: string, action: string, env: BuilderEnv): WorkflowStep {
  return {
    name,
    uses: action,
    env: { ...env, GITHUB_TOKEN: TOKEN_EXPRESSION },
  };
}

/** Build the workflow document for a config. */
export function buildWorkflow(config: PublishConfig): WorkflowDocument {
  const { builder } = config;
  const publishRef = `refs/heads/${config.publishBranch}`;
  const checkout: WorkflowStep = { name: "Checkout", uses: builder.checkout };

  return {
    on: {
      push: { branches: [config.publishBranch] },
      pull_request: null,
    },
    jobs: {
      build: {
        "runs-on": builder.runsOn,
        if: `github.ref != '${publishRef}'`,
        steps: [
          checkout,
          builderStep(
            "Build only",
            builder.action,
            toBuilderEnv({ mode: "build-only" }, builder.buildDir),
          ),
        ],
      },
      build_and_deploy: {
        "runs-on": builder.runsOn,
        if: `github.ref == '${publishRef}'`,
        steps: [
          checkout,
          builderStep(
            "Build and deploy",
            builder.action,
            toBuilderEnv(
              { mode: "build-and-deploy", deployTargetBranch: config.pagesBranch },
              builder.buildDir,
            ),
          ),
        ],
      },
    },
  };
}

/** Render the workflow as YAML text. */
export function renderWorkflow(config: PublishConfig): string {
  return stringifyYaml(buildWorkflow(config), { aliasDuplicateObjects: false });
}

/** Render the workflow and write it atomically. Returns the YAML written. */
export async function writeWorkflow(outputPath: string, config: PublishConfig): Promise<string> {
  const yaml = renderWorkflow(config);
  await writeFileAtomic(outputPath, yaml);
  return yaml;
}
