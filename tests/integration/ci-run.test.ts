/**
 * CI run integration — config file, runner environment, gate, step outputs
 * and journal wired together the way a workflow step uses them.
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  buildWorkflow,
  EventLogger,
  loadPublishConfig,
  PublishGate,
  resolveTriggerEvent,
  writeStepOutputs,
  InvalidBranchIdentifierError,
} from "../../src/index.js";
import type { GitHubActionsEnv, PublishConfig } from "../../src/index.js";

describe("CI run", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "pubgate-ci-"));
    await writeFile(
      join(tmpDir, ".pubgate.yml"),
      ["publishBranch: code", "pagesBranch: master", "eventsDir: journal"].join("\n"),
      "utf-8",
    );
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  async function runStep(env: GitHubActionsEnv): Promise<string> {
    const { config } = await loadPublishConfig({ cwd: tmpDir, env: {} });
    const logger = new EventLogger(join(tmpDir, config.eventsDir ?? "journal"));
    const gate = new PublishGate(config, { logger });
    const outputPath = join(tmpDir, "github_output");

    const { decision } = await gate.decide(resolveTriggerEvent(env), "ci");
    await writeStepOutputs(outputPath, decision);
    return readFile(outputPath, "utf-8");
  }

  it("publishes a push to the publishing branch", async () => {
    const outputs = await runStep({ GITHUB_EVENT_NAME: "push", GITHUB_REF: "refs/heads/code" });

    expect(outputs).toBe("mode=build-and-deploy\ndeploy=true\npages-branch=master\n");
  });

  it("only builds a pull request into the publishing branch", async () => {
    const outputs = await runStep({
      GITHUB_EVENT_NAME: "pull_request",
      GITHUB_REF: "refs/pull/9/merge",
      GITHUB_BASE_REF: "code",
    });

    expect(outputs).toBe("mode=build-only\ndeploy=false\npages-branch=\n");
  });

  it("aborts a tag push without writing outputs", async () => {
    await expect(
      runStep({ GITHUB_EVENT_NAME: "push", GITHUB_REF: "refs/tags/v1" }),
    ).rejects.toBeInstanceOf(InvalidBranchIdentifierError);

    const journal = new EventLogger(join(tmpDir, "journal"));
    const rejected = await journal.query({ type: "decision.rejected" });
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.payload["code"]).toBe("InvalidBranchIdentifier");
  });

  it("triggers the rendered workflow only for pushes to the publishing branch", async () => {
    const { config } = await loadPublishConfig({ cwd: tmpDir, env: {} });
    const workflow = buildWorkflow(config);

    expect(workflow.on.push.branches).toEqual(["code"]);
    expect(workflow.on.pull_request).toBeNull();
  });

  it("agrees with the rendered job conditions for every push ref", async () => {
    const { config } = await loadPublishConfig({ cwd: tmpDir, env: {} });
    const gate = new PublishGate(config);
    const workflow = buildWorkflow(config);

    // Conditions only: the push trigger above filters these refs out before any job runs
    for (const branch of ["code", "master", "feature-x"]) {
      const ref = `refs/heads/${branch}`;
      const { decision } = await gate.decide({ kind: "push", originBranch: branch }, "ci");

      expect(hostRunsJob(workflow.jobs.build_and_deploy.if, ref)).toBe(decision.mode === "build-and-deploy");
      expect(hostRunsJob(workflow.jobs.build.if, ref)).toBe(decision.mode === "build-only");
    }
  });

  it("reads eventsDir from the config file", async () => {
    const { config }: { config: PublishConfig } = await loadPublishConfig({ cwd: tmpDir, env: {} });

    expect(config.eventsDir).toBe("journal");
  });
});

/** Evaluate a rendered `github.ref ==/!= '<ref>'` job condition. */
function hostRunsJob(condition: string, ref: string): boolean {
  const match = /^github\.ref (==|!=) '([^']*)'$/.exec(condition);
  if (!match) throw new Error(`unexpected condition: ${condition}`);
  const equal = ref === match[2];
  return match[1] === "==" ? equal : !equal;
}
