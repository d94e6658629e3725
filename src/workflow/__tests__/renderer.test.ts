import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { parse as parseYaml } from "yaml";
import { buildWorkflow, renderWorkflow, writeWorkflow } from "../renderer.js";
import { PublishConfig } from "../../schemas/config.js";

const defaults = PublishConfig.parse({});

describe("workflow renderer", () => {
  describe("buildWorkflow", () => {
    it("triggers on pushes to the publishing branch and on every pull request", () => {
      const workflow = buildWorkflow(defaults);

      expect(workflow.on).toEqual({ push: { branches: ["code"] }, pull_request: null });
    });

    it("gates the two jobs on opposite ref conditions", () => {
      const { jobs } = buildWorkflow(defaults);

      expect(jobs.build.if).toBe("github.ref != 'refs/heads/code'");
      expect(jobs.build_and_deploy.if).toBe("github.ref == 'refs/heads/code'");
    });

    it("runs checkout then the builder in build-only mode", () => {
      const { build } = buildWorkflow(defaults).jobs;

      expect(build["runs-on"]).toBe("ubuntu-latest");
      expect(build.steps).toEqual([
        { name: "Checkout", uses: "actions/checkout@main" },
        {
          name: "Build only",
          uses: "shalzz/zola-deploy-action@v0.16.1",
          env: {
            BUILD_DIR: ".",
            BUILD_ONLY: "true",
            GITHUB_TOKEN: "${{ secrets.GITHUB_TOKEN }}",
          },
        },
      ]);
    });

    it("deploys to the pages branch in the deploy job", () => {
      const { build_and_deploy } = buildWorkflow(defaults).jobs;

      expect(build_and_deploy.steps[1]).toEqual({
        name: "Build and deploy",
        uses: "shalzz/zola-deploy-action@v0.16.1",
        env: {
          BUILD_DIR: ".",
          PAGES_BRANCH: "master",
          GITHUB_TOKEN: "${{ secrets.GITHUB_TOKEN }}",
        },
      });
    });

    it("follows configured branches and builder settings", () => {
      const config = PublishConfig.parse({
        publishBranch: "main",
        pagesBranch: "gh-pages",
        builder: { runsOn: "self-hosted", buildDir: "site" },
      });
      const workflow = buildWorkflow(config);

      expect(workflow.on.push.branches).toEqual(["main"]);
      expect(workflow.jobs.build_and_deploy.if).toBe("github.ref == 'refs/heads/main'");
      expect(workflow.jobs.build_and_deploy["runs-on"]).toBe("self-hosted");
      expect(workflow.jobs.build_and_deploy.steps[1]?.env).toEqual({
        BUILD_DIR: "site",
        PAGES_BRANCH: "gh-pages",
        GITHUB_TOKEN: "${{ secrets.GITHUB_TOKEN }}",
      });
    });
  });

  describe("renderWorkflow", () => {
    it("renders YAML that parses back to the same document", () => {
      const yaml = renderWorkflow(defaults);

      expect(parseYaml(yaml)).toEqual(buildWorkflow(defaults));
    });

    it("does not emit anchors for the shared checkout step", () => {
      const yaml = renderWorkflow(defaults);

      expect(yaml).not.toMatch(/[&*]a\d/);
    });
  });

  describe("writeWorkflow", () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await mkdtemp(join(tmpdir(), "pubgate-workflow-"));
    });

    afterEach(async () => {
      await rm(tmpDir, { recursive: true, force: true });
    });

    it("writes the rendered YAML to disk", async () => {
      const outputPath = join(tmpDir, "publish.yml");

      const written = await writeWorkflow(outputPath, defaults);

      expect(await readFile(outputPath, "utf-8")).toBe(written);
      expect(written).toBe(renderWorkflow(defaults));
    });
  });
});
