import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  loadPublishConfig,
  toPublishPolicy,
  PublishConfigParseError,
  PublishConfigReadError,
  PublishConfigValidationError,
} from "../loader.js";

describe("config loader", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "pubgate-config-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  async function writeConfig(lines: string[], name = ".pubgate.yml"): Promise<void> {
    await writeFile(join(tmpDir, name), lines.join("\n"), "utf-8");
  }

  it("returns defaults when the file is missing", async () => {
    const loaded = await loadPublishConfig({ cwd: tmpDir, env: {} });

    expect(loaded.fromFile).toBe(false);
    expect(loaded.filePath).toBe(join(tmpDir, ".pubgate.yml"));
    expect(loaded.config).toEqual({
      publishBranch: "code",
      pagesBranch: "master",
      builder: {
        action: "shalzz/zola-deploy-action@v0.16.1",
        checkout: "actions/checkout@main",
        runsOn: "ubuntu-latest",
        buildDir: ".",
      },
    });
  });

  it("merges file values over defaults", async () => {
    await writeConfig([
      "publishBranch: main",
      "builder:",
      "  buildDir: site",
    ]);

    const loaded = await loadPublishConfig({ cwd: tmpDir, env: {} });

    expect(loaded.fromFile).toBe(true);
    expect(loaded.config.publishBranch).toBe("main");
    expect(loaded.config.pagesBranch).toBe("master");
    expect(loaded.config.builder.buildDir).toBe("site");
    expect(loaded.config.builder.action).toBe("shalzz/zola-deploy-action@v0.16.1");
  });

  it("treats an empty file as defaults", async () => {
    await writeConfig([""]);

    const loaded = await loadPublishConfig({ cwd: tmpDir, env: {} });

    expect(loaded.fromFile).toBe(true);
    expect(toPublishPolicy(loaded.config)).toEqual({ publishBranch: "code", pagesBranch: "master" });
  });

  it("applies environment overrides after the file", async () => {
    await writeConfig(["publishBranch: main", "pagesBranch: gh-pages"]);

    const loaded = await loadPublishConfig({
      cwd: tmpDir,
      env: {
        PUBGATE_PAGES_BRANCH: "published",
        PUBGATE_BUILD_DIR: "docs",
        PUBGATE_EVENTS_DIR: "journal",
      },
    });

    expect(loaded.config.publishBranch).toBe("main");
    expect(loaded.config.pagesBranch).toBe("published");
    expect(loaded.config.builder.buildDir).toBe("docs");
    expect(loaded.config.eventsDir).toBe("journal");
  });

  it("honors a custom path", async () => {
    await writeConfig(["pagesBranch: out"], "publish.yaml");

    const loaded = await loadPublishConfig({ cwd: tmpDir, path: "publish.yaml", env: {} });

    expect(loaded.config.pagesBranch).toBe("out");
  });

  it("throws a parse error for invalid YAML", async () => {
    await writeConfig(["publishBranch: [code"]);

    await expect(loadPublishConfig({ cwd: tmpDir, env: {} })).rejects.toBeInstanceOf(
      PublishConfigParseError,
    );
  });

  it("rejects an empty branch name", async () => {
    await writeConfig(['publishBranch: ""']);

    await expect(loadPublishConfig({ cwd: tmpDir, env: {} })).rejects.toThrow(
      "publishBranch: branch name must not be empty",
    );
  });

  it("rejects an empty branch override", async () => {
    await expect(
      loadPublishConfig({ cwd: tmpDir, env: { PUBGATE_PUBLISH_BRANCH: "" } }),
    ).rejects.toBeInstanceOf(PublishConfigValidationError);
  });

  it("rejects a branch override that would add step output lines", async () => {
    await expect(
      loadPublishConfig({ cwd: tmpDir, env: { PUBGATE_PAGES_BRANCH: "master\ndeploy=false" } }),
    ).rejects.toThrow("pagesBranch: branch name must not contain control characters");
  });

  it("rejects unknown top-level keys", async () => {
    await writeConfig(["publish_branch: code"]);

    await expect(loadPublishConfig({ cwd: tmpDir, env: {} })).rejects.toBeInstanceOf(
      PublishConfigValidationError,
    );
  });

  it("rejects a non-mapping document", async () => {
    await writeConfig(["- code", "- master"]);

    await expect(loadPublishConfig({ cwd: tmpDir, env: {} })).rejects.toThrow(
      "top-level config must be a mapping",
    );
  });

  it("throws a read error when the path is a directory", async () => {
    await mkdir(join(tmpDir, ".pubgate.yml"));

    await expect(loadPublishConfig({ cwd: tmpDir, env: {} })).rejects.toBeInstanceOf(
      PublishConfigReadError,
    );
  });
});
