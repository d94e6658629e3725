/**
 * Publish config loader — `.pubgate.yml` plus environment overrides.
 *
 * Resolution order: schema defaults, then the file (when present), then
 * `PUBGATE_*` environment variables.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parseDocument } from "yaml";
import { PublishConfig } from "../schemas/config.js";
import type { PublishPolicy } from "../schemas/config.js";

export const DEFAULT_CONFIG_FILE_NAME = ".pubgate.yml";

/** Environment variables that override file values. */
export interface PublishConfigEnv {
  PUBGATE_PUBLISH_BRANCH?: string;
  PUBGATE_PAGES_BRANCH?: string;
  PUBGATE_BUILD_DIR?: string;
  PUBGATE_EVENTS_DIR?: string;
}

export interface LoadPublishConfigOptions {
  /** Base directory for relative config paths. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Config path, relative to `cwd` or absolute. */
  path?: string;
  /** Override source. Defaults to `process.env`. */
  env?: PublishConfigEnv;
}

export interface LoadedPublishConfig {
  config: PublishConfig;
  /** Absolute path of the config file, whether or not it exists. */
  filePath: string;
  /** False when the file was missing and only defaults/overrides apply. */
  fromFile: boolean;
}

/** Raised when the config file exists but cannot be read. */
export class PublishConfigReadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, details: string, cause?: unknown) {
    super(`Unable to read publish config ${filePath}: ${details}`, { cause });
    this.name = "PublishConfigReadError";
    this.filePath = filePath;
  }
}

/** Raised when the config file is not valid YAML. */
export class PublishConfigParseError extends Error {
  readonly filePath: string;

  constructor(filePath: string, details: string) {
    super(`Invalid YAML in ${filePath}: ${details}`);
    this.name = "PublishConfigParseError";
    this.filePath = filePath;
  }
}

/** Raised when the merged config does not satisfy the schema. */
export class PublishConfigValidationError extends Error {
  readonly filePath: string;
  readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`Invalid publish config ${filePath}: ${issues.join("; ")}`);
    this.name = "PublishConfigValidationError";
    this.filePath = filePath;
    this.issues = issues;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readRawConfig(filePath: string): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    const details = err instanceof Error ? err.message : String(err);
    throw new PublishConfigReadError(filePath, details, err);
  }

  const doc = parseDocument(content);
  if (doc.errors.length > 0) {
    throw new PublishConfigParseError(filePath, doc.errors.map((e) => e.message).join("; "));
  }

  const raw: unknown = doc.toJSON();
  // Empty file
  if (raw === null || raw === undefined) return {};
  if (!isPlainObject(raw)) {
    throw new PublishConfigValidationError(filePath, ["top-level config must be a mapping"]);
  }
  return raw;
}

function applyEnvOverrides(raw: Record<string, unknown>, env: PublishConfigEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  if (env.PUBGATE_PUBLISH_BRANCH !== undefined) merged["publishBranch"] = env.PUBGATE_PUBLISH_BRANCH;
  if (env.PUBGATE_PAGES_BRANCH !== undefined) merged["pagesBranch"] = env.PUBGATE_PAGES_BRANCH;
  if (env.PUBGATE_EVENTS_DIR !== undefined) merged["eventsDir"] = env.PUBGATE_EVENTS_DIR;

  if (env.PUBGATE_BUILD_DIR !== undefined) {
    const builder = isPlainObject(raw["builder"]) ? raw["builder"] : {};
    merged["builder"] = { ...builder, buildDir: env.PUBGATE_BUILD_DIR };
  }

  return merged;
}

/**
 * Validate a raw config object against the schema.
 *
 * @throws PublishConfigValidationError listing every schema issue
 */
export function parsePublishConfig(raw: unknown, filePath: string): PublishConfig {
  const result = PublishConfig.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new PublishConfigValidationError(filePath, issues);
  }
  return result.data;
}

/**
 * Load the publish config.
 *
 * A missing file is not an error: defaults and overrides apply.
 */
export async function loadPublishConfig(options: LoadPublishConfigOptions = {}): Promise<LoadedPublishConfig> {
  const cwd = options.cwd ?? process.cwd();
  const filePath = resolve(cwd, options.path ?? DEFAULT_CONFIG_FILE_NAME);
  const env = options.env ?? process.env;

  const raw = await readRawConfig(filePath);
  const config = parsePublishConfig(applyEnvOverrides(raw ?? {}, env), filePath);

  return { config, filePath, fromFile: raw !== null };
}

/** Narrow a config down to the two branch constants the gate needs. */
export function toPublishPolicy(config: PublishConfig): PublishPolicy {
  return { publishBranch: config.publishBranch, pagesBranch: config.pagesBranch };
}
