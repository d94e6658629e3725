export {
  DEFAULT_CONFIG_FILE_NAME,
  loadPublishConfig,
  parsePublishConfig,
  toPublishPolicy,
  PublishConfigReadError,
  PublishConfigParseError,
  PublishConfigValidationError,
} from "./loader.js";
export type { LoadPublishConfigOptions, LoadedPublishConfig, PublishConfigEnv } from "./loader.js";

export { lintPublishConfig } from "./linter.js";
export type { LintIssue } from "./linter.js";
