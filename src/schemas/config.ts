/**
 * Publish configuration schema for `.pubgate.yml`.
 *
 * @example
 * ```yaml
 * publishBranch: code
 * pagesBranch: master
 * builder:
 *   action: shalzz/zola-deploy-action@v0.16.1
 *   buildDir: .
 * eventsDir: .pubgate/events
 * ```
 */

import { z } from "zod";

export const DEFAULT_PUBLISH_BRANCH = "code";
export const DEFAULT_PAGES_BRANCH = "master";

/** Branch name as it appears after `refs/heads/`. */
export const BranchName = z
  .string()
  .regex(/\S/, "branch name must not be empty")
  .regex(/^[^\x00-\x1f\x7f]*$/, "branch name must not contain control characters");

/** The pair of branch constants the publish gate decides with. */
export const PublishPolicy = z.object({
  /** Branch whose pushes are published. */
  publishBranch: BranchName,
  /** Branch that receives the generated site. */
  pagesBranch: BranchName,
});
export type PublishPolicy = z.infer<typeof PublishPolicy>;

/** Settings for the external site-building action. */
export const BuilderSettings = z.object({
  /** Action reference, pinned with `@<ref>`. */
  action: z.string().min(1).default("shalzz/zola-deploy-action@v0.16.1"),
  /** Checkout action run before the builder. */
  checkout: z.string().min(1).default("actions/checkout@main"),
  /** Runner label for both jobs. */
  runsOn: z.string().min(1).default("ubuntu-latest"),
  /** Site root handed to the builder as `BUILD_DIR`. */
  buildDir: z.string().min(1).default("."),
});
export type BuilderSettings = z.infer<typeof BuilderSettings>;

export const PublishConfig = z.object({
  publishBranch: BranchName.default(DEFAULT_PUBLISH_BRANCH),
  pagesBranch: BranchName.default(DEFAULT_PAGES_BRANCH),
  builder: BuilderSettings.default({}),
  /** Decision journal directory. Journal is off when unset. */
  eventsDir: z.string().min(1).optional(),
}).strict();
export type PublishConfig = z.infer<typeof PublishConfig>;
