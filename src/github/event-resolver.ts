/**
 * CI event resolution — builds a trigger descriptor from GitHub Actions data.
 *
 * Push runs carry the pushed branch in `GITHUB_REF` (`refs/heads/<branch>`).
 * Pull request runs carry a merge ref there instead, so the targeted branch
 * comes from `GITHUB_BASE_REF`.
 *
 * Resolution never decides anything: unknown event names pass through as
 * the kind and non-branch refs resolve to an empty branch, and the
 * evaluator rejects both.
 */

import { z } from "zod";
import type { TriggerEventInput } from "../schemas/trigger.js";

const BRANCH_REF_PREFIX = "refs/heads/";

/** GitHub event names that map onto a review request. */
const REVIEW_REQUEST_EVENTS: ReadonlySet<string> = new Set([
  "pull_request",
  "pull_request_target",
]);

/** Subset of the runner environment read during resolution. */
export interface GitHubActionsEnv {
  GITHUB_EVENT_NAME?: string;
  GITHUB_REF?: string;
  GITHUB_BASE_REF?: string;
}

/** Raised when a webhook payload does not have the shape its event name implies. */
export class EventPayloadError extends Error {
  readonly eventName: string;

  constructor(eventName: string, details: string) {
    super(`Malformed ${eventName} payload: ${details}`);
    this.name = "EventPayloadError";
    this.eventName = eventName;
  }
}

const PushPayload = z.object({
  ref: z.string(),
});

const PullRequestPayload = z.object({
  pull_request: z.object({
    base: z.object({
      ref: z.string(),
    }),
  }),
});

/**
 * Strip `refs/heads/` from a ref. Tag refs, pull request merge refs and
 * missing refs yield an empty string.
 */
export function branchFromRef(ref: string | undefined): string {
  if (!ref?.startsWith(BRANCH_REF_PREFIX)) {
    return "";
  }
  return ref.slice(BRANCH_REF_PREFIX.length);
}

/** Map a GitHub event name to a trigger kind, passing unknown names through. */
export function kindFromEventName(eventName: string): string {
  if (eventName === "push") return "push";
  if (REVIEW_REQUEST_EVENTS.has(eventName)) return "review-request";
  return eventName;
}

/**
 * Resolve a trigger descriptor from the runner environment.
 *
 * @param env - Defaults to `process.env`
 */
export function resolveTriggerEvent(env: GitHubActionsEnv = process.env): TriggerEventInput {
  const eventName = env.GITHUB_EVENT_NAME ?? "";
  const kind = kindFromEventName(eventName);

  if (kind === "review-request") {
    return { kind, originBranch: env.GITHUB_BASE_REF ?? "" };
  }

  return { kind, originBranch: branchFromRef(env.GITHUB_REF) };
}

/**
 * Resolve a trigger descriptor from a webhook payload (the JSON file at
 * `GITHUB_EVENT_PATH`).
 *
 * Payloads of unknown events are not inspected.
 *
 * @throws EventPayloadError when a push or pull request payload lacks its ref
 */
export function resolveTriggerEventFromPayload(eventName: string, payload: unknown): TriggerEventInput {
  const kind = kindFromEventName(eventName);

  if (kind === "push") {
    const result = PushPayload.safeParse(payload);
    if (!result.success) {
      throw new EventPayloadError(eventName, formatIssues(result.error));
    }
    return { kind, originBranch: branchFromRef(result.data.ref) };
  }

  if (kind === "review-request") {
    const result = PullRequestPayload.safeParse(payload);
    if (!result.success) {
      throw new EventPayloadError(eventName, formatIssues(result.error));
    }
    return { kind, originBranch: result.data.pull_request.base.ref };
  }

  return { kind, originBranch: "" };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
