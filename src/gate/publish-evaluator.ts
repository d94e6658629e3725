/**
 * Publish gate — decides between build-only and build-and-deploy for one event.
 *
 * - Push to the publishing branch: build and deploy to the pages branch
 * - Anything else (review requests, pushes elsewhere): build only
 *
 * This is a pure function with no I/O. Invalid input throws; it never falls
 * back to either mode.
 *
 * @module publish-evaluator
 */

import { EventKind, TriggerEvent } from "../schemas/trigger.js";
import type { TriggerEventInput } from "../schemas/trigger.js";
import type { PublishDecision } from "../schemas/decision.js";
import type { PublishPolicy } from "../schemas/config.js";
import { InvalidBranchIdentifierError, InvalidEventKindError } from "./errors.js";

/**
 * Validate a raw event descriptor.
 *
 * The kind is checked before the branch, so a descriptor with both fields
 * wrong reports `InvalidEventKind`.
 *
 * @throws InvalidEventKindError
 * @throws InvalidBranchIdentifierError
 */
export function validateTriggerEvent(event: TriggerEventInput): TriggerEvent {
  const kind = EventKind.safeParse(event.kind);
  if (!kind.success) {
    throw new InvalidEventKindError(String(event.kind));
  }

  const parsed = TriggerEvent.safeParse({ originBranch: event.originBranch, kind: kind.data });
  if (!parsed.success) {
    throw new InvalidBranchIdentifierError(String(event.originBranch));
  }

  return parsed.data;
}

/**
 * Map one event descriptor to exactly one publish decision.
 *
 * Branch comparison is exact and case-sensitive. A review request never
 * deploys, whatever branch it targets.
 *
 * @throws InvalidEventKindError when `event.kind` is not a recognized kind
 * @throws InvalidBranchIdentifierError when `event.originBranch` is empty
 */
export function evaluatePublish(event: TriggerEventInput, policy: PublishPolicy): PublishDecision {
  const trigger = validateTriggerEvent(event);

  if (trigger.kind === "push" && trigger.originBranch === policy.publishBranch) {
    return { mode: "build-and-deploy", deployTargetBranch: policy.pagesBranch };
  }

  return { mode: "build-only" };
}
