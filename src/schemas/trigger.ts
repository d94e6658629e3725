/**
 * Trigger schema — the event descriptor handed to the publish gate.
 *
 * One descriptor is built per CI run from the host's event data and is
 * discarded once a decision has been made for it.
 */

import { z } from "zod";

/**
 * Event kind — what fired the run.
 *
 * - `push`: commits landed directly on `originBranch`
 * - `review-request`: a proposed change targets `originBranch` and is not merged yet
 */
export const EventKind = z.enum(["push", "review-request"]);
export type EventKind = z.infer<typeof EventKind>;

/** Validated event descriptor. */
export const TriggerEvent = z.object({
  /** Branch pushed to, or the branch a review request targets. */
  originBranch: z.string().regex(/\S/),
  /** Event kind. */
  kind: EventKind,
});
export type TriggerEvent = z.infer<typeof TriggerEvent>;

/**
 * Unvalidated event descriptor as callers assemble it from flags or CI
 * environment. `kind` stays a plain string so unknown kinds surface as
 * evaluation errors rather than type errors.
 */
export interface TriggerEventInput {
  originBranch: string;
  kind: string;
}
