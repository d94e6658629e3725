/**
 * Decision journal schema — JSONL audit trail of gate activity.
 *
 * Every evaluated or rejected event, rendered workflow, and loaded config
 * is recorded as one line.
 */

import { z } from "zod";

/** Event types — exhaustive list of journaled actions. */
export const EventType = z.enum([
  // Gate
  "decision.evaluated",
  "decision.rejected",

  // Workflow
  "workflow.rendered",

  // Config
  "config.loaded",
]);
export type EventType = z.infer<typeof EventType>;

/** Base event structure. */
export const BaseEvent = z.object({
  /** Monotonic event ID within one logger instance. */
  eventId: z.number().int().positive(),
  /** Event type. */
  type: EventType,
  /** ISO-8601 timestamp. */
  timestamp: z.string().datetime(),
  /** CLI command or system component that caused this event. */
  actor: z.string(),
  /** Event-specific payload. */
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;
