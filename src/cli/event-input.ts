/**
 * Event flag resolution for commands that evaluate one event.
 *
 * Sources, first match wins:
 * 1. `--event-path <file>`: webhook payload JSON, named by `--event-name` or `GITHUB_EVENT_NAME`
 * 2. `--from-env`: `GITHUB_EVENT_NAME`, `GITHUB_REF`, `GITHUB_BASE_REF`
 * 3. `--kind` and `--branch`
 */

import { readFile } from "node:fs/promises";
import type { Command } from "commander";
import {
  resolveTriggerEvent,
  resolveTriggerEventFromPayload,
  EventPayloadError,
} from "../github/event-resolver.js";
import type { TriggerEventInput } from "../schemas/trigger.js";

export interface EventFlags {
  kind?: string;
  branch?: string;
  fromEnv?: boolean;
  eventPath?: string;
  eventName?: string;
}

/** Attach the event flags to a command. */
export function withEventFlags(command: Command): Command {
  return command
    .option("--kind <kind>", "Event kind: push | review-request")
    .option("--branch <name>", "Branch pushed to, or targeted by the review request")
    .option("--from-env", "Read the event from the GitHub Actions environment", false)
    .option("--event-path <file>", "Read the event from a webhook payload file")
    .option("--event-name <name>", "GitHub event name for --event-path (default: $GITHUB_EVENT_NAME)");
}

export async function resolveEventInput(
  flags: EventFlags,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TriggerEventInput> {
  if (flags.eventPath) {
    const eventName = flags.eventName ?? env["GITHUB_EVENT_NAME"] ?? "";
    const content = await readFile(flags.eventPath, "utf-8");
    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch (err) {
      throw new EventPayloadError(eventName, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
    }
    return resolveTriggerEventFromPayload(eventName, payload);
  }

  if (flags.fromEnv) {
    return resolveTriggerEvent(env);
  }

  return { kind: flags.kind ?? "", originBranch: flags.branch ?? "" };
}
