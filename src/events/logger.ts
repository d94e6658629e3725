/**
 * Decision journal — append-only JSONL event log.
 *
 * Writes one JSON object per line to <eventsDir>/YYYY-MM-DD.jsonl and keeps
 * events.jsonl pointing at the current day.
 * Uses the BaseEvent schema from schemas/event.ts.
 */

import { appendFile, mkdir, symlink, unlink, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { BaseEvent } from "../schemas/event.js";
import type { EventType } from "../schemas/event.js";
import type { TriggerEventInput } from "../schemas/trigger.js";
import type { PublishDecision } from "../schemas/decision.js";
import type { PublishGateError } from "../gate/errors.js";

export type EventCallback = (event: BaseEvent) => void | Promise<void>;

export interface EventLoggerOptions {
  onEvent?: EventCallback;
}

export interface EventQuery {
  type?: EventType;
  actor?: string;
}

const CURRENT_LOG = "events.jsonl";

export class EventLogger {
  private readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private eventCounter: number = 0;

  constructor(eventsDir: string, options?: EventLoggerOptions) {
    this.eventsDir = eventsDir;
    this.onEvent = options?.onEvent;
  }

  /** Append an event to today's JSONL file. */
  async log(
    type: EventType,
    actor: string,
    payload: Record<string, unknown> = {},
  ): Promise<BaseEvent> {
    this.eventCounter += 1;

    const event: BaseEvent = {
      eventId: this.eventCounter,
      type,
      timestamp: new Date().toISOString(),
      actor,
      payload,
    };

    const date = event.timestamp.slice(0, 10); // YYYY-MM-DD
    const filePath = join(this.eventsDir, `${date}.jsonl`);

    await mkdir(this.eventsDir, { recursive: true });
    await appendFile(filePath, JSON.stringify(event) + "\n", "utf-8");
    await this.updateSymlink(date);

    if (this.onEvent) {
      await Promise.resolve(this.onEvent(event));
    }

    return event;
  }

  /** Point events.jsonl at the current day's log. */
  private async updateSymlink(date: string): Promise<void> {
    const symlinkPath = join(this.eventsDir, CURRENT_LOG);

    try {
      await unlink(symlinkPath);
    } catch (err) {
      if (!isMissingFile(err)) {
        console.warn(`[EventLogger] Failed to remove ${CURRENT_LOG}: ${describe(err)}`);
      }
    }

    try {
      // Relative target so the directory can move
      await symlink(`${date}.jsonl`, symlinkPath);
    } catch (err) {
      console.warn(`[EventLogger] Failed to update symlink: ${describe(err)}`);
    }
  }

  /** Log a decision made for an event. */
  async logDecision(
    actor: string,
    event: TriggerEventInput,
    decision: PublishDecision,
  ): Promise<BaseEvent> {
    return this.log("decision.evaluated", actor, {
      kind: event.kind,
      originBranch: event.originBranch,
      ...decision,
    });
  }

  /** Log an event the gate refused to decide on. */
  async logRejection(
    actor: string,
    event: TriggerEventInput,
    error: PublishGateError,
  ): Promise<BaseEvent> {
    return this.log("decision.rejected", actor, {
      kind: event.kind,
      originBranch: event.originBranch,
      code: error.code,
      message: error.message,
    });
  }

  /** Log a rendered workflow. */
  async logWorkflowRendered(
    actor: string,
    payload: { publishBranch: string; pagesBranch: string; outputPath?: string },
  ): Promise<BaseEvent> {
    return this.log("workflow.rendered", actor, payload);
  }

  /** Log the config a command ran with. */
  async logConfigLoaded(
    actor: string,
    payload: { filePath: string; fromFile: boolean },
  ): Promise<BaseEvent> {
    return this.log("config.loaded", actor, payload);
  }

  /**
   * Query events from the journal.
   *
   * Reads every dated JSONL file in the events directory in date order.
   * Lines that are not valid events are skipped.
   *
   * @returns Matching events, oldest first
   */
  async query(filter?: EventQuery): Promise<BaseEvent[]> {
    let files: string[];
    try {
      files = await readdir(this.eventsDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const jsonlFiles = files
      .filter((f) => f.endsWith(".jsonl") && f !== CURRENT_LOG)
      .sort();

    const events: BaseEvent[] = [];

    for (const file of jsonlFiles) {
      const content = await readFile(join(this.eventsDir, file), "utf-8");
      const lines = content.split("\n").filter((line) => line.trim().length > 0);

      for (const line of lines) {
        const event = parseEventLine(line);
        if (!event) continue;

        if (filter?.type && event.type !== filter.type) continue;
        if (filter?.actor && event.actor !== filter.actor) continue;

        events.push(event);
      }
    }

    return events;
  }
}

function parseEventLine(line: string): BaseEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const result = BaseEvent.safeParse(raw);
  return result.success ? result.data : null;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
