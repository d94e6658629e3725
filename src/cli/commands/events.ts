import type { Command } from "commander";
import { loadCommandContext, reportCommandError } from "../context.js";
import { EventType } from "../../schemas/event.js";

/**
 * Register `events`.
 */
export function registerEventsCommand(program: Command): void {
  program
    .command("events")
    .description("List decision journal entries")
    .option("--type <type>", `Filter by type (${EventType.options.join(", ")})`)
    .option("--actor <actor>", "Filter by actor")
    .option("--json", "Print one JSON object per line", false)
    .action(async (opts: { type?: string; actor?: string; json: boolean }) => {
      try {
        const { logger } = await loadCommandContext(program);
        if (!logger) {
          throw new Error("No events directory configured (use --events-dir or eventsDir in config)");
        }

        let type: EventType | undefined;
        if (opts.type !== undefined) {
          const parsed = EventType.safeParse(opts.type);
          if (!parsed.success) {
            throw new Error(`Unknown event type '${opts.type}' (expected one of: ${EventType.options.join(", ")})`);
          }
          type = parsed.data;
        }
        const events = await logger.query({ type, actor: opts.actor });

        for (const event of events) {
          if (opts.json) {
            console.log(JSON.stringify(event));
          } else {
            console.log(`${event.timestamp}  ${event.type}  ${event.actor}  ${JSON.stringify(event.payload)}`);
          }
        }
      } catch (err) {
        reportCommandError(err);
      }
    });
}
