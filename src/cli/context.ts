/**
 * Shared command plumbing — global options, config, journal, error reporting.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import { loadPublishConfig, type LoadedPublishConfig } from "../config/index.js";
import { EventLogger } from "../events/logger.js";

export interface GlobalOptions {
  config?: string;
  eventsDir?: string;
}

export interface CommandContext {
  loaded: LoadedPublishConfig;
  /** Null when no events directory is configured. */
  logger: EventLogger | null;
}

/**
 * Load config and open the journal for a command.
 *
 * `--events-dir` wins over `eventsDir` from the config file.
 */
export async function loadCommandContext(
  program: Command,
  env: NodeJS.ProcessEnv = process.env,
): Promise<CommandContext> {
  const opts = program.opts<GlobalOptions>();
  const loaded = await loadPublishConfig({ path: opts.config, env });
  const eventsDir = opts.eventsDir ?? loaded.config.eventsDir;
  const logger = eventsDir ? new EventLogger(resolve(eventsDir)) : null;
  return { loaded, logger };
}

/** Report a failed command on stderr and mark the process as failed. */
export function reportCommandError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${message}`);
  process.exitCode = 1;
}
