/**
 * pubgate CLI — build-or-publish gate for static site CI runs.
 * Built with Commander for arg parsing, help generation, and subcommands.
 *
 * This module configures the Commander program with all commands registered.
 * It is separated from the entrypoint (index.ts) so tests can build a fresh
 * program without triggering parseAsync on process.argv.
 */

import { Command } from "commander";
import { DEFAULT_CONFIG_FILE_NAME } from "../config/index.js";
import { registerEvaluateCommands } from "./commands/evaluate.js";
import { registerWorkflowCommand } from "./commands/workflow.js";
import { registerConfigCommands } from "./commands/config-commands.js";
import { registerEventsCommand } from "./commands/events.js";

export function createProgram(): Command {
  const program = new Command()
    .name("pubgate")
    .version("0.1.0")
    .description("Decide whether a CI run builds the site only or builds and publishes it")
    .option("-c, --config <path>", "Config file", DEFAULT_CONFIG_FILE_NAME)
    .option("--events-dir <path>", "Decision journal directory (overrides config)");

  registerEvaluateCommands(program);
  registerWorkflowCommand(program);
  registerConfigCommands(program);
  registerEventsCommand(program);

  return program;
}
