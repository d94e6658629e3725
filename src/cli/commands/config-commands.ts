/**
 * Configuration commands.
 */

import type { Command } from "commander";
import { stringify as stringifyYaml } from "yaml";
import { loadCommandContext, reportCommandError } from "../context.js";
import { lintPublishConfig } from "../../config/index.js";

/**
 * Register `config show` and `config validate`.
 */
export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Configuration inspection");

  config
    .command("show")
    .description("Print the effective config (file + defaults + environment)")
    .action(async () => {
      try {
        const { loaded, logger } = await loadCommandContext(program);
        const source = loaded.fromFile ? loaded.filePath : "defaults (no config file)";
        console.log(`# source: ${source}`);
        console.log(stringifyYaml(loaded.config).trimEnd());
        await logger?.logConfigLoaded("cli:config", {
          filePath: loaded.filePath,
          fromFile: loaded.fromFile,
        });
      } catch (err) {
        reportCommandError(err);
      }
    });

  config
    .command("validate")
    .description("Validate config (schema + policy lint)")
    .action(async () => {
      try {
        const { loaded } = await loadCommandContext(program);
        const issues = lintPublishConfig(loaded.config);

        for (const issue of issues) {
          const icon = issue.severity === "error" ? "✗" : "⚠";
          console.log(`  ${icon} [${issue.rule}] ${issue.message}`);
        }

        if (issues.some((i) => i.severity === "error")) {
          process.exitCode = 1;
          return;
        }
        console.log("✅ Config valid");
      } catch (err) {
        reportCommandError(err);
      }
    });
}
