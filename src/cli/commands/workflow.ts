import { resolve } from "node:path";
import type { Command } from "commander";
import { loadCommandContext, reportCommandError } from "../context.js";
import { renderWorkflow, writeWorkflow } from "../../workflow/renderer.js";

/**
 * Register `workflow`.
 */
export function registerWorkflowCommand(program: Command): void {
  program
    .command("workflow")
    .description("Render the GitHub Actions workflow for the configured branches")
    .option("-o, --out <path>", "Write to a file instead of stdout")
    .action(async (opts: { out?: string }) => {
      try {
        const { loaded, logger } = await loadCommandContext(program);
        const { config } = loaded;

        if (opts.out) {
          const outputPath = resolve(opts.out);
          await writeWorkflow(outputPath, config);
          console.log(`✅ Workflow written to ${outputPath}`);
          await logger?.logWorkflowRendered("cli:workflow", {
            publishBranch: config.publishBranch,
            pagesBranch: config.pagesBranch,
            outputPath,
          });
          return;
        }

        console.log(renderWorkflow(config).trimEnd());
        await logger?.logWorkflowRendered("cli:workflow", {
          publishBranch: config.publishBranch,
          pagesBranch: config.pagesBranch,
        });
      } catch (err) {
        reportCommandError(err);
      }
    });
}
