/**
 * vteam init command
 */

import { Command } from "commander";
import { initConfig, configExists, getConfigPath } from "../../config/loader.js";
import { errorMessage } from "../../runtime/errors.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Initialize vteam configuration")
    .option("-c, --coding-command <command>", "Coding CLI that receives phase instructions on stdin")
    .option("-w, --workspace-root <path>", "Directory repositories are cloned into")
    .option("-f, --force", "Overwrite existing config")
    .action(async (opts: { codingCommand?: string; workspaceRoot?: string; force?: boolean }) => {
      const configPath = getConfigPath();

      if (!opts.force && (await configExists())) {
        console.log(`Config already exists at ${configPath}`);
        console.log("Use --force to overwrite");
        return;
      }

      try {
        const { configPath: savedPath, config } = await initConfig(opts);

        console.log(`✓ Created config at ${savedPath}`);
        if (config.dispatch.command) {
          console.log(`✓ Coding CLI: ${config.dispatch.command}`);
        }
        console.log(`  Workspaces: ${config.workflow.workspaceRoot}`);

        console.log("\nNext steps:");
        console.log("  1. Route a prompt:  vteam route 'compare the memory graph'");
        console.log("  2. Run a scenario:  vteam run scenarios/feature.yaml --plan-only");
      } catch (error) {
        console.error(`Failed to initialize: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
