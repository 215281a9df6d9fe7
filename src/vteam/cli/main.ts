/**
 * Main CLI entry point for vteam
 */

import { Command } from "commander";
import { registerInitCommand } from "./commands/init.js";
import { registerRunCommand } from "./commands/run.js";
import { registerRouteCommand } from "./commands/route.js";
import { registerMemoryCommand } from "./commands/memory.js";
import { registerRunsCommand } from "./commands/runs.js";
import { registerConfigCommand } from "./commands/config.js";

/**
 * Build the vteam CLI program
 */
export function buildVteamProgram(): Command {
  const program = new Command();

  program
    .name("vteam")
    .description("Virtual engineering team - routes requests and drives phased feature work through coding CLIs")
    .version("0.1.0");

  registerInitCommand(program);
  registerRunCommand(program);
  registerRouteCommand(program);
  registerMemoryCommand(program);
  registerRunsCommand(program);
  registerConfigCommand(program);

  return program;
}

/**
 * Run the CLI
 */
export async function runVteamCli(args: string[] = process.argv): Promise<void> {
  const program = buildVteamProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
