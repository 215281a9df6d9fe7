/**
 * vteam route command - Show which capability a prompt would be routed to
 */

import { Command } from "commander";
import { loadConfig } from "../../config/loader.js";
import { RequestRouter } from "../../router/router.js";
import { errorMessage } from "../../runtime/errors.js";
import { parseScenario } from "../../runtime/scenario.js";
import { createInitialState } from "../../runtime/state.js";

export function registerRouteCommand(program: Command): void {
  program
    .command("route")
    .description("Show the route a prompt would take")
    .argument("<prompt>", "Prompt to route")
    .option("--context <json>", "Scenario context flags as JSON")
    .option("--json", "Output as JSON")
    .action(async (prompt: string, opts: { context?: string; json?: boolean }) => {
      try {
        const config = await loadConfig();
        const context: unknown = opts.context ? JSON.parse(opts.context) : {};
        const state = createInitialState(parseScenario({ prompt, context }));
        const decision = new RequestRouter(config.router, config.policy).decide(state);

        if (opts.json) {
          console.log(JSON.stringify(decision, null, 2));
          return;
        }
        console.log(`Route:  ${decision.route}`);
        console.log(`Reason: ${decision.reason}`);
        for (const [route, score] of Object.entries(decision.scores)) {
          console.log(`  ${route.padEnd(16)} ${(score ?? 0).toFixed(3)}`);
        }
      } catch (error) {
        console.error(`Failed to route: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
