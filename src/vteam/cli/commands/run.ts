/**
 * vteam run command - Run a scenario file
 */

import fs from "node:fs/promises";
import { Command } from "commander";
import YAML from "yaml";
import { loadConfig } from "../../config/loader.js";
import { errorMessage } from "../../runtime/errors.js";
import { checkAssertions } from "../../runtime/assertions.js";
import { ScenarioRunner, type RunResult } from "../../runtime/runner.js";
import { parseScenario } from "../../runtime/scenario.js";

export interface RunOptions {
  planOnly?: boolean;
  dryRun?: boolean;
  resume?: boolean;
  forceRerun?: boolean;
  sharedContext?: boolean;
  verbose?: boolean;
  json?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Scenario data with command-line flags layered over its context
 */
export function withRunFlags(raw: unknown, opts: RunOptions): unknown {
  if (!isRecord(raw)) return raw;
  const flags: Record<string, boolean> = {};
  if (opts.planOnly) flags.planOnly = true;
  if (opts.dryRun) flags.dryRun = true;
  if (opts.resume) flags.resume = true;
  if (opts.forceRerun) flags.forceRerun = true;
  if (opts.sharedContext) flags.sharedContext = true;
  const context = isRecord(raw.context) ? raw.context : {};
  return { ...raw, context: { ...context, ...flags } };
}

function printResult(result: RunResult): void {
  console.log("\n┌─ Run");
  console.log(`│ Run ID:  ${result.runId}`);
  console.log(`│ Route:   ${result.route ?? "-"}`);
  console.log(`│ Phase:   ${result.workflowPhase ?? "-"}`);
  console.log(`│ Status:  ${result.status}`);
  console.log(`│ Cost:    $${result.telemetry.costEstimateUsd.toFixed(6)} (${result.telemetry.tokens} tokens)`);
  console.log("└─");
  if (result.error) {
    console.error(`\nError: ${result.error}`);
  }
  if (result.output) {
    console.log(`\n${result.output}`);
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Run a scenario")
    .argument("<scenario>", "Scenario YAML file")
    .option("--plan-only", "Stop after planning; skip phase execution")
    .option("--dry-run", "Record phase dispatches without running the coding CLI")
    .option("--resume", "Skip phases completed by an earlier run")
    .option("--force-rerun", "Re-run completed phases when resuming")
    .option("--shared-context", "Use the shared context store for this run")
    .option("-v, --verbose", "Debug logging")
    .option("--json", "Output as JSON")
    .action(async (file: string, opts: RunOptions) => {
      try {
        const config = await loadConfig();
        const raw: unknown = YAML.parse(await fs.readFile(file, "utf-8"));
        const runner = new ScenarioRunner(config, { quiet: opts.json, verbose: opts.verbose });

        const input = withRunFlags(raw, opts);
        const result = await runner.run(input);
        const failures = checkAssertions(parseScenario(input).assertions ?? [], result);

        if (opts.json) {
          const { state: _state, ...summary } = result;
          console.log(JSON.stringify(summary, null, 2));
        } else {
          printResult(result);
        }
        for (const failure of failures) {
          console.error(`FAIL ${file}: ${failure}`);
        }
        if (result.status === "failed" || failures.length > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(`Run failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
