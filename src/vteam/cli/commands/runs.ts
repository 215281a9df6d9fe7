/**
 * vteam runs command - View run history and logs
 */

import { Command } from "commander";
import { loadConfig } from "../../config/loader.js";
import { errorMessage } from "../../runtime/errors.js";
import { listRunLogs, readAuditLog } from "../../runtime/logger.js";

export function registerRunsCommand(program: Command): void {
  const runsCmd = program.command("runs").description("View run history and logs");

  runsCmd
    .command("list")
    .description("List recent runs")
    .option("-n, --limit <n>", "Number of runs to show", (value) => parseInt(value, 10), 20)
    .option("--json", "Output as JSON")
    .action(async (opts: { limit: number; json?: boolean }) => {
      try {
        const config = await loadConfig();
        const logs = (await listRunLogs(config.audit.dir)).slice(0, opts.limit);

        if (opts.json) {
          console.log(JSON.stringify(logs, null, 2));
          return;
        }
        if (logs.length === 0) {
          console.log("No runs found");
          return;
        }

        console.log("\nRecent runs:\n");
        for (const log of logs) {
          console.log(`  ${log.runId}`);
          console.log(`    Time: ${log.timestamp.toISOString()}`);
          console.log(`    Size: ${(log.size / 1024).toFixed(1)}KB`);
          console.log();
        }
      } catch (error) {
        console.error(`Failed to list runs: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  runsCmd
    .command("show")
    .description("Show the audit log of a run")
    .argument("<run-id>", "Run ID to show")
    .option("--json", "Output as JSON")
    .action(async (runId: string, opts: { json?: boolean }) => {
      try {
        const config = await loadConfig();
        const entries = await readAuditLog(runId, config.audit.dir);

        if (entries.length === 0) {
          console.error(`No audit log found for run: ${runId}`);
          process.exit(1);
        }

        if (opts.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }

        console.log(`\n─── Run: ${runId} ───\n`);
        for (const entry of entries) {
          const time = new Date(entry.timestamp).toISOString();
          console.log(`[${time}] ${entry.type.toUpperCase()}${entry.stage ? ` ${entry.stage}` : ""}`);
          if (entry.tool) console.log(`  Tool: ${entry.tool}`);
          if (entry.input) console.log(`  Input: ${JSON.stringify(entry.input)}`);
          if (entry.output) console.log(`  Output: ${JSON.stringify(entry.output)}`);
          if (entry.error) console.log(`  Error: ${entry.error}`);
          if (entry.duration_ms !== undefined) console.log(`  Duration: ${entry.duration_ms}ms`);
          console.log();
        }
      } catch (error) {
        console.error(`Failed to show run: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
