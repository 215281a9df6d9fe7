/**
 * vteam memory command - Search, add and prune temporal memories
 */

import { Command } from "commander";
import { loadConfig } from "../../config/loader.js";
import { TemporalMemory } from "../../memory/temporal.js";
import { errorMessage } from "../../runtime/errors.js";

export function registerMemoryCommand(program: Command): void {
  const memoryCmd = program.command("memory").description("Inspect and edit temporal memory");

  memoryCmd
    .command("search")
    .description("Search memories by relevance and recency")
    .argument("<query>", "Search text")
    .option("-k, --top-k <n>", "Number of results", (value) => parseInt(value, 10))
    .option("--category <category>", "Only this category")
    .option("--json", "Output as JSON")
    .action(async (query: string, opts: { topK?: number; category?: string; json?: boolean }) => {
      try {
        const config = await loadConfig();
        const memory = new TemporalMemory(config.memory);
        const hits = await memory.search(query, { topK: opts.topK, category: opts.category });

        if (opts.json) {
          console.log(JSON.stringify(hits, null, 2));
          return;
        }
        if (hits.length === 0) {
          console.log("No memories found");
          return;
        }
        for (const hit of hits) {
          console.log(`${hit.score.toFixed(3)}  [${hit.category}] ${hit.text.split("\n")[0]}`);
          console.log(`       ${hit.id} · ${hit.ts} · ${hit.source}`);
        }
      } catch (error) {
        console.error(`Failed to search memory: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  memoryCmd
    .command("add")
    .description("Write a memory")
    .argument("<text>", "Memory text")
    .option("--category <category>", "Memory category", "general")
    .option("--importance <n>", "Importance in [0, 1]", parseFloat)
    .option("--source <source>", "Who wrote it", "user")
    .action(async (text: string, opts: { category: string; importance?: number; source: string }) => {
      try {
        const config = await loadConfig();
        const memory = new TemporalMemory(config.memory);
        const record = await memory.persist({
          text,
          category: opts.category,
          importance: opts.importance,
          source: opts.source,
        });
        console.log(`✓ Stored ${record.id} in ${memory.localPath}`);
      } catch (error) {
        console.error(`Failed to add memory: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  memoryCmd
    .command("prune")
    .description("Drop expired task_state memories")
    .action(async () => {
      try {
        const config = await loadConfig();
        const removed = await new TemporalMemory(config.memory).prune();
        console.log(`✓ Pruned ${removed} memories`);
      } catch (error) {
        console.error(`Failed to prune memory: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
