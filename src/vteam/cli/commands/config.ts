/**
 * vteam config command - View configuration
 */

import { Command } from "commander";
import { loadConfig, getConfigPath } from "../../config/loader.js";
import { errorMessage } from "../../runtime/errors.js";

/**
 * Walk a dot-notation key through nested objects; undefined when any part is missing
 */
export function lookupConfigValue(source: unknown, key: string): unknown {
  let value: unknown = source;
  for (const part of key.split(".")) {
    if (typeof value !== "object" || value === null || Array.isArray(value)) return undefined;
    const entries = new Map(Object.entries(value));
    if (!entries.has(part)) return undefined;
    value = entries.get(part);
  }
  return value;
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command("config").description("View configuration");

  configCmd
    .command("path")
    .description("Show config file path")
    .action(() => {
      console.log(getConfigPath());
    });

  configCmd
    .command("show")
    .description("Show current configuration")
    .action(async () => {
      try {
        const config = await loadConfig();
        console.log(JSON.stringify(config, null, 2));
      } catch (error) {
        console.error(`Failed to load config: ${errorMessage(error)}`);
        process.exit(1);
      }
    });

  configCmd
    .command("get")
    .description("Get a config value")
    .argument("<key>", "Config key (dot notation, e.g., router.graphMinLatency)")
    .action(async (key: string) => {
      try {
        const value = lookupConfigValue(await loadConfig(), key);
        if (value === undefined) {
          console.error(`Key not found: ${key}`);
          process.exit(1);
        }
        console.log(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
      } catch (error) {
        console.error(`Failed to get config: ${errorMessage(error)}`);
        process.exit(1);
      }
    });
}
