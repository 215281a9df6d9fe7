#!/usr/bin/env node
/**
 * vteam CLI entry point
 */

import { runVteamCli } from "./cli/main.js";

runVteamCli().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
