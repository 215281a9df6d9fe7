/**
 * Tests for the vteam CLI
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildVteamProgram } from "./main.js";
import { lookupConfigValue } from "./commands/config.js";
import { withRunFlags } from "./commands/run.js";

describe("buildVteamProgram", () => {
  it("registers every command", () => {
    const program = buildVteamProgram();
    expect(program.name()).toBe("vteam");
    expect(program.commands.map((command) => command.name())).toEqual([
      "init",
      "run",
      "route",
      "memory",
      "runs",
      "config",
    ]);
  });

  it("groups memory subcommands", () => {
    const memory = buildVteamProgram().commands.find((command) => command.name() === "memory");
    expect(memory?.commands.map((command) => command.name())).toEqual(["search", "add", "prune"]);
  });
});

describe("withRunFlags", () => {
  it("layers set flags over the scenario context", () => {
    const raw = { prompt: "Add an orders API", context: { repoPath: "/tmp/repo", dryRun: false } };
    expect(withRunFlags(raw, { dryRun: true, resume: true })).toEqual({
      prompt: "Add an orders API",
      context: { repoPath: "/tmp/repo", dryRun: true, resume: true },
    });
  });

  it("creates a context when the scenario has none", () => {
    expect(withRunFlags({ prompt: "hi" }, { planOnly: true })).toEqual({
      prompt: "hi",
      context: { planOnly: true },
    });
  });

  it("leaves non-object input for scenario validation", () => {
    expect(withRunFlags("not a scenario", { dryRun: true })).toBe("not a scenario");
  });
});

describe("lookupConfigValue", () => {
  const config = { router: { graphMinLatency: 6, thresholds: {} }, policy: { default: "balanced" } };

  it("walks dot-notation keys", () => {
    expect(lookupConfigValue(config, "router.graphMinLatency")).toBe(6);
    expect(lookupConfigValue(config, "policy")).toEqual({ default: "balanced" });
  });

  it("returns undefined for missing keys", () => {
    expect(lookupConfigValue(config, "router.missing")).toBeUndefined();
    expect(lookupConfigValue(config, "policy.default.length")).toBeUndefined();
  });
});

describe("vteam route", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vteam-cli-"));
    vi.stubEnv("VTEAM_CONFIG_PATH", path.join(dir, "config.yaml"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("prints a forced route", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await buildVteamProgram().parseAsync([
      "node",
      "vteam",
      "route",
      "compare memory graphs",
      "--context",
      '{"forceRoute":"graph_rag"}',
    ]);

    expect(log.mock.calls).toEqual([["Route:  graph_rag"], ["Reason: forced_by_context"]]);
  });
});
