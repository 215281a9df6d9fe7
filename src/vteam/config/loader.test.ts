/**
 * Tests for configuration loading
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { VteamErrorCode, isVteamError } from "../runtime/errors.js";
import { applyEnvOverrides, initConfig, loadConfig } from "./loader.js";
import { getDefaultConfig } from "./types.js";

describe("config loader", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vteam-config-"));
    configPath = path.join(dir, "config.yaml");
    vi.stubEnv("VTEAM_CONFIG_PATH", configPath);
    vi.stubEnv("VTEAM_CODING_CLI_COMMAND", "");
    vi.stubEnv("VTEAM_MODEL_POLICY", "");
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns defaults when no file exists", async () => {
    const config = await loadConfig();
    expect(config.retry).toEqual({ attempts: 2, waitMs: 500 });
    expect(config.policy.default).toBe("balanced");
  });

  it("fills defaults around values from the file", async () => {
    await fs.writeFile(configPath, "retry:\n  attempts: 4\nmemory:\n  topK: 3\n");
    const config = await loadConfig();
    expect(config.retry).toEqual({ attempts: 4, waitMs: 500 });
    expect(config.memory.topK).toBe(3);
    expect(config.memory.halfLifeHours).toBe(72);
  });

  it("rejects invalid files with CONFIG_INVALID", async () => {
    await fs.writeFile(configPath, "retry:\n  attempts: 0\n");
    const error = await loadConfig().catch((caught: unknown) => caught);
    expect(isVteamError(error) && error.code).toBe(VteamErrorCode.CONFIG_INVALID);
  });

  it("writes the initial config and refuses to overwrite without force", async () => {
    const { config } = await initConfig({ codingCommand: "coder --stdin" });
    expect(config.dispatch.command).toBe("coder --stdin");
    expect((await loadConfig()).dispatch.command).toBe("coder --stdin");

    await expect(initConfig()).rejects.toThrow(`Config already exists at ${configPath}`);
    const forced = await initConfig({ force: true });
    expect(forced.config.dispatch.command).toBeUndefined();
  });
});

describe("applyEnvOverrides", () => {
  it("applies command, timeout and shared-context variables", () => {
    const config = applyEnvOverrides(getDefaultConfig(), {
      VTEAM_CODING_CLI_COMMAND: "coder",
      VTEAM_CODING_CLI_TIMEOUT: "120",
      VTEAM_SHARED_CONTEXT: "yes",
      VTEAM_MODEL_POLICY: "fast",
    });
    expect(config.dispatch.command).toBe("coder");
    expect(config.dispatch.timeoutS).toBe(120);
    expect(config.sharedContext.enabled).toBe(true);
    expect(config.policy.default).toBe("fast");
  });

  it("ignores non-positive timeouts", () => {
    const config = applyEnvOverrides(getDefaultConfig(), { VTEAM_CODING_CLI_TIMEOUT: "-5" });
    expect(config.dispatch.timeoutS).toBe(600);
  });
});
