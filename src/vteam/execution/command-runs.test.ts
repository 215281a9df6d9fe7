/**
 * Tests for the command-run log and hints
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CommandRunLog } from "./command-runs.js";
import type { ReportCommand } from "./handoff.js";

function command(overrides: Partial<ReportCommand>): ReportCommand {
  return {
    section: "Build",
    command: "mvn package",
    workdir: "api",
    status: "success",
    resultExcerpt: "",
    errorSignature: null,
    errorHash: null,
    ...overrides,
  };
}

describe("CommandRunLog", () => {
  let dir: string;
  let log: CommandRunLog;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vteam-runs-"));
    log = new CommandRunLog(path.join(dir, "ops", "command_runs.jsonl"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("appends entries tagged with their source", async () => {
    const source = { repoPath: "/repo", branch: "feat", phase: "Backend API", reportPath: "docs/handoff/backend.md" };

    const count = await log.append(source, [command({}), command({ section: "Tests" })]);
    const entries = await log.entries();

    expect(count).toBe(2);
    expect(entries.map((entry) => entry.section)).toEqual(["Build", "Tests"]);
    expect(entries[0]).toMatchObject({ repoPath: "/repo", branch: "feat", phase: "Backend API", sessionId: null });
  });

  it("turns a failure followed by a success into a hint", async () => {
    const source = { repoPath: "/repo", reportPath: "report.md" };
    await log.append(source, [
      command({ status: "failed", command: "mvn package", errorSignature: "BUILD FAILURE" }),
    ]);
    await log.append(source, [command({ status: "success", command: "mvn -o package" })]);

    expect(await log.loadHints("/repo")).toEqual([
      "Build failed before (BUILD FAILURE); last working command: `mvn -o package` (workdir: api).",
    ]);
  });

  it("keeps hints separate per repository and workdir", async () => {
    await log.append({ repoPath: "/repo", reportPath: "r.md" }, [
      command({ status: "failed", workdir: "api" }),
      command({ status: "success", workdir: "web" }),
    ]);
    await log.append({ repoPath: "/other", reportPath: "r.md" }, [command({ status: "success", workdir: "api" })]);

    expect(await log.loadHints("/repo")).toEqual([]);
  });

  it("filters by phase and respects the limit", async () => {
    const source = { repoPath: "/repo", phase: "Backend API", reportPath: "r.md" };
    for (const section of ["Build", "Tests", "Lint"]) {
      await log.append(source, [
        command({ section, status: "failed", errorSignature: `${section} broke` }),
        command({ section, status: "success", command: `fix ${section}` }),
      ]);
    }

    expect(await log.loadHints("/repo", "Frontend")).toEqual([]);
    expect(await log.loadHints("/repo", "Backend API", 2)).toHaveLength(2);
  });

  it("returns no hints without a log file", async () => {
    await expect(log.loadHints("/repo")).resolves.toEqual([]);
  });
});
