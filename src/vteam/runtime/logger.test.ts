/**
 * Tests for run logging and audit files
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { LoggingConfigSchema } from "../config/types.js";
import { createLogger, listRunLogs, readAuditLog, writeAuditLog } from "./logger.js";

describe("createLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vteam-logger-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("filters below the configured level and flushes JSON lines", async () => {
    const config = LoggingConfigSchema.parse({ level: "warn", jsonLogs: true, logDir: dir });
    const logger = createLogger("run_test", config, { quiet: true });

    logger.info("ignored");
    logger.warn("Phase blocked", { phase: "Frontend Integration" });
    await logger.flush();

    const lines = (await fs.readFile(path.join(dir, "run_test.log"), "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: "warn",
      runId: "run_test",
      message: "Phase blocked",
      phase: "Frontend Integration",
    });
  });

  it("prints text lines unless quiet", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const config = LoggingConfigSchema.parse({ timestamps: false });

    createLogger("run_test", config).info("Router selected route=rag", { reason: "threshold" });

    expect(log).toHaveBeenCalledWith('[INFO ] Router selected route=rag {"reason":"threshold"}');
  });

  it("logs stages only when verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const config = LoggingConfigSchema.parse({ timestamps: false });

    createLogger("run_test", config).stage("router", 12);
    createLogger("run_test", config, { verbose: true }).stage("router", 12);

    expect(log.mock.calls).toEqual([['[DEBUG] Stage: router {"duration_ms":12}']]);
  });
});

describe("audit logs", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vteam-audit-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("round-trips entries and lists runs without the IO audit file", async () => {
    await writeAuditLog(
      "run_a",
      [{ timestamp: new Date("2026-03-01T00:00:00Z"), runId: "run_a", type: "route", output: { route: "rag" } }],
      dir,
    );
    await fs.writeFile(path.join(dir, "io_audit.jsonl"), "{}\n");

    const entries = await readAuditLog("run_a", dir);
    expect(entries).toEqual([
      { timestamp: "2026-03-01T00:00:00.000Z", runId: "run_a", type: "route", output: { route: "rag" } },
    ]);
    expect((await listRunLogs(dir)).map((log) => log.runId)).toEqual(["run_a"]);
  });

  it("returns nothing for unknown runs and missing directories", async () => {
    expect(await readAuditLog("run_missing", dir)).toEqual([]);
    expect(await listRunLogs(path.join(dir, "absent"))).toEqual([]);
  });
});
