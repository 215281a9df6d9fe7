/**
 * Tests for per-thread phase checkpoints
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { VteamErrorCode, isVteamError } from "../runtime/errors.js";
import type { PhaseExecutionRecord } from "../runtime/state.js";
import { RunCheckpointStore } from "./checkpoints.js";

const record: PhaseExecutionRecord = {
  phaseName: "Core",
  owners: ["ops"],
  session: { id: "sess_000000000001", name: "implementation-core" },
  toolCalls: [],
  handoffStatus: "not_required",
  status: "completed",
  debugAttempts: 0,
  summary: "Core: completed",
};

describe("RunCheckpointStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vteam-checkpoints-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("saves one file per thread and reads its records back", async () => {
    const store = new RunCheckpointStore(path.join(dir, "checkpoints"));

    await store.save({
      threadId: "thread-a",
      runId: "run_1_thread-a",
      updatedAt: "2026-03-01T12:00:00.000Z",
      records: [record],
      checkpoints: [{ phase: "Core", owners: ["ops"], status: "completed" }],
    });

    expect(await store.records("thread-a")).toEqual([record]);
    expect(await store.records("thread-b")).toEqual([]);
    expect(await fs.readdir(path.join(dir, "checkpoints"))).toEqual(["thread-a.json"]);
  });

  it("rejects an unreadable checkpoint file", async () => {
    const store = new RunCheckpointStore(dir);
    await fs.writeFile(store.pathFor("thread-a"), "{not json", "utf-8");

    const error = await store.load("thread-a").catch((caught: unknown) => caught);

    expect(isVteamError(error) && error.code).toBe(VteamErrorCode.CONFIG_INVALID);
  });
});
