/**
 * Tests for the session registry
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ContextStore } from "../context/store.js";
import { SessionRegistry, sessionIdFor } from "./sessions.js";

const key = { repo: "/repos/shop", branch: "main", workstreamId: "orders" };

describe("sessionIdFor", () => {
  it("is stable for the same inputs and differs across modes", () => {
    const first = sessionIdFor("implementation", key, "Backend API");
    expect(first).toMatch(/^sess_[0-9a-f]{12}$/);
    expect(sessionIdFor("implementation", key, "Backend API")).toBe(first);
    expect(sessionIdFor("planning", key, "Backend API")).not.toBe(first);
  });
});

describe("SessionRegistry", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vteam-sessions-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("names sessions by mode and slug", async () => {
    const registry = new SessionRegistry("implementation", key);

    const info = await registry.acquire("Backend API");

    expect(info).toEqual({
      sessionId: sessionIdFor("implementation", key, "Backend API"),
      sessionName: "implementation-backend-api",
      initialized: false,
    });
  });

  it("remembers initialization across registries sharing a store", async () => {
    const store = new ContextStore(dir);
    await new SessionRegistry("implementation", key, store).markInitialized("Backend API");

    const reloaded = await new SessionRegistry("implementation", key, store).acquire("Backend API");

    expect(reloaded.initialized).toBe(true);
  });
});
