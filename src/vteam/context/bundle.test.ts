/**
 * Tests for context bundles
 */

import { describe, it, expect } from "vitest";
import { buildContextBundle, formatSection } from "./bundle.js";
import { ContextEntrySchema } from "./store.js";
import type { ScoredMemory } from "../memory/temporal.js";

function memory(text: string, score: number): ScoredMemory {
  return {
    id: text,
    text,
    category: "general",
    importance: 0.5,
    source: "agent",
    ts: "2026-01-01T00:00:00.000Z",
    tsEpoch: 1767225600,
    metadata: {},
    score,
  };
}

describe("formatSection", () => {
  it("drops lines past the budget", () => {
    expect(formatSection("Notes", ["- aaaa", "- bbbb"], 15)).toBe("Notes:\n- aaaa");
  });

  it("is empty when no line fits", () => {
    expect(formatSection("Notes", [], 100)).toBe("");
  });
});

describe("buildContextBundle", () => {
  const entry = ContextEntrySchema.parse({
    key: { repo: "/repo", branch: "current", workstreamId: "csv" },
    version: 1,
    workingSummary: { text: "Export endpoint drafted.", stale: true },
    filePointers: ["docs/product.md"],
  });

  it("includes pinned rules, stale summary, pointers and high-scoring snippets when planning", () => {
    const bundle = buildContextBundle({
      mode: "planning",
      entry,
      filePointers: ["docs/architecture_plan.md", "docs/product.md"],
      retrieved: [memory("Stream large exports", 0.9), memory("Unrelated", 0.2)],
    });

    expect(bundle).toBe(
      [
        "Pinned rules:",
        "- Repo state is truth; never assume unstated facts.",
        "- Evidence required for done/implemented/fixed claims.",
        "- If unsure, request file pointers instead of guessing.",
        "",
        "Diff-first summary:",
        "- Context is STALE; refresh file evidence before changes.",
        "",
        "Working summary (STALE - do not trust):",
        "Export endpoint drafted.",
        "",
        "File pointers:",
        "- docs/architecture_plan.md",
        "- docs/product.md",
        "",
        "Retrieved snippets:",
        "- Stream large exports",
      ].join("\n"),
    );
  });

  it("shows the repo checkpoint and changed files for a stale entry", () => {
    const bundle = buildContextBundle({
      mode: "planning",
      entry,
      repoState: { gitHead: "b2", trackedFilesHash: "f00d", diffFiles: ["src/export.ts"] },
    });

    expect(bundle).toContain(
      [
        "Diff-first summary:",
        "- Context is STALE; refresh file evidence before changes.",
        "Changed files:",
        "- src/export.ts",
        "",
        "Repo checkpoint:",
        "head=b2 tracked_hash=f00d status=STALE",
      ].join("\n"),
    );
  });

  it("marks a fresh checkpoint and leaves out the diff section", () => {
    const fresh = ContextEntrySchema.parse({ ...entry, workingSummary: { text: "Export endpoint drafted." } });

    const bundle = buildContextBundle({
      mode: "planning",
      entry: fresh,
      repoState: { gitHead: "a1", trackedFilesHash: null, diffFiles: [] },
    });

    expect(bundle).toContain("Repo checkpoint:\nhead=a1 tracked_hash=unknown status=fresh");
    expect(bundle).toContain("Working summary:\nExport endpoint drafted.");
    expect(bundle).not.toContain("Diff-first summary");
  });

  it("lists next steps and the evidence reminder when implementing", () => {
    const bundle = buildContextBundle({ mode: "implementation", entry, taskChecklist: ["Wire the route"] });

    expect(bundle).toContain("Diff-first summary:\n- Context is STALE; refresh file evidence before changes.");
    expect(bundle).toContain("Next steps:\n- Wire the route");
    expect(bundle).toContain("Evidence reminder:\n- Claims require file paths and line refs or symbol names.");
    expect(bundle).not.toContain("Working summary");
  });
});
