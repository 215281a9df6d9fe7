/**
 * Tests for the review, summary and evaluation stages
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { WorkflowSettingsSchema } from "../config/types.js";
import { resolveContextKey } from "../context/store.js";
import { SessionRegistry } from "../execution/sessions.js";
import { parseScenario } from "../runtime/scenario.js";
import { createInitialState, type PhasePlan, type RunState } from "../runtime/state.js";
import type { CodingTool, DispatchOutcome } from "../tools/coding-tool.js";
import { WorkflowConfigSchema } from "./config.js";
import { WorkflowStages } from "./stages.js";

const tool: CodingTool = {
  name: "coder",
  dispatch: async (): Promise<DispatchOutcome> => ({
    ok: true,
    text: "[coder] exit=0",
    exitCode: 0,
    timedOut: false,
    dryRun: false,
  }),
};

function phase(name: string, overrides: Partial<PhasePlan> = {}): PhasePlan {
  return {
    name,
    owners: ["backend_lead"],
    deliverables: ["Orders endpoint"],
    acceptanceTests: ["POST /orders returns 201"],
    testPolicy: "default",
    ...overrides,
  };
}

describe("WorkflowStages", () => {
  let dir: string;
  let stages: WorkflowStages;

  function stateFor(context: Record<string, unknown> = {}): RunState {
    return createInitialState(parseScenario({ prompt: "Add an orders API", context }));
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vteam-stages-"));
    stages = new WorkflowStages({
      workflow: WorkflowConfigSchema.parse({}),
      settings: WorkflowSettingsSchema.parse({ evaluationsPath: path.join(dir, "evaluations.jsonl") }),
      tool,
      sessions: new SessionRegistry("planning", resolveContextKey({ workstreamId: "orders" })),
      now: () => new Date("2026-03-01T12:00:00Z"),
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("codeReview", () => {
    it("approves phases with owners, tests and deliverables", async () => {
      const state = stateFor();
      state.plan.phases = [phase("Backend API")];

      const next = await stages.codeReview(state);

      expect(next.metadata.codeReview).toEqual({ status: "approved", issues: [] });
      expect(next.checkpoints).toEqual([{ phase: "code_review", status: "approved" }]);
      expect(state.metadata.codeReview).toBeUndefined();
    });

    it("records gaps without failing the run", async () => {
      const state = stateFor();
      state.plan.phases = [
        phase("Backend API", { owners: [], acceptanceTests: [] }),
        phase("", { deliverables: [] }),
      ];

      const next = await stages.codeReview(state);

      expect(next.metadata.codeReview).toEqual({
        status: "changes_requested",
        issues: [
          "Backend API: missing owners",
          "Backend API: missing acceptance tests",
          "Phase 2: no deliverables listed",
        ],
      });
    });
  });

  describe("planSummary", () => {
    it("becomes the output when planning only", async () => {
      const state = stateFor({ planOnly: true });
      state.plan.phases = [phase("Backend API")];

      const next = await stages.planSummary(state);

      expect(next.output).toBe(
        [
          "# Plan: Add an orders API",
          "Stack: typescript",
          "",
          "## Phases",
          "### Phase 1 – Backend API (owner: backend_lead)",
          "- Deliverable: Orders endpoint",
          "- Acceptance: POST /orders returns 201",
        ].join("\n"),
      );
      expect(next.checkpoints).toEqual([{ phase: "plan_summary", status: "plan_only" }]);
    });

    it("leaves the output alone on a full run", async () => {
      const next = await stages.planSummary(stateFor());
      expect(next.output).toBe("");
      expect(next.plan.summary.startsWith("# Plan: Add an orders API")).toBe(true);
    });
  });

  describe("evaluation", () => {
    it("asks for more graph weight on thin output", async () => {
      const next = await stages.evaluation(stateFor());

      expect(next.metadata.evaluations).toEqual([
        { timestamp: "2026-03-01T12:00:00.000Z", route: undefined, grounding: 0, completeness: 0.5, score: 0.2 },
      ]);
      expect(next.metadata.routerFeedback).toBe("increase_graph_weight");
      expect(next.checkpoints).toEqual([{ phase: "evaluation", status: "0.200" }]);

      const persisted = await fs.readFile(path.join(dir, "evaluations.jsonl"), "utf-8");
      expect(JSON.parse(persisted.trim())).toMatchObject({ score: 0.2, grounding: 0 });
    });

    it("scores grounded, complete output at 1", async () => {
      const state = stateFor();
      state.artifacts = [
        { kind: "document", ref: "docs/a.md" },
        { kind: "document", ref: "docs/b.md" },
        { kind: "document", ref: "docs/c.md" },
      ];
      state.output = Array.from({ length: 31 }, (_, i) => `word${i}`).join(" ");

      const next = await stages.evaluation(state);

      expect(next.metadata.evaluations[0].score).toBe(1);
      expect(next.metadata.routerFeedback).toBeUndefined();
    });
  });
});
