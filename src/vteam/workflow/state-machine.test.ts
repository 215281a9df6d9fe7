/**
 * Tests for the planning stages and the phase state machine
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { PhaseStateMachine, nextStage, reviewBranch, type StageTable } from "./state-machine.js";
import { WorkflowStages } from "./stages.js";
import { loadWorkflowConfig, type WorkflowConfig } from "./config.js";
import { WorkflowSettingsSchema, type WorkflowSettings } from "../config/types.js";
import { SessionRegistry } from "../execution/sessions.js";
import { parseScenario } from "../runtime/scenario.js";
import { createInitialState, type RunState, type Stage } from "../runtime/state.js";
import { PreconditionError, VteamErrorCode, isVteamError } from "../runtime/errors.js";
import type { CodingTool, DispatchOutcome, DispatchRequest } from "../tools/coding-tool.js";

class RecordingTool implements CodingTool {
  readonly name = "coder";
  readonly requests: DispatchRequest[] = [];

  async dispatch(request: DispatchRequest): Promise<DispatchOutcome> {
    this.requests.push(request);
    return { ok: true, text: "[coder] exit=0", exitCode: 0, timedOut: false, dryRun: false };
  }
}

function stateFor(prompt: string, context: Record<string, unknown> = {}): RunState {
  return createInitialState(parseScenario({ prompt, context }));
}

describe("nextStage", () => {
  it("routes a rejected review back to architecture", () => {
    const state = stateFor("Add export");
    state.plan.review.status = "needs_revision";
    expect(nextStage("review", state)).toBe("architecture");
  });

  it("prefers a pending phase review over the architecture verdict", () => {
    const state = stateFor("Add export");
    state.plan.review.status = "approved";
    state.plan.phaseReview = { status: "needs_review", issues: ["x"], attempts: 1 };
    expect(reviewBranch(state.plan)).toBe("phase_revision");
    expect(nextStage("review", state)).toBe("implementation_planning");
    expect(nextStage("phase_validation", state)).toBe("review");
  });

  it("skips execution when planning only", () => {
    const state = stateFor("Add export", { planOnly: true });
    expect(nextStage("plan_summary", state)).toBe("code_review");
    expect(nextStage("evaluation", state)).toBeNull();
  });
});

describe("PhaseStateMachine", () => {
  let dir: string;
  let workflow: WorkflowConfig;
  let settings: WorkflowSettings;
  let tool: RecordingTool;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vteam-workflow-"));
    workflow = await loadWorkflowConfig();
    settings = WorkflowSettingsSchema.parse({ evaluationsPath: path.join(dir, "evaluations.jsonl") });
    tool = new RecordingTool();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function buildStages(overrides: Partial<WorkflowSettings> = {}): WorkflowStages {
    return new WorkflowStages({
      workflow,
      settings: { ...settings, ...overrides },
      tool,
      sessions: new SessionRegistry("planning", { repo: dir, branch: "current", workstreamId: "test" }),
    });
  }

  const execution: Stage = async (state) => ({ ...state, workflowPhase: "execution", output: "executed" });

  function buildMachine(stages: WorkflowStages): PhaseStateMachine {
    return new PhaseStateMachine(stages.table(execution));
  }

  it("approves a plan with guardrails and acceptance tests on the first pass", async () => {
    const stages = buildStages();
    const drafted = await stages.architecture(
      stateFor("Add an orders API endpoint", {
        guardrails: ["Feature flag the endpoint"],
        acceptanceTests: ["npm test passes"],
      }),
    );

    const reviewed = await stages.review(drafted);

    expect(reviewed.plan.review).toEqual({ status: "approved", issues: [], attempts: 1 });
  });

  it("rejects a plan missing guardrails and acceptance tests on the first pass", async () => {
    const stages = buildStages();
    const drafted = await stages.architecture(stateFor("Add an orders API endpoint"));

    const reviewed = await stages.review(drafted);

    expect(reviewed.plan.review).toEqual({
      status: "needs_revision",
      issues: ["Architecture plan is missing guardrails.", "Architecture plan is missing acceptance tests."],
      attempts: 1,
    });
    expect(nextStage("review", reviewed)).toBe("architecture");
  });

  it("names only the missing field", async () => {
    const stages = buildStages();
    const drafted = await stages.architecture(
      stateFor("Add an orders API endpoint", { guardrails: ["Feature flag the endpoint"] }),
    );

    const reviewed = await stages.review(drafted);

    expect(reviewed.plan.review.issues).toEqual(["Architecture plan is missing acceptance tests."]);
  });

  it("raises REVIEW_LIMIT when the rejection cap is reached", async () => {
    const stages = buildStages({ maxReviewAttempts: 1 });
    const drafted = await stages.architecture(stateFor("Add an orders API endpoint"));

    const error = await stages.review(drafted).catch((caught: unknown) => caught);

    expect(isVteamError(error) && error.code).toBe(VteamErrorCode.REVIEW_LIMIT);
  });

  it("refuses implementation planning before review approval", async () => {
    const stages = buildStages();

    await expect(stages.implementationPlanner(stateFor("Add export"))).rejects.toBeInstanceOf(PreconditionError);
  });

  it("runs the full workflow through a revision loop", async () => {
    const machine = buildMachine(buildStages());

    const final = await machine.run(stateFor("Add an orders API endpoint"));

    expect(final.checkpoints.map((checkpoint) => checkpoint.phase)).toEqual([
      "intake",
      "product_owner",
      "ui_ux_design",
      "architecture",
      "review",
      "architecture",
      "review",
      "lead_planning",
      "tech_lead",
      "implementation_planning",
      "phase_validation",
      "plan_summary",
      "code_review",
      "evaluation",
    ]);
    expect(final.plan.review).toEqual({ status: "approved", issues: [], attempts: 2 });
    expect(final.plan.architecture.guardrails).toEqual([
      "List telemetry and rollback guardrails before merging Add an orders API endpoint.",
    ]);
    expect(final.plan.lead?.role).toBe("backend_lead");
    expect(final.plan.phases.map((phase) => [phase.name, phase.owners])).toEqual([
      ["Backend API", ["backend_lead"]],
      ["Frontend Integration", ["frontend_lead"]],
      ["Validation", ["tech_lead"]],
    ]);
    expect(final.plan.phases[0].handoff).toEqual({
      path: "docs/handoff/backend.md",
      requiredSections: ["Build", "Tests"],
    });
    expect(final.plan.phases[1].handoff).toBeUndefined();
    expect(final.plan.phases[2].testPolicy).toBe("debugger");
    expect(final.metadata.codeReview).toEqual({ status: "approved", issues: [] });
    expect(final.metadata.evaluations[0].score).toBe(0.8);
    expect(final.attemptCounters.plan_review).toBe(2);
  });

  it("sends the session-init message once before the first lead dispatch", async () => {
    const machine = buildMachine(buildStages());

    await machine.run(stateFor("Add an orders API endpoint"));

    const lead = tool.requests.filter((request) => request.phase === "backend_lead");
    expect(lead).toHaveLength(2);
    expect(lead[0].instruction).toBe(workflow.roles.backend_lead.systemPrompt);
    expect(lead[0].sessionId).toBe(lead[1].sessionId);
  });

  it("loops phase validation through the reviewer until owners are filled", async () => {
    const machine = buildMachine(buildStages());

    const final = await machine.run(
      stateFor("Add export", {
        planOnly: true,
        guardrails: ["Flag it"],
        acceptanceTests: ["npm test passes"],
        phases: [{ name: "Ship", deliverables: ["Export button"] }],
      }),
    );

    expect(final.checkpoints.map((checkpoint) => `${checkpoint.phase}:${checkpoint.status}`)).toContain(
      "review:phase_revision",
    );
    expect(final.plan.phases[0].owners).toEqual(["researcher"]);
    expect(final.plan.phases[0].acceptanceTests).toEqual([
      workflow.implementation.checklist,
      "Scenario validation: scenarios/feature_request.yaml",
    ]);
    expect(final.plan.phaseReview).toEqual({ status: "clear", issues: [], attempts: 1 });
    expect(final.output).toBe(final.plan.summary);
    expect(final.workflowPhase).toBe("evaluation");
  });

  it("stops between stages once the signal is aborted", async () => {
    const controller = new AbortController();
    const stages = buildStages();
    const table: StageTable = {
      ...stages.table(execution),
      intake: async (state) => {
        controller.abort();
        return stages.intake(state);
      },
    };
    const machine = new PhaseStateMachine(table, { signal: controller.signal });

    const error = await machine.run(stateFor("Add export")).catch((caught: unknown) => caught);

    expect(isVteamError(error) && error.code).toBe(VteamErrorCode.CANCELLED);
    expect(tool.requests).toHaveLength(0);
  });
});
