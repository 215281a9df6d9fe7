/**
 * Phase state machine: sequences the planning roles, the approval gates and
 * the execution stage.
 *
 * intake → product_owner → ui_ux_design → architecture → review
 *   review: architecture_revision → architecture
 *           phase_revision → implementation_planning
 *           approved → lead_planning → tech_lead → implementation_planning
 * implementation_planning → phase_validation
 *   phase_validation: needs_review → review, ok → plan_summary
 * plan_summary → execution (skipped when planning only) → code_review → evaluation
 */

import type { FeaturePlan, RunState, Stage } from "../runtime/state.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { StructuralError, VteamError, VteamErrorCode } from "../runtime/errors.js";
import { branch as validationBranch } from "./validator.js";

export const STAGE_NAMES = [
  "intake",
  "product_owner",
  "ui_ux_design",
  "architecture",
  "review",
  "lead_planning",
  "tech_lead",
  "implementation_planning",
  "phase_validation",
  "plan_summary",
  "execution",
  "code_review",
  "evaluation",
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export type StageTable = Record<StageName, Stage>;

export type ReviewBranch = "phase_revision" | "architecture_revision" | "approved";

/** Stage transitions allowed before the run is treated as looping */
const MAX_TRANSITIONS = 64;

/**
 * Where the review gate sends the run. A pending phase review wins over
 * the architecture verdict.
 */
export function reviewBranch(plan: FeaturePlan): ReviewBranch {
  if (plan.phaseReview.status === "needs_review") return "phase_revision";
  return plan.review.status === "approved" ? "approved" : "architecture_revision";
}

/**
 * Stage that follows `current`, or null when the workflow is finished
 */
export function nextStage(current: StageName, state: RunState): StageName | null {
  switch (current) {
    case "intake":
      return "product_owner";
    case "product_owner":
      return "ui_ux_design";
    case "ui_ux_design":
      return "architecture";
    case "architecture":
      return "review";
    case "review": {
      const decision = reviewBranch(state.plan);
      if (decision === "phase_revision") return "implementation_planning";
      return decision === "approved" ? "lead_planning" : "architecture";
    }
    case "lead_planning":
      return "tech_lead";
    case "tech_lead":
      return "implementation_planning";
    case "implementation_planning":
      return "phase_validation";
    case "phase_validation":
      return validationBranch(state.plan.phaseReview) === "ok" ? "plan_summary" : "review";
    case "plan_summary":
      return state.context.planOnly ? "code_review" : "execution";
    case "execution":
      return "code_review";
    case "code_review":
      return "evaluation";
    case "evaluation":
      return null;
  }
}

export interface PhaseStateMachineOptions {
  logger?: VteamLogger;
  /** Checked between stages */
  signal?: AbortSignal;
  /** Applied to every stage, e.g. cost accounting */
  wrap?: (name: StageName, stage: Stage) => Stage;
}

export class PhaseStateMachine {
  private readonly logger: VteamLogger;
  private readonly stages: StageTable;

  constructor(
    stages: StageTable,
    private readonly options: PhaseStateMachineOptions = {},
  ) {
    this.logger = options.logger ?? createSilentLogger();
    const wrap = options.wrap;
    const wrapped: Partial<StageTable> = {};
    for (const name of STAGE_NAMES) {
      wrapped[name] = wrap ? wrap(name, stages[name]) : stages[name];
    }
    this.stages = { ...stages, ...wrapped };
  }

  /**
   * Run from `start` until the workflow finishes
   */
  async run(initial: RunState, start: StageName = "intake"): Promise<RunState> {
    let state = initial;
    let current: StageName | null = start;
    let transitions = 0;

    while (current) {
      if (this.options.signal?.aborted) {
        throw new VteamError(VteamErrorCode.CANCELLED, `Run cancelled before stage ${current}`);
      }
      if (++transitions > MAX_TRANSITIONS) {
        throw new StructuralError(`Workflow exceeded ${MAX_TRANSITIONS} stage transitions`, {
          stage: current,
        });
      }

      const started = Date.now();
      state = await this.stages[current](state);
      this.logger.stage(current, Date.now() - started, { workflowPhase: state.workflowPhase });

      const following = nextStage(current, state);
      state = {
        ...state,
        attemptCounters: {
          ...state.attemptCounters,
          [`stage:${current}`]: (state.attemptCounters[`stage:${current}`] ?? 0) + 1,
        },
      };
      this.logger.debug("Workflow transition", { from: current, to: following ?? "done" });
      current = following;
    }
    return state;
  }
}
