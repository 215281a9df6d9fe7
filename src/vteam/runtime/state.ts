/**
 * Run state threaded through every stage. Stages receive a state and return
 * a new one; nothing else is shared between them.
 */

import type { RouteName } from "../config/types.js";
import type { LeadRole } from "../workflow/config.js";
import type { ScoredMemory } from "../memory/temporal.js";
import type { RunFlags, ScenarioInput } from "./scenario.js";

export type WorkflowPhase =
  | "intake"
  | "product_owner"
  | "ui_ux_design"
  | "architecture"
  | "review"
  | "lead_planning"
  | "tech_lead"
  | "implementation_planning"
  | "phase_validation"
  | "plan_summary"
  | "execution"
  | "code_review"
  | "evaluation";

export interface Message {
  role: "user" | "assistant" | "system";
  content: string;
  name?: string;
}

export type TestPolicy = "default" | "debugger";

export interface HandoffRequirement {
  path: string;
  requiredSections: string[];
}

export interface PhasePlan {
  name: string;
  owners: string[];
  deliverables: string[];
  acceptanceTests: string[];
  focus?: string;
  testPolicy: TestPolicy;
  /** Present on phases that must publish a handoff report */
  handoff?: HandoffRequirement;
}

export type ReviewStatus = "pending" | "approved" | "needs_revision";

export interface ReviewState {
  status: ReviewStatus;
  issues: string[];
  attempts: number;
}

export interface PhaseReviewState {
  status: "clear" | "needs_review";
  issues: string[];
  attempts: number;
}

export interface ArchitecturePlan {
  vision: string;
  systemChanges: string;
  apiDesign: string;
  guardrails: string[];
  acceptanceTests: string[];
  risks: string[];
}

export interface LeadPlan {
  role: LeadRole;
  file?: string;
  focus: string;
}

export interface ImplementationPlan {
  stackRecommendation: string;
  phases: Array<{ name: string; focus: string }>;
  deliverables: string[];
  dependencies: string[];
}

export interface PlanMetadata {
  persona: string;
  stack: string;
  repoPath?: string;
  targetBranch?: string;
  workflowMode: "plan_only" | "full";
  /** Role id -> planning document that role's dispatch edits */
  outputFiles: Record<string, string>;
  workstreamId?: string;
  contextBundle?: string;
}

export interface FeaturePlan {
  request: string;
  metadata: PlanMetadata;
  product: { problem: string; successMetrics: string[] };
  uxFlows: string[];
  architecture: ArchitecturePlan;
  review: ReviewState;
  phaseReview: PhaseReviewState;
  lead?: LeadPlan;
  implementation?: ImplementationPlan;
  phases: PhasePlan[];
  summary: string;
}

export interface Checkpoint {
  phase: string;
  status: string;
  owners?: string[];
  detail?: string;
}

export interface ToolCallRecord {
  tool: string;
  instruction: string;
  result: string;
}

export type PhaseStatus = "completed" | "failed" | "blocked" | "skipped";

export type HandoffStatus = "ready" | "incomplete" | "missing" | "not_required";

export interface PhaseExecutionRecord {
  phaseName: string;
  owners: string[];
  session: { id: string; name: string };
  toolCalls: ToolCallRecord[];
  handoffStatus: HandoffStatus;
  status: PhaseStatus;
  debugAttempts: number;
  goldenRule?: string;
  summary: string;
}

export interface Telemetry {
  latencyS: number;
  costEstimateUsd: number;
  tokens: number;
  lastStage?: string;
}

export interface Evaluation {
  timestamp: string;
  route?: RouteName;
  grounding: number;
  completeness: number;
  score: number;
}

export interface RunMetadata {
  routeHistory: RouteName[];
  /** Persona currently answering; the handoff route switches it */
  agent?: string;
  routerReason?: string;
  routerScores?: Partial<Record<RouteName, number>>;
  telemetry: Telemetry;
  modelPolicy?: string;
  codeReview?: { status: "approved" | "changes_requested"; issues: string[] };
  evaluations: Evaluation[];
  routerFeedback?: string;
  execution?: {
    records: PhaseExecutionRecord[];
    backendHandoffReady: boolean;
  };
  retrievedMemories: ScoredMemory[];
  /** Documentation-update dispatches made by planning stages */
  dispatches: ToolCallRecord[];
}

export interface Artifact {
  kind: "document" | "memory" | "report";
  ref: string;
}

export interface RunState {
  messages: Message[];
  context: RunFlags;
  metadata: RunMetadata;
  plan: FeaturePlan;
  checkpoints: Checkpoint[];
  /** phase key -> review attempts so far */
  attemptCounters: Record<string, number>;
  artifacts: Artifact[];
  workflowPhase?: WorkflowPhase;
  route?: RouteName;
  output: string;
}

/**
 * A pipeline stage: takes the current state, returns the next one
 */
export type Stage = (state: RunState) => Promise<RunState>;

export function cloneState(state: RunState): RunState {
  return structuredClone(state);
}

/**
 * Fresh plan for a request; stages fill it in
 */
export function createFeaturePlan(request: string, flags: RunFlags): FeaturePlan {
  return {
    request,
    metadata: {
      persona: flags.persona ?? "researcher",
      stack: flags.stack ?? "typescript",
      repoPath: flags.repoPath,
      targetBranch: flags.targetBranch,
      workflowMode: flags.planOnly ? "plan_only" : "full",
      outputFiles: {},
      workstreamId: flags.workstreamId,
    },
    product: { problem: "", successMetrics: [] },
    uxFlows: [],
    architecture: {
      vision: "",
      systemChanges: "",
      apiDesign: "",
      guardrails: [],
      acceptanceTests: [],
      risks: [],
    },
    review: { status: "pending", issues: [], attempts: 0 },
    phaseReview: { status: "clear", issues: [], attempts: 0 },
    phases: [],
    summary: "",
  };
}

/**
 * Initial state for a scenario
 */
export function createInitialState(scenario: ScenarioInput): RunState {
  const flags = scenario.context;
  const request = flags.featureRequest ?? scenario.prompt;
  return {
    messages: [{ role: "user", content: scenario.prompt }],
    context: flags,
    metadata: {
      routeHistory: [],
      telemetry: { latencyS: 0, costEstimateUsd: 0, tokens: 0 },
      evaluations: [],
      retrievedMemories: [],
      dispatches: [],
    },
    plan: createFeaturePlan(request, flags),
    checkpoints: [],
    attemptCounters: {},
    artifacts: [],
    output: "",
  };
}

/**
 * Latest user message, or empty string
 */
export function latestUserMessage(state: RunState): string {
  for (let i = state.messages.length - 1; i >= 0; i--) {
    const message = state.messages[i];
    if (message.role === "user") return message.content;
  }
  return "";
}
