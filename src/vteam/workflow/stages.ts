/**
 * Planning stages of the engineering workflow.
 *
 * Every stage clones the incoming state, seeds its part of the FeaturePlan
 * from the workflow document, and asks the coding tool to update the role's
 * planning document. Dispatch failures are recorded on the state and never
 * abort a stage.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { WorkflowSettings } from "../config/types.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { PreconditionError, VteamError, VteamErrorCode, errorMessage } from "../runtime/errors.js";
import type { PhaseInput } from "../runtime/scenario.js";
import type { Evaluation, PhasePlan, RunState, Stage, TestPolicy } from "../runtime/state.js";
import { cloneState, latestUserMessage } from "../runtime/state.js";
import type { CodingTool } from "../tools/coding-tool.js";
import type { SessionRegistry } from "../execution/sessions.js";
import type { RoleConfig, WorkflowConfig } from "./config.js";
import { renderTemplate } from "./config.js";
import { classifyOwners, selectLeadFromConfig } from "./roles.js";
import { chooseStack, dependencyMatrix, phaseBreakdown, riskMatrix } from "./planning-kit.js";
import { reviewAfterValidation, validatePhases } from "./validator.js";
import type { StageTable } from "./state-machine.js";

export interface WorkflowStageDeps {
  workflow: WorkflowConfig;
  settings: WorkflowSettings;
  /** Coding tool that edits the planning documents */
  tool: CodingTool;
  sessions: SessionRegistry;
  logger?: VteamLogger;
  now?: () => Date;
}

const DEFAULT_PHASES = [
  { name: "Design Hardening", focus: "Finalize architecture and docs for {request}." },
  { name: "Implementation", focus: "Land the services and telemetry for {request}." },
  { name: "Validation", focus: "Run scenarios and tests proving {request} works." },
];

const DEFAULT_TECH_LEAD_PHASES = [
  { name: "Design", focus: "Finalize prompts and docs" },
  { name: "Implementation", focus: "Land the workflow changes" },
];

const DEFAULT_ACCEPTANCE_TESTS = [
  "A scenario file exercises {request} end to end.",
  "The IO audit log records the workflow route with valid input and output.",
];

const DEFAULT_GUARDRAIL = "List the planning docs and telemetry guardrails before merging {request}.";

/** Words an output needs before it counts as complete */
const COMPLETENESS_WORDS = 30;

/** Owner for a phase with none, by position */
function defaultOwner(index: number, persona: string): string {
  if (index === 0) return persona;
  return index === 1 ? "tech_lead" : "ops";
}

function bulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

export class WorkflowStages {
  private readonly logger: VteamLogger;
  private readonly now: () => Date;

  constructor(private readonly deps: WorkflowStageDeps) {
    this.logger = deps.logger ?? createSilentLogger();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Stage table for the state machine, with the given execution stage
   */
  table(execution: Stage): StageTable {
    return {
      intake: this.intake,
      product_owner: this.productOwner,
      ui_ux_design: this.uiUxDesign,
      architecture: this.architecture,
      review: this.review,
      lead_planning: this.leadPlanning,
      tech_lead: this.techLead,
      implementation_planning: this.implementationPlanner,
      phase_validation: this.phaseValidation,
      plan_summary: this.planSummary,
      execution,
      code_review: this.codeReview,
      evaluation: this.evaluation,
    };
  }

  intake = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const plan = next.plan;
    plan.request = plan.request || latestUserMessage(next);
    const outputFiles: Record<string, string> = {};
    for (const [roleId, role] of Object.entries(this.deps.workflow.roles)) {
      if (role.outputFile) outputFiles[roleId] = role.outputFile;
    }
    plan.metadata.outputFiles = outputFiles;

    next.workflowPhase = "intake";
    next.messages.push({
      role: "system",
      content: `Workflow intake captured feature request: ${plan.request}`,
    });
    next.checkpoints.push({ phase: "intake", status: "captured" });
    this.logger.info("Workflow intake", { request: plan.request, stack: plan.metadata.stack });
    return next;
  };

  productOwner = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const sections = this.renderSections(next, "product_owner");
    const { request, persona } = this.values(next);
    next.plan.product = {
      problem: sections[0]?.content ?? `Users need ${request} without leaving their current workflow.`,
      successMetrics:
        sections.length > 1
          ? sections.slice(1).map((section) => `${section.title}: ${section.content}`)
          : [`The ${persona} persona completes ${request} end to end.`],
    };
    next.workflowPhase = "product_owner";
    await this.dispatchDoc(next, "product_owner");
    next.checkpoints.push({ phase: "product_owner", status: "drafted" });
    next.messages.push({
      role: "assistant",
      name: "product_owner",
      content: `Product brief drafted for '${request}'.`,
    });
    return next;
  };

  uiUxDesign = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const sections = this.renderSections(next, "ui_ux");
    const { request } = this.values(next);
    next.plan.uxFlows =
      sections.length > 0
        ? sections.map((section) => `${section.title}: ${section.content}`)
        : [`Primary flow: ${request}`];
    next.workflowPhase = "ui_ux_design";
    await this.dispatchDoc(next, "ui_ux");
    next.checkpoints.push({ phase: "ui_ux_design", status: "drafted" });
    return next;
  };

  architecture = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const role = this.role("architect");
    const values = this.values(next);
    const revision = next.plan.review.status === "needs_revision";
    const sections = this.renderSections(next, "architect");
    const byTitle = (title: string): string | undefined =>
      sections.find((section) => section.title.toLowerCase() === title)?.content;

    const arch = next.plan.architecture;
    arch.vision =
      byTitle("vision") ?? sections[0]?.content ?? `Define how ${values.request} fits ${values.stack}.`;
    arch.apiDesign = byTitle("api design") ?? "";
    arch.systemChanges = byTitle("system changes") ?? "";
    arch.risks = riskMatrix(values.request);

    const render = (text: string): string => renderTemplate(text, values);
    if (arch.guardrails.length === 0) {
      arch.guardrails = (next.context.guardrails ?? role.guardrails).map(render);
    }
    if (arch.acceptanceTests.length === 0) {
      arch.acceptanceTests = (next.context.acceptanceTests ?? role.acceptanceTests).map(render);
    }

    if (revision) {
      if (arch.guardrails.length === 0) {
        arch.guardrails = [render(role.corrections.guardrails ?? DEFAULT_GUARDRAIL)];
      }
      if (arch.acceptanceTests.length === 0) {
        const corrections = role.corrections.acceptanceTests;
        const tests = corrections.length > 0 ? corrections : DEFAULT_ACCEPTANCE_TESTS;
        arch.acceptanceTests = tests.map(render);
      }
    }

    next.workflowPhase = "architecture";
    await this.dispatchDoc(
      next,
      "architect",
      revision ? `Address the reviewer issues:\n${bulletList(next.plan.review.issues)}` : undefined,
    );
    next.checkpoints.push({ phase: "architecture", status: revision ? "revised" : "drafted" });
    next.messages.push({
      role: "assistant",
      name: "architect",
      content: `Architecture plan drafted for '${values.request}' covering ${Math.max(sections.length, 1)} sections.`,
    });
    return next;
  };

  /**
   * Architecture review. Also the loop target when phase validation asks for
   * a phase revision; the architecture verdict is kept in that case.
   */
  review = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const plan = next.plan;
    next.workflowPhase = "review";

    if (plan.phaseReview.status === "needs_review") {
      await this.dispatchDoc(
        next,
        "reviewer",
        `Fix the phase breakdown in ${this.outputFile("implementation_planner")}:\n` +
          bulletList(plan.phaseReview.issues),
      );
      next.checkpoints.push({
        phase: "review",
        status: "phase_revision",
        detail: plan.phaseReview.issues.join("; "),
      });
      return next;
    }

    const missing: string[] = [];
    if (plan.architecture.guardrails.length === 0) missing.push("guardrails");
    if (plan.architecture.acceptanceTests.length === 0) missing.push("acceptance tests");

    const attempts = (next.attemptCounters.plan_review ?? 0) + 1;
    next.attemptCounters.plan_review = attempts;

    if (missing.length === 0) {
      plan.review = { status: "approved", issues: [], attempts };
      next.checkpoints.push({ phase: "review", status: "approved" });
      next.messages.push({
        role: "assistant",
        name: "reviewer",
        content: "Plan reviewer approved the architecture.",
      });
      this.logger.info("Architecture approved", { attempts });
      return next;
    }

    const issues = missing.map((field) => `Architecture plan is missing ${field}.`);
    plan.review = { status: "needs_revision", issues, attempts };
    next.checkpoints.push({ phase: "review", status: "needs_revision", detail: missing.join(", ") });
    next.messages.push({
      role: "assistant",
      name: "reviewer",
      content: `Reviewer requested updates for: ${missing.join(", ")}.`,
    });
    this.logger.warn("Architecture needs revision", { attempts, missing });

    if (attempts >= this.deps.settings.maxReviewAttempts) {
      throw new VteamError(
        VteamErrorCode.REVIEW_LIMIT,
        `Architecture review rejected ${attempts} times (limit ${this.deps.settings.maxReviewAttempts})`,
        { issues },
      );
    }
    await this.dispatchDoc(next, "reviewer", `Add the missing items: ${missing.join(", ")}.`);
    return next;
  };

  leadPlanning = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const selection = selectLeadFromConfig(next.plan.request, this.deps.workflow);
    const role = this.deps.workflow.roles[selection.role];
    next.plan.lead = {
      role: selection.role,
      file: role?.outputFile,
      focus: role?.focus ? renderTemplate(role.focus, this.values(next)) : "",
    };
    next.workflowPhase = "lead_planning";
    await this.dispatchDoc(next, selection.role);
    next.checkpoints.push({ phase: "lead_planning", status: selection.role, detail: selection.keyword });
    this.logger.info("Lead selected", { role: selection.role, keyword: selection.keyword ?? null });
    return next;
  };

  techLead = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const role = this.role("tech_lead");
    const values = this.values(next);
    const phases = (role.phases.length > 0 ? role.phases : DEFAULT_TECH_LEAD_PHASES).map((phase) => ({
      name: phase.name,
      focus: renderTemplate(phase.focus, values),
    }));
    const implementation = {
      stackRecommendation: chooseStack(values.request, values.stack),
      phases,
      deliverables: phaseBreakdown(values.request, phases.map((phase) => phase.name)),
      dependencies: [...dependencyMatrix(values.request), ...role.dependencies],
    };
    next.plan.implementation = implementation;

    const lines = [
      `## Tech Lead Plan for ${values.request}`,
      role.intro,
      `- Stack guidance: ${implementation.stackRecommendation}`,
      "### Phases",
      ...implementation.deliverables.map((item) => `* ${item}`),
      "### Dependencies & Guardrails",
      ...implementation.dependencies.map((item) => `* ${item}`),
      "### Risks",
      ...next.plan.architecture.risks.map((item) => `* ${item}`),
    ];
    next.output = lines.filter((line) => line.trim()).join("\n");
    next.messages.push({ role: "assistant", name: "tech_lead", content: next.output });
    next.workflowPhase = "tech_lead";
    await this.dispatchDoc(next, "tech_lead");
    next.checkpoints.push({
      phase: "tech_lead",
      status: "planned",
      detail: phases.map((phase) => phase.name).join(", "),
    });
    return next;
  };

  implementationPlanner = async (state: RunState): Promise<RunState> => {
    if (state.plan.review.status !== "approved") {
      throw new PreconditionError("Implementation planner requires an approved review state.", {
        reviewStatus: state.plan.review.status,
      });
    }
    const next = cloneState(state);
    const revising = next.plan.phaseReview.status === "needs_review";
    const phases = revising
      ? next.plan.phases.map((phase, index) => this.fillGaps(next, phase, index))
      : this.initialPhases(next);

    next.plan.phases = phases.map((phase) => this.withHandoff(phase));
    next.workflowPhase = "implementation_planning";
    await this.dispatchDoc(
      next,
      "implementation_planner",
      revising ? `Resolve:\n${bulletList(next.plan.phaseReview.issues)}` : undefined,
    );
    next.checkpoints.push({
      phase: "implementation_planning",
      status: revising ? "revised" : "planned",
      detail: next.plan.phases.map((phase) => phase.name).join(", "),
    });
    next.messages.push({
      role: "assistant",
      name: "implementation_planner",
      content:
        "Implementation planner created phase breakdown:\n" +
        next.plan.phases
          .map((phase) => `- ${phase.name} (owner: ${phase.owners.join(", ") || "unassigned"})`)
          .join("\n"),
    });
    return next;
  };

  phaseValidation = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const validation = validatePhases(next.plan.phases);
    next.plan.phases = validation.phases;
    next.plan.phaseReview = reviewAfterValidation(next.plan.phaseReview, validation);
    next.workflowPhase = "phase_validation";

    const review = next.plan.phaseReview;
    if (review.status === "needs_review") {
      next.attemptCounters.phase_review = review.attempts;
      next.checkpoints.push({
        phase: "phase_validation",
        status: "needs_review",
        detail: review.issues.join("; "),
      });
      this.logger.warn("Phase validation flagged issues", { issues: review.issues });
      if (review.attempts >= this.deps.settings.maxPhaseReviewAttempts) {
        throw new VteamError(
          VteamErrorCode.REVIEW_LIMIT,
          `Phase validation failed ${review.attempts} times (limit ${this.deps.settings.maxPhaseReviewAttempts})`,
          { issues: review.issues },
        );
      }
      return next;
    }
    next.checkpoints.push({ phase: "phase_validation", status: "ok" });
    return next;
  };

  planSummary = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const plan = next.plan;
    const lines = [`# Plan: ${plan.request}`];
    if (plan.lead) lines.push(`Lead: ${plan.lead.role}`);
    lines.push(`Stack: ${plan.metadata.stack}`, "", "## Phases");
    plan.phases.forEach((phase, index) => {
      lines.push(`### Phase ${index + 1} – ${phase.name} (owner: ${phase.owners.join(", ")})`);
      lines.push(...phase.deliverables.map((item) => `- Deliverable: ${item}`));
      lines.push(...phase.acceptanceTests.map((item) => `- Acceptance: ${item}`));
    });
    if (plan.architecture.guardrails.length > 0) {
      lines.push("", "## Guardrails", bulletList(plan.architecture.guardrails));
    }
    plan.summary = lines.join("\n");
    if (next.context.planOnly) {
      next.output = plan.summary;
    }
    next.workflowPhase = "plan_summary";
    next.checkpoints.push({ phase: "plan_summary", status: next.context.planOnly ? "plan_only" : "ready" });
    return next;
  };

  codeReview = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const issues: string[] = [];
    next.plan.phases.forEach((phase, index) => {
      const name = phase.name || `Phase ${index + 1}`;
      if (phase.owners.length === 0) issues.push(`${name}: missing owners`);
      if (phase.acceptanceTests.length === 0) issues.push(`${name}: missing acceptance tests`);
      if (phase.deliverables.length === 0) issues.push(`${name}: no deliverables listed`);
    });
    const status = issues.length > 0 ? "changes_requested" : "approved";
    next.metadata.codeReview = { status, issues };
    next.messages.push({
      role: "assistant",
      name: "code_review",
      content:
        issues.length > 0
          ? `Code review flagged issues:\n${bulletList(issues)}`
          : "Code review approved all phases.",
    });
    next.workflowPhase = "code_review";
    next.checkpoints.push({ phase: "code_review", status });
    return next;
  };

  evaluation = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const grounding = Math.min(1, next.artifacts.length / 3);
    const words = next.output.split(/\s+/).filter(Boolean).length;
    const completeness = words > COMPLETENESS_WORDS ? 1 : 0.5;
    const evaluation: Evaluation = {
      timestamp: this.now().toISOString(),
      route: next.route,
      grounding,
      completeness,
      score: Math.round((grounding * 0.6 + completeness * 0.4) * 1000) / 1000,
    };
    next.metadata.evaluations.push(evaluation);
    if (evaluation.score < this.deps.settings.evaluationThreshold) {
      next.metadata.routerFeedback = "increase_graph_weight";
    }
    next.workflowPhase = "evaluation";
    next.checkpoints.push({ phase: "evaluation", status: evaluation.score.toFixed(3) });
    await this.persistEvaluation(evaluation);
    return next;
  };

  private async persistEvaluation(evaluation: Evaluation): Promise<void> {
    const target = this.deps.settings.evaluationsPath;
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.appendFile(target, JSON.stringify(evaluation) + "\n", "utf-8");
    } catch (error) {
      this.logger.warn("Failed to persist evaluation", { error: errorMessage(error) });
    }
  }

  private initialPhases(state: RunState): PhasePlan[] {
    const values = this.values(state);
    const overrides = state.context.phaseOwners;
    if (state.context.phases && state.context.phases.length > 0) {
      return state.context.phases.map((input) => this.fromInput(input, overrides));
    }

    const implementation = this.deps.workflow.implementation;
    const configured = this.role("tech_lead").phases;
    const sources: Array<{ name: string; focus: string; owners: string[]; testPolicy: TestPolicy }> =
      configured.length > 0
        ? configured
        : DEFAULT_PHASES.map((phase) => ({ ...phase, owners: [], testPolicy: "default" as const }));

    return sources.map((source, index) => {
      const override = overrides[source.name];
      const owners = override
        ? [override]
        : source.owners.length > 0
          ? [...source.owners]
          : [defaultOwner(index, values.persona)];
      const focus = renderTemplate(source.focus, values);
      return {
        name: source.name,
        owners,
        deliverables: [focus, implementation.phaseTemplate, implementation.dependencies].filter(Boolean),
        acceptanceTests: this.defaultAcceptance(state),
        focus,
        testPolicy: source.testPolicy,
      };
    });
  }

  private fromInput(input: PhaseInput, overrides: Record<string, string>): PhasePlan {
    const override = overrides[input.name];
    return {
      name: input.name,
      owners: override ? [override] : [...input.owners],
      deliverables: [...input.deliverables],
      acceptanceTests: [...input.acceptanceTests],
      focus: input.focus,
      testPolicy: input.testPolicy,
    };
  }

  private fillGaps(state: RunState, phase: PhasePlan, index: number): PhasePlan {
    return {
      ...phase,
      owners: phase.owners.length > 0 ? phase.owners : [defaultOwner(index, this.values(state).persona)],
      acceptanceTests: phase.acceptanceTests.length > 0 ? phase.acceptanceTests : this.defaultAcceptance(state),
      deliverables:
        phase.deliverables.length > 0 ? phase.deliverables : [this.deps.workflow.implementation.phaseTemplate],
    };
  }

  private defaultAcceptance(state: RunState): string[] {
    const scenario = state.context.scenarioId ?? "feature_request";
    return [this.deps.workflow.implementation.checklist, `Scenario validation: scenarios/${scenario}.yaml`];
  }

  private withHandoff(phase: PhasePlan): PhasePlan {
    if (classifyOwners(phase.owners) !== "backend") {
      return { ...phase, handoff: undefined };
    }
    const handoff = this.deps.workflow.handoff;
    return { ...phase, handoff: { path: handoff.reportPath, requiredSections: [...handoff.requiredSections] } };
  }

  private values(state: RunState): { request: string; persona: string; stack: string } {
    return {
      request: state.plan.request,
      persona: state.plan.metadata.persona,
      stack: state.plan.metadata.stack,
    };
  }

  private role(roleId: string): RoleConfig {
    const role = this.deps.workflow.roles[roleId];
    if (!role) {
      throw new VteamError(VteamErrorCode.CONFIG_INVALID, `Workflow document has no '${roleId}' role`);
    }
    return role;
  }

  private outputFile(roleId: string): string {
    return this.deps.workflow.roles[roleId]?.outputFile ?? "the plan";
  }

  private renderSections(state: RunState, roleId: string): Array<{ title: string; content: string }> {
    const role = this.deps.workflow.roles[roleId];
    if (!role) return [];
    const values = this.values(state);
    return role.sections.map((section) => ({
      title: section.title,
      content: renderTemplate(section.template, values),
    }));
  }

  /**
   * Ask the coding tool to update the role's planning document. Roles
   * without an output file are skipped.
   */
  private async dispatchDoc(state: RunState, roleId: string, extra?: string): Promise<void> {
    const role = this.deps.workflow.roles[roleId];
    if (!role?.outputFile) return;

    const values = this.values(state);
    const parts = [renderTemplate(role.prompt, values), `Update ${role.outputFile} in place.`];
    if (extra) parts.push(extra);
    if (state.plan.metadata.contextBundle) parts.push(state.plan.metadata.contextBundle);
    const instruction = parts.filter(Boolean).join("\n\n");

    const session = await this.deps.sessions.acquire(roleId);
    const base = {
      repoPath: state.plan.metadata.repoPath,
      branch: state.plan.metadata.targetBranch,
      sessionId: session.sessionId,
      sessionName: session.sessionName,
      phase: roleId,
      dryRun: state.context.dryRun,
    };

    if (role.systemPrompt && !session.initialized) {
      const init = await this.deps.tool.dispatch({ ...base, instruction: role.systemPrompt });
      state.metadata.dispatches.push({
        tool: this.deps.tool.name,
        instruction: role.systemPrompt,
        result: init.text,
      });
      await this.deps.sessions.markInitialized(roleId);
    }

    const outcome = await this.deps.tool.dispatch({ ...base, instruction });
    state.metadata.dispatches.push({ tool: this.deps.tool.name, instruction, result: outcome.text });
    state.artifacts.push({ kind: "document", ref: role.outputFile });
    if (!outcome.ok) {
      this.logger.warn(`Doc update for ${roleId} did not succeed`, { result: outcome.text });
    }
  }
}
