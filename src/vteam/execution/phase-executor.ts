/**
 * Phase executor: runs approved phases against a repository through the
 * coding tool.
 *
 * Phases run strictly in plan order. Frontend phases wait for the backend
 * handoff report, failed phases are recorded and the run moves on, and a
 * phase flagged for the debugger gets at most one debug round.
 */

import type { ContextKey, ContextStore } from "../context/store.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { VteamError, VteamErrorCode, errorMessage } from "../runtime/errors.js";
import type {
  Checkpoint,
  HandoffStatus,
  PhaseExecutionRecord,
  PhasePlan,
  PhaseStatus,
  RunState,
  ToolCallRecord,
} from "../runtime/state.js";
import { cloneState } from "../runtime/state.js";
import type { CodingTool, DispatchOutcome, DispatchRequest } from "../tools/coding-tool.js";
import type { WorkflowConfig } from "../workflow/config.js";
import { classifyOwners } from "../workflow/roles.js";
import type { RunCheckpointStore } from "./checkpoints.js";
import type { CommandRunLog } from "./command-runs.js";
import type { GoldenRuleDistiller } from "./golden-rule.js";
import { errorSignature, evaluateReport, readReport, type HandoffEvaluation } from "./handoff.js";
import type { SessionRegistry } from "./sessions.js";
import type { RepoPreparer } from "./workspace.js";

/** Debug rounds allowed per phase within one run */
export const MAX_DEBUG_ATTEMPTS = 1;

export interface PhaseExecutorDeps {
  workflow: WorkflowConfig;
  tool: CodingTool;
  /** Advisor that may only write the suggestions file */
  debugTool: CodingTool;
  preparer: RepoPreparer;
  sessions: SessionRegistry;
  commandRuns: CommandRunLog;
  goldenRules: GoldenRuleDistiller;
  /** Shared phase records from earlier runs on the workstream */
  contextStore?: ContextStore;
  contextKey?: ContextKey;
  /** Per-thread phase records, saved after every phase and read on resume */
  checkpoints?: RunCheckpointStore;
  threadId?: string;
  runId?: string;
  logger?: VteamLogger;
  signal?: AbortSignal;
}

interface PhaseRun {
  phase: PhasePlan;
  repoPath?: string;
  branch?: string;
  session: { id: string; name: string };
  dryRun: boolean;
  toolCalls: ToolCallRecord[];
}

/**
 * Success for phases without a handoff report: a clean exit and no error text
 */
export function outputLooksSuccessful(text: string): boolean {
  return /\bexit=0\b/.test(text) && !/error|timed out/i.test(text);
}

function bulletList(title: string, items: readonly string[]): string[] {
  return items.length > 0 ? [`${title}:`, ...items.map((item) => `- ${item}`)] : [];
}

export class PhaseExecutor {
  private readonly logger: VteamLogger;

  constructor(private readonly deps: PhaseExecutorDeps) {
    this.logger = deps.logger ?? createSilentLogger();
  }

  /**
   * Execution stage of the workflow
   */
  run = async (state: RunState): Promise<RunState> => {
    const next = cloneState(state);
    const flags = next.context;
    const phases = next.plan.phases;

    const workspace = await this.deps.preparer.prepare({
      repoPath: next.plan.metadata.repoPath,
      repoUrl: flags.repoUrl,
      branch: next.plan.metadata.targetBranch,
    });
    for (const line of workspace?.log ?? []) {
      this.logger.info(line);
    }
    const repoPath = workspace?.path;
    const branch = next.plan.metadata.targetBranch;

    const prior = flags.resume ? await this.loadPriorRecords(next) : new Map<string, PhaseExecutionRecord>();
    const backendPhases = phases.filter((phase) => classifyOwners(phase.owners) === "backend");
    const records: PhaseExecutionRecord[] = [];
    const checkpoints: Checkpoint[] = [];
    const backendReady = (): boolean =>
      backendPhases.every(
        (phase) => records.find((record) => record.phaseName === phase.name)?.handoffStatus === "ready",
      );

    for (const phase of phases) {
      if (this.deps.signal?.aborted) {
        throw new VteamError(VteamErrorCode.CANCELLED, `Run cancelled before phase ${phase.name}`);
      }

      const side = classifyOwners(phase.owners);
      const previous = prior.get(phase.name);
      let record: PhaseExecutionRecord;
      let detail: string | undefined;

      if (previous?.status === "completed" && !flags.forceRerun) {
        detail = "resumed";
        record = { ...previous, summary: `${phase.name}: completed in an earlier run; not re-dispatched.` };
      } else if (side === "frontend" && backendPhases.length > 0 && !backendReady()) {
        const session = this.deps.sessions.identify(phase.name);
        record = {
          phaseName: phase.name,
          owners: phase.owners,
          session: { id: session.sessionId, name: session.sessionName },
          toolCalls: [],
          handoffStatus: "not_required",
          status: "blocked",
          debugAttempts: 0,
          summary: `${phase.name}: blocked until the backend handoff report is ready.`,
        };
        this.logger.warn("Frontend phase blocked by backend handoff", { phase: phase.name });
      } else {
        record = await this.executePhase(next, phase, repoPath, branch);
      }

      const checkpoint: Checkpoint = { phase: phase.name, owners: phase.owners, status: record.status, detail };
      records.push(record);
      checkpoints.push(checkpoint);
      next.checkpoints.push(checkpoint);
      if (record.handoffStatus === "ready" && phase.handoff) {
        next.artifacts.push({ kind: "report", ref: phase.handoff.path });
      }
      await this.saveCheckpoint(records, checkpoints);
    }

    next.metadata.execution = { records, backendHandoffReady: backendReady() };
    next.output = ["Execution summary:", ...records.map((record) => `- ${record.summary}`)].join("\n");
    next.workflowPhase = "execution";
    await this.saveRecords(records);
    return next;
  };

  private async executePhase(
    state: RunState,
    phase: PhasePlan,
    repoPath: string | undefined,
    branch: string | undefined,
  ): Promise<PhaseExecutionRecord> {
    const session = await this.openSession(state, phase, repoPath, branch);
    const run: PhaseRun = {
      phase,
      repoPath,
      branch,
      session: { id: session.id, name: session.name },
      dryRun: state.context.dryRun,
      toolCalls: [],
    };
    if (session.initMessage) {
      await this.dispatch(run, this.deps.tool, session.initMessage);
    }

    const instruction = await this.buildInstruction(state, phase, repoPath);
    const first = await this.dispatch(run, this.deps.tool, instruction);

    if (run.dryRun) {
      return this.finish(run, "skipped", phase.handoff ? "missing" : "not_required", 0, undefined, "dry run");
    }

    let check = await this.checkPhase(run, first);
    if (phase.handoff && check.evaluation && check.evaluation.missingSections.length > 0) {
      const missing = check.evaluation.missingSections.map((name) => `## ${name}`).join(", ");
      const followUp = await this.dispatch(
        run,
        this.deps.tool,
        `Complete the handoff report ${phase.handoff.path}. Missing sections: ${missing}. ` +
          "Each section needs a Command block, a Result block and the workdir.",
      );
      check = await this.checkPhase(run, followUp);
    }

    let debugAttempts = 0;
    let goldenRule: string | undefined;
    if (!check.success && phase.testPolicy === "debugger" && debugAttempts < MAX_DEBUG_ATTEMPTS) {
      debugAttempts++;
      const failure = check.signature;
      const applied = await this.debugRound(run, failure);
      check = await this.checkPhase(run, applied);
      if (check.success && repoPath) {
        goldenRule = await this.deps.goldenRules.distill({
          repoPath,
          phase: phase.name,
          failureSignature: failure,
          fix: applied.text.slice(0, 400),
          branch,
          sessionId: run.session.id,
          sessionName: run.session.name,
        });
      }
    }

    if (phase.handoff && repoPath && check.evaluation && check.evaluation.commands.length > 0) {
      await this.deps.commandRuns.append(
        {
          repoPath,
          branch,
          phase: phase.name,
          sessionId: run.session.id,
          sessionName: run.session.name,
          reportPath: phase.handoff.path,
        },
        check.evaluation.commands,
      );
    }

    const handoffStatus: HandoffStatus = check.evaluation?.status ?? "not_required";
    return this.finish(run, check.success ? "completed" : "failed", handoffStatus, debugAttempts, goldenRule);
  }

  /**
   * Advisor writes suggestions, then the primary tool applies them
   */
  private async debugRound(run: PhaseRun, failure: string): Promise<DispatchOutcome> {
    const suggestions = this.deps.workflow.debug.suggestionsPath;
    await this.dispatch(
      run,
      this.deps.debugTool,
      [
        `Diagnose the failing phase "${run.phase.name}".`,
        `Failure: ${failure}`,
        `Write your suggestions to ${suggestions} only. Do not edit any other file.`,
      ].join("\n"),
    );
    return this.dispatch(
      run,
      this.deps.tool,
      `Apply the suggestions in ${suggestions}, then re-run the acceptance tests for "${run.phase.name}".`,
    );
  }

  private async checkPhase(
    run: PhaseRun,
    outcome: DispatchOutcome,
  ): Promise<{ success: boolean; evaluation?: HandoffEvaluation; signature: string }> {
    const handoff = run.phase.handoff;
    if (!handoff) {
      const success = outputLooksSuccessful(outcome.text);
      return { success, signature: errorSignature(outcome.text) ?? outcome.text.slice(0, 240) };
    }

    const report = run.repoPath ? await readReport(run.repoPath, handoff.path) : null;
    const evaluation = evaluateReport(report, handoff.requiredSections);
    const failed = evaluation.failed[0];
    const signature =
      failed?.errorSignature ??
      (evaluation.missingSections.length > 0
        ? `handoff report ${handoff.path} missing ${evaluation.missingSections.join(", ")}`
        : outcome.text.slice(0, 240));
    return { success: evaluation.status === "ready", evaluation, signature };
  }

  private async openSession(
    state: RunState,
    phase: PhasePlan,
    repoPath: string | undefined,
    branch: string | undefined,
  ): Promise<{ id: string; name: string; initMessage?: string }> {
    const info = await this.deps.sessions.acquire(phase.name);
    const systemPrompt = phase.owners
      .map((owner) => this.deps.workflow.roles[owner]?.systemPrompt)
      .find((prompt): prompt is string => Boolean(prompt));
    if (!systemPrompt || info.initialized) {
      return { id: info.sessionId, name: info.sessionName };
    }
    await this.deps.sessions.markInitialized(phase.name);
    const context = [
      systemPrompt,
      `Feature request: ${state.plan.request}`,
      `Repository: ${repoPath ?? "unspecified"} (branch ${branch ?? "current"})`,
    ].join("\n");
    return { id: info.sessionId, name: info.sessionName, initMessage: context };
  }

  private async buildInstruction(state: RunState, phase: PhasePlan, repoPath: string | undefined): Promise<string> {
    const lines = [
      `Feature request: ${state.plan.request}`,
      `Phase: ${phase.name} (owners: ${phase.owners.join(", ")})`,
    ];
    if (phase.focus) lines.push(`Focus: ${phase.focus}`);
    lines.push(...bulletList("Deliverables", phase.deliverables));
    lines.push(...bulletList("Acceptance tests", phase.acceptanceTests));
    if (phase.handoff) {
      lines.push(
        `Handoff report: write ${phase.handoff.path} with sections ` +
          phase.handoff.requiredSections.map((name) => `## ${name}`).join(", ") +
          "; under each, a fenced Command block, a fenced Result block and workdir: `<path>`.",
      );
    }

    if (repoPath) {
      const query = `${phase.name} ${state.plan.request}`;
      const [rules, hints] = await Promise.all([
        this.deps.goldenRules.forRepo(repoPath, query),
        this.deps.commandRuns.loadHints(repoPath, phase.name),
      ]);
      lines.push(...bulletList("Golden rules for this repository", rules));
      lines.push(...bulletList("Command hints", hints));
    }
    if (state.plan.metadata.contextBundle) {
      lines.push("", state.plan.metadata.contextBundle);
    }
    return lines.join("\n");
  }

  private async dispatch(run: PhaseRun, tool: CodingTool, instruction: string): Promise<DispatchOutcome> {
    const request: DispatchRequest = {
      instruction,
      repoPath: run.repoPath,
      branch: run.branch,
      sessionId: run.session.id,
      sessionName: run.session.name,
      phase: run.phase.name,
      dryRun: run.dryRun,
    };
    const outcome = await tool.dispatch(request);
    run.toolCalls.push({ tool: tool.name, instruction, result: outcome.text });
    return outcome;
  }

  private finish(
    run: PhaseRun,
    status: PhaseStatus,
    handoffStatus: HandoffStatus,
    debugAttempts: number,
    goldenRule?: string,
    note?: string,
  ): PhaseExecutionRecord {
    const parts = [`${run.phase.name}: ${status}`];
    if (run.phase.handoff) parts.push(`handoff ${handoffStatus}`);
    if (debugAttempts > 0) parts.push(`debug attempts ${debugAttempts}`);
    if (note) parts.push(note);
    this.logger.info("Phase finished", { phase: run.phase.name, status, handoffStatus });
    return {
      phaseName: run.phase.name,
      owners: run.phase.owners,
      session: run.session,
      toolCalls: run.toolCalls,
      handoffStatus,
      status,
      debugAttempts,
      goldenRule,
      summary: parts.join("; "),
    };
  }

  /**
   * Phase records from the shared context store, then the thread's
   * checkpoint file, then checkpoints already in this state; later sources win
   */
  private async loadPriorRecords(state: RunState): Promise<Map<string, PhaseExecutionRecord>> {
    const prior = new Map<string, PhaseExecutionRecord>();
    const { contextStore, contextKey, checkpoints, threadId } = this.deps;
    if (contextStore && contextKey) {
      const entry = await contextStore.get("implementation", contextKey);
      for (const record of entry?.phaseRecords ?? []) {
        prior.set(record.phaseName, record);
      }
    }
    if (checkpoints && threadId) {
      for (const record of await checkpoints.records(threadId)) {
        prior.set(record.phaseName, record);
      }
    }
    for (const record of state.metadata.execution?.records ?? []) {
      prior.set(record.phaseName, record);
    }
    return prior;
  }

  private async saveCheckpoint(records: PhaseExecutionRecord[], checkpoints: Checkpoint[]): Promise<void> {
    const { checkpoints: store, threadId, runId } = this.deps;
    if (!store || !threadId) return;
    try {
      await store.save({ threadId, runId, updatedAt: new Date().toISOString(), records, checkpoints });
    } catch (error) {
      this.logger.warn("Failed to save phase checkpoint", { error: errorMessage(error) });
    }
  }

  private async saveRecords(records: PhaseExecutionRecord[]): Promise<void> {
    const { contextStore, contextKey } = this.deps;
    if (!contextStore || !contextKey) return;
    try {
      await contextStore.update("implementation", contextKey, (entry) => ({ ...entry, phaseRecords: records }));
    } catch (error) {
      this.logger.warn("Failed to save phase records", { error: errorMessage(error) });
    }
  }
}
