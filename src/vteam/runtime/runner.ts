/**
 * Scenario runner: one turn from scenario input to audited result
 *
 * memory retrieve → shared context → router → capability or workflow →
 * evidence gate → memory write. Every stage is metered by the cost monitor;
 * retrieval and capability stages are retried.
 */

import path from "node:path";
import type { RouteName, VteamConfig } from "../config/types.js";
import { ContextStore, resolveContextKey, type ContextKey, type ContextMode } from "../context/store.js";
import { buildContextBundle } from "../context/bundle.js";
import { computeRepoState, isStale, type RepoState } from "../context/repo-state.js";
import { enforceEvidence } from "../context/evidence.js";
import { RunCheckpointStore } from "../execution/checkpoints.js";
import { CommandRunLog } from "../execution/command-runs.js";
import { GoldenRuleDistiller } from "../execution/golden-rule.js";
import { PhaseExecutor } from "../execution/phase-executor.js";
import { SessionRegistry } from "../execution/sessions.js";
import { GitRepoPreparer, type GitRunner, type RepoPreparer } from "../execution/workspace.js";
import { TemporalMemory } from "../memory/temporal.js";
import { runCapability } from "../router/capabilities.js";
import { RequestRouter } from "../router/router.js";
import { CliCodingTool, type CodingTool } from "../tools/coding-tool.js";
import { loadWorkflowConfig, type WorkflowConfig } from "../workflow/config.js";
import { WorkflowStages } from "../workflow/stages.js";
import { PhaseStateMachine } from "../workflow/state-machine.js";
import {
  addAuditEntry,
  createRunContext,
  generateRunId,
  getRunSummary,
  type RunContext,
  type RunId,
} from "./context.js";
import { CostLatencyMonitor } from "./cost-monitor.js";
import { VteamErrorCode, errorMessage, isVteamError } from "./errors.js";
import { appendIOAudit, createLogger, writeAuditLog, type VteamLogger } from "./logger.js";
import { RetryPolicy } from "./retry.js";
import { parseScenario, type ScenarioInput } from "./scenario.js";
import {
  createInitialState,
  latestUserMessage,
  type Checkpoint,
  type RunState,
  type Stage,
  type Telemetry,
} from "./state.js";

/**
 * Outcome of one run
 */
export interface RunResult {
  runId: RunId;
  threadId: string;
  route: RouteName | null;
  output: string;
  workflowPhase: string | null;
  checkpoints: Checkpoint[];
  telemetry: Telemetry;
  status: "ok" | "failed";
  error?: string;
  errorCode?: VteamErrorCode;
  state: RunState;
}

/**
 * Collaborators a runner may be given instead of building them from config
 */
export interface ScenarioRunnerDeps {
  memory?: TemporalMemory;
  tool?: CodingTool;
  debugTool?: CodingTool;
  reviewTool?: CodingTool;
  preparer?: RepoPreparer;
  /** Used for repository checkpoints in the shared context */
  git?: GitRunner;
  workflow?: WorkflowConfig;
  signal?: AbortSignal;
  quiet?: boolean;
  verbose?: boolean;
}

interface SharedContext {
  store: ContextStore;
  key: ContextKey;
  mode: ContextMode;
}

/**
 * Planning documents and handoff reports the run touched, in plan order
 */
export function filePointersOf(state: RunState): string[] {
  const reports = state.plan.phases.flatMap((phase) => (phase.handoff ? [phase.handoff.path] : []));
  return [...new Set([...Object.values(state.plan.metadata.outputFiles), ...reports])];
}

export class ScenarioRunner {
  private readonly memory: TemporalMemory;

  constructor(
    private readonly config: VteamConfig,
    private readonly deps: ScenarioRunnerDeps = {},
  ) {
    this.memory = deps.memory ?? new TemporalMemory(config.memory);
  }

  /**
   * Run a scenario. Invalid input is audited and rethrown; failures after
   * that are returned as a failed result.
   */
  async run(raw: unknown): Promise<RunResult> {
    let scenario: ScenarioInput;
    try {
      scenario = parseScenario(raw);
    } catch (error) {
      await appendIOAudit(
        {
          timestamp: new Date().toISOString(),
          scenarioId: "invalid",
          runId: generateRunId("invalid"),
          validInput: false,
          validOutput: false,
          route: null,
          workflowPhase: null,
          errors: [errorMessage(error)],
        },
        this.config.audit.dir,
      );
      throw error;
    }

    const ctx = createRunContext(this.config, scenario, { signal: this.deps.signal });
    const logger = createLogger(ctx.runId, this.config.logging, {
      quiet: this.deps.quiet,
      verbose: this.deps.verbose,
    });
    const monitor = new CostLatencyMonitor(this.config.costs);
    const retry = new RetryPolicy(this.config.retry, { logger });
    const flags = scenario.context;

    let state = createInitialState(scenario);
    state.metadata.modelPolicy = flags.modelPolicy ?? this.config.policy.default;
    const shared = this.sharedContext(state);

    logger.info(`Starting run ${ctx.runId}`, { scenarioId: ctx.scenarioId, threadId: ctx.threadId });

    const errors: string[] = [];
    let errorCode: VteamErrorCode | undefined;
    try {
      state = await monitor.wrap("memory_retrieve", retry.wrap("memory_retrieve", this.retrieve))(state);
      if (shared) {
        const attach: Stage = (current) => this.attachBundle(current, shared, logger);
        state = await monitor.wrap("shared_context", attach)(state);
      }

      const router = new RequestRouter(this.config.router, this.config.policy, logger);
      state = await monitor.wrap("router", async (current) => router.run(current))(state);
      const route = state.route ?? "rag";
      addAuditEntry(ctx, { type: "route", output: { route, reason: state.metadata.routerReason } });

      if (route === "workflow") {
        state = await this.runWorkflow(state, ctx, logger, monitor, shared);
      } else {
        const capability: Stage = (current) => runCapability(route, current, logger);
        state = await monitor.wrap(route, retry.wrap(route, capability))(state);
      }

      if (shared) {
        enforceEvidence(state.output, flags.evidenceLedger);
      }
      this.remember(state, ctx);
    } catch (error) {
      const message = errorMessage(error);
      errors.push(message);
      errorCode = isVteamError(error) ? error.code : undefined;
      addAuditEntry(ctx, { type: "error", error: message });
      logger.error("Run failed", { error: message, code: errorCode });
    }

    const status = errors.length === 0 ? "ok" : "failed";
    if (shared) {
      await this.recordLastRun(shared, state, errors[0], logger);
    }

    const route = state.route ?? null;
    await appendIOAudit(
      {
        timestamp: new Date().toISOString(),
        scenarioId: ctx.scenarioId,
        runId: ctx.runId,
        validInput: true,
        validOutput: status === "ok" && state.output.trim().length > 0,
        route,
        workflowPhase: state.workflowPhase ?? null,
        errors,
      },
      this.config.audit.dir,
    );
    await writeAuditLog(ctx.runId, ctx.auditLog, this.config.audit.dir);
    await monitor.flush(ctx.scenarioId, route);
    await this.memory.flush();
    logger.info(`Run ${status}`, { route, ...getRunSummary(ctx), ...monitor.summary() });
    await logger.flush();

    return {
      runId: ctx.runId,
      threadId: ctx.threadId,
      route,
      output: state.output,
      workflowPhase: state.workflowPhase ?? null,
      checkpoints: state.checkpoints,
      telemetry: state.metadata.telemetry,
      status,
      error: errors[0],
      errorCode,
      state,
    };
  }

  private retrieve: Stage = async (state) => {
    const memories = await this.memory.search(latestUserMessage(state));
    return {
      ...state,
      metadata: { ...state.metadata, retrievedMemories: memories },
      artifacts: [...state.artifacts, ...memories.map((memory) => ({ kind: "memory" as const, ref: memory.id }))],
    };
  };

  private sharedContext(state: RunState): SharedContext | null {
    const flags = state.context;
    if (!(flags.sharedContext ?? this.config.sharedContext.enabled)) return null;
    return {
      store: new ContextStore(this.config.sharedContext.dir),
      key: resolveContextKey({
        repoPath: flags.repoPath,
        branch: flags.targetBranch,
        workstreamId: flags.workstreamId,
        featureRequest: state.plan.request,
      }),
      mode: flags.planOnly ? "planning" : "implementation",
    };
  }

  /**
   * Load the workstream entry, flag its summary stale if the repository moved
   * since it was written, and put the context bundle on the plan
   */
  private async attachBundle(state: RunState, shared: SharedContext, logger: VteamLogger): Promise<RunState> {
    const stored = await shared.store.get(shared.mode, shared.key);
    const repoState = await this.repoState(state, shared, logger, stored?.repoCheckpoint.gitHead);
    const entry = await shared.store.ensure(shared.mode, shared.key, state.plan.request, (current) =>
      repoState !== null && isStale(current.repoCheckpoint, repoState)
        ? { ...current, workingSummary: { ...current.workingSummary, stale: true } }
        : current,
    );
    if (entry.workingSummary.stale) {
      logger.warn("Shared context summary is stale", { workstream: shared.key.workstreamId });
    }
    const bundle = buildContextBundle({
      mode: shared.mode,
      entry,
      filePointers: filePointersOf(state),
      repoState,
      retrieved: state.context.sharedContextRetrieve ? state.metadata.retrievedMemories : undefined,
      taskChecklist: state.context.taskChecklist,
    });
    return {
      ...state,
      plan: {
        ...state.plan,
        metadata: { ...state.plan.metadata, contextBundle: bundle, workstreamId: shared.key.workstreamId },
      },
    };
  }

  private async runWorkflow(
    state: RunState,
    ctx: RunContext,
    logger: VteamLogger,
    monitor: CostLatencyMonitor,
    shared: SharedContext | null,
  ): Promise<RunState> {
    const flags = state.context;
    const workflow = this.deps.workflow ?? (await loadWorkflowConfig(this.config.workflow.configPath));
    const key =
      shared?.key ??
      resolveContextKey({
        repoPath: flags.repoPath,
        branch: flags.targetBranch,
        workstreamId: flags.workstreamId,
        featureRequest: state.plan.request,
      });
    const store = shared?.store;
    const tool = this.deps.tool ?? this.cliTool("coder", this.config.dispatch.command, logger);
    const debugTool = this.deps.debugTool ?? this.cliTool("debugger", this.config.dispatch.debugCommand, logger);
    const reviewTool =
      this.deps.reviewTool ??
      (this.config.dispatch.reviewCommand
        ? this.cliTool("reviewer", this.config.dispatch.reviewCommand, logger)
        : undefined);

    const stages = new WorkflowStages({
      workflow,
      settings: this.config.workflow,
      tool,
      sessions: new SessionRegistry("planning", key, store),
      logger,
    });
    const executor = new PhaseExecutor({
      workflow,
      tool,
      debugTool,
      preparer: this.deps.preparer ?? new GitRepoPreparer(this.config.workflow.workspaceRoot),
      sessions: new SessionRegistry("implementation", key, store),
      commandRuns: new CommandRunLog(this.config.dispatch.commandRunsPath, logger),
      goldenRules: new GoldenRuleDistiller(this.memory, reviewTool, logger),
      contextStore: store,
      contextKey: key,
      checkpoints: new RunCheckpointStore(path.join(this.config.audit.dir, "checkpoints")),
      threadId: ctx.threadId,
      runId: ctx.runId,
      logger,
      signal: ctx.signal,
    });

    const machine = new PhaseStateMachine(stages.table(executor.run), {
      logger,
      signal: ctx.signal,
      wrap: (name, stage) => {
        const metered = monitor.wrap(name, stage);
        return async (current) => {
          const next = await metered(current);
          addAuditEntry(ctx, { type: "stage", stage: name, output: { workflowPhase: next.workflowPhase } });
          return next;
        };
      },
    });
    return machine.run(state);
  }

  private cliTool(name: string, command: string | undefined, logger: VteamLogger): CodingTool {
    return new CliCodingTool({
      name,
      command,
      timeoutS: this.config.dispatch.timeoutS,
      auditLogPath: this.config.dispatch.auditLogPath,
      logger,
    });
  }

  /**
   * Queue the turn for temporal memory; the write lands in the background
   */
  private remember(state: RunState, ctx: RunContext): void {
    if (!state.output.trim()) return;
    const flags = state.context;
    this.memory.write({
      text: `${latestUserMessage(state)}\n${state.output}`,
      category: flags.category,
      importance: flags.importance,
      source: state.metadata.agent ?? flags.persona ?? "agent",
      metadata: { runId: ctx.runId, route: state.route ?? null },
    });
  }

  /**
   * Repository checkpoint for runs that name a repo path; null otherwise
   */
  private async repoState(
    state: RunState,
    shared: SharedContext,
    logger: VteamLogger,
    baselineHead?: string | null,
  ): Promise<RepoState | null> {
    if (!state.context.repoPath) return null;
    return computeRepoState(shared.key.repo, { baselineHead, git: this.deps.git, logger });
  }

  private async recordLastRun(
    shared: SharedContext,
    state: RunState,
    error: string | undefined,
    logger: VteamLogger,
  ): Promise<void> {
    const updatedAt = new Date().toISOString();
    const summary = state.plan.summary.trim();
    const pointers = filePointersOf(state);
    const decisions = state.context.openDecisions;
    try {
      const repoState = await this.repoState(state, shared, logger);
      await shared.store.update(shared.mode, shared.key, (entry) => ({
        ...entry,
        workingSummary: summary ? { text: summary, updatedAt, stale: false } : entry.workingSummary,
        openDecisions: decisions.length > 0 ? decisions : entry.openDecisions,
        filePointers: pointers.length > 0 ? pointers : entry.filePointers,
        evidenceLedger: state.context.evidenceLedger.length > 0 ? state.context.evidenceLedger : entry.evidenceLedger,
        repoCheckpoint: {
          gitHead: repoState?.gitHead ?? entry.repoCheckpoint.gitHead,
          trackedFilesHash: repoState?.trackedFilesHash ?? entry.repoCheckpoint.trackedFilesHash,
        },
        lastRun: {
          status: error ? "failed" : "ok",
          error: error ?? null,
          nextAction: state.context.nextAction ?? null,
          updatedAt,
        },
      }));
    } catch (caught) {
      logger.warn("Failed to record last run in shared context", { error: errorMessage(caught) });
    }
  }
}

