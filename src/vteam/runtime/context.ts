/**
 * Runtime context for vteam runs
 */

import { createHash } from "node:crypto";
import type { RouteName, VteamConfig } from "../config/types.js";
import type { ScenarioInput } from "./scenario.js";
import { scenarioIdOf } from "./scenario.js";

/**
 * Unique identifier for a run
 */
export type RunId = string;

/**
 * Content-derived identity shared by runs on the same scenario, repo and branch
 */
export function computeThreadId(scenario: ScenarioInput): string {
  const ctx = scenario.context;
  const seed = [
    scenarioIdOf(scenario),
    ctx.mode ?? "",
    ctx.repoPath ?? ctx.repoUrl ?? "",
    ctx.targetBranch ?? "",
    scenario.prompt,
  ].join("|");
  return createHash("sha256").update(seed).digest("hex").slice(0, 16);
}

/**
 * Generate a new run ID
 */
export function generateRunId(threadId: string): RunId {
  const timestamp = Date.now().toString(36);
  return `run_${timestamp}_${threadId}`;
}

/**
 * Log entry for audit trail
 */
export interface AuditLogEntry {
  timestamp: Date;
  runId: RunId;
  type: "stage" | "route" | "dispatch" | "checkpoint" | "error";
  stage?: string;
  tool?: string;
  input?: Record<string, unknown>;
  output?: Record<string, unknown>;
  error?: string;
  duration_ms?: number;
}

/**
 * One line of io_audit.jsonl, written for every run
 */
export interface IOAuditRecord {
  timestamp: string;
  scenarioId: string;
  runId: RunId;
  validInput: boolean;
  validOutput: boolean;
  route: RouteName | null;
  workflowPhase: string | null;
  errors: string[];
}

/**
 * Run context containing state for a single orchestration run
 */
export interface RunContext {
  /** Unique run identifier */
  runId: RunId;
  threadId: string;
  scenarioId: string;
  /** Start time of the run */
  startTime: Date;
  /** Full configuration */
  config: VteamConfig;
  /** Audit log entries */
  auditLog: AuditLogEntry[];
  /** Checked between phases */
  signal?: AbortSignal;
}

/**
 * Create a new run context
 */
export function createRunContext(
  config: VteamConfig,
  scenario: ScenarioInput,
  options?: { signal?: AbortSignal },
): RunContext {
  const threadId = computeThreadId(scenario);
  return {
    runId: generateRunId(threadId),
    threadId,
    scenarioId: scenarioIdOf(scenario),
    startTime: new Date(),
    config,
    auditLog: [],
    signal: options?.signal,
  };
}

/**
 * Add an audit log entry
 */
export function addAuditEntry(
  ctx: RunContext,
  entry: Omit<AuditLogEntry, "timestamp" | "runId">,
): void {
  ctx.auditLog.push({
    ...entry,
    timestamp: new Date(),
    runId: ctx.runId,
  });
}

/**
 * Get run summary
 */
export function getRunSummary(ctx: RunContext): {
  runId: RunId;
  duration_ms: number;
  stages: number;
  dispatches: number;
  checkpoints: number;
  errors: number;
} {
  const duration_ms = Date.now() - ctx.startTime.getTime();

  return {
    runId: ctx.runId,
    duration_ms,
    stages: ctx.auditLog.filter((e) => e.type === "stage").length,
    dispatches: ctx.auditLog.filter((e) => e.type === "dispatch").length,
    checkpoints: ctx.auditLog.filter((e) => e.type === "checkpoint").length,
    errors: ctx.auditLog.filter((e) => e.type === "error").length,
  };
}
