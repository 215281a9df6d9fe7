/**
 * Configuration types for the vteam orchestrator
 */

import { z } from "zod";

/**
 * Capabilities the router can select for a turn
 */
export const ROUTE_NAMES = [
  "rag",
  "graph_rag",
  "skills",
  "handoff",
  "swarm",
  "langchain_agent",
  "workflow",
  "hybrid",
] as const;

export const RouteNameSchema = z.enum(ROUTE_NAMES);

export type RouteName = z.infer<typeof RouteNameSchema>;

/**
 * Router configuration
 */
export const RouterConfigSchema = z.object({
  /** Minimum score a route needs before it can be selected */
  thresholds: z.record(RouteNameSchema, z.number()).default({}),
  /** Latency budgets below this (seconds) halve the graph score */
  graphMinLatency: z.number().default(6),
  /** task_complexity value that boosts the swarm route */
  swarmComplexityKeyword: z.string().default("high"),
});

export type RouterConfig = z.infer<typeof RouterConfigSchema>;

/**
 * Policy preset applied on top of the router heuristics
 */
export const PolicyPresetSchema = z.object({
  forceRoute: RouteNameSchema.optional(),
  disableRoutes: z.array(RouteNameSchema).default([]),
  preferredRoute: RouteNameSchema.optional(),
  boost: z.number().default(0.15),
});

export type PolicyPreset = z.infer<typeof PolicyPresetSchema>;

export const PolicyConfigSchema = z.object({
  /** Preset used when the scenario does not name one */
  default: z.string().default("balanced"),
  presets: z.record(z.string(), PolicyPresetSchema).default({}),
});

export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;

/**
 * Temporal memory configuration
 */
export const MemoryConfigSchema = z.object({
  /** JSON-lines file used when no vector backend is reachable */
  localPath: z.string().default("data/memory/memories.jsonl"),
  topK: z.number().int().positive().default(8),
  timeWindowDays: z.number().positive().default(30),
  halfLifeHours: z.number().positive().default(72),
  decayAlpha: z.number().min(0).default(0.5),
  /** task_state records older than this are pruned */
  taskTtlDays: z.number().positive().default(7),
  allowWrite: z.boolean().default(true),
});

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;

/**
 * Coding-tool dispatch configuration
 */
export const DispatchConfigSchema = z.object({
  /** Primary coding CLI (instruction passed on stdin) */
  command: z.string().optional(),
  /** Debug advisor CLI, only allowed to write a suggestions file */
  debugCommand: z.string().optional(),
  /** Review CLI used to distill golden rules */
  reviewCommand: z.string().optional(),
  timeoutS: z.number().positive().default(600),
  auditLogPath: z.string().default("data/ops/dispatch_requests.jsonl"),
  commandRunsPath: z.string().default("data/ops/command_runs.jsonl"),
});

export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;

/**
 * Retry configuration for retrieval and tool stages
 */
export const RetryConfigSchema = z.object({
  attempts: z.number().int().min(1).default(2),
  waitMs: z.number().min(0).default(500),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

/**
 * Cost and latency accounting
 */
export const CostConfigSchema = z.object({
  usdPer1kTokens: z.number().min(0).default(0.002),
  metricsPath: z.string().default("data/metrics/cost_latency.jsonl"),
});

export type CostConfig = z.infer<typeof CostConfigSchema>;

/**
 * Planning workflow configuration
 */
export const WorkflowSettingsSchema = z.object({
  /** Workflow document; the bundled config/workflow.yaml when unset */
  configPath: z.string().optional(),
  maxReviewAttempts: z.number().int().min(1).default(3),
  maxPhaseReviewAttempts: z.number().int().min(1).default(3),
  /** Where repositories given only by URL are cloned */
  workspaceRoot: z.string().default("data/workspaces"),
  /** Evaluation scores below this ask the router for more graph weight */
  evaluationThreshold: z.number().min(0).max(1).default(0.55),
  evaluationsPath: z.string().default("data/metrics/evaluations.jsonl"),
});

export type WorkflowSettings = z.infer<typeof WorkflowSettingsSchema>;

/**
 * Shared context store configuration
 */
export const SharedContextConfigSchema = z.object({
  enabled: z.boolean().default(false),
  dir: z.string().default("data/context"),
});

export type SharedContextConfig = z.infer<typeof SharedContextConfigSchema>;

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  /** Directory for log files */
  logDir: z.string().optional(),
  /** Enable structured JSON logging */
  jsonLogs: z.boolean().default(false),
  /** Include timestamps */
  timestamps: z.boolean().default(true),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const AuditConfigSchema = z.object({
  dir: z.string().default("data/audit"),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;

/**
 * Main vteam configuration
 */
export const VteamConfigSchema = z.object({
  /** Config version */
  version: z.literal(1).default(1),
  router: RouterConfigSchema.default({}),
  policy: PolicyConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  dispatch: DispatchConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  costs: CostConfigSchema.default({}),
  workflow: WorkflowSettingsSchema.default({}),
  sharedContext: SharedContextConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  audit: AuditConfigSchema.default({}),
});

export type VteamConfig = z.infer<typeof VteamConfigSchema>;

/**
 * Default configuration
 */
export function getDefaultConfig(): VteamConfig {
  return VteamConfigSchema.parse({});
}
