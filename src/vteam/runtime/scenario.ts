/**
 * Scenario input: the prompt plus the context flags that steer a run
 */

import fs from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { RouteNameSchema } from "../config/types.js";
import { VteamError, VteamErrorCode } from "./errors.js";

export const PhaseInputSchema = z.object({
  name: z.string(),
  owners: z.array(z.string()).default([]),
  deliverables: z.array(z.string()).default([]),
  acceptanceTests: z.array(z.string()).default([]),
  focus: z.string().optional(),
  testPolicy: z.enum(["default", "debugger"]).default("default"),
});

export type PhaseInput = z.infer<typeof PhaseInputSchema>;

export const EvidenceEntrySchema = z.object({
  claim: z.string().optional(),
  files: z
    .array(
      z.object({
        path: z.string().optional(),
        lines: z.string().optional(),
      }),
    )
    .optional(),
});

export type EvidenceEntry = z.infer<typeof EvidenceEntrySchema>;

export const RunFlagsSchema = z.object({
  persona: z.string().optional(),
  mode: z.string().optional(),
  forceRoute: RouteNameSchema.optional(),
  disableRoutes: z.array(RouteNameSchema).default([]),
  latencyBudgetS: z.number().nonnegative().optional(),
  costBudgetUsd: z.number().nonnegative().optional(),
  allowHybrid: z.boolean().default(true),
  requiresGraph: z.boolean().optional(),
  skillPack: z.string().optional(),
  skillTool: z.string().optional(),
  taskComplexity: z.string().optional(),
  requireLangchain: z.boolean().optional(),
  workflowIntent: z.boolean().optional(),
  modelPolicy: z.string().optional(),
  stack: z.string().optional(),
  repoPath: z.string().optional(),
  repoUrl: z.string().optional(),
  targetBranch: z.string().optional(),
  featureRequest: z.string().optional(),
  workstreamId: z.string().optional(),
  scenarioId: z.string().optional(),
  resume: z.boolean().default(false),
  forceRerun: z.boolean().default(false),
  planOnly: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  /** Phase name -> owner, overriding the planner's defaults */
  phaseOwners: z.record(z.string(), z.string()).default({}),
  /** Caller-supplied phases; replace the planner's defaults */
  phases: z.array(PhaseInputSchema).optional(),
  guardrails: z.array(z.string()).optional(),
  acceptanceTests: z.array(z.string()).optional(),
  category: z.string().default("general"),
  importance: z.number().min(0).max(1).default(0.5),
  evidenceLedger: z.array(EvidenceEntrySchema).default([]),
  sharedContext: z.boolean().optional(),
  sharedContextRetrieve: z.boolean().default(false),
  taskChecklist: z.array(z.string()).default([]),
  /** Replaces the workstream's open decisions when non-empty */
  openDecisions: z.array(z.string()).default([]),
  nextAction: z.string().optional(),
});

export type RunFlags = z.infer<typeof RunFlagsSchema>;

export const AssertionSchema = z.object({
  type: z.enum(["contains", "not_contains", "route", "metadata"]).default("contains"),
  value: z.string().optional(),
  equals: z.unknown().optional(),
  path: z.array(z.union([z.string(), z.number()])).optional(),
});

export type Assertion = z.infer<typeof AssertionSchema>;

export const ScenarioInputSchema = z.object({
  id: z.string().optional(),
  prompt: z.string().default("Hello"),
  context: RunFlagsSchema.default({}),
  assertions: z.array(AssertionSchema).optional(),
});

export type ScenarioInput = z.infer<typeof ScenarioInputSchema>;

/**
 * Validate raw scenario data
 */
export function parseScenario(raw: unknown): ScenarioInput {
  const parsed = ScenarioInputSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new VteamError(VteamErrorCode.SCENARIO_INVALID, `Invalid scenario: ${parsed.error.message}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Read a scenario YAML file
 */
export async function loadScenario(filePath: string): Promise<ScenarioInput> {
  const content = await fs.readFile(filePath, "utf-8");
  return parseScenario(YAML.parse(content));
}

/**
 * Identifier used for audit records and the thread hash
 */
export function scenarioIdOf(scenario: ScenarioInput): string {
  return scenario.id ?? scenario.context.scenarioId ?? "adhoc";
}
