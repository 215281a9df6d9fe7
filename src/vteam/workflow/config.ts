/**
 * Workflow document: per-role prompts, output files, checklists and the
 * lead selection table
 */

import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { z } from "zod";
import { VteamError, VteamErrorCode } from "../runtime/errors.js";

/** Bundled workflow document at the repository root */
export const DEFAULT_WORKFLOW_PATH = fileURLToPath(
  new URL("../../../config/workflow.yaml", import.meta.url),
);

export const LEAD_ROLES = ["backend_lead", "frontend_lead", "data_lead", "fullstack_lead"] as const;

export const LeadRoleSchema = z.enum(LEAD_ROLES);

export type LeadRole = z.infer<typeof LeadRoleSchema>;

export const SectionTemplateSchema = z.object({
  title: z.string(),
  template: z.string(),
});

export type SectionTemplate = z.infer<typeof SectionTemplateSchema>;

export const RoleConfigSchema = z.object({
  /** Planning document the role's coding-tool dispatch edits */
  outputFile: z.string().optional(),
  prompt: z.string().default(""),
  /** Sent once per session before the first task dispatch */
  systemPrompt: z.string().optional(),
  sections: z.array(SectionTemplateSchema).default([]),
  checklist: z.array(z.string()).default([]),
  guardrails: z.array(z.string()).default([]),
  acceptanceTests: z.array(z.string()).default([]),
  corrections: z
    .object({
      guardrails: z.string().optional(),
      acceptanceTests: z.array(z.string()).default([]),
    })
    .default({}),
  phases: z
    .array(
      z.object({
        name: z.string(),
        focus: z.string().default(""),
        owners: z.array(z.string()).default([]),
        testPolicy: z.enum(["default", "debugger"]).default("default"),
      }),
    )
    .default([]),
  dependencies: z.array(z.string()).default([]),
  intro: z.string().default(""),
  focus: z.string().default(""),
});

export type RoleConfig = z.infer<typeof RoleConfigSchema>;

export const LeadRuleSchema = z.object({
  role: LeadRoleSchema,
  keywords: z.array(z.string()).min(1),
});

export type LeadRule = z.infer<typeof LeadRuleSchema>;

export const WorkflowConfigSchema = z.object({
  roles: z.record(z.string(), RoleConfigSchema).default({}),
  /** Evaluated in order; the first rule with a keyword hit wins */
  leadRules: z.array(LeadRuleSchema).default([]),
  defaultLead: LeadRoleSchema.default("fullstack_lead"),
  handoff: z
    .object({
      reportPath: z.string().default("docs/handoff/backend.md"),
      requiredSections: z.array(z.string()).default(["Build", "Tests"]),
    })
    .default({}),
  debug: z
    .object({
      /** The only file the debug advisor may write */
      suggestionsPath: z.string().default("docs/debug/suggestions.md"),
    })
    .default({}),
  implementation: z
    .object({
      phaseTemplate: z.string().default("Document owners, telemetry, and exit tests."),
      dependencies: z.string().default("List upstream blockers before starting."),
      checklist: z.string().default("Every phase names owners and acceptance tests."),
    })
    .default({}),
});

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;

let cached: { path: string; config: WorkflowConfig } | null = null;

/**
 * Load the workflow document. Parsed once per path and cached.
 */
export async function loadWorkflowConfig(
  configPath: string = DEFAULT_WORKFLOW_PATH,
): Promise<WorkflowConfig> {
  if (cached && cached.path === configPath) {
    return cached.config;
  }

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new VteamError(VteamErrorCode.CONFIG_INVALID, `Workflow config not found: ${configPath}`);
    }
    throw error;
  }

  const parsed = WorkflowConfigSchema.safeParse(YAML.parse(content) ?? {});
  if (!parsed.success) {
    throw new VteamError(
      VteamErrorCode.CONFIG_INVALID,
      `Invalid workflow config ${configPath}: ${parsed.error.message}`,
    );
  }

  cached = { path: configPath, config: parsed.data };
  return parsed.data;
}

/**
 * Fill {request}, {persona} and {stack} placeholders
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in values ? values[key] : match,
  );
}
