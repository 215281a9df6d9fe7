/**
 * Lead selection: an ordered rule table over the lead roles
 */

import type { LeadRole, LeadRule, WorkflowConfig } from "./config.js";

export interface LeadSelection {
  role: LeadRole;
  /** Keyword that matched, absent when the default lead was used */
  keyword?: string;
}

function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean));
}

/**
 * Pick the lead for a request. Rules are checked in order and the first rule
 * with a keyword present in the request wins.
 */
export function selectLead(
  request: string,
  rules: readonly LeadRule[],
  fallback: LeadRole = "fullstack_lead",
): LeadSelection {
  const tokens = tokenize(request);
  for (const rule of rules) {
    const keyword = rule.keywords.find((word) => tokens.has(word.toLowerCase()));
    if (keyword) {
      return { role: rule.role, keyword };
    }
  }
  return { role: fallback };
}

export function selectLeadFromConfig(request: string, config: WorkflowConfig): LeadSelection {
  return selectLead(request, config.leadRules, config.defaultLead);
}

/** Owners that make a phase backend-owned */
const BACKEND_OWNERS = new Set(["backend", "backend_lead"]);

/** Owners that make a phase frontend-owned */
const FRONTEND_OWNERS = new Set(["frontend", "frontend_lead", "ui", "ui_ux"]);

export type PhaseSide = "backend" | "frontend" | "neither";

/**
 * Classify a phase from its owners. A phase with a backend owner is backend
 * even when a frontend owner is also listed.
 */
export function classifyOwners(owners: readonly string[]): PhaseSide {
  const normalized = owners.map((owner) => owner.trim().toLowerCase());
  if (normalized.some((owner) => BACKEND_OWNERS.has(owner))) return "backend";
  if (normalized.some((owner) => FRONTEND_OWNERS.has(owner))) return "frontend";
  return "neither";
}
