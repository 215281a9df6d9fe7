/**
 * Phase validation between implementation planning and the plan summary
 */

import type { PhasePlan, PhaseReviewState } from "../runtime/state.js";

export type ValidationBranch = "ok" | "needs_review";

export interface PhaseValidation {
  phases: PhasePlan[];
  issues: string[];
}

function cleanList(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed && !seen.has(trimmed)) {
      seen.add(trimmed);
      result.push(trimmed);
    }
  }
  return result;
}

/**
 * Trim and de-duplicate owners, deliverables and acceptance tests
 */
export function normalizePhase(phase: PhasePlan): PhasePlan {
  return {
    ...phase,
    name: phase.name.trim(),
    owners: cleanList(phase.owners),
    deliverables: phase.deliverables.map((item) => item.trim()).filter(Boolean),
    acceptanceTests: cleanList(phase.acceptanceTests),
  };
}

/**
 * Normalize every phase and collect one issue per missing field
 */
export function validatePhases(phases: readonly PhasePlan[]): PhaseValidation {
  const normalized = phases.map(normalizePhase);
  const issues: string[] = [];
  if (normalized.length === 0) {
    issues.push("Plan has no phases.");
  }
  for (const phase of normalized) {
    const label = phase.name || "(unnamed phase)";
    if (phase.owners.length === 0) {
      issues.push(`${label}: missing owners`);
    }
    if (phase.acceptanceTests.length === 0) {
      issues.push(`${label}: missing acceptance tests`);
    }
  }
  return { phases: normalized, issues };
}

/**
 * Next phase-review state after a validation pass
 */
export function reviewAfterValidation(
  previous: PhaseReviewState,
  validation: PhaseValidation,
): PhaseReviewState {
  if (validation.issues.length === 0) {
    return { status: "clear", issues: [], attempts: previous.attempts };
  }
  return { status: "needs_review", issues: validation.issues, attempts: previous.attempts + 1 };
}

export function branch(review: PhaseReviewState): ValidationBranch {
  return review.status === "needs_review" ? "needs_review" : "ok";
}

/**
 * Validate and branch in one step
 */
export function validateAndBranch(phases: readonly PhasePlan[]): ValidationBranch {
  const validation = validatePhases(phases);
  return branch(
    reviewAfterValidation({ status: "clear", issues: [], attempts: 0 }, validation),
  );
}
