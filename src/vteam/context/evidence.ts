/**
 * Evidence gate: outputs that claim completion must be backed by an evidence
 * ledger naming files.
 */

import type { EvidenceEntry } from "../runtime/scenario.js";
import { EvidenceViolation } from "../runtime/errors.js";

const COMPLETION_KEYWORDS = ["implemented", "fixed", "completed", "resolved", "done"];

export function hasCompletionClaim(text: string): boolean {
  const lowered = text.toLowerCase();
  return COMPLETION_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

export function evidenceViolations(entries: EvidenceEntry[]): string[] {
  const violations: string[] = [];
  for (const entry of entries) {
    if (!entry.files || entry.files.length === 0) {
      violations.push("Evidence ledger entry missing files");
      continue;
    }
    for (const file of entry.files) {
      if (!file.path) violations.push("Evidence ledger entry missing file path");
    }
  }
  return violations;
}

/**
 * Throws when the output claims completion without a usable ledger
 */
export function enforceEvidence(output: string, ledger: EvidenceEntry[]): void {
  if (!output || !hasCompletionClaim(output)) return;
  if (ledger.length === 0) {
    throw new EvidenceViolation("Evidence required: add file paths + line refs for completion claims.");
  }
  const violations = evidenceViolations(ledger);
  if (violations.length > 0) {
    throw new EvidenceViolation(`Evidence ledger is incomplete: ${violations.join("; ")}`, { violations });
  }
}
