/**
 * Tests for the evidence gate
 */

import { describe, it, expect } from "vitest";
import { enforceEvidence, evidenceViolations, hasCompletionClaim } from "./evidence.js";
import { EvidenceViolation } from "../runtime/errors.js";

describe("evidence gate", () => {
  it("detects completion claims", () => {
    expect(hasCompletionClaim("Export endpoint IMPLEMENTED")).toBe(true);
    expect(hasCompletionClaim("Plan drafted for review")).toBe(false);
  });

  it("blocks a completion claim with an empty ledger", () => {
    expect(() => enforceEvidence("All tests fixed", [])).toThrow(EvidenceViolation);
  });

  it("blocks a completion claim backed by entries without file paths", () => {
    expect(() => enforceEvidence("Bug fixed", [{ claim: "fix", files: [{ lines: "1-4" }] }])).toThrow(
      "Evidence ledger is incomplete: Evidence ledger entry missing file path",
    );
  });

  it("passes outputs with a complete ledger or no claim", () => {
    expect(() =>
      enforceEvidence("Bug fixed", [{ claim: "fix", files: [{ path: "src/a.ts", lines: "1-4" }] }]),
    ).not.toThrow();
    expect(() => enforceEvidence("Plan drafted", [])).not.toThrow();
  });

  it("reports entries missing files", () => {
    expect(evidenceViolations([{ claim: "x" }, { files: [] }])).toEqual([
      "Evidence ledger entry missing files",
      "Evidence ledger entry missing files",
    ]);
  });
});
