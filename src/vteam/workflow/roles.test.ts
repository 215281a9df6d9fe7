/**
 * Tests for lead selection and phase classification
 */

import { describe, it, expect } from "vitest";
import { classifyOwners, selectLead } from "./roles.js";
import type { LeadRule } from "./config.js";

const rules: LeadRule[] = [
  { role: "data_lead", keywords: ["pipeline", "etl"] },
  { role: "frontend_lead", keywords: ["ui", "page"] },
  { role: "backend_lead", keywords: ["api", "endpoint"] },
];

describe("selectLead", () => {
  it("returns the first rule with a matching keyword", () => {
    expect(selectLead("Add an ETL pipeline behind the API", rules)).toEqual({
      role: "data_lead",
      keyword: "pipeline",
    });
  });

  it("matches whole words only", () => {
    expect(selectLead("Build a guide for rapid onboarding", rules)).toEqual({ role: "fullstack_lead" });
  });

  it("honors rule order over keyword position", () => {
    expect(selectLead("Expose the endpoint on the settings page", rules).role).toBe("frontend_lead");
  });

  it("uses the given fallback", () => {
    expect(selectLead("Improve docs", rules, "backend_lead")).toEqual({ role: "backend_lead" });
  });
});

describe("classifyOwners", () => {
  it("treats a phase with any backend owner as backend", () => {
    expect(classifyOwners(["frontend_lead", "Backend_Lead"])).toBe("backend");
  });

  it("recognizes frontend and ui owners", () => {
    expect(classifyOwners(["ui_ux"])).toBe("frontend");
    expect(classifyOwners(["frontend"])).toBe("frontend");
  });

  it("returns neither for other owners", () => {
    expect(classifyOwners(["tech_lead", "ops"])).toBe("neither");
  });
});
