/**
 * Tests for handoff report parsing
 */

import { describe, it, expect } from "vitest";
import {
  errorSignature,
  evaluateReport,
  extractReportCommands,
  findMissingSections,
  hashSignature,
  inferStatus,
} from "./handoff.js";

const FENCE = "```";

function section(name: string, command: string, result: string, workdir?: string): string {
  const lines = [`## ${name}`];
  if (workdir) lines.push(`workdir: \`${workdir}\``);
  lines.push("Command:", `${FENCE}bash`, command, FENCE, "Result:", FENCE, result, FENCE, "");
  return lines.join("\n");
}

describe("inferStatus", () => {
  it("marks missing and n/a commands as skipped", () => {
    expect(inferStatus("", "ok")).toBe("skipped");
    expect(inferStatus("N/A - no build", "ok")).toBe("skipped");
  });

  it("marks deferred results as skipped", () => {
    expect(inferStatus("npm test", "Tests deferred to CI")).toBe("skipped");
  });

  it("detects failure markers", () => {
    expect(inferStatus("mvn package", "BUILD FAILURE")).toBe("failed");
    expect(inferStatus("npm test", "Tests run: 10, Failures: 2, Errors: 0")).toBe("failed");
    expect(inferStatus("npm test", "TypeError: x is undefined")).toBe("failed");
    expect(inferStatus("./gradlew", "Permission denied")).toBe("failed");
  });

  it("ignores zero failure counters", () => {
    expect(inferStatus("npm test", "Tests run: 10, Failures: 0, Errors: 0")).toBe("success");
  });

  it("is unknown without a result", () => {
    expect(inferStatus("npm test", "")).toBe("unknown");
  });
});

describe("errorSignature", () => {
  it("returns the first explaining line", () => {
    expect(errorSignature("compiling\nERROR: cannot find symbol Foo\nmore")).toBe(
      "ERROR: cannot find symbol Foo",
    );
  });

  it("caps the signature length", () => {
    expect(errorSignature(`error ${"x".repeat(400)}`)?.length).toBe(240);
  });

  it("hashes to 12 hex characters", () => {
    expect(hashSignature("boom")).toMatch(/^[0-9a-f]{12}$/);
    expect(hashSignature(null)).toBeNull();
  });
});

describe("extractReportCommands", () => {
  it("parses one entry per section with command, workdir and status", () => {
    const report =
      "# Backend handoff\n\n" +
      section("Build", "npm run build", "done in 3s", "services/api") +
      section("Tests", "npm test", "1 failed\nError: expected 2 to be 3");

    const entries = extractReportCommands(report);

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      section: "Build",
      command: "npm run build",
      workdir: "services/api",
      status: "success",
      errorSignature: null,
    });
    expect(entries[1]).toMatchObject({
      section: "Tests",
      command: "npm test",
      workdir: "",
      status: "failed",
      errorSignature: "Error: expected 2 to be 3",
    });
  });

  it("skips sections without command or result", () => {
    expect(extractReportCommands("## Notes\nNothing to run here.\n")).toEqual([]);
  });
});

describe("evaluateReport", () => {
  it("is missing when there is no report", () => {
    expect(evaluateReport(null, ["Build", "Tests"])).toEqual({
      status: "missing",
      missingSections: ["Build", "Tests"],
      commands: [],
      failed: [],
    });
  });

  it("is incomplete when a required section is absent", () => {
    const result = evaluateReport(section("Build", "make", "ok"), ["Build", "Tests"]);

    expect(result.status).toBe("incomplete");
    expect(result.missingSections).toEqual(["Tests"]);
  });

  it("is incomplete when a command failed", () => {
    const report = section("Build", "make", "ok") + section("Tests", "make test", "build failed");

    const result = evaluateReport(report, ["Build", "Tests"]);

    expect(result.status).toBe("incomplete");
    expect(result.failed.map((entry) => entry.section)).toEqual(["Tests"]);
  });

  it("is ready when sections are present and nothing failed", () => {
    const report = section("Build", "make", "ok") + section("Tests", "make test", "12 passed");

    expect(evaluateReport(report, ["Build", "Tests"]).status).toBe("ready");
  });
});

describe("findMissingSections", () => {
  it("matches headers case-insensitively and by prefix word", () => {
    expect(findMissingSections("## build\n## Tests (unit)\n", ["Build", "Tests", "Deploy"])).toEqual([
      "Deploy",
    ]);
  });
});
