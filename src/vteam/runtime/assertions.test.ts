import { describe, it, expect } from "vitest";
import { checkAssertions, walkPath } from "./assertions.js";

const result = {
  output: "Answer for: What is temporal memory?",
  route: "rag",
  state: { metadata: { routeHistory: ["rag"], evaluations: [{ score: 0.7 }] } },
};

describe("walkPath", () => {
  it("follows object keys and array indexes", () => {
    expect(walkPath(result, ["state", "metadata", "routeHistory", 0])).toBe("rag");
    expect(walkPath(result, ["state", "metadata", "evaluations", "0", "score"])).toBe(0.7);
  });

  it("returns undefined past a missing step", () => {
    expect(walkPath(result, ["state", "missing", "score"])).toBeUndefined();
    expect(walkPath(result, ["output", "length"])).toBeUndefined();
  });
});

describe("checkAssertions", () => {
  it("passes matching assertions", () => {
    expect(
      checkAssertions(
        [
          { type: "contains", value: "temporal memory" },
          { type: "not_contains", value: "Graph insight" },
          { type: "route", value: "rag" },
          { type: "metadata", path: ["state", "metadata", "routeHistory"], equals: ["rag"] },
        ],
        result,
      ),
    ).toEqual([]);
  });

  it("reports each failure with its index", () => {
    expect(
      checkAssertions(
        [
          { type: "contains", value: "graph" },
          { type: "route", value: "hybrid" },
          { type: "metadata", path: ["state", "metadata", "evaluations", 0, "score"], equals: 0.9 },
        ],
        result,
      ),
    ).toEqual([
      "assertion 0 expected 'graph' in output",
      "assertion 1 expected route hybrid (got rag)",
      "assertion 2 expected state.metadata.evaluations.0.score == 0.9 (got 0.7)",
    ]);
  });
});
