/**
 * Tests for the request router
 */

import { describe, it, expect } from "vitest";
import { RequestRouter } from "./router.js";
import { PolicyConfigSchema, RouterConfigSchema } from "../config/types.js";
import { parseScenario } from "../runtime/scenario.js";
import { createInitialState, type RunState } from "../runtime/state.js";

function makeState(prompt: string, context: Record<string, unknown> = {}): RunState {
  return createInitialState(parseScenario({ prompt, context }));
}

function makeRouter(presets: Record<string, unknown> = {}): RequestRouter {
  return new RequestRouter(RouterConfigSchema.parse({}), PolicyConfigSchema.parse({ presets }));
}

describe("RequestRouter", () => {
  describe("forced routes", () => {
    it("returns the forced route regardless of message content", () => {
      const state = makeState("compare the graph relationship between services", {
        forceRoute: "swarm",
      });

      const decision = makeRouter().decide(state);

      expect(decision.route).toBe("swarm");
      expect(decision.reason).toBe("forced_by_context");
    });

    it("ignores a forced route that is disabled", () => {
      const state = makeState("Hello", { forceRoute: "swarm", disableRoutes: ["swarm"] });

      const decision = makeRouter().decide(state);

      expect(decision.route).toBe("rag");
      expect(decision.reason).toBe("default_fallback");
    });

    it("takes the forced route from the policy preset", () => {
      const state = makeState("Hello", { modelPolicy: "graph_only" });

      const decision = makeRouter({ graph_only: { forceRoute: "graph_rag" } }).decide(state);

      expect(decision.route).toBe("graph_rag");
      expect(decision.reason).toBe("forced_by_context");
    });
  });

  describe("budgets", () => {
    it("never selects graph, swarm or hybrid once the latency budget is spent", () => {
      const state = makeState("plan and coordinate the graph relationship", {
        latencyBudgetS: 5,
        requiresGraph: true,
        taskComplexity: "high",
        mode: "hybrid",
      });
      state.metadata.telemetry.latencyS = 6;

      const decision = makeRouter().decide(state);

      expect(decision.route).toBe("rag");
      expect(decision.scores.graph_rag).toBe(0);
    });

    it("disables the agentic route once the cost budget is spent", () => {
      const state = makeState("Hello", { costBudgetUsd: 0.1, requireLangchain: true });
      state.metadata.telemetry.costEstimateUsd = 0.2;

      const decision = makeRouter().decide(state);

      expect(decision.route).toBe("rag");
      expect(decision.scores.langchain_agent).toBeCloseTo(0.4);
    });
  });

  describe("scoring", () => {
    it("routes architect mode to the workflow", () => {
      const decision = makeRouter().decide(makeState("Add CSV export", { mode: "architect" }));

      expect(decision.route).toBe("workflow");
      expect(decision.reason).toBe("workflow_request");
      expect(decision.scores.workflow).toBe(1);
    });

    it("selects hybrid in hybrid mode", () => {
      const decision = makeRouter().decide(makeState("Hello", { mode: "hybrid" }));

      expect(decision.route).toBe("hybrid");
      expect(decision.reason).toBe("graph+rag_combo");
      expect(decision.scores.hybrid).toBe(1);
    });

    it("skips hybrid when the context does not allow it", () => {
      const decision = makeRouter().decide(
        makeState("Hello", { mode: "hybrid", allowHybrid: false }),
      );

      expect(decision.route).toBe("rag");
    });

    it("hands off when the persona differs from the current agent", () => {
      const decision = makeRouter().decide(makeState("Hello", { persona: "writer" }));

      expect(decision.route).toBe("handoff");
      expect(decision.reason).toBe("score=0.60");
    });

    it("boosts the policy-preferred route over its threshold", () => {
      const presets = { drafting: { preferredRoute: "skills" } };
      const state = makeState("write an outline", { modelPolicy: "drafting" });

      expect(makeRouter().decide(state).route).toBe("rag");

      const decision = makeRouter(presets).decide(state);
      expect(decision.route).toBe("skills");
      expect(decision.reason).toBe("score=0.45;policy=drafting");
    });

    it("drops routes disabled by the policy preset", () => {
      const state = makeState("Hello", { mode: "architect", modelPolicy: "no_workflow" });

      const decision = makeRouter({ no_workflow: { disableRoutes: ["workflow"] } }).decide(state);

      expect(decision.route).toBe("rag");
    });
  });

  describe("run", () => {
    it("records the decision on a new state", () => {
      const state = makeState("Add CSV export", { mode: "architect" });

      const next = makeRouter().run(state);

      expect(next.route).toBe("workflow");
      expect(next.metadata.routeHistory).toEqual(["workflow"]);
      expect(next.metadata.routerReason).toBe("workflow_request");
      expect(state.metadata.routeHistory).toEqual([]);
      expect(state.route).toBeUndefined();
    });
  });
});
