/**
 * Request router: picks the capability that handles a turn from keyword
 * signals, context flags, policy hints and the remaining cost/latency budget.
 */

import type { RouteName, RouterConfig, PolicyConfig } from "../config/types.js";
import type { RunState } from "../runtime/state.js";
import { cloneState } from "../runtime/state.js";
import type { RunFlags } from "../runtime/scenario.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { ModelPolicy } from "./policy.js";

export interface RouteDecision {
  route: RouteName;
  reason: string;
  scores: Partial<Record<RouteName, number>>;
}

export const DEFAULT_THRESHOLDS: Partial<Record<RouteName, number>> = {
  graph_rag: 0.45,
  skills: 0.4,
  handoff: 0.35,
  swarm: 0.5,
  langchain_agent: 0.5,
  workflow: 0.5,
};

/** Tie order when two routes score the same */
const SCORING_ORDER: readonly RouteName[] = [
  "graph_rag",
  "skills",
  "handoff",
  "swarm",
  "langchain_agent",
  "workflow",
  "rag",
  "hybrid",
];

/** Threshold for routes without a configured one */
const FALLBACK_THRESHOLD = 0.3;

const GRAPH_TERMS = /\bgraph\b|\brelationship\b|\bnetwork\b/i;
const SKILL_TERMS = /\b(write|outline|draft|summarize)\b/i;
const SWARM_TERMS = /\b(plan|coordinate|multi-step)\b/i;
const AGENTIC_TERMS = /\bautonomous\b|\bagentic\b|\bworkflow\b/i;
const WORKFLOW_TERMS = /\b(feature request|workflow plan|tech lead)\b/i;
const COMPARATIVE_TERMS = /\b(compare|analyze|relationship)\b/i;

interface Budget {
  latencyBudget: number;
  costBudget: number;
  elapsed: number;
  spent: number;
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function lastMessage(state: RunState): string {
  const messages = state.messages;
  return messages.length > 0 ? messages[messages.length - 1].content : "";
}

export class RequestRouter {
  private readonly thresholds: Partial<Record<RouteName, number>>;
  private readonly policy: ModelPolicy;
  private readonly logger: VteamLogger;

  constructor(
    private readonly config: RouterConfig,
    policyConfig: PolicyConfig,
    logger?: VteamLogger,
  ) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...config.thresholds };
    this.policy = new ModelPolicy(policyConfig);
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Route the turn and record the decision on a copy of the state
   */
  run(state: RunState): RunState {
    const decision = this.decide(state);
    const next = cloneState(state);
    next.metadata.routeHistory.push(decision.route);
    next.metadata.routerReason = decision.reason;
    next.metadata.routerScores = decision.scores;
    next.route = decision.route;
    this.logger.info(`Router selected route=${decision.route}`, { reason: decision.reason });
    return next;
  }

  decide(state: RunState): RouteDecision {
    const flags = state.context;
    const hint = this.policy.advise(flags);
    const disabled = new Set<RouteName>([...flags.disableRoutes, ...hint.disableRoutes]);
    const scores: Partial<Record<RouteName, number>> = {};

    const forced = flags.forceRoute ?? hint.forceRoute;
    if (forced && !disabled.has(forced)) {
      return { route: forced, reason: "forced_by_context", scores };
    }

    const telemetry = state.metadata.telemetry;
    const budget: Budget = {
      latencyBudget: flags.latencyBudgetS ?? 0,
      costBudget: flags.costBudgetUsd ?? 0,
      elapsed: telemetry.latencyS,
      spent: telemetry.costEstimateUsd,
    };
    if (budget.latencyBudget && budget.elapsed >= budget.latencyBudget) {
      for (const route of ["graph_rag", "swarm", "hybrid"] as const) disabled.add(route);
    }
    if (budget.costBudget && budget.spent >= budget.costBudget) {
      for (const route of ["swarm", "langchain_agent", "hybrid"] as const) disabled.add(route);
    }

    const message = lastMessage(state);
    scores.graph_rag = this.scoreGraph(message, flags, budget);
    scores.skills = this.scoreSkills(message, flags);
    scores.handoff = this.scoreHandoff(message, flags, state.metadata.agent ?? "researcher");
    scores.swarm = this.scoreSwarm(message, flags, budget);
    scores.langchain_agent = this.scoreAgentic(message, flags, budget);
    scores.workflow = this.scoreWorkflow(message, flags);

    if (this.shouldUseHybrid(message, flags, scores, disabled)) {
      scores.hybrid = 1.0;
      return { route: "hybrid", reason: "graph+rag_combo", scores };
    }

    const preferred = hint.preferredRoute;
    if (preferred) {
      scores[preferred] = Math.min(1.0, (scores[preferred] ?? 0) + hint.boost);
    }

    const ranked = SCORING_ORDER.filter((route) => scores[route] !== undefined)
      .map((route) => ({ route, score: scores[route] ?? 0 }))
      .sort((a, b) => b.score - a.score);

    for (const { route, score } of ranked) {
      if (disabled.has(route)) continue;
      if (score >= (this.thresholds[route] ?? FALLBACK_THRESHOLD)) {
        let reason = `score=${score.toFixed(2)}`;
        if (route === preferred) reason = `${reason};policy=${hint.name}`;
        if (route === "workflow") reason = "workflow_request";
        return { route, reason, scores };
      }
    }
    return { route: "rag", reason: "default_fallback", scores };
  }

  private scoreGraph(message: string, flags: RunFlags, budget: Budget): number {
    let score = 0;
    if (flags.requiresGraph) score += 0.6;
    if (GRAPH_TERMS.test(message)) score += 0.3;
    if (/\bgraph\b/i.test(message) && /\brelationship\b/i.test(message)) score += 0.2;
    if (wordCount(message) > 40) score += 0.1;
    if (budget.latencyBudget && budget.latencyBudget < this.config.graphMinLatency) score *= 0.5;
    if (budget.latencyBudget && budget.elapsed) {
      const ratio = budget.elapsed / budget.latencyBudget;
      if (ratio >= 1.0) return 0;
      if (ratio >= 0.6) score *= 0.4;
    }
    return Math.min(score, 1.0);
  }

  private scoreSkills(message: string, flags: RunFlags): number {
    let score = 0;
    if (flags.skillPack) score += 0.5;
    if (SKILL_TERMS.test(message)) score += 0.3;
    if (flags.skillTool) score += 0.2;
    return Math.min(score, 1.0);
  }

  private scoreHandoff(message: string, flags: RunFlags, currentAgent: string): number {
    if (flags.persona && flags.persona !== currentAgent) return 0.6;
    if (message.toLowerCase().includes("handoff")) return 0.4;
    return 0;
  }

  private scoreSwarm(message: string, flags: RunFlags, budget: Budget): number {
    let score = 0;
    if ((flags.taskComplexity ?? "").toLowerCase() === this.config.swarmComplexityKeyword) score += 0.5;
    if (SWARM_TERMS.test(message)) score += 0.3;
    if (wordCount(message) > 80) score += 0.1;
    if (budget.latencyBudget && budget.latencyBudget < 10) score *= 0.7;
    if (budget.latencyBudget && budget.elapsed > budget.latencyBudget * 0.7) score *= 0.5;
    if (budget.costBudget && (budget.costBudget < 0.25 || budget.spent > budget.costBudget * 0.8)) {
      score *= 0.6;
    }
    return Math.min(score, 1.0);
  }

  private scoreAgentic(message: string, flags: RunFlags, budget: Budget): number {
    let score = 0;
    if (flags.mode === "agentic") score += 0.7;
    if (AGENTIC_TERMS.test(message)) score += 0.3;
    if (flags.requireLangchain) score = 1.0;
    if (budget.costBudget && budget.spent > budget.costBudget * 0.9) score *= 0.4;
    return Math.min(score, 1.0);
  }

  private scoreWorkflow(message: string, flags: RunFlags): number {
    if (flags.mode === "architect") return 1.0;
    let score = 0;
    if (flags.workflowIntent) score += 0.6;
    if (WORKFLOW_TERMS.test(message)) score += 0.4;
    if ((flags.persona ?? "").toLowerCase().includes("architect")) score += 0.2;
    return Math.min(score, 1.0);
  }

  private shouldUseHybrid(
    message: string,
    flags: RunFlags,
    scores: Partial<Record<RouteName, number>>,
    disabled: Set<RouteName>,
  ): boolean {
    if (disabled.has("hybrid") || !flags.allowHybrid) return false;
    if (flags.mode === "hybrid") return true;
    const graphScore = scores.graph_rag ?? 0;
    if (graphScore < (this.thresholds.graph_rag ?? DEFAULT_THRESHOLDS.graph_rag ?? FALLBACK_THRESHOLD)) {
      return false;
    }
    return wordCount(message) > 60 && COMPARATIVE_TERMS.test(message);
  }
}
