/**
 * Golden rules: one-line lessons distilled from a failure and the fix that
 * followed it, stored in temporal memory and replayed into later phase
 * instructions for the same repository.
 */

import type { CodingTool } from "../tools/coding-tool.js";
import type { TemporalMemory } from "../memory/temporal.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";

export const GOLDEN_RULE_CATEGORY = "golden_rule";

/** Rules must stay under this many words */
export const GOLDEN_RULE_MAX_WORDS = 30;

const RULE_RE = /Golden Rule:\s*(.+?)(?=\s+stderr=|$)/im;

export interface GoldenRuleInput {
  repoPath: string;
  phase: string;
  /** First line of the failure that triggered debugging */
  failureSignature: string;
  /** What made the phase pass afterwards */
  fix: string;
  branch?: string;
  sessionId?: string;
  sessionName?: string;
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Rule text from a "Golden Rule: <rule>" line, or null if absent or too long
 */
export function parseGoldenRule(text: string): string | null {
  const match = RULE_RE.exec(text);
  if (!match) return null;
  const rule = match[1].trim().replace(/^["'`]+|["'`]+$/g, "").trim();
  const words = wordCount(rule);
  return words > 0 && words < GOLDEN_RULE_MAX_WORDS ? rule : null;
}

/**
 * Rule derived from the failure signature alone
 */
export function fallbackGoldenRule(phase: string, failureSignature: string): string {
  const head = `In ${phase}, fix`;
  const tail = "before re-running acceptance tests.";
  const budget = GOLDEN_RULE_MAX_WORDS - 1 - wordCount(head) - wordCount(tail);
  const words = failureSignature.replace(/\s+/g, " ").trim().split(" ").filter(Boolean);
  const signature = words.length > 0 ? words.slice(0, Math.max(1, budget)).join(" ") : "the failure";
  return `${head} "${signature}" ${tail}`;
}

export function buildRulePrompt(input: GoldenRuleInput): string {
  return [
    "Summarize the lesson from this failure and fix as one reusable rule.",
    `Reply with exactly one line: "Golden Rule: <rule>" in fewer than ${GOLDEN_RULE_MAX_WORDS} words.`,
    `Phase: ${input.phase}`,
    `Failure: ${input.failureSignature}`,
    `Fix: ${input.fix}`,
  ].join("\n");
}

export class GoldenRuleDistiller {
  private readonly logger: VteamLogger;

  constructor(
    private readonly memory: TemporalMemory,
    private readonly reviewTool?: CodingTool,
    logger?: VteamLogger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  /**
   * Distill a rule and queue it for storage; returns the rule text
   */
  async distill(input: GoldenRuleInput, dryRun = false): Promise<string> {
    let rule: string | null = null;
    if (this.reviewTool) {
      const outcome = await this.reviewTool.dispatch({
        instruction: buildRulePrompt(input),
        repoPath: input.repoPath,
        branch: input.branch,
        sessionId: input.sessionId,
        sessionName: input.sessionName,
        phase: input.phase,
        dryRun,
      });
      rule = outcome.ok ? parseGoldenRule(outcome.text) : null;
      if (!rule) {
        this.logger.debug("Review tool gave no usable golden rule", { result: outcome.text.slice(0, 200) });
      }
    }
    rule ??= fallbackGoldenRule(input.phase, input.failureSignature);

    this.memory.write({
      text: rule,
      category: GOLDEN_RULE_CATEGORY,
      importance: 0.8,
      source: "debugger",
      metadata: { repo: input.repoPath, phase: input.phase },
    });
    this.logger.info("Golden rule recorded", { phase: input.phase, rule });
    return rule;
  }

  /**
   * Rules previously learned on a repository, best first
   */
  async forRepo(repoPath: string, query: string, limit = 3): Promise<string[]> {
    const found = await this.memory.search(query, {
      topK: limit,
      category: GOLDEN_RULE_CATEGORY,
      where: (memory) => memory.metadata.repo === repoPath,
    });
    return [...new Set(found.map((memory) => memory.text))];
  }
}
