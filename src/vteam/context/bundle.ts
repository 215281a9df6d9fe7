/**
 * Context bundle: the markdown block of pinned rules, summary, pointers and
 * retrieved snippets prepended to role and phase instructions.
 */

import type { ContextEntry, ContextMode } from "./store.js";
import { DEFAULT_PINNED_RULES } from "./store.js";
import type { ScoredMemory } from "../memory/temporal.js";
import { checkpointLine, type RepoState } from "./repo-state.js";

/** Character budget per section */
const PLANNING_BUDGETS = {
  pinned: 350,
  diff: 600,
  repo: 200,
  decisions: 600,
  summary: 800,
  files: 300,
  retrieved: 300,
  tasks: 400,
  evidence: 150,
};

const IMPLEMENTATION_BUDGETS: typeof PLANNING_BUDGETS = {
  ...PLANNING_BUDGETS,
  retrieved: 200,
};

/** Retrieved memories below this score are left out */
export const MIN_SNIPPET_SCORE = 0.5;

export interface BundleInput {
  mode: ContextMode;
  entry: ContextEntry;
  filePointers?: string[];
  /** Current repository state; adds the checkpoint line and changed files */
  repoState?: RepoState | null;
  retrieved?: ScoredMemory[];
  taskChecklist?: string[];
}

/**
 * Title line followed by as many lines as fit in the budget
 */
export function formatSection(title: string, lines: string[], limit: number): string {
  const header = `${title}:`;
  const output = [header];
  let used = header.length + 1;
  for (const line of lines) {
    const candidate = line.trimEnd();
    if (!candidate) continue;
    if (used + candidate.length + 1 > limit) break;
    output.push(candidate);
    used += candidate.length + 1;
  }
  return output.length > 1 ? output.join("\n") : "";
}

function bullets(items: string[]): string[] {
  return items.map((item) => item.trim()).filter(Boolean).map((item) => `- ${item}`);
}

function unique(items: string[]): string[] {
  return [...new Set(items)];
}

function diffLines(repoState: RepoState | null | undefined, stale: boolean): string[] {
  const files = repoState?.diffFiles ?? [];
  const lines = stale ? ["- Context is STALE; refresh file evidence before changes."] : [];
  if (files.length > 0) lines.push("Changed files:", ...bullets(files));
  return lines;
}

export function buildContextBundle(input: BundleInput): string {
  const budgets = input.mode === "planning" ? PLANNING_BUDGETS : IMPLEMENTATION_BUDGETS;
  const { entry } = input;
  const sections: string[] = [];

  const pinned = entry.pinnedRules.length > 0 ? entry.pinnedRules : DEFAULT_PINNED_RULES;
  sections.push(formatSection("Pinned rules", bullets(pinned), budgets.pinned));

  const stale = entry.workingSummary.stale;
  if (input.mode === "planning") {
    if (stale) {
      sections.push(formatSection("Diff-first summary", diffLines(input.repoState, stale), budgets.diff));
    }
    if (input.repoState) {
      sections.push(formatSection("Repo checkpoint", [checkpointLine(input.repoState, stale)], budgets.repo));
    }
    sections.push(formatSection("Open decisions", bullets(entry.openDecisions.slice(-5)), budgets.decisions));
    const summary = entry.workingSummary.text.trim();
    if (summary) {
      const header = stale ? "Working summary (STALE - do not trust)" : "Working summary";
      sections.push(formatSection(header, summary.split("\n"), budgets.summary));
    }
    const pointers = unique([...(input.filePointers ?? []), ...entry.filePointers]);
    sections.push(formatSection("File pointers", bullets(pointers), budgets.files));
  } else {
    sections.push(formatSection("Diff-first summary", diffLines(input.repoState, stale), budgets.diff));
    sections.push(formatSection("Next steps", bullets(input.taskChecklist ?? []), budgets.tasks));
    sections.push(
      formatSection(
        "Evidence reminder",
        ["- Claims require file paths and line refs or symbol names."],
        budgets.evidence,
      ),
    );
  }

  const snippets = (input.retrieved ?? [])
    .filter((memory) => memory.score >= MIN_SNIPPET_SCORE)
    .map((memory) => memory.text);
  sections.push(formatSection("Retrieved snippets", bullets(snippets), budgets.retrieved));

  return sections.filter(Boolean).join("\n\n").trim();
}
