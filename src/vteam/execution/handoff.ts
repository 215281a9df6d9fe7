/**
 * Handoff report parsing. A report is markdown with "## <Section>" headers,
 * each holding fenced Command and Result blocks.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import type { HandoffStatus } from "../runtime/state.js";

export type CommandStatus = "success" | "failed" | "skipped" | "unknown";

export interface ReportCommand {
  section: string;
  command: string;
  workdir: string;
  status: CommandStatus;
  resultExcerpt: string;
  errorSignature: string | null;
  errorHash: string | null;
}

export interface HandoffEvaluation {
  status: HandoffStatus;
  missingSections: string[];
  commands: ReportCommand[];
  failed: ReportCommand[];
}

const SECTION_RE = /^##\s+(.+)$/gm;
const WORKDIR_RE = /workdir:\s*`([^`]+)`/i;
const MAX_EXCERPT = 800;
const MAX_SIGNATURE = 240;

export function splitSections(text: string): Array<{ name: string; body: string }> {
  const matches = [...text.matchAll(SECTION_RE)];
  return matches.map((match, idx) => {
    const start = (match.index ?? 0) + match[0].length;
    const next = matches[idx + 1];
    const end = next ? (next.index ?? text.length) : text.length;
    return { name: match[1].trim(), body: text.slice(start, end).trim() };
  });
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function stripInfoString(block: string): string {
  const newline = block.indexOf("\n");
  if (newline === -1) return block.trim();
  const first = block.slice(0, newline).trim();
  return /^[\w+-]*$/.test(first) ? block.slice(newline + 1).trim() : block.trim();
}

/**
 * Content of the first fenced block after the label, or the next non-empty line
 */
export function extractLabeledBlock(body: string, label: string): string {
  const fenced = new RegExp(`${escapeRegExp(label)}[\\s\\S]*?\`\`\`([\\s\\S]*?)\`\`\``, "i");
  const match = fenced.exec(body);
  if (match) return stripInfoString(match[1]);

  const lines = body.split("\n");
  const idx = lines.findIndex((line) => line.trim().toLowerCase().startsWith(label.toLowerCase()));
  if (idx === -1) return "";
  const next = lines.slice(idx + 1).find((line) => line.trim());
  return next ? next.trim() : "";
}

function countMetric(text: string, label: string): number | null {
  const match = new RegExp(`${label}\\s*:\\s*(\\d+)`, "i").exec(text);
  return match ? Number.parseInt(match[1], 10) : null;
}

function hasErrorLine(text: string): boolean {
  return text.split("\n").some((line) => {
    const lowered = line.trim().toLowerCase();
    if (!lowered) return false;
    if (!lowered.includes("error") && !lowered.includes("exception") && !lowered.includes("failed to")) {
      return false;
    }
    return !lowered.includes("errors: 0") && !lowered.includes("failures: 0");
  });
}

function isFailure(result: string): boolean {
  if (result.includes("build failure") || result.includes("build failed")) return true;
  if (result.includes("operation not permitted") || result.includes("permission denied")) return true;
  const failures = countMetric(result, "failures");
  const errors = countMetric(result, "errors");
  if ((failures !== null && failures > 0) || (errors !== null && errors > 0)) return true;
  return hasErrorLine(result);
}

export function inferStatus(command: string, result: string): CommandStatus {
  const commandLower = command.trim().toLowerCase();
  const resultLower = result.trim().toLowerCase();
  if (!command || commandLower.startsWith("n/a")) return "skipped";
  if (["not run", "skipped", "deferred"].some((token) => resultLower.includes(token))) return "skipped";
  if (isFailure(resultLower)) return "failed";
  return result ? "success" : "unknown";
}

/**
 * First line that explains a failure, capped in length
 */
export function errorSignature(result: string): string | null {
  for (const line of result.split("\n")) {
    const lowered = line.trim().toLowerCase();
    if (!lowered) continue;
    const explains =
      lowered.includes("build failure") ||
      lowered.includes("operation not permitted") ||
      lowered.includes("permission denied") ||
      lowered.includes("failed to execute goal") ||
      lowered.includes("exception") ||
      (lowered.includes("error") && !lowered.includes("errors: 0"));
    if (explains) return line.trim().slice(0, MAX_SIGNATURE);
  }
  return null;
}

export function hashSignature(signature: string | null): string | null {
  if (!signature) return null;
  return createHash("sha1").update(signature, "utf-8").digest("hex").slice(0, 12);
}

/**
 * Command entries of every section that has a Command or Result
 */
export function extractReportCommands(text: string): ReportCommand[] {
  const entries: ReportCommand[] = [];
  for (const { name, body } of splitSections(text)) {
    const command = extractLabeledBlock(body, "Command");
    const result = extractLabeledBlock(body, "Result");
    if (!command && !result) continue;
    const status = inferStatus(command, result);
    const signature = status === "failed" ? errorSignature(result) : null;
    entries.push({
      section: name,
      command,
      workdir: WORKDIR_RE.exec(body)?.[1].trim() ?? "",
      status,
      resultExcerpt: result.trim().slice(0, MAX_EXCERPT),
      errorSignature: signature,
      errorHash: hashSignature(signature),
    });
  }
  return entries;
}

/**
 * Required sections with no matching header (case-insensitive prefix match)
 */
export function findMissingSections(text: string, required: string[]): string[] {
  const present = splitSections(text).map((section) => section.name.toLowerCase());
  return required.filter((name) => {
    const wanted = name.toLowerCase();
    return !present.some((header) => header === wanted || header.startsWith(`${wanted} `));
  });
}

export function evaluateReport(text: string | null, required: string[]): HandoffEvaluation {
  if (text === null) {
    return { status: "missing", missingSections: [...required], commands: [], failed: [] };
  }
  const missingSections = findMissingSections(text, required);
  const commands = extractReportCommands(text);
  const failed = commands.filter((entry) => entry.status === "failed");
  const status: HandoffStatus = missingSections.length === 0 && failed.length === 0 ? "ready" : "incomplete";
  return { status, missingSections, commands, failed };
}

/**
 * Report contents, or null when the file does not exist
 */
export async function readReport(repoPath: string, reportPath: string): Promise<string | null> {
  try {
    return await fs.readFile(path.resolve(repoPath, reportPath), "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }
}
