/**
 * Command-run log: every command parsed from a handoff report is appended to
 * a JSON-lines file so later phases can learn which commands fixed a failure.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ReportCommand } from "./handoff.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { errorMessage } from "../runtime/errors.js";

export const CommandRunEntrySchema = z.object({
  timestamp: z.string(),
  repoPath: z.string(),
  branch: z.string().nullable(),
  phase: z.string().nullable(),
  sessionId: z.string().nullable(),
  sessionName: z.string().nullable(),
  reportPath: z.string(),
  section: z.string(),
  command: z.string(),
  workdir: z.string(),
  status: z.enum(["success", "failed", "skipped", "unknown"]),
  resultExcerpt: z.string(),
  errorSignature: z.string().nullable(),
  errorHash: z.string().nullable(),
});

export type CommandRunEntry = z.infer<typeof CommandRunEntrySchema>;

export interface CommandRunSource {
  repoPath: string;
  branch?: string;
  phase?: string;
  sessionId?: string;
  sessionName?: string;
  reportPath: string;
}

export function formatHint(failure: CommandRunEntry, success: CommandRunEntry): string {
  if (!success.command) return "";
  const section = failure.section || "command";
  const signature = failure.errorSignature || "failure";
  const workdir = success.workdir || ".";
  return `${section} failed before (${signature}); last working command: \`${success.command}\` (workdir: ${workdir}).`;
}

export class CommandRunLog {
  constructor(
    private readonly logPath: string,
    private readonly logger: VteamLogger = createSilentLogger(),
  ) {}

  async append(source: CommandRunSource, commands: ReportCommand[]): Promise<number> {
    if (commands.length === 0) return 0;
    const timestamp = new Date().toISOString();
    const lines = commands.map((command) => {
      const entry: CommandRunEntry = {
        timestamp,
        repoPath: source.repoPath,
        branch: source.branch ?? null,
        phase: source.phase ?? null,
        sessionId: source.sessionId ?? null,
        sessionName: source.sessionName ?? null,
        reportPath: source.reportPath,
        ...command,
      };
      return JSON.stringify(entry);
    });
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    await fs.appendFile(this.logPath, lines.join("\n") + "\n", "utf-8");
    return lines.length;
  }

  async entries(): Promise<CommandRunEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.logPath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw error;
    }
    const entries: CommandRunEntry[] = [];
    for (const line of content.split("\n")) {
      if (!line.trim()) continue;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        this.logger.warn("Skipping unreadable command-run line", { error: errorMessage(error) });
        continue;
      }
      const parsed = CommandRunEntrySchema.safeParse(raw);
      if (parsed.success) entries.push(parsed.data);
    }
    return entries;
  }

  /**
   * For each (section, workdir), a failure followed later by a success becomes a hint
   */
  async loadHints(repoPath: string, phase?: string, limit = 4): Promise<string[]> {
    const hints: string[] = [];
    const pendingFailures = new Map<string, CommandRunEntry>();

    for (const entry of await this.entries()) {
      if (entry.repoPath !== repoPath) continue;
      if (phase && entry.phase !== phase) continue;
      const key = `${entry.section || "unknown"}\u0000${entry.workdir}`;
      if (entry.status === "failed") {
        pendingFailures.set(key, entry);
        continue;
      }
      if (entry.status !== "success") continue;
      const failure = pendingFailures.get(key);
      if (!failure) continue;
      const hint = formatHint(failure, entry);
      if (hint && !hints.includes(hint)) hints.push(hint);
      if (hints.length >= limit) break;
    }
    return hints;
  }
}
