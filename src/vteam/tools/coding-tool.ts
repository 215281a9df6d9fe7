/**
 * Coding-tool dispatch. External coding assistants are driven as subprocesses:
 * the instruction goes in on stdin, a status line comes back. Failures are
 * returned as outcomes, never thrown.
 */

import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { errorMessage } from "../runtime/errors.js";

/** Maximum characters of stdout/stderr kept in the status text */
const MAX_STREAM_CHARS = 4000;

/** Grace period between SIGTERM and SIGKILL */
const KILL_GRACE_MS = 5000;

/** Exit status a shell reports for an unknown command */
const SHELL_NOT_FOUND = 127;

export interface DispatchRequest {
  instruction: string;
  repoPath?: string;
  branch?: string;
  sessionId?: string;
  sessionName?: string;
  phase?: string;
  dryRun?: boolean;
}

export interface DispatchOutcome {
  ok: boolean;
  /** Status text, e.g. "[coder] exit=0 stdout=..." */
  text: string;
  exitCode: number | null;
  timedOut: boolean;
  dryRun: boolean;
}

export interface CodingTool {
  readonly name: string;
  dispatch(request: DispatchRequest): Promise<DispatchOutcome>;
}

export interface CliCodingToolOptions {
  name: string;
  /** Shell command line; instruction is written to its stdin */
  command?: string;
  timeoutS: number;
  auditLogPath: string;
  /** Heading of the formatted instruction */
  title?: string;
  logger?: VteamLogger;
}

/**
 * Header block sent ahead of the instruction
 */
export function formatInstruction(request: DispatchRequest, title: string): string {
  const lines = [
    `# ${title}`,
    `Repository: ${request.repoPath ?? "unspecified"}`,
    `Branch: ${request.branch ?? "current"}`,
  ];
  if (request.sessionName) lines.push(`Session: ${request.sessionName}`);
  if (request.phase) lines.push(`Phase: ${request.phase}`);
  lines.push("Instruction:", request.instruction, "");
  return lines.join("\n");
}

function clip(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_STREAM_CHARS ? trimmed.slice(0, MAX_STREAM_CHARS) : trimmed;
}

export class CliCodingTool implements CodingTool {
  readonly name: string;
  private readonly logger: VteamLogger;

  constructor(private readonly options: CliCodingToolOptions) {
    this.name = options.name;
    this.logger = options.logger ?? createSilentLogger();
  }

  async dispatch(request: DispatchRequest): Promise<DispatchOutcome> {
    const outcome = await this.execute(request);
    await this.audit(request, outcome);
    this.logger.dispatch(this.name, request.instruction, outcome.text);
    return outcome;
  }

  private async execute(request: DispatchRequest): Promise<DispatchOutcome> {
    const tag = `[${this.name}]`;
    const instruction = request.instruction.trim();
    const fail = (text: string, exitCode: number | null = null): DispatchOutcome => ({
      ok: false,
      text: `${tag} ${text}`,
      exitCode,
      timedOut: false,
      dryRun: request.dryRun ?? false,
    });

    if (!instruction) {
      return fail("No instruction supplied.");
    }
    const command = this.options.command;
    if (!command) {
      return fail(`No command configured; instruction logged to ${this.options.auditLogPath}.`);
    }
    if (request.dryRun) {
      return {
        ok: true,
        text: `${tag} Dry-run: would run '${command}'; instruction logged to ${this.options.auditLogPath}.`,
        exitCode: null,
        timedOut: false,
        dryRun: true,
      };
    }

    const payload = formatInstruction({ ...request, instruction }, this.options.title ?? "Coding Task");
    const env: NodeJS.ProcessEnv = { ...process.env };
    if (request.repoPath) env.VTEAM_TARGET_REPO = request.repoPath;
    if (request.branch) env.VTEAM_TARGET_BRANCH = request.branch;
    if (request.sessionId) env.VTEAM_SESSION_ID = request.sessionId;
    if (request.sessionName) env.VTEAM_SESSION_NAME = request.sessionName;
    if (request.phase) env.VTEAM_PHASE = request.phase;

    const timeoutS = this.options.timeoutS;

    return new Promise((resolve) => {
      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let settled = false;

      const proc = spawn(command, {
        cwd: request.repoPath,
        env,
        shell: true,
      });

      const timeout = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGTERM");
        setTimeout(() => {
          if (proc.exitCode === null) {
            proc.kill("SIGKILL");
          }
        }, KILL_GRACE_MS).unref();
      }, timeoutS * 1000);

      proc.stdout.on("data", (data: Buffer) => {
        if (stdout.length < MAX_STREAM_CHARS) stdout += data.toString();
      });
      proc.stderr.on("data", (data: Buffer) => {
        if (stderr.length < MAX_STREAM_CHARS) stderr += data.toString();
      });
      // The child may exit before reading stdin
      proc.stdin.on("error", (error) => {
        this.logger.debug(`${this.name} closed stdin early`, { error: error.message });
      });
      proc.stdin.end(payload);

      proc.on("close", (code) => {
        clearTimeout(timeout);
        if (settled) return;
        settled = true;
        if (timedOut) {
          resolve({ ...fail(`Timed out after ${timeoutS}s running '${command}'.`, code), timedOut: true });
          return;
        }
        if (code === SHELL_NOT_FOUND) {
          resolve(fail(`CLI command '${command}' not found.`, code));
          return;
        }
        const parts = [`exit=${code ?? "unknown"}`];
        if (stdout.trim()) parts.push(`stdout=${clip(stdout)}`);
        if (stderr.trim()) parts.push(`stderr=${clip(stderr)}`);
        resolve({
          ok: code === 0,
          text: `${tag} ${parts.join(" ")}`,
          exitCode: code,
          timedOut: false,
          dryRun: false,
        });
      });

      proc.on("error", (error: NodeJS.ErrnoException) => {
        clearTimeout(timeout);
        if (settled) return;
        settled = true;
        resolve(
          error.code === "ENOENT"
            ? fail(`CLI command '${command}' not found (${error.message}).`)
            : fail(`CLI error: ${error.message}`),
        );
      });
    });
  }

  private async audit(request: DispatchRequest, outcome: DispatchOutcome): Promise<void> {
    const entry = {
      timestamp: new Date().toISOString(),
      tool: this.name,
      instruction: request.instruction,
      repoPath: request.repoPath ?? null,
      branch: request.branch ?? null,
      sessionId: request.sessionId ?? null,
      sessionName: request.sessionName ?? null,
      phase: request.phase ?? null,
      dryRun: outcome.dryRun,
      ok: outcome.ok,
      exitCode: outcome.exitCode,
      timedOut: outcome.timedOut,
    };
    try {
      await fs.mkdir(path.dirname(this.options.auditLogPath), { recursive: true });
      await fs.appendFile(this.options.auditLogPath, JSON.stringify(entry) + "\n", "utf-8");
    } catch (error) {
      this.logger.warn("Failed to append dispatch audit", { error: errorMessage(error) });
    }
  }
}
