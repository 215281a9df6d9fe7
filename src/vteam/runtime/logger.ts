/**
 * Logging infrastructure for vteam
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { LoggingConfig } from "../config/types.js";
import type { RunId, AuditLogEntry, IOAuditRecord } from "./context.js";
import { getConfigDir } from "../config/loader.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger instance for a run
 */
export interface VteamLogger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  stage: (name: string, durationMs: number, data?: Record<string, unknown>) => void;
  dispatch: (tool: string, instruction: string, result: string) => void;
  flush: () => Promise<void>;
}

/**
 * Format a log message for console output
 */
function formatConsoleMessage(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  config?: LoggingConfig,
): string {
  const parts: string[] = [];

  if (config?.timestamps ?? true) {
    parts.push(`[${new Date().toISOString()}]`);
  }

  parts.push(`[${level.toUpperCase().padEnd(5)}]`);
  parts.push(message);

  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }

  return parts.join(" ");
}

/**
 * Format a log entry as JSON
 */
function formatJsonLog(
  level: LogLevel,
  message: string,
  runId: RunId,
  data?: Record<string, unknown>,
): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    runId,
    message,
    ...data,
  });
}

/**
 * Create a logger for a run
 */
export function createLogger(
  runId: RunId,
  config: LoggingConfig,
  options?: {
    quiet?: boolean;
    verbose?: boolean;
  },
): VteamLogger {
  const logBuffer: string[] = [];
  const effectiveLevel: LogLevel = options?.verbose ? "debug" : config.level;
  const shouldLog = (level: LogLevel): boolean =>
    LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[effectiveLevel];

  const log = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (!shouldLog(level)) return;

    const formattedLine = config.jsonLogs
      ? formatJsonLog(level, message, runId, data)
      : formatConsoleMessage(level, message, data, config);

    logBuffer.push(formattedLine);

    if (!options?.quiet) {
      const output = level === "error" ? console.error : console.log;
      output(formattedLine);
    }
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),

    stage: (name, durationMs, data) => {
      log("debug", `Stage: ${name}`, { duration_ms: durationMs, ...data });
    },

    dispatch: (tool, instruction, result) => {
      log("info", `Dispatch: ${tool}`, {
        instruction: instruction.slice(0, 160),
        result: result.slice(0, 240),
      });
    },

    flush: async () => {
      if (!config.logDir || logBuffer.length === 0) return;

      const logDir = config.logDir.startsWith("~")
        ? path.join(getConfigDir(), "logs")
        : config.logDir;

      await fs.mkdir(logDir, { recursive: true });

      const logFile = path.join(logDir, `${runId}.log`);
      await fs.appendFile(logFile, logBuffer.join("\n") + "\n");
      logBuffer.length = 0;
    },
  };
}

/**
 * Write audit log to file
 */
export async function writeAuditLog(
  runId: RunId,
  entries: AuditLogEntry[],
  logDir: string,
): Promise<string> {
  await fs.mkdir(logDir, { recursive: true });

  const logFile = path.join(logDir, `${runId}.jsonl`);
  const content = entries.map((e) => JSON.stringify(e)).join("\n") + "\n";

  await fs.writeFile(logFile, content);
  return logFile;
}

/**
 * Append one IO audit record for a finished run
 */
export async function appendIOAudit(record: IOAuditRecord, logDir: string): Promise<string> {
  await fs.mkdir(logDir, { recursive: true });
  const logFile = path.join(logDir, "io_audit.jsonl");
  await fs.appendFile(logFile, JSON.stringify(record) + "\n");
  return logFile;
}

/**
 * Read audit log from file
 */
export async function readAuditLog(runId: RunId, logDir: string): Promise<AuditLogEntry[]> {
  const logFile = path.join(logDir, `${runId}.jsonl`);

  try {
    const content = await fs.readFile(logFile, "utf-8");
    return content
      .trim()
      .split("\n")
      .filter((line) => line)
      .map((line) => JSON.parse(line) as AuditLogEntry);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/**
 * List available run logs
 */
export async function listRunLogs(logDir: string): Promise<
  Array<{
    runId: RunId;
    timestamp: Date;
    size: number;
  }>
> {
  try {
    const files = await fs.readdir(logDir);
    const logs: Array<{ runId: RunId; timestamp: Date; size: number }> = [];

    for (const file of files) {
      if (!file.endsWith(".jsonl") || file === "io_audit.jsonl") continue;

      const runId = file.replace(".jsonl", "");
      const stats = await fs.stat(path.join(logDir, file));

      logs.push({
        runId,
        timestamp: stats.mtime,
        size: stats.size,
      });
    }

    return logs.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/**
 * Logger that drops everything; used when a collaborator is built without one
 */
export function createSilentLogger(): VteamLogger {
  const noop = (): void => undefined;
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    stage: noop,
    dispatch: noop,
    flush: async () => undefined,
  };
}
