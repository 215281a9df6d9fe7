/**
 * Shared context store. Planning and implementation context for a workstream
 * (repo + branch + feature) persists across runs in JSON files under the
 * configured directory. Each write re-reads the file under a lock and only
 * commits an entry whose version has not moved since it was read.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import type { FileHandle } from "node:fs/promises";
import { z } from "zod";
import { EvidenceEntrySchema } from "../runtime/scenario.js";
import { VteamError, VteamErrorCode } from "../runtime/errors.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";

export const SCHEMA_VERSION = 1;

/** Attempts before an update gives up with CONCURRENT_UPDATE */
export const MAX_UPDATE_ATTEMPTS = 3;

/** Lock file polling: attempts, delay between them, and age after which a lock is abandoned */
export const LOCK_ATTEMPTS = 100;
export const LOCK_WAIT_MS = 20;
export const LOCK_STALE_MS = 30_000;

const fileQueues = new Map<string, Promise<unknown>>();

/**
 * Run `task` after every earlier task queued for the same file in this process
 */
function serialized<R>(filePath: string, task: () => Promise<R>): Promise<R> {
  const previous = fileQueues.get(filePath) ?? Promise.resolve();
  const result = previous.then(task, task);
  const tail = result.then(
    () => undefined,
    () => undefined,
  );
  fileQueues.set(filePath, tail);
  return result;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exclusive lock file shared with other processes; a lock older than
 * LOCK_STALE_MS is treated as left behind by a crashed writer
 */
async function withFileLock<R>(filePath: string, task: () => Promise<R>): Promise<R> {
  const lockPath = `${filePath}.lock`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  let handle: FileHandle | undefined;
  for (let attempt = 1; attempt <= LOCK_ATTEMPTS && !handle; attempt++) {
    try {
      handle = await fs.open(lockPath, "wx");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "EEXIST") throw error;
      const stat = await fs.stat(lockPath).catch(() => null);
      if (stat && Date.now() - stat.mtimeMs > LOCK_STALE_MS) {
        await fs.rm(lockPath, { force: true });
        continue;
      }
      await sleep(LOCK_WAIT_MS);
    }
  }
  if (!handle) {
    throw new VteamError(VteamErrorCode.CONCURRENT_UPDATE, `Could not lock ${filePath}`, { lockPath });
  }
  try {
    return await task();
  } finally {
    await handle.close();
    await fs.rm(lockPath, { force: true });
  }
}

export const DEFAULT_PINNED_RULES = [
  "Repo state is truth; never assume unstated facts.",
  "Evidence required for done/implemented/fixed claims.",
  "If unsure, request file pointers instead of guessing.",
];

export type ContextMode = "planning" | "implementation";

export const ContextKeySchema = z.object({
  repo: z.string(),
  branch: z.string(),
  workstreamId: z.string(),
});

export type ContextKey = z.infer<typeof ContextKeySchema>;

export const PhaseExecutionRecordSchema = z.object({
  phaseName: z.string(),
  owners: z.array(z.string()),
  session: z.object({ id: z.string(), name: z.string() }),
  toolCalls: z.array(z.object({ tool: z.string(), instruction: z.string(), result: z.string() })),
  handoffStatus: z.enum(["ready", "incomplete", "missing", "not_required"]),
  status: z.enum(["completed", "failed", "blocked", "skipped"]),
  debugAttempts: z.number(),
  goldenRule: z.string().optional(),
  summary: z.string(),
});

/** Repository state recorded with the working summary */
export const RepoCheckpointSchema = z.object({
  gitHead: z.string().nullable().default(null),
  trackedFilesHash: z.string().nullable().default(null),
});

export type RepoCheckpoint = z.infer<typeof RepoCheckpointSchema>;

export const ContextEntrySchema = z.object({
  key: ContextKeySchema,
  version: z.number().int().nonnegative(),
  featureRequest: z.string().default(""),
  pinnedRules: z.array(z.string()).default(() => [...DEFAULT_PINNED_RULES]),
  workingSummary: z
    .object({
      text: z.string().default(""),
      updatedAt: z.string().default(""),
      stale: z.boolean().default(false),
    })
    .default({}),
  openDecisions: z.array(z.string()).default([]),
  evidenceLedger: z.array(EvidenceEntrySchema).default([]),
  filePointers: z.array(z.string()).default([]),
  lastRun: z
    .object({
      status: z.enum(["ok", "failed"]),
      error: z.string().nullable(),
      nextAction: z.string().nullable(),
      updatedAt: z.string(),
    })
    .optional(),
  phaseRecords: z.array(PhaseExecutionRecordSchema).default([]),
  repoCheckpoint: RepoCheckpointSchema.default({}),
});

export type ContextEntry = z.infer<typeof ContextEntrySchema>;

export const SessionInfoSchema = z.object({
  sessionId: z.string(),
  sessionName: z.string(),
  initialized: z.boolean().default(false),
});

export type SessionInfo = z.infer<typeof SessionInfoSchema>;

export const SessionEntrySchema = z.object({
  key: ContextKeySchema,
  version: z.number().int().nonnegative(),
  sessions: z.record(z.string(), SessionInfoSchema).default({}),
  updatedAt: z.string().default(""),
});

export type SessionEntry = z.infer<typeof SessionEntrySchema>;

/**
 * Lowercase alphanumerics joined by single dashes, at most 48 characters
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 48);
}

export function resolveContextKey(options: {
  repoPath?: string;
  branch?: string;
  workstreamId?: string;
  featureRequest?: string;
}): ContextKey {
  return {
    repo: path.resolve(options.repoPath ?? process.cwd()),
    branch: options.branch || "current",
    workstreamId: options.workstreamId || slugify(options.featureRequest ?? "") || "default",
  };
}

function sameKey(a: ContextKey, b: ContextKey): boolean {
  return a.repo === b.repo && a.branch === b.branch && a.workstreamId === b.workstreamId;
}

const StoreFileSchema = z.object({
  schemaVersion: z.number().default(SCHEMA_VERSION),
  entries: z.array(z.unknown()).default([]),
});

/**
 * One JSON file of versioned entries keyed by ContextKey
 */
class VersionedFile<T extends { key: ContextKey; version: number }> {
  constructor(
    private readonly filePath: string,
    private readonly entrySchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly create: (key: ContextKey) => T,
    private readonly logger: VteamLogger,
  ) {}

  async read(): Promise<T[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw error;
    }
    const file = StoreFileSchema.safeParse(JSON.parse(content));
    if (!file.success) {
      throw new VteamError(
        VteamErrorCode.CONFIG_INVALID,
        `Invalid context store ${this.filePath}: ${file.error.message}`,
      );
    }
    return file.data.entries.map((raw, idx) => {
      const entry = this.entrySchema.safeParse(raw);
      if (!entry.success) {
        throw new VteamError(
          VteamErrorCode.CONFIG_INVALID,
          `Invalid entry ${idx} in ${this.filePath}: ${entry.error.message}`,
        );
      }
      return entry.data;
    });
  }

  async find(key: ContextKey): Promise<T | null> {
    return (await this.read()).find((entry) => sameKey(entry.key, key)) ?? null;
  }

  /**
   * Read and mutate without holding the lock, then commit under it only if
   * nobody bumped the entry's version meanwhile. Other entries in the file
   * are taken from the locked re-read, never from the first read.
   */
  async update(key: ContextKey, mutate: (entry: T) => T | Promise<T>): Promise<T> {
    for (let attempt = 1; attempt <= MAX_UPDATE_ATTEMPTS; attempt++) {
      const current = (await this.find(key)) ?? this.create(key);
      const readVersion = current.version;
      const next = await mutate(structuredClone(current));

      const committed = await this.locked(async () => {
        const entries = await this.read();
        const idx = entries.findIndex((entry) => sameKey(entry.key, key));
        const storedVersion = idx === -1 ? 0 : entries[idx].version;
        if (storedVersion !== readVersion) {
          this.logger.debug("Context entry changed during update; retrying", {
            file: this.filePath,
            attempt,
            readVersion,
            storedVersion,
          });
          return null;
        }
        const entry: T = { ...next, key, version: readVersion + 1 };
        if (idx === -1) entries.push(entry);
        else entries[idx] = entry;
        await this.write(entries);
        return entry;
      });
      if (committed) return committed;
    }
    throw new VteamError(
      VteamErrorCode.CONCURRENT_UPDATE,
      `Context entry ${key.workstreamId}@${key.branch} kept changing during update`,
      { key, attempts: MAX_UPDATE_ATTEMPTS },
    );
  }

  private locked<R>(task: () => Promise<R>): Promise<R> {
    return serialized(this.filePath, () => withFileLock(this.filePath, task));
  }

  private async write(entries: T[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${randomBytes(4).toString("hex")}.tmp`;
    const body = JSON.stringify({ schemaVersion: SCHEMA_VERSION, entries }, null, 2) + "\n";
    await fs.writeFile(tmp, body, "utf-8");
    await fs.rename(tmp, this.filePath);
  }
}

export class ContextStore {
  private readonly contexts: Record<ContextMode, VersionedFile<ContextEntry>>;
  private readonly sessions: Record<ContextMode, VersionedFile<SessionEntry>>;

  constructor(
    readonly dir: string,
    logger: VteamLogger = createSilentLogger(),
  ) {
    const newContext = (key: ContextKey): ContextEntry => ContextEntrySchema.parse({ key, version: 0 });
    const newSessions = (key: ContextKey): SessionEntry => SessionEntrySchema.parse({ key, version: 0 });
    const file = (name: string): string => path.join(dir, name);
    this.contexts = {
      planning: new VersionedFile(file("planning_context.json"), ContextEntrySchema, newContext, logger),
      implementation: new VersionedFile(file("implementation_context.json"), ContextEntrySchema, newContext, logger),
    };
    this.sessions = {
      planning: new VersionedFile(file("planning_sessions.json"), SessionEntrySchema, newSessions, logger),
      implementation: new VersionedFile(file("implementation_sessions.json"), SessionEntrySchema, newSessions, logger),
    };
  }

  get(mode: ContextMode, key: ContextKey): Promise<ContextEntry | null> {
    return this.contexts[mode].find(key);
  }

  update(
    mode: ContextMode,
    key: ContextKey,
    mutate: (entry: ContextEntry) => ContextEntry | Promise<ContextEntry>,
  ): Promise<ContextEntry> {
    return this.contexts[mode].update(key, mutate);
  }

  /**
   * Entry for the key, created with the default pinned rules if absent.
   * `refine` runs in the same update.
   */
  ensure(
    mode: ContextMode,
    key: ContextKey,
    featureRequest: string,
    refine: (entry: ContextEntry) => ContextEntry = (entry) => entry,
  ): Promise<ContextEntry> {
    return this.update(mode, key, (entry) =>
      refine({
        ...entry,
        featureRequest: entry.featureRequest || featureRequest,
      }),
    );
  }

  async getSessions(mode: ContextMode, key: ContextKey): Promise<Record<string, SessionInfo>> {
    return (await this.sessions[mode].find(key))?.sessions ?? {};
  }

  async saveSession(mode: ContextMode, key: ContextKey, name: string, info: SessionInfo): Promise<void> {
    await this.sessions[mode].update(key, (entry) => ({
      ...entry,
      sessions: { ...entry.sessions, [name]: info },
      updatedAt: new Date().toISOString(),
    }));
  }
}
