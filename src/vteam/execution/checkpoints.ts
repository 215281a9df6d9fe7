/**
 * Per-thread phase checkpoints. Each run on a thread rewrites
 * `<dir>/<threadId>.json` after every phase, so a later run with `resume`
 * can skip completed phases whether or not the shared context store is on.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { z } from "zod";
import { PhaseExecutionRecordSchema } from "../context/store.js";
import { VteamError, VteamErrorCode, errorMessage } from "../runtime/errors.js";
import type { PhaseExecutionRecord } from "../runtime/state.js";

export const CheckpointFileSchema = z.object({
  threadId: z.string(),
  runId: z.string().optional(),
  updatedAt: z.string(),
  records: z.array(PhaseExecutionRecordSchema),
  checkpoints: z.array(
    z.object({
      phase: z.string(),
      status: z.string(),
      owners: z.array(z.string()).optional(),
      detail: z.string().optional(),
    }),
  ),
});

export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

export class RunCheckpointStore {
  constructor(readonly dir: string) {}

  pathFor(threadId: string): string {
    return path.join(this.dir, `${threadId}.json`);
  }

  async load(threadId: string): Promise<CheckpointFile | null> {
    const file = this.pathFor(threadId);
    let content: string;
    try {
      content = await fs.readFile(file, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return null;
      }
      throw error;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new VteamError(VteamErrorCode.CONFIG_INVALID, `Unreadable checkpoint file ${file}: ${errorMessage(error)}`);
    }
    const parsed = CheckpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new VteamError(VteamErrorCode.CONFIG_INVALID, `Invalid checkpoint file ${file}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /** Phase records from the thread's last run */
  async records(threadId: string): Promise<PhaseExecutionRecord[]> {
    return (await this.load(threadId))?.records ?? [];
  }

  async save(file: CheckpointFile): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.pathFor(file.threadId);
    const tmp = `${target}.${randomBytes(4).toString("hex")}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(file, null, 2) + "\n", "utf-8");
    await fs.rename(tmp, target);
  }
}
