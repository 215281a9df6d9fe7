/**
 * Temporal memory: decay-ranked durable knowledge. Uses a vector backend when
 * one is configured and reachable, otherwise a local JSON-lines store ranked
 * by token overlap.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { MemoryConfig } from "../config/types.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { errorMessage } from "../runtime/errors.js";
import { BackgroundQueue } from "./queue.js";

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

export const StoredMemorySchema = z.object({
  id: z.string(),
  text: z.string(),
  category: z.string(),
  importance: z.number(),
  source: z.string(),
  ts: z.string(),
  tsEpoch: z.number(),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

export type StoredMemory = z.infer<typeof StoredMemorySchema>;

export interface ScoredMemory extends StoredMemory {
  score: number;
}

export interface MemoryRecordInput {
  text: string;
  category?: string;
  /** Clamped to [0, 1] */
  importance?: number;
  source?: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

export interface SearchOptions {
  topK?: number;
  timeWindowDays?: number;
  category?: string;
  where?: (memory: StoredMemory) => boolean;
}

/**
 * Turns text into a fixed-dimension vector
 */
export interface EmbeddingProvider {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

/**
 * Cosine-distance vector collection
 */
export interface VectorBackend {
  upsert(id: string, vector: number[], payload: StoredMemory): Promise<void>;
  search(
    vector: number[],
    options: { limit: number; sinceEpoch: number },
  ): Promise<Array<{ payload: StoredMemory; similarity: number }>>;
}

function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

export class TemporalMemory {
  private readonly queue: BackgroundQueue;
  private readonly logger: VteamLogger;
  private readonly now: () => Date;
  private readonly embeddings?: EmbeddingProvider;
  private readonly backend?: VectorBackend;

  constructor(
    private readonly config: MemoryConfig,
    options?: {
      embeddings?: EmbeddingProvider;
      backend?: VectorBackend;
      now?: () => Date;
      logger?: VteamLogger;
    },
  ) {
    this.embeddings = options?.embeddings;
    this.backend = options?.backend;
    this.now = options?.now ?? (() => new Date());
    this.logger = options?.logger ?? createSilentLogger();
    this.queue = new BackgroundQueue("memory-writer", this.logger);
  }

  get localPath(): string {
    return this.config.localPath;
  }

  /**
   * Queue a write; returns the record id immediately
   */
  write(input: MemoryRecordInput): string {
    const record = this.toStored(input);
    if (!this.config.allowWrite) {
      this.logger.debug("Memory write skipped", { category: record.category });
      return record.id;
    }
    this.queue.enqueue(async () => {
      await this.store(record);
    });
    return record.id;
  }

  /**
   * Write and wait for it to land
   */
  async persist(input: MemoryRecordInput): Promise<StoredMemory> {
    const record = this.toStored(input);
    await this.store(record);
    return record;
  }

  async flush(): Promise<void> {
    await this.queue.drain();
  }

  async search(query: string, options: SearchOptions = {}): Promise<ScoredMemory[]> {
    const topK = options.topK ?? this.config.topK;
    const windowDays = options.timeWindowDays ?? this.config.timeWindowDays;
    const sinceEpoch = (this.now().getTime() - windowDays * DAY_MS) / 1000;
    const accept = (memory: StoredMemory): boolean =>
      memory.tsEpoch >= sinceEpoch &&
      (options.category === undefined || memory.category === options.category) &&
      (options.where === undefined || options.where(memory));

    if (this.embeddings && this.backend) {
      try {
        const vector = await this.embeddings.embed(query);
        const hits = await this.backend.search(vector, { limit: topK, sinceEpoch });
        const accepted = hits
          .filter((hit) => accept(hit.payload))
          .map((hit) => ({ memory: hit.payload, similarity: hit.similarity }));
        return this.rank(accepted, topK);
      } catch (error) {
        this.logger.warn("Vector search failed; using local store", { error: errorMessage(error) });
      }
    }

    const queryTokens = tokenize(query);
    const rows = (await this.readLocal()).filter(accept);
    return this.rank(
      rows.map((memory) => {
        let overlap = 0;
        for (const token of tokenize(memory.text)) {
          if (queryTokens.has(token)) overlap++;
        }
        return { memory, similarity: overlap };
      }),
      topK,
    );
  }

  /**
   * Drop local task_state records older than the TTL. Returns how many were removed.
   */
  async prune(): Promise<number> {
    const rows = await this.readLocal();
    if (rows.length === 0) return 0;
    const cutoff = (this.now().getTime() - this.config.taskTtlDays * DAY_MS) / 1000;
    const kept = rows.filter((row) => !(row.category === "task_state" && row.tsEpoch < cutoff));
    await fs.writeFile(
      this.config.localPath,
      kept.map((row) => JSON.stringify(row) + "\n").join(""),
      "utf-8",
    );
    return rows.length - kept.length;
  }

  /**
   * alpha * 2^(-age / halfLife); future timestamps count as age 0
   */
  recencyBonus(timestamp: Date): number {
    const ageHours = Math.max(0, (this.now().getTime() - timestamp.getTime()) / HOUR_MS);
    return this.config.decayAlpha * Math.pow(2, -ageHours / this.config.halfLifeHours);
  }

  private rank(
    candidates: Array<{ memory: StoredMemory; similarity: number }>,
    topK: number,
  ): ScoredMemory[] {
    return candidates
      .map(({ memory, similarity }) => ({
        ...memory,
        score: similarity + memory.importance + this.recencyBonus(new Date(memory.tsEpoch * 1000)),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  private toStored(input: MemoryRecordInput): StoredMemory {
    const timestamp = input.timestamp ?? this.now();
    return {
      id: randomUUID(),
      text: input.text,
      category: input.category ?? "general",
      importance: Math.min(1, Math.max(0, input.importance ?? 0.5)),
      source: input.source ?? "agent",
      ts: timestamp.toISOString(),
      tsEpoch: timestamp.getTime() / 1000,
      metadata: input.metadata ?? {},
    };
  }

  private async store(record: StoredMemory): Promise<void> {
    if (this.embeddings && this.backend) {
      try {
        const vector = await this.embeddings.embed(record.text);
        await this.backend.upsert(record.id, vector, record);
        return;
      } catch (error) {
        this.logger.warn("Vector upsert failed; writing locally", { error: errorMessage(error) });
      }
    }
    await fs.mkdir(path.dirname(this.config.localPath), { recursive: true });
    await fs.appendFile(this.config.localPath, JSON.stringify(record) + "\n", "utf-8");
  }

  private async readLocal(): Promise<StoredMemory[]> {
    let content: string;
    try {
      content = await fs.readFile(this.config.localPath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const rows: StoredMemory[] = [];
    for (const line of content.split("\n")) {
      if (!line.trim()) continue;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        this.logger.warn("Skipping unreadable memory line", { error: errorMessage(error) });
        continue;
      }
      const parsed = StoredMemorySchema.safeParse(raw);
      if (parsed.success) {
        rows.push(parsed.data);
      } else {
        this.logger.warn("Skipping malformed memory line", { error: parsed.error.message });
      }
    }
    return rows;
  }
}
