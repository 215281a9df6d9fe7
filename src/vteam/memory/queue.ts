/**
 * Single-worker background queue. Tasks run one at a time, in submission
 * order, off the caller's critical path.
 */

import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { errorMessage } from "../runtime/errors.js";

export type BackgroundTask = () => Promise<void>;

export class BackgroundQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;
  private failures = 0;

  constructor(
    private readonly name: string,
    private readonly logger: VteamLogger = createSilentLogger(),
  ) {}

  enqueue(task: BackgroundTask): void {
    this.pendingCount++;
    this.tail = this.tail
      .then(task)
      .catch((error: unknown) => {
        this.failures++;
        this.logger.warn(`Background task failed in ${this.name}`, { error: errorMessage(error) });
      })
      .finally(() => {
        this.pendingCount--;
      });
  }

  /**
   * Resolves once every task queued so far has finished
   */
  async drain(): Promise<void> {
    await this.tail;
  }

  get pending(): number {
    return this.pendingCount;
  }

  get failed(): number {
    return this.failures;
  }
}
