/**
 * Fixed-count, fixed-delay retry for stages that call out to retrieval or tools
 */

import type { RetryConfig } from "../config/types.js";
import type { Stage } from "./state.js";
import type { VteamLogger } from "./logger.js";
import { createSilentLogger } from "./logger.js";
import { errorMessage, isFatalError } from "./errors.js";

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryPolicy {
  readonly attempts: number;
  readonly waitMs: number;
  private readonly sleep: Sleep;
  private readonly logger: VteamLogger;

  constructor(config: RetryConfig, options?: { sleep?: Sleep; logger?: VteamLogger }) {
    this.attempts = Math.max(1, Math.floor(config.attempts));
    this.waitMs = Math.max(0, config.waitMs);
    this.sleep = options?.sleep ?? defaultSleep;
    this.logger = options?.logger ?? createSilentLogger();
  }

  /**
   * Call fn until it resolves or attempts run out; the last error is rethrown.
   * Fatal orchestration errors are rethrown on the first failure.
   */
  async execute<T>(name: string, fn: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;
        if (isFatalError(error) || attempt === this.attempts) break;
        this.logger.warn(`Retrying ${name}`, { attempt, error: errorMessage(error) });
        await this.sleep(this.waitMs);
      }
    }
    throw lastError;
  }

  wrap(name: string, stage: Stage): Stage {
    return (state) => this.execute(name, () => stage(state));
  }
}
