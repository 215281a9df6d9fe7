/**
 * Per-stage duration, token and cost accounting. Totals are written back into
 * state telemetry after every stage so budget checks see current spend.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { CostConfig, RouteName } from "../config/types.js";
import type { RunState, Stage, WorkflowPhase } from "./state.js";

export interface CostRecord {
  stage: string;
  durationS: number;
  tokenDelta: number;
  costUsd: number;
  workflowPhase: WorkflowPhase | null;
}

export interface CostSummary {
  totalDurationS: number;
  totalTokens: number;
  totalCostUsd: number;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Token proxy: whitespace-separated words of the indented JSON form, at least 1
 */
export function estimateTokens(payload: unknown): number {
  const serialized = JSON.stringify(payload, null, 1) ?? "";
  return Math.max(serialized.split(/\s+/).filter(Boolean).length, 1);
}

export class CostLatencyMonitor {
  private records: CostRecord[] = [];
  private totalDurationS = 0;
  private totalTokens = 0;
  private costUsd = 0;

  constructor(
    private readonly config: CostConfig,
    private readonly now: () => number = () => performance.now(),
  ) {}

  wrap(name: string, stage: Stage): Stage {
    return async (state) => {
      const beforeTokens = estimateTokens(state);
      const start = this.now();
      const result = await stage(state);
      const durationS = (this.now() - start) / 1000;
      const tokenDelta = Math.max(estimateTokens(result) - beforeTokens, 0);
      const cost = (tokenDelta / 1000) * this.config.usdPer1kTokens;

      this.totalDurationS += durationS;
      this.totalTokens += tokenDelta;
      this.costUsd += cost;
      this.records.push({
        stage: name,
        durationS: round(durationS, 4),
        tokenDelta,
        costUsd: round(cost, 6),
        workflowPhase: result.workflowPhase ?? state.workflowPhase ?? null,
      });
      return this.publish(result, name);
    };
  }

  summary(): CostSummary {
    return {
      totalDurationS: round(this.totalDurationS, 4),
      totalTokens: this.totalTokens,
      totalCostUsd: round(this.costUsd, 6),
    };
  }

  pending(): readonly CostRecord[] {
    return this.records;
  }

  /**
   * Append buffered records to the metrics file
   */
  async flush(scenarioId: string, route: RouteName | null): Promise<void> {
    if (this.records.length === 0) return;
    const timestamp = new Date().toISOString();
    const totalCostUsd = round(this.costUsd, 6);
    const lines = this.records.map((record) =>
      JSON.stringify({ ...record, scenarioId, route, timestamp, totalCostUsd }),
    );
    await fs.mkdir(path.dirname(this.config.metricsPath), { recursive: true });
    await fs.appendFile(this.config.metricsPath, lines.join("\n") + "\n");
    this.records = [];
  }

  private publish(state: RunState, stage: string): RunState {
    return {
      ...state,
      metadata: {
        ...state.metadata,
        telemetry: {
          latencyS: round(this.totalDurationS, 4),
          costEstimateUsd: round(this.costUsd, 6),
          tokens: this.totalTokens,
          lastStage: stage,
        },
      },
    };
  }
}
