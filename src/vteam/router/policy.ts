/**
 * Model policy presets that bias routing (cost-sensitive, latency-sensitive, ...)
 */

import type { PolicyConfig, PolicyPreset, RouteName } from "../config/types.js";
import type { RunFlags } from "../runtime/scenario.js";

export interface PolicyHint {
  name: string;
  forceRoute?: RouteName;
  disableRoutes: RouteName[];
  preferredRoute?: RouteName;
  boost: number;
}

export class ModelPolicy {
  constructor(private readonly config: PolicyConfig) {}

  /**
   * Resolve the preset named by the run flags, falling back to the configured default
   */
  advise(flags: Pick<RunFlags, "modelPolicy">): PolicyHint {
    const name = flags.modelPolicy || this.config.default;
    const preset: PolicyPreset | undefined = this.config.presets[name];
    return {
      name,
      forceRoute: preset?.forceRoute,
      disableRoutes: preset?.disableRoutes ?? [],
      preferredRoute: preset?.preferredRoute,
      boost: preset?.boost ?? 0.15,
    };
  }
}
