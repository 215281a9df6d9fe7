/**
 * vteam - virtual engineering team
 *
 * Routes a request to a capability (RAG, graph, skills, swarm, ...) or drives
 * a feature through architecture, lead planning, review and phased execution
 * on external coding CLIs, with temporal memory and a shared context store.
 */

// CLI
export { runVteamCli, buildVteamProgram } from "./cli/main.js";

// Config
export { type VteamConfig, type RouteName, ROUTE_NAMES, VteamConfigSchema, getDefaultConfig } from "./config/types.js";
export { loadConfig, saveConfig, initConfig, getConfigPath, getConfigDir } from "./config/loader.js";

// Runtime
export { ScenarioRunner, type RunResult, type ScenarioRunnerDeps } from "./runtime/runner.js";
export { parseScenario, loadScenario, type ScenarioInput, type RunFlags } from "./runtime/scenario.js";
export { checkAssertions } from "./runtime/assertions.js";
export { type RunState, type Stage, type FeaturePlan, createInitialState, cloneState } from "./runtime/state.js";
export {
  VteamError,
  VteamErrorCode,
  StructuralError,
  PreconditionError,
  EvidenceViolation,
  isVteamError,
} from "./runtime/errors.js";
export { createLogger, createSilentLogger, type VteamLogger } from "./runtime/logger.js";
export { RetryPolicy } from "./runtime/retry.js";
export { CostLatencyMonitor } from "./runtime/cost-monitor.js";

// Routing
export { RequestRouter, type RouteDecision } from "./router/router.js";
export { registerCapability, runCapability, hasCapability } from "./router/capabilities.js";

// Memory
export { TemporalMemory, type EmbeddingProvider, type VectorBackend } from "./memory/temporal.js";

// Shared context
export { ContextStore, resolveContextKey, type ContextEntry, type ContextKey } from "./context/store.js";
export { buildContextBundle } from "./context/bundle.js";
export { computeRepoState, type RepoState } from "./context/repo-state.js";
export { enforceEvidence } from "./context/evidence.js";

// Workflow and execution
export { loadWorkflowConfig, type WorkflowConfig } from "./workflow/config.js";
export { WorkflowStages } from "./workflow/stages.js";
export { PhaseStateMachine, STAGE_NAMES } from "./workflow/state-machine.js";
export { PhaseExecutor } from "./execution/phase-executor.js";
export { RunCheckpointStore } from "./execution/checkpoints.js";
export { evaluateReport, readReport } from "./execution/handoff.js";
export { CliCodingTool, type CodingTool, type DispatchRequest, type DispatchOutcome } from "./tools/coding-tool.js";
