/**
 * Capability handlers for the non-workflow routes
 *
 * Each route the router can pick, other than the workflow, is served by a
 * handler registered here. The built-in handlers are deterministic
 * placeholders so a run completes end to end without a model behind it;
 * integrations replace them with registerCapability.
 */

import type { RouteName } from "../config/types.js";
import type { VteamLogger } from "../runtime/logger.js";
import { createSilentLogger } from "../runtime/logger.js";
import { StructuralError } from "../runtime/errors.js";
import type { RunState, Stage } from "../runtime/state.js";
import { cloneState, latestUserMessage } from "../runtime/state.js";

export type CapabilityRoute = Exclude<RouteName, "workflow">;

export type CapabilityHandler = Stage;

const capabilityHandlers: Map<CapabilityRoute, CapabilityHandler> = new Map();

/**
 * Register a capability handler, replacing any existing one
 */
export function registerCapability(route: CapabilityRoute, handler: CapabilityHandler): void {
  capabilityHandlers.set(route, handler);
}

export function hasCapability(route: RouteName): route is CapabilityRoute {
  return route !== "workflow" && capabilityHandlers.has(route);
}

/**
 * Run the handler for a route
 */
export async function runCapability(
  route: CapabilityRoute,
  state: RunState,
  logger: VteamLogger = createSilentLogger(),
): Promise<RunState> {
  const handler = capabilityHandlers.get(route);
  if (!handler) {
    throw new StructuralError(`No capability registered for route ${route}`, { route });
  }

  const started = Date.now();
  const next = await handler(cloneState(state));
  logger.stage(route, Date.now() - started, { outputChars: next.output.length });
  return next;
}

function respond(state: RunState, text: string, name?: string): RunState {
  state.output = text;
  state.messages.push({ role: "assistant", content: text, name });
  return state;
}

function memorySnippets(state: RunState, limit = 3): string[] {
  return state.metadata.retrievedMemories.slice(0, limit).map((memory) => `Memory: ${memory.text}`);
}

// ============================================================================
// Built-in handlers
// ============================================================================

export function ragAnswer(query: string, context: string[]): string {
  return [`Answer for: ${query}`, "Context:", ...context.map((doc) => `- ${doc}`)].join("\n");
}

export function graphEntities(query: string): string[] {
  const entities = query.match(/\b[A-Z][a-z]+\b/g) ?? [];
  return entities.length > 0 ? [...new Set(entities)] : ["Agent", "Memory"];
}

export function graphSummary(query: string): string {
  const hops = graphEntities(query).map((entity) => `${entity} -> MemoryStrategy -> Collaboration`);
  return [`Graph summary for '${query}':`, ...hops.map((hop) => `* ${hop}`)].join("\n");
}

registerCapability("rag", async (state) => {
  const query = latestUserMessage(state);
  const docs = query
    ? [`Doc snippet A supporting '${query}'`, `Doc snippet B referencing '${query}'`]
    : [];
  for (const doc of docs) {
    state.artifacts.push({ kind: "document", ref: doc });
  }
  return respond(state, ragAnswer(query, [...docs, ...memorySnippets(state)]), "rag");
});

registerCapability("graph_rag", async (state) => {
  return respond(state, graphSummary(latestUserMessage(state)), "graph_rag");
});

registerCapability("hybrid", async (state) => {
  const query = latestUserMessage(state);
  const rag = await runCapability("rag", state);
  const graph = graphSummary(query);
  return respond(rag, `RAG insight:\n${rag.output}\n\nGraph insight:\n${graph}`, "hybrid");
});

const SWARM_PLANNER = "researcher";
const SWARM_WORKERS = ["researcher", "writer"];

registerCapability("swarm", async (state) => {
  const phases = state.plan.phases;
  let summary: string;
  if (phases.length > 0) {
    const lines: string[] = [];
    phases.forEach((phase, idx) => {
      const owners = phase.owners.filter((owner) => owner.trim()).join(", ") || SWARM_PLANNER;
      lines.push(`### Phase ${idx + 1} – ${phase.name} (owner: ${owners})`);
      lines.push(...phase.deliverables.map((item) => `- Deliverable: ${item}`));
      lines.push(...phase.acceptanceTests.map((item) => `- Acceptance: ${item}`));
      lines.push("");
    });
    summary = lines.join("\n").trim();
  } else {
    summary = [
      `${SWARM_PLANNER} -> define goals for '${latestUserMessage(state)}'`,
      ...SWARM_WORKERS.map((worker) => `${worker} completes task fragment`),
    ].join("\n");
  }
  return respond(state, summary, "swarm");
});

/** Persona a handoff passes work to */
const HANDOFF_TARGETS: Record<string, string> = {
  writer: "researcher",
};

registerCapability("handoff", async (state) => {
  const current = state.metadata.agent ?? state.context.persona ?? "researcher";
  const target = HANDOFF_TARGETS[current] ?? "writer";
  state.metadata.agent = target;
  state.messages.push({ role: "system", content: `Handoff to ${target} agent` });
  state.output = `Delegated work to ${target}`;
  // the receiving persona coordinates through the swarm
  return runCapability("swarm", state);
});

/** Built-in skill packs: pack -> tool -> runner over the payload text */
const SKILL_PACKS: Record<string, Record<string, (payload: string) => string>> = {
  research_pack: {
    web_search: (query) => [`Result 1 about ${query}`, `Result 2 discussing ${query}`].join("\n"),
    summarize_notes: (notes) => {
      const items = notes.split("\n").filter((line) => line.trim());
      if (items.length === 0) return "No notes to summarize.";
      return `Summary (${items.length} items): ${items.join(" ").slice(0, 256)}`;
    },
  },
  report_pack: {
    draft_brief: (topic) => [`# Brief: ${topic}`, "", "## Findings", "- Pending research"].join("\n"),
  },
};

registerCapability("skills", async (state) => {
  const packName = state.context.skillPack ?? "research_pack";
  const pack = SKILL_PACKS[packName] ?? {};
  const toolName = state.context.skillTool ?? Object.keys(pack)[0] ?? "";
  const runner = pack[toolName];
  if (!runner) {
    return respond(state, `Unknown tool '${toolName}' for pack '${packName}'`, "skills");
  }
  return respond(state, runner(latestUserMessage(state)), `${packName}.${toolName}`);
});

registerCapability("langchain_agent", async (state) => {
  const query = latestUserMessage(state);
  const plan = [
    `1. Interpret task: ${query}`,
    "2. Gather relevant documents.",
    "3. Analyze findings and highlight risks.",
    "4. Produce final brief for stakeholders.",
  ];
  return respond(state, plan.join("\n"), "langchain_agent");
});
