/**
 * Text helpers the planning roles use to seed plan fields before the coding
 * tool's document edits are reconciled
 */

function subject(feature: string): string {
  return feature.trim() || "the requested feature";
}

export function chooseStack(feature: string, stackHint: string): string {
  const stack = stackHint.trim() || "the existing stack";
  return (
    `Favor the ${stack} primitives when delivering ${subject(feature)}: ` +
    "thread state through the run pipeline instead of module-level globals, " +
    "and keep role prompts in the workflow document."
  );
}

/**
 * Risks the tech lead echoes back from the architecture
 */
export function riskMatrix(feature: string): string[] {
  const target = subject(feature);
  return [
    `Reviewer gate blocks ${target} unless the architecture plan lists its assumptions.`,
    `Telemetry must record the workflow route for ${target} to keep audit parity.`,
    `Fall back to the rag route if run-state serialization regresses after adding ${target}.`,
  ];
}

export function phaseBreakdown(feature: string, phases: readonly string[]): string[] {
  const target = subject(feature);
  return phases.map(
    (phase, index) =>
      `Phase ${index + 1} – ${phase}: ensure ${target} has owners, telemetry, and exit tests documented.`,
  );
}

export function dependencyMatrix(feature: string): string[] {
  const target = subject(feature);
  return [
    `Run state schema: needed so ${target} can store plan and checkpoint metadata.`,
    `Workflow document: keeps ${target} prompts centralized for every planning role.`,
    `Scenario file: proves the ${target} route stays deterministic in CI.`,
  ];
}
