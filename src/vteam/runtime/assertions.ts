/**
 * Scenario assertions checked against a run result
 */

import { isDeepStrictEqual } from "node:util";
import type { Assertion } from "./scenario.js";

/**
 * Follow a path of keys and indexes; undefined when any step is missing
 */
export function walkPath(source: unknown, keys: ReadonlyArray<string | number>): unknown {
  let current: unknown = source;
  for (const key of keys) {
    if (Array.isArray(current)) {
      const index = typeof key === "number" ? key : Number.parseInt(key, 10);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (typeof current === "object" && current !== null) {
      current = new Map(Object.entries(current)).get(String(key));
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Check every assertion; returns one message per failure
 */
export function checkAssertions(
  assertions: readonly Assertion[],
  result: { output: string; route: string | null },
): string[] {
  const failures: string[] = [];
  assertions.forEach((assertion, index) => {
    const value = assertion.value ?? "";
    switch (assertion.type) {
      case "contains":
        if (!result.output.includes(value)) {
          failures.push(`assertion ${index} expected '${value}' in output`);
        }
        break;
      case "not_contains":
        if (result.output.includes(value)) {
          failures.push(`assertion ${index} expected '${value}' absent from output`);
        }
        break;
      case "route":
        if (result.route !== value) {
          failures.push(`assertion ${index} expected route ${value} (got ${result.route ?? "none"})`);
        }
        break;
      case "metadata": {
        const keys = assertion.path ?? [];
        const actual = walkPath(result, keys);
        if (!isDeepStrictEqual(actual, assertion.equals)) {
          const expected = JSON.stringify(assertion.equals);
          failures.push(`assertion ${index} expected ${keys.join(".")} == ${expected} (got ${JSON.stringify(actual)})`);
        }
        break;
      }
    }
  });
  return failures;
}
