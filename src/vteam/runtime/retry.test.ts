/**
 * Tests for the retry policy
 */

import { describe, it, expect, vi } from "vitest";
import { RetryPolicy } from "./retry.js";
import { PreconditionError } from "./errors.js";

const noSleep = vi.fn(async () => undefined);

describe("RetryPolicy", () => {
  it("invokes a stage that fails twice exactly three times and returns its value", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky 1"))
      .mockRejectedValueOnce(new Error("flaky 2"))
      .mockResolvedValueOnce("done");
    const sleep = vi.fn(async () => undefined);
    const policy = new RetryPolicy({ attempts: 3, waitMs: 250 }, { sleep });

    await expect(policy.execute("retrieve", fn)).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it("rethrows the last error after exhausting attempts", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"));
    const policy = new RetryPolicy({ attempts: 2, waitMs: 0 }, { sleep: noSleep });

    await expect(policy.execute("retrieve", fn)).rejects.toThrow("second");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry fatal errors", async () => {
    const fn = vi.fn(async () => {
      throw new PreconditionError("review not approved");
    });
    const policy = new RetryPolicy({ attempts: 3, waitMs: 0 }, { sleep: noSleep });

    await expect(policy.execute("plan", fn)).rejects.toBeInstanceOf(PreconditionError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("treats attempts below one as a single attempt", () => {
    expect(new RetryPolicy({ attempts: 0, waitMs: -5 }).attempts).toBe(1);
    expect(new RetryPolicy({ attempts: 0, waitMs: -5 }).waitMs).toBe(0);
  });
});
