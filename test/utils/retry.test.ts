import { describe, expect, it } from "vitest";
import { withRetry } from "../../src/utils/retry.js";

const FAST = { baseDelayMs: 1, maxDelayMs: 2 };

describe("withRetry", () => {
  it("returns the first success", async () => {
    const attempts: number[] = [];
    const result = await withRetry(async (attempt) => {
      attempts.push(attempt);
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return "ok";
    }, FAST);

    expect(result).toBe("ok");
    expect(attempts).toEqual([1, 2, 3]);
  });

  it("rethrows the last error after the final attempt", async () => {
    let calls = 0;
    await expect(
      withRetry(async (attempt) => {
        calls++;
        throw new Error(`fail ${attempt}`);
      }, { ...FAST, maxAttempts: 2 }),
    ).rejects.toThrow("fail 2");
    expect(calls).toBe(2);
  });

  it("stops when retryIf declines", async () => {
    let calls = 0;
    await expect(
      withRetry(async () => {
        calls++;
        throw new Error("permanent");
      }, { ...FAST, retryIf: (err) => !(err instanceof Error && err.message === "permanent") }),
    ).rejects.toThrow("permanent");
    expect(calls).toBe(1);
  });

  it("does not retry after the signal aborts", async () => {
    const controller = new AbortController();
    let calls = 0;
    await expect(
      withRetry(async () => {
        calls++;
        controller.abort();
        throw new Error("interrupted");
      }, { ...FAST, signal: controller.signal }),
    ).rejects.toThrow("interrupted");
    expect(calls).toBe(1);
  });

  it("aborts the backoff wait", async () => {
    const controller = new AbortController();
    const pending = withRetry(async () => {
      throw new Error("busy");
    }, { baseDelayMs: 5_000, signal: controller.signal });
    setTimeout(() => controller.abort(new Error("user cancelled")), 10);

    await expect(pending).rejects.toThrow("user cancelled");
  });
});
