import { afterEach, describe, expect, it } from "vitest";
import { CollaboratorError } from "../../src/errors.js";
import { RateLimiter } from "../../src/utils/rate-limiter.js";

let limiter: RateLimiter | undefined;

afterEach(() => {
  limiter?.reset();
  limiter = undefined;
});

describe("RateLimiter", () => {
  it("allows requests under the limit", async () => {
    limiter = new RateLimiter({ maxRequests: 3, windowMs: 10_000 });
    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.remaining()).toBe(1);
    expect(limiter.nextAvailableIn()).toBe(0);
  });

  it("queues callers over the limit in order", async () => {
    limiter = new RateLimiter({ maxRequests: 1, windowMs: 30 });
    await limiter.acquire();

    const order: string[] = [];
    const first = limiter.acquire().then(() => order.push("first"));
    const second = limiter.acquire().then(() => order.push("second"));
    expect(limiter.waiting).toBe(2);

    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
    expect(limiter.waiting).toBe(0);
  });

  it("rejects when the queue is full", async () => {
    limiter = new RateLimiter({ maxRequests: 1, windowMs: 10_000, maxQueueSize: 1 });
    await limiter.acquire();
    const queued = limiter.acquire();

    await expect(limiter.acquire()).rejects.toThrow("Rate limit queue full");
    limiter.reset();
    await expect(queued).rejects.toThrow(CollaboratorError);
  });

  it("rejects queued callers on reset", async () => {
    limiter = new RateLimiter({ maxRequests: 1, windowMs: 10_000 });
    await limiter.acquire();
    const queued = limiter.acquire();

    limiter.reset();

    await expect(queued).rejects.toThrow("Rate limiter reset");
    expect(limiter.remaining()).toBe(1);
  });

  it("drops a waiter whose signal aborts", async () => {
    limiter = new RateLimiter({ maxRequests: 1, windowMs: 10_000 });
    await limiter.acquire();
    const controller = new AbortController();
    const queued = limiter.acquire(controller.signal);

    controller.abort(new Error("user cancelled"));

    await expect(queued).rejects.toThrow("user cancelled");
    expect(limiter.waiting).toBe(0);
  });

  it("rejects an already aborted signal without taking a slot", async () => {
    limiter = new RateLimiter({ maxRequests: 1, windowMs: 10_000 });
    const controller = new AbortController();
    controller.abort(new Error("too late"));

    await expect(limiter.acquire(controller.signal)).rejects.toThrow("too late");
    expect(limiter.remaining()).toBe(1);
  });

  it("frees slots once the window passes", async () => {
    limiter = new RateLimiter({ maxRequests: 1, windowMs: 20 });
    await limiter.acquire();
    expect(limiter.remaining()).toBe(0);
    expect(limiter.nextAvailableIn()).toBeGreaterThan(0);

    await new Promise((resolve) => setTimeout(resolve, 40));

    expect(limiter.remaining()).toBe(1);
  });
});
