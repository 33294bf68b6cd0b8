import { CollaboratorError } from "../errors.js";
import { log } from "./logger.js";

export type RateLimiterOptions = {
  /** Maximum requests per window (default: 10) */
  maxRequests?: number;
  /** Window size in milliseconds (default: 1000) */
  windowMs?: number;
  /** Maximum number of callers waiting for a slot (default: 50) */
  maxQueueSize?: number;
};

type Waiter = {
  resolve: () => void;
  reject: (err: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Sliding-window limiter placed in front of a chat backend. Callers over the
 * limit wait in FIFO order until a slot frees up or their signal aborts.
 */
export class RateLimiter {
  private timestamps: number[] = [];
  private queue: Waiter[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly maxQueueSize: number;

  constructor(opts: RateLimiterOptions = {}) {
    this.maxRequests = opts.maxRequests ?? 10;
    this.windowMs = opts.windowMs ?? 1000;
    this.maxQueueSize = opts.maxQueueSize ?? 50;
  }

  private cleanup(): void {
    const cutoff = Date.now() - this.windowMs;
    this.timestamps = this.timestamps.filter((t) => t > cutoff);
  }

  /** Requests still available in the current window. */
  remaining(): number {
    this.cleanup();
    return Math.max(0, this.maxRequests - this.timestamps.length);
  }

  /** Milliseconds until the next slot opens (0 if one is free). */
  nextAvailableIn(): number {
    this.cleanup();
    if (this.timestamps.length < this.maxRequests) return 0;
    return Math.max(0, this.timestamps[0] + this.windowMs - Date.now());
  }

  get waiting(): number {
    return this.queue.length;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw signal.reason;

    this.cleanup();
    if (this.queue.length === 0 && this.timestamps.length < this.maxRequests) {
      this.timestamps.push(Date.now());
      return;
    }

    if (this.queue.length >= this.maxQueueSize) {
      throw new CollaboratorError("Rate limit queue full", { queued: this.queue.length });
    }

    log.debug("Request queued by rate limiter", {
      queueSize: this.queue.length + 1,
      waitMs: this.nextAvailableIn(),
    });

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.queue = this.queue.filter((w) => w !== waiter);
          reject(signal.reason);
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
      this.schedule();
    });
  }

  private schedule(): void {
    if (this.timer || this.queue.length === 0) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.drain();
    }, Math.max(1, this.nextAvailableIn()));
  }

  private drain(): void {
    this.cleanup();
    while (this.queue.length > 0 && this.timestamps.length < this.maxRequests) {
      const waiter = this.queue.shift();
      if (!waiter) break;
      if (waiter.onAbort) waiter.signal?.removeEventListener("abort", waiter.onAbort);
      this.timestamps.push(Date.now());
      waiter.resolve();
    }
    this.schedule();
  }

  /** Drop all state; queued callers are rejected. */
  reset(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    const pending = this.queue;
    this.queue = [];
    this.timestamps = [];
    for (const waiter of pending) {
      if (waiter.onAbort) waiter.signal?.removeEventListener("abort", waiter.onAbort);
      waiter.reject(new CollaboratorError("Rate limiter reset"));
    }
  }
}
