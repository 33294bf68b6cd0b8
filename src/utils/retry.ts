import { log } from "./logger.js";

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Stops retrying (and the backoff wait) once aborted. */
  signal?: AbortSignal;
  /** Return false to rethrow immediately. */
  retryIf?: (err: unknown) => boolean;
  /** Used in the retry log line. */
  label?: string;
};

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxAttempts = opts?.maxAttempts ?? DEFAULTS.maxAttempts;
  const baseDelayMs = opts?.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = opts?.maxDelayMs ?? DEFAULTS.maxDelayMs;
  const signal = opts?.signal;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (signal?.aborted) throw err;
      if (opts?.retryIf && !opts.retryIf(err)) throw err;
      if (attempt === maxAttempts) break;
      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      log.warn(`Retrying ${opts?.label ?? "call"} in ${delay}ms`, {
        attempt,
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(delay, signal);
    }
  }
  throw lastError;
}
