export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
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

export type Backoff = "linear" | "exponential";

export type RetryPolicyOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  backoff?: Backoff;
};

/**
 * Bounded retry schedule. Attempts are 1-based; `delayFor(n)` is the wait
 * after the n-th failed attempt.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoff: Backoff;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 3));
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 1000);
    this.maxDelayMs = options.maxDelayMs ?? 10_000;
    this.backoff = options.backoff ?? "exponential";
  }

  delayFor(attempt: number): number {
    const raw = this.backoff === "linear"
      ? this.baseDelayMs * attempt
      : this.baseDelayMs * 2 ** (attempt - 1);
    return Math.min(raw, this.maxDelayMs);
  }

  shouldRetry(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }
}

export type RateLimiterOptions = {
  minIntervalMs: number;
  sleep?: Sleep;
  now?: Clock;
};

/**
 * Keeps consecutive requests from one client at least `minIntervalMs` apart.
 */
export class RateLimiter {
  readonly minIntervalMs: number;
  private readonly sleepFn: Sleep;
  private readonly now: Clock;
  private lastRequestAt: number | null = null;

  constructor(options: RateLimiterOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.sleepFn = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  async throttle(signal?: AbortSignal) {
    if (this.lastRequestAt !== null) {
      const elapsed = this.now() - this.lastRequestAt;
      const remaining = this.minIntervalMs - elapsed;
      if (remaining > 0) {
        await this.sleepFn(remaining, signal);
      }
    }
    this.lastRequestAt = this.now();
  }
}
