import { RetryExhaustedError } from "../errors";
import { sleep } from "../utils/sleep";
import { isRetryable } from "./classify";

export interface RetryPolicy {
  /** Retries after the first try; total attempts = maxAttempts + 1. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 5,
  initialDelayMs: 100,
  maxDelayMs: 30_000,
  backoffFactor: 2.0,
  jitter: true,
});

export interface ExecuteOptions {
  /** Aborting rejects a pending backoff with the signal's reason. */
  signal?: AbortSignal;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Exponential backoff with optional ±5% jitter.
 *
 * Shared read-only by every worker; the only state is the random source.
 */
export class RetryStrategy {
  readonly policy: Readonly<RetryPolicy>;
  private readonly random: () => number;

  constructor(policy: Partial<RetryPolicy> = {}, random: () => number = Math.random) {
    const merged: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };
    if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 0) {
      throw new RangeError("maxAttempts cannot be negative");
    }
    if (merged.initialDelayMs < 0 || merged.maxDelayMs < 0) {
      throw new RangeError("delays cannot be negative");
    }
    if (!(merged.backoffFactor >= 1)) {
      throw new RangeError("backoffFactor must be >= 1.0");
    }
    this.policy = Object.freeze(merged);
    this.random = random;
  }

  static defaultStrategy(): RetryStrategy {
    return new RetryStrategy();
  }

  /**
   * Delay before retry number `attempt` (0-based):
   * `min(initialDelay × factor^attempt, maxDelay)`, jittered by up to ±5%.
   * Negative attempts wait 0; attempts at or past `maxAttempts` wait
   * `maxDelay`.
   */
  calculateDelay(attempt: number): number {
    const { maxAttempts, initialDelayMs, maxDelayMs, backoffFactor, jitter } = this.policy;
    if (attempt < 0) return 0;
    if (attempt >= maxAttempts) return maxDelayMs;

    let delay = Math.min(initialDelayMs * Math.pow(backoffFactor, attempt), maxDelayMs);
    if (jitter) {
      delay += (this.random() - 0.5) * 0.1 * delay;
    }
    return Math.max(0, Math.floor(delay));
  }

  shouldRetry(attempt: number): boolean {
    return attempt < this.policy.maxAttempts;
  }

  isRetryable(error: unknown): boolean {
    return isRetryable(error);
  }

  /**
   * Run `operation` until it succeeds, fails permanently, or runs out of
   * attempts.
   *
   * @throws the operation's own error when it is not retryable
   * @throws {RetryExhaustedError} when a retryable failure outlives `maxAttempts`
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    opts: ExecuteOptions = {}
  ): Promise<T> {
    const { maxAttempts } = this.policy;

    for (let attempt = 0; ; attempt++) {
      opts.signal?.throwIfAborted();
      try {
        return await operation(attempt);
      } catch (err) {
        if (!this.isRetryable(err)) throw err;
        if (!this.shouldRetry(attempt)) {
          throw new RetryExhaustedError(attempt + 1, err);
        }

        const delayMs = this.calculateDelay(attempt);
        opts.onRetry?.(err, attempt + 1, delayMs);
        if (delayMs > 0) {
          await sleep(delayMs, opts.signal);
        }
      }
    }
  }
}
