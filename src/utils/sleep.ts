export interface SleepOptions {
  /** Keep the timer ref'd so the process waits for it. */
  keepAlive?: boolean;
}

/**
 * Resolve after `ms` milliseconds, or reject with the signal's reason as
 * soon as `signal` aborts. Unless `keepAlive` is set the timer is unref'd,
 * so a pending backoff never keeps the process alive on its own.
 */
export function sleep(ms: number, signal?: AbortSignal, opts: SleepOptions = {}): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    if (!opts.keepAlive) timer.unref();
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const err = new Error(reason === undefined ? "The operation was aborted" : String(reason));
  err.name = "AbortError";
  return err;
}
