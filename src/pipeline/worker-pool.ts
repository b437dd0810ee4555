/* ------------------------------------------------------------------
 * worker-pool.ts  •  Background delivery loops
 * ------------------------------------------------------------------
 *  ▸ N async loops share one queue, one retry strategy, one port
 *  ▸ Each loop polls with a short timeout so a stop signal is seen fast
 *  ▸ Stopping ends the loops; a delivery already under way keeps its
 *    sends and backoffs until the grace period runs out, then is cancelled
 *  ▸ An entry leaves the queue exactly once; it ends up counted as
 *    sent or failed, never requeued
 * ------------------------------------------------------------------ */

import { PipelineClosedError, errorMessage } from "../errors";
import { deliveredCounter, deliveryFailures, retryCounter } from "../metrics";
import type { DeliveryPort } from "../network/port";
import type { BoundedQueue } from "../queue/bounded-queue";
import type { RetryStrategy } from "../retry/strategy";
import { serializeRecord, type LogRecord } from "../schema/log-record";
import type { Logger } from "../utils/logger";
import type { StatsCounters } from "./stats";

const CANCEL_SETTLE_MS = 100;

export interface WorkerPoolOptions {
  queue: BoundedQueue<LogRecord>;
  port: DeliveryPort;
  retry: RetryStrategy;
  stats: StatsCounters;
  logger: Logger;
  workerCount: number;
  /** How long one `poll` waits before the loop re-checks for a stop. */
  pollIntervalMs: number;
  /** Failsafe pools log give-ups at `warn`, strict ones at `error`. */
  failsafe: boolean;
}

export class WorkerPool {
  private readonly opts: WorkerPoolOptions;
  /** Ends the polling loops. */
  private readonly stopping = new AbortController();
  /** Aborts sends and backoffs still running when the grace period ends. */
  private readonly cancel = new AbortController();
  private loops: Promise<void>[] = [];
  private busy = 0;

  constructor(opts: WorkerPoolOptions) {
    if (!Number.isInteger(opts.workerCount) || opts.workerCount <= 0) {
      throw new RangeError("workerCount must be positive");
    }
    this.opts = opts;
  }

  start(): void {
    if (this.loops.length > 0 || this.stopping.signal.aborted) return;
    for (let id = 0; id < this.opts.workerCount; id++) {
      this.loops.push(this.run(id));
    }
  }

  get size(): number {
    return this.loops.length;
  }

  /** Entries dequeued and not yet settled as sent or failed. */
  get inFlight(): number {
    return this.busy;
  }

  get stopped(): boolean {
    return this.stopping.signal.aborted;
  }

  /**
   * Stop taking entries and wait up to `graceMs` for every loop to finish
   * the delivery it holds. A pending poll returns at once. When the grace
   * period runs out, in-flight sends and backoffs are aborted and the
   * entries they carried count as failed.
   *
   * Resolves false when some loop was still running at the deadline.
   */
  async stop(graceMs: number): Promise<boolean> {
    if (!this.stopping.signal.aborted) {
      this.stopping.abort(new PipelineClosedError());
    }

    const joined = Promise.all(this.loops).then(() => true);
    if (await settlesWithin(joined, graceMs)) return true;

    if (!this.cancel.signal.aborted) {
      this.cancel.abort(new PipelineClosedError());
    }
    // give cancelled deliveries a moment to record their failure
    await settlesWithin(joined, CANCEL_SETTLE_MS);
    return false;
  }

  private async run(id: number): Promise<void> {
    const { queue, pollIntervalMs, logger } = this.opts;
    const { signal } = this.stopping;

    logger.debug(`Worker ${id} started`);
    while (!signal.aborted) {
      const record = await queue.poll(pollIntervalMs, signal);
      if (record === undefined) continue;
      await this.deliver(record, id);
    }
    logger.debug(`Worker ${id} stopped`);
  }

  private async deliver(record: LogRecord, id: number): Promise<void> {
    const { port, retry, stats, logger, failsafe } = this.opts;
    const { signal } = this.cancel;

    this.busy++;
    try {
      const body = serializeRecord(record);
      await retry.execute(() => port.send(body, signal), {
        signal,
        onRetry: (err, attempt, delayMs) => {
          retryCounter.inc();
          logger.verbose("Retrying delivery", {
            worker: id,
            attempt,
            delayMs,
            error: errorMessage(err),
          });
        },
      });
      stats.recordSent();
      deliveredCounter.inc();
    } catch (err) {
      stats.recordFailed();
      deliveryFailures.inc();
      if (signal.aborted) {
        logger.warn("Delivery interrupted by shutdown, record discarded", { worker: id });
      } else {
        logger.log(failsafe ? "warn" : "error", "Failed to deliver log record", {
          worker: id,
          error: errorMessage(err),
        });
      }
    } finally {
      this.busy--;
    }
  }
}

/** Whether `task` resolves before `ms` elapses. */
async function settlesWithin(task: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), Math.max(0, ms));
  });
  try {
    return await Promise.race([task.then(() => true), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
