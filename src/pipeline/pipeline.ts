/**
 * @fileoverview Public face of the delivery pipeline.
 *
 * ```
 * submit → Encryptor → BoundedQueue → WorkerPool → RetryStrategy → DeliveryPort
 *                                                        ↓
 *                                                  StatsCounters
 * ```
 *
 * Workers start on construction. `close()` moves the pipeline through
 * `running → draining → stopped`: new submissions are refused, the queue
 * gets a bounded window to empty, workers finish what they hold within a
 * grace period (then are cancelled), and whatever is still queued is
 * discarded and counted as failed.
 *
 * In failsafe mode nothing a caller does can surface a delivery,
 * encryption or queue-full failure; it is logged and shows up in
 * {@link Pipeline.stats} only. In strict mode `submit` rejects.
 */

import { resolveConfig } from "../config";
import { Encryptor } from "../crypto/encryptor";
import { PipelineClosedError, QueueFullError, errorMessage } from "../errors";
import { deliveryFailures, droppedCounter, queueGauge } from "../metrics";
import type { DeliveryPort } from "../network/port";
import { HttpDeliveryPort } from "../network/transport";
import {
  BlockingBoundedQueue,
  createBoundedQueue,
  type BoundedQueue,
} from "../queue/bounded-queue";
import { RetryStrategy } from "../retry/strategy";
import { recordFromEncryption, type LogRecord } from "../schema/log-record";
import {
  Severity,
  SeverityAlias,
  type PipelineInit,
  type PipelineState,
  type PipelineStats,
  type ResolvedConfig,
  type SubmitItem,
} from "../types";
import { createLogger, type Logger } from "../utils/logger";
import { sleep } from "../utils/sleep";
import { StatsCounters, snapshotStats } from "./stats";
import { WorkerPool } from "./worker-pool";

const FLUSH_POLL_MS = 10;

export type PipelineEncryptor = Pick<Encryptor, "encrypt" | "clearCache">;

/** Collaborators a caller may supply instead of the defaults built from config. */
export interface PipelineDeps {
  port?: DeliveryPort;
  encryptor?: PipelineEncryptor;
  logger?: Logger;
  /** Random source for retry jitter. */
  random?: () => number;
}

export class Pipeline {
  readonly config: ResolvedConfig;

  private readonly log: Logger;
  private readonly encryptor: PipelineEncryptor;
  private readonly port: DeliveryPort;
  private readonly queue: BoundedQueue<LogRecord>;
  private readonly counters = new StatsCounters();
  private readonly workers: WorkerPool;
  private ticker?: NodeJS.Timeout;
  private currentState: PipelineState = "running";
  private closing?: Promise<void>;

  /**
   * @throws {ConfigError} when the merged configuration is invalid
   * @throws {EncryptionError} when no encryptor is given and the secret is blank
   */
  constructor(config: PipelineInit, deps: PipelineDeps = {}) {
    this.config = resolveConfig(config);
    const cfg = this.config;

    this.log = deps.logger ?? createLogger(cfg.logLevel);
    this.encryptor = deps.encryptor ?? new Encryptor(cfg.secret);
    this.port =
      deps.port ??
      new HttpDeliveryPort({
        serverUrl: cfg.serverUrl,
        apiKey: cfg.apiKey,
        timeoutMs: cfg.timeoutMs,
        logger: this.log,
      });
    this.queue = createBoundedQueue<LogRecord>(cfg.queueSize, cfg.failsafe);

    const retry = new RetryStrategy(
      {
        maxAttempts: cfg.maxRetries,
        initialDelayMs: cfg.initialDelayMs,
        maxDelayMs: cfg.maxDelayMs,
        backoffFactor: cfg.backoffFactor,
        jitter: cfg.jitter,
      },
      deps.random
    );

    this.workers = new WorkerPool({
      queue: this.queue,
      port: this.port,
      retry,
      stats: this.counters,
      logger: this.log,
      workerCount: cfg.workerCount,
      pollIntervalMs: cfg.pollIntervalMs,
      failsafe: cfg.failsafe,
    });
    this.workers.start();
    this.startTicker();

    this.log.info("Pipeline started", {
      node: cfg.node,
      workers: cfg.workerCount,
      queueSize: cfg.queueSize,
      failsafe: cfg.failsafe,
    });
  }

  get state(): PipelineState {
    return this.currentState;
  }

  isRunning(): boolean {
    return this.currentState === "running";
  }

  /**
   * Encrypt `message` and queue it for delivery. Resolves once the record
   * is queued (or, in failsafe mode, once it has been dropped).
   *
   * @throws {QueueFullError} strict mode, when the queue refused the record
   * @throws {PipelineClosedError} strict mode, after `close()` has begun
   * @throws {EncryptionError} strict mode, when sealing the message failed
   */
  async submit(message: string, severity: Severity = Severity.INFO, timestamp?: Date): Promise<void> {
    if (!this.isRunning()) return this.refuseClosed();

    let record: LogRecord;
    try {
      const enc = await this.encryptor.encrypt(message);
      record = recordFromEncryption(this.config.node, enc, severity, timestamp);
    } catch (err) {
      if (!this.config.failsafe) throw err;
      this.log.warn("Failed to prepare log record", { error: errorMessage(err) });
      return;
    }

    await this.enqueue(record);
  }

  /**
   * Queue several entries in order. Items are encrypted here; pre-built
   * records are queued as they are.
   */
  async submitBatch(entries: ReadonlyArray<LogRecord | SubmitItem>): Promise<void> {
    for (const entry of entries) {
      if ("payload" in entry) {
        await this.enqueue(entry);
      } else {
        await this.submit(entry.message, entry.severity, entry.timestamp);
      }
    }
  }

  debug(message: string): Promise<void> {
    return this.submit(message, Severity.DEBUG);
  }

  info(message: string): Promise<void> {
    return this.submit(message, Severity.INFO);
  }

  notice(message: string): Promise<void> {
    return this.submit(message, SeverityAlias.NOTICE);
  }

  warn(message: string): Promise<void> {
    return this.submit(message, Severity.WARN);
  }

  warning(message: string): Promise<void> {
    return this.submit(message, SeverityAlias.WARNING);
  }

  error(message: string): Promise<void> {
    return this.submit(message, Severity.ERROR);
  }

  critical(message: string): Promise<void> {
    return this.submit(message, SeverityAlias.CRITICAL);
  }

  alert(message: string): Promise<void> {
    return this.submit(message, SeverityAlias.ALERT);
  }

  emergency(message: string): Promise<void> {
    return this.submit(message, SeverityAlias.EMERGENCY);
  }

  fatal(message: string): Promise<void> {
    return this.submit(message, Severity.FATAL);
  }

  /**
   * Wait until the queue is empty or `timeoutMs` elapses. Records already
   * taken by a worker may still be in delivery when this resolves.
   *
   * @returns whether the queue was empty at the end
   */
  async flush(timeoutMs: number = this.config.drainTimeoutMs): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (this.queue.size() > 0 && Date.now() < deadline) {
      // ref'd: a process awaiting close() must not exit mid-drain
      await sleep(FLUSH_POLL_MS, undefined, { keepAlive: true });
    }
    return this.queue.size() === 0;
  }

  stats(): PipelineStats {
    return snapshotStats(this.counters, this.queue);
  }

  /** Idempotent; every call resolves once the pipeline is stopped. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async enqueue(record: LogRecord): Promise<void> {
    // close() may have begun while the message was being encrypted
    if (!this.isRunning()) return this.refuseClosed();

    const { offerTimeoutMs } = this.config;
    const accepted = await this.queue.offer(record, offerTimeoutMs > 0 ? offerTimeoutMs : undefined);
    if (accepted) return;

    if (!this.isRunning()) return this.refuseClosed();
    if (this.config.failsafe) {
      droppedCounter.inc();
      this.log.debug("Queue full, dropping log record", { capacity: this.queue.capacity() });
      return;
    }
    throw new QueueFullError(this.queue.capacity());
  }

  private refuseClosed(): void {
    if (!this.config.failsafe) throw new PipelineClosedError();
    this.log.debug("Pipeline is closed, discarding log record");
  }

  private startTicker(): void {
    const { flushIntervalMs } = this.config;
    if (flushIntervalMs <= 0) return;

    this.ticker = setInterval(() => {
      const depth = this.queue.size();
      queueGauge.set(depth);
      this.log.silly("Queue depth", { depth, inFlight: this.workers.inFlight });
    }, flushIntervalMs);
    this.ticker.unref();
  }

  private async shutdown(): Promise<void> {
    this.currentState = "draining";
    clearInterval(this.ticker);
    this.log.info("Shutting down pipeline", { queued: this.queue.size() });

    const drained = await this.flush(this.config.drainTimeoutMs);
    if (!drained) {
      this.log.warn("Drain timeout elapsed with records still queued", {
        queued: this.queue.size(),
      });
    }

    const joined = await this.workers.stop(this.config.shutdownGraceMs);
    if (!joined) {
      this.log.warn("Workers did not stop within the grace period", {
        inFlight: this.workers.inFlight,
      });
    }

    // Release blocked producers first so none of them slips into the ring
    // after it has been emptied.
    if (this.queue instanceof BlockingBoundedQueue) {
      this.queue.releaseProducers();
    }
    const leftover = this.queue.drainAll();
    if (leftover.length > 0) {
      this.counters.recordFailed(leftover.length);
      deliveryFailures.inc(leftover.length);
      this.log.warn("Discarded undelivered records on shutdown", { count: leftover.length });
    }
    queueGauge.set(0);

    this.encryptor.clearCache();
    try {
      await this.port.close?.();
    } catch (err) {
      this.log.warn("Failed to close delivery port", { error: errorMessage(err) });
    }

    this.currentState = "stopped";
    this.log.info("Pipeline stopped", { ...this.stats() });
  }
}
