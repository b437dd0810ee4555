import type { PipelineStats } from "../types";

/**
 * Per-pipeline delivery counters. Only ever incremented; the event loop
 * serializes every update.
 */
export class StatsCounters {
  private sent = 0;
  private failed = 0;

  recordSent(): void {
    this.sent++;
  }

  recordFailed(count = 1): void {
    this.failed += count;
  }

  get totalSent(): number {
    return this.sent;
  }

  get totalFailed(): number {
    return this.failed;
  }
}

export interface QueueView {
  size(): number;
  capacity(): number;
  droppedCount(): number;
}

/** Point-in-time view; `totalDropped` mirrors the queue's own count. */
export function snapshotStats(counters: StatsCounters, queue: QueueView): PipelineStats {
  const queueSize = queue.size();
  const queueCapacity = queue.capacity();
  return {
    totalSent: counters.totalSent,
    totalFailed: counters.totalFailed,
    totalDropped: queue.droppedCount(),
    queueSize,
    queueCapacity,
    isQueueFull: queueSize >= queueCapacity,
    queueUtilization: queueCapacity === 0 ? 0 : queueSize / queueCapacity,
  };
}
