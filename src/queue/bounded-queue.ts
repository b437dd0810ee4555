/**
 * @module bounded-queue
 * @description Fixed-capacity FIFO between submitters and delivery workers.
 *
 * Two admission policies share one interface:
 *
 * - {@link BlockingBoundedQueue}: `offer` waits for space, optionally up to
 *   a timeout. Nothing is ever dropped.
 * - {@link DroppingBoundedQueue}: `offer` never waits. A full queue discards
 *   the item and bumps `droppedCount`.
 *
 * Consumers call `poll(timeoutMs)`, which resolves with the oldest item or
 * `undefined` once the timeout elapses or the signal aborts. Every state
 * change happens synchronously inside the call that causes it, so the
 * event loop is the only lock the queue needs.
 */

import { RingBuffer } from "./ring-buffer";

export type AdmissionMode = "blocking" | "dropping";

export interface BoundedQueue<T> {
  readonly mode: AdmissionMode;
  /**
   * Admit `item`. In blocking mode waits for space (forever when
   * `timeoutMs` is omitted). Resolves false when the item was not enqueued.
   */
  offer(item: T, timeoutMs?: number): Promise<boolean>;
  /** Admit `item` only if there is space right now. Never counts a drop. */
  tryOffer(item: T): boolean;
  poll(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined>;
  tryPoll(): T | undefined;
  size(): number;
  capacity(): number;
  droppedCount(): number;
  remainingCapacity(): number;
  isEmpty(): boolean;
  isFull(): boolean;
  /** Remove and return everything queued, oldest first. */
  drainAll(): T[];
  clear(): void;
}

interface PollWaiter<T> {
  resolve: (item: T | undefined) => void;
  cancel: () => void;
}

abstract class RingBackedQueue<T> implements BoundedQueue<T> {
  abstract readonly mode: AdmissionMode;

  protected readonly ring: RingBuffer<T>;
  private readonly pollers: PollWaiter<T>[] = [];

  constructor(capacity: number) {
    this.ring = new RingBuffer<T>(capacity);
  }

  abstract offer(item: T, timeoutMs?: number): Promise<boolean>;

  tryOffer(item: T): boolean {
    const poller = this.pollers.shift();
    if (poller) {
      // A waiting consumer implies the ring is empty: hand over directly.
      poller.cancel();
      poller.resolve(item);
      return true;
    }
    return this.ring.push(item);
  }

  poll(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
    const item = this.tryPoll();
    if (item !== undefined || signal?.aborted || timeoutMs <= 0) {
      return Promise.resolve(item);
    }

    return new Promise<T | undefined>((resolve) => {
      const waiter: PollWaiter<T> = {
        resolve,
        cancel: () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        },
      };
      const giveUp = (): void => {
        const idx = this.pollers.indexOf(waiter);
        if (idx !== -1) this.pollers.splice(idx, 1);
        waiter.cancel();
        resolve(undefined);
      };
      const onAbort = (): void => giveUp();
      const timer = setTimeout(giveUp, timeoutMs);
      timer.unref();
      signal?.addEventListener("abort", onAbort, { once: true });
      this.pollers.push(waiter);
    });
  }

  tryPoll(): T | undefined {
    const item = this.ring.shift();
    if (item !== undefined) this.onSpaceFreed();
    return item;
  }

  size(): number {
    return this.ring.length;
  }

  capacity(): number {
    return this.ring.capacity;
  }

  abstract droppedCount(): number;

  remainingCapacity(): number {
    return this.ring.capacity - this.ring.length;
  }

  isEmpty(): boolean {
    return this.ring.length === 0;
  }

  isFull(): boolean {
    return this.ring.isFull;
  }

  drainAll(): T[] {
    const items = this.ring.popMany();
    if (items.length > 0) this.onSpaceFreed();
    return items;
  }

  clear(): void {
    this.drainAll();
  }

  /** Called after items leave the ring. */
  protected onSpaceFreed(): void {}
}

interface BlockedProducer<T> {
  item: T;
  resolve: (accepted: boolean) => void;
  timer?: NodeJS.Timeout;
}

/**
 * Back-pressure by waiting. Producers blocked on a full queue are admitted
 * in arrival order as consumers free slots.
 */
export class BlockingBoundedQueue<T> extends RingBackedQueue<T> {
  readonly mode = "blocking" as const;
  private readonly producers: BlockedProducer<T>[] = [];

  offer(item: T, timeoutMs?: number): Promise<boolean> {
    if (this.producers.length === 0 && this.tryOffer(item)) {
      return Promise.resolve(true);
    }
    if (timeoutMs !== undefined && timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const producer: BlockedProducer<T> = { item, resolve };
      if (timeoutMs !== undefined) {
        producer.timer = setTimeout(() => {
          const idx = this.producers.indexOf(producer);
          if (idx !== -1) this.producers.splice(idx, 1);
          resolve(false);
        }, timeoutMs);
      }
      this.producers.push(producer);
    });
  }

  droppedCount(): number {
    return 0;
  }

  /** Number of producers currently waiting for space. */
  waitingProducers(): number {
    return this.producers.length;
  }

  /** Wake every blocked producer with `false`; their items are not enqueued. */
  releaseProducers(): void {
    for (const producer of this.producers.splice(0)) {
      clearTimeout(producer.timer);
      producer.resolve(false);
    }
  }

  protected override onSpaceFreed(): void {
    while (this.producers.length > 0 && !this.ring.isFull) {
      const producer = this.producers.shift();
      if (!producer) break;
      clearTimeout(producer.timer);
      this.ring.push(producer.item);
      producer.resolve(true);
    }
  }
}

/**
 * Back-pressure by discarding. `offer` answers immediately; a full queue
 * drops the item and counts it.
 */
export class DroppingBoundedQueue<T> extends RingBackedQueue<T> {
  readonly mode = "dropping" as const;
  private dropped = 0;

  offer(item: T): Promise<boolean> {
    const accepted = this.tryOffer(item);
    if (!accepted) this.dropped++;
    return Promise.resolve(accepted);
  }

  droppedCount(): number {
    return this.dropped;
  }
}

export function createBoundedQueue<T>(capacity: number, failsafe: boolean): BoundedQueue<T> {
  return failsafe ? new DroppingBoundedQueue<T>(capacity) : new BlockingBoundedQueue<T>(capacity);
}
