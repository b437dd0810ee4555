import { describe, expect, it } from "vitest";
import {
  BlockingBoundedQueue,
  DroppingBoundedQueue,
  createBoundedQueue,
} from "../../src/queue/bounded-queue";
import { RingBuffer } from "../../src/queue/ring-buffer";

describe("RingBuffer", () => {
  it("keeps FIFO order across wrap-around", () => {
    const ring = new RingBuffer<number>(3);
    ring.push(1);
    ring.push(2);
    ring.push(3);
    expect(ring.push(4)).toBe(false);
    expect(ring.isFull).toBe(true);

    expect(ring.shift()).toBe(1);
    expect(ring.push(4)).toBe(true);
    expect(ring.popMany()).toEqual([2, 3, 4]);
    expect(ring.length).toBe(0);
    expect(ring.shift()).toBeUndefined();
  });

  it("popMany stops at n", () => {
    const ring = new RingBuffer<string>(5);
    ["a", "b", "c"].forEach((v) => ring.push(v));
    expect(ring.popMany(2)).toEqual(["a", "b"]);
    expect(ring.length).toBe(1);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
    expect(() => new RingBuffer(2.5)).toThrow(RangeError);
  });

  it("clear empties the buffer", () => {
    const ring = new RingBuffer<number>(2);
    ring.push(1);
    ring.clear();
    expect(ring.length).toBe(0);
    expect(ring.push(2)).toBe(true);
    expect(ring.shift()).toBe(2);
  });
});

describe("DroppingBoundedQueue", () => {
  it("drops and counts what does not fit", async () => {
    const queue = new DroppingBoundedQueue<string>(2);

    expect(await queue.offer("a")).toBe(true);
    expect(await queue.offer("b")).toBe(true);
    expect(await queue.offer("c")).toBe(false);
    expect(await queue.offer("d")).toBe(false);

    expect(queue.size()).toBe(2);
    expect(queue.droppedCount()).toBe(2);
    expect(queue.isFull()).toBe(true);
    expect(queue.remainingCapacity()).toBe(0);
  });

  it("tryOffer never counts a drop", () => {
    const queue = new DroppingBoundedQueue<string>(1);
    expect(queue.tryOffer("a")).toBe(true);
    expect(queue.tryOffer("b")).toBe(false);
    expect(queue.droppedCount()).toBe(0);
  });

  it("polls in insertion order", async () => {
    const queue = new DroppingBoundedQueue<number>(3);
    await queue.offer(1);
    await queue.offer(2);
    await queue.offer(3);

    expect(await queue.poll(10)).toBe(1);
    expect(await queue.poll(10)).toBe(2);
    expect(queue.tryPoll()).toBe(3);
    expect(queue.isEmpty()).toBe(true);
  });
});

describe("BlockingBoundedQueue", () => {
  it("times out without enqueuing or counting a drop", async () => {
    const queue = new BlockingBoundedQueue<string>(2);
    await queue.offer("a");
    await queue.offer("b");

    expect(await queue.offer("c", 30)).toBe(false);
    expect(queue.size()).toBe(2);
    expect(queue.droppedCount()).toBe(0);
    expect(queue.waitingProducers()).toBe(0);
  });

  it("admits a blocked producer once a slot frees up", async () => {
    const queue = new BlockingBoundedQueue<string>(1);
    await queue.offer("a");

    const pending = queue.offer("b");
    expect(queue.waitingProducers()).toBe(1);

    expect(await queue.poll(10)).toBe("a");
    expect(await pending).toBe(true);
    expect(queue.tryPoll()).toBe("b");
  });

  it("admits blocked producers in arrival order", async () => {
    const queue = new BlockingBoundedQueue<number>(1);
    await queue.offer(0);
    const first = queue.offer(1);
    const second = queue.offer(2);

    expect(queue.tryPoll()).toBe(0);
    expect(await first).toBe(true);
    expect(queue.tryPoll()).toBe(1);
    expect(await second).toBe(true);
    expect(queue.tryPoll()).toBe(2);
  });

  it("releaseProducers wakes waiters with false", async () => {
    const queue = new BlockingBoundedQueue<string>(1);
    await queue.offer("a");
    const pending = queue.offer("b");

    queue.releaseProducers();

    expect(await pending).toBe(false);
    expect(queue.drainAll()).toEqual(["a"]);
  });

  it("a zero timeout answers immediately", async () => {
    const queue = new BlockingBoundedQueue<string>(1);
    await queue.offer("a");
    expect(await queue.offer("b", 0)).toBe(false);
  });
});

describe("poll", () => {
  it("returns undefined on timeout", async () => {
    const queue = new DroppingBoundedQueue<string>(1);
    expect(await queue.poll(20)).toBeUndefined();
  });

  it("hands an offered item straight to a waiting consumer", async () => {
    const queue = new DroppingBoundedQueue<string>(1);
    const pending = queue.poll(1_000);

    expect(await queue.offer("direct")).toBe(true);
    expect(await pending).toBe("direct");
    expect(queue.size()).toBe(0);
  });

  it("returns undefined when the signal aborts", async () => {
    const queue = new BlockingBoundedQueue<string>(1);
    const controller = new AbortController();
    const pending = queue.poll(10_000, controller.signal);

    controller.abort();

    expect(await pending).toBeUndefined();
    // the aborted poller no longer intercepts offers
    await queue.offer("later");
    expect(queue.size()).toBe(1);
  });
});

describe("createBoundedQueue", () => {
  it("picks the policy from the failsafe flag", () => {
    expect(createBoundedQueue(4, true).mode).toBe("dropping");
    expect(createBoundedQueue(4, false).mode).toBe("blocking");
    expect(createBoundedQueue(4, false).capacity()).toBe(4);
  });

  it("failsafe with capacity 2 and three offers keeps two and drops one", async () => {
    const queue = createBoundedQueue<string>(2, true);
    await queue.offer("one");
    await queue.offer("two");
    await queue.offer("three");

    expect(queue.size()).toBe(2);
    expect(queue.droppedCount()).toBe(1);
  });
});
