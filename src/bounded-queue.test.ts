/**
 * Unit tests for bounded-queue.ts
 */

import { describe, it, expect } from "vitest";
import { BoundedQueue } from "./bounded-queue.js";

describe("BoundedQueue", () => {
  describe("basic enqueue/dequeue FIFO behavior", () => {
    it("dequeues items in the order they were enqueued", () => {
      const q = new BoundedQueue<string>(5);
      q.enqueue("a");
      q.enqueue("b");
      q.enqueue("c");

      expect(q.dequeue()?.value).toBe("a");
      expect(q.dequeue()?.value).toBe("b");
      expect(q.dequeue()?.value).toBe("c");
    });

    it("stamps each item with its enqueue time", () => {
      let now = 1_000;
      const q = new BoundedQueue<number>(5, () => now);
      q.enqueue(42);
      now = 2_500;
      q.enqueue(43);

      expect(q.dequeue()).toEqual({ value: 42, enqueuedAt: 1_000 });
      expect(q.dequeue()).toEqual({ value: 43, enqueuedAt: 2_500 });
    });
  });

  // ─── Backpressure: Drops Oldest When Full ───────────────────────────────────

  describe("backpressure: drops oldest when full", () => {
    it("drops and returns the oldest item when enqueuing into a full queue", () => {
      const q = new BoundedQueue<number>(3);
      expect(q.enqueue(0)).toBeNull();
      expect(q.enqueue(1)).toBeNull();
      expect(q.enqueue(2)).toBeNull();
      expect(q.enqueue(3)).toBe(0);

      expect(q.size).toBe(3);
      expect(q.dequeue()?.value).toBe(1);
      expect(q.dequeue()?.value).toBe(2);
      expect(q.dequeue()?.value).toBe(3);
    });

    it("counts one drop per overflow enqueue", () => {
      const q = new BoundedQueue<number>(2);
      q.enqueue(0);
      q.enqueue(1);
      expect(q.droppedCount).toBe(0);

      q.enqueue(2);
      expect(q.droppedCount).toBe(1);

      q.enqueue(3);
      expect(q.droppedCount).toBe(2);
      expect(q.dequeue()?.value).toBe(2);
      expect(q.dequeue()?.value).toBe(3);
    });

    it("keeps the drop counter across clear()", () => {
      const q = new BoundedQueue<number>(1);
      q.enqueue(0);
      q.enqueue(1);
      q.clear();
      expect(q.droppedCount).toBe(1);
    });

    it("never exceeds capacity under sustained overflow", () => {
      const q = new BoundedQueue<number>(3);
      for (let i = 0; i < 10; i++) q.enqueue(i);
      expect(q.size).toBe(3);
      expect(q.capacity).toBe(3);
      expect(q.droppedCount).toBe(7);
    });
  });

  // ─── clear() ──────────────────────────────────────────────────────────────

  describe("clear()", () => {
    it("empties the queue and reports how many items were discarded", () => {
      const q = new BoundedQueue<number>(5);
      q.enqueue(0);
      q.enqueue(1);
      q.enqueue(2);

      expect(q.clear()).toBe(3);
      expect(q.size).toBe(0);
      expect(q.dequeue()).toBeNull();
    });

    it("allows re-use after clear", () => {
      const q = new BoundedQueue<number>(3);
      q.enqueue(0);
      q.enqueue(1);
      q.clear();

      q.enqueue(10);
      expect(q.size).toBe(1);
      expect(q.dequeue()?.value).toBe(10);
    });
  });

  // ─── Edge Cases ───────────────────────────────────────────────────────────

  describe("edge cases", () => {
    it("dequeue from an empty queue returns null", () => {
      expect(new BoundedQueue<number>().dequeue()).toBeNull();
    });

    it("wraps around the circular buffer under interleaved use", () => {
      const q = new BoundedQueue<number>(3);
      const seen: number[] = [];
      for (let i = 0; i < 10; i++) {
        q.enqueue(i);
        if (i % 2 === 1) {
          const item = q.dequeue();
          if (item) seen.push(item.value);
        }
      }
      expect(seen).toEqual([0, 1, 3, 5, 7]);
      expect(q.droppedCount).toBe(3);
      expect(q.size).toBe(2);
    });

    it("default capacity is 100", () => {
      expect(new BoundedQueue<number>().capacity).toBe(100);
    });

    it("rejects a non-positive capacity", () => {
      expect(() => new BoundedQueue<number>(0)).toThrow(RangeError);
    });
  });
});
