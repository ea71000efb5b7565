/**
 * FastQueue unit tests
 */

import { describe, expect, it } from "vitest";
import { FastQueue } from "../src/core/data-structures";

describe("FastQueue", () => {
  it("dequeues in FIFO order", () => {
    const queue = new FastQueue<number>();
    queue.enqueue(1);
    queue.enqueue(2);
    queue.enqueue(3);

    expect(queue.dequeue()).toBe(1);
    expect(queue.dequeue()).toBe(2);
    expect(queue.dequeue()).toBe(3);
    expect(queue.dequeue()).toBeUndefined();
  });

  it("tracks length and emptiness", () => {
    const queue = new FastQueue<string>();
    expect(queue.isEmpty).toBe(true);

    queue.enqueue("a");
    queue.enqueue("b");
    expect(queue.length).toBe(2);
    expect(queue.peek()).toBe("a");
    expect(queue.length).toBe(2);

    queue.dequeue();
    queue.dequeue();
    expect(queue.isEmpty).toBe(true);
    expect(queue.peek()).toBeUndefined();
  });

  it("keeps its order across compaction", () => {
    const queue = new FastQueue<number>();
    for (let i = 0; i < 2000; i++) {
      queue.enqueue(i);
    }
    for (let i = 0; i < 1500; i++) {
      queue.dequeue();
    }

    expect(queue.length).toBe(500);
    expect(queue.dequeue()).toBe(1500);
    queue.enqueue(2000);
    expect(queue.length).toBe(500);
    expect(queue.peek()).toBe(1501);
  });

  it("interleaves enqueue and dequeue", () => {
    const queue = FastQueue.from(["a", "b"]);
    expect(queue.dequeue()).toBe("a");
    queue.enqueue("c");
    expect(queue.dequeue()).toBe("b");
    expect(queue.dequeue()).toBe("c");

    queue.enqueue("d");
    queue.clear();
    expect(queue.length).toBe(0);
  });
});
