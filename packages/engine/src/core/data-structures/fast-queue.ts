/**
 * FIFO queue with O(1) amortized enqueue and dequeue.
 *
 * Array-backed with a moving head; the array is compacted once more
 * than half of it (and over 1000 slots) has been consumed.
 *
 * @example
 * ```typescript
 * const queue = new FastQueue<Position>();
 * queue.enqueue(space.first);
 * queue.dequeue(); // space.first
 * queue.dequeue(); // undefined
 * ```
 */
export class FastQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the first item, or undefined if empty.
   */
  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > 1000 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  peek(): T | undefined {
    if (this.isEmpty) return undefined;
    return this.items[this.head];
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }

  static from<T>(items: Iterable<T>): FastQueue<T> {
    const queue = new FastQueue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }
}
