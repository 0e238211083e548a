/**
 * FIFO queue of point positions awaiting expansion.
 *
 * Append-only: dequeue advances a head index instead of removing the front
 * element, so draining n entries costs O(n) overall.
 */
export class WorkQueue {
  private items: number[];
  private head = 0;

  /**
   * Create a queue seeded with the given positions.
   */
  constructor(initial: Iterable<number> = []) {
    this.items = Array.from(initial);
  }

  /**
   * Append one position to the back.
   */
  enqueue(item: number): void {
    this.items.push(item);
  }

  /**
   * Append positions to the back, in order.
   */
  enqueueAll(items: readonly number[]): void {
    for (const item of items) {
      this.items.push(item);
    }
  }

  /**
   * Take the front position, or undefined when drained.
   */
  dequeue(): number | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }
    return this.items[this.head++];
  }

  /**
   * Number of positions not yet dequeued.
   */
  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Total positions ever enqueued.
   */
  get enqueued(): number {
    return this.items.length;
  }
}
