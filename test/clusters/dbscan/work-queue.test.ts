/**
 * Tests for WorkQueue.
 */

import { describe, it, expect } from 'vitest';
import { WorkQueue } from '../../../src/clusters/dbscan/work-queue.js';

describe('WorkQueue', () => {
  it('starts empty by default', () => {
    const queue = new WorkQueue();

    expect(queue.isEmpty()).toBe(true);
    expect(queue.size).toBe(0);
    expect(queue.dequeue()).toBeUndefined();
  });

  it('dequeues seeded items in order', () => {
    const queue = new WorkQueue([3, 1, 2]);

    expect(queue.dequeue()).toBe(3);
    expect(queue.dequeue()).toBe(1);
    expect(queue.dequeue()).toBe(2);
    expect(queue.dequeue()).toBeUndefined();
  });

  it('appends to the back while draining', () => {
    const queue = new WorkQueue([0]);

    expect(queue.dequeue()).toBe(0);
    queue.enqueueAll([4, 5]);
    queue.enqueue(6);

    expect(queue.size).toBe(3);
    expect(queue.dequeue()).toBe(4);
    expect(queue.dequeue()).toBe(5);
    expect(queue.dequeue()).toBe(6);
    expect(queue.isEmpty()).toBe(true);
  });

  it('keeps duplicates', () => {
    const queue = new WorkQueue([1, 1]);
    queue.enqueue(1);

    expect(queue.size).toBe(3);
    expect(queue.enqueued).toBe(3);
  });

  it('counts every enqueue, drained or not', () => {
    const queue = new WorkQueue([1, 2]);
    queue.dequeue();
    queue.dequeue();
    queue.enqueue(3);

    expect(queue.enqueued).toBe(3);
    expect(queue.size).toBe(1);
  });

  it('drains a large queue', () => {
    const queue = new WorkQueue();
    for (let i = 0; i < 50_000; i++) {
      queue.enqueue(i);
    }

    const drained: number[] = [];
    for (let item = queue.dequeue(); item !== undefined; item = queue.dequeue()) {
      drained.push(item);
    }

    expect(drained).toHaveLength(50_000);
    expect(drained.every((item, i) => item === i)).toBe(true);
  });
});
