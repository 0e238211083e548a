/**
 * Tests for cluster assembly.
 */

import { describe, it, expect } from 'vitest';
import { assembleClusters } from '../../../src/clusters/dbscan/cluster-assembly.js';

describe('assembleClusters', () => {
  it('groups values by label in label order', () => {
    const result = assembleClusters(['a', 'b', 'c', 'd', 'e'], {
      labels: [1, -1, 0, 1, 0],
      numClusters: 2,
    });

    expect(result.clusters).toEqual([
      ['c', 'e'],
      ['a', 'd'],
    ]);
    expect(result.outliers).toEqual(['b']);
    expect(result.noiseCount).toBe(1);
    expect(result.numClusters).toBe(2);
  });

  it('keeps input order inside each cluster and among outliers', () => {
    const result = assembleClusters([5, 4, 3, 2, 1], {
      labels: [-1, 0, -1, 0, 0],
      numClusters: 1,
    });

    expect(result.clusters).toEqual([[4, 2, 1]]);
    expect(result.outliers).toEqual([5, 3]);
  });

  it('returns the labels it was given', () => {
    const labels = [0, 0, -1];

    const result = assembleClusters(['x', 'y', 'z'], { labels, numClusters: 1 });

    expect(result.labels).toBe(labels);
  });

  it('handles all noise', () => {
    const result = assembleClusters([1, 2], { labels: [-1, -1], numClusters: 0 });

    expect(result.clusters).toEqual([]);
    expect(result.outliers).toEqual([1, 2]);
  });
});
