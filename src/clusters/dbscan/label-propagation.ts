/**
 * Breadth-first label propagation for DBSCAN.
 *
 * Points are scanned in input order. An unlabeled point whose neighborhood
 * (itself included) reaches `minimumNumberOfPoints` opens the next cluster;
 * the cluster then grows through a work queue of discovered positions. Every
 * dequeued, still-unlabeled position joins the cluster, and only core points
 * enqueue their own neighbors. Labels are never revoked.
 */

import type { NeighborQuery } from './neighbor-query.js';
import { NOISE, type LabelPropagationResult } from './types.js';
import { WorkQueue } from './work-queue.js';

/**
 * Assign a cluster label to each of `count` positions.
 * @param count Number of points.
 * @param query Neighbor lookup by position.
 * @param minimumNumberOfPoints Core point threshold.
 */
export function propagateLabels(
  count: number,
  query: NeighborQuery,
  minimumNumberOfPoints: number,
): LabelPropagationResult {
  const labels = new Array<number>(count).fill(NOISE);
  let numClusters = 0;

  for (let i = 0; i < count; i++) {
    if (labels[i] !== NOISE) {
      continue;
    }

    // Not core (yet). May still be claimed as a border point later.
    const neighbors = query.neighbors(i);
    if (neighbors.length < minimumNumberOfPoints) {
      continue;
    }

    const label = numClusters;
    labels[i] = label;
    expandCluster(new WorkQueue(neighbors), labels, label, query, minimumNumberOfPoints);
    numClusters++;
  }

  return { labels, numClusters };
}

/**
 * Drain the queue, labeling every unlabeled position it yields.
 * Duplicates and labeled positions are filtered here, not at enqueue time.
 */
function expandCluster(
  queue: WorkQueue,
  labels: number[],
  label: number,
  query: NeighborQuery,
  minimumNumberOfPoints: number,
): void {
  let next = queue.dequeue();

  while (next !== undefined) {
    if (labels[next] === NOISE) {
      labels[next] = label;

      const neighbors = query.neighbors(next);
      if (neighbors.length >= minimumNumberOfPoints) {
        queue.enqueueAll(neighbors);
      }
    }

    next = queue.dequeue();
  }
}
