/**
 * Group values by final label.
 */

import { NOISE, type DBSCANResult, type LabelPropagationResult } from './types.js';

/**
 * Partition values into clusters (ordered by label) and outliers.
 * Members of each cluster, and the outliers, keep input order.
 */
export function assembleClusters<V>(
  values: readonly V[],
  { labels, numClusters }: LabelPropagationResult,
): DBSCANResult<V> {
  const clusters: V[][] = Array.from({ length: numClusters }, () => []);
  const outliers: V[] = [];

  for (let i = 0; i < values.length; i++) {
    const label = labels[i];
    if (label === NOISE) {
      outliers.push(values[i]);
    } else {
      clusters[label].push(values[i]);
    }
  }

  return {
    clusters,
    outliers,
    labels,
    numClusters,
    noiseCount: outliers.length,
  };
}
