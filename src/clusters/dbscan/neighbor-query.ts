/**
 * Neighbor lookup for DBSCAN.
 *
 * Both strategies answer the same question, "which positions lie strictly
 * within epsilon of position i", and include i itself. For an index whose
 * metric agrees with the exhaustive distance function they return identical
 * arrays (ascending positions).
 */

import type { DistanceFunction, KeyFunction, NeighborStrategy, SpatialIndex } from './types.js';

/**
 * Capability consumed by label propagation.
 */
export interface NeighborQuery {
  /** Positions of all values strictly within epsilon of `values[index]`. */
  neighbors(index: number): number[];
}

/**
 * Evaluates the distance function against every value, self included.
 * Errors thrown by the distance function propagate unchanged.
 */
export class ExhaustiveNeighborQuery<V> implements NeighborQuery {
  constructor(
    private readonly values: readonly V[],
    private readonly epsilon: number,
    private readonly distance: DistanceFunction<V>,
  ) {}

  neighbors(index: number): number[] {
    const center = this.values[index];
    const result: number[] = [];

    for (let j = 0; j < this.values.length; j++) {
      if (this.distance(center, this.values[j]) < this.epsilon) {
        result.push(j);
      }
    }

    return result;
  }
}

/**
 * Queries a prebuilt spatial index and maps returned values back to
 * positions through a lookup built once per run.
 *
 * Values sharing a key (duplicates) all map to every position holding that
 * key; a key returned twice by one query is counted once. Returned values
 * whose key is not among the inputs are ignored.
 */
export class IndexedNeighborQuery<V> implements NeighborQuery {
  private readonly positions = new Map<unknown, number[]>();

  constructor(
    private readonly values: readonly V[],
    private readonly epsilon: number,
    private readonly index: SpatialIndex<V>,
    private readonly key: KeyFunction<V>,
  ) {
    for (let i = 0; i < values.length; i++) {
      const k = key(values[i]);
      const existing = this.positions.get(k);
      if (existing) {
        existing.push(i);
      } else {
        this.positions.set(k, [i]);
      }
    }
  }

  neighbors(index: number): number[] {
    const found = this.index.query(this.values[index], this.epsilon);
    const seen = new Set<unknown>();
    const result: number[] = [];

    for (const value of found) {
      const k = this.key(value);
      if (seen.has(k)) {
        continue;
      }
      seen.add(k);

      const positions = this.positions.get(k);
      if (positions) {
        result.push(...positions);
      }
    }

    return result.sort((a, b) => a - b);
  }
}

/**
 * Create the neighbor query for a strategy.
 */
export function createNeighborQuery<V>(
  values: readonly V[],
  epsilon: number,
  strategy: NeighborStrategy<V>,
): NeighborQuery {
  switch (strategy.kind) {
    case 'exhaustive':
      return new ExhaustiveNeighborQuery(values, epsilon, strategy.distance);
    case 'indexed':
      return new IndexedNeighborQuery(values, epsilon, strategy.index, strategy.key);
  }
}
