/**
 * KD-tree for fixed-radius neighbor search.
 * Performance degrades in high dimensions but still avoids most distance
 * evaluations for low-dimensional data.
 */

import type { CoordinateAccessor, SpatialIndex, SpatialIndexBuilder } from './types.js';

interface KDNode<V> {
  value: V;
  point: number[];
  left: KDNode<V> | null;
  right: KDNode<V> | null;
  splitDim: number;
}

/**
 * KD-tree over arbitrary values exposed through a coordinate accessor.
 * Radius queries use Euclidean distance with a strict `<` bound, matching
 * `euclideanDistance` below.
 */
export class KDTree<V> implements SpatialIndex<V> {
  private root: KDNode<V> | null = null;
  // Zero-dimensional values all coincide, so they are kept flat
  private coincident: readonly V[] = [];
  private readonly dimensions: number;
  private readonly accessor: CoordinateAccessor<V>;
  private readonly count: number;

  /**
   * Build a KD-tree from values.
   * @param values Values to index.
   * @param accessor Coordinate access for the value type.
   */
  constructor(values: readonly V[], accessor: CoordinateAccessor<V>) {
    this.accessor = accessor;
    this.dimensions = accessor.dimensions;
    this.count = values.length;

    if (values.length === 0) {
      return;
    }
    if (this.dimensions === 0) {
      this.coincident = [...values];
      return;
    }

    const entries = values.map((value) => ({ value, point: this.coordinates(value) }));
    this.root = this.buildTree(entries, 0);
  }

  /**
   * Builder for DBSCAN's `buildIndex` option.
   */
  static builder<V>(accessor: CoordinateAccessor<V>): SpatialIndexBuilder<V> {
    return (values) => new KDTree(values, accessor);
  }

  /**
   * Number of indexed values.
   */
  get size(): number {
    return this.count;
  }

  private buildTree(entries: Array<{ value: V; point: number[] }>, depth: number): KDNode<V> | null {
    if (entries.length === 0) {
      return null;
    }

    const dim = depth % this.dimensions;

    // Sort by splitting dimension
    entries.sort((a, b) => a.point[dim] - b.point[dim]);

    const mid = Math.floor(entries.length / 2);
    return {
      value: entries[mid].value,
      point: entries[mid].point,
      splitDim: dim,
      left: this.buildTree(entries.slice(0, mid), depth + 1),
      right: this.buildTree(entries.slice(mid + 1), depth + 1),
    };
  }

  /**
   * Find all values strictly closer than `radius` to `center`.
   * Results come back in tree traversal order.
   */
  query(center: V, radius: number): V[] {
    if (this.dimensions === 0) {
      return 0 < radius ? [...this.coincident] : [];
    }

    const target = this.coordinates(center);
    const found: V[] = [];

    const search = (node: KDNode<V> | null): void => {
      if (node === null) {
        return;
      }

      if (euclideanDistance(target, node.point) < radius) {
        found.push(node.value);
      }

      // Left subtree holds coordinates <= the split, right holds >=
      const diff = target[node.splitDim] - node.point[node.splitDim];
      if (diff < radius) {
        search(node.left);
      }
      if (-diff < radius) {
        search(node.right);
      }
    };

    search(this.root);
    return found;
  }

  private coordinates(value: V): number[] {
    const point = new Array<number>(this.dimensions);
    for (let d = 0; d < this.dimensions; d++) {
      point[d] = this.accessor.coordinate(value, d);
    }
    return point;
  }
}

/**
 * Coordinate accessor for plain numeric vectors.
 */
export function vectorAccessor(dimensions: number): CoordinateAccessor<readonly number[]> {
  return {
    dimensions,
    coordinate: (value, dimension) => value[dimension],
  };
}

/**
 * Compute Euclidean distance between two points.
 */
export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Compute angular distance between two normalized vectors.
 * Angular distance = 1 - cos(angle) = 1 - dot(a, b)
 */
export function angularDistance(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
  }
  return 1 - dot;
}
