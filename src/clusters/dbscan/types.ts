/**
 * Type definitions for DBSCAN clustering.
 */

/** Label given to points that belong to no cluster. */
export const NOISE = -1;

/**
 * Distance between two values. May throw; a thrown error aborts the whole
 * clustering call and reaches the caller unchanged.
 */
export type DistanceFunction<V> = (a: V, b: V) => number;

/**
 * Identity of a value, used as a `Map` key to find a value's position.
 */
export type KeyFunction<V> = (value: V) => unknown;

/**
 * Range-query structure over the input values.
 */
export interface SpatialIndex<V> {
  /** All values strictly closer than `radius` to `center`. */
  query(center: V, radius: number): V[];
}

/**
 * Builds a spatial index over the full input collection.
 */
export type SpatialIndexBuilder<V> = (values: readonly V[]) => SpatialIndex<V>;

/**
 * Fixed-dimension coordinate access for values held in a KD-tree.
 */
export interface CoordinateAccessor<V> {
  /** Number of coordinates every value has. */
  dimensions: number;
  /** Real-valued coordinate of `value` along `dimension`. */
  coordinate(value: V, dimension: number): number;
}

/**
 * How neighbors are looked up. Chosen once per clustering run.
 */
export type NeighborStrategy<V> =
  | { kind: 'exhaustive'; distance: DistanceFunction<V> }
  | { kind: 'indexed'; index: SpatialIndex<V>; key: KeyFunction<V> };

/**
 * Options for constructing a DBSCAN instance.
 */
export interface DBSCANOptions<V> {
  /** Builds the spatial index used by `clusterIndexed`. Called once, at construction. */
  buildIndex?: SpatialIndexBuilder<V>;
  /** Maps values returned by the index back to input positions. Default: the value itself. */
  key?: KeyFunction<V>;
}

/**
 * Density parameters shared by both entry points.
 */
export interface ClusterParameters {
  /** Neighborhood radius. Neighbors are strictly closer than this. */
  epsilon: number;
  /** Minimum neighborhood size, counting the point itself, for a core point. */
  minimumNumberOfPoints: number;
}

/**
 * Parameters for exhaustive clustering.
 */
export interface ExhaustiveClusterParameters<V> extends ClusterParameters {
  distance: DistanceFunction<V>;
}

/**
 * Result of label propagation over point positions.
 */
export interface LabelPropagationResult {
  /** Cluster label per position. NOISE = -1, 0+ = cluster in discovery order. */
  labels: number[];
  /** Number of clusters found. */
  numClusters: number;
}

/**
 * Full result from DBSCAN clustering.
 */
export interface DBSCANResult<V> {
  /** Clusters ordered by label; members ordered by input position. */
  clusters: V[][];
  /** Values reachable from no core point, in input order. */
  outliers: V[];
  /** Cluster label per input position. -1 = noise. */
  labels: number[];
  /** Number of clusters found. */
  numClusters: number;
  /** Number of noise points. */
  noiseCount: number;
}
