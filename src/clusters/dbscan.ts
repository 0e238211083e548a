/**
 * DBSCAN: density-based clustering with noise.
 *
 * Groups values that have many close neighbors and marks values in sparse
 * regions as outliers (Ester, Kriegel, Sander, Xu, KDD-96).
 *
 * Features:
 * - Exhaustive neighbor search with any distance function
 * - Indexed neighbor search over a spatial index built once per instance
 * - Deterministic labels in cluster discovery order
 * - Label vector alongside grouped clusters and outliers
 */

import type {
  ClusterParameters,
  DBSCANOptions,
  DBSCANResult,
  ExhaustiveClusterParameters,
  KeyFunction,
  NeighborStrategy,
  SpatialIndex,
} from './dbscan/types.js';

import { createNeighborQuery } from './dbscan/neighbor-query.js';
import { propagateLabels } from './dbscan/label-propagation.js';
import { assembleClusters } from './dbscan/cluster-assembly.js';
import { ClusterError, ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('dbscan');

/**
 * DBSCAN clustering algorithm.
 *
 * Usage:
 * ```typescript
 * const dbscan = new DBSCAN(points, { buildIndex: KDTree.builder(vectorAccessor(2)) });
 * const { clusters, outliers } = dbscan.clusterIndexed({ epsilon: 0.5, minimumNumberOfPoints: 4 });
 * ```
 */
export class DBSCAN<V> {
  /** The values to be clustered. */
  readonly values: readonly V[];

  private readonly index: SpatialIndex<V> | null;
  private readonly key: KeyFunction<V>;

  constructor(values: readonly V[], options: DBSCANOptions<V> = {}) {
    this.values = [...values];
    this.key = options.key ?? ((value) => value);
    this.index = options.buildIndex ? options.buildIndex(this.values) : null;
  }

  /**
   * Whether `clusterIndexed` can run.
   */
  hasIndex(): boolean {
    return this.index !== null;
  }

  /**
   * Cluster by evaluating `distance` between every pair of values.
   * Errors thrown by `distance` abort the call and are rethrown unchanged.
   */
  cluster({ distance, ...parameters }: ExhaustiveClusterParameters<V>): DBSCANResult<V> {
    validateParameters(parameters);
    return this.run(parameters, { kind: 'exhaustive', distance });
  }

  /**
   * Cluster using the spatial index supplied at construction.
   */
  clusterIndexed(parameters: ClusterParameters): DBSCANResult<V> {
    validateParameters(parameters);
    if (this.index === null) {
      throw new ClusterError(
        'Spatial index not built. Pass buildIndex to the constructor.',
        'MISSING_INDEX',
      );
    }
    return this.run(parameters, { kind: 'indexed', index: this.index, key: this.key });
  }

  private run(parameters: ClusterParameters, strategy: NeighborStrategy<V>): DBSCANResult<V> {
    const start = Date.now();

    const query = createNeighborQuery(this.values, parameters.epsilon, strategy);
    const propagation = propagateLabels(this.values.length, query, parameters.minimumNumberOfPoints);
    const result = assembleClusters(this.values, propagation);

    log.debug('Clustering complete', {
      strategy: strategy.kind,
      points: this.values.length,
      clusters: result.numClusters,
      noise: result.noiseCount,
      durationMs: Date.now() - start,
    });

    return result;
  }
}

/**
 * Reject parameters no clustering run can use.
 */
export function validateParameters({ epsilon, minimumNumberOfPoints }: ClusterParameters): void {
  if (!Number.isInteger(minimumNumberOfPoints) || minimumNumberOfPoints < 0) {
    throw new ConfigError(
      `minimumNumberOfPoints must be a non-negative integer, got ${minimumNumberOfPoints}`,
      'INVALID_MIN_POINTS',
    );
  }
  if (!(epsilon > 0)) {
    throw new ConfigError(`epsilon must be greater than 0, got ${epsilon}`, 'INVALID_EPSILON');
  }
}

// Re-export types
export type {
  ClusterParameters,
  DBSCANOptions,
  DBSCANResult,
  ExhaustiveClusterParameters,
} from './dbscan/types.js';
