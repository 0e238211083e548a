/**
 * Clustering exports.
 */

// DBSCAN entry points
export { DBSCAN, validateParameters } from './dbscan.js';

// Building blocks
export { NOISE } from './dbscan/types.js';
export type {
  ClusterParameters,
  CoordinateAccessor,
  DBSCANOptions,
  DBSCANResult,
  DistanceFunction,
  ExhaustiveClusterParameters,
  KeyFunction,
  LabelPropagationResult,
  NeighborStrategy,
  SpatialIndex,
  SpatialIndexBuilder,
} from './dbscan/types.js';
export {
  createNeighborQuery,
  ExhaustiveNeighborQuery,
  IndexedNeighborQuery,
} from './dbscan/neighbor-query.js';
export type { NeighborQuery } from './dbscan/neighbor-query.js';
export { propagateLabels } from './dbscan/label-propagation.js';
export { assembleClusters } from './dbscan/cluster-assembly.js';
export { WorkQueue } from './dbscan/work-queue.js';

// Spatial index and distances
export { KDTree, vectorAccessor, euclideanDistance, angularDistance } from './dbscan/kd-tree.js';
