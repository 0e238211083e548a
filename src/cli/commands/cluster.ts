import type { Command } from '../types.js';
import {
  loadConfig,
  validateExternalConfig,
  type ClusteringConfig,
  type ExternalConfig,
} from '../../config/loader.js';
import { DBSCAN } from '../../clusters/dbscan.js';
import type { DBSCANResult } from '../../clusters/dbscan/types.js';
import {
  KDTree,
  angularDistance,
  euclideanDistance,
  vectorAccessor,
} from '../../clusters/dbscan/kd-tree.js';
import { formatPoint, getFlagValue, getNumberFlag, readPointsFile } from '../utils.js';

type Point = readonly number[];

const USAGE =
  'density-scan cluster <points.json> [--epsilon <n>] [--min-points <n>] ' +
  '[--strategy exhaustive|indexed] [--metric euclidean|angular] [--json]';

/**
 * Cluster numeric points with resolved clustering settings.
 */
export function clusterPoints(
  points: readonly Point[],
  clustering: Required<ClusteringConfig>,
): DBSCANResult<Point> {
  const parameters = {
    epsilon: clustering.epsilon,
    minimumNumberOfPoints: clustering.minPoints,
  };

  if (clustering.strategy === 'indexed') {
    const dimensions = points.length > 0 ? points[0].length : 0;
    const dbscan = new DBSCAN(points, { buildIndex: KDTree.builder(vectorAccessor(dimensions)) });
    return dbscan.clusterIndexed(parameters);
  }

  const distance = clustering.metric === 'angular' ? angularDistance : euclideanDistance;
  return new DBSCAN(points).cluster({ ...parameters, distance });
}

/**
 * Human-readable summary, one line per cluster.
 */
export function formatSummary(result: DBSCANResult<Point>): string[] {
  const lines = [`Clusters: ${result.numClusters}`];

  result.clusters.forEach((cluster, label) => {
    lines.push(`  ${label} (${cluster.length}): ${cluster.map(formatPoint).join(' ')}`);
  });

  lines.push(`Outliers: ${result.noiseCount}`);
  if (result.noiseCount > 0) {
    lines.push(`  ${result.outliers.map(formatPoint).join(' ')}`);
  }

  return lines;
}

/**
 * Collect clustering overrides from command-line flags.
 * Returns the offending flag text when a strategy or metric is unknown.
 */
export function parseClusterFlags(
  args: string[],
): { overrides: ExternalConfig } | { error: string } {
  const clustering: ClusteringConfig = {};

  const epsilon = getNumberFlag(args, '--epsilon');
  if (epsilon !== undefined) {
    clustering.epsilon = epsilon;
  }

  const minPoints = getNumberFlag(args, '--min-points');
  if (minPoints !== undefined) {
    clustering.minPoints = minPoints;
  }

  const strategy = getFlagValue(args, '--strategy');
  if (strategy !== undefined) {
    if (strategy !== 'exhaustive' && strategy !== 'indexed') {
      return { error: `Unknown strategy: ${strategy}` };
    }
    clustering.strategy = strategy;
  }

  const metric = getFlagValue(args, '--metric');
  if (metric !== undefined) {
    if (metric !== 'euclidean' && metric !== 'angular') {
      return { error: `Unknown metric: ${metric}` };
    }
    clustering.metric = metric;
  }

  return { overrides: { clustering } };
}

export const clusterCommand: Command = {
  name: 'cluster',
  description: 'Cluster points from a JSON file',
  usage: USAGE,
  handler: async (args) => {
    const file = args[0];
    if (!file || file.startsWith('--')) {
      console.error('Error: points file required');
      console.log(`Usage: ${USAGE}`);
      process.exit(2);
      return;
    }

    const flags = parseClusterFlags(args.slice(1));
    if ('error' in flags) {
      console.error(`Error: ${flags.error}`);
      process.exit(2);
      return;
    }

    const config = loadConfig({ cliOverrides: flags.overrides });
    const errors = validateExternalConfig(config);
    if (errors.length > 0) {
      console.error('Configuration errors:');
      for (const error of errors) {
        console.error(`  - ${error}`);
      }
      process.exit(3);
      return;
    }

    const points = readPointsFile(file);
    const result = clusterPoints(points, config.clustering);

    if (args.includes('--json')) {
      const { clusters, outliers, labels } = result;
      console.log(JSON.stringify({ clusters, outliers, labels }, null, 2));
      return;
    }

    for (const line of formatSummary(result)) {
      console.log(line);
    }
  },
};
