/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (DENSITY_SCAN_*)
 * 3. Project config file (./density-scan.config.json)
 * 4. User config file (~/.density-scan/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

export type StrategyName = 'exhaustive' | 'indexed';
export type MetricName = 'euclidean' | 'angular';

const STRATEGIES: readonly StrategyName[] = ['exhaustive', 'indexed'];
const METRICS: readonly MetricName[] = ['euclidean', 'angular'];

/** Clustering section of the config file */
export interface ClusteringConfig {
  /** Neighborhood radius. */
  epsilon?: number;
  /** Minimum neighborhood size (point included) for a core point. */
  minPoints?: number;
  /** Neighbor lookup: scan every pair, or query a KD-tree. */
  strategy?: StrategyName;
  /** Distance metric for the exhaustive strategy. */
  metric?: MetricName;
}

/** External config file structure */
export interface ExternalConfig {
  clustering?: ClusteringConfig;
}

/** Config after all sources are merged */
export interface ResolvedConfig {
  clustering: Required<ClusteringConfig>;
}

/** Default external config values */
const EXTERNAL_DEFAULTS: ResolvedConfig = {
  clustering: {
    epsilon: 0.5,
    minPoints: 4,
    strategy: 'exhaustive',
    metric: 'euclidean',
  },
};

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    return path.replace('~', homedir());
  }
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStrategy(value: unknown): value is StrategyName {
  return STRATEGIES.some((s) => s === value);
}

function isMetric(value: unknown): value is MetricName {
  return METRICS.some((m) => m === value);
}

/**
 * Pick the recognized fields out of parsed JSON.
 * Fields of the wrong type are dropped with a warning.
 */
export function parseExternalConfig(raw: unknown, source: string): ExternalConfig {
  if (!isRecord(raw)) {
    log.warn(`Ignoring ${source}: expected a JSON object`);
    return {};
  }

  const clustering = raw.clustering;
  if (clustering === undefined) {
    return {};
  }
  if (!isRecord(clustering)) {
    log.warn(`Ignoring clustering section in ${source}: expected an object`);
    return {};
  }

  const result: ClusteringConfig = {};

  if (typeof clustering.epsilon === 'number') {
    result.epsilon = clustering.epsilon;
  } else if (clustering.epsilon !== undefined) {
    log.warn(`Ignoring clustering.epsilon in ${source}: expected a number`);
  }

  if (typeof clustering.minPoints === 'number') {
    result.minPoints = clustering.minPoints;
  } else if (clustering.minPoints !== undefined) {
    log.warn(`Ignoring clustering.minPoints in ${source}: expected a number`);
  }

  if (isStrategy(clustering.strategy)) {
    result.strategy = clustering.strategy;
  } else if (clustering.strategy !== undefined) {
    log.warn(`Ignoring clustering.strategy in ${source}`, { value: clustering.strategy });
  }

  if (isMetric(clustering.metric)) {
    result.metric = clustering.metric;
  } else if (clustering.metric !== undefined) {
    log.warn(`Ignoring clustering.metric in ${source}`, { value: clustering.metric });
  }

  return { clustering: result };
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    return parseExternalConfig(JSON.parse(content), path);
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Load config from environment variables.
 * Variables are prefixed with DENSITY_SCAN_ and use underscores for nesting.
 * Examples:
 *   DENSITY_SCAN_CLUSTERING_EPSILON=0.25
 *   DENSITY_SCAN_CLUSTERING_STRATEGY=indexed
 */
function loadEnvConfig(): ExternalConfig {
  const clustering: ClusteringConfig = {};

  if (process.env.DENSITY_SCAN_CLUSTERING_EPSILON) {
    clustering.epsilon = Number(process.env.DENSITY_SCAN_CLUSTERING_EPSILON);
  }
  if (process.env.DENSITY_SCAN_CLUSTERING_MIN_POINTS) {
    clustering.minPoints = Number(process.env.DENSITY_SCAN_CLUSTERING_MIN_POINTS);
  }

  const strategy = process.env.DENSITY_SCAN_CLUSTERING_STRATEGY;
  if (isStrategy(strategy)) {
    clustering.strategy = strategy;
  } else if (strategy) {
    log.warn('Ignoring unknown DENSITY_SCAN_CLUSTERING_STRATEGY', { value: strategy });
  }

  const metric = process.env.DENSITY_SCAN_CLUSTERING_METRIC;
  if (isMetric(metric)) {
    clustering.metric = metric;
  } else if (metric) {
    log.warn('Ignoring unknown DENSITY_SCAN_CLUSTERING_METRIC', { value: metric });
  }

  return Object.keys(clustering).length > 0 ? { clustering } : {};
}

/**
 * Merge a config source over resolved values. Undefined fields keep the target's value.
 */
function mergeConfig(target: ResolvedConfig, source: ExternalConfig): ResolvedConfig {
  const clustering = source.clustering ?? {};
  return {
    clustering: {
      epsilon: clustering.epsilon ?? target.clustering.epsilon,
      minPoints: clustering.minPoints ?? target.clustering.minPoints,
      strategy: clustering.strategy ?? target.clustering.strategy,
      metric: clustering.metric ?? target.clustering.metric,
    },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];
  const clustering = config.clustering;

  if (clustering?.epsilon !== undefined) {
    if (!(clustering.epsilon > 0)) {
      errors.push('clustering.epsilon must be greater than 0');
    }
  }
  if (clustering?.minPoints !== undefined) {
    if (!Number.isInteger(clustering.minPoints) || clustering.minPoints < 0) {
      errors.push('clustering.minPoints must be a non-negative integer');
    }
  }
  if (clustering?.strategy === 'indexed' && clustering.metric === 'angular') {
    errors.push("clustering.strategy 'indexed' requires clustering.metric 'euclidean'");
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  let config: ResolvedConfig = mergeConfig(EXTERNAL_DEFAULTS, {});

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.density-scan/config.json');
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'density-scan.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  if (options.cliOverrides) {
    config = mergeConfig(config, options.cliOverrides);
  }

  return config;
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
