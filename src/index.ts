/**
 * density-scan
 *
 * DBSCAN clustering over any value type, with exhaustive or KD-tree
 * neighbor search.
 *
 * @packageDocumentation
 */

// Clustering
export * from './clusters/index.js';

// Configuration
export {
  loadConfig,
  validateExternalConfig,
  parseExternalConfig,
  resolvePath,
  EXTERNAL_DEFAULTS,
} from './config/loader.js';
export type {
  ClusteringConfig,
  ExternalConfig,
  LoadConfigOptions,
  MetricName,
  ResolvedConfig,
  StrategyName,
} from './config/loader.js';

// Errors
export {
  DensityScanError,
  ConfigError,
  ClusterError,
  InputError,
  isErrorWithCode,
  isConfigError,
  isClusterError,
  isInputError,
  wrapError,
} from './utils/errors.js';

// Logging
export { logger, createLogger, setLogLevel, getLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel, LogEntry } from './utils/logger.js';
