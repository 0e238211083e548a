/**
 * Standardized error types for density-scan.
 *
 * All errors extend from DensityScanError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * Errors raised by a caller-supplied distance function are never wrapped;
 * they reach the caller exactly as thrown.
 *
 * ## Usage
 *
 * ```typescript
 * import { ConfigError, InputError } from './errors.js';
 *
 * throw new ConfigError('epsilon must be greater than 0', 'INVALID_EPSILON');
 *
 * try {
 *   readFileSync(path, 'utf-8');
 * } catch (err) {
 *   throw new InputError(`Cannot read ${path}`, 'INPUT_READ_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all density-scan errors.
 *
 * Provides:
 * - `code`: Programmatic error identifier (e.g., 'INVALID_EPSILON')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'ConfigError')
 */
export class DensityScanError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  declare readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    // Capture stack trace (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof DensityScanError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Invalid clustering parameters or configuration.
 *
 * Common codes:
 * - `INVALID_MIN_POINTS`: minimumNumberOfPoints is negative or not an integer
 * - `INVALID_EPSILON`: epsilon is not greater than 0
 */
export class ConfigError extends DensityScanError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Cluster Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors during clustering operations.
 *
 * Common codes:
 * - `MISSING_INDEX`: Indexed clustering requested without a spatial index
 */
export class ClusterError extends DensityScanError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors reading or validating point files.
 *
 * Common codes:
 * - `INPUT_READ_FAILED`: Cannot read or parse the points file
 * - `INPUT_INVALID`: Points are malformed or of mixed dimension
 */
export class InputError extends DensityScanError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a density-scan error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof DensityScanError && error.code === code;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isClusterError(error: unknown): error is ClusterError {
  return error instanceof ClusterError;
}

export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError;
}

/**
 * Wrap an unknown error in a DensityScanError.
 *
 * If the error is already a DensityScanError, returns it unchanged.
 * Otherwise wraps it in a new DensityScanError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): DensityScanError {
  if (error instanceof DensityScanError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new DensityScanError(errorMessage, 'UNKNOWN', error);
}
