/**
 * Shared CLI utilities.
 */

import { readFileSync } from 'node:fs';
import { InputError } from '../utils/errors.js';

/**
 * Value following a `--flag`, if present.
 */
export function getFlagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

/**
 * Numeric value following a `--flag`. Non-numeric text yields NaN so that
 * config validation reports it.
 */
export function getNumberFlag(args: string[], flag: string): number | undefined {
  const value = getFlagValue(args, flag);
  return value === undefined ? undefined : Number(value);
}

/**
 * Normalize parsed JSON into equal-length numeric vectors.
 * Bare numbers are treated as 1-D points.
 */
export function parsePoints(raw: unknown): number[][] {
  if (!Array.isArray(raw)) {
    throw new InputError('Points file must contain a JSON array', 'INPUT_INVALID');
  }

  const points: number[][] = [];
  let dimensions: number | undefined;

  for (let i = 0; i < raw.length; i++) {
    const entry: unknown = raw[i];
    let point: number[];

    if (typeof entry === 'number') {
      point = [entry];
    } else if (Array.isArray(entry) && entry.every((c): c is number => typeof c === 'number')) {
      point = entry;
    } else {
      throw new InputError(`Point ${i} is not a number or an array of numbers`, 'INPUT_INVALID');
    }

    if (!point.every(Number.isFinite)) {
      throw new InputError(`Point ${i} has a non-finite coordinate`, 'INPUT_INVALID');
    }

    dimensions ??= point.length;
    if (point.length !== dimensions) {
      throw new InputError(
        `Point ${i} has ${point.length} dimensions, expected ${dimensions}`,
        'INPUT_INVALID',
      );
    }

    points.push(point);
  }

  return points;
}

/**
 * Read and validate a JSON points file.
 */
export function readPointsFile(path: string): number[][] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new InputError(`Cannot read points from ${path}`, 'INPUT_READ_FAILED', error);
  }
  return parsePoints(raw);
}

/**
 * Render a point as `[x, y, ...]`.
 */
export function formatPoint(point: readonly number[]): string {
  return `[${point.join(', ')}]`;
}
