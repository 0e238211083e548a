/**
 * Synthetic test fixtures for DBSCAN tests.
 * Tests verify geometric invariants rather than fixed coordinates.
 *
 * Uses a seeded PRNG (mulberry32) for deterministic data generation.
 */

import { euclideanDistance } from '../../../src/clusters/dbscan/kd-tree.js';

/**
 * Mulberry32 seeded PRNG. Returns values in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Default seed for reproducible test fixtures. */
const DEFAULT_SEED = 42;

/**
 * Generate random Gaussian samples around a center.
 */
function gaussianSamples(
  center: number[],
  variance: number,
  count: number,
  rng: () => number,
): number[][] {
  const samples: number[][] = [];

  for (let i = 0; i < count; i++) {
    const point = center.map((c) => {
      // Box-Muller transform for Gaussian
      const u1 = 1 - rng();
      const u2 = rng();
      const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
      return c + z * Math.sqrt(variance);
    });
    samples.push(point);
  }

  return samples;
}

/**
 * Generate three well-separated 2-D blobs.
 */
export function wellSeparatedBlobs(n: number = 150): number[][] {
  const rng = mulberry32(DEFAULT_SEED);
  const pointsPerCluster = Math.floor(n / 3);

  const cluster1 = gaussianSamples([10, 0], 0.5, pointsPerCluster, rng);
  const cluster2 = gaussianSamples([-10, 0], 0.5, pointsPerCluster, rng);
  const cluster3 = gaussianSamples([0, 10], 0.5, pointsPerCluster, rng);

  return [...cluster1, ...cluster2, ...cluster3];
}

/**
 * Dense 3-D cluster at the origin followed by far-away outliers.
 */
export function denseClusterWithOutliers(
  clusterSize: number = 100,
  numOutliers: number = 10,
): number[][] {
  const rng = mulberry32(DEFAULT_SEED + 3);
  const cluster = gaussianSamples([0, 0, 0], 0.3, clusterSize, rng);

  const outliers: number[][] = [];
  for (let i = 0; i < numOutliers; i++) {
    const angle = (2 * Math.PI * i) / numOutliers;
    outliers.push([50 + rng() * 10, 50 * Math.sin(angle), 50 * Math.cos(angle)]);
  }

  return [...cluster, ...outliers];
}

/**
 * Uniform random points in a square. Mixed density: some clusters, some noise.
 */
export function uniformSquare(n: number = 200, side: number = 20): number[][] {
  const rng = mulberry32(DEFAULT_SEED + 2);
  const points: number[][] = [];

  for (let i = 0; i < n; i++) {
    points.push([rng() * side, rng() * side]);
  }

  return points;
}

/**
 * Connected components of the graph joining points strictly closer than epsilon.
 */
export function countComponents(points: number[][], epsilon: number): number {
  const visited = new Array<boolean>(points.length).fill(false);
  let components = 0;

  for (let start = 0; start < points.length; start++) {
    if (visited[start]) continue;
    components++;
    visited[start] = true;
    const stack = [start];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (let j = 0; j < points.length; j++) {
        if (!visited[j] && euclideanDistance(points[current], points[j]) < epsilon) {
          visited[j] = true;
          stack.push(j);
        }
      }
    }
  }

  return components;
}

/**
 * Brute-force neighbor positions, self included.
 */
export function bruteForceNeighbors(points: number[][], index: number, epsilon: number): number[] {
  const result: number[] = [];
  for (let j = 0; j < points.length; j++) {
    if (euclideanDistance(points[index], points[j]) < epsilon) {
      result.push(j);
    }
  }
  return result;
}
