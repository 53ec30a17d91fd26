/**
 * Visual Comparison
 */

import type { HashType, RegionName, RegionSignature } from '../../types';
import { hammingDistance, hexToBits, HASH_TYPES, type HashBits } from './hashes';
import { REGION_NAMES, type RegionFeatures } from './regions';

export const HASH_WEIGHTS: Record<HashType, number> = {
  phash: 0.35,
  dhash: 0.3,
  ahash: 0.2,
  whash: 0.15,
};

/** Region score blend; the remaining 0.15 is held for keypoint matching. */
export const REGION_SCORE_WEIGHTS = {
  hash: 0.6,
  histogram: 0.25,
} as const;

export const REGION_WEIGHTS: Record<RegionName, number> = {
  header: 0.4,
  main_table: 0.35,
  payment_info: 0.15,
};

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * 1 − hamming / bitWidth, or null when the stored hash is absent,
 * unparsable or of another width.
 */
export function hashSimilarity(input: HashBits, stored: string | null | undefined): number | null {
  if (typeof stored !== 'string') {
    return null;
  }
  const storedBits = hexToBits(stored);
  if (!storedBits) {
    return null;
  }
  const distance = hammingDistance(input, storedBits);
  if (distance === null) {
    return null;
  }
  return clamp01(1 - distance / input.length);
}

/**
 * Weighted hash similarity over the hash types both sides can compare.
 * 0 when none are comparable.
 */
export function compareHashes(
  input: Record<HashType, HashBits>,
  stored: RegionSignature['hashes']
): number {
  let weighted = 0;
  let totalWeight = 0;

  for (const type of HASH_TYPES) {
    const similarity = hashSimilarity(input[type], stored[type]);
    if (similarity === null) {
      continue;
    }
    weighted += similarity * HASH_WEIGHTS[type];
    totalWeight += HASH_WEIGHTS[type];
  }

  return totalWeight > 0 ? weighted / totalWeight : 0;
}

function normalizeHistogram(histogram: readonly number[]): number[] | null {
  const total = histogram.reduce((sum, value) => sum + value, 0);
  if (!(total > 0)) {
    return null;
  }
  return histogram.map((value) => value / total);
}

/**
 * Pearson correlation of the sum-normalized histograms, floored at 0.
 * Mismatched lengths or an empty histogram score 0; two flat histograms
 * correlate perfectly.
 */
export function histogramSimilarity(input: readonly number[], stored: readonly number[]): number {
  if (input.length === 0 || input.length !== stored.length) {
    return 0;
  }
  const a = normalizeHistogram(input);
  const b = normalizeHistogram(stored);
  if (!a || !b) {
    return 0;
  }

  const n = a.length;
  let sumA = 0;
  let sumB = 0;
  let sumAA = 0;
  let sumBB = 0;
  let sumAB = 0;
  for (let i = 0; i < n; i++) {
    sumA += a[i];
    sumB += b[i];
    sumAA += a[i] * a[i];
    sumBB += b[i] * b[i];
    sumAB += a[i] * b[i];
  }

  const numerator = sumAB - (sumA * sumB) / n;
  const denominator = (sumAA - (sumA * sumA) / n) * (sumBB - (sumB * sumB) / n);
  const correlation = Math.abs(denominator) > Number.EPSILON ? numerator / Math.sqrt(denominator) : 1;
  return clamp01(correlation);
}

export function compareRegion(input: RegionFeatures, stored: RegionSignature): number {
  const hashScore = compareHashes(input.hashes, stored.hashes);
  const histogramScore = Array.isArray(stored.histogram)
    ? histogramSimilarity(input.histogram, stored.histogram)
    : 0;

  return hashScore * REGION_SCORE_WEIGHTS.hash + histogramScore * REGION_SCORE_WEIGHTS.histogram;
}

/**
 * Weighted average of region scores, renormalized over the regions present.
 */
export function calculateVisualConfidence(regionScores: Partial<Record<RegionName, number>>): number {
  let weighted = 0;
  let totalWeight = 0;

  for (const name of REGION_NAMES) {
    const score = regionScores[name];
    if (score === undefined) {
      continue;
    }
    const weight = REGION_WEIGHTS[name];
    weighted += score * weight;
    totalWeight += weight;
  }

  return totalWeight > 0 ? weighted / totalWeight : 0;
}
