/**
 * Perceptual Hashes
 *
 * Bit fingerprints of a grayscale region and their hex encoding. Bits are
 * held one per byte (0 or 1) and packed MSB first, four bits per hex digit.
 */

import type { GrayImage } from '../../imaging/raster';
import { resizeGray } from '../../imaging/sharp-ops';
import type { HashType } from '../../types';

export type HashBits = Uint8Array;

export type RegionHashBits = Record<HashType, HashBits>;

export const HASH_TYPES: readonly HashType[] = ['phash', 'dhash', 'ahash', 'whash'];

/** Edge length of the low-frequency block kept by each hash. */
export const HASH_SIZES: Record<HashType, number> = {
  phash: 16,
  dhash: 8,
  ahash: 8,
  whash: 8,
};

/** DCT input edge = phash size × this factor */
const PHASH_HIGHFREQ_FACTOR = 4;

export function hashBitWidth(type: HashType): number {
  return HASH_SIZES[type] * HASH_SIZES[type];
}

export function median(values: ArrayLike<number>): number {
  const sorted = Array.from(values).sort((a, b) => a - b);
  if (sorted.length === 0) {
    return 0;
  }
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function bitsToHex(bits: HashBits): string {
  const pad = (4 - (bits.length % 4)) % 4;
  let hex = '';
  let nibble = 0;
  let filled = pad;

  for (let i = 0; i < bits.length; i++) {
    nibble = (nibble << 1) | (bits[i] ? 1 : 0);
    filled++;
    if (filled === 4) {
      hex += nibble.toString(16);
      nibble = 0;
      filled = 0;
    }
  }
  return hex;
}

/**
 * Returns null for anything that is not a non-empty hex string.
 */
export function hexToBits(hex: string): HashBits | null {
  if (!/^[0-9a-fA-F]+$/.test(hex)) {
    return null;
  }
  const bits = new Uint8Array(hex.length * 4);
  for (let i = 0; i < hex.length; i++) {
    const nibble = parseInt(hex[i], 16);
    for (let b = 0; b < 4; b++) {
      bits[i * 4 + b] = (nibble >> (3 - b)) & 1;
    }
  }
  return bits;
}

/** Number of differing bits; null when the widths differ. */
export function hammingDistance(a: HashBits, b: HashBits): number | null {
  if (a.length !== b.length) {
    return null;
  }
  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      distance++;
    }
  }
  return distance;
}

// ============================================================================
// Bit functions over pre-sized images
// ============================================================================

/** Pixels brighter than the mean (image already hashSize × hashSize). */
export function averageHashBits(image: GrayImage): HashBits {
  let sum = 0;
  for (let i = 0; i < image.data.length; i++) {
    sum += image.data[i];
  }
  const mean = sum / image.data.length;
  return image.data.map((value) => (value > mean ? 1 : 0));
}

/** Right neighbour brighter than left, per row (image is (n+1) × n). */
export function differenceHashBits(image: GrayImage): HashBits {
  const cols = image.width - 1;
  const bits = new Uint8Array(cols * image.height);
  for (let y = 0; y < image.height; y++) {
    const row = y * image.width;
    for (let x = 0; x < cols; x++) {
      bits[y * cols + x] = image.data[row + x + 1] > image.data[row + x] ? 1 : 0;
    }
  }
  return bits;
}

/**
 * Low-frequency block of a 2D DCT-II compared to its median. Only the
 * first hashSize coefficients of each axis are computed.
 */
export function perceptualHashBits(image: GrayImage, hashSize: number): HashBits {
  const { width, height, data } = image;
  const rowBasis = dctBasis(hashSize, height);
  const colBasis = dctBasis(hashSize, width);

  // Along columns: partial[k][x] = Σ_y cos(k, y) · p[y][x]
  const partial = new Float64Array(hashSize * width);
  for (let k = 0; k < hashSize; k++) {
    for (let y = 0; y < height; y++) {
      const c = rowBasis[k * height + y];
      const row = y * width;
      for (let x = 0; x < width; x++) {
        partial[k * width + x] += c * data[row + x];
      }
    }
  }

  const coefficients = new Float64Array(hashSize * hashSize);
  for (let k = 0; k < hashSize; k++) {
    for (let j = 0; j < hashSize; j++) {
      let sum = 0;
      for (let x = 0; x < width; x++) {
        sum += colBasis[j * width + x] * partial[k * width + x];
      }
      coefficients[k * hashSize + j] = sum;
    }
  }

  const threshold = median(coefficients);
  return Uint8Array.from(coefficients, (value) => (value > threshold ? 1 : 0));
}

function dctBasis(count: number, length: number): Float64Array {
  const basis = new Float64Array(count * length);
  for (let k = 0; k < count; k++) {
    for (let n = 0; n < length; n++) {
      basis[k * length + n] = Math.cos((Math.PI * k * (2 * n + 1)) / (2 * length));
    }
  }
  return basis;
}

/**
 * Haar wavelet hash. The image must be square with a power-of-two edge of
 * at least hashSize. The mean is removed first (the coarsest LL band carries
 * nothing else), then LL bands are taken down to hashSize × hashSize.
 */
export function waveletHashBits(image: GrayImage, hashSize: number): HashBits {
  let side = image.width;
  let values = new Float64Array(image.data.length);
  let sum = 0;
  for (let i = 0; i < image.data.length; i++) {
    values[i] = image.data[i] / 255;
    sum += values[i];
  }
  const mean = sum / values.length;
  for (let i = 0; i < values.length; i++) {
    values[i] -= mean;
  }

  while (side > hashSize) {
    const half = side / 2;
    const next = new Float64Array(half * half);
    for (let y = 0; y < half; y++) {
      for (let x = 0; x < half; x++) {
        const top = 2 * y * side + 2 * x;
        const bottom = top + side;
        next[y * half + x] = (values[top] + values[top + 1] + values[bottom] + values[bottom + 1]) / 2;
      }
    }
    values = next;
    side = half;
  }

  const threshold = median(values);
  return Uint8Array.from(values, (value) => (value > threshold ? 1 : 0));
}

// ============================================================================
// Region hashing
// ============================================================================

function largestPowerOfTwo(n: number): number {
  return 2 ** Math.floor(Math.log2(Math.max(1, n)));
}

/**
 * All four hashes of a region tile. Each hash resizes the tile itself.
 */
export async function computeHashBits(tile: GrayImage): Promise<RegionHashBits> {
  const phashEdge = HASH_SIZES.phash * PHASH_HIGHFREQ_FACTOR;
  const waveletEdge = Math.max(HASH_SIZES.whash, largestPowerOfTwo(Math.min(tile.width, tile.height)));

  const [phashImage, dhashImage, ahashImage, whashImage] = await Promise.all([
    resizeGray(tile, phashEdge, phashEdge),
    resizeGray(tile, HASH_SIZES.dhash + 1, HASH_SIZES.dhash),
    resizeGray(tile, HASH_SIZES.ahash, HASH_SIZES.ahash),
    resizeGray(tile, waveletEdge, waveletEdge),
  ]);

  return {
    phash: perceptualHashBits(phashImage, HASH_SIZES.phash),
    dhash: differenceHashBits(dhashImage),
    ahash: averageHashBits(ahashImage),
    whash: waveletHashBits(whashImage, HASH_SIZES.whash),
  };
}

export function encodeHashes(bits: RegionHashBits): Record<HashType, string> {
  return {
    phash: bitsToHex(bits.phash),
    dhash: bitsToHex(bits.dhash),
    ahash: bitsToHex(bits.ahash),
    whash: bitsToHex(bits.whash),
  };
}
