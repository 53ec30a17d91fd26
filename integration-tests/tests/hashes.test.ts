/**
 * Perceptual Hash Tests
 *
 * Bit functions, hex encoding and Hamming distances.
 */

import {
  averageHashBits,
  bitsToHex,
  computeHashBits,
  createGrayImage,
  differenceHashBits,
  encodeHashes,
  hammingDistance,
  hashBitWidth,
  hexToBits,
  median,
  perceptualHashBits,
  waveletHashBits,
  type GrayImage,
} from '@layoutid/shared';
import { fillRect, makePage } from './helpers';

function image(width: number, height: number, pixels: number[]): GrayImage {
  return { width, height, data: Uint8Array.from(pixels) };
}

describe('Hex encoding', () => {
  it('packs bits MSB first, four per digit', () => {
    expect(bitsToHex(Uint8Array.from([1, 0, 1, 0, 0, 1, 0, 1]))).toBe('a5');
    expect(bitsToHex(Uint8Array.from([0, 0, 0, 0, 1, 1, 1, 1]))).toBe('0f');
  });

  it('left-pads widths that are not a multiple of four', () => {
    expect(bitsToHex(Uint8Array.from([1, 1]))).toBe('3');
  });

  it('decodes hex back to bits', () => {
    expect(Array.from(hexToBits('a5') ?? [])).toEqual([1, 0, 1, 0, 0, 1, 0, 1]);
    expect(Array.from(hexToBits('F0') ?? [])).toEqual([1, 1, 1, 1, 0, 0, 0, 0]);
  });

  it('rejects strings that are not hex', () => {
    expect(hexToBits('')).toBeNull();
    expect(hexToBits('xyz')).toBeNull();
    expect(hexToBits('12 4')).toBeNull();
  });
});

describe('Hamming distance', () => {
  it('counts differing bits', () => {
    const a = Uint8Array.from([1, 0, 1, 1]);
    const b = Uint8Array.from([0, 0, 1, 0]);
    expect(hammingDistance(a, b)).toBe(2);
    expect(hammingDistance(a, a)).toBe(0);
  });

  it('returns null for different widths', () => {
    expect(hammingDistance(Uint8Array.from([1, 0]), Uint8Array.from([1, 0, 0, 0]))).toBeNull();
  });
});

describe('Hash widths', () => {
  it('uses 256 bits for phash and 64 for the others', () => {
    expect(hashBitWidth('phash')).toBe(256);
    expect(hashBitWidth('dhash')).toBe(64);
    expect(hashBitWidth('ahash')).toBe(64);
    expect(hashBitWidth('whash')).toBe(64);
  });
});

describe('Bit functions', () => {
  it('median averages the two middle values of an even count', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([5, 1, 3])).toBe(3);
  });

  it('average hash marks pixels brighter than the mean', () => {
    expect(Array.from(averageHashBits(image(2, 2, [0, 100, 200, 255])))).toEqual([0, 0, 1, 1]);
  });

  it('difference hash compares each pixel with its right neighbour', () => {
    const bits = differenceHashBits(image(3, 2, [10, 20, 15, 5, 5, 6]));
    expect(Array.from(bits)).toEqual([1, 0, 0, 1]);
  });

  it('wavelet hash keeps a left/right split through Haar levels', () => {
    const page = createGrayImage(16, 16);
    fillRect(page, 0, 0, 8, 16);

    const bits = waveletHashBits(page, 8);

    expect(bits.length).toBe(64);
    for (let row = 0; row < 8; row++) {
      expect(Array.from(bits.subarray(row * 8, row * 8 + 8))).toEqual([0, 0, 0, 0, 1, 1, 1, 1]);
    }
  });

  it('perceptual hash is deterministic with hashSize² bits', () => {
    const page = createGrayImage(64, 64);
    fillRect(page, 5, 5, 40, 20);
    fillRect(page, 30, 35, 60, 60, 90);

    const first = perceptualHashBits(page, 16);
    const second = perceptualHashBits(page, 16);

    expect(first.length).toBe(256);
    expect(hammingDistance(first, second)).toBe(0);
  });
});

describe('Region hashing', () => {
  it('computes all four hashes with their fixed widths', async () => {
    const hashes = await computeHashBits(makePage('alpha'));

    expect(hashes.phash.length).toBe(256);
    expect(hashes.dhash.length).toBe(64);
    expect(hashes.ahash.length).toBe(64);
    expect(hashes.whash.length).toBe(64);

    const hex = encodeHashes(hashes);
    expect(hex.phash).toMatch(/^[0-9a-f]{64}$/);
    expect(hex.dhash).toMatch(/^[0-9a-f]{16}$/);
    expect(hex.ahash).toMatch(/^[0-9a-f]{16}$/);
    expect(hex.whash).toMatch(/^[0-9a-f]{16}$/);
  });
});
