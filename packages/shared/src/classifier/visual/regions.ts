/**
 * Page Regions
 *
 * Fixed named regions of a preprocessed page and their visual features.
 */

import { cropImage, grayHistogram, type GrayImage } from '../../imaging/raster';
import { resizeGray } from '../../imaging/sharp-ops';
import type { BoundingBox, RegionName } from '../../types';
import { computeHashBits, type RegionHashBits } from './hashes';

/** Normalized [x0, y0, x1, y1] page fractions */
export const REGION_LAYOUT: Record<RegionName, BoundingBox> = {
  header: [0.0, 0.0, 1.0, 0.25],
  main_table: [0.1, 0.25, 0.9, 0.65],
  payment_info: [0.0, 0.7, 1.0, 0.95],
};

export const REGION_NAMES: readonly RegionName[] = ['header', 'main_table', 'payment_info'];

/** Every region is resampled to this square before hashing. */
export const REGION_TILE_SIZE = 512;

export interface RegionFeatures {
  bbox_norm: BoundingBox;
  bbox_pixels: BoundingBox;
  hashes: RegionHashBits;
  histogram: number[];
}

export type RegionFeatureSet = Partial<Record<RegionName, RegionFeatures>>;

export function regionPixelBox(name: RegionName, width: number, height: number): BoundingBox {
  const [x0, y0, x1, y1] = REGION_LAYOUT[name];
  return [
    Math.trunc(x0 * width),
    Math.trunc(y0 * height),
    Math.trunc(x1 * width),
    Math.trunc(y1 * height),
  ];
}

export async function computeRegionFeatures(
  name: RegionName,
  page: GrayImage
): Promise<RegionFeatures | null> {
  const box = regionPixelBox(name, page.width, page.height);
  const region = cropImage(page, box[0], box[1], box[2], box[3]);
  if (!region) {
    return null;
  }

  const tile = await resizeGray(region, REGION_TILE_SIZE, REGION_TILE_SIZE);
  return {
    bbox_norm: REGION_LAYOUT[name],
    bbox_pixels: box,
    hashes: await computeHashBits(tile),
    histogram: grayHistogram(region),
  };
}

/**
 * Features of every non-empty region of a preprocessed page.
 */
export async function extractRegionFeatures(page: GrayImage): Promise<RegionFeatureSet> {
  const features: RegionFeatureSet = {};
  for (const name of REGION_NAMES) {
    const region = await computeRegionFeatures(name, page);
    if (region) {
      features[name] = region;
    }
  }
  return features;
}
