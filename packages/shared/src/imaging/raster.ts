/**
 * Grayscale Rasters
 *
 * Minimal 8-bit single-channel image container and the pixel operations the
 * detectors share. Rows are stored top to bottom, `data.length === width * height`.
 */

export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Pixels darker than this count as ink. */
export const INK_THRESHOLD = 200;

export function createGrayImage(width: number, height: number, fill = 255): GrayImage {
  const data = new Uint8Array(width * height);
  data.fill(fill);
  return { width, height, data };
}

/**
 * Copy the pixel rectangle [x0, x1) × [y0, y1), clamped to the image.
 * Returns null when the clamped rectangle is empty.
 */
export function cropImage(
  image: GrayImage,
  x0: number,
  y0: number,
  x1: number,
  y1: number
): GrayImage | null {
  const left = Math.max(0, Math.min(image.width, x0));
  const right = Math.max(0, Math.min(image.width, x1));
  const top = Math.max(0, Math.min(image.height, y0));
  const bottom = Math.max(0, Math.min(image.height, y1));
  const width = right - left;
  const height = bottom - top;

  if (width <= 0 || height <= 0) {
    return null;
  }

  const data = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    const start = (top + y) * image.width + left;
    data.set(image.data.subarray(start, start + width), y * width);
  }
  return { width, height, data };
}

/**
 * 256-bin intensity histogram (raw counts).
 */
export function grayHistogram(image: GrayImage): number[] {
  const bins = new Array<number>(256).fill(0);
  for (let i = 0; i < image.data.length; i++) {
    bins[image.data[i]]++;
  }
  return bins;
}

/**
 * Fraction of pixels in [x0, x1) × [y0, y1) darker than INK_THRESHOLD.
 */
export function inkDensity(
  image: GrayImage,
  x0 = 0,
  y0 = 0,
  x1 = image.width,
  y1 = image.height
): number {
  const left = Math.max(0, x0);
  const right = Math.min(image.width, x1);
  const top = Math.max(0, y0);
  const bottom = Math.min(image.height, y1);
  const total = Math.max(0, right - left) * Math.max(0, bottom - top);
  if (total === 0) {
    return 0;
  }

  let dark = 0;
  for (let y = top; y < bottom; y++) {
    const row = y * image.width;
    for (let x = left; x < right; x++) {
      if (image.data[row + x] < INK_THRESHOLD) dark++;
    }
  }
  return dark / total;
}
