/**
 * Binary Morphology with Rectangular Kernels
 *
 * Any non-zero pixel is foreground. Kernels are anchored at their centre
 * (floor(size / 2)); pixels outside the image never constrain an erosion
 * and never feed a dilation.
 */

import type { GrayImage } from './raster';

type LineOp = 'erode' | 'dilate';

function applyLine(
  src: Uint8Array,
  width: number,
  height: number,
  length: number,
  horizontal: boolean,
  op: LineOp
): Uint8Array {
  if (length <= 1) {
    return src.slice();
  }

  const out = new Uint8Array(src.length);
  const before = Math.floor(length / 2);
  const after = length - 1 - before;
  const lines = horizontal ? height : width;
  const lineLength = horizontal ? width : height;
  const stride = horizontal ? 1 : width;
  const prefix = new Int32Array(lineLength + 1);

  for (let line = 0; line < lines; line++) {
    const origin = horizontal ? line * width : line;

    for (let k = 0; k < lineLength; k++) {
      prefix[k + 1] = prefix[k] + (src[origin + k * stride] !== 0 ? 1 : 0);
    }

    for (let k = 0; k < lineLength; k++) {
      const lo = Math.max(0, k - before);
      const hi = Math.min(lineLength - 1, k + after);
      const count = prefix[hi + 1] - prefix[lo];
      const set = op === 'erode' ? count === hi - lo + 1 : count > 0;
      out[origin + k * stride] = set ? 255 : 0;
    }
  }

  return out;
}

function applyRect(image: GrayImage, kernelWidth: number, kernelHeight: number, op: LineOp): GrayImage {
  const rows = applyLine(image.data, image.width, image.height, kernelWidth, true, op);
  const both = applyLine(rows, image.width, image.height, kernelHeight, false, op);
  return { width: image.width, height: image.height, data: both };
}

export function erode(image: GrayImage, kernelWidth: number, kernelHeight: number): GrayImage {
  return applyRect(image, kernelWidth, kernelHeight, 'erode');
}

export function dilate(image: GrayImage, kernelWidth: number, kernelHeight: number): GrayImage {
  return applyRect(image, kernelWidth, kernelHeight, 'dilate');
}

/**
 * Morphological opening: `iterations` erosions followed by as many dilations.
 * With a long thin kernel this keeps only line segments at least that long.
 */
export function openImage(
  image: GrayImage,
  kernelWidth: number,
  kernelHeight: number,
  iterations = 1
): GrayImage {
  let result = image;
  for (let i = 0; i < iterations; i++) {
    result = erode(result, kernelWidth, kernelHeight);
  }
  for (let i = 0; i < iterations; i++) {
    result = dilate(result, kernelWidth, kernelHeight);
  }
  return result;
}

export function countNonZero(image: GrayImage): number {
  let count = 0;
  for (let i = 0; i < image.data.length; i++) {
    if (image.data[i] !== 0) count++;
  }
  return count;
}
