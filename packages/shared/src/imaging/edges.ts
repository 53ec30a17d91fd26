/**
 * Canny Edge Detection
 *
 * 3×3 Sobel gradients with L1 magnitude, non-maximum suppression along the
 * quantized gradient direction, then hysteresis over 8-connected neighbours.
 * Output pixels are 255 on edges and 0 elsewhere; the one-pixel border is
 * never marked.
 */

import type { GrayImage } from './raster';

const TAN_22_5 = Math.SQRT2 - 1;
const TAN_67_5 = Math.SQRT2 + 1;

const WEAK = 1;
const STRONG = 2;

export function cannyEdges(image: GrayImage, lowThreshold = 50, highThreshold = 150): GrayImage {
  const { width, height, data } = image;
  const size = width * height;
  const gradX = new Int32Array(size);
  const gradY = new Int32Array(size);
  const magnitude = new Int32Array(size);

  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const i = y * width + x;
      const tl = data[i - width - 1];
      const tc = data[i - width];
      const tr = data[i - width + 1];
      const ml = data[i - 1];
      const mr = data[i + 1];
      const bl = data[i + width - 1];
      const bc = data[i + width];
      const br = data[i + width + 1];

      const dx = tr + 2 * mr + br - (tl + 2 * ml + bl);
      const dy = bl + 2 * bc + br - (tl + 2 * tc + tr);
      gradX[i] = dx;
      gradY[i] = dy;
      magnitude[i] = Math.abs(dx) + Math.abs(dy);
    }
  }

  const state = new Uint8Array(size);
  const stack: number[] = [];

  for (let y = 1; y < height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      const i = y * width + x;
      const m = magnitude[i];
      if (m <= lowThreshold) continue;

      const dx = gradX[i];
      const dy = gradY[i];
      const ax = Math.abs(dx);
      const ay = Math.abs(dy);

      let isMaximum: boolean;
      if (ay <= ax * TAN_22_5) {
        isMaximum = m > magnitude[i - 1] && m >= magnitude[i + 1];
      } else if (ay >= ax * TAN_67_5) {
        isMaximum = m > magnitude[i - width] && m >= magnitude[i + width];
      } else {
        const s = (dx < 0) !== (dy < 0) ? -1 : 1;
        isMaximum = m > magnitude[i - width - s] && m > magnitude[i + width + s];
      }

      if (!isMaximum) continue;

      if (m > highThreshold) {
        state[i] = STRONG;
        stack.push(i);
      } else {
        state[i] = WEAK;
      }
    }
  }

  const edges = new Uint8Array(size);
  for (const i of stack) {
    edges[i] = 255;
  }

  while (stack.length > 0) {
    const i = stack.pop();
    if (i === undefined) break;
    const x = i % width;
    const y = (i - x) / width;

    for (let ny = y - 1; ny <= y + 1; ny++) {
      if (ny < 0 || ny >= height) continue;
      for (let nx = x - 1; nx <= x + 1; nx++) {
        if (nx < 0 || nx >= width) continue;
        const n = ny * width + nx;
        if (state[n] === WEAK && edges[n] === 0) {
          edges[n] = 255;
          stack.push(n);
        }
      }
    }
  }

  return { width, height, data: edges };
}
