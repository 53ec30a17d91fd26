/**
 * Raster Operations backed by sharp (libvips)
 */

import sharp from 'sharp';
import type { GrayImage } from './raster';

/** CLAHE tile grid per axis; the window is the page size divided by this. */
const CLAHE_GRID = 8;
const CLAHE_MAX_SLOPE = 2;
/** Sigma of a 3×3 Gaussian kernel. */
const BLUR_SIGMA = 0.8;

function fromGray(image: GrayImage): sharp.Sharp {
  const buffer = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
  return sharp(buffer, {
    raw: { width: image.width, height: image.height, channels: 1 },
  });
}

async function toGray(pipeline: sharp.Sharp): Promise<GrayImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  const pixels = new Uint8Array(info.width * info.height);

  if (info.channels === 1) {
    pixels.set(data.subarray(0, pixels.length));
  } else {
    // libvips may hand back the gray band replicated; keep the first one.
    for (let i = 0; i < pixels.length; i++) {
      pixels[i] = data[i * info.channels];
    }
  }

  return { width: info.width, height: info.height, data: pixels };
}

/**
 * Contrast-limited adaptive histogram equalization followed by a mild blur.
 * Equalizing first keeps the blur from having to smooth CLAHE tile banding.
 */
export async function equalizeAndBlur(image: GrayImage): Promise<GrayImage> {
  const pipeline = fromGray(image)
    .clahe({
      width: Math.max(1, Math.ceil(image.width / CLAHE_GRID)),
      height: Math.max(1, Math.ceil(image.height / CLAHE_GRID)),
      maxSlope: CLAHE_MAX_SLOPE,
    })
    .blur(BLUR_SIGMA);

  return toGray(pipeline);
}

/**
 * Resample to exactly width × height with a Lanczos kernel (aspect ratio is not kept).
 */
export async function resizeGray(image: GrayImage, width: number, height: number): Promise<GrayImage> {
  if (image.width === width && image.height === height) {
    return image;
  }
  return toGray(fromGray(image).resize(width, height, { fit: 'fill', kernel: 'lanczos3' }));
}

/**
 * Decode an encoded bitmap (PNG, JPEG, ...) to gray, flattening any alpha
 * channel over a white page.
 */
export async function decodeToGray(encoded: Buffer): Promise<GrayImage> {
  return toGray(sharp(encoded).flatten({ background: '#ffffff' }).grayscale());
}
