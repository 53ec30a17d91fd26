/**
 * Test Helpers
 *
 * In-process PDF source, synthetic page rasters and a signature builder
 * that runs the same feature extraction as detection.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  createGrayImage,
  DocumentInput,
  encodeHashes,
  extractStructuralFeatures,
  inputRegionFeatures,
  REGION_NAMES,
  type GrayImage,
  type PdfDescription,
  type PdfPageSize,
  type PdfSource,
  type RegionSignature,
  type TemplateSignatureDocument,
  type TextSignature,
} from '@layoutid/shared';

export const LETTER: PdfPageSize = { width: 612, height: 792 };

export const PAGE_WIDTH = 600;
export const PAGE_HEIGHT = 800;

export interface FakePage {
  raster: GrayImage;
  text?: string;
  numPages?: number;
  size?: PdfPageSize;
}

/**
 * PdfSource over an in-memory map of path -> page. Unknown paths reject
 * like an unreadable file would.
 */
export class FakePdfSource implements PdfSource {
  renderCalls = 0;
  describeCalls = 0;
  textCalls = 0;

  constructor(private readonly pages: Record<string, FakePage> = {}) {}

  addPage(pdfPath: string, page: FakePage): void {
    this.pages[pdfPath] = page;
  }

  resetCounts(): void {
    this.renderCalls = 0;
    this.describeCalls = 0;
    this.textCalls = 0;
  }

  async describe(pdfPath: string): Promise<PdfDescription> {
    this.describeCalls++;
    const page = this.page(pdfPath);
    return { numPages: page.numPages ?? 1, firstPage: page.size ?? LETTER };
  }

  async extractText(pdfPath: string): Promise<string> {
    this.textCalls++;
    return this.page(pdfPath).text ?? '';
  }

  async renderPage(pdfPath: string): Promise<GrayImage> {
    this.renderCalls++;
    return this.page(pdfPath).raster;
  }

  private page(pdfPath: string): FakePage {
    const page = this.pages[pdfPath];
    if (!page) {
      throw new Error(`ENOENT: no such file '${pdfPath}'`);
    }
    return page;
  }
}

// ============================================================================
// Synthetic pages
// ============================================================================

export function fillRect(image: GrayImage, x0: number, y0: number, x1: number, y1: number, value = 0): void {
  for (let y = Math.max(0, y0); y < Math.min(image.height, y1); y++) {
    image.data.fill(value, y * image.width + Math.max(0, x0), y * image.width + Math.min(image.width, x1));
  }
}

export function drawGrid(
  image: GrayImage,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  rows: number,
  cols: number,
  thickness = 2
): void {
  for (let r = 0; r <= rows; r++) {
    const y = Math.round(y0 + ((y1 - y0) * r) / rows);
    fillRect(image, x0, y, x1, y + thickness);
  }
  for (let c = 0; c <= cols; c++) {
    const x = Math.round(x0 + ((x1 - x0) * c) / cols);
    fillRect(image, x, y0, x + thickness, y1);
  }
}

export type PageVariant = 'alpha' | 'beta' | 'gamma';

/**
 * Three visibly different invoice layouts on a 600 × 800 page.
 */
export function makePage(variant: PageVariant): GrayImage {
  const page = createGrayImage(PAGE_WIDTH, PAGE_HEIGHT);

  switch (variant) {
    case 'alpha':
      fillRect(page, 30, 30, 300, 150);
      fillRect(page, 360, 60, 570, 80);
      drawGrid(page, 70, 220, 530, 500, 6, 4);
      fillRect(page, 60, 600, 200, 700);
      break;
    case 'beta':
      fillRect(page, 300, 40, 570, 160);
      fillRect(page, 30, 90, 200, 110);
      for (let y = 230; y < 500; y += 45) {
        fillRect(page, 70, y, 530, y + 12);
      }
      fillRect(page, 400, 600, 540, 720);
      break;
    case 'gamma':
      for (let x = 40; x < 560; x += 130) {
        fillRect(page, x, 50, x + 60, 110);
      }
      for (let x = 90; x < 520; x += 70) {
        fillRect(page, x, 220, x + 25, 500);
      }
      fillRect(page, 250, 640, 350, 660);
      break;
  }

  return page;
}

// ============================================================================
// Signatures
// ============================================================================

/**
 * Signature document for a page, built with the detector's own feature
 * extraction.
 */
export async function buildSignature(
  templateId: string,
  pdf: PdfSource,
  pdfPath: string,
  text?: TextSignature
): Promise<TemplateSignatureDocument> {
  const input = new DocumentInput(pdfPath, pdf, undefined, 300);

  const features = await inputRegionFeatures(input);
  if (!features) {
    throw new Error(`Cannot build visual signature for ${pdfPath}`);
  }
  const regions: Record<string, RegionSignature> = {};
  for (const name of REGION_NAMES) {
    const region = features[name];
    if (region) {
      regions[name] = {
        bbox_norm: region.bbox_norm,
        bbox_pixels: region.bbox_pixels,
        hashes: encodeHashes(region.hashes),
        histogram: region.histogram,
      };
    }
  }

  const { features: structural } = await extractStructuralFeatures(input);
  if (!structural) {
    throw new Error(`Cannot build structural signature for ${pdfPath}`);
  }

  return {
    template_id: templateId,
    template_file: `${templateId}.pdf`,
    signatures: {
      visual: { regions },
      structural,
      ...(text ? { text } : {}),
    },
  };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `layoutid-${prefix}-`));
}

export function writeSignature(dir: string, fileName: string, document: unknown): void {
  fs.writeFileSync(path.join(dir, fileName), JSON.stringify(document, null, 2));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
