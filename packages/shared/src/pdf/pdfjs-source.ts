/**
 * PDF Access via pdfjs-dist
 *
 * Text extraction and page rendering for Node.js. Rendering draws into an
 * @napi-rs/canvas surface and decodes the result to gray with sharp.
 */

import fs from 'fs';
import path from 'path';
import { createCanvas, DOMMatrix, ImageData, Path2D, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import type * as PdfjsModule from 'pdfjs-dist';
import type { PDFDocumentProxy } from 'pdfjs-dist';
import { logger } from '../logger';
import { decodeToGray } from '../imaging/sharp-ops';
import type { PdfDescription, PdfSource } from './types';
import type { GrayImage } from '../imaging/raster';

type Pdfjs = typeof PdfjsModule;

const pdfjsRoot = path.dirname(require.resolve('pdfjs-dist/package.json'));

let pdfjsLib: Pdfjs | null = null;

function loadPdfjs(): Pdfjs {
  if (pdfjsLib) {
    return pdfjsLib;
  }

  // The legacy build only polyfills these from node-canvas; supply them first.
  for (const [name, value] of Object.entries({ DOMMatrix, ImageData, Path2D })) {
    if (!Reflect.has(globalThis, name)) {
      Reflect.set(globalThis, name, value);
    }
  }

  // pdfjs-dist 3.x ships its legacy build as CommonJS
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  const lib: Pdfjs = require('pdfjs-dist/legacy/build/pdf.js');
  lib.GlobalWorkerOptions.workerSrc = path.join(pdfjsRoot, 'legacy/build/pdf.worker.js');
  pdfjsLib = lib;
  return lib;
}

interface CanvasAndContext {
  canvas: Canvas | null;
  context: SKRSContext2D | null;
}

/**
 * Canvas factory handed to pdfjs for its scratch surfaces (masks, patterns).
 */
class NapiCanvasFactory {
  create(width: number, height: number): CanvasAndContext {
    const canvas = createCanvas(Math.max(1, width), Math.max(1, height));
    return { canvas, context: canvas.getContext('2d') };
  }

  reset(target: CanvasAndContext, width: number, height: number): void {
    if (!target.canvas) {
      throw new Error('Canvas is not specified');
    }
    target.canvas.width = Math.max(1, width);
    target.canvas.height = Math.max(1, height);
  }

  destroy(target: CanvasAndContext): void {
    target.canvas = null;
    target.context = null;
  }
}

async function withDocument<T>(
  pdfPath: string,
  fn: (doc: PDFDocumentProxy) => Promise<T>
): Promise<T> {
  const lib = loadPdfjs();
  const data = new Uint8Array(await fs.promises.readFile(pdfPath));
  const doc = await lib.getDocument({
    data,
    canvasFactory: new NapiCanvasFactory(),
    standardFontDataUrl: path.join(pdfjsRoot, 'standard_fonts') + path.sep,
    isEvalSupported: false,
    verbosity: 0,
  }).promise;

  try {
    return await fn(doc);
  } finally {
    await doc.destroy();
  }
}

export class PdfjsSource implements PdfSource {
  async describe(pdfPath: string): Promise<PdfDescription> {
    return withDocument(pdfPath, async (doc) => {
      const page = await doc.getPage(1);
      const viewport = page.getViewport({ scale: 1 });
      return {
        numPages: doc.numPages,
        firstPage: { width: viewport.width, height: viewport.height },
      };
    });
  }

  /**
   * Extract page text, preserving line structure.
   *
   * Groups text items by Y position so that each visual line becomes one
   * line of output, read left to right.
   */
  async extractText(pdfPath: string, pageNumber: number): Promise<string> {
    return withDocument(pdfPath, async (doc) => {
      const page = await doc.getPage(pageNumber);
      const textContent = await page.getTextContent();

      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        // Round Y position to group items on the same line
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y);
        if (line) {
          line.push({ x, str: item.str });
        } else {
          itemsByY.set(y, [{ x, str: item.str }]);
        }
      }

      // PDF y grows upwards: sort descending for top to bottom
      const lines: string[] = [];
      for (const y of Array.from(itemsByY.keys()).sort((a, b) => b - a)) {
        const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
        const lineText = lineItems.map((item) => item.str).join(' ').trim();
        if (lineText) {
          lines.push(lineText);
        }
      }

      logger.debug('PDF text extraction complete', {
        pdfPath,
        pageNumber,
        lineCount: lines.length,
      });

      return lines.join('\n');
    });
  }

  async renderPage(pdfPath: string, pageNumber: number, dpi: number): Promise<GrayImage> {
    return withDocument(pdfPath, async (doc) => {
      const page = await doc.getPage(pageNumber);
      const viewport = page.getViewport({ scale: dpi / 72 });
      const width = Math.ceil(viewport.width);
      const height = Math.ceil(viewport.height);

      const canvas = createCanvas(width, height);
      const context = canvas.getContext('2d');
      context.fillStyle = '#ffffff';
      context.fillRect(0, 0, width, height);

      await page.render({ canvasContext: context, viewport }).promise;

      const image = await decodeToGray(await canvas.encode('png'));

      logger.debug('PDF page rendered', { pdfPath, pageNumber, dpi, width, height });

      return image;
    });
  }
}
