/**
 * PDF Access Contract
 *
 * The classifier needs four things from a PDF library: page count, page
 * dimensions, page text and a rendered bitmap. Any implementation of
 * PdfSource is interchangeable; methods may reject on unreadable files and
 * callers degrade that to "no evidence".
 */

import type { GrayImage } from '../imaging/raster';

export interface PdfPageSize {
  /** PDF points (1/72 inch) */
  width: number;
  height: number;
}

export interface PdfDescription {
  numPages: number;
  firstPage: PdfPageSize;
}

export interface PdfSource {
  describe(pdfPath: string): Promise<PdfDescription>;
  /** Text of a 1-based page, lines top to bottom */
  extractText(pdfPath: string, pageNumber: number): Promise<string>;
  /** Grayscale raster of a 1-based page at the given resolution */
  renderPage(pdfPath: string, pageNumber: number, dpi: number): Promise<GrayImage>;
}
