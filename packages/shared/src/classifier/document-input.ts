/**
 * Document Input
 *
 * Per-call view of the PDF being classified. Each primitive (describe,
 * render, text) runs at most once per instance; the rendered page is also
 * shared through the DetectionCache across calls.
 */

import { logger } from '../logger';
import type { GrayImage } from '../imaging/raster';
import type { PdfDescription, PdfSource } from '../pdf/types';
import type { DetectionCache } from './cache';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class DocumentInput {
  private rasterTask: Promise<GrayImage | null> | null = null;
  private descriptionTask: Promise<PdfDescription | null> | null = null;
  private textTask: Promise<string> | null = null;
  private renderFailure: string | null = null;
  private describeFailure: string | null = null;

  constructor(
    readonly pdfPath: string,
    private readonly pdf: PdfSource,
    readonly cache: DetectionCache | undefined,
    readonly dpi: number
  ) {}

  /** Why rendering failed, once raster() has resolved to null */
  get renderError(): string | null {
    return this.renderFailure;
  }

  get describeError(): string | null {
    return this.describeFailure;
  }

  /**
   * First page as a grayscale raster at `dpi`, or null when the PDF cannot
   * be rendered.
   */
  raster(): Promise<GrayImage | null> {
    if (!this.rasterTask) {
      this.rasterTask = this.loadRaster();
    }
    return this.rasterTask;
  }

  description(): Promise<PdfDescription | null> {
    if (!this.descriptionTask) {
      this.descriptionTask = this.pdf.describe(this.pdfPath).then(
        (description) => (description.numPages > 0 ? description : this.noPages()),
        (err: unknown) => {
          this.describeFailure = errorMessage(err);
          logger.warn('Failed to read PDF structure', {
            pdfPath: this.pdfPath,
            error: this.describeFailure,
          });
          return null;
        }
      );
    }
    return this.descriptionTask;
  }

  /** First-page text; empty string when extraction fails. */
  firstPageText(): Promise<string> {
    if (!this.textTask) {
      this.textTask = this.pdf.extractText(this.pdfPath, 1).catch((err: unknown) => {
        logger.debug('Text extraction failed, continuing without text', {
          pdfPath: this.pdfPath,
          error: errorMessage(err),
        });
        return '';
      });
    }
    return this.textTask;
  }

  private noPages(): null {
    this.describeFailure = 'document has no pages';
    return null;
  }

  private async loadRaster(): Promise<GrayImage | null> {
    const cached = await this.cache?.getImage(this.pdfPath, 'render');
    if (cached) {
      return cached;
    }

    try {
      const image = await this.pdf.renderPage(this.pdfPath, 1, this.dpi);
      await this.cache?.setImage(this.pdfPath, 'render', image);
      return image;
    } catch (err) {
      this.renderFailure = errorMessage(err);
      logger.warn('Failed to render PDF', { pdfPath: this.pdfPath, error: this.renderFailure });
      return null;
    }
  }
}
