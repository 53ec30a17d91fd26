/**
 * Classifier Service
 *
 * Owns the detection context for the API process: the template database,
 * the PDF source and the detection cache. Reloading swaps the context.
 */

import {
  createDetectionContext,
  detectOptionsFromRequest,
  detectTemplate,
  loadTemplateDatabaseWithReport,
  logger,
  DetectionCache,
  type ClassifierSettings,
  type ClassifyRequest,
  type DetectionContext,
  type DetectionResult,
  type PdfSource,
  type TemplateDatabaseReport,
} from '@layoutid/shared';

export interface ClassifierServiceOptions {
  signaturesDir: string;
  pdfSource?: PdfSource;
  settings?: Partial<ClassifierSettings>;
}

export class ClassifierService {
  private readonly cache = new DetectionCache();
  private contextTask: Promise<DetectionContext> | null = null;

  constructor(private readonly options: ClassifierServiceOptions) {}

  /** Context built on first use and reused until reload(). */
  getContext(): Promise<DetectionContext> {
    if (!this.contextTask) {
      const task = createDetectionContext({
        signaturesDir: this.options.signaturesDir,
        pdfSource: this.options.pdfSource,
        cache: this.cache,
        settings: this.options.settings,
      });
      // A failed load is retried on the next request
      this.contextTask = task.catch((err: unknown) => {
        this.contextTask = null;
        throw err;
      });
    }
    return this.contextTask;
  }

  async templateIds(): Promise<string[]> {
    const context = await this.getContext();
    return [...context.database.keys()];
  }

  /**
   * Rebuild the template database from disk. Cached rasters stay valid;
   * only the database slot is replaced.
   */
  async reload(): Promise<TemplateDatabaseReport> {
    const report = await loadTemplateDatabaseWithReport(this.options.signaturesDir);
    this.cache.setTemplateDatabase(report.database);
    this.contextTask = null;
    const context = await this.getContext();

    logger.info('Template database reloaded', {
      templates: context.database.size,
      skipped: report.skipped.length,
    });
    return report;
  }

  async classify(request: ClassifyRequest): Promise<DetectionResult> {
    const context = await this.getContext();
    return detectTemplate(request.pdf_path, { ...detectOptionsFromRequest(request), context });
  }
}
