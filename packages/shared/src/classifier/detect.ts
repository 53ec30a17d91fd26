/**
 * Template Detection
 *
 * Entry point of the classifier: runs the text, visual and structural
 * detectors against one PDF and fuses their evidence.
 */

import { config } from '../config';
import { runForDocument } from '../context';
import { ClassifierConfigurationError } from '../errors';
import { logger } from '../logger';
import {
  detectionDurationHistogram,
  detectionsCounter,
  detectionTimeoutsCounter,
  signalDurationHistogram,
} from '../metrics';
import { PdfjsSource } from '../pdf/pdfjs-source';
import type { PdfSource } from '../pdf/types';
import {
  UNKNOWN_TEMPLATE,
  type ClassifyRequest,
  type DetectionOutcome,
  type DetectionResult,
  type TemplateDatabase,
} from '../types';
import { DetectionCache } from './cache';
import { DocumentInput } from './document-input';
import { fuseResults } from './fusion';
import { loadTemplateDatabase } from './signature-store';
import { emptySignal, type SignalScores, type TextExclusions } from './signals';
import { detectByStructure } from './structure';
import { detectByText } from './text-exclusion';
import { detectByVisual } from './visual';

export interface ClassifierSettings {
  renderDpi: number;
  confidenceThreshold: number;
  visualWeight: number;
  structureWeight: number;
  ambiguityMargin: number;
  /** 0 disables the budget */
  timeoutMs: number;
}

export function settingsFromConfig(): ClassifierSettings {
  return {
    renderDpi: config.renderDpi,
    confidenceThreshold: config.confidenceThreshold,
    visualWeight: config.visualWeight,
    structureWeight: config.structureWeight,
    ambiguityMargin: config.ambiguityMargin,
    timeoutMs: config.detectionTimeoutMs,
  };
}

/**
 * Everything a detection needs that outlives a single call.
 */
export interface DetectionContext {
  database: TemplateDatabase;
  pdf: PdfSource;
  cache?: DetectionCache;
  settings: ClassifierSettings;
}

export interface CreateDetectionContextOptions {
  templatesDb?: TemplateDatabase;
  signaturesDir?: string;
  pdfSource?: PdfSource;
  cache?: DetectionCache;
  /** Set false to run without any cache */
  useCache?: boolean;
  settings?: Partial<ClassifierSettings>;
}

export async function createDetectionContext(
  options: CreateDetectionContextOptions = {}
): Promise<DetectionContext> {
  const cache = options.useCache === false ? undefined : (options.cache ?? new DetectionCache());

  let database = options.templatesDb;
  if (!database) {
    if (!options.signaturesDir) {
      throw new ClassifierConfigurationError(
        'Either a template database or a signatures directory is required'
      );
    }
    database = await loadTemplateDatabase(options.signaturesDir, { cache });
  }

  return {
    database,
    pdf: options.pdfSource ?? new PdfjsSource(),
    cache,
    settings: { ...settingsFromConfig(), ...options.settings },
  };
}

export interface DetectTemplateOptions {
  context?: DetectionContext;
  templatesDb?: TemplateDatabase;
  signaturesDir?: string;
  pdfSource?: PdfSource;
  cache?: DetectionCache;
  confidenceThreshold?: number;
  useTextExclusion?: boolean;
  useVisual?: boolean;
  useStructure?: boolean;
  visualWeight?: number;
  structureWeight?: number;
  timeoutMs?: number;
}

/**
 * Detection switches carried by a classify request.
 */
export function detectOptionsFromRequest(request: ClassifyRequest): DetectTemplateOptions {
  return {
    confidenceThreshold: request.confidence_threshold,
    useTextExclusion: request.use_text_exclusion,
    useVisual: request.use_visual,
    useStructure: request.use_structure,
  };
}

export function detectionOutcome(result: DetectionResult): DetectionOutcome {
  if (result.template_id !== UNKNOWN_TEMPLATE) {
    return 'matched';
  }
  return result.confidence > 0 ? 'low_confidence' : 'unknown';
}

function unknownResult(warning: string, excluded: string[] = []): DetectionResult {
  return {
    template_id: UNKNOWN_TEMPLATE,
    confidence: 0,
    details: { visual_score: 0, structure_score: 0, excluded_templates: excluded, warnings: [warning] },
  };
}

async function timed<T>(signal: string, run: () => Promise<T>): Promise<T> {
  const end = signalDurationHistogram.startTimer({ signal });
  try {
    return await run();
  } finally {
    end();
  }
}

async function resolveContext(options: DetectTemplateOptions): Promise<DetectionContext> {
  const { context } = options;
  if (context) {
    return {
      ...context,
      database: options.templatesDb ?? context.database,
      pdf: options.pdfSource ?? context.pdf,
      cache: options.cache ?? context.cache,
    };
  }
  return createDetectionContext({
    templatesDb: options.templatesDb,
    signaturesDir: options.signaturesDir,
    pdfSource: options.pdfSource,
    cache: options.cache,
  });
}

async function runDetection(
  pdfPath: string,
  context: DetectionContext,
  options: DetectTemplateOptions
): Promise<DetectionResult> {
  const { database, settings } = context;
  const input = new DocumentInput(pdfPath, context.pdf, context.cache, settings.renderDpi);

  const noExclusions: TextExclusions = { excluded: [], warnings: [] };
  const [text, visual, structure] = await Promise.all([
    options.useTextExclusion !== false
      ? timed('text', () => detectByText(input, database))
      : Promise.resolve(noExclusions),
    options.useVisual !== false
      ? timed('visual', () => detectByVisual(input, database))
      : Promise.resolve<SignalScores>(emptySignal()),
    options.useStructure !== false
      ? timed('structure', () => detectByStructure(input, database))
      : Promise.resolve<SignalScores>(emptySignal()),
  ]);

  return fuseResults({
    visualScores: visual.scores,
    structureScores: structure.scores,
    excludedTemplates: text.excluded,
    confidenceThreshold: options.confidenceThreshold ?? settings.confidenceThreshold,
    visualWeight: options.visualWeight ?? settings.visualWeight,
    structureWeight: options.structureWeight ?? settings.structureWeight,
    ambiguityMargin: settings.ambiguityMargin,
    warnings: [...text.warnings, ...visual.warnings, ...structure.warnings],
  });
}

async function withBudget(
  detection: Promise<DetectionResult>,
  timeoutMs: number
): Promise<DetectionResult> {
  if (!(timeoutMs > 0)) {
    return detection;
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<DetectionResult>((resolve) => {
    timer = setTimeout(() => {
      detectionTimeoutsCounter.inc();
      resolve(unknownResult(`Detection exceeded time budget of ${timeoutMs} ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([detection, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Identify which registered template a PDF matches.
 *
 * Throws only when no template database can be obtained
 * (ClassifierConfigurationError, SignatureDirectoryError). Every other
 * failure resolves to unknown_template with warnings.
 */
export async function detectTemplate(
  pdfPath: string,
  options: DetectTemplateOptions = {}
): Promise<DetectionResult> {
  const context = await resolveContext(options);
  const timeoutMs = options.timeoutMs ?? context.settings.timeoutMs;

  return runForDocument(pdfPath, async () => {
    const endTimer = detectionDurationHistogram.startTimer();

    let result: DetectionResult;
    try {
      result = await withBudget(runDetection(pdfPath, context, options), timeoutMs);
    } catch (err) {
      logger.error('Template detection failed', err);
      const message = err instanceof Error ? err.message : String(err);
      result = unknownResult(`Detection failed: ${message}`);
    }

    const outcome = detectionOutcome(result);
    endTimer({ outcome });
    detectionsCounter.inc({ outcome });

    logger.info('Template detection complete', {
      templateId: result.template_id,
      confidence: Number(result.confidence.toFixed(3)),
      outcome,
      excluded: result.details.excluded_templates.length,
      warnings: result.details.warnings.length,
    });

    return result;
  });
}
