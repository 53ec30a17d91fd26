/**
 * Structural Detector
 */

import { logger } from '../../logger';
import type { TemplateDatabase } from '../../types';
import type { DocumentInput } from '../document-input';
import type { SignalScores } from '../signals';
import { compareStructures } from './compare';
import { buildStructuralFeatures, type StructuralFeatures } from './features';

export * from './compare';
export * from './features';

export interface StructuralExtraction {
  features: StructuralFeatures | null;
  warnings: string[];
}

/**
 * Structural features of the input, or null with a warning when the PDF
 * cannot be read or rendered. Never throws.
 */
export async function extractStructuralFeatures(input: DocumentInput): Promise<StructuralExtraction> {
  const [description, page] = await Promise.all([input.description(), input.raster()]);

  if (!description) {
    return {
      features: null,
      warnings: [`Structural detection skipped: could not read PDF (${input.describeError ?? 'unknown error'})`],
    };
  }
  if (!page) {
    return {
      features: null,
      warnings: [`Structural detection skipped: could not render page (${input.renderError ?? 'unknown error'})`],
    };
  }

  try {
    return { features: buildStructuralFeatures(description, page), warnings: [] };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn('Structural feature extraction failed', { pdfPath: input.pdfPath, error: message });
    return { features: null, warnings: [`Structural detection failed: ${message}`] };
  }
}

/**
 * Page-count mismatches score 0 without further comparison; templates
 * without a structural signature, or with an empty one, are left unscored.
 */
export function scoreStructuralTemplates(
  features: StructuralFeatures,
  database: TemplateDatabase
): Map<string, number> {
  const scores = new Map<string, number>();

  for (const [templateId, document] of database) {
    const structural = document.signatures.structural;
    if (!structural || Object.keys(structural).length === 0) {
      continue;
    }
    if (structural.num_pages !== features.num_pages) {
      scores.set(templateId, 0);
      continue;
    }
    scores.set(templateId, compareStructures(features, structural));
  }

  return scores;
}

export async function detectByStructure(
  input: DocumentInput,
  database: TemplateDatabase
): Promise<SignalScores> {
  const { features, warnings } = await extractStructuralFeatures(input);
  if (!features) {
    return { scores: new Map(), warnings };
  }

  const scores = scoreStructuralTemplates(features, database);
  logger.debug('Structural detection complete', { pdfPath: input.pdfPath, scored: scores.size });
  return { scores, warnings };
}
