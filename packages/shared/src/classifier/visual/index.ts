/**
 * Visual Region Detector
 *
 * Scores every template by perceptual-hash and histogram similarity of the
 * fixed page regions.
 */

import type { GrayImage } from '../../imaging/raster';
import { equalizeAndBlur } from '../../imaging/sharp-ops';
import { logger } from '../../logger';
import type { RegionName, TemplateDatabase } from '../../types';
import type { DocumentInput } from '../document-input';
import type { SignalScores } from '../signals';
import { calculateVisualConfidence, compareRegion } from './compare';
import { extractRegionFeatures, REGION_NAMES, type RegionFeatureSet } from './regions';

export * from './compare';
export * from './hashes';
export * from './regions';

/**
 * CLAHE + blur of the rendered page, shared through the cache.
 */
export async function preprocessedPage(input: DocumentInput): Promise<GrayImage | null> {
  const cached = await input.cache?.getImage(input.pdfPath, 'preprocessed');
  if (cached) {
    return cached;
  }

  const raster = await input.raster();
  if (!raster) {
    return null;
  }

  const processed = await equalizeAndBlur(raster);
  await input.cache?.setImage(input.pdfPath, 'preprocessed', processed);
  return processed;
}

/**
 * Region features of the input page, computed once per file version when a
 * cache is present. Null when the page could not be rendered.
 */
export async function inputRegionFeatures(input: DocumentInput): Promise<RegionFeatureSet | null> {
  const cached = await input.cache?.getRegions(input.pdfPath);
  if (cached) {
    return cached;
  }

  const page = await preprocessedPage(input);
  if (!page) {
    return null;
  }

  const features = await extractRegionFeatures(page);
  await input.cache?.setRegions(input.pdfPath, features);
  return features;
}

/**
 * Visual confidence per template over the regions both sides carry. A
 * template with stored regions but none in common with the input scores 0;
 * one without regions is left unscored.
 */
export function scoreVisualTemplates(
  features: RegionFeatureSet,
  database: TemplateDatabase
): Map<string, number> {
  const scores = new Map<string, number>();

  for (const [templateId, document] of database) {
    const storedRegions = document.signatures.visual?.regions;
    if (!storedRegions || Object.keys(storedRegions).length === 0) {
      continue;
    }

    const regionScores: Partial<Record<RegionName, number>> = {};
    for (const name of REGION_NAMES) {
      const inputRegion = features[name];
      const storedRegion = storedRegions[name];
      if (!inputRegion || !storedRegion) {
        continue;
      }
      regionScores[name] = compareRegion(inputRegion, storedRegion);
    }

    scores.set(templateId, calculateVisualConfidence(regionScores));
  }

  return scores;
}

export async function detectByVisual(
  input: DocumentInput,
  database: TemplateDatabase
): Promise<SignalScores> {
  let features: RegionFeatureSet | null;
  try {
    features = await inputRegionFeatures(input);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn('Visual feature extraction failed', { pdfPath: input.pdfPath, error: message });
    return { scores: new Map(), warnings: [`Visual detection failed: ${message}`] };
  }

  if (!features) {
    return {
      scores: new Map(),
      warnings: [`Visual detection skipped: could not render page (${input.renderError ?? 'unknown error'})`],
    };
  }

  const scores = scoreVisualTemplates(features, database);
  logger.debug('Visual detection complete', { pdfPath: input.pdfPath, scored: scores.size });
  return { scores, warnings: [] };
}
