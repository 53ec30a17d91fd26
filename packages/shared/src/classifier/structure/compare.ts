/**
 * Structural Comparison
 *
 * Each term scores in [0, 1]; compareStructures blends them with
 * STRUCTURE_WEIGHTS.
 */

import type { StructuralSignature } from '../../types';
import { SECTION_NAMES } from './features';

export const STRUCTURE_WEIGHTS = {
  page: 0.2,
  table: 0.5,
  section: 0.25,
  layout: 0.05,
} as const;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export function comparePageStructure(input: StructuralSignature, template: StructuralSignature): number {
  let score = 0;

  if (input.num_pages === template.num_pages) {
    score += 0.5;
  }

  const a = input.aspect_ratio ?? 0;
  const b = template.aspect_ratio ?? 0;
  if (a > 0 && b > 0) {
    score += 0.5 * clamp01(1 - Math.abs(a - b) / Math.max(a, b));
  }

  return score;
}

function closeness(a: number, b: number): number {
  return clamp01(1 - Math.abs(a - b) / Math.max(a, b, 1));
}

export function compareTableStructure(input: StructuralSignature, template: StructuralSignature): number {
  const inputCount = input.tables?.count ?? 0;
  const templateCount = template.tables?.count ?? 0;
  const inputRows = input.tables?.main_consumption?.rows ?? 0;
  const templateRows = template.tables?.main_consumption?.rows ?? 0;
  const inputCols = input.tables?.main_consumption?.cols ?? 0;
  const templateCols = template.tables?.main_consumption?.cols ?? 0;

  const countScore = Math.max(0, 0.3 - 0.1 * Math.abs(inputCount - templateCount));

  return countScore + 0.35 * closeness(inputRows, templateRows) + 0.35 * closeness(inputCols, templateCols);
}

/** Fraction of sections whose presence agrees; absent sections count as not present */
export function compareSections(input: StructuralSignature, template: StructuralSignature): number {
  let matches = 0;
  for (const name of SECTION_NAMES) {
    const inputPresent = input.sections?.[name]?.present ?? false;
    const templatePresent = template.sections?.[name]?.present ?? false;
    if (inputPresent === templatePresent) {
      matches++;
    }
  }
  return matches / SECTION_NAMES.length;
}

export function compareLayout(input: StructuralSignature, template: StructuralSignature): number {
  const inputLayout = input.layout?.column_layout ?? '';
  const templateLayout = template.layout?.column_layout ?? '';
  return inputLayout === templateLayout ? 1 : 0;
}

export function compareStructures(input: StructuralSignature, template: StructuralSignature): number {
  const score =
    comparePageStructure(input, template) * STRUCTURE_WEIGHTS.page +
    compareTableStructure(input, template) * STRUCTURE_WEIGHTS.table +
    compareSections(input, template) * STRUCTURE_WEIGHTS.section +
    compareLayout(input, template) * STRUCTURE_WEIGHTS.layout;

  return clamp01(score);
}
