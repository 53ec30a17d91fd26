/**
 * Fusion Engine
 *
 * Combines visual and structural scores into a single ranked decision.
 * Text exclusions are applied before ranking.
 */

import {
  UNKNOWN_TEMPLATE,
  type CandidateScore,
  type DetectionResult,
  type ScoreMap,
} from '../types';

export interface FusionOptions {
  visualScores: ScoreMap;
  structureScores: ScoreMap;
  excludedTemplates?: readonly string[];
  confidenceThreshold?: number;
  visualWeight?: number;
  structureWeight?: number;
  ambiguityMargin?: number;
  /** Warnings raised upstream, carried into the result */
  warnings?: readonly string[];
}

export const DEFAULT_FUSION = {
  confidenceThreshold: 0.5,
  visualWeight: 0.6,
  structureWeight: 0.4,
  ambiguityMargin: 0.15,
} as const;

const TOP_CANDIDATES = 3;

interface RankedCandidate extends CandidateScore {
  visual: number;
  structure: number;
}

export function fuseResults(options: FusionOptions): DetectionResult {
  const {
    visualScores,
    structureScores,
    confidenceThreshold = DEFAULT_FUSION.confidenceThreshold,
    visualWeight = DEFAULT_FUSION.visualWeight,
    structureWeight = DEFAULT_FUSION.structureWeight,
    ambiguityMargin = DEFAULT_FUSION.ambiguityMargin,
  } = options;

  const excluded = [...new Set(options.excludedTemplates ?? [])].sort();
  const excludedSet = new Set(excluded);
  const warnings = [...(options.warnings ?? [])];

  const scored = new Set<string>([...visualScores.keys(), ...structureScores.keys()]);
  const candidates = [...scored].filter((id) => !excludedSet.has(id));

  if (candidates.length === 0) {
    warnings.push(
      scored.size > 0
        ? 'All templates excluded by text detection'
        : 'No templates scored by visual or structural detection'
    );
    return {
      template_id: UNKNOWN_TEMPLATE,
      confidence: 0,
      details: { visual_score: 0, structure_score: 0, excluded_templates: excluded, warnings },
    };
  }

  const ranked: RankedCandidate[] = candidates
    .map((id) => {
      const visual = visualScores.get(id) ?? 0;
      const structure = structureScores.get(id) ?? 0;
      return { template_id: id, score: visual * visualWeight + structure * structureWeight, visual, structure };
    })
    .sort((a, b) => b.score - a.score || (a.template_id < b.template_id ? -1 : a.template_id > b.template_id ? 1 : 0));

  const best = ranked[0];
  const runnerUp = ranked.length > 1 ? ranked[1] : undefined;

  if (runnerUp && best.score - runnerUp.score < ambiguityMargin) {
    warnings.push(
      `Ambiguous detection: ${best.template_id} (${best.score.toFixed(3)}) vs ${runnerUp.template_id} (${runnerUp.score.toFixed(3)})`
    );
  }

  const matched = best.score >= confidenceThreshold;
  if (!matched) {
    warnings.push(`Confidence ${best.score.toFixed(3)} below threshold ${confidenceThreshold}`);
  }

  const result: DetectionResult = {
    template_id: matched ? best.template_id : UNKNOWN_TEMPLATE,
    confidence: Math.min(1, Math.max(0, best.score)),
    details: {
      visual_score: best.visual,
      structure_score: best.structure,
      excluded_templates: excluded,
      warnings,
    },
  };

  if (ranked.length > 1) {
    result.details.top_candidates = ranked
      .slice(0, TOP_CANDIDATES)
      .map(({ template_id, score }) => ({ template_id, score }));
  }

  return result;
}
