import type { ScoreMap } from '../types';

/** Output of a scoring detector. Unscored templates are absent from `scores`. */
export interface SignalScores {
  scores: ScoreMap;
  warnings: string[];
}

export interface TextExclusions {
  excluded: string[];
  warnings: string[];
}

export const emptySignal = (): SignalScores => ({ scores: new Map(), warnings: [] });
