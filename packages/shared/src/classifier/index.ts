export { DetectionCache, type CachePurpose, type CacheStats, type ImagePurpose } from './cache';
export { DocumentInput } from './document-input';
export { emptySignal, type SignalScores, type TextExclusions } from './signals';
export {
  loadTemplateDatabase,
  loadTemplateDatabaseWithReport,
  type LoadTemplateDatabaseOptions,
  type SkippedSignatureFile,
  type TemplateDatabaseReport,
} from './signature-store';
export { detectByText, extractFirstPageText, findExclusions, normalizeText } from './text-exclusion';
export * from './visual';
export * from './structure';
export { DEFAULT_FUSION, fuseResults, type FusionOptions } from './fusion';
export {
  createDetectionContext,
  detectionOutcome,
  detectOptionsFromRequest,
  detectTemplate,
  settingsFromConfig,
  type ClassifierSettings,
  type CreateDetectionContextOptions,
  type DetectionContext,
  type DetectTemplateOptions,
} from './detect';
