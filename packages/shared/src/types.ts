/**
 * Shared TypeScript Types
 *
 * Types for the template classifier, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Template Signatures (persisted by the signature generator)
// ============================================================================

export type HashType = 'phash' | 'dhash' | 'ahash' | 'whash';

export type RegionName = 'header' | 'main_table' | 'payment_info';

export type SectionName = 'header' | 'consumption_table' | 'payment_info';

export type ColumnLayout = 'single_column' | 'two_column';

export type Orientation = 'portrait' | 'landscape';

/** [x0, y0, x1, y1] */
export type BoundingBox = [number, number, number, number];

export type RegionHashes = Partial<Record<HashType, string | null>>;

export interface RegionSignature {
  bbox_norm?: BoundingBox;
  bbox_pixels?: BoundingBox;
  hashes: RegionHashes;
  /** 256-bin grayscale histogram of the un-resized region */
  histogram: number[];
}

export interface VisualSignature {
  regions: Partial<Record<string, RegionSignature>>;
  page_dimensions?: [number, number];
}

export interface TableStructure {
  rows: number;
  cols: number;
  bbox_norm?: BoundingBox;
  cell_arrangement?: string;
}

export interface TablesSignature {
  count: number;
  main_consumption?: TableStructure;
}

export interface SectionSignature {
  present: boolean;
  bbox_norm?: BoundingBox;
}

export interface LayoutSignature {
  column_layout: string;
  section_spacing?: number[];
}

/** Empty when the generator could not extract structure */
export interface StructuralSignature {
  num_pages?: number;
  page_dimensions?: [number, number];
  aspect_ratio?: number;
  orientation?: string;
  tables?: TablesSignature;
  sections?: Partial<Record<string, SectionSignature>>;
  layout?: LayoutSignature;
}

export interface TextSignature {
  exclusion_keywords?: string[];
  unique_text_patterns?: string[];
}

export interface TemplateSignatures {
  visual?: VisualSignature;
  structural?: StructuralSignature;
  text?: TextSignature;
}

export interface TemplateSignatureDocument {
  template_id: string;
  template_file?: string;
  signatures: TemplateSignatures;
}

/**
 * Loaded reference database, keyed by template_id.
 * Iteration order follows the sorted signature file names.
 */
export type TemplateDatabase = ReadonlyMap<string, TemplateSignatureDocument>;

// ============================================================================
// Detection Results
// ============================================================================

export const UNKNOWN_TEMPLATE = 'unknown_template';

export type ScoreMap = Map<string, number>;

export interface CandidateScore {
  template_id: string;
  score: number;
}

export interface DetectionDetails {
  visual_score: number;
  structure_score: number;
  excluded_templates: string[];
  warnings: string[];
  top_candidates?: CandidateScore[];
}

export interface DetectionResult {
  template_id: string;
  confidence: number;
  details: DetectionDetails;
}

export type DetectionOutcome = 'matched' | 'unknown' | 'low_confidence';

// ============================================================================
// API Types
// ============================================================================

export interface ClassifyRequest {
  pdf_path: string;
  confidence_threshold?: number;
  use_text_exclusion?: boolean;
  use_visual?: boolean;
  use_structure?: boolean;
}

export interface ClassifyAcceptedResponse {
  correlation_id: string;
  job_id: string;
}

export interface TemplateListResponse {
  items: string[];
  count: number;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
