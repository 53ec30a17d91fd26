/**
 * Structural Features
 *
 * Coarse geometry of a document: page metadata, a table estimate from line
 * detection, the fixed section layout and column layout.
 */

import { cannyEdges } from '../../imaging/edges';
import { countNonZero, openImage } from '../../imaging/morphology';
import { inkDensity, type GrayImage } from '../../imaging/raster';
import type { PdfDescription } from '../../pdf/types';
import type {
  BoundingBox,
  ColumnLayout,
  LayoutSignature,
  Orientation,
  SectionName,
  SectionSignature,
  StructuralSignature,
  TablesSignature,
} from '../../types';

export const LINE_KERNEL_LENGTH = 40;
const LINE_OPEN_ITERATIONS = 2;
/** Edge pixels per detected line unit */
const PIXELS_PER_LINE = 1000;

export const MAIN_TABLE_BOX: BoundingBox = [0.1, 0.25, 0.9, 0.65];

export const SECTION_LAYOUT: Record<SectionName, BoundingBox> = {
  header: [0.0, 0.0, 1.0, 0.25],
  consumption_table: [0.1, 0.25, 0.9, 0.65],
  payment_info: [0.1, 0.7, 0.9, 0.95],
};

export const SECTION_NAMES: readonly SectionName[] = ['header', 'consumption_table', 'payment_info'];

/** Left/right ink densities closer than this mean two columns */
export const COLUMN_BALANCE_TOLERANCE = 0.1;

export type StructuralFeatures = Required<Omit<StructuralSignature, 'sections'>> & {
  sections: Record<SectionName, SectionSignature>;
};

export function pageMetadata(description: PdfDescription): {
  num_pages: number;
  page_dimensions: [number, number];
  aspect_ratio: number;
  orientation: Orientation;
} {
  const { width, height } = description.firstPage;
  return {
    num_pages: description.numPages,
    page_dimensions: [Math.trunc(width), Math.trunc(height)],
    aspect_ratio: height > 0 ? width / height : 0,
    orientation: height > width ? 'portrait' : 'landscape',
  };
}

/**
 * Horizontal and vertical line pixels surviving a morphological opening of
 * the edge map, scaled into a table count and a grid estimate.
 */
export function detectTables(page: GrayImage): TablesSignature {
  const edges = cannyEdges(page, 50, 150);
  const horizontal = openImage(edges, LINE_KERNEL_LENGTH, 1, LINE_OPEN_ITERATIONS);
  const vertical = openImage(edges, 1, LINE_KERNEL_LENGTH, LINE_OPEN_ITERATIONS);

  const h = Math.floor(countNonZero(horizontal) / PIXELS_PER_LINE);
  const v = Math.floor(countNonZero(vertical) / PIXELS_PER_LINE);

  const rows = Math.max(3, Math.floor(h / 5));
  const cols = Math.max(3, Math.floor(v / 5));

  return {
    count: Math.max(1, Math.floor(Math.min(h, v) / 10)),
    main_consumption: {
      rows,
      cols,
      bbox_norm: MAIN_TABLE_BOX,
      cell_arrangement: `grid_${rows}x${cols}`,
    },
  };
}

/**
 * Sections follow the fixed layout of the family: every one is reported
 * present at its layout box, whatever the page holds.
 */
export function detectSections(): Record<SectionName, SectionSignature> {
  const section = (name: SectionName): SectionSignature => ({
    present: true,
    bbox_norm: SECTION_LAYOUT[name],
  });

  return {
    header: section('header'),
    consumption_table: section('consumption_table'),
    payment_info: section('payment_info'),
  };
}

export function detectLayout(page: GrayImage): LayoutSignature {
  const mid = Math.floor(page.width / 2);
  const left = inkDensity(page, 0, 0, mid, page.height);
  const right = inkDensity(page, mid, 0, page.width, page.height);
  const columnLayout: ColumnLayout =
    Math.abs(left - right) < COLUMN_BALANCE_TOLERANCE ? 'two_column' : 'single_column';

  return { column_layout: columnLayout };
}

export function buildStructuralFeatures(description: PdfDescription, page: GrayImage): StructuralFeatures {
  return {
    ...pageMetadata(description),
    tables: detectTables(page),
    sections: detectSections(),
    layout: detectLayout(page),
  };
}
