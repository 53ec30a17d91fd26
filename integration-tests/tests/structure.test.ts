/**
 * Structural Detector Tests
 *
 * Comparison terms, feature extraction on synthetic pages and the line
 * morphology the table estimate depends on.
 */

import {
  cannyEdges,
  compareLayout,
  comparePageStructure,
  compareSections,
  compareStructures,
  buildStructuralFeatures,
  compareTableStructure,
  countNonZero,
  createGrayImage,
  detectLayout,
  detectSections,
  detectTables,
  openImage,
  pageMetadata,
  scoreStructuralTemplates,
  type StructuralFeatures,
  type StructuralSignature,
  type TemplateSignatureDocument,
} from '@layoutid/shared';
import { fillRect } from './helpers';

function structure(overrides: Partial<StructuralSignature> = {}): StructuralSignature {
  return {
    num_pages: 1,
    aspect_ratio: 0.75,
    tables: { count: 1, main_consumption: { rows: 5, cols: 3 } },
    sections: {
      header: { present: true },
      consumption_table: { present: true },
      payment_info: { present: true },
    },
    layout: { column_layout: 'single_column' },
    ...overrides,
  };
}

describe('comparePageStructure', () => {
  it('is 1 for equal page counts and aspect ratios', () => {
    expect(comparePageStructure(structure(), structure())).toBe(1);
  });

  it('scores the aspect difference relative to the larger ratio', () => {
    const score = comparePageStructure(structure({ num_pages: 2 }), structure({ aspect_ratio: 0.5 }));
    // 0.5 × (1 − 0.25 / 0.75)
    expect(score).toBeCloseTo(1 / 3, 10);
  });

  it('ignores a missing aspect ratio', () => {
    expect(comparePageStructure(structure({ aspect_ratio: undefined }), structure())).toBe(0.5);
  });
});

describe('compareTableStructure', () => {
  it('is 1 for identical tables', () => {
    expect(compareTableStructure(structure(), structure())).toBeCloseTo(1, 10);
  });

  it('combines count, row and column terms', () => {
    const input = structure({ tables: { count: 1, main_consumption: { rows: 5, cols: 3 } } });
    const template = structure({ tables: { count: 3, main_consumption: { rows: 9, cols: 3 } } });

    // 0.1 + 0.35 × (1 − 4/9) + 0.35
    expect(compareTableStructure(input, template)).toBeCloseTo(0.1 + 0.35 * (5 / 9) + 0.35, 10);
  });

  it('floors the count term at 0', () => {
    const input = structure({ tables: { count: 1, main_consumption: { rows: 5, cols: 3 } } });
    const template = structure({ tables: { count: 6, main_consumption: { rows: 5, cols: 3 } } });
    expect(compareTableStructure(input, template)).toBeCloseTo(0.7, 10);
  });
});

describe('compareSections', () => {
  it('is the fraction of sections whose presence agrees', () => {
    const input = structure({ sections: { header: { present: true } } });
    expect(compareSections(input, structure())).toBeCloseTo(1 / 3, 10);
  });
});

describe('compareLayout', () => {
  it('matches column layouts exactly', () => {
    expect(compareLayout(structure(), structure())).toBe(1);
    expect(compareLayout(structure(), structure({ layout: { column_layout: 'two_column' } }))).toBe(0);
  });
});

describe('compareStructures', () => {
  it('is 1 for identical structures', () => {
    expect(compareStructures(structure(), structure())).toBeCloseTo(1, 10);
  });

  it('weights page 0.20, table 0.50, section 0.25 and layout 0.05', () => {
    const template = structure({ layout: { column_layout: 'two_column' } });
    expect(compareStructures(structure(), template)).toBeCloseTo(0.95, 10);
  });
});

describe('scoreStructuralTemplates', () => {
  it('scores page count mismatches 0 and omits templates with no or empty structure', () => {
    const features: StructuralFeatures = {
      num_pages: 1,
      page_dimensions: [612, 792],
      aspect_ratio: 612 / 792,
      orientation: 'portrait',
      tables: { count: 1, main_consumption: { rows: 5, cols: 3 } },
      sections: {
        header: { present: true },
        consumption_table: { present: true },
        payment_info: { present: true },
      },
      layout: { column_layout: 'single_column' },
    };
    const database = new Map<string, TemplateSignatureDocument>([
      ['two_pages', { template_id: 'two_pages', signatures: { structural: { ...features, num_pages: 2 } } }],
      ['same', { template_id: 'same', signatures: { structural: features } }],
      ['visual_only', { template_id: 'visual_only', signatures: { visual: { regions: {} } } }],
      ['empty', { template_id: 'empty', signatures: { structural: {} } }],
    ]);

    const scores = scoreStructuralTemplates(features, database);

    expect(scores.get('two_pages')).toBe(0);
    expect(scores.get('same')).toBeCloseTo(1, 10);
    expect(scores.has('visual_only')).toBe(false);
    expect(scores.has('empty')).toBe(false);
  });
});

describe('Feature extraction', () => {
  it('reads page metadata in truncated points', () => {
    const meta = pageMetadata({ numPages: 2, firstPage: { width: 612.5, height: 792 } });

    expect(meta).toEqual({
      num_pages: 2,
      page_dimensions: [612, 792],
      aspect_ratio: 612.5 / 792,
      orientation: 'portrait',
    });
  });

  it('treats a wide page as landscape', () => {
    expect(pageMetadata({ numPages: 1, firstPage: { width: 792, height: 612 } }).orientation).toBe('landscape');
  });

  it('falls back to a 3×3 grid on a blank page', () => {
    expect(detectTables(createGrayImage(200, 300))).toEqual({
      count: 1,
      main_consumption: {
        rows: 3,
        cols: 3,
        bbox_norm: [0.1, 0.25, 0.9, 0.65],
        cell_arrangement: 'grid_3x3',
      },
    });
  });

  it('reports every section of the fixed layout as present', () => {
    expect(detectSections()).toEqual({
      header: { present: true, bbox_norm: [0.0, 0.0, 1.0, 0.25] },
      consumption_table: { present: true, bbox_norm: [0.1, 0.25, 0.9, 0.65] },
      payment_info: { present: true, bbox_norm: [0.1, 0.7, 0.9, 0.95] },
    });
  });

  it('matches a generated signature in full when only the header carries ink', () => {
    const page = createGrayImage(600, 800);
    fillRect(page, 0, 0, 600, 150);
    const features = buildStructuralFeatures({ numPages: 1, firstPage: { width: 600, height: 800 } }, page);
    const generated: StructuralSignature = {
      ...features,
      sections: {
        header: { present: true },
        consumption_table: { present: true },
        payment_info: { present: true },
      },
    };

    expect(compareSections(features, generated)).toBe(1);
    expect(compareStructures(features, generated)).toBeCloseTo(1, 10);
  });

  it('calls ink on one side single_column and balanced ink two_column', () => {
    const lopsided = createGrayImage(100, 100);
    fillRect(lopsided, 0, 0, 40, 100);
    expect(detectLayout(lopsided).column_layout).toBe('single_column');

    const balanced = createGrayImage(100, 100);
    fillRect(balanced, 10, 0, 30, 100);
    fillRect(balanced, 60, 0, 80, 100);
    expect(detectLayout(balanced).column_layout).toBe('two_column');
  });
});

describe('Line morphology', () => {
  it('keeps only horizontal runs at least as long as the kernel', () => {
    const row = createGrayImage(100, 1, 0);
    row.data.fill(255, 10, 70);
    row.data.fill(255, 80, 100);

    const opened = openImage(row, 40, 1);

    expect(countNonZero(opened)).toBe(60);
    expect(opened.data[90]).toBe(0);
  });

  it('marks the border of a dark block as edges', () => {
    const page = createGrayImage(40, 40);
    fillRect(page, 10, 10, 30, 30);

    const edges = cannyEdges(page);

    expect(countNonZero(edges)).toBeGreaterThan(0);
    expect(edges.data[20 * 40 + 20]).toBe(0);
    expect(edges.data[0]).toBe(0);
  });
});
