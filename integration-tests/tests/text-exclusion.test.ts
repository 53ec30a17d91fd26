/**
 * Text Exclusion Tests
 *
 * Normalization of mixed Persian/Arabic text and exclusion by keyword and
 * pattern.
 */

import {
  detectByText,
  DocumentInput,
  findExclusions,
  normalizeText,
  type TemplateSignatureDocument,
} from '@layoutid/shared';
import { FakePdfSource, makePage } from './helpers';

function database(entries: Array<[string, TemplateSignatureDocument['signatures']['text']]>) {
  return new Map<string, TemplateSignatureDocument>(
    entries.map(([id, text]) => [id, { template_id: id, signatures: text ? { text } : {} }])
  );
}

describe('normalizeText', () => {
  it('lowercases, collapses whitespace and trims', () => {
    expect(normalizeText('  Water   BILL\n\tTotal  ')).toBe('water bill total');
  });

  it('folds Arabic yeh and kaf to their Persian forms', () => {
    expect(normalizeText('\u064A\u0643')).toBe('\u06CC\u06A9');
    expect(normalizeText('\u0649')).toBe('\u06CC');
  });

  it('maps Persian and Arabic-Indic digits to ASCII', () => {
    expect(normalizeText('\u06F1\u06F2\u06F3 \u0664\u0665')).toBe('123 45');
  });

  it('removes zero-width characters', () => {
    expect(normalizeText('in\u200Cvoice\u200B no\uFEFF')).toBe('invoice no');
  });

  it('folds presentation forms through NFKC', () => {
    // isolated yeh presentation form
    expect(normalizeText('\uFEF1')).toBe('\u06CC');
  });
});

describe('findExclusions', () => {
  const db = database([
    ['electricity', { exclusion_keywords: ['Water Usage'] }],
    ['gas', { unique_text_patterns: ['meter\\s+#\\d{4}'] }],
    ['water', { exclusion_keywords: ['kilowatt'] }],
    ['plain', undefined],
  ]);

  it('excludes on a normalized keyword hit', () => {
    const result = findExclusions(normalizeText('Monthly WATER   usage report'), db);
    expect(result.excluded).toEqual(['electricity']);
    expect(result.warnings).toEqual([]);
  });

  it('excludes on a pattern hit and returns a sorted list', () => {
    const result = findExclusions(normalizeText('Kilowatt hours, meter #1234'), db);
    expect(result.excluded).toEqual(['gas', 'water']);
  });

  it('matches keywords written with Arabic letter forms against Persian text', () => {
    const persian = database([['tehran', { exclusion_keywords: ['\u0643\u064A\u0644\u0648'] }]]);
    expect(findExclusions(normalizeText('\u06A9\u06CC\u0644\u0648'), persian).excluded).toEqual(['tehran']);
  });

  it('excludes nothing for empty text', () => {
    expect(findExclusions('', db)).toEqual({ excluded: [], warnings: [] });
  });

  it('skips invalid patterns with a warning', () => {
    const broken = database([['broken', { unique_text_patterns: ['([unclosed', 'total'] }]]);

    const result = findExclusions('total due', broken);

    expect(result.excluded).toEqual(['broken']);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatch(/^Invalid text pattern for broken: \(\[unclosed/);
  });
});

describe('detectByText', () => {
  it('reads the first page text through the PDF source', async () => {
    const pdf = new FakePdfSource({
      '/docs/bill.pdf': { raster: makePage('alpha'), text: 'Water usage this month' },
    });
    const input = new DocumentInput('/docs/bill.pdf', pdf, undefined, 300);

    const result = await detectByText(input, database([['electricity', { exclusion_keywords: ['water usage'] }]]));

    expect(result.excluded).toEqual(['electricity']);
    expect(pdf.textCalls).toBe(1);
  });

  it('excludes nothing when text extraction fails', async () => {
    const input = new DocumentInput('/docs/missing.pdf', new FakePdfSource(), undefined, 300);

    const result = await detectByText(input, database([['electricity', { exclusion_keywords: ['water'] }]]));

    expect(result).toEqual({ excluded: [], warnings: [] });
  });
});
