/**
 * Text Exclusion Detector
 *
 * Rules templates out when the first page carries text the template never
 * shows. Text is never used to pick a template.
 */

import { logger } from '../logger';
import type { TemplateDatabase } from '../types';
import type { DocumentInput } from './document-input';
import type { TextExclusions } from './signals';

const ZERO_WIDTH = /[\u200B\u200C\u200D\uFEFF]/g;

/** Arabic letter forms folded to their Persian counterparts */
const LETTER_FOLDS: Record<string, string> = {
  '\u064A': '\u06CC', // yeh
  '\u0649': '\u06CC', // alef maksura
  '\u0643': '\u06A9', // kaf
};

const PERSIAN_DIGIT_ZERO = 0x06f0;
const ARABIC_INDIC_DIGIT_ZERO = 0x0660;

function foldDigit(ch: string): string {
  const code = ch.charCodeAt(0);
  if (code >= PERSIAN_DIGIT_ZERO && code <= PERSIAN_DIGIT_ZERO + 9) {
    return String(code - PERSIAN_DIGIT_ZERO);
  }
  return String(code - ARABIC_INDIC_DIGIT_ZERO);
}

export function normalizeText(text: string): string {
  return text
    .normalize('NFKC')
    .replace(ZERO_WIDTH, '')
    .replace(/[\u064A\u0649\u0643]/g, (ch) => LETTER_FOLDS[ch] ?? ch)
    .replace(/[\u06F0-\u06F9\u0660-\u0669]/g, foldDigit)
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

export async function extractFirstPageText(input: DocumentInput): Promise<string> {
  return input.firstPageText();
}

/**
 * Templates contradicted by already-normalized text. A template is excluded
 * on its first keyword or pattern hit.
 */
export function findExclusions(normalizedText: string, database: TemplateDatabase): TextExclusions {
  const excluded: string[] = [];
  const warnings: string[] = [];

  if (!normalizedText) {
    return { excluded, warnings };
  }

  for (const [templateId, document] of database) {
    const text = document.signatures.text;
    if (!text) {
      continue;
    }

    const keywordHit = (text.exclusion_keywords ?? []).some((keyword) => {
      const needle = normalizeText(keyword);
      return needle.length > 0 && normalizedText.includes(needle);
    });
    if (keywordHit) {
      excluded.push(templateId);
      continue;
    }

    for (const pattern of text.unique_text_patterns ?? []) {
      let regex: RegExp;
      try {
        regex = new RegExp(pattern);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        warnings.push(`Invalid text pattern for ${templateId}: ${pattern} (${reason})`);
        continue;
      }
      if (regex.test(normalizedText)) {
        excluded.push(templateId);
        break;
      }
    }
  }

  excluded.sort();
  return { excluded, warnings };
}

export async function detectByText(input: DocumentInput, database: TemplateDatabase): Promise<TextExclusions> {
  const raw = await extractFirstPageText(input);
  const result = findExclusions(normalizeText(raw), database);

  if (result.excluded.length > 0) {
    logger.debug('Templates excluded by text', {
      pdfPath: input.pdfPath,
      excluded: result.excluded,
    });
  }
  return result;
}
