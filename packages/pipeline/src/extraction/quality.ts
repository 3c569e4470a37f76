/**
 * Extraction quality heuristic.
 *
 *   ratio   = recognized characters / non-whitespace characters
 *   density = min(1, non-whitespace characters / (pages * expected chars per page))
 *   quality = ratio * density
 *
 * Recognized characters are letters, digits and common punctuation. Page
 * separators inserted by joinPages are not counted.
 */

import type { QualityClass } from '@decision-corpus/shared';

const PAGE_SEPARATOR = /^--- Page \d+ ---$/gm;
const RECOGNIZED = /[\p{L}\p{N}.,;:!?'"()[\]\-/%€$&@+*=§«»…·–—]/u;

export interface QualityScore {
  quality: number;
  qualityClass: QualityClass;
  /** Non-whitespace characters excluding page separators */
  usableChars: number;
}

export function stripPageSeparators(text: string): string {
  return text.replace(PAGE_SEPARATOR, '');
}

export function classifyQuality(quality: number, usableChars: number): QualityClass {
  if (usableChars === 0) return 'empty';
  if (quality >= 0.6) return 'high';
  if (quality >= 0.3) return 'medium';
  return 'low';
}

export function scoreText(text: string, pageCount: number, expectedCharsPerPage: number): QualityScore {
  let usableChars = 0;
  let recognized = 0;
  for (const char of stripPageSeparators(text)) {
    if (/\s/.test(char)) continue;
    usableChars += 1;
    if (RECOGNIZED.test(char)) recognized += 1;
  }

  if (usableChars === 0) {
    return { quality: 0, qualityClass: 'empty', usableChars };
  }

  const ratio = recognized / usableChars;
  const expected = Math.max(1, pageCount) * expectedCharsPerPage;
  const density = Math.min(1, usableChars / expected);
  const quality = Math.round(ratio * density * 1000) / 1000;

  return { quality, qualityClass: classifyQuality(quality, usableChars), usableChars };
}
