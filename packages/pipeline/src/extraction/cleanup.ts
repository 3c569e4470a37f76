/**
 * Text cleanup applied to every extraction result before it is stored.
 */

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/** Words broken across a line end with a hyphen (frequent in Greek PDFs) */
const HYPHENATED_BREAK = /(\p{L})-\n(\p{L})/gu;

export function removeLoneSurrogates(text: string): string {
  return text.replace(LONE_SURROGATE, '');
}

export function cleanText(text: string): string {
  return removeLoneSurrogates(text)
    .replace(/\r\n?/g, '\n')
    .normalize('NFC')
    .replace(HYPHENATED_BREAK, '$1$2')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Join per-page texts with page separators. Pages that are empty after
 * cleanup keep their separator so page numbers stay aligned.
 */
export function joinPages(pages: string[]): string {
  if (pages.every((page) => page.trim() === '')) {
    return '';
  }
  return pages
    .map((page, index) => `--- Page ${index + 1} ---\n${cleanText(page)}`)
    .join('\n\n');
}
