/**
 * Native PDF text extraction with pdfjs-dist.
 *
 * Groups text items by Y position so each visual line comes out as one line
 * of text, top to bottom, left to right.
 */

import { logger, throwIfAborted } from '@decision-corpus/shared';

export interface NativeTextResult {
  /** Raw text per page, in page order */
  pages: string[];
}

export interface NativeTextExtractor {
  readonly name: string;
  /** Throws when the document cannot be parsed at all */
  extract(bytes: Uint8Array, signal?: AbortSignal): Promise<NativeTextResult>;
}

type PdfjsModule = typeof import('pdfjs-dist');

// Loaded on first use so that importing the pipeline never pulls in pdfjs
let pdfjsModule: PdfjsModule | null = null;
async function getPdfjs(): Promise<PdfjsModule> {
  if (!pdfjsModule) {
    // The legacy build runs on Node without browser globals; it shares the main entry's API and types
    const legacy: PdfjsModule = require('pdfjs-dist/legacy/build/pdf');
    pdfjsModule = legacy;
  }
  return pdfjsModule;
}

interface PositionedText {
  x: number;
  str: string;
}

export function groupLines(items: Array<{ str: string; x: number; y: number }>): string {
  const itemsByY = new Map<number, PositionedText[]>();
  for (const item of items) {
    if (item.str.trim() === '') continue;
    // Items on the same visual line may differ slightly in Y
    const y = Math.round(item.y);
    const line = itemsByY.get(y) ?? [];
    line.push({ x: Math.round(item.x), str: item.str });
    itemsByY.set(y, line);
  }

  const lines: string[] = [];
  for (const y of [...itemsByY.keys()].sort((a, b) => b - a)) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems.map((item) => item.str).join(' ').trim();
    if (lineText) {
      lines.push(lineText);
    }
  }
  return lines.join('\n');
}

export class PdfjsTextExtractor implements NativeTextExtractor {
  readonly name = 'pdfjs';

  async extract(bytes: Uint8Array, signal?: AbortSignal): Promise<NativeTextResult> {
    const pdfjs = await getPdfjs();
    // pdfjs transfers the buffer it is given; hand it a copy
    const loadingTask = pdfjs.getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      disableFontFace: true,
      verbosity: 0,
    });

    try {
      const pdf = await loadingTask.promise;
      const pages: string[] = [];

      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        throwIfAborted(signal);
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();
        const items: Array<{ str: string; x: number; y: number }> = [];
        for (const item of textContent.items) {
          if ('str' in item) {
            items.push({ str: item.str, x: Number(item.transform[4]), y: Number(item.transform[5]) });
          }
        }
        pages.push(groupLines(items));
        page.cleanup();
      }

      logger.debug('Native text extraction complete', {
        pages: pdf.numPages,
        chars: pages.reduce((sum, page) => sum + page.length, 0),
      });

      return { pages };
    } finally {
      await loadingTask.destroy();
    }
  }
}
