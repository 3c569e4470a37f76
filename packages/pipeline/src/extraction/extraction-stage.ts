/**
 * Extraction Stage
 *
 * extract(raw) -> ExtractedText. Native text layer first; OCR when the
 * native pass yields no usable text or the document looks image-only.
 * A result is a pure function of the raw bytes and the extractor version,
 * so results are cached by (rawHash, extractorVersion).
 */

import path from 'path';
import {
  config,
  logger,
  extractionMethodCounter,
  createRetryPolicy,
  isRetryable,
  withRetry,
  CancelledError,
  ExtractionError,
  type ExtractedText,
  type ExtractionMethod,
  type RawDocument,
  type RetryPolicy,
} from '@decision-corpus/shared';
import type { FileTextStore } from '../store/text-store';
import { joinPages } from './cleanup';
import type { NativeTextExtractor } from './pdf';
import type { OcrEngine } from './ocr';
import { scoreText, type QualityScore } from './quality';

export interface ExtractionStageOptions {
  extractorVersion?: string;
  /** Average usable characters per page below which a document counts as image-only */
  minNativeCharsPerPage?: number;
  expectedCharsPerPage?: number;
  /** Applied to OCR requests; only TransientExtractionError is retried */
  ocrRetryPolicy?: RetryPolicy;
}

interface Candidate {
  method: ExtractionMethod;
  text: string;
  pageCount: number;
  score: QualityScore;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function baseContentType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

export class ExtractionStage {
  private readonly extractorVersion: string;
  private readonly minNativeCharsPerPage: number;
  private readonly expectedCharsPerPage: number;
  private readonly ocrRetryPolicy: RetryPolicy;

  constructor(
    private readonly native: NativeTextExtractor,
    private readonly ocr: OcrEngine | null,
    private readonly textStore: FileTextStore,
    options: ExtractionStageOptions = {}
  ) {
    this.extractorVersion = options.extractorVersion ?? config.extractorVersion;
    this.minNativeCharsPerPage = options.minNativeCharsPerPage ?? config.minNativeCharsPerPage;
    this.expectedCharsPerPage = options.expectedCharsPerPage ?? config.expectedCharsPerPage;
    this.ocrRetryPolicy = options.ocrRetryPolicy ?? createRetryPolicy({ maxAttempts: config.ocrMaxAttempts });
  }

  get version(): string {
    return this.extractorVersion;
  }

  private candidate(method: ExtractionMethod, pages: string[], pageCount: number = pages.length): Candidate {
    const text = joinPages(pages);
    return {
      method,
      text,
      pageCount,
      score: scoreText(text, pageCount, this.expectedCharsPerPage),
    };
  }

  private isImageOnly(candidate: Candidate): boolean {
    if (candidate.pageCount === 0) {
      return true;
    }
    return candidate.score.usableChars / candidate.pageCount < this.minNativeCharsPerPage;
  }

  async extract(raw: RawDocument, bytes: Uint8Array, signal?: AbortSignal): Promise<ExtractedText> {
    const cached = await this.textStore.find(raw.ada, raw.hash, this.extractorVersion);
    if (cached) {
      logger.debug('Extracted text cache hit', { raw_hash: raw.hash, method: cached.method });
      return cached;
    }

    const warnings: string[] = [];
    const contentType = baseContentType(raw.contentType);
    let chosen: Candidate;

    if (contentType === 'text/plain') {
      chosen = this.candidate('native', [Buffer.from(bytes).toString('utf-8')]);
    } else {
      chosen = await this.extractDocument(raw, bytes, warnings, signal);
    }

    const extracted: ExtractedText = {
      ada: raw.ada,
      rawHash: raw.hash,
      method: chosen.method,
      text: chosen.text,
      pageCount: chosen.pageCount,
      charCount: chosen.text.length,
      quality: chosen.score.quality,
      qualityClass: chosen.score.qualityClass,
      extractorVersion: this.extractorVersion,
      path: this.textStore.textPathFor(raw.ada, raw.hash, chosen.method),
      createdAt: new Date().toISOString(),
      warnings,
    };

    await this.textStore.save(extracted);
    extractionMethodCounter.inc({ method: extracted.method, quality: extracted.qualityClass });

    logger.info('Extracted text', {
      method: extracted.method,
      pages: extracted.pageCount,
      chars: extracted.charCount,
      quality: extracted.quality,
      quality_class: extracted.qualityClass,
      warnings: warnings.length,
    });

    return extracted;
  }

  private async extractDocument(
    raw: RawDocument,
    bytes: Uint8Array,
    warnings: string[],
    signal?: AbortSignal
  ): Promise<Candidate> {
    let native: Candidate | null = null;
    let nativeError: unknown = null;

    try {
      const result = await this.native.extract(bytes, signal);
      native = this.candidate('native', result.pages);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      nativeError = error;
      warnings.push(`native extraction failed: ${errorMessage(error)}`);
      logger.warn('Native text extraction failed', { error: errorMessage(error) });
    }

    if (native && !this.isImageOnly(native)) {
      return native;
    }

    if (native) {
      logger.info('Document has no usable text layer, falling back to OCR', {
        pages: native.pageCount,
        usable_chars: native.score.usableChars,
      });
    }

    if (!this.ocr) {
      if (native && native.score.usableChars > 0) {
        warnings.push('sparse text layer and no OCR engine configured');
        return native;
      }
      throw new ExtractionError(
        nativeError
          ? `Native extraction failed and no OCR engine is configured: ${errorMessage(nativeError)}`
          : 'Document has no text layer and no OCR engine is configured',
        { cause: nativeError ?? undefined }
      );
    }

    const ocr = this.ocr;
    try {
      const result = await withRetry(
        this.ocrRetryPolicy,
        () =>
          ocr.recognize(bytes, {
            filename: path.basename(raw.path),
            contentType: raw.contentType,
            signal,
          }),
        { signal, operation: 'ocr.recognize' }
      );
      return this.candidate('ocr', result.pages, Math.max(result.pages.length, native?.pageCount ?? 0));
    } catch (error) {
      // Out of OCR attempts on a transient failure: the stage fails and a
      // retry of the identifier resumes here
      if (error instanceof CancelledError || isRetryable(error)) {
        throw error;
      }
      if (native && native.score.usableChars > 0) {
        warnings.push(`OCR failed, kept sparse text layer: ${errorMessage(error)}`);
        logger.warn('OCR failed, keeping native text', { error: errorMessage(error) });
        return native;
      }
      throw new ExtractionError(
        nativeError
          ? `Native extraction and OCR both failed: ${errorMessage(nativeError)}; ${errorMessage(error)}`
          : `Document has no text layer and OCR failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
