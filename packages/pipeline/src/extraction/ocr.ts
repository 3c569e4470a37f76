/**
 * OCR capability.
 *
 * The pipeline treats OCR as a black box behind OcrEngine. The bundled engine
 * sends the PDF to an OpenAI vision model as a file part and asks for a
 * verbatim transcription per page through a strict JSON schema.
 */

import OpenAI, { APIConnectionError, APIError } from 'openai';
import {
  config,
  logger,
  ocrRequestDurationHistogram,
  CancelledError,
  ExtractionError,
  TransientExtractionError,
} from '@decision-corpus/shared';
import { isRecord } from '../lib/files';

export interface OcrResult {
  /** Recognized text per page, in page order */
  pages: string[];
}

export interface OcrRequest {
  filename: string;
  contentType: string;
  signal?: AbortSignal;
}

export interface OcrEngine {
  readonly name: string;
  recognize(bytes: Uint8Array, request: OcrRequest): Promise<OcrResult>;
}

const OCR_SYSTEM_PROMPT = `You transcribe scanned Greek public-sector decisions.
Return the text of every page exactly as printed, in reading order, one entry per page.
Do not translate, summarize or correct the text. Use an empty string for a blank page.`;

const OCR_SCHEMA = {
  name: 'page_transcription',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['pages'],
    properties: {
      pages: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['page_number', 'text'],
          properties: {
            page_number: { type: 'integer' },
            text: { type: 'string' },
          },
        },
      },
    },
  },
} as const;

interface TranscribedPage {
  page_number: number;
  text: string;
}

function isTranscribedPage(value: unknown): value is TranscribedPage {
  return isRecord(value) && typeof value.page_number === 'number' && typeof value.text === 'string';
}

/**
 * Parse the model's JSON answer into page texts ordered by page number.
 */
export function parseTranscription(content: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ExtractionError('OCR response is not valid JSON', { cause: error });
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.pages) || !parsed.pages.every(isTranscribedPage)) {
    throw new ExtractionError('OCR response does not match the transcription schema');
  }
  return [...parsed.pages]
    .sort((a, b) => a.page_number - b.page_number)
    .map((page) => page.text);
}

/**
 * Connection failures, timeouts, rate limiting and 5xx are worth another
 * attempt; any other API error is about the request itself.
 */
export function isTransientOcrError(error: unknown): boolean {
  if (error instanceof APIConnectionError) {
    return true;
  }
  if (error instanceof APIError) {
    const status = error.status;
    return status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
  }
  return false;
}

export interface OpenAiVisionOcrOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  client?: OpenAI;
}

export class OpenAiVisionOcr implements OcrEngine {
  readonly name = 'openai-vision';
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiVisionOcrOptions = {}) {
    this.model = options.model ?? config.ocrModel;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey ?? config.openaiApiKey,
        timeout: options.timeoutMs ?? config.ocrRequestTimeoutMs,
        // Retried by the extraction stage's policy
        maxRetries: 0,
      });
  }

  async recognize(bytes: Uint8Array, request: OcrRequest): Promise<OcrResult> {
    if (request.contentType.split(';')[0].trim() !== 'application/pdf') {
      throw new ExtractionError(`OCR does not support content type ${request.contentType}`);
    }

    const base64Pdf = Buffer.from(bytes).toString('base64');
    const startTime = Date.now();

    logger.info('Running OCR on document', {
      model: this.model,
      filename: request.filename,
      size_bytes: bytes.byteLength,
    });

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: OCR_SYSTEM_PROMPT },
            {
              role: 'user',
              content: [
                {
                  type: 'file',
                  file: {
                    filename: request.filename,
                    file_data: `data:application/pdf;base64,${base64Pdf}`,
                  },
                },
                { type: 'text', text: 'Transcribe every page of the attached document.' },
              ],
            },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: OCR_SCHEMA,
          },
          temperature: 0,
        },
        { signal: request.signal }
      );

      const duration = (Date.now() - startTime) / 1000;
      ocrRequestDurationHistogram.observe({ model: this.model, status: 'success' }, duration);

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new ExtractionError('Empty OCR response');
      }

      const pages = parseTranscription(content);
      logger.info('OCR complete', {
        model: this.model,
        request_id: response.id,
        pages: pages.length,
        duration_seconds: duration,
      });
      return { pages };
    } catch (error) {
      if (request.signal?.aborted) {
        throw new CancelledError();
      }
      ocrRequestDurationHistogram.observe({ model: this.model, status: 'error' }, (Date.now() - startTime) / 1000);
      if (error instanceof ExtractionError) {
        throw error;
      }
      if (isTransientOcrError(error)) {
        throw new TransientExtractionError(
          `OCR request failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        );
      }
      throw new ExtractionError(
        `OCR request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
