/**
 * Fetch Stage
 *
 * fetch(ada) -> (document bytes, metadata envelope). No side effects beyond
 * network I/O: persisting the result is the content store's job.
 */

import {
  logger,
  validateMetadataEnvelope,
  withRetry,
  PermanentFetchError,
  type MetadataEnvelope,
  type RetryPolicy,
} from '@decision-corpus/shared';
import type { PortalClient } from './client';
import type { FetchedDocument } from './types';

export interface FetchResult {
  document: FetchedDocument;
  envelope: MetadataEnvelope;
}

export interface FetchStageOptions {
  /** Awaited before every retried request */
  onRetry?: () => Promise<void>;
}

export class FetchStage {
  constructor(
    private readonly client: PortalClient,
    private readonly retryPolicy: RetryPolicy
  ) {}

  async fetch(ada: string, signal?: AbortSignal, options: FetchStageOptions = {}): Promise<FetchResult> {
    let requests = 0;
    const attempt = async <T>(retry: number, request: () => Promise<T>): Promise<T> => {
      if (retry > 1) {
        await options.onRetry?.();
      }
      requests += 1;
      return request();
    };

    const envelope = await withRetry(
      this.retryPolicy,
      (retry) => attempt(retry, () => this.client.getDecision(ada, signal)),
      { signal, operation: 'portal.getDecision' }
    );

    const validation = validateMetadataEnvelope(envelope);
    if (!validation.valid) {
      throw new PermanentFetchError(
        `Malformed decision response for ${ada}: ${(validation.errors ?? []).join('; ')}`
      );
    }
    if (String(envelope.ada).normalize('NFC').trim() !== ada.normalize('NFC').trim()) {
      throw new PermanentFetchError(`Decision response for ${ada} carries ADA ${String(envelope.ada)}`);
    }

    const documentUrl = envelope.documentUrl;
    if (typeof documentUrl !== 'string' || documentUrl.trim() === '') {
      throw new PermanentFetchError(`Decision ${ada} has no document URL`);
    }

    const document = await withRetry(
      this.retryPolicy,
      (retry) => attempt(retry, () => this.client.downloadDocument(documentUrl, signal)),
      { signal, operation: 'portal.downloadDocument' }
    );

    if (document.bytes.byteLength === 0) {
      throw new PermanentFetchError(`Document for ${ada} is empty`);
    }

    logger.info('Fetched decision', {
      source_url: document.sourceUrl,
      content_type: document.contentType,
      size_bytes: document.bytes.byteLength,
      requests,
    });

    return { document, envelope };
  }
}
