/**
 * Identifier Sources
 *
 * Lazy, restartable enumerations of ADAs. A source only promises a stable
 * order and a cursor to continue from; deciding whether an identifier still
 * needs work is the coordinator's business.
 */

import fs from 'fs';
import readline from 'readline';
import {
  config,
  logger,
  createRetryPolicy,
  withRetry,
  type DecisionIdentifier,
  type RetryPolicy,
} from '@decision-corpus/shared';
import type { PortalClient } from '../portal/client';

export type SourceCursor =
  | { kind: 'list'; offset: number }
  | { kind: 'manifest'; offset: number }
  | { kind: 'listing'; page: number; index: number };

export interface IdentifierSource extends AsyncIterable<DecisionIdentifier> {
  /** Stable description used to match a checkpoint to its source */
  readonly key: string;
  /** Next identifier, or null at end of sequence */
  next(): Promise<DecisionIdentifier | null>;
  /** Position of the next identifier `next()` would return */
  cursor(): SourceCursor;
}

abstract class BaseIdentifierSource implements IdentifierSource {
  abstract readonly key: string;
  abstract next(): Promise<DecisionIdentifier | null>;
  abstract cursor(): SourceCursor;

  async *[Symbol.asyncIterator](): AsyncIterator<DecisionIdentifier> {
    for (let ada = await this.next(); ada !== null; ada = await this.next()) {
      yield ada;
    }
  }
}

function cleanIdentifier(raw: string): string | null {
  const ada = raw.normalize('NFC').trim();
  return ada === '' || ada.startsWith('#') ? null : ada;
}

/**
 * Fixed list (CLI --ids).
 */
export class ListIdentifierSource extends BaseIdentifierSource {
  readonly key: string;
  private offset: number;
  private readonly ids: string[];

  constructor(ids: string[], cursor?: SourceCursor) {
    super();
    this.ids = ids.map(cleanIdentifier).filter((ada): ada is string => ada !== null);
    this.key = `list:${this.ids.length}:${this.ids[0] ?? ''}`;
    this.offset = cursor?.kind === 'list' ? cursor.offset : 0;
  }

  async next(): Promise<DecisionIdentifier | null> {
    if (this.offset >= this.ids.length) {
      return null;
    }
    return this.ids[this.offset++];
  }

  cursor(): SourceCursor {
    return { kind: 'list', offset: this.offset };
  }
}

/**
 * Manifest file: one ADA per line, blank lines and `#` comments ignored.
 * The cursor counts raw lines so it stays valid if comments are edited out
 * of lines already consumed.
 */
export class ManifestIdentifierSource extends BaseIdentifierSource {
  readonly key: string;
  private lineOffset = 0;
  private readonly skipLines: number;
  private lines: AsyncIterator<string> | null = null;
  private reader: readline.Interface | null = null;

  constructor(private readonly manifestPath: string, cursor?: SourceCursor) {
    super();
    this.key = `manifest:${manifestPath}`;
    this.skipLines = cursor?.kind === 'manifest' ? cursor.offset : 0;
  }

  private open(): AsyncIterator<string> {
    if (!this.lines) {
      this.reader = readline.createInterface({
        input: fs.createReadStream(this.manifestPath, { encoding: 'utf-8' }),
        crlfDelay: Infinity,
      });
      this.lines = this.reader[Symbol.asyncIterator]();
    }
    return this.lines;
  }

  async next(): Promise<DecisionIdentifier | null> {
    const lines = this.open();
    for (;;) {
      const result = await lines.next();
      if (result.done) {
        this.close();
        return null;
      }
      this.lineOffset += 1;
      if (this.lineOffset <= this.skipLines) {
        continue;
      }
      const ada = cleanIdentifier(result.value);
      if (ada !== null) {
        return ada;
      }
    }
  }

  cursor(): SourceCursor {
    return { kind: 'manifest', offset: Math.max(this.lineOffset, this.skipLines) };
  }

  close(): void {
    this.reader?.close();
    this.reader = null;
  }
}

export interface ListingQuery {
  fromDate?: string;
  toDate?: string;
  organizationId?: string;
  pageSize?: number;
  /** Stop after this many identifiers */
  limit?: number;
}

export interface PortalListingOptions {
  signal?: AbortSignal;
  retryPolicy?: RetryPolicy;
}

/**
 * Portal search listing, page by page. The listing is bounded by what the
 * portal returns at call time; re-invoking later picks up new decisions.
 */
export class PortalListingSource extends BaseIdentifierSource {
  readonly key: string;
  private page: number;
  private index: number;
  private buffer: string[] | null = null;
  private exhausted = false;
  private emitted = 0;
  private readonly pageSize: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly client: PortalClient,
    private readonly query: ListingQuery = {},
    cursor?: SourceCursor,
    options: PortalListingOptions = {}
  ) {
    super();
    this.retryPolicy = options.retryPolicy ?? createRetryPolicy();
    this.signal = options.signal;
    this.pageSize = query.pageSize ?? config.portalPageSize;
    this.key = `listing:${query.organizationId ?? '*'}:${query.fromDate ?? ''}:${query.toDate ?? ''}:${this.pageSize}`;
    this.page = cursor?.kind === 'listing' ? cursor.page : 0;
    this.index = cursor?.kind === 'listing' ? cursor.index : 0;
  }

  private async loadPage(): Promise<void> {
    const response = await withRetry(
      this.retryPolicy,
      () =>
        this.client.searchDecisions(
          {
            page: this.page,
            size: this.pageSize,
            fromDate: this.query.fromDate,
            toDate: this.query.toDate,
            organizationId: this.query.organizationId,
          },
          this.signal
        ),
      { signal: this.signal, operation: 'portal.searchDecisions' }
    );
    this.buffer = response.decisions.map((decision) => decision.ada);
    logger.debug('Loaded listing page', {
      page: this.page,
      count: this.buffer.length,
      total: response.info.total,
    });
  }

  async next(): Promise<DecisionIdentifier | null> {
    if (this.query.limit !== undefined && this.emitted >= this.query.limit) {
      return null;
    }
    for (;;) {
      if (this.exhausted) {
        return null;
      }
      if (this.buffer === null) {
        await this.loadPage();
      }
      const buffer = this.buffer ?? [];
      if (this.index < buffer.length) {
        const ada = cleanIdentifier(buffer[this.index]);
        this.index += 1;
        if (ada !== null) {
          this.emitted += 1;
          return ada;
        }
        continue;
      }
      // A short page is the last one
      if (buffer.length < this.pageSize) {
        this.exhausted = true;
        return null;
      }
      this.page += 1;
      this.index = 0;
      this.buffer = null;
    }
  }

  cursor(): SourceCursor {
    return { kind: 'listing', page: this.page, index: this.index };
  }
}
