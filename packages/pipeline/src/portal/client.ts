/**
 * Portal API Client
 *
 * Thin HTTP layer over the transparency portal's opendata endpoints. Every
 * request goes through one shared token bucket and maps failures onto the
 * transient/permanent fetch error taxonomy; retrying is the caller's job.
 */

import Bottleneck from 'bottleneck';
import {
  config,
  logger,
  fetchAttemptsCounter,
  CancelledError,
  PermanentFetchError,
  TransientFetchError,
  type MetadataEnvelope,
} from '@decision-corpus/shared';
import type {
  FetchedDocument,
  PortalDecisionSummary,
  PortalSearchQuery,
  PortalSearchResponse,
} from './types';
import { anySignal } from '../lib/signals';

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface PortalClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  limiter?: Bottleneck;
  fetchImpl?: FetchImpl;
}

/**
 * Token bucket: `burst` tokens available at once, refilled by `perSecond`
 * every second.
 */
export function createRateLimiter(
  perSecond: number = config.rateLimitPerSecond,
  burst: number = config.rateLimitBurst
): Bottleneck {
  const limiter = new Bottleneck({
    reservoir: burst,
    reservoirIncreaseAmount: perSecond,
    reservoirIncreaseInterval: 1000,
    reservoirIncreaseMaximum: burst,
  });

  limiter.on('depleted', () => {
    logger.debug('Portal rate limit reservoir depleted, waiting');
  });

  return limiter;
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

function isDecisionSummary(value: unknown): value is PortalDecisionSummary {
  return typeof value === 'object' && value !== null && 'ada' in value && typeof value.ada === 'string';
}

function isEnvelope(value: unknown): value is MetadataEnvelope {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class PortalClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly limiter: Bottleneck;
  private readonly fetchImpl: FetchImpl;

  constructor(options: PortalClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.portalBaseUrl;
    this.timeoutMs = options.timeoutMs ?? config.httpTimeoutMs;
    this.limiter = options.limiter ?? createRateLimiter();
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Issue one rate-limited request. Network errors and timeouts become
   * TransientFetchError; an abort from `signal` becomes CancelledError.
   */
  private async request(endpoint: string, url: string, signal?: AbortSignal, accept = 'application/json'): Promise<Response> {
    return this.limiter.schedule(async () => {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      const timeout = AbortSignal.timeout(this.timeoutMs);
      const combined = anySignal([signal, timeout]);

      let response: Response;
      try {
        response = await this.fetchImpl(url, { headers: { Accept: accept }, signal: combined });
      } catch (error) {
        if (signal?.aborted) {
          throw new CancelledError();
        }
        fetchAttemptsCounter.inc({ endpoint, outcome: 'network_error' });
        const reason = timeout.aborted ? `timed out after ${this.timeoutMs}ms` : error instanceof Error ? error.message : String(error);
        throw new TransientFetchError(`Request to ${url} failed: ${reason}`, undefined, undefined, { cause: error });
      }

      if (response.ok) {
        fetchAttemptsCounter.inc({ endpoint, outcome: 'ok' });
        return response;
      }

      const message = `Portal responded ${response.status} ${response.statusText} for ${url}`;
      if (isTransientStatus(response.status)) {
        fetchAttemptsCounter.inc({ endpoint, outcome: response.status === 429 ? 'rate_limited' : 'transient' });
        throw new TransientFetchError(message, response.status, parseRetryAfter(response.headers.get('retry-after')));
      }
      fetchAttemptsCounter.inc({ endpoint, outcome: 'permanent' });
      throw new PermanentFetchError(message, response.status);
    });
  }

  private async readJson(response: Response, url: string, signal?: AbortSignal): Promise<unknown> {
    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      throw new TransientFetchError(`Reading body of ${url} failed`, response.status, undefined, { cause: error });
    }
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new PermanentFetchError(`Malformed JSON from ${url}`, response.status, { cause: error });
    }
  }

  /**
   * GET /opendata/search.json - one page of decision summaries.
   */
  async searchDecisions(query: PortalSearchQuery, signal?: AbortSignal): Promise<PortalSearchResponse> {
    const url = new URL('/opendata/search.json', this.baseUrl);
    url.searchParams.set('page', String(query.page));
    url.searchParams.set('size', String(query.size));
    if (query.fromDate) url.searchParams.set('from_issue_date', query.fromDate);
    if (query.toDate) url.searchParams.set('to_issue_date', query.toDate);
    if (query.organizationId) url.searchParams.set('org', query.organizationId);

    const response = await this.request('search', url.toString(), signal);
    const body = await this.readJson(response, url.toString(), signal);

    if (typeof body !== 'object' || body === null || !('decisions' in body) || !Array.isArray(body.decisions)) {
      throw new PermanentFetchError(`Search response from ${url.toString()} has no decisions array`);
    }

    const decisions = body.decisions.filter(isDecisionSummary);
    const info = 'info' in body && typeof body.info === 'object' && body.info !== null ? body.info : {};
    const numberField = (key: string, fallback: number): number => {
      const value: unknown = key in info ? Reflect.get(info, key) : undefined;
      return typeof value === 'number' ? value : fallback;
    };

    return {
      decisions,
      info: {
        page: numberField('page', query.page),
        size: numberField('size', query.size),
        actualSize: numberField('actualSize', decisions.length),
        total: numberField('total', decisions.length),
      },
    };
  }

  /**
   * GET /opendata/decisions/{ada} - the metadata envelope of one decision.
   */
  async getDecision(ada: string, signal?: AbortSignal): Promise<MetadataEnvelope> {
    const url = new URL(`/opendata/decisions/${encodeURIComponent(ada)}`, this.baseUrl).toString();
    const response = await this.request('decision', url, signal);
    const body = await this.readJson(response, url, signal);
    if (!isEnvelope(body)) {
      throw new PermanentFetchError(`Decision response for ${ada} is not an object`);
    }
    return body;
  }

  /**
   * Download the document bytes verbatim.
   */
  async downloadDocument(documentUrl: string, signal?: AbortSignal): Promise<FetchedDocument> {
    const response = await this.request('document', documentUrl, signal, 'application/pdf, */*');
    let bytes: Buffer;
    try {
      bytes = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      throw new TransientFetchError(`Reading body of ${documentUrl} failed`, response.status, undefined, { cause: error });
    }

    return {
      bytes,
      sourceUrl: response.url || documentUrl,
      contentType: response.headers.get('content-type') ?? 'application/octet-stream',
      retrievedAt: new Date().toISOString(),
    };
  }

  async close(): Promise<void> {
    await this.limiter.disconnect();
  }
}
