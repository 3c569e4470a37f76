/**
 * Portal Client and Fetch Stage Tests
 *
 * HTTP failures map onto the transient/permanent taxonomy; the fetch stage
 * retries transient ones within its bound and validates what it gets back.
 */

import { FetchStage, PortalClient, createRateLimiter, parseRetryAfter } from '@decision-corpus/pipeline';
import {
  CancelledError,
  PermanentFetchError,
  TransientFetchError,
  createRetryPolicy,
} from '@decision-corpus/shared';
import {
  PORTAL_URL,
  PortalStub,
  createTestClient,
  decisionUrl,
  documentUrl,
  fakePdf,
  silenceLogs,
} from './helpers';

const ADA = '6ΡΞΛ46ΜΤΛΡ-ΥΘ8';

describe('PortalClient', () => {
  beforeAll(() => silenceLogs());

  describe('parseRetryAfter', () => {
    it('reads delta-seconds', () => {
      expect(parseRetryAfter('3')).toBe(3000);
    });

    it('reads an HTTP date relative to now', () => {
      const now = Date.parse('2024-01-01T00:00:00Z');
      expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:05 GMT', now)).toBe(5000);
    });

    it('ignores missing or garbage values', () => {
      expect(parseRetryAfter(null)).toBeUndefined();
      expect(parseRetryAfter('later')).toBeUndefined();
    });
  });

  it('maps 404 to a permanent failure', async () => {
    const stub = new PortalStub();
    const client = createTestClient(stub);

    const error = await client.getDecision(ADA).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermanentFetchError);
    expect(error).toMatchObject({ status: 404 });
    await client.close();
  });

  it('maps 429 to a transient failure carrying Retry-After', async () => {
    const stub = new PortalStub().fail(decisionUrl(ADA), 429, 1, { 'retry-after': '2' });
    const client = createTestClient(stub);

    const error = await client.getDecision(ADA).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toMatchObject({ status: 429, retryAfterMs: 2000 });
    await client.close();
  });

  it('maps network failures to transient failures', async () => {
    const stub = new PortalStub().dropConnection(decisionUrl(ADA));
    const client = createTestClient(stub);

    await expect(client.getDecision(ADA)).rejects.toBeInstanceOf(TransientFetchError);
    await client.close();
  });

  it('maps a body that fails mid-read to a transient failure', async () => {
    let requests = 0;
    const client = new PortalClient({
      baseUrl: PORTAL_URL,
      timeoutMs: 5000,
      limiter: createRateLimiter(1000, 1000),
      fetchImpl: async () => {
        requests += 1;
        const body = new ReadableStream<Uint8Array>({
          pull(controller) {
            controller.error(new Error('socket hang up'));
          },
        });
        return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } });
      },
    });

    const error = await client.getDecision(ADA).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toMatchObject({
      status: 200,
      message: `Reading body of ${decisionUrl(ADA)} failed`,
    });
    expect(requests).toBe(1);
    await client.close();
  });

  it('rejects malformed JSON as permanent', async () => {
    const stub = new PortalStub().route(decisionUrl(ADA), () => ({
      status: 200,
      body: '{"ada": ',
      headers: { 'content-type': 'application/json' },
    }));
    const client = createTestClient(stub);

    await expect(client.getDecision(ADA)).rejects.toBeInstanceOf(PermanentFetchError);
    await client.close();
  });

  it('does not issue a request once cancelled', async () => {
    const stub = new PortalStub();
    const client = createTestClient(stub);
    const controller = new AbortController();
    controller.abort();

    await expect(client.getDecision(ADA, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(stub.calls).toHaveLength(0);
    await client.close();
  });

  it('lists decisions and drops entries without an ADA', async () => {
    const stub = new PortalStub().json(`${PORTAL_URL}/opendata/search.json?page=0&size=10&org=6104`, {
      decisions: [{ ada: 'Α-1' }, { subject: 'no ada' }, { ada: 'Α-2' }],
      info: { page: 0, size: 10, actualSize: 3, total: 3 },
    });
    const client = createTestClient(stub);

    const response = await client.searchDecisions({ page: 0, size: 10, organizationId: '6104' });

    expect(response.decisions.map((decision) => decision.ada)).toEqual(['Α-1', 'Α-2']);
    expect(response.info).toEqual({ page: 0, size: 10, actualSize: 3, total: 3 });
    await client.close();
  });
});

describe('FetchStage', () => {
  const policy = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 });
  const docUrl = documentUrl('decision.pdf');
  const bytes = fakePdf('fetch-stage');

  beforeAll(() => silenceLogs());

  function portal(): PortalStub {
    return new PortalStub()
      .decision(ADA, { ada: ADA, subject: 'Ανάθεση', documentUrl: docUrl })
      .document(docUrl, bytes);
  }

  it('returns the document bytes and the envelope', async () => {
    const stub = portal();
    const client = createTestClient(stub);

    const result = await new FetchStage(client, policy).fetch(ADA);

    expect(result.envelope).toEqual({ ada: ADA, subject: 'Ανάθεση', documentUrl: docUrl });
    expect(result.document.bytes.equals(bytes)).toBe(true);
    expect(result.document.contentType).toBe('application/pdf');
    expect(result.document.sourceUrl).toBe(docUrl);
    await client.close();
  });

  it('retries transient failures within the bound and reports every retry', async () => {
    const stub = portal().fail(decisionUrl(ADA), 503, 2);
    const client = createTestClient(stub);
    let retries = 0;

    await new FetchStage(client, policy).fetch(ADA, undefined, {
      onRetry: async () => {
        retries += 1;
      },
    });

    expect(stub.countCalls(decisionUrl(ADA))).toBe(3);
    expect(stub.countCalls(docUrl)).toBe(1);
    expect(retries).toBe(2);
    await client.close();
  });

  it('gives up after maxAttempts transient failures', async () => {
    const stub = portal().fail(docUrl, 500, 5);
    const client = createTestClient(stub);

    await expect(new FetchStage(client, policy).fetch(ADA)).rejects.toBeInstanceOf(TransientFetchError);
    expect(stub.countCalls(docUrl)).toBe(3);
    await client.close();
  });

  it('does not retry a missing decision', async () => {
    const stub = new PortalStub();
    const client = createTestClient(stub);

    await expect(new FetchStage(client, policy).fetch(ADA)).rejects.toBeInstanceOf(PermanentFetchError);
    expect(stub.countCalls(decisionUrl(ADA))).toBe(1);
    await client.close();
  });

  it('rejects an envelope for a different ADA', async () => {
    const stub = new PortalStub().decision(ADA, { ada: 'ΑΛΛΟ-1', documentUrl: docUrl });
    const client = createTestClient(stub);

    await expect(new FetchStage(client, policy).fetch(ADA)).rejects.toThrow('carries ADA ΑΛΛΟ-1');
    await client.close();
  });

  it('rejects an envelope that fails the schema', async () => {
    const stub = new PortalStub().decision(ADA, { ada: 42, documentUrl: docUrl });
    const client = createTestClient(stub);

    await expect(new FetchStage(client, policy).fetch(ADA)).rejects.toThrow(/^Malformed decision response/);
    await client.close();
  });

  it('leaves wrongly typed optional fields to normalization', async () => {
    const envelope = { ada: ADA, unitIds: '12345', signerIds: 7, extraFieldValues: 'n/a', documentUrl: docUrl };
    const stub = new PortalStub().decision(ADA, envelope).document(docUrl, bytes);
    const client = createTestClient(stub);

    const result = await new FetchStage(client, policy).fetch(ADA);

    expect(result.envelope).toEqual(envelope);
    await client.close();
  });

  it('rejects a decision without a document URL', async () => {
    const stub = new PortalStub().decision(ADA, { ada: ADA });
    const client = createTestClient(stub);

    await expect(new FetchStage(client, policy).fetch(ADA)).rejects.toThrow(`Decision ${ADA} has no document URL`);
    await client.close();
  });

  it('rejects an empty document', async () => {
    const stub = new PortalStub()
      .decision(ADA, { ada: ADA, documentUrl: docUrl })
      .document(docUrl, Buffer.alloc(0));
    const client = createTestClient(stub);

    await expect(new FetchStage(client, policy).fetch(ADA)).rejects.toBeInstanceOf(PermanentFetchError);
    await client.close();
  });
});
