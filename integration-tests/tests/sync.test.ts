/**
 * Adapter API Sync Tests
 *
 * Request validation and the listing -> decision.available enqueue pass,
 * against a recording queue and the stub portal.
 */

import { ValidationError, decisionJobId, type DecisionAvailableJob } from '@decision-corpus/shared';
import {
  DEFAULT_MAX_DECISIONS,
  formatSyncCursor,
  parseSyncCursor,
  parseSyncRequest,
  syncDecisions,
  type DecisionQueue,
} from '../../services/adapter-api/src/lib/sync';
import { PORTAL_URL, PortalStub, createTestClient, silenceLogs } from './helpers';

class RecordingQueue implements DecisionQueue {
  readonly added: Array<{ name: string; data: DecisionAvailableJob; jobId: string }> = [];

  async add(name: 'decision.available', data: DecisionAvailableJob, opts: { jobId: string }): Promise<unknown> {
    this.added.push({ name, data, jobId: opts.jobId });
    return undefined;
  }
}

function searchUrl(page: number, size: number, extra = ''): string {
  return `${PORTAL_URL}/opendata/search.json?page=${page}&size=${size}${extra}`;
}

describe('parseSyncRequest', () => {
  it('fills defaults for an empty body', () => {
    expect(parseSyncRequest({})).toEqual({
      since_cursor: null,
      max_decisions: DEFAULT_MAX_DECISIONS,
      from_date: undefined,
      to_date: undefined,
      refresh: false,
    });
  });

  it('keeps valid fields', () => {
    expect(
      parseSyncRequest({ since_cursor: '2:5', max_decisions: 10, from_date: '2024-01-01', refresh: true })
    ).toEqual({
      since_cursor: '2:5',
      max_decisions: 10,
      from_date: '2024-01-01',
      to_date: undefined,
      refresh: true,
    });
  });

  it('collects every problem into one validation error', () => {
    let caught: unknown;
    try {
      parseSyncRequest({ max_decisions: 0, from_date: '01/01/2024', refresh: 'yes' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      errors: ['from_date must be YYYY-MM-DD', 'max_decisions must be a positive integer', 'refresh must be a boolean'],
    });
  });
});

describe('sync cursor', () => {
  it('parses and formats page:index', () => {
    expect(parseSyncCursor('3:14')).toEqual({ kind: 'listing', page: 3, index: 14 });
    expect(formatSyncCursor({ kind: 'listing', page: 3, index: 14 })).toBe('3:14');
    expect(parseSyncCursor(null)).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(() => parseSyncCursor('page-3')).toThrow(ValidationError);
  });
});

describe('syncDecisions', () => {
  beforeAll(() => silenceLogs());

  it('enqueues one job per listed ADA with an ADA-derived job id', async () => {
    const stub = new PortalStub().json(searchUrl(0, 100, '&from_issue_date=2024-01-01'), {
      decisions: [{ ada: 'ΣΥΝ-1' }, { ada: '123/ΣΥΝ:2' }],
      info: { total: 2 },
    });
    const client = createTestClient(stub);
    const queue = new RecordingQueue();

    const result = await syncDecisions(
      { since_cursor: null, max_decisions: 50, from_date: '2024-01-01', refresh: false },
      'corr-1',
      queue,
      client
    );

    expect(result).toEqual({ correlation_id: 'corr-1', enqueued: 2, next_cursor: '0:2' });
    expect(queue.added.map((job) => job.jobId)).toEqual([decisionJobId('ΣΥΝ-1'), decisionJobId('123/ΣΥΝ:2')]);
    expect(queue.added[1].jobId).toBe(`decision_${encodeURIComponent('123/ΣΥΝ')}%3A2`);
    expect(queue.added[0].name).toBe('decision.available');
    expect(queue.added[0].data).toMatchObject({
      event_type: 'decision.available',
      correlation_id: 'corr-1',
      ada: 'ΣΥΝ-1',
    });
    expect(queue.added[0].data.refresh).toBeUndefined();
    await client.close();
  });

  it('continues from since_cursor, stops at max_decisions and marks refresh jobs', async () => {
    const stub = new PortalStub().json(searchUrl(1, 100), {
      decisions: [{ ada: 'ΣΥΝ-101' }, { ada: 'ΣΥΝ-102' }, { ada: 'ΣΥΝ-103' }],
      info: { total: 103 },
    });
    const client = createTestClient(stub);
    const queue = new RecordingQueue();

    const result = await syncDecisions(
      { since_cursor: '1:1', max_decisions: 1, refresh: true },
      'corr-2',
      queue,
      client
    );

    expect(result).toEqual({ correlation_id: 'corr-2', enqueued: 1, next_cursor: '1:2' });
    expect(queue.added.map((job) => job.data.ada)).toEqual(['ΣΥΝ-102']);
    expect(queue.added[0].data.refresh).toBe(true);
    await client.close();
  });
});
