/**
 * Sync Logic
 *
 * Pages through the portal listing and enqueues one decision.available job
 * per ADA. Fetching and processing happen in the pipeline worker; the job id
 * is derived from the ADA so BullMQ drops duplicates still in the queue.
 */

import {
  logger,
  ValidationError,
  decisionJobId,
  type DecisionAvailableJob,
  type SyncRequest,
  type SyncResponse,
} from '@decision-corpus/shared';
import { PortalListingSource, type PortalClient, type SourceCursor } from '@decision-corpus/pipeline';

/** The part of a BullMQ Queue the sync pass needs */
export interface DecisionQueue {
  add(name: 'decision.available', data: DecisionAvailableJob, opts: { jobId: string }): Promise<unknown>;
}

export const DEFAULT_MAX_DECISIONS = 50;

const CURSOR_PATTERN = /^(\d+):(\d+)$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * `since_cursor` is `<page>:<index>` into the listing for the same dates.
 */
export function parseSyncCursor(value: string | null | undefined): SourceCursor | undefined {
  if (value === null || value === undefined || value === '') {
    return undefined;
  }
  const match = CURSOR_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(`since_cursor must look like <page>:<index>, got '${value}'`);
  }
  return { kind: 'listing', page: parseInt(match[1], 10), index: parseInt(match[2], 10) };
}

export function formatSyncCursor(cursor: SourceCursor): string | null {
  return cursor.kind === 'listing' ? `${cursor.page}:${cursor.index}` : null;
}

/**
 * Validate a raw request body into a SyncRequest.
 */
export function parseSyncRequest(body: unknown): SyncRequest {
  const input: Record<string, unknown> =
    typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : {};
  const errors: string[] = [];

  const optionalString = (key: string): string | undefined => {
    const value = input[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      errors.push(`${key} must be a string`);
      return undefined;
    }
    return value;
  };

  const fromDate = optionalString('from_date');
  const toDate = optionalString('to_date');
  for (const [key, value] of [['from_date', fromDate], ['to_date', toDate]] as const) {
    if (value !== undefined && !DATE_PATTERN.test(value)) {
      errors.push(`${key} must be YYYY-MM-DD`);
    }
  }

  const maxDecisions = input.max_decisions;
  if (
    maxDecisions !== undefined &&
    (typeof maxDecisions !== 'number' || !Number.isInteger(maxDecisions) || maxDecisions < 1)
  ) {
    errors.push('max_decisions must be a positive integer');
  }

  const refresh = input.refresh;
  if (refresh !== undefined && typeof refresh !== 'boolean') {
    errors.push('refresh must be a boolean');
  }

  const sinceCursor = optionalString('since_cursor');

  if (errors.length > 0) {
    throw new ValidationError(`Invalid sync request: ${errors.join('; ')}`, errors);
  }

  return {
    since_cursor: sinceCursor ?? null,
    max_decisions: typeof maxDecisions === 'number' ? maxDecisions : DEFAULT_MAX_DECISIONS,
    from_date: fromDate,
    to_date: toDate,
    refresh: refresh === true,
  };
}

/**
 * List decisions from the portal and enqueue them.
 */
export async function syncDecisions(
  request: SyncRequest,
  correlationId: string,
  queue: DecisionQueue,
  client: PortalClient,
  signal?: AbortSignal
): Promise<SyncResponse> {
  const cursor = parseSyncCursor(request.since_cursor);
  const source = new PortalListingSource(
    client,
    {
      fromDate: request.from_date,
      toDate: request.to_date,
      limit: request.max_decisions ?? DEFAULT_MAX_DECISIONS,
    },
    cursor,
    { signal }
  );

  logger.info('Listing decisions from portal', {
    source: source.key,
    since_cursor: request.since_cursor ?? null,
  });

  let enqueued = 0;
  for await (const ada of source) {
    const job: DecisionAvailableJob = {
      event_type: 'decision.available',
      correlation_id: correlationId,
      ada,
      discovered_at: new Date().toISOString(),
      ...(request.refresh ? { refresh: true } : {}),
    };
    await queue.add('decision.available', job, { jobId: decisionJobId(ada) });
    enqueued += 1;
    logger.debug('Enqueued decision.available job', { ada });
  }

  const nextCursor = formatSyncCursor(source.cursor());
  logger.info('Sync pass finished', { enqueued, next_cursor: nextCursor });

  return { correlation_id: correlationId, enqueued, next_cursor: nextCursor };
}
