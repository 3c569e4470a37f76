/**
 * Bounded worker pool.
 *
 * `concurrency` workers pull identifiers lazily from one source and hand each
 * to the coordinator. Identifiers are independent; no ordering holds across
 * them. A run-level abort stops pulling and lets in-flight identifiers settle
 * (finish or roll back their current stage). A fatal storage error aborts
 * the run the same way.
 */

import {
  config,
  logger,
  isFatal,
  type DecisionIdentifier,
  type ProcessResult,
  type RunSummary,
} from '@decision-corpus/shared';
import type { Coordinator, ProcessOptions } from './coordinator';
import type { IdentifierSource, SourceCursor } from './identifiers/sources';
import { anySignal } from './lib/signals';

export interface WorkerPoolOptions {
  concurrency?: number;
  /** Stop after pulling this many identifiers */
  limit?: number;
  processOptions?: Omit<ProcessOptions, 'signal'>;
  onResult?: (result: ProcessResult) => void;
}

export interface PoolRunResult {
  summary: RunSummary;
  /**
   * Where a later run should resume: just before the earliest identifier
   * that was cancelled or found in flight, or after the last one pulled.
   */
  cursor: SourceCursor;
  /** Run-aborting error (fatal storage failure or unreadable source) */
  fatal: Error | null;
}

interface Pulled {
  ada: DecisionIdentifier;
  seq: number;
  cursorBefore: SourceCursor;
}

export function emptySummary(): RunSummary {
  return { processed: 0, complete: 0, skipped: 0, inFlight: 0, cancelled: 0, failed: [], aborted: false };
}

export class WorkerPool {
  private readonly concurrency: number;

  constructor(
    private readonly coordinator: Pick<Coordinator, 'process'>,
    private readonly options: WorkerPoolOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? config.workerConcurrency);
  }

  async run(source: IdentifierSource, signal?: AbortSignal): Promise<PoolRunResult> {
    const summary = emptySummary();
    const internal = new AbortController();
    const runSignal = anySignal([signal, internal.signal]);

    let fatal: Error | null = null;
    let pulled = 0;
    let exhausted = false;
    const unsettled = new Map<number, SourceCursor>();

    const abortRun = (error: Error) => {
      fatal = fatal ?? error;
      internal.abort();
    };

    let pullChain: Promise<unknown> = Promise.resolve();
    const pull = (): Promise<Pulled | null> => {
      const next = pullChain.then(async (): Promise<Pulled | null> => {
        if (runSignal.aborted || exhausted) return null;
        if (this.options.limit !== undefined && pulled >= this.options.limit) return null;
        const cursorBefore = source.cursor();
        const ada = await source.next();
        if (ada === null) {
          exhausted = true;
          return null;
        }
        return { ada, seq: pulled++, cursorBefore };
      });
      // Keep the chain alive after a failed pull; the caller sees the error
      pullChain = next.then(
        () => undefined,
        () => undefined
      );
      return next;
    };

    const record = (result: ProcessResult) => {
      summary.processed += 1;
      switch (result.outcome) {
        case 'complete':
          summary.complete += 1;
          break;
        case 'skipped':
          summary.skipped += 1;
          break;
        case 'in_flight':
          summary.inFlight += 1;
          break;
        case 'cancelled':
          summary.cancelled += 1;
          break;
        case 'failed':
          summary.failed.push({ ada: result.ada, reason: result.reason ?? 'unknown error' });
          break;
      }
      this.options.onResult?.(result);
    };

    const worker = async (): Promise<void> => {
      for (;;) {
        let item: Pulled | null;
        try {
          item = await pull();
        } catch (error) {
          logger.error('Identifier source failed', error);
          abortRun(error instanceof Error ? error : new Error(String(error)));
          return;
        }
        if (!item) return;

        unsettled.set(item.seq, item.cursorBefore);
        try {
          const result = await this.coordinator.process(item.ada, {
            ...this.options.processOptions,
            signal: runSignal,
          });
          record(result);
          // Leased elsewhere or rolled back: a resumed run has to see it again
          if (result.outcome !== 'cancelled' && result.outcome !== 'in_flight') {
            unsettled.delete(item.seq);
          }
        } catch (error) {
          if (isFatal(error) && error instanceof Error) {
            logger.error('Fatal storage failure, aborting run', error, { ada: item.ada });
            abortRun(error);
            continue;
          }
          unsettled.delete(item.seq);
          record({
            ada: item.ada,
            outcome: 'failed',
            stage: 'pending',
            reason: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
          });
        }
      }
    };

    logger.info('Worker pool starting', { source: source.key, concurrency: this.concurrency });
    await Promise.all(Array.from({ length: this.concurrency }, () => worker()));

    const earliest = [...unsettled.keys()].sort((a, b) => a - b)[0];
    const cursor = earliest === undefined ? source.cursor() : unsettled.get(earliest) ?? source.cursor();

    summary.aborted = runSignal.aborted;
    logger.info('Worker pool finished', {
      processed: summary.processed,
      complete: summary.complete,
      skipped: summary.skipped,
      in_flight: summary.inFlight,
      cancelled: summary.cancelled,
      failed: summary.failed.length,
      aborted: summary.aborted,
    });

    return { summary, cursor, fatal };
  }
}
