/**
 * decision.available job handler.
 *
 * The coordinator's state store decides what work remains; the job only
 * carries the ADA. Outcomes map onto BullMQ semantics: `in_flight` and
 * `cancelled` throw so the job is retried later, a `failed` identifier is
 * recorded in the state store and the job completes.
 */

import {
  logger,
  runWithContextAsync,
  CancelledError,
  InFlightError,
  type DecisionAvailableJob,
  type ProcessResult,
} from '@decision-corpus/shared';
import type { Coordinator } from '@decision-corpus/pipeline';

export interface ProcessJobOptions {
  signal?: AbortSignal;
  retryFailed?: boolean;
}

export async function processDecisionJob(
  coordinator: Pick<Coordinator, 'process'>,
  data: DecisionAvailableJob,
  options: ProcessJobOptions = {}
): Promise<ProcessResult> {
  return runWithContextAsync({ correlationId: data.correlation_id, ada: data.ada }, async () => {
    const result = await coordinator.process(data.ada, {
      signal: options.signal,
      refresh: data.refresh === true,
      retryFailed: options.retryFailed === true,
    });

    switch (result.outcome) {
      case 'in_flight':
        throw new InFlightError(data.ada, result.reason ?? 'leased by another worker');
      case 'cancelled':
        throw new CancelledError(`Processing of ${data.ada} cancelled at ${result.stage}`);
      case 'failed':
        logger.warn('Decision failed permanently', { reason: result.reason });
        return result;
      default:
        return result;
    }
  });
}
