import type { PipelineState } from '@decision-corpus/shared';
import { isRecord } from '../lib/files';

/**
 * Keyed PipelineState persistence with compare-and-set writes. Only the
 * coordinator talks to it.
 */
export interface PipelineStateStore {
  get(ada: string): Promise<PipelineState | null>;

  /**
   * Insert `state` when no state exists for its ADA. Returns whatever is
   * stored afterwards (the given state, or the one that won the race).
   */
  createIfAbsent(state: PipelineState): Promise<PipelineState>;

  /**
   * Write `next` only if the stored revision equals `expectedRevision`.
   * The stored state gets revision `expectedRevision + 1`, which is returned.
   * Throws StateConflictError otherwise.
   */
  compareAndSet(next: PipelineState, expectedRevision: number): Promise<PipelineState>;

  list(): Promise<PipelineState[]>;

  assertAvailable(): Promise<void>;
}

export function isPipelineState(value: unknown): value is PipelineState {
  return (
    isRecord(value) &&
    typeof value.ada === 'string' &&
    typeof value.stage === 'string' &&
    typeof value.revision === 'number'
  );
}
