/**
 * PipelineState state machine.
 *
 *   pending -> fetching -> fetched -> extracting -> extracted -> normalizing -> complete
 *
 * `failed` is reachable from every in-progress stage. In-progress stages may
 * also loop onto themselves (retry) or fall back to the last completed stage
 * (cancellation, crash recovery).
 */

import type { PipelineStage, PipelineState } from '@decision-corpus/shared';

export type InProgressStage = 'fetching' | 'extracting' | 'normalizing';
export type SettledStage = 'pending' | 'fetched' | 'extracted' | 'complete' | 'failed';

const TRANSITIONS: Record<PipelineStage, readonly PipelineStage[]> = {
  pending: ['fetching', 'failed'],
  fetching: ['fetching', 'fetched', 'failed', 'pending'],
  fetched: ['extracting', 'failed'],
  extracting: ['extracting', 'extracted', 'failed', 'fetched'],
  extracted: ['normalizing', 'failed'],
  normalizing: ['normalizing', 'complete', 'failed', 'extracted'],
  // refresh re-enters the pipeline from the top
  complete: ['pending'],
  // retry of a failed identifier resumes from its last completed stage
  failed: ['pending', 'fetched', 'extracted'],
};

/** Completed stage each in-progress stage starts from */
const PREVIOUS: Record<InProgressStage, SettledStage> = {
  fetching: 'pending',
  extracting: 'fetched',
  normalizing: 'extracted',
};

export function isInProgress(stage: PipelineStage): stage is InProgressStage {
  return stage === 'fetching' || stage === 'extracting' || stage === 'normalizing';
}

export function isTerminal(stage: PipelineStage): boolean {
  return stage === 'complete' || stage === 'failed';
}

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: PipelineStage, to: PipelineStage): void {
  if (!canTransition(from, to)) {
    throw new Error(`Illegal PipelineState transition ${from} -> ${to}`);
  }
}

/**
 * Last completed stage for a state left in-progress (by a crash or an abort)
 * or failed during a stage.
 */
export function settledStageOf(state: PipelineState): SettledStage {
  if (isInProgress(state.stage)) {
    return PREVIOUS[state.stage];
  }
  if (state.stage === 'failed') {
    const failedAt = state.failure?.stage;
    return failedAt && isInProgress(failedAt) ? PREVIOUS[failedAt] : 'pending';
  }
  return state.stage;
}

export function initialState(ada: string, now: Date = new Date()): PipelineState {
  const timestamp = now.toISOString();
  return {
    ada,
    stage: 'pending',
    revision: 0,
    attempts: 0,
    lastError: null,
    failure: null,
    lease: null,
    rawDocument: null,
    extractedText: null,
    extractionFailed: false,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}
