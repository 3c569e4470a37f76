/**
 * Pipeline Coordinator
 *
 * Drives one identifier through fetch -> store -> extract -> normalize,
 * persisting a PipelineState transition before and after every stage. All
 * writes are compare-and-set on the state revision; the lease taken at claim
 * time is what keeps a second worker from running the same identifier.
 */

import os from 'os';
import { ulid } from 'ulid';
import {
  config,
  logger,
  getCorrelationId,
  runWithContextAsync,
  setContextStage,
  identifiersProcessedCounter,
  stageDurationHistogram,
  createRetryPolicy,
  withRetry,
  toErrorInfo,
  isFatal,
  CancelledError,
  ExtractionError,
  StateConflictError,
  StorageError,
  ValidationError,
  type ExtractedText,
  type ExtractedTextRef,
  type Lease,
  type PipelineStage,
  type PipelineState,
  type ProcessOutcome,
  type ProcessResult,
  type RawDocument,
  type RawDocumentRef,
  type RetryPolicy,
} from '@decision-corpus/shared';
import type { FetchStage } from './portal/fetch-stage';
import type { FileContentStore } from './store/content-store';
import type { ExtractionStage } from './extraction/extraction-stage';
import type { NormalizationStage } from './normalization/normalize';
import type { PipelineStateStore } from './state/state-store';
import {
  assertTransition,
  initialState,
  isInProgress,
  settledStageOf,
  type InProgressStage,
} from './state/transitions';
import { errnoCode } from './lib/files';
import { anySignal } from './lib/signals';

/** Claim attempts lost to concurrent writers before reporting in_flight */
const MAX_CLAIM_CONFLICTS = 5;

export interface CoordinatorDeps {
  stateStore: PipelineStateStore;
  contentStore: FileContentStore;
  fetchStage: Pick<FetchStage, 'fetch'>;
  extractionStage: Pick<ExtractionStage, 'extract'>;
  normalizationStage: Pick<NormalizationStage, 'run'>;
  storageRetryPolicy?: RetryPolicy;
  workerId?: string;
  leaseTtlMs?: number;
  /** How often a running stage renews its lease; defaults to a third of the TTL */
  heartbeatIntervalMs?: number;
  now?: () => Date;
}

export interface ProcessOptions {
  signal?: AbortSignal;
  /** Re-fetch identifiers that are already complete */
  refresh?: boolean;
  /** Resume failed identifiers from their last completed stage */
  retryFailed?: boolean;
}

type Claim =
  | { kind: 'claimed'; state: PipelineState }
  | { kind: 'done'; result: Omit<ProcessResult, 'ada'> };

export function toRawRef(document: RawDocument): RawDocumentRef {
  return {
    version: document.version,
    hash: document.hash,
    path: document.path,
    sourceUrl: document.sourceUrl,
  };
}

export function toTextRef(extracted: ExtractedText): ExtractedTextRef {
  return {
    path: extracted.path,
    method: extracted.method,
    rawHash: extracted.rawHash,
    quality: extracted.quality,
    qualityClass: extracted.qualityClass,
  };
}

function errorReason(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists under another user
    return errnoCode(error) === 'EPERM';
  }
}

type StateWriter = (current: PipelineState, patch: Partial<PipelineState>) => Promise<PipelineState>;

/**
 * One in-progress stage. State writes are serialized through a chain so the
 * heartbeat and the stage's own updates never race on the revision. A failed
 * heartbeat means the lease is gone: it is kept in `heartbeatError` and
 * `leaseLost` fires.
 */
class StageRun {
  private current: PipelineState;
  private chain: Promise<unknown> = Promise.resolve();
  private timer: NodeJS.Timeout | null = null;
  private readonly lost = new AbortController();
  heartbeatError: unknown = null;

  constructor(initial: PipelineState, private readonly write: StateWriter) {
    this.current = initial;
  }

  get state(): PipelineState {
    return this.current;
  }

  get leaseLost(): AbortSignal {
    return this.lost.signal;
  }

  update(patch: Partial<PipelineState>): Promise<PipelineState> {
    const next = this.chain.then(async () => {
      this.current = await this.write(this.current, patch);
      return this.current;
    });
    // The caller sees the failure; the chain carries on
    this.chain = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  startHeartbeat(intervalMs: number): void {
    this.timer = setInterval(() => {
      this.update({}).catch((error: unknown) => {
        logger.warn('Lease renewal failed', { error: errorReason(error) });
        this.heartbeatError = this.heartbeatError ?? error;
        this.lost.abort();
      });
    }, intervalMs);
  }

  /** Stop renewing and wait for pending writes; returns the latest state */
  async stop(): Promise<PipelineState> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.chain;
    return this.current;
  }
}

export class Coordinator {
  private readonly stateStore: PipelineStateStore;
  private readonly contentStore: FileContentStore;
  private readonly fetchStage: Pick<FetchStage, 'fetch'>;
  private readonly extractionStage: Pick<ExtractionStage, 'extract'>;
  private readonly normalizationStage: Pick<NormalizationStage, 'run'>;
  private readonly storageRetryPolicy: RetryPolicy;
  private readonly workerId: string;
  private readonly leaseTtlMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly hostname = os.hostname();
  private readonly now: () => Date;

  constructor(deps: CoordinatorDeps) {
    this.stateStore = deps.stateStore;
    this.contentStore = deps.contentStore;
    this.fetchStage = deps.fetchStage;
    this.extractionStage = deps.extractionStage;
    this.normalizationStage = deps.normalizationStage;
    this.storageRetryPolicy =
      deps.storageRetryPolicy ??
      createRetryPolicy({
        maxAttempts: config.storageMaxAttempts,
        baseDelayMs: 100,
        maxDelayMs: 2000,
        isRetryable: (error) => error instanceof StorageError && !error.fatal,
      });
    this.workerId = deps.workerId ?? `worker-${process.pid}`;
    this.leaseTtlMs = deps.leaseTtlMs ?? config.leaseTtlMs;
    this.heartbeatIntervalMs = deps.heartbeatIntervalMs ?? Math.max(1, Math.floor(this.leaseTtlMs / 3));
    this.now = deps.now ?? (() => new Date());
  }

  async getState(ada: string): Promise<PipelineState | null> {
    return this.stateStore.get(ada);
  }

  /**
   * Drive `ada` to `complete`, or as far as it can get. Per-identifier
   * failures are returned as outcomes; only a fatal StorageError throws.
   */
  async process(ada: string, options: ProcessOptions = {}): Promise<ProcessResult> {
    return runWithContextAsync({ correlationId: getCorrelationId(), ada }, async () => {
      const result = await this.processInContext(ada, options);
      identifiersProcessedCounter.inc({ outcome: result.outcome });
      const log = result.outcome === 'failed' ? logger.warn : logger.info;
      log('Identifier processed', { outcome: result.outcome, stage: result.stage, reason: result.reason });
      return { ada, ...result };
    });
  }

  private async processInContext(ada: string, options: ProcessOptions): Promise<Omit<ProcessResult, 'ada'>> {
    if (options.signal?.aborted) {
      return { outcome: 'cancelled', stage: 'pending', reason: 'run cancelled before start' };
    }

    const owner = `${this.workerId}:${ulid()}`;
    const claim = await this.claim(ada, owner, options);
    if (claim.kind === 'done') {
      return claim.result;
    }

    try {
      return await this.drive(claim.state, options.signal);
    } catch (error) {
      if (error instanceof StateConflictError) {
        return { outcome: 'in_flight', stage: claim.state.stage, reason: 'lease taken over by another worker' };
      }
      throw error;
    } finally {
      setContextStage(undefined);
    }
  }

  // ==========================================================================
  // Claim
  // ==========================================================================

  private leaseExpiry(): string {
    return new Date(this.now().getTime() + this.leaseTtlMs).toISOString();
  }

  /**
   * A lease holds until it expires, unless it names a process on this host
   * that no longer exists.
   */
  private isLeaseHeld(lease: Lease, now: Date): boolean {
    if (Date.parse(lease.expiresAt) <= now.getTime()) {
      return false;
    }
    if (
      lease.pid !== undefined &&
      lease.hostname === this.hostname &&
      lease.pid !== process.pid &&
      !isProcessAlive(lease.pid)
    ) {
      logger.warn('Taking over lease of a dead process', { owner: lease.owner, pid: lease.pid });
      return false;
    }
    return true;
  }

  private async claim(ada: string, owner: string, options: ProcessOptions): Promise<Claim> {
    for (let conflicts = 0; conflicts < MAX_CLAIM_CONFLICTS; conflicts++) {
      const state =
        (await this.withStorageRetry(() => this.stateStore.get(ada), 'state.get')) ??
        (await this.withStorageRetry(
          () => this.stateStore.createIfAbsent(initialState(ada, this.now())),
          'state.create'
        ));

      const now = this.now();
      if (state.lease && state.lease.owner !== owner && this.isLeaseHeld(state.lease, now)) {
        return { kind: 'done', result: { outcome: 'in_flight', stage: state.stage, reason: `leased by ${state.lease.owner}` } };
      }
      if (state.stage === 'complete' && !options.refresh) {
        return { kind: 'done', result: { outcome: 'skipped', stage: 'complete' } };
      }
      if (state.stage === 'failed' && !options.retryFailed) {
        return {
          kind: 'done',
          result: { outcome: 'skipped', stage: 'failed', reason: state.lastError?.message ?? 'previously failed' },
        };
      }

      let stage: PipelineStage = state.stage;
      if (isInProgress(state.stage)) {
        stage = settledStageOf(state);
        logger.warn('Recovering interrupted stage', { interrupted: state.stage, resume_from: stage });
      } else if (state.stage === 'complete') {
        stage = 'pending';
      } else if (state.stage === 'failed') {
        stage = settledStageOf(state);
      }
      if (stage !== state.stage) {
        assertTransition(state.stage, stage);
      }

      const next: PipelineState = {
        ...state,
        stage,
        failure: state.stage === 'failed' ? null : state.failure,
        attempts: state.stage === 'failed' ? 0 : state.attempts,
        lease: {
          owner,
          acquiredAt: now.toISOString(),
          expiresAt: this.leaseExpiry(),
          pid: process.pid,
          hostname: this.hostname,
        },
        updatedAt: now.toISOString(),
      };

      try {
        const claimed = await this.withStorageRetry(
          () => this.stateStore.compareAndSet(next, state.revision),
          'state.claim'
        );
        return { kind: 'claimed', state: claimed };
      } catch (error) {
        if (!(error instanceof StateConflictError)) {
          throw error;
        }
        logger.debug('Claim lost a compare-and-set race, re-reading state', { revision: state.revision });
      }
    }

    const latest = await this.stateStore.get(ada);
    return { kind: 'done', result: { outcome: 'in_flight', stage: latest?.stage ?? 'pending', reason: 'state changing concurrently' } };
  }

  // ==========================================================================
  // Stage loop
  // ==========================================================================

  private async transition(current: PipelineState, patch: Partial<PipelineState>): Promise<PipelineState> {
    if (patch.stage !== undefined && patch.stage !== current.stage) {
      assertTransition(current.stage, patch.stage);
    }
    const now = this.now();
    const releasing = patch.lease === null;
    const next: PipelineState = {
      ...current,
      ...patch,
      lease:
        releasing || !current.lease
          ? null
          : { ...current.lease, expiresAt: this.leaseExpiry() },
      updatedAt: now.toISOString(),
    };
    return this.withStorageRetry(() => this.stateStore.compareAndSet(next, current.revision), 'state.transition');
  }

  private async drive(initial: PipelineState, signal?: AbortSignal): Promise<Omit<ProcessResult, 'ada'>> {
    let state = initial;
    for (;;) {
      if (state.stage === 'complete') {
        return { outcome: 'complete', stage: 'complete' };
      }
      if (signal?.aborted) {
        await this.transition(state, { lease: null });
        return { outcome: 'cancelled', stage: state.stage };
      }

      let step: { state: PipelineState; outcome?: ProcessOutcome; reason?: string };
      switch (state.stage) {
        case 'pending':
          step = await this.runStage(state, 'fetching', signal, (run, stageSignal) => this.fetch(run, stageSignal));
          break;
        case 'fetched':
          step = await this.runStage(state, 'extracting', signal, (run, stageSignal) =>
            this.extract(run.state, stageSignal)
          );
          break;
        case 'extracted':
          step = await this.runStage(state, 'normalizing', signal, (run) => this.normalize(run.state));
          break;
        default:
          throw new Error(`Cannot drive identifier from stage ${state.stage}`);
      }

      state = step.state;
      if (step.outcome) {
        return { outcome: step.outcome, stage: state.stage, reason: step.reason };
      }
    }
  }

  /**
   * Enter `inProgress`, run `work` while a heartbeat renews the lease, and
   * settle: on success `work` returns the patch for the completed stage;
   * cancellation rolls back to the stage the work started from; losing the
   * lease hands the identifier to its new owner; other errors fail it.
   */
  private async runStage(
    from: PipelineState,
    inProgress: InProgressStage,
    signal: AbortSignal | undefined,
    work: (run: StageRun, signal: AbortSignal) => Promise<Partial<PipelineState>>
  ): Promise<{ state: PipelineState; outcome?: ProcessOutcome; reason?: string }> {
    const run = new StageRun(
      await this.transition(from, { stage: inProgress, attempts: from.attempts + 1 }),
      (current, patch) => this.transition(current, patch)
    );
    setContextStage(inProgress);
    const startTime = Date.now();
    const observe = (status: string) =>
      stageDurationHistogram.observe({ stage: inProgress, status }, (Date.now() - startTime) / 1000);

    run.startHeartbeat(this.heartbeatIntervalMs);
    let settled: { patch: Partial<PipelineState> } | { error: unknown };
    try {
      settled = { patch: await work(run, anySignal([signal, run.leaseLost])) };
    } catch (error) {
      settled = { error };
    }
    const running = await run.stop();
    if (run.heartbeatError !== null) {
      settled = { error: run.heartbeatError };
    }

    if ('error' in settled) {
      const error = settled.error;
      if (isFatal(error) || error instanceof StateConflictError) {
        observe('error');
        throw error;
      }
      if (error instanceof CancelledError || signal?.aborted) {
        observe('cancelled');
        logger.info('Stage cancelled, rolling back', { rollback_to: from.stage });
        const rolledBack = await this.transition(running, { stage: from.stage, lease: null });
        return { state: rolledBack, outcome: 'cancelled' };
      }

      observe('failed');
      const info = toErrorInfo(error);
      logger.error('Stage failed', error, { attempts: running.attempts });
      const failed = await this.transition(running, {
        stage: 'failed',
        failure: { stage: inProgress, error: info },
        lastError: info,
        lease: null,
      });
      return { state: failed, outcome: 'failed', reason: errorReason(error) };
    }

    observe('success');
    const done = await this.transition(running, { attempts: 0, ...settled.patch });
    return { state: done };
  }

  private async loadRaw(state: PipelineState): Promise<RawDocument> {
    const ref = state.rawDocument;
    if (!ref) {
      throw new StorageError(`State for ${state.ada} has no raw document reference`);
    }
    const raw = await this.withStorageRetry(() => this.contentStore.getByHash(state.ada, ref.hash), 'content.get');
    if (!raw) {
      throw new StorageError(`Raw document ${ref.hash} for ${state.ada} is not in the content store`);
    }
    return raw;
  }

  private async fetch(run: StageRun, signal: AbortSignal): Promise<Partial<PipelineState>> {
    const ada = run.state.ada;
    const { document, envelope } = await this.fetchStage.fetch(ada, signal, {
      onRetry: async () => {
        await run.update({ stage: 'fetching', attempts: run.state.attempts + 1 });
      },
    });
    const { document: raw } = await this.withStorageRetry(
      () =>
        this.contentStore.put(ada, document.bytes, {
          sourceUrl: document.sourceUrl,
          contentType: document.contentType,
          retrievedAt: document.retrievedAt,
          envelope,
        }),
      'content.put'
    );
    return { stage: 'fetched', rawDocument: toRawRef(raw), lastError: null };
  }

  private async extract(state: PipelineState, signal?: AbortSignal): Promise<Partial<PipelineState>> {
    const raw = await this.loadRaw(state);
    const bytes = await this.withStorageRetry(() => this.contentStore.read(raw), 'content.read');
    try {
      const extracted = await this.withStorageRetry(
        () => this.extractionStage.extract(raw, bytes, signal),
        'extraction'
      );
      return { stage: 'extracted', extractedText: toTextRef(extracted), extractionFailed: false };
    } catch (error) {
      if (!(error instanceof ExtractionError)) {
        throw error;
      }
      // Normalization still runs, without text
      logger.warn('Extraction failed, continuing without text', { error: error.message });
      return {
        stage: 'extracted',
        extractedText: null,
        extractionFailed: true,
        lastError: toErrorInfo(error),
      };
    }
  }

  private async normalize(state: PipelineState): Promise<Partial<PipelineState>> {
    const raw = await this.loadRaw(state);
    const envelope = await this.withStorageRetry(() => this.contentStore.readEnvelope(raw), 'content.envelope');
    if (!envelope) {
      throw new ValidationError(`No metadata envelope stored with ${raw.path}`);
    }
    await this.withStorageRetry(
      () =>
        this.normalizationStage.run(
          envelope,
          state.extractedText,
          toRawRef(raw),
          state.extractionFailed,
          new Date(raw.retrievedAt)
        ),
      'normalization'
    );
    return { stage: 'complete', lease: null };
  }

  // ==========================================================================
  // Storage retry
  // ==========================================================================

  /**
   * Retry non-fatal StorageErrors. When the bound is exhausted, check the
   * stores: an unreachable store turns the failure into a fatal one.
   */
  private async withStorageRetry<T>(fn: () => Promise<T>, operation: string): Promise<T> {
    try {
      return await withRetry(this.storageRetryPolicy, () => fn(), { operation });
    } catch (error) {
      if (error instanceof StorageError && !error.fatal) {
        await this.contentStore.assertAvailable();
        await this.stateStore.assertAvailable();
      }
      throw error;
    }
  }
}
