/**
 * Coordinator Tests
 *
 * Drives identifiers through the file-backed pipeline against the stub
 * portal: idempotence, resumption, leases, failure and cancellation.
 */

import os from 'os';
import {
  Coordinator,
  ExtractionStage,
  FetchStage,
  FileTextStore,
  createPipeline,
  initialState,
  type NativeTextExtractor,
  type Pipeline,
} from '@decision-corpus/pipeline';
import {
  CancelledError,
  StateConflictError,
  TransientExtractionError,
  createRetryPolicy,
  type MetadataEnvelope,
  type PipelineState,
} from '@decision-corpus/shared';
import {
  FakeNativeExtractor,
  FakeOcrEngine,
  GREEK_PAGE,
  PortalStub,
  createTestClient,
  decisionUrl,
  documentUrl,
  exitedPid,
  fakePdf,
  makeTempDir,
  removeDir,
  silenceLogs,
  testPipelineOptions,
  waitForAbort,
} from './helpers';

const ADA = 'ΩΡΘ746ΜΤΛΚ-1ΑΒ';
const DOC_URL = documentUrl('omega.pdf');
const BYTES = fakePdf('omega');

const envelope: MetadataEnvelope = {
  ada: ADA,
  protocolNumber: '552/2024',
  subject: 'Έγκριση δαπάνης',
  issueDate: '2024-03-15',
  organizationId: '6104',
  documentUrl: DOC_URL,
};

describe('Coordinator', () => {
  let dataDir: string;
  let pipeline: Pipeline;
  let stub: PortalStub;
  let native: FakeNativeExtractor;

  beforeAll(() => silenceLogs());

  beforeEach(() => {
    dataDir = makeTempDir();
    stub = new PortalStub().decision(ADA, envelope).document(DOC_URL, BYTES);
    native = new FakeNativeExtractor({ [BYTES.toString('utf-8')]: [GREEK_PAGE] });
    pipeline = createPipeline(testPipelineOptions(stub, dataDir, { native }));
  });

  afterEach(async () => {
    await pipeline.close();
    removeDir(dataDir);
  });

  it('takes an identifier from pending to complete', async () => {
    const result = await pipeline.coordinator.process(ADA);

    expect(result).toEqual({ ada: ADA, outcome: 'complete', stage: 'complete' });

    const state = await pipeline.stateStore.get(ADA);
    expect(state?.stage).toBe('complete');
    expect(state?.revision).toBe(7);
    expect(state?.lease).toBeNull();
    expect(state?.rawDocument?.version).toBe(1);
    expect(state?.extractedText?.method).toBe('native');

    const record = await pipeline.recordStore.get(ADA);
    expect(record?.subject).toBe('Έγκριση δαπάνης');
    expect(record?.extractedTextRef?.method).toBe('native');
    expect(record?.rawDocumentRef?.hash).toBe(state?.rawDocument?.hash);
  });

  it('skips a complete identifier without touching the portal', async () => {
    await pipeline.coordinator.process(ADA);
    const second = await pipeline.coordinator.process(ADA);

    expect(second).toEqual({ ada: ADA, outcome: 'skipped', stage: 'complete' });
    expect(stub.countCalls(decisionUrl(ADA))).toBe(1);
    expect(native.calls).toBe(1);
    expect(await pipeline.contentStore.listVersions(ADA)).toHaveLength(1);
  });

  it('refreshes into a new version when the document changed', async () => {
    await pipeline.coordinator.process(ADA);
    stub.document(DOC_URL, fakePdf('omega amended'));

    const result = await pipeline.coordinator.process(ADA, { refresh: true });

    expect(result.outcome).toBe('complete');
    const versions = await pipeline.contentStore.listVersions(ADA);
    expect(versions.map((version) => version.version)).toEqual([1, 2]);
    expect((await pipeline.recordStore.get(ADA))?.rawDocumentRef?.version).toBe(2);
  });

  it('reuses stored text when a refresh finds identical bytes', async () => {
    await pipeline.coordinator.process(ADA);

    await pipeline.coordinator.process(ADA, { refresh: true });

    expect(stub.countCalls(decisionUrl(ADA))).toBe(2);
    expect(await pipeline.contentStore.listVersions(ADA)).toHaveLength(1);
    expect(native.calls).toBe(1);
  });

  it('resumes after the last completed stage without fetching again', async () => {
    const controller = new AbortController();
    stub.route(DOC_URL, () => {
      controller.abort();
      return { status: 200, body: BYTES, headers: { 'content-type': 'application/pdf' } };
    });

    const interrupted = await pipeline.coordinator.process(ADA, { signal: controller.signal });
    expect(interrupted).toEqual({ ada: ADA, outcome: 'cancelled', stage: 'fetched' });
    expect((await pipeline.stateStore.get(ADA))?.lease).toBeNull();

    const resumed = await pipeline.coordinator.process(ADA);

    expect(resumed.outcome).toBe('complete');
    expect(stub.countCalls(decisionUrl(ADA))).toBe(1);
    expect(stub.countCalls(DOC_URL)).toBe(1);
  });

  it('rolls back to fetched when cancelled during extraction', async () => {
    const controller = new AbortController();
    const aborting: NativeTextExtractor = {
      name: 'aborting-native',
      extract: async () => {
        controller.abort();
        throw new CancelledError();
      },
    };
    await pipeline.close();
    pipeline = createPipeline(testPipelineOptions(stub, dataDir, { native: aborting }));

    const interrupted = await pipeline.coordinator.process(ADA, { signal: controller.signal });

    expect(interrupted).toEqual({ ada: ADA, outcome: 'cancelled', stage: 'fetched' });
    const state = await pipeline.stateStore.get(ADA);
    expect(state?.stage).toBe('fetched');
    expect(state?.lease).toBeNull();
    expect(state?.extractedText).toBeNull();

    await pipeline.close();
    pipeline = createPipeline(testPipelineOptions(stub, dataDir, { native }));
    const resumed = await pipeline.coordinator.process(ADA);

    expect(resumed.outcome).toBe('complete');
    expect(native.calls).toBe(1);
    expect(stub.countCalls(decisionUrl(ADA))).toBe(1);
  });

  it('rolls back to extracted when cancelled during normalization', async () => {
    const controller = new AbortController();
    const client = createTestClient(stub);
    const cancelling = new Coordinator({
      stateStore: pipeline.stateStore,
      contentStore: pipeline.contentStore,
      fetchStage: new FetchStage(client, createRetryPolicy({ maxAttempts: 1 })),
      extractionStage: new ExtractionStage(native, null, new FileTextStore(dataDir)),
      normalizationStage: {
        run: async () => {
          controller.abort();
          throw new CancelledError();
        },
      },
      workerId: 'cancelling-worker',
    });

    try {
      const interrupted = await cancelling.process(ADA, { signal: controller.signal });
      expect(interrupted).toEqual({ ada: ADA, outcome: 'cancelled', stage: 'extracted' });
    } finally {
      await client.close();
    }

    const state = await pipeline.stateStore.get(ADA);
    expect(state?.stage).toBe('extracted');
    expect(state?.lease).toBeNull();
    expect(state?.extractedText?.method).toBe('native');

    const resumed = await pipeline.coordinator.process(ADA);

    expect(resumed.outcome).toBe('complete');
    expect(native.calls).toBe(1);
    expect(stub.countCalls(decisionUrl(ADA))).toBe(1);
  });

  it('does nothing for a run cancelled before it starts', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await pipeline.coordinator.process(ADA, { signal: controller.signal });

    expect(result).toEqual({ ada: ADA, outcome: 'cancelled', stage: 'pending', reason: 'run cancelled before start' });
    expect(stub.calls).toHaveLength(0);
    expect(await pipeline.stateStore.get(ADA)).toBeNull();
  });

  it('lets only one of two concurrent calls do the work', async () => {
    const results = await Promise.all([pipeline.coordinator.process(ADA), pipeline.coordinator.process(ADA)]);

    const outcomes = results.map((result) => result.outcome).sort();
    expect(outcomes[0]).toBe('complete');
    expect(['in_flight', 'skipped']).toContain(outcomes[1]);
    expect(stub.countCalls(decisionUrl(ADA))).toBe(1);
    expect(await pipeline.contentStore.listVersions(ADA)).toHaveLength(1);
  });

  it('reports an identifier leased by a live worker as in flight', async () => {
    await pipeline.stateStore.createIfAbsent({
      ...initialState(ADA),
      stage: 'fetching',
      lease: { owner: 'other-worker', acquiredAt: '2024-01-01T00:00:00.000Z', expiresAt: '2999-01-01T00:00:00.000Z' },
    });

    const result = await pipeline.coordinator.process(ADA);

    expect(result).toEqual({ ada: ADA, outcome: 'in_flight', stage: 'fetching', reason: 'leased by other-worker' });
    expect(stub.calls).toHaveLength(0);
  });

  it('takes over an expired lease and recovers the interrupted stage', async () => {
    await pipeline.stateStore.createIfAbsent({
      ...initialState(ADA),
      stage: 'fetching',
      attempts: 1,
      lease: { owner: 'crashed-worker', acquiredAt: '2000-01-01T00:00:00.000Z', expiresAt: '2000-01-01T00:10:00.000Z' },
    });

    const result = await pipeline.coordinator.process(ADA);

    expect(result.outcome).toBe('complete');
    expect((await pipeline.stateStore.get(ADA))?.lease).toBeNull();
  });

  it('takes over a lease left by a process that no longer exists', async () => {
    await pipeline.stateStore.createIfAbsent({
      ...initialState(ADA),
      stage: 'fetching',
      attempts: 1,
      lease: {
        owner: 'crashed-worker:01',
        acquiredAt: new Date().toISOString(),
        expiresAt: '2999-01-01T00:00:00.000Z',
        pid: exitedPid(),
        hostname: os.hostname(),
      },
    });

    const result = await pipeline.coordinator.process(ADA);

    expect(result).toEqual({ ada: ADA, outcome: 'complete', stage: 'complete' });
    expect((await pipeline.stateStore.get(ADA))?.lease).toBeNull();
  });

  it('honours a lease held by another live process', async () => {
    await pipeline.stateStore.createIfAbsent({
      ...initialState(ADA),
      stage: 'extracting',
      lease: {
        owner: 'live-worker',
        acquiredAt: new Date().toISOString(),
        expiresAt: '2999-01-01T00:00:00.000Z',
        pid: process.ppid,
        hostname: os.hostname(),
      },
    });

    const result = await pipeline.coordinator.process(ADA);

    expect(result).toEqual({ ada: ADA, outcome: 'in_flight', stage: 'extracting', reason: 'leased by live-worker' });
    expect(stub.calls).toHaveLength(0);
  });

  it('degrades the record for wrongly typed optional fields instead of failing', async () => {
    stub.decision(ADA, {
      ...envelope,
      unitIds: '6104001',
      signerIds: { id: 5 },
      thematicCategoryIds: 'ΑΓΡ',
      extraFieldValues: 'n/a',
    });

    const result = await pipeline.coordinator.process(ADA);

    expect(result).toEqual({ ada: ADA, outcome: 'complete', stage: 'complete' });
    const record = await pipeline.recordStore.get(ADA);
    expect(record?.unitIds).toEqual(['6104001']);
    expect(record?.fieldStatus.unitIds).toBe('present');
    expect(record?.signatories).toEqual([]);
    expect(record?.fieldStatus.signatories).toBe('invalid');
    expect(record?.classificationTags).toEqual(['ΑΓΡ']);
    expect(record?.fieldStatus.financialAmounts).toBe('empty');
  });

  it('rebuilds an identical record from the same inputs', async () => {
    await pipeline.coordinator.process(ADA);
    const first = await pipeline.recordStore.get(ADA);

    await pipeline.coordinator.process(ADA, { refresh: true });

    const versions = await pipeline.contentStore.listVersions(ADA);
    expect(first?.normalizedAt).toBe(versions[0].retrievedAt);
    expect(await pipeline.recordStore.get(ADA)).toEqual(first);
  });

  it('still produces a record when extraction fails', async () => {
    await pipeline.close();
    pipeline = createPipeline(testPipelineOptions(stub, dataDir, { native: new FakeNativeExtractor(), ocr: null }));

    const result = await pipeline.coordinator.process(ADA);

    expect(result.outcome).toBe('complete');
    const state = await pipeline.stateStore.get(ADA);
    expect(state?.extractionFailed).toBe(true);
    expect(state?.extractedText).toBeNull();
    const record = await pipeline.recordStore.get(ADA);
    expect(record?.flags).toEqual(['extraction_failed']);
    expect(record?.extractedTextRef).toBeNull();
    expect(record?.fieldStatus.extractedText).toBe('missing');
  });

  it('marks a permanently missing decision failed and skips it afterwards', async () => {
    const missing = 'ΧΧΧ-404';

    const first = await pipeline.coordinator.process(missing);

    expect(first.outcome).toBe('failed');
    expect(first.stage).toBe('failed');
    expect(first.reason).toMatch(/404/);
    const state = await pipeline.stateStore.get(missing);
    expect(state?.failure?.stage).toBe('fetching');
    expect(state?.lastError?.code).toBe('permanent_fetch');
    expect(stub.countCalls(decisionUrl(missing))).toBe(1);

    const second = await pipeline.coordinator.process(missing);
    expect(second.outcome).toBe('skipped');
    expect(second.stage).toBe('failed');
    expect(stub.countCalls(decisionUrl(missing))).toBe(1);
  });

  it('retries a failed identifier on request', async () => {
    const flaky = 'ΥΥΥ-1';
    await pipeline.coordinator.process(flaky);
    stub.decision(flaky, { ...envelope, ada: flaky });

    const result = await pipeline.coordinator.process(flaky, { retryFailed: true });

    expect(result.outcome).toBe('complete');
    const state = await pipeline.stateStore.get(flaky);
    expect(state?.failure).toBeNull();
  });

  it('fails after transient errors exhaust the retry bound', async () => {
    stub.fail(decisionUrl(ADA), 503, 3);

    const result = await pipeline.coordinator.process(ADA);

    expect(result.outcome).toBe('failed');
    expect(stub.countCalls(decisionUrl(ADA))).toBe(3);
    const state = await pipeline.stateStore.get(ADA);
    expect(state?.lastError?.code).toBe('transient_fetch');
    // One for entering the stage, one per retry
    expect(state?.attempts).toBe(3);
  });

  it('retries OCR that fails transiently', async () => {
    const ocr = new FakeOcrEngine(['Σελίδα ένα']);
    ocr.queuedFailures.push(new TransientExtractionError('OCR request failed: 503'));
    await pipeline.close();
    pipeline = createPipeline(testPipelineOptions(stub, dataDir, { native: new FakeNativeExtractor(), ocr }));

    const result = await pipeline.coordinator.process(ADA);

    expect(result.outcome).toBe('complete');
    expect(ocr.requests).toHaveLength(2);
    const record = await pipeline.recordStore.get(ADA);
    expect(record?.extractedTextRef?.method).toBe('ocr');
    expect(record?.flags).not.toContain('extraction_failed');
  });

  it('fails on OCR that stays unavailable and resumes at extraction on retry', async () => {
    const ocr = new FakeOcrEngine(['Σελίδα ένα']);
    ocr.failWith = new TransientExtractionError('OCR request failed: 429');
    await pipeline.close();
    pipeline = createPipeline(testPipelineOptions(stub, dataDir, { native: new FakeNativeExtractor(), ocr }));

    const first = await pipeline.coordinator.process(ADA);

    expect(first.outcome).toBe('failed');
    expect(ocr.requests).toHaveLength(2);
    const failed = await pipeline.stateStore.get(ADA);
    expect(failed?.failure?.stage).toBe('extracting');
    expect(failed?.lastError?.code).toBe('transient_extraction');
    expect(await pipeline.recordStore.get(ADA)).toBeNull();

    ocr.failWith = null;
    const retried = await pipeline.coordinator.process(ADA, { retryFailed: true });

    expect(retried.outcome).toBe('complete');
    expect(ocr.requests).toHaveLength(3);
    expect(stub.countCalls(decisionUrl(ADA))).toBe(1);
    expect((await pipeline.recordStore.get(ADA))?.extractedTextRef?.method).toBe('ocr');
  });
});

describe('Coordinator lease renewal', () => {
  let dataDir: string;
  let stub: PortalStub;

  beforeAll(() => silenceLogs());

  beforeEach(() => {
    dataDir = makeTempDir();
    stub = new PortalStub().decision(ADA, envelope).document(DOC_URL, BYTES);
  });

  afterEach(() => removeDir(dataDir));

  it('renews the lease while a long stage runs', async () => {
    const observed: PipelineState[] = [];
    let pipeline: Pipeline | null = null;
    const slow: NativeTextExtractor = {
      name: 'slow-native',
      extract: async () => {
        for (let i = 0; i < 100; i++) {
          const state = await pipeline?.stateStore.get(ADA);
          if (state) {
            observed.push(state);
            if (state.revision > observed[0].revision) break;
          }
          await new Promise((resolve) => setTimeout(resolve, 10));
        }
        return { pages: [GREEK_PAGE] };
      },
    };
    pipeline = createPipeline(testPipelineOptions(stub, dataDir, { native: slow, leaseTtlMs: 60 }));

    try {
      const result = await pipeline.coordinator.process(ADA);

      expect(result.outcome).toBe('complete');
      const first = observed[0];
      const last = observed[observed.length - 1];
      expect(first.stage).toBe('extracting');
      expect(last.stage).toBe('extracting');
      expect(last.revision).toBeGreaterThan(first.revision);
      expect(last.lease?.owner).toBe(first.lease?.owner);
      expect(Date.parse(last.lease?.expiresAt ?? '')).toBeGreaterThan(Date.parse(first.lease?.expiresAt ?? ''));
    } finally {
      await pipeline.close();
    }
  });

  it('gives the identifier up when another worker takes the lease mid-stage', async () => {
    let pipeline: Pipeline | null = null;
    const stealLease = async (): Promise<void> => {
      for (let tries = 0; tries < 5; tries++) {
        const current = await pipeline?.stateStore.get(ADA);
        if (!pipeline || !current) return;
        try {
          await pipeline.stateStore.compareAndSet(
            {
              ...current,
              lease: { owner: 'new-owner', acquiredAt: current.updatedAt, expiresAt: '2999-01-01T00:00:00.000Z' },
            },
            current.revision
          );
          return;
        } catch (error) {
          if (!(error instanceof StateConflictError)) throw error;
        }
      }
    };
    const stealing: NativeTextExtractor = {
      name: 'stealing-native',
      extract: async (_bytes, signal) => {
        await stealLease();
        await waitForAbort(signal, 2000);
        throw new CancelledError();
      },
    };
    pipeline = createPipeline(testPipelineOptions(stub, dataDir, { native: stealing, leaseTtlMs: 60 }));

    try {
      const result = await pipeline.coordinator.process(ADA);

      expect(result).toEqual({
        ada: ADA,
        outcome: 'in_flight',
        stage: 'pending',
        reason: 'lease taken over by another worker',
      });
      expect((await pipeline.stateStore.get(ADA))?.lease?.owner).toBe('new-owner');
    } finally {
      await pipeline.close();
    }
  });
});

describe('Scanned decision with sparse metadata', () => {
  const SCANNED = '123456/ΑΒΓ1Ψ-ΞΩΖ';
  const SCAN_URL = documentUrl('scan.pdf');
  const SCAN = fakePdf('scanned two pages');
  let dataDir: string;

  beforeAll(() => silenceLogs());
  beforeEach(() => {
    dataDir = makeTempDir();
  });
  afterEach(() => removeDir(dataDir));

  it('falls back to OCR and stores a partial record', async () => {
    const stub = new PortalStub()
      .decision(SCANNED, { ada: SCANNED, issueDate: '2024-03-15', documentUrl: SCAN_URL })
      .document(SCAN_URL, SCAN);
    const ocr = new FakeOcrEngine(['Σελίδα ένα', 'Σελίδα δύο']);
    const pipeline = createPipeline(
      testPipelineOptions(stub, dataDir, {
        native: new FakeNativeExtractor({ [SCAN.toString('utf-8')]: ['', ''] }),
        ocr,
      })
    );

    try {
      const result = await pipeline.coordinator.process(SCANNED);
      expect(result.outcome).toBe('complete');

      const versions = await pipeline.contentStore.listVersions(SCANNED);
      expect(versions).toHaveLength(1);
      expect(versions[0].path.startsWith(`raw/${encodeURIComponent(SCANNED)}/v0001-`)).toBe(true);
      expect(ocr.requests).toHaveLength(1);

      const record = await pipeline.recordStore.get(SCANNED);
      expect(record?.completeness).toBe('partial');
      expect(record?.issueDate).toBe('2024-03-15');
      expect(record?.subject).toBeNull();
      expect(record?.fieldStatus.subject).toBe('missing');
      expect(record?.extractedTextRef?.method).toBe('ocr');
      expect(record?.extractedTextRef?.qualityClass).toBe('low');
      expect(record?.flags).toEqual(['low_quality_text']);
    } finally {
      await pipeline.close();
    }
  });
});
