/**
 * Test Helpers
 *
 * In-process stand-ins for the portal and the text extractors, plus temp
 * directory handling. Nothing here touches the network.
 */

import { spawnSync } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  createRateLimiter,
  type NativeTextExtractor,
  type NativeTextResult,
  type OcrEngine,
  type OcrRequest,
  type OcrResult,
  type PipelineOptions,
  PortalClient,
} from '@decision-corpus/pipeline';
import { createRetryPolicy, type MetadataEnvelope } from '@decision-corpus/shared';

export const PORTAL_URL = 'https://portal.test';

/**
 * Silence the JSON logger for the current test file.
 */
export function silenceLogs(): void {
  for (const method of ['log', 'warn', 'error', 'debug'] as const) {
    jest.spyOn(console, method).mockImplementation(() => undefined);
  }
}

export function makeTempDir(prefix = 'decision-corpus-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function decisionUrl(ada: string): string {
  return `${PORTAL_URL}/opendata/decisions/${encodeURIComponent(ada)}`;
}

export function documentUrl(name: string): string {
  return `${PORTAL_URL}/doc/${name}`;
}

interface StubResponse {
  status: number;
  body: string | Buffer;
  headers: Record<string, string>;
}

type Route = StubResponse | ((url: string) => StubResponse);

/**
 * Programmable portal. Routes are matched on the full URL; queued failures
 * are served before the route itself.
 */
export class PortalStub {
  readonly calls: string[] = [];
  private readonly routes = new Map<string, Route>();
  private readonly failures = new Map<string, StubResponse[]>();
  private readonly networkErrors = new Map<string, number>();

  decision(ada: string, envelope: MetadataEnvelope): this {
    return this.json(decisionUrl(ada), envelope);
  }

  json(url: string, body: unknown, status = 200): this {
    this.routes.set(url, { status, body: JSON.stringify(body), headers: { 'content-type': 'application/json' } });
    return this;
  }

  document(url: string, bytes: Buffer, contentType = 'application/pdf'): this {
    this.routes.set(url, { status: 200, body: bytes, headers: { 'content-type': contentType } });
    return this;
  }

  route(url: string, handler: (url: string) => StubResponse): this {
    this.routes.set(url, handler);
    return this;
  }

  /** Serve `status` for the next `times` requests to `url` */
  fail(url: string, status: number, times = 1, headers: Record<string, string> = {}): this {
    const queued = this.failures.get(url) ?? [];
    for (let i = 0; i < times; i++) {
      queued.push({ status, body: `error ${status}`, headers });
    }
    this.failures.set(url, queued);
    return this;
  }

  /** Reject the next `times` requests to `url` as a network failure */
  dropConnection(url: string, times = 1): this {
    this.networkErrors.set(url, (this.networkErrors.get(url) ?? 0) + times);
    return this;
  }

  countCalls(url: string): number {
    return this.calls.filter((call) => call === url).length;
  }

  readonly fetchImpl = async (input: string, init?: RequestInit): Promise<Response> => {
    this.calls.push(input);
    if (init?.signal?.aborted) {
      throw new Error('The operation was aborted');
    }

    const drops = this.networkErrors.get(input) ?? 0;
    if (drops > 0) {
      this.networkErrors.set(input, drops - 1);
      throw new TypeError('fetch failed');
    }

    const queued = this.failures.get(input);
    const failure = queued?.shift();
    const route = this.routes.get(input);
    const response: StubResponse = failure ??
      (typeof route === 'function' ? route(input) : route) ?? {
        status: 404,
        body: 'not found',
        headers: {},
      };

    return new Response(response.body, { status: response.status, headers: response.headers });
  };
}

/**
 * Portal client over a stub with a limiter generous enough not to slow tests.
 */
export function createTestClient(stub: PortalStub): PortalClient {
  return new PortalClient({
    baseUrl: PORTAL_URL,
    timeoutMs: 5000,
    limiter: createRateLimiter(1000, 1000),
    fetchImpl: stub.fetchImpl,
  });
}

/**
 * Native extractor returning canned pages keyed by the document's bytes.
 */
export class FakeNativeExtractor implements NativeTextExtractor {
  readonly name = 'fake-native';
  calls = 0;

  constructor(private readonly pagesByContent: Record<string, string[]> = {}, private readonly fallback: string[] = ['']) {}

  async extract(bytes: Uint8Array): Promise<NativeTextResult> {
    this.calls += 1;
    const key = Buffer.from(bytes).toString('utf-8');
    if (key.startsWith('%CORRUPT')) {
      throw new Error('Invalid PDF structure');
    }
    return { pages: this.pagesByContent[key] ?? this.fallback };
  }
}

/**
 * OCR engine returning canned pages, or failing when told to.
 */
export class FakeOcrEngine implements OcrEngine {
  readonly name = 'fake-ocr';
  readonly requests: OcrRequest[] = [];
  failWith: Error | null = null;
  /** Errors thrown by the next requests, one each, before `failWith` applies */
  readonly queuedFailures: Error[] = [];

  constructor(private readonly pages: string[]) {}

  async recognize(_bytes: Uint8Array, request: OcrRequest): Promise<OcrResult> {
    this.requests.push(request);
    const queued = this.queuedFailures.shift();
    if (queued) {
      throw queued;
    }
    if (this.failWith) {
      throw this.failWith;
    }
    return { pages: this.pages };
  }
}

/** A paragraph of native Greek text long enough to count as a real text layer */
export const GREEK_PAGE =
  'ΑΠΟΦΑΣΗ\nΟ Δήμαρχος έχοντας υπόψη τις διατάξεις του νόμου αποφασίζει την έγκριση ' +
  'της δαπάνης για την προμήθεια αναλωσίμων υλικών του δημοτικού καταστήματος.';

/**
 * File-backed pipeline over the stub portal, without backoff delays.
 */
export function testPipelineOptions(
  stub: PortalStub,
  dataDir: string,
  overrides: Pick<PipelineOptions, 'native' | 'ocr' | 'workerId' | 'leaseTtlMs'> = {}
): PipelineOptions {
  return {
    dataDir,
    stateBackend: 'file',
    recordBackend: 'file',
    portalClient: createTestClient(stub),
    fetchRetryPolicy: createRetryPolicy({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 }),
    ocrRetryPolicy: createRetryPolicy({ maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 }),
    leaseTtlMs: overrides.leaseTtlMs,
    native: overrides.native ?? new FakeNativeExtractor(),
    ocr: overrides.ocr ?? null,
    workerId: overrides.workerId ?? 'test-worker',
  };
}

export function fakePdf(label: string): Buffer {
  return Buffer.from(`%PDF-1.4 ${label}`, 'utf-8');
}

/** Pid of a process that has already exited */
export function exitedPid(): number {
  return spawnSync(process.execPath, ['-e', '']).pid;
}

/** Resolve once `signal` aborts, or after `timeoutMs` */
export function waitForAbort(signal: AbortSignal | undefined, timeoutMs: number): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, timeoutMs);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true }
    );
  });
}
