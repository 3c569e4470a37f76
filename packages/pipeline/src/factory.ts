/**
 * Wires the stages, stores and coordinator from configuration.
 */

import path from 'path';
import type { Pool } from 'pg';
import {
  config,
  logger,
  createRetryPolicy,
  type RecordBackend,
  type RetryPolicy,
  type StateBackend,
} from '@decision-corpus/shared';
import { CheckpointStore } from './checkpoint';
import { Coordinator } from './coordinator';
import { ExtractionStage } from './extraction/extraction-stage';
import { OpenAiVisionOcr, type OcrEngine } from './extraction/ocr';
import { PdfjsTextExtractor, type NativeTextExtractor } from './extraction/pdf';
import { NormalizationStage } from './normalization/normalize';
import { PortalClient, type FetchImpl } from './portal/client';
import { FetchStage } from './portal/fetch-stage';
import { FilePipelineStateStore } from './state/file-state-store';
import { PgPipelineStateStore } from './state/pg-state-store';
import type { PipelineStateStore } from './state/state-store';
import { FileContentStore } from './store/content-store';
import { createPool } from './store/db';
import { PgRecordStore } from './store/pg-record-store';
import { FileRecordStore, type RecordStore } from './store/record-store';
import { FileTextStore } from './store/text-store';

export interface PipelineOptions {
  dataDir?: string;
  stateBackend?: StateBackend;
  recordBackend?: RecordBackend;
  databaseUrl?: string;
  fetchMaxAttempts?: number;
  workerId?: string;
  fetchImpl?: FetchImpl;
  /** Replaces the client built from config (fetchImpl is then ignored) */
  portalClient?: PortalClient;
  fetchRetryPolicy?: RetryPolicy;
  ocrRetryPolicy?: RetryPolicy;
  leaseTtlMs?: number;
  native?: NativeTextExtractor;
  /** null disables OCR; defaults to the OpenAI engine when an API key is set */
  ocr?: OcrEngine | null;
}

export interface Pipeline {
  dataDir: string;
  coordinator: Coordinator;
  portalClient: PortalClient;
  contentStore: FileContentStore;
  stateStore: PipelineStateStore;
  recordStore: RecordStore;
  checkpoints: CheckpointStore;
  /** Fails with a fatal StorageError when any store is unusable */
  assertAvailable(): Promise<void>;
  close(): Promise<void>;
}

function defaultOcr(): OcrEngine | null {
  if (!config.openaiApiKey) {
    logger.warn('OPENAI_API_KEY not set, OCR fallback disabled');
    return null;
  }
  return new OpenAiVisionOcr();
}

export function createPipeline(options: PipelineOptions = {}): Pipeline {
  const dataDir = path.resolve(options.dataDir ?? config.dataDir);
  const stateBackend = options.stateBackend ?? config.stateBackend;
  const recordBackend = options.recordBackend ?? config.recordBackend;

  let pool: Pool | null = null;
  const getPool = (): Pool => {
    pool = pool ?? createPool(options.databaseUrl ?? config.databaseUrl);
    return pool;
  };

  const stateStore: PipelineStateStore =
    stateBackend === 'postgres' ? new PgPipelineStateStore(getPool()) : new FilePipelineStateStore(dataDir);
  const recordStore: RecordStore =
    recordBackend === 'postgres' ? new PgRecordStore(getPool()) : new FileRecordStore(dataDir);

  const contentStore = new FileContentStore(dataDir);
  const portalClient = options.portalClient ?? new PortalClient({ fetchImpl: options.fetchImpl });
  const fetchPolicy = options.fetchRetryPolicy ?? createRetryPolicy();
  const fetchStage = new FetchStage(
    portalClient,
    options.fetchMaxAttempts !== undefined ? { ...fetchPolicy, maxAttempts: options.fetchMaxAttempts } : fetchPolicy
  );
  const extractionStage = new ExtractionStage(
    options.native ?? new PdfjsTextExtractor(),
    options.ocr === undefined ? defaultOcr() : options.ocr,
    new FileTextStore(dataDir),
    { ocrRetryPolicy: options.ocrRetryPolicy }
  );
  const normalizationStage = new NormalizationStage(recordStore);

  const coordinator = new Coordinator({
    stateStore,
    contentStore,
    fetchStage,
    extractionStage,
    normalizationStage,
    workerId: options.workerId,
    leaseTtlMs: options.leaseTtlMs,
  });

  return {
    dataDir,
    coordinator,
    portalClient,
    contentStore,
    stateStore,
    recordStore,
    checkpoints: new CheckpointStore(dataDir),
    async assertAvailable() {
      await contentStore.assertAvailable();
      await stateStore.assertAvailable();
      await recordStore.assertAvailable();
    },
    async close() {
      await portalClient.close();
      if (pool) {
        await pool.end();
      }
    },
  };
}
