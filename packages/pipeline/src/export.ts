/**
 * Dataset export: records.jsonl (one StructuredRecord per line, sorted by
 * ADA) plus manifest.json with counts and the versions that produced them.
 */

import path from 'path';
import {
  config,
  logger,
  type Completeness,
  type ExtractionMethod,
  type StructuredRecord,
} from '@decision-corpus/shared';
import { toStorageError, writeFileAtomic } from './lib/files';
import type { RecordStore } from './store/record-store';

export interface ExportManifest {
  generatedAt: string;
  schemaVersion: StructuredRecord['schemaVersion'];
  extractorVersion: string;
  records: number;
  completeness: Record<Completeness, number>;
  extractionMethods: Record<ExtractionMethod | 'none', number>;
  files: { records: string };
}

export interface ExportOptions {
  extractorVersion?: string;
  now?: Date;
}

function byAda(a: StructuredRecord, b: StructuredRecord): number {
  return a.ada < b.ada ? -1 : a.ada > b.ada ? 1 : 0;
}

export async function exportDataset(
  recordStore: RecordStore,
  outDir: string,
  options: ExportOptions = {}
): Promise<ExportManifest> {
  const records = [...(await recordStore.list())].sort(byAda);

  const completeness: Record<Completeness, number> = { complete: 0, partial: 0, minimal: 0 };
  const extractionMethods: Record<ExtractionMethod | 'none', number> = { native: 0, ocr: 0, none: 0 };
  for (const record of records) {
    completeness[record.completeness] += 1;
    extractionMethods[record.extractedTextRef?.method ?? 'none'] += 1;
  }

  const manifest: ExportManifest = {
    generatedAt: (options.now ?? new Date()).toISOString(),
    schemaVersion: '1.0.0',
    extractorVersion: options.extractorVersion ?? config.extractorVersion,
    records: records.length,
    completeness,
    extractionMethods,
    files: { records: 'records.jsonl' },
  };

  const lines = records.map((record) => JSON.stringify(record)).join('\n');
  try {
    await writeFileAtomic(path.join(outDir, 'records.jsonl'), records.length > 0 ? `${lines}\n` : '');
    await writeFileAtomic(path.join(outDir, 'manifest.json'), `${JSON.stringify(manifest, null, 2)}\n`);
  } catch (error) {
    throw toStorageError(error, `Exporting dataset to ${outDir}`);
  }

  logger.info('Dataset exported', { out_dir: outDir, records: records.length, completeness });
  return manifest;
}
