/**
 * Structured record persistence.
 *
 * Records are only ever replaced whole, never patched field by field.
 */

import fs from 'fs';
import path from 'path';
import type { StructuredRecord } from '@decision-corpus/shared';
import {
  assertWritableDirectory,
  isNotFound,
  isRecord,
  readJsonFile,
  storageKey,
  toStorageError,
  writeFileAtomic,
} from '../lib/files';

export interface RecordStore {
  get(ada: string): Promise<StructuredRecord | null>;
  /** Full replacement of the record for `record.ada` */
  put(record: StructuredRecord): Promise<void>;
  list(): Promise<StructuredRecord[]>;
  assertAvailable(): Promise<void>;
}

export function isStructuredRecord(value: unknown): value is StructuredRecord {
  return (
    isRecord(value) &&
    typeof value.ada === 'string' &&
    typeof value.completeness === 'string' &&
    Array.isArray(value.classificationTags)
  );
}

export class FileRecordStore implements RecordStore {
  constructor(private readonly rootDir: string) {}

  private get dir(): string {
    return path.join(this.rootDir, 'records');
  }

  private pathFor(ada: string): string {
    return path.join(this.dir, `${storageKey(ada)}.json`);
  }

  async assertAvailable(): Promise<void> {
    await assertWritableDirectory(this.dir);
  }

  async get(ada: string): Promise<StructuredRecord | null> {
    try {
      return await readJsonFile(this.pathFor(ada), isStructuredRecord);
    } catch (error) {
      throw toStorageError(error, `Reading record ${ada}`);
    }
  }

  async put(record: StructuredRecord): Promise<void> {
    try {
      await writeFileAtomic(this.pathFor(record.ada), `${JSON.stringify(record, null, 2)}\n`);
    } catch (error) {
      throw toStorageError(error, `Writing record ${record.ada}`);
    }
  }

  async list(): Promise<StructuredRecord[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw toStorageError(error, 'Listing records');
    }

    const records: StructuredRecord[] = [];
    for (const entry of entries.filter((name) => name.endsWith('.json')).sort()) {
      const record = await readJsonFile(path.join(this.dir, entry), isStructuredRecord);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }
}
