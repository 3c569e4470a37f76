/**
 * Postgres-backed record store (table `structured_records`, see
 * db/schema/init.sql). One row per ADA, replaced whole on every write.
 */

import type { Pool } from 'pg';
import { StorageError, type StructuredRecord } from '@decision-corpus/shared';
import { timedQuery } from './db';
import { isStructuredRecord, type RecordStore } from './record-store';

interface RecordRow {
  record: unknown;
}

function toRecord(row: RecordRow): StructuredRecord {
  if (!isStructuredRecord(row.record)) {
    throw new StorageError('Malformed structured_records row');
  }
  return row.record;
}

export class PgRecordStore implements RecordStore {
  constructor(private readonly pool: Pool) {}

  async assertAvailable(): Promise<void> {
    try {
      await timedQuery(this.pool, 'ping', 'SELECT 1');
    } catch (error) {
      throw new StorageError('Record database is unreachable', true, { cause: error });
    }
  }

  async get(ada: string): Promise<StructuredRecord | null> {
    try {
      const result = await timedQuery<RecordRow>(
        this.pool,
        'record_get',
        'SELECT record FROM structured_records WHERE ada = $1',
        [ada]
      );
      return result.rows[0] ? toRecord(result.rows[0]) : null;
    } catch (error) {
      throw error instanceof StorageError ? error : new StorageError(`Reading record ${ada} failed`, false, { cause: error });
    }
  }

  async put(record: StructuredRecord): Promise<void> {
    try {
      await timedQuery(
        this.pool,
        'record_put',
        `INSERT INTO structured_records (ada, completeness, issue_date, raw_hash, record, updated_at)
         VALUES ($1, $2, $3, $4, $5, now())
         ON CONFLICT (ada) DO UPDATE SET
           completeness = EXCLUDED.completeness,
           issue_date = EXCLUDED.issue_date,
           raw_hash = EXCLUDED.raw_hash,
           record = EXCLUDED.record,
           updated_at = now()`,
        [
          record.ada,
          record.completeness,
          record.issueDate,
          record.rawDocumentRef?.hash ?? null,
          JSON.stringify(record),
        ]
      );
    } catch (error) {
      throw new StorageError(`Writing record ${record.ada} failed`, false, { cause: error });
    }
  }

  async list(): Promise<StructuredRecord[]> {
    try {
      const result = await timedQuery<RecordRow>(
        this.pool,
        'record_list',
        'SELECT record FROM structured_records ORDER BY ada'
      );
      return result.rows.map(toRecord);
    } catch (error) {
      throw error instanceof StorageError ? error : new StorageError('Listing records failed', false, { cause: error });
    }
  }
}
