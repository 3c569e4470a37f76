/**
 * Run checkpoint: <dataDir>/checkpoint.json.
 *
 * Holds the source cursor a `--resume` run continues from. The checkpoint is
 * tied to the source key, so resuming a different listing or manifest starts
 * from the beginning instead of at an unrelated offset.
 */

import path from 'path';
import { logger, type RunSummary } from '@decision-corpus/shared';
import { isRecord, readJsonFile, toStorageError, writeFileAtomic } from './lib/files';
import type { SourceCursor } from './identifiers/sources';

export interface Checkpoint {
  sourceKey: string;
  cursor: SourceCursor;
  updatedAt: string;
  summary: RunSummary | null;
}

function isCursor(value: unknown): value is SourceCursor {
  if (!isRecord(value)) return false;
  if (value.kind === 'list' || value.kind === 'manifest') {
    return typeof value.offset === 'number';
  }
  return value.kind === 'listing' && typeof value.page === 'number' && typeof value.index === 'number';
}

function isCheckpoint(value: unknown): value is Checkpoint {
  return isRecord(value) && typeof value.sourceKey === 'string' && isCursor(value.cursor);
}

export class CheckpointStore {
  private readonly filePath: string;

  constructor(rootDir: string) {
    this.filePath = path.join(rootDir, 'checkpoint.json');
  }

  async read(): Promise<Checkpoint | null> {
    try {
      return await readJsonFile(this.filePath, isCheckpoint);
    } catch (error) {
      throw toStorageError(error, 'Reading checkpoint');
    }
  }

  /** Cursor saved for `sourceKey`, or null */
  async load(sourceKey: string): Promise<SourceCursor | null> {
    const checkpoint = await this.read();
    if (!checkpoint) {
      return null;
    }
    if (checkpoint.sourceKey !== sourceKey) {
      logger.warn('Checkpoint belongs to a different source, starting from the beginning', {
        checkpoint_source: checkpoint.sourceKey,
        source: sourceKey,
      });
      return null;
    }
    return checkpoint.cursor;
  }

  async save(sourceKey: string, cursor: SourceCursor, summary: RunSummary | null = null): Promise<void> {
    const checkpoint: Checkpoint = { sourceKey, cursor, updatedAt: new Date().toISOString(), summary };
    try {
      await writeFileAtomic(this.filePath, JSON.stringify(checkpoint, null, 2));
    } catch (error) {
      throw toStorageError(error, 'Writing checkpoint');
    }
  }
}
