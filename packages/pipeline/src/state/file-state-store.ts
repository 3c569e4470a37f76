/**
 * File-backed PipelineState store: state/<key>.json, one file per ADA.
 *
 * Compare-and-set is a read, a revision check and an atomic rename performed
 * under a per-key mutex, which makes it linearizable for every writer in this
 * process. The single-node CLI is the only writer of a file store; multiple
 * processes must use the Postgres store instead.
 */

import fs from 'fs';
import path from 'path';
import { StateConflictError, type PipelineState } from '@decision-corpus/shared';
import {
  assertWritableDirectory,
  isNotFound,
  readJsonFile,
  storageKey,
  toStorageError,
  writeFileAtomic,
} from '../lib/files';
import { KeyedMutex } from '../lib/keyed-mutex';
import { isPipelineState, type PipelineStateStore } from './state-store';

export class FilePipelineStateStore implements PipelineStateStore {
  private readonly mutex = new KeyedMutex();

  constructor(private readonly rootDir: string) {}

  private get dir(): string {
    return path.join(this.rootDir, 'state');
  }

  private pathFor(ada: string): string {
    return path.join(this.dir, `${storageKey(ada)}.json`);
  }

  async assertAvailable(): Promise<void> {
    await assertWritableDirectory(this.dir);
  }

  private async read(ada: string): Promise<PipelineState | null> {
    try {
      return await readJsonFile(this.pathFor(ada), isPipelineState);
    } catch (error) {
      throw toStorageError(error, `Reading state for ${ada}`);
    }
  }

  private async write(state: PipelineState): Promise<void> {
    try {
      await writeFileAtomic(this.pathFor(state.ada), JSON.stringify(state, null, 2));
    } catch (error) {
      throw toStorageError(error, `Writing state for ${state.ada}`);
    }
  }

  async get(ada: string): Promise<PipelineState | null> {
    return this.read(ada);
  }

  async createIfAbsent(state: PipelineState): Promise<PipelineState> {
    return this.mutex.runExclusive(state.ada, async () => {
      const existing = await this.read(state.ada);
      if (existing) {
        return existing;
      }
      await this.write(state);
      return state;
    });
  }

  async compareAndSet(next: PipelineState, expectedRevision: number): Promise<PipelineState> {
    return this.mutex.runExclusive(next.ada, async () => {
      const current = await this.read(next.ada);
      if (!current || current.revision !== expectedRevision) {
        throw new StateConflictError(next.ada, expectedRevision);
      }
      const stored: PipelineState = { ...next, revision: expectedRevision + 1 };
      await this.write(stored);
      return stored;
    });
  }

  async list(): Promise<PipelineState[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw toStorageError(error, 'Listing pipeline states');
    }

    const states: PipelineState[] = [];
    for (const entry of entries.filter((name) => name.endsWith('.json')).sort()) {
      const state = await readJsonFile(path.join(this.dir, entry), isPipelineState);
      if (state) {
        states.push(state);
      }
    }
    return states;
  }
}
