/**
 * Postgres-backed PipelineState store (table `pipeline_state`).
 *
 * Compare-and-set is a conditional UPDATE on the revision column, so it holds
 * across every worker process sharing the database.
 */

import type { Pool } from 'pg';
import { StateConflictError, StorageError, type PipelineState } from '@decision-corpus/shared';
import { timedQuery } from '../store/db';
import { isPipelineState, type PipelineStateStore } from './state-store';

interface StateRow {
  state: unknown;
}

function toState(row: StateRow): PipelineState {
  if (!isPipelineState(row.state)) {
    throw new StorageError('Malformed pipeline_state row');
  }
  return row.state;
}

function wrap(error: unknown, action: string): Error {
  if (error instanceof StorageError || error instanceof StateConflictError) {
    return error;
  }
  return new StorageError(`${action} failed`, false, { cause: error });
}

export class PgPipelineStateStore implements PipelineStateStore {
  constructor(private readonly pool: Pool) {}

  async assertAvailable(): Promise<void> {
    try {
      await timedQuery(this.pool, 'ping', 'SELECT 1');
    } catch (error) {
      throw new StorageError('State database is unreachable', true, { cause: error });
    }
  }

  async get(ada: string): Promise<PipelineState | null> {
    try {
      const result = await timedQuery<StateRow>(
        this.pool,
        'state_get',
        'SELECT state FROM pipeline_state WHERE ada = $1',
        [ada]
      );
      return result.rows[0] ? toState(result.rows[0]) : null;
    } catch (error) {
      throw wrap(error, `Reading state for ${ada}`);
    }
  }

  async createIfAbsent(state: PipelineState): Promise<PipelineState> {
    try {
      await timedQuery(
        this.pool,
        'state_create',
        `INSERT INTO pipeline_state (ada, stage, revision, state, updated_at)
         VALUES ($1, $2, $3, $4, now())
         ON CONFLICT (ada) DO NOTHING`,
        [state.ada, state.stage, state.revision, JSON.stringify(state)]
      );
    } catch (error) {
      throw wrap(error, `Creating state for ${state.ada}`);
    }
    const stored = await this.get(state.ada);
    if (!stored) {
      throw new StorageError(`State for ${state.ada} vanished after insert`);
    }
    return stored;
  }

  async compareAndSet(next: PipelineState, expectedRevision: number): Promise<PipelineState> {
    const stored: PipelineState = { ...next, revision: expectedRevision + 1 };
    try {
      const result = await timedQuery(
        this.pool,
        'state_cas',
        `UPDATE pipeline_state
            SET stage = $2, revision = $3, state = $4, updated_at = now()
          WHERE ada = $1 AND revision = $5`,
        [stored.ada, stored.stage, stored.revision, JSON.stringify(stored), expectedRevision]
      );
      if (result.rowCount !== 1) {
        throw new StateConflictError(next.ada, expectedRevision);
      }
      return stored;
    } catch (error) {
      throw wrap(error, `Updating state for ${next.ada}`);
    }
  }

  async list(): Promise<PipelineState[]> {
    try {
      const result = await timedQuery<StateRow>(
        this.pool,
        'state_list',
        'SELECT state FROM pipeline_state ORDER BY ada'
      );
      return result.rows.map(toState);
    } catch (error) {
      throw wrap(error, 'Listing pipeline states');
    }
  }
}
