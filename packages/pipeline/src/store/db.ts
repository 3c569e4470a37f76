/**
 * Database Connection
 *
 * Shared pg pool and a timed query helper feeding the db duration histogram.
 */

import fs from 'fs';
import path from 'path';
import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { config, logger, dbQueryDurationHistogram, StorageError } from '@decision-corpus/shared';

export function createPool(connectionString: string = config.databaseUrl): Pool {
  return new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
  });
}

export async function timedQuery<R extends QueryResultRow>(
  pool: Pool,
  operation: string,
  text: string,
  values: unknown[] = []
): Promise<QueryResult<R>> {
  const end = dbQueryDurationHistogram.startTimer({ operation });
  try {
    return await pool.query<R>(text, values);
  } finally {
    end();
  }
}

function findSchemaFile(): string {
  const possiblePaths = [
    // Relative to pipeline package sources
    path.join(__dirname, '../../../../db/schema/init.sql'),
    // Relative to compiled output under dist/
    path.join(__dirname, '../../../../../db/schema/init.sql'),
    path.join(process.cwd(), 'db/schema/init.sql'),
  ];
  const found = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new StorageError(`Schema file init.sql not found (looked in ${possiblePaths.join(', ')})`, true);
  }
  return found;
}

/**
 * Create the pipeline_state and structured_records tables. Idempotent.
 */
export async function initSchema(pool: Pool): Promise<void> {
  const schemaPath = findSchemaFile();
  logger.info('Running database schema (init.sql)', { path: schemaPath });
  const sql = fs.readFileSync(schemaPath, 'utf-8');
  try {
    await timedQuery(pool, 'init_schema', sql);
  } catch (error) {
    throw new StorageError('Schema init failed', true, { cause: error });
  }
  logger.info('Database schema complete');
}
