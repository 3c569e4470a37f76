/**
 * Filesystem helpers shared by the file-backed stores.
 */

import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { ulid } from 'ulid';
import { StorageError } from '@decision-corpus/shared';

/** Error codes that mean the store as a whole is unusable, not just one write. */
const FATAL_CODES = new Set(['EROFS', 'ENOSPC', 'EDQUOT']);

export function storageKey(ada: string): string {
  return encodeURIComponent(ada);
}

export function sha256(bytes: Uint8Array): string {
  return `sha256:${crypto.createHash('sha256').update(bytes).digest('hex')}`;
}

export function hashHex(hash: string): string {
  return hash.replace(/^sha256:/, '');
}

// fs errors can come from another realm (Jest sandboxes), so no instanceof Error
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return errnoCode(error) === 'ENOENT';
}

/**
 * Wrap an fs failure in a StorageError. Already-wrapped errors pass through.
 */
export function toStorageError(error: unknown, action: string): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  const code = errnoCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return new StorageError(`${action} failed: ${message}`, code !== undefined && FATAL_CODES.has(code), {
    cause: error,
  });
}

/**
 * Write via a temp file in the same directory then rename, so readers never
 * observe a partially written file.
 */
export async function writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${ulid()}.tmp`;
  try {
    await fs.promises.writeFile(tmpPath, data);
    await fs.promises.rename(tmpPath, filePath);
  } catch (error) {
    await fs.promises.rm(tmpPath, { force: true });
    throw error;
  }
}

export async function readJsonFile<T>(filePath: string, guard: (value: unknown) => value is T): Promise<T | null> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  if (!guard(parsed)) {
    throw new StorageError(`Unexpected content in ${filePath}`);
  }
  return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check that the store root exists (creating it) and is writable.
 * Any failure here is fatal for the run.
 */
export async function assertWritableDirectory(dir: string): Promise<void> {
  try {
    await fs.promises.mkdir(dir, { recursive: true });
    await fs.promises.access(dir, fs.constants.W_OK);
  } catch (error) {
    throw new StorageError(
      `Store directory ${dir} is unavailable: ${error instanceof Error ? error.message : String(error)}`,
      true,
      { cause: error }
    );
  }
}
