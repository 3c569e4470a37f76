/**
 * Extracted text artifacts.
 *
 *   text/<key>/<sha256>.<method>.txt   UTF-8 plain text
 *   text/<key>/<sha256>.json           sidecar (method, quality, extractor version)
 *
 * Keyed by the raw document hash: the same bytes under the same extractor
 * version always map to the same artifact, so a hit skips extraction.
 */

import fs from 'fs';
import path from 'path';
import type { ExtractedText } from '@decision-corpus/shared';
import {
  hashHex,
  isNotFound,
  isRecord,
  readJsonFile,
  storageKey,
  toStorageError,
  writeFileAtomic,
} from '../lib/files';

type TextSidecar = Omit<ExtractedText, 'text'>;

function isSidecar(value: unknown): value is TextSidecar {
  return (
    isRecord(value) &&
    typeof value.rawHash === 'string' &&
    (value.method === 'native' || value.method === 'ocr') &&
    typeof value.extractorVersion === 'string' &&
    typeof value.path === 'string'
  );
}

export class FileTextStore {
  constructor(private readonly rootDir: string) {}

  private sidecarPath(ada: string, rawHash: string): string {
    return path.join(this.rootDir, 'text', storageKey(ada), `${hashHex(rawHash)}.json`);
  }

  textPathFor(ada: string, rawHash: string, method: ExtractedText['method']): string {
    return path.join('text', storageKey(ada), `${hashHex(rawHash)}.${method}.txt`);
  }

  /**
   * Cached extraction for these exact bytes, or null when none exists for the
   * given extractor version.
   */
  async find(ada: string, rawHash: string, extractorVersion: string): Promise<ExtractedText | null> {
    try {
      const sidecar = await readJsonFile(this.sidecarPath(ada, rawHash), isSidecar);
      if (!sidecar || sidecar.extractorVersion !== extractorVersion) {
        return null;
      }
      const text = await fs.promises.readFile(path.join(this.rootDir, sidecar.path), 'utf-8');
      return { ...sidecar, text };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw toStorageError(error, `Reading extracted text for ${ada}`);
    }
  }

  async save(extracted: ExtractedText): Promise<void> {
    const { text, ...sidecar } = extracted;
    try {
      await writeFileAtomic(path.join(this.rootDir, extracted.path), text);
      await writeFileAtomic(
        this.sidecarPath(extracted.ada, extracted.rawHash),
        JSON.stringify(sidecar, null, 2)
      );
    } catch (error) {
      throw toStorageError(error, `Writing extracted text for ${extracted.ada}`);
    }
  }
}
