/**
 * Content Store
 *
 * Content-addressed, write-once persistence of raw documents. Each identifier
 * owns an append-only version chain:
 *
 *   raw/<key>/versions.json
 *   raw/<key>/v0001-<sha256>.pdf
 *   raw/<key>/v0001-<sha256>.metadata.json
 *
 * A put whose hash equals the latest version is a no-op. A different hash
 * appends a new version; earlier versions are never touched.
 */

import fs from 'fs';
import path from 'path';
import {
  logger,
  contentStoreWritesCounter,
  StorageError,
  type MetadataEnvelope,
  type RawDocument,
} from '@decision-corpus/shared';
import {
  assertWritableDirectory,
  hashHex,
  isNotFound,
  isRecord,
  readJsonFile,
  sha256,
  storageKey,
  toStorageError,
  writeFileAtomic,
} from '../lib/files';
import { KeyedMutex } from '../lib/keyed-mutex';

export interface PutDocumentInfo {
  sourceUrl: string;
  contentType: string;
  retrievedAt?: string;
  /** Envelope fetched together with the bytes; stored beside the version */
  envelope?: MetadataEnvelope;
}

export interface PutResult {
  document: RawDocument;
  /** false when the bytes matched the latest stored version */
  created: boolean;
}

interface VersionIndex {
  ada: string;
  versions: RawDocument[];
}

function isVersionIndex(value: unknown): value is VersionIndex {
  return isRecord(value) && typeof value.ada === 'string' && Array.isArray(value.versions);
}

function isEnvelope(value: unknown): value is MetadataEnvelope {
  return isRecord(value);
}

const EXTENSIONS: Record<string, string> = {
  'application/pdf': 'pdf',
  'text/plain': 'txt',
  'text/html': 'html',
};

function extensionFor(contentType: string): string {
  const base = contentType.split(';')[0].trim().toLowerCase();
  return EXTENSIONS[base] ?? 'bin';
}

export class FileContentStore {
  private readonly mutex = new KeyedMutex();

  constructor(private readonly rootDir: string) {}

  /** Dataset root the stored paths are relative to */
  get root(): string {
    return this.rootDir;
  }

  private dirFor(ada: string): string {
    return path.join('raw', storageKey(ada));
  }

  private indexPath(ada: string): string {
    return path.join(this.rootDir, this.dirFor(ada), 'versions.json');
  }

  async assertAvailable(): Promise<void> {
    await assertWritableDirectory(path.join(this.rootDir, 'raw'));
  }

  private async readIndex(ada: string): Promise<VersionIndex> {
    const index = await readJsonFile(this.indexPath(ada), isVersionIndex);
    return index ?? { ada, versions: [] };
  }

  async put(ada: string, bytes: Uint8Array, info: PutDocumentInfo): Promise<PutResult> {
    return this.mutex.runExclusive(ada, async () => {
      try {
        const hash = sha256(bytes);
        const index = await this.readIndex(ada);
        const latest = index.versions[index.versions.length - 1];

        if (latest && latest.hash === hash) {
          contentStoreWritesCounter.inc({ result: 'duplicate' });
          logger.debug('Raw document unchanged, skipping write', { version: latest.version, hash });
          return { document: latest, created: false };
        }

        const version = index.versions.length + 1;
        const stem = `v${String(version).padStart(4, '0')}-${hashHex(hash)}`;
        const relativePath = path.join(this.dirFor(ada), `${stem}.${extensionFor(info.contentType)}`);
        const metadataPath = info.envelope ? path.join(this.dirFor(ada), `${stem}.metadata.json`) : null;

        await writeFileAtomic(path.join(this.rootDir, relativePath), bytes);
        if (metadataPath && info.envelope) {
          await writeFileAtomic(
            path.join(this.rootDir, metadataPath),
            JSON.stringify(info.envelope, null, 2)
          );
        }

        const document: RawDocument = {
          ada,
          version,
          hash,
          sizeBytes: bytes.byteLength,
          sourceUrl: info.sourceUrl,
          contentType: info.contentType,
          retrievedAt: info.retrievedAt ?? new Date().toISOString(),
          path: relativePath,
          metadataPath,
        };

        // The index is written last: a crash before this point leaves an
        // unreferenced file that the next put overwrites with identical bytes.
        await writeFileAtomic(
          this.indexPath(ada),
          JSON.stringify({ ada, versions: [...index.versions, document] }, null, 2)
        );

        contentStoreWritesCounter.inc({ result: 'created' });
        logger.info('Stored raw document version', {
          version,
          hash,
          size_bytes: bytes.byteLength,
          path: relativePath,
        });

        return { document, created: true };
      } catch (error) {
        throw toStorageError(error, `Storing raw document for ${ada}`);
      }
    });
  }

  /** Latest version, or null when nothing was stored for the identifier */
  async get(ada: string): Promise<RawDocument | null> {
    const versions = await this.listVersions(ada);
    return versions[versions.length - 1] ?? null;
  }

  async getVersion(ada: string, version: number): Promise<RawDocument | null> {
    const versions = await this.listVersions(ada);
    return versions.find((doc) => doc.version === version) ?? null;
  }

  async getByHash(ada: string, hash: string): Promise<RawDocument | null> {
    const versions = await this.listVersions(ada);
    return versions.find((doc) => doc.hash === hash) ?? null;
  }

  async listVersions(ada: string): Promise<RawDocument[]> {
    try {
      return (await this.readIndex(ada)).versions;
    } catch (error) {
      throw toStorageError(error, `Reading version index for ${ada}`);
    }
  }

  /**
   * Read the bytes of a stored version, verifying them against the hash the
   * version was recorded with.
   */
  async read(document: Pick<RawDocument, 'path' | 'hash'>): Promise<Buffer> {
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(path.join(this.rootDir, document.path));
    } catch (error) {
      throw toStorageError(error, `Reading ${document.path}`);
    }
    const actual = sha256(bytes);
    if (actual !== document.hash) {
      throw new StorageError(`Hash mismatch for ${document.path}: expected ${document.hash}, found ${actual}`);
    }
    return bytes;
  }

  async readEnvelope(document: Pick<RawDocument, 'metadataPath'>): Promise<MetadataEnvelope | null> {
    if (!document.metadataPath) {
      return null;
    }
    try {
      return await readJsonFile(path.join(this.rootDir, document.metadataPath), isEnvelope);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw toStorageError(error, `Reading ${document.metadataPath}`);
    }
  }
}
