/**
 * Identifier Source Tests
 */

import fs from 'fs';
import path from 'path';
import {
  ListIdentifierSource,
  ManifestIdentifierSource,
  PortalListingSource,
  type IdentifierSource,
} from '@decision-corpus/pipeline';
import { TransientFetchError, createRetryPolicy } from '@decision-corpus/shared';
import { PORTAL_URL, PortalStub, createTestClient, makeTempDir, removeDir, silenceLogs } from './helpers';

async function drain(source: IdentifierSource): Promise<string[]> {
  const ids: string[] = [];
  for await (const ada of source) {
    ids.push(ada);
  }
  return ids;
}

function searchUrl(page: number, size: number): string {
  return `${PORTAL_URL}/opendata/search.json?page=${page}&size=${size}`;
}

describe('ListIdentifierSource', () => {
  it('yields cleaned identifiers in order and skips blanks', async () => {
    const source = new ListIdentifierSource([' Α-1 ', '', 'Α-2', '# comment', 'Α-3']);
    expect(await drain(source)).toEqual(['Α-1', 'Α-2', 'Α-3']);
    expect(await source.next()).toBeNull();
  });

  it('normalizes identifiers to NFC', async () => {
    const source = new ListIdentifierSource(['Ά-1']);
    expect(await source.next()).toBe('Ά-1');
  });

  it('resumes from a cursor', async () => {
    const first = new ListIdentifierSource(['Α-1', 'Α-2', 'Α-3']);
    await first.next();
    const cursor = first.cursor();

    expect(cursor).toEqual({ kind: 'list', offset: 1 });
    expect(await drain(new ListIdentifierSource(['Α-1', 'Α-2', 'Α-3'], cursor))).toEqual(['Α-2', 'Α-3']);
  });
});

describe('ManifestIdentifierSource', () => {
  let dir: string;
  let manifest: string;

  beforeEach(() => {
    dir = makeTempDir();
    manifest = path.join(dir, 'manifest.txt');
    fs.writeFileSync(manifest, '# decisions to ingest\nΒ-1\r\n\nΒ-2\n  Β-3  \n');
  });

  afterEach(() => removeDir(dir));

  it('reads one identifier per line, ignoring comments and blank lines', async () => {
    expect(await drain(new ManifestIdentifierSource(manifest))).toEqual(['Β-1', 'Β-2', 'Β-3']);
  });

  it('counts raw lines in its cursor and resumes after them', async () => {
    const source = new ManifestIdentifierSource(manifest);
    expect(await source.next()).toBe('Β-1');
    const cursor = source.cursor();
    source.close();

    expect(cursor).toEqual({ kind: 'manifest', offset: 2 });
    expect(await drain(new ManifestIdentifierSource(manifest, cursor))).toEqual(['Β-2', 'Β-3']);
  });
});

describe('PortalListingSource', () => {
  const policy = createRetryPolicy({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 });

  beforeAll(() => silenceLogs());

  function portal(): PortalStub {
    return new PortalStub()
      .json(searchUrl(0, 2), { decisions: [{ ada: 'Γ-1' }, { ada: 'Γ-2' }], info: { total: 3 } })
      .json(searchUrl(1, 2), { decisions: [{ ada: 'Γ-3' }], info: { total: 3 } });
  }

  it('pages through the listing until a short page', async () => {
    const stub = portal();
    const client = createTestClient(stub);

    const ids = await drain(new PortalListingSource(client, { pageSize: 2 }, undefined, { retryPolicy: policy }));

    expect(ids).toEqual(['Γ-1', 'Γ-2', 'Γ-3']);
    expect(stub.calls).toEqual([searchUrl(0, 2), searchUrl(1, 2)]);
    await client.close();
  });

  it('resumes at a page and index', async () => {
    const stub = portal();
    const client = createTestClient(stub);

    const source = new PortalListingSource(
      client,
      { pageSize: 2 },
      { kind: 'listing', page: 0, index: 1 },
      { retryPolicy: policy }
    );

    expect(await drain(source)).toEqual(['Γ-2', 'Γ-3']);
    await client.close();
  });

  it('stops at the limit', async () => {
    const stub = portal();
    const client = createTestClient(stub);
    const source = new PortalListingSource(client, { pageSize: 2, limit: 1 }, undefined, { retryPolicy: policy });

    expect(await drain(source)).toEqual(['Γ-1']);
    expect(source.cursor()).toEqual({ kind: 'listing', page: 0, index: 1 });
    await client.close();
  });

  it('retries a transient listing failure', async () => {
    const stub = portal().fail(searchUrl(0, 2), 503, 1);
    const client = createTestClient(stub);

    const ids = await drain(new PortalListingSource(client, { pageSize: 2 }, undefined, { retryPolicy: policy }));

    expect(ids).toEqual(['Γ-1', 'Γ-2', 'Γ-3']);
    expect(stub.countCalls(searchUrl(0, 2))).toBe(2);
    await client.close();
  });

  it('surfaces a listing that keeps failing', async () => {
    const stub = portal().fail(searchUrl(0, 2), 503, 3);
    const client = createTestClient(stub);
    const source = new PortalListingSource(client, { pageSize: 2 }, undefined, { retryPolicy: policy });

    await expect(source.next()).rejects.toBeInstanceOf(TransientFetchError);
    await client.close();
  });
});
