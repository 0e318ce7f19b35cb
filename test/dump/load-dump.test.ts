/**
 * Tests for loading dumps into a page store
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { gzipSync } from 'node:zlib';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DUMP_HEAD, DUMP_TAIL } from './fixtures.js';
import { detectCompression, loadDump, readDump } from '../../src/dump/index.js';
import { StoreUnavailableError } from '../../src/lib/errors.js';
import { MemoryPageStore, Resolver } from '../../src/store/index.js';

describe('detectCompression', () => {
  it('should pick gzip by extension', () => {
    expect(detectCompression('dump.xml.gz')).toBe('gzip');
    expect(detectCompression('DUMP.XML.GZ')).toBe('gzip');
    expect(detectCompression('dump.xml')).toBe('none');
  });
});

describe('readDump', () => {
  it('should keep pages of the default namespaces', async () => {
    const store = new MemoryPageStore();
    const stats = await readDump(Readable.from([DUMP_HEAD, DUMP_TAIL]), store);
    expect(stats).toEqual({ pagesRead: 4, pagesKept: 3, language: 'fi' });
    expect(store.titles()).toEqual(['sortaa', 'Template:conj-table', 'Template:empty']);
    expect(store.getPage('sortaa')).toMatchObject({ language: 'fi', revisionId: 10, model: 'wikitext' });
    expect(store.getPage('Template:conj-table')?.redirect).toBe('Template:new');
  });

  it('should keep the requested namespaces only', async () => {
    const store = new MemoryPageStore();
    const stats = await readDump(Readable.from([DUMP_HEAD, DUMP_TAIL]), store, { namespaces: [2] });
    expect(stats.pagesKept).toBe(1);
    expect(store.titles()).toEqual(['User:Tester']);
  });
});

describe('loadDump', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'wiktextract-dump-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should read a gzip-compressed dump', async () => {
    const path = join(directory, 'dump.xml.gz');
    const templates = '<page><title>Template:new</title><ns>10</ns><id>5</id><revision><text>body</text></revision></page>';
    await writeFile(path, gzipSync(DUMP_HEAD + templates + DUMP_TAIL));
    const store = await loadDump(path);
    expect(store.titles()).toEqual(['sortaa', 'Template:new', 'Template:conj-table', 'Template:empty']);
    expect(new Resolver(store).resolveTemplate('conj-table')).toEqual({
      found: true,
      definition: { name: 'new', body: 'body', defaults: {} },
    });
  });

  it('should read an uncompressed dump into a given store', async () => {
    const path = join(directory, 'dump.xml');
    await writeFile(path, DUMP_HEAD + DUMP_TAIL);
    const store = new MemoryPageStore();
    expect(await loadDump(path, { store })).toBe(store);
    expect(store.size).toBe(3);
  });

  it('should fail with StoreUnavailableError for a missing file', async () => {
    const path = join(directory, 'missing.xml');
    await expect(loadDump(path)).rejects.toThrow(StoreUnavailableError);
    await expect(loadDump(path)).rejects.toThrow(`cannot read dump ${path}: `);
  });
});
