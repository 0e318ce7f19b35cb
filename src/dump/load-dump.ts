/**
 * Fill a page store from a MediaWiki XML dump
 *
 * @module dump/load-dump
 */

import { createReadStream } from 'node:fs';
import type { Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';
import { createDumpParser } from './parse-dump.js';
import { NS_MAIN, NS_MODULE, NS_TEMPLATE } from '../lib/constants.js';
import { StoreUnavailableError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { MemoryPageStore } from '../store/memory-store.js';
import type { NameOptions } from '../store/names.js';

/** Namespaces kept by default: pages, templates and modules */
export const DUMP_NAMESPACES: readonly number[] = [NS_MAIN, NS_TEMPLATE, NS_MODULE];

export type DumpCompression = 'auto' | 'gzip' | 'none';

export interface LoadDumpOptions extends NameOptions {
  /** Namespaces to keep (default: 0, 10 and 828) */
  namespaces?: readonly number[] | undefined;
  /** `auto` picks gzip for `.gz` paths */
  compression?: DumpCompression | undefined;
  /** Store to fill instead of a new one */
  store?: MemoryPageStore | undefined;
  logger?: Logger | undefined;
}

/** Counters of a finished load */
export interface LoadDumpStats {
  pagesRead: number;
  pagesKept: number;
  language: string | undefined;
}

/**
 * Detect compression type from a file path
 */
export function detectCompression(path: string): Exclude<DumpCompression, 'auto'> {
  return path.toLowerCase().endsWith('.gz') ? 'gzip' : 'none';
}

/**
 * Read pages from a stream of dump bytes into `store`
 */
export async function readDump(
  input: Readable,
  store: MemoryPageStore,
  options: Pick<LoadDumpOptions, 'namespaces' | 'logger'> = {}
): Promise<LoadDumpStats> {
  const log = options.logger ?? createLogger('dump:load');
  const keep = new Set(options.namespaces ?? DUMP_NAMESPACES);
  const stats: LoadDumpStats = { pagesRead: 0, pagesKept: 0, language: undefined };

  const parser = createDumpParser({
    logger: log,
    onLanguage: language => {
      stats.language = language;
    },
    onPage: page => {
      stats.pagesRead++;
      if (!keep.has(page.namespace)) return;
      store.addPage({
        title: page.title,
        text: page.text,
        namespace: page.namespace,
        revisionId: page.revisionId,
        model: page.model,
        language: stats.language,
      });
      stats.pagesKept++;
      if (stats.pagesKept % 10000 === 0) {
        log.info('Loading dump', { pagesRead: stats.pagesRead, pagesKept: stats.pagesKept });
      }
    },
  });

  for await (const chunk of input) {
    if (typeof chunk === 'string' || Buffer.isBuffer(chunk)) parser.write(chunk);
    else if (chunk instanceof Uint8Array) parser.write(Buffer.from(chunk));
  }
  parser.end();
  return stats;
}

/**
 * Load a dump file into a MemoryPageStore
 *
 * @example
 * ```typescript
 * const store = await loadDump('enwiktionary-pages-articles.xml.gz');
 * store.titles(NS_MAIN).length;
 * ```
 */
export async function loadDump(path: string, options: LoadDumpOptions = {}): Promise<MemoryPageStore> {
  const log = options.logger ?? createLogger('dump:load');
  const compression = options.compression === undefined || options.compression === 'auto'
    ? detectCompression(path)
    : options.compression;
  const store = options.store ?? new MemoryPageStore({ capitalize: options.capitalize });
  const startTime = Date.now();

  const file = createReadStream(path);
  let input: Readable = file;
  if (compression === 'gzip') {
    const gunzip = createGunzip();
    // pipe() does not forward source errors
    file.on('error', error => gunzip.destroy(error));
    input = file.pipe(gunzip);
  }

  try {
    const stats = await readDump(input, store, { namespaces: options.namespaces, logger: log });
    log.info('Dump loaded', { ...stats, durationMs: Date.now() - startTime });
    return store;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StoreUnavailableError(`cannot read dump ${path}: ${message}`);
  }
}
