/**
 * Concurrent page processing
 *
 * `concurrency` lanes pull pages from a shared source. Each lane owns a
 * PageExtractor and yields to the event loop between pages. Results are
 * re-ordered so they come out in input order. Lanes run at most
 * `2 * concurrency` pages ahead of the consumer.
 *
 * @module pipeline/pool
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { PageExtractor, type PageExtractorOptions, type PageResult, type PageSource } from './page-extractor.js';
import { RuleBook } from '../extract/index.js';
import { ExtractionAbortedError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('extract:pool');

export interface PoolOptions extends Omit<PageExtractorOptions, 'worker'> {
  /** Number of lanes (default: the config's concurrency) */
  concurrency?: number | undefined;
  signal?: AbortSignal | undefined;
}

/** Statistics of a finished run */
export interface PoolStats {
  pages: number;
  entries: number;
  diagnostics: number;
  elapsedMs: number;
}

async function* each<T>(source: Iterable<T> | AsyncIterable<T>): AsyncGenerator<T> {
  yield* source;
}

/**
 * Extract every page of `pages`
 *
 * Stops with the first fatal error (store unavailable, cancellation);
 * results of pages still in flight are dropped.
 *
 * @example
 * ```typescript
 * for await (const result of runPool(pages, { store, config, concurrency: 4 })) {
 *   for (const entry of result.entries) process.stdout.write(JSON.stringify(entry) + '\n');
 * }
 * ```
 */
export async function* runPool(
  pages: Iterable<PageSource> | AsyncIterable<PageSource>,
  options: PoolOptions
): AsyncGenerator<PageResult, PoolStats, unknown> {
  const { signal } = options;
  const concurrency = Math.max(1, options.concurrency ?? options.config.concurrency);
  const rules = options.rules ?? new RuleBook(options.config);
  const source = each(pages);
  const startTime = Date.now();
  const stats: PoolStats = { pages: 0, entries: 0, diagnostics: 0, elapsedMs: 0 };

  const ready = new Map<number, PageResult>();
  let claimed = 0;
  let emitted = 0;
  const readAhead = 2 * concurrency;
  /** Index one past the last page, once the source is exhausted */
  let end = Infinity;
  let failure: { error: unknown } | undefined;
  let stopped = false;
  let finished = false;
  let wake: (() => void) | undefined;
  const notify = (): void => {
    const resolve = wake;
    wake = undefined;
    resolve?.();
  };
  // Lanes parked until the consumer takes a result
  const parked: Array<() => void> = [];
  const unpark = (): void => {
    for (const resolve of parked.splice(0)) resolve();
  };

  const lanes = Array.from({ length: concurrency }, async (_, worker) => {
    const extractor = new PageExtractor({ ...options, rules, worker });
    const laneLog = log.withFields({ worker });
    let done = 0;
    while (!stopped && failure === undefined) {
      if (signal?.aborted) throw new ExtractionAbortedError('extraction run aborted');
      if (claimed - emitted >= readAhead) {
        await new Promise<void>(resolve => parked.push(resolve));
        continue;
      }
      // Claim the index before awaiting, so indexes follow source order
      const index = claimed++;
      const next = await source.next();
      if (next.done) {
        end = Math.min(end, index);
        break;
      }
      await yieldToEventLoop();
      if (stopped) return;
      if (signal?.aborted) throw new ExtractionAbortedError('extraction run aborted');
      ready.set(index, extractor.extract(next.value, signal));
      done++;
      notify();
    }
    laneLog.debug('Lane finished', { pages: done });
  });

  const settled = Promise.all(lanes).then(
    () => {
      finished = true;
      notify();
    },
    (error: unknown) => {
      failure ??= { error };
      notify();
    }
  );

  try {
    while (emitted < end) {
      const result = ready.get(emitted);
      if (result) {
        ready.delete(emitted);
        emitted++;
        unpark();
        stats.pages++;
        stats.entries += result.entries.length;
        stats.diagnostics += result.diagnostics.length;
        yield result;
        continue;
      }
      if (failure) throw failure.error;
      if (finished) break;
      await new Promise<void>(resolve => {
        wake = resolve;
      });
    }
  } finally {
    stopped = true;
    unpark();
    await settled;
  }

  stats.elapsedMs = Date.now() - startTime;
  log.info('Extraction run finished', { ...stats });
  return stats;
}
