/**
 * Tests for the concurrent page pool
 */

import { describe, it, expect } from 'vitest';
import { testConfig } from '../extract/fixtures.js';
import { ExtractionAbortedError } from '../../src/lib/errors.js';
import { runPool, type PageResult, type PageSource, type PoolOptions, type PoolStats } from '../../src/pipeline/index.js';
import { MemoryPageStore } from '../../src/store/index.js';

function pages(count: number): PageSource[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `p${i}`,
    text: `== Finnish ==\n=== Verb ===\n# sense ${i}`,
  }));
}

function options(extra: Partial<PoolOptions> = {}): PoolOptions {
  return { store: new MemoryPageStore(), config: testConfig(), ...extra };
}

async function drain(
  source: Iterable<PageSource> | AsyncIterable<PageSource>,
  poolOptions: PoolOptions
): Promise<{ results: PageResult[]; stats: PoolStats }> {
  const results: PageResult[] = [];
  const run = runPool(source, poolOptions);
  for (let next = await run.next(); ; next = await run.next()) {
    if (next.done) return { results, stats: next.value };
    results.push(next.value);
  }
}

describe('runPool', () => {
  it('should emit results in input order', async () => {
    const { results, stats } = await drain(pages(7), options({ concurrency: 3 }));
    expect(results.map(result => result.title)).toEqual(['p0', 'p1', 'p2', 'p3', 'p4', 'p5', 'p6']);
    expect(results.map(result => result.entries[0]?.senses[0]?.gloss)).toEqual([
      'sense 0',
      'sense 1',
      'sense 2',
      'sense 3',
      'sense 4',
      'sense 5',
      'sense 6',
    ]);
    expect(stats).toMatchObject({ pages: 7, entries: 7, diagnostics: 0 });
  });

  it('should read from an async source', async () => {
    async function* slow(): AsyncGenerator<PageSource> {
      for (const page of pages(3)) {
        await new Promise(resolve => setTimeout(resolve, 1));
        yield page;
      }
    }
    const { results } = await drain(slow(), options({ concurrency: 2 }));
    expect(results.map(result => result.title)).toEqual(['p0', 'p1', 'p2']);
  });

  it('should not run far ahead of a stalled consumer', async () => {
    let pulled = 0;
    function* counting(): Generator<PageSource> {
      for (const page of pages(50)) {
        pulled++;
        yield page;
      }
    }
    const run = runPool(counting(), options({ concurrency: 2 }));
    const first = await run.next();
    expect(first.done).toBe(false);
    await new Promise(resolve => setTimeout(resolve, 50));
    // One emitted page plus two pages per lane
    expect(pulled).toBeLessThanOrEqual(5);

    let rest = 0;
    for (let next = await run.next(); !next.done; next = await run.next()) rest++;
    expect(rest).toBe(49);
    expect(pulled).toBe(50);
  });

  it('should finish an empty source', async () => {
    const { results, stats } = await drain([], options());
    expect(results).toEqual([]);
    expect(stats.pages).toBe(0);
  });

  it('should count diagnostics of every page', async () => {
    const source = [{ title: 'x', text: '== Klingon ==\n=== Verb ===\n# a {{nope}}' }];
    const { stats } = await drain(source, options());
    expect(stats).toMatchObject({ pages: 1, entries: 1, diagnostics: 2 });
  });

  it('should refuse to start once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(drain(pages(3), options({ signal: controller.signal }))).rejects.toThrow(ExtractionAbortedError);
  });

  it('should stop when aborted mid-run', async () => {
    const controller = new AbortController();
    const seen: string[] = [];
    const run = async (): Promise<void> => {
      for await (const result of runPool(pages(5), options({ concurrency: 1, signal: controller.signal }))) {
        seen.push(result.title);
        controller.abort();
      }
    };
    await expect(run()).rejects.toThrow(ExtractionAbortedError);
    expect(seen).toEqual(['p0']);
  });
});
