/**
 * Extract Command
 *
 * Load a dump, extract every main-namespace page and write the entries as
 * JSON lines.
 */

import { Command } from 'commander';
import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { openSession, type SessionOptions } from './session.js';
import { color, fatal, formatDuration, formatNumber, parseCount, resolvePath } from './utils.js';
import type { DiagnosticKind } from '../lib/diagnostics.js';
import { NS_MAIN } from '../lib/constants.js';
import { runPool, type PageSource } from '../pipeline/index.js';
import type { MemoryPageStore } from '../store/memory-store.js';

/** Extract command options */
interface ExtractOptions extends SessionOptions {
  output?: string;
  diagnostics?: string;
  limit?: string;
}

/**
 * Main-namespace pages of a store, redirects skipped
 */
export function* mainPages(store: MemoryPageStore, limit = Infinity): Generator<PageSource> {
  let count = 0;
  for (const title of store.titles(NS_MAIN)) {
    if (count >= limit) return;
    const page = store.getPage(title);
    if (!page || page.redirect !== undefined) continue;
    count++;
    yield page;
  }
}

/** Write a line, waiting when the stream buffer is full */
async function writeLine(stream: Writable, value: unknown): Promise<void> {
  if (!stream.write(`${JSON.stringify(value)}\n`)) {
    await once(stream, 'drain');
  }
}

async function close(stream: Writable): Promise<void> {
  if (stream === process.stdout) return;
  stream.end();
  await finished(stream);
}

export const extractCommand = new Command('extract')
  .description('Extract lexical entries from a MediaWiki XML dump as JSON lines')
  .argument('<dump>', 'Dump file (.xml or .xml.gz)')
  .option('-c, --config <path>', 'Extraction config replacing the bundled one')
  .option('-l, --languages <names>', 'Only these language sections (comma-separated headings)')
  .option('-j, --concurrency <lanes>', 'Number of concurrent lanes')
  .option('-o, --output <file>', 'Entries file (default: stdout)')
  .option('-d, --diagnostics <file>', 'Write diagnostics as JSON lines')
  .option('-n, --limit <pages>', 'Maximum number of pages to extract')
  .action(async (dump: string, options: ExtractOptions) => {
    try {
      const session = await openSession(dump, options);
      const limit = options.limit ? parseCount(options.limit, '--limit') : Infinity;
      const outputPath = options.output ?? session.cli.output;
      const output: Writable = outputPath ? createWriteStream(resolvePath(outputPath)) : process.stdout;
      const diagnosticsOut = options.diagnostics ? createWriteStream(resolvePath(options.diagnostics)) : undefined;

      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);

      const startTime = Date.now();
      let pages = 0;
      let entries = 0;
      const byKind = new Map<DiagnosticKind, number>();

      try {
        const results = runPool(mainPages(session.store, limit), {
          store: session.store,
          config: session.extraction,
          languages: session.languages,
          concurrency: session.concurrency,
          signal: controller.signal,
        });
        for await (const result of results) {
          pages++;
          for (const entry of result.entries) {
            entries++;
            await writeLine(output, entry);
          }
          for (const diagnostic of result.diagnostics) {
            byKind.set(diagnostic.kind, (byKind.get(diagnostic.kind) ?? 0) + 1);
            if (diagnosticsOut) await writeLine(diagnosticsOut, diagnostic);
          }
        }
      } finally {
        process.off('SIGINT', onInterrupt);
        await close(output);
        if (diagnosticsOut) await close(diagnosticsOut);
      }

      const elapsed = (Date.now() - startTime) / 1000;
      console.error(
        `\n  ${color.green('Done')}: ${formatNumber(pages)} pages, ${formatNumber(entries)} entries in ${formatDuration(elapsed)}`
      );
      for (const [kind, count] of [...byKind].sort(([a], [b]) => a.localeCompare(b))) {
        console.error(`  ${color.gray(kind.padEnd(18))} ${formatNumber(count)}`);
      }
    } catch (error) {
      fatal(error instanceof Error ? error.message : String(error), error);
    }
  });
