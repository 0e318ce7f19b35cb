/**
 * Page Command
 *
 * Extract a single page and print its entries and diagnostics.
 */

import { Command } from 'commander';
import { openSession, type SessionOptions } from './session.js';
import { color, fatal } from './utils.js';
import { PageExtractor } from '../pipeline/index.js';

interface PageOptions extends SessionOptions {
  json: boolean;
}

export const pageCommand = new Command('page')
  .description('Extract one page of a dump and print its entries')
  .argument('<dump>', 'Dump file (.xml or .xml.gz)')
  .argument('<title>', 'Page title')
  .option('-c, --config <path>', 'Extraction config replacing the bundled one')
  .option('-l, --languages <names>', 'Only these language sections (comma-separated headings)')
  .option('--json', 'Print the whole result as JSON', false)
  .action(async (dump: string, title: string, options: PageOptions) => {
    try {
      const session = await openSession(dump, options);
      const page = session.store.getPage(title);
      if (!page) {
        fatal(`Page not found: ${title}`);
      }
      const extractor = new PageExtractor({
        store: session.store,
        config: session.extraction,
        languages: session.languages,
      });
      const result = extractor.extract(page);

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      for (const entry of result.entries) {
        console.log(JSON.stringify(entry, null, 2));
      }
      for (const diagnostic of result.diagnostics) {
        const where = diagnostic.offset === undefined ? '' : ` @${diagnostic.offset}`;
        console.error(`${color.yellow(diagnostic.kind)}${where}: ${diagnostic.message}`);
      }
    } catch (error) {
      fatal(error instanceof Error ? error.message : String(error), error);
    }
  });
