/**
 * Expand Command
 *
 * Print a page, or a piece of markup, with every template and module call
 * expanded.
 */

import { Command } from 'commander';
import { openSession, type SessionOptions } from './session.js';
import { color, fatal } from './utils.js';
import { DiagnosticSink } from '../lib/diagnostics.js';
import { PageExtractor } from '../pipeline/index.js';
import { toWikitext } from '../wikitext/index.js';

interface ExpandOptions extends SessionOptions {
  text?: string;
}

export const expandCommand = new Command('expand')
  .description('Print the expanded markup of a page')
  .argument('<dump>', 'Dump file (.xml or .xml.gz)')
  .argument('<title>', 'Page title, also the context of --text')
  .option('-c, --config <path>', 'Extraction config replacing the bundled one')
  .option('-t, --text <markup>', 'Expand this markup instead of the page text')
  .action(async (dump: string, title: string, options: ExpandOptions) => {
    try {
      const session = await openSession(dump, options);
      const text = options.text ?? session.store.getPage(title)?.text;
      if (text === undefined) {
        fatal(`Page not found: ${title}`);
      }
      const extractor = new PageExtractor({ store: session.store, config: session.extraction });
      const diagnostics = new DiagnosticSink(title);
      const root = extractor.expandPage({ title, text }, diagnostics);

      console.log(toWikitext(root.children));
      for (const diagnostic of diagnostics.all) {
        console.error(`${color.yellow(diagnostic.kind)}: ${diagnostic.message}`);
      }
    } catch (error) {
      fatal(error instanceof Error ? error.message : String(error), error);
    }
  });
