#!/usr/bin/env node
/**
 * wiktextract CLI
 *
 * Extract structured lexical entries from MediaWiki XML dumps.
 */

import { Command } from 'commander';
import { extractCommand } from './cli/extract.js';
import { pageCommand } from './cli/page.js';
import { expandCommand } from './cli/expand.js';

const program = new Command()
  .name('wiktextract')
  .description('Extract structured lexical entries from Wiktionary dumps')
  .version('0.1.0');

// Register commands
program.addCommand(extractCommand);
program.addCommand(pageCommand);
program.addCommand(expandCommand);

// Parse arguments
await program.parseAsync();
