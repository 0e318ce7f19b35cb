/**
 * Shared setup of the CLI commands: configuration and the page store
 */

import { loadConfig, parseCount, parseList, resolvePath } from './utils.js';
import { loadDump } from '../dump/index.js';
import type { CliConfig, ExtractionConfig } from '../lib/config-schema.js';
import { loadExtractionConfig } from '../lib/config.js';
import { createLogger } from '../lib/logger.js';
import type { MemoryPageStore } from '../store/memory-store.js';

const log = createLogger('cli:session');

/** Options every command accepts */
export interface SessionOptions {
  config?: string;
  languages?: string;
  concurrency?: string;
}

export interface Session {
  cli: CliConfig;
  extraction: ExtractionConfig;
  store: MemoryPageStore;
  /** Language headings to keep; all when undefined */
  languages: Set<string> | undefined;
  concurrency: number;
}

/**
 * Resolve configuration (flags over `.wiktextractrc` over the bundled
 * config) and load the dump
 */
export async function openSession(dumpPath: string, options: SessionOptions): Promise<Session> {
  const cli = await loadConfig();
  const configPath = options.config ?? cli.configPath;
  const extraction = await loadExtractionConfig(configPath === undefined ? undefined : resolvePath(configPath));
  const languages = options.languages ? parseList(options.languages) : cli.languages;
  const concurrency = options.concurrency
    ? parseCount(options.concurrency, '--concurrency')
    : cli.concurrency ?? extraction.concurrency;

  const startTime = Date.now();
  const store = await loadDump(resolvePath(dumpPath), { capitalize: extraction.capitalize });
  log.info('Page store ready', { pages: store.size, durationMs: Date.now() - startTime });

  return {
    cli,
    extraction,
    store,
    languages: languages && languages.length > 0 ? new Set(languages) : undefined,
    concurrency,
  };
}
