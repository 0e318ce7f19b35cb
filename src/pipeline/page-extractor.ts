/**
 * Per-lane page extraction
 *
 * A PageExtractor owns everything one pool lane needs: a resolver with its
 * lookup cache, a sandbox with its chunk cache and the parsed template
 * bodies. Each page gets a fresh diagnostic sink and expander, so nothing
 * one page does is visible to the next.
 *
 * @module pipeline/page-extractor
 */

import { Expander, pageView, pageViewText, type BodyCache } from '../expand/index.js';
import { extractEntries, RuleBook } from '../extract/index.js';
import type { ExtractionConfig } from '../lib/config-schema.js';
import { DiagnosticSink, type Diagnostic } from '../lib/diagnostics.js';
import { isFatalError } from '../lib/errors.js';
import { createLogger, withPageContext } from '../lib/logger.js';
import { LRUCache } from '../lib/lru-cache.js';
import { Sandbox } from '../lua/index.js';
import { validate, type LexicalEntry } from '../schema/index.js';
import { Resolver } from '../store/resolver.js';
import type { PageStore } from '../store/types.js';
import { parse, type RootNode } from '../wikitext/index.js';

const log = createLogger('extract:page');

/** Parsed template bodies kept per lane */
const BODY_CACHE_SIZE = 1024;

/** What a page needs to be extracted */
export interface PageSource {
  title: string;
  text: string;
}

export interface PageResult {
  title: string;
  /** Entries that passed the schema gate, in page order */
  entries: LexicalEntry[];
  diagnostics: Diagnostic[];
}

export interface PageExtractorOptions {
  store: PageStore;
  config: ExtractionConfig;
  /** Compiled from `config` when absent */
  rules?: RuleBook | undefined;
  /** Only these language headings */
  languages?: ReadonlySet<string> | undefined;
  /** Lane index, added to log lines */
  worker?: number | undefined;
  /** Clock for sandbox budgets */
  now?: (() => number) | undefined;
}

/**
 * Turns pages into validated entries
 *
 * @example
 * ```typescript
 * const extractor = new PageExtractor({ store, config: defaultExtractionConfig() });
 * const { entries, diagnostics } = extractor.extract({ title: 'sortaa', text });
 * ```
 */
export class PageExtractor {
  readonly resolver: Resolver;
  readonly sandbox: Sandbox;
  readonly rules: RuleBook;
  private readonly bodies: BodyCache;

  constructor(private readonly options: PageExtractorOptions) {
    const { config } = options;
    this.resolver = new Resolver(options.store, { capitalize: config.capitalize });
    this.sandbox = new Sandbox(this.resolver, {
      maxSteps: config.limits.maxSteps,
      timeoutMs: config.limits.timeoutMs,
      now: options.now,
    });
    this.rules = options.rules ?? new RuleBook(config);
    this.bodies = new LRUCache({ maxSize: BODY_CACHE_SIZE });
  }

  /**
   * Extract one page
   *
   * Page-local failures become an `internal` diagnostic on an empty
   * result. Store failures and cancellation are thrown. Diagnostic
   * offsets point into `page.text`.
   */
  extract(page: PageSource, signal?: AbortSignal): PageResult {
    return withPageContext({ page: page.title, worker: this.options.worker }, () => {
      const view = pageView(page.text);
      const diagnostics = new DiagnosticSink(page.title, undefined, view.sourceOffset);
      let entries: LexicalEntry[] = [];
      try {
        const expanded = this.expand(page.title, view.text, diagnostics, signal);
        entries = this.gate(expanded, page.title, diagnostics);
      } catch (error) {
        if (isFatalError(error)) throw error;
        const message = error instanceof Error ? error.message : String(error);
        diagnostics.report({ kind: 'internal', message: `page extraction failed: ${message}` });
      }
      log.debug('Page extracted', { entries: entries.length, diagnostics: diagnostics.count() });
      return { title: page.title, entries, diagnostics: [...diagnostics.all] };
    });
  }

  /**
   * Parse and expand a page without extracting entries. Node offsets are
   * into the page as it is read directly.
   */
  expandPage(page: PageSource, diagnostics: DiagnosticSink, signal?: AbortSignal): RootNode {
    return this.expand(page.title, pageViewText(page.text), diagnostics, signal);
  }

  private expand(title: string, text: string, diagnostics: DiagnosticSink, signal: AbortSignal | undefined): RootNode {
    const { config } = this.options;
    const parsed = parse(text, {
      leniency: config.leniency,
      maxNesting: config.limits.maxNesting,
    });
    for (const problem of parsed.diagnostics) {
      diagnostics.report({ kind: 'parse', message: problem.message, offset: problem.offset });
    }
    const expander = new Expander({
      title,
      resolver: this.resolver,
      sandbox: this.sandbox,
      diagnostics,
      limits: { maxDepth: config.limits.maxDepth, maxExpansions: config.limits.maxExpansions },
      signal,
      leniency: config.leniency,
      maxNesting: config.limits.maxNesting,
      bodies: this.bodies,
    });
    return expander.expandTree(parsed.root);
  }

  private gate(root: RootNode, title: string, diagnostics: DiagnosticSink): LexicalEntry[] {
    const candidates = extractEntries(root, {
      title,
      rules: this.rules,
      diagnostics,
      languages: this.options.languages,
    });
    const entries: LexicalEntry[] = [];
    candidates.forEach((candidate, index) => {
      const result = validate(candidate, this.options.config.schemaVersion);
      if (result.ok) {
        entries.push(result.entry);
        return;
      }
      for (const issue of result.errors) {
        diagnostics.report({
          kind: 'validation',
          message: `entry ${index} (${candidate.language} ${candidate.pos}) rejected: ${issue.reason}`,
          path: issue.path,
          section: candidate.language,
        });
      }
    });
    return entries;
  }
}
