/**
 * In-memory page store
 *
 * Holds every page of a dump (or a test fixture) in Maps keyed by
 * normalized title. Definitions are derived from page text on first lookup.
 *
 * @module store/memory-store
 */

import { StoreUnavailableError } from '../lib/errors.js';
import { NS_MODULE, NS_TEMPLATE } from '../lib/constants.js';
import { buildModuleDefinition, buildTemplateDefinition, redirectTarget } from './definitions.js';
import { definitionTitle, normalizeTitle, splitTitle, type NameOptions } from './names.js';
import type { ModuleDefinition, Page, PageStore, TemplateDefinition } from './types.js';

export interface PageInput {
  title: string;
  text: string;
  namespace?: number | undefined;
  language?: string | undefined;
  revisionId?: number | undefined;
  model?: string | undefined;
}

export interface MemoryPageStoreOptions extends NameOptions {
  /** Site language recorded on pages that name none (default `en`) */
  language?: string | undefined;
}

/** Fixture shape for building a store in one call */
export interface StoreRecords {
  pages?: Record<string, string> | undefined;
  templates?: Record<string, string> | undefined;
  modules?: Record<string, string> | undefined;
}

/**
 * PageStore backed by Maps
 *
 * @example
 * ```typescript
 * const store = MemoryPageStore.fromRecords({
 *   templates: { 'conj-table': 'form: -{{{type}}}' },
 * });
 * store.getTemplate('conj-table')?.body; // 'form: -{{{type}}}'
 * ```
 */
export class MemoryPageStore implements PageStore {
  private readonly pages = new Map<string, Page>();
  private readonly templates = new Map<string, TemplateDefinition>();
  private readonly modules = new Map<string, ModuleDefinition>();
  private readonly nameOptions: NameOptions;
  private readonly language: string;
  private nextRevision = 1;
  private closed = false;

  constructor(options: MemoryPageStoreOptions = {}) {
    this.nameOptions = { capitalize: options.capitalize };
    this.language = options.language ?? 'en';
  }

  static fromRecords(records: StoreRecords, options: MemoryPageStoreOptions = {}): MemoryPageStore {
    const store = new MemoryPageStore(options);
    for (const [title, text] of Object.entries(records.pages ?? {})) {
      store.addPage({ title, text });
    }
    for (const [name, body] of Object.entries(records.templates ?? {})) {
      store.addTemplate(name, body);
    }
    for (const [name, source] of Object.entries(records.modules ?? {})) {
      store.addModule(name, source);
    }
    return store;
  }

  addPage(input: PageInput): Page {
    const title = normalizeTitle(input.title, this.nameOptions);
    const namespace = input.namespace ?? splitTitle(title).namespace;
    const page: Page = {
      title,
      text: input.text,
      namespace,
      language: input.language ?? this.language,
      revisionId: input.revisionId ?? this.nextRevision++,
      model: input.model ?? (namespace === NS_MODULE ? 'Scribunto' : 'wikitext'),
      redirect: namespace === NS_MODULE ? undefined : redirectTarget(input.text),
    };
    this.pages.set(title, page);
    this.templates.delete(title);
    this.modules.delete(title);
    return page;
  }

  addTemplate(name: string, body: string): Page {
    return this.addPage({ title: definitionTitle(name, 'template', this.nameOptions), text: body, namespace: NS_TEMPLATE });
  }

  addModule(name: string, source: string): Page {
    return this.addPage({ title: definitionTitle(name, 'module', this.nameOptions), text: source, namespace: NS_MODULE });
  }

  getPage(title: string): Page | undefined {
    this.assertOpen();
    return this.pages.get(normalizeTitle(title, this.nameOptions));
  }

  getTemplate(name: string): TemplateDefinition | undefined {
    this.assertOpen();
    const title = definitionTitle(name, 'template', this.nameOptions);
    const cached = this.templates.get(title);
    if (cached) return cached;
    const page = this.pages.get(title);
    if (!page) return undefined;
    const definition = buildTemplateDefinition(title.slice(title.indexOf(':') + 1), page.text);
    this.templates.set(title, definition);
    return definition;
  }

  getModule(name: string): ModuleDefinition | undefined {
    this.assertOpen();
    const title = definitionTitle(name, 'module', this.nameOptions);
    const cached = this.modules.get(title);
    if (cached) return cached;
    const page = this.pages.get(title);
    if (!page) return undefined;
    const definition = buildModuleDefinition(title.slice(title.indexOf(':') + 1), page.text);
    this.modules.set(title, definition);
    return definition;
  }

  /**
   * Titles of stored pages, optionally limited to one namespace, in
   * insertion order
   */
  titles(namespace?: number): string[] {
    const titles: string[] = [];
    for (const page of this.pages.values()) {
      if (namespace === undefined || page.namespace === namespace) titles.push(page.title);
    }
    return titles;
  }

  get size(): number {
    return this.pages.size;
  }

  /**
   * Make every later lookup fail with StoreUnavailableError
   */
  close(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError('page store is closed');
    }
  }
}
