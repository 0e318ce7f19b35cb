/**
 * Template and module resolver
 *
 * Normalizes names, follows template redirects and memoizes lookups
 * (misses included) in an LRU cache. Each pool lane owns one resolver;
 * the store behind it is shared read-only.
 *
 * @module store/resolver
 */

import { LRUCache, type LRUCacheStats } from '../lib/lru-cache.js';
import { MAX_REDIRECTS, NS_TEMPLATE, RESOLVER_CACHE_SIZE } from '../lib/constants.js';
import { redirectTarget } from './definitions.js';
import { normalizeDefinitionName, splitTitle, type NameOptions } from './names.js';
import type {
  DefinitionKind,
  ModuleDefinition,
  Page,
  PageStore,
  Resolution,
  TemplateDefinition,
} from './types.js';

export interface ResolverOptions extends NameOptions {
  cacheSize?: number | undefined;
  maxRedirects?: number | undefined;
}

export class Resolver {
  private readonly templates: LRUCache<string, Resolution<TemplateDefinition>>;
  private readonly modules: LRUCache<string, Resolution<ModuleDefinition>>;
  private readonly nameOptions: NameOptions;
  private readonly maxRedirects: number;

  constructor(
    readonly store: PageStore,
    options: ResolverOptions = {}
  ) {
    const maxSize = options.cacheSize ?? RESOLVER_CACHE_SIZE;
    this.templates = new LRUCache({ maxSize });
    this.modules = new LRUCache({ maxSize });
    this.nameOptions = { capitalize: options.capitalize };
    this.maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
  }

  /**
   * Look up a template or module by name
   *
   * @example
   * ```typescript
   * const result = resolver.resolve('Template:conj-table', 'template');
   * if (result.found) render(result.definition.body);
   * ```
   */
  resolve(name: string, kind: 'template'): Resolution<TemplateDefinition>;
  resolve(name: string, kind: 'module'): Resolution<ModuleDefinition>;
  resolve(name: string, kind: DefinitionKind): Resolution<TemplateDefinition> | Resolution<ModuleDefinition> {
    return kind === 'template' ? this.resolveTemplate(name) : this.resolveModule(name);
  }

  resolveTemplate(name: string): Resolution<TemplateDefinition> {
    const normalized = this.normalize(name, 'template');
    return this.templates.getOrCompute(normalized, () => this.lookupTemplate(normalized));
  }

  resolveModule(name: string): Resolution<ModuleDefinition> {
    const normalized = this.normalize(name, 'module');
    return this.modules.getOrCompute(normalized, () => {
      const definition = this.store.getModule(normalized);
      return definition
        ? { found: true, definition }
        : { found: false, kind: 'module', name: normalized };
    });
  }

  /** Lookup counters of both caches */
  cacheStats(): { templates: LRUCacheStats; modules: LRUCacheStats } {
    return { templates: this.templates.getStats(), modules: this.modules.getStats() };
  }

  getPage(title: string): Page | undefined {
    return this.store.getPage(title);
  }

  /**
   * Whether a page exists, following the same normalization as lookups
   */
  pageExists(title: string): boolean {
    return this.store.getPage(title) !== undefined;
  }

  normalize(name: string, kind: DefinitionKind): string {
    return normalizeDefinitionName(name, kind, this.nameOptions);
  }

  private lookupTemplate(normalized: string): Resolution<TemplateDefinition> {
    let name = normalized;
    const seen = new Set<string>();
    for (let hops = 0; hops <= this.maxRedirects; hops++) {
      const definition = this.store.getTemplate(name);
      if (!definition) break;
      const target = redirectTarget(definition.body);
      if (target === undefined) return { found: true, definition };

      seen.add(name);
      const { namespace, name: targetName } = splitTitle(target);
      if (namespace !== NS_TEMPLATE) break;
      name = this.normalize(targetName, 'template');
      if (seen.has(name)) break;
    }
    return { found: false, kind: 'template', name: normalized };
  }
}
