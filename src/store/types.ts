/**
 * Page store types
 *
 * @module store/types
 */

/**
 * A page as loaded from a dump. Immutable once stored.
 */
export interface Page {
  /** Full title including any namespace prefix */
  readonly title: string;
  /** Raw markup, or Lua source for modules */
  readonly text: string;
  readonly namespace: number;
  /** Site language of the dump the page came from */
  readonly language: string;
  readonly revisionId: number;
  /** Content model, e.g. `wikitext` or `Scribunto` */
  readonly model?: string | undefined;
  /** Redirect target title, when the page is a redirect */
  readonly redirect?: string | undefined;
}

export interface TemplateDefinition {
  /** Normalized name without the namespace prefix */
  readonly name: string;
  readonly body: string;
  /** Declared parameter defaults, keyed by parameter name */
  readonly defaults: Readonly<Record<string, string>>;
}

export interface ModuleDefinition {
  /** Normalized name without the namespace prefix */
  readonly name: string;
  readonly source: string;
  /** Functions exported on the table the module returns */
  readonly exports: readonly string[];
}

/**
 * Read-only access to pages, templates and modules
 *
 * Implementations throw StoreUnavailableError when they cannot serve
 * lookups at all; a missing entry is `undefined`.
 */
export interface PageStore {
  getPage(title: string): Page | undefined;
  getTemplate(name: string): TemplateDefinition | undefined;
  getModule(name: string): ModuleDefinition | undefined;
}

export type DefinitionKind = 'template' | 'module';

export interface NotFound {
  readonly found: false;
  readonly kind: DefinitionKind;
  /** Normalized name that was looked up */
  readonly name: string;
}

export type Resolution<D> = { readonly found: true; readonly definition: D } | NotFound;
