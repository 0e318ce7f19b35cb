/**
 * Centralized constants for the extraction pipeline
 *
 * Limits and defaults shared across modules. Import from here to ensure
 * consistency between the engine, the CLI and the configuration schema.
 */

// ============================================================================
// Expansion Limits
// ============================================================================

/** Maximum depth of the active template/module invocation stack */
export const DEFAULT_MAX_DEPTH = 40;

/** Maximum number of template and module expansions per page */
export const DEFAULT_MAX_EXPANSIONS = 10000;

/** Maximum number of template redirects followed by the resolver */
export const MAX_REDIRECTS = 5;

// ============================================================================
// Sandbox Budget
// ============================================================================

/** Interpreter steps allowed per module invocation */
export const DEFAULT_MAX_STEPS = 500000;

/** Wall-clock budget per module invocation in milliseconds */
export const DEFAULT_SANDBOX_TIMEOUT_MS = 5000;

/** Maximum Lua call depth before a stack overflow fault */
export const MAX_LUA_CALL_DEPTH = 200;

// ============================================================================
// Cache Configuration
// ============================================================================

/** Resolver lookups memoized per resolver */
export const RESOLVER_CACHE_SIZE = 4096;

/** Parsed Lua chunks kept per sandbox */
export const CHUNK_CACHE_SIZE = 256;

// ============================================================================
// Pool
// ============================================================================

/** Default number of concurrent lanes */
export const DEFAULT_CONCURRENCY = 4;

// ============================================================================
// Namespaces
// ============================================================================

export const NS_MAIN = 0;
export const NS_TEMPLATE = 10;
export const NS_CATEGORY = 14;
export const NS_MODULE = 828;

/** Namespace prefixes recognized in titles, keyed by lowercase name */
export const NAMESPACES: Readonly<Record<string, number>> = {
  'user': 2,
  'wiktionary': 4,
  'file': 6,
  'image': 6,
  'mediawiki': 8,
  'template': NS_TEMPLATE,
  'help': 12,
  'category': NS_CATEGORY,
  'appendix': 100,
  'rhymes': 106,
  'thesaurus': 110,
  'citations': 114,
  'reconstruction': 118,
  'module': NS_MODULE,
};

/** Canonical spelling of each namespace prefix */
export const NAMESPACE_NAMES: Readonly<Record<number, string>> = {
  2: 'User',
  4: 'Wiktionary',
  6: 'File',
  8: 'MediaWiki',
  10: 'Template',
  12: 'Help',
  14: 'Category',
  100: 'Appendix',
  106: 'Rhymes',
  110: 'Thesaurus',
  114: 'Citations',
  118: 'Reconstruction',
  828: 'Module',
};

// ============================================================================
// Output
// ============================================================================

/** Schema version emitted when the configuration names none */
export const DEFAULT_SCHEMA_VERSION = '1';

/** Error marker substituted for failed module calls */
export const ERROR_MARKER_CLASS = 'error';
