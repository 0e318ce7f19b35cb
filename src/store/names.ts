/**
 * Title and name normalization
 *
 * Titles are compared after trimming, turning underscores into spaces,
 * collapsing whitespace and canonicalizing the namespace prefix. First-letter
 * capitalization is optional: Wiktionary titles are case-sensitive, most
 * other wikis fold the first letter.
 *
 * @module store/names
 */

import { NAMESPACES, NAMESPACE_NAMES, NS_MAIN, NS_MODULE, NS_TEMPLATE } from '../lib/constants.js';
import type { DefinitionKind } from './types.js';

export interface NameOptions {
  /** Uppercase the first letter of the name part */
  capitalize?: boolean | undefined;
}

export interface TitleParts {
  namespace: number;
  /** Title without its namespace prefix */
  name: string;
}

/**
 * Trim, turn underscores into spaces, collapse whitespace and drop a
 * leading colon
 */
export function cleanName(raw: string): string {
  return raw.replace(/_/g, ' ').replace(/\s+/g, ' ').trim().replace(/^:\s*/, '');
}

function capitalizeFirst(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * Split a title into its namespace and the rest
 */
export function splitTitle(title: string): TitleParts {
  const cleaned = cleanName(title);
  const colon = cleaned.indexOf(':');
  if (colon > 0) {
    const namespace = NAMESPACES[cleaned.slice(0, colon).trim().toLowerCase()];
    if (namespace !== undefined) {
      return { namespace, name: cleaned.slice(colon + 1).trim() };
    }
  }
  return { namespace: NS_MAIN, name: cleaned };
}

/**
 * Canonical full title, e.g. `template:foo_bar` becomes `Template:foo bar`
 */
export function normalizeTitle(title: string, options: NameOptions = {}): string {
  const { namespace, name } = splitTitle(title);
  const rest = options.capitalize ? capitalizeFirst(name) : name;
  const prefix = NAMESPACE_NAMES[namespace];
  return prefix ? `${prefix}:${rest}` : rest;
}

/**
 * Canonical template or module name without its namespace prefix
 *
 * @example
 * normalizeDefinitionName(' Template:conj_table ', 'template') // 'conj table'
 * normalizeDefinitionName('Module:fi-headword', 'module')      // 'fi-headword'
 */
export function normalizeDefinitionName(name: string, kind: DefinitionKind, options: NameOptions = {}): string {
  let cleaned = cleanName(name);
  const prefix = kind === 'template' ? /^template\s*:\s*/i : /^module\s*:\s*/i;
  cleaned = cleaned.replace(prefix, '');
  return options.capitalize ? capitalizeFirst(cleaned) : cleaned;
}

/**
 * Full page title of a template or module
 */
export function definitionTitle(name: string, kind: DefinitionKind, options: NameOptions = {}): string {
  const namespace = kind === 'template' ? NS_TEMPLATE : NS_MODULE;
  return `${NAMESPACE_NAMES[namespace] ?? ''}:${normalizeDefinitionName(name, kind, options)}`;
}
