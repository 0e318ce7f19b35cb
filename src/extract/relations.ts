/**
 * Linkages, translations, pronunciations and categories
 */

import { splitQualifier } from './senses.js';
import { NAMESPACES, NS_CATEGORY } from '../lib/constants.js';
import type { Linkage, Sound, Translation } from '../schema/index.js';
import { cleanText, toText, walk, type LinkNode, type WikiNode } from '../wikitext/index.js';

/** Link namespaces that never name a related word */
const NON_WORD_LINK = /^(?:category|file|image|media|w|wikipedia|special)\s*:/i;

const IPA = /\/[^/\s][^/]*\/|\[[^\]\s][^\]]*\]/g;

/**
 * The page a link points at: no leading colon, no `#fragment`
 */
export function linkTarget(link: LinkNode): string {
  return cleanText(toText(link.target)).replace(/^:\s*/, '').replace(/#.*$/, '').trim();
}

function wordLinks(nodes: readonly WikiNode[]): string[] {
  const words: string[] = [];
  walk(nodes, node => {
    if (node.kind !== 'link') return true;
    const target = linkTarget(node);
    if (target !== '' && !NON_WORD_LINK.test(target)) words.push(target);
    return false;
  });
  return words;
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Targets of word links, in order, without repeats
 */
export function crossReferences(nodes: readonly WikiNode[]): string[] {
  return unique(wordLinks(nodes));
}

/**
 * Category names from category links at any depth
 */
export function categories(nodes: readonly WikiNode[]): string[] {
  const found: string[] = [];
  walk(nodes, node => {
    if (node.kind !== 'link') return true;
    const target = toText(node.target).replace(/^\s*:/, '');
    const colon = target.indexOf(':');
    if (colon !== -1 && NAMESPACES[target.slice(0, colon).trim().toLowerCase()] === NS_CATEGORY) {
      const name = cleanText(target.slice(colon + 1));
      if (name !== '') found.push(name);
    }
    return false;
  });
  return unique(found);
}

function listItems(nodes: readonly WikiNode[]): { inline: WikiNode[] }[] {
  const items: { inline: WikiNode[] }[] = [];
  walk(nodes, node => {
    if (node.kind === 'list-item') items.push({ inline: node.children.filter(child => child.kind !== 'list') });
    return true;
  });
  return items;
}

/**
 * Words of a linkage section: the links of each list item, or its
 * comma-separated text when it has none
 */
export function linkages(nodes: readonly WikiNode[], relation: string): Linkage[] {
  const out: Linkage[] = [];
  const seen = new Set<string>();
  for (const item of listItems(nodes)) {
    const links = wordLinks(item.inline);
    const words = links.length > 0 ? links : plainWords(cleanText(toText(item.inline)));
    for (const word of words) {
      if (seen.has(word)) continue;
      seen.add(word);
      out.push({ relation, word });
    }
  }
  return out;
}

function plainWords(text: string): string[] {
  const { text: rest } = splitQualifier(text);
  return rest
    .split(/\s*,\s*/)
    .map(word => word.replace(/\s*\([^)]*\)/g, '').trim())
    .filter(word => word !== '');
}

/**
 * Translation lines `Language: word, word` under optional gloss lines
 *
 * @param codeOf - Code of a language name, when configured
 */
export function translations(nodes: readonly WikiNode[], codeOf: (name: string) => string | undefined): Translation[] {
  const out: Translation[] = [];
  let sense: string | undefined;
  for (const node of nodes) {
    if (node.kind !== 'list') {
      const text = cleanText(toText(node));
      if (text !== '') sense = text;
      continue;
    }
    for (const item of listItems([node])) {
      const text = cleanText(toText(item.inline));
      const colon = text.indexOf(':');
      if (colon <= 0) continue;
      const lang = text.slice(0, colon).trim();
      const links = wordLinks(item.inline);
      const words = links.length > 0 ? links : plainWords(text.slice(colon + 1));
      const code = codeOf(lang);
      for (const word of words) {
        const translation: Translation = { lang, word };
        if (code !== undefined) translation.code = code;
        if (sense !== undefined) translation.sense = sense;
        out.push(translation);
      }
    }
  }
  return out;
}

/**
 * IPA transcriptions from lines that mention IPA, with a leading
 * `(qualifier)` as tags
 */
export function sounds(nodes: readonly WikiNode[]): Sound[] {
  const out: Sound[] = [];
  for (const raw of toText(nodes).split('\n')) {
    const { tags, text } = splitQualifier(cleanText(raw));
    const at = text.search(/\bIPA\b/);
    if (at === -1) continue;
    for (const match of text.slice(at).matchAll(IPA)) {
      out.push(tags.length > 0 ? { ipa: match[0], tags } : { ipa: match[0] });
    }
  }
  return out;
}
