/**
 * Senses from definition lists
 *
 * `#` items are senses, `##` items subsenses, `#:` items examples and `#*`
 * items quotations whose `#*:` children hold the quoted text.
 */

import type { Example, Sense } from '../schema/index.js';
import { cleanText, toText, type ListItemNode, type ListNode, type WikiNode } from '../wikitext/index.js';

/** Separates an example from its translation */
const TRANSLATION_SEPARATOR = ' ― ';

const QUALIFIER = /^\(([^()]*)\)\s*/;

/**
 * Split a leading `(archaic, informal)` qualifier off a gloss
 *
 * @example
 * splitQualifier('(archaic, informal) to oppress') // { tags: ['archaic', 'informal'], text: 'to oppress' }
 */
export function splitQualifier(text: string): { tags: string[]; text: string } {
  const match = QUALIFIER.exec(text);
  if (!match) return { tags: [], text };
  const tags = (match[1] ?? '')
    .split(/\s*,\s*/)
    .map(tag => tag.trim())
    .filter(tag => tag !== '');
  return { tags, text: text.slice(match[0].length).trim() };
}

function inlineText(item: ListItemNode): string {
  return cleanText(toText(item.children.filter(child => child.kind !== 'list')));
}

function nestedLists(item: ListItemNode): ListNode[] {
  return item.children.filter((child): child is ListNode => child.kind === 'list');
}

/**
 * Build an example, splitting `text ― translation`
 */
export function parseExample(text: string, translation?: string): Example | undefined {
  if (text === '') return undefined;
  const at = text.indexOf(TRANSLATION_SEPARATOR);
  if (at !== -1) {
    const head = text.slice(0, at).trim();
    const tail = text.slice(at + TRANSLATION_SEPARATOR.length).trim();
    if (head !== '') return tail === '' ? { text: head } : { text: head, translation: tail };
  }
  return translation ? { text, translation } : { text };
}

function firstNestedText(item: ListItemNode): string | undefined {
  for (const list of nestedLists(item)) {
    for (const nested of list.items) {
      const text = inlineText(nested);
      if (text !== '') return text;
    }
  }
  return undefined;
}

function examplesOf(list: ListNode): Example[] {
  const examples: Example[] = [];
  for (const item of list.items) {
    let example: Example | undefined;
    if (list.marker === '*') {
      // The citation line itself is not an example when a quote follows it
      const quote = nestedLists(item).find(nested => nested.marker === ':');
      const quoteItem = quote?.items[0];
      example = quoteItem ? parseExample(inlineText(quoteItem), firstNestedText(quoteItem)) : parseExample(inlineText(item));
    } else {
      example = parseExample(inlineText(item), firstNestedText(item));
    }
    if (example) examples.push(example);
  }
  return examples;
}

function sensesOf(list: ListNode): Sense[] {
  const senses: Sense[] = [];
  for (const item of list.items) {
    const { tags, text } = splitQualifier(inlineText(item));
    const examples: Example[] = [];
    const subsenses: Sense[] = [];
    for (const nested of nestedLists(item)) {
      if (nested.marker === '#') subsenses.push(...sensesOf(nested));
      else if (nested.marker === ':' || nested.marker === '*') examples.push(...examplesOf(nested));
    }
    if (text === '') {
      senses.push(...subsenses);
      continue;
    }
    const sense: Sense = { gloss: text, examples, tags };
    if (subsenses.length > 0) sense.subsenses = subsenses;
    senses.push(sense);
  }
  return senses;
}

/**
 * Senses of every top-level `#` list among `nodes`, in order
 */
export function extractSenses(nodes: readonly WikiNode[]): Sense[] {
  const senses: Sense[] = [];
  for (const node of nodes) {
    if (node.kind === 'list' && node.marker === '#') senses.push(...sensesOf(node));
  }
  return senses;
}
