/**
 * Tests for entry extraction from expanded pages
 */

import { describe, it, expect } from 'vitest';
import { testConfig } from './fixtures.js';
import { extractEntries, RuleBook } from '../../src/extract/index.js';
import { DiagnosticSink } from '../../src/lib/diagnostics.js';
import { parse } from '../../src/wikitext/index.js';

function extract(text: string, languages?: ReadonlySet<string>) {
  const diagnostics = new DiagnosticSink('sortaa');
  const entries = extractEntries(parse(text).root, {
    title: 'sortaa',
    rules: new RuleBook(testConfig()),
    diagnostics,
    languages,
  });
  return { entries, diagnostics };
}

const FINNISH = [
  '== Finnish ==',
  '=== Etymology 1 ===',
  'From [[sortua]].',
  '=== Pronunciation ===',
  '* IPA: /ˈsortɑː/',
  '=== Verb ===',
  "'''sortaa''' (plural sortaat)",
  '# (transitive) to oppress',
  '#: Kansa sortaa. ― The people oppress.',
  '==== Synonyms ====',
  '* [[alistaa]], [[painaa]]',
  '=== Etymology 2 ===',
  'Unknown.',
  '=== Noun ===',
  '# a sort',
  '[[Category:Finnish verbs]]',
].join('\n');

describe('extractEntries', () => {
  it('should build one entry from a language and POS heading', () => {
    const { entries } = extract('== Finnish ==\n=== Verb ===\n# to oppress');
    expect(entries).toEqual([
      {
        headword: 'sortaa',
        language: 'Finnish',
        langCode: 'fi',
        pos: 'Verb',
        posTag: 'verb',
        senses: [{ gloss: 'to oppress', examples: [], tags: [] }],
        forms: [],
        crossRefs: [],
        linkages: [],
        translations: [],
        sounds: [],
        categories: [],
        extra: [],
      },
    ]);
  });

  it('should give each etymology its own entries', () => {
    const { entries } = extract(FINNISH);
    expect(entries).toHaveLength(2);
    expect(entries[0]).toEqual({
      headword: 'sortaa',
      language: 'Finnish',
      langCode: 'fi',
      pos: 'Verb',
      posTag: 'verb',
      senses: [
        {
          gloss: 'to oppress',
          examples: [{ text: 'Kansa sortaa.', translation: 'The people oppress.' }],
          tags: ['transitive'],
        },
      ],
      forms: [{ form: 'sortaat', tags: { number: 'plural' }, source: 'headword' }],
      crossRefs: ['alistaa', 'painaa'],
      linkages: [
        { relation: 'synonym', word: 'alistaa' },
        { relation: 'synonym', word: 'painaa' },
      ],
      translations: [],
      sounds: [{ ipa: '/ˈsortɑː/' }],
      etymology: 'From sortua.',
      categories: ['Finnish verbs'],
      extra: [],
    });
    expect(entries[1]).toMatchObject({
      pos: 'Noun',
      posTag: 'noun',
      senses: [{ gloss: 'a sort', examples: [], tags: [] }],
      sounds: [],
      etymology: 'Unknown.',
      categories: ['Finnish verbs'],
    });
  });

  it('should read translations, keep unknown sections and skip ignored ones', () => {
    const text = [
      '== English ==',
      '=== Noun ===',
      '# a cat',
      '==== Translations ====',
      'feline',
      '* Finnish: [[kissa]]',
      '* German: Katze, Mieze',
      '==== Usage notes ====',
      'Common.',
      '=== References ===',
      'ignored',
    ].join('\n');
    const [entry] = extract(text).entries;
    expect(entry?.translations).toEqual([
      { lang: 'Finnish', code: 'fi', word: 'kissa', sense: 'feline' },
      { lang: 'German', word: 'Katze', sense: 'feline' },
      { lang: 'German', word: 'Mieze', sense: 'feline' },
    ]);
    expect(entry?.extra).toEqual([{ heading: 'Usage notes', text: 'Common.' }]);
  });

  it('should report unknown languages and still extract them', () => {
    const { entries, diagnostics } = extract('== Klingon ==\n=== Verb ===\n# to fight');
    expect(entries).toMatchObject([{ language: 'Klingon', langCode: 'unknown', pos: 'Verb' }]);
    expect(diagnostics.all).toEqual([
      { page: 'sortaa', kind: 'unknown-language', message: 'unknown language heading: Klingon', offset: 0, section: 'Klingon' },
    ]);
  });

  it('should accept configured aliases', () => {
    expect(extract('== Suomi ==\n=== Verb ===\n# to oppress').entries).toMatchObject([
      { language: 'Suomi', langCode: 'fi' },
    ]);
  });

  it('should make an unknown-POS entry from a language without POS headings', () => {
    expect(extract('== Finnish ==\n# loose sense').entries).toMatchObject([
      { pos: 'unknown', posTag: 'unknown', senses: [{ gloss: 'loose sense', examples: [], tags: [] }] },
    ]);
    expect(extract('== Finnish ==\n').entries).toEqual([]);
  });

  it('should keep only the requested languages', () => {
    const text = '== Finnish ==\n=== Verb ===\n# a\n== English ==\n=== Verb ===\n# b';
    expect(extract(text, new Set(['English'])).entries.map(entry => entry.language)).toEqual(['English']);
  });

  it('should ignore sections outside a language', () => {
    expect(extract('= Title =\n=== Verb ===\n# stray').entries).toEqual([]);
  });
});
