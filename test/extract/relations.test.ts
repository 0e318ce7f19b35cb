/**
 * Tests for linkages, translations, sounds and categories
 */

import { describe, it, expect } from 'vitest';
import { categories, crossReferences, linkages, linkTarget, sounds, translations } from '../../src/extract/index.js';
import { findAll, parseNodes } from '../../src/wikitext/index.js';

describe('crossReferences', () => {
  it('should keep word links once, without fragments or other namespaces', () => {
    const nodes = parseNodes('[[x]] [[Category:A]] [[w:foo]] [[y#Finnish|y]] [[x]]');
    expect(crossReferences(nodes)).toEqual(['x', 'y']);
  });

  it('should strip a leading colon from targets', () => {
    const [link] = findAll(parseNodes('[[:kissa#Noun]]'), 'link');
    if (!link) throw new Error('no link');
    expect(linkTarget(link)).toBe('kissa');
  });
});

describe('categories', () => {
  it('should collect category names once', () => {
    expect(categories(parseNodes('[[Category:Finnish verbs]] [[x]]\n* [[Category:Finnish verbs]]'))).toEqual([
      'Finnish verbs',
    ]);
  });

  it('should only read links into the category namespace', () => {
    expect(categories(parseNodes('[[ category : Finnish nouns ]] [[Categories:x]] [[Template:fi-noun]]'))).toEqual([
      'Finnish nouns',
    ]);
  });
});

describe('linkages', () => {
  it('should prefer links and fall back to plain words', () => {
    const nodes = parseNodes('* [[alistaa]]\n* (dated) painaa, polkea (rare)\n* [[alistaa]]');
    expect(linkages(nodes, 'synonym')).toEqual([
      { relation: 'synonym', word: 'alistaa' },
      { relation: 'synonym', word: 'painaa' },
      { relation: 'synonym', word: 'polkea' },
    ]);
  });
});

describe('translations', () => {
  it('should attach the gloss line and configured codes', () => {
    const nodes = parseNodes('to oppress\n* Finnish: [[sortaa]]\n* Swedish: förtrycka\nnot a line');
    const codeOf = (name: string): string | undefined => (name === 'Finnish' ? 'fi' : undefined);
    expect(translations(nodes, codeOf)).toEqual([
      { lang: 'Finnish', code: 'fi', word: 'sortaa', sense: 'to oppress' },
      { lang: 'Swedish', word: 'förtrycka', sense: 'to oppress' },
    ]);
  });
});

describe('sounds', () => {
  it('should read IPA with qualifiers as tags', () => {
    const nodes = parseNodes('* (Received Pronunciation) IPA: /kæt/, [kʰæt]\n* Rhymes: -æt');
    expect(sounds(nodes)).toEqual([
      { ipa: '/kæt/', tags: ['Received Pronunciation'] },
      { ipa: '[kʰæt]', tags: ['Received Pronunciation'] },
    ]);
  });
});
