/**
 * Tests for form extraction
 */

import { describe, it, expect } from 'vitest';
import { dedupeForms, headwordForms, labelLineForms, RuleBook, tableForms, tableGrid } from '../../src/extract/index.js';
import { testConfig } from './fixtures.js';
import { findAll, parseNodes, type TableNode } from '../../src/wikitext/index.js';

const rules = new RuleBook(testConfig()).rulesFor('Finnish');

function table(text: string): TableNode {
  const [node] = findAll(parseNodes(text), 'table');
  if (!node) throw new Error('no table');
  return node;
}

const DECLENSION = [
  '{|',
  '! case !! singular !! plural',
  '|-',
  '! nominative',
  '| kissa || kissat',
  '|-',
  '! genitive',
  '| kissan || kissojen',
  '|}',
].join('\n');

describe('tableForms', () => {
  it('should tag each cell with its row and column headers', () => {
    const matcher = rules.inflection[1];
    if (!matcher) throw new Error('no matcher');
    expect(tableForms(table(DECLENSION), matcher, 'fi-decl-kala')).toEqual([
      { form: 'kissa', tags: { number: 'singular', case: 'nominative' }, source: 'fi-decl-kala' },
      { form: 'kissat', tags: { number: 'plural', case: 'nominative' }, source: 'fi-decl-kala' },
      { form: 'kissan', tags: { number: 'singular', case: 'genitive' }, source: 'fi-decl-kala' },
      { form: 'kissojen', tags: { number: 'plural', case: 'genitive' }, source: 'fi-decl-kala' },
    ]);
  });

  it('should keep unknown headers and skip empty cells', () => {
    const matcher = rules.inflection[0];
    if (!matcher) throw new Error('no matcher');
    const text = '{|\n! form !! past\n|-\n! first\n| —\n|-\n! second\n| a, b\n|}';
    expect(tableForms(table(text), matcher, 'conj-table')).toEqual([
      { form: 'a', tags: { column: 'past', row: 'second' }, source: 'conj-table' },
      { form: 'b', tags: { column: 'past', row: 'second' }, source: 'conj-table' },
    ]);
  });

  it('should spread spanning cells over the grid', () => {
    const grid = tableGrid(table('{|\n| rowspan="2" | a || b\n|-\n| c\n|}'));
    expect(grid.map(line => line.map(slot => slot?.text))).toEqual([
      ['a', 'b'],
      ['a', 'c'],
    ]);
    expect(grid[1]?.[0]?.origin).toBe(false);
  });
});

describe('labelLineForms', () => {
  it('should tag known labels and keep unknown ones as text', () => {
    expect(labelLineForms('genitive: sortajan\nform: -it, -ot', rules.labels, 'conj-table')).toEqual([
      { form: 'sortajan', tags: { case: 'genitive' }, source: 'conj-table' },
      { form: '-it', tags: { label: 'form' }, source: 'conj-table' },
      { form: '-ot', tags: { label: 'form' }, source: 'conj-table' },
    ]);
  });
});

describe('headwordForms', () => {
  it('should read labelled forms in parentheses', () => {
    expect(headwordForms('cat (plural cats or cattes, informal)', rules.labels, 'headword')).toEqual([
      { form: 'cats', tags: { number: 'plural' }, source: 'headword' },
      { form: 'cattes', tags: { number: 'plural' }, source: 'headword' },
    ]);
  });
});

describe('dedupeForms', () => {
  it('should drop repeats and keep the first source', () => {
    const forms = dedupeForms([
      { form: 'a', tags: { x: '1', y: '2' }, source: 'first' },
      { form: 'a', tags: { y: '2', x: '1' }, source: 'second' },
      { form: 'a', tags: { x: '2' }, source: 'third' },
    ]);
    expect(forms.map(form => form.source)).toEqual(['first', 'third']);
  });
});
