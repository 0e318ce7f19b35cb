/**
 * Tests for the wikitext parser
 */

import { describe, it, expect } from 'vitest';
import { parse, parseNodes, LITERAL_OPEN, LITERAL_CLOSE } from '../../src/wikitext/index.js';
import type { ListNode, TableNode, TemplateNode } from '../../src/wikitext/index.js';
import { ParseError } from '../../src/lib/errors.js';

describe('parse', () => {
  describe('headings', () => {
    it('should read heading levels and trimmed titles', () => {
      const { root, diagnostics } = parse('== Finnish ==\n=== Verb ===\n# to oppress');
      expect(diagnostics).toEqual([]);
      expect(root.children[0]).toEqual({
        kind: 'heading',
        level: 2,
        title: [{ kind: 'text', value: 'Finnish', start: 3, end: 10 }],
        start: 0,
        end: 13,
      });
      expect(root.children[1]).toMatchObject({ kind: 'heading', level: 3, title: [{ value: 'Verb' }] });
    });

    it('should leave a line without closing marks as text', () => {
      const nodes = parseNodes('== open');
      expect(nodes).toEqual([{ kind: 'text', value: '== open', start: 0, end: 7 }]);
    });
  });

  describe('lists', () => {
    it('should build an ordered list from # lines', () => {
      const [list] = parseNodes('# to oppress');
      expect(list).toMatchObject({
        kind: 'list',
        marker: '#',
        ordered: true,
        depth: 1,
        items: [{ kind: 'list-item', prefix: '#', children: [{ kind: 'text', value: ' to oppress' }] }],
      });
    });

    it('should nest deeper prefixes under the previous item', () => {
      const nodes = parseNodes('# one\n#: example\n# two');
      expect(nodes).toHaveLength(1);
      const list = nodes[0] as ListNode;
      expect(list.items.map(item => item.prefix)).toEqual(['#', '#']);
      expect(list.items[0]?.children[1]).toMatchObject({
        kind: 'list',
        marker: ':',
        ordered: false,
        depth: 2,
        items: [{ prefix: '#:', children: [{ kind: 'text', value: ' example' }] }],
      });
    });
  });

  describe('templates and arguments', () => {
    it('should split positional and named parameters', () => {
      const [node] = parseNodes('{{conj-table|type=A|x}}');
      expect(node).toMatchObject({
        kind: 'template',
        name: [{ kind: 'text', value: 'conj-table' }],
        params: [
          { name: [{ kind: 'text', value: 'type' }], value: [{ kind: 'text', value: 'A' }] },
          { name: null, value: [{ kind: 'text', value: 'x' }] },
        ],
        start: 0,
        end: 23,
      });
    });

    it('should read an argument with a default', () => {
      const [node] = parseNodes('{{{1|default}}}');
      expect(node).toMatchObject({
        kind: 'argument',
        name: [{ kind: 'text', value: '1' }],
        fallback: [{ kind: 'text', value: 'default' }],
      });
    });

    it('should read a template whose name is an argument', () => {
      const [node] = parseNodes('{{{{{1}}}x}}');
      expect(node?.kind).toBe('template');
      expect((node as TemplateNode).name.map(part => part.kind)).toEqual(['argument', 'text']);
    });

    it('should keep an unclosed template as text and report it', () => {
      const { root, diagnostics } = parse('{{foo');
      expect(root.children).toEqual([{ kind: 'text', value: '{{foo', start: 0, end: 5 }]);
      expect(diagnostics).toEqual([{ offset: 0, expected: '}}', message: 'unclosed template' }]);
    });

    it('should throw the first problem with failFast', () => {
      expect(() => parse('{{foo', { failFast: true })).toThrow(ParseError);
      expect(() => parse('{{foo', { failFast: true })).toThrow('unclosed template');
    });

    it('should stop at the nesting limit', () => {
      const { root, diagnostics } = parse('{{a|{{b}}}}', { maxNesting: 1 });
      expect(diagnostics).toEqual([{ offset: 4, expected: '}}', message: 'nesting limit of 1 exceeded' }]);
      expect(root.children[0]).toMatchObject({
        kind: 'template',
        params: [{ name: null, value: [{ kind: 'text', value: '{{b' }] }],
      });
    });
  });

  describe('links', () => {
    it('should read target, display text and trail', () => {
      const [node] = parseNodes('[[cat|kitty]]s are');
      expect(node).toMatchObject({
        kind: 'link',
        target: [{ value: 'cat' }],
        args: [[{ value: 'kitty' }]],
        trail: 's',
      });
    });

    it('should read external links only in document mode', () => {
      expect(parseNodes('[http://example.org site]')[0]).toMatchObject({
        kind: 'extlink',
        url: 'http://example.org',
        children: [{ kind: 'text', value: 'site' }],
      });
      expect(parseNodes('[http://example.org site]', { mode: 'preprocess' })).toEqual([
        { kind: 'text', value: '[http://example.org site]', start: 0, end: 25 },
      ]);
    });
  });

  describe('formatting', () => {
    it('should turn quote runs into italic and bold spans', () => {
      const nodes = parseNodes("''italic'' and '''bold'''");
      expect(nodes).toMatchObject([
        { kind: 'format', style: 'italic', children: [{ value: 'italic' }] },
        { kind: 'text', value: ' and ' },
        { kind: 'format', style: 'bold', children: [{ value: 'bold' }] },
      ]);
    });

    it('should close an open span at the end of the line', () => {
      const { root, diagnostics } = parse("''open");
      expect(root.children).toMatchObject([{ kind: 'format', style: 'italic', children: [{ value: 'open' }] }]);
      expect(diagnostics).toEqual([]);
    });

    it('should report unclosed spans in strict mode', () => {
      const { diagnostics } = parse("''open", { leniency: 'strict' });
      expect(diagnostics).toEqual([{ offset: 0, expected: "''", message: 'unclosed formatting' }]);
    });
  });

  describe('tables', () => {
    it('should read header and data cells by row', () => {
      const [node] = parseNodes('{|\n! a !! b\n|-\n| 1 || 2\n|}');
      const table = node as TableNode;
      expect(table.kind).toBe('table');
      expect(table.rows).toHaveLength(2);
      expect(table.rows[0]?.cells.map(cell => [cell.header, cell.children])).toMatchObject([
        [true, [{ value: ' a ' }]],
        [true, [{ value: ' b' }]],
      ]);
      expect(table.rows[1]?.cells.map(cell => [cell.header, cell.children])).toMatchObject([
        [false, [{ value: ' 1 ' }]],
        [false, [{ value: ' 2' }]],
      ]);
    });

    it('should split cell attributes from content', () => {
      const table = parseNodes('{|\n| style="x" | hi\n|}')[0] as TableNode;
      expect(table.rows[0]?.cells[0]).toMatchObject({ attrs: ' style="x" ', children: [{ value: ' hi' }] });
    });

    it('should report an unclosed table', () => {
      const { diagnostics } = parse('{|\n| a');
      expect(diagnostics).toEqual([{ offset: 0, expected: '|}', message: 'unclosed table' }]);
    });

    it('should count nested tables against the nesting limit', () => {
      const { diagnostics } = parse('{|\n'.repeat(41));
      expect(diagnostics).toHaveLength(41);
      expect(diagnostics[0]).toEqual({ offset: 120, expected: '|}', message: 'nesting limit of 40 exceeded' });
      expect(diagnostics.filter(d => d.message === 'unclosed table')).toHaveLength(40);
    });

    it('should keep openers past the limit as text', () => {
      const { root, diagnostics } = parse('{|\n{|\n', { maxNesting: 1 });
      const outer = root.children[0] as TableNode;
      expect(outer.kind).toBe('table');
      expect(outer.rows[0]?.cells[0]?.children[0]).toEqual({ kind: 'text', value: '{|', start: 3, end: 5 });
      expect(diagnostics).toEqual([
        { offset: 3, expected: '|}', message: 'nesting limit of 1 exceeded' },
        { offset: 0, expected: '|}', message: 'unclosed table' },
      ]);
    });

    it('should not throw on thousands of nested tables', () => {
      const { diagnostics } = parse('{|\n'.repeat(5000));
      expect(diagnostics).toHaveLength(5000);
    });
  });

  describe('unclosed openers', () => {
    const timed = (text: string): number => {
      const started = Date.now();
      parse(text);
      return Date.now() - started;
    };

    it('should scan long runs of braces once', () => {
      expect(timed('{{'.repeat(20000))).toBeLessThan(2000);
      expect(timed('{{{'.repeat(15000))).toBeLessThan(2000);
    });

    it('should pair many unclosed tags once', () => {
      expect(timed('<span>'.repeat(20000))).toBeLessThan(2000);
    });

    it('should report an unclosed template once per opener', () => {
      const { diagnostics } = parse('{{a|{{b}}');
      expect(diagnostics).toEqual([{ offset: 0, expected: '}}', message: 'unclosed template' }]);
    });

    it('should still pair nested tags', () => {
      const [node] = parseNodes('<span><span>x</span></span>');
      expect(node).toMatchObject({ kind: 'html', tag: 'span', children: [{ kind: 'html', tag: 'span' }], end: 27 });
    });
  });

  describe('comments and tags', () => {
    it('should read comments', () => {
      expect(parseNodes('a<!-- hidden -->b')).toEqual([
        { kind: 'text', value: 'a', start: 0, end: 1 },
        { kind: 'comment', value: ' hidden ', start: 1, end: 16 },
        { kind: 'text', value: 'b', start: 16, end: 17 },
      ]);
    });

    it('should report an unclosed comment', () => {
      const { diagnostics } = parse('a<!-- x');
      expect(diagnostics).toEqual([{ offset: 1, expected: '-->', message: 'unclosed comment' }]);
    });

    it('should keep nowiki content literal', () => {
      const nodes = parseNodes('x<nowiki>{{t}}</nowiki>y');
      expect(nodes[1]).toMatchObject({
        kind: 'html',
        tag: 'nowiki',
        children: [{ kind: 'text', value: '{{t}}', literal: true }],
      });
      expect(nodes[2]).toMatchObject({ kind: 'text', value: 'y' });
    });

    it('should substitute literal markers', () => {
      const nodes = parseNodes(`${LITERAL_OPEN}0${LITERAL_CLOSE}`, { literals: ['{{frozen}}'] });
      expect(nodes).toEqual([{ kind: 'text', value: '{{frozen}}', literal: true, start: 0, end: 3 }]);
    });
  });
});
