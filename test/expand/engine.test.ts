/**
 * Tests for the macro expansion engine and parser functions
 */

import { describe, it, expect } from 'vitest';
import { Expander, type ExpanderOptions } from '../../src/expand/index.js';
import { DiagnosticSink } from '../../src/lib/diagnostics.js';
import { ExtractionAbortedError } from '../../src/lib/errors.js';
import { Sandbox } from '../../src/lua/index.js';
import { MemoryPageStore, Resolver, type StoreRecords } from '../../src/store/index.js';
import { findAll, parse, toText } from '../../src/wikitext/index.js';

function setup(records: StoreRecords = {}, options: Partial<ExpanderOptions> = {}) {
  const resolver = new Resolver(MemoryPageStore.fromRecords(records));
  const diagnostics = new DiagnosticSink('kissa');
  const expander = new Expander({
    title: 'kissa',
    resolver,
    sandbox: new Sandbox(resolver),
    diagnostics,
    ...options,
  });
  return { expander, diagnostics };
}

function render(text: string, records: StoreRecords = {}): string {
  return setup(records).expander.render(text);
}

function mainModule(body: string): string {
  return `local p = {}\nfunction p.main(frame)\n${body}\nend\nreturn p`;
}

describe('Expander', () => {
  describe('templates', () => {
    it('should substitute arguments into the body', () => {
      expect(render('{{t|x}}', { templates: { t: 'a{{{1}}}b' } })).toBe('axb');
    });

    it('should trim named arguments only', () => {
      expect(render('{{t| a | k = v }}', { templates: { t: '[{{{1}}}][{{{k}}}]' } })).toBe('[ a ][v]');
    });

    it('should use the fallback and then keep the argument literally', () => {
      expect(render('{{t}}', { templates: { t: '{{{x|def}}}/{{{y}}}' } })).toBe('def/{{{y}}}');
    });

    it('should apply templatedata defaults and drop noinclude content', () => {
      const body =
        'form: -{{{type}}}<noinclude><templatedata>{"params":{"type":{"default":"A"}}}</templatedata></noinclude>';
      expect(render('{{conj-table}}', { templates: { 'conj-table': body } })).toBe('form: -A');
    });

    it('should strip subst prefixes', () => {
      expect(render('{{subst:t}}', { templates: { t: 'x' } })).toBe('x');
    });

    it('should transclude pages of other namespaces', () => {
      expect(render('{{Appendix:x}}', { pages: { 'Appendix:x': 'shown<noinclude> hidden</noinclude>' } })).toBe('shown');
    });

    it('should keep a missing template literally and report it', () => {
      const { expander, diagnostics } = setup();
      expect(expander.render('{{undefined-template}}')).toBe('{{undefined-template}}');
      expect(diagnostics.all).toEqual([
        {
          page: 'kissa',
          kind: 'resolution-miss',
          message: 'template not found: undefined-template',
          offset: undefined,
          stack: [],
        },
      ]);
    });

    it('should protect nowiki content from expansion', () => {
      expect(render('<nowiki>{{t}}</nowiki>', { templates: { t: 'x' } })).toBe('{{t}}');
    });
  });

  describe('limits', () => {
    it('should stop a template that calls itself', () => {
      const { expander, diagnostics } = setup({ templates: { a: 'x{{a}}' } });
      expect(expander.render('{{a}}')).toBe('x{{a}}');
      expect(diagnostics.all).toMatchObject([
        { kind: 'expansion-cycle', message: 'template loop detected: a → a', stack: ['a'] },
      ]);
    });

    it('should stop a cycle through two templates', () => {
      const { expander, diagnostics } = setup({ templates: { a: 'x{{b}}', b: 'y{{a}}' } });
      expect(expander.render('{{a}}')).toBe('xy{{a}}');
      expect(diagnostics.all).toMatchObject([{ kind: 'expansion-cycle', message: 'template loop detected: a → b → a' }]);
    });

    it('should allow recursion with changing arguments', () => {
      const { expander, diagnostics } = setup({ templates: { t: '{{#if:{{{1|}}}|[{{{1}}}]{{t}}|end}}' } });
      expect(expander.render('{{t|x}}')).toBe('[x]end');
      expect(diagnostics.count()).toBe(0);
    });

    it('should stop at the depth limit', () => {
      const { expander, diagnostics } = setup(
        { templates: { a: '{{b}}', b: '{{c}}', c: '{{d}}', d: 'done' } },
        { limits: { maxDepth: 3, maxExpansions: 100 } }
      );
      expect(expander.render('{{a}}')).toBe('{{d}}');
      expect(diagnostics.all).toMatchObject([
        { kind: 'expansion-depth', message: 'expansion depth limit of 3 exceeded at d', stack: ['a', 'b', 'c'] },
      ]);
    });

    it('should stop at the expansion limit', () => {
      const { expander, diagnostics } = setup({ templates: { t: 'x' } }, { limits: { maxDepth: 10, maxExpansions: 2 } });
      expect(expander.render('{{t}}{{t}}{{t}}')).toBe('xx{{t}}');
      expect(expander.expansionCount).toBe(2);
      expect(diagnostics.count('expansion-limit')).toBe(1);
    });

    it('should throw once the signal is aborted', () => {
      const controller = new AbortController();
      controller.abort();
      const { expander } = setup({}, { signal: controller.signal });
      expect(() => expander.render('{{t}}')).toThrow(ExtractionAbortedError);
    });
  });

  describe('modules', () => {
    const records: StoreRecords = {
      templates: {
        'conj-table': '{{#invoke:m|main|x}}',
        t: '({{{1}}})',
      },
      modules: {
        m: mainModule('return "[" .. frame.args[1] .. "]" .. frame:getParent().args.type'),
        calls: mainModule('return frame:expandTemplate{ title = "t", args = { "v" } } .. frame:preprocess("{{t|w}}")'),
        broken: mainModule('error("bad")'),
      },
    };

    it('should invoke a module with its frame and the caller as parent', () => {
      expect(render('{{conj-table|type=A}}', records)).toBe('[x]A');
    });

    it('should let modules expand templates and wikitext', () => {
      expect(render('{{#invoke:calls|main}}', records)).toBe('(v)(w)');
    });

    it('should turn a module error into an error marker', () => {
      const { expander, diagnostics } = setup(records);
      expect(expander.render('{{#invoke:broken|main}}')).toBe(
        '<strong class="error">Lua error: Module:broken:3: bad</strong>'
      );
      expect(diagnostics.all).toMatchObject([{ kind: 'sandbox-fault', message: 'broken.main: Module:broken:3: bad' }]);
    });

    it('should keep a call to a missing module literally', () => {
      const { expander, diagnostics } = setup(records);
      expect(expander.render('{{#invoke:nope|main}}')).toBe('{{#invoke:nope|main}}');
      expect(diagnostics.all).toMatchObject([{ kind: 'resolution-miss', message: 'module not found: nope' }]);
    });

    it('should require a function name', () => {
      expect(render('{{#invoke:m}}', records)).toBe(
        '<strong class="error">Script error: you must specify a function to call.</strong>'
      );
    });
  });

  describe('expandTree', () => {
    it('should return a tree without calls unchanged', () => {
      const { root } = parse('plain [[text]]');
      expect(setup().expander.expandTree(root)).toBe(root);
    });

    it('should splice expanded nodes tagged with their call', () => {
      const { expander } = setup({ templates: { t: '[[x]]' } });
      const expanded = expander.expandTree(parse('a {{t}} b').root);
      expect(toText(expanded.children)).toBe('a x b');
      expect(findAll(expanded.children, 'link')).toMatchObject([{ origin: 't', start: 2, end: 7 }]);
    });

    it('should report page-level misses at their offset', () => {
      const { expander, diagnostics } = setup();
      const expanded = expander.expandTree(parse('x {{nope}}').root);
      expect(expanded.children).toContainEqual({
        kind: 'text',
        value: '{{nope}}',
        literal: true,
        origin: 'nope',
        start: 2,
        end: 10,
      });
      expect(diagnostics.all).toMatchObject([{ kind: 'resolution-miss', offset: 2, stack: [] }]);
    });

    it('should expand the same page the same way twice', () => {
      const records: StoreRecords = { templates: { t: "''{{{1}}}''" } };
      const first = setup(records).expander.expandTree(parse('{{t|a}} {{t|b}}').root);
      const second = setup(records).expander.expandTree(parse('{{t|a}} {{t|b}}').root);
      expect(second).toEqual(first);
    });
  });
});

describe('parser functions', () => {
  it.each([
    ['{{#if: x | yes | no }}', 'yes'],
    ['{{#if:|yes|no}}', 'no'],
    ['{{#ifeq: 01 | 1 | same | diff }}', 'same'],
    ['{{#ifeq: a | b | same | diff }}', 'diff'],
    ['{{#switch: b | a = 1 | b | c = 2 | #default = 3 }}', '2'],
    ['{{#switch: z | a = 1 | #default = 3 }}', '3'],
    ['{{#switch: z | a = 1 | other }}', 'other'],
    ['{{#expr: 2 * (3 + 4) }}', '14'],
    ['{{#ifexpr: 1 > 2 | big | small }}', 'small'],
    ['{{#iferror:{{#expr:1/0}}|bad|good}}', 'bad'],
    ['{{#iferror:5|bad}}', '5'],
    ['{{lc:ABC}}', 'abc'],
    ['{{ucfirst:äbc}}', 'Äbc'],
    ['{{padleft:7|3}}', '007'],
    ['{{padright:ab|5|xy}}', 'abxyx'],
    ['{{#len:héllo}}', '5'],
    ['{{#titleparts:a/b/c|2|2}}', 'b/c'],
    ['{{#tag:span|x|class=y}}', '<span class="y">x</span>'],
    ['{{urlencode:a b&c}}', 'a+b%26c'],
  ])('should expand %s', (text, expected) => {
    expect(render(text)).toBe(expected);
  });

  it('should report expression errors', () => {
    expect(render('{{#expr: 1/0 }}')).toBe('<strong class="error">Expression error: Division by zero.</strong>');
  });

  it('should check page existence', () => {
    const records: StoreRecords = { templates: { t: 'x' } };
    expect(render('{{#ifexist:Template:t|y|n}}/{{#ifexist:Template:u|y|n}}', records)).toBe('y/n');
  });

  it('should expand only the branch taken', () => {
    const { expander, diagnostics } = setup();
    expect(expander.render('{{#if:x|ok|{{missing}}}}')).toBe('ok');
    expect(diagnostics.count()).toBe(0);
  });
});

describe('magic words', () => {
  it.each([
    ['{{PAGENAME}}', 'kissa'],
    ['{{FULLPAGENAME:template:foo_bar}}', 'Template:foo bar'],
    ['{{NAMESPACE:Template:x}}', 'Template'],
    ['{{SUBPAGENAME:Template:a/b}}', 'b'],
    ['{{BASEPAGENAME:Template:a/b}}', 'a'],
    ['a{{!}}b', 'a|b'],
  ])('should expand %s', (text, expected) => {
    expect(render(text)).toBe(expected);
  });
});
