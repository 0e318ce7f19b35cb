/**
 * Tests for per-page extraction
 */

import { describe, it, expect } from 'vitest';
import { testConfig } from '../extract/fixtures.js';
import { DiagnosticSink } from '../../src/lib/diagnostics.js';
import { ExtractionAbortedError, StoreUnavailableError } from '../../src/lib/errors.js';
import { PageExtractor } from '../../src/pipeline/index.js';
import { MemoryPageStore, type StoreRecords } from '../../src/store/index.js';
import { findAll } from '../../src/wikitext/index.js';
import type { ExtractionConfig } from '../../src/lib/config-schema.js';

function extractor(records: StoreRecords = {}, config: ExtractionConfig = testConfig()): PageExtractor {
  return new PageExtractor({ store: MemoryPageStore.fromRecords(records), config });
}

const VERB = '== Finnish ==\n=== Verb ===\n';

describe('PageExtractor', () => {
  it('should extract a validated entry', () => {
    const result = extractor().extract({ title: 'sortaa', text: `${VERB}# to oppress` });
    expect(result.title).toBe('sortaa');
    expect(result.diagnostics).toEqual([]);
    expect(result.entries).toMatchObject([
      { language: 'Finnish', pos: 'Verb', senses: [{ gloss: 'to oppress', examples: [], tags: [] }] },
    ]);
    expect(Object.isFrozen(result.entries[0])).toBe(true);
  });

  it('should read forms from the output of an inflection template', () => {
    const result = extractor({ templates: { 'conj-table': 'form: -it' } }).extract({
      title: 'sortaa',
      text: `${VERB}{{conj-table|type=A}}\n# to oppress`,
    });
    expect(result.entries[0]?.forms).toEqual([{ form: '-it', tags: { label: 'form' }, source: 'conj-table' }]);
    expect(result.entries[0]?.senses).toEqual([{ gloss: 'to oppress', examples: [], tags: [] }]);
  });

  it('should decompose inflection tables', () => {
    const table = '{|\n! case !! singular !! plural\n|-\n! genitive\n| kissan || kissojen\n|}';
    const result = extractor({ templates: { 'fi-decl-kala': table } }).extract({
      title: 'kissa',
      text: '== Finnish ==\n=== Noun ===\n{{fi-decl-kala}}\n# cat',
    });
    expect(result.entries[0]?.forms).toEqual([
      { form: 'kissan', tags: { number: 'singular', case: 'genitive' }, source: 'fi-decl-kala' },
      { form: 'kissojen', tags: { number: 'plural', case: 'genitive' }, source: 'fi-decl-kala' },
    ]);
  });

  it('should keep an undefined template literally in the gloss and report the miss', () => {
    const pages = extractor();
    const page = { title: 'sortaa', text: `${VERB}# {{undefined-template}} to oppress` };
    const result = pages.extract(page);
    expect(result.entries[0]?.senses).toEqual([{ gloss: '{{undefined-template}} to oppress', examples: [], tags: [] }]);
    expect(result.diagnostics).toEqual([
      {
        page: 'sortaa',
        kind: 'resolution-miss',
        message: 'template not found: undefined-template',
        offset: 29,
        stack: [],
      },
    ]);

    const root = pages.expandPage(page, new DiagnosticSink('sortaa'));
    expect(findAll(root.children, 'text').filter(node => node.literal)).toEqual([
      {
        kind: 'text',
        value: '{{undefined-template}}',
        literal: true,
        origin: 'undefined-template',
        start: 29,
        end: 51,
      },
    ]);
  });

  it('should reject entries that fail the schema', () => {
    const result = extractor().extract({ title: 'sortaa', text: `${VERB}no definitions here` });
    expect(result.entries).toEqual([]);
    expect(result.diagnostics).toEqual([
      {
        page: 'sortaa',
        kind: 'validation',
        message: 'entry 0 (Finnish Verb) rejected: an entry needs at least one sense or form',
        path: 'senses',
        section: 'Finnish',
      },
    ]);
  });

  it('should report a module that runs out of budget', () => {
    const config = testConfig();
    config.limits.maxSteps = 1000;
    const result = extractor(
      { modules: { loop: 'local p = {}\nfunction p.main() while true do end end\nreturn p' } },
      config
    ).extract({ title: 'sortaa', text: `${VERB}# {{#invoke:loop|main}}to oppress` });
    expect(result.diagnostics).toMatchObject([
      { kind: 'sandbox-timeout', message: 'loop.main: step budget of 1000 exceeded', offset: 29 },
    ]);
  });

  it('should read the page as a reader sees it', () => {
    const result = extractor().extract({
      title: 'sortaa',
      text: `${VERB}# to oppress<includeonly>\n# hidden</includeonly>`,
    });
    expect(result.entries[0]?.senses).toEqual([{ gloss: 'to oppress', examples: [], tags: [] }]);
  });

  it('should report offsets into the page text', () => {
    const result = extractor().extract({
      title: 'sortaa',
      text: `${VERB}<includeonly>x</includeonly># {{undefined-template}} to oppress`,
    });
    expect(result.diagnostics).toMatchObject([{ kind: 'resolution-miss', offset: 57 }]);
  });

  it('should keep entries of a page with deeply nested tables', () => {
    const result = extractor().extract({ title: 'sortaa', text: `${VERB}# to oppress\n${'{|\n'.repeat(3000)}` });
    expect(result.entries).toMatchObject([{ language: 'Finnish', pos: 'Verb', senses: [{ gloss: 'to oppress' }] }]);
    expect(result.diagnostics.filter(d => d.kind === 'internal')).toEqual([]);
  });

  it('should throw when the store is unavailable', () => {
    const store = MemoryPageStore.fromRecords({ templates: { t: 'x' } });
    const pages = new PageExtractor({ store, config: testConfig() });
    store.close();
    expect(() => pages.extract({ title: 'sortaa', text: `${VERB}{{t}}` })).toThrow(StoreUnavailableError);
  });

  it('should throw when cancelled', () => {
    const controller = new AbortController();
    controller.abort();
    expect(() => extractor().extract({ title: 'sortaa', text: `${VERB}{{t}}` }, controller.signal)).toThrow(
      ExtractionAbortedError
    );
  });
});
