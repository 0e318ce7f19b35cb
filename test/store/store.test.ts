/**
 * Tests for the page store, name normalization and the resolver
 */

import { describe, it, expect, vi } from 'vitest';
import {
  MemoryPageStore,
  Resolver,
  cleanName,
  definitionTitle,
  discoverExports,
  normalizeDefinitionName,
  normalizeTitle,
  redirectTarget,
  splitTitle,
  templateDataDefaults,
  type PageStore,
} from '../../src/store/index.js';
import { StoreUnavailableError } from '../../src/lib/errors.js';

describe('names', () => {
  it('should clean underscores, whitespace and a leading colon', () => {
    expect(cleanName('  foo__bar  baz ')).toBe('foo bar baz');
    expect(cleanName(':Category:Verbs')).toBe('Category:Verbs');
  });

  it('should split known namespace prefixes only', () => {
    expect(splitTitle('template:conj_table')).toEqual({ namespace: 10, name: 'conj table' });
    expect(splitTitle('Foo:bar')).toEqual({ namespace: 0, name: 'Foo:bar' });
  });

  it('should canonicalize the namespace and keep case by default', () => {
    expect(normalizeTitle('template:foo_bar')).toBe('Template:foo bar');
    expect(normalizeTitle('kissa')).toBe('kissa');
    expect(normalizeTitle('kissa', { capitalize: true })).toBe('Kissa');
  });

  it('should strip the namespace from definition names', () => {
    expect(normalizeDefinitionName(' Template:conj_table ', 'template')).toBe('conj table');
    expect(normalizeDefinitionName('Module:fi-headword', 'module')).toBe('fi-headword');
    expect(definitionTitle('fi-headword', 'module')).toBe('Module:fi-headword');
  });
});

describe('definitions', () => {
  it('should read redirect targets', () => {
    expect(redirectTarget('#REDIRECT [[Template:new]]')).toBe('Template:new');
    expect(redirectTarget('#redirect: [[ Template:new | x]]')).toBe('Template:new');
    expect(redirectTarget('text')).toBeUndefined();
  });

  it('should read templatedata defaults', () => {
    const body = 'x<templatedata>{"params":{"type":{"default":"A"},"n":{"default":3},"m":{}}}</templatedata>';
    expect(templateDataDefaults(body)).toEqual({ type: 'A', n: '3' });
  });

  it('should ignore malformed templatedata', () => {
    expect(templateDataDefaults('<templatedata>{oops</templatedata>')).toEqual({});
    expect(templateDataDefaults('<templatedata>{"params":[1]}</templatedata>')).toEqual({});
  });

  it('should discover exported functions in source order', () => {
    const source = [
      'local p = {}',
      'function p.show(frame) end',
      'p.other = function() end',
      'p["quoted"] = function() end',
      'local function helper() end',
      'return p -- exports',
    ].join('\n');
    expect(discoverExports(source)).toEqual(['show', 'other', 'quoted']);
  });

  it('should find no exports without a final return', () => {
    expect(discoverExports('function p.show() end')).toEqual([]);
  });
});

describe('MemoryPageStore', () => {
  it('should derive template definitions from pages', () => {
    const store = MemoryPageStore.fromRecords({ templates: { 'conj-table': 'form: -{{{type}}}' } });
    expect(store.getTemplate('Template:conj-table')).toEqual({
      name: 'conj-table',
      body: 'form: -{{{type}}}',
      defaults: {},
    });
    expect(store.getPage('template:conj-table')?.namespace).toBe(10);
  });

  it('should record module metadata', () => {
    const store = new MemoryPageStore({ language: 'fi' });
    const page = store.addModule('m', 'local p = {}\nfunction p.main(frame) return "x" end\nreturn p');
    expect(page).toMatchObject({ title: 'Module:m', namespace: 828, model: 'Scribunto', language: 'fi', revisionId: 1 });
    expect(store.getModule('m')?.exports).toEqual(['main']);
  });

  it('should replace a page and its cached definition', () => {
    const store = new MemoryPageStore();
    store.addTemplate('t', 'one');
    expect(store.getTemplate('t')?.body).toBe('one');
    store.addTemplate('t', 'two');
    expect(store.getTemplate('t')?.body).toBe('two');
    expect(store.size).toBe(1);
  });

  it('should list titles by namespace', () => {
    const store = MemoryPageStore.fromRecords({ pages: { kissa: 'a', koira: 'b' }, templates: { t: 'x' } });
    expect(store.titles(0)).toEqual(['kissa', 'koira']);
    expect(store.titles()).toEqual(['kissa', 'koira', 'Template:t']);
  });

  it('should fail every lookup once closed', () => {
    const store = MemoryPageStore.fromRecords({ pages: { kissa: 'a' } });
    store.close();
    expect(() => store.getPage('kissa')).toThrow(StoreUnavailableError);
    expect(() => store.getTemplate('t')).toThrow('page store is closed');
  });
});

describe('Resolver', () => {
  it('should follow template redirects', () => {
    const store = MemoryPageStore.fromRecords({
      templates: { old: '#REDIRECT [[Template:new]]', new: 'body' },
    });
    const result = new Resolver(store).resolve('Template:old', 'template');
    expect(result).toEqual({ found: true, definition: { name: 'new', body: 'body', defaults: {} } });
  });

  it('should report a redirect loop as not found', () => {
    const store = MemoryPageStore.fromRecords({
      templates: { a: '#REDIRECT [[Template:b]]', b: '#REDIRECT [[Template:a]]' },
    });
    expect(new Resolver(store).resolveTemplate('a')).toEqual({ found: false, kind: 'template', name: 'a' });
  });

  it('should not follow redirects out of the template namespace', () => {
    const store = MemoryPageStore.fromRecords({ templates: { a: '#REDIRECT [[kissa]]' }, pages: { kissa: 'x' } });
    expect(new Resolver(store).resolveTemplate('a').found).toBe(false);
  });

  it('should memoize misses', () => {
    const store: PageStore = {
      getPage: vi.fn(() => undefined),
      getTemplate: vi.fn(() => undefined),
      getModule: vi.fn(() => undefined),
    };
    const resolver = new Resolver(store);
    resolver.resolveTemplate('missing');
    resolver.resolveTemplate('Template:missing');
    expect(store.getTemplate).toHaveBeenCalledTimes(1);
    expect(resolver.cacheStats().templates).toMatchObject({ hits: 1, misses: 1 });
  });

  it('should resolve modules case-sensitively unless capitalizing', () => {
    const store = MemoryPageStore.fromRecords({ modules: { Links: 'local p = {}\nreturn p' } });
    expect(new Resolver(store).resolveModule('links').found).toBe(false);

    const folding = MemoryPageStore.fromRecords({ modules: { Links: 'local p = {}\nreturn p' } }, { capitalize: true });
    expect(new Resolver(folding, { capitalize: true }).resolveModule('links')).toMatchObject({
      found: true,
      definition: { name: 'Links', exports: [] },
    });
  });

  it('should check page existence', () => {
    const resolver = new Resolver(MemoryPageStore.fromRecords({ pages: { kissa: 'x' } }));
    expect(resolver.pageExists('kissa')).toBe(true);
    expect(resolver.pageExists('koira')).toBe(false);
  });
});
