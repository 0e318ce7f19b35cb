/**
 * Tests for record validation
 */

import { describe, it, expect } from 'vitest';
import { formatPath, validate, type LexicalEntry } from '../../src/schema/index.js';
import { ConfigError } from '../../src/lib/errors.js';

function entry(overrides: Partial<LexicalEntry> = {}): LexicalEntry {
  return {
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
    ...overrides,
  };
}

describe('validate', () => {
  it('should accept a well-formed entry and freeze it', () => {
    const result = validate(entry());
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.entry).toEqual(entry());
      expect(Object.isFrozen(result.entry)).toBe(true);
      expect(Object.isFrozen(result.entry.senses[0])).toBe(true);
    }
  });

  it('should report the path of an empty gloss', () => {
    expect(validate(entry({ senses: [{ gloss: '', examples: [], tags: [] }] }))).toEqual({
      ok: false,
      errors: [{ path: 'senses[0].gloss', reason: 'must not be empty' }],
    });
  });

  it('should reject fields the contract does not declare', () => {
    const result = validate({ ...entry(), pronunciation: 'x' });
    expect(result).toEqual({
      ok: false,
      errors: [{ path: '', reason: "Unrecognized key(s) in object: 'pronunciation'" }],
    });
  });

  it('should reject missing fields', () => {
    const { headword: _headword, ...rest } = entry();
    expect(validate(rest)).toEqual({ ok: false, errors: [{ path: 'headword', reason: 'Required' }] });
  });

  it('should require a sense or a form', () => {
    expect(validate(entry({ senses: [] }))).toEqual({
      ok: false,
      errors: [{ path: 'senses', reason: 'an entry needs at least one sense or form' }],
    });
    expect(validate(entry({ senses: [], forms: [{ form: '-it', tags: {}, source: 'conj-table' }] })).ok).toBe(true);
  });

  it('should refuse an unknown contract version', () => {
    expect(() => validate(entry(), '9')).toThrow(new ConfigError('Unknown schema version: 9'));
  });
});

describe('formatPath', () => {
  it('should write indexes in brackets', () => {
    expect(formatPath(['senses', 0, 'examples', 1, 'text'])).toBe('senses[0].examples[1].text');
    expect(formatPath([])).toBe('');
  });
});
