/**
 * Tests for typed error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  ParseError,
  StoreUnavailableError,
  ConfigError,
  ExtractionAbortedError,
  InternalError,
  isTypedError,
  isFatalError,
  getExitCodeForError,
} from '../../src/lib/errors.js';

describe('Error Classes', () => {
  const cases = [
    { error: new StoreUnavailableError('store closed'), kind: 'STORE_UNAVAILABLE', name: 'StoreUnavailableError' },
    { error: new ConfigError('bad config'), kind: 'CONFIG', name: 'ConfigError' },
    { error: new ExtractionAbortedError('aborted'), kind: 'ABORTED', name: 'ExtractionAbortedError' },
    { error: new InternalError('oops'), kind: 'INTERNAL', name: 'InternalError' },
  ] as const;

  for (const { error, kind, name } of cases) {
    describe(name, () => {
      it('should be an instance of Error and of its class', () => {
        expect(error).toBeInstanceOf(Error);
        expect(error.constructor.name).toBe(name);
      });

      it(`should have kind = ${kind}`, () => {
        expect(error.kind).toBe(kind);
        expect(error.name).toBe(name);
      });
    });
  }

  describe('ParseError', () => {
    it('should carry the offset and the expected construct', () => {
      const error = new ParseError('unclosed template', 12, '}}');
      expect(error).toBeInstanceOf(ParseError);
      expect(error.kind).toBe('PARSE');
      expect(error.offset).toBe(12);
      expect(error.expected).toBe('}}');
      expect(error.message).toBe('unclosed template');
    });
  });
});

describe('isTypedError', () => {
  it('should recognise our errors', () => {
    expect(isTypedError(new ConfigError('x'))).toBe(true);
  });

  it('should reject plain errors and non-errors', () => {
    expect(isTypedError(new Error('x'))).toBe(false);
    expect(isTypedError({ kind: 'CONFIG', message: 'x' })).toBe(false);
    expect(isTypedError('CONFIG')).toBe(false);
  });
});

describe('isFatalError', () => {
  it('should treat store, abort and config failures as fatal', () => {
    expect(isFatalError(new StoreUnavailableError('x'))).toBe(true);
    expect(isFatalError(new ExtractionAbortedError('x'))).toBe(true);
    expect(isFatalError(new ConfigError('x'))).toBe(true);
  });

  it('should keep other failures page-local', () => {
    expect(isFatalError(new InternalError('x'))).toBe(false);
    expect(isFatalError(new ParseError('x', 0, ']]'))).toBe(false);
    expect(isFatalError(new TypeError('x'))).toBe(false);
  });
});

describe('getExitCodeForError', () => {
  it('should map kinds to exit codes', () => {
    expect(getExitCodeForError(new ConfigError('x'))).toBe(2);
    expect(getExitCodeForError(new StoreUnavailableError('x'))).toBe(3);
    expect(getExitCodeForError(new ExtractionAbortedError('x'))).toBe(130);
    expect(getExitCodeForError(new InternalError('x'))).toBe(1);
    expect(getExitCodeForError(new Error('x'))).toBe(1);
  });
});
