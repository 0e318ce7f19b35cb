/**
 * Tests for the expansion call stack and its budget
 */

import { describe, it, expect } from 'vitest';
import { ExpansionContext } from '../../src/expand/context.js';
import { ExtractionAbortedError } from '../../src/lib/errors.js';

describe('ExpansionContext', () => {
  it('should refuse the same call twice on the stack', () => {
    const ctx = new ExpansionContext();
    expect(ctx.enter({ kind: 'template', name: 'a', signature: 'a' })).toEqual({ ok: true });
    expect(ctx.enter({ kind: 'template', name: 'b', signature: 'b' })).toEqual({ ok: true });
    expect(ctx.enter({ kind: 'template', name: 'a', signature: 'a' })).toEqual({
      ok: false,
      kind: 'expansion-cycle',
      message: 'template loop detected: a → b → a',
    });
  });

  it('should allow the same name with other arguments', () => {
    const ctx = new ExpansionContext();
    ctx.enter({ kind: 'template', name: 'a', signature: 'a|1=x' });
    expect(ctx.enter({ kind: 'template', name: 'a', signature: 'a' }).ok).toBe(true);
    expect(ctx.names()).toEqual(['a', 'a']);
  });

  it('should enforce the depth limit', () => {
    const ctx = new ExpansionContext({ maxDepth: 2, maxExpansions: 10 });
    ctx.enter({ kind: 'template', name: 'a', signature: 'a' });
    ctx.enter({ kind: 'module', name: 'b', signature: 'b' });
    expect(ctx.enter({ kind: 'template', name: 'c', signature: 'c' })).toEqual({
      ok: false,
      kind: 'expansion-depth',
      message: 'expansion depth limit of 2 exceeded at c',
    });
  });

  it('should count calls against the expansion limit', () => {
    const ctx = new ExpansionContext({ maxDepth: 10, maxExpansions: 2 });
    for (let i = 0; i < 2; i++) {
      ctx.enter({ kind: 'template', name: 't', signature: 't' });
      ctx.leave();
    }
    expect(ctx.enter({ kind: 'template', name: 't', signature: 't' })).toEqual({
      ok: false,
      kind: 'expansion-limit',
      message: 'expansion limit of 2 calls exceeded at t',
    });
    expect(ctx.expansionCount).toBe(2);
  });

  it('should leave the frame when the body throws', () => {
    const ctx = new ExpansionContext();
    ctx.enter({ kind: 'template', name: 'a', signature: 'a' });
    expect(() =>
      ctx.within(() => {
        throw new Error('body failed');
      })
    ).toThrow('body failed');
    expect(ctx.depth).toBe(0);
    expect(ctx.enter({ kind: 'template', name: 'a', signature: 'a' }).ok).toBe(true);
  });

  it('should stop once the signal is aborted', () => {
    const controller = new AbortController();
    const ctx = new ExpansionContext(undefined, controller.signal);
    controller.abort();
    expect(() => ctx.enter({ kind: 'template', name: 'a', signature: 'a' })).toThrow(ExtractionAbortedError);
  });
});
