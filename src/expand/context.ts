/**
 * Expansion context: the active call stack of one page and its budget
 *
 * @module expand/context
 */

import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_EXPANSIONS } from '../lib/constants.js';
import { ExtractionAbortedError } from '../lib/errors.js';

export type CallKind = 'template' | 'module' | 'function';

export interface CallFrame {
  kind: CallKind;
  name: string;
  /** Name plus expanded argument values */
  signature: string;
}

export interface ExpansionLimits {
  /** Deepest allowed call stack */
  maxDepth: number;
  /** Template and module calls allowed per page */
  maxExpansions: number;
}

export const DEFAULT_LIMITS: ExpansionLimits = {
  maxDepth: DEFAULT_MAX_DEPTH,
  maxExpansions: DEFAULT_MAX_EXPANSIONS,
};

export type EnterResult =
  | { ok: true }
  | { ok: false; kind: 'expansion-cycle' | 'expansion-depth' | 'expansion-limit'; message: string };

/**
 * Stack of active calls for one page
 *
 * The same `(name, signature)` pair never appears twice on the stack:
 * `enter` refuses it as a cycle.
 */
export class ExpansionContext {
  private readonly stack: CallFrame[] = [];
  private readonly active = new Set<string>();
  private expansions = 0;

  constructor(
    readonly limits: ExpansionLimits = DEFAULT_LIMITS,
    private readonly signal?: AbortSignal | undefined
  ) {}

  /** Throw when the page has been cancelled */
  checkAbort(): void {
    if (this.signal?.aborted) throw new ExtractionAbortedError('page extraction aborted');
  }

  enter(frame: CallFrame): EnterResult {
    this.checkAbort();
    const key = `${frame.name}\u0000${frame.signature}`;
    if (this.active.has(key)) {
      return { ok: false, kind: 'expansion-cycle', message: `template loop detected: ${this.describe(frame.name)}` };
    }
    if (this.stack.length >= this.limits.maxDepth) {
      return {
        ok: false,
        kind: 'expansion-depth',
        message: `expansion depth limit of ${this.limits.maxDepth} exceeded at ${frame.name}`,
      };
    }
    if (this.expansions >= this.limits.maxExpansions) {
      return {
        ok: false,
        kind: 'expansion-limit',
        message: `expansion limit of ${this.limits.maxExpansions} calls exceeded at ${frame.name}`,
      };
    }
    this.expansions++;
    this.stack.push(frame);
    this.active.add(key);
    return { ok: true };
  }

  leave(): void {
    const frame = this.stack.pop();
    if (frame) this.active.delete(`${frame.name}\u0000${frame.signature}`);
  }

  /** Run `fn` inside `frame`, leaving it whatever happens */
  within<T>(fn: () => T): T {
    try {
      return fn();
    } finally {
      this.leave();
    }
  }

  get depth(): number {
    return this.stack.length;
  }

  get expansionCount(): number {
    return this.expansions;
  }

  /** Names on the stack, outermost first */
  names(): string[] {
    return this.stack.map(frame => frame.name);
  }

  private describe(name: string): string {
    const start = this.stack.findIndex(frame => frame.name === name);
    return [...this.stack.slice(Math.max(start, 0)).map(frame => frame.name), name].join(' → ');
  }
}
