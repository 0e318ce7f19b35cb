/**
 * Template frames and argument binding
 *
 * @module expand/frame
 */

import type { TemplateParam, WikiNode } from '../wikitext/index.js';

/** Expands nodes in a frame; supplied by the engine */
export type NodeExpander = (nodes: readonly WikiNode[], frame: TemplateFrame) => string;

type ArgSource =
  | { kind: 'nodes'; nodes: readonly WikiNode[]; caller: TemplateFrame; trim: boolean }
  | { kind: 'text'; text: string };

/**
 * One template call (or the page itself) and its arguments
 *
 * Argument values are expanded in the caller's frame on first use and then
 * memoized, so an argument the body never reads is never expanded.
 */
export class TemplateFrame {
  private readonly sources = new Map<string, ArgSource>();
  private readonly values = new Map<string, string>();

  constructor(
    /** Full title, e.g. `Template:conj-table` */
    readonly title: string,
    readonly parent: TemplateFrame | null,
    private readonly expand: NodeExpander,
    /** Declared defaults used when an argument is absent */
    readonly defaults: Readonly<Record<string, string>> = {}
  ) {}

  /**
   * Bind the params of a call: positional ones are numbered from 1 and
   * kept untrimmed, named ones are trimmed, later duplicates win
   */
  static fromParams(
    title: string,
    caller: TemplateFrame,
    params: readonly TemplateParam[],
    expand: NodeExpander,
    defaults?: Readonly<Record<string, string>>
  ): TemplateFrame {
    const frame = new TemplateFrame(title, caller, expand, defaults);
    let position = 0;
    for (const param of params) {
      if (param.name === null) {
        position++;
        frame.sources.set(String(position), { kind: 'nodes', nodes: param.value, caller, trim: false });
      } else {
        const name = expand(param.name, caller).trim();
        frame.sources.set(name, { kind: 'nodes', nodes: param.value, caller, trim: true });
      }
    }
    return frame;
  }

  /** A frame whose arguments are already text, as module code passes them */
  static fromText(
    title: string,
    parent: TemplateFrame | null,
    args: ReadonlyMap<string, string>,
    expand: NodeExpander,
    defaults?: Readonly<Record<string, string>>
  ): TemplateFrame {
    const frame = new TemplateFrame(title, parent, expand, defaults);
    for (const [name, text] of args) frame.sources.set(name, { kind: 'text', text });
    return frame;
  }

  /** Expanded value of an argument passed by the call */
  getArg(name: string): string | undefined {
    const cached = this.values.get(name);
    if (cached !== undefined) return cached;
    const source = this.sources.get(name);
    if (!source) return undefined;
    let value: string;
    if (source.kind === 'text') {
      value = source.text;
    } else {
      const expanded = this.expand(source.nodes, source.caller);
      value = source.trim ? expanded.trim() : expanded;
    }
    this.values.set(name, value);
    return value;
  }

  /** Declared default of an argument, when the call does not pass it */
  defaultFor(name: string): string | undefined {
    return Object.hasOwn(this.defaults, name) ? this.defaults[name] : undefined;
  }

  argNames(): string[] {
    return [...this.sources.keys()];
  }

  /** Positional arguments passed in order, `"1"` to `"n"` without gaps */
  positional(): string[] {
    const values: string[] = [];
    for (let i = 1; ; i++) {
      const value = this.getArg(String(i));
      if (value === undefined) return values;
      values.push(value);
    }
  }

  /**
   * Name plus every expanded argument; two calls with equal signatures
   * expand identically
   */
  signature(name: string): string {
    const parts = this.argNames()
      .sort()
      .map(key => `${key}=${this.getArg(key) ?? ''}`);
    return [name, ...parts].join('|');
  }
}
