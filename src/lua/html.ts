/**
 * `mw.html`: a fluent HTML builder for module code
 *
 * @module lua/html
 */

import type { Interpreter } from './interpreter.js';
import { native } from './library.js';
import { LuaTable, luaType, tostringPrimitive, type LuaValue } from './values.js';

const VOID_TAGS = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

export function escapeAttribute(value: string): string {
  return value.replace(/[&"<>]/g, ch => `&#${ch.charCodeAt(0)};`);
}

/**
 * One element (or a tagless fragment) of an mw.html tree
 */
export class HtmlBuilder {
  readonly attributes = new Map<string, string>();
  readonly styles: string[] = [];
  readonly nodes: (HtmlBuilder | string)[] = [];
  /** The Lua table module code holds for this builder */
  table: LuaTable | undefined;

  constructor(
    readonly tagName: string | undefined,
    readonly selfClosing: boolean,
    readonly parent: HtmlBuilder | null
  ) {}

  get root(): HtmlBuilder {
    let node: HtmlBuilder = this;
    while (node.parent) node = node.parent;
    return node;
  }

  addClass(name: string): void {
    const current = this.attributes.get('class');
    const classes = current ? current.split(' ') : [];
    if (!classes.includes(name)) classes.push(name);
    this.attributes.set('class', classes.join(' '));
  }

  css(name: string, value: string | undefined): void {
    const prefix = `${name}:`;
    const index = this.styles.findIndex(style => style.startsWith(prefix));
    if (value === undefined) {
      if (index !== -1) this.styles.splice(index, 1);
      return;
    }
    const style = `${name}:${value}`;
    if (index === -1) this.styles.push(style);
    else this.styles[index] = style;
  }

  toString(): string {
    const content = this.nodes.map(node => node.toString()).join('');
    if (this.tagName === undefined) return content;
    let open = `<${this.tagName}`;
    for (const [name, value] of this.attributes) open += ` ${name}="${escapeAttribute(value)}"`;
    if (this.styles.length > 0) open += ` style="${escapeAttribute(this.styles.join(';'))}"`;
    if (this.selfClosing && content === '') return `${open} />`;
    return `${open}>${content}</${this.tagName}>`;
  }
}

/**
 * Build the `mw.html` library table
 */
export function createHtmlLibrary(interp: Interpreter): LuaTable {
  const builders = new WeakMap<LuaTable, HtmlBuilder>();
  const methods = new LuaTable();
  const metatable = LuaTable.from([], { __index: methods });

  const wrap = (builder: HtmlBuilder): LuaTable => {
    if (builder.table) return builder.table;
    const table = new LuaTable();
    table.metatable = metatable;
    builders.set(table, builder);
    builder.table = table;
    return table;
  };

  const unwrap = (value: LuaValue, method: string): HtmlBuilder => {
    const builder = value instanceof LuaTable ? builders.get(value) : undefined;
    if (!builder) throw interp.runtimeError(`mw.html:${method}: method called on a ${luaType(value)}, not a builder`);
    return builder;
  };

  const create = (tagName: LuaValue, options: LuaValue, parent: HtmlBuilder | null): HtmlBuilder => {
    const name = typeof tagName === 'string' && tagName !== '' ? tagName : undefined;
    const explicit = options instanceof LuaTable && options.get('selfClosing') !== undefined;
    const selfClosing = explicit
      ? options instanceof LuaTable && options.get('selfClosing') === true
      : name !== undefined && VOID_TAGS.has(name);
    return new HtmlBuilder(name, selfClosing, parent);
  };

  const text = (value: LuaValue): string | undefined =>
    value === undefined ? undefined : tostringPrimitive(value) ?? interp.tostring(value);

  const define = (name: string, impl: (builder: HtmlBuilder, args: LuaValue[]) => LuaValue): void => {
    methods.set(
      name,
      native(`mw.html:${name}`, ([self, ...args]) => [impl(unwrap(self, name), args)])
    );
  };

  define('node', (builder, [child]) => {
    if (child !== undefined) {
      const node = child instanceof LuaTable ? builders.get(child) : undefined;
      builder.nodes.push(node ?? interp.tostring(child));
    }
    return wrap(builder);
  });

  define('wikitext', (builder, values) => {
    for (const value of values) {
      const content = text(value);
      if (content === undefined) break;
      builder.nodes.push(content);
    }
    return wrap(builder);
  });

  define('newline', builder => {
    builder.nodes.push('\n');
    return wrap(builder);
  });

  define('tag', (builder, [tagName, options]) => {
    if (typeof tagName !== 'string') throw interp.runtimeError('mw.html:tag: tag name must be a string');
    const child = create(tagName, options, builder);
    builder.nodes.push(child);
    return wrap(child);
  });

  define('attr', (builder, [name, value]) => {
    if (name instanceof LuaTable) {
      for (const [key, item] of name.entries()) {
        const content = text(item);
        if (typeof key === 'string' && content !== undefined) builder.attributes.set(key, content);
      }
    } else if (typeof name === 'string') {
      const content = text(value);
      if (content === undefined) builder.attributes.delete(name);
      else builder.attributes.set(name, content);
    } else {
      throw interp.runtimeError('mw.html:attr: invalid attribute name');
    }
    return wrap(builder);
  });

  define('getAttr', (builder, [name]) => (typeof name === 'string' ? builder.attributes.get(name) : undefined));

  define('addClass', (builder, [name]) => {
    const content = text(name);
    if (content !== undefined) builder.addClass(content);
    return wrap(builder);
  });

  define('css', (builder, [name, value]) => {
    if (name instanceof LuaTable) {
      for (const [key, item] of name.entries()) {
        if (typeof key === 'string') builder.css(key, text(item));
      }
    } else if (typeof name === 'string') {
      builder.css(name, text(value));
    } else {
      throw interp.runtimeError('mw.html:css: invalid property name');
    }
    return wrap(builder);
  });

  define('cssText', (builder, [css]) => {
    const content = text(css);
    if (content) builder.styles.push(content.replace(/;\s*$/, ''));
    return wrap(builder);
  });

  define('done', builder => wrap(builder.parent ?? builder));

  define('allDone', builder => wrap(builder.root));

  metatable.set(
    '__tostring',
    native('mw.html.__tostring', ([self]) => [unwrap(self, 'tostring').toString()])
  );

  return LuaTable.from([], {
    create: native('mw.html.create', ([tagName, options]) => [wrap(create(tagName, options, null))]),
  });
}
