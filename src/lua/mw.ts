/**
 * The Scribunto `mw` library
 *
 * Covers what Wiktionary modules lean on: mw.text, mw.ustring, mw.html,
 * mw.title, mw.language, mw.uri, mw.site, mw.loadData and the frame
 * accessors. Everything reads from the local page store; nothing reaches
 * the network.
 *
 * @module lua/mw
 */

import type { FrameHost, FrameTableFactory } from './frame.js';
import { createHtmlLibrary, escapeAttribute } from './html.js';
import type { Interpreter } from './interpreter.js';
import { Args, defineLibrary, native } from './library.js';
import { PatternSearch, decode, encode } from './patterns.js';
import { createStringLibrary } from './strings.js';
import { LuaFunction, LuaTable, luaType, numberToString, truthy, type LuaValue } from './values.js';
import { NAMESPACES, NAMESPACE_NAMES, NS_MAIN } from '../lib/constants.js';
import { createLogger } from '../lib/logger.js';
import type { Resolver } from '../store/resolver.js';
import { cleanName, splitTitle } from '../store/names.js';

const log = createLogger('extract:lua');

const JSON_PRESERVE_KEYS = 1;
const JSON_TRY_FIXING = 2;
const JSON_PRETTY = 4;

export interface MwContext {
  interp: Interpreter;
  resolver: Resolver;
  frames: FrameTableFactory;
  /** Frame of the running `#invoke` */
  frame: FrameHost;
  /** Load a data module once per invocation */
  loadData: (name: string) => LuaValue;
}

/** Call a method with or without `self` */
function dropSelf(args: LuaValue[], self: LuaTable): LuaValue[] {
  return args[0] === self ? args.slice(1) : args;
}

// ============================================================================
// mw.text
// ============================================================================

const NOWIKI_CHARS: Readonly<Record<string, string>> = {
  '"': '&#34;',
  '&': '&#38;',
  "'": '&#39;',
  '<': '&#60;',
  '=': '&#61;',
  '>': '&#62;',
  '[': '&#91;',
  ']': '&#93;',
  '{': '&#123;',
  '|': '&#124;',
  '}': '&#125;',
};

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
  hellip: '…',
  minus: '−',
  times: '×',
  middot: '·',
};

export function nowiki(text: string): string {
  return text
    .replace(/["&'<=>[\]{|}]/g, ch => NOWIKI_CHARS[ch] ?? ch)
    .replace(/(^|\n)([#*:; ])/g, (_, start: string, ch: string) => `${start}&#${ch.charCodeAt(0)};`)
    .replace(/(^|\n)----/g, '$1&#45;---')
    .replace(/:\/\//g, '&#58;//')
    .replace(/__/g, '_&#95;');
}

export function decodeEntities(text: string, named: boolean): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (whole, body: string) => {
    if (body.startsWith('#')) {
      const code = body[1] === 'x' || body[1] === 'X' ? parseInt(body.slice(2), 16) : Number(body.slice(1));
      return code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    if (named || ['lt', 'gt', 'amp', 'quot', 'nbsp'].includes(body)) return NAMED_ENTITIES[body] ?? whole;
    return whole;
  });
}

function jsonEncode(interp: Interpreter, value: LuaValue, pretty: boolean, seen: Set<LuaTable>, indent: string): string {
  if (value === undefined) return 'null';
  if (typeof value === 'boolean' || typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw interp.runtimeError('mw.text.jsonEncode: Cannot encode non-finite numbers');
    return numberToString(value);
  }
  if (value instanceof LuaFunction) throw interp.runtimeError('mw.text.jsonEncode: Cannot encode functions');
  if (seen.has(value)) throw interp.runtimeError('mw.text.jsonEncode: Cannot use recursive tables');
  seen.add(value);
  const inner = pretty ? `${indent}    ` : '';
  const newline = pretty ? '\n' : '';
  const entries = value.entries();
  const isArray = entries.length === value.length;
  const parts = entries.map(([key, item]) => {
    const encoded = jsonEncode(interp, item, pretty, seen, inner);
    if (isArray) return inner + encoded;
    if (typeof key !== 'string' && typeof key !== 'number') {
      throw interp.runtimeError(`mw.text.jsonEncode: Cannot use type '${luaType(key)}' as a table key`);
    }
    const name = typeof key === 'number' ? numberToString(key) : key;
    return `${inner}${JSON.stringify(name)}:${pretty ? ' ' : ''}${encoded}`;
  });
  seen.delete(value);
  const [open, close] = isArray ? ['[', ']'] : ['{', '}'];
  if (parts.length === 0) return `${open}${close}`;
  return `${open}${newline}${parts.join(`,${newline}`)}${newline}${indent}${close}`;
}

function fromJson(value: unknown, preserveKeys: boolean): LuaValue {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const table = new LuaTable();
    value.forEach((item: unknown, i) => table.set(preserveKeys ? i : i + 1, fromJson(item, preserveKeys)));
    return table;
  }
  if (typeof value === 'object') {
    const table = new LuaTable();
    for (const [key, item] of Object.entries(value)) {
      const child: unknown = item;
      const numeric = !preserveKeys && /^-?[1-9]\d*$/.test(key);
      table.set(numeric ? Number(key) : key, fromJson(child, preserveKeys));
    }
    return table;
  }
  return undefined;
}

function createTextLibrary(ctx: MwContext): LuaTable {
  const { interp } = ctx;
  const ustring = { unicode: true };

  const trim = (text: string, charset: string): string => {
    const search = new PatternSearch(encode(text, true), `^[${charset}]*(.-)[${charset}]*$`, ustring);
    const m = search.exec(0);
    const captured = m?.captures[0];
    return typeof captured === 'string' ? captured : text;
  };

  /** Pieces of `text` between matches of `pattern` */
  const split = (text: string, pattern: string, plain: boolean): string[] => {
    if (plain) return pattern === '' ? Array.from(text) : text.split(pattern);
    const codes = encode(text, true);
    const search = new PatternSearch(codes, pattern, ustring);
    const pieces: string[] = [];
    let start = 0;
    let position = 0;
    while (position <= codes.length) {
      const m = search.exec(position, false);
      if (!m) break;
      if (m.end === m.start) {
        if (m.start >= codes.length) break;
        pieces.push(decode(codes, start, m.start + 1));
        start = position = m.start + 1;
        continue;
      }
      pieces.push(decode(codes, start, m.start));
      start = position = m.end;
    }
    pieces.push(decode(codes, start));
    return pieces;
  };

  const text = defineLibrary(interp, 'mw.text', {
    trim: a => [trim(a.string(1), a.optString(2, '\t\r\n\f '))],

    split: a => [LuaTable.from(split(a.string(1), a.string(2), truthy(a.get(3))))],

    gsplit: a => {
      const pieces = split(a.string(1), a.string(2), truthy(a.get(3)));
      let index = 0;
      return [native('mw.text.gsplit iterator', () => [pieces[index++]])];
    },

    listToText: a => {
      const list = a.table(1).arrayValues().map(value => interp.tostring(value));
      const separator = a.optString(2, ', ');
      const conjunction = a.optString(3, ' and ');
      if (list.length <= 1) return [list.join('')];
      return [`${list.slice(0, -1).join(separator)}${conjunction}${list[list.length - 1] ?? ''}`];
    },

    nowiki: a => [nowiki(a.string(1))],

    tag: a => {
      let name: LuaValue = a.get(1);
      let attrs: LuaValue = a.get(2);
      let content: LuaValue = a.get(3);
      if (name instanceof LuaTable) {
        const options = name;
        name = options.get('name');
        attrs = options.get('attrs');
        content = options.get('content');
      }
      if (typeof name !== 'string') throw a.error(1, 'string expected');
      let open = `<${name}`;
      if (attrs instanceof LuaTable) {
        for (const [key, value] of attrs.entries()) {
          if (value === true) open += ` ${interp.tostring(key)}`;
          else if (value !== false) open += ` ${interp.tostring(key)}="${escapeAttribute(interp.tostring(value))}"`;
        }
      }
      if (content === undefined) return [`${open} />`];
      if (content === false) return [`${open}>`];
      return [`${open}>${interp.tostring(content)}</${name}>`];
    },

    encode: a => {
      const charset = a.optString(2);
      const pattern = charset === undefined ? /[<>&"' ]/g : new RegExp(`[${charset.replace(/[\\\]]/g, '\\$&')}]`, 'gu');
      return [a.string(1).replace(pattern, ch => (ch === ' ' ? '&nbsp;' : `&#${ch.codePointAt(0) ?? 0};`))];
    },

    decode: a => [decodeEntities(a.string(1), truthy(a.get(2)))],

    jsonEncode: a => {
      const flags = a.optInteger(2, 0);
      return [jsonEncode(interp, a.get(1), (flags & JSON_PRETTY) !== 0, new Set(), '')];
    },

    jsonDecode: a => {
      const flags = a.optInteger(2, 0);
      let parsed: unknown;
      try {
        parsed = JSON.parse(a.string(1));
      } catch (error) {
        throw interp.runtimeError(`mw.text.jsonDecode: ${error instanceof Error ? error.message : String(error)}`);
      }
      return [fromJson(parsed, (flags & JSON_PRESERVE_KEYS) !== 0)];
    },

    unstrip: a => [ctx.frame.page.unstrip(a.string(1))],

    unstripNoWiki: a => [ctx.frame.page.unstrip(a.string(1))],

    killMarkers: a => [ctx.frame.page.killMarkers(a.string(1))],

    truncate: a => {
      const chars = Array.from(a.string(1));
      const length = a.integer(2);
      const ellipsis = a.optString(3, '…');
      if (Math.abs(length) >= chars.length) return [chars.join('')];
      return [length >= 0 ? chars.slice(0, length).join('') + ellipsis : ellipsis + chars.slice(length).join('')];
    },
  });
  text.set('JSON_PRESERVE_KEYS', JSON_PRESERVE_KEYS);
  text.set('JSON_TRY_FIXING', JSON_TRY_FIXING);
  text.set('JSON_PRETTY', JSON_PRETTY);
  return text;
}

// ============================================================================
// mw.title
// ============================================================================

const INVALID_TITLE = /[#<>[\]{}|\u0000-\u001f\u007f]/;

function resolveNamespace(value: LuaValue): number | undefined {
  if (typeof value === 'number') return NAMESPACE_NAMES[value] !== undefined || value === NS_MAIN ? value : undefined;
  if (typeof value === 'string') {
    const trimmed = value.trim().toLowerCase();
    if (trimmed === '') return NS_MAIN;
    return /^\d+$/.test(trimmed) ? Number(trimmed) : NAMESPACES[trimmed.replace(/_/g, ' ')];
  }
  return undefined;
}

function createTitleLibrary(ctx: MwContext): LuaTable {
  const { interp, resolver } = ctx;
  const titleMeta = new LuaTable();

  const makeTitle = (namespace: number, name: string): LuaTable | undefined => {
    const cleaned = cleanName(name);
    if (cleaned === '' || INVALID_TITLE.test(cleaned)) return undefined;
    const nsText = NAMESPACE_NAMES[namespace] ?? '';
    const prefixedText = nsText ? `${nsText}:${cleaned}` : cleaned;
    const segments = cleaned.split('/');
    const hasSubpages = namespace !== NS_MAIN && segments.length > 1;

    const title = LuaTable.from([], {
      namespace,
      nsText,
      text: cleaned,
      prefixedText,
      fullText: prefixedText,
      baseText: hasSubpages ? segments.slice(0, -1).join('/') : cleaned,
      rootText: hasSubpages ? segments[0] ?? cleaned : cleaned,
      subpageText: hasSubpages ? segments[segments.length - 1] ?? cleaned : cleaned,
      isSubpage: hasSubpages,
      isContentPage: namespace === NS_MAIN,
      isTalkPage: false,
      isRedirect: false,
      fragment: '',
      interwiki: '',
    });
    title.metatable = titleMeta;

    title.set('getContent', native('title:getContent', () => [resolver.getPage(prefixedText)?.text]));
    title.set(
      'inNamespace',
      native('title:inNamespace', args => [resolveNamespace(dropSelf(args, title)[0]) === namespace])
    );
    title.set(
      'inNamespaces',
      native('title:inNamespaces', args => [dropSelf(args, title).some(ns => resolveNamespace(ns) === namespace)])
    );
    title.set('partialUrl', native('title:partialUrl', () => [encodeURIComponent(cleaned.replace(/ /g, '_'))]));
    return title;
  };

  titleMeta.set(
    '__index',
    native('title.__index', ([self, key]) => {
      if (!(self instanceof LuaTable)) return [undefined];
      const prefixed = self.get('prefixedText');
      if (typeof prefixed !== 'string') return [undefined];
      if (key === 'exists') return [resolver.pageExists(prefixed)];
      if (key === 'redirectTarget') {
        const target = resolver.getPage(prefixed)?.redirect;
        return [target === undefined ? false : makeFromText(target)];
      }
      return [undefined];
    })
  );
  titleMeta.set(
    '__tostring',
    native('title.__tostring', ([self]) => [self instanceof LuaTable ? self.get('prefixedText') : ''])
  );
  titleMeta.set(
    '__eq',
    native('title.__eq', ([a, b]) => [
      a instanceof LuaTable && b instanceof LuaTable && a.get('prefixedText') === b.get('prefixedText'),
    ])
  );

  const makeFromText = (text: string, defaultNamespace = NS_MAIN): LuaTable | undefined => {
    const { namespace, name } = splitTitle(text);
    const explicit = namespace !== NS_MAIN || text.trim().startsWith(':');
    return makeTitle(explicit ? namespace : defaultNamespace, name);
  };

  return defineLibrary(interp, 'mw.title', {
    new: a => {
      const text = a.get(1);
      if (typeof text === 'number') return [undefined];
      const namespace = a.get(2) === undefined ? NS_MAIN : resolveNamespace(a.get(2));
      if (namespace === undefined) throw a.error(2, 'unrecognized namespace name');
      return [makeFromText(a.string(1), namespace)];
    },

    makeTitle: a => {
      const namespace = resolveNamespace(a.any(1));
      if (namespace === undefined) return [undefined];
      return [makeTitle(namespace, a.string(2))];
    },

    getCurrentTitle: () => [makeFromText(ctx.frame.page.title)],

    equals: a => [interp.equals(a.table(1), a.table(2))],

    compare: a => {
      const x = interp.tostring(a.table(1));
      const y = interp.tostring(a.table(2));
      return [x < y ? -1 : x > y ? 1 : 0];
    },
  });
}

// ============================================================================
// mw.language
// ============================================================================

export function formatNumber(value: number, commafy: boolean): string {
  const text = numberToString(value);
  if (!commafy) return text;
  const match = /^(-?)(\d+)(.*)$/.exec(text);
  if (!match) return text;
  const [, sign = '', digits = '', rest = ''] = match;
  return sign + digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',') + rest;
}

function createLanguageLibrary(ctx: MwContext): LuaTable {
  const { interp } = ctx;
  const objects = new Map<string, LuaTable>();

  const languageObject = (code: string): LuaTable => {
    const cached = objects.get(code);
    if (cached) return cached;
    const language = new LuaTable();
    const method = (name: string, impl: (args: Args) => LuaValue[]): void => {
      language.set(
        name,
        native(`language:${name}`, values => impl(new Args(interp, name, dropSelf(values, language))))
      );
    };
    method('getCode', () => [code]);
    method('lc', a => [a.string(1).toLowerCase()]);
    method('uc', a => [a.string(1).toUpperCase()]);
    method('lcfirst', a => {
      const [first = '', ...rest] = Array.from(a.string(1));
      return [first.toLowerCase() + rest.join('')];
    });
    method('ucfirst', a => {
      const [first = '', ...rest] = Array.from(a.string(1));
      return [first.toUpperCase() + rest.join('')];
    });
    method('formatNum', a => {
      const options = a.optTable(2);
      const value = a.number(1);
      return [formatNumber(value, !(options && truthy(options.get('noCommafy'))))];
    });
    method('parseFormattedNumber', a => {
      const parsed = Number(a.string(1).replace(/,/g, ''));
      return [Number.isNaN(parsed) ? undefined : parsed];
    });
    method('plural', a => {
      const n = a.number(1);
      const forms = a.values.slice(1);
      const [first] = forms;
      const pick = first instanceof LuaTable ? first.arrayValues() : forms;
      const chosen = n === 1 ? pick[0] : pick[1] ?? pick[0];
      return [chosen === undefined ? '' : interp.tostring(chosen)];
    });
    method('isRTL', () => [false]);
    objects.set(code, language);
    return language;
  };

  const contentLanguage = (): LuaTable => languageObject('en');

  return defineLibrary(interp, 'mw.language', {
    new: a => [languageObject(a.string(1))],
    getContentLanguage: () => [contentLanguage()],
    isKnownLanguageTag: a => [/^[a-z]{2,3}(-[a-z0-9-]+)?$/i.test(a.string(1))],
    isValidCode: a => [/^[^:/\\\x00&<>'"]+$/.test(a.string(1))],
  });
}

// ============================================================================
// mw.uri, mw.site
// ============================================================================

/**
 * Percent-encode for a query string (`QUERY`, spaces as `+`), a path
 * (`PATH`) or a page name (`WIKI`, spaces as `_`, `:` and `/` kept)
 */
export function encodeUri(text: string, kind: string): string {
  const encoded = encodeURIComponent(text).replace(/[!'()*]/g, ch => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`);
  if (kind === 'PATH') return encoded;
  if (kind === 'WIKI') return encoded.replace(/%20/g, '_').replace(/%3A/g, ':').replace(/%2F/g, '/');
  return encoded.replace(/%20/g, '+');
}

function createUriLibrary(interp: Interpreter): LuaTable {
  return defineLibrary(interp, 'mw.uri', {
    encode: a => [encodeUri(a.string(1), a.optString(2, 'QUERY'))],
    decode: a => {
      const text = a.string(1);
      const kind = a.optString(2, 'QUERY');
      let prepared = text;
      if (kind === 'QUERY') prepared = prepared.replace(/\+/g, ' ');
      if (kind === 'WIKI') prepared = prepared.replace(/_/g, ' ');
      try {
        return [decodeURIComponent(prepared)];
      } catch (error) {
        if (error instanceof URIError) return [prepared];
        throw error;
      }
    },
    anchorEncode: a => [a.string(1).trim().replace(/\s+/g, '_')],
  });
}

function createSite(): LuaTable {
  const namespaces = new LuaTable();
  const ids = new Set<number>([NS_MAIN, ...Object.keys(NAMESPACE_NAMES).map(Number)]);
  for (const id of ids) {
    const name = NAMESPACE_NAMES[id] ?? '';
    const entry = LuaTable.from([], { id, name, canonicalName: name, hasSubpages: id !== NS_MAIN, isContent: id === NS_MAIN });
    namespaces.set(id, entry);
    if (name) namespaces.set(name, entry);
  }
  return LuaTable.from([], {
    siteName: 'Wiktionary',
    server: '',
    scriptPath: '',
    currentVersion: '1.41',
    namespaces,
  });
}

// ============================================================================
// HELPERS
// ============================================================================

function cloneValue(value: LuaValue, seen: Map<LuaTable, LuaTable>): LuaValue {
  if (!(value instanceof LuaTable)) return value;
  const existing = seen.get(value);
  if (existing) return existing;
  const copy = new LuaTable();
  seen.set(value, copy);
  for (const [key, item] of value.entries()) copy.set(cloneValue(key, seen), cloneValue(item, seen));
  copy.metatable = value.metatable;
  return copy;
}

function dumpObject(interp: Interpreter, value: LuaValue, indent: string, seen: Set<LuaTable>): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (!(value instanceof LuaTable)) return interp.tostring(value);
  if (seen.has(value)) return '{ (recursion) }';
  seen.add(value);
  const inner = `${indent}  `;
  const lines = value
    .entries()
    .map(([key, item]) => `${inner}[${dumpObject(interp, key, inner, seen)}] = ${dumpObject(interp, item, inner, seen)},`);
  seen.delete(value);
  return lines.length === 0 ? '{}' : `{\n${lines.join('\n')}\n${indent}}`;
}

// ============================================================================
// INSTALL
// ============================================================================

/**
 * Install `mw` into the interpreter's globals
 */
export function installMw(ctx: MwContext): void {
  const { interp } = ctx;
  const mw = defineLibrary(interp, 'mw', {
    loadData: a => [ctx.loadData(a.string(1))],

    loadJsonData: a => {
      const title = a.string(1);
      const content = ctx.resolver.getPage(title)?.text;
      if (content === undefined) throw interp.runtimeError(`bad argument #1 to 'mw.loadJsonData' ('${title}' does not exist)`);
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw interp.runtimeError(`mw.loadJsonData: ${error instanceof Error ? error.message : String(error)}`);
      }
      return [fromJson(parsed, false)];
    },

    clone: a => [cloneValue(a.get(1), new Map())],

    log: a => {
      log.debug('mw.log', { text: a.values.map(value => interp.tostring(value)).join('\t') });
      return [];
    },

    logObject: a => {
      const prefix = a.optString(2);
      const dump = dumpObject(interp, a.get(1), '', new Set());
      log.debug('mw.logObject', { text: prefix === undefined ? dump : `${prefix}: ${dump}` });
      return [];
    },

    dumpObject: a => [dumpObject(interp, a.get(1), '', new Set())],

    getCurrentFrame: () => [ctx.frames(ctx.frame)],

    allToString: a => [a.values.map(value => interp.tostring(value)).join('\t')],

    addWarning: a => {
      log.warn('module warning', { text: a.string(1) });
      return [];
    },

    isSubsting: () => [false],

    incrementExpensiveFunctionCount: () => [],
  });

  mw.set('text', createTextLibrary(ctx));
  mw.set('ustring', createStringLibrary(interp, { unicode: true, prefix: 'mw.ustring' }));
  mw.set('html', createHtmlLibrary(interp));
  mw.set('title', createTitleLibrary(ctx));
  const language = createLanguageLibrary(ctx);
  mw.set('language', language);
  mw.set('getContentLanguage', language.get('getContentLanguage'));
  mw.set('uri', createUriLibrary(interp));
  mw.set('site', createSite());
  interp.globals.set('mw', mw);
}

// ============================================================================
// libraryUtil
// ============================================================================

/**
 * The `libraryUtil` module Scribunto ships for argument checking
 */
export function createLibraryUtil(interp: Interpreter): LuaTable {
  const typeError = (what: string, got: LuaValue, expected: string): Error =>
    interp.runtimeError(`${what} (${expected} expected, got ${luaType(got)})`);

  const matches = (value: LuaValue, expected: LuaValue, nilOk: LuaValue): boolean =>
    luaType(value) === expected || (value === undefined && truthy(nilOk));

  return defineLibrary(interp, 'libraryUtil', {
    checkType: a => {
      const [name, index, value, expected, nilOk] = a.values;
      if (!matches(value, expected, nilOk)) {
        throw typeError(`bad argument #${interp.tostring(index)} to '${interp.tostring(name)}'`, value, interp.tostring(expected));
      }
      return [];
    },

    checkTypeMulti: a => {
      const [name, index, value] = a.values;
      const types = a.table(4).arrayValues();
      if (!types.some(expected => luaType(value) === expected)) {
        const expected = types.map(type => interp.tostring(type)).join(' or ');
        throw typeError(`bad argument #${interp.tostring(index)} to '${interp.tostring(name)}'`, value, expected);
      }
      return [];
    },

    checkTypeForIndex: a => {
      const [index, value, expected] = a.values;
      if (!matches(value, expected, false)) {
        throw typeError(`value for index '${interp.tostring(index)}' must be ${interp.tostring(expected)}`, value, interp.tostring(expected));
      }
      return [];
    },

    checkTypeForNamedArg: a => {
      const [name, argName, value, expected, nilOk] = a.values;
      if (!matches(value, expected, nilOk)) {
        throw typeError(`bad named argument ${interp.tostring(argName)} to '${interp.tostring(name)}'`, value, interp.tostring(expected));
      }
      return [];
    },

    makeCheckSelfFunction: a => {
      const [libraryName, varName, selfObject, description] = a.values;
      return [
        native('checkSelf', ([self, method]) => {
          if (self !== selfObject) {
            throw interp.runtimeError(
              `${interp.tostring(libraryName)}: invalid ${interp.tostring(description)}. ` +
                `Did you call ${interp.tostring(method)} with a dot instead of a colon, i.e. ` +
                `${interp.tostring(varName)}.${interp.tostring(method)}() instead of ${interp.tostring(varName)}:${interp.tostring(method)}()?`
            );
          }
          return [];
        }),
      ];
    },
  });
}
