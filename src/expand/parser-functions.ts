/**
 * Parser functions and magic words
 *
 * Functions receive their arguments lazily: only the branches a function
 * actually takes are expanded, the way the wiki preprocessor does it.
 *
 * @module expand/parser-functions
 */

import { evaluate, ExprError, formatExprResult } from './expr.js';
import { ERROR_MARKER_CLASS, NAMESPACE_NAMES, NS_MAIN } from '../lib/constants.js';
import { encodeUri } from '../lua/mw.js';
import { normalizeTitle, splitTitle } from '../store/names.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One argument after the first, e.g. `a=b` or `c` in `{{#switch:x|a=b|c}}`
 */
export interface FunctionArg {
  /** Expanded, trimmed part before the first `=`, or null without one */
  name(): string | null;
  /** Expanded, trimmed part after the `=`, or the whole argument */
  value(): string;
  /** Whole argument, expanded and trimmed */
  text(): string;
}

/** What a parser function may ask of the engine */
export interface FunctionHost {
  /** Title of the page being expanded */
  readonly title: string;
  pageExists(title: string): boolean;
  /** Protect text from being read as markup again */
  literal(text: string): string;
}

export interface FunctionCall {
  /** Function name as registered, e.g. `#if` */
  readonly name: string;
  /** Expanded, trimmed text after the colon */
  readonly first: string;
  readonly args: readonly FunctionArg[];
  readonly host: FunctionHost;
}

export type ParserFunction = (call: FunctionCall) => string;

// ============================================================================
// Helpers
// ============================================================================

/** The marker substituted for failed calls; `#iferror` looks for it */
export function errorMarker(message: string): string {
  return `<strong class="${ERROR_MARKER_CLASS}">${message}</strong>`;
}

const ERROR_PATTERN = /<(?:strong|span|p|div)\s[^>]*\bclass\s*=\s*["'][^"']*\berror\b/i;

const NUMERIC = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

/** Compare as numbers when both sides are numeric, else as strings */
export function valuesEqual(a: string, b: string): boolean {
  if (NUMERIC.test(a) && NUMERIC.test(b)) return parseFloat(a) === parseFloat(b);
  return a === b;
}

/** An argument built from text, as module code passes it */
export function textArg(raw: string): FunctionArg {
  const eq = raw.indexOf('=');
  if (eq === -1) {
    const value = raw.trim();
    return { name: () => null, value: () => value, text: () => value };
  }
  const name = raw.slice(0, eq).trim();
  const value = raw.slice(eq + 1).trim();
  return { name: () => name, value: () => value, text: () => `${name}=${value}` };
}

function argValue(args: readonly FunctionArg[], index: number): string {
  const arg = args[index];
  return arg ? arg.text() : '';
}

function codePoints(text: string): string[] {
  return Array.from(text);
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

function expressionResult(text: string): { ok: true; value: number | null } | { ok: false; marker: string } {
  try {
    return { ok: true, value: evaluate(text) };
  } catch (error) {
    if (error instanceof ExprError) return { ok: false, marker: errorMarker(`Expression error: ${error.message}`) };
    throw error;
  }
}

function pad(call: FunctionCall, left: boolean): string {
  const value = call.first;
  const length = Math.min(parseInt(argValue(call.args, 0), 10) || 0, 500);
  const padding = call.args[1] ? codePoints(call.args[1].text()) : ['0'];
  const chars = codePoints(value);
  if (padding.length === 0 || chars.length >= length) return value;
  let fill = '';
  for (let i = 0; i < length - chars.length; i++) fill += padding[i % padding.length] ?? '';
  return left ? fill + value : value + fill;
}

function changeFirst(text: string, change: (ch: string) => string): string {
  const [first = '', ...rest] = codePoints(text);
  return change(first) + rest.join('');
}

// ============================================================================
// Conditionals
// ============================================================================

function ifFunction(call: FunctionCall): string {
  return call.first !== '' ? argValue(call.args, 0) : argValue(call.args, 1);
}

function ifeqFunction(call: FunctionCall): string {
  const other = argValue(call.args, 0);
  return valuesEqual(call.first, other) ? argValue(call.args, 1) : argValue(call.args, 2);
}

function iferrorFunction(call: FunctionCall): string {
  if (ERROR_PATTERN.test(call.first)) return argValue(call.args, 0);
  return call.args.length > 1 ? argValue(call.args, 1) : call.first;
}

function ifexistFunction(call: FunctionCall): string {
  const exists = call.first !== '' && call.host.pageExists(call.first);
  return exists ? argValue(call.args, 0) : argValue(call.args, 1);
}

/**
 * `{{#switch:value|a|b=result|#default=other}}`: cases without `=` fall
 * through to the next case with a result; a trailing case without `=` is
 * the default
 */
function switchFunction(call: FunctionCall): string {
  let matched = false;
  let fallback: string | undefined;
  for (let i = 0; i < call.args.length; i++) {
    const arg = call.args[i];
    if (!arg) continue;
    const name = arg.name();
    if (name === null) {
      const value = arg.value();
      if (i === call.args.length - 1) return matched ? '' : value;
      if (!matched && valuesEqual(call.first, value)) matched = true;
      continue;
    }
    if (matched || valuesEqual(call.first, name)) return arg.value();
    if (name === '#default') fallback = arg.value();
  }
  return fallback ?? '';
}

function exprFunction(call: FunctionCall): string {
  const result = expressionResult(call.first);
  if (!result.ok) return result.marker;
  return result.value === null ? '' : formatExprResult(result.value);
}

function ifexprFunction(call: FunctionCall): string {
  const result = expressionResult(call.first);
  if (!result.ok) return result.marker;
  return result.value !== null && result.value !== 0 ? argValue(call.args, 0) : argValue(call.args, 1);
}

// ============================================================================
// Strings and titles
// ============================================================================

function tagFunction(call: FunctionCall): string {
  const tag = call.first.toLowerCase();
  const [content, ...attrs] = call.args;
  const body = content ? content.text() : '';
  if (tag === 'nowiki') return call.host.literal(body);
  let attributes = '';
  for (const attr of attrs) {
    const name = attr.name();
    if (name === null) continue;
    const value = attr.value().replace(/^(["'])(.*)\1$/s, '$2');
    attributes += ` ${name}="${escapeAttribute(value)}"`;
  }
  return `<${tag}${attributes}>${body}</${tag}>`;
}

/**
 * `{{#titleparts:title|count|first}}`: keep `count` slash-separated parts
 * starting at `first` (1-based); negatives count from the end
 */
function titlepartsFunction(call: FunctionCall): string {
  const parts = call.first.replace(/_/g, ' ').split('/');
  const count = parseInt(argValue(call.args, 0), 10) || 0;
  const offset = parseInt(argValue(call.args, 1), 10) || 0;
  let start = offset > 0 ? offset - 1 : offset;
  if (start < 0) start = Math.max(parts.length + start, 0);
  let end = parts.length;
  if (count > 0) end = Math.min(start + count, parts.length);
  else if (count < 0) end = parts.length + count;
  return end > start ? parts.slice(start, end).join('/') : '';
}

function urlencodeFunction(call: FunctionCall): string {
  const kind = argValue(call.args, 0).toUpperCase();
  return encodeUri(call.first, kind === 'WIKI' || kind === 'PATH' ? kind : 'QUERY');
}

export const PARSER_FUNCTIONS: ReadonlyMap<string, ParserFunction> = new Map<string, ParserFunction>([
  ['#if', ifFunction],
  ['#ifeq', ifeqFunction],
  ['#iferror', iferrorFunction],
  ['#ifexist', ifexistFunction],
  ['#switch', switchFunction],
  ['#expr', exprFunction],
  ['#ifexpr', ifexprFunction],
  ['#tag', tagFunction],
  ['#titleparts', titlepartsFunction],
  ['lc', call => call.first.toLowerCase()],
  ['uc', call => call.first.toUpperCase()],
  ['lcfirst', call => changeFirst(call.first, ch => ch.toLowerCase())],
  ['ucfirst', call => changeFirst(call.first, ch => ch.toUpperCase())],
  ['urlencode', urlencodeFunction],
  ['padleft', call => pad(call, true)],
  ['padright', call => pad(call, false)],
  ['#len', call => String(codePoints(call.first).length)],
]);

/** Parser function by the name written before the colon, any case */
export function parserFunction(name: string): ParserFunction | undefined {
  return PARSER_FUNCTIONS.get(name.trim().toLowerCase());
}

// ============================================================================
// Magic words
// ============================================================================

type MagicWord = (title: string) => string;

function subpageParts(title: string): { namespace: number; parts: string[] } {
  const { namespace, name } = splitTitle(title);
  return { namespace, parts: namespace === NS_MAIN ? [name] : name.split('/') };
}

const MAGIC_WORDS: ReadonlyMap<string, MagicWord> = new Map<string, MagicWord>([
  ['FULLPAGENAME', title => normalizeTitle(title)],
  ['PAGENAME', title => splitTitle(title).name],
  ['NAMESPACE', title => NAMESPACE_NAMES[splitTitle(title).namespace] ?? ''],
  ['SUBPAGENAME', title => {
    const { parts } = subpageParts(title);
    return parts[parts.length - 1] ?? '';
  }],
  ['BASEPAGENAME', title => {
    const { parts } = subpageParts(title);
    return parts.length > 1 ? parts.slice(0, -1).join('/') : (parts[0] ?? '');
  }],
]);

/**
 * Value of a magic word such as `{{PAGENAME}}` or `{{PAGENAME:Other}}`
 *
 * Names are case-sensitive. Returns undefined when `name` is not one.
 */
export function magicWord(name: string, argument: string | undefined, pageTitle: string): string | undefined {
  const word = name.trim();
  if (argument === undefined) {
    if (word === '!') return '|';
    if (word === '=') return '=';
  }
  const fn = MAGIC_WORDS.get(word);
  if (!fn) return undefined;
  const title = argument === undefined || argument.trim() === '' ? pageTitle : argument.trim();
  return fn(title);
}
