/**
 * The `string` library and its Unicode twin `mw.ustring`
 *
 * Both are built by one factory. In byte mode positions count UTF-8 bytes
 * and classes are ASCII; in Unicode mode positions count code points and
 * `%a`, `%l` and friends follow Unicode categories.
 *
 * @module lua/strings
 */

import type { Interpreter } from './interpreter.js';
import { Args, defineLibrary, native, relativePosition } from './library.js';
import { PatternSearch, decode, encode, expandReplacement, isPlainPattern, type PatternMatch } from './patterns.js';
import { byteChar, mergeBytes, utf8Decode, utf8Length } from './utf8.js';
import { LuaFunction, LuaTable, formatG, luaType, numberToString, tostringPrimitive, truthy, type LuaValue } from './values.js';

/** Longest string `rep` and `format` may build */
const MAX_STRING_LENGTH = 50_000_000;

/** Strings whose bytes are their code units */
const ASCII = /^[\x00-\x7f]*$/;

export interface StringLibraryOptions {
  unicode: boolean;
  /** Name prefix in error messages, `string` or `mw.ustring` */
  prefix: string;
}

// ============================================================================
// FORMAT
// ============================================================================

const FORMAT_SPEC = /%([-+ #0]*)(\d*)(?:\.(\d*))?([a-zA-Z%])?/g;

function pad(text: string, flags: string, width: number, numeric: boolean): string {
  if (text.length >= width) return text;
  if (flags.includes('-')) return text.padEnd(width);
  if (numeric && flags.includes('0')) {
    const sign = /^[-+ ]/.test(text) ? text.charAt(0) : '';
    return sign + text.slice(sign.length).padStart(width - sign.length, '0');
  }
  return text.padStart(width);
}

function signed(text: string, negative: boolean, flags: string): string {
  if (negative) return `-${text}`;
  if (flags.includes('+')) return `+${text}`;
  if (flags.includes(' ')) return ` ${text}`;
  return text;
}

function exponential(n: number, precision: number, upper: boolean): string {
  const [mantissa = '0', exponent = '0'] = n.toExponential(precision).split('e');
  const value = Number(exponent);
  const text = `${mantissa}e${value < 0 ? '-' : '+'}${String(Math.abs(value)).padStart(2, '0')}`;
  return upper ? text.toUpperCase() : text;
}

function quoted(text: string): string {
  let out = '"';
  for (const ch of text) {
    if (ch === '"' || ch === '\\') out += `\\${ch}`;
    else if (ch === '\n') out += '\\\n';
    else if (ch === '\r') out += '\\r';
    else if (ch === '\0') out += '\\0';
    else out += ch;
  }
  return `${out}"`;
}

/**
 * `string.format`, covering the conversions C's printf shares with Lua
 */
export function formatString(interp: Interpreter, args: Args): string {
  const format = args.string(1);
  let argument = 2;
  let out = '';
  let last = 0;
  FORMAT_SPEC.lastIndex = 0;
  for (let m = FORMAT_SPEC.exec(format); m; m = FORMAT_SPEC.exec(format)) {
    out += format.slice(last, m.index);
    last = FORMAT_SPEC.lastIndex;
    const [, flags = '', widthText = '', precisionText, conversion] = m;
    const width = widthText ? Number(widthText) : 0;
    const precision = precisionText === undefined ? undefined : Number(precisionText || '0');
    if (width > 99 || (precision ?? 0) > 99) throw interp.runtimeError("invalid format (width or precision too long)");

    switch (conversion) {
      case '%':
        out += '%';
        break;
      case 'd':
      case 'i':
      case 'u': {
        const n = Math.trunc(args.number(argument++));
        let digits = Math.abs(n).toString();
        if (precision !== undefined) digits = digits.padStart(precision, '0');
        out += pad(signed(digits, n < 0, flags), precision === undefined ? flags : flags.replace('0', ''), width, true);
        break;
      }
      case 'c':
        out += pad(byteChar(args.integer(argument++) & 0xff), flags, width, false);
        break;
      case 'x':
      case 'X':
      case 'o': {
        const n = Math.trunc(args.number(argument++));
        const unsigned = n < 0 ? n + 2 ** 32 : n;
        let digits = unsigned.toString(conversion === 'o' ? 8 : 16);
        if (conversion === 'X') digits = digits.toUpperCase();
        if (precision !== undefined) digits = digits.padStart(precision, '0');
        if (flags.includes('#') && unsigned !== 0) {
          digits = conversion === 'o' ? `0${digits}` : `0${conversion}${digits}`;
        }
        out += pad(digits, flags, width, true);
        break;
      }
      case 'e':
      case 'E': {
        const n = args.number(argument++);
        const text = Number.isFinite(n)
          ? exponential(Math.abs(n), precision ?? 6, conversion === 'E')
          : numberToString(Math.abs(n));
        out += pad(signed(text, n < 0 || Object.is(n, -0), flags), flags, width, Number.isFinite(n));
        break;
      }
      case 'f':
      case 'F': {
        const n = args.number(argument++);
        const text = Number.isFinite(n) ? Math.abs(n).toFixed(precision ?? 6) : numberToString(Math.abs(n));
        out += pad(signed(text, n < 0 || Object.is(n, -0), flags), flags, width, Number.isFinite(n));
        break;
      }
      case 'g':
      case 'G': {
        const n = args.number(argument++);
        let text = formatG(Math.abs(n), precision ?? 6, flags.includes('#'));
        if (conversion === 'G') text = text.toUpperCase();
        out += pad(signed(text, n < 0 || Object.is(n, -0), flags), flags, width, Number.isFinite(n));
        break;
      }
      case 'q':
        out += quoted(args.string(argument++));
        break;
      case 's': {
        const value = args.any(argument++);
        let text = interp.tostring(value);
        if (precision !== undefined) text = text.slice(0, precision);
        out += pad(text, flags, width, false);
        break;
      }
      default:
        throw interp.runtimeError(
          conversion === undefined
            ? "invalid format (ends with '%')"
            : `invalid option '%${conversion}' to 'format'`
        );
    }
    if (out.length > MAX_STRING_LENGTH) throw interp.runtimeError('resulting string too large');
  }
  return mergeBytes(out + format.slice(last));
}

// ============================================================================
// LIBRARY
// ============================================================================

/**
 * Build `string` (byte mode) or `mw.ustring` (Unicode mode)
 */
export function createStringLibrary(interp: Interpreter, options: StringLibraryOptions): LuaTable {
  const { unicode } = options;
  const patternOptions = { unicode, onStep: () => interp.charge(1024) };

  const codesOf = (s: string): number[] => encode(s, unicode);
  const textOf = (codes: readonly number[], start?: number, end?: number): string =>
    unicode ? decode(codes, start, end) : utf8Decode(codes, start, end);
  const lengthOf = (s: string): number => (unicode ? codesOf(s).length : utf8Length(s));

  /** Start index for find/match/gmatch, or undefined when past the end */
  const startIndex = (init: number, length: number): number | undefined => {
    let start = relativePosition(init, length);
    if (start < 1) start = 1;
    return start > length + 1 ? undefined : start - 1;
  };

  const plainFind = (s: string, codes: number[], needle: string, start: number): LuaValue[] => {
    const offset = textOf(codes, 0, start).length;
    const index = s.indexOf(needle, offset);
    if (index === -1) return [undefined];
    const position = lengthOf(s.slice(0, index));
    return [position + 1, position + lengthOf(needle)];
  };

  const captures = (m: PatternMatch): LuaValue[] => m.captures;

  const replacementFor = (repl: LuaValue, m: PatternMatch, whole: string, args: Args): string => {
    if (typeof repl === 'string' || typeof repl === 'number') {
      return expandReplacement(typeof repl === 'number' ? numberToString(repl) : repl, m, whole);
    }
    const key = m.captures[0] ?? whole;
    let value: LuaValue;
    if (repl instanceof LuaTable) value = interp.index(repl, key);
    else if (repl instanceof LuaFunction) value = interp.call(repl, m.captures.length > 0 ? m.captures : [whole])[0];
    else throw args.error(3, `string/function/table expected, got ${luaType(repl)}`);
    if (!truthy(value)) return whole;
    if (typeof value === 'string' || typeof value === 'number') return tostringPrimitive(value) ?? whole;
    throw interp.runtimeError(`invalid replacement value (a ${luaType(value)})`);
  };

  const library = defineLibrary(interp, options.prefix, {
    len: a => [lengthOf(a.string(1))],

    sub: a => {
      const s = a.string(1);
      const codes = unicode || !ASCII.test(s) ? codesOf(s) : undefined;
      const length = codes ? codes.length : s.length;
      let start = relativePosition(a.optInteger(2, 1), length);
      let end = relativePosition(a.optInteger(3, -1), length);
      if (start < 1) start = 1;
      if (end > length) end = length;
      if (start > end) return [''];
      return [codes ? textOf(codes, start - 1, end) : s.slice(start - 1, end)];
    },

    upper: a => {
      const s = a.string(1);
      return [unicode ? s.toUpperCase() : s.replace(/[a-z]+/g, run => run.toUpperCase())];
    },

    lower: a => {
      const s = a.string(1);
      return [unicode ? s.toLowerCase() : s.replace(/[A-Z]+/g, run => run.toLowerCase())];
    },

    rep: a => {
      const s = a.string(1);
      const n = a.integer(2);
      const separator = a.optString(3, '');
      if (n <= 0) return [''];
      if ((s.length + separator.length) * n > MAX_STRING_LENGTH) throw interp.runtimeError('resulting string too large');
      interp.charge((s.length + separator.length) * n);
      return [mergeBytes(separator ? Array.from({ length: n }, () => s).join(separator) : s.repeat(n))];
    },

    reverse: a => {
      const s = a.string(1);
      return [unicode ? Array.from(s).reverse().join('') : utf8Decode(codesOf(s).reverse())];
    },

    byte: a => {
      const s = a.string(1);
      const codes = codesOf(s);
      const start = Math.max(relativePosition(a.optInteger(2, 1), codes.length), 1);
      const end = Math.min(relativePosition(a.optInteger(3, start), codes.length), codes.length);
      return start > end ? [] : codes.slice(start - 1, end);
    },

    char: a => {
      const codes: number[] = [];
      for (let i = 1; i <= a.values.length; i++) {
        const code = a.integer(i);
        if (code < 0 || code > (unicode ? 0x10ffff : 0xff)) throw a.error(i, 'value out of range');
        codes.push(code);
      }
      return [textOf(codes)];
    },

    find: a => {
      const s = a.string(1);
      const pattern = a.string(2);
      const codes = codesOf(s);
      const start = startIndex(a.optInteger(3, 1), codes.length);
      if (start === undefined) return [undefined];
      if (truthy(a.get(4)) || isPlainPattern(pattern)) return plainFind(s, codes, pattern, start);
      interp.charge(codes.length);
      const m = new PatternSearch(codes, pattern, patternOptions).exec(start, false);
      return m ? [m.start + 1, m.end, ...captures(m)] : [undefined];
    },

    match: a => {
      const codes = codesOf(a.string(1));
      const pattern = a.string(2);
      const start = startIndex(a.optInteger(3, 1), codes.length);
      if (start === undefined) return [undefined];
      interp.charge(codes.length);
      const m = new PatternSearch(codes, pattern, patternOptions).exec(start);
      return m ? captures(m) : [undefined];
    },

    gmatch: a => {
      const codes = codesOf(a.string(1));
      const search = new PatternSearch(codes, a.string(2), patternOptions);
      let position = 0;
      const iterator = native(`${options.prefix}.gmatch iterator`, () => {
        while (position <= codes.length) {
          const m = search.matchAt(position);
          if (m) {
            position = m.end === m.start ? m.end + 1 : m.end;
            return captures(m);
          }
          position++;
        }
        return [undefined];
      });
      return [iterator];
    },

    gsub: a => {
      const codes = codesOf(a.string(1));
      const search = new PatternSearch(codes, a.string(2), patternOptions);
      const repl = a.get(3);
      const limit = a.get(4) === undefined ? Infinity : a.integer(4);
      interp.charge(codes.length);
      let out = '';
      let position = 0;
      let count = 0;
      while (count < limit) {
        const m = search.matchAt(position, false);
        if (m) {
          count++;
          out += replacementFor(repl, m, textOf(codes, m.start, m.end), a);
        }
        if (m && m.end > position) position = m.end;
        else if (position < codes.length) out += textOf(codes, position, ++position);
        else break;
        if (search.isAnchored) break;
      }
      out += textOf(codes, position);
      return [unicode ? out : mergeBytes(out), count];
    },

    format: a => [formatString(interp, a)],
  });

  if (unicode) {
    const byte = library.get('byte');
    library.set('codepoint', byte);
    defineLibrary(
      interp,
      options.prefix,
      {
        gcodepoint: a => {
          const codes = codesOf(a.string(1));
          const start = Math.max(relativePosition(a.optInteger(2, 1), codes.length), 1);
          const end = Math.min(relativePosition(a.optInteger(3, -1), codes.length), codes.length);
          let index = start - 1;
          return [native('mw.ustring.gcodepoint iterator', () => (index < end ? [codes[index++]] : [undefined]))];
        },
        isutf8: a => [typeof a.get(1) === 'string' && !/[\uD800-\uDFFF]/.test(a.string(1).replace(/[\uD800-\uDBFF][\uDC00-\uDFFF]/g, ''))],
        toNFC: a => [a.string(1).normalize('NFC')],
        toNFD: a => [a.string(1).normalize('NFD')],
        toNFKC: a => [a.string(1).normalize('NFKC')],
        toNFKD: a => [a.string(1).normalize('NFKD')],
      },
      library
    );
    library.set('maxPatternLength', Infinity);
    library.set('maxStringLength', MAX_STRING_LENGTH);
  }

  return library;
}
