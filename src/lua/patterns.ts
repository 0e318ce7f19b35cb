/**
 * Lua pattern matching
 *
 * Backtracking matcher over arrays of character codes. The `string` library
 * matches UTF-8 bytes with ASCII classes; `mw.ustring` matches code points
 * with Unicode classes.
 *
 * @module lua/patterns
 */

import { LuaError } from './errors.js';
import { utf8Decode, utf8Encode } from './utf8.js';

const ESC = 37; // %
const CAP_UNFINISHED = -1;
const CAP_POSITION = -2;
const MAX_MATCH_DEPTH = 200;
const MAX_CAPTURES = 32;

const C_OPEN_PAREN = 40;
const C_CLOSE_PAREN = 41;
const C_STAR = 42;
const C_PLUS = 43;
const C_MINUS = 45;
const C_DOT = 46;
const C_QUESTION = 63;
const C_OPEN_BRACKET = 91;
const C_CLOSE_BRACKET = 93;
const C_CARET = 94;
const C_DOLLAR = 36;

export interface PatternOptions {
  /** Code points and Unicode character classes (mw.ustring) */
  unicode: boolean;
  /** Called periodically while matching, to charge the step budget */
  onStep?: (() => void) | undefined;
}

/** A capture value: text, or a 1-based position for `()` */
export type CaptureValue = string | number;

export interface PatternMatch {
  /** Index of the first matched character */
  start: number;
  /** Index one past the last matched character */
  end: number;
  captures: CaptureValue[];
}

/**
 * Split a string into the character codes patterns operate on
 */
export function encode(text: string, unicode: boolean): number[] {
  if (unicode) {
    const codes: number[] = [];
    for (const ch of text) codes.push(ch.codePointAt(0) ?? 0);
    return codes;
  }
  return utf8Encode(text);
}

export function decode(codes: readonly number[], start = 0, end = codes.length): string {
  let out = '';
  for (let i = start; i < end; i += 4096) {
    out += String.fromCodePoint(...codes.slice(i, Math.min(end, i + 4096)));
  }
  return out;
}

// ============================================================================
// CHARACTER CLASSES
// ============================================================================

const UNICODE_CLASSES: Readonly<Record<string, RegExp>> = {
  a: /^\p{L}$/u,
  c: /^\p{Cc}$/u,
  d: /^\p{Nd}$/u,
  l: /^\p{Ll}$/u,
  p: /^\p{P}$/u,
  s: /^[\s\p{Zs}]$/u,
  u: /^\p{Lu}$/u,
  w: /^[\p{L}\p{Nd}]$/u,
};

function asciiClass(c: number, cl: string): boolean | undefined {
  switch (cl) {
    case 'a':
      return (c >= 65 && c <= 90) || (c >= 97 && c <= 122);
    case 'c':
      return c < 32 || c === 127;
    case 'd':
      return c >= 48 && c <= 57;
    case 'g':
      return c > 32 && c < 127;
    case 'l':
      return c >= 97 && c <= 122;
    case 'p':
      return (c >= 33 && c <= 47) || (c >= 58 && c <= 64) || (c >= 91 && c <= 96) || (c >= 123 && c <= 126);
    case 's':
      return c === 32 || (c >= 9 && c <= 13);
    case 'u':
      return c >= 65 && c <= 90;
    case 'w':
      return (c >= 48 && c <= 57) || (c >= 65 && c <= 90) || (c >= 97 && c <= 122);
    case 'x':
      return (c >= 48 && c <= 57) || (c >= 65 && c <= 70) || (c >= 97 && c <= 102);
    default:
      return undefined;
  }
}

function matchClass(c: number, classCode: number, unicode: boolean): boolean {
  const cl = String.fromCharCode(classCode);
  const lower = cl.toLowerCase();
  let result: boolean | undefined;
  if (unicode && c > 127 && lower !== 'x' && lower !== 'g') {
    const pattern = UNICODE_CLASSES[lower];
    result = pattern ? pattern.test(String.fromCodePoint(c)) : undefined;
  } else if (unicode && c > 127 && lower === 'g') {
    result = !/^[\s\p{Cc}]$/u.test(String.fromCodePoint(c));
  } else {
    result = asciiClass(c, lower);
  }
  if (result === undefined) return classCode === c;
  return cl === lower ? result : !result;
}

// ============================================================================
// MATCHER
// ============================================================================

interface CaptureSlot {
  init: number;
  len: number;
}

class Matcher {
  private depth = 0;
  private calls = 0;
  captures: CaptureSlot[] = [];

  constructor(
    readonly src: readonly number[],
    readonly pat: readonly number[],
    private readonly options: PatternOptions
  ) {}

  private error(message: string): LuaError {
    return new LuaError(message);
  }

  private classEnd(p: number): number {
    const pat = this.pat;
    const c = pat[p++];
    if (c === ESC) {
      if (p >= pat.length) throw this.error("malformed pattern (ends with '%')");
      return p + 1;
    }
    if (c === C_OPEN_BRACKET) {
      if (pat[p] === C_CARET) p++;
      // The first character after `[` or `[^` is always literal
      do {
        if (p >= pat.length) throw this.error("malformed pattern (missing ']')");
        const cc = pat[p++];
        if (cc === ESC && p < pat.length) p++;
      } while (pat[p] !== C_CLOSE_BRACKET);
      return p + 1;
    }
    return p;
  }

  private matchBracketClass(c: number, p: number, ec: number): boolean {
    const pat = this.pat;
    let sig = true;
    if (pat[p + 1] === C_CARET) {
      sig = false;
      p++;
    }
    while (++p < ec) {
      const pc = pat[p] ?? 0;
      if (pc === ESC) {
        p++;
        if (matchClass(c, pat[p] ?? 0, this.options.unicode)) return sig;
      } else if (pat[p + 1] === C_MINUS && p + 2 < ec) {
        p += 2;
        if (pc <= c && c <= (pat[p] ?? 0)) return sig;
      } else if (pc === c) {
        return sig;
      }
    }
    return !sig;
  }

  private singleMatch(s: number, p: number, ep: number): boolean {
    if (s >= this.src.length) return false;
    const c = this.src[s] ?? 0;
    const pc = this.pat[p];
    switch (pc) {
      case C_DOT:
        return true;
      case ESC:
        return matchClass(c, this.pat[p + 1] ?? 0, this.options.unicode);
      case C_OPEN_BRACKET:
        return this.matchBracketClass(c, p, ep - 1);
      default:
        return pc === c;
    }
  }

  private matchBalance(s: number, p: number): number {
    if (p + 1 >= this.pat.length) throw this.error("malformed pattern (missing arguments to '%b')");
    const src = this.src;
    if (s >= src.length || src[s] !== this.pat[p]) return -1;
    const open = this.pat[p];
    const close = this.pat[p + 1];
    let count = 1;
    while (++s < src.length) {
      const c = src[s];
      if (c === close) {
        if (--count === 0) return s + 1;
      } else if (c === open) {
        count++;
      }
    }
    return -1;
  }

  private maxExpand(s: number, p: number, ep: number): number {
    let i = 0;
    while (this.singleMatch(s + i, p, ep)) i++;
    while (i >= 0) {
      const result = this.match(s + i, ep + 1);
      if (result !== -1) return result;
      i--;
    }
    return -1;
  }

  private minExpand(s: number, p: number, ep: number): number {
    for (;;) {
      const result = this.match(s, ep + 1);
      if (result !== -1) return result;
      if (this.singleMatch(s, p, ep)) s++;
      else return -1;
    }
  }

  private startCapture(s: number, p: number, what: number): number {
    if (this.captures.length >= MAX_CAPTURES) throw this.error('too many captures');
    this.captures.push({ init: s, len: what });
    const result = this.match(s, p);
    if (result === -1) this.captures.pop();
    return result;
  }

  private endCapture(s: number, p: number): number {
    const slot = this.captureToClose();
    slot.len = s - slot.init;
    const result = this.match(s, p);
    if (result === -1) slot.len = CAP_UNFINISHED;
    return result;
  }

  private captureToClose(): CaptureSlot {
    for (let level = this.captures.length - 1; level >= 0; level--) {
      const slot = this.captures[level];
      if (slot && slot.len === CAP_UNFINISHED) return slot;
    }
    throw this.error('invalid pattern capture');
  }

  private matchCapture(s: number, l: number): number {
    const slot = this.captures[l - 49]; // '1'
    if (!slot || slot.len === CAP_UNFINISHED) throw this.error(`invalid capture index %${l - 48}`);
    const len = slot.len;
    if (len < 0 || s + len > this.src.length) return -1;
    for (let i = 0; i < len; i++) {
      if (this.src[slot.init + i] !== this.src[s + i]) return -1;
    }
    return s + len;
  }

  /**
   * Match the pattern from `p` against the subject from `s`; returns the
   * end of the match or -1
   */
  match(s: number, p: number): number {
    if (++this.depth > MAX_MATCH_DEPTH) throw this.error('pattern too complex');
    if ((++this.calls & 1023) === 0) this.options.onStep?.();
    try {
      const pat = this.pat;
      for (;;) {
        if (p >= pat.length) return s;
        const pc = pat[p];

        if (pc === C_OPEN_PAREN) {
          return pat[p + 1] === C_CLOSE_PAREN
            ? this.startCapture(s, p + 2, CAP_POSITION)
            : this.startCapture(s, p + 1, CAP_UNFINISHED);
        }
        if (pc === C_CLOSE_PAREN) return this.endCapture(s, p + 1);
        if (pc === C_DOLLAR && p + 1 === pat.length) return s === this.src.length ? s : -1;

        if (pc === ESC) {
          const next = pat[p + 1];
          if (next === 98) { // b
            s = this.matchBalance(s, p + 2);
            if (s === -1) return -1;
            p += 4;
            continue;
          }
          if (next === 102) { // f
            p += 2;
            if (pat[p] !== C_OPEN_BRACKET) throw this.error("missing '[' after '%f' in pattern");
            const ep = this.classEnd(p);
            const previous = s === 0 ? 0 : this.src[s - 1] ?? 0;
            const current = s < this.src.length ? this.src[s] ?? 0 : 0;
            if (!this.matchBracketClass(previous, p, ep - 1) && this.matchBracketClass(current, p, ep - 1)) {
              p = ep;
              continue;
            }
            return -1;
          }
          if (next !== undefined && next >= 48 && next <= 57) {
            s = this.matchCapture(s, next);
            if (s === -1) return -1;
            p += 2;
            continue;
          }
        }

        const ep = this.classEnd(p);
        const epc = pat[ep];
        if (!this.singleMatch(s, p, ep)) {
          if (epc === C_STAR || epc === C_QUESTION || epc === C_MINUS) {
            p = ep + 1;
            continue;
          }
          return -1;
        }
        switch (epc) {
          case C_QUESTION: {
            const result = this.match(s + 1, ep + 1);
            if (result !== -1) return result;
            p = ep + 1;
            continue;
          }
          case C_PLUS:
            return this.maxExpand(s + 1, p, ep);
          case C_STAR:
            return this.maxExpand(s, p, ep);
          case C_MINUS:
            return this.minExpand(s, p, ep);
          default:
            s++;
            p = ep;
            continue;
        }
      }
    } finally {
      this.depth--;
    }
  }

  captureValue(index: number, start: number, end: number): CaptureValue {
    const slot = this.captures[index];
    if (!slot) {
      if (index === 0) return this.text(start, end);
      throw this.error('invalid capture index');
    }
    if (slot.len === CAP_POSITION) return slot.init + 1;
    if (slot.len === CAP_UNFINISHED) throw this.error('unfinished capture');
    return this.text(slot.init, slot.init + slot.len);
  }

  private text(start: number, end: number): string {
    return this.options.unicode ? decode(this.src, start, end) : utf8Decode(this.src, start, end);
  }

  /** Capture values of the last match; the whole match when there are none */
  captureValues(start: number, end: number, wholeIfNone: boolean): CaptureValue[] {
    const count = this.captures.length === 0 && wholeIfNone ? 1 : this.captures.length;
    const values: CaptureValue[] = [];
    for (let i = 0; i < count; i++) values.push(this.captureValue(i, start, end));
    return values;
  }
}

// ============================================================================
// API
// ============================================================================

/**
 * A compiled pattern bound to a subject string
 */
export class PatternSearch {
  private readonly matcher: Matcher;
  private readonly anchored: boolean;
  private readonly firstP: number;

  constructor(
    readonly subject: readonly number[],
    pattern: string,
    options: PatternOptions
  ) {
    const pat = encode(pattern, options.unicode);
    this.anchored = pat[0] === C_CARET;
    this.firstP = this.anchored ? 1 : 0;
    this.matcher = new Matcher(subject, pat, options);
  }

  /**
   * First match starting at or after `init` (0-based)
   *
   * @param wholeIfNone - report the whole match as the only capture when the
   *   pattern has no captures
   */
  exec(init: number, wholeIfNone = true): PatternMatch | null {
    for (let s = init; s <= this.subject.length; s++) {
      this.matcher.captures = [];
      const end = this.matcher.match(s, this.firstP);
      if (end !== -1) {
        return { start: s, end, captures: this.matcher.captureValues(s, end, wholeIfNone) };
      }
      if (this.anchored) break;
    }
    return null;
  }

  /** Match anchored at exactly position `s` */
  matchAt(s: number, wholeIfNone = true): PatternMatch | null {
    this.matcher.captures = [];
    const end = this.matcher.match(s, this.firstP);
    if (end === -1) return null;
    return { start: s, end, captures: this.matcher.captureValues(s, end, wholeIfNone) };
  }

  /** Whether the pattern starts with `^` */
  get isAnchored(): boolean {
    return this.anchored;
  }
}

/**
 * Whether a pattern has no special characters and can be searched for
 * with indexOf
 */
export function isPlainPattern(pattern: string): boolean {
  return !/[\^$*+?.()[\]%-]/.test(pattern);
}

/**
 * Expand a gsub replacement string for one match
 */
export function expandReplacement(replacement: string, match: PatternMatch, whole: string): string {
  let out = '';
  for (let i = 0; i < replacement.length; i++) {
    const ch = replacement.charAt(i);
    if (ch !== '%') {
      out += ch;
      continue;
    }
    i++;
    const next = replacement.charAt(i);
    if (next === '%') {
      out += '%';
    } else if (next >= '0' && next <= '9') {
      const index = Number(next);
      // %1 without captures is the whole match
      const value = index === 0 || (index === 1 && match.captures.length === 0) ? whole : match.captures[index - 1];
      if (value === undefined) throw new LuaError(`invalid capture index %${index} in replacement string`);
      out += typeof value === 'number' ? String(value) : value;
    } else {
      throw new LuaError("invalid use of '%' in replacement string");
    }
  }
  return out;
}
