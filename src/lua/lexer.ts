/**
 * Lua lexer
 *
 * Produces the whole token array up front; chunks are small and parsed
 * once per worker thanks to the chunk cache.
 *
 * @module lua/lexer
 */

import { LuaSyntaxError } from './errors.js';
import { byteChar, mergeBytes } from './utf8.js';

export type TokenType = 'name' | 'keyword' | 'number' | 'string' | 'op' | 'eof';

export interface Token {
  type: TokenType;
  /** Name, keyword or operator text; decoded contents for strings */
  value: string;
  /** Numeric value for number tokens */
  number: number;
  line: number;
}

const KEYWORDS: ReadonlySet<string> = new Set([
  'and', 'break', 'do', 'else', 'elseif', 'end', 'false', 'for', 'function', 'goto', 'if', 'in',
  'local', 'nil', 'not', 'or', 'repeat', 'return', 'then', 'true', 'until', 'while',
]);

/** Operators, longest first so that `...` wins over `..` and `.` */
const OPERATORS = [
  '...', '..', '==', '~=', '<=', '>=', '::', '//',
  '+', '-', '*', '/', '%', '^', '#', '<', '>', '=', '(', ')', '{', '}', '[', ']', ';', ':', ',', '.',
];

const ESCAPES: Readonly<Record<string, string>> = {
  'n': '\n',
  't': '\t',
  'r': '\r',
  'a': '\x07',
  'b': '\b',
  'f': '\f',
  'v': '\v',
  '\\': '\\',
  '"': '"',
  "'": "'",
  '\n': '\n',
};

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

function isNameStart(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
}

function isNameChar(c: string): boolean {
  return isNameStart(c) || isDigit(c);
}

export function tokenize(source: string, chunk: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  const len = source.length;

  const error = (message: string): LuaSyntaxError => new LuaSyntaxError(`${chunk}:${line}: ${message}`);

  const push = (type: TokenType, value: string, number = 0): void => {
    tokens.push({ type, value, number, line });
  };

  /** Length of the `[==[` opener at pos, or -1 */
  const longBracketLevel = (at: number): number => {
    if (source[at] !== '[') return -1;
    let i = at + 1;
    while (source[i] === '=') i++;
    return source[i] === '[' ? i - at - 1 : -1;
  };

  const readLongString = (level: number): string => {
    pos += level + 2;
    // A newline right after the opener is skipped
    if (source[pos] === '\r') pos++;
    if (source[pos] === '\n') {
      pos++;
      line++;
    }
    const close = `]${'='.repeat(level)}]`;
    const end = source.indexOf(close, pos);
    if (end === -1) throw error('unfinished long string');
    const text = source.slice(pos, end);
    for (let i = 0; i < text.length; i++) if (text[i] === '\n') line++;
    pos = end + close.length;
    return text;
  };

  // Skip a shebang line
  if (source.startsWith('#')) {
    while (pos < len && source[pos] !== '\n') pos++;
  }

  while (pos < len) {
    const c = source.charAt(pos);

    if (c === '\n') {
      line++;
      pos++;
      continue;
    }
    if (c === ' ' || c === '\t' || c === '\r' || c === '\f' || c === '\v') {
      pos++;
      continue;
    }

    if (c === '-' && source[pos + 1] === '-') {
      pos += 2;
      const level = longBracketLevel(pos);
      if (level >= 0) {
        readLongString(level);
      } else {
        while (pos < len && source[pos] !== '\n') pos++;
      }
      continue;
    }

    if (isNameStart(c)) {
      const start = pos;
      while (pos < len && isNameChar(source.charAt(pos))) pos++;
      const word = source.slice(start, pos);
      push(KEYWORDS.has(word) ? 'keyword' : 'name', word);
      continue;
    }

    if (isDigit(c) || (c === '.' && isDigit(source.charAt(pos + 1)))) {
      const start = pos;
      let value: number;
      if (c === '0' && (source[pos + 1] === 'x' || source[pos + 1] === 'X')) {
        pos += 2;
        while (pos < len && /[0-9a-fA-F]/.test(source.charAt(pos))) pos++;
        value = parseInt(source.slice(start + 2, pos), 16);
      } else {
        while (pos < len && (isDigit(source.charAt(pos)) || source[pos] === '.')) pos++;
        if (source[pos] === 'e' || source[pos] === 'E') {
          pos++;
          if (source[pos] === '+' || source[pos] === '-') pos++;
          while (pos < len && isDigit(source.charAt(pos))) pos++;
        }
        value = Number(source.slice(start, pos));
      }
      if (isNameChar(source.charAt(pos)) || Number.isNaN(value)) {
        throw error(`malformed number near '${source.slice(start, pos + 1)}'`);
      }
      push('number', source.slice(start, pos), value);
      continue;
    }

    if (c === '"' || c === "'") {
      pos++;
      let text = '';
      for (;;) {
        if (pos >= len) throw error('unfinished string');
        const ch = source.charAt(pos);
        if (ch === c) {
          pos++;
          break;
        }
        if (ch === '\n') throw error('unfinished string');
        if (ch !== '\\') {
          text += ch;
          pos++;
          continue;
        }
        const next = source.charAt(pos + 1);
        const simple = ESCAPES[next];
        if (simple !== undefined) {
          text += simple;
          if (next === '\n') line++;
          pos += 2;
        } else if (isDigit(next)) {
          let digits = '';
          pos++;
          while (digits.length < 3 && isDigit(source.charAt(pos))) digits += source.charAt(pos++);
          const code = Number(digits);
          if (code > 255) throw error('escape sequence too large');
          text += byteChar(code);
        } else if (next === 'x') {
          const hex = source.slice(pos + 2, pos + 4);
          if (!/^[0-9a-fA-F]{2}$/.test(hex)) throw error('hexadecimal digit expected');
          text += byteChar(parseInt(hex, 16));
          pos += 4;
        } else if (next === 'z') {
          pos += 2;
          while (pos < len && /\s/.test(source.charAt(pos))) {
            if (source[pos] === '\n') line++;
            pos++;
          }
        } else if (next === 'u' && source[pos + 2] === '{') {
          const close = source.indexOf('}', pos + 3);
          const code = parseInt(source.slice(pos + 3, close), 16);
          if (close === -1 || Number.isNaN(code)) throw error('invalid unicode escape');
          text += String.fromCodePoint(code);
          pos = close + 1;
        } else {
          throw error(`invalid escape sequence '\\${next}'`);
        }
      }
      push('string', mergeBytes(text));
      continue;
    }

    if (c === '[') {
      const level = longBracketLevel(pos);
      if (level >= 0) {
        const startLine = line;
        const text = readLongString(level);
        tokens.push({ type: 'string', value: text, number: 0, line: startLine });
        continue;
      }
    }

    const op = OPERATORS.find(candidate => source.startsWith(candidate, pos));
    if (!op) throw error(`unexpected symbol near '${c}'`);
    push('op', op);
    pos += op.length;
  }

  push('eof', '<eof>');
  return tokens;
}
