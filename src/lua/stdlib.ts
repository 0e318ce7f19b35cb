/**
 * Lua standard library, restricted to what a sandboxed module may use
 *
 * There is no `io`, `debug`, `load`, `loadstring` or `dofile`. `os` only
 * has the clock and date functions, and they are deterministic: `os.time()`
 * and `os.clock()` never read the host clock, so the same page expands the
 * same way on every run.
 *
 * @module lua/stdlib
 */

import { LuaError, SandboxTimeoutError } from './errors.js';
import type { Interpreter } from './interpreter.js';
import { Args, defineLibrary, native } from './library.js';
import { createStringLibrary } from './strings.js';
import {
  LuaFunction,
  LuaTable,
  luaType,
  parseNumber,
  parseNumberInBase,
  truthy,
  type LuaValue,
} from './values.js';
import { mergeBytes, utf8Length } from './utf8.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('extract:lua');

/** `os.time()` with no argument: 2000-01-01T00:00:00Z */
export const FIXED_TIME = 946684800;

const MAX_UNPACK = 1_000_000;

/**
 * Convert a JS exception raised inside protected code to the Lua error
 * value `pcall` returns; budget exhaustion is not catchable
 */
function caught(error: unknown): LuaValue {
  if (error instanceof SandboxTimeoutError) throw error;
  if (error instanceof LuaError) return error.value;
  if (error instanceof RangeError) return 'stack overflow';
  throw error;
}

// ============================================================================
// BASE
// ============================================================================

function installBase(interp: Interpreter, G: LuaTable): void {
  const ipairsIterator = native('ipairs iterator', ([table, index]) => {
    const i = (typeof index === 'number' ? index : 0) + 1;
    const value = interp.index(table, i);
    return value === undefined ? [undefined] : [i, value];
  });

  const next = native('next', ([table, key]) => {
    if (!(table instanceof LuaTable)) {
      throw interp.runtimeError(`bad argument #1 to 'next' (table expected, got ${luaType(table)})`);
    }
    return table.next(key) ?? [undefined];
  });

  defineLibrary(
    interp,
    '',
    {
      assert: a => {
        if (truthy(a.any(1))) return a.values;
        const message = a.get(2);
        if (message === undefined) throw interp.runtimeError('assertion failed!');
        throw new LuaError(interp.tostring(message), message, interp.traceback());
      },

      error: a => {
        const value = a.get(1);
        const level = a.optInteger(2, 1);
        if (typeof value === 'string' && level > 0) {
          const text = interp.where(level) + value;
          throw new LuaError(text, text, interp.traceback());
        }
        throw new LuaError(typeof value === 'string' ? value : interp.tostring(value), value, interp.traceback());
      },

      ipairs: a => {
        const table = a.any(1);
        const handler = interp.metamethod(table, '__ipairs');
        if (handler !== undefined) return interp.call(handler, [table]).slice(0, 3);
        return [ipairsIterator, table, 0];
      },

      pairs: a => {
        const table = a.any(1);
        const handler = interp.metamethod(table, '__pairs');
        if (handler !== undefined) return interp.call(handler, [table]).slice(0, 3);
        return [next, a.table(1), undefined];
      },

      pcall: a => {
        const fn = a.any(1);
        try {
          return [true, ...interp.call(fn, a.values.slice(1))];
        } catch (error) {
          return [false, caught(error)];
        }
      },

      xpcall: a => {
        const fn = a.any(1);
        const handler = a.get(2);
        try {
          return [true, ...interp.call(fn, a.values.slice(2))];
        } catch (error) {
          return [false, ...interp.call(handler, [caught(error)])];
        }
      },

      select: a => {
        const n = a.get(1);
        const rest = a.values.slice(1);
        if (n === '#') return [rest.length];
        const index = a.integer(1);
        if (index < 0) {
          if (-index > rest.length) throw a.error(1, 'index out of range');
          return rest.slice(rest.length + index);
        }
        if (index === 0) throw a.error(1, 'index out of range');
        return rest.slice(index - 1);
      },

      tonumber: a => {
        const value = a.any(1);
        const base = a.get(2);
        if (base === undefined) {
          if (typeof value === 'number') return [value];
          return [typeof value === 'string' ? parseNumber(value) : undefined];
        }
        const radix = a.integer(2);
        if (radix < 2 || radix > 36) throw a.error(2, 'base out of range');
        return [parseNumberInBase(a.string(1), radix)];
      },

      tostring: a => [interp.tostring(a.any(1))],

      type: a => [luaType(a.any(1))],

      unpack: a => unpack(interp, a),

      rawget: a => [a.table(1).get(a.get(2))],

      rawset: a => {
        interp.rawSet(a.table(1), a.get(2), a.get(3));
        return [a.values[0]];
      },

      rawequal: a => [a.any(1) === a.any(2)],

      rawlen: a => {
        const value = a.get(1);
        if (typeof value === 'string') return [utf8Length(value)];
        return [a.table(1).length];
      },

      setmetatable: a => {
        const table = a.table(1);
        const metatable = a.get(2);
        if (metatable !== undefined && !(metatable instanceof LuaTable)) {
          throw a.error(2, 'nil or table expected');
        }
        if (table.metatable?.get('__metatable') !== undefined) {
          throw interp.runtimeError('cannot change a protected metatable');
        }
        table.metatable = metatable;
        return [table];
      },

      getmetatable: a => {
        const metatable = interp.metatableOf(a.get(1));
        if (!metatable) return [undefined];
        const protectedValue = metatable.get('__metatable');
        return [protectedValue ?? metatable];
      },

      print: a => {
        log.debug('print', { text: a.values.map(value => interp.tostring(value)).join('\t') });
        return [];
      },
    },
    G
  );

  G.set('next', next);
  G.set('_G', G);
  G.set('_VERSION', 'Lua 5.1');
}

function unpack(interp: Interpreter, a: Args): LuaValue[] {
  const table = a.table(1);
  const start = a.optInteger(2, 1);
  const end = a.get(3) === undefined ? table.length : a.integer(3);
  if (start > end) return [];
  if (end - start >= MAX_UNPACK) throw interp.runtimeError('too many results to unpack');
  const values: LuaValue[] = [];
  for (let i = start; i <= end; i++) values.push(table.get(i));
  return values;
}

// ============================================================================
// TABLE
// ============================================================================

function createTableLibrary(interp: Interpreter): LuaTable {
  return defineLibrary(interp, 'table', {
    insert: a => {
      const table = a.table(1);
      const length = table.length;
      if (a.values.length === 2) {
        table.insert(length + 1, a.get(2));
        return [];
      }
      if (a.values.length !== 3) throw interp.runtimeError("wrong number of arguments to 'insert'");
      const position = a.integer(2);
      if (position < 1 || position > length + 1) throw a.error(2, 'position out of bounds');
      table.insert(position, a.get(3));
      return [];
    },

    remove: a => {
      const table = a.table(1);
      const length = table.length;
      if (a.get(2) === undefined) return length === 0 ? [undefined] : [table.remove(length)];
      const position = a.integer(2);
      if (length === 0 && (position === 0 || position === length)) return [table.get(position)];
      if (position < 1 || position > length + 1) throw a.error(2, 'position out of bounds');
      return position === length + 1 ? [undefined] : [table.remove(position)];
    },

    concat: a => {
      const table = a.table(1);
      const separator = a.optString(2, '');
      const start = a.optInteger(3, 1);
      const end = a.get(4) === undefined ? table.length : a.integer(4);
      const parts: string[] = [];
      for (let i = start; i <= end; i++) {
        const value = table.get(i);
        if (typeof value === 'string') parts.push(value);
        else if (typeof value === 'number') parts.push(interp.tostring(value));
        else throw interp.runtimeError(`invalid value (at index ${i}) in table for 'concat'`);
      }
      interp.charge(parts.length);
      return [mergeBytes(parts.join(separator))];
    },

    sort: a => {
      const table = a.table(1);
      const comparator = a.get(2);
      if (comparator !== undefined && !(comparator instanceof LuaFunction)) throw a.error(2, 'function expected');
      const values = table.arrayValues();
      const less = comparator
        ? (x: LuaValue, y: LuaValue) => truthy(interp.call(comparator, [x, y])[0])
        : (x: LuaValue, y: LuaValue) => interp.lessThan(x, y);
      values.sort((x, y) => {
        interp.step();
        if (less(x, y)) return -1;
        return less(y, x) ? 1 : 0;
      });
      table.replaceArray(values);
      return [];
    },

    unpack: a => unpack(interp, a),

    pack: a => {
      const table = LuaTable.from(a.values);
      table.set('n', a.values.length);
      return [table];
    },

    maxn: a => {
      let max = 0;
      for (const [key] of a.table(1).entries()) {
        if (typeof key === 'number' && key > max) max = key;
      }
      return [max];
    },
  });
}

// ============================================================================
// MATH
// ============================================================================

/**
 * Deterministic generator behind `math.random`; a park-miller LCG seeded
 * by `math.randomseed`
 */
class SeededRandom {
  private state = 1;

  seed(value: number): void {
    this.state = Math.abs(Math.trunc(value)) % 2147483647 || 1;
  }

  next(): number {
    this.state = (this.state * 48271) % 2147483647;
    return (this.state - 1) / 2147483646;
  }
}

function createMathLibrary(interp: Interpreter): LuaTable {
  const random = new SeededRandom();
  const unary = (fn: (x: number) => number) => (a: Args) => [fn(a.number(1))];
  const math = defineLibrary(interp, 'math', {
    abs: unary(Math.abs),
    ceil: unary(Math.ceil),
    floor: unary(Math.floor),
    sqrt: unary(Math.sqrt),
    sin: unary(Math.sin),
    cos: unary(Math.cos),
    tan: unary(Math.tan),
    asin: unary(Math.asin),
    acos: unary(Math.acos),
    atan: unary(Math.atan),
    sinh: unary(Math.sinh),
    cosh: unary(Math.cosh),
    tanh: unary(Math.tanh),
    exp: unary(Math.exp),
    log10: unary(Math.log10),
    deg: unary(x => (x * 180) / Math.PI),
    rad: unary(x => (x * Math.PI) / 180),
    atan2: a => [Math.atan2(a.number(1), a.number(2))],
    pow: a => [Math.pow(a.number(1), a.number(2))],
    log: a => {
      const x = a.number(1);
      const base = a.optNumber(2);
      if (base === undefined) return [Math.log(x)];
      if (base === 10) return [Math.log10(x)];
      if (base === 2) return [Math.log2(x)];
      return [Math.log(x) / Math.log(base)];
    },
    fmod: a => [a.number(1) % a.number(2)],
    modf: a => {
      const x = a.number(1);
      if (!Number.isFinite(x)) return [x, Number.isNaN(x) ? x : 0];
      const whole = Math.trunc(x);
      return [whole, x - whole];
    },
    frexp: a => {
      const x = a.number(1);
      if (x === 0 || !Number.isFinite(x)) return [x, 0];
      const exponent = Math.floor(Math.log2(Math.abs(x))) + 1;
      return [x / Math.pow(2, exponent), exponent];
    },
    ldexp: a => [a.number(1) * Math.pow(2, a.integer(2))],
    max: a => {
      let max = a.number(1);
      for (let i = 2; i <= a.values.length; i++) max = Math.max(max, a.number(i));
      return [max];
    },
    min: a => {
      let min = a.number(1);
      for (let i = 2; i <= a.values.length; i++) min = Math.min(min, a.number(i));
      return [min];
    },
    random: a => {
      const r = random.next();
      if (a.values.length === 0) return [r];
      const low = a.values.length === 1 ? 1 : a.integer(1);
      const high = a.values.length === 1 ? a.integer(1) : a.integer(2);
      if (low > high) throw a.error(a.values.length, 'interval is empty');
      return [low + Math.floor(r * (high - low + 1))];
    },
    randomseed: a => {
      random.seed(a.number(1));
      return [];
    },
  });
  math.set('pi', Math.PI);
  math.set('huge', Infinity);
  return math;
}

// ============================================================================
// OS
// ============================================================================

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

function two(n: number): string {
  return String(n).padStart(2, '0');
}

function strftime(format: string, date: Date): string {
  return format.replace(/%(.)/g, (whole, code: string) => {
    switch (code) {
      case 'Y':
        return String(date.getUTCFullYear());
      case 'y':
        return two(date.getUTCFullYear() % 100);
      case 'm':
        return two(date.getUTCMonth() + 1);
      case 'd':
        return two(date.getUTCDate());
      case 'H':
        return two(date.getUTCHours());
      case 'M':
        return two(date.getUTCMinutes());
      case 'S':
        return two(date.getUTCSeconds());
      case 'p':
        return date.getUTCHours() < 12 ? 'AM' : 'PM';
      case 'A':
        return WEEKDAYS[date.getUTCDay()] ?? '';
      case 'a':
        return (WEEKDAYS[date.getUTCDay()] ?? '').slice(0, 3);
      case 'B':
        return MONTHS[date.getUTCMonth()] ?? '';
      case 'b':
        return (MONTHS[date.getUTCMonth()] ?? '').slice(0, 3);
      case 'j': {
        const start = Date.UTC(date.getUTCFullYear(), 0, 1);
        return String(Math.floor((date.getTime() - start) / 86400000) + 1).padStart(3, '0');
      }
      case 'c':
        return date.toUTCString();
      case 'x':
        return `${two(date.getUTCMonth() + 1)}/${two(date.getUTCDate())}/${two(date.getUTCFullYear() % 100)}`;
      case 'X':
        return `${two(date.getUTCHours())}:${two(date.getUTCMinutes())}:${two(date.getUTCSeconds())}`;
      case '%':
        return '%';
      default:
        return whole;
    }
  });
}

function createOsLibrary(interp: Interpreter): LuaTable {
  const field = (table: LuaTable, key: string, fallback?: number): number => {
    const value = table.get(key);
    if (typeof value === 'number') return value;
    if (typeof value === 'string') {
      const parsed = parseNumber(value);
      if (parsed !== undefined) return parsed;
    }
    if (fallback === undefined) throw interp.runtimeError(`field '${key}' missing in date table`);
    return fallback;
  };

  return defineLibrary(interp, 'os', {
    time: a => {
      const table = a.optTable(1);
      if (!table) return [FIXED_TIME];
      const ms = Date.UTC(
        field(table, 'year'),
        field(table, 'month') - 1,
        field(table, 'day'),
        field(table, 'hour', 12),
        field(table, 'min', 0),
        field(table, 'sec', 0)
      );
      return [Math.floor(ms / 1000)];
    },

    date: a => {
      let format = a.optString(1, '%c');
      const time = a.optNumber(2, FIXED_TIME);
      if (format.startsWith('!')) format = format.slice(1);
      const date = new Date(time * 1000);
      if (format.startsWith('*t')) {
        return [
          LuaTable.from([], {
            year: date.getUTCFullYear(),
            month: date.getUTCMonth() + 1,
            day: date.getUTCDate(),
            hour: date.getUTCHours(),
            min: date.getUTCMinutes(),
            sec: date.getUTCSeconds(),
            wday: date.getUTCDay() + 1,
            yday: Math.floor((date.getTime() - Date.UTC(date.getUTCFullYear(), 0, 1)) / 86400000) + 1,
            isdst: false,
          }),
        ];
      }
      return [strftime(format, date)];
    },

    clock: () => [interp.stepsUsed / 1e6],

    difftime: a => [a.number(1) - a.optNumber(2, 0)],
  });
}

// ============================================================================
// INSTALL
// ============================================================================

/**
 * Install the sandboxed standard library into the interpreter's globals
 */
export function installStdlib(interp: Interpreter): void {
  const G = interp.globals;
  installBase(interp, G);

  const string = createStringLibrary(interp, { unicode: false, prefix: 'string' });
  G.set('string', string);
  interp.stringMetatable = LuaTable.from([], { __index: string });

  const table = createTableLibrary(interp);
  G.set('table', table);
  G.set('math', createMathLibrary(interp));
  G.set('os', createOsLibrary(interp));
}
