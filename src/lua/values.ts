/**
 * Lua values
 *
 * nil is `undefined`; booleans, numbers and strings are JS primitives;
 * tables and functions are class instances so that `instanceof` tells them
 * apart.
 *
 * @module lua/values
 */

import type { FunctionBody } from './ast.js';
import { LuaError } from './errors.js';

export type LuaValue = undefined | boolean | number | string | LuaTable | LuaFunction;

// ============================================================================
// FUNCTIONS
// ============================================================================

export abstract class LuaFunction {
  abstract readonly name: string;
}

export type NativeImpl = (args: LuaValue[]) => LuaValue[];

export class NativeFunction extends LuaFunction {
  constructor(
    readonly name: string,
    readonly impl: NativeImpl
  ) {
    super();
  }
}

/**
 * A variable cell shared between a scope and the closures that capture it
 */
export interface Cell {
  value: LuaValue;
}

export class Scope {
  private readonly vars = new Map<string, Cell>();

  constructor(
    readonly parent: Scope | null,
    /** Values of `...` in the enclosing vararg function */
    readonly varargs: LuaValue[] | null
  ) {}

  declare(name: string, value: LuaValue): void {
    this.vars.set(name, { value });
  }

  lookup(name: string): Cell | undefined {
    for (let scope: Scope | null = this; scope; scope = scope.parent) {
      const cell = scope.vars.get(name);
      if (cell) return cell;
    }
    return undefined;
  }
}

export class Closure extends LuaFunction {
  constructor(
    readonly func: FunctionBody,
    readonly scope: Scope
  ) {
    super();
  }

  get name(): string {
    return this.func.name;
  }
}

// ============================================================================
// TABLES
// ============================================================================

type TableKey = boolean | number | string | LuaTable | LuaFunction;

/**
 * Lua table with an array part for keys 1..n and a hash part for the rest
 *
 * The array part never holds nil, so its length is always a valid border.
 */
export class LuaTable {
  private readonly array: LuaValue[] = [];
  private readonly hash = new Map<TableKey, LuaValue>();
  private keyOrder: TableKey[] | null = null;
  private keyPosition: Map<TableKey, number> | null = null;
  metatable: LuaTable | undefined = undefined;

  static from(items: readonly LuaValue[], fields?: Record<string, LuaValue>): LuaTable {
    const table = new LuaTable();
    items.forEach((item, i) => table.set(i + 1, item));
    if (fields) {
      for (const [key, value] of Object.entries(fields)) table.set(key, value);
    }
    return table;
  }

  get(key: LuaValue): LuaValue {
    if (typeof key === 'number') {
      if (Number.isInteger(key) && key >= 1 && key <= this.array.length) return this.array[key - 1];
      if (Object.is(key, -0)) key = 0;
    }
    if (key === undefined) return undefined;
    return this.hash.get(key);
  }

  set(key: LuaValue, value: LuaValue): void {
    if (key === undefined) throw new LuaError('table index is nil');
    if (typeof key === 'number') {
      if (Number.isNaN(key)) throw new LuaError('table index is NaN');
      if (Object.is(key, -0)) key = 0;
      if (Number.isInteger(key) && key >= 1 && key <= this.array.length + 1) {
        this.setArray(key, value);
        return;
      }
    }
    if (value === undefined) {
      this.hash.delete(key);
      return;
    }
    if (!this.hash.has(key)) this.keyOrder = null;
    this.hash.set(key, value);
  }

  private setArray(key: number, value: LuaValue): void {
    const length = this.array.length;
    if (value === undefined) {
      if (key > length) {
        this.hash.delete(key);
        return;
      }
      // Move the tail into the hash part so the array keeps no holes
      for (let i = key + 1; i <= length; i++) this.hash.set(i, this.array[i - 1]);
      this.array.length = key - 1;
      this.keyOrder = null;
      return;
    }
    if (key <= length) {
      this.array[key - 1] = value;
      return;
    }
    this.array.push(value);
    this.hash.delete(key);
    this.absorb();
  }

  /** Pull integer keys that follow the array part out of the hash part */
  private absorb(): void {
    for (let next = this.array.length + 1; this.hash.has(next); next++) {
      this.array.push(this.hash.get(next));
      this.hash.delete(next);
    }
    this.keyOrder = null;
  }

  /** The border used by the `#` operator */
  get length(): number {
    return this.array.length;
  }

  /**
   * The key after `key` in traversal order, as `next` returns it
   */
  next(key: LuaValue): [LuaValue, LuaValue] | undefined {
    let start = 0;
    if (key !== undefined) {
      if (typeof key === 'number' && Number.isInteger(key) && key >= 1 && key <= this.array.length) {
        start = key;
      } else {
        const order = this.order();
        const position = this.keyPosition?.get(key);
        if (position === undefined) throw new LuaError("invalid key to 'next'");
        for (let i = position + 1; i < order.length; i++) {
          const candidate = order[i];
          if (candidate === undefined) continue;
          const value = this.hash.get(candidate);
          if (value !== undefined) return [candidate, value];
        }
        return undefined;
      }
    }
    if (start < this.array.length) return [start + 1, this.array[start]];
    for (const candidate of this.order()) {
      const value = this.hash.get(candidate);
      if (value !== undefined) return [candidate, value];
    }
    return undefined;
  }

  private order(): TableKey[] {
    if (!this.keyOrder) {
      this.keyOrder = [...this.hash.keys()];
      this.keyPosition = new Map(this.keyOrder.map((key, i) => [key, i]));
    }
    return this.keyOrder;
  }

  /** Snapshot of all entries, array part first */
  entries(): [LuaValue, LuaValue][] {
    const out: [LuaValue, LuaValue][] = this.array.map((value, i) => [i + 1, value]);
    for (const [key, value] of this.hash) out.push([key, value]);
    return out;
  }

  /** Values of keys 1..#t */
  arrayValues(): LuaValue[] {
    return [...this.array];
  }

  /** Insert at a position of the array part, shifting later items up */
  insert(position: number, value: LuaValue): void {
    if (position === this.array.length + 1) {
      this.set(position, value);
      return;
    }
    this.array.splice(position - 1, 0, value);
    this.absorb();
  }

  /** Remove from the array part, shifting later items down */
  remove(position: number): LuaValue {
    const [removed] = this.array.splice(position - 1, 1);
    this.keyOrder = null;
    return removed;
  }

  /** Replace keys 1..n with new values, used by table.sort */
  replaceArray(values: LuaValue[]): void {
    this.array.length = 0;
    this.array.push(...values);
  }
}

// ============================================================================
// CONVERSIONS
// ============================================================================

export function luaType(value: LuaValue): string {
  if (value === undefined) return 'nil';
  if (value instanceof LuaTable) return 'table';
  if (value instanceof LuaFunction) return 'function';
  return typeof value;
}

export function truthy(value: LuaValue): boolean {
  return value !== undefined && value !== false;
}

/**
 * Format a number the way Lua's `%.14g` does
 */
export function numberToString(n: number): string {
  if (Number.isNaN(n)) return 'nan';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  if (Number.isInteger(n) && Math.abs(n) < 1e15) return Object.is(n, -0) ? '-0' : String(n);
  return formatG(n, 14);
}

/**
 * C `%g` formatting with the given precision
 */
export function formatG(n: number, precision: number, alternate = false): string {
  if (!Number.isFinite(n)) return numberToString(n);
  if (n === 0) return Object.is(n, -0) ? '-0' : '0';
  const p = precision === 0 ? 1 : precision;
  const [mantissa = '0', exponentText = '0'] = n.toExponential(p - 1).split('e');
  const exponent = Number(exponentText);
  const strip = (text: string): string => (alternate || !text.includes('.') ? text : text.replace(/\.?0+$/, ''));
  if (exponent < -4 || exponent >= p) {
    const sign = exponent < 0 ? '-' : '+';
    const digits = String(Math.abs(exponent)).padStart(2, '0');
    return `${strip(mantissa)}e${sign}${digits}`;
  }
  return strip(n.toFixed(Math.max(0, p - 1 - exponent)));
}

export function tostringPrimitive(value: LuaValue): string | undefined {
  if (value === undefined) return 'nil';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return numberToString(value);
  if (typeof value === 'string') return value;
  return undefined;
}

const DECIMAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const HEX = /^([-+])?0[xX]([0-9a-fA-F]+)$/;

/**
 * Lua `tonumber` for strings in base 10 or hexadecimal
 */
export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (DECIMAL.test(trimmed)) return Number(trimmed);
  const hex = HEX.exec(trimmed);
  if (hex?.[2]) {
    const value = parseInt(hex[2], 16);
    return hex[1] === '-' ? -value : value;
  }
  return undefined;
}

/**
 * Parse digits in an arbitrary base from 2 to 36
 */
export function parseNumberInBase(text: string, base: number): number | undefined {
  const trimmed = text.trim().toLowerCase();
  const negative = trimmed.startsWith('-');
  const digits = negative ? trimmed.slice(1) : trimmed;
  if (!digits) return undefined;
  let value = 0;
  for (const ch of digits) {
    const digit = parseInt(ch, 36);
    if (Number.isNaN(digit) || digit >= base) return undefined;
    value = value * base + digit;
  }
  return negative ? -value : value;
}

/**
 * Coerce a value to a number for arithmetic, or undefined when impossible
 */
export function toNumber(value: LuaValue): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return parseNumber(value);
  return undefined;
}

/**
 * Coerce a value to a string for concatenation, or undefined when impossible
 */
export function toStringCoerce(value: LuaValue): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return numberToString(value);
  return undefined;
}
