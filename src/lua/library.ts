/**
 * Helpers for writing native library functions
 *
 * @module lua/library
 */

import type { LuaError } from './errors.js';
import type { Interpreter } from './interpreter.js';
import { LuaFunction, LuaTable, NativeFunction, luaType, toNumber, toStringCoerce, type LuaValue, type NativeImpl } from './values.js';

export type NativeDefinitions = Record<string, NativeImpl>;

/**
 * Argument checking bound to one library function, producing Lua's
 * `bad argument #n to 'name'` messages
 */
export class Args {
  constructor(
    private readonly interp: Interpreter,
    readonly fname: string,
    readonly values: LuaValue[]
  ) {}

  error(n: number, message: string): LuaError {
    return this.interp.runtimeError(`bad argument #${n} to '${this.fname}' (${message})`);
  }

  private expected(n: number, what: string): LuaError {
    const value = this.values[n - 1];
    return this.error(n, `${what} expected, got ${value === undefined && n > this.values.length ? 'no value' : luaType(value)}`);
  }

  get(n: number): LuaValue {
    return this.values[n - 1];
  }

  any(n: number): LuaValue {
    if (n > this.values.length) throw this.error(n, 'value expected');
    return this.values[n - 1];
  }

  table(n: number): LuaTable {
    const value = this.values[n - 1];
    if (value instanceof LuaTable) return value;
    throw this.expected(n, 'table');
  }

  optTable(n: number): LuaTable | undefined {
    const value = this.values[n - 1];
    return value === undefined ? undefined : this.table(n);
  }

  func(n: number): LuaFunction {
    const value = this.values[n - 1];
    if (value instanceof LuaFunction) return value;
    throw this.expected(n, 'function');
  }

  string(n: number): string {
    const value = toStringCoerce(this.values[n - 1]);
    if (value !== undefined) return value;
    throw this.expected(n, 'string');
  }

  optString(n: number, fallback: string): string;
  optString(n: number): string | undefined;
  optString(n: number, fallback?: string): string | undefined {
    return this.values[n - 1] === undefined ? fallback : this.string(n);
  }

  number(n: number): number {
    const value = toNumber(this.values[n - 1]);
    if (value !== undefined) return value;
    throw this.expected(n, 'number');
  }

  optNumber(n: number, fallback: number): number;
  optNumber(n: number): number | undefined;
  optNumber(n: number, fallback?: number): number | undefined {
    return this.values[n - 1] === undefined ? fallback : this.number(n);
  }

  integer(n: number): number {
    const value = this.number(n);
    if (!Number.isFinite(value)) throw this.error(n, 'number has no integer representation');
    return Math.trunc(value);
  }

  optInteger(n: number, fallback: number): number {
    return this.values[n - 1] === undefined ? fallback : this.integer(n);
  }
}

/**
 * Build a library table from native implementations that receive checked
 * arguments
 */
export function defineLibrary(
  interp: Interpreter,
  prefix: string,
  functions: Record<string, (args: Args) => LuaValue[]>,
  target: LuaTable = new LuaTable()
): LuaTable {
  for (const [name, impl] of Object.entries(functions)) {
    const fname = prefix ? `${prefix}.${name}` : name;
    target.set(name, new NativeFunction(fname, values => impl(new Args(interp, name, values))));
  }
  return target;
}

export function native(name: string, impl: NativeImpl): NativeFunction {
  return new NativeFunction(name, impl);
}

/** Lua's relative string position: negative counts from the end */
export function relativePosition(position: number, length: number): number {
  if (position >= 0) return position;
  if (-position > length) return 0;
  return length + position + 1;
}
