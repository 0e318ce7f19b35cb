/**
 * Tree-walking Lua interpreter
 *
 * Every statement, call and loop iteration charges one step against the
 * budget; the wall clock is checked every 1024 steps. Running out raises
 * SandboxTimeoutError, which Lua code cannot catch.
 *
 * @module lua/interpreter
 */

import type { Block, CallExpr, Chunk, Expr, Stat } from './ast.js';
import { LuaError, SandboxTimeoutError } from './errors.js';
import {
  Closure,
  LuaFunction,
  LuaTable,
  NativeFunction,
  Scope,
  toNumber,
  toStringCoerce,
  tostringPrimitive,
  truthy,
  luaType,
  type LuaValue,
} from './values.js';
import { concatBytes, utf8Length } from './utf8.js';
import { DEFAULT_MAX_STEPS, DEFAULT_SANDBOX_TIMEOUT_MS, MAX_LUA_CALL_DEPTH } from '../lib/constants.js';

export interface InterpreterOptions {
  maxSteps?: number | undefined;
  timeoutMs?: number | undefined;
  maxCallDepth?: number | undefined;
  /** Clock used for the wall-clock budget */
  now?: (() => number) | undefined;
}

/** Longest string concatenation may build */
const MAX_STRING_LENGTH = 50_000_000;

class ReturnValues {
  constructor(readonly values: LuaValue[]) {}
}

const BREAK = Symbol('break');

type Completion = undefined | typeof BREAK | ReturnValues;

interface CallFrame {
  name: string;
  chunk: string;
  line: number;
}

type ArithEvent = '__add' | '__sub' | '__mul' | '__div' | '__mod' | '__pow' | '__unm' | '__idiv';

const ARITH_EVENTS: Readonly<Record<string, ArithEvent>> = {
  '+': '__add',
  '-': '__sub',
  '*': '__mul',
  '/': '__div',
  '%': '__mod',
  '^': '__pow',
  '//': '__idiv',
};

function arithmetic(op: string, a: number, b: number): number {
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      return a / b;
    case '%':
      if (b === Infinity) return a >= 0 ? a : b;
      if (b === -Infinity) return a <= 0 ? a : b;
      return a - Math.floor(a / b) * b;
    case '^':
      return Math.pow(a, b);
    case '//':
      return Math.floor(a / b);
    default:
      throw new LuaError(`unknown arithmetic operator ${op}`);
  }
}

export class Interpreter {
  readonly globals = new LuaTable();
  /** Metatable shared by all strings, so that `s:upper()` works */
  stringMetatable: LuaTable | undefined;
  private steps = 0;
  private deadline = Infinity;
  private callDepth = 0;
  private readonly frames: CallFrame[] = [];
  private readonly ids = new WeakMap<object, number>();
  private nextId = 1;
  private readonly maxSteps: number;
  private readonly timeoutMs: number;
  private readonly maxCallDepth: number;
  private readonly now: () => number;

  constructor(options: InterpreterOptions = {}) {
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SANDBOX_TIMEOUT_MS;
    this.maxCallDepth = options.maxCallDepth ?? MAX_LUA_CALL_DEPTH;
    this.now = options.now ?? Date.now;
    this.resetBudget();
  }

  // ==========================================================================
  // BUDGET
  // ==========================================================================

  resetBudget(): void {
    this.steps = 0;
    this.deadline = this.now() + this.timeoutMs;
  }

  get stepsUsed(): number {
    return this.steps;
  }

  /** Charge one step; throws SandboxTimeoutError when the budget is spent */
  step(): void {
    this.steps++;
    if (this.steps > this.maxSteps) {
      throw new SandboxTimeoutError(`step budget of ${this.maxSteps} exceeded`, this.steps);
    }
    if ((this.steps & 1023) === 0 && this.now() > this.deadline) {
      throw new SandboxTimeoutError(`time budget of ${this.timeoutMs}ms exceeded`, this.steps);
    }
  }

  /** Charge a batch of steps for native work proportional to its input */
  charge(amount: number): void {
    for (let i = 0; i < amount; i += 1024) this.step();
  }

  // ==========================================================================
  // ERRORS
  // ==========================================================================

  /** Position prefix for the given stack level, 1 being the running function */
  where(level = 1): string {
    const frame = this.frames[this.frames.length - level];
    return frame ? `${frame.chunk}:${frame.line}: ` : '';
  }

  runtimeError(message: string): LuaError {
    const text = `${this.where()}${message}`;
    return new LuaError(text, text, this.traceback());
  }

  /** Function names on the stack, outermost first */
  traceback(): string[] {
    return this.frames.map(frame => `${frame.chunk}:${frame.line}: in ${frame.name}`);
  }

  // ==========================================================================
  // ENTRY POINTS
  // ==========================================================================

  /** Create the main function of a parsed chunk, bound to the globals */
  load(chunk: Chunk): Closure {
    return new Closure(chunk.main, new Scope(null, null));
  }

  call(fn: LuaValue, args: LuaValue[]): LuaValue[] {
    this.step();
    if (fn instanceof Closure) return this.callClosure(fn, args);
    if (fn instanceof NativeFunction) return fn.impl(args);
    const handler = this.metamethod(fn, '__call');
    if (handler !== undefined) return this.call(handler, [fn, ...args]);
    throw this.runtimeError(`attempt to call a ${luaType(fn)} value`);
  }

  private callClosure(fn: Closure, args: LuaValue[]): LuaValue[] {
    if (this.callDepth >= this.maxCallDepth) throw this.runtimeError('stack overflow');
    this.callDepth++;
    const func = fn.func;
    this.frames.push({ name: func.name, chunk: func.chunk, line: func.line });
    try {
      const scope = new Scope(fn.scope, func.isVararg ? args.slice(func.params.length) : null);
      for (let i = 0; i < func.params.length; i++) {
        const param = func.params[i];
        if (param !== undefined) scope.declare(param, args[i]);
      }
      const completion = this.execBlock(func.body, scope);
      return completion instanceof ReturnValues ? completion.values : [];
    } finally {
      this.callDepth--;
      this.frames.pop();
    }
  }

  // ==========================================================================
  // METATABLES AND OPERATORS
  // ==========================================================================

  metatableOf(value: LuaValue): LuaTable | undefined {
    if (value instanceof LuaTable) return value.metatable;
    if (typeof value === 'string') return this.stringMetatable;
    return undefined;
  }

  metamethod(value: LuaValue, event: string): LuaValue {
    return this.metatableOf(value)?.get(event);
  }

  index(object: LuaValue, key: LuaValue): LuaValue {
    let current = object;
    for (let hops = 0; hops < 100; hops++) {
      let handler: LuaValue;
      if (current instanceof LuaTable) {
        const raw = current.get(key);
        if (raw !== undefined) return raw;
        handler = current.metatable?.get('__index');
        if (handler === undefined) return undefined;
      } else {
        handler = this.metamethod(current, '__index');
        if (handler === undefined) {
          throw this.runtimeError(`attempt to index a ${luaType(current)} value`);
        }
      }
      if (handler instanceof LuaFunction) return this.call(handler, [current, key])[0];
      current = handler;
    }
    throw this.runtimeError("'__index' chain too long; possible loop");
  }

  setIndex(object: LuaValue, key: LuaValue, value: LuaValue): void {
    let current = object;
    for (let hops = 0; hops < 100; hops++) {
      let handler: LuaValue;
      if (current instanceof LuaTable) {
        handler = current.metatable?.get('__newindex');
        if (handler === undefined || current.get(key) !== undefined) {
          this.rawSet(current, key, value);
          return;
        }
      } else {
        handler = this.metamethod(current, '__newindex');
        if (handler === undefined) {
          throw this.runtimeError(`attempt to index a ${luaType(current)} value`);
        }
      }
      if (handler instanceof LuaFunction) {
        this.call(handler, [current, key, value]);
        return;
      }
      current = handler;
    }
    throw this.runtimeError("'__newindex' chain too long; possible loop");
  }

  rawSet(table: LuaTable, key: LuaValue, value: LuaValue): void {
    try {
      table.set(key, value);
    } catch (error) {
      if (error instanceof LuaError) throw this.runtimeError(error.message);
      throw error;
    }
  }

  arith(op: string, a: LuaValue, b: LuaValue): LuaValue {
    const x = toNumber(a);
    const y = toNumber(b);
    if (x !== undefined && y !== undefined) return arithmetic(op, x, y);
    const event = ARITH_EVENTS[op] ?? '__add';
    const handler = this.metamethod(a, event) ?? this.metamethod(b, event);
    if (handler !== undefined) return this.call(handler, [a, b])[0];
    const bad = x === undefined ? a : b;
    throw this.runtimeError(`attempt to perform arithmetic on a ${luaType(bad)} value`);
  }

  negate(a: LuaValue): LuaValue {
    const x = toNumber(a);
    if (x !== undefined) return -x;
    const handler = this.metamethod(a, '__unm');
    if (handler !== undefined) return this.call(handler, [a, a])[0];
    throw this.runtimeError(`attempt to perform arithmetic on a ${luaType(a)} value`);
  }

  concat(a: LuaValue, b: LuaValue): LuaValue {
    const x = toStringCoerce(a);
    const y = toStringCoerce(b);
    if (x !== undefined && y !== undefined) {
      if (x.length + y.length > MAX_STRING_LENGTH) throw this.runtimeError('string length overflow');
      return concatBytes(x, y);
    }
    const handler = this.metamethod(a, '__concat') ?? this.metamethod(b, '__concat');
    if (handler !== undefined) return this.call(handler, [a, b])[0];
    const bad = x === undefined ? a : b;
    throw this.runtimeError(`attempt to concatenate a ${luaType(bad)} value`);
  }

  length(value: LuaValue): LuaValue {
    if (typeof value === 'string') return utf8Length(value);
    const handler = this.metamethod(value, '__len');
    if (handler !== undefined) return this.call(handler, [value])[0];
    if (value instanceof LuaTable) return value.length;
    throw this.runtimeError(`attempt to get length of a ${luaType(value)} value`);
  }

  equals(a: LuaValue, b: LuaValue): boolean {
    if (a === b) return true;
    if (!(a instanceof LuaTable) || !(b instanceof LuaTable)) return false;
    const handler = this.metamethod(a, '__eq');
    if (handler === undefined || handler !== this.metamethod(b, '__eq')) return false;
    return truthy(this.call(handler, [a, b])[0]);
  }

  lessThan(a: LuaValue, b: LuaValue): boolean {
    if (typeof a === 'number' && typeof b === 'number') return a < b;
    if (typeof a === 'string' && typeof b === 'string') return a < b;
    const handler = this.metamethod(a, '__lt') ?? this.metamethod(b, '__lt');
    if (handler !== undefined) return truthy(this.call(handler, [a, b])[0]);
    throw this.compareError(a, b);
  }

  lessEqual(a: LuaValue, b: LuaValue): boolean {
    if (typeof a === 'number' && typeof b === 'number') return a <= b;
    if (typeof a === 'string' && typeof b === 'string') return a <= b;
    const handler = this.metamethod(a, '__le') ?? this.metamethod(b, '__le');
    if (handler !== undefined) return truthy(this.call(handler, [a, b])[0]);
    const lt = this.metamethod(b, '__lt') ?? this.metamethod(a, '__lt');
    if (lt !== undefined) return !truthy(this.call(lt, [b, a])[0]);
    throw this.compareError(a, b);
  }

  private compareError(a: LuaValue, b: LuaValue): LuaError {
    const ta = luaType(a);
    const tb = luaType(b);
    return this.runtimeError(ta === tb ? `attempt to compare two ${ta} values` : `attempt to compare ${ta} with ${tb}`);
  }

  /** Lua `tostring`, honouring `__tostring` */
  tostring(value: LuaValue): string {
    const primitive = tostringPrimitive(value);
    if (primitive !== undefined) return primitive;
    const handler = this.metamethod(value, '__tostring');
    if (handler !== undefined) {
      const result = this.call(handler, [value])[0];
      if (typeof result !== 'string') throw this.runtimeError("'__tostring' must return a string");
      return result;
    }
    return `${luaType(value)}: 0x${this.identity(value).toString(16).padStart(8, '0')}`;
  }

  /** Stable per-interpreter identity, so printed addresses are deterministic */
  private identity(value: LuaValue): number {
    if (!(value instanceof LuaTable) && !(value instanceof LuaFunction)) return 0;
    let id = this.ids.get(value);
    if (id === undefined) {
      id = this.nextId++;
      this.ids.set(value, id);
    }
    return id;
  }

  // ==========================================================================
  // STATEMENTS
  // ==========================================================================

  private execBlock(block: Block, scope: Scope): Completion {
    for (const stat of block) {
      const completion = this.execStat(stat, scope);
      if (completion !== undefined) return completion;
    }
    return undefined;
  }

  private setLine(line: number): void {
    const frame = this.frames[this.frames.length - 1];
    if (frame) frame.line = line;
  }

  private execStat(stat: Stat, scope: Scope): Completion {
    this.step();
    this.setLine(stat.line);

    switch (stat.type) {
      case 'local': {
        const values = this.evalList(stat.values, scope);
        stat.names.forEach((name, i) => scope.declare(name, values[i]));
        return undefined;
      }

      case 'localFunction': {
        scope.declare(stat.name, undefined);
        const cell = scope.lookup(stat.name);
        if (cell) cell.value = new Closure(stat.func, scope);
        return undefined;
      }

      case 'assign':
        this.execAssign(stat.targets, stat.values, scope);
        return undefined;

      case 'call':
        this.evalCall(stat.call, scope);
        return undefined;

      case 'do':
        return this.execBlock(stat.body, new Scope(scope, scope.varargs));

      case 'while':
        while (truthy(this.evalExpr(stat.cond, scope))) {
          // Empty bodies run no statements, so each iteration is charged here
          this.step();
          const completion = this.execBlock(stat.body, new Scope(scope, scope.varargs));
          if (completion === BREAK) break;
          if (completion) return completion;
        }
        return undefined;

      case 'repeat':
        for (;;) {
          this.step();
          const inner = new Scope(scope, scope.varargs);
          const completion = this.execBlock(stat.body, inner);
          if (completion === BREAK) break;
          if (completion) return completion;
          if (truthy(this.evalExpr(stat.cond, inner))) break;
        }
        return undefined;

      case 'if':
        for (const clause of stat.clauses) {
          if (truthy(this.evalExpr(clause.cond, scope))) {
            return this.execBlock(clause.body, new Scope(scope, scope.varargs));
          }
        }
        return stat.orelse ? this.execBlock(stat.orelse, new Scope(scope, scope.varargs)) : undefined;

      case 'numericFor':
        return this.execNumericFor(stat, scope);

      case 'genericFor':
        return this.execGenericFor(stat, scope);

      case 'return':
        return new ReturnValues(this.evalList(stat.values, scope));

      case 'break':
        return BREAK;
    }
  }

  private execAssign(targets: Extract<Stat, { type: 'assign' }>['targets'], exprs: Expr[], scope: Scope): void {
    if (targets.length === 1 && exprs.length === 1) {
      const [target] = targets;
      const [expr] = exprs;
      if (!target || !expr) return;
      if (target.type === 'name') {
        this.assignName(target.name, this.evalExpr(expr, scope), scope);
      } else {
        const object = this.evalExpr(target.object, scope);
        const key = this.evalExpr(target.key, scope);
        this.setIndex(object, key, this.evalExpr(expr, scope));
      }
      return;
    }

    const places = targets.map(target =>
      target.type === 'name'
        ? { name: target.name, object: undefined, key: undefined }
        : { name: null, object: this.evalExpr(target.object, scope), key: this.evalExpr(target.key, scope) }
    );
    const values = this.evalList(exprs, scope);
    places.forEach((place, i) => {
      if (place.name !== null) this.assignName(place.name, values[i], scope);
      else this.setIndex(place.object, place.key, values[i]);
    });
  }

  private assignName(name: string, value: LuaValue, scope: Scope): void {
    const cell = scope.lookup(name);
    if (cell) cell.value = value;
    else this.setIndex(this.globals, name, value);
  }

  private execNumericFor(stat: Extract<Stat, { type: 'numericFor' }>, scope: Scope): Completion {
    const start = toNumber(this.evalExpr(stat.start, scope));
    const limit = toNumber(this.evalExpr(stat.limit, scope));
    const step = stat.step ? toNumber(this.evalExpr(stat.step, scope)) : 1;
    if (start === undefined) throw this.runtimeError("'for' initial value must be a number");
    if (limit === undefined) throw this.runtimeError("'for' limit must be a number");
    if (step === undefined) throw this.runtimeError("'for' step must be a number");
    if (step === 0) throw this.runtimeError("'for' step is zero");

    for (let i = start; step > 0 ? i <= limit : i >= limit; i += step) {
      const inner = new Scope(scope, scope.varargs);
      inner.declare(stat.variable, i);
      const completion = this.execBlock(stat.body, inner);
      if (completion === BREAK) break;
      if (completion) return completion;
      this.step();
    }
    return undefined;
  }

  private execGenericFor(stat: Extract<Stat, { type: 'genericFor' }>, scope: Scope): Completion {
    const [iterator, state, initial] = this.evalList(stat.exprs, scope);
    let control = initial;
    for (;;) {
      this.step();
      const results = this.call(iterator, [state, control]);
      const first = results[0];
      if (first === undefined) break;
      control = first;
      const inner = new Scope(scope, scope.varargs);
      stat.names.forEach((name, i) => inner.declare(name, results[i]));
      const completion = this.execBlock(stat.body, inner);
      if (completion === BREAK) break;
      if (completion) return completion;
    }
    return undefined;
  }

  // ==========================================================================
  // EXPRESSIONS
  // ==========================================================================

  private evalList(exprs: Expr[], scope: Scope): LuaValue[] {
    const values: LuaValue[] = [];
    const last = exprs.length - 1;
    for (let i = 0; i < last; i++) {
      const expr = exprs[i];
      if (expr) values.push(this.evalExpr(expr, scope));
    }
    const tail = exprs[last];
    if (tail) values.push(...this.evalMulti(tail, scope));
    return values;
  }

  private evalMulti(expr: Expr, scope: Scope): LuaValue[] {
    if (expr.type === 'call' || expr.type === 'method') return this.evalCall(expr, scope);
    if (expr.type === 'vararg') return [...(scope.varargs ?? [])];
    return [this.evalExpr(expr, scope)];
  }

  private evalExpr(expr: Expr, scope: Scope): LuaValue {
    switch (expr.type) {
      case 'nil':
        return undefined;
      case 'true':
        return true;
      case 'false':
        return false;
      case 'number':
      case 'string':
        return expr.value;
      case 'vararg':
        return scope.varargs?.[0];
      case 'function':
        return new Closure(expr.func, scope);
      case 'table':
        return this.evalTable(expr, scope);
      case 'binary':
        return this.evalBinary(expr, scope);
      case 'unary': {
        const operand = this.evalExpr(expr.operand, scope);
        if (expr.op === 'not') return !truthy(operand);
        if (expr.op === '-') return this.negate(operand);
        return this.length(operand);
      }
      case 'name': {
        const cell = scope.lookup(expr.name);
        return cell ? cell.value : this.index(this.globals, expr.name);
      }
      case 'index':
        return this.index(this.evalExpr(expr.object, scope), this.evalExpr(expr.key, scope));
      case 'call':
      case 'method':
        return this.evalCall(expr, scope)[0];
      case 'paren':
        return this.evalExpr(expr.expr, scope);
    }
  }

  private evalTable(expr: Extract<Expr, { type: 'table' }>, scope: Scope): LuaTable {
    const table = new LuaTable();
    let position = 1;
    const last = expr.fields.length - 1;
    expr.fields.forEach((field, i) => {
      if (field.kind === 'keyed') {
        const key = this.evalExpr(field.key, scope);
        if (key === undefined) throw this.runtimeError('table index is nil');
        this.rawSet(table, key, this.evalExpr(field.value, scope));
        return;
      }
      if (i === last) {
        for (const value of this.evalMulti(field.value, scope)) table.set(position++, value);
        return;
      }
      table.set(position++, this.evalExpr(field.value, scope));
    });
    return table;
  }

  private evalBinary(expr: Extract<Expr, { type: 'binary' }>, scope: Scope): LuaValue {
    const op = expr.op;
    if (op === 'and') {
      const left = this.evalExpr(expr.left, scope);
      return truthy(left) ? this.evalExpr(expr.right, scope) : left;
    }
    if (op === 'or') {
      const left = this.evalExpr(expr.left, scope);
      return truthy(left) ? left : this.evalExpr(expr.right, scope);
    }
    const left = this.evalExpr(expr.left, scope);
    const right = this.evalExpr(expr.right, scope);
    switch (op) {
      case '..':
        return this.concat(left, right);
      case '==':
        return this.equals(left, right);
      case '~=':
        return !this.equals(left, right);
      case '<':
        return this.lessThan(left, right);
      case '<=':
        return this.lessEqual(left, right);
      case '>':
        return this.lessThan(right, left);
      case '>=':
        return this.lessEqual(right, left);
      default:
        return this.arith(op, left, right);
    }
  }

  private evalCall(expr: CallExpr, scope: Scope): LuaValue[] {
    if (expr.type === 'method') {
      const object = this.evalExpr(expr.object, scope);
      const fn = this.index(object, expr.method);
      const args = [object, ...this.evalList(expr.args, scope)];
      this.setLine(expr.line);
      if (fn === undefined) throw this.runtimeError(`attempt to call method '${expr.method}' (a nil value)`);
      return this.call(fn, args);
    }
    const fn = this.evalExpr(expr.callee, scope);
    const args = this.evalList(expr.args, scope);
    this.setLine(expr.line);
    if (!(fn instanceof LuaFunction) && this.metamethod(fn, '__call') === undefined) {
      throw this.runtimeError(`attempt to call ${this.describe(expr.callee, scope)} (a ${luaType(fn)} value)`);
    }
    return this.call(fn, args);
  }

  /** How an expression reads in error messages, e.g. `global 'foo'` */
  private describe(expr: Expr, scope: Scope): string {
    if (expr.type === 'name') return scope.lookup(expr.name) ? `local '${expr.name}'` : `global '${expr.name}'`;
    if (expr.type === 'index' && expr.key.type === 'string') return `field '${expr.key.value}'`;
    return 'a value';
  }
}
