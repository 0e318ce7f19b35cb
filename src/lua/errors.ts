/**
 * Errors raised inside the Lua sandbox
 *
 * LuaError is a Lua-level error: `pcall` catches it and its value is what
 * `error()` was given. SandboxTimeoutError ends the whole invocation and is
 * invisible to `pcall`.
 *
 * @module lua/errors
 */

import type { LuaValue } from './values.js';

export type SandboxErrorKind = 'LUA_ERROR' | 'LUA_SYNTAX' | 'SANDBOX_TIMEOUT';

export class LuaError extends Error {
  readonly kind: SandboxErrorKind = 'LUA_ERROR';

  constructor(
    message: string,
    /** The value passed to `error()`, or the message for runtime errors */
    readonly value: LuaValue = message,
    /** Module call stack at the point of failure, innermost last */
    readonly traceback: readonly string[] = []
  ) {
    super(message);
    this.name = 'LuaError';
    Object.setPrototypeOf(this, LuaError.prototype);
  }
}

export class LuaSyntaxError extends LuaError {
  override readonly kind: SandboxErrorKind = 'LUA_SYNTAX';

  constructor(message: string) {
    super(message);
    this.name = 'LuaSyntaxError';
    Object.setPrototypeOf(this, LuaSyntaxError.prototype);
  }
}

export class SandboxTimeoutError extends Error {
  readonly kind = 'SANDBOX_TIMEOUT' as const;

  constructor(
    message: string,
    /** Interpreter steps executed before the budget ran out */
    readonly steps: number
  ) {
    super(message);
    this.name = 'SandboxTimeoutError';
    Object.setPrototypeOf(this, SandboxTimeoutError.prototype);
  }
}
