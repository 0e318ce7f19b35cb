/**
 * Lua sandbox
 *
 * @module lua
 */

export { Sandbox, type InvokeResult, type SandboxFailure, type SandboxOptions } from './sandbox.js';
export { argKey, argName, type FrameHost, type PageHost } from './frame.js';
export { Interpreter, type InterpreterOptions } from './interpreter.js';
export { installStdlib, FIXED_TIME } from './stdlib.js';
export { encodeUri, nowiki } from './mw.js';
export { parseChunk } from './parser.js';
export { LuaError, LuaSyntaxError, SandboxTimeoutError } from './errors.js';
export { LuaTable, LuaFunction, NativeFunction, type LuaValue } from './values.js';
