/**
 * Module execution sandbox
 *
 * Each `invoke` runs in a fresh interpreter with fresh globals, so module
 * code cannot leak state from one call to the next. Parsed chunks are
 * immutable and cached per sandbox (one sandbox per pool lane).
 *
 * @module lua/sandbox
 */

import type { Chunk } from './ast.js';
import { LuaError, SandboxTimeoutError } from './errors.js';
import { createFrameFactory, isCallable, type FrameHost } from './frame.js';
import { Interpreter } from './interpreter.js';
import { native } from './library.js';
import { createLibraryUtil, installMw } from './mw.js';
import { parseChunk } from './parser.js';
import { installStdlib } from './stdlib.js';
import { LuaTable, type LuaValue } from './values.js';
import { CHUNK_CACHE_SIZE } from '../lib/constants.js';
import { createLogger } from '../lib/logger.js';
import { LRUCache, type LRUCacheStats } from '../lib/lru-cache.js';
import type { Resolver } from '../store/resolver.js';

const log = createLogger('extract:lua');

export interface SandboxOptions {
  maxSteps?: number | undefined;
  timeoutMs?: number | undefined;
  maxCallDepth?: number | undefined;
  chunkCacheSize?: number | undefined;
  /** Clock for the wall-clock budget */
  now?: (() => number) | undefined;
}

export interface SandboxFailure {
  kind: 'timeout' | 'fault';
  message: string;
}

export type InvokeResult = { ok: true; text: string } | { ok: false; error: SandboxFailure };

/** Marks a module whose loading has started but not finished */
const LOADING = Symbol('loading');

/**
 * Runs module functions for the expansion engine
 *
 * @example
 * ```typescript
 * const sandbox = new Sandbox(resolver, { maxSteps: 100_000 });
 * const result = sandbox.invoke('fi-conj', 'show', frame);
 * if (!result.ok) console.error(result.error.kind, result.error.message);
 * ```
 */
export class Sandbox {
  private readonly chunks: LRUCache<string, Chunk>;

  constructor(
    private readonly resolver: Resolver,
    private readonly options: SandboxOptions = {}
  ) {
    this.chunks = new LRUCache({ maxSize: options.chunkCacheSize ?? CHUNK_CACHE_SIZE });
  }

  /**
   * Call `functionName` of `moduleName` with the frame of an `#invoke`
   *
   * Lua errors, syntax errors and stack overflows come back as `fault`,
   * an exhausted budget as `timeout`. Errors from the host (cancellation,
   * an unavailable store) propagate.
   */
  invoke(moduleName: string, functionName: string, frame: FrameHost): InvokeResult {
    const interp = new Interpreter({
      maxSteps: this.options.maxSteps,
      timeoutMs: this.options.timeoutMs,
      maxCallDepth: this.options.maxCallDepth,
      now: this.options.now,
    });
    try {
      const text = this.run(interp, moduleName, functionName, frame);
      log.debug('invoke finished', { module: moduleName, function: functionName, steps: interp.stepsUsed });
      return { ok: true, text };
    } catch (error) {
      if (error instanceof SandboxTimeoutError) {
        return { ok: false, error: { kind: 'timeout', message: error.message } };
      }
      if (error instanceof LuaError) {
        return { ok: false, error: { kind: 'fault', message: error.message } };
      }
      if (error instanceof RangeError) {
        return { ok: false, error: { kind: 'fault', message: 'stack overflow' } };
      }
      throw error;
    }
  }

  /** Number of parsed chunks held, and how often they were reused */
  cacheStats(): LRUCacheStats {
    return this.chunks.getStats();
  }

  private run(interp: Interpreter, moduleName: string, functionName: string, frame: FrameHost): string {
    installStdlib(interp);
    const frames = createFrameFactory(interp);
    const loaded = new Map<string, LuaValue | typeof LOADING>();
    const data = new Map<string, LuaValue>();

    const requireModule = (name: string): LuaValue => {
      const normalized = this.resolver.normalize(name, 'module');
      const builtin = this.builtin(interp, normalized);
      if (builtin !== undefined) return builtin;

      const state = loaded.get(normalized);
      if (state === LOADING) throw interp.runtimeError(`loop or previous error loading module '${name}'`);
      if (state !== undefined) return state;

      loaded.set(normalized, LOADING);
      const main = interp.load(this.chunk(interp, normalized));
      const value = interp.call(main, [])[0] ?? true;
      loaded.set(normalized, value);
      return value;
    };

    installMw({
      interp,
      resolver: this.resolver,
      frames,
      frame,
      loadData: name => {
        const normalized = this.resolver.normalize(name, 'module');
        const cached = data.get(normalized);
        if (cached !== undefined) return cached;
        const value = requireModule(name);
        if (!(value instanceof LuaTable)) {
          throw interp.runtimeError(`data for mw.loadData was '${typeof value}', expected a table`);
        }
        data.set(normalized, value);
        return value;
      },
    });
    interp.globals.set('require', native('require', ([name]) => {
      if (typeof name !== 'string') throw interp.runtimeError("bad argument #1 to 'require' (string expected)");
      return [requireModule(name)];
    }));

    const exports = requireModule(moduleName);
    if (!(exports instanceof LuaTable)) {
      throw new LuaError(`module '${moduleName}' must return a table, got ${interp.tostring(exports)}`);
    }
    const fn = exports.get(functionName);
    if (!isCallable(fn)) {
      throw new LuaError(`function '${functionName}' does not exist in module '${moduleName}'`);
    }
    const results = interp.call(fn, [frames(frame)]);
    return results.map(value => (value === undefined ? '' : interp.tostring(value))).join('');
  }

  private builtin(interp: Interpreter, name: string): LuaValue {
    switch (name.toLowerCase()) {
      case 'strict':
        return true;
      case 'libraryutil':
        return createLibraryUtil(interp);
      default:
        return undefined;
    }
  }

  private chunk(interp: Interpreter, name: string): Chunk {
    const cached = this.chunks.get(name);
    if (cached) return cached;
    const resolution = this.resolver.resolveModule(name);
    if (!resolution.found) throw interp.runtimeError(`module '${name}' not found`);
    const chunk = parseChunk(resolution.definition.source, `Module:${resolution.definition.name}`);
    this.chunks.set(name, chunk);
    return chunk;
  }
}
