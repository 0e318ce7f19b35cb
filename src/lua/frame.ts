/**
 * Frame objects
 *
 * The expansion engine hands the sandbox a FrameHost for the `#invoke`
 * call and its parent template call. This module turns hosts into the
 * frame tables module code sees (`frame.args`, `frame:getParent()`, ...).
 *
 * @module lua/frame
 */

import type { Interpreter } from './interpreter.js';
import { native } from './library.js';
import { LuaFunction, LuaTable, luaType, numberToString, tostringPrimitive, type LuaValue } from './values.js';

// ============================================================================
// HOST INTERFACES
// ============================================================================

/** The page being expanded, shared by every frame of one invocation */
export interface PageHost {
  /** Full title of the page */
  readonly title: string;
  /** Replace literal markers with the text they protect */
  unstrip(text: string): string;
  /** Remove literal markers */
  killMarkers(text: string): string;
}

/**
 * A template call or `#invoke` as the sandbox sees it
 *
 * Argument names are strings: positional arguments are `"1"`, `"2"`, ...
 */
export interface FrameHost {
  /** Title of the frame's page, e.g. `Module:fi-conj` or `Template:conj-table` */
  readonly title: string;
  readonly parent: FrameHost | null;
  readonly page: PageHost;
  /** Expanded argument value, or undefined when the call does not pass it */
  getArg(name: string): string | undefined;
  /** Argument names in call order */
  argNames(): string[];
  /** Expand `{{title|args}}` as if it were called from this frame */
  expandTemplate(title: string, args: ReadonlyMap<string, string>): string;
  /** Expand wikitext as if it were part of this frame's body */
  preprocess(text: string): string;
  callParserFunction(name: string, args: string[]): string;
  newChild(title: string, args: ReadonlyMap<string, string>): FrameHost;
}

// ============================================================================
// CONVERSIONS
// ============================================================================

/** `1` and `"1"` name the same argument */
export function argName(key: LuaValue): string | undefined {
  if (typeof key === 'number') return numberToString(key);
  if (typeof key === 'string') return key;
  return undefined;
}

/** Lua sees positional argument names as numbers */
export function argKey(name: string): LuaValue {
  return /^[1-9]\d*$/.test(name) ? Number(name) : name;
}

/**
 * Read a Lua table of arguments (`{ 'a', 'b', x = 'c' }`) as named strings
 */
export function argsFromTable(interp: Interpreter, table: LuaValue): Map<string, string> {
  const args = new Map<string, string>();
  if (!(table instanceof LuaTable)) return args;
  for (const [key, value] of table.entries()) {
    const name = argName(key);
    const text = tostringPrimitive(value);
    if (name === undefined || text === undefined || value === undefined || typeof value === 'boolean') {
      throw interp.runtimeError(`invalid argument ${interp.tostring(key)} (${luaType(value)})`);
    }
    args.set(name, text);
  }
  return args;
}

// ============================================================================
// FRAME TABLES
// ============================================================================

export type FrameTableFactory = (host: FrameHost) => LuaTable;

/**
 * Build the factory that turns hosts into frame tables; one table per host,
 * so `frame:getParent()` is stable across calls
 */
export function createFrameFactory(interp: Interpreter): FrameTableFactory {
  const tables = new WeakMap<FrameHost, LuaTable>();

  const factory = (host: FrameHost): LuaTable => {
    const existing = tables.get(host);
    if (existing) return existing;
    const frame = new LuaTable();
    tables.set(host, frame);

    /** Drop `self` when a method is called with `:` */
    const params = (args: LuaValue[]): LuaValue[] => (args[0] === frame ? args.slice(1) : args);
    const method = (name: string, impl: (args: LuaValue[]) => LuaValue[]): void => {
      frame.set(name, native(`frame:${name}`, args => impl(params(args))));
    };

    frame.set('args', createArgsTable(interp, host));

    method('getParent', () => [host.parent ? factory(host.parent) : undefined]);

    method('getTitle', () => [host.title]);

    method('expandTemplate', ([options]) => {
      if (!(options instanceof LuaTable)) throw interp.runtimeError('frame:expandTemplate: table expected');
      const title = options.get('title');
      if (typeof title !== 'string') throw interp.runtimeError('frame:expandTemplate: a title is required');
      return [host.expandTemplate(title, argsFromTable(interp, options.get('args')))];
    });

    method('preprocess', ([input]) => {
      const text = input instanceof LuaTable ? input.get('text') : input;
      if (typeof text !== 'string' && typeof text !== 'number') {
        throw interp.runtimeError('frame:preprocess: string expected');
      }
      return [host.preprocess(String(text))];
    });

    method('callParserFunction', args => {
      let name: LuaValue;
      let rest: LuaValue[];
      const [first] = args;
      if (first instanceof LuaTable) {
        name = first.get('name');
        rest = [first.get('args')];
      } else {
        name = first;
        rest = args.slice(1);
      }
      if (typeof name !== 'string') throw interp.runtimeError('frame:callParserFunction: function name is required');
      const values: string[] = [];
      for (const value of rest) {
        if (value instanceof LuaTable) {
          for (const [key, item] of argsFromTable(interp, value)) {
            values.push(/^[1-9]\d*$/.test(key) ? item : `${key}=${item}`);
          }
        } else if (value !== undefined) {
          values.push(interp.tostring(value));
        }
      }
      return [host.callParserFunction(name, values)];
    });

    method('extensionTag', args => {
      const [first] = args;
      let name: LuaValue = first;
      let content: LuaValue = args[1];
      let attrs: LuaValue = args[2];
      if (first instanceof LuaTable) {
        name = first.get('name');
        content = first.get('content');
        attrs = first.get('args');
      }
      if (typeof name !== 'string') throw interp.runtimeError('frame:extensionTag: tag name is required');
      const values = [name, content === undefined ? '' : interp.tostring(content)];
      for (const [key, value] of argsFromTable(interp, attrs)) values.push(`${key}=${value}`);
      return [host.callParserFunction('#tag', values)];
    });

    method('newChild', ([options]) => {
      const title = options instanceof LuaTable ? options.get('title') : undefined;
      const args = options instanceof LuaTable ? options.get('args') : undefined;
      return [factory(host.newChild(typeof title === 'string' ? title : host.title, argsFromTable(interp, args)))];
    });

    method('getArgument', ([key]) => {
      const name = key instanceof LuaTable ? argName(key.get('name')) : argName(key);
      if (name === undefined) throw interp.runtimeError('frame:getArgument: argument name is required');
      const value = host.getArg(name);
      if (value === undefined) return [undefined];
      return [LuaTable.from([], { expand: native('argument:expand', () => [value]) })];
    });

    method('argumentPairs', () => {
      const args = frame.get('args');
      const pairs = interp.globals.get('pairs');
      return interp.call(pairs, [args]);
    });

    return frame;
  };

  return factory;
}

/**
 * `frame.args`: values are expanded on first access, by the host
 */
function createArgsTable(interp: Interpreter, host: FrameHost): LuaTable {
  const args = new LuaTable();
  const keys = (): LuaValue[] => host.argNames().map(argKey);

  args.metatable = LuaTable.from([], {
    __index: native('args.__index', ([, key]) => {
      const name = argName(key);
      return [name === undefined ? undefined : host.getArg(name)];
    }),
    __newindex: native('args.__newindex', () => {
      throw interp.runtimeError('frame.args is read-only');
    }),
    __pairs: native('args.__pairs', () => {
      const order = keys();
      let position = 0;
      const iterator = native('args iterator', () => {
        while (position < order.length) {
          const key = order[position++];
          const name = argName(key);
          const value = name === undefined ? undefined : host.getArg(name);
          if (value !== undefined) return [key, value];
        }
        return [undefined];
      });
      return [iterator, args, undefined];
    }),
    __ipairs: native('args.__ipairs', () => {
      const iterator = native('args ipairs iterator', ([, index]) => {
        const i = (typeof index === 'number' ? index : 0) + 1;
        const value = host.getArg(String(i));
        return value === undefined ? [undefined] : [i, value];
      });
      return [iterator, args, 0];
    }),
  });
  return args;
}

/** Whether a value is a callable Lua function */
export function isCallable(value: LuaValue): value is LuaFunction {
  return value instanceof LuaFunction;
}
