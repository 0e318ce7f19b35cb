/**
 * Tests for the Lua interpreter and its standard library
 */

import { describe, it, expect } from 'vitest';
import {
  FIXED_TIME,
  Interpreter,
  LuaError,
  LuaSyntaxError,
  SandboxTimeoutError,
  installStdlib,
  parseChunk,
  type InterpreterOptions,
  type LuaValue,
} from '../../src/lua/index.js';

function run(source: string, options: InterpreterOptions = {}): LuaValue[] {
  const interp = new Interpreter(options);
  installStdlib(interp);
  return interp.call(interp.load(parseChunk(source, 'test')), []);
}

describe('Interpreter', () => {
  describe('expressions', () => {
    it('should evaluate arithmetic and concatenation', () => {
      expect(run('return 1 + 2, "a" .. "b", 7 // 2, 7 % 3, 2^10, -7 % 3')).toEqual([3, 'ab', 3, 1, 1024, 2]);
    });

    it('should coerce numeric strings', () => {
      expect(run('return "10" + 5, 1 .. 2')).toEqual([15, '12']);
    });

    it('should short-circuit and/or', () => {
      expect(run('return nil or "x", false and error("no"), 1 and 2')).toEqual(['x', false, 2]);
    });
  });

  describe('functions', () => {
    it('should keep upvalues in closures', () => {
      const source = [
        'local function counter()',
        '  local n = 0',
        '  return function() n = n + 1 return n end',
        'end',
        'local c = counter()',
        'c()',
        'return c()',
      ].join('\n');
      expect(run(source)).toEqual([2]);
    });

    it('should pass varargs through select', () => {
      const source = 'local function f(...) return select("#", ...), select(2, ...) end\nreturn f(1, nil, 3)';
      expect(run(source)).toEqual([3, undefined, 3]);
    });

    it('should call metatable handlers', () => {
      const source = [
        'local t = setmetatable({}, { __index = function(_, k) return k .. "!" end, __call = function(self, x) return x * 2 end })',
        'return t.hey, t(21)',
      ].join('\n');
      expect(run(source)).toEqual(['hey!', 42]);
    });

    it('should iterate with numeric and generic for', () => {
      const source = [
        'local sum = 0',
        'for i = 10, 1, -3 do sum = sum + i end',
        'local t = { 10, 20, x = 1 }',
        'local total = 0',
        'for _, v in pairs(t) do total = total + v end',
        'local seen = 0',
        'for _, v in ipairs({ 1, 2, nil, 4 }) do seen = seen + v end',
        'return sum, total, seen',
      ].join('\n');
      expect(run(source)).toEqual([22, 31, 3]);
    });
  });

  describe('errors', () => {
    it('should prefix runtime errors with the chunk and line', () => {
      expect(() => run('local x = nil\nreturn x.y')).toThrow('test:2: attempt to index a nil value');
    });

    it('should name the missing global in call errors', () => {
      expect(() => run('foo()')).toThrow("test:1: attempt to call global 'foo' (a nil value)");
    });

    it('should raise syntax errors from the parser', () => {
      expect(() => parseChunk('x = = 1', 'test')).toThrow(LuaSyntaxError);
    });

    it('should catch errors with pcall', () => {
      const source = [
        'local ok, e = pcall(function() error("boom") end)',
        'local ok2, t = pcall(error, { code = 7 })',
        'return ok, e, ok2, t.code',
      ].join('\n');
      expect(run(source)).toEqual([false, 'test:1: boom', false, 7]);
    });

    it('should turn deep recursion into a catchable error', () => {
      const source = [
        'local function f() return f() end',
        'local ok, e = pcall(f)',
        'return ok, e',
      ].join('\n');
      expect(run(source, { maxCallDepth: 50 })).toEqual([false, 'test:1: stack overflow']);
    });

    it('should throw LuaError out of unprotected code', () => {
      expect(() => run('error("top")')).toThrow(LuaError);
    });
  });

  describe('budget', () => {
    it('should stop an infinite loop at the step limit', () => {
      expect(() => run('while true do end', { maxSteps: 1000 })).toThrow('step budget of 1000 exceeded');
    });

    it('should charge every iteration of an empty loop', () => {
      expect(() => run('repeat until false', { maxSteps: 1000 })).toThrow('step budget of 1000 exceeded');
      expect(() => run('for _ in math.abs, -1 do end', { maxSteps: 1000 })).toThrow('step budget of 1000 exceeded');
      expect(() => run('for i = 1, math.huge do end', { maxSteps: 1000 })).toThrow('step budget of 1000 exceeded');
    });

    it('should not let pcall catch budget exhaustion', () => {
      expect(() => run('return pcall(function() while true do end end)', { maxSteps: 1000 })).toThrow(
        SandboxTimeoutError
      );
    });

    it('should stop at the time limit', () => {
      let clock = 0;
      const now = (): number => (clock += 100);
      expect(() => run('while true do end', { timeoutMs: 1000, now })).toThrow('time budget of 1000ms exceeded');
    });
  });
});

describe('standard library', () => {
  it('should not expose io or code loading', () => {
    expect(run('return io, load, loadstring, dofile, debug')).toEqual([
      undefined,
      undefined,
      undefined,
      undefined,
      undefined,
    ]);
  });

  it('should format numbers like Lua', () => {
    expect(run('return tostring(1e15), tostring(0.1), tostring(10 / 2), tostring(1 / 0)')).toEqual([
      '1e+15',
      '0.1',
      '5',
      'inf',
    ]);
  });

  it('should parse numbers with tonumber', () => {
    expect(run('return tonumber("0x1F"), tonumber("  12  "), tonumber("z", 36), tonumber("abc")')).toEqual([
      31,
      12,
      35,
      undefined,
    ]);
  });

  describe('string', () => {
    it('should format with string.format', () => {
      expect(run('return string.format("%5.2f|%d|%s|%x|%q", 3.14159, 42, "hi", 255, "a\\"b")')).toEqual([
        ' 3.14|42|hi|ff|"a\\"b"',
      ]);
    });

    it('should support method calls on strings', () => {
      expect(run('return ("abc"):upper(), ("x"):rep(3, "-"), ("hello"):sub(2, -2)')).toEqual(['ABC', 'x-x-x', 'ell']);
    });

    it('should find and match patterns', () => {
      const source = [
        'local a, b = string.find("hello", "l+")',
        'local k, v = string.match("key=value", "(%w+)=(%w+)")',
        'return a, b, k, v, string.find("a.b", ".", 1, true)',
      ].join('\n');
      expect(run(source)).toEqual([3, 4, 'key', 'value', 2, 2]);
    });

    it('should substitute with gsub', () => {
      const source = [
        'local a, n = string.gsub("hello world", "o", "0")',
        'local b = string.gsub("abc", "%w", "%1%1")',
        'local c = string.gsub("x=1, y=2", "(%w+)=(%w+)", "%2=%1")',
        'local d = string.gsub("a b", "%a", { a = "A" })',
        'local e = string.gsub("abc", "b", function(m) return m:upper() end)',
        'return a, n, b, c, d, e',
      ].join('\n');
      expect(run(source)).toEqual(['hell0 w0rld', 2, 'aabbcc', '1=x, 2=y', 'A b', 'aBc']);
    });

    it('should iterate with gmatch', () => {
      const source = [
        'local t = {}',
        'for w in string.gmatch("one two  three", "%a+") do t[#t + 1] = w end',
        'return table.concat(t, ",")',
      ].join('\n');
      expect(run(source)).toEqual(['one,two,three']);
    });
  });

  describe('string bytes', () => {
    it('should count UTF-8 bytes', () => {
      expect(run('return #"ä", string.len("жж"), rawlen("ж")')).toEqual([2, 4, 2]);
    });

    it('should match byte classes against non-ASCII text', () => {
      expect(run('return ("ж"):find("[\\128-\\255]")')).toEqual([1, 1]);
      expect(run('return select(2, ("añb"):gsub("[^\\128-\\191]", ""))')).toEqual([3]);
    });

    it('should read and build bytes', () => {
      expect(run('return string.byte("ä", 1, -1)')).toEqual([195, 164]);
      expect(run('return string.char(195, 164), string.char(65)')).toEqual(['ä', 'A']);
      expect(() => run('return string.char(256)')).toThrow('value out of range');
    });

    it('should join halves of a character again', () => {
      expect(run('return ("ä"):sub(1, 1) .. ("ä"):sub(2, 2)')).toEqual(['ä']);
      expect(run('return string.reverse(string.reverse("añ")), table.concat({ "\\195", "\\164" })')).toEqual([
        'añ',
        'ä',
      ]);
    });
  });

  describe('table', () => {
    it('should insert, remove and concat', () => {
      const source = [
        'local t = { "a", "c" }',
        'table.insert(t, 2, "b")',
        'local r = table.remove(t)',
        'return table.concat(t), r, #t',
      ].join('\n');
      expect(run(source)).toEqual(['ab', 'c', 2]);
    });

    it('should sort with a comparator', () => {
      const source = 'local t = { 3, 1, 2 }\ntable.sort(t, function(a, b) return a > b end)\nreturn table.concat(t, " ")';
      expect(run(source)).toEqual(['3 2 1']);
    });
  });

  describe('os and math', () => {
    it('should use a fixed clock', () => {
      const source = 'return os.time(), os.date("%Y-%m-%d"), os.time({ year = 2000, month = 1, day = 2, hour = 0 })';
      expect(run(source)).toEqual([FIXED_TIME, '2000-01-01', 946771200]);
    });

    it('should make math.random deterministic', () => {
      const source = [
        'math.randomseed(42)',
        'local a = math.random(1, 100)',
        'math.randomseed(42)',
        'return a == math.random(1, 100)',
      ].join('\n');
      expect(run(source)).toEqual([true]);
      expect(run('return math.random()')).toEqual(run('return math.random()'));
    });

    it('should compute integer and float helpers', () => {
      expect(run('return math.floor(2.7), math.max(1, 5, 3), math.min(4, -1), math.abs(-2)')).toEqual([2, 5, -1, 2]);
    });
  });
});
