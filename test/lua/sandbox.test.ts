/**
 * Tests for module invocation and the mw library
 */

import { describe, it, expect } from 'vitest';
import { Sandbox, type FrameHost, type PageHost, type SandboxOptions } from '../../src/lua/index.js';
import { MemoryPageStore, Resolver } from '../../src/store/index.js';

const page: PageHost = {
  title: 'kissa',
  unstrip: text => text,
  killMarkers: text => text,
};

/** Frame whose host calls echo what they were given */
function stubFrame(args: Record<string, string> = {}, parent: FrameHost | null = null): FrameHost {
  const host: FrameHost = {
    title: 'Module:m',
    parent,
    page,
    getArg: name => args[name],
    argNames: () => Object.keys(args),
    expandTemplate: (title, values) => `{{${[title, ...[...values].map(([k, v]) => `${k}=${v}`)].join('|')}}}`,
    preprocess: text => `PRE:${text}`,
    callParserFunction: (name, values) => `${name}:${values.join('|')}`,
    newChild: (title, values) => ({ ...stubFrame(Object.fromEntries(values), host), title }),
  };
  return host;
}

/** Module source whose `main` runs `body` */
function mainModule(body: string): string {
  return `local p = {}\nfunction p.main(frame)\n${body}\nend\nreturn p`;
}

function sandboxFor(modules: Record<string, string>, options: SandboxOptions = {}, pages: Record<string, string> = {}): Sandbox {
  return new Sandbox(new Resolver(MemoryPageStore.fromRecords({ modules, pages })), options);
}

function invoke(body: string, frame: FrameHost = stubFrame()): string {
  const result = sandboxFor({ m: mainModule(body) }).invoke('m', 'main', frame);
  if (!result.ok) throw new Error(`${result.error.kind}: ${result.error.message}`);
  return result.text;
}

describe('Sandbox', () => {
  describe('frames', () => {
    it('should read positional and named arguments', () => {
      expect(invoke('return frame.args[1] .. frame.args.x', stubFrame({ '1': 'a', x: 'b' }))).toBe('ab');
    });

    it('should read the parent frame', () => {
      const parent = stubFrame({ type: 'A' });
      expect(invoke('return frame:getParent().args.type', stubFrame({}, parent))).toBe('A');
    });

    it('should iterate arguments in call order', () => {
      const body = [
        'local t = {}',
        'for k, v in pairs(frame.args) do t[#t + 1] = k .. "=" .. v end',
        'return table.concat(t, ";")',
      ].join('\n');
      expect(invoke(body, stubFrame({ '1': 'a', x: 'b' }))).toBe('1=a;x=b');
    });

    it('should refuse writes to frame.args', () => {
      const result = sandboxFor({ m: mainModule('frame.args.x = "y"') }).invoke('m', 'main', stubFrame());
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toContain('frame.args is read-only');
    });

    it('should delegate template and parser function calls to the host', () => {
      const body = [
        'return frame:expandTemplate({ title = "t", args = { "a", k = "v" } })',
        '  .. "/" .. frame:preprocess("{{x}}")',
        '  .. "/" .. frame:callParserFunction("#if", "yes", "1", "2")',
      ].join('\n');
      expect(invoke(body)).toBe('{{t|1=a|k=v}}/PRE:{{x}}/#if:yes|1|2');
    });

    it('should expose the current frame and page title', () => {
      expect(invoke('return mw.getCurrentFrame():getTitle() .. "|" .. mw.title.getCurrentTitle().text')).toBe(
        'Module:m|kissa'
      );
    });
  });

  describe('modules', () => {
    it('should load other modules with require and mw.loadData', () => {
      const sandbox = sandboxFor({
        m: mainModule('return require("Module:util").greet() .. mw.loadData("Module:data").suffix'),
        util: 'local u = {}\nfunction u.greet() return "hi" end\nreturn u',
        data: 'return { suffix = "!" }',
      });
      expect(sandbox.invoke('m', 'main', stubFrame())).toEqual({ ok: true, text: 'hi!' });
    });

    it('should run each invocation with fresh globals', () => {
      const sandbox = sandboxFor({ m: mainModule('counter = (counter or 0) + 1\nreturn counter') });
      expect(sandbox.invoke('m', 'main', stubFrame())).toEqual({ ok: true, text: '1' });
      expect(sandbox.invoke('m', 'main', stubFrame())).toEqual({ ok: true, text: '1' });
      expect(sandbox.cacheStats()).toMatchObject({ size: 1, hits: 1, misses: 1 });
    });

    it('should report a missing function as a fault', () => {
      expect(sandboxFor({ m: mainModule('return 1') }).invoke('m', 'nope', stubFrame())).toEqual({
        ok: false,
        error: { kind: 'fault', message: "function 'nope' does not exist in module 'm'" },
      });
    });

    it('should report a missing module as a fault', () => {
      expect(sandboxFor({}).invoke('absent', 'main', stubFrame())).toEqual({
        ok: false,
        error: { kind: 'fault', message: "module 'absent' not found" },
      });
    });

    it('should report Lua errors with their position', () => {
      expect(sandboxFor({ m: mainModule('error("bad input")') }).invoke('m', 'main', stubFrame())).toEqual({
        ok: false,
        error: { kind: 'fault', message: 'Module:m:3: bad input' },
      });
    });

    it('should report a require loop', () => {
      const sandbox = sandboxFor({
        m: mainModule('return require("a")'),
        a: 'return require("b")',
        b: 'return require("a")',
      });
      const result = sandbox.invoke('m', 'main', stubFrame());
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toContain("loop or previous error loading module 'a'");
    });
  });

  describe('budget', () => {
    it('should time out an infinite loop', () => {
      const sandbox = sandboxFor({ m: mainModule('while true do end') }, { maxSteps: 10_000 });
      expect(sandbox.invoke('m', 'main', stubFrame())).toEqual({
        ok: false,
        error: { kind: 'timeout', message: 'step budget of 10000 exceeded' },
      });
    });

    it('should fault on runaway recursion', () => {
      const sandbox = sandboxFor({ m: mainModule('local function f() return f() end\nreturn f()') }, { maxCallDepth: 20 });
      const result = sandbox.invoke('m', 'main', stubFrame());
      expect(result).toMatchObject({ ok: false, error: { kind: 'fault' } });
      if (!result.ok) expect(result.error.message).toContain('stack overflow');
    });
  });
});

describe('mw', () => {
  it('should trim and split text', () => {
    expect(invoke('return mw.text.trim("  x  ") .. "|" .. table.concat(mw.text.split("a,b,,c", ","), "/")')).toBe(
      'x|a/b//c'
    );
  });

  it('should count code points in mw.ustring', () => {
    expect(invoke('return mw.ustring.len("héllo") .. mw.ustring.upper("äö") .. mw.ustring.sub("héllo", 2, 3)')).toBe(
      '5ÄÖél'
    );
  });

  it('should escape markup with mw.text.nowiki', () => {
    expect(invoke('return mw.text.nowiki("[[x]]")')).toBe('&#91;&#91;x&#93;&#93;');
  });

  it('should encode JSON', () => {
    expect(invoke('return mw.text.jsonEncode({ 1, 2 }) .. mw.text.jsonEncode({ a = "b" })')).toBe('[1,2]{"a":"b"}');
  });

  it('should build HTML', () => {
    const body = [
      'local root = mw.html.create("table"):addClass("inflection")',
      'root:tag("tr"):tag("td"):css("color", "red"):wikitext("-it")',
      'return tostring(root)',
    ].join('\n');
    expect(invoke(body)).toBe('<table class="inflection"><tr><td style="color:red">-it</td></tr></table>');
  });

  it('should build titles and check existence', () => {
    const sandbox = sandboxFor(
      {
        m: mainModule(
          'local t = mw.title.new("Template:foo")\nreturn t.nsText .. "|" .. t.text .. "|" .. tostring(t.exists) .. "|" .. tostring(mw.title.new("nope").exists)'
        ),
      },
      {},
      { 'Template:foo': 'x' }
    );
    expect(sandbox.invoke('m', 'main', stubFrame())).toEqual({ ok: true, text: 'Template|foo|true|false' });
  });

  it('should format numbers by language', () => {
    expect(invoke('return mw.language.getContentLanguage():formatNum(1234567.5)')).toBe('1,234,567.5');
  });
});
