/**
 * Tests for Logger utility
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  Logger,
  createLogger,
  getLoggerProvider,
  setLoggerProvider,
  resetLoggerProvider,
  withPageContext,
  getPageContext,
  type LogEntry,
  type LogLevel,
  type LoggerProvider,
} from '../../src/lib/logger.js';

/** Logger writing JSON lines into an array */
function capture(level: LogLevel = 'debug'): { log: Logger; lines: string[]; entries: () => LogEntry[] } {
  const lines: string[] = [];
  const log = new Logger({
    context: 'test',
    level,
    format: 'json',
    sink: line => {
      lines.push(line);
    },
  });
  return { log, lines, entries: () => lines.map(line => JSON.parse(line) as LogEntry) };
}

describe('Logger', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should create logger with custom context and level', () => {
      const log = new Logger({ context: 'expand', level: 'warn' });
      expect(log.getConfig().context).toBe('expand');
      expect(log.getConfig().level).toBe('warn');
    });

    it('should respect LOG_LEVEL environment variable', () => {
      process.env['LOG_LEVEL'] = 'error';
      expect(new Logger().getConfig().level).toBe('error');
    });

    it('should respect LOG_FORMAT environment variable', () => {
      process.env['LOG_FORMAT'] = 'json';
      expect(new Logger().getConfig().format).toBe('json');
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      process.env['LOG_LEVEL'] = 'verbose';
      process.env['NODE_ENV'] = 'test';
      expect(new Logger().getConfig().level).toBe('info');
    });
  });

  describe('log levels', () => {
    it('should drop messages below the minimum level', () => {
      const { log, entries } = capture('warn');
      log.debug('quiet');
      log.info('quiet');
      log.warn('loud');
      log.error('louder');
      expect(entries().map(entry => entry.level)).toEqual(['warn', 'error']);
    });

    it('should report enabled levels', () => {
      const { log } = capture('info');
      expect(log.isLevelEnabled('debug')).toBe(false);
      expect(log.isLevelEnabled('error')).toBe(true);
    });

    it('should write to stderr without a sink', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      new Logger({ context: 'test', level: 'info', format: 'json' }).info('hello');
      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  describe('log output', () => {
    it('should include context, message, data and operation', () => {
      const { log, entries } = capture();
      log.info('Loaded', { pages: 3 }, 'load');
      const [entry] = entries();
      expect(entry).toMatchObject({
        level: 'info',
        context: 'test',
        message: 'Loaded',
        data: { pages: 3 },
        operation: 'load',
        service: 'wiktextract',
      });
      expect(typeof entry?.timestamp).toBe('string');
    });

    it('should turn Error objects in data into message and stack', () => {
      const { log, entries } = capture();
      const error = new Error('boom');
      log.error('Failed', { error });
      const [entry] = entries();
      expect(entry?.data).toEqual({ error: 'boom' });
      expect(entry?.stack).toBe(error.stack);
    });

    it('should output human-readable text format', () => {
      const lines: string[] = [];
      const log = new Logger({
        context: 'test',
        level: 'info',
        format: 'text',
        timestamps: false,
        sink: line => {
          lines.push(line);
        },
      });
      log.info('Hello', { n: 1 });
      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain('[test]');
      expect(lines[0]).toContain('Hello');
      expect(lines[0]).toContain('n=1');
    });
  });

  describe('page context', () => {
    it('should tag entries with the page and lane', () => {
      const { log, entries } = capture();
      withPageContext({ page: 'sortaa', worker: 2 }, () => log.info('inside'));
      log.info('outside');
      const [inside, outside] = entries();
      expect(inside?.page).toBe('sortaa');
      expect(inside?.worker).toBe(2);
      expect(outside?.page).toBeUndefined();
    });

    it('should merge context fields into data', () => {
      const { log, entries } = capture();
      withPageContext({ page: 'kissa', fields: { lang: 'fi' } }, () => log.info('x', { y: 1 }));
      expect(entries()[0]?.data).toEqual({ lang: 'fi', y: 1 });
    });

    it('should expose the active context', () => {
      expect(getPageContext()).toBeUndefined();
      const title = withPageContext({ page: 'talo' }, () => getPageContext()?.page);
      expect(title).toBe('talo');
    });
  });

  describe('derived loggers', () => {
    it('should create child logger with extended context', () => {
      const { log } = capture();
      expect(log.child('lua').getConfig().context).toBe('test:lua');
    });

    it('should add default fields', () => {
      const { log, entries } = capture();
      log.withFields({ lane: 1 }).info('x');
      expect(entries()[0]?.data).toEqual({ lane: 1 });
    });

    it('should log errorWithStack with the error name', () => {
      const { log, entries } = capture();
      log.errorWithStack('Crashed', new TypeError('bad'), { page: 1 });
      expect(entries()[0]?.data).toEqual({ page: 1, error: 'bad', errorName: 'TypeError' });
    });
  });
});

describe('Dependency Injection', () => {
  afterEach(() => {
    resetLoggerProvider();
  });

  it('should allow a custom logger provider', () => {
    const custom = new Logger({ context: 'custom' });
    const provider: LoggerProvider = {
      createLogger: () => custom,
    };
    const previous = setLoggerProvider(provider);
    expect(createLogger('anything')).toBe(custom);
    expect(getLoggerProvider()).toBe(provider);
    setLoggerProvider(previous);
  });

  it('should cache loggers per context in the default provider', () => {
    expect(createLogger('cached')).toBe(createLogger('cached'));
    expect(createLogger('cached').getConfig().context).toBe('cached');
  });
});
