/**
 * CLI Utilities
 *
 * Shared utilities for the wiktextract CLI commands.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { createLogger } from '../lib/logger.js';
import { ConfigError, getExitCodeForError } from '../lib/errors.js';
import {
  type CliConfig,
  safeValidateCliConfig,
  formatValidationError,
} from '../lib/config-schema.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('cli');

/** Name of the CLI configuration file */
export const CONFIG_FILE = '.wiktextractrc';

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/** Color output helpers */
export const color = {
  bold: (s: string) => paint(colors.bold, s),
  green: (s: string) => paint(colors.green, s),
  yellow: (s: string) => paint(colors.yellow, s),
  cyan: (s: string) => paint(colors.cyan, s),
  gray: (s: string) => paint(colors.gray, s),
  error: (s: string) => paint(`${colors.red}${colors.bold}`, s),
  warning: (s: string) => paint(`${colors.yellow}${colors.bold}`, s),
};

function paint(code: string, s: string): string {
  return supportsColor() ? `${code}${s}${colors.reset}` : s;
}

/** Check if color output is supported on stderr, where the CLI reports */
export function supportsColor(): boolean {
  if (process.env['NO_COLOR'] || process.env['FORCE_COLOR'] === '0') {
    return false;
  }
  if (process.env['FORCE_COLOR']) {
    return true;
  }
  return process.stderr.isTTY ?? false;
}

/**
 * Format duration as human-readable string
 */
export function formatDuration(seconds: number): string {
  if (!isFinite(seconds) || seconds < 0) return '--:--';
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const m = Math.floor(seconds / 60);
    const s = Math.round(seconds % 60);
    return `${m}m ${s}s`;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

// Re-export CliConfig type from schema
export type { CliConfig } from '../lib/config-schema.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load configuration from .wiktextractrc or environment
 *
 * Configuration is loaded from (in order of precedence):
 * 1. Environment variables (highest priority)
 * 2. .wiktextractrc in current directory
 * 3. .wiktextractrc in home directory (lowest priority)
 *
 * @param directories - Where to look for the file, first match wins
 * @throws {ConfigError} If a file is not valid JSON or validation fails
 */
export async function loadConfig(
  directories: string[] = [process.cwd(), homedir()],
  env: NodeJS.ProcessEnv = process.env
): Promise<CliConfig> {
  const config: Record<string, unknown> = {};

  for (const directory of directories) {
    const configPath = join(directory, CONFIG_FILE);
    let data: string;
    try {
      data = await readFile(configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) continue;
      throw error;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new ConfigError(`${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`${configPath} must hold a JSON object`);
    }
    Object.assign(config, parsed);
    getLog().debug('Loaded CLI config', { path: configPath });
    break;
  }

  // Override with environment variables
  const envConfigPath = env['WIKTEXTRACT_CONFIG'];
  if (envConfigPath) {
    config['configPath'] = envConfigPath;
  }
  const envConcurrency = env['WIKTEXTRACT_CONCURRENCY'];
  if (envConcurrency) {
    config['concurrency'] = parseInt(envConcurrency, 10);
  }
  const envLanguages = env['WIKTEXTRACT_LANGUAGES'];
  if (envLanguages) {
    config['languages'] = parseList(envLanguages);
  }

  // Validate configuration with Zod
  const result = safeValidateCliConfig(config);
  if (!result.success) {
    const errorMessage = formatValidationError(result.error);
    throw new ConfigError(`Invalid configuration:\n${errorMessage}`);
  }

  return result.data;
}

/**
 * Print error message and exit with the code for `error`
 */
export function fatal(message: string, error?: unknown): never {
  getLog().error(message, undefined, 'fatal');
  console.error(`\n${color.error('Error:')} ${message}\n`);
  process.exit(error === undefined ? 1 : getExitCodeForError(error));
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  getLog().warn(message);
  console.error(`${color.warning('Warning:')} ${message}`);
}

/**
 * Parse comma-separated list
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse a positive integer option
 */
export function parseCount(value: string, name: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return n;
}

/**
 * Resolve path relative to cwd or absolute
 */
export function resolvePath(p: string): string {
  if (p.startsWith('/') || p.startsWith('~')) {
    return p.replace('~', homedir());
  }
  return join(process.cwd(), p);
}
