/**
 * Schema gate for emitted records
 */

import type { z } from 'zod';
import { schemaFor } from './registry.js';
import type { LexicalEntry, ValidationIssue, ValidationResult } from './types.js';
import { DEFAULT_SCHEMA_VERSION } from '../lib/constants.js';
import { ConfigError } from '../lib/errors.js';

/**
 * Render a zod issue path, e.g. `['senses', 0, 'gloss']` as `senses[0].gloss`
 */
export function formatPath(path: readonly (string | number)[]): string {
  let out = '';
  for (const part of path) {
    if (typeof part === 'number') out += `[${part}]`;
    else out += out === '' ? part : `.${part}`;
  }
  return out;
}

function issues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({ path: formatPath(issue.path), reason: issue.message }));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Check a record against a version of the contract
 *
 * An accepted entry is returned frozen; a rejected one is reported with
 * the path of every problem and never repaired.
 *
 * @throws {ConfigError} If no contract has that version
 *
 * @example
 * const result = validate({ headword: 'sortaa', language: 'Finnish', ... });
 * if (!result.ok) console.error(result.errors[0]?.path);
 */
export function validate(record: unknown, version: string = DEFAULT_SCHEMA_VERSION): ValidationResult {
  const schema = schemaFor(version);
  if (!schema) throw new ConfigError(`Unknown schema version: ${version}`);
  const result = schema.safeParse(record);
  if (!result.success) return { ok: false, errors: issues(result.error) };
  const entry: LexicalEntry = result.data;
  return { ok: true, entry: deepFreeze(entry) };
}
