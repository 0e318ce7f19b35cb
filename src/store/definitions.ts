/**
 * Building template and module definitions from page text
 *
 * @module store/definitions
 */

import { z } from 'zod';
import type { ModuleDefinition, TemplateDefinition } from './types.js';

const REDIRECT_PATTERN = /^\s*#redirect\s*:?\s*\[\[\s*([^\]|#]+)/i;

const TEMPLATEDATA_PATTERN = /<templatedata(?:\s[^>]*)?>([\s\S]*?)<\/templatedata\s*>/i;

/**
 * The part of a `<templatedata>` block that carries defaults. Everything else
 * in the block is accepted and ignored.
 */
const TemplateDataSchema = z
  .object({
    params: z
      .record(
        z
          .object({
            default: z.union([z.string(), z.number()]).optional(),
            autovalue: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

/**
 * Target title of a `#REDIRECT [[...]]` page, or undefined
 */
export function redirectTarget(text: string): string | undefined {
  const match = REDIRECT_PATTERN.exec(text);
  return match?.[1]?.trim();
}

/**
 * Parameter defaults declared in a template's `<templatedata>` block.
 * Malformed blocks declare nothing.
 */
export function templateDataDefaults(body: string): Record<string, string> {
  const block = TEMPLATEDATA_PATTERN.exec(body)?.[1];
  if (!block) return {};

  let json: unknown;
  try {
    json = JSON.parse(block);
  } catch {
    return {};
  }

  const parsed = TemplateDataSchema.safeParse(json);
  if (!parsed.success || !parsed.data.params) return {};

  const defaults: Record<string, string> = {};
  for (const [name, param] of Object.entries(parsed.data.params)) {
    const value = param.default ?? param.autovalue;
    if (value !== undefined) defaults[name] = String(value);
  }
  return defaults;
}

export function buildTemplateDefinition(name: string, body: string): TemplateDefinition {
  return { name, body, defaults: templateDataDefaults(body) };
}

/**
 * Names of the functions a module exports, in source order
 *
 * The export table is the variable in the module's final `return`
 * statement; functions are found as `function p.name(`, `function p:name(`
 * and `p.name = function`.
 */
export function discoverExports(source: string): string[] {
  const table = /\breturn\s+([A-Za-z_]\w*)\s*;?\s*$/.exec(source.replace(/--[^\n]*$/gm, '').trimEnd())?.[1];
  if (!table) return [];

  const found = new Map<string, number>();
  const patterns = [
    new RegExp(`\\bfunction\\s+${table}\\s*[.:]\\s*([A-Za-z_]\\w*)\\s*\\(`, 'g'),
    new RegExp(`(?:^|[^.\\w])${table}\\s*\\.\\s*([A-Za-z_]\\w*)\\s*=\\s*function\\b`, 'g'),
    new RegExp(`(?:^|[^.\\w])${table}\\s*\\[\\s*["']([^"']+)["']\\s*\\]\\s*=\\s*function\\b`, 'g'),
  ];
  for (const pattern of patterns) {
    for (const match of source.matchAll(pattern)) {
      const name = match[1];
      if (name !== undefined && !found.has(name)) found.set(name, match.index ?? 0);
    }
  }
  return [...found.entries()].sort((a, b) => a[1] - b[1]).map(([name]) => name);
}

export function buildModuleDefinition(name: string, source: string): ModuleDefinition {
  return { name, source, exports: discoverExports(source) };
}
