/**
 * Extraction configuration loading
 *
 * The bundled rules live in `config/default-config.json` at the package
 * root; a caller may replace them with a file of the same shape.
 */

import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import {
  ExtractionConfigSchema,
  formatValidationError,
  type ExtractionConfig,
} from './config-schema.js';
import { ConfigError } from './errors.js';

/** Path of the bundled extraction config */
export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/default-config.json', import.meta.url));

/**
 * Validate a raw config object, applying defaults
 *
 * @throws {ConfigError} If validation fails
 */
export function parseExtractionConfig(raw: unknown, source = 'extraction config'): ExtractionConfig {
  const result = ExtractionConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}:\n${formatValidationError(result.error)}`);
  }
  return result.data;
}

function parseJson(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) throw new ConfigError(`${path} is not valid JSON: ${error.message}`);
    throw error;
  }
}

/**
 * Load and validate an extraction config file
 *
 * @param path - Config file; the bundled config when omitted
 * @throws {ConfigError} If the file cannot be read or fails validation
 */
export async function loadExtractionConfig(path: string = DEFAULT_CONFIG_PATH): Promise<ExtractionConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseExtractionConfig(parseJson(text, path), path);
}

let bundled: ExtractionConfig | undefined;

/**
 * The bundled config, read once
 */
export function defaultExtractionConfig(): ExtractionConfig {
  if (!bundled) {
    bundled = parseExtractionConfig(parseJson(readFileSync(DEFAULT_CONFIG_PATH, 'utf-8'), DEFAULT_CONFIG_PATH), DEFAULT_CONFIG_PATH);
  }
  return bundled;
}
