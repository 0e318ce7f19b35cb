/**
 * Configuration Schema Validation
 *
 * Zod schemas for the CLI configuration file and for the extraction rules.
 * Provides runtime type safety and helpful error messages for misconfiguration.
 */

import { z } from 'zod';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_EXPANSIONS,
  DEFAULT_MAX_STEPS,
  DEFAULT_SANDBOX_TIMEOUT_MS,
  DEFAULT_SCHEMA_VERSION,
} from './constants.js';

/**
 * CLI Configuration Schema
 *
 * Validates configuration from .wiktextractrc files.
 */
export const CliConfigSchema = z.object({
  /** Path of an extraction config file replacing the bundled one */
  configPath: z.string().optional(),

  /** Number of concurrent lanes */
  concurrency: z.number().int().positive().optional(),

  /** Only extract these language sections (names as in headings) */
  languages: z.array(z.string()).optional(),

  /** Output file for JSON lines (stdout when absent) */
  output: z.string().optional(),
});

/** Type inferred from CliConfigSchema */
export type CliConfig = z.infer<typeof CliConfigSchema>;

// ============================================================================
// Extraction rules
// ============================================================================

/** Grammatical category to value, e.g. `{ number: 'plural' }` */
const TagMapSchema = z.record(z.string(), z.string());

/** Label or header text to the tags it stands for */
const LabelMapSchema = z.record(z.string(), TagMapSchema);

/**
 * How a non-POS section heading is read
 */
export const SectionRuleSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('etymology') }),
  z.object({ type: z.literal('pronunciation') }),
  z.object({ type: z.literal('translations') }),
  z.object({ type: z.literal('inflection') }),
  z.object({ type: z.literal('see-also') }),
  z.object({ type: z.literal('ignore') }),
  z.object({ type: z.literal('linkage'), relation: z.string().min(1) }),
]);

export type SectionRule = z.infer<typeof SectionRuleSchema>;

/**
 * Templates whose output is an inflection table or label lines
 */
export const InflectionTemplateRuleSchema = z
  .object({
    /** Template or module name, matched after normalization */
    name: z.string().min(1).optional(),
    /** Regular expression matched against the name */
    pattern: z.string().min(1).optional(),
    /** Table header text to tags, merged over the shared `headers` */
    headers: LabelMapSchema.optional(),
    /** `label: value` labels to tags, merged over the shared `labels` */
    labels: LabelMapSchema.optional(),
  })
  .refine(rule => rule.name !== undefined || rule.pattern !== undefined, {
    message: 'an inflection template rule needs a name or a pattern',
  })
  .refine(rule => rule.pattern === undefined || isValidPattern(rule.pattern), {
    message: 'pattern is not a valid regular expression',
    path: ['pattern'],
  });

export type InflectionTemplateRule = z.infer<typeof InflectionTemplateRuleSchema>;

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch (error) {
    if (error instanceof SyntaxError) return false;
    throw error;
  }
}

/**
 * Rules shared by all languages; a language's own rules are merged over them
 */
export const RulesSchema = z.object({
  /** POS heading to POS tag, e.g. `Verb` to `verb` */
  posHeadings: z.record(z.string(), z.string()).default({}),
  /** Other headings the extractor understands */
  sections: z.record(z.string(), SectionRuleSchema).default({}),
  inflectionTemplates: z.array(InflectionTemplateRuleSchema).default([]),
  /** Labels of `label: value` lines and headword-line parentheses */
  labels: LabelMapSchema.default({}),
  /** Inflection table header text */
  headers: LabelMapSchema.default({}),
});

export type Rules = z.infer<typeof RulesSchema>;

export const LanguageRulesSchema = RulesSchema.partial().extend({
  /** Language name as written in level-2 headings */
  name: z.string().min(1),
  code: z.string().min(1),
  /** Other heading names for the same language */
  aliases: z.array(z.string()).default([]),
});

export type LanguageRules = z.infer<typeof LanguageRulesSchema>;

export const LimitsSchema = z.object({
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  maxExpansions: z.number().int().positive().default(DEFAULT_MAX_EXPANSIONS),
  maxSteps: z.number().int().positive().default(DEFAULT_MAX_STEPS),
  timeoutMs: z.number().int().positive().default(DEFAULT_SANDBOX_TIMEOUT_MS),
  maxNesting: z.number().int().positive().default(40),
});

/**
 * Extraction Configuration Schema
 *
 * The bundled default lives in `config/default-config.json`.
 */
export const ExtractionConfigSchema = z.object({
  /** Version of the record contract entries are validated against */
  schemaVersion: z.string().default(DEFAULT_SCHEMA_VERSION),
  limits: LimitsSchema.default({}),
  leniency: z.enum(['tolerant', 'strict']).default('tolerant'),
  /** Uppercase the first letter of template and module names */
  capitalize: z.boolean().default(false),
  concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  defaults: RulesSchema.default({}),
  languages: z.array(LanguageRulesSchema).default([]),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

/** Config as written in a file, before defaults apply */
export type ExtractionConfigInput = z.input<typeof ExtractionConfigSchema>;

/**
 * Validate CLI configuration
 *
 * @param config - Raw configuration object to validate
 * @returns Validated configuration
 * @throws {z.ZodError} If validation fails
 */
export function validateCliConfig(config: unknown): CliConfig {
  return CliConfigSchema.parse(config);
}

/**
 * Safely validate CLI configuration without throwing
 *
 * @param config - Raw configuration object to validate
 * @returns Validation result with success flag and either data or error
 */
export function safeValidateCliConfig(config: unknown): z.SafeParseReturnType<unknown, CliConfig> {
  return CliConfigSchema.safeParse(config);
}

/**
 * Safely validate extraction configuration without throwing
 */
export function safeValidateExtractionConfig(
  config: unknown
): z.SafeParseReturnType<unknown, ExtractionConfig> {
  return ExtractionConfigSchema.safeParse(config);
}

/**
 * Format Zod validation errors for user display
 *
 * @param error - Zod error object
 * @returns Formatted error message string
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
