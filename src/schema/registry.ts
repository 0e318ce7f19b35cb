/**
 * Versioned record contracts
 *
 * Each version is a zod schema for LexicalEntry. Schemas are strict:
 * a record with a field the contract does not declare is rejected rather
 * than stripped.
 */

import { z } from 'zod';
import type { Example, ExtraSection, Form, LexicalEntry, Linkage, Sense, Sound, Translation } from './types.js';

const text = z.string().min(1, 'must not be empty');

const ExampleSchema: z.ZodType<Example> = z
  .object({
    text,
    translation: text.optional(),
  })
  .strict();

const SenseSchema: z.ZodType<Sense> = z.lazy(() =>
  z
    .object({
      gloss: text,
      examples: z.array(ExampleSchema),
      tags: z.array(text),
      subsenses: z.array(SenseSchema).optional(),
    })
    .strict()
);

const FormSchema: z.ZodType<Form> = z
  .object({
    form: text,
    tags: z.record(z.string(), z.string()),
    source: text,
  })
  .strict();

const LinkageSchema: z.ZodType<Linkage> = z.object({ relation: text, word: text }).strict();

const TranslationSchema: z.ZodType<Translation> = z
  .object({
    lang: text,
    code: text.optional(),
    word: text,
    sense: text.optional(),
  })
  .strict();

const SoundSchema: z.ZodType<Sound> = z
  .object({
    ipa: text,
    tags: z.array(text).optional(),
  })
  .strict();

const ExtraSchema: z.ZodType<ExtraSection> = z.object({ heading: text, text: z.string() }).strict();

/**
 * Version 1 of the contract
 */
export const LexicalEntrySchemaV1: z.ZodType<LexicalEntry> = z
  .object({
    headword: text,
    language: text,
    langCode: text,
    pos: text,
    posTag: text,
    senses: z.array(SenseSchema),
    forms: z.array(FormSchema),
    crossRefs: z.array(text),
    linkages: z.array(LinkageSchema),
    translations: z.array(TranslationSchema),
    sounds: z.array(SoundSchema),
    etymology: text.optional(),
    categories: z.array(text),
    extra: z.array(ExtraSchema),
  })
  .strict()
  .refine(entry => entry.senses.length > 0 || entry.forms.length > 0, {
    message: 'an entry needs at least one sense or form',
    path: ['senses'],
  });

/**
 * Contracts by version
 */
export const SCHEMA_VERSIONS: ReadonlyMap<string, z.ZodType<LexicalEntry>> = new Map([['1', LexicalEntrySchemaV1]]);

export function schemaFor(version: string): z.ZodType<LexicalEntry> | undefined {
  return SCHEMA_VERSIONS.get(version);
}
