/**
 * Lexical entry record types
 *
 * This is the single source of truth for the records the pipeline emits.
 */

/**
 * A usage example under a sense
 */
export interface Example {
  text: string;
  /** Text after the ` ― ` separator */
  translation?: string | undefined;
}

export interface Sense {
  gloss: string;
  examples: Example[];
  /** Usage labels from a leading qualifier, e.g. `archaic` */
  tags: string[];
  subsenses?: Sense[] | undefined;
}

/**
 * An inflected or alternative form of the headword
 */
export interface Form {
  /** Surface string */
  form: string;
  /** Grammatical category to value, e.g. `{ case: 'genitive' }` */
  tags: Record<string, string>;
  /** Template, module or headword line that produced the form */
  source: string;
}

/**
 * A related word from a linkage section, e.g. a synonym
 */
export interface Linkage {
  relation: string;
  word: string;
}

export interface Translation {
  /** Language name as written in the translation line */
  lang: string;
  /** Language code, when the name is configured */
  code?: string | undefined;
  word: string;
  /** Gloss of the translation table the line is in */
  sense?: string | undefined;
}

export interface Sound {
  ipa: string;
  /** Accent or dialect qualifiers, e.g. `Received Pronunciation` */
  tags?: string[] | undefined;
}

/**
 * A section the extractor has no rule for
 */
export interface ExtraSection {
  heading: string;
  text: string;
}

/**
 * One part of speech of one word in one language
 */
export interface LexicalEntry {
  headword: string;
  /** Language section heading, e.g. `Finnish` */
  language: string;
  /** Configured code of the language, or `unknown` */
  langCode: string;
  /** POS heading without trailing numbers, e.g. `Verb` */
  pos: string;
  /** Configured tag of the POS heading, e.g. `verb` */
  posTag: string;
  senses: Sense[];
  forms: Form[];
  /** Link targets from linkage and see-also sections */
  crossRefs: string[];
  linkages: Linkage[];
  translations: Translation[];
  sounds: Sound[];
  etymology?: string | undefined;
  categories: string[];
  extra: ExtraSection[];
}

/**
 * Why a record was rejected
 */
export interface ValidationIssue {
  /** Location in the record, e.g. `senses[0].gloss` */
  path: string;
  reason: string;
}

export type ValidationResult =
  | { ok: true; entry: Readonly<LexicalEntry> }
  | { ok: false; errors: ValidationIssue[] };
