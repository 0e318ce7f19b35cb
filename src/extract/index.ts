/**
 * Structured field extraction
 *
 * @module extract
 */

export { extractEntries, inflectionForms } from './extractor.js';
export type { ExtractOptions } from './extractor.js';
export { RuleBook, UNKNOWN_LANGUAGE, UNKNOWN_POS } from './rules.js';
export type { InflectionMatcher, LanguageInfo, LanguageRuleSet, TagMap } from './rules.js';
export { baseHeading, languageSections, splitSections } from './sections.js';
export type { LanguageSection, Section } from './sections.js';
export { extractSenses, parseExample, splitQualifier } from './senses.js';
export { dedupeForms, headwordForms, labelLineForms, tableForms, tableGrid, HEADWORD_SOURCE } from './forms.js';
export { categories, crossReferences, linkTarget, linkages, sounds, translations } from './relations.js';
