/**
 * Structured field extractor
 *
 * Walks an expanded tree language section by language section and builds
 * one LexicalEntry record per part-of-speech section. Records are returned
 * unvalidated; the pipeline gates them through the schema.
 */

import { dedupeForms, headwordForms, HEADWORD_SOURCE, labelLineForms, tableForms } from './forms.js';
import { categories, crossReferences, linkages, sounds, translations } from './relations.js';
import { UNKNOWN_POS, type LanguageRuleSet, type RuleBook } from './rules.js';
import { baseHeading, languageSections, splitSections, type LanguageSection, type Section } from './sections.js';
import { extractSenses } from './senses.js';
import type { DiagnosticSink } from '../lib/diagnostics.js';
import type { ExtraSection, Form, LexicalEntry, Linkage, Sense, Sound, Translation } from '../schema/index.js';
import { cleanText, toText, walk, type RootNode, type WikiNode } from '../wikitext/index.js';

export interface ExtractOptions {
  /** Page title, used as the headword */
  title: string;
  rules: RuleBook;
  diagnostics: DiagnosticSink;
  /** Only these language headings; all when absent */
  languages?: ReadonlySet<string> | undefined;
}

/** Fields a section can add to an entry, or to every entry of a scope */
interface Collected {
  forms: Form[];
  crossRefs: string[];
  linkages: Linkage[];
  translations: Translation[];
  extra: ExtraSection[];
}

interface Draft extends Collected {
  pos: string;
  posTag: string;
  senses: Sense[];
}

/** Entries sharing an etymology (or the whole language when it has none) */
interface Scope {
  etymology?: string | undefined;
  sounds: Sound[];
  shared: Collected;
  drafts: Draft[];
}

function collected(): Collected {
  return { forms: [], crossRefs: [], linkages: [], translations: [], extra: [] };
}

function scope(): Scope {
  return { sounds: [], shared: collected(), drafts: [] };
}

/**
 * Forms from nodes produced by configured inflection templates
 *
 * Tables are decomposed cell by cell; other output is read as
 * `label: value` lines.
 */
export function inflectionForms(nodes: readonly WikiNode[], rules: LanguageRuleSet): Form[] {
  const forms: Form[] = [];
  let run: { source: string; labels: LanguageRuleSet['labels']; text: string } | undefined;
  const flush = (): void => {
    if (run) forms.push(...labelLineForms(run.text, run.labels, run.source));
    run = undefined;
  };

  walk(nodes, node => {
    const origin = node.origin;
    if (origin === undefined) {
      flush();
      return true;
    }
    const matcher = rules.inflection.find(candidate => candidate.matches(origin));
    if (!matcher) {
      flush();
      return false;
    }
    if (node.kind === 'table') {
      flush();
      forms.push(...tableForms(node, matcher, origin));
      return false;
    }
    if (run && run.source !== origin) flush();
    run ??= { source: origin, labels: matcher.labels, text: '' };
    run.text += toText(node);
    return false;
  });
  flush();
  return forms;
}

/**
 * First line of text before the definitions, skipping inflection output
 */
function headwordLine(nodes: readonly WikiNode[], rules: LanguageRuleSet): { line: string; source: string } | undefined {
  const leading: WikiNode[] = [];
  for (const node of nodes) {
    if (node.kind === 'list' || node.kind === 'table' || node.kind === 'heading') break;
    const origin = node.origin;
    if (origin !== undefined && rules.inflection.some(matcher => matcher.matches(origin))) continue;
    leading.push(node);
  }
  const line = toText(leading)
    .split('\n')
    .map(part => cleanText(part))
    .find(part => part !== '');
  if (line === undefined) return undefined;
  const source = leading.find(node => node.origin !== undefined)?.origin ?? HEADWORD_SOURCE;
  return { line, source };
}

function posDraft(pos: string, posTag: string, section: Section, rules: LanguageRuleSet): Draft {
  const draft: Draft = { ...collected(), pos, posTag, senses: extractSenses(section.nodes) };
  const headword = headwordLine(section.nodes, rules);
  if (headword) draft.forms.push(...headwordForms(headword.line, rules.labels, headword.source));
  draft.forms.push(...inflectionForms(section.nodes, rules));
  return draft;
}

/**
 * Add what a non-POS section contributes
 */
function attach(target: Collected, section: Section, rules: LanguageRuleSet, book: RuleBook): void {
  const rule = rules.sections.get(baseHeading(section.heading));
  switch (rule?.type) {
    case 'ignore':
      return;
    case 'linkage':
      target.linkages.push(...linkages(section.nodes, rule.relation));
      target.crossRefs.push(...crossReferences(section.nodes));
      break;
    case 'see-also':
      target.crossRefs.push(...crossReferences(section.nodes));
      break;
    case 'translations':
      target.translations.push(...translations(section.nodes, name => book.codeOf(name)));
      break;
    case 'inflection':
      break;
    case undefined: {
      target.extra.push({ heading: section.heading, text: cleanText(toText(section.nodes)) });
      break;
    }
    default:
      // etymology and pronunciation are handled per scope
      return;
  }
  target.forms.push(...inflectionForms(section.nodes, rules));
}

function build(
  title: string,
  language: LanguageSection,
  rules: LanguageRuleSet,
  draft: Draft,
  owner: Scope,
  languageSounds: readonly Sound[],
  pageCategories: readonly string[]
): LexicalEntry {
  const { shared } = owner;
  const entry: LexicalEntry = {
    headword: title,
    language: language.section.heading,
    langCode: rules.language.code,
    pos: draft.pos,
    posTag: draft.posTag,
    senses: draft.senses,
    forms: dedupeForms([...draft.forms, ...shared.forms]),
    crossRefs: [...new Set([...draft.crossRefs, ...shared.crossRefs])],
    linkages: [...draft.linkages, ...shared.linkages],
    translations: [...draft.translations, ...shared.translations],
    sounds: [...languageSounds, ...owner.sounds],
    categories: [...pageCategories],
    extra: [...shared.extra, ...draft.extra],
  };
  if (owner.etymology !== undefined) entry.etymology = owner.etymology;
  return entry;
}

function extractLanguage(language: LanguageSection, options: ExtractOptions): LexicalEntry[] {
  const heading = language.section.heading;
  const rules = options.rules.rulesFor(heading);
  if (!options.rules.language(heading)) {
    options.diagnostics.report({
      kind: 'unknown-language',
      message: `unknown language heading: ${heading}`,
      offset: language.section.node.start,
      section: heading,
    });
  }

  const first = scope();
  const scopes: Scope[] = [first];
  let current = first;
  let draft: Draft | undefined;
  let seenEtymology = false;
  const languageSounds: Sound[] = [];

  for (const section of language.subsections) {
    const base = baseHeading(section.heading);
    const posTag = rules.pos.get(base);
    if (posTag !== undefined) {
      draft = posDraft(base, posTag, section, rules);
      current.drafts.push(draft);
      continue;
    }
    const rule = rules.sections.get(base);
    if (rule?.type === 'etymology') {
      if (seenEtymology || current.drafts.length > 0) {
        current = scope();
        scopes.push(current);
      }
      seenEtymology = true;
      draft = undefined;
      const text = cleanText(toText(section.nodes));
      if (text !== '') current.etymology = text;
    } else if (rule?.type === 'pronunciation') {
      (seenEtymology ? current.sounds : languageSounds).push(...sounds(section.nodes));
    } else {
      attach(draft ?? current.shared, section, rules, options.rules);
    }
  }

  const all = [language.section, ...language.subsections];
  const pageCategories = categories(all.flatMap(section => section.nodes));

  if (scopes.every(owner => owner.drafts.length === 0)) {
    const nodes = all.flatMap(section => section.nodes);
    if (cleanText(toText(nodes)) === '') return [];
    const fallback: Draft = { ...collected(), pos: UNKNOWN_POS, posTag: UNKNOWN_POS, senses: extractSenses(nodes) };
    fallback.forms.push(...inflectionForms(language.section.nodes, rules));
    return [build(options.title, language, rules, fallback, first, languageSounds, pageCategories)];
  }

  return scopes.flatMap(owner =>
    owner.drafts.map(entryDraft =>
      build(options.title, language, rules, entryDraft, owner, languageSounds, pageCategories)
    )
  );
}

/**
 * Candidate records of an expanded page, in page order
 *
 * @example
 * const entries = extractEntries(expanded, { title: 'sortaa', rules, diagnostics });
 */
export function extractEntries(root: RootNode, options: ExtractOptions): LexicalEntry[] {
  const entries: LexicalEntry[] = [];
  for (const language of languageSections(splitSections(root))) {
    if (options.languages && !options.languages.has(language.section.heading)) continue;
    entries.push(...extractLanguage(language, options));
  }
  return entries;
}
