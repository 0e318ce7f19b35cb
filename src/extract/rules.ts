/**
 * Compiled extraction rules
 *
 * Turns the validated ExtractionConfig into lookups: language by heading,
 * and per language the merged POS vocabulary, section vocabulary, label and
 * header maps and inflection template matchers.
 */

import type {
  ExtractionConfig,
  InflectionTemplateRule,
  LanguageRules,
  Rules,
  SectionRule,
} from '../lib/config-schema.js';
import { normalizeTemplateName } from '../wikitext/index.js';

export type TagMap = Readonly<Record<string, string>>;

/** Language code given to sections whose heading is not configured */
export const UNKNOWN_LANGUAGE = 'unknown';

/** POS of an entry made from a language section without a POS heading */
export const UNKNOWN_POS = 'unknown';

export interface LanguageInfo {
  name: string;
  code: string;
}

/**
 * An inflection template rule ready for matching
 */
export interface InflectionMatcher {
  matches(name: string): boolean;
  headers: ReadonlyMap<string, TagMap>;
  labels: ReadonlyMap<string, TagMap>;
}

/**
 * Everything the extractor needs for one language
 */
export interface LanguageRuleSet {
  language: LanguageInfo;
  /** POS tag by heading */
  pos: ReadonlyMap<string, string>;
  sections: ReadonlyMap<string, SectionRule>;
  labels: ReadonlyMap<string, TagMap>;
  inflection: readonly InflectionMatcher[];
}

/** Lowercased keys, so lookups ignore case */
function labelMap(...sources: (Readonly<Record<string, TagMap>> | undefined)[]): Map<string, TagMap> {
  const map = new Map<string, TagMap>();
  for (const source of sources) {
    if (!source) continue;
    for (const [key, tags] of Object.entries(source)) map.set(key.trim().toLowerCase(), tags);
  }
  return map;
}

function compileMatcher(rule: InflectionTemplateRule, shared: Rules, labels: Map<string, TagMap>): InflectionMatcher {
  const name = rule.name === undefined ? undefined : normalizeTemplateName(rule.name);
  const pattern = rule.pattern === undefined ? undefined : new RegExp(rule.pattern);
  return {
    matches: candidate => {
      const normalized = normalizeTemplateName(candidate);
      return normalized === name || (pattern !== undefined && pattern.test(normalized));
    },
    headers: labelMap(shared.headers, rule.headers),
    labels: rule.labels ? new Map([...labels, ...labelMap(rule.labels)]) : labels,
  };
}

/**
 * Lookups compiled from an ExtractionConfig
 *
 * @example
 * const book = new RuleBook(config);
 * book.language('Finnish'); // { name: 'Finnish', code: 'fi' }
 */
export class RuleBook {
  private readonly byHeading = new Map<string, LanguageRules>();
  private readonly byName = new Map<string, LanguageInfo>();
  private readonly compiled = new Map<string, LanguageRuleSet>();

  constructor(readonly config: ExtractionConfig) {
    for (const language of config.languages) {
      for (const heading of [language.name, ...language.aliases]) {
        this.byHeading.set(heading.trim(), language);
        this.byName.set(heading.trim().toLowerCase(), { name: language.name, code: language.code });
      }
    }
  }

  /** Configured language of a level-2 heading */
  language(heading: string): LanguageInfo | undefined {
    const rules = this.byHeading.get(heading.trim());
    return rules ? { name: rules.name, code: rules.code } : undefined;
  }

  /** Code of a language name as written in running text, any case */
  codeOf(name: string): string | undefined {
    return this.byName.get(name.trim().toLowerCase())?.code;
  }

  /**
   * Rules for a language section; an unconfigured heading gets the
   * shared rules and the `unknown` code
   */
  rulesFor(heading: string): LanguageRuleSet {
    const key = heading.trim();
    const cached = this.compiled.get(key);
    if (cached) return cached;
    const own = this.byHeading.get(key);
    const shared = this.config.defaults;
    const labels = labelMap(shared.labels, own?.labels);
    const inflection = [...(own?.inflectionTemplates ?? []), ...shared.inflectionTemplates].map(rule =>
      compileMatcher(rule, { ...shared, headers: { ...shared.headers, ...own?.headers } }, labels)
    );
    const set: LanguageRuleSet = {
      language: own ? { name: own.name, code: own.code } : { name: key, code: UNKNOWN_LANGUAGE },
      pos: new Map(Object.entries({ ...shared.posHeadings, ...own?.posHeadings })),
      sections: new Map(Object.entries({ ...shared.sections, ...own?.sections })),
      labels,
      inflection,
    };
    this.compiled.set(key, set);
    return set;
  }
}
