/**
 * Extraction rules shared by the extract and pipeline tests
 */

import { ExtractionConfigSchema, type ExtractionConfig } from '../../src/lib/config-schema.js';

export function testConfig(): ExtractionConfig {
  return ExtractionConfigSchema.parse({
    defaults: {
      posHeadings: { Verb: 'verb', Noun: 'noun' },
      sections: {
        Etymology: { type: 'etymology' },
        Pronunciation: { type: 'pronunciation' },
        Synonyms: { type: 'linkage', relation: 'synonym' },
        Translations: { type: 'translations' },
        'See also': { type: 'see-also' },
        References: { type: 'ignore' },
        Conjugation: { type: 'inflection' },
      },
      inflectionTemplates: [{ name: 'conj-table' }, { pattern: '^fi-decl' }],
      labels: { plural: { number: 'plural' }, genitive: { case: 'genitive' } },
      headers: {
        singular: { number: 'singular' },
        plural: { number: 'plural' },
        nominative: { case: 'nominative' },
        genitive: { case: 'genitive' },
      },
    },
    languages: [
      { name: 'Finnish', code: 'fi', aliases: ['Suomi'] },
      { name: 'English', code: 'en' },
    ],
  });
}
