/**
 * Tests for configuration schema validation
 */

import { describe, it, expect } from 'vitest';
import {
  CliConfigSchema,
  ExtractionConfigSchema,
  InflectionTemplateRuleSchema,
  SectionRuleSchema,
  validateCliConfig,
  safeValidateCliConfig,
  safeValidateExtractionConfig,
  formatValidationError,
} from '../../src/lib/config-schema.js';
import {
  DEFAULT_CONFIG_PATH,
  defaultExtractionConfig,
  loadExtractionConfig,
  parseExtractionConfig,
} from '../../src/lib/config.js';
import { ConfigError } from '../../src/lib/errors.js';

describe('Config Schema', () => {
  describe('CliConfigSchema', () => {
    it('should accept empty config', () => {
      expect(CliConfigSchema.safeParse({}).success).toBe(true);
    });

    it('should accept valid complete config', () => {
      const config = {
        configPath: './rules.json',
        concurrency: 8,
        languages: ['Finnish', 'English'],
        output: 'entries.jsonl',
      };
      expect(validateCliConfig(config)).toEqual(config);
    });

    it('should reject a non-positive concurrency', () => {
      const result = safeValidateCliConfig({ concurrency: 0 });
      expect(result.success).toBe(false);
    });

    it('should reject languages that are not strings', () => {
      expect(() => validateCliConfig({ languages: [1] })).toThrow();
    });
  });

  describe('SectionRuleSchema', () => {
    it('should accept a linkage rule with a relation', () => {
      const result = SectionRuleSchema.safeParse({ type: 'linkage', relation: 'synonym' });
      expect(result.success).toBe(true);
    });

    it('should reject a linkage rule without a relation', () => {
      expect(SectionRuleSchema.safeParse({ type: 'linkage' }).success).toBe(false);
    });

    it('should reject an unknown section type', () => {
      expect(SectionRuleSchema.safeParse({ type: 'gallery' }).success).toBe(false);
    });
  });

  describe('InflectionTemplateRuleSchema', () => {
    it('should require a name or a pattern', () => {
      const result = InflectionTemplateRuleSchema.safeParse({ labels: {} });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatValidationError(result.error)).toBe('an inflection template rule needs a name or a pattern');
      }
    });

    it('should reject an invalid pattern', () => {
      const result = InflectionTemplateRuleSchema.safeParse({ pattern: '(' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatValidationError(result.error)).toBe('pattern: pattern is not a valid regular expression');
      }
    });
  });

  describe('ExtractionConfigSchema', () => {
    it('should fill every default into an empty object', () => {
      const config = ExtractionConfigSchema.parse({});
      expect(config.schemaVersion).toBe('1');
      expect(config.leniency).toBe('tolerant');
      expect(config.capitalize).toBe(false);
      expect(config.limits).toEqual({
        maxDepth: 40,
        maxExpansions: 10000,
        maxSteps: 500000,
        timeoutMs: 5000,
        maxNesting: 40,
      });
      expect(config.defaults.posHeadings).toEqual({});
      expect(config.languages).toEqual([]);
    });

    it('should default language aliases to an empty list', () => {
      const config = ExtractionConfigSchema.parse({ languages: [{ name: 'Finnish', code: 'fi' }] });
      expect(config.languages[0]?.aliases).toEqual([]);
    });

    it('should report the path of a bad limit', () => {
      const result = safeValidateExtractionConfig({ limits: { maxDepth: -1 } });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatValidationError(result.error)).toBe('limits.maxDepth: Number must be greater than 0');
      }
    });
  });

  describe('formatValidationError', () => {
    it('should join one line per issue', () => {
      const result = CliConfigSchema.safeParse({ concurrency: 'four', output: 3 });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatValidationError(result.error)).toBe(
          'concurrency: Expected number, received string\noutput: Expected string, received number'
        );
      }
    });
  });
});

describe('Extraction config loading', () => {
  it('should throw ConfigError with the source name', () => {
    expect(() => parseExtractionConfig({ leniency: 'loose' }, 'rules.json')).toThrow(ConfigError);
    expect(() => parseExtractionConfig({ leniency: 'loose' }, 'rules.json')).toThrow(/^Invalid rules\.json:/);
  });

  it('should load the bundled config', async () => {
    const config = await loadExtractionConfig(DEFAULT_CONFIG_PATH);
    expect(config.defaults.posHeadings['Verb']).toBe('verb');
    expect(config.languages.find(language => language.name === 'Finnish')?.code).toBe('fi');
  });

  it('should read the bundled config once', () => {
    expect(defaultExtractionConfig()).toBe(defaultExtractionConfig());
  });

  it('should wrap a missing file in ConfigError', async () => {
    await expect(loadExtractionConfig('/nonexistent/rules.json')).rejects.toBeInstanceOf(ConfigError);
  });
});
