/**
 * Tests for the extract command's page source
 */

import { describe, it, expect } from 'vitest';
import { mainPages } from '../../src/cli/extract.js';
import { MemoryPageStore } from '../../src/store/index.js';

describe('mainPages', () => {
  const store = MemoryPageStore.fromRecords({
    pages: { kissa: '# cat', vanha: '#REDIRECT [[kissa]]', koira: '# dog' },
    templates: { t: 'x' },
  });

  it('should yield main-namespace pages and skip redirects', () => {
    expect([...mainPages(store)].map(page => page.title)).toEqual(['kissa', 'koira']);
  });

  it('should stop at the limit', () => {
    expect([...mainPages(store, 1)].map(page => page.title)).toEqual(['kissa']);
  });
});
