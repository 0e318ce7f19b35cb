/**
 * Page extraction pipeline
 *
 * @module pipeline
 */

export { PageExtractor } from './page-extractor.js';
export type { PageExtractorOptions, PageResult, PageSource } from './page-extractor.js';
export { runPool } from './pool.js';
export type { PoolOptions, PoolStats } from './pool.js';
