/**
 * MediaWiki XML dump input
 *
 * @module dump
 */

export { createDumpParser, decodeXmlEntities } from './parse-dump.js';
export type { DumpPage, DumpParser, DumpParserOptions } from './parse-dump.js';
export { loadDump, readDump, detectCompression, DUMP_NAMESPACES } from './load-dump.js';
export type { DumpCompression, LoadDumpOptions, LoadDumpStats } from './load-dump.js';
