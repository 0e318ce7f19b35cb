/**
 * wiktextract-ts - Main Library Entry Point
 *
 * This module re-exports key functionality from the various sub-modules
 * for convenient access by library consumers.
 */

// ============================================================================
// MARKUP PARSER
// ============================================================================
export { parse, parseNodes, toWikitext, toText, cleanText, walk, findAll, mapNodes } from './wikitext/index.js'
export type { WikiNode, RootNode, ParseOptions, ParseResult, ParseDiagnostic, Leniency } from './wikitext/index.js'

// ============================================================================
// PAGE STORE & RESOLVER
// ============================================================================
export { MemoryPageStore, Resolver, normalizeTitle } from './store/index.js'
export type {
  Page,
  PageStore,
  TemplateDefinition,
  ModuleDefinition,
  Resolution,
  StoreRecords,
} from './store/index.js'

// ============================================================================
// EXPANSION & SANDBOX
// ============================================================================
export { Expander, ExpansionContext, DEFAULT_LIMITS } from './expand/index.js'
export type { ExpanderOptions, ExpansionLimits } from './expand/index.js'
export { Sandbox, LuaError, SandboxTimeoutError } from './lua/index.js'
export type { SandboxOptions, InvokeResult } from './lua/index.js'

// ============================================================================
// EXTRACTION & VALIDATION
// ============================================================================
export { extractEntries, RuleBook } from './extract/index.js'
export type { ExtractOptions } from './extract/index.js'
export { validate, schemaFor, SCHEMA_VERSIONS } from './schema/index.js'
export type {
  LexicalEntry,
  Sense,
  Example,
  Form,
  Linkage,
  Translation,
  Sound,
  ValidationResult,
  ValidationIssue,
} from './schema/index.js'

// ============================================================================
// PIPELINE & DUMP INPUT
// ============================================================================
export { PageExtractor, runPool } from './pipeline/index.js'
export type { PageResult, PageSource, PoolOptions, PoolStats } from './pipeline/index.js'
export { loadDump, readDump, createDumpParser } from './dump/index.js'
export type { DumpPage, LoadDumpOptions } from './dump/index.js'

// ============================================================================
// CONFIGURATION, DIAGNOSTICS & ERRORS
// ============================================================================
export { loadExtractionConfig, parseExtractionConfig, defaultExtractionConfig } from './lib/config.js'
export type { ExtractionConfig, ExtractionConfigInput } from './lib/config-schema.js'
export { DiagnosticSink } from './lib/diagnostics.js'
export type { Diagnostic, DiagnosticKind } from './lib/diagnostics.js'
export {
  ParseError,
  StoreUnavailableError,
  ConfigError,
  ExtractionAbortedError,
  InternalError,
  isTypedError,
  isFatalError,
} from './lib/errors.js'
export { createLogger, withPageContext } from './lib/logger.js'
