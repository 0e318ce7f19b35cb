/**
 * Typed error hierarchy for the extraction pipeline
 *
 * Every error carries a `kind` discriminator so callers can branch on the
 * failure class without string matching.
 *
 * Usage:
 * ```ts
 * import { StoreUnavailableError, isTypedError } from './lib/errors.js';
 *
 * throw new StoreUnavailableError('page store closed');
 *
 * if (isTypedError(error) && error.kind === 'STORE_UNAVAILABLE') { ... }
 * ```
 *
 * Page-local problems (missing templates, cycles, sandbox faults) are not
 * errors: they are recorded as diagnostics and processing continues.
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'PARSE'
  | 'STORE_UNAVAILABLE'
  | 'CONFIG'
  | 'ABORTED'
  | 'INTERNAL';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/**
 * Raised by the parser only when `failFast` is set; otherwise parse
 * problems are diagnostics.
 */
export class ParseError extends Error implements TypedError {
  readonly kind = 'PARSE' as const;

  constructor(
    message: string,
    /** Offset into the source text */
    readonly offset: number,
    /** Construct the parser expected at that offset */
    readonly expected: string
  ) {
    super(message);
    this.name = 'ParseError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * The page store cannot serve lookups. Fatal for the whole run.
 */
export class StoreUnavailableError extends Error implements TypedError {
  readonly kind = 'STORE_UNAVAILABLE' as const;

  constructor(message: string) {
    super(message);
    this.name = 'StoreUnavailableError';
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}

/**
 * Extraction or CLI configuration failed validation
 */
export class ConfigError extends Error implements TypedError {
  readonly kind = 'CONFIG' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * A page's extraction was abandoned through its AbortSignal
 */
export class ExtractionAbortedError extends Error implements TypedError {
  readonly kind = 'ABORTED' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ExtractionAbortedError';
    Object.setPrototypeOf(this, ExtractionAbortedError.prototype);
  }
}

/**
 * Unexpected failure inside the pipeline
 */
export class InternalError extends Error implements TypedError {
  readonly kind = 'INTERNAL' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InternalError';
    Object.setPrototypeOf(this, InternalError.prototype);
  }
}

/**
 * Type guard to check if an error is one of ours
 */
export function isTypedError(error: unknown): error is TypedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string'
  );
}

/**
 * Whether an error must stop the whole run rather than a single page
 */
export function isFatalError(error: unknown): boolean {
  if (!isTypedError(error)) return false;
  switch (error.kind) {
    case 'STORE_UNAVAILABLE':
    case 'ABORTED':
    case 'CONFIG':
      return true;
    default:
      return false;
  }
}

/**
 * Process exit code for an error that ends a CLI run
 */
export function getExitCodeForError(error: unknown): number {
  if (!isTypedError(error)) return 1;
  switch (error.kind) {
    case 'CONFIG':
      return 2;
    case 'STORE_UNAVAILABLE':
      return 3;
    case 'ABORTED':
      return 130;
    default:
      return 1;
  }
}
