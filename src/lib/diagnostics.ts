/**
 * Diagnostics channel
 *
 * Non-fatal problems found while processing a page are collected per page,
 * returned with its result and logged through the structured logger.
 *
 * @module lib/diagnostics
 */

import { createLogger, type Logger } from './logger.js';

export type DiagnosticKind =
  | 'parse'
  | 'resolution-miss'
  | 'expansion-cycle'
  | 'expansion-depth'
  | 'expansion-limit'
  | 'sandbox-timeout'
  | 'sandbox-fault'
  | 'validation'
  | 'unknown-language'
  | 'internal';

export interface Diagnostic {
  kind: DiagnosticKind;
  /** Title of the page being processed */
  page: string;
  message: string;
  /** Offset into the page text */
  offset?: number | undefined;
  /** Location in the tree or record, e.g. `senses[0].gloss` */
  path?: string | undefined;
  /** Heading of the enclosing section */
  section?: string | undefined;
  /** Template and module calls active when the problem was found, outermost first */
  stack?: string[] | undefined;
}

export type DiagnosticInput = Omit<Diagnostic, 'page'>;

/** Diagnostics worth a warning rather than a debug line */
const WARN_KINDS: ReadonlySet<DiagnosticKind> = new Set(['sandbox-timeout', 'validation', 'internal']);

/**
 * Collects the diagnostics of one page
 */
export class DiagnosticSink {
  private readonly items: Diagnostic[] = [];

  constructor(
    readonly page: string,
    private readonly logger: Logger = createLogger('extract:diagnostics'),
    /** Maps offsets in the parsed text back to the page text */
    private readonly sourceOffset: ((offset: number) => number) | null = null
  ) {}

  report(input: DiagnosticInput): void {
    const diagnostic: Diagnostic = { page: this.page, ...input };
    if (diagnostic.offset !== undefined && this.sourceOffset) {
      diagnostic.offset = this.sourceOffset(diagnostic.offset);
    }
    this.items.push(diagnostic);
    const data = { kind: diagnostic.kind, offset: diagnostic.offset, path: diagnostic.path, stack: diagnostic.stack };
    if (WARN_KINDS.has(diagnostic.kind)) this.logger.warn(diagnostic.message, data);
    else this.logger.debug(diagnostic.message, data);
  }

  /** Diagnostics reported so far, in order */
  get all(): readonly Diagnostic[] {
    return this.items;
  }

  count(kind?: DiagnosticKind): number {
    return kind ? this.items.filter(item => item.kind === kind).length : this.items.length;
  }
}
