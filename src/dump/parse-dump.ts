/**
 * Streaming parser for MediaWiki XML dump files
 *
 * Uses SAX parsing to process large dumps without loading them into memory.
 * Calls back with each page as its closing tag is read.
 */

import Saxophone, { type TagOpenNode } from 'saxophone';
import { createLogger, type Logger } from '../lib/logger.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('dump:parse');

/** XML element names we care about */
const ELEMENTS = {
  MEDIAWIKI: 'mediawiki',
  PAGE: 'page',
  TITLE: 'title',
  ID: 'id',
  NS: 'ns',
  REVISION: 'revision',
  MODEL: 'model',
  TEXT: 'text',
  TIMESTAMP: 'timestamp',
  REDIRECT: 'redirect',
} as const;

/** Parser state machine states */
type ParserState =
  | 'idle'
  | 'inPage'
  | 'inTitle'
  | 'inId'
  | 'inNs'
  | 'inRevision'
  | 'inRevisionId'
  | 'inModel'
  | 'inText'
  | 'inTimestamp';

/** One page as read from a dump */
export interface DumpPage {
  title: string;
  id: number;
  namespace: number;
  revisionId?: number | undefined;
  /** Content model, e.g. `wikitext` or `Scribunto` */
  model?: string | undefined;
  text: string;
  timestamp?: string | undefined;
  /** Redirect target if this is a redirect page */
  redirect?: string | undefined;
}

export interface DumpParserOptions {
  /** Called for every complete page, in dump order */
  onPage: (page: DumpPage) => void;
  /** Called once with the `xml:lang` of the root element */
  onLanguage?: ((language: string) => void) | undefined;
  /** Optional logger for dependency injection (testing) */
  logger?: Logger | undefined;
}

/** Chunk sink fed with raw dump bytes */
export interface DumpParser {
  write(chunk: Buffer | string): void;
  end(): void;
}

/**
 * Create a streaming dump parser
 *
 * @example
 * ```typescript
 * const parser = createDumpParser({ onPage: page => store.addPage(page) });
 * for await (const chunk of stream) parser.write(chunk);
 * parser.end();
 * ```
 */
export function createDumpParser(options: DumpParserOptions): DumpParser {
  const log = options.logger ?? getLog();
  const sax = new Saxophone();

  let state: ParserState = 'idle';
  let currentPage: Partial<DumpPage> | null = null;
  let textBuffer = '';
  // Distinguishes the page id from the revision id
  let inRevision = false;

  /** Start collecting text for `next` when a page is open */
  const collect = (next: ParserState): void => {
    state = next;
    textBuffer = '';
  };

  sax.on('tagopen', (tag: TagOpenNode) => {
    const tagName = tag.name.toLowerCase();

    switch (tagName) {
      case ELEMENTS.MEDIAWIKI: {
        const language = parseAttributes(tag.attrs)['xml:lang'];
        if (language) options.onLanguage?.(language);
        break;
      }

      case ELEMENTS.PAGE:
        state = 'inPage';
        currentPage = {};
        inRevision = false;
        break;

      case ELEMENTS.TITLE:
        if (state === 'inPage' && currentPage) collect('inTitle');
        break;

      case ELEMENTS.ID:
        if (!currentPage) break;
        // Only the first id of a revision is its own; later ones belong to the contributor
        if (inRevision && currentPage.revisionId !== undefined) break;
        if (state !== 'inPage' && state !== 'inRevision') break;
        collect(inRevision ? 'inRevisionId' : 'inId');
        break;

      case ELEMENTS.NS:
        if (state === 'inPage' && currentPage) collect('inNs');
        break;

      case ELEMENTS.REVISION:
        if (currentPage) {
          inRevision = true;
          state = 'inRevision';
        }
        break;

      case ELEMENTS.MODEL:
        if (inRevision && currentPage) collect('inModel');
        break;

      case ELEMENTS.TEXT:
        if (inRevision && currentPage) {
          collect('inText');
          // <text ... /> holds an empty page
          if (tag.isSelfClosing) {
            currentPage.text = '';
            state = 'inRevision';
          }
        }
        break;

      case ELEMENTS.TIMESTAMP:
        if (inRevision && currentPage) collect('inTimestamp');
        break;

      case ELEMENTS.REDIRECT:
        if (currentPage) {
          const target = parseAttributes(tag.attrs)['title'];
          if (target) currentPage.redirect = target;
        }
        break;
    }
  });

  sax.on('tagclose', tag => {
    const tagName = tag.name.toLowerCase();

    switch (tagName) {
      case ELEMENTS.PAGE:
        if (currentPage && isCompletePage(currentPage)) {
          options.onPage(currentPage);
        } else if (currentPage) {
          log.warn('Skipping incomplete page', { title: currentPage.title }, 'parsePage');
        }
        currentPage = null;
        state = 'idle';
        inRevision = false;
        break;

      case ELEMENTS.TITLE:
        if (state === 'inTitle' && currentPage) {
          currentPage.title = textBuffer;
          state = 'inPage';
        }
        break;

      case ELEMENTS.ID:
        if (state === 'inId' && currentPage) {
          currentPage.id = parseInt(textBuffer, 10);
          state = 'inPage';
        } else if (state === 'inRevisionId' && currentPage) {
          currentPage.revisionId = parseInt(textBuffer, 10);
          state = 'inRevision';
        }
        break;

      case ELEMENTS.NS:
        if (state === 'inNs' && currentPage) {
          currentPage.namespace = parseInt(textBuffer, 10);
          state = 'inPage';
        }
        break;

      case ELEMENTS.REVISION:
        if (inRevision) {
          inRevision = false;
          state = 'inPage';
        }
        break;

      case ELEMENTS.MODEL:
        if (state === 'inModel' && currentPage) {
          currentPage.model = textBuffer.trim();
          state = 'inRevision';
        }
        break;

      case ELEMENTS.TEXT:
        if (state === 'inText' && currentPage) {
          currentPage.text = textBuffer;
          state = 'inRevision';
        }
        break;

      case ELEMENTS.TIMESTAMP:
        if (state === 'inTimestamp' && currentPage) {
          currentPage.timestamp = textBuffer;
          state = 'inRevision';
        }
        break;
    }
  });

  sax.on('text', text => {
    switch (state) {
      case 'inTitle':
      case 'inId':
      case 'inNs':
      case 'inModel':
      case 'inText':
      case 'inTimestamp':
      case 'inRevisionId':
        textBuffer += decodeXmlEntities(text.contents);
        break;
    }
  });

  sax.on('cdata', cdata => {
    if (state === 'inText') textBuffer += cdata.contents;
  });

  // A malformed stretch loses at most the page it is in
  sax.on('error', (error: Error) => {
    log.warn('XML parse error', { error: error.message }, 'saxParser');
  });

  return {
    write(chunk) {
      sax.write(chunk);
    },
    end() {
      sax.end();
    },
  };
}

/**
 * Check if a partial page has all required fields
 */
function isCompletePage(page: Partial<DumpPage>): page is DumpPage {
  return (
    typeof page.title === 'string' &&
    typeof page.id === 'number' &&
    Number.isFinite(page.id) &&
    typeof page.namespace === 'number' &&
    Number.isFinite(page.namespace) &&
    typeof page.text === 'string'
  );
}

/**
 * Parse XML attributes from a string
 */
function parseAttributes(attrs: string): Record<string, string> {
  const result: Record<string, string> = {};
  const regex = /([\w:.-]+)\s*=\s*"([^"]*)"/g;
  let match;

  while ((match = regex.exec(attrs)) !== null) {
    const key = match[1];
    const value = match[2];
    if (key !== undefined && value !== undefined) {
      result[key] = decodeXmlEntities(value);
    }
  }

  return result;
}

/**
 * Decode the XML entities dumps use
 */
export function decodeXmlEntities(text: string): string {
  return text.replace(/&(lt|gt|amp|quot|apos|#\d+|#x[0-9a-fA-F]+);/g, (entity, name: string) => {
    switch (name) {
      case 'lt':
        return '<';
      case 'gt':
        return '>';
      case 'amp':
        return '&';
      case 'quot':
        return '"';
      case 'apos':
        return "'";
    }
    const code = name.startsWith('#x') ? parseInt(name.slice(2), 16) : parseInt(name.slice(1), 10);
    return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
  });
}
