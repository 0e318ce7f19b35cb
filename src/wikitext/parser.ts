/**
 * Recursive-descent parser for wikitext
 *
 * Bracketed constructs ({{...}}, {{{...}}}, [[...]], tags, comments) are
 * parsed speculatively: when one does not close, the parser backtracks and
 * treats its opening characters as text, the way the wiki renderer does.
 * In document mode, line-level structure (headings, lists, tables) is
 * recognized at line starts and quote runs become bold/italic spans.
 */

import { ParseError } from '../lib/errors.js'
import type {
  ArgumentNode,
  ExtLinkNode,
  FormatNode,
  FormatStyle,
  HeadingNode,
  HtmlNode,
  LinkNode,
  ListItemNode,
  ListNode,
  ParseDiagnostic,
  ParseOptions,
  ParseResult,
  TableCellNode,
  TableNode,
  TableRowNode,
  TemplateNode,
  TemplateParam,
  TextNode,
  WikiNode,
} from './types.js'
import {
  CH_BANG,
  CH_CLOSE_BRACE,
  CH_CLOSE_BRACKET,
  CH_COLON,
  CH_EQUALS,
  CH_HASH,
  CH_LT,
  CH_NEWLINE,
  CH_OPEN_BRACE,
  CH_OPEN_BRACKET,
  CH_PIPE,
  CH_SEMI,
  CH_SPACE,
  CH_STAR,
  CH_TAB,
  DEFAULT_MAX_NESTING,
  KNOWN_TAGS,
  LINK_TRAIL,
  LITERAL_CLOSE,
  LITERAL_OPEN,
  MAX_HEADING_LEVEL,
  RAW_TAGS,
  URL_SCHEMES,
  VOID_TAGS,
} from './constants.js'
import { toWikitext } from './render.js'

/**
 * A token that ends the current inline run. Tokens starting with `</` match
 * a closing HTML tag case-insensitively.
 */
type Stop = string

const LIST_PREFIX = /[*#:;]+/y
const TAG_OPEN = /<([a-zA-Z][a-zA-Z0-9]*)((?:\s[^<>]*?)?)(\/?)>/y
const TAG_CLOSE = /<\/([a-zA-Z][a-zA-Z0-9]*)\s*>/y

const CH_LITERAL_OPEN = LITERAL_OPEN.charCodeAt(0)

/**
 * Parse wikitext into a node tree
 *
 * Never throws on malformed markup unless `failFast` is set: problems are
 * returned as diagnostics alongside a best-effort tree.
 *
 * @example
 * const { root, diagnostics } = parse('== Finnish ==\n# to oppress')
 */
export function parse(text: string, options: ParseOptions = {}): ParseResult {
  const parser = new Parser(text, options)
  const root = parser.parseRoot()
  const first = parser.diagnostics[0]
  if (options.failFast && first) {
    throw new ParseError(first.message, first.offset, first.expected)
  }
  return { root, diagnostics: parser.diagnostics }
}

/**
 * Parse a fragment and return its top-level nodes
 */
export function parseNodes(text: string, options: ParseOptions = {}): WikiNode[] {
  return parse(text, options).root.children
}

function textNode(value: string, start: number, end: number): TextNode {
  return { kind: 'text', value, start, end }
}

class Parser {
  readonly diagnostics: ParseDiagnostic[] = []
  private pos = 0
  private nesting = 0
  private readonly len: number
  private readonly document: boolean
  private readonly strict: boolean
  private readonly maxNesting: number
  private readonly literals: readonly string[]
  /** Offsets of the last `}}` and `]]` in the source, -1 when absent */
  private readonly lastBraceClose: number
  private readonly lastBracketClose: number
  /** Extent of the last measured run of `{` */
  private braceRunStart = -1
  private braceRunEnd = -1
  /** Openers already parsed to the end of their scan without a closer */
  private readonly unclosedTemplates = new Set<number>()
  private readonly unclosedArguments = new Set<number>()
  /** Offsets of `<tag>` openers that have a matching close, per tag */
  private readonly matchedOpens = new Map<string, Set<number>>()
  private lowerSrc: string | null = null

  constructor(private readonly src: string, options: ParseOptions) {
    this.len = src.length
    this.document = (options.mode ?? 'document') === 'document'
    this.strict = options.leniency === 'strict'
    this.maxNesting = options.maxNesting ?? DEFAULT_MAX_NESTING
    this.literals = options.literals ?? []
    this.lastBraceClose = src.lastIndexOf('}}')
    this.lastBracketClose = src.lastIndexOf(']]')
  }

  parseRoot(): { kind: 'root'; children: WikiNode[] } {
    const children = this.document
      ? this.parseBlocks([], true, null)
      : this.parseInline([], false)
    return { kind: 'root', children }
  }

  // ==========================================================================
  // DIAGNOSTICS
  // ==========================================================================

  private report(offset: number, expected: string, message: string): void {
    this.diagnostics.push({ offset, expected, message })
  }

  /** Abandon a speculative construct and rewind to its opener */
  private fail(start: number, savedDiagnostics: number, expected: string, message: string | null): null {
    this.pos = start
    this.diagnostics.length = savedDiagnostics
    if (message !== null) this.report(start, expected, message)
    return null
  }

  private enter(start: number, what: string): boolean {
    if (this.nesting >= this.maxNesting) {
      this.report(start, what, `nesting limit of ${this.maxNesting} exceeded`)
      return false
    }
    this.nesting++
    return true
  }

  // ==========================================================================
  // STOPS
  // ==========================================================================

  private atStop(stops: readonly Stop[]): boolean {
    for (const stop of stops) {
      if (stop.charCodeAt(0) === CH_LT && stop.charCodeAt(1) === 47) {
        if (this.atCloseTag(stop.slice(2))) return true
      } else if (this.src.startsWith(stop, this.pos)) {
        return true
      }
    }
    return false
  }

  private atCloseTag(tag: string): boolean {
    if (this.src.charCodeAt(this.pos) !== CH_LT || this.src.charCodeAt(this.pos + 1) !== 47) return false
    const end = this.pos + 2 + tag.length
    if (this.src.slice(this.pos + 2, end).toLowerCase() !== tag) return false
    const next = this.src.charAt(end)
    return next === '>' || next === ' ' || next === '\t' || next === '\n'
  }

  private consumeCloseTag(): void {
    const gt = this.src.indexOf('>', this.pos)
    this.pos = gt === -1 ? this.len : gt + 1
  }

  private hasCloseAhead(token: '}}' | ']]'): boolean {
    return (token === '}}' ? this.lastBraceClose : this.lastBracketClose) >= this.pos
  }

  // ==========================================================================
  // BLOCKS
  // ==========================================================================

  /**
   * Parse lines until a stop token or a line for which `lineTerminator`
   * returns true
   */
  private parseBlocks(
    stops: readonly Stop[],
    atLineStart: boolean,
    lineTerminator: (() => boolean) | null
  ): WikiNode[] {
    const out: WikiNode[] = []
    const lists = new ListBuilder(out)
    const lineStops: Stop[] = ['\n', ...stops]
    let lineStart = atLineStart

    while (this.pos < this.len) {
      if (lineStart) {
        if (lineTerminator?.()) break
        if (stops.length > 0 && this.atStop(stops)) break
        const c = this.src.charCodeAt(this.pos)

        if (c === CH_STAR || c === CH_HASH || c === CH_COLON || c === CH_SEMI) {
          const start = this.pos
          LIST_PREFIX.lastIndex = start
          const prefix = LIST_PREFIX.exec(this.src)?.[0] ?? ''
          this.pos += prefix.length
          const content = this.parseInline(lineStops, true)
          lists.add(prefix, content, start, this.pos)
          if (this.src.charCodeAt(this.pos) === CH_NEWLINE) {
            this.pos++
            continue
          }
          break
        }

        lists.close()

        if (c === CH_EQUALS) {
          const heading = this.parseHeading()
          if (heading) {
            out.push(heading)
            continue
          }
        }

        if (this.atTableStart()) {
          if (this.nesting < this.maxNesting) {
            out.push(this.parseTable())
            continue
          }
          // Past the limit the opener stays text
          this.report(this.pos, '|}', `nesting limit of ${this.maxNesting} exceeded`)
        }
      }

      const nodes = this.parseInline(lineStops, true)
      out.push(...nodes)
      if (this.src.charCodeAt(this.pos) === CH_NEWLINE) {
        out.push(textNode('\n', this.pos, this.pos + 1))
        this.pos++
        lineStart = true
      } else {
        break
      }
    }

    lists.close()
    return out
  }

  private parseHeading(): HeadingNode | null {
    const start = this.pos
    let open = 0
    while (this.src.charCodeAt(start + open) === CH_EQUALS) open++
    this.pos = start + open

    const title = this.parseInline(['\n'], false)
    const last = title[title.length - 1]
    if (!last || last.kind !== 'text' || last.literal) {
      this.pos = start
      return null
    }

    const trimmed = last.value.replace(/[ \t]+$/, '')
    let close = 0
    while (close < trimmed.length && trimmed.charCodeAt(trimmed.length - 1 - close) === CH_EQUALS) close++
    if (close === 0 || (title.length === 1 && close === trimmed.length)) {
      this.pos = start
      return null
    }

    const level = Math.min(open, close, MAX_HEADING_LEVEL)
    const lastValue = trimmed.slice(0, trimmed.length - level)
    if (lastValue) {
      title[title.length - 1] = textNode(lastValue, last.start, last.start + lastValue.length)
    } else {
      title.pop()
    }
    if (open > level) {
      title.unshift(textNode('='.repeat(open - level), start + level, start + open))
    }

    const end = this.pos
    if (this.src.charCodeAt(this.pos) === CH_NEWLINE) this.pos++
    return {
      kind: 'heading',
      level,
      title: applyFormatting(trimEdges(title), null),
      start,
      end,
    }
  }

  private atTableStart(): boolean {
    let i = this.pos
    while (this.src.charCodeAt(i) === CH_SPACE || this.src.charCodeAt(i) === CH_TAB) i++
    return this.src.charCodeAt(i) === CH_OPEN_BRACE && this.src.charCodeAt(i + 1) === CH_PIPE
  }

  private atTableLine(): boolean {
    let i = this.pos
    while (this.src.charCodeAt(i) === CH_SPACE || this.src.charCodeAt(i) === CH_TAB) i++
    const c = this.src.charCodeAt(i)
    return c === CH_PIPE || c === CH_BANG
  }

  private skipSpaces(): void {
    while (this.src.charCodeAt(this.pos) === CH_SPACE || this.src.charCodeAt(this.pos) === CH_TAB) this.pos++
  }

  /** Read raw text up to the end of the line and step over the newline */
  private readToLineEnd(): string {
    let end = this.src.indexOf('\n', this.pos)
    if (end === -1) end = this.len
    const text = this.src.slice(this.pos, end)
    this.pos = end < this.len ? end + 1 : end
    return text
  }

  private parseTable(): TableNode {
    const start = this.pos
    this.skipSpaces()
    this.pos += 2
    const table: TableNode = {
      kind: 'table',
      attrs: this.readToLineEnd(),
      caption: null,
      rows: [],
      start,
      end: start,
    }
    this.nesting++

    let row: TableRowNode | null = null
    let cell: TableCellNode | null = null
    let closed = false

    while (this.pos < this.len) {
      const lineStart = this.pos
      this.skipSpaces()
      const c = this.src.charCodeAt(this.pos)
      const n = this.src.charCodeAt(this.pos + 1)

      if (c === CH_PIPE && n === CH_CLOSE_BRACE) {
        this.pos += 2
        if (this.src.charCodeAt(this.pos) === CH_NEWLINE) this.pos++
        closed = true
        break
      }

      if (c === CH_PIPE && this.src.charAt(this.pos + 1) === '+') {
        this.pos += 2
        table.caption = this.parseInline(['\n'], true)
        if (this.src.charCodeAt(this.pos) === CH_NEWLINE) this.pos++
        cell = null
        continue
      }

      if (c === CH_PIPE && this.src.charAt(this.pos + 1) === '-') {
        this.pos += 2
        while (this.src.charAt(this.pos) === '-') this.pos++
        const attrs = this.readToLineEnd()
        row = { kind: 'table-row', attrs, cells: [], start: lineStart, end: this.pos }
        table.rows.push(row)
        cell = null
        continue
      }

      if (c === CH_PIPE || c === CH_BANG) {
        const header = c === CH_BANG
        this.pos++
        if (!row) {
          row = { kind: 'table-row', attrs: '', cells: [], start: lineStart, end: lineStart }
          table.rows.push(row)
        }
        for (;;) {
          cell = this.parseCell(header)
          row.cells.push(cell)
          if (this.src.startsWith('||', this.pos) || (header && this.src.startsWith('!!', this.pos))) {
            this.pos += 2
            continue
          }
          break
        }
        row.end = this.pos
        if (this.src.charCodeAt(this.pos) === CH_NEWLINE) this.pos++
        continue
      }

      // Continuation of the current cell, which may hold lists or nested tables
      this.pos = lineStart
      const nodes = this.parseBlocks([], true, () => this.atTableLine())
      if (cell) {
        cell.children.push(textNode('\n', lineStart, lineStart), ...nodes)
        cell.end = this.pos
      } else if (nodes.some(node => node.kind !== 'text' || node.value.trim() !== '')) {
        if (!row) {
          row = { kind: 'table-row', attrs: '', cells: [], start: lineStart, end: lineStart }
          table.rows.push(row)
        }
        cell = { kind: 'table-cell', header: false, attrs: '', children: nodes, start: lineStart, end: this.pos }
        row.cells.push(cell)
      }
      if (this.pos === lineStart) {
        // No progress is possible on this line; keep it as text
        this.readToLineEnd()
      }
    }

    this.nesting--
    if (!closed) this.report(start, '|}', 'unclosed table')
    table.end = this.pos
    return table
  }

  private parseCell(header: boolean): TableCellNode {
    const start = this.pos
    const contentStops: Stop[] = header ? ['\n', '||', '!!'] : ['\n', '||']
    let attrs = ''
    let children = this.parseInline([...contentStops, '|'], false)
    if (this.src.charCodeAt(this.pos) === CH_PIPE && !this.src.startsWith('||', this.pos)) {
      attrs = toWikitext(children)
      this.pos++
      children = this.parseInline(contentStops, false)
    }
    return {
      kind: 'table-cell',
      header,
      attrs,
      children: applyFormatting(children, this.strict ? this.formatReporter() : null),
      start,
      end: this.pos,
    }
  }

  // ==========================================================================
  // INLINE
  // ==========================================================================

  private formatReporter(): (offset: number) => void {
    return (offset: number) => this.report(offset, "''", 'unclosed formatting')
  }

  /**
   * Parse inline content up to a stop token or the end of input
   */
  private parseInline(stops: readonly Stop[], format: boolean): WikiNode[] {
    const nodes: WikiNode[] = []
    let textStart = this.pos

    while (this.pos < this.len) {
      if (stops.length > 0 && this.atStop(stops)) break

      const at = this.pos
      const c = this.src.charCodeAt(at)
      let node: WikiNode | null = null

      if (c === CH_OPEN_BRACE && this.src.charCodeAt(at + 1) === CH_OPEN_BRACE) {
        node = this.parseBraces()
      } else if (c === CH_OPEN_BRACKET) {
        if (this.src.charCodeAt(at + 1) === CH_OPEN_BRACKET) {
          node = this.parseLink()
        } else if (this.document) {
          node = this.parseExtLink()
        }
      } else if (c === CH_LT) {
        if (this.src.startsWith('<!--', at)) {
          node = this.parseComment()
        } else {
          node = this.parseTag()
        }
      } else if (c === CH_LITERAL_OPEN) {
        node = this.parseLiteral()
      } else if (this.strict && (c === CH_CLOSE_BRACE || c === CH_CLOSE_BRACKET) && this.src.charCodeAt(at + 1) === c) {
        this.report(at, '', `stray ${this.src.slice(at, at + 2)}`)
      }

      if (node) {
        if (at > textStart) nodes.push(textNode(this.src.slice(textStart, at), textStart, at))
        nodes.push(node)
        textStart = this.pos
        continue
      }
      this.pos = at + 1
    }

    if (this.pos > textStart) nodes.push(textNode(this.src.slice(textStart, this.pos), textStart, this.pos))
    if (format && this.document) {
      return applyFormatting(nodes, this.strict ? this.formatReporter() : null)
    }
    return nodes
  }

  /**
   * A run of two or more `{`. Runs of 2, 4 and 5 open a template (4 and 5
   * hold a nested template or argument in the name), runs of 3 and 6+ open
   * an argument. On failure the caller steps over one brace and retries.
   */
  private parseBraces(): WikiNode | null {
    if (this.pos < this.braceRunStart || this.pos >= this.braceRunEnd) {
      let end = this.pos
      while (this.src.charCodeAt(end) === CH_OPEN_BRACE) end++
      this.braceRunStart = this.pos
      this.braceRunEnd = end
    }
    const run = this.braceRunEnd - this.pos
    if (!this.hasCloseAhead('}}')) {
      if (run === 2 || run === 3) this.report(this.pos, run === 3 ? '}}}' : '}}', run === 3 ? 'unclosed argument' : 'unclosed template')
      return null
    }
    if (run === 3 || run >= 6) return this.parseArgument()
    return this.parseTemplate()
  }

  private parseTemplate(): TemplateNode | null {
    const start = this.pos
    const saved = this.diagnostics.length
    if (this.unclosedTemplates.has(start)) {
      this.report(start, '}}', 'unclosed template')
      return null
    }
    if (!this.enter(start, '}}')) return null
    this.pos += 2

    const name = this.parseInline(['|', '}}'], false)
    const params: TemplateParam[] = []
    let closed = false

    while (this.pos < this.len) {
      if (this.src.startsWith('}}', this.pos)) {
        this.pos += 2
        closed = true
        break
      }
      this.pos++ // '|'
      const first = this.parseInline(['|', '}}', '='], true)
      if (this.src.charCodeAt(this.pos) === CH_EQUALS) {
        this.pos++
        params.push({ name: first, value: this.parseInline(['|', '}}'], true) })
      } else {
        params.push({ name: null, value: first })
      }
    }

    this.nesting--
    if (!closed) {
      this.unclosedTemplates.add(start)
      return this.fail(start, saved, '}}', 'unclosed template')
    }
    return { kind: 'template', name, params, start, end: this.pos }
  }

  private parseArgument(): ArgumentNode | null {
    const start = this.pos
    const saved = this.diagnostics.length
    if (this.unclosedArguments.has(start)) {
      this.report(start, '}}}', 'unclosed argument')
      return null
    }
    if (!this.enter(start, '}}}')) return null
    this.pos += 3

    const name = this.parseInline(['|', '}}}'], false)
    let fallback: WikiNode[] | null = null
    if (this.src.charCodeAt(this.pos) === CH_PIPE) {
      this.pos++
      fallback = this.parseInline(['|', '}}}'], true)
      // Parts after a second pipe are ignored
      while (this.src.charCodeAt(this.pos) === CH_PIPE) {
        this.pos++
        this.parseInline(['|', '}}}'], false)
      }
    }

    this.nesting--
    if (!this.src.startsWith('}}}', this.pos)) {
      this.unclosedArguments.add(start)
      return this.fail(start, saved, '}}}', 'unclosed argument')
    }
    this.pos += 3
    return { kind: 'argument', name, fallback, start, end: this.pos }
  }

  private parseLink(): LinkNode | null {
    const start = this.pos
    const saved = this.diagnostics.length
    if (!this.hasCloseAhead(']]')) return null
    if (!this.enter(start, ']]')) return null
    this.pos += 2

    const target = this.parseInline(['|', ']]', '\n'], false)
    const args: WikiNode[][] = []
    if (this.pos >= this.len || this.src.charCodeAt(this.pos) === CH_NEWLINE || target.length === 0) {
      this.nesting--
      return this.fail(start, saved, ']]', target.length === 0 ? null : 'unclosed link')
    }
    while (this.src.charCodeAt(this.pos) === CH_PIPE) {
      this.pos++
      args.push(this.parseInline(['|', ']]'], true))
    }

    this.nesting--
    if (!this.src.startsWith(']]', this.pos)) return this.fail(start, saved, ']]', 'unclosed link')
    this.pos += 2

    let trail = ''
    if (this.document) {
      const match = LINK_TRAIL.exec(this.src.slice(this.pos, this.pos + 64))
      if (match) {
        trail = match[0]
        this.pos += trail.length
      }
    }
    return { kind: 'link', target, args, trail, start, end: this.pos }
  }

  private parseExtLink(): ExtLinkNode | null {
    const start = this.pos
    const rest = this.src.slice(start + 1, start + 10).toLowerCase()
    if (!URL_SCHEMES.some(scheme => rest.startsWith(scheme))) return null
    const saved = this.diagnostics.length

    let i = start + 1
    while (i < this.len) {
      const ch = this.src.charCodeAt(i)
      if (ch === CH_SPACE || ch === CH_CLOSE_BRACKET || ch === CH_NEWLINE || ch === CH_LT) break
      i++
    }
    const url = this.src.slice(start + 1, i)
    this.pos = i
    if (this.src.charCodeAt(this.pos) === CH_SPACE) this.pos++
    const children = this.parseInline([']', '\n'], true)
    if (this.src.charCodeAt(this.pos) !== CH_CLOSE_BRACKET) return this.fail(start, saved, ']', null)
    this.pos++
    return { kind: 'extlink', url, children, start, end: this.pos }
  }

  private parseComment(): WikiNode {
    const start = this.pos
    const end = this.src.indexOf('-->', start + 4)
    if (end === -1) {
      this.report(start, '-->', 'unclosed comment')
      this.pos = this.len
      return { kind: 'comment', value: this.src.slice(start + 4), start, end: this.len }
    }
    this.pos = end + 3
    return { kind: 'comment', value: this.src.slice(start + 4, end), start, end: this.pos }
  }

  private parseLiteral(): TextNode | null {
    const start = this.pos
    const close = this.src.indexOf(LITERAL_CLOSE, start + 1)
    if (close === -1) return null
    const index = Number(this.src.slice(start + 1, close))
    const value = this.literals[index]
    if (value === undefined) return null
    this.pos = close + 1
    return { kind: 'text', value, literal: true, start, end: this.pos }
  }

  private parseTag(): WikiNode | null {
    const start = this.pos

    TAG_CLOSE.lastIndex = start
    const closeMatch = TAG_CLOSE.exec(this.src)
    if (closeMatch) {
      if (this.strict && this.document) this.report(start, '', `stray </${closeMatch[1] ?? ''}>`)
      return null
    }

    TAG_OPEN.lastIndex = start
    const match = TAG_OPEN.exec(this.src)
    if (!match) return null
    const tag = (match[1] ?? '').toLowerCase()
    const attrs = match[2] ?? ''
    const selfClosing = match[3] === '/'
    const afterOpen = start + match[0].length

    if (RAW_TAGS.has(tag)) {
      return this.parseRawTag(tag, attrs, selfClosing, start, afterOpen)
    }
    // Ordinary HTML is only structure in document mode
    if (!this.document || !KNOWN_TAGS.has(tag)) return null

    if (selfClosing || VOID_TAGS.has(tag)) {
      this.pos = afterOpen
      return { kind: 'html', tag, attrs, children: [], selfClosing, start, end: this.pos }
    }

    if (!this.hasMatchingClose(tag, start)) {
      if (this.strict) this.report(start, `</${tag}>`, `unclosed <${tag}>`)
      this.pos = afterOpen
      return { kind: 'html', tag, attrs, children: [], selfClosing: false, start, end: this.pos }
    }

    if (!this.enter(start, `</${tag}>`)) return null
    this.pos = afterOpen
    const children = this.parseBlocks([`</${tag}`], false, null)
    this.nesting--
    if (this.atCloseTag(tag)) this.consumeCloseTag()
    return { kind: 'html', tag, attrs, children, selfClosing: false, start, end: this.pos }
  }

  private parseRawTag(tag: string, attrs: string, selfClosing: boolean, start: number, afterOpen: number): HtmlNode | null {
    if (selfClosing) {
      this.pos = afterOpen
      return { kind: 'html', tag, attrs, children: [], selfClosing: true, start, end: afterOpen }
    }
    this.lowerSrc ??= this.src.toLowerCase()
    const close = this.lowerSrc.indexOf(`</${tag}`, afterOpen)
    if (close === -1) {
      if (this.strict) this.report(start, `</${tag}>`, `unclosed <${tag}>`)
      return null
    }
    const content: TextNode = {
      kind: 'text',
      value: this.src.slice(afterOpen, close),
      literal: true,
      start: afterOpen,
      end: close,
    }
    this.pos = close
    this.consumeCloseTag()
    return { kind: 'html', tag, attrs, children: [content], selfClosing: false, start, end: this.pos }
  }

  /**
   * Whether the opener at `start` is closed. Openers and closers of `tag`
   * are paired once per source with a stack, innermost first.
   */
  private hasMatchingClose(tag: string, start: number): boolean {
    let matched = this.matchedOpens.get(tag)
    if (!matched) {
      matched = new Set()
      const open: number[] = []
      const pattern = new RegExp(`<(/?)${tag}(?=[\\s/>])[^<>]*?(/?)>`, 'gi')
      for (let match = pattern.exec(this.src); match; match = pattern.exec(this.src)) {
        if (match[1]) {
          const opener = open.pop()
          if (opener !== undefined) matched.add(opener)
        } else if (!match[2]) {
          open.push(match.index)
        }
      }
      this.matchedOpens.set(tag, matched)
    }
    return matched.has(start)
  }
}

// ============================================================================
// LISTS
// ============================================================================

/**
 * Assembles consecutive list lines into nested ListNodes. Each stack level
 * is one list; a line continues every level whose marker matches its prefix.
 */
class ListBuilder {
  private stack: { list: ListNode; item: ListItemNode | null }[] = []

  constructor(private readonly out: WikiNode[]) {}

  add(prefix: string, content: WikiNode[], start: number, end: number): void {
    let matched = 0
    while (
      matched < this.stack.length &&
      matched < prefix.length &&
      this.stack[matched]?.list.marker === prefix[matched]
    ) {
      matched++
    }
    this.stack.length = matched

    for (let level = matched; level < prefix.length; level++) {
      const marker = prefix.charAt(level)
      const list: ListNode = {
        kind: 'list',
        marker,
        ordered: marker === '#',
        depth: level + 1,
        items: [],
        start,
        end,
      }
      const parent = this.stack[level - 1]
      if (!parent) {
        this.out.push(list)
      } else {
        if (!parent.item) {
          parent.item = { kind: 'list-item', prefix: prefix.slice(0, level), children: [], start, end }
          parent.list.items.push(parent.item)
        }
        parent.item.children.push(list)
      }
      this.stack.push({ list, item: null })
    }

    const top = this.stack[prefix.length - 1]
    if (!top) return
    const item: ListItemNode = { kind: 'list-item', prefix, children: content, start, end }
    top.list.items.push(item)
    top.item = item

    for (const level of this.stack) {
      level.list.end = end
      if (level.item) level.item.end = end
    }
  }

  close(): void {
    this.stack = []
  }
}

// ============================================================================
// FORMATTING
// ============================================================================

/** Trim whitespace at the outer edges of a node list */
function trimEdges(nodes: WikiNode[]): WikiNode[] {
  const out = [...nodes]
  const first = out[0]
  if (first && first.kind === 'text' && !first.literal) {
    const value = first.value.replace(/^\s+/, '')
    if (value) out[0] = textNode(value, first.end - value.length, first.end)
    else out.shift()
  }
  const last = out[out.length - 1]
  if (last && last.kind === 'text' && !last.literal) {
    const value = last.value.replace(/\s+$/, '')
    if (value) out[out.length - 1] = textNode(value, last.start, last.start + value.length)
    else out.pop()
  }
  return out
}

interface FormatFrame {
  style: FormatStyle | null
  children: WikiNode[]
  start: number
}

/**
 * Turn `''` and `'''` runs in text nodes into FormatNodes. Spans close at
 * newlines and at the end of the run of nodes.
 */
export function applyFormatting(nodes: WikiNode[], onUnclosed: ((offset: number) => void) | null): WikiNode[] {
  if (!nodes.some(node => node.kind === 'text' && !node.literal && node.value.includes("''"))) {
    return nodes
  }

  const root: FormatFrame = { style: null, children: [], start: 0 }
  const stack: FormatFrame[] = [root]
  const top = (): FormatFrame => stack[stack.length - 1] ?? root
  const isOpen = (style: FormatStyle): boolean => stack.some(frame => frame.style === style)

  const closeTop = (end: number): void => {
    const frame = stack.pop()
    if (!frame || frame.style === null) return
    const node: FormatNode = { kind: 'format', style: frame.style, children: frame.children, start: frame.start, end }
    top().children.push(node)
  }

  const toggle = (style: FormatStyle, start: number, end: number): void => {
    if (!isOpen(style)) {
      stack.push({ style, children: [], start })
      return
    }
    const reopen: FormatStyle[] = []
    for (let frame = top(); frame.style !== style && frame.style !== null; frame = top()) {
      reopen.push(frame.style)
      closeTop(start)
    }
    closeTop(end)
    for (const other of reopen.reverse()) stack.push({ style: other, children: [], start: end })
  }

  const closeAll = (offset: number): void => {
    while (stack.length > 1) {
      onUnclosed?.(top().start)
      closeTop(offset)
    }
  }

  let lastEnd = 0
  for (const node of nodes) {
    lastEnd = node.end
    if (node.kind !== 'text' || node.literal) {
      top().children.push(node)
      continue
    }
    const value = node.value
    const pattern = /'{2,}|\n/g
    let last = 0
    for (let match = pattern.exec(value); match; match = pattern.exec(value)) {
      const at = node.start + match.index
      if (match.index > last) {
        top().children.push(textNode(value.slice(last, match.index), node.start + last, at))
      }
      last = match.index + match[0].length

      if (match[0] === '\n') {
        closeAll(at)
        top().children.push(textNode('\n', at, at + 1))
        continue
      }

      let run = match[0].length
      let lead = 0
      if (run === 4) {
        lead = 1
        run = 3
      } else if (run > 5) {
        lead = run - 5
        run = 5
      }
      if (lead > 0) top().children.push(textNode("'".repeat(lead), at, at + lead))
      const start = at + lead
      const end = at + match[0].length

      if (run === 2) {
        toggle('italic', start, end)
      } else if (run === 3) {
        toggle('bold', start, end)
      } else if (isOpen('bold') && isOpen('italic')) {
        const inner = top().style === 'bold' ? 'bold' : 'italic'
        toggle(inner, start, end)
        toggle(inner === 'bold' ? 'italic' : 'bold', start, end)
      } else if (isOpen('bold')) {
        toggle('bold', start, end)
        toggle('italic', start, end)
      } else if (isOpen('italic')) {
        toggle('italic', start, end)
        toggle('bold', start, end)
      } else {
        toggle('bold', start, end)
        toggle('italic', start, end)
      }
    }
    if (last < value.length) {
      top().children.push(textNode(value.slice(last), node.start + last, node.end))
    }
  }

  closeAll(lastEnd)
  return root.children
}
