/**
 * Node types for the wikitext parser
 *
 * The tree is plain data: every node is a discriminated object with source
 * offsets, children are owned by their parent and nothing points back up.
 */

// ============================================================================
// NODES
// ============================================================================

interface NodeBase {
  /** Offset of the first character in the parsed source */
  start: number
  /** Offset one past the last character */
  end: number
  /**
   * Name of the page-level template or module call whose expansion produced
   * this node. Unset for nodes that come straight from the page text.
   */
  origin?: string | undefined
}

export interface TextNode extends NodeBase {
  kind: 'text'
  value: string
  /** Text that must never be re-interpreted as markup (nowiki, frozen calls) */
  literal?: boolean | undefined
}

export interface HeadingNode extends NodeBase {
  kind: 'heading'
  /** 1-6, from the number of `=` on each side */
  level: number
  title: WikiNode[]
}

export interface ListNode extends NodeBase {
  kind: 'list'
  /** Marker character of this level: `*`, `#`, `:` or `;` */
  marker: string
  /** True when the marker is `#` */
  ordered: boolean
  /** Nesting depth, 1 for a top-level list */
  depth: number
  items: ListItemNode[]
}

export interface ListItemNode extends NodeBase {
  kind: 'list-item'
  /** Full marker prefix of the line, e.g. `#:` */
  prefix: string
  /** Inline content followed by any nested lists */
  children: WikiNode[]
}

export interface TemplateParam {
  /** Key nodes for `name=value` params, null for positional ones */
  name: WikiNode[] | null
  value: WikiNode[]
}

export interface TemplateNode extends NodeBase {
  kind: 'template'
  /** Name part, including a parser function's first argument after `:` */
  name: WikiNode[]
  params: TemplateParam[]
}

export interface ArgumentNode extends NodeBase {
  kind: 'argument'
  name: WikiNode[]
  /** Default after the first `|`, or null when none is given */
  fallback: WikiNode[] | null
}

export interface LinkNode extends NodeBase {
  kind: 'link'
  target: WikiNode[]
  /** Pipe-separated parts after the target; the last one is the display text */
  args: WikiNode[][]
  /** Letters glued to the closing brackets, e.g. the `s` of `[[cat]]s` */
  trail: string
}

export interface ExtLinkNode extends NodeBase {
  kind: 'extlink'
  url: string
  children: WikiNode[]
}

export type FormatStyle = 'bold' | 'italic'

export interface FormatNode extends NodeBase {
  kind: 'format'
  style: FormatStyle
  children: WikiNode[]
}

export interface HtmlNode extends NodeBase {
  kind: 'html'
  /** Lowercased tag name */
  tag: string
  /** Raw attribute text, including leading whitespace */
  attrs: string
  children: WikiNode[]
  selfClosing: boolean
}

export interface TableCellNode extends NodeBase {
  kind: 'table-cell'
  header: boolean
  attrs: string
  children: WikiNode[]
}

export interface TableRowNode extends NodeBase {
  kind: 'table-row'
  attrs: string
  cells: TableCellNode[]
}

export interface TableNode extends NodeBase {
  kind: 'table'
  attrs: string
  caption: WikiNode[] | null
  rows: TableRowNode[]
}

export interface CommentNode extends NodeBase {
  kind: 'comment'
  value: string
}

export type WikiNode =
  | TextNode
  | HeadingNode
  | ListNode
  | ListItemNode
  | TemplateNode
  | ArgumentNode
  | LinkNode
  | ExtLinkNode
  | FormatNode
  | HtmlNode
  | TableNode
  | TableRowNode
  | TableCellNode
  | CommentNode

export type NodeKind = WikiNode['kind']

export interface RootNode {
  kind: 'root'
  children: WikiNode[]
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * `document` builds headings, lists, tables and formatting; `preprocess`
 * only recognizes the constructs that matter for template expansion.
 */
export type ParseMode = 'document' | 'preprocess'

/**
 * How much malformed markup is reported. Both levels always produce a tree.
 * - `tolerant`: unclosed templates, arguments, links, tables and comments
 * - `strict`: also unclosed formatting and HTML tags, and stray closers
 */
export type Leniency = 'tolerant' | 'strict'

export interface ParseOptions {
  mode?: ParseMode | undefined
  /** Maximum nesting of bracketed constructs (default 40) */
  maxNesting?: number | undefined
  leniency?: Leniency | undefined
  /** Throw a ParseError for the first diagnostic instead of recovering */
  failFast?: boolean | undefined
  /** Table for literal markers produced by the expansion engine */
  literals?: readonly string[] | undefined
}

export interface ParseDiagnostic {
  /** Offset into the parsed source */
  offset: number
  /** The construct the parser expected, e.g. `}}` */
  expected: string
  message: string
}

export interface ParseResult {
  root: RootNode
  diagnostics: ParseDiagnostic[]
}
