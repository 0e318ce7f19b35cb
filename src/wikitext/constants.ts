/**
 * Character codes, tag lists and limits shared by the wikitext modules
 */

// Character codes for hot loop comparisons
export const CH_NEWLINE = 10
export const CH_SPACE = 32
export const CH_TAB = 9
export const CH_BANG = 33
export const CH_HASH = 35
export const CH_APOS = 39
export const CH_STAR = 42
export const CH_COLON = 58
export const CH_SEMI = 59
export const CH_LT = 60
export const CH_EQUALS = 61
export const CH_OPEN_BRACKET = 91
export const CH_CLOSE_BRACKET = 93
export const CH_OPEN_BRACE = 123
export const CH_PIPE = 124
export const CH_CLOSE_BRACE = 125

/** Opens a literal marker; the index into the literal table follows */
export const LITERAL_OPEN = '\uE000'
/** Closes a literal marker */
export const LITERAL_CLOSE = '\uE001'

export const DEFAULT_MAX_NESTING = 40

/** Heading levels above this are clamped */
export const MAX_HEADING_LEVEL = 6

/**
 * Tags whose content is kept verbatim, in both parse modes
 */
export const RAW_TAGS: ReadonlySet<string> = new Set([
  'nowiki',
  'pre',
  'math',
  'chem',
  'ce',
  'syntaxhighlight',
  'source',
  'score',
  'hiero',
  'graph',
  'timeline',
  'templatedata',
])

/**
 * Tags that never have content
 */
export const VOID_TAGS: ReadonlySet<string> = new Set([
  'br',
  'hr',
  'wbr',
  'img',
  'col',
  'meta',
  'link',
  'templatestyles',
  'references',
])

/**
 * Tags recognized in document mode; any other `<x>` is plain text
 */
export const KNOWN_TAGS: ReadonlySet<string> = new Set([
  ...RAW_TAGS,
  ...VOID_TAGS,
  'abbr', 'b', 'bdi', 'bdo', 'big', 'blockquote', 'caption', 'center', 'cite',
  'code', 'data', 'dd', 'del', 'dfn', 'div', 'dl', 'dt', 'em', 'font', 'h1',
  'h2', 'h3', 'h4', 'h5', 'h6', 'i', 'ins', 'kbd', 'li', 'mark', 'ol', 'p',
  'q', 'rb', 'rp', 'rt', 'rtc', 'ruby', 's', 'samp', 'small', 'span',
  'strike', 'strong', 'sub', 'sup', 'table', 'tbody', 'td', 'tfoot', 'th',
  'thead', 'time', 'tr', 'tt', 'u', 'ul', 'var',
  'ref', 'gallery', 'poem', 'section', 'categorytree',
])

/** URL schemes that start an external link after `[` */
export const URL_SCHEMES = ['http://', 'https://', 'ftp://', '//', 'mailto:'] as const

/** Letters that may trail a link's closing brackets */
export const LINK_TRAIL = /^[a-z]+/
