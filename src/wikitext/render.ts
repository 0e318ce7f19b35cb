/**
 * Serialize node trees back to wikitext or down to plain text
 */

import type { WikiNode } from './types.js'
import { RAW_TAGS, VOID_TAGS } from './constants.js'

type Nodes = WikiNode | readonly WikiNode[]

/** Link namespaces whose links render nothing inline */
const HIDDEN_LINK_PREFIX = /^\s*(category|file|image)\s*:/i

/** Tags whose content is dropped from plain text */
const HIDDEN_TAGS: ReadonlySet<string> = new Set(['ref', 'references', 'templatestyles', 'math', 'chem', 'ce', 'score', 'hiero', 'graph', 'timeline', 'templatedata', 'gallery'])

/**
 * Serialize nodes to wikitext
 *
 * Parsing the output again yields an equivalent tree. Literal text is
 * wrapped in `<nowiki>` so it stays literal.
 */
export function toWikitext(nodes: Nodes): string {
  if (isNodeList(nodes)) {
    let out = ''
    for (const node of nodes) out += toWikitext(node)
    return out
  }
  const node = nodes
  switch (node.kind) {
    case 'text':
      return node.literal ? `<nowiki>${node.value}</nowiki>` : node.value
    case 'heading': {
      const marks = '='.repeat(node.level)
      return `${marks}${toWikitext(node.title)}${marks}\n`
    }
    case 'list':
      return node.items.map(item => toWikitext(item)).join('')
    case 'list-item': {
      let out = node.prefix
      let broken = false
      for (const child of node.children) {
        if (child.kind === 'list') {
          if (!broken) out += '\n'
          broken = true
          out += toWikitext(child)
        } else {
          out += toWikitext(child)
        }
      }
      return broken ? out : `${out}\n`
    }
    case 'template': {
      let out = `{{${toWikitext(node.name)}`
      for (const param of node.params) {
        out += '|'
        if (param.name) out += `${toWikitext(param.name)}=`
        out += toWikitext(param.value)
      }
      return `${out}}}`
    }
    case 'argument':
      return `{{{${toWikitext(node.name)}${node.fallback ? `|${toWikitext(node.fallback)}` : ''}}}}`
    case 'link':
      return `[[${toWikitext(node.target)}${node.args.map(arg => `|${toWikitext(arg)}`).join('')}]]${node.trail}`
    case 'extlink':
      return node.children.length > 0 ? `[${node.url} ${toWikitext(node.children)}]` : `[${node.url}]`
    case 'format': {
      const quotes = node.style === 'bold' ? "'''" : "''"
      return `${quotes}${toWikitext(node.children)}${quotes}`
    }
    case 'html': {
      if (node.selfClosing) return `<${node.tag}${node.attrs}/>`
      if (VOID_TAGS.has(node.tag) && node.children.length === 0) return `<${node.tag}${node.attrs}>`
      const inner = RAW_TAGS.has(node.tag)
        ? node.children.map(child => (child.kind === 'text' ? child.value : toWikitext(child))).join('')
        : toWikitext(node.children)
      return `<${node.tag}${node.attrs}>${inner}</${node.tag}>`
    }
    case 'table': {
      let out = `{|${node.attrs}\n`
      if (node.caption) out += `|+${toWikitext(node.caption)}\n`
      for (const row of node.rows) out += toWikitext(row)
      return `${out}|}\n`
    }
    case 'table-row':
      return `|-${node.attrs}\n${node.cells.map(cell => toWikitext(cell)).join('')}`
    case 'table-cell': {
      const marker = node.header ? '!' : '|'
      const attrs = node.attrs ? `${node.attrs}|` : ''
      return `${marker}${attrs}${toWikitext(node.children)}\n`
    }
    case 'comment':
      return `<!--${node.value}-->`
  }
}

/**
 * Reduce nodes to the text a reader would see
 *
 * Templates and arguments that are still present are dropped, links show
 * their display text, comments and reference-like tags vanish. Whitespace
 * is left as is; see {@link cleanText}.
 */
export function toText(nodes: Nodes): string {
  if (isNodeList(nodes)) {
    let out = ''
    for (const node of nodes) out += toText(node)
    return out
  }
  const node = nodes
  switch (node.kind) {
    case 'text':
      return node.value
    case 'heading':
      return `${toText(node.title)}\n`
    case 'list':
      return node.items.map(item => toText(item)).join('')
    case 'list-item': {
      const inline = node.children.filter(child => child.kind !== 'list')
      const nested = node.children.filter(child => child.kind === 'list')
      return `${toText(inline).trim()}\n${toText(nested)}`
    }
    case 'template':
    case 'argument':
    case 'comment':
      return ''
    case 'link': {
      const display = node.args[node.args.length - 1]
      if (display) return toText(display) + node.trail
      const target = toText(node.target)
      if (HIDDEN_LINK_PREFIX.test(target)) return ''
      return target.replace(/^\s*:/, '') + node.trail
    }
    case 'extlink':
      return node.children.length > 0 ? toText(node.children) : ''
    case 'format':
      return toText(node.children)
    case 'html':
      if (HIDDEN_TAGS.has(node.tag)) return ''
      if (node.tag === 'br') return '\n'
      return toText(node.children)
    case 'table':
      return node.rows.map(row => toText(row)).join('')
    case 'table-row':
      return `${node.cells.map(cell => toText(cell).trim()).join('\t')}\n`
    case 'table-cell':
      return toText(node.children)
  }
}

/**
 * Collapse runs of whitespace to one space and trim
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

function isNodeList(nodes: Nodes): nodes is readonly WikiNode[] {
  return Array.isArray(nodes)
}
