/**
 * Tree traversal and template accessors
 */

import type { ListItemNode, NodeKind, TableRowNode, TemplateNode, WikiNode } from './types.js'
import { toText, toWikitext } from './render.js'

export type NodeOfKind<K extends NodeKind> = Extract<WikiNode, { kind: K }>

export function isKind<K extends NodeKind>(node: WikiNode, kind: K): node is NodeOfKind<K> {
  return node.kind === kind
}

/**
 * Direct children of a node, in source order
 */
export function childNodes(node: WikiNode): WikiNode[] {
  switch (node.kind) {
    case 'text':
    case 'comment':
      return []
    case 'heading':
      return node.title
    case 'list':
      return node.items
    case 'list-item':
    case 'extlink':
    case 'format':
    case 'html':
    case 'table-cell':
      return node.children
    case 'template':
      return [...node.name, ...node.params.flatMap(param => [...(param.name ?? []), ...param.value])]
    case 'argument':
      return [...node.name, ...(node.fallback ?? [])]
    case 'link':
      return [...node.target, ...node.args.flat()]
    case 'table':
      return [...(node.caption ?? []), ...node.rows]
    case 'table-row':
      return node.cells
  }
}

/**
 * Depth-first, pre-order walk. Return `false` from the visitor to skip a
 * node's children.
 */
export function walk(nodes: readonly WikiNode[], visit: (node: WikiNode) => boolean | void): void {
  for (const node of nodes) {
    if (visit(node) === false) continue
    walk(childNodes(node), visit)
  }
}

/**
 * All nodes of one kind, at any depth
 */
export function findAll<K extends NodeKind>(nodes: readonly WikiNode[], kind: K): NodeOfKind<K>[] {
  const found: NodeOfKind<K>[] = []
  walk(nodes, node => {
    if (isKind(node, kind)) found.push(node)
  })
  return found
}

/**
 * Copy a tree, replacing nodes. `replace` sees each node before its
 * children; returning an array splices it in place of the node, returning
 * undefined keeps the node and maps its children.
 */
export function mapNodes(
  nodes: readonly WikiNode[],
  replace: (node: WikiNode) => WikiNode[] | undefined,
): WikiNode[] {
  const out: WikiNode[] = []
  for (const node of nodes) {
    const replaced = replace(node)
    if (replaced) out.push(...replaced)
    else out.push(mapChildren(node, replace))
  }
  return out
}

function mapItem(item: ListItemNode, replace: (node: WikiNode) => WikiNode[] | undefined): ListItemNode {
  return { ...item, children: mapNodes(item.children, replace) }
}

function mapRow(row: TableRowNode, replace: (node: WikiNode) => WikiNode[] | undefined): TableRowNode {
  return { ...row, cells: row.cells.map(cell => ({ ...cell, children: mapNodes(cell.children, replace) })) }
}

function mapChildren(node: WikiNode, replace: (node: WikiNode) => WikiNode[] | undefined): WikiNode {
  switch (node.kind) {
    case 'text':
    case 'comment':
      return node
    case 'heading':
      return { ...node, title: mapNodes(node.title, replace) }
    case 'list':
      return { ...node, items: node.items.map(item => mapItem(item, replace)) }
    case 'list-item':
      return mapItem(node, replace)
    case 'extlink':
    case 'format':
    case 'html':
    case 'table-cell':
      return { ...node, children: mapNodes(node.children, replace) }
    case 'template':
      return {
        ...node,
        name: mapNodes(node.name, replace),
        params: node.params.map(param => ({
          name: param.name && mapNodes(param.name, replace),
          value: mapNodes(param.value, replace),
        })),
      }
    case 'argument':
      return {
        ...node,
        name: mapNodes(node.name, replace),
        fallback: node.fallback && mapNodes(node.fallback, replace),
      }
    case 'link':
      return { ...node, target: mapNodes(node.target, replace), args: node.args.map(arg => mapNodes(arg, replace)) }
    case 'table':
      return {
        ...node,
        caption: node.caption && mapNodes(node.caption, replace),
        rows: node.rows.map(row => mapRow(row, replace)),
      }
    case 'table-row':
      return mapRow(node, replace)
  }
}

/**
 * Canonical form of a template name: underscores become spaces and runs of
 * whitespace collapse. Case is kept.
 */
export function normalizeTemplateName(name: string): string {
  return name.replace(/_/g, ' ').replace(/\s+/g, ' ').trim()
}

/**
 * Static name of a template call, or null when the name is built from
 * other templates or arguments
 */
export function templateName(node: TemplateNode): string | null {
  if (!node.name.every(part => part.kind === 'text' || part.kind === 'comment')) return null
  const raw = toText(node.name).trim()
  return raw ? normalizeTemplateName(raw) : null
}

export interface TemplateArgs {
  /** Positional values; index 0 holds `{{{1}}}` */
  positional: WikiNode[][]
  /** Named values keyed by their trimmed key text; later keys win */
  named: Map<string, WikiNode[]>
}

/**
 * Bind a call's parameters the way the wiki does: an explicit numeric key
 * overrides the positional slot it names
 */
export function templateArgs(node: TemplateNode): TemplateArgs {
  const positional: WikiNode[][] = []
  const named = new Map<string, WikiNode[]>()
  let index = 0
  for (const param of node.params) {
    if (param.name === null) {
      positional[index] = param.value
      index++
      continue
    }
    const key = toWikitext(param.name).trim()
    if (/^[1-9]\d*$/.test(key)) {
      positional[Number(key) - 1] = param.value
    } else {
      named.set(key, param.value)
    }
  }
  for (let i = 0; i < positional.length; i++) {
    if (!positional[i]) positional[i] = []
  }
  return { positional, named }
}

/**
 * Plain text of an argument value, trimmed, or undefined when absent
 */
export function argText(args: TemplateArgs, key: number | string): string | undefined {
  const value = typeof key === 'number' ? args.positional[key - 1] : args.named.get(key)
  return value === undefined ? undefined : toText(value).trim()
}
