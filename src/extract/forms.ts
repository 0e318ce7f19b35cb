/**
 * Forms from inflection tables, label lines and headword lines
 */

import type { InflectionMatcher, TagMap } from './rules.js';
import type { Form } from '../schema/index.js';
import { cleanText, toText, type TableCellNode, type TableNode } from '../wikitext/index.js';

/** Cells that stand for "no form" */
const EMPTY_CELL = /^[-–—―?]*$/;

const FORM_SEPARATOR = /\s*(?:,|;|\n|\bor\b)\s*/;

/** Source of forms read from a headword line no template produced */
export const HEADWORD_SOURCE = 'headword';

function splitForms(text: string): string[] {
  return text
    .split(FORM_SEPARATOR)
    .map(part => cleanText(part))
    .filter(part => part !== '' && !EMPTY_CELL.test(part));
}

function spanOf(attrs: string, name: 'rowspan' | 'colspan'): number {
  const match = new RegExp(`\\b${name}\\s*=\\s*["']?(\\d+)`, 'i').exec(attrs);
  const value = match ? parseInt(match[1] ?? '1', 10) : 1;
  return Number.isFinite(value) && value > 0 ? Math.min(value, 100) : 1;
}

/** Add tags for one header, unknown headers under `key` */
function addHeaderTags(tags: Record<string, string>, text: string, headers: ReadonlyMap<string, TagMap>, key: string): void {
  if (text === '') return;
  const known = headers.get(text.toLowerCase());
  if (known) {
    Object.assign(tags, known);
    return;
  }
  const previous = tags[key];
  tags[key] = previous === undefined ? text : `${previous} ${text}`;
}

// ============================================================================
// Tables
// ============================================================================

interface Slot {
  cell: TableCellNode;
  text: string;
  /** True for the first slot the cell covers */
  origin: boolean;
}

/**
 * Lay cells out on a grid, honouring rowspan and colspan
 */
export function tableGrid(table: TableNode): (Slot | undefined)[][] {
  const grid: (Slot | undefined)[][] = [];
  table.rows.forEach((row, r) => {
    const line = (grid[r] ??= []);
    let column = 0;
    for (const cell of row.cells) {
      while (line[column]) column++;
      const rowspan = spanOf(cell.attrs, 'rowspan');
      const colspan = spanOf(cell.attrs, 'colspan');
      const text = toText(cell.children).trim();
      for (let dr = 0; dr < rowspan; dr++) {
        const target = (grid[r + dr] ??= []);
        for (let dc = 0; dc < colspan; dc++) {
          target[column + dc] = { cell, text, origin: dr === 0 && dc === 0 };
        }
      }
      column += colspan;
    }
  });
  return grid;
}

/**
 * Forms of an inflection table
 *
 * Each data cell is tagged with the header cells above it in its column and
 * to its left in its row. Header cells spanning the whole width are titles
 * and add no tags.
 */
export function tableForms(table: TableNode, matcher: InflectionMatcher, source: string): Form[] {
  const grid = tableGrid(table);
  const width = Math.max(0, ...grid.map(line => line.length));
  const isTitle = (slot: Slot): boolean => slot.cell.header && spanOf(slot.cell.attrs, 'colspan') >= width && width > 1;
  const forms: Form[] = [];

  grid.forEach((line, r) => {
    line.forEach((slot, c) => {
      if (!slot || !slot.origin || slot.cell.header) return;
      const values = splitForms(slot.text);
      if (values.length === 0) return;

      const tags: Record<string, string> = {};
      const seen = new Set<TableCellNode>();
      for (let above = 0; above < r; above++) {
        const header = grid[above]?.[c];
        if (!header || !header.cell.header || isTitle(header) || seen.has(header.cell)) continue;
        seen.add(header.cell);
        addHeaderTags(tags, cleanText(header.text), matcher.headers, 'column');
      }
      for (let left = 0; left < c; left++) {
        const header = line[left];
        if (!header || !header.cell.header || seen.has(header.cell)) continue;
        seen.add(header.cell);
        addHeaderTags(tags, cleanText(header.text), matcher.headers, 'row');
      }
      for (const form of values) forms.push({ form, tags: { ...tags }, source });
    });
  });
  return forms;
}

// ============================================================================
// Label lines
// ============================================================================

const LABEL_LINE = /^\s*([^:\n]{1,60}?)\s*:\s*(.+?)\s*$/;

/**
 * Forms of `label: value` lines, e.g. `genitive: sortajan`
 *
 * Labels missing from the map are kept under the `label` category.
 */
export function labelLineForms(text: string, labels: ReadonlyMap<string, TagMap>, source: string): Form[] {
  const forms: Form[] = [];
  for (const line of text.split('\n')) {
    const match = LABEL_LINE.exec(line);
    if (!match) continue;
    const label = cleanText(match[1] ?? '');
    const tags: Record<string, string> = { ...(labels.get(label.toLowerCase()) ?? { label }) };
    for (const form of splitForms(match[2] ?? '')) forms.push({ form, tags: { ...tags }, source });
  }
  return forms;
}

// ============================================================================
// Headword lines
// ============================================================================

function longestLabel(text: string, labels: ReadonlyMap<string, TagMap>): string | undefined {
  const lower = text.toLowerCase();
  let best: string | undefined;
  for (const label of labels.keys()) {
    if ((lower === label || lower.startsWith(`${label} `)) && (!best || label.length > best.length)) best = label;
  }
  return best;
}

/**
 * Forms in the parentheses of a headword line, e.g. `cat (plural cats)`
 *
 * Only parts that start with a configured label give forms.
 */
export function headwordForms(line: string, labels: ReadonlyMap<string, TagMap>, source: string): Form[] {
  const forms: Form[] = [];
  for (const group of line.matchAll(/\(([^()]*)\)/g)) {
    for (const part of (group[1] ?? '').split(/\s*[,;]\s*/)) {
      const text = cleanText(part);
      const label = longestLabel(text, labels);
      if (!label) continue;
      const tags = labels.get(label) ?? {};
      for (const form of splitForms(text.slice(label.length))) forms.push({ form, tags: { ...tags }, source });
    }
  }
  return forms;
}

// ============================================================================
// Deduplication
// ============================================================================

function formKey(form: Form): string {
  const tags = Object.keys(form.tags)
    .sort()
    .map(key => [key, form.tags[key]]);
  return JSON.stringify([form.form, tags]);
}

/**
 * Drop forms whose surface and tags repeat an earlier form; the first
 * source wins. Forms that share a surface but not their tags are all kept.
 */
export function dedupeForms(forms: readonly Form[]): Form[] {
  const seen = new Set<string>();
  const out: Form[] = [];
  for (const form of forms) {
    const key = formKey(form);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(form);
  }
  return out;
}
