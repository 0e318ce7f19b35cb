/**
 * Transclusion tags
 *
 * `<noinclude>`, `<includeonly>` and `<onlyinclude>` decide which part of a
 * page is seen when it is read directly and which part when it is
 * transcluded into another page.
 *
 * @module expand/preprocess
 */

const ONLYINCLUDE = /<onlyinclude\s*>([\s\S]*?)(?:<\/onlyinclude\s*>|$)/gi;
const NOINCLUDE_BLOCK = /<noinclude\s*>[\s\S]*?(?:<\/noinclude\s*>|$)/gi;
const INCLUDEONLY_TAG = /<\/?includeonly\s*\/?>/gi;

/**
 * Text of a page as another page transcludes it
 *
 * When `<onlyinclude>` sections exist only they are kept; otherwise
 * `<noinclude>` blocks are dropped. `<includeonly>` tags vanish and their
 * content stays.
 *
 * @example
 * transclusionText('form: -it<noinclude>[[Category:Templates]]</noinclude>') // 'form: -it'
 */
export function transclusionText(body: string): string {
  if (/<onlyinclude\s*>/i.test(body)) {
    let kept = '';
    for (const match of body.matchAll(ONLYINCLUDE)) kept += match[1] ?? '';
    return kept.replace(INCLUDEONLY_TAG, '');
  }
  return body.replace(NOINCLUDE_BLOCK, '').replace(INCLUDEONLY_TAG, '');
}

/** What `pageView` cuts: `<includeonly>` blocks and the other two tags */
const VIEW_CUTS = /<includeonly\s*>[\s\S]*?(?:<\/includeonly\s*>|$)|<\/?(?:noinclude|onlyinclude)\s*\/?>/gi;

/** A page as it is read directly */
export interface PageView {
  text: string;
  /** Offset in the page of an offset in `text` */
  sourceOffset(offset: number): number;
}

/**
 * Read a page directly: `<includeonly>` blocks are dropped, the other two
 * tags vanish and their content stays
 *
 * @example
 * const view = pageView('a<noinclude>b</noinclude>');
 * view.text // 'ab'
 * view.sourceOffset(1) // 12
 */
export function pageView(text: string): PageView {
  if (!/<\/?(?:includeonly|noinclude|onlyinclude)/i.test(text)) return { text, sourceOffset: offset => offset };

  let view = '';
  // Where each kept stretch starts, in the view and in the page
  const viewStarts = [0];
  const sourceStarts = [0];
  let last = 0;
  for (const match of text.matchAll(VIEW_CUTS)) {
    const at = match.index ?? last;
    view += text.slice(last, at);
    last = at + match[0].length;
    viewStarts.push(view.length);
    sourceStarts.push(last);
  }
  view += text.slice(last);

  return {
    text: view,
    sourceOffset(offset) {
      let i = viewStarts.length - 1;
      while (i > 0 && (viewStarts[i] ?? 0) > offset) i--;
      return (sourceStarts[i] ?? 0) + offset - (viewStarts[i] ?? 0);
    },
  };
}

/**
 * Text of a page as it is read directly
 */
export function pageViewText(text: string): string {
  return pageView(text).text;
}
