/**
 * Heading structure of an expanded page
 */

import { cleanText, toText, type HeadingNode, type RootNode, type WikiNode } from '../wikitext/index.js';

export interface Section {
  /** Heading text as a reader sees it */
  heading: string;
  level: number;
  node: HeadingNode;
  /** Nodes between this heading and the next one of any level */
  nodes: WikiNode[];
}

export interface LanguageSection {
  section: Section;
  /** Deeper sections up to the next language heading, in page order */
  subsections: Section[];
}

/**
 * Heading text without a trailing number, e.g. `Etymology 2` or `Noun 3`
 */
export function baseHeading(heading: string): string {
  return heading.replace(/\s+\d+$/, '');
}

/**
 * Split the top level of a tree at its headings
 */
export function splitSections(root: RootNode): Section[] {
  const sections: Section[] = [];
  let current: Section | undefined;
  for (const node of root.children) {
    if (node.kind === 'heading') {
      current = { heading: cleanText(toText(node.title)), level: node.level, node, nodes: [] };
      sections.push(current);
    } else if (current) {
      current.nodes.push(node);
    }
  }
  return sections;
}

/**
 * Group sections under their level-2 language headings
 *
 * Sections before the first language heading, and under a level-1
 * heading, belong to no language and are dropped.
 */
export function languageSections(sections: readonly Section[]): LanguageSection[] {
  const languages: LanguageSection[] = [];
  let current: LanguageSection | undefined;
  for (const section of sections) {
    if (section.level <= 1) {
      current = undefined;
    } else if (section.level === 2) {
      current = { section, subsections: [] };
      languages.push(current);
    } else if (current) {
      current.subsections.push(section);
    }
  }
  return languages;
}
