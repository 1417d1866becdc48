import type { CheerioAPI } from 'cheerio';
import { Element, isTag } from 'domhandler';
import { countWords, normalizeWhitespace } from '../utils/text';

export const BLOCK_TAGS = new Set([
  'p',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'li',
  'pre',
  'blockquote',
  'table',
  'dt',
  'dd',
  'figcaption',
]);

export interface ContentBlock {
  index: number;
  tag: string;
  element: Element;
  text: string;
  wordCount: number;
  textLength: number;
  linkTextLength: number;
  /** Length of the block's inner HTML. */
  htmlLength: number;
  /** Class and id attributes of the block and its ancestors. */
  classIdSignature: string;
}

/**
 * Collects the outermost block-level elements under `root`, in document
 * order. Nested blocks belong to the block that contains them.
 */
export function collectBlocks($: CheerioAPI, root: Element): ContentBlock[] {
  const elements: Element[] = [];

  const walk = (node: Element): void => {
    for (const child of node.children) {
      if (!isTag(child)) {
        continue;
      }
      if (BLOCK_TAGS.has(child.name)) {
        elements.push(child);
      } else {
        walk(child);
      }
    }
  };
  walk(root);

  return elements.map((element, index) => {
    const node = $(element);
    const text = normalizeWhitespace(node.text());
    const linkText = normalizeWhitespace(node.find('a').text());
    const signature = [element, ...node.parents().toArray()]
      .map((el) => `${el.attribs.class ?? ''} ${el.attribs.id ?? ''}`)
      .join(' ')
      .trim();

    return {
      index,
      tag: element.name,
      element,
      text,
      wordCount: countWords(text),
      textLength: text.length,
      linkTextLength: linkText.length,
      htmlLength: (node.html() ?? '').length,
      classIdSignature: signature,
    };
  });
}

/** Decides which blocks survive into the fit markdown. */
export interface ContentFilter {
  selectBlocks(blocks: ContentBlock[]): Set<number>;
}
