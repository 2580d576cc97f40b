import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';

const BLOCK_SELECTOR = [
  'address', 'article', 'aside', 'blockquote', 'dd', 'div', 'dl', 'dt', 'figcaption',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'li', 'ol', 'p', 'pre', 'section', 'table', 'tr', 'ul',
].join(', ');

/**
 * Text of an element with a line break after every block element,
 * so paragraphs do not run into each other the way `.text()` alone leaves them
 */
export function blockText($: CheerioAPI, root: Cheerio<AnyNode>): string {
  root.find('br').replaceWith('\n');
  root.find(BLOCK_SELECTOR).each((_, el) => {
    $(el).append('\n');
  });
  root.find('td, th').each((_, el) => {
    $(el).append(' ');
  });
  return root.text();
}

/**
 * Non-empty heading texts (h1-h6) in document order
 */
export function collectHeadings($: CheerioAPI, root: Cheerio<AnyNode>): string[] {
  const headings: string[] = [];
  root.find('h1, h2, h3, h4, h5, h6').each((_, el) => {
    const headingText = $(el).text().replace(/\s+/g, ' ').trim();
    if (headingText.length > 0) {
      headings.push(headingText);
    }
  });
  return headings;
}
