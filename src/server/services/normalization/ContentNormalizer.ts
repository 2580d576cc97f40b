/**
 * Content Normalizer
 *
 * Cleans extracted text before windowing. Steps, in order:
 * 1. strip invisible/control characters and collapse whitespace (per page)
 * 2. drop header/footer/page-number lines
 * 3. re-join words hyphenated across line breaks
 * 4. strip and collapse again
 *
 * Never throws, and normalizing already-normalized text returns it unchanged.
 */

import type { ExtractedText, NormalizedText } from '../../types/pipeline.js';
import { countWords } from '../../extraction/TextExtractor.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_MIN_WORDS = 500;

/** Lines this close to a page edge are header/footer candidates */
const EDGE_LINES = 3;
/** Minimum pages before repeated edge lines are looked for */
const MIN_PAGES_FOR_EDGE_DETECTION = 3;
const EDGE_REPEAT_RATIO = 0.5;

const INVISIBLE_CHARS = /[\u0000-\u0008\u000B\u000E-\u001F\u007F-\u009F\u00AD\u200B-\u200D\u2060\uFEFF\uFFFD]/g;
const PAGE_NUMBER_LINE = /^(?:page\s+|p\.\s*)?[-\u2013\u2014]?\s*\d{1,4}\s*[-\u2013\u2014]?(?:\s*(?:of|\/)\s*\d{1,4})?$/i;

export interface NormalizerConfig {
  /** Word count below which text is flagged insufficient */
  minWords?: number;
}

/**
 * Map line/paragraph separators to newlines and odd spaces to plain spaces, then drop
 * invisible and control characters. Never lengthens the text.
 */
export function stripInvisible(text: string): string {
  return text
    .replace(/\r\n?/g, '\n') // Normalize line endings
    .replace(/[\f\u2028\u2029]/g, '\n') // Page, line and paragraph separators
    .replace(/[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g, ' ') // Non-breaking and typographic spaces
    .replace(INVISIBLE_CHARS, '');
}

export function collapseWhitespace(text: string): string {
  return text
    .replace(/[ \t]+/g, ' ') // Collapse horizontal whitespace
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n') // Collapse multiple newlines to double newline max
    .trim();
}

/**
 * Case-folded line with digits masked, so "Page 3 of 9" and "Page 4 of 9" match
 */
function edgeKey(line: string): string {
  return line.toLowerCase().replace(/\d+/g, '#');
}

function edgeLineIndexes(lines: string[]): number[] {
  const content: number[] = [];
  lines.forEach((line, index) => {
    if (line.length > 0) content.push(index);
  });
  if (content.length <= EDGE_LINES * 2) return content;
  return [...content.slice(0, EDGE_LINES), ...content.slice(-EDGE_LINES)];
}

/**
 * Remove running headers/footers and standalone page numbers
 *
 * @returns Cleaned pages and the number of lines removed
 */
export function removeRepeatedEdgeLines(pages: string[]): { pages: string[]; removed: number } {
  const pageLines = pages.map((page) => page.split('\n'));
  const repeated = new Set<string>();

  if (pages.length >= MIN_PAGES_FOR_EDGE_DETECTION) {
    const pagesPerKey = new Map<string, number>();
    for (const lines of pageLines) {
      const keys = new Set(edgeLineIndexes(lines).map((index) => edgeKey(lines[index])));
      for (const key of keys) {
        pagesPerKey.set(key, (pagesPerKey.get(key) ?? 0) + 1);
      }
    }
    const threshold = Math.max(MIN_PAGES_FOR_EDGE_DETECTION, Math.ceil(pages.length * EDGE_REPEAT_RATIO));
    for (const [key, count] of pagesPerKey) {
      if (count >= threshold) repeated.add(key);
    }
  }

  let removed = 0;
  const cleaned = pageLines.map((lines) => {
    const edges = new Set(edgeLineIndexes(lines));
    const kept = lines.filter((line, index) => {
      const drop =
        PAGE_NUMBER_LINE.test(line) || (edges.has(index) && repeated.has(edgeKey(line)));
      if (drop) removed++;
      return !drop;
    });
    return kept.join('\n');
  });

  return { pages: cleaned, removed };
}

/**
 * exam-\nple → example; only when the continuation starts lower-case
 */
export function dehyphenate(text: string): string {
  return text.replace(/(\p{L})-\n(?=\p{Ll})/gu, '$1');
}

/**
 * ContentNormalizer - turns ExtractedText into NormalizedText
 */
export class ContentNormalizer {
  private readonly minWords: number;

  constructor(config: NormalizerConfig = {}) {
    this.minWords = config.minWords ?? DEFAULT_MIN_WORDS;
  }

  normalize(input: ExtractedText | string): NormalizedText {
    const pages = typeof input === 'string' ? [input] : input.pages;

    const collapsed = pages.map((page) => collapseWhitespace(stripInvisible(page)));
    const { pages: withoutEdges, removed } = removeRepeatedEdgeLines(collapsed);
    const joined = dehyphenate(withoutEdges.join('\n\n'));
    const text = collapseWhitespace(stripInvisible(joined));

    const wordCount = countWords(text);
    const quality = wordCount < this.minWords ? 'insufficient' : 'ok';

    logger.debug(
      { pageCount: pages.length, removedLines: removed, textLength: text.length, wordCount, quality },
      'Text normalized'
    );

    return {
      text,
      wordCount,
      charCount: text.length,
      quality,
      minWords: this.minWords,
      removedLines: removed,
    };
  }
}
