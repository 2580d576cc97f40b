/**
 * HtmlExtractor - Extract text from HTML documents
 *
 * Strips boilerplate (navigation, banners, scripts) and keeps block structure as line breaks.
 */

import * as cheerio from 'cheerio';
import type { ExtractedText, SourceDocument } from '../../types/pipeline.js';
import { logger } from '../../utils/logger.js';
import { decodeText } from '../encoding.js';
import { buildExtractedText, type ExtractionOptions, type TextExtractor } from '../TextExtractor.js';
import { blockText, collectHeadings } from './htmlText.js';

const DEFAULT_BOILERPLATE_SELECTORS = [
  'nav',
  'header',
  'footer',
  'aside',
  '.navigation',
  '.nav',
  '.header',
  '.footer',
  '.sidebar',
  '.menu',
  '.cookie-banner',
  '.skip-link',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
  'script',
  'style',
  'noscript',
  'template',
  'svg',
  'iframe',
  'form',
];

/**
 * HtmlExtractor - Extract text from HTML
 */
export class HtmlExtractor implements TextExtractor {
  readonly format = 'html' as const;
  private readonly boilerplateSelectors: string[];

  constructor(config: { boilerplateSelectors?: string[] } = {}) {
    this.boilerplateSelectors = config.boilerplateSelectors || DEFAULT_BOILERPLATE_SELECTORS;
  }

  async extract(source: SourceDocument, options: ExtractionOptions = {}): Promise<ExtractedText> {
    const decoded = decodeText(source.bytes, options.encodingTolerance);
    const result = this.extractFromString(decoded.text);
    return { ...result, encoding: decoded.encoding };
  }

  /**
   * Extract text from an HTML string
   */
  extractFromString(htmlContent: string): ExtractedText {
    const $ = cheerio.load(htmlContent);

    const title = $('title').first().text().trim() || $('h1').first().text().trim();

    for (const selector of this.boilerplateSelectors) {
      $(selector).remove();
    }

    // Prefer article, then main, then body
    let contentElement = $('article').first();
    if (contentElement.length === 0) {
      contentElement = $('main').first();
    }
    if (contentElement.length === 0) {
      contentElement = $('body');
    }

    const headings = collectHeadings($, contentElement);
    const fullText = blockText($, contentElement);

    logger.debug(
      {
        textLength: fullText.length,
        headingCount: headings.length,
      },
      'HTML extraction completed'
    );

    return buildExtractedText('html', [fullText], {
      extractionMethod: 'cheerio',
      headings,
      title,
    });
  }
}
