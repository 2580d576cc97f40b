/**
 * DocxExtractor - Extract text from DOCX documents
 *
 * Converts the document to HTML with mammoth, then walks paragraphs and headings.
 */

import mammoth from 'mammoth';
import * as cheerio from 'cheerio';
import type { ExtractedText, SourceDocument } from '../../types/pipeline.js';
import { CorruptedDocumentError, PasswordProtectedError, getErrorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { blockText, collectHeadings } from '../html/htmlText.js';
import { hasEncryptedPackage, isOleCompoundFile } from '../ole.js';
import { buildExtractedText, type TextExtractor } from '../TextExtractor.js';

/**
 * DocxExtractor - Extract text from DOCX
 */
export class DocxExtractor implements TextExtractor {
  readonly format = 'docx' as const;

  async extract(source: SourceDocument): Promise<ExtractedText> {
    if (hasEncryptedPackage(source.bytes)) {
      throw new PasswordProtectedError('docx', { filename: source.filename });
    }
    if (isOleCompoundFile(source.bytes)) {
      throw new CorruptedDocumentError('docx', 'legacy OLE container, not an Office Open XML package');
    }

    let html: string;
    let messages: string[];
    try {
      const result = await mammoth.convertToHtml({ buffer: source.bytes });
      html = result.value || '';
      messages = result.messages.map((message) => message.message);
    } catch (error) {
      logger.error({ error, filename: source.filename }, 'DOCX extraction failed');
      throw new CorruptedDocumentError('docx', getErrorMessage(error));
    }

    const $ = cheerio.load(html);
    const body = $('body');
    const headings = collectHeadings($, body);
    const fullText = blockText($, body);

    logger.debug(
      {
        textLength: fullText.length,
        headingCount: headings.length,
        warnings: messages.length,
      },
      'DOCX extraction completed'
    );

    return buildExtractedText('docx', [fullText], {
      extractionMethod: 'mammoth',
      headings,
      title: headings[0],
      notes: messages.slice(0, 10),
    });
  }
}
