/**
 * PdfExtractor - Extract text from PDF documents
 *
 * Reads the text layer page by page with pdfjs-dist. Encrypted documents surface as
 * PasswordProtectedError, unreadable ones as CorruptedDocumentError.
 */

import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { ExtractedText, SourceDocument } from '../../types/pipeline.js';
import { CorruptedDocumentError, PasswordProtectedError, getErrorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { buildExtractedText, type TextExtractor } from '../TextExtractor.js';

/**
 * PdfExtractor - Extract text from PDF
 */
export class PdfExtractor implements TextExtractor {
  readonly format = 'pdf' as const;
  private readonly minTextPerPage: number; // Below this a page probably has no text layer

  constructor(config: { minTextPerPage?: number } = {}) {
    this.minTextPerPage = config.minTextPerPage || 50;
  }

  async extract(source: SourceDocument): Promise<ExtractedText> {
    const loadingTask = pdfjsLib.getDocument({
      data: new Uint8Array(source.bytes),
      isEvalSupported: false,
      disableFontFace: true,
      verbosity: 0, // Suppress warnings
    });

    let pdfDocument: Awaited<typeof loadingTask.promise>;
    try {
      pdfDocument = await loadingTask.promise;
    } catch (error) {
      await loadingTask.destroy();
      if (error instanceof Error && error.name === 'PasswordException') {
        throw new PasswordProtectedError('pdf', { filename: source.filename });
      }
      logger.error({ error, filename: source.filename }, 'PDF could not be opened');
      throw new CorruptedDocumentError('pdf', getErrorMessage(error));
    }

    try {
      const pages: string[] = [];
      for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
        const page = await pdfDocument.getPage(pageNum);
        const content = await page.getTextContent();
        let pageText = '';
        for (const item of content.items) {
          if ('str' in item) {
            pageText += item.str;
            if (item.hasEOL) pageText += '\n';
          }
        }
        pages.push(pageText);
        page.cleanup();
      }

      const title = await this.readTitle(pdfDocument);
      const textLength = pages.reduce((total, page) => total + page.trim().length, 0);
      const isScanned = pages.length > 0 && textLength / pages.length < this.minTextPerPage;

      logger.debug(
        { pageCount: pages.length, textLength, isScanned, filename: source.filename },
        'PDF extraction completed'
      );

      return buildExtractedText('pdf', pages, {
        extractionMethod: 'pdfjs-dist',
        title,
        notes: isScanned ? ['little or no text layer; the PDF may be scanned'] : undefined,
      });
    } catch (error) {
      logger.error({ error, filename: source.filename }, 'PDF extraction failed');
      throw new CorruptedDocumentError('pdf', getErrorMessage(error));
    } finally {
      await pdfDocument.destroy();
    }
  }

  private async readTitle(pdfDocument: { getMetadata(): Promise<{ info: unknown }> }): Promise<string | undefined> {
    try {
      const { info } = await pdfDocument.getMetadata();
      if (typeof info === 'object' && info !== null && 'Title' in info && typeof info.Title === 'string' && info.Title.trim().length > 0) {
        return info.Title.trim();
      }
    } catch (error) {
      logger.debug({ error }, 'PDF metadata unavailable');
    }
    return undefined;
  }
}
