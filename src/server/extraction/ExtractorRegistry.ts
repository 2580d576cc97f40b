/**
 * Closed registry of text extractors, one per supported format
 */

import type { DocumentFormat } from '../types/pipeline.js';
import { LegacyDocExtractor } from './doc/LegacyDocExtractor.js';
import { DocxExtractor } from './docx/DocxExtractor.js';
import { EpubExtractor } from './epub/EpubExtractor.js';
import { HtmlExtractor } from './html/HtmlExtractor.js';
import { MarkdownExtractor } from './markdown/MarkdownExtractor.js';
import { PdfExtractor } from './pdf/PdfExtractor.js';
import { RtfExtractor } from './rtf/RtfExtractor.js';
import { PlainTextExtractor } from './text/PlainTextExtractor.js';
import type { TextExtractor } from './TextExtractor.js';

export type ExtractorRegistry = Readonly<Record<DocumentFormat, TextExtractor>>;

export function createExtractorRegistry(overrides: Partial<Record<DocumentFormat, TextExtractor>> = {}): ExtractorRegistry {
  const docxExtractor = new DocxExtractor();
  const registry = {
    pdf: new PdfExtractor(),
    docx: docxExtractor,
    doc: new LegacyDocExtractor(docxExtractor),
    epub: new EpubExtractor(),
    txt: new PlainTextExtractor(),
    md: new MarkdownExtractor(),
    html: new HtmlExtractor(),
    rtf: new RtfExtractor(),
  } satisfies Record<DocumentFormat, TextExtractor>;

  return Object.freeze({ ...registry, ...overrides });
}
