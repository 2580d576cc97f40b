/**
 * TextExtractor - contract shared by the per-format extractors
 *
 * Each supported format has exactly one extractor; the registry maps format tags to them.
 * Extraction is pure: the same bytes always produce the same ExtractedText.
 */

import type { DocumentFormat, ExtractedText, ExtractionDiagnostics, SourceDocument } from '../types/pipeline.js';

export interface ExtractionOptions {
  /** Highest acceptable share of corrupt characters when decoding text formats */
  encodingTolerance?: number;
}

export interface TextExtractor {
  readonly format: DocumentFormat;
  extract(source: SourceDocument, options?: ExtractionOptions): Promise<ExtractedText>;
}

export function countWords(text: string): number {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  return words.length;
}

/**
 * Assemble an ExtractedText from page (or chapter) texts
 */
export function buildExtractedText(
  format: DocumentFormat,
  pages: string[],
  details: {
    extractionMethod: string;
    headings?: string[];
    title?: string;
    encoding?: string;
    notes?: string[];
  }
): ExtractedText {
  const trimmedPages = pages.map((page) => page.trim());
  const text = trimmedPages.join('\n\n');
  const diagnostics: ExtractionDiagnostics = {
    extractionMethod: details.extractionMethod,
    pageCount: trimmedPages.length,
  };
  if (details.notes && details.notes.length > 0) {
    diagnostics.notes = details.notes;
  }

  return {
    format,
    text,
    pages: trimmedPages,
    headings: details.headings ?? [],
    title: details.title || undefined,
    encoding: details.encoding,
    wordCount: countWords(text),
    charCount: text.length,
    diagnostics,
  };
}
