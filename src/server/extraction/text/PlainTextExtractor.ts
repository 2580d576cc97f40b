import type { ExtractedText, SourceDocument } from '../../types/pipeline.js';
import { decodeText } from '../encoding.js';
import { buildExtractedText, type ExtractionOptions, type TextExtractor } from '../TextExtractor.js';

/**
 * PlainTextExtractor - decode only; form feeds mark page boundaries
 */
export class PlainTextExtractor implements TextExtractor {
  readonly format = 'txt' as const;

  async extract(source: SourceDocument, options: ExtractionOptions = {}): Promise<ExtractedText> {
    const decoded = decodeText(source.bytes, options.encodingTolerance);
    const pages = decoded.text.split('\f');

    return buildExtractedText('txt', pages, {
      extractionMethod: 'decode',
      encoding: decoded.encoding,
    });
  }
}
