/**
 * LegacyDocExtractor - best-effort text recovery from Word 97-2003 (.doc) files
 *
 * The binary format is not parsed; printable runs are recovered from both the 8-bit and the
 * UTF-16LE view of the file and the view with more letters wins. Files that are really
 * DOCX packages with a .doc name are handed to the DOCX extractor.
 */

import type { ExtractedText, SourceDocument } from '../../types/pipeline.js';
import { CorruptedDocumentError, PasswordProtectedError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { DocxExtractor } from '../docx/DocxExtractor.js';
import { hasEncryptedPackage, isEncryptedWordDocument, isOleCompoundFile, isZipArchive } from '../ole.js';
import { buildExtractedText, type TextExtractor } from '../TextExtractor.js';

const MIN_RUN_LENGTH = 20;
const EIGHT_BIT_RUN = /[\x20-\x7E\u00A0-\u00FF\r\n\t]{20,}/g;
const UTF16_RUN = /[\p{L}\p{N}\p{P}\p{S}\p{Zs}\r\n\t]{20,}/gu;

function letterCount(text: string): number {
  const letters = text.match(/\p{L}/gu);
  return letters ? letters.length : 0;
}

function isProse(run: string): boolean {
  const hexCount = (run.match(/[0-9A-Fa-f]{8,}/g) || []).length;
  return hexCount < run.length / 10 && letterCount(run) / run.length >= 0.6;
}

export function recoverPrintableRuns(bytes: Buffer): string {
  const views = [bytes.toString('latin1').match(EIGHT_BIT_RUN), bytes.toString('utf16le').match(UTF16_RUN)];

  let best = '';
  let bestLetters = 0;
  for (const runs of views) {
    const text = (runs || [])
      .map((run) => run.trim())
      .filter((run) => run.length >= MIN_RUN_LENGTH && isProse(run))
      .join('\n')
      .replace(/\r/g, '\n');
    const letters = letterCount(text);
    if (letters > bestLetters) {
      best = text;
      bestLetters = letters;
    }
  }
  return best;
}

export class LegacyDocExtractor implements TextExtractor {
  readonly format = 'doc' as const;

  constructor(private readonly docxExtractor: DocxExtractor = new DocxExtractor()) {}

  async extract(source: SourceDocument): Promise<ExtractedText> {
    if (isZipArchive(source.bytes)) {
      const extracted = await this.docxExtractor.extract(source);
      return { ...extracted, format: 'doc' };
    }

    if (!isOleCompoundFile(source.bytes)) {
      throw new CorruptedDocumentError('doc', 'not an OLE compound file');
    }
    if (hasEncryptedPackage(source.bytes) || isEncryptedWordDocument(source.bytes)) {
      throw new PasswordProtectedError('doc', { filename: source.filename });
    }

    const text = recoverPrintableRuns(source.bytes);
    if (text.trim().length === 0) {
      throw new CorruptedDocumentError('doc', 'no text could be recovered');
    }

    logger.debug({ textLength: text.length, filename: source.filename }, 'Legacy DOC text recovered');

    return buildExtractedText('doc', [text], {
      extractionMethod: 'printable-runs',
      notes: ['legacy binary format; text recovered heuristically'],
    });
  }
}
