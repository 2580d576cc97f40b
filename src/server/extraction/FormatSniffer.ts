/**
 * Document format detection
 *
 * Pure functions for picking a format tag from the filename suffix, the payload's
 * signature, or a declared default, in that order.
 *
 * Rules:
 * - Known suffix (.pdf, .docx, ...) → that format
 * - %PDF- / {\rtf / ZIP container markers / OLE streams / <html → detected format
 * - Declared default → that format, with a FORMAT_ASSUMED warning
 * - Otherwise → UnsupportedFormatError carrying the attempted tag
 */

import path from 'path';
import { isDocumentFormat, type DocumentFormat } from '../types/pipeline.js';
import { UnsupportedFormatError } from '../types/errors.js';
import { containsStreamName, hasEncryptedPackage, isOleCompoundFile, isZipArchive } from './ole.js';

export type DetectionMethod = 'suffix' | 'signature' | 'declared';

export interface FormatDetection {
  format: DocumentFormat;
  method: DetectionMethod;
  /** Tag that was tried and rejected before this one (an unknown suffix, for instance) */
  attempted?: string;
  warnings: string[];
}

export interface SniffInput {
  bytes: Uint8Array;
  filename?: string;
  sourceUrl?: string;
  declaredFormat?: string;
}

const SUFFIX_FORMATS: Record<string, DocumentFormat> = {
  pdf: 'pdf',
  docx: 'docx',
  doc: 'doc',
  epub: 'epub',
  txt: 'txt',
  text: 'txt',
  md: 'md',
  markdown: 'md',
  html: 'html',
  htm: 'html',
  xhtml: 'html',
  rtf: 'rtf',
};

const PROBE_LENGTH = 1024;

/**
 * Lower-cased suffix of the filename, else of the URL path
 */
export function fileSuffix(filename?: string, sourceUrl?: string): string | undefined {
  const candidates: string[] = [];
  if (filename) candidates.push(filename);
  if (sourceUrl) {
    try {
      candidates.push(decodeURIComponent(new URL(sourceUrl).pathname));
    } catch {
      candidates.push(sourceUrl.split(/[?#]/)[0]);
    }
  }

  for (const candidate of candidates) {
    const ext = path.posix.extname(candidate.trim()).slice(1).toLowerCase();
    if (ext) return ext;
  }
  return undefined;
}

export function detectFormatFromSuffix(suffix: string | undefined): DocumentFormat | undefined {
  if (!suffix) return undefined;
  return Object.prototype.hasOwnProperty.call(SUFFIX_FORMATS, suffix) ? SUFFIX_FORMATS[suffix] : undefined;
}

/**
 * Probe magic bytes and container markers
 */
export function detectFormatFromContent(bytes: Uint8Array): DocumentFormat | undefined {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const head = buffer.toString('latin1', 0, Math.min(PROBE_LENGTH, buffer.length));
  const start = head.replace(/^(\uFEFF|\u00EF\u00BB\u00BF)/, '').trimStart();

  if (start.startsWith('%PDF-')) return 'pdf';
  if (start.startsWith('{\\rtf')) return 'rtf';

  if (isZipArchive(buffer)) {
    // The EPUB mimetype entry is stored first and uncompressed; central directory names are plain ASCII
    if (head.includes('mimetypeapplication/epub+zip') || buffer.includes('META-INF/container.xml')) {
      return 'epub';
    }
    if (buffer.includes('word/document.xml')) return 'docx';
    return undefined;
  }

  if (isOleCompoundFile(buffer)) {
    if (hasEncryptedPackage(buffer)) return 'docx';
    if (containsStreamName(buffer, 'WordDocument')) return 'doc';
    return undefined;
  }

  const lower = start.toLowerCase();
  if (lower.startsWith('<!doctype html') || lower.startsWith('<html')) return 'html';
  return undefined;
}

/**
 * Select the format for a payload
 *
 * @param defaultFormat - Fallback when the reference declares nothing
 * @throws UnsupportedFormatError when no rule matches
 */
export function sniffFormat(input: SniffInput, defaultFormat?: DocumentFormat): FormatDetection {
  const suffix = fileSuffix(input.filename, input.sourceUrl);
  const bySuffix = detectFormatFromSuffix(suffix);
  if (bySuffix) {
    return { format: bySuffix, method: 'suffix', warnings: [] };
  }
  const attemptedSuffix = suffix ? `.${suffix}` : undefined;

  const bySignature = detectFormatFromContent(input.bytes);
  if (bySignature) {
    return { format: bySignature, method: 'signature', attempted: attemptedSuffix, warnings: [] };
  }

  const declared = input.declaredFormat?.trim().toLowerCase().replace(/^\./, '');
  if (declared) {
    if (!isDocumentFormat(declared)) {
      throw new UnsupportedFormatError(declared, { filename: input.filename });
    }
    return {
      format: declared,
      method: 'declared',
      attempted: attemptedSuffix,
      warnings: [`Format could not be detected; assuming declared format "${declared}"`],
    };
  }

  if (defaultFormat) {
    return {
      format: defaultFormat,
      method: 'declared',
      attempted: attemptedSuffix,
      warnings: [`Format could not be detected; assuming default format "${defaultFormat}"`],
    };
  }

  throw new UnsupportedFormatError(attemptedSuffix ?? 'unknown', { filename: input.filename });
}
