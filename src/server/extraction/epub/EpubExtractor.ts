/**
 * EpubExtractor - Extract text from EPUB books
 *
 * container.xml -> package document (OPF) -> spine order -> XHTML chapters.
 * Each chapter becomes one page of the extracted text.
 */

import JSZip from 'jszip';
import * as cheerio from 'cheerio';
import path from 'path';
import type { ExtractedText, SourceDocument } from '../../types/pipeline.js';
import { CorruptedDocumentError, PasswordProtectedError, getErrorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { blockText, collectHeadings } from '../html/htmlText.js';
import { buildExtractedText, type TextExtractor } from '../TextExtractor.js';

/** Font obfuscation algorithms; these do not hide any text */
const FONT_OBFUSCATION_ALGORITHMS = new Set([
  'http://www.idpf.org/2008/embedding',
  'http://ns.adobe.com/pdf/enc#RC',
]);

const CHAPTER_MEDIA_TYPES = new Set(['application/xhtml+xml', 'text/html', 'application/x-dtbook+xml']);

interface ManifestItem {
  href: string;
  mediaType: string;
}

export interface EpubPackage {
  title?: string;
  /** Chapter paths inside the archive, in reading order */
  chapterPaths: string[];
}

export class EpubExtractor implements TextExtractor {
  readonly format = 'epub' as const;

  async extract(source: SourceDocument): Promise<ExtractedText> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(source.bytes);
    } catch (error) {
      throw new CorruptedDocumentError('epub', `invalid ZIP container: ${getErrorMessage(error)}`);
    }

    await this.assertNotEncrypted(zip);

    const pkg = await this.readPackage(zip);
    const pages: string[] = [];
    const headings: string[] = [];
    const notes: string[] = [];

    for (const chapterPath of pkg.chapterPaths) {
      const file = zip.file(chapterPath);
      if (!file) {
        notes.push(`missing spine item ${chapterPath}`);
        continue;
      }
      const $ = cheerio.load(await file.async('string'));
      $('script, style, noscript').remove();
      const body = $('body');
      headings.push(...collectHeadings($, body));
      pages.push(blockText($, body));
    }

    if (pages.length === 0) {
      throw new CorruptedDocumentError('epub', 'spine contains no readable chapters');
    }

    logger.debug(
      { chapterCount: pages.length, headingCount: headings.length, filename: source.filename },
      'EPUB extraction completed'
    );

    return buildExtractedText('epub', pages, {
      extractionMethod: 'jszip+cheerio',
      headings,
      title: pkg.title,
      notes,
    });
  }

  /**
   * DRM-protected books list their content documents in META-INF/encryption.xml
   */
  private async assertNotEncrypted(zip: JSZip): Promise<void> {
    const encryption = zip.file('META-INF/encryption.xml');
    if (!encryption) return;

    const $ = cheerio.load(await encryption.async('string'), { xml: true });
    let protectedEntries = 0;
    $('*').each((_, el) => {
      if (el.type !== 'tag' || !/(^|:)EncryptionMethod$/.test(el.name)) return;
      const algorithm = $(el).attr('Algorithm') || '';
      if (!FONT_OBFUSCATION_ALGORITHMS.has(algorithm)) {
        protectedEntries++;
      }
    });

    if (protectedEntries > 0) {
      throw new PasswordProtectedError('epub', { encryptedEntries: protectedEntries });
    }
  }

  private async readPackage(zip: JSZip): Promise<EpubPackage> {
    const container = zip.file('META-INF/container.xml');
    if (!container) {
      throw new CorruptedDocumentError('epub', 'META-INF/container.xml is missing');
    }

    const $container = cheerio.load(await container.async('string'), { xml: true });
    const opfPath = $container('rootfile').first().attr('full-path');
    if (!opfPath) {
      throw new CorruptedDocumentError('epub', 'container.xml names no package document');
    }

    const opfFile = zip.file(opfPath);
    if (!opfFile) {
      throw new CorruptedDocumentError('epub', `package document ${opfPath} is missing`);
    }

    const $ = cheerio.load(await opfFile.async('string'), { xml: true });
    const baseDir = path.posix.dirname(opfPath);

    const manifest = new Map<string, ManifestItem>();
    $('manifest > item, opf\\:manifest > opf\\:item').each((_, el) => {
      const id = $(el).attr('id');
      const href = $(el).attr('href');
      if (id && href) {
        manifest.set(id, { href, mediaType: $(el).attr('media-type') || '' });
      }
    });

    const chapterPaths: string[] = [];
    $('spine > itemref, opf\\:spine > opf\\:itemref').each((_, el) => {
      const item = manifest.get($(el).attr('idref') || '');
      if (item && CHAPTER_MEDIA_TYPES.has(item.mediaType)) {
        chapterPaths.push(resolveHref(baseDir, item.href));
      }
    });

    if (chapterPaths.length === 0) {
      throw new CorruptedDocumentError('epub', 'spine is empty');
    }

    const title = $('dc\\:title').first().text().trim() || $('title').first().text().trim();
    return { title: title || undefined, chapterPaths };
  }
}

function resolveHref(baseDir: string, href: string): string {
  const withoutFragment = href.split('#')[0];
  let decoded = withoutFragment;
  try {
    decoded = decodeURIComponent(withoutFragment);
  } catch {
    // Malformed escapes: use the href as written
  }
  const joined = baseDir === '.' ? decoded : path.posix.join(baseDir, decoded);
  return path.posix.normalize(joined);
}
