/**
 * Document Fetcher
 *
 * Turns a DocumentReference into a SourceDocument: downloads URLs (with retries on
 * transient failures and a size cap) or wraps bytes the caller already holds.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import crypto from 'crypto';
import path from 'path';
import type { DocumentReference, SourceDocument } from '../../types/pipeline.js';
import { DocumentFetchError, getErrorMessage } from '../../types/errors.js';
import { getEnv } from '../../config/env.js';
import { logger } from '../../utils/logger.js';
import { retryWithBackoff, sleep as defaultSleep } from '../../utils/retry.js';

const DEFAULT_FILENAME = 'document';

export interface DocumentFetcherConfig {
  httpClient?: AxiosInstance;
  timeoutMs?: number;
  maxBytes?: number;
  /** Total download attempts for transient failures */
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  userAgent?: string;
}

/**
 * First 12 hex characters of the payload's MD5
 */
export function computeFileId(bytes: Uint8Array): string {
  return crypto.createHash('md5').update(bytes).digest('hex').slice(0, 12);
}

/**
 * filename*=UTF-8''... wins over filename="..."
 */
export function filenameFromContentDisposition(header: string | undefined): string | undefined {
  if (!header) return undefined;

  const extended = /filename\*\s*=\s*(?:[\w-]+)?'[^']*'([^;]+)/i.exec(header);
  if (extended) {
    try {
      const decoded = path.posix.basename(decodeURIComponent(extended[1].trim()));
      if (decoded) return decoded;
    } catch {
      // Malformed percent-encoding: try the plain parameter
    }
  }

  const plain = /filename\s*=\s*("([^"]*)"|[^;]+)/i.exec(header);
  if (plain) {
    const value = (plain[2] ?? plain[1]).trim().replace(/^['"]|['"]$/g, '');
    const name = path.posix.basename(value.replace(/\\/g, '/'));
    if (name) return name;
  }
  return undefined;
}

export function filenameFromUrl(url: string): string | undefined {
  try {
    const name = path.posix.basename(decodeURIComponent(new URL(url).pathname));
    return name || undefined;
  } catch {
    return undefined;
  }
}

function headerString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function statusOf(error: unknown): number | undefined {
  if (axios.isAxiosError(error)) return error.response?.status;
  return undefined;
}

export class DocumentFetcher {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly maxBytes: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly userAgent: string;

  constructor(config: DocumentFetcherConfig = {}) {
    const env = getEnv();
    this.http = config.httpClient ?? axios.create();
    this.timeoutMs = config.timeoutMs ?? env.FETCH_TIMEOUT_MS;
    this.maxBytes = config.maxBytes ?? env.FETCH_MAX_BYTES;
    this.maxAttempts = config.maxAttempts ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.sleep = config.sleep ?? defaultSleep;
    this.userAgent = config.userAgent ?? 'study-pipeline/0.1';
  }

  /**
   * Resolve a reference to its payload; bytes in hand win over a URL
   *
   * @throws DocumentFetchError when the reference carries neither or the download fails
   */
  async resolve(reference: DocumentReference): Promise<SourceDocument> {
    if (reference.bytes) {
      return this.fromBytes(reference.bytes, {
        filename: reference.filename ?? (reference.url ? filenameFromUrl(reference.url) : undefined),
        sourceUrl: reference.url,
        declaredFormat: reference.declaredFormat,
      });
    }
    if (reference.url) {
      const document = await this.fetch(reference.url, reference.declaredFormat);
      return reference.filename ? { ...document, filename: reference.filename } : document;
    }
    throw new DocumentFetchError(reference.id ?? '(none)', 'document reference has neither url nor bytes');
  }

  fromBytes(
    bytes: Uint8Array,
    details: { filename?: string; sourceUrl?: string; declaredFormat?: string; contentType?: string } = {}
  ): SourceDocument {
    const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return {
      fileId: computeFileId(buffer),
      filename: details.filename || DEFAULT_FILENAME,
      sourceUrl: details.sourceUrl,
      declaredFormat: details.declaredFormat,
      contentType: details.contentType,
      bytes: buffer,
      size: buffer.length,
    };
  }

  /**
   * Download a document
   */
  async fetch(url: string, declaredFormat?: string): Promise<SourceDocument> {
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await retryWithBackoff(
        () =>
          this.http.get<ArrayBuffer>(url, {
            responseType: 'arraybuffer',
            timeout: this.timeoutMs,
            maxContentLength: this.maxBytes,
            headers: { 'User-Agent': this.userAgent },
          }),
        { maxAttempts: this.maxAttempts, initialDelay: this.retryDelayMs, sleep: this.sleep },
        `download ${url}`
      );
    } catch (error) {
      const statusCode = statusOf(error);
      logger.warn({ url, statusCode, error: getErrorMessage(error) }, 'Document download failed');
      throw new DocumentFetchError(url, getErrorMessage(error), statusCode);
    }

    const bytes = Buffer.from(response.data);
    if (bytes.length > this.maxBytes) {
      throw new DocumentFetchError(url, `payload of ${bytes.length} bytes exceeds the ${this.maxBytes} byte limit`);
    }

    const filename =
      filenameFromContentDisposition(headerString(response.headers['content-disposition'])) ??
      filenameFromUrl(url) ??
      DEFAULT_FILENAME;

    logger.debug({ url, filename, size: bytes.length }, 'Document downloaded');

    return this.fromBytes(bytes, {
      filename,
      sourceUrl: url,
      declaredFormat,
      contentType: headerString(response.headers['content-type']),
    });
  }
}
