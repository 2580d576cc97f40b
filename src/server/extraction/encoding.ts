/**
 * Text decoding with legacy-encoding fallback
 *
 * Candidates are tried in order (UTF-8, Latin-1, CP1252). The first one that decodes without
 * corrupt characters wins; failing that, the first whose share of corrupt characters stays
 * within the tolerance. Corrupt means the
 * replacement character, C0 controls other than tab/newline/carriage return/form feed, and
 * C1 controls (which show up when CP1252 bytes are read as Latin-1).
 */

import { EncodingUndeterminedError } from '../types/errors.js';

export type TextEncodingName = 'utf-8' | 'utf-16le' | 'utf-16be' | 'latin1' | 'windows-1252';

export interface DecodedText {
  text: string;
  encoding: TextEncodingName;
  corruptRatio: number;
}

export const DEFAULT_ENCODING_TOLERANCE = 0.001;

const FALLBACK_ENCODINGS: readonly TextEncodingName[] = ['utf-8', 'latin1', 'windows-1252'];

const CORRUPT_CHARS = /[\uFFFD\u0000-\u0008\u000B\u000E-\u001F\u007F-\u009F]/g;

export function corruptCharRatio(text: string): number {
  if (text.length === 0) return 0;
  const matches = text.match(CORRUPT_CHARS);
  return matches ? matches.length / text.length : 0;
}

function decodeAs(bytes: Uint8Array, encoding: TextEncodingName): string {
  if (encoding === 'latin1') {
    // WHATWG maps the latin1 label to windows-1252, Buffer keeps true ISO-8859-1
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
  }
  return new TextDecoder(encoding, { fatal: false, ignoreBOM: false }).decode(bytes);
}

function detectBom(bytes: Uint8Array): TextEncodingName | null {
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return 'utf-8';
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';
  return null;
}

/**
 * Decode bytes to text, falling back through legacy encodings
 *
 * @param tolerance - Highest acceptable share of corrupt characters (0.001 = 0.1%)
 * @throws EncodingUndeterminedError when no candidate decodes cleanly
 */
export function decodeText(bytes: Uint8Array, tolerance: number = DEFAULT_ENCODING_TOLERANCE): DecodedText {
  const bom = detectBom(bytes);
  const candidates = bom ? [bom] : FALLBACK_ENCODINGS;

  const decoded = candidates.map((encoding): DecodedText => {
    const text = decodeAs(bytes, encoding);
    return { text, encoding, corruptRatio: corruptCharRatio(text) };
  });

  // A clean decode beats an earlier candidate that is only within tolerance
  const chosen =
    decoded.find((candidate) => candidate.corruptRatio === 0) ??
    decoded.find((candidate) => candidate.corruptRatio <= tolerance);
  if (chosen) return chosen;

  throw new EncodingUndeterminedError([...candidates]);
}

/**
 * Decode a single CP1252 byte (used for RTF \'hh escapes)
 */
export function decodeCp1252Byte(byte: number): string {
  return new TextDecoder('windows-1252').decode(Uint8Array.of(byte));
}
