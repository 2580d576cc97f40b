/**
 * RtfExtractor - Extract text from RTF documents
 *
 * A small tokenizer over RTF control words: paragraph marks become newlines, \'hh escapes are
 * decoded as CP1252, \uN escapes as UTF-16 code units, and non-text destinations (font and
 * colour tables, pictures, headers/footers, {\*...} groups) are skipped.
 */

import type { ExtractedText, SourceDocument } from '../../types/pipeline.js';
import { CorruptedDocumentError } from '../../types/errors.js';
import { decodeCp1252Byte, decodeText } from '../encoding.js';
import { buildExtractedText, type ExtractionOptions, type TextExtractor } from '../TextExtractor.js';

const SKIPPED_DESTINATIONS = new Set([
  'fonttbl', 'colortbl', 'stylesheet', 'info', 'pict', 'object', 'fldinst', 'filetbl',
  'listtable', 'listoverridetable', 'revtbl', 'rsidtbl', 'generator', 'xmlnstbl', 'themedata',
  'colorschememapping', 'datastore', 'latentstyles', 'pgdsctbl', 'bkmkstart', 'bkmkend',
  'header', 'headerl', 'headerr', 'headerf', 'footer', 'footerl', 'footerr', 'footerf',
]);

const SYMBOL_WORDS: Record<string, string> = {
  par: '\n',
  line: '\n',
  sect: '\n\n',
  row: '\n',
  cell: ' ',
  tab: '\t',
  emdash: '—',
  endash: '–',
  bullet: '•',
  lquote: '‘',
  rquote: '’',
  ldblquote: '“',
  rdblquote: '”',
};

interface GroupState {
  skip: boolean;
  /** Fallback characters that follow a \uN escape */
  unicodeSkip: number;
}

export interface RtfParseResult {
  /** Text split at \page breaks */
  pages: string[];
  unbalanced: boolean;
}

export function parseRtf(rtf: string): RtfParseResult {
  const pages: string[] = [];
  let current = '';
  const stack: GroupState[] = [];
  let state: GroupState = { skip: false, unicodeSkip: 1 };
  let pendingFallback = 0;
  let unbalanced = false;

  const emit = (value: string) => {
    if (state.skip) return;
    if (pendingFallback > 0) {
      pendingFallback--;
      return;
    }
    current += value;
  };

  let i = 0;
  while (i < rtf.length) {
    const ch = rtf[i];

    if (ch === '{') {
      stack.push(state);
      state = { ...state };
      pendingFallback = 0;
      i++;
      continue;
    }

    if (ch === '}') {
      const previous = stack.pop();
      if (previous) {
        state = previous;
      } else {
        unbalanced = true;
      }
      pendingFallback = 0;
      i++;
      continue;
    }

    if (ch === '\r' || ch === '\n') {
      i++;
      continue;
    }

    if (ch !== '\\') {
      emit(ch);
      i++;
      continue;
    }

    if (i + 1 >= rtf.length) break;
    const next = rtf[i + 1];

    if (/[a-zA-Z]/.test(next)) {
      const match = /^([a-zA-Z]+)(-?\d+)? ?/.exec(rtf.slice(i + 1, i + 40));
      if (!match) {
        i++;
        continue;
      }
      const word = match[1];
      const param = match[2] !== undefined ? parseInt(match[2], 10) : undefined;
      i += 1 + match[0].length;

      if (SKIPPED_DESTINATIONS.has(word)) {
        state.skip = true;
        continue;
      }
      if (word === 'uc' && param !== undefined) {
        state.unicodeSkip = param;
        continue;
      }
      if (word === 'u' && param !== undefined) {
        emit(String.fromCharCode(param < 0 ? param + 65536 : param));
        if (!state.skip) pendingFallback = state.unicodeSkip;
        continue;
      }
      if (word === 'page') {
        if (!state.skip) {
          pages.push(current);
          current = '';
        }
        continue;
      }
      const symbol = SYMBOL_WORDS[word];
      if (symbol !== undefined) {
        emit(symbol);
      }
      continue;
    }

    if (next === "'") {
      const hex = rtf.slice(i + 2, i + 4);
      if (/^[0-9a-fA-F]{2}$/.test(hex)) {
        emit(decodeCp1252Byte(parseInt(hex, 16)));
      }
      i += 4;
      continue;
    }

    switch (next) {
      case '*':
        state.skip = true;
        break;
      case '\\':
      case '{':
      case '}':
        emit(next);
        break;
      case '~':
        emit(' ');
        break;
      case '_':
        emit('-');
        break;
      case '\n':
      case '\r':
        emit('\n');
        break;
      default:
        // \- (optional hyphen) and unknown control symbols produce no text
        break;
    }
    i += 2;
  }

  pages.push(current);
  return { pages, unbalanced: unbalanced || stack.length > 0 };
}

export class RtfExtractor implements TextExtractor {
  readonly format = 'rtf' as const;

  async extract(source: SourceDocument, options: ExtractionOptions = {}): Promise<ExtractedText> {
    const decoded = decodeText(source.bytes, options.encodingTolerance);
    const rtf = decoded.text.replace(/^\uFEFF/, '').trimStart();

    if (!rtf.startsWith('{\\rtf')) {
      throw new CorruptedDocumentError('rtf', 'missing {\\rtf header');
    }

    const { pages, unbalanced } = parseRtf(rtf);

    return buildExtractedText('rtf', pages, {
      extractionMethod: 'rtf-tokenizer',
      encoding: decoded.encoding,
      notes: unbalanced ? ['unbalanced braces; the document may be truncated'] : undefined,
    });
  }
}
