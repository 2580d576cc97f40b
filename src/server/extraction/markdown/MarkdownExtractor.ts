/**
 * MarkdownExtractor - Extract text from Markdown documents
 *
 * Markdown is already mostly prose; this removes the syntax that would otherwise leak into
 * prompts (fences, emphasis markers, link targets, images, tables, inline HTML).
 */

import type { ExtractedText, SourceDocument } from '../../types/pipeline.js';
import { decodeText } from '../encoding.js';
import { buildExtractedText, type ExtractionOptions, type TextExtractor } from '../TextExtractor.js';

const HEADING = /^ {0,3}(#{1,6})[ \t]+(.+?)[ \t#]*$/;
const SETEXT_UNDERLINE = /^ {0,3}(=+|-+)[ \t]*$/;

export function stripMarkdown(markdown: string): { text: string; headings: string[] } {
  const headings: string[] = [];
  const output: string[] = [];
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n');
  let inFence = false;

  for (let i = 0; i < lines.length; i++) {
    let line = lines[i];

    if (/^ {0,3}(```|~~~)/.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) {
      output.push(line);
      continue;
    }

    const heading = HEADING.exec(line);
    if (heading) {
      headings.push(heading[2]);
      output.push(heading[2]);
      continue;
    }

    // Setext headings: a text line followed by === or ---
    if (line.trim().length > 0 && i + 1 < lines.length && SETEXT_UNDERLINE.test(lines[i + 1])) {
      headings.push(line.trim());
      output.push(line.trim());
      i++;
      continue;
    }

    // Horizontal rules and table separator rows
    if (/^ {0,3}([-*_])( *\1){2,} *$/.test(line) || /^\s*\|?\s*:?-{3,}:?\s*(\|\s*:?-{3,}:?\s*)*\|?\s*$/.test(line)) {
      continue;
    }

    line = line
      .replace(/^ {0,3}>\s?/, '')
      .replace(/^(\s*)([-*+]|\d+[.)])\s+\[[ xX]\]\s+/, '$1')
      .replace(/^(\s*)[-*+]\s+/, '$1')
      .replace(/!\[([^\]]*)\]\([^)]*\)/g, '$1')
      .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
      .replace(/\[([^\]]+)\]\[[^\]]*\]/g, '$1')
      .replace(/^\s*\[[^\]]+\]:\s+\S+.*$/, '')
      .replace(/<\/?[a-zA-Z][^>]*>/g, '')
      .replace(/(`+)(.+?)\1/g, '$2')
      .replace(/\*\*(?=\S)(.+?)(?<=\S)\*\*/g, '$1')
      .replace(/\*(?=\S)(.+?)(?<=\S)\*/g, '$1')
      // underscores only count at word edges, so snake_case survives
      .replace(/(^|\W)__(?=\S)(.+?)(?<=\S)__(?!\w)/g, '$1$2')
      .replace(/(^|\W)_(?=\S)(.+?)(?<=\S)_(?!\w)/g, '$1$2')
      .replace(/~~(.+?)~~/g, '$1');

    if (/^\s*\|.*\|\s*$/.test(line)) {
      line = line
        .replace(/^\s*\|/, '')
        .replace(/\|\s*$/, '')
        .split('|')
        .map((cell) => cell.trim())
        .join('  ');
    }

    output.push(line);
  }

  return { text: output.join('\n'), headings };
}

export class MarkdownExtractor implements TextExtractor {
  readonly format = 'md' as const;

  async extract(source: SourceDocument, options: ExtractionOptions = {}): Promise<ExtractedText> {
    const decoded = decodeText(source.bytes, options.encodingTolerance);
    const { text, headings } = stripMarkdown(decoded.text);

    return buildExtractedText('md', [text], {
      extractionMethod: 'markdown-strip',
      headings,
      title: headings[0],
      encoding: decoded.encoding,
    });
  }
}
