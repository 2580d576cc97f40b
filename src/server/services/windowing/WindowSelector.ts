/**
 * Window Selector
 *
 * Picks the slice of normalized text sent to the generation service. Text within the
 * budget is sent whole; longer text is cut to a prefix or sampled as evenly spaced,
 * word-aligned segments so later chapters are represented too.
 */

import type { GenerationWindow, NormalizedText, WindowSegment, WindowStrategy } from '../../types/pipeline.js';
import { logger } from '../../utils/logger.js';

export const SEGMENT_SEPARATOR = '\n\n[...]\n\n';
export const DEFAULT_CONTEXT_BUDGET = 15000;
export const DEFAULT_WINDOW_SEGMENTS = 5;

/** Shortest segment worth sampling */
const MIN_SEGMENT_CHARS = 100;
/** A prefix cut back to a word boundary must keep at least this share of the budget */
const PREFIX_WORD_BOUNDARY_RATIO = 0.9;

export interface WindowSelectorConfig {
  budget?: number;
  strategy?: Exclude<WindowStrategy, 'full'>;
  segments?: number;
}

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

function lastWhitespaceBefore(text: string, from: number, to: number): number {
  for (let i = to - 1; i > from; i--) {
    if (isWhitespace(text[i])) return i;
  }
  return -1;
}

function firstWhitespaceAfter(text: string, from: number, to: number): number {
  for (let i = from; i < to; i++) {
    if (isWhitespace(text[i])) return i;
  }
  return -1;
}

export class WindowSelector {
  private readonly budget: number;
  private readonly strategy: Exclude<WindowStrategy, 'full'>;
  private readonly segments: number;

  constructor(config: WindowSelectorConfig = {}) {
    this.budget = config.budget ?? DEFAULT_CONTEXT_BUDGET;
    this.strategy = config.strategy ?? 'distributed';
    this.segments = config.segments ?? DEFAULT_WINDOW_SEGMENTS;
  }

  select(input: NormalizedText | string): GenerationWindow {
    const text = typeof input === 'string' ? input : input.text;

    let window: GenerationWindow;
    if (text.length <= this.budget) {
      window = this.build(text, 'full', [{ start: 0, end: text.length }], text.length);
    } else if (this.strategy === 'prefix' || this.segmentCount() < 2) {
      window = this.prefix(text);
    } else {
      window = this.distributed(text);
    }

    logger.debug(
      {
        strategy: window.strategy,
        sourceLength: window.sourceLength,
        windowLength: window.text.length,
        segments: window.segments.length,
      },
      'Generation window selected'
    );
    return window;
  }

  private segmentCount(): number {
    const fitting = Math.floor((this.budget + SEGMENT_SEPARATOR.length) / (MIN_SEGMENT_CHARS + SEGMENT_SEPARATOR.length));
    return Math.max(1, Math.min(this.segments, fitting));
  }

  private prefix(text: string): GenerationWindow {
    let end = this.budget;
    if (!isWhitespace(text[end])) {
      const boundary = lastWhitespaceBefore(text, 0, end);
      if (boundary >= Math.floor(this.budget * PREFIX_WORD_BOUNDARY_RATIO)) {
        end = boundary;
      }
    }
    const slice = text.slice(0, end).trimEnd();
    return this.build(slice, 'prefix', [{ start: 0, end: slice.length }], text.length);
  }

  private distributed(text: string): GenerationWindow {
    const count = this.segmentCount();
    const segmentLength = Math.floor((this.budget - (count - 1) * SEGMENT_SEPARATOR.length) / count);
    const stride = (text.length - segmentLength) / (count - 1);

    const segments: WindowSegment[] = [];
    const parts: string[] = [];
    for (let i = 0; i < count; i++) {
      let start = Math.floor(i * stride);
      let end = start + segmentLength;

      // Start on a word: skip the tail of a word cut at the segment start
      if (start > 0 && !isWhitespace(text[start - 1])) {
        const boundary = firstWhitespaceAfter(text, start, end);
        if (boundary >= 0) start = boundary + 1;
      }
      // End on a word: drop a word cut at the segment end
      if (end < text.length && !isWhitespace(text[end])) {
        const boundary = lastWhitespaceBefore(text, start, end);
        if (boundary > start) end = boundary;
      }

      const raw = text.slice(start, end);
      const part = raw.trim();
      if (part.length === 0) continue;

      const leading = raw.length - raw.trimStart().length;
      segments.push({ start: start + leading, end: start + leading + part.length });
      parts.push(part);
    }

    return this.build(parts.join(SEGMENT_SEPARATOR), 'distributed', segments, text.length);
  }

  private build(
    windowText: string,
    strategy: WindowStrategy,
    segments: WindowSegment[],
    sourceLength: number
  ): GenerationWindow {
    const coveredChars = segments.reduce((total, segment) => total + (segment.end - segment.start), 0);
    return {
      text: windowText,
      strategy,
      budget: this.budget,
      sourceLength,
      coveredChars,
      coverageRatio: sourceLength === 0 ? 1 : coveredChars / sourceLength,
      segments,
    };
  }
}
