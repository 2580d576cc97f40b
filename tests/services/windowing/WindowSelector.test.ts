import { describe, it, expect } from 'vitest';
import { SEGMENT_SEPARATOR, WindowSelector } from '../../../src/server/services/windowing/WindowSelector.js';
import { ContentNormalizer } from '../../../src/server/services/normalization/ContentNormalizer.js';

const repeated = (count: number) => 'alpha '.repeat(count).trim();

describe('WindowSelector', () => {
  it('sends text within the budget whole', () => {
    const window = new WindowSelector({ budget: 1000 }).select('Short text.');
    expect(window.text).toBe('Short text.');
    expect(window.strategy).toBe('full');
    expect(window.coverageRatio).toBe(1);
    expect(window.segments).toEqual([{ start: 0, end: 11 }]);
  });

  it('accepts normalized text', () => {
    const normalized = new ContentNormalizer({ minWords: 1 }).normalize('Cells   divide.');
    expect(new WindowSelector().select(normalized).text).toBe('Cells divide.');
  });

  it('cuts a prefix back to the last word boundary', () => {
    const text = repeated(300);
    const window = new WindowSelector({ budget: 1000, strategy: 'prefix' }).select(text);
    expect(window.strategy).toBe('prefix');
    expect(window.text).toHaveLength(995);
    expect(window.text.endsWith('alpha')).toBe(true);
    expect(window.sourceLength).toBe(text.length);
    expect(window.segments).toEqual([{ start: 0, end: 995 }]);
  });

  it('samples evenly spaced word-aligned segments', () => {
    const text = repeated(1000);
    const window = new WindowSelector({ budget: 1000 }).select(text);

    expect(window.strategy).toBe('distributed');
    expect(window.segments).toHaveLength(5);
    expect(window.text.length).toBeLessThanOrEqual(1000);

    const parts = window.text.split(SEGMENT_SEPARATOR);
    expect(parts).toHaveLength(5);
    for (const part of parts) {
      expect(part.length).toBeLessThanOrEqual(192);
      expect(part.startsWith('alpha')).toBe(true);
      expect(part.endsWith('alpha')).toBe(true);
    }

    expect(window.segments[0].start).toBe(0);
    expect(window.segments[4].end).toBe(text.length);
    window.segments.forEach((segment, i) => {
      expect(text.slice(segment.start, segment.end)).toBe(parts[i]);
    });
  });

  it('limits the segment count to what the budget can hold', () => {
    const window = new WindowSelector({ budget: 1000, segments: 20 }).select(repeated(1000));
    expect(window.segments).toHaveLength(9);
  });

  it('falls back to a prefix when the budget fits only one segment', () => {
    const window = new WindowSelector({ budget: 150 }).select(repeated(100));
    expect(window.strategy).toBe('prefix');
    expect(window.text.length).toBeLessThanOrEqual(150);
  });
});
