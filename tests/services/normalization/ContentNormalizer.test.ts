import { describe, it, expect } from 'vitest';
import {
  ContentNormalizer,
  collapseWhitespace,
  dehyphenate,
  removeRepeatedEdgeLines,
  stripInvisible,
} from '../../../src/server/services/normalization/ContentNormalizer.js';
import { buildExtractedText } from '../../../src/server/extraction/TextExtractor.js';
import { prose } from '../../helpers/fixtures.js';

describe('stripInvisible', () => {
  it('normalizes line endings and odd spaces and drops invisible characters', () => {
    expect(stripInvisible('a\r\nb\rc\fd')).toBe('a\nb\nc\nd');
    expect(stripInvisible('no\u00A0break\u2009thin')).toBe('no break thin');
    expect(stripInvisible('zero\u200Bwidth\u00ADsoft\uFEFF')).toBe('zerowidthsoft');
  });
});

describe('collapseWhitespace', () => {
  it('collapses runs of spaces and blank lines and trims every line', () => {
    expect(collapseWhitespace('  one   two \t three  \n\n\n\n  four  ')).toBe('one two three\n\nfour');
  });
});

describe('dehyphenate', () => {
  it('joins words split across lines only when the continuation is lower case', () => {
    expect(dehyphenate('The exam-\nple of Anglo-\nSaxon words')).toBe('The example of Anglo-\nSaxon words');
  });
});

describe('removeRepeatedEdgeLines', () => {
  it('removes running headers and page-number footers', () => {
    const bodies = ['Mitochondria produce energy.', 'Ribosomes build proteins.', 'Chloroplasts capture light.', 'Nuclei store genes.'];
    const pages = bodies.map((body, i) => `Biology Course Reader\n${body}\nPage ${i + 1} of 4`);

    const result = removeRepeatedEdgeLines(pages);
    expect(result.pages).toEqual(bodies);
    expect(result.removed).toBe(8);
  });

  it('leaves repeated lines alone when there are too few pages to tell', () => {
    const result = removeRepeatedEdgeLines(['Header\nFirst body', 'Header\nSecond body']);
    expect(result.pages).toEqual(['Header\nFirst body', 'Header\nSecond body']);
    expect(result.removed).toBe(0);
  });

  it('removes standalone page numbers anywhere', () => {
    const result = removeRepeatedEdgeLines(['Intro text\n12\nMore text\n- 13 -']);
    expect(result.pages).toEqual(['Intro text\nMore text']);
    expect(result.removed).toBe(2);
  });
});

describe('ContentNormalizer', () => {
  it('normalizes a plain string as a single page', () => {
    const normalized = new ContentNormalizer({ minWords: 3 }).normalize('Hello\u00A0world\u200B!  \r\n\r\n\r\n\r\nNext   line');
    expect(normalized.text).toBe('Hello world!\n\nNext line');
    expect(normalized.wordCount).toBe(4);
    expect(normalized.charCount).toBe(normalized.text.length);
    expect(normalized.quality).toBe('ok');
  });

  it('cleans extracted pages and joins them with blank lines', () => {
    const bodies = ['Mitochondria produce energy.', 'Ribosomes build proteins.', 'Chloroplasts capture light.', 'Nuclei store genes.'];
    const extracted = buildExtractedText(
      'pdf',
      bodies.map((body, i) => `Biology Course Reader\n${body}\n${i + 1}`),
      { extractionMethod: 'test' }
    );

    const normalized = new ContentNormalizer({ minWords: 1 }).normalize(extracted);
    expect(normalized.text).toBe(bodies.join('\n\n'));
    expect(normalized.removedLines).toBe(8);
  });

  it('flags text below the word minimum as insufficient', () => {
    const normalized = new ContentNormalizer().normalize(prose(200));
    expect(normalized.wordCount).toBe(200);
    expect(normalized.minWords).toBe(500);
    expect(normalized.quality).toBe('insufficient');
  });

  it('is idempotent and never lengthens the text', () => {
    const messy = '  Chapter 1 \u00A0 Intro\r\n\r\n\r\nThe photo-\nsynthesis   step\u200B happens \tin leaves.\n\n\n7\n';
    const normalizer = new ContentNormalizer({ minWords: 1 });

    const once = normalizer.normalize(messy);
    const twice = normalizer.normalize(once.text);
    expect(twice.text).toBe(once.text);
    expect(once.text.length).toBeLessThanOrEqual(messy.length);
    expect(once.text).toBe('Chapter 1 Intro\n\nThe photosynthesis step happens in leaves.');
  });

  it('returns empty text for whitespace-only input', () => {
    const normalized = new ContentNormalizer().normalize(' \n\t\u200B ');
    expect(normalized.text).toBe('');
    expect(normalized.wordCount).toBe(0);
    expect(normalized.quality).toBe('insufficient');
  });
});
