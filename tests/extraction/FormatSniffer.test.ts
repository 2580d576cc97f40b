import { describe, it, expect } from 'vitest';
import { fileSuffix, sniffFormat } from '../../src/server/extraction/FormatSniffer.js';
import { UnsupportedFormatError } from '../../src/server/types/errors.js';
import { buildDocx, buildEpub, buildOleFile } from '../helpers/fixtures.js';

const text = (value: string) => Buffer.from(value, 'utf-8');

describe('fileSuffix', () => {
  it('prefers the filename and falls back to the URL path', () => {
    expect(fileSuffix('Notes.PDF', 'https://example.com/x.docx')).toBe('pdf');
    expect(fileSuffix(undefined, 'https://example.com/files/reader.epub?download=1')).toBe('epub');
    expect(fileSuffix('README', undefined)).toBeUndefined();
  });
});

describe('sniffFormat', () => {
  it('uses a known suffix first', () => {
    const detection = sniffFormat({ bytes: text('%PDF-1.7'), filename: 'chapter.md' });
    expect(detection).toEqual({ format: 'md', method: 'suffix', warnings: [] });
  });

  it('maps suffix aliases', () => {
    expect(sniffFormat({ bytes: text(''), filename: 'page.htm' }).format).toBe('html');
    expect(sniffFormat({ bytes: text(''), filename: 'notes.markdown' }).format).toBe('md');
    expect(sniffFormat({ bytes: text(''), filename: 'log.text' }).format).toBe('txt');
  });

  it('reads the signature when the suffix is unknown, recording the rejected suffix', () => {
    const detection = sniffFormat({ bytes: text('%PDF-1.7\n...'), filename: 'download.bin' });
    expect(detection).toEqual({ format: 'pdf', method: 'signature', attempted: '.bin', warnings: [] });
  });

  it('detects RTF and HTML signatures', () => {
    expect(sniffFormat({ bytes: text('{\\rtf1\\ansi hello}') }).format).toBe('rtf');
    expect(sniffFormat({ bytes: text('\uFEFF  <!DOCTYPE html><html></html>') }).format).toBe('html');
    expect(sniffFormat({ bytes: text('<HTML><body>x</body></HTML>') }).format).toBe('html');
  });

  it('tells EPUB and DOCX packages apart', async () => {
    const epub = await buildEpub([{ heading: 'One', body: 'Text' }]);
    const docx = await buildDocx([{ text: 'Text' }]);
    expect(sniffFormat({ bytes: epub, filename: 'upload' }).format).toBe('epub');
    expect(sniffFormat({ bytes: docx, filename: 'upload' }).format).toBe('docx');
  });

  it('treats encrypted OOXML as docx and Word binaries as doc', () => {
    expect(sniffFormat({ bytes: buildOleFile(['EncryptedInfo', 'EncryptedPackage']) }).format).toBe('docx');
    expect(sniffFormat({ bytes: buildOleFile(['WordDocument', '1Table']) }).format).toBe('doc');
  });

  it('falls back to the declared format with a warning', () => {
    const detection = sniffFormat({ bytes: text('plain words'), filename: 'notes', declaredFormat: '.TXT' });
    expect(detection).toEqual({
      format: 'txt',
      method: 'declared',
      attempted: undefined,
      warnings: ['Format could not be detected; assuming declared format "txt"'],
    });
  });

  it('falls back to the batch default format', () => {
    const detection = sniffFormat({ bytes: text('plain words') }, 'md');
    expect(detection.format).toBe('md');
    expect(detection.warnings).toEqual(['Format could not be detected; assuming default format "md"']);
  });

  it('throws UnsupportedFormatError naming the attempted suffix', () => {
    expect(() => sniffFormat({ bytes: text('random bytes'), filename: 'archive.xyz' })).toThrow(
      'Unsupported document format: .xyz'
    );
    try {
      sniffFormat({ bytes: text('random bytes'), filename: 'archive.xyz' });
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedFormatError);
      if (error instanceof UnsupportedFormatError) {
        expect(error.attemptedFormat).toBe('.xyz');
        expect(error.code).toBe('UNSUPPORTED_FORMAT');
      }
    }
  });

  it('rejects a declared format outside the supported set', () => {
    expect(() => sniffFormat({ bytes: text('slides'), declaredFormat: 'pptx' })).toThrow(
      'Unsupported document format: pptx'
    );
  });

  it('reports "unknown" when there is nothing to go on', () => {
    expect(() => sniffFormat({ bytes: text('???') })).toThrow('Unsupported document format: unknown');
  });
});
