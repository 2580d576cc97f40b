import { describe, it, expect } from 'vitest';
import { DocxExtractor } from '../../src/server/extraction/docx/DocxExtractor.js';
import { LegacyDocExtractor, recoverPrintableRuns } from '../../src/server/extraction/doc/LegacyDocExtractor.js';
import { EpubExtractor } from '../../src/server/extraction/epub/EpubExtractor.js';
import { CorruptedDocumentError, PasswordProtectedError } from '../../src/server/types/errors.js';
import { buildDocx, buildEpub, buildOleFile, sourceOf } from '../helpers/fixtures.js';

describe('DocxExtractor', () => {
  it('extracts paragraphs and headings', async () => {
    const bytes = await buildDocx([
      { text: 'Photosynthesis', heading: true },
      { text: 'Plants turn light into sugar.' },
    ]);

    const extracted = await new DocxExtractor().extract(sourceOf(bytes, 'biology.docx'));
    expect(extracted.format).toBe('docx');
    expect(extracted.headings).toEqual(['Photosynthesis']);
    expect(extracted.title).toBe('Photosynthesis');
    expect(extracted.text).toBe('Photosynthesis\nPlants turn light into sugar.');
    expect(extracted.diagnostics.extractionMethod).toBe('mammoth');
  });

  it('reports encrypted packages as password protected', async () => {
    const bytes = buildOleFile(['EncryptionInfo', 'EncryptedPackage']);
    await expect(new DocxExtractor().extract(sourceOf(bytes, 'secret.docx'))).rejects.toThrow(PasswordProtectedError);
  });

  it('reports a broken package as corrupted', async () => {
    const bytes = Buffer.from('PK\u0003\u0004 definitely not a zip', 'latin1');
    await expect(new DocxExtractor().extract(sourceOf(bytes, 'broken.docx'))).rejects.toThrow(CorruptedDocumentError);
  });
});

describe('LegacyDocExtractor', () => {
  it('recovers printable text runs from a Word binary', async () => {
    const bytes = buildOleFile(['WordDocument', '1Table'], {
      fib: 'plain',
      text: 'Cells divide to make new cells while energy flows through ecosystems.',
    });

    const extracted = await new LegacyDocExtractor().extract(sourceOf(bytes, 'old.doc'));
    expect(extracted.format).toBe('doc');
    expect(extracted.text).toBe('Cells divide to make new cells while energy flows through ecosystems.');
    expect(extracted.diagnostics.notes).toEqual(['legacy binary format; text recovered heuristically']);
  });

  it('rejects Word binaries with the encryption flag set', async () => {
    const bytes = buildOleFile(['WordDocument'], { fib: 'encrypted', text: 'Hidden text that should not be read out.' });
    await expect(new LegacyDocExtractor().extract(sourceOf(bytes, 'locked.doc'))).rejects.toThrow(
      'The doc document is encrypted or password protected'
    );
  });

  it('hands DOCX packages named .doc to the DOCX extractor', async () => {
    const bytes = await buildDocx([{ text: 'Renamed file body.' }]);
    const extracted = await new LegacyDocExtractor().extract(sourceOf(bytes, 'renamed.doc'));
    expect(extracted.format).toBe('doc');
    expect(extracted.text).toBe('Renamed file body.');
  });

  it('fails when nothing readable is left', async () => {
    await expect(new LegacyDocExtractor().extract(sourceOf(buildOleFile([]), 'empty.doc'))).rejects.toThrow(
      'Cannot parse doc document: no text could be recovered'
    );
    await expect(new LegacyDocExtractor().extract(sourceOf('just text', 'fake.doc'))).rejects.toThrow(
      'Cannot parse doc document: not an OLE compound file'
    );
  });

  it('ignores short runs and numeric noise', () => {
    const noise = Buffer.concat([
      Buffer.from('short', 'latin1'),
      Buffer.alloc(4),
      Buffer.from('0011223344556677889900112233', 'latin1'),
      Buffer.alloc(4),
      Buffer.from('A readable sentence about proteins.', 'latin1'),
    ]);
    expect(recoverPrintableRuns(noise)).toBe('A readable sentence about proteins.');
  });
});

describe('EpubExtractor', () => {
  it('reads chapters in spine order as pages', async () => {
    const bytes = await buildEpub(
      [
        { heading: 'Cells', body: 'Cells divide.' },
        { heading: 'Energy', body: 'Energy flows.' },
      ],
      { title: 'Biology Basics' }
    );

    const extracted = await new EpubExtractor().extract(sourceOf(bytes, 'book.epub'));
    expect(extracted.pages).toEqual(['Cells\nCells divide.', 'Energy\nEnergy flows.']);
    expect(extracted.headings).toEqual(['Cells', 'Energy']);
    expect(extracted.title).toBe('Biology Basics');
    expect(extracted.diagnostics.pageCount).toBe(2);
  });

  it('reports DRM-encrypted books as password protected', async () => {
    const bytes = await buildEpub([{ heading: 'Locked', body: 'Secret.' }], { encrypted: true });
    await expect(new EpubExtractor().extract(sourceOf(bytes, 'drm.epub'))).rejects.toThrow(PasswordProtectedError);
  });

  it('reads books whose only encryption is font obfuscation', async () => {
    const bytes = await buildEpub([{ heading: 'Open', body: 'Readable.' }], { fontObfuscation: true });
    const extracted = await new EpubExtractor().extract(sourceOf(bytes, 'fonts.epub'));
    expect(extracted.text).toBe('Open\nReadable.');
  });

  it('reports an archive without a container as corrupted', async () => {
    const bytes = await buildDocx([{ text: 'Not a book' }]);
    await expect(new EpubExtractor().extract(sourceOf(bytes, 'wrong.epub'))).rejects.toThrow(
      'Cannot parse epub document: META-INF/container.xml is missing'
    );
  });
});
