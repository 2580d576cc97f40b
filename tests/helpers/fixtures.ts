/**
 * In-memory document fixtures for extractor and pipeline tests
 */

import JSZip from 'jszip';
import type { SourceDocument } from '../../src/server/types/pipeline.js';

const VOCABULARY = [
  'cells', 'divide', 'energy', 'flows', 'through', 'living', 'systems', 'proteins',
  'fold', 'into', 'shapes', 'that', 'define', 'their', 'function', 'within', 'tissue',
];

/**
 * Exactly `count` whitespace-separated words
 */
export function prose(count: number): string {
  return Array.from({ length: count }, (_, i) => VOCABULARY[i % VOCABULARY.length]).join(' ');
}

export function sourceOf(content: Uint8Array | string, filename: string = 'document'): SourceDocument {
  const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content);
  return { fileId: 'test-file', filename, bytes, size: bytes.length };
}

function escapePdfText(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/\(/g, '\\(').replace(/\)/g, '\\)');
}

/**
 * Single-font PDF with one line of text per page and a correct xref table
 *
 * `encrypted` adds a Standard security handler whose user password is not empty.
 */
export function buildPdf(pages: string[], options: { encrypted?: boolean } = {}): Buffer {
  const objects: string[] = [];
  const pageIds = pages.map((_, i) => 4 + i * 2);
  objects[1] = '<< /Type /Catalog /Pages 2 0 R >>';
  objects[2] = `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(' ')}] /Count ${pages.length} >>`;
  objects[3] = '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>';
  pages.forEach((text, i) => {
    const stream = `BT /F1 12 Tf 72 720 Td (${escapePdfText(text)}) Tj ET`;
    objects[4 + i * 2] =
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${5 + i * 2} 0 R >>`;
    objects[5 + i * 2] = `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`;
  });

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  for (let id = 1; id < objects.length; id++) {
    offsets[id] = body.length;
    body += `${id} 0 obj\n${objects[id]}\nendobj\n`;
  }

  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length}\n0000000000 65535 f \n`;
  for (let id = 1; id < objects.length; id++) {
    body += `${String(offsets[id]).padStart(10, '0')} 00000 n \n`;
  }
  const encryption = options.encrypted
    ? ` /Encrypt << /Filter /Standard /V 1 /R 2 /Length 40 /P -4 /O <${'ab'.repeat(32)}> /U <${'cd'.repeat(32)}> >>` +
      ` /ID [<${'01'.repeat(16)}> <${'01'.repeat(16)}>]`
    : '';
  body += `trailer\n<< /Size ${objects.length} /Root 1 0 R${encryption} >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(body, 'latin1');
}

const WORD_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';
const REL_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';
const OFFICE_REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

export interface DocxParagraph {
  text: string;
  heading?: boolean;
}

export async function buildDocx(paragraphs: DocxParagraph[]): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    '[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8"?>' +
      '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
      '<Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/>' +
      '</Types>'
  );
  zip.file(
    '_rels/.rels',
    `<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="${REL_NS}">` +
      `<Relationship Id="rId1" Type="${OFFICE_REL}/officeDocument" Target="word/document.xml"/></Relationships>`
  );
  zip.file(
    'word/_rels/document.xml.rels',
    `<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="${REL_NS}">` +
      `<Relationship Id="rId1" Type="${OFFICE_REL}/styles" Target="styles.xml"/></Relationships>`
  );
  zip.file(
    'word/styles.xml',
    `<?xml version="1.0" encoding="UTF-8"?><w:styles xmlns:w="${WORD_NS}">` +
      '<w:style w:type="paragraph" w:styleId="Heading1"><w:name w:val="heading 1"/></w:style></w:styles>'
  );

  const body = paragraphs
    .map((paragraph) => {
      const style = paragraph.heading ? '<w:pPr><w:pStyle w:val="Heading1"/></w:pPr>' : '';
      return `<w:p>${style}<w:r><w:t xml:space="preserve">${paragraph.text}</w:t></w:r></w:p>`;
    })
    .join('');
  zip.file(
    'word/document.xml',
    `<?xml version="1.0" encoding="UTF-8"?><w:document xmlns:w="${WORD_NS}"><w:body>${body}</w:body></w:document>`
  );

  return zip.generateAsync({ type: 'nodebuffer' });
}

export interface EpubChapter {
  heading: string;
  body: string;
}

export async function buildEpub(
  chapters: EpubChapter[],
  options: { title?: string; encrypted?: boolean; fontObfuscation?: boolean } = {}
): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('mimetype', 'application/epub+zip', { compression: 'STORE' });
  zip.file(
    'META-INF/container.xml',
    '<?xml version="1.0"?><container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">' +
      '<rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles></container>'
  );

  const manifest = chapters
    .map((_, i) => `<item id="ch${i}" href="text/ch${i}.xhtml" media-type="application/xhtml+xml"/>`)
    .join('');
  const spine = chapters.map((_, i) => `<itemref idref="ch${i}"/>`).join('');
  zip.file(
    'OEBPS/content.opf',
    '<?xml version="1.0" encoding="UTF-8"?><package xmlns="http://www.idpf.org/2007/opf" version="3.0">' +
      `<metadata xmlns:dc="http://purl.org/dc/elements/1.1/"><dc:title>${options.title ?? 'Untitled'}</dc:title></metadata>` +
      `<manifest><item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>${manifest}</manifest>` +
      `<spine>${spine}</spine></package>`
  );

  chapters.forEach((chapter, i) => {
    zip.file(
      `OEBPS/text/ch${i}.xhtml`,
      `<html xmlns="http://www.w3.org/1999/xhtml"><head><title>Chapter</title><style>p { color: red; }</style></head>` +
        `<body><h1>${chapter.heading}</h1><p>${chapter.body}</p></body></html>`
    );
  });

  if (options.encrypted || options.fontObfuscation) {
    const algorithm = options.encrypted
      ? 'http://www.w3.org/2001/04/xmlenc#aes128-cbc'
      : 'http://www.idpf.org/2008/embedding';
    zip.file(
      'META-INF/encryption.xml',
      '<encryption xmlns="urn:oasis:names:tc:opendocument:xmlns:container" xmlns:enc="http://www.w3.org/2001/04/xmlenc#">' +
        `<enc:EncryptedData><enc:EncryptionMethod Algorithm="${algorithm}"/>` +
        '<enc:CipherData><enc:CipherReference URI="OEBPS/text/ch0.xhtml"/></enc:CipherData></enc:EncryptedData></encryption>'
    );
  }

  return zip.generateAsync({ type: 'nodebuffer' });
}

const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];
const SECTOR = 512;

/**
 * Skeleton OLE compound file: header signature, an optional Word FIB in the first sector,
 * stream names in a directory sector and optional text after it
 */
export function buildOleFile(
  streamNames: string[],
  options: { fib?: 'plain' | 'encrypted'; text?: string } = {}
): Buffer {
  const text = options.text ? Buffer.from(options.text, 'latin1') : Buffer.alloc(0);
  const buffer = Buffer.alloc(SECTOR * 3 + text.length);
  Buffer.from(OLE_SIGNATURE).copy(buffer, 0);

  if (options.fib) {
    buffer.writeUInt16LE(0xa5ec, SECTOR);
    buffer.writeUInt16LE(options.fib === 'encrypted' ? 0x0100 : 0, SECTOR + 10);
  }

  streamNames.forEach((name, i) => {
    Buffer.from(name, 'utf16le').copy(buffer, SECTOR * 2 + i * 128);
  });
  text.copy(buffer, SECTOR * 3);
  return buffer;
}
