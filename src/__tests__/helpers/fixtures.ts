import PizZip from 'pizzip';
import sharp from 'sharp';

const CONTENT_TYPES = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"><Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/><Default Extension="xml" ContentType="application/xml"/><Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/></Types>`;

const ROOT_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"><Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/></Relationships>`;

const DOCUMENT_RELS = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"></Relationships>`;

const paragraph = (text: string) => `<w:p><w:r><w:t>${text}</w:t></w:r></w:p>`;

/** Builds a minimal .docx whose body has one paragraph per line. */
export function buildDocx(lines: string[]): Buffer {
  const document = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships" xmlns:wp="http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing" xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" xmlns:pic="http://schemas.openxmlformats.org/drawingml/2006/picture"><w:body>${lines
    .map(paragraph)
    .join('')}<w:sectPr/></w:body></w:document>`;

  const zip = new PizZip();
  zip.file('[Content_Types].xml', CONTENT_TYPES);
  zip.file('_rels/.rels', ROOT_RELS);
  zip.file('word/document.xml', document);
  zip.file('word/_rels/document.xml.rels', DOCUMENT_RELS);
  return zip.generate({ type: 'nodebuffer' });
}

export const CERTIFICATE_TEMPLATE_LINES = [
  'Certificate {{certificate_number}}',
  '{{first_name}} {{middle_name}} {{last_name}}',
  'Trained {{training_date}} Issued {{issue_date}}',
  'Instructor {{instructor_name}}',
  '{{%qr_code}}',
  '{{%instructor_signature}}',
];

export function readDocumentXml(docx: Buffer): string {
  const file = new PizZip(docx).file('word/document.xml');
  if (!file) {
    throw new Error('word/document.xml missing from rendered docx');
  }
  return file.asText();
}

export function listMedia(docx: Buffer): string[] {
  return Object.keys(new PizZip(docx).files).filter((name) => name.startsWith('word/media/'));
}

export function createImage(
  width: number,
  height: number,
  format: 'png' | 'jpeg' = 'png'
): Promise<Buffer> {
  const image = sharp({
    create: { width, height, channels: 3, background: { r: 20, g: 40, b: 160 } },
  });
  return (format === 'png' ? image.png() : image.jpeg()).toBuffer();
}
