import { describe, it, expect } from 'vitest';
import { PDFDict, PDFDocument, PDFName, PDFNumber, PDFString } from 'pdf-lib';
import {
  assess,
  defaultAuthenticityOptions,
  type AuthenticityOptions,
  type OriginMetadata,
} from '../../../src/services/authenticity/authenticity-scorer';

const CREATED = new Date('2024-03-15T10:00:00.000Z');

const options: AuthenticityOptions = {
  ...defaultAuthenticityOptions(),
  minFileSizeKb: 0,
  maxFileSizeKb: 5120,
  maxModificationSkewSeconds: 3600,
  now: () => new Date('2024-03-16T10:00:00.000Z'),
};

interface PdfSetup {
  producer?: string;
  creator?: string;
  created?: Date;
  modified?: Date;
  annotate?: boolean;
  rawInfo?: Record<string, PDFString | PDFNumber>;
}

async function buildPdf(setup: PdfSetup = {}): Promise<Buffer> {
  const doc = await PDFDocument.create();
  const page = doc.addPage();
  page.drawText('CERTIFICADO DE ANTECEDENTES LABORALES Y PREVISIONALES');
  doc.setProducer(setup.producer ?? 'Servicio de Certificados');
  doc.setCreator(setup.creator ?? 'Servicio de Certificados');
  doc.setCreationDate(setup.created ?? CREATED);
  doc.setModificationDate(setup.modified ?? setup.created ?? CREATED);
  if (setup.rawInfo) {
    const info = doc.context.lookup(doc.context.trailerInfo.Info, PDFDict);
    for (const [key, value] of Object.entries(setup.rawInfo)) {
      info.set(PDFName.of(key), value);
    }
  }
  if (setup.annotate) {
    const annot = doc.context.obj({ Type: 'Annot', Subtype: 'Text', Rect: [0, 0, 10, 10] });
    page.node.addAnnot(doc.context.register(annot));
  }
  return Buffer.from(await doc.save());
}

function pdfOrigin(bytes: Buffer, overrides: Partial<OriginMetadata> = {}): OriginMetadata {
  return { contentType: 'application/pdf', contentLength: bytes.length, contentEncoding: null, ...overrides };
}

describe('authenticity scorer', () => {
  it('passes an untouched PDF served as application/pdf', async () => {
    const bytes = await buildPdf();
    await expect(assess(bytes, pdfOrigin(bytes), options)).resolves.toEqual({ verdict: 'PASSED', signals: [] });
  });

  it('fails a PDF produced by a denylisted editor', async () => {
    const bytes = await buildPdf({ producer: 'Microsoft Word 2019' });
    const result = await assess(bytes, pdfOrigin(bytes), options);

    expect(result).toEqual({ verdict: 'FAILED', signals: ['pdf_editor_detected:microsoft word'] });
  });

  it('reports one signal per editor even when producer and creator agree', async () => {
    const bytes = await buildPdf({ producer: 'iLovePDF', creator: 'ilovepdf.com' });
    const result = await assess(bytes, pdfOrigin(bytes), options);

    expect(result.signals).toEqual(['pdf_editor_detected:ilovepdf']);
  });

  it('fails when the modification date is far from the creation date', async () => {
    const bytes = await buildPdf({ modified: new Date('2024-03-15T12:00:00.000Z') });
    const result = await assess(bytes, pdfOrigin(bytes), options);

    expect(result).toEqual({
      verdict: 'FAILED',
      signals: ['pdf_metadata_inconsistent:modified_7200s_after_creation'],
    });
  });

  it('fails when the document claims to be modified before it was created', async () => {
    const bytes = await buildPdf({ modified: new Date('2024-03-15T09:00:00.000Z') });
    const result = await assess(bytes, pdfOrigin(bytes), options);

    expect(result.signals).toEqual(['pdf_metadata_inconsistent:modified_before_created']);
  });

  it('fails when the creation date is in the future', async () => {
    const bytes = await buildPdf({ created: new Date('2024-03-20T10:00:00.000Z') });
    const result = await assess(bytes, pdfOrigin(bytes), options);

    expect(result).toEqual({ verdict: 'FAILED', signals: ['pdf_metadata_inconsistent:created_in_future'] });
  });

  it('fails a PDF whose creation date is not a PDF date string', async () => {
    const bytes = await buildPdf({ rawInfo: { CreationDate: PDFString.of('20240315100000') } });
    const result = await assess(bytes, pdfOrigin(bytes), options);

    expect(result).toEqual({ verdict: 'FAILED', signals: ['pdf_metadata_inconsistent:invalid_date'] });
  });

  it('warns when the producer entry is not a string', async () => {
    const bytes = await buildPdf({ rawInfo: { Producer: PDFNumber.of(42) } });
    const result = await assess(bytes, pdfOrigin(bytes), options);

    expect(result).toEqual({ verdict: 'WARNING', signals: ['pdf_metadata_unreadable'] });
  });

  it('warns about markup annotations', async () => {
    const bytes = await buildPdf({ annotate: true });
    const result = await assess(bytes, pdfOrigin(bytes), options);

    expect(result).toEqual({ verdict: 'WARNING', signals: ['pdf_contains_annotations:1'] });
  });

  it('warns when the declared content type is not PDF', async () => {
    const bytes = await buildPdf();
    const result = await assess(bytes, pdfOrigin(bytes, { contentType: 'application/octet-stream' }), options);

    expect(result).toEqual({ verdict: 'WARNING', signals: ['mime_mismatch:application/octet-stream'] });
  });

  it('accepts content-type parameters', async () => {
    const bytes = await buildPdf();
    const result = await assess(bytes, pdfOrigin(bytes, { contentType: 'Application/PDF; charset=binary' }), options);

    expect(result.verdict).toBe('PASSED');
  });

  it('warns on a content-length mismatch only for identity encodings', async () => {
    const bytes = await buildPdf();
    const declared = bytes.length + 10;

    const plain = await assess(bytes, pdfOrigin(bytes, { contentLength: declared }), options);
    expect(plain.signals).toEqual([`content_length_mismatch:declared=${declared},actual=${bytes.length}`]);

    const gzipped = await assess(bytes, pdfOrigin(bytes, { contentLength: declared, contentEncoding: 'gzip' }), options);
    expect(gzipped.signals).toEqual([]);
  });

  it('warns about files outside the expected size range', async () => {
    const bytes = await buildPdf();
    const result = await assess(bytes, pdfOrigin(bytes), { ...options, minFileSizeKb: 10 });

    expect(result.verdict).toBe('WARNING');
    expect(result.signals).toEqual([`suspicious_file_size:${(bytes.length / 1024).toFixed(2)}KB`]);
  });

  it('warns about incremental updates appended after the original document', async () => {
    const original = await buildPdf();
    const bytes = Buffer.concat([original, Buffer.from('\n%%EOF\n', 'latin1')]);
    const result = await assess(bytes, pdfOrigin(bytes), options);

    expect(result.verdict).toBe('WARNING');
    expect(result.signals).toContain('pdf_incremental_updates:1');
  });

  it('warns when the body is not a PDF at all', async () => {
    const bytes = Buffer.from('<html>not found</html>');
    const result = await assess(bytes, pdfOrigin(bytes, { contentType: 'text/html' }), options);

    expect(result).toEqual({ verdict: 'WARNING', signals: ['missing_pdf_header', 'mime_mismatch:text/html'] });
  });
});
