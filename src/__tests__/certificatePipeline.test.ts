import { beforeEach, describe, expect, it } from 'vitest';

import { fail, ok } from '../errors';
import { createCertificatePipeline } from '../services/certificates/certificatePipeline';
import { DOCX_CONTENT_TYPE } from '../services/storage/objectStore';
import { readDocumentXml } from './helpers/fixtures';
import { type RecordingObjectStore, seededStore, StubConverter, testSettings } from './helpers/stubs';

const JANE = {
  certificate_number: 'CERT-001',
  first_name: 'Jane',
  last_name: 'Doe',
  training_date: '2024-01-15',
};

describe('CertificatePipeline', () => {
  let store: RecordingObjectStore;
  let converter: StubConverter;

  beforeEach(async () => {
    store = await seededStore();
    converter = new StubConverter(ok(Buffer.from('%PDF-stub')));
  });

  const pipeline = (env: Record<string, string> = {}) =>
    createCertificatePipeline(testSettings(env), store, converter);

  it('renders, names and stores a docx certificate', async () => {
    const result = await pipeline().generate({ templateKey: 't1', signatureKey: 's1', data: JANE });
    if (!result.ok) throw result.error;

    expect(result.value.key).toBe('certificates/CERT001_Jane_Doe.docx');
    expect(result.value.contentType).toBe(DOCX_CONTENT_TYPE);
    expect(store.reads).toEqual(['t1', 's1']);
    expect(store.writes).toEqual(['certificates/CERT001_Jane_Doe.docx']);

    const stored = store.peek('certificates/CERT001_Jane_Doe.docx');
    expect(stored?.contentType).toBe(DOCX_CONTENT_TYPE);
    const xml = readDocumentXml(stored?.data ?? Buffer.alloc(0));
    expect(xml).toContain('>Certificate CERT-001<');
    expect(xml).toContain('>Trained 01/15/2024 Issued <');
    expect(converter.inputs).toHaveLength(0);
  });

  it('replaces a caller supplied output key with the derived one', async () => {
    const result = await pipeline().generate({
      templateKey: 't1',
      signatureKey: 's1',
      outputKey: 'uploads/whatever.docx',
      data: { ...JANE, middle_name: 'Ann Marie' },
    });
    if (!result.ok) throw result.error;

    expect(result.value.key).toBe('certificates/CERT001_Jane_Ann_Marie_Doe.docx');
    expect(store.has('uploads/whatever.docx')).toBe(false);
  });

  it('stores a converted pdf under the rewritten key', async () => {
    const result = await pipeline().generate({
      templateKey: 't1',
      signatureKey: 's1',
      outputFormat: 'pdf',
      data: JANE,
    });
    if (!result.ok) throw result.error;

    expect(result.value).toEqual({ key: 'certificates/CERT001_Jane_Doe.pdf', contentType: 'application/pdf', size: 9 });
    expect(store.peek('certificates/CERT001_Jane_Doe.pdf')?.data.toString('utf-8')).toBe('%PDF-stub');
    expect(store.has('certificates/CERT001_Jane_Doe.docx')).toBe(false);
    expect(converter.inputs).toHaveLength(1);
  });

  it('converts by default when configured to', async () => {
    const result = await pipeline({ DEFAULT_OUTPUT_FORMAT: 'pdf' }).generate({
      templateKey: 't1',
      signatureKey: 's1',
      data: JANE,
    });
    if (!result.ok) throw result.error;

    expect(result.value.key).toBe('certificates/CERT001_Jane_Doe.pdf');
  });

  it('rejects a missing certificate number before touching storage', async () => {
    const result = await pipeline().generate({
      templateKey: 't1',
      signatureKey: 's1',
      data: { first_name: 'Jane', last_name: 'Doe' },
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('ValidationError');
      expect(result.error.message).toBe('certificate_number missing');
    }
    expect(store.reads).toEqual([]);
  });

  it('rejects an identity that sanitizes to nothing before touching storage', async () => {
    const result = await pipeline().generate({
      templateKey: 't1',
      signatureKey: 's1',
      data: { certificate_number: 'C1', first_name: 'Jane', last_name: '   ' },
    });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('InvalidIdentity');
    expect(store.reads).toEqual([]);
  });

  it('rejects structured values in the data', async () => {
    const result = await pipeline().generate({
      templateKey: 't1',
      signatureKey: 's1',
      data: { ...JANE, first_name: { given: 'Jane' } },
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('ValidationError');
      expect(result.error.message).toBe('data.first_name must be a string');
    }
  });

  it('accepts numeric certificate numbers', async () => {
    const result = await pipeline().generate({
      templateKey: 't1',
      signatureKey: 's1',
      data: { ...JANE, certificate_number: 1042 },
    });
    if (!result.ok) throw result.error;

    expect(result.value.key).toBe('certificates/1042_Jane_Doe.docx');
  });

  it('stops when the template is missing', async () => {
    const result = await pipeline().generate({ templateKey: 'missing', signatureKey: 's1', data: JANE });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('AssetNotFound');
    expect(store.reads).toEqual(['missing']);
    expect(store.writes).toEqual([]);
  });

  it('reports an unreachable store', async () => {
    store.unavailable = true;

    const result = await pipeline().generate({ templateKey: 't1', signatureKey: 's1', data: JANE });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('AssetStoreUnavailable');
  });

  it('stops when the signature is not an image', async () => {
    store.seed('s-bad', Buffer.from('not an image'));

    const result = await pipeline().generate({ templateKey: 't1', signatureKey: 's-bad', data: JANE });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('UnsupportedImageFormat');
    expect(store.writes).toEqual([]);
  });

  it('publishes nothing when conversion fails', async () => {
    converter = new StubConverter(fail('ConversionProcessError', 'libreoffice exited with code 1'));

    const result = await pipeline().generate({
      templateKey: 't1',
      signatureKey: 's1',
      outputFormat: 'pdf',
      data: JANE,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('ConversionProcessError');
    expect(store.writes).toEqual([]);
  });

  it('reports a failed write after a successful render', async () => {
    store.rejectWrites = true;

    const result = await pipeline().generate({ templateKey: 't1', signatureKey: 's1', data: JANE });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PublishError');
      expect(result.error.message).toBe('Could not write certificates/CERT001_Jane_Doe.docx');
    }
    expect(store.reads).toEqual(['t1', 's1']);
    expect(store.has('certificates/CERT001_Jane_Doe.docx')).toBe(false);
  });

  it('overwrites an earlier certificate stored under the same key', async () => {
    const first = await pipeline().generate({ templateKey: 't1', signatureKey: 's1', data: JANE });
    if (!first.ok) throw first.error;
    const second = await pipeline().generate({
      templateKey: 't1',
      signatureKey: 's1',
      data: { ...JANE, training_date: '2024-06-30' },
    });
    if (!second.ok) throw second.error;

    expect(second.value.key).toBe(first.value.key);
    expect(store.writes).toEqual(['certificates/CERT001_Jane_Doe.docx', 'certificates/CERT001_Jane_Doe.docx']);
    const xml = readDocumentXml(store.peek('certificates/CERT001_Jane_Doe.docx')?.data ?? Buffer.alloc(0));
    expect(xml).toContain('>Trained 06/30/2024 Issued <');
  });
});
