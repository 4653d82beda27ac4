import { describe, it, expect } from 'vitest';
import { CertificateExtractor, missingRequiredFields } from '../../../src/ocr/extract-certificate-fields';
import { profileFor } from '../../../src/documents/document-registry';
import { UnreadableDocumentError } from '../../../src/errors';
import {
  FakeTextRecognizer,
  matchedExtraction,
  personaNaturalFields,
  QueuedFieldExtractor,
  razonSocialFields,
} from '../../helpers/fakes';

describe('CertificateExtractor', () => {
  it('reads the text and extracts the profile fields', async () => {
    const recognizer = new FakeTextRecognizer('CERTIFICADO F30 AB12CD34EF56');
    const extractor = new CertificateExtractor(recognizer, new QueuedFieldExtractor(matchedExtraction(razonSocialFields())));

    const result = await extractor.extract(Buffer.from('%PDF-1.7'), profileFor('razon_social'));

    expect(result).toEqual({
      matchedVariant: true,
      detectedType: null,
      reason: '',
      fields: razonSocialFields(),
      rawText: 'CERTIFICADO F30 AB12CD34EF56',
    });
    expect(recognizer.calls).toBe(1);
  });

  it('raises UnreadableDocumentError on blank text', async () => {
    const extractor = new CertificateExtractor(new FakeTextRecognizer(' \n\t '), new QueuedFieldExtractor());

    await expect(extractor.readText(Buffer.from('%PDF-1.7'))).rejects.toThrow(UnreadableDocumentError);
  });
});

describe('missingRequiredFields', () => {
  it('lists required fields that are null or blank', () => {
    const fields = personaNaturalFields({ folio_anio: null, codigo_verificacion: '  ', nombre_completo: null });

    expect(missingRequiredFields(profileFor('persona_natural'), fields)).toEqual(['folio_anio', 'codigo_verificacion']);
  });

  it('treats absent keys as missing', () => {
    expect(missingRequiredFields(profileFor('razon_social'), { rut_empleador: '76.123.456-7' })).toEqual([
      'codigo_certificado',
    ]);
  });
});
