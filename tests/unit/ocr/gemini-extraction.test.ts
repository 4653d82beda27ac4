import { describe, it, expect, vi, beforeEach } from 'vitest';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: vi.fn().mockImplementation(() => ({ models: { generateContent } })),
}));

import { buildPrompt, GeminiFieldExtractor, safeJsonParse } from '../../../src/ocr/gemini-extraction';
import { profileFor } from '../../../src/documents/document-registry';
import { ExtractionEngineError } from '../../../src/errors';

const profile = profileFor('razon_social');

const goodAnswer = JSON.stringify({
  matchesExpectedType: true,
  detectedType: null,
  reason: '',
  fields: {
    rut_empleador: '76.123.456-7',
    razon_social: '  CONSTRUCTORA LOS ANDES SPA ',
    codigo_certificado: 'AB12CD34EF56',
    fecha_emision: '',
    multas_ejecutoriadas: null,
  },
});

describe('GeminiFieldExtractor', () => {
  beforeEach(() => {
    generateContent.mockReset();
  });

  it('maps the answer onto the profile fields', async () => {
    generateContent.mockResolvedValue({ text: '```json\n' + goodAnswer + '\n```' });
    const extractor = new GeminiFieldExtractor('test-key', 'gemini-test');

    const extraction = await extractor.extract('CERTIFICADO F30', profile);

    expect(extraction).toEqual({
      matchesExpectedType: true,
      detectedType: null,
      reason: '',
      fields: {
        rut_empleador: '76.123.456-7',
        razon_social: 'CONSTRUCTORA LOS ANDES SPA',
        codigo_certificado: 'AB12CD34EF56',
        fecha_emision: null,
        multas_ejecutoriadas: null,
        deudas_previsionales: null,
      },
    });
    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(generateContent.mock.calls[0][0]).toMatchObject({
      model: 'gemini-test',
      config: { responseMimeType: 'application/json', temperature: 0 },
    });
  });

  it('turns numeric values into strings', async () => {
    generateContent.mockResolvedValue({
      text: JSON.stringify({ matchesExpectedType: true, fields: { folio_anio: 2024, folio_oficina: '1301' } }),
    });
    const extractor = new GeminiFieldExtractor('test-key', 'gemini-test');

    const extraction = await extractor.extract('text', profileFor('persona_natural'));

    expect(extraction.fields.folio_anio).toBe('2024');
    expect(extraction.fields.folio_oficina).toBe('1301');
  });

  it('reports a different document type', async () => {
    generateContent.mockResolvedValue({
      text: JSON.stringify({
        matchesExpectedType: false,
        detectedType: ' Certificado de Cotizaciones ',
        reason: 'no F30 heading',
        fields: {},
      }),
    });
    const extractor = new GeminiFieldExtractor('test-key', 'gemini-test');

    const extraction = await extractor.extract('text', profile);

    expect(extraction.matchesExpectedType).toBe(false);
    expect(extraction.detectedType).toBe('Certificado de Cotizaciones');
    expect(extraction.reason).toBe('no F30 heading');
  });

  it('retries once after an unusable answer', async () => {
    generateContent.mockResolvedValueOnce({ text: 'I could not read it' }).mockResolvedValueOnce({ text: goodAnswer });
    const extractor = new GeminiFieldExtractor('test-key', 'gemini-test');

    const extraction = await extractor.extract('text', profile);

    expect(generateContent).toHaveBeenCalledTimes(2);
    expect(extraction.fields.codigo_certificado).toBe('AB12CD34EF56');
  });

  it('raises ExtractionEngineError after two unusable answers', async () => {
    generateContent.mockResolvedValue({ text: 'I could not read it' });
    const extractor = new GeminiFieldExtractor('test-key', 'gemini-test');

    const attempt = extractor.extract('text', profile);

    await expect(attempt).rejects.toThrow(ExtractionEngineError);
    await expect(attempt).rejects.toThrow(
      'Extraction engine returned no usable answer: answer did not match the expected shape'
    );
    expect(generateContent).toHaveBeenCalledTimes(2);
  });

  it('raises ExtractionEngineError when the API keeps failing', async () => {
    generateContent.mockRejectedValue(new Error('429 quota exceeded'));
    const extractor = new GeminiFieldExtractor('test-key', 'gemini-test');

    await expect(extractor.extract('text', profile)).rejects.toThrow(
      'Extraction engine returned no usable answer: 429 quota exceeded'
    );
  });

  it('requires an API key', async () => {
    const extractor = new GeminiFieldExtractor('', 'gemini-test');

    await expect(extractor.extract('text', profile)).rejects.toThrow('GEMINI_API_KEY is not configured');
    expect(generateContent).not.toHaveBeenCalled();
  });
});

describe('buildPrompt', () => {
  it('lists every profile field and the classification hint', () => {
    const prompt = buildPrompt('OCR BODY', profile);

    expect(prompt).toContain(
      '- codigo_certificado (code): Certificate verification code printed on the document, exactly as shown'
    );
    expect(prompt).toContain(profile.classificationHint);
    expect(prompt).toContain('Expected document type: Certificado F30 - Razón Social');
    expect(prompt.endsWith('OCR TEXT:\nOCR BODY')).toBe(true);
  });
});

describe('safeJsonParse', () => {
  it('strips code fences', () => {
    expect(safeJsonParse('```json\n{"a":1}\n```')).toEqual({ a: 1 });
  });

  it('returns null for invalid JSON', () => {
    expect(safeJsonParse('{oops')).toBeNull();
  });
});
