import type { DocumentTypeProfile } from '../documents/document-registry';
import { UnreadableDocumentError } from '../errors';
import type { TextRecognizer } from '../services/gcp/document-ai';
import type { ExtractedFields } from '../types/certificate';
import type { FieldExtractor } from './gemini-extraction';

export interface ExtractionResult {
  matchedVariant: boolean;
  detectedType: string | null;
  reason: string;
  fields: ExtractedFields;
  rawText: string;
}

/**
 * OCR followed by structured extraction against the declared profile.
 * Blank OCR output raises UnreadableDocumentError.
 */
export class CertificateExtractor {
  constructor(
    private readonly recognizer: TextRecognizer,
    private readonly fieldExtractor: FieldExtractor
  ) {}

  async readText(bytes: Buffer, mimeType = 'application/pdf'): Promise<string> {
    const text = await this.recognizer.recognize(bytes, mimeType);
    if (text.trim() === '') {
      throw new UnreadableDocumentError();
    }
    return text;
  }

  async extractFromText(rawText: string, profile: DocumentTypeProfile): Promise<ExtractionResult> {
    const extraction = await this.fieldExtractor.extract(rawText, profile);
    return {
      matchedVariant: extraction.matchesExpectedType,
      detectedType: extraction.detectedType,
      reason: extraction.reason,
      fields: extraction.fields,
      rawText,
    };
  }

  async extract(bytes: Buffer, profile: DocumentTypeProfile): Promise<ExtractionResult> {
    const rawText = await this.readText(bytes);
    return this.extractFromText(rawText, profile);
  }
}

export function missingRequiredFields(profile: DocumentTypeProfile, fields: ExtractedFields): string[] {
  return profile.requiredFields.filter((name) => {
    const value = fields[name];
    return value === null || value === undefined || value.trim() === '';
  });
}
