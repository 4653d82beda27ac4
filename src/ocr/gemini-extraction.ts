import { GoogleGenAI } from '@google/genai';
import { z } from 'zod';
import { config } from '../config';
import type { DocumentTypeProfile } from '../documents/document-registry';
import { ExtractionEngineError } from '../errors';
import type { ExtractedFields } from '../types/certificate';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ module: 'extraction' });

export interface FieldExtraction {
  matchesExpectedType: boolean;
  detectedType: string | null;
  reason: string;
  fields: ExtractedFields;
}

export interface FieldExtractor {
  extract(rawText: string, profile: DocumentTypeProfile): Promise<FieldExtraction>;
}

const PROMPT_PREFIX = `You read OCR text of Chilean labor certificates.
Return STRICT JSON only. No markdown, no code fences, no explanation.
Copy every value exactly as printed. Use null for any field not found.
`;

const answerSchema = z.object({
  matchesExpectedType: z.boolean(),
  detectedType: z.string().nullish(),
  reason: z.string().nullish(),
  fields: z.record(z.union([z.string(), z.number(), z.null()])).default({}),
});

type GeminiAnswer = z.infer<typeof answerSchema>;

export function safeJsonParse(text: string): unknown {
  try {
    const stripped = text
      .trim()
      .replace(/^```(?:json)?\s*/i, '')
      .replace(/\s*```$/g, '')
      .trim();
    return JSON.parse(stripped);
  } catch {
    return null;
  }
}

export function buildPrompt(rawText: string, profile: DocumentTypeProfile): string {
  const fieldList = profile.fields.map((f) => `- ${f.name} (${f.type}): ${f.description}`).join('\n');
  const schema = JSON.stringify(
    {
      matchesExpectedType: true,
      detectedType: '',
      reason: '',
      fields: Object.fromEntries(profile.fields.map((f) => [f.name, null])),
    },
    null,
    2
  );
  return `${PROMPT_PREFIX}
Expected document type: ${profile.displayName}
${profile.classificationHint}
Set matchesExpectedType to false when the text is a different document, and say which one in detectedType.

Fields:
${fieldList}

Schema:
${schema}

OCR TEXT:
${rawText}`;
}

export function toFieldExtraction(answer: GeminiAnswer, profile: DocumentTypeProfile): FieldExtraction {
  const fields: ExtractedFields = {};
  for (const def of profile.fields) {
    const value = answer.fields[def.name];
    const text = value === null || value === undefined ? '' : String(value).trim();
    fields[def.name] = text === '' ? null : text;
  }
  return {
    matchesExpectedType: answer.matchesExpectedType,
    detectedType: answer.detectedType?.trim() || null,
    reason: answer.reason?.trim() || '',
    fields,
  };
}

/** Structured extraction with Gemini. One retry on an unusable answer. */
export class GeminiFieldExtractor implements FieldExtractor {
  constructor(
    private readonly apiKey: string | undefined = config.GEMINI_API_KEY,
    private readonly model: string = config.GEMINI_MODEL
  ) {}

  async extract(rawText: string, profile: DocumentTypeProfile): Promise<FieldExtraction> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new ExtractionEngineError('GEMINI_API_KEY is not configured');
    }
    const ai = new GoogleGenAI({ apiKey });
    const prompt = buildPrompt(rawText, profile);

    let lastError = 'no usable answer';
    const tryOnce = async (): Promise<GeminiAnswer | null> => {
      try {
        const response = await ai.models.generateContent({
          model: this.model,
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          config: { responseMimeType: 'application/json', temperature: 0 },
        });
        const parsed = answerSchema.safeParse(safeJsonParse(response.text ?? ''));
        if (parsed.success) return parsed.data;
        lastError = 'answer did not match the expected shape';
      } catch (err) {
        lastError = err instanceof Error ? err.message : String(err);
      }
      return null;
    };

    let answer = await tryOnce();
    if (answer === null) {
      log.warn({ variant: profile.variant, error: lastError }, 'unusable extraction answer, retrying once');
      answer = await tryOnce();
    }
    if (answer === null) {
      throw new ExtractionEngineError(`Extraction engine returned no usable answer: ${lastError}`);
    }
    return toFieldExtraction(answer, profile);
  }
}
