import { config } from '../../config';
import { firstPresent, profileFor, type SubmissionSpec } from '../../documents/document-registry';
import type { ExternalVerificationOutcome, ExtractedFields, VerificationAttempt } from '../../types/certificate';
import { createChildLogger } from '../../utils/logger';
import type { AgentAnswer, CopyStore, RegistryAgent, RegistrySubmission } from './types';

const log = createChildLogger({ module: 'registry' });

export interface CoordinatorOptions {
  maxAttempts: number;
  retryDelayMs: number;
  sleep: (ms: number) => Promise<void>;
}

const defaultOptions = (): CoordinatorOptions => ({
  maxAttempts: config.REGISTRY_MAX_ATTEMPTS,
  retryDelayMs: config.REGISTRY_RETRY_DELAY_MS,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
});

/**
 * The registry portal shows certificate codes in blocks of four. A code
 * extracted without spaces is regrouped; one with spaces is sent compacted.
 */
export function formatCertificateCode(raw: string): string {
  const compact = raw.replace(/\s+/g, '').toUpperCase();
  if (/\s/.test(raw.trim()) || compact.length < 8) {
    return compact;
  }
  return (compact.match(/.{1,4}/g) ?? [compact]).join(' ');
}

type BuiltSubmission =
  | { ok: true; submission: RegistrySubmission; inputs: Record<string, string> }
  | { ok: false; missing: string[]; inputs: Record<string, string> };

export function buildSubmission(spec: SubmissionSpec, fields: ExtractedFields): BuiltSubmission {
  const inputs: Record<string, string> = {};
  const missing: string[] = [];
  const mapping: Record<string, string> = spec.fields;
  for (const [key, field] of Object.entries(mapping)) {
    const value = firstPresent([field], fields);
    if (value === null) {
      missing.push(field);
    } else {
      inputs[key] = value.trim();
    }
  }
  if (missing.length > 0) {
    return { ok: false, missing, inputs };
  }

  if (spec.mode === 'certificate_code') {
    const certificateCode = formatCertificateCode(inputs.certificateCode ?? '');
    return { ok: true, submission: { mode: 'certificate_code', certificateCode }, inputs: { certificateCode } };
  }
  const submission: RegistrySubmission = {
    mode: 'folio',
    officeCode: inputs.officeCode ?? '',
    year: inputs.year ?? '',
    sequenceNumber: inputs.sequenceNumber ?? '',
    verificationCode: (inputs.verificationCode ?? '').toUpperCase(),
  };
  return {
    ok: true,
    submission,
    inputs: {
      officeCode: submission.officeCode,
      year: submission.year,
      sequenceNumber: submission.sequenceNumber,
      verificationCode: submission.verificationCode,
    },
  };
}

export class ExternalVerificationCoordinator {
  private readonly options: CoordinatorOptions;

  constructor(
    private readonly agent: RegistryAgent,
    private readonly copyStore: CopyStore,
    options: Partial<CoordinatorOptions> = {}
  ) {
    this.options = { ...defaultOptions(), ...options };
  }

  /**
   * Submits the certificate's identifiers to the registry, retrying only on
   * technical failure. A definitive answer (valid or invalid) ends the loop.
   */
  async verify(variant: string, extractedFields: ExtractedFields, documentId: string): Promise<ExternalVerificationOutcome> {
    const profile = profileFor(variant);
    const built = buildSubmission(profile.submission, extractedFields);
    if (!built.ok) {
      return {
        attempted: false,
        success: false,
        valid: false,
        message: `Cannot submit to registry, missing fields: ${built.missing.join(', ')}`,
        submittedInputs: built.inputs,
        attempts: [],
        retrievedCopyRef: null,
      };
    }

    const attempts: VerificationAttempt[] = [];
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const answer = await this.callAgent(variant, built.submission);
      attempts.push({
        attempt,
        submittedInputs: { ...built.inputs },
        outcome: answer.kind === 'technical_failure' ? 'technical_failure' : answer.valid ? 'valid' : 'invalid',
        message: answer.kind === 'technical_failure' ? answer.error : answer.message,
      });

      if (answer.kind === 'definitive') {
        log.info({ documentId, attempt, valid: answer.valid, inputs: built.inputs }, 'registry verification answered');
        const retrievedCopyRef = answer.valid && answer.officialCopy
          ? await this.storeCopy(documentId, answer.officialCopy)
          : null;
        return {
          attempted: true,
          success: true,
          valid: answer.valid,
          message: answer.message,
          submittedInputs: built.inputs,
          attempts,
          retrievedCopyRef,
        };
      }

      lastError = answer.error;
      log.warn(
        { documentId, attempt, maxAttempts: this.options.maxAttempts, inputs: built.inputs, error: answer.error },
        'registry verification attempt failed'
      );
      if (attempt < this.options.maxAttempts) {
        await this.options.sleep(this.options.retryDelayMs);
      }
    }

    return {
      attempted: true,
      success: false,
      valid: false,
      message: `No definitive registry answer after ${this.options.maxAttempts} attempts: ${lastError}`,
      submittedInputs: built.inputs,
      attempts,
      retrievedCopyRef: null,
    };
  }

  private async callAgent(variant: string, submission: RegistrySubmission): Promise<AgentAnswer> {
    try {
      return await this.agent.submitAndVerify(variant, submission);
    } catch (err) {
      return { kind: 'technical_failure', error: err instanceof Error ? err.message : String(err) };
    }
  }

  private async storeCopy(documentId: string, bytes: Buffer): Promise<string | null> {
    try {
      return await this.copyStore.save(documentId, bytes);
    } catch (err) {
      log.error({ documentId, err }, 'failed to store official copy');
      return null;
    }
  }
}
