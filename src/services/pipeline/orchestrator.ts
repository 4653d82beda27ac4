import { profileFor, type DocumentTypeProfile } from '../../documents/document-registry';
import { UnreadableDocumentError } from '../../errors';
import { missingRequiredFields, type CertificateExtractor } from '../../ocr/extract-certificate-fields';
import type {
  AuthenticityResult,
  CertificateDecision,
  DecisionStatus,
  ExternalVerificationOutcome,
  ExtractedFields,
  JobState,
  ProcessingJob,
  RejectionReason,
  ValidationResult,
} from '../../types/certificate';
import { deepFreeze } from '../../utils/freeze';
import { createChildLogger, type Logger } from '../../utils/logger';
import { evaluate } from '../../validation-engine/validation-engine';
import type { OriginMetadata } from '../authenticity/authenticity-scorer';
import type { JobStore } from '../../db/job-store';
import type { DocumentSource, FetchedDocument } from '../intake/document-source';
import type { ExternalVerificationCoordinator } from '../registry/verification-coordinator';
import type { CopyStore } from '../registry/types';
import { compareWithOfficialCopy } from '../validation/copy-comparison';
import type { ActiveJobRegistry } from './admission';
import { deriveStatus, notAttempted } from './decision';
import { ProcessingTrace } from './processing-trace';

export interface PipelineDependencies {
  store: JobStore;
  source: DocumentSource;
  extractor: CertificateExtractor;
  verifier: Pick<ExternalVerificationCoordinator, 'verify'>;
  copyStore: CopyStore;
  assessAuthenticity: (bytes: Buffer, origin: OriginMetadata) => Promise<AuthenticityResult>;
  notify: (responseUrl: string, decision: CertificateDecision) => Promise<boolean>;
  admission: ActiveJobRegistry;
  compareRetrievedCopy: boolean;
  now?: () => Date;
}

interface RunState {
  extractedData: ExtractedFields | null;
  validationResults: ValidationResult[];
  rejectionReasons: RejectionReason[];
  authenticityResult: AuthenticityResult | null;
  externalVerification: ExternalVerificationOutcome;
  verificationUnresolved: boolean;
}

class CertificateRun {
  private readonly log: Logger;
  private readonly trace: ProcessingTrace;
  private readonly state: RunState = {
    extractedData: null,
    validationResults: [],
    rejectionReasons: [],
    authenticityResult: null,
    externalVerification: notAttempted(),
    verificationUnresolved: false,
  };

  constructor(
    private readonly job: ProcessingJob,
    private readonly deps: PipelineDependencies
  ) {
    this.log = createChildLogger({ module: 'pipeline', documentId: job.documentId, runId: job.runId });
    this.trace = new ProcessingTrace(this.log);
  }

  async execute(): Promise<CertificateDecision> {
    let decision: CertificateDecision;
    try {
      const status = await this.runStages();
      this.trace.add(
        'VALIDATION',
        `Final decision ${status} with ${this.state.rejectionReasons.length} rejection reason(s)`
      );
      const note = `Decision ${status} recorded`;
      this.trace.add('COMPLETED', `${this.job.state} -> COMPLETED: ${note}`);
      decision = this.buildDecision(status);
      await this.deps.store.finishRun(this.job, 'COMPLETED', decision, note);
      this.job.state = 'COMPLETED';
    } catch (err) {
      decision = await this.fail(err);
    } finally {
      this.deps.admission.release(this.job.documentId, this.job.runId);
    }

    if (this.job.responseUrl) {
      try {
        await this.deps.notify(this.job.responseUrl, decision);
      } catch (err) {
        this.log.warn({ err }, 'decision callback raised');
      }
    }
    return decision;
  }

  private async runStages(): Promise<DecisionStatus> {
    const { job } = this;
    this.trace.add(job.state, `Run ${job.runId} started for document ${job.documentId} (variant ${job.variant})`);
    const profile = profileFor(job.variant);

    await this.transition('OCR', 'Downloading and reading document');
    const document = await this.deps.source.fetch(job.fileUrl);
    this.trace.add(
      'OCR',
      `Downloaded ${document.bytes.length} bytes (content-type ${document.origin.contentType ?? 'unknown'})`
    );
    const rawText = await this.readText(document);

    await this.transition('VALIDATION', 'Validating document');
    return this.validate(profile, document, rawText);
  }

  private async readText(document: FetchedDocument): Promise<string | null> {
    try {
      const text = await this.deps.extractor.readText(document.bytes);
      this.trace.add('OCR', `Recognized ${text.length} characters of text`);
      return text;
    } catch (err) {
      if (err instanceof UnreadableDocumentError) {
        this.trace.add('OCR', 'No readable text found in document', 'warn');
        return null;
      }
      throw err;
    }
  }

  private async validate(
    profile: DocumentTypeProfile,
    document: FetchedDocument,
    rawText: string | null
  ): Promise<DecisionStatus> {
    const { job, state } = this;

    if (rawText === null) {
      return this.shortCircuit({ type: 'extraction_failed', details: 'Document contains no readable text' });
    }

    const extraction = await this.deps.extractor.extractFromText(rawText, profile);
    state.extractedData = extraction.fields;
    if (!extraction.matchedVariant) {
      const detected = extraction.detectedType ?? 'an unrecognized document';
      return this.shortCircuit({
        type: 'classification_mismatch',
        details: `Declared ${profile.displayName} but document looks like ${detected}${extraction.reason ? `: ${extraction.reason}` : ''}`,
      });
    }
    const missing = missingRequiredFields(profile, extraction.fields);
    if (missing.length > 0) {
      return this.shortCircuit({
        type: 'extraction_failed',
        details: `Required fields could not be extracted: ${missing.join(', ')}`,
      });
    }
    this.trace.add('VALIDATION', `Classified as ${profile.displayName}; ${Object.keys(extraction.fields).length} fields extracted`);

    const authenticity = await this.deps.assessAuthenticity(document.bytes, document.origin);
    state.authenticityResult = authenticity;
    if (authenticity.verdict === 'FAILED') {
      state.rejectionReasons.push({
        type: 'authenticity_failed',
        details: `Authenticity check failed: ${authenticity.signals.join(', ')}`,
      });
      this.trace.add('VALIDATION', `Authenticity FAILED: ${authenticity.signals.join(', ')}`, 'warn');
    } else if (authenticity.verdict === 'WARNING') {
      this.trace.add('VALIDATION', `Authenticity WARNING: ${authenticity.signals.join(', ')}`, 'warn');
    } else {
      this.trace.add('VALIDATION', 'Authenticity PASSED');
    }

    const report = evaluate(profile, extraction.fields, job.identityData);
    state.validationResults = report.validationResults;
    state.rejectionReasons.push(...report.rejections);
    for (const result of report.validationResults) {
      this.trace.add('VALIDATION', `Rule ${result.rule}: ${result.passed ? 'passed' : 'failed'} (${result.message})`);
    }

    if (authenticity.verdict === 'FAILED') {
      this.trace.add('VALIDATION', 'External verification skipped because authenticity failed');
    } else {
      await this.verifyExternally(profile, extraction.fields);
    }

    return deriveStatus(state.rejectionReasons, state.verificationUnresolved);
  }

  private async verifyExternally(profile: DocumentTypeProfile, fields: ExtractedFields): Promise<void> {
    const { job, state } = this;
    const outcome = await this.deps.verifier.verify(job.variant, fields, job.documentId);
    state.externalVerification = outcome;
    this.trace.add(
      'VALIDATION',
      `Registry submission inputs: ${JSON.stringify(outcome.submittedInputs ?? {})}`
    );
    for (const attempt of outcome.attempts) {
      this.trace.add('VALIDATION', `Registry attempt ${attempt.attempt}: ${attempt.outcome} (${attempt.message})`);
    }

    if (!outcome.success) {
      state.verificationUnresolved = true;
      state.rejectionReasons.push({
        type: 'download_error',
        details: `Registry verification unresolved: ${outcome.message}`,
      });
      this.trace.add('VALIDATION', 'Registry gave no definitive answer; certificate needs manual review', 'warn');
      return;
    }
    if (!outcome.valid) {
      state.rejectionReasons.push({
        type: 'invalid_certificate',
        details: `Registry reports the certificate as invalid: ${outcome.message}`,
      });
      return;
    }
    this.trace.add('VALIDATION', 'Registry confirmed the certificate');

    if (outcome.retrievedCopyRef && this.deps.compareRetrievedCopy) {
      await this.compareOfficialCopy(profile, fields, outcome.retrievedCopyRef);
    }
  }

  private async compareOfficialCopy(profile: DocumentTypeProfile, fields: ExtractedFields, ref: string): Promise<void> {
    let retrieved: ExtractedFields;
    try {
      const copy = await this.deps.copyStore.load(ref);
      retrieved = (await this.deps.extractor.extract(copy, profile)).fields;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.trace.add('VALIDATION', `Official copy could not be compared: ${message}`, 'warn');
      return;
    }

    const differences = compareWithOfficialCopy(profile, fields, retrieved);
    if (differences.length === 0) {
      this.trace.add('VALIDATION', 'Submitted document matches the official copy');
      return;
    }
    this.state.rejectionReasons.push({
      type: 'data_mismatch',
      details: `Submitted document differs from the official copy in: ${differences.map((d) => d.field).join(', ')}`,
      differences,
    });
    this.trace.add('VALIDATION', `Official copy differs in ${differences.length} field(s)`, 'warn');
  }

  private shortCircuit(reason: RejectionReason): DecisionStatus {
    this.state.rejectionReasons.push(reason);
    this.trace.add('VALIDATION', `${reason.type}: ${reason.details}; remaining checks skipped`, 'warn');
    return deriveStatus(this.state.rejectionReasons, false);
  }

  private async transition(next: JobState, note: string): Promise<void> {
    this.trace.add(next, `${this.job.state} -> ${next}: ${note}`);
    this.job.state = next;
    await this.deps.store.recordTransition(this.job, next, note);
  }

  private async fail(err: unknown): Promise<CertificateDecision> {
    const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    this.trace.add(this.job.state, `Technical error during ${this.job.state}: ${message}`, 'error');
    this.trace.add('FAILED', `${this.job.state} -> FAILED: Run ended by a technical error`);
    this.job.state = 'FAILED';
    const decision = this.buildDecision('ERROR');
    try {
      await this.deps.store.finishRun(this.job, 'FAILED', decision, message);
    } catch (persistErr) {
      this.log.error({ err: persistErr }, 'could not persist ERROR decision');
    }
    return decision;
  }

  private buildDecision(status: DecisionStatus): CertificateDecision {
    const now = this.deps.now ?? (() => new Date());
    return deepFreeze({
      documentId: this.job.documentId,
      runId: this.job.runId,
      variant: this.job.variant,
      status,
      extractedData: this.state.extractedData,
      validationResults: this.state.validationResults,
      rejectionReasons: this.state.rejectionReasons,
      authenticityResult: this.state.authenticityResult,
      externalVerification: this.state.externalVerification,
      processingLog: this.trace.entries(),
      processedAt: now().toISOString(),
    });
  }
}

/**
 * Runs one admitted job to a terminal state and returns its decision.
 * Never rejects: technical faults become an ERROR decision.
 */
export function processCertificateJob(job: ProcessingJob, deps: PipelineDependencies): Promise<CertificateDecision> {
  return new CertificateRun(job, deps).execute();
}
