import type { JobStore, StoredRun } from '../../src/db/job-store';
import { DuplicateJobError } from '../../src/errors';
import type { FieldExtraction, FieldExtractor } from '../../src/ocr/gemini-extraction';
import type { TextRecognizer } from '../../src/services/gcp/document-ai';
import type { DocumentSource, FetchedDocument } from '../../src/services/intake/document-source';
import type { AgentAnswer, CopyStore, RegistryAgent, RegistrySubmission } from '../../src/services/registry/types';
import type { DocumentTypeProfile } from '../../src/documents/document-registry';
import {
  ACTIVE_JOB_STATES,
  type CertificateDecision,
  type IdentityData,
  type JobState,
  type ProcessingJob,
  type TerminalJobState,
} from '../../src/types/certificate';

export class InMemoryJobStore implements JobStore {
  readonly jobs: ProcessingJob[] = [];
  readonly events: { runId: string; state: JobState; note: string }[] = [];
  readonly decisions: CertificateDecision[] = [];

  async createJob(job: ProcessingJob): Promise<void> {
    const active = this.jobs.some((j) => j.documentId === job.documentId && ACTIVE_JOB_STATES.includes(j.state));
    if (active) {
      throw new DuplicateJobError(job.documentId);
    }
    this.jobs.push({ ...job });
    this.events.push({ runId: job.runId, state: job.state, note: 'Job admitted' });
  }

  async recordTransition(job: ProcessingJob, state: JobState, note: string): Promise<void> {
    const stored = this.jobs.find((j) => j.runId === job.runId);
    if (stored) stored.state = state;
    this.events.push({ runId: job.runId, state, note });
  }

  async finishRun(
    job: ProcessingJob,
    state: TerminalJobState,
    decision: CertificateDecision,
    note: string
  ): Promise<void> {
    await this.recordTransition(job, state, note);
    this.decisions.push(decision);
  }

  async findLatest(documentId: string): Promise<StoredRun | null> {
    const runs = this.jobs.filter((j) => j.documentId === documentId);
    const job = runs[runs.length - 1];
    if (!job) return null;
    return { job, decision: this.decisions.find((d) => d.runId === job.runId) ?? null };
  }

  statesFor(runId: string): JobState[] {
    return this.events.filter((e) => e.runId === runId).map((e) => e.state);
  }
}

export class StaticDocumentSource implements DocumentSource {
  readonly fetched: string[] = [];

  constructor(private readonly document: FetchedDocument | Error) {}

  async fetch(fileUrl: string): Promise<FetchedDocument> {
    this.fetched.push(fileUrl);
    if (this.document instanceof Error) throw this.document;
    return this.document;
  }
}

export class FakeTextRecognizer implements TextRecognizer {
  calls = 0;

  constructor(private readonly text: string | Error = 'CERTIFICADO DE ANTECEDENTES LABORALES Y PREVISIONALES') {}

  async recognize(): Promise<string> {
    this.calls++;
    if (this.text instanceof Error) throw this.text;
    return this.text;
  }
}

/** Returns queued extractions in order, repeating the last one. */
export class QueuedFieldExtractor implements FieldExtractor {
  calls = 0;
  private readonly answers: FieldExtraction[];

  constructor(...answers: FieldExtraction[]) {
    this.answers = answers;
  }

  async extract(_rawText: string, _profile: DocumentTypeProfile): Promise<FieldExtraction> {
    const answer = this.answers[Math.min(this.calls, this.answers.length - 1)];
    this.calls++;
    if (!answer) throw new Error('no extraction queued');
    return answer;
  }
}

/** Plays back scripted answers; a thrown Error simulates an automation crash. */
export class ScriptedRegistryAgent implements RegistryAgent {
  readonly calls: { variant: string; submission: RegistrySubmission }[] = [];

  constructor(private readonly script: (AgentAnswer | Error)[]) {}

  async submitAndVerify(variant: string, submission: RegistrySubmission): Promise<AgentAnswer> {
    this.calls.push({ variant, submission });
    const step = this.script[Math.min(this.calls.length - 1, this.script.length - 1)];
    if (!step) throw new Error('agent script is empty');
    if (step instanceof Error) throw step;
    return step;
  }
}

export class InMemoryCopyStore implements CopyStore {
  readonly copies = new Map<string, Buffer>();

  async save(documentId: string, bytes: Buffer): Promise<string> {
    const ref = `copies/${documentId}/${this.copies.size + 1}.pdf`;
    this.copies.set(ref, bytes);
    return ref;
  }

  async load(ref: string): Promise<Buffer> {
    const bytes = this.copies.get(ref);
    if (!bytes) throw new Error(`missing copy ${ref}`);
    return bytes;
  }
}

export const TECHNICAL_FAILURE: AgentAnswer = { kind: 'technical_failure', error: 'portal did not respond' };
export const VALID_ANSWER: Extract<AgentAnswer, { kind: 'definitive' }> = { kind: 'definitive', valid: true, message: 'Certificado válido' };
export const INVALID_ANSWER: Extract<AgentAnswer, { kind: 'definitive' }> = { kind: 'definitive', valid: false, message: 'Certificado no encontrado' };

export function razonSocialFields(overrides: Record<string, string | null> = {}): Record<string, string | null> {
  return {
    rut_empleador: '76.123.456-7',
    razon_social: 'CONSTRUCTORA LOS ANDES SPA',
    codigo_certificado: 'AB12CD34EF56',
    fecha_emision: '15/03/2024',
    multas_ejecutoriadas: '-- NO REGISTRA --',
    deudas_previsionales: 'NO REGISTRA',
    ...overrides,
  };
}

export function personaNaturalFields(overrides: Record<string, string | null> = {}): Record<string, string | null> {
  return {
    rut: '12.345.678-5',
    nombre_completo: 'MARÍA JOSÉ GONZÁLEZ PÉREZ',
    folio_oficina: '1301',
    folio_anio: '2024',
    folio_numero_consecutivo: '000123',
    codigo_verificacion: 'x9k2',
    fecha_emision: '02/04/2024',
    multas_ejecutoriadas: 'NO REGISTRA',
    deudas_previsionales: 'NO REGISTRA',
    ...overrides,
  };
}

export function matchedExtraction(fields: Record<string, string | null>): FieldExtraction {
  return { matchesExpectedType: true, detectedType: null, reason: '', fields };
}

export function makeJob(overrides: Partial<ProcessingJob> = {}, identityData?: IdentityData): ProcessingJob {
  return {
    runId: 'run-0001',
    documentId: 'doc-0001',
    variant: 'razon_social',
    identityData: identityData ?? { rut_empleador: '76123456-7', razon_social_empleador: 'Constructora Los Andes SpA' },
    fileUrl: 'https://files.example.test/certificates/doc-0001.pdf',
    responseUrl: null,
    origin: 'portal',
    destination: 'compliance',
    state: 'PENDING',
    createdAt: new Date('2024-03-16T10:00:00.000Z'),
    ...overrides,
  };
}
