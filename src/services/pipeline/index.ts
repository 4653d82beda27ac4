import { config } from '../../config';
import { PgJobStore, type JobStore } from '../../db/job-store';
import { GeminiFieldExtractor } from '../../ocr/gemini-extraction';
import { CertificateExtractor } from '../../ocr/extract-certificate-fields';
import type { ProcessingJob } from '../../types/certificate';
import { assess } from '../authenticity/authenticity-scorer';
import { DocumentAiTextRecognizer } from '../gcp/document-ai';
import { HttpDocumentSource } from '../intake/document-source';
import { jobQueue } from '../queue/job-queue';
import { HttpRegistryAgent } from '../registry/agent-client';
import { ExternalVerificationCoordinator } from '../registry/verification-coordinator';
import { S3CopyStore } from '../storage/s3-copy-store';
import { deliverDecision } from '../webhooks/deliver';
import { activeJobs } from './admission';
import { IntakeService } from './intake';
import { processCertificateJob, type PipelineDependencies } from './orchestrator';

export const PROCESS_CERTIFICATE_JOB = 'process_certificate';

export function createPipelineDependencies(store: JobStore = new PgJobStore()): PipelineDependencies {
  const copyStore = new S3CopyStore();
  return {
    store,
    source: new HttpDocumentSource(),
    extractor: new CertificateExtractor(new DocumentAiTextRecognizer(), new GeminiFieldExtractor()),
    verifier: new ExternalVerificationCoordinator(new HttpRegistryAgent(), copyStore),
    copyStore,
    assessAuthenticity: (bytes, origin) => assess(bytes, origin),
    notify: deliverDecision,
    admission: activeJobs,
    compareRetrievedCopy: config.COMPARE_RETRIEVED_COPY,
  };
}

export function createIntakeService(store: JobStore): IntakeService {
  return new IntakeService({
    store,
    admission: activeJobs,
    enqueue: (job) => jobQueue.add(PROCESS_CERTIFICATE_JOB, job),
  });
}

export function registerPipelineHandler(deps: PipelineDependencies): void {
  jobQueue.register(PROCESS_CERTIFICATE_JOB, async (job: ProcessingJob) => {
    await processCertificateJob(job, deps);
  });
}
