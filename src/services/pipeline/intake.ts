import { v4 as uuidv4 } from 'uuid';
import { missingRequiredConcepts, profileFor } from '../../documents/document-registry';
import { DuplicateJobError, MissingIdentityDataError } from '../../errors';
import type { JobStore, StoredRun } from '../../db/job-store';
import type { IdentityData, ProcessingJob } from '../../types/certificate';
import { createChildLogger } from '../../utils/logger';
import type { ActiveJobRegistry } from './admission';

const log = createChildLogger({ module: 'intake' });

export interface IntakeRequest {
  documentId: string;
  fileUrl: string;
  variant: string;
  identityData: IdentityData;
  responseUrl?: string | null;
  origin?: string | null;
  destination?: string | null;
}

export interface IntakeReceipt {
  documentId: string;
  runId: string;
  variant: string;
  status: 'PROCESSING';
  createdAt: string;
}

export interface IntakeDependencies {
  store: JobStore;
  admission: ActiveJobRegistry;
  enqueue: (job: ProcessingJob) => Promise<string>;
  newRunId?: () => string;
  now?: () => Date;
}

/**
 * Admission of new certificate runs. Every intake error is raised before a
 * job exists; an admitted job is persisted and handed to the queue.
 */
export class IntakeService {
  constructor(private readonly deps: IntakeDependencies) {}

  async submit(request: IntakeRequest): Promise<IntakeReceipt> {
    const profile = profileFor(request.variant);
    const missing = missingRequiredConcepts(profile, request.identityData);
    if (missing.length > 0) {
      throw new MissingIdentityDataError(missing);
    }

    const runId = (this.deps.newRunId ?? uuidv4)();
    if (!this.deps.admission.tryAcquire(request.documentId, runId)) {
      log.warn({ documentId: request.documentId }, 'duplicate intake rejected');
      throw new DuplicateJobError(request.documentId);
    }

    const job: ProcessingJob = {
      runId,
      documentId: request.documentId,
      variant: profile.variant,
      identityData: { ...request.identityData },
      fileUrl: request.fileUrl,
      responseUrl: request.responseUrl ?? null,
      origin: request.origin ?? null,
      destination: request.destination ?? null,
      state: 'PENDING',
      createdAt: (this.deps.now ?? (() => new Date()))(),
    };

    try {
      await this.deps.store.createJob(job);
      await this.deps.enqueue(job);
    } catch (error) {
      this.deps.admission.release(job.documentId, runId);
      throw error;
    }

    log.info({ documentId: job.documentId, runId, variant: job.variant }, 'certificate job admitted');
    return {
      documentId: job.documentId,
      runId,
      variant: job.variant,
      status: 'PROCESSING',
      createdAt: job.createdAt.toISOString(),
    };
  }

  async latestRun(documentId: string): Promise<StoredRun | null> {
    return this.deps.store.findLatest(documentId);
  }
}
