import type { PoolClient } from 'pg';
import { pool } from './pool';
import { DuplicateJobError } from '../errors';
import type { CertificateDecision, IdentityData, JobState, ProcessingJob, TerminalJobState } from '../types/certificate';

export interface StoredRun {
  job: ProcessingJob;
  decision: CertificateDecision | null;
}

/** Append-only record of runs, their state transitions and final decisions. */
export interface JobStore {
  /** Throws DuplicateJobError when the document already has a non-terminal run. */
  createJob(job: ProcessingJob): Promise<void>;
  recordTransition(job: ProcessingJob, state: JobState, note: string): Promise<void>;
  /** Moves the run to its terminal state and stores its decision atomically. */
  finishRun(job: ProcessingJob, state: TerminalJobState, decision: CertificateDecision, note: string): Promise<void>;
  findLatest(documentId: string): Promise<StoredRun | null>;
}

interface JobRow {
  run_id: string;
  document_id: string;
  variant: string;
  identity_data: IdentityData;
  file_url: string;
  response_url: string | null;
  origin: string | null;
  destination: string | null;
  state: JobState;
  created_at: Date;
}

interface DecisionRow {
  decision: CertificateDecision;
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

function toJob(row: JobRow): ProcessingJob {
  return {
    runId: row.run_id,
    documentId: row.document_id,
    variant: row.variant,
    identityData: row.identity_data,
    fileUrl: row.file_url,
    responseUrl: row.response_url,
    origin: row.origin,
    destination: row.destination,
    state: row.state,
    createdAt: row.created_at,
  };
}

export class PgJobStore implements JobStore {
  async createJob(job: ProcessingJob): Promise<void> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(
        `INSERT INTO processing_jobs
           (run_id, document_id, variant, identity_data, file_url, response_url, origin, destination, state, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          job.runId,
          job.documentId,
          job.variant,
          JSON.stringify(job.identityData),
          job.fileUrl,
          job.responseUrl,
          job.origin,
          job.destination,
          job.state,
          job.createdAt,
        ]
      );
      await client.query(
        `INSERT INTO processing_job_events (run_id, document_id, state, note) VALUES ($1, $2, $3, $4)`,
        [job.runId, job.documentId, job.state, 'Job admitted']
      );
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      if (isUniqueViolation(error)) {
        throw new DuplicateJobError(job.documentId);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async recordTransition(job: ProcessingJob, state: JobState, note: string): Promise<void> {
    await this.inTransaction(async (client) => {
      await this.writeTransition(client, job, state, note);
    });
  }

  async finishRun(
    job: ProcessingJob,
    state: TerminalJobState,
    decision: CertificateDecision,
    note: string
  ): Promise<void> {
    await this.inTransaction(async (client) => {
      await this.writeTransition(client, job, state, note);
      await client.query(
        `INSERT INTO certificate_decisions (run_id, document_id, status, decision, processed_at)
         VALUES ($1, $2, $3, $4, $5)`,
        [decision.runId, decision.documentId, decision.status, JSON.stringify(decision), decision.processedAt]
      );
    });
  }

  private async writeTransition(client: PoolClient, job: ProcessingJob, state: JobState, note: string): Promise<void> {
    await client.query(`UPDATE processing_jobs SET state = $1, updated_at = NOW() WHERE run_id = $2`, [
      state,
      job.runId,
    ]);
    await client.query(
      `INSERT INTO processing_job_events (run_id, document_id, state, note) VALUES ($1, $2, $3, $4)`,
      [job.runId, job.documentId, state, note]
    );
  }

  private async inTransaction(work: (client: PoolClient) => Promise<void>): Promise<void> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await work(client);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /** Runs left non-terminal by a previous process are never resumed; they end FAILED. */
  async failInterruptedRuns(): Promise<number> {
    const result = await pool.query<{ run_id: string }>(
      `WITH failed AS (
         UPDATE processing_jobs SET state = 'FAILED', updated_at = NOW()
          WHERE state IN ('PENDING', 'OCR', 'VALIDATION')
          RETURNING run_id, document_id
       )
       INSERT INTO processing_job_events (run_id, document_id, state, note)
       SELECT run_id, document_id, 'FAILED', 'Interrupted by service restart' FROM failed
       RETURNING run_id`
    );
    return result.rows.length;
  }

  async findLatest(documentId: string): Promise<StoredRun | null> {
    const jobs = await pool.query<JobRow>(
      `SELECT run_id, document_id, variant, identity_data, file_url, response_url, origin, destination, state, created_at
         FROM processing_jobs
        WHERE document_id = $1
        ORDER BY created_at DESC
        LIMIT 1`,
      [documentId]
    );
    const row = jobs.rows[0];
    if (!row) return null;

    const decisions = await pool.query<DecisionRow>(
      `SELECT decision FROM certificate_decisions WHERE run_id = $1`,
      [row.run_id]
    );
    return { job: toJob(row), decision: decisions.rows[0]?.decision ?? null };
  }
}
