import { config } from '../../config';
import type { ProcessingJob } from '../../types/certificate';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger({ module: 'queue' });

type JobHandler<T> = (data: T) => Promise<void>;

interface Job {
  id: string;
  type: string;
  execute: () => Promise<void>;
}

export type QueueJobs = {
  process_certificate: ProcessingJob;
};

export class JobQueue<Jobs extends Record<string, unknown>> {
  private queue: Job[] = [];
  private handlers: { [K in keyof Jobs]?: JobHandler<Jobs[K]> } = {};
  private processing = false;
  private activeJobs = 0;

  constructor(private readonly maxConcurrent: number = config.QUEUE_MAX_CONCURRENT) {}

  /** Each job runs once; a failure is logged and the queue moves on. */
  async add<K extends keyof Jobs & string>(type: K, data: Jobs[K]): Promise<string> {
    const job: Job = {
      id: `${type}_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`,
      type,
      execute: () => this.dispatch(type, data),
    };

    this.queue.push(job);
    this.process();

    return job.id;
  }

  register<K extends keyof Jobs & string>(type: K, handler: JobHandler<Jobs[K]>): void {
    this.handlers[type] = handler;
  }

  private async dispatch<K extends keyof Jobs & string>(type: K, data: Jobs[K]): Promise<void> {
    const handler = this.handlers[type];
    if (!handler) {
      log.error({ type }, 'no handler registered for job type');
      return;
    }
    await handler(data);
  }

  private process(): void {
    if (this.processing || this.activeJobs >= this.maxConcurrent) {
      return;
    }

    this.processing = true;

    while (this.queue.length > 0 && this.activeJobs < this.maxConcurrent) {
      const job = this.queue.shift();
      if (!job) break;

      this.activeJobs++;
      void this.processJob(job).finally(() => {
        this.activeJobs--;
        this.process();
      });
    }

    this.processing = false;
  }

  private async processJob(job: Job): Promise<void> {
    try {
      await job.execute();
    } catch (error) {
      log.error({ jobId: job.id, type: job.type, err: error }, 'job failed');
    }
  }

  getQueueSize(): number {
    return this.queue.length;
  }

  getActiveJobs(): number {
    return this.activeJobs;
  }
}

export const jobQueue = new JobQueue<QueueJobs>();
