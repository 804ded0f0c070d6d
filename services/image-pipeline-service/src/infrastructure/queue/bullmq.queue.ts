import { ConnectionOptions, Job, Queue, Worker } from 'bullmq';
import { toError } from '@domain/errors';
import { LoggingClient } from '@infrastructure/logging';
import { JobProcessor, WorkQueue } from './types';

export interface QueuedJob {
  jobId: string;
}

export interface BullWorkQueueOptions {
  name: string;
  concurrency: number;
  connection: ConnectionOptions;
}

/**
 * Redis-backed queue with an in-process worker. Job ids are the registry's
 * ids, so each service instance needs its own queue name.
 */
export class BullWorkQueue implements WorkQueue {
  readonly name = 'bullmq';
  private readonly queue: Queue<QueuedJob>;
  private worker: Worker<QueuedJob> | null = null;

  constructor(
    private readonly options: BullWorkQueueOptions,
    private readonly logger: LoggingClient
  ) {
    this.queue = new Queue<QueuedJob>(options.name, {
      connection: options.connection,
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: true,
      },
    });
  }

  start(processor: JobProcessor): void {
    if (this.worker) return;

    this.worker = new Worker<QueuedJob>(
      this.options.name,
      async (job: Job<QueuedJob>) => {
        await processor(job.data.jobId);
      },
      { connection: this.options.connection, concurrency: this.options.concurrency }
    );

    this.worker.on('failed', (job, error) => this.logger.error('Queued job failed', error, { jobId: job?.data.jobId }));
    this.worker.on('error', (error) => this.logger.error('Queue worker error', error));
  }

  async add(jobId: string): Promise<void> {
    await this.queue.add('transform', { jobId }, { jobId });
  }

  async remove(jobId: string): Promise<void> {
    const job = await this.queue.getJob(jobId);
    if (!job) return;
    try {
      await job.remove();
    } catch (error) {
      // A worker holds the lock once the job is claimed.
      this.logger.debug('Queued job already claimed', { jobId, reason: toError(error).message });
    }
  }

  async close(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
    await this.queue.close();
  }
}
