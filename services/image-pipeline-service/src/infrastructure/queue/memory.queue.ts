import pLimit from 'p-limit';
import { AppError } from '@domain/errors';
import { JobProcessor, WorkQueue } from './types';

/** In-process queue: jobs run in submission order, at most `concurrency` at a time. */
export class MemoryWorkQueue implements WorkQueue {
  readonly name = 'memory';
  private readonly limit: ReturnType<typeof pLimit>;
  private processor: JobProcessor | null = null;

  constructor(concurrency: number) {
    this.limit = pLimit(concurrency);
  }

  start(processor: JobProcessor): void {
    this.processor ??= processor;
  }

  async add(jobId: string): Promise<void> {
    const processor = this.processor;
    if (!processor) {
      throw AppError.executionError('Work queue has no processor', { jobId });
    }
    // Settles with the job; callers only wait for the hand-off.
    void this.limit(() => processor(jobId));
  }

  // Unclaimed entries stay in the limiter; the processor skips jobs that are no longer queued.
  async remove(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    this.limit.clearQueue();
  }
}
