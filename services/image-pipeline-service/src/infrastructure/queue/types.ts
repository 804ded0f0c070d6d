/** Runs one claimed job to completion. Must not reject. */
export type JobProcessor = (jobId: string) => Promise<void>;

/**
 * FIFO hand-off between the job registry and its workers. The queue only
 * carries job ids; state lives with the registry.
 */
export interface WorkQueue {
  readonly name: string;
  /** Registers the processor; idempotent. */
  start(processor: JobProcessor): void;
  add(jobId: string): Promise<void>;
  /** Drops a job that has not been claimed yet. */
  remove(jobId: string): Promise<void>;
  close(): Promise<void>;
}
