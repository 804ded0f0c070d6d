import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { AppError, CacheUnavailableError, toError } from '@domain/errors';
import { ImageFormat, JobState, isTerminalState } from '@domain/types/common';
import { TransformSpec } from '@domain/types/operations';
import {
  Artifact, ImageRecord, JobError, JobHandle, JobRecord, JobStatusView, toArtifactRef, toJobStatusView,
} from '@domain/types/responses';
import { LoggingClient } from '@infrastructure/logging';
import { MetadataStore } from '@infrastructure/metadata';
import { recordJobTransition, recordTransform, setQueueDepth, startSpan } from '@infrastructure/observability';
import { MemoryWorkQueue, WorkQueue } from '@infrastructure/queue';
import { CacheService } from '@services/cache';
import { fingerprintService } from '@services/fingerprint';

export interface TransformTask {
  fingerprint: string;
  image: ImageRecord;
  userId: string;
  spec: TransformSpec;
  outputFormat: ImageFormat;
}

/** Produces the artifact for a task: loads the source and runs the transform. */
export type TaskExecutor = (task: TransformTask) => Promise<Artifact>;

export interface JobServiceOptions {
  concurrency: number;
  maxExecutionMs: number;
  retentionMs: number;
  sweepIntervalMs: number;
  /** Defaults to an in-process queue bounded by `concurrency`. */
  queue?: WorkQueue;
  now?: () => number;
}

export type CancelOutcome = 'cancelled' | 'running' | 'terminal';

export type JobAccess = 'allowed' | 'forbidden' | 'unknown';

interface JobEntry {
  record: JobRecord;
  task: TransformTask;
  expiresAt?: number;
  waiters: Array<() => void>;
  persisting: Promise<void>;
}

/**
 * Job registry in front of a work queue.
 *
 * At most one non-terminal job exists per fingerprint: `submit` looks up and
 * inserts without yielding, so concurrent callers attach to the same job and
 * each of them is recorded as a subscriber. Jobs are claimed FIFO, never
 * retried, and reclaimed `retentionMs` after reaching a terminal state. Jobs
 * keep a reference to their artifact; the bytes live in the cache.
 */
export class JobService {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly active = new Map<string, string>();
  private readonly recomputing = new Map<string, Promise<Artifact>>();
  private readonly recomputeLimit: ReturnType<typeof pLimit>;
  private readonly queue: WorkQueue;
  private readonly counts = { queued: 0, running: 0 };
  private sweeper: NodeJS.Timeout | null = null;
  private closed = false;
  private readonly now: () => number;

  constructor(
    private readonly execute: TaskExecutor,
    private readonly cache: CacheService,
    private readonly store: MetadataStore,
    private readonly logger: LoggingClient,
    private readonly options: JobServiceOptions
  ) {
    this.now = options.now ?? Date.now;
    this.queue = options.queue ?? new MemoryWorkQueue(options.concurrency);
    this.recomputeLimit = pLimit(options.concurrency);
    this.queue.start((jobId) => this.process(jobId));
  }

  get queueName(): string {
    return this.queue.name;
  }

  start(): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.sweeper.unref();
  }

  submit(task: TransformTask): JobHandle {
    const existing = this.inFlight(task.fingerprint);
    if (existing) {
      this.subscribe(existing, task.userId);
      this.logger.debug('Attached to in-flight job', { jobId: existing.record.id, fingerprint: task.fingerprint });
      return this.handle(existing, false);
    }

    if (this.closed) {
      throw AppError.executionError('Job scheduler is shutting down');
    }

    const id = uuidv4();
    const entry: JobEntry = {
      record: {
        id,
        fingerprint: task.fingerprint,
        imageId: task.image.id,
        userId: task.userId,
        subscribers: [task.userId],
        state: 'queued',
        outputFormat: task.outputFormat,
        operations: JSON.stringify(task.spec),
        createdAt: new Date(this.now()).toISOString(),
      },
      task,
      waiters: [],
      persisting: Promise.resolve(),
    };

    this.jobs.set(id, entry);
    this.active.set(task.fingerprint, id);
    this.counts.queued++;
    recordJobTransition('queued');
    this.persist(entry);
    this.logger.info('Job queued', { jobId: id, fingerprint: task.fingerprint, imageId: task.image.id });

    this.enqueue(entry);
    return this.handle(entry, true);
  }

  /** In-flight job for a fingerprint. A given `userId` is attached to it. */
  findActive(fingerprint: string, userId?: string): JobHandle | null {
    const entry = this.inFlight(fingerprint);
    if (!entry) return null;
    if (userId !== undefined) {
      this.subscribe(entry, userId);
    }
    return this.handle(entry, false);
  }

  async status(jobId: string): Promise<JobStatusView> {
    const entry = this.jobs.get(jobId);
    if (entry) return toJobStatusView(entry.record);

    const stored = await this.store.getJob(jobId);
    if (!stored) {
      throw AppError.jobNotFound(`Job not found: ${jobId}`, { jobId });
    }
    return toJobStatusView(stored);
  }

  /** Whether `userId` created or attached to the job. */
  async access(jobId: string, userId: string): Promise<JobAccess> {
    const record = this.jobs.get(jobId)?.record ?? (await this.store.getJob(jobId));
    if (!record) return 'unknown';
    return record.userId === userId || record.subscribers.includes(userId) ? 'allowed' : 'forbidden';
  }

  /** Artifact of a succeeded job, from the cache or recomputed when it has been evicted. */
  async result(jobId: string): Promise<Artifact> {
    const entry = this.jobs.get(jobId);
    const record = entry ? entry.record : await this.store.getJob(jobId);
    if (!record) {
      throw AppError.jobNotFound(`Job not found: ${jobId}`, { jobId });
    }

    if (record.state !== 'succeeded') {
      throw AppError.jobNotReady(`Job ${jobId} is ${record.state}`, { jobId, state: record.state, error: record.error });
    }

    const cached = await this.cached(record);
    if (cached) return cached;
    return this.recompute(record, entry?.task);
  }

  cancel(jobId: string): CancelOutcome {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      throw AppError.jobNotFound(`Job not found: ${jobId}`, { jobId });
    }

    switch (entry.record.state) {
      case 'queued':
        this.transition(entry, 'cancelled', { completedAt: this.timestamp() });
        this.queue.remove(jobId).catch((error: unknown) => {
          this.logger.warn('Failed to drop cancelled job from the queue', { jobId, reason: toError(error).message });
        });
        return 'cancelled';
      case 'running':
        return 'running';
      default:
        return 'terminal';
    }
  }

  /** Resolves once the job is terminal or `timeoutMs` has elapsed, with the then-current view. */
  async wait(jobId: string, timeoutMs: number): Promise<JobStatusView> {
    const entry = this.jobs.get(jobId);
    if (!entry || isTerminalState(entry.record.state) || timeoutMs <= 0) {
      return this.status(jobId);
    }

    await new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        entry.waiters = entry.waiters.filter((waiter) => waiter !== done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      entry.waiters.push(done);
    });

    return toJobStatusView(entry.record);
  }

  /** Reclaims terminal jobs whose retention has elapsed. */
  sweep(now: number = this.now()): number {
    let reclaimed = 0;
    for (const [id, entry] of this.jobs) {
      if (entry.expiresAt === undefined || entry.expiresAt > now) continue;
      this.jobs.delete(id);
      entry.persisting = entry.persisting
        .then(async () => {
          await this.store.deleteJob(id);
        })
        .catch((error: unknown) => {
          this.logger.error('Failed to delete expired job record', toError(error), { jobId: id });
        });
      reclaimed++;
    }
    if (reclaimed > 0) {
      this.logger.debug('Reclaimed expired jobs', { count: reclaimed });
    }
    return reclaimed;
  }

  stats(): { queued: number; running: number; tracked: number } {
    return { ...this.counts, tracked: this.jobs.size };
  }

  /** Waits for pending record writes. */
  async flush(): Promise<void> {
    await Promise.all([...this.jobs.values()].map((entry) => entry.persisting));
  }

  /** Stops the sweep, cancels queued jobs, waits for running ones and closes the queue. */
  async close(): Promise<void> {
    this.closed = true;
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }

    const entries = [...this.jobs.values()];
    entries.filter((entry) => entry.record.state === 'queued').forEach((entry) => this.cancel(entry.record.id));

    const running = entries.filter((entry) => entry.record.state === 'running');
    await Promise.all(running.map((entry) => this.wait(entry.record.id, this.options.maxExecutionMs)));
    await this.queue.close();
    await this.flush();
  }

  /** Claimed by the work queue. Never rejects: every outcome is recorded on the job. */
  private async process(jobId: string): Promise<void> {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      this.logger.warn('Skipping job not tracked by this instance', { jobId });
      return;
    }
    // Cancelled while waiting for a worker.
    if (entry.record.state !== 'queued') return;

    this.transition(entry, 'running', { startedAt: this.timestamp() });
    const { task } = entry;
    const started = Date.now();

    try {
      const artifact = await startSpan(
        'pipeline.job.execute',
        () => this.withBudget(entry.record.id, this.execute(task)),
        {
          'job.id': entry.record.id,
          'job.fingerprint': task.fingerprint,
          'job.operations': task.spec.length,
          'job.output_format': task.outputFormat,
        }
      );

      await this.cacheArtifact(entry.record, artifact);
      recordTransform(true, Date.now() - started, artifact.metadata.format, artifact.metadata.size);
      this.transition(entry, 'succeeded', {
        completedAt: this.timestamp(),
        artifact: toArtifactRef(artifact),
      });
    } catch (error) {
      recordTransform(false, Date.now() - started);
      this.logger.warn('Job failed', {
        jobId: entry.record.id,
        fingerprint: task.fingerprint,
        error: toJobError(error),
      });
      this.transition(entry, 'failed', { completedAt: this.timestamp(), error: toJobError(error) });
    }
  }

  private enqueue(entry: JobEntry): void {
    this.reportDepth();
    this.queue.add(entry.record.id).catch((error: unknown) => {
      this.logger.error('Failed to enqueue job', toError(error), { jobId: entry.record.id });
      if (entry.record.state === 'queued') {
        this.transition(entry, 'failed', { completedAt: this.timestamp(), error: toJobError(error) });
      }
    });
  }

  /** Re-runs a succeeded job whose artifact left the cache; concurrent callers share one run. */
  private recompute(record: JobRecord, task?: TransformTask): Promise<Artifact> {
    const pending = this.recomputing.get(record.fingerprint);
    if (pending) return pending;

    const work = this.recomputeLimit(async () => {
      const resolved = task ?? (await this.restoreTask(record));
      this.logger.info('Recomputing evicted job result', { jobId: record.id, fingerprint: record.fingerprint });
      const artifact = await startSpan(
        'pipeline.job.recompute',
        () => this.withBudget(record.id, this.execute(resolved)),
        { 'job.id': record.id, 'job.fingerprint': record.fingerprint }
      );
      await this.cacheArtifact(record, artifact);
      return artifact;
    }).finally(() => {
      this.recomputing.delete(record.fingerprint);
    });

    this.recomputing.set(record.fingerprint, work);
    return work;
  }

  private async restoreTask(record: JobRecord): Promise<TransformTask> {
    const image = await this.store.getImage(record.imageId);
    if (!image) {
      throw AppError.jobNotFound(`Source of job ${record.id} is no longer available`, {
        jobId: record.id,
        imageId: record.imageId,
      });
    }

    let spec: TransformSpec;
    try {
      spec = fingerprintService.parse(JSON.parse(record.operations));
    } catch (error) {
      throw AppError.jobNotFound(`Result of job ${record.id} cannot be rebuilt`, {
        jobId: record.id,
        reason: toError(error).message,
      });
    }

    return {
      fingerprint: record.fingerprint,
      image,
      userId: record.userId,
      spec,
      outputFormat: record.outputFormat,
    };
  }

  private async cached(record: JobRecord): Promise<Artifact | null> {
    try {
      return await this.cache.get(record.fingerprint);
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      this.logger.warn('Cache unavailable, recomputing job result', { jobId: record.id, reason: error.message });
      return null;
    }
  }

  private withBudget(jobId: string, work: Promise<Artifact>): Promise<Artifact> {
    const { maxExecutionMs } = this.options;
    let timer: NodeJS.Timeout | undefined;
    const budget = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(AppError.timeout(`Job exceeded its ${maxExecutionMs}ms execution budget`, { jobId, maxExecutionMs }));
      }, maxExecutionMs);
    });

    return Promise.race([work, budget]).finally(() => clearTimeout(timer));
  }

  private async cacheArtifact(record: JobRecord, artifact: Artifact): Promise<void> {
    try {
      await this.cache.put(record.fingerprint, artifact);
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      this.logger.warn('Cache unavailable, artifact not stored', {
        jobId: record.id,
        fingerprint: record.fingerprint,
        reason: error.message,
      });
    }
  }

  private inFlight(fingerprint: string): JobEntry | undefined {
    const activeId = this.active.get(fingerprint);
    const entry = activeId ? this.jobs.get(activeId) : undefined;
    return entry && !isTerminalState(entry.record.state) ? entry : undefined;
  }

  private subscribe(entry: JobEntry, userId: string): void {
    if (entry.record.subscribers.includes(userId)) return;
    entry.record = { ...entry.record, subscribers: [...entry.record.subscribers, userId] };
    this.persist(entry);
  }

  private transition(entry: JobEntry, state: JobState, patch: Partial<JobRecord> = {}): void {
    this.count(entry.record.state, -1);
    this.count(state, 1);
    entry.record = { ...entry.record, ...patch, state };
    recordJobTransition(state);
    this.persist(entry);
    this.reportDepth();

    if (isTerminalState(state)) {
      if (this.active.get(entry.record.fingerprint) === entry.record.id) {
        this.active.delete(entry.record.fingerprint);
      }
      entry.expiresAt = this.now() + this.options.retentionMs;
      const waiters = entry.waiters;
      entry.waiters = [];
      waiters.forEach((notify) => notify());
      this.logger.info('Job finished', { jobId: entry.record.id, state });
    }
  }

  private count(state: JobState, delta: number): void {
    if (state === 'queued' || state === 'running') {
      this.counts[state] += delta;
    }
  }

  private persist(entry: JobEntry): void {
    const snapshot: JobRecord = { ...entry.record };
    entry.persisting = entry.persisting
      .then(() => this.store.saveJob(snapshot))
      .catch((error: unknown) => {
        this.logger.error('Failed to persist job record', toError(error), { jobId: snapshot.id, state: snapshot.state });
      });
  }

  private handle(entry: JobEntry, created: boolean): JobHandle {
    return {
      jobId: entry.record.id,
      fingerprint: entry.record.fingerprint,
      state: entry.record.state,
      created,
    };
  }

  private reportDepth(): void {
    setQueueDepth(this.counts.queued, this.counts.running);
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

export function toJobError(error: unknown): JobError {
  if (error instanceof AppError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'EXECUTION_ERROR', message: toError(error).message };
}
