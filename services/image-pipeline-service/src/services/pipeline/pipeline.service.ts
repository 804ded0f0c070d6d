import { AppError } from '@domain/errors';
import { ActionClass } from '@domain/types/common';
import { Artifact, ImageRecord, JobStatusView } from '@domain/types/responses';
import { validateOperations } from '@domain/schemas';
import { AdmissionService, admissionIdentity } from '@services/admission';
import { ArtifactSource, DeliveryService, Resolution } from '@services/delivery';
import { ImageService } from '@services/image';
import { CancelOutcome, JobService } from '@services/job';

/** Caller as seen by the pipeline: an authenticated user and the client address. */
export interface Identity {
  userId?: string;
  address: string;
}

export type DeliveryResult =
  | { kind: 'artifact'; artifact: Artifact; source: ArtifactSource }
  | { kind: 'job'; job: JobStatusView };

export interface SubmitOptions {
  /** How long to wait for the job before returning its handle. */
  waitMs?: number;
}

/** Upload bytes, or a reader that is only called once the upload is admitted. */
export type UploadSource = Buffer | (() => Promise<Buffer>);

export interface CancelResult {
  jobId: string;
  outcome: CancelOutcome;
  job: JobStatusView;
}

/**
 * Boundary surface of the pipeline. Authenticates, applies admission, then
 * delegates to ingest, delivery and the job scheduler.
 */
export class PipelineService {
  constructor(
    private readonly images: ImageService,
    private readonly delivery: DeliveryService,
    private readonly jobs: JobService,
    private readonly admission: AdmissionService
  ) {}

  async uploadImage(identity: Identity, source: UploadSource): Promise<ImageRecord> {
    const userId = this.admit(identity, 'upload');
    const buffer = typeof source === 'function' ? await source() : source;
    return this.images.register(userId, buffer);
  }

  async submitTransform(
    identity: Identity,
    imageId: string,
    operations: unknown,
    outputFormat?: string,
    options: SubmitOptions = {}
  ): Promise<DeliveryResult> {
    const userId = this.admit(identity, 'transform');
    validateOperations(operations);

    const resolution = await this.delivery.resolve({ userId, imageId, operations, format: outputFormat });
    return this.settle(imageId, resolution, options.waitMs ?? 0);
  }

  async getJobStatus(identity: Identity, jobId: string): Promise<JobStatusView> {
    const userId = this.admit(identity, 'read');
    await this.authorizeJob(userId, jobId);
    return this.jobs.status(jobId);
  }

  async getJobResult(identity: Identity, jobId: string): Promise<Artifact> {
    const userId = this.admit(identity, 'read');
    await this.authorizeJob(userId, jobId);
    return this.jobs.result(jobId);
  }

  async cancelJob(identity: Identity, jobId: string): Promise<CancelResult> {
    const userId = this.admit(identity, 'transform');
    await this.authorizeJob(userId, jobId);
    const outcome = this.jobs.cancel(jobId);
    return { jobId, outcome, job: await this.jobs.status(jobId) };
  }

  async getImage(
    identity: Identity,
    imageId: string,
    operations?: unknown,
    outputFormat?: string,
    options: SubmitOptions = {}
  ): Promise<DeliveryResult> {
    const userId = this.admit(identity, 'read');
    const key = admissionIdentity(userId, identity.address);

    const resolution = await this.delivery.resolve(
      { userId, imageId, operations, format: outputFormat },
      { beforeSubmit: () => { this.admission.enforce(key, 'transform'); } }
    );
    return this.settle(imageId, resolution, options.waitMs ?? 0);
  }

  async getImageRecord(identity: Identity, imageId: string): Promise<ImageRecord> {
    const userId = this.admit(identity, 'read');
    return this.images.getRecord(userId, imageId);
  }

  async deleteImage(identity: Identity, imageId: string): Promise<void> {
    const userId = this.admit(identity, 'upload');
    await this.images.delete(userId, imageId);
  }

  private admit(identity: Identity, action: ActionClass): string {
    if (!identity.userId) {
      throw AppError.unauthorized('Authentication required');
    }
    this.admission.enforce(admissionIdentity(identity.userId, identity.address), action);
    return identity.userId;
  }

  private async authorizeJob(userId: string, jobId: string): Promise<void> {
    switch (await this.jobs.access(jobId, userId)) {
      case 'unknown':
        throw AppError.jobNotFound(`Job not found: ${jobId}`, { jobId });
      case 'forbidden':
        throw AppError.forbidden('Job belongs to another user', { jobId });
      case 'allowed':
        return;
    }
  }

  private async settle(imageId: string, resolution: Resolution, waitMs: number): Promise<DeliveryResult> {
    switch (resolution.kind) {
      case 'not_found':
        throw AppError.imageNotFound(`Image not found: ${imageId}`, { imageId });
      case 'artifact':
        return resolution;
      case 'pending': {
        const job = await this.jobs.wait(resolution.job.jobId, waitMs);
        if (job.state === 'succeeded') {
          return { kind: 'artifact', artifact: await this.jobs.result(job.jobId), source: 'job' };
        }
        return { kind: 'job', job };
      }
    }
  }
}
