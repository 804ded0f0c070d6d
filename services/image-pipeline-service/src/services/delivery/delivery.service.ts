import { AppError, CacheUnavailableError, NotFoundError } from '@domain/errors';
import { ImageFormat } from '@domain/types/common';
import { TransformSpec, WatermarkOperation } from '@domain/types/operations';
import { Artifact, ImageRecord, JobHandle } from '@domain/types/responses';
import { validateFormat } from '@domain/schemas';
import { LoggingClient } from '@infrastructure/logging';
import { MetadataStore } from '@infrastructure/metadata';
import { CacheService } from '@services/cache';
import { fingerprintService } from '@services/fingerprint';
import { JobService } from '@services/job';
import { ObjectStorage } from '@services/storage';
import { planGeometry, resolveOutputFormat } from '@services/transform';

export type ArtifactSource = 'original' | 'cache' | 'job';

export interface ResolveRequest {
  userId: string;
  imageId: string;
  operations?: unknown;
  format?: string;
}

export interface ResolveHooks {
  /** Runs only when a new job is about to be created; throwing aborts the submission. */
  beforeSubmit?: () => void;
}

export type Resolution =
  | { kind: 'artifact'; artifact: Artifact; source: ArtifactSource }
  | { kind: 'pending'; job: JobHandle }
  | { kind: 'not_found' };

export interface PreparedRequest {
  image: ImageRecord;
  spec: TransformSpec;
  outputFormat: ImageFormat;
  fingerprint: string;
}

/**
 * Answers "give me image X with spec S": the original bytes, a cached
 * artifact, or a handle to the job producing it. Every check that can reject
 * a request runs before anything is enqueued.
 */
export class DeliveryService {
  constructor(
    private readonly store: MetadataStore,
    private readonly storage: ObjectStorage,
    private readonly cache: CacheService,
    private readonly jobs: JobService,
    private readonly logger: LoggingClient
  ) {}

  async resolve(request: ResolveRequest, hooks: ResolveHooks = {}): Promise<Resolution> {
    const image = await this.store.getImage(request.imageId);
    if (!image) return { kind: 'not_found' };
    if (image.ownerId !== request.userId) {
      throw AppError.forbidden('Image belongs to another user', { imageId: request.imageId });
    }

    if (!hasOperations(request.operations) && request.format === undefined) {
      return this.original(image);
    }

    const prepared = await this.prepare(image, request);

    const cached = await this.lookup(prepared.fingerprint);
    if (cached) {
      return { kind: 'artifact', artifact: cached, source: 'cache' };
    }

    const inFlight = this.jobs.findActive(prepared.fingerprint, request.userId);
    if (inFlight) {
      return { kind: 'pending', job: inFlight };
    }

    hooks.beforeSubmit?.();
    const job = this.jobs.submit({
      fingerprint: prepared.fingerprint,
      image,
      userId: request.userId,
      spec: prepared.spec,
      outputFormat: prepared.outputFormat,
    });
    return { kind: 'pending', job };
  }

  /** Validates, plans and fingerprints a request against its source image. */
  async prepare(image: ImageRecord, request: Pick<ResolveRequest, 'operations' | 'format'>): Promise<PreparedRequest> {
    const requested = request.format !== undefined ? validateFormat(request.format) : undefined;
    const spec: TransformSpec = hasOperations(request.operations)
      ? fingerprintService.parse(request.operations)
      : [{ op: 'format', target: requested ?? image.format }];

    const outputFormat = resolveOutputFormat(spec, requested, image.format);
    planGeometry(image, spec);
    await this.checkOverlays(image.ownerId, spec);

    return {
      image,
      spec,
      outputFormat,
      fingerprint: fingerprintService.fingerprint(image.contentHash, spec, outputFormat),
    };
  }

  private async original(image: ImageRecord): Promise<Resolution> {
    try {
      const buffer = await this.storage.get(image.storageKey);
      return {
        kind: 'artifact',
        source: 'original',
        artifact: {
          fingerprint: image.contentHash,
          buffer,
          createdAt: image.createdAt,
          metadata: {
            width: image.width,
            height: image.height,
            format: image.format,
            mimeType: image.mimeType,
            size: buffer.length,
            hasAlpha: image.hasAlpha,
          },
        },
      };
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn('Image record without stored bytes', { imageId: image.id, storageKey: image.storageKey });
        return { kind: 'not_found' };
      }
      throw error;
    }
  }

  private async lookup(fingerprint: string): Promise<Artifact | null> {
    try {
      return await this.cache.get(fingerprint);
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      this.logger.warn('Cache unavailable, treating lookup as a miss', { fingerprint, reason: error.message });
      return null;
    }
  }

  private async checkOverlays(ownerId: string, spec: TransformSpec): Promise<void> {
    const overlays = spec.filter((operation): operation is WatermarkOperation => operation.op === 'watermark');
    for (const operation of overlays) {
      const overlay = await this.store.getImage(operation.overlay);
      if (!overlay || overlay.ownerId !== ownerId) {
        throw AppError.imageNotFound(`Watermark overlay not found: ${operation.overlay}`, { overlay: operation.overlay });
      }
    }
  }
}

function hasOperations(operations: unknown): boolean {
  return operations !== undefined && !(Array.isArray(operations) && operations.length === 0);
}
