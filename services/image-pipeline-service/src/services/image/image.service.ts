import { v4 as uuidv4 } from 'uuid';
import { AppError, errorMessage, toError } from '@domain/errors';
import { ImageMetadata, ImageRecord } from '@domain/types/responses';
import { LoggingClient } from '@infrastructure/logging';
import { MetadataStore } from '@infrastructure/metadata';
import { fingerprintService } from '@services/fingerprint';
import { ObjectStorage } from '@services/storage';
import { TransformService } from '@services/transform';

export interface ImageServiceOptions {
  maxFileSizeBytes: number;
}

/**
 * Registers and removes source images. Bytes go to object storage, the
 * record (owner, content hash, decoded dimensions) to the metadata store.
 */
export class ImageService {
  constructor(
    private readonly storage: ObjectStorage,
    private readonly store: MetadataStore,
    private readonly transform: TransformService,
    private readonly logger: LoggingClient,
    private readonly options: ImageServiceOptions
  ) {}

  async register(ownerId: string, buffer: Buffer): Promise<ImageRecord> {
    if (buffer.length === 0) {
      throw AppError.invalidImage('Uploaded file is empty');
    }
    if (buffer.length > this.options.maxFileSizeBytes) {
      throw AppError.fileTooLarge(`File exceeds the ${this.options.maxFileSizeBytes} byte limit`, {
        size: buffer.length,
        maxSize: this.options.maxFileSizeBytes,
      });
    }

    const metadata = await this.inspect(buffer);
    const contentHash = fingerprintService.hashContent(buffer);
    const storageKey = await this.storage.put(buffer, undefined, {
      contentType: metadata.mimeType,
      metadata: { owner: ownerId, sha256: contentHash },
    });

    const record: ImageRecord = {
      id: uuidv4(),
      ownerId,
      storageKey,
      contentHash,
      width: metadata.width,
      height: metadata.height,
      format: metadata.format,
      mimeType: metadata.mimeType,
      size: buffer.length,
      hasAlpha: metadata.hasAlpha,
      createdAt: new Date().toISOString(),
    };

    try {
      await this.store.createImage(record);
    } catch (error) {
      await this.storage.delete(storageKey).catch((cleanupError: unknown) => {
        this.logger.error('Failed to remove orphaned upload', toError(cleanupError), { storageKey });
      });
      throw error;
    }

    this.logger.info('Image registered', {
      imageId: record.id,
      userId: ownerId,
      format: record.format,
      size: record.size,
    });
    return record;
  }

  /** Record lookup scoped to its owner. */
  async getRecord(requesterId: string, imageId: string): Promise<ImageRecord> {
    const record = await this.store.getImage(imageId);
    if (!record) {
      throw AppError.imageNotFound(`Image not found: ${imageId}`, { imageId });
    }
    if (record.ownerId !== requesterId) {
      throw AppError.forbidden('Image belongs to another user', { imageId });
    }
    return record;
  }

  async delete(requesterId: string, imageId: string): Promise<void> {
    const record = await this.getRecord(requesterId, imageId);
    await this.storage.delete(record.storageKey);
    await this.store.deleteImage(imageId);
    this.logger.info('Image deleted', { imageId, userId: requesterId });
  }

  private async inspect(buffer: Buffer): Promise<ImageMetadata> {
    try {
      return await this.transform.getMetadata(buffer);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw AppError.invalidImage(`Unsupported or corrupt image: ${errorMessage(error)}`);
    }
  }
}
