import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
  HeadBucketCommand,
} from '@aws-sdk/client-s3';
import { v4 as uuidv4 } from 'uuid';
import { config, Config } from '@config/index';
import { AppError, errorMessage } from '@domain/errors';

export interface StorageOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

/** Durable home of original image bytes. */
export interface ObjectStorage {
  readonly name: string;
  put(buffer: Buffer, key?: string, options?: StorageOptions): Promise<string>;
  get(key: string): Promise<Buffer>;
  delete(key: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  ping(): Promise<void>;
}

export function generateStorageKey(): string {
  return `images/${Date.now()}/${uuidv4()}`;
}

export class S3ObjectStorage implements ObjectStorage {
  readonly name = 's3';
  private client: S3Client;
  private bucket: string;

  constructor(settings: Config['s3'] = config.s3) {
    this.client = new S3Client({
      region: settings.region,
      endpoint: settings.endpoint,
      forcePathStyle: settings.forcePathStyle,
      credentials: {
        accessKeyId: settings.accessKeyId,
        secretAccessKey: settings.secretAccessKey,
      },
    });
    this.bucket = settings.bucket;
  }

  async put(buffer: Buffer, key?: string, options: StorageOptions = {}): Promise<string> {
    const storageKey = key || generateStorageKey();

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: storageKey,
          Body: buffer,
          ContentType: options.contentType || 'application/octet-stream',
          Metadata: options.metadata,
        })
      );

      return storageKey;
    } catch (error) {
      throw AppError.storageError('Failed to upload file to storage', {
        key: storageKey,
        error: errorMessage(error),
      });
    }
  }

  async get(key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );

      if (!response.Body) {
        throw AppError.imageNotFound('Image not found in storage', { key });
      }

      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      if (isMissingObject(error)) {
        throw AppError.imageNotFound('Image not found in storage', { key });
      }
      throw AppError.storageError('Failed to download file from storage', {
        key,
        error: errorMessage(error),
      });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: key,
        })
      );
    } catch (error) {
      throw AppError.storageError('Failed to delete file from storage', {
        key,
        error: errorMessage(error),
      });
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isMissingObject(error)) return false;
      throw AppError.storageError('Failed to check object in storage', {
        key,
        error: errorMessage(error),
      });
    }
  }

  async ping(): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
  }

  destroy(): void {
    this.client.destroy();
  }
}

function isMissingObject(error: unknown): boolean {
  return error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound');
}

/** Process-local storage for development and tests. */
export class MemoryObjectStorage implements ObjectStorage {
  readonly name = 'memory';
  private readonly objects = new Map<string, Buffer>();

  async put(buffer: Buffer, key?: string): Promise<string> {
    const storageKey = key || generateStorageKey();
    this.objects.set(storageKey, Buffer.from(buffer));
    return storageKey;
  }

  async get(key: string): Promise<Buffer> {
    const buffer = this.objects.get(key);
    if (!buffer) {
      throw AppError.imageNotFound('Image not found in storage', { key });
    }
    return buffer;
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async ping(): Promise<void> {
    return;
  }

  get size(): number {
    return this.objects.size;
  }
}

export function createObjectStorage(settings: Config = config): ObjectStorage {
  return settings.storage.driver === 's3' ? new S3ObjectStorage(settings.s3) : new MemoryObjectStorage();
}
