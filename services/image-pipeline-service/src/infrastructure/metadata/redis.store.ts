import { z } from 'zod';
import { formatSchema } from '@domain/schemas';
import { ImageRecord, JobRecord } from '@domain/types/responses';
import { RedisCommands } from '@infrastructure/redis';
import { MetadataStore } from './types';

const imageRecordSchema = z.object({
  id: z.string(),
  ownerId: z.string(),
  storageKey: z.string(),
  contentHash: z.string(),
  width: z.number(),
  height: z.number(),
  format: formatSchema,
  mimeType: z.string(),
  size: z.number(),
  hasAlpha: z.boolean(),
  createdAt: z.string(),
});

const jobRecordSchema = z.object({
  id: z.string(),
  fingerprint: z.string(),
  imageId: z.string(),
  userId: z.string(),
  subscribers: z.array(z.string()),
  state: z.enum(['queued', 'running', 'succeeded', 'failed', 'cancelled']),
  outputFormat: formatSchema,
  operations: z.string(),
  createdAt: z.string(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
  artifact: z.object({
    fingerprint: z.string(),
    width: z.number(),
    height: z.number(),
    format: formatSchema,
    mimeType: z.string(),
    size: z.number(),
  }).optional(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
});

/**
 * Records are stored as Redis hashes with a single JSON `data` field:
 * `<prefix>image:<id>` and `<prefix>job:<id>`.
 */
export class RedisMetadataStore implements MetadataStore {
  readonly name = 'redis';

  constructor(
    private readonly redis: RedisCommands,
    private readonly prefix: string = 'pipeline:'
  ) {}

  async createImage(record: ImageRecord): Promise<void> {
    await this.redis.hset(this.imageKey(record.id), { data: JSON.stringify(record) });
  }

  async getImage(id: string): Promise<ImageRecord | null> {
    return this.read(this.imageKey(id), imageRecordSchema);
  }

  async deleteImage(id: string): Promise<boolean> {
    return (await this.redis.del(this.imageKey(id))) > 0;
  }

  async saveJob(record: JobRecord): Promise<void> {
    await this.redis.hset(this.jobKey(record.id), { data: JSON.stringify(record) });
  }

  async getJob(id: string): Promise<JobRecord | null> {
    return this.read(this.jobKey(id), jobRecordSchema);
  }

  async deleteJob(id: string): Promise<boolean> {
    return (await this.redis.del(this.jobKey(id))) > 0;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  private async read<S extends z.ZodTypeAny>(key: string, schema: S): Promise<z.infer<S> | null> {
    const hash = await this.redis.hgetall(key);
    if (hash.data === undefined) return null;

    const parsed = schema.safeParse(parseJson(hash.data));
    return parsed.success ? parsed.data : null;
  }

  private imageKey(id: string): string {
    return `${this.prefix}image:${id}`;
  }

  private jobKey(id: string): string {
    return `${this.prefix}job:${id}`;
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
