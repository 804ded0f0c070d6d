import { z } from 'zod';
import { Artifact } from '@domain/types/responses';
import { formatSchema } from '@domain/schemas';
import { RedisCommands } from '@infrastructure/redis';
import { CacheBackend } from './types';

const cachedArtifactSchema = z.object({
  fingerprint: z.string(),
  buffer: z.string(),
  createdAt: z.string(),
  metadata: z.object({
    width: z.number(),
    height: z.number(),
    format: formatSchema,
    mimeType: z.string(),
    size: z.number(),
    hasAlpha: z.boolean(),
  }),
});

type CachedArtifact = z.infer<typeof cachedArtifactSchema>;

export interface RedisCacheOptions {
  prefix: string;
  ttlSeconds: number;
}

/**
 * Shared artifact cache in Redis. Values are JSON with base64 bytes; size
 * bounds are left to the server's maxmemory policy.
 */
export class RedisCacheBackend implements CacheBackend {
  readonly name = 'redis';

  constructor(
    private readonly redis: RedisCommands,
    private readonly options: RedisCacheOptions
  ) {}

  async get(fingerprint: string): Promise<Artifact | null> {
    const raw = await this.redis.get(this.key(fingerprint));
    if (raw === null) return null;

    const parsed = cachedArtifactSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      await this.redis.del(this.key(fingerprint));
      return null;
    }

    return {
      fingerprint: parsed.data.fingerprint,
      buffer: Buffer.from(parsed.data.buffer, 'base64'),
      metadata: parsed.data.metadata,
      createdAt: parsed.data.createdAt,
    };
  }

  async set(fingerprint: string, artifact: Artifact): Promise<boolean> {
    const cached: CachedArtifact = {
      fingerprint: artifact.fingerprint,
      buffer: artifact.buffer.toString('base64'),
      metadata: artifact.metadata,
      createdAt: artifact.createdAt,
    };
    const value = JSON.stringify(cached);

    if (this.options.ttlSeconds > 0) {
      await this.redis.set(this.key(fingerprint), value, 'PX', this.options.ttlSeconds * 1000);
    } else {
      await this.redis.set(this.key(fingerprint), value);
    }
    return true;
  }

  async delete(fingerprint: string): Promise<boolean> {
    return (await this.redis.del(this.key(fingerprint))) > 0;
  }

  usage(): null {
    return null;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  private key(fingerprint: string): string {
    return `${this.options.prefix}${fingerprint}`;
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
