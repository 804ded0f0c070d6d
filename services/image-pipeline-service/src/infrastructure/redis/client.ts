import { Redis, RedisOptions } from 'ioredis';
import { config, Config } from '@config/index';

/**
 * The subset of ioredis the cache backend and metadata store rely on.
 * Tests pass an in-process implementation.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
  hset(key: string, values: Record<string, string>): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  ping(): Promise<string>;
}

export function createRedisClient(settings: Config['redis'] = config.redis): Redis {
  return new Redis({
    host: settings.host,
    port: settings.port,
    password: settings.password,
    db: settings.db,
    lazyConnect: true,
    maxRetriesPerRequest: 2,
  });
}

/** Connection settings for the job queue; blocking worker commands must never be retried. */
export function queueConnectionOptions(settings: Config['redis'] = config.redis): RedisOptions {
  return {
    host: settings.host,
    port: settings.port,
    password: settings.password,
    db: settings.db,
    maxRetriesPerRequest: null,
  };
}

export async function closeRedisClient(client: Redis): Promise<void> {
  if (client.status === 'end') return;
  try {
    await client.quit();
  } catch {
    client.disconnect();
  }
}
