import { AppError, CacheUnavailableError, errorMessage } from '@domain/errors';
import { Artifact, CacheStats } from '@domain/types/responses';
import { CacheBackend } from '@infrastructure/cache';
import { LoggingClient } from '@infrastructure/logging';
import { recordCacheOperation } from '@infrastructure/observability/metrics';

/**
 * Fingerprint-keyed artifact cache. Backend failures are rethrown as
 * `CacheUnavailableError`; callers decide whether to degrade.
 */
export class CacheService {
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly backend: CacheBackend,
    private readonly logger: LoggingClient
  ) {}

  get backendName(): string {
    return this.backend.name;
  }

  async get(fingerprint: string): Promise<Artifact | null> {
    let artifact: Artifact | null;
    try {
      artifact = await this.backend.get(fingerprint);
    } catch (error) {
      throw this.unavailable('get', fingerprint, error);
    }

    if (artifact && artifact.fingerprint === fingerprint) {
      this.hits++;
      recordCacheOperation('get', 'hit');
      return artifact;
    }

    this.misses++;
    recordCacheOperation('get', 'miss');
    return null;
  }

  async put(fingerprint: string, artifact: Artifact): Promise<void> {
    if (artifact.fingerprint !== fingerprint) {
      throw AppError.executionError('Artifact fingerprint does not match cache key', {
        fingerprint,
        artifactFingerprint: artifact.fingerprint,
      });
    }

    let stored: boolean;
    try {
      stored = await this.backend.set(fingerprint, artifact);
    } catch (error) {
      throw this.unavailable('put', fingerprint, error);
    }

    recordCacheOperation('put', stored ? 'stored' : 'skipped');
    if (!stored) {
      this.logger.debug('Artifact not cached', { fingerprint, size: artifact.buffer.length });
    }
  }

  async delete(fingerprint: string): Promise<boolean> {
    try {
      const removed = await this.backend.delete(fingerprint);
      recordCacheOperation('delete', removed ? 'hit' : 'miss');
      return removed;
    } catch (error) {
      throw this.unavailable('delete', fingerprint, error);
    }
  }

  stats(): CacheStats {
    const usage = this.backend.usage();
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
      size: usage?.entries ?? 0,
      bytes: usage?.bytes ?? 0,
      evictions: usage?.evictions ?? 0,
    };
  }

  async ping(): Promise<void> {
    try {
      await this.backend.ping();
    } catch (error) {
      throw this.unavailable('ping', undefined, error);
    }
  }

  private unavailable(
    operation: 'get' | 'put' | 'delete' | 'ping',
    fingerprint: string | undefined,
    error: unknown
  ): CacheUnavailableError {
    if (operation !== 'ping') {
      recordCacheOperation(operation, 'error');
    }
    return AppError.cacheUnavailable(`Cache ${operation} failed: ${errorMessage(error)}`, {
      backend: this.backend.name,
      fingerprint,
    });
  }
}
