import * as fc from 'fast-check';
import { LruCacheBackend, RedisCacheBackend } from '../../../src/infrastructure/cache';
import { FakeRedis, makeArtifact } from '../../helpers/fakes';

const fp = (n: number): string => n.toString(16).padStart(64, '0');

describe('Cache Backend Property Tests', () => {
  describe('Property 24: LRU Bounds', () => {
    it('should never exceed its entry or byte bounds', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.integer({ min: 1, max: 5 }),
          fc.integer({ min: 10, max: 50 }),
          fc.array(fc.tuple(fc.integer({ min: 0, max: 9 }), fc.integer({ min: 1, max: 20 })), { maxLength: 40 }),
          async (maxEntries, maxBytes, writes) => {
            const backend = new LruCacheBackend({ maxEntries, maxBytes, ttlSeconds: 0 });

            for (const [key, size] of writes) {
              await backend.set(fp(key), makeArtifact(fp(key), Buffer.alloc(size)));
              const usage = backend.usage();
              expect(usage.entries).toBeLessThanOrEqual(maxEntries);
              expect(usage.bytes).toBeLessThanOrEqual(maxBytes);
            }
          }
        ),
        { numRuns: 100 }
      );
    });

    it('should evict the least recently used entry by count', async () => {
      const backend = new LruCacheBackend({ maxEntries: 2, maxBytes: 1000, ttlSeconds: 0 });

      await backend.set(fp(1), makeArtifact(fp(1)));
      await backend.set(fp(2), makeArtifact(fp(2)));
      await backend.get(fp(1));
      await backend.set(fp(3), makeArtifact(fp(3)));

      expect(backend.keys()).toEqual([fp(1), fp(3)]);
      expect(backend.usage().evictions).toBe(1);
      expect(await backend.get(fp(2))).toBeNull();
    });

    it('should evict by total bytes', async () => {
      const backend = new LruCacheBackend({ maxEntries: 10, maxBytes: 10, ttlSeconds: 0 });

      await backend.set(fp(1), makeArtifact(fp(1), Buffer.alloc(4)));
      await backend.set(fp(2), makeArtifact(fp(2), Buffer.alloc(4)));
      await backend.set(fp(3), makeArtifact(fp(3), Buffer.alloc(4)));

      expect(backend.keys()).toEqual([fp(2), fp(3)]);
      expect(backend.usage()).toEqual({ entries: 2, bytes: 8, evictions: 1 });
    });

    it('should skip artifacts larger than the whole cache', async () => {
      const backend = new LruCacheBackend({ maxEntries: 10, maxBytes: 10, ttlSeconds: 0 });
      await backend.set(fp(1), makeArtifact(fp(1), Buffer.alloc(4)));

      expect(await backend.set(fp(2), makeArtifact(fp(2), Buffer.alloc(11)))).toBe(false);
      expect(backend.keys()).toEqual([fp(1)]);
    });

    it('should account for replaced entries', async () => {
      const backend = new LruCacheBackend({ maxEntries: 10, maxBytes: 100, ttlSeconds: 0 });
      await backend.set(fp(1), makeArtifact(fp(1), Buffer.alloc(30)));
      await backend.set(fp(1), makeArtifact(fp(1), Buffer.alloc(5)));

      expect(backend.usage()).toEqual({ entries: 1, bytes: 5, evictions: 0 });
      expect(await backend.delete(fp(1))).toBe(true);
      expect(await backend.delete(fp(1))).toBe(false);
      expect(backend.usage().bytes).toBe(0);
    });
  });

  describe('Property 25: LRU Expiry', () => {
    it('should expire entries after their time to live', async () => {
      let now = 0;
      const backend = new LruCacheBackend({ maxEntries: 10, maxBytes: 100, ttlSeconds: 1, now: () => now });
      await backend.set(fp(1), makeArtifact(fp(1)));

      now = 999;
      expect(await backend.get(fp(1))).not.toBeNull();
      now = 1000;
      expect(await backend.get(fp(1))).toBeNull();
      expect(backend.usage().entries).toBe(0);
    });
  });

  describe('Property 26: Redis Backend', () => {
    it('should store artifacts under the prefix with a millisecond expiry', async () => {
      const redis = new FakeRedis(() => 5000);
      const backend = new RedisCacheBackend(redis, { prefix: 'cache:', ttlSeconds: 60 });
      const artifact = makeArtifact(fp(7), Buffer.from([0, 1, 2, 255]));

      expect(await backend.set(fp(7), artifact)).toBe(true);
      expect(redis.strings.get(`cache:${fp(7)}`)?.expiresAt).toBe(65000);

      const restored = await backend.get(fp(7));
      expect(restored?.buffer.equals(artifact.buffer)).toBe(true);
      expect(restored?.metadata).toEqual(artifact.metadata);
      expect(restored?.fingerprint).toBe(fp(7));
    });

    it('should store without expiry when the time to live is 0', async () => {
      const redis = new FakeRedis();
      const backend = new RedisCacheBackend(redis, { prefix: 'cache:', ttlSeconds: 0 });
      await backend.set(fp(1), makeArtifact(fp(1)));

      expect(redis.strings.get(`cache:${fp(1)}`)?.expiresAt).toBeUndefined();
    });

    it('should drop malformed entries and report a miss', async () => {
      const redis = new FakeRedis();
      const backend = new RedisCacheBackend(redis, { prefix: 'cache:', ttlSeconds: 0 });
      await redis.set(`cache:${fp(1)}`, JSON.stringify({ fingerprint: fp(1) }));
      await redis.set(`cache:${fp(2)}`, 'not-json');

      expect(await backend.get(fp(1))).toBeNull();
      expect(await backend.get(fp(2))).toBeNull();
      expect(redis.strings.size).toBe(0);
    });

    it('should propagate connection failures', async () => {
      const redis = new FakeRedis();
      const backend = new RedisCacheBackend(redis, { prefix: 'cache:', ttlSeconds: 0 });
      redis.failing = true;

      await expect(backend.get(fp(1))).rejects.toThrow('Connection is closed.');
      await expect(backend.ping()).rejects.toThrow('Connection is closed.');
      expect(backend.usage()).toBeNull();
    });
  });
});
