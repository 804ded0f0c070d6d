import { Redis } from 'ioredis';
import { config, Config } from '@config/index';
import { AppError } from '@domain/errors';
import { CacheBackend, LruCacheBackend, RedisCacheBackend } from '@infrastructure/cache';
import { logger as rootLogger, LoggingClient } from '@infrastructure/logging';
import { MemoryMetadataStore, MetadataStore, RedisMetadataStore } from '@infrastructure/metadata';
import { BullWorkQueue, MemoryWorkQueue, WorkQueue } from '@infrastructure/queue';
import { closeRedisClient, createRedisClient, queueConnectionOptions, RedisCommands } from '@infrastructure/redis';
import { AdmissionService } from '@services/admission';
import { CacheService } from '@services/cache';
import { DeliveryService } from '@services/delivery';
import { ImageService } from '@services/image';
import { JobService, TaskExecutor } from '@services/job';
import { createObjectStorage, ObjectStorage } from '@services/storage';
import { TransformService } from '@services/transform';
import { PipelineService } from './pipeline.service';

export interface PipelineOverrides {
  storage?: ObjectStorage;
  store?: MetadataStore;
  cacheBackend?: CacheBackend;
  /** Used for every Redis-backed component instead of a new connection. */
  redis?: RedisCommands;
  transform?: TransformService;
  executor?: TaskExecutor;
  workQueue?: WorkQueue;
  logger?: LoggingClient;
  now?: () => number;
}

export interface Pipeline {
  config: Config;
  logger: LoggingClient;
  storage: ObjectStorage;
  store: MetadataStore;
  cache: CacheService;
  admission: AdmissionService;
  transform: TransformService;
  jobs: JobService;
  delivery: DeliveryService;
  images: ImageService;
  service: PipelineService;
  close(): Promise<void>;
}

/** Loads a task's source (and any overlays) and runs the transform under the job's budget. */
export function createTaskExecutor(
  storage: ObjectStorage,
  store: MetadataStore,
  transform: TransformService,
  maxExecutionMs: number
): TaskExecutor {
  return async (task) => {
    const source = await storage.get(task.image.storageKey);
    return transform.execute(source, task.spec, task.outputFormat, {
      fingerprint: task.fingerprint,
      timeoutSeconds: Math.ceil(maxExecutionMs / 1000),
      loadOverlay: async (reference) => {
        const overlay = await store.getImage(reference);
        if (!overlay || overlay.ownerId !== task.image.ownerId) {
          throw AppError.imageNotFound(`Watermark overlay not found: ${reference}`, { overlay: reference });
        }
        return storage.get(overlay.storageKey);
      },
    });
  };
}

export function createWorkQueue(settings: Config, logger: LoggingClient): WorkQueue {
  if (settings.queue.driver === 'bullmq') {
    return new BullWorkQueue(
      {
        name: settings.queue.name,
        concurrency: settings.queue.concurrency,
        connection: queueConnectionOptions(settings.redis),
      },
      logger
    );
  }
  return new MemoryWorkQueue(settings.queue.concurrency);
}

export function createPipeline(settings: Config = config, overrides: PipelineOverrides = {}): Pipeline {
  const log = overrides.logger ?? rootLogger;

  let connection: Redis | undefined;
  const redis = (): RedisCommands => {
    if (overrides.redis) return overrides.redis;
    connection ??= createRedisClient(settings.redis);
    return connection;
  };

  const storage = overrides.storage ?? createObjectStorage(settings);
  const store = overrides.store
    ?? (settings.metadata.driver === 'redis'
      ? new RedisMetadataStore(redis(), settings.metadata.prefix)
      : new MemoryMetadataStore());
  const backend = overrides.cacheBackend
    ?? (settings.cache.driver === 'redis'
      ? new RedisCacheBackend(redis(), { prefix: settings.cache.prefix, ttlSeconds: settings.cache.ttlSeconds })
      : new LruCacheBackend({
        maxEntries: settings.cache.maxEntries,
        maxBytes: settings.cache.maxBytes,
        ttlSeconds: settings.cache.ttlSeconds,
        now: overrides.now,
      }));

  const cache = new CacheService(backend, log.child({ component: 'cache' }));
  const transform = overrides.transform ?? new TransformService(settings.transform);
  const admission = new AdmissionService({
    policies: {
      upload: settings.admission.upload,
      transform: settings.admission.transform,
      read: settings.admission.read,
    },
    maxTrackedBuckets: settings.admission.maxTrackedBuckets,
    now: overrides.now,
  });

  const jobLogger = log.child({ component: 'jobs' });
  const jobs = new JobService(
    overrides.executor ?? createTaskExecutor(storage, store, transform, settings.queue.maxExecutionMs),
    cache,
    store,
    jobLogger,
    {
      concurrency: settings.queue.concurrency,
      maxExecutionMs: settings.queue.maxExecutionMs,
      retentionMs: settings.queue.retentionMs,
      sweepIntervalMs: settings.queue.sweepIntervalMs,
      queue: overrides.workQueue ?? createWorkQueue(settings, jobLogger),
      now: overrides.now,
    }
  );
  const delivery = new DeliveryService(store, storage, cache, jobs, log.child({ component: 'delivery' }));
  const images = new ImageService(storage, store, transform, log.child({ component: 'images' }), {
    maxFileSizeBytes: settings.storage.maxFileSizeBytes,
  });
  const service = new PipelineService(images, delivery, jobs, admission);

  return {
    config: settings,
    logger: log,
    storage,
    store,
    cache,
    admission,
    transform,
    jobs,
    delivery,
    images,
    service,
    close: async () => {
      await jobs.close();
      if (connection) {
        await closeRedisClient(connection);
      }
    },
  };
}
