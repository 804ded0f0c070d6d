import { z } from 'zod';

const bucketSchema = z.object({
  capacity: z.number().int().positive(),
  refillPerSecond: z.number().positive(),
});

const configSchema = z.object({
  server: z.object({
    port: z.number().default(3000),
    host: z.string().default('0.0.0.0'),
  }),
  redis: z.object({
    host: z.string().default('localhost'),
    port: z.number().default(6379),
    password: z.string().optional(),
    db: z.number().default(0),
  }),
  s3: z.object({
    endpoint: z.string().optional(),
    region: z.string().default('us-east-1'),
    bucket: z.string(),
    accessKeyId: z.string(),
    secretAccessKey: z.string(),
    forcePathStyle: z.boolean().default(true),
  }),
  auth: z.object({
    jwtSecret: z.string(),
    jwtIssuer: z.string().default('auth-platform'),
    jwtAudience: z.string().default('image-pipeline-service'),
  }),
  storage: z.object({
    driver: z.enum(['memory', 's3']).default('memory'),
    maxFileSizeBytes: z.number().default(52428800), // 50MB
  }),
  metadata: z.object({
    driver: z.enum(['memory', 'redis']).default('memory'),
    prefix: z.string().default('pipeline:'),
  }),
  cache: z.object({
    driver: z.enum(['memory', 'redis']).default('memory'),
    maxEntries: z.number().int().positive().default(500),
    maxBytes: z.number().int().positive().default(268435456), // 256MB
    ttlSeconds: z.number().int().nonnegative().default(3600),
    prefix: z.string().default('img:'),
  }),
  queue: z.object({
    driver: z.enum(['memory', 'bullmq']).default('memory'),
    name: z.string().min(1).default('image-pipeline'),
    concurrency: z.number().int().positive().default(4),
    maxExecutionMs: z.number().int().positive().default(30000),
    retentionMs: z.number().int().nonnegative().default(600000),
    sweepIntervalMs: z.number().int().positive().default(30000),
  }),
  transform: z.object({
    defaultQuality: z.number().int().min(1).max(100).default(80),
    maxInputPixels: z.number().int().positive().default(268402689),
  }),
  admission: z.object({
    upload: bucketSchema,
    transform: bucketSchema,
    read: bucketSchema,
    maxTrackedBuckets: z.number().int().positive().default(10000),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'silent']).default('info'),
  }),
  tracing: z.object({
    endpoint: z.string().optional(),
    enabled: z.boolean().default(true),
  }),
});

export type Config = z.infer<typeof configSchema>;

function int(value: string | undefined, fallback: number): number {
  return value === undefined || value === '' ? fallback : parseInt(value, 10);
}

function float(value: string | undefined, fallback: number): number {
  return value === undefined || value === '' ? fallback : parseFloat(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    server: {
      port: int(env.PORT, 3000),
      host: env.HOST || '0.0.0.0',
    },
    redis: {
      host: env.REDIS_HOST || 'localhost',
      port: int(env.REDIS_PORT, 6379),
      password: env.REDIS_PASSWORD,
      db: int(env.REDIS_DB, 0),
    },
    s3: {
      endpoint: env.S3_ENDPOINT,
      region: env.S3_REGION || 'us-east-1',
      bucket: env.S3_BUCKET || 'image-pipeline',
      accessKeyId: env.S3_ACCESS_KEY_ID || '',
      secretAccessKey: env.S3_SECRET_ACCESS_KEY || '',
      forcePathStyle: env.S3_FORCE_PATH_STYLE === 'true',
    },
    auth: {
      jwtSecret: env.JWT_SECRET || 'dev-secret-change-in-production',
      jwtIssuer: env.JWT_ISSUER || 'auth-platform',
      jwtAudience: env.JWT_AUDIENCE || 'image-pipeline-service',
    },
    storage: {
      driver: env.STORAGE_DRIVER || 'memory',
      maxFileSizeBytes: int(env.MAX_FILE_SIZE_BYTES, 52428800),
    },
    metadata: {
      driver: env.METADATA_DRIVER || 'memory',
      prefix: env.METADATA_PREFIX || 'pipeline:',
    },
    cache: {
      driver: env.CACHE_DRIVER || 'memory',
      maxEntries: int(env.CACHE_MAX_ENTRIES, 500),
      maxBytes: int(env.CACHE_MAX_BYTES, 268435456),
      ttlSeconds: int(env.CACHE_TTL_SECONDS, 3600),
      prefix: env.CACHE_PREFIX || 'img:',
    },
    queue: {
      driver: env.QUEUE_DRIVER || 'memory',
      name: env.QUEUE_NAME || 'image-pipeline',
      concurrency: int(env.QUEUE_CONCURRENCY, 4),
      maxExecutionMs: int(env.JOB_MAX_EXECUTION_MS, 30000),
      retentionMs: int(env.JOB_RETENTION_MS, 600000),
      sweepIntervalMs: int(env.JOB_SWEEP_INTERVAL_MS, 30000),
    },
    transform: {
      defaultQuality: int(env.TRANSFORM_DEFAULT_QUALITY, 80),
      maxInputPixels: int(env.TRANSFORM_MAX_INPUT_PIXELS, 268402689),
    },
    admission: {
      upload: {
        capacity: int(env.ADMISSION_UPLOAD_BURST, 10),
        refillPerSecond: float(env.ADMISSION_UPLOAD_RATE, 0.5),
      },
      transform: {
        capacity: int(env.ADMISSION_TRANSFORM_BURST, 30),
        refillPerSecond: float(env.ADMISSION_TRANSFORM_RATE, 2),
      },
      read: {
        capacity: int(env.ADMISSION_READ_BURST, 120),
        refillPerSecond: float(env.ADMISSION_READ_RATE, 20),
      },
      maxTrackedBuckets: int(env.ADMISSION_MAX_TRACKED_BUCKETS, 10000),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
    tracing: {
      endpoint: env.TRACING_ENDPOINT || 'http://localhost:4318/v1/traces',
      enabled: env.TRACING_ENABLED !== 'false',
    },
  };

  return configSchema.parse(rawConfig);
}

export const config = loadConfig();
