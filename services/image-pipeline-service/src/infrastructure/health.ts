import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { errorMessage } from '@domain/errors';
import { Pipeline } from '@services/pipeline';

type OverallStatus = 'healthy' | 'unhealthy' | 'degraded';

interface HealthStatus {
  status: OverallStatus;
  timestamp: string;
  version: string;
  uptime: number;
  checks: Record<string, ComponentHealth>;
  jobs: { queued: number; running: number; tracked: number };
}

export interface ComponentHealth {
  status: 'healthy' | 'unhealthy';
  backend: string;
  latencyMs: number;
  error?: string;
}

const startTime = Date.now();

async function probe(backend: string, ping: () => Promise<void>): Promise<ComponentHealth> {
  const start = Date.now();
  try {
    await ping();
    return { status: 'healthy', backend, latencyMs: Date.now() - start };
  } catch (error) {
    return {
      status: 'unhealthy',
      backend,
      latencyMs: Date.now() - start,
      error: errorMessage(error),
    };
  }
}

/**
 * The metadata store and object storage are required; a failing cache only
 * degrades the service since artifacts are still served through jobs.
 */
export function determineOverallStatus(checks: Record<string, ComponentHealth>): OverallStatus {
  const required = [checks.metadata, checks.storage];
  if (required.some((check) => check?.status !== 'healthy')) return 'unhealthy';
  return Object.values(checks).every((check) => check.status === 'healthy') ? 'healthy' : 'degraded';
}

async function collect(pipeline: Pipeline): Promise<HealthStatus> {
  const [metadata, storage, cache] = await Promise.all([
    probe(pipeline.store.name, () => pipeline.store.ping()),
    probe(pipeline.storage.name, () => pipeline.storage.ping()),
    probe(pipeline.cache.backendName, () => pipeline.cache.ping()),
  ]);
  const checks = { metadata, storage, cache };

  return {
    status: determineOverallStatus(checks),
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version || '1.0.0',
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks,
    jobs: pipeline.jobs.stats(),
  };
}

export function registerHealthEndpoints(server: FastifyInstance, pipeline: Pipeline): void {
  server.get('/health/live', async (_request: FastifyRequest, reply: FastifyReply) => {
    reply.send({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  server.get('/health/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    const health = await collect(pipeline);

    if (health.status !== 'healthy') {
      pipeline.logger.warn('Health check degraded', { checks: health.checks, status: health.status });
    }

    reply.status(health.status === 'unhealthy' ? 503 : 200).send(health);
  });

  server.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    reply.send(await collect(pipeline));
  });
}
