import { Counter, Gauge, Histogram, Registry } from 'prom-client';

const register = new Registry();

// HTTP request metrics
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

// Transform metrics
export const transformExecutionsTotal = new Counter({
  name: 'transform_executions_total',
  help: 'Total number of transform executions',
  labelNames: ['status'],
  registers: [register],
});

export const transformExecutionDuration = new Histogram({
  name: 'transform_execution_duration_seconds',
  help: 'Transform execution duration in seconds',
  labelNames: ['status'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [register],
});

export const transformOutputSize = new Histogram({
  name: 'transform_output_size_bytes',
  help: 'Size of transform outputs in bytes',
  labelNames: ['format'],
  buckets: [1024, 10240, 102400, 1048576, 10485760, 52428800],
  registers: [register],
});

// Cache metrics
export const cacheOperationsTotal = new Counter({
  name: 'cache_operations_total',
  help: 'Total number of cache operations',
  labelNames: ['operation', 'result'],
  registers: [register],
});

// Admission metrics
export const admissionDecisionsTotal = new Counter({
  name: 'admission_decisions_total',
  help: 'Total number of admission decisions',
  labelNames: ['action', 'decision'],
  registers: [register],
});

// Job metrics
export const jobTransitionsTotal = new Counter({
  name: 'job_transitions_total',
  help: 'Total number of job state transitions',
  labelNames: ['state'],
  registers: [register],
});

export const jobQueueDepth = new Gauge({
  name: 'job_queue_depth',
  help: 'Jobs currently waiting or running',
  labelNames: ['state'],
  registers: [register],
});

export function recordHttpRequest(method: string, path: string, status: number, durationMs: number): void {
  httpRequestsTotal.inc({ method, path, status: String(status) });
  httpRequestDuration.observe({ method, path, status: String(status) }, durationMs / 1000);
}

export function recordTransform(success: boolean, durationMs: number, format?: string, outputSize?: number): void {
  const status = success ? 'success' : 'error';
  transformExecutionsTotal.inc({ status });
  transformExecutionDuration.observe({ status }, durationMs / 1000);
  if (success && format !== undefined && outputSize !== undefined) {
    transformOutputSize.observe({ format }, outputSize);
  }
}

export function recordCacheOperation(operation: 'get' | 'put' | 'delete', result: 'hit' | 'miss' | 'stored' | 'skipped' | 'error'): void {
  cacheOperationsTotal.inc({ operation, result });
}

export function recordAdmission(action: string, allowed: boolean): void {
  admissionDecisionsTotal.inc({ action, decision: allowed ? 'allowed' : 'throttled' });
}

export function recordJobTransition(state: string): void {
  jobTransitionsTotal.inc({ state });
}

export function setQueueDepth(queued: number, running: number): void {
  jobQueueDepth.set({ state: 'queued' }, queued);
  jobQueueDepth.set({ state: 'running' }, running);
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}

export { register };
