import { FastifyInstance } from 'fastify';
import jwt from 'jsonwebtoken';
import { createServer } from '../../../src/infrastructure/server';
import { Pipeline } from '../../../src/services/pipeline';
import { createTestPipeline } from '../../helpers/fakes';
import { generateTestImage, getImageInfo } from '../../helpers/images';

const BOUNDARY = '----pipeline-test-boundary';

function bearer(userId: string): string {
  const token = jwt.sign({ sub: userId }, 'test-secret', {
    issuer: 'auth-platform',
    audience: 'image-pipeline-service',
    expiresIn: '1h',
  });
  return `Bearer ${token}`;
}

function multipart(bytes: Buffer, filename = 'upload.png'): Buffer {
  return Buffer.concat([
    Buffer.from(
      `--${BOUNDARY}\r\nContent-Disposition: form-data; name="file"; filename="${filename}"\r\n` +
      'Content-Type: application/octet-stream\r\n\r\n'
    ),
    bytes,
    Buffer.from(`\r\n--${BOUNDARY}--\r\n`),
  ]);
}

describe('API Integration Tests', () => {
  let pipeline: Pipeline;
  let server: FastifyInstance;

  async function start(env: NodeJS.ProcessEnv = {}, now?: () => number): Promise<void> {
    pipeline = createTestPipeline(env, now ? { now } : {});
    server = await createServer(pipeline);
  }

  async function upload(bytes: Buffer, userId = 'user-1') {
    return server.inject({
      method: 'POST',
      url: '/images',
      headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}`, authorization: bearer(userId) },
      payload: multipart(bytes),
    });
  }

  async function uploadId(bytes: Buffer): Promise<string> {
    const response = await upload(bytes);
    expect(response.statusCode).toBe(201);
    const id: unknown = response.json().data.id;
    if (typeof id !== 'string') throw new Error('upload returned no id');
    return id;
  }

  afterEach(async () => {
    await server.close();
    await pipeline.close();
  });

  describe('Health', () => {
    it('should report liveness and readiness of the in-memory components', async () => {
      await start();

      const live = await server.inject({ method: 'GET', url: '/health/live' });
      expect(live.statusCode).toBe(200);

      const ready = await server.inject({ method: 'GET', url: '/health/ready' });
      expect(ready.statusCode).toBe(200);
      expect(ready.json()).toMatchObject({
        status: 'healthy',
        checks: {
          metadata: { status: 'healthy', backend: 'memory' },
          storage: { status: 'healthy', backend: 'memory' },
          cache: { status: 'healthy', backend: 'memory' },
        },
        jobs: { queued: 0, running: 0, tracked: 0 },
      });
    });

    it('should expose Prometheus metrics', async () => {
      await start();
      const response = await server.inject({ method: 'GET', url: '/metrics' });

      expect(response.statusCode).toBe(200);
      expect(response.body).toContain('http_requests_total');
    });
  });

  describe('Uploads', () => {
    it('should require authentication', async () => {
      await start();
      const response = await server.inject({
        method: 'POST',
        url: '/images',
        headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
        payload: multipart(await generateTestImage(8, 8, 'png')),
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ success: false, error: { code: 'MISSING_TOKEN' } });
    });

    it('should register an image and describe it without its storage key', async () => {
      await start();
      const bytes = await generateTestImage(30, 20, 'png');
      const response = await upload(bytes);

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(body.data).toMatchObject({ ownerId: 'user-1', width: 30, height: 20, format: 'png', size: bytes.length });
      expect(body.data.storageKey).toBeUndefined();

      const metadata = await server.inject({
        method: 'GET',
        url: `/images/${body.data.id}/metadata`,
        headers: { authorization: bearer('user-1') },
      });
      expect(metadata.json().data).toEqual(body.data);
    });

    it('should throttle uploads with a Retry-After hint', async () => {
      await start({ ADMISSION_UPLOAD_BURST: '1', ADMISSION_UPLOAD_RATE: '0.5' }, () => 0);
      const bytes = await generateTestImage(8, 8, 'png');

      expect((await upload(bytes)).statusCode).toBe(201);
      const throttled = await upload(bytes);

      expect(throttled.statusCode).toBe(429);
      expect(throttled.headers['retry-after']).toBe('2');
      expect(throttled.json()).toMatchObject({ error: { code: 'RATE_LIMIT_EXCEEDED' } });
    });

    it('should reject files that are not images', async () => {
      await start();
      const response = await upload(Buffer.from('plain text'));

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('INVALID_IMAGE');
    });

    it('should reject files over the size limit', async () => {
      await start({ MAX_FILE_SIZE_BYTES: '100' });
      const response = await upload(Buffer.alloc(500, 1));

      expect(response.statusCode).toBe(413);
      expect(response.json().error.code).toBe('FILE_TOO_LARGE');
    });
  });

  describe('Delivery', () => {
    it('should serve the original and then transformed variants', async () => {
      await start();
      const bytes = await generateTestImage(80, 60, 'png');
      const id = await uploadId(bytes);
      const auth = { authorization: bearer('user-1') };

      const original = await server.inject({ method: 'GET', url: `/images/${id}`, headers: auth });
      expect(original.statusCode).toBe(200);
      expect(original.rawPayload.equals(bytes)).toBe(true);

      const ops = JSON.stringify([{ op: 'resize', width: 40 }]);
      const transformed = await server.inject({
        method: 'GET',
        url: `/images/${id}`,
        headers: auth,
        query: { ops, format: 'webp', waitMs: '10000' },
      });
      expect(transformed.statusCode).toBe(200);
      expect(transformed.headers['content-type']).toBe('image/webp');
      expect(transformed.headers['x-cache']).toBe('MISS');
      expect(await getImageInfo(transformed.rawPayload)).toEqual({ width: 40, height: 30, format: 'webp' });

      const cached = await server.inject({ method: 'GET', url: `/images/${id}`, headers: auth, query: { ops, format: 'webp' } });
      expect(cached.headers['x-cache']).toBe('HIT');
      expect(cached.headers['x-fingerprint']).toBe(transformed.headers['x-fingerprint']);
    });

    it('should return a job handle and then its result', async () => {
      await start();
      const id = await uploadId(await generateTestImage(32, 32, 'png'));
      const auth = { authorization: bearer('user-1') };

      const submitted = await server.inject({
        method: 'POST',
        url: `/images/${id}/transform`,
        headers: auth,
        payload: { operations: [{ op: 'grayscale' }], format: 'png' },
      });
      expect(submitted.statusCode).toBe(202);
      const jobId: unknown = submitted.json().data.jobId;
      if (typeof jobId !== 'string') throw new Error('no job id');

      await pipeline.jobs.wait(jobId, 10_000);

      const status = await server.inject({ method: 'GET', url: `/jobs/${jobId}`, headers: auth });
      expect(status.json().data).toMatchObject({ jobId, imageId: id, state: 'succeeded', outputFormat: 'png' });

      const result = await server.inject({ method: 'GET', url: `/jobs/${jobId}/result`, headers: auth });
      expect(result.statusCode).toBe(200);
      expect(await getImageInfo(result.rawPayload)).toEqual({ width: 32, height: 32, format: 'png' });

      const cancelled = await server.inject({ method: 'DELETE', url: `/jobs/${jobId}`, headers: auth });
      expect(cancelled.json().data).toMatchObject({ jobId, outcome: 'terminal' });

      const foreign = await server.inject({ method: 'GET', url: `/jobs/${jobId}`, headers: { authorization: bearer('user-2') } });
      expect(foreign.statusCode).toBe(403);
    });

    it('should validate operations and report unknown images', async () => {
      await start();
      const id = await uploadId(await generateTestImage(16, 16, 'png'));
      const auth = { authorization: bearer('user-1') };

      const badJson = await server.inject({ method: 'GET', url: `/images/${id}`, headers: auth, query: { ops: '[{' } });
      expect(badJson.statusCode).toBe(400);
      expect(badJson.json().error.code).toBe('VALIDATION_ERROR');

      const outOfBounds = await server.inject({
        method: 'POST',
        url: `/images/${id}/transform`,
        headers: auth,
        payload: { operations: [{ op: 'crop', x: 10, y: 10, width: 10, height: 10 }] },
      });
      expect(outOfBounds.statusCode).toBe(400);
      expect(outOfBounds.json().error.code).toBe('CROP_OUT_OF_BOUNDS');

      const unknown = await server.inject({ method: 'GET', url: '/images/does-not-exist', headers: auth });
      expect(unknown.statusCode).toBe(404);
    });

    it('should delete images', async () => {
      await start();
      const id = await uploadId(await generateTestImage(16, 16, 'png'));
      const auth = { authorization: bearer('user-1') };

      const deleted = await server.inject({ method: 'DELETE', url: `/images/${id}`, headers: auth });
      expect(deleted.json()).toMatchObject({ success: true, data: { id, deleted: true } });

      const gone = await server.inject({ method: 'GET', url: `/images/${id}`, headers: auth });
      expect(gone.statusCode).toBe(404);
    });
  });
});
