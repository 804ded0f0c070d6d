import Fastify, { FastifyInstance, FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import fastifyMultipart from '@fastify/multipart';
import fastifyCors from '@fastify/cors';
import fastifyHelmet from '@fastify/helmet';
import { v4 as uuidv4 } from 'uuid';
import { AppError, ErrorCode } from '@domain/errors';
import { createAuthMiddleware } from '@api/middlewares';
import { registerRoutes } from '@api/routes';
import { Pipeline } from '@services/pipeline';
import { sendError } from '@shared/utils/response';
import { getCurrentTraceContext, getContentType, getMetrics } from './observability';
import { recordHttpRequest } from './observability/metrics';
import { registerHealthEndpoints } from './health';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
    startTime: number;
  }
}

export async function createServer(pipeline: Pipeline): Promise<FastifyInstance> {
  const { config, logger } = pipeline;
  const server = Fastify({
    logger: false, // Using platform logging client instead
    genReqId: () => uuidv4(),
  });

  await server.register(fastifyCors, { origin: true, credentials: true });
  await server.register(fastifyHelmet, { contentSecurityPolicy: false });
  await server.register(fastifyMultipart, {
    limits: { fileSize: config.storage.maxFileSizeBytes + 1, files: 1 },
  });

  server.addHook('onRequest', async (request: FastifyRequest) => {
    request.requestId = request.id;
    request.startTime = Date.now();
  });

  server.addHook('preHandler', createAuthMiddleware(config.auth));

  server.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    const duration = Date.now() - request.startTime;
    const traceContext = getCurrentTraceContext();
    const path = request.routeOptions.url ?? request.url;

    logger.info('Request completed', {
      requestId: request.requestId,
      userId: request.user?.id,
      method: request.method,
      path: request.url,
      statusCode: reply.statusCode,
      duration,
      traceId: traceContext?.traceId,
      spanId: traceContext?.spanId,
    });

    recordHttpRequest(request.method, path, reply.statusCode, duration);
  });

  server.setErrorHandler(async (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const requestId = request.requestId || uuidv4();
    const traceContext = getCurrentTraceContext();

    if (error instanceof AppError) {
      logger.warn('Application error', {
        requestId,
        traceId: traceContext?.traceId,
        error: error.toJSON(),
      });
      sendError(reply, requestId, error);
      return reply;
    }

    if (error.validation) {
      sendError(reply, requestId, AppError.validationError(error.message, []));
      return reply;
    }

    if (error.code === 'FST_REQ_FILE_TOO_LARGE') {
      sendError(reply, requestId, AppError.fileTooLarge(error.message, { maxSize: config.storage.maxFileSizeBytes }));
      return reply;
    }

    logger.error('Unexpected error', error, {
      requestId,
      traceId: traceContext?.traceId,
      url: request.url,
      method: request.method,
    });

    sendError(reply, requestId, new AppError(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
    return reply;
  });

  registerHealthEndpoints(server, pipeline);

  server.get('/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
    const metrics = await getMetrics();
    reply.header('Content-Type', getContentType()).send(metrics);
  });

  await registerRoutes(server, pipeline);

  return server;
}

export async function startServer(server: FastifyInstance, pipeline: Pipeline): Promise<void> {
  const { host, port } = pipeline.config.server;
  await server.listen({ port, host });
  pipeline.logger.info(`Server listening on ${host}:${port}`);
}
