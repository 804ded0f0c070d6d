import { FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from '@domain/errors';
import { toImageView } from '@domain/types';
import { identityOf } from '@api/middlewares';
import { validateTransformRequest } from '@api/validators';
import { DeliveryResult, PipelineService } from '@services/pipeline';
import { getRequestId, sendSuccess, sendError, sendImage } from '@shared/utils/response';

interface ImageParams {
  id: string;
}

interface ImageQuery {
  ops?: string;
  format?: string;
  waitMs?: string;
}

export class ImageController {
  constructor(private readonly pipeline: PipelineService) {}

  async get(
    request: FastifyRequest<{ Params: ImageParams; Querystring: ImageQuery }>,
    reply: FastifyReply
  ): Promise<void> {
    const requestId = getRequestId(request);

    try {
      const { ops, format, waitMs } = request.query;
      const result = await this.pipeline.getImage(
        identityOf(request),
        request.params.id,
        parseOperations(ops),
        format || undefined,
        { waitMs: parseWait(waitMs) }
      );

      this.sendResult(reply, requestId, result, request.headers.accept);
    } catch (error) {
      sendError(reply, requestId, error);
    }
  }

  async metadata(
    request: FastifyRequest<{ Params: ImageParams }>,
    reply: FastifyReply
  ): Promise<void> {
    const requestId = getRequestId(request);

    try {
      const record = await this.pipeline.getImageRecord(identityOf(request), request.params.id);
      sendSuccess(reply, requestId, toImageView(record));
    } catch (error) {
      sendError(reply, requestId, error);
    }
  }

  async delete(
    request: FastifyRequest<{ Params: ImageParams }>,
    reply: FastifyReply
  ): Promise<void> {
    const requestId = getRequestId(request);

    try {
      await this.pipeline.deleteImage(identityOf(request), request.params.id);
      sendSuccess(reply, requestId, { id: request.params.id, deleted: true });
    } catch (error) {
      sendError(reply, requestId, error);
    }
  }

  async transform(
    request: FastifyRequest<{ Params: ImageParams; Body: unknown }>,
    reply: FastifyReply
  ): Promise<void> {
    const requestId = getRequestId(request);

    try {
      const body = validateTransformRequest(request.body ?? {});
      const result = await this.pipeline.submitTransform(
        identityOf(request),
        request.params.id,
        body.operations,
        body.format,
        { waitMs: body.waitMs }
      );

      this.sendResult(reply, requestId, result, request.headers.accept);
    } catch (error) {
      sendError(reply, requestId, error);
    }
  }

  private sendResult(reply: FastifyReply, requestId: string, result: DeliveryResult, accept?: string): void {
    if (result.kind === 'artifact') {
      sendImage(reply, requestId, result.artifact, result.source, accept);
      return;
    }
    sendSuccess(reply, requestId, result.job, 202);
  }
}

function parseOperations(ops: string | undefined): unknown {
  if (ops === undefined || ops === '') return undefined;
  try {
    return JSON.parse(ops);
  } catch {
    throw AppError.validationError('Validation failed', [
      { field: 'ops', message: 'Operations must be a JSON array', code: 'invalid_json' },
    ]);
  }
}

function parseWait(waitMs: string | undefined): number {
  if (waitMs === undefined || waitMs === '') return 0;
  const value = Number(waitMs);
  if (!Number.isInteger(value) || value < 0 || value > 60000) {
    throw AppError.validationError('Validation failed', [
      { field: 'waitMs', message: 'waitMs must be an integer between 0 and 60000', code: 'invalid_wait' },
    ]);
  }
  return value;
}
