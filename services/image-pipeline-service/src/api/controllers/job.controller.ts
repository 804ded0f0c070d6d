import { FastifyRequest, FastifyReply } from 'fastify';
import { identityOf } from '@api/middlewares';
import { PipelineService } from '@services/pipeline';
import { getRequestId, sendSuccess, sendError, sendImage } from '@shared/utils/response';

interface JobParams {
  jobId: string;
}

export class JobController {
  constructor(private readonly pipeline: PipelineService) {}

  async getStatus(
    request: FastifyRequest<{ Params: JobParams }>,
    reply: FastifyReply
  ): Promise<void> {
    const requestId = getRequestId(request);

    try {
      const status = await this.pipeline.getJobStatus(identityOf(request), request.params.jobId);
      sendSuccess(reply, requestId, status);
    } catch (error) {
      sendError(reply, requestId, error);
    }
  }

  async getResult(
    request: FastifyRequest<{ Params: JobParams }>,
    reply: FastifyReply
  ): Promise<void> {
    const requestId = getRequestId(request);

    try {
      const artifact = await this.pipeline.getJobResult(identityOf(request), request.params.jobId);
      sendImage(reply, requestId, artifact, 'job', request.headers.accept);
    } catch (error) {
      sendError(reply, requestId, error);
    }
  }

  async cancel(
    request: FastifyRequest<{ Params: JobParams }>,
    reply: FastifyReply
  ): Promise<void> {
    const requestId = getRequestId(request);

    try {
      const result = await this.pipeline.cancelJob(identityOf(request), request.params.jobId);
      sendSuccess(reply, requestId, result);
    } catch (error) {
      sendError(reply, requestId, error);
    }
  }
}
