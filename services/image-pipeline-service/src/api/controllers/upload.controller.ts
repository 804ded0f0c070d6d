import { FastifyRequest, FastifyReply } from 'fastify';
import { MultipartFile } from '@fastify/multipart';
import { AppError } from '@domain/errors';
import { toImageView } from '@domain/types';
import { identityOf } from '@api/middlewares';
import { PipelineService } from '@services/pipeline';
import { getRequestId, sendSuccess, sendError } from '@shared/utils/response';

export class UploadController {
  constructor(
    private readonly pipeline: PipelineService,
    private readonly maxFileSizeBytes: number
  ) {}

  async uploadFile(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const requestId = getRequestId(request);

    try {
      // The body is only read once the upload has been admitted.
      const record = await this.pipeline.uploadImage(identityOf(request), async () => {
        const file = await request.file();
        if (!file) {
          throw AppError.invalidImage('No file provided');
        }
        return this.processMultipartFile(file);
      });

      sendSuccess(reply, requestId, toImageView(record), 201);
    } catch (error) {
      sendError(reply, requestId, error);
    }
  }

  private async processMultipartFile(file: MultipartFile): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let totalSize = 0;

    try {
      for await (const chunk of file.file) {
        totalSize += chunk.length;
        if (totalSize > this.maxFileSizeBytes) {
          throw this.tooLarge();
        }
        chunks.push(chunk);
      }
    } catch (error) {
      // The multipart limit sits one byte above ours and may abort the stream first.
      if (isFileSizeLimit(error)) throw this.tooLarge();
      throw error;
    }

    return Buffer.concat(chunks);
  }

  private tooLarge(): AppError {
    return AppError.fileTooLarge(
      `File size exceeds maximum allowed size of ${this.maxFileSizeBytes} bytes`,
      { maxSize: this.maxFileSizeBytes }
    );
  }
}

function isFileSizeLimit(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'FST_REQ_FILE_TOO_LARGE';
}
