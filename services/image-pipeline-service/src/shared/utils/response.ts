import { FastifyReply, FastifyRequest } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { AppError, ErrorCode, ErrorDetails, ThrottledError } from '@domain/errors';
import { Artifact, ImageMetadata } from '@domain/types';

export interface SuccessResponse<T = unknown> {
  success: true;
  requestId: string;
  data: T;
}

export interface ErrorResponse {
  success: false;
  requestId: string;
  error: ErrorDetails;
}

export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;

// Required headers for all responses
export const REQUIRED_HEADERS = {
  REQUEST_ID: 'X-Request-Id',
} as const;

// Required headers for image responses
export const IMAGE_HEADERS = {
  CONTENT_TYPE: 'Content-Type',
  WIDTH: 'X-Image-Width',
  HEIGHT: 'X-Image-Height',
  SIZE: 'X-Image-Size',
  FORMAT: 'X-Image-Format',
  FINGERPRINT: 'X-Fingerprint',
  CACHE: 'X-Cache',
} as const;

export const RETRY_AFTER_HEADER = 'Retry-After';

export function getRequestId(request: FastifyRequest): string {
  return request.requestId || request.id || uuidv4();
}

export interface ImageResponseData {
  image: string;
  fingerprint: string;
  source: string;
  metadata: ImageMetadata;
}

export function sendSuccess<T>(
  reply: FastifyReply,
  requestId: string,
  data: T,
  statusCode = 200
): void {
  const response: SuccessResponse<T> = {
    success: true,
    requestId,
    data,
  };
  reply
    .status(statusCode)
    .header(REQUIRED_HEADERS.REQUEST_ID, requestId)
    .send(response);
}

export function sendError(
  reply: FastifyReply,
  requestId: string,
  error: unknown
): void {
  if (error instanceof AppError) {
    const response: ErrorResponse = {
      success: false,
      requestId,
      error: error.toJSON(),
    };
    if (error instanceof ThrottledError) {
      reply.header(RETRY_AFTER_HEADER, error.retryAfterSeconds.toString());
    }
    reply
      .status(error.httpStatus)
      .header(REQUIRED_HEADERS.REQUEST_ID, requestId)
      .send(response);
  } else {
    const response: ErrorResponse = {
      success: false,
      requestId,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
      },
    };
    reply
      .status(500)
      .header(REQUIRED_HEADERS.REQUEST_ID, requestId)
      .send(response);
  }
}

/**
 * Binary body with `X-Image-*` headers, or a JSON envelope with base64 bytes
 * when the client asks for `application/json`.
 */
export function sendImage(
  reply: FastifyReply,
  requestId: string,
  artifact: Artifact,
  source: string,
  acceptHeader?: string
): void {
  const { metadata } = artifact;
  const wantsJson = acceptHeader?.includes('application/json');

  reply
    .header(IMAGE_HEADERS.FINGERPRINT, artifact.fingerprint)
    .header(IMAGE_HEADERS.CACHE, source === 'cache' ? 'HIT' : 'MISS');

  if (wantsJson) {
    sendSuccess<ImageResponseData>(reply, requestId, {
      image: artifact.buffer.toString('base64'),
      fingerprint: artifact.fingerprint,
      source,
      metadata,
    });
  } else {
    reply
      .status(200)
      .header(IMAGE_HEADERS.CONTENT_TYPE, metadata.mimeType)
      .header(REQUIRED_HEADERS.REQUEST_ID, requestId)
      .header(IMAGE_HEADERS.WIDTH, metadata.width.toString())
      .header(IMAGE_HEADERS.HEIGHT, metadata.height.toString())
      .header(IMAGE_HEADERS.SIZE, metadata.size.toString())
      .header(IMAGE_HEADERS.FORMAT, metadata.format)
      .send(artifact.buffer);
  }
}
