import { ErrorCode, ERROR_HTTP_STATUS } from './error-codes';

export interface FieldError {
  field: string;
  message: string;
  code: string;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  fields?: FieldError[];
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly details?: Record<string, unknown>;
  public readonly fields?: FieldError[];

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, fields?: FieldError[]) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code];
    this.details = details;
    this.fields = fields;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      fields: this.fields,
    };
  }

  static validationError(message: string, fields: FieldError[]): ValidationError {
    return new ValidationError(ErrorCode.VALIDATION_ERROR, message, { fields }, fields);
  }

  static invalidDimensions(message: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(ErrorCode.INVALID_DIMENSIONS, message, details);
  }

  static cropOutOfBounds(message: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(ErrorCode.CROP_OUT_OF_BOUNDS, message, details);
  }

  static invalidFormat(message: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(ErrorCode.INVALID_FORMAT, message, details);
  }

  static invalidQuality(message: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(ErrorCode.INVALID_QUALITY, message, details);
  }

  static invalidImage(message: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(ErrorCode.INVALID_IMAGE, message, details);
  }

  static fileTooLarge(message: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(ErrorCode.FILE_TOO_LARGE, message, details);
  }

  static imageNotFound(message: string, details?: Record<string, unknown>): NotFoundError {
    return new NotFoundError(ErrorCode.IMAGE_NOT_FOUND, message, details);
  }

  static jobNotFound(message: string, details?: Record<string, unknown>): NotFoundError {
    return new NotFoundError(ErrorCode.JOB_NOT_FOUND, message, details);
  }

  static jobNotReady(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(ErrorCode.JOB_NOT_READY, message, details);
  }

  static executionError(message: string, details?: Record<string, unknown>): ExecutionError {
    return new ExecutionError(message, details);
  }

  static timeout(message: string, details?: Record<string, unknown>): TimeoutError {
    return new TimeoutError(message, details);
  }

  static cacheUnavailable(message: string, details?: Record<string, unknown>): CacheUnavailableError {
    return new CacheUnavailableError(message, details);
  }

  static storageError(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(ErrorCode.STORAGE_ERROR, message, details);
  }

  static unauthorized(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(ErrorCode.MISSING_TOKEN, message, details);
  }

  static forbidden(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(ErrorCode.INSUFFICIENT_PERMISSIONS, message, details);
  }

  static rateLimitExceeded(message: string, retryAfterMs: number, details?: Record<string, unknown>): ThrottledError {
    return new ThrottledError(message, retryAfterMs, details);
  }
}

/** Malformed spec, parameters or upload. Raised before anything is enqueued. */
export class ValidationError extends AppError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, fields?: FieldError[]) {
    super(code, message, details, fields);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(code: ErrorCode.IMAGE_NOT_FOUND | ErrorCode.JOB_NOT_FOUND, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'NotFoundError';
  }
}

/** Admission denial. `retryAfterMs` is how long until a token is available again. */
export class ThrottledError extends AppError {
  public readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number, details?: Record<string, unknown>) {
    const retryAfterSeconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
    super(ErrorCode.RATE_LIMIT_EXCEEDED, message, { ...details, retryAfterMs, retryAfter: retryAfterSeconds });
    this.name = 'ThrottledError';
    this.retryAfterMs = retryAfterMs;
  }

  get retryAfterSeconds(): number {
    return Math.max(1, Math.ceil(this.retryAfterMs / 1000));
  }
}

export class ExecutionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.EXECUTION_ERROR, message, details);
    this.name = 'ExecutionError';
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.EXECUTION_TIMEOUT, message, details);
    this.name = 'TimeoutError';
  }
}

export class CacheUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CACHE_UNAVAILABLE, message, details);
    this.name = 'CacheUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
